import { toMinutes } from '../event.js';
import type { EventRecord, Timing } from '../event.js';
import { estimateAttendance, estimateTravelMinutes } from './estimates.js';
import type { ConflictDetector } from './types.js';

interface MinuteWindow {
  readonly start: number;
  readonly end: number;
}

function minuteWindow(timing: Timing): MinuteWindow | null {
  if (timing.startTime === null || timing.endTime === null) return null;
  return { start: toMinutes(timing.startTime), end: toMinutes(timing.endTime) };
}

export function dateRangesIntersect(a: Timing, b: Timing): boolean {
  const aEnd = a.endDate ?? a.startDate;
  const bEnd = b.endDate ?? b.startDate;
  return a.startDate <= bEnd && b.startDate <= aEnd;
}

/**
 * Whether two events occupy the same time: intersecting date ranges and,
 * when both are timed on the same start date, intersecting minute windows.
 */
export function eventsOverlap(a: Timing, b: Timing): boolean {
  if (!dateRangesIntersect(a, b)) return false;
  if (a.startDate !== b.startDate) return true;
  const wa = minuteWindow(a);
  const wb = minuteWindow(b);
  if (wa === null || wb === null) return true;
  return Math.min(wa.end, wb.end) - Math.max(wa.start, wb.start) > 0;
}

export function createTimeOverlapDetector(): ConflictDetector {
  return {
    type: 'time_overlap',
    detect(a, b, { config }) {
      if (a.timing === null || b.timing === null) return null;
      if (!dateRangesIntersect(a.timing, b.timing)) return null;
      if (a.timing.startDate !== b.timing.startDate) return null;

      const wa = minuteWindow(a.timing);
      const wb = minuteWindow(b.timing);

      if (wa === null || wb === null) {
        return {
          severity: 0.8,
          description: '同日に開催されるイベントです',
          suggestions: ['開催時間帯を明確にする', '別の日程を検討する'],
          autoResolvable: false,
        };
      }

      const overlap = Math.min(wa.end, wb.end) - Math.max(wa.start, wb.start);
      const longest = Math.max(wa.end - wa.start, wb.end - wb.start);
      if (overlap <= 0 || longest <= 0) return null;

      const severity = Math.min(1, overlap / longest);
      return {
        severity,
        description: `イベントが${overlap}分間重複しています`,
        suggestions: [`開始時刻を${config.shiftMinutes}分ずらす`, '別の日程を検討する'],
        autoResolvable: severity < config.autoResolveBelow.timeOverlap,
      };
    },
  };
}

export function createVenueCapacityDetector(): ConflictDetector {
  return {
    type: 'venue_capacity',
    detect(a, b, { config, venues }) {
      if (a.timing === null || b.timing === null || a.location === null || b.location === null) return null;
      if (a.location.name === '' || a.location.name !== b.location.name) return null;

      const venue = venues.get(a.location.name);
      if (venue === undefined || !eventsOverlap(a.timing, b.timing)) return null;

      const total = estimateAttendance(a, config) + estimateAttendance(b, config);
      if (total <= venue.capacity) return null;

      return {
        severity: Math.min(total / venue.capacity - 1, 1),
        description: `推定参加者数${total}人が${venue.name}の収容人数${venue.capacity}人を超えています`,
        suggestions: ['より大きな会場を検討する', '開催日をずらす', '入場制限を設ける'],
        autoResolvable: false,
      };
    },
  };
}

/** Order two same-day timed events by start time. */
function sequence(a: EventRecord, b: EventRecord): [EventRecord, MinuteWindow, EventRecord, MinuteWindow] | null {
  if (a.timing === null || b.timing === null) return null;
  const wa = minuteWindow(a.timing);
  const wb = minuteWindow(b.timing);
  if (wa === null || wb === null) return null;
  return wa.start <= wb.start ? [a, wa, b, wb] : [b, wb, a, wa];
}

export function createTravelTimeDetector(): ConflictDetector {
  return {
    type: 'travel_time',
    detect(a, b, { config }) {
      if (a.timing === null || b.timing === null || a.location === null || b.location === null) return null;
      if (a.timing.startDate !== b.timing.startDate) return null;
      if (a.location.name === '' || b.location.name === '' || a.location.name === b.location.name) return null;

      const ordered = sequence(a, b);
      if (ordered === null) return null;
      const [earlier, earlierWindow, later, laterWindow] = ordered;

      // Only sequential pairs; overlapping ones are a time overlap instead.
      const gap = laterWindow.start - earlierWindow.end;
      if (gap < 0 || earlier.location === null || later.location === null) return null;

      const travel = estimateTravelMinutes(earlier.location, later.location, config.travel);
      if (travel <= gap) return null;

      const severity = Math.min((travel - gap) / travel, 1);
      return {
        severity,
        description: `移動時間（約${Math.round(travel)}分）に対してイベント間隔が${gap}分しかありません`,
        suggestions: ['イベント間の間隔を広げる', '近隣の会場を検討する'],
        autoResolvable: severity < config.autoResolveBelow.travelTime,
      };
    },
  };
}

export function createCategoryClashDetector(): ConflictDetector {
  return {
    type: 'category_clash',
    detect(a, b, { config }) {
      if (a.timing === null || b.timing === null) return null;
      if (a.category !== b.category || !config.clashCategories.includes(a.category)) return null;
      if (!dateRangesIntersect(a.timing, b.timing)) return null;

      return {
        severity: 0.6,
        description: `同じカテゴリ（${a.category}）のイベントが同時期に開催されます`,
        suggestions: ['開催日をずらして集客の競合を避ける', '合同開催を検討する'],
        autoResolvable: false,
      };
    },
  };
}

export function createDefaultDetectors(): ConflictDetector[] {
  return [
    createTimeOverlapDetector(),
    createVenueCapacityDetector(),
    createTravelTimeDetector(),
    createCategoryClashDetector(),
  ];
}
