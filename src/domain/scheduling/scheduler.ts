import { fromMinutes, reviseEventRecord, toMinutes } from '../event.js';
import type { EventCategory, EventRecord, QualityLevel } from '../event.js';
import { createDefaultDetectors } from './detectors.js';
import { PRIORITY_RANK } from './types.js';
import type {
  ConflictDetector,
  ConflictType,
  DetectorContext,
  EventPriority,
  OptimizationResult,
  ScheduleConflict,
  ScheduleReport,
  SchedulerConfig,
  VenueInfo,
} from './types.js';

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  venues: [
    { name: '富山市民会館', capacity: 2000, venueType: 'ホール', address: '富山市新総曲輪4-18', latitude: 36.6916, longitude: 137.2137 },
    { name: '高岡市民会館', capacity: 1500, venueType: 'ホール', address: '高岡市中川1-1-25', latitude: 36.753, longitude: 137.0236 },
    { name: '富山城址公園', capacity: 10000, venueType: '公園', address: '富山市本丸1', latitude: 36.6936, longitude: 137.2107 },
    { name: '環水公園', capacity: 5000, venueType: '公園', address: '富山市湊入船町', latitude: 36.7073, longitude: 137.2166 },
  ],
  criticalPatterns: ['第\\d+回.*(まつり|祭)', '花火大会', 'おわら風の盆', '官公庁', '市制.*周年', '県.*主催'],
  highPatterns: [
    'まつり|祭り?',
    'フェスティバル|festival|フェス',
    'コンサート|concert|ライブ',
    '展示会|exhibition',
    '限定|特別|special',
  ],
  categoryPriority: {
    festival: 'high',
    culture: 'medium',
    sports: 'medium',
    market: 'low',
    food: 'low',
  },
  attendanceBase: 100,
  attendanceMultipliers: {
    festival: 5,
    entertainment: 3,
    culture: 2,
    sports: 2.5,
    market: 1.5,
    food: 2,
    nature: 1.8,
    education: 1.2,
    business: 1,
    other: 0.8,
  },
  travel: { speedKmh: 30, crossCityMinutes: 45, sameCityMinutes: 15 },
  shiftMinutes: 30,
  clashCategories: ['festival', 'entertainment', 'market'],
  autoResolveBelow: { timeOverlap: 0.3, travelTime: 0.5 },
};

const LAST_MINUTE_OF_DAY = 23 * 60 + 59;

const RECOMMENDATIONS: Readonly<Record<ConflictType, (count: number) => string>> = {
  time_overlap: (n) => `${n}件の時間重複があります。イベント時間の調整を検討してください`,
  venue_capacity: (n) => `${n}件の会場定員不足があります。より大きな会場への変更を検討してください`,
  travel_time: (n) => `${n}件の移動時間不足があります。イベント間の時間調整を検討してください`,
  category_clash: (n) => `${n}件のカテゴリ競合があります。イベントの連携や差別化を検討してください`,
};

function sumSeverity(conflicts: readonly ScheduleConflict[]): number {
  return conflicts.reduce((sum, c) => sum + c.severity, 0);
}

/**
 * Priority assignment, pairwise conflict detection and single-strategy
 * optimization over a deduplicated event set.
 *
 * Events are addressed by their index in the input list; `optimize` never
 * mutates its input and returns shifted copies in `optimizedEvents`.
 */
export class SmartScheduler {
  private readonly config: SchedulerConfig;
  private readonly detectors: readonly ConflictDetector[];
  private readonly context: DetectorContext;
  private readonly criticalPatterns: readonly RegExp[];
  private readonly highPatterns: readonly RegExp[];

  constructor(
    config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
    detectors: readonly ConflictDetector[] = createDefaultDetectors(),
  ) {
    this.config = config;
    this.detectors = detectors;
    this.context = {
      config,
      venues: new Map(config.venues.map((v): [string, VenueInfo] => [v.name, v])),
    };
    this.criticalPatterns = config.criticalPatterns.map((p) => new RegExp(p, 'i'));
    this.highPatterns = config.highPatterns.map((p) => new RegExp(p, 'i'));
  }

  /** First matching rule wins: critical patterns, high patterns, category, quality. */
  priority(event: EventRecord): EventPriority {
    if (this.criticalPatterns.some((re) => re.test(event.title))) return 'critical';
    if (this.highPatterns.some((re) => re.test(event.title))) return 'high';

    const byCategory = this.config.categoryPriority[event.category];
    if (byCategory !== undefined) return byCategory;

    if (event.qualityScore >= 80) return 'medium';
    if (event.qualityScore >= 60) return 'low';
    return 'flexible';
  }

  detectConflicts(events: readonly EventRecord[]): ScheduleConflict[] {
    const conflicts: ScheduleConflict[] = [];
    for (let i = 0; i < events.length; i++) {
      for (let j = i + 1; j < events.length; j++) {
        const first = events[i];
        const second = events[j];
        if (first === undefined || second === undefined) continue;

        for (const detector of this.detectors) {
          const finding = detector.detect(first, second, this.context);
          if (finding !== null) {
            conflicts.push({ type: detector.type, firstId: i, secondId: j, first, second, ...finding });
          }
        }
      }
    }
    return conflicts;
  }

  optimize(events: readonly EventRecord[]): OptimizationResult {
    const conflicts = this.detectConflicts(events);
    const working = [...events];
    const resolved: ScheduleConflict[] = [];
    const remaining: ScheduleConflict[] = [];

    const ordered = [...conflicts].sort((a, b) => b.severity - a.severity);
    for (const conflict of ordered) {
      if (conflict.autoResolvable && this.tryShift(conflict, working)) {
        resolved.push(conflict);
      } else {
        remaining.push(conflict);
      }
    }

    const initial = sumSeverity(conflicts);
    const score = initial > 0 ? 1 - sumSeverity(remaining) / initial : 1;

    return {
      optimizedEvents: working,
      conflicts,
      resolved,
      remaining,
      score: Math.min(1, Math.max(0, score)),
      recommendations: this.recommend(remaining),
    };
  }

  generateScheduleReport(events: readonly EventRecord[]): ScheduleReport {
    const optimization = this.optimize(events);

    const byCategory: Partial<Record<EventCategory, number>> = {};
    const byDate: Record<string, number> = {};
    const byPriority: Record<EventPriority, number> = { critical: 0, high: 0, medium: 0, low: 0, flexible: 0 };
    const byQualityLevel: Record<QualityLevel, number> = { high: 0, medium: 0, low: 0, poor: 0 };

    for (const event of events) {
      byCategory[event.category] = (byCategory[event.category] ?? 0) + 1;
      if (event.timing !== null) {
        byDate[event.timing.startDate] = (byDate[event.timing.startDate] ?? 0) + 1;
      }
      byPriority[this.priority(event)] += 1;
      byQualityLevel[event.qualityLevel] += 1;
    }

    const busiestDates = Object.entries(byDate)
      .map(([date, count]) => ({ date, count }))
      .sort((a, b) => b.count - a.count || a.date.localeCompare(b.date))
      .slice(0, 5);

    const insights: string[] = [];
    const peak = busiestDates[0];
    if (peak !== undefined && peak.count >= 3) {
      insights.push(`${peak.date}に${peak.count}件のイベントが集中しています`);
    }
    const topCategory = Object.entries(byCategory).sort((a, b) => b[1] - a[1])[0];
    if (topCategory !== undefined) {
      insights.push(`${topCategory[0]}カテゴリが最多で${topCategory[1]}件です`);
    }
    const lowQuality = byQualityLevel.low + byQualityLevel.poor;
    if (lowQuality > events.length * 0.3) {
      insights.push(`データ品質の低いイベントが${lowQuality}件あります`);
    }

    return {
      totalEvents: events.length,
      conflictsRemaining: optimization.remaining.length,
      conflictsResolved: optimization.resolved.length,
      optimizationScore: optimization.score,
      byCategory,
      byDate,
      busiestDates,
      byPriority,
      highPriorityCount: byPriority.critical + byPriority.high,
      byQualityLevel,
      remaining: optimization.remaining,
      recommendations: optimization.recommendations,
      insights,
    };
  }

  /**
   * Shift the lower-priority event of `conflict` away from the other one.
   * The shift is written into `working` only when it stays inside the day
   * and the same conflict type no longer fires for the pair.
   */
  private tryShift(conflict: ScheduleConflict, working: EventRecord[]): boolean {
    const first = working[conflict.firstId];
    const second = working[conflict.secondId];
    if (first === undefined || second === undefined) return false;

    const rankFirst = PRIORITY_RANK[this.priority(first)];
    const rankSecond = PRIORITY_RANK[this.priority(second)];
    if (rankFirst === rankSecond) return false;

    const [moveId, move, other] = rankFirst < rankSecond
      ? [conflict.firstId, first, second]
      : [conflict.secondId, second, first];

    const shifted = this.shift(move, other);
    if (shifted === null) return false;

    const detector = this.detectors.find((d) => d.type === conflict.type);
    if (detector === undefined || detector.detect(shifted, other, this.context) !== null) return false;

    working[moveId] = shifted;
    return true;
  }

  private shift(move: EventRecord, other: EventRecord): EventRecord | null {
    const t = move.timing;
    const o = other.timing;
    if (t === null || o === null) return null;
    if (t.startTime === null || t.endTime === null || o.startTime === null) return null;

    const start = toMinutes(t.startTime);
    const end = toMinutes(t.endTime);
    const delta = start >= toMinutes(o.startTime) ? this.config.shiftMinutes : -this.config.shiftMinutes;

    if (start + delta < 0 || end + delta > LAST_MINUTE_OF_DAY) return null;

    return reviseEventRecord(move, {
      timing: {
        startDate: t.startDate,
        endDate: t.endDate,
        startTime: fromMinutes(start + delta),
        endTime: fromMinutes(end + delta),
      },
    });
  }

  private recommend(remaining: readonly ScheduleConflict[]): string[] {
    if (remaining.length === 0) return ['重大なスケジュール競合はありません'];

    const counts = new Map<ConflictType, number>();
    for (const c of remaining) counts.set(c.type, (counts.get(c.type) ?? 0) + 1);

    return [...counts].map(([type, count]) => RECOMMENDATIONS[type](count));
  }
}
