import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SCHEDULER_CONFIG,
  estimateTravelMinutes,
  haversineKm,
  SmartScheduler,
} from '../../src/domain/index.js';
import { makeRecord } from '../helpers.js';

const scheduler = new SmartScheduler();

describe('SmartScheduler.priority', () => {
  it('applies critical patterns, high patterns, category and quality in order', () => {
    expect(scheduler.priority(makeRecord({ title: '第72回 高岡七夕まつり' }))).toBe('critical');
    expect(scheduler.priority(makeRecord({ title: '冬のコンサート', category: 'market' }))).toBe('high');
    expect(scheduler.priority(makeRecord({ title: '陶芸教室', category: 'culture' }))).toBe('medium');
    expect(scheduler.priority(makeRecord({ title: '勉強会', timing: null, sourceSite: '' }))).toBe('flexible');
  });
});

describe('SmartScheduler.detectConflicts', () => {
  it('reports a partial time overlap and nothing else for unrelated categories', () => {
    const pottery = makeRecord({
      title: '陶芸教室',
      category: 'culture',
      timing: { startDate: '2025-08-02', startTime: '10:00', endTime: '16:00' },
      location: { name: '高岡市民会館' },
    });
    const yoga = makeRecord({
      title: '市民ヨガ',
      category: 'sports',
      timing: { startDate: '2025-08-02', startTime: '14:00', endTime: '20:00' },
      location: { name: '環水公園' },
    });

    const conflicts = scheduler.detectConflicts([pottery, yoga]);
    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]?.type).toBe('time_overlap');
    expect(conflicts[0]?.severity).toBeCloseTo(1 / 3);
    expect(conflicts[0]?.description).toBe('イベントが120分間重複しています');
    expect(conflicts[0]?.autoResolvable).toBe(false);
  });

  it('flags insufficient travel time between sequential events', () => {
    const morning = makeRecord({
      title: '陶芸教室',
      category: 'culture',
      timing: { startDate: '2025-08-02', startTime: '10:00', endTime: '12:00' },
      location: { name: '会場A', city: '富山市' },
    });
    const afternoon = makeRecord({
      title: '市民ヨガ',
      category: 'sports',
      timing: { startDate: '2025-08-02', startTime: '12:20', endTime: '14:00' },
      location: { name: '会場B', city: '高岡市' },
    });

    const [conflict, ...rest] = scheduler.detectConflicts([morning, afternoon]);
    expect(rest).toHaveLength(0);
    expect(conflict?.type).toBe('travel_time');
    expect(conflict?.severity).toBeCloseTo(25 / 45);
    expect(conflict?.description).toBe('移動時間（約45分）に対してイベント間隔が20分しかありません');
  });

  it('flags venue capacity, same-day and category clashes for two festivals at one small venue', () => {
    const small = new SmartScheduler({
      ...DEFAULT_SCHEDULER_CONFIG,
      venues: [{ name: '小ホール', capacity: 500, venueType: 'ホール', address: '', latitude: null, longitude: null }],
    });
    // quality 50 each; Saturday boost: 100 × 5 × 1.5 × 0.5 = 375 per event
    const a = makeRecord({ title: '高岡納涼まつり', category: 'festival', location: { name: '小ホール' } });
    const b = makeRecord({ title: '氷見港まつり', category: 'festival', location: { name: '小ホール' } });
    expect(a.qualityScore).toBe(50);

    const conflicts = small.detectConflicts([a, b]);
    expect(conflicts.map((c) => c.type)).toEqual(['time_overlap', 'venue_capacity', 'category_clash']);

    const venue = conflicts.find((c) => c.type === 'venue_capacity');
    expect(venue?.severity).toBe(0.5);
    expect(venue?.description).toBe('推定参加者数750人が小ホールの収容人数500人を超えています');
  });
});

describe('SmartScheduler.optimize', () => {
  it('scores an empty schedule as optimal', () => {
    const result = scheduler.optimize([]);
    expect(result.score).toBe(1);
    expect(result.recommendations).toEqual(['重大なスケジュール競合はありません']);
  });

  it('shifts the lower-priority event out of a small overlap', () => {
    const pottery = makeRecord({
      title: '陶芸教室',
      category: 'culture',
      timing: { startDate: '2025-08-02', startTime: '10:00', endTime: '16:00' },
    });
    const tasting = makeRecord({
      title: '地元グルメ市',
      category: 'food',
      timing: { startDate: '2025-08-02', startTime: '15:45', endTime: '17:00' },
    });

    const result = scheduler.optimize([pottery, tasting]);

    expect(result.conflicts).toHaveLength(1);
    expect(result.resolved).toHaveLength(1);
    expect(result.remaining).toHaveLength(0);
    expect(result.score).toBe(1);
    expect(result.optimizedEvents[0]).toBe(pottery);
    expect(result.optimizedEvents[1]?.timing?.startTime).toBe('16:15');
    expect(result.optimizedEvents[1]?.timing?.endTime).toBe('17:30');
    expect(tasting.timing?.startTime).toBe('15:45');
  });

  it('keeps a conflict whose shift would not clear it', () => {
    const pottery = makeRecord({
      title: '陶芸教室',
      category: 'culture',
      timing: { startDate: '2025-08-02', startTime: '10:00', endTime: '16:00' },
    });
    const tasting = makeRecord({
      title: '地元グルメ市',
      category: 'food',
      timing: { startDate: '2025-08-02', startTime: '15:00', endTime: '17:00' },
    });

    const result = scheduler.optimize([pottery, tasting]);
    expect(result.remaining).toHaveLength(1);
    expect(result.score).toBe(0);
    expect(result.recommendations).toEqual(['1件の時間重複があります。イベント時間の調整を検討してください']);
  });
});

describe('SmartScheduler.generateScheduleReport', () => {
  it('counts events per date and category and surfaces insights', () => {
    const events = [
      makeRecord({ title: '朝市', category: 'market', timing: { startDate: '2025-08-03' } }),
      makeRecord({ title: '夕市', category: 'market', timing: { startDate: '2025-08-03' } }),
      makeRecord({ title: '夜市', category: 'market', timing: { startDate: '2025-08-03' } }),
      makeRecord({ title: '陶芸教室', category: 'culture', timing: { startDate: '2025-08-10' } }),
    ];

    const report = scheduler.generateScheduleReport(events);
    expect(report.totalEvents).toBe(4);
    expect(report.byDate).toEqual({ '2025-08-03': 3, '2025-08-10': 1 });
    expect(report.busiestDates).toEqual([
      { date: '2025-08-03', count: 3 },
      { date: '2025-08-10', count: 1 },
    ]);
    expect(report.insights.slice(0, 2)).toEqual([
      '2025-08-03に3件のイベントが集中しています',
      'marketカテゴリが最多で3件です',
    ]);
  });
});

describe('estimates', () => {
  it('uses straight-line distance when both venues are geocoded', () => {
    expect(haversineKm(36.6916, 137.2137, 36.6916, 137.2137)).toBe(0);
    const a = { name: 'A', address: '', city: '富山市', prefecture: '', latitude: null, longitude: null, venueType: '' };
    const b = { ...a, name: 'B' };
    const travel = DEFAULT_SCHEDULER_CONFIG.travel;
    expect(estimateTravelMinutes(a, b, travel)).toBe(15);
    expect(estimateTravelMinutes(a, { ...b, city: '高岡市' }, travel)).toBe(45);
    expect(estimateTravelMinutes(a, a, travel)).toBe(0);
  });
});
