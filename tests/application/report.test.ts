import { describe, it, expect } from 'vitest';
import { buildDuplicateReport, buildScheduleSummary, topEvents } from '../../src/application/index.js';
import { createNormalizer, Deduplicator, SimilarityEngine, SmartScheduler } from '../../src/domain/index.js';
import { makeRecord } from '../helpers.js';

const first = makeRecord({
  title: '第72回 高岡七夕まつり',
  description: '高岡駅前一帯で七夕飾りが楽しめます',
  category: 'festival',
  location: { name: '高岡市中心部' },
});
const second = makeRecord({
  title: '高岡七夕祭り2025',
  category: 'festival',
  location: { name: '高岡市' },
  sourceSite: 'takaoka-info',
});
const marathon = makeRecord({
  title: '富山マラソン',
  category: 'sports',
  timing: { startDate: '2025-11-02' },
  location: { name: '富山市' },
});

describe('buildDuplicateReport', () => {
  it('summarises merges by type and reduction', () => {
    const dedup = new Deduplicator(new SimilarityEngine(createNormalizer()), () => 0)
      .deduplicate([first, marathon, second]);
    const report = buildDuplicateReport(dedup);

    expect(report.originalCount).toBe(3);
    expect(report.deduplicatedCount).toBe(2);
    expect(report.reductionPercent).toBe(33.3);
    expect(report.byMatchType).toEqual({ exact_duplicate: 1 });
    expect(report.topMatches.map((m) => [m.left, m.right])).toEqual([['第72回 高岡七夕まつり', '高岡七夕祭り2025']]);
    expect(report.processingTimeMs).toBe(0);
  });
});

describe('buildScheduleSummary', () => {
  it('counts remaining conflicts by type', () => {
    const pottery = makeRecord({
      title: '陶芸教室',
      category: 'culture',
      timing: { startDate: '2025-08-02', startTime: '10:00', endTime: '16:00' },
    });
    const yoga = makeRecord({
      title: '市民ヨガ',
      category: 'sports',
      timing: { startDate: '2025-08-02', startTime: '14:00', endTime: '20:00' },
    });
    const summary = buildScheduleSummary(new SmartScheduler().optimize([pottery, yoga]));

    expect(summary).toMatchObject({ conflictCount: 1, resolvedCount: 0, remainingCount: 1, score: 0 });
    expect(summary.byType).toEqual({ time_overlap: 1 });
  });
});

describe('topEvents', () => {
  it('orders by quality and honours the limit', () => {
    expect(first.qualityScore).toBe(65);
    expect(marathon.qualityScore).toBe(50);

    const top = topEvents([marathon, first], 1);
    expect(top).toEqual([
      {
        title: '第72回 高岡七夕まつり',
        startDate: '2025-08-02',
        location: '高岡市中心部',
        category: 'festival',
        qualityScore: 65,
        sourceSite: 'toyama-navi',
      },
    ]);
  });
});
