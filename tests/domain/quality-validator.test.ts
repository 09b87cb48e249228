import { describe, it, expect } from 'vitest';
import { createEventRecord, gradeFor, QualityValidator, summarizeQuality } from '../../src/domain/index.js';
import { makeRecord, TODAY } from '../helpers.js';

const validator = new QualityValidator(() => TODAY);

describe('QualityValidator.validate', () => {
  it('flags an empty title as a critical integrity issue', () => {
    const event = createEventRecord({ title: '' });
    const issues = validator.validate(event);

    expect(issues.map((i) => i.code)).toEqual([
      'empty-title',
      'missing-timing',
      'missing-location',
      'short-description',
      'missing-source-url',
    ]);
    expect(issues[0]?.severity).toBe('critical');
    expect(event.qualityLevel).toBe('poor');
  });

  it('flags start dates more than the tolerance in the past', () => {
    const event = makeRecord({ timing: { startDate: '2025-05-01' } });
    expect(validator.validate(event).map((i) => i.code)).toContain('start-date-past');
  });

  it('reports known typos without a fix', () => {
    const event = makeRecord({ title: '高岡七夕マツリ' });
    const typo = validator.validate(event).find((i) => i.code === 'known-typo');
    expect(typo?.suggestedFix).toBe('「マツリ」→「まつり」');
    expect(typo?.fix).toBeNull();
  });

  it('flags placeholder titles as suspicious', () => {
    const event = makeRecord({ title: 'テストイベント' });
    const suspicious = validator.validate(event).filter((i) => i.category === 'suspicious_data');
    expect(suspicious).toHaveLength(1);
  });

  it('notes festivals held on weekdays', () => {
    // 2025-08-04 is a Monday
    const event = makeRecord({ category: 'festival', timing: { startDate: '2025-08-04' } });
    expect(validator.validate(event).map((i) => i.code)).toContain('weekday-festival');
  });
});

describe('QualityValidator.score', () => {
  it('weights completeness, accuracy, consistency and reliability', () => {
    const event = createEventRecord({ title: '' });
    const metrics = validator.score(event, validator.validate(event));

    expect(metrics.completeness).toBe(0);
    expect(metrics.accuracy).toBe(70);
    expect(metrics.consistency).toBe(100);
    expect(metrics.reliability).toBe(100);
    expect(metrics.overall).toBeCloseTo(62.5);
    expect(metrics.issuesBySeverity).toEqual({ critical: 1, high: 2, medium: 1, low: 1, info: 0 });
  });
});

describe('QualityValidator.autoFix', () => {
  const messy = makeRecord({
    title: '  高岡  七夕まつり ',
    timing: { startDate: '2025-08-02', startTime: '21:00', endTime: '18:00' },
    pricing: { isFree: false, adultPrice: -500 },
  });

  it('applies only the safe corrections', () => {
    const { event, fixesApplied } = validator.autoFix(messy, validator.validate(messy));

    expect(fixesApplied).toBe(3);
    expect(event.title).toBe('高岡 七夕まつり');
    expect(event.timing?.startTime).toBe('18:00');
    expect(event.timing?.endTime).toBe('21:00');
    expect(event.pricing?.adultPrice).toBe(500);
    expect(messy.pricing?.adultPrice).toBe(-500);
  });

  it('is idempotent', () => {
    const once = validator.autoFix(messy, validator.validate(messy)).event;
    const twice = validator.autoFix(once, validator.validate(once));
    expect(twice.fixesApplied).toBe(0);
    expect(twice.event).toBe(once);
  });

  it('swaps inverted times exposed by clamping the end date', () => {
    const event = makeRecord({
      timing: { startDate: '2025-08-05', endDate: '2025-08-04', startTime: '18:00', endTime: '10:00' },
    });
    expect(event.timing?.durationMinutes).toBeNull();

    const first = validator.validateAll([event]);
    expect(first.autoFixesApplied).toBe(2);
    expect(first.events[0]?.timing).toEqual({
      startDate: '2025-08-05',
      endDate: '2025-08-05',
      startTime: '10:00',
      endTime: '18:00',
      isAllDay: false,
      durationMinutes: 480,
    });

    const second = validator.validateAll(first.events);
    expect(second.autoFixesApplied).toBe(0);
    expect(second.events[0]).toBe(first.events[0]);
  });

  it('clamps an end date before the start date', () => {
    const event = makeRecord({ timing: { startDate: '2025-08-02', endDate: '2025-08-01' } });
    const fixed = validator.autoFix(event, validator.validate(event)).event;
    expect(fixed.timing?.endDate).toBe('2025-08-02');
  });

  it('counts fixes across a batch and re-validates fixed records', () => {
    const batch = validator.validateAll([messy, makeRecord()]);
    expect(batch.autoFixesApplied).toBe(3);
    expect(batch.reports[0]?.issues.some((i) => i.fix !== null)).toBe(false);
  });

  it('leaves records alone when auto-fix is off', () => {
    const batch = validator.validateAll([messy], { autoFix: false });
    expect(batch.events[0]).toBe(messy);
    expect(batch.autoFixesApplied).toBe(0);
  });
});

describe('summarizeQuality', () => {
  it('grades the batch on its average overall score', () => {
    const event = createEventRecord({ title: '' });
    const summary = summarizeQuality(validator.validateAll([event]).reports);

    expect(summary.eventCount).toBe(1);
    expect(summary.averages.overall).toBe(62.5);
    expect(summary.grade).toBe('D');
    expect(summary.issuesByCategory).toEqual({ integrity: 1, completeness: 4 });
    expect(summary.suggestions[0]).toBe('1件の重大な問題を優先的に修正してください');
  });

  it('maps scores onto letter grades', () => {
    expect(gradeFor(90)).toBe('A');
    expect(gradeFor(89.9)).toBe('B');
    expect(gradeFor(59.9)).toBe('F');
  });
});
