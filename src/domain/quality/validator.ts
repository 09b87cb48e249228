import { reviseEventRecord } from '../event.js';
import type { EventRecord, IsoDate } from '../event.js';
import { createDefaultRules, tidyWhitespace } from './rules.js';
import { AUTO_FIX_KINDS } from './types.js';
import type {
  AutoFixKind,
  IssueSeverity,
  QualityConfig,
  QualityMetrics,
  ValidationIssue,
  ValidationRule,
} from './types.js';

export const DEFAULT_QUALITY_CONFIG: QualityConfig = {
  pastToleranceDays: 30,
  futureYears: 5,
  minTitleLength: 3,
  maxTitleLength: 200,
  minDescriptionLength: 10,
  maxPrice: 50_000,
  maxDurationDays: 365,
  cityNames: ['富山', '高岡', '魚津', '氷見', '黒部', '砺波', '射水', '滑川', '南砺', '小矢部'],
  festivalWords: ['まつり', '祭', 'festival', 'フェスティバル', 'フェス', '花火', '盆'],
  typos: [
    ['ﾏﾂﾘ', 'まつり'],
    ['マツリ', 'まつり'],
    ['富山県富山県', '富山県'],
    ['富山市富山市', '富山市'],
  ],
  suspiciousPatterns: [
    '\\btest\\b|テスト',
    '\\bsample\\b|サンプル',
    '\\bdummy\\b|ダミー',
    '\\bexample\\b',
    '^\\d+$',
    '^[a-z]+$',
    '(.)\\1{5,}',
    '未定|未確定|\\bTBD\\b|\\bTBA\\b',
  ],
};

const SCORE_WEIGHTS = { completeness: 0.3, accuracy: 0.25, consistency: 0.25, reliability: 0.2 } as const;

export interface AutoFixResult {
  readonly event: EventRecord;
  readonly fixesApplied: number;
}

export interface EventQualityReport {
  readonly event: EventRecord;
  readonly issues: readonly ValidationIssue[];
  readonly metrics: QualityMetrics;
  readonly fixesApplied: number;
}

export interface BatchValidation {
  readonly events: readonly EventRecord[];
  readonly reports: readonly EventQualityReport[];
  readonly autoFixesApplied: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function countBySeverity(issues: readonly ValidationIssue[]): Record<IssueSeverity, number> {
  const counts: Record<IssueSeverity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const i of issues) counts[i.severity] += 1;
  return counts;
}

/** Count of the ten completeness fields that carry a value. */
export function filledFieldCount(event: EventRecord): number {
  const filled = [
    event.title.trim() !== '',
    event.description.trim().length > 10,
    event.timing !== null,
    event.timing !== null && event.timing.startTime !== null,
    event.location !== null && event.location.name !== '',
    event.location !== null && event.location.address !== '',
    event.contact !== null && (event.contact.phone !== '' || event.contact.email !== ''),
    event.pricing !== null,
    event.sourceUrl.startsWith('http'),
    event.category !== 'other',
  ];
  return filled.filter(Boolean).length;
}

/**
 * Rule-based data-quality validation with a small set of safe corrections.
 *
 * Rules are injected so a deployment can add or drop groups; the clock is
 * injectable for deterministic date checks.
 */
export class QualityValidator {
  private readonly config: QualityConfig;
  private readonly rules: readonly ValidationRule[];
  private readonly todayFn: () => IsoDate;

  constructor(
    todayFn: () => IsoDate,
    config: QualityConfig = DEFAULT_QUALITY_CONFIG,
    rules: readonly ValidationRule[] = createDefaultRules(),
  ) {
    this.todayFn = todayFn;
    this.config = config;
    this.rules = rules;
  }

  validate(event: EventRecord): ValidationIssue[] {
    const context = { today: this.todayFn(), config: this.config };
    return this.rules.flatMap((rule) => rule.check(event, context));
  }

  score(event: EventRecord, issues: readonly ValidationIssue[]): QualityMetrics {
    const count = (predicate: (i: ValidationIssue) => boolean): number => issues.filter(predicate).length;

    const completeness = (filledFieldCount(event) / 10) * 100;
    const accuracy = Math.max(0,
      100 - 30 * count((i) => i.severity === 'critical') - 15 * count((i) => i.category === 'accuracy'));
    const consistency = Math.max(0, 100 - 20 * count((i) => i.category === 'consistency'));

    let reliability = 100 - 25 * count((i) => i.category === 'suspicious_data');
    if (event.sourceUrl.startsWith('https')) reliability += 5;
    if (event.contact !== null && event.contact.phone !== '' && event.contact.email !== '') reliability += 5;
    reliability = clamp(reliability, 0, 100);

    const overall = completeness * SCORE_WEIGHTS.completeness
      + accuracy * SCORE_WEIGHTS.accuracy
      + consistency * SCORE_WEIGHTS.consistency
      + reliability * SCORE_WEIGHTS.reliability;

    return {
      completeness,
      accuracy,
      consistency,
      reliability,
      overall,
      issueCount: issues.length,
      issuesBySeverity: countBySeverity(issues),
    };
  }

  /**
   * Apply the fixable subset of `issues`, returning a new record.
   * Issues without a `fix` tag are left alone.
   *
   * One fix can expose another (clamping the end date onto the start day
   * makes inverted times checkable), so the record is re-validated and
   * fixed again until no fixable issue remains, at most once per fix kind.
   */
  autoFix(event: EventRecord, issues: readonly ValidationIssue[]): AutoFixResult {
    let current = event;
    let pending = issues;
    let fixesApplied = 0;

    for (let pass = 0; pass < AUTO_FIX_KINDS.length; pass++) {
      const fixable = pending.filter((i): i is ValidationIssue & { fix: AutoFixKind } => i.fix !== null);
      if (fixable.length === 0) break;

      current = applyFixes(current, new Set(fixable.map((i) => i.fix)));
      fixesApplied += fixable.length;
      pending = this.validate(current);
    }

    return { event: current, fixesApplied };
  }

  /**
   * Validate every record, optionally auto-fixing and re-validating, and
   * score each against its final issue list.
   */
  validateAll(events: readonly EventRecord[], options: { autoFix: boolean } = { autoFix: true }): BatchValidation {
    const reports = events.map((original): EventQualityReport => {
      let event = original;
      let issues = this.validate(event);
      let fixesApplied = 0;

      if (options.autoFix) {
        const fixed = this.autoFix(event, issues);
        if (fixed.fixesApplied > 0) {
          event = fixed.event;
          fixesApplied = fixed.fixesApplied;
          issues = this.validate(event);
        }
      }

      return { event, issues, metrics: this.score(event, issues), fixesApplied };
    });

    return {
      events: reports.map((r) => r.event),
      reports,
      autoFixesApplied: reports.reduce((sum, r) => sum + r.fixesApplied, 0),
    };
  }
}

function applyFixes(event: EventRecord, kinds: ReadonlySet<AutoFixKind>): EventRecord {
  const title = kinds.has('collapse-whitespace') ? tidyWhitespace(event.title) : event.title;

  const t = event.timing;
  const swap = kinds.has('swap-times');
  const timing = t !== null && (swap || kinds.has('clamp-end-date'))
    ? {
      startDate: t.startDate,
      endDate: kinds.has('clamp-end-date') ? t.startDate : t.endDate,
      startTime: swap ? t.endTime : t.startTime,
      endTime: swap ? t.startTime : t.endTime,
    }
    : t;

  const p = event.pricing;
  const positive = (price: number | null): number | null => (price !== null && price < 0 ? -price : price);
  const pricing = p !== null && kinds.has('negate-price')
    ? {
      ...p,
      adultPrice: positive(p.adultPrice),
      childPrice: positive(p.childPrice),
      seniorPrice: positive(p.seniorPrice),
      advancePrice: positive(p.advancePrice),
    }
    : p;

  return reviseEventRecord(event, { title, timing, pricing });
}
