import type { EventRecord, IsoDate } from '../event.js';

export type IssueSeverity = 'critical' | 'high' | 'medium' | 'low' | 'info';

export const ISSUE_SEVERITIES: readonly IssueSeverity[] = ['critical', 'high', 'medium', 'low', 'info'];

export type IssueCategory =
  | 'integrity'
  | 'completeness'
  | 'consistency'
  | 'accuracy'
  | 'formatting'
  | 'business_logic'
  | 'suspicious_data';

/** The only corrections the validator applies on its own. */
export const AUTO_FIX_KINDS = ['collapse-whitespace', 'clamp-end-date', 'swap-times', 'negate-price'] as const;
export type AutoFixKind = (typeof AUTO_FIX_KINDS)[number];

/**
 * A structured, non-fatal finding about one record.
 *
 * `fix` is set only when the finding can be corrected automatically.
 */
export interface ValidationIssue {
  readonly eventId: string;
  readonly eventTitle: string;
  readonly category: IssueCategory;
  readonly severity: IssueSeverity;
  readonly code: string;
  readonly message: string;
  readonly field: string;
  readonly currentValue: string | number | null;
  readonly suggestedFix: string | null;
  readonly fix: AutoFixKind | null;
  readonly confidence: number;
}

export interface QualityMetrics {
  readonly completeness: number;
  readonly accuracy: number;
  readonly consistency: number;
  readonly reliability: number;
  readonly overall: number;
  readonly issueCount: number;
  readonly issuesBySeverity: Readonly<Record<IssueSeverity, number>>;
}

export interface QualityConfig {
  readonly pastToleranceDays: number;
  readonly futureYears: number;
  readonly minTitleLength: number;
  readonly maxTitleLength: number;
  readonly minDescriptionLength: number;
  readonly maxPrice: number;
  readonly maxDurationDays: number;
  /** City base names checked for title/location agreement. */
  readonly cityNames: readonly string[];
  readonly festivalWords: readonly string[];
  /** [misspelling, correction] pairs; reported, never auto-applied. */
  readonly typos: readonly (readonly [string, string])[];
  /** Case-insensitive regular expression sources flagging placeholder content. */
  readonly suspiciousPatterns: readonly string[];
}

export interface ValidationContext {
  readonly today: IsoDate;
  readonly config: QualityConfig;
}

/** One independent rule group. Pure: no I/O, no mutation. */
export interface ValidationRule {
  readonly id: string;
  readonly category: IssueCategory;
  check(event: EventRecord, context: ValidationContext): ValidationIssue[];
}
