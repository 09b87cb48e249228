export type {
  IssueSeverity,
  IssueCategory,
  AutoFixKind,
  ValidationIssue,
  QualityMetrics,
  QualityConfig,
  ValidationContext,
  ValidationRule,
} from './types.js';
export { ISSUE_SEVERITIES } from './types.js';
export {
  createIntegrityRule,
  createCompletenessRule,
  createConsistencyRule,
  createAccuracyRule,
  createFormattingRule,
  createBusinessLogicRule,
  createSuspiciousDataRule,
  createDefaultRules,
} from './rules.js';
export type { AutoFixResult, EventQualityReport, BatchValidation } from './validator.js';
export { QualityValidator, DEFAULT_QUALITY_CONFIG, filledFieldCount } from './validator.js';
export type { QualityGrade, QualitySummary } from './summary.js';
export { summarizeQuality, gradeFor } from './summary.js';
