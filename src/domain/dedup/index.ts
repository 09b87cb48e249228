export type { MatchType, ConfidenceLevel, DuplicateMatch, DeduplicationResult } from './types.js';
export { CONFIDENCE_LEVELS } from './types.js';
export { classifyMatch, confidenceLevelFor, explainMatch, isAutoMergeable, AUTO_MERGE_CONFIDENCE } from './classify.js';
export { mergeRecords } from './merge.js';
export { Deduplicator } from './deduplicator.js';
