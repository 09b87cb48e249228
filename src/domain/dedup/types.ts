import type { EventRecord } from '../event.js';
import type { SimilarityVector } from '../similarity/similarity-engine.js';

export type MatchType =
  | 'exact_duplicate'
  | 'likely_duplicate'
  | 'similar_event'
  | 'related_event'
  | 'different_event';

export type ConfidenceLevel = 'very_high' | 'high' | 'medium' | 'low' | 'very_low';

export const CONFIDENCE_LEVELS: readonly ConfidenceLevel[] = ['very_high', 'high', 'medium', 'low', 'very_low'];

/**
 * A compared pair that is at least related.
 *
 * `leftId` / `rightId` index into the input list of the dedup pass;
 * `leftId < rightId` always holds.
 */
export interface DuplicateMatch {
  readonly leftId: number;
  readonly rightId: number;
  readonly left: EventRecord;
  readonly right: EventRecord;
  readonly matchType: Exclude<MatchType, 'different_event'>;
  readonly confidence: number;
  readonly confidenceLevel: ConfidenceLevel;
  readonly similarity: SimilarityVector;
  readonly reasoning: readonly string[];
  /** Present for exact and likely duplicates. */
  readonly mergeSuggestion: EventRecord | null;
  readonly autoMergeable: boolean;
}

export interface DeduplicationResult {
  readonly originalCount: number;
  readonly deduplicatedCount: number;
  readonly mergedCount: number;
  readonly events: readonly EventRecord[];
  readonly matches: readonly DuplicateMatch[];
  readonly confidenceDistribution: Readonly<Record<ConfidenceLevel, number>>;
  readonly processingTimeMs: number;
}
