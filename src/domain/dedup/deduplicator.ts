import type { EventRecord } from '../event.js';
import type { SimilarityEngine } from '../similarity/similarity-engine.js';
import { classifyMatch, confidenceLevelFor, explainMatch, isAutoMergeable } from './classify.js';
import { mergeRecords } from './merge.js';
import type { ConfidenceLevel, DeduplicationResult, DuplicateMatch } from './types.js';

/**
 * Pairwise duplicate detection and greedy merging.
 *
 * Records are addressed by their index in the input list (a fixed arena for
 * the duration of one pass). Merged records are new objects and are never
 * compared again within the same pass.
 */
export class Deduplicator {
  private readonly engine: SimilarityEngine;
  private readonly nowFn: () => number;

  constructor(engine: SimilarityEngine, nowFn: () => number = () => performance.now()) {
    this.engine = engine;
    this.nowFn = nowFn;
  }

  /** Compare one pair; `null` when the pair is a different event. */
  compare(leftId: number, left: EventRecord, rightId: number, right: EventRecord): DuplicateMatch | null {
    const similarity = this.engine.compare(left, right);
    const matchType = classifyMatch(similarity);
    if (matchType === 'different_event') return null;

    const confidence = similarity.overall;
    const isDuplicate = matchType === 'exact_duplicate' || matchType === 'likely_duplicate';

    return {
      leftId,
      rightId,
      left,
      right,
      matchType,
      confidence,
      confidenceLevel: confidenceLevelFor(confidence),
      similarity,
      reasoning: explainMatch(similarity),
      mergeSuggestion: isDuplicate ? mergeRecords(left, right) : null,
      autoMergeable: isAutoMergeable(matchType, confidence),
    };
  }

  /** All non-different pairs, highest confidence first (stable on ties). */
  findDuplicates(events: readonly EventRecord[]): DuplicateMatch[] {
    const matches: DuplicateMatch[] = [];

    events.forEach((left, i) => {
      for (let j = i + 1; j < events.length; j++) {
        const right = events[j];
        if (right === undefined) continue;
        const match = this.compare(i, left, j, right);
        if (match !== null) matches.push(match);
      }
    });

    return matches.sort((a, b) => b.confidence - a.confidence);
  }

  /**
   * Greedy, confidence-ordered, non-transitive merge pass.
   *
   * Each record takes part in at most one merge; a merged record takes the
   * slot of its earlier member so output order follows input order.
   */
  deduplicate(events: readonly EventRecord[], autoMerge: boolean = true): DeduplicationResult {
    const startedAt = this.nowFn();
    const matches = this.findDuplicates(events);

    const confidenceDistribution: Record<ConfidenceLevel, number> = {
      very_high: 0,
      high: 0,
      medium: 0,
      low: 0,
      very_low: 0,
    };
    for (const match of matches) {
      confidenceDistribution[match.confidenceLevel] += 1;
    }

    const consumed = new Set<number>();
    const mergedAt = new Map<number, EventRecord>();

    if (autoMerge) {
      for (const match of matches) {
        if (!match.autoMergeable || match.mergeSuggestion === null) continue;
        if (consumed.has(match.leftId) || consumed.has(match.rightId)) continue;

        consumed.add(match.leftId);
        consumed.add(match.rightId);
        mergedAt.set(match.leftId, match.mergeSuggestion);
      }
    }

    const output: EventRecord[] = [];
    events.forEach((event, id) => {
      const merged = mergedAt.get(id);
      if (merged !== undefined) output.push(merged);
      else if (!consumed.has(id)) output.push(event);
    });

    return {
      originalCount: events.length,
      deduplicatedCount: output.length,
      mergedCount: mergedAt.size,
      events: output,
      matches,
      confidenceDistribution,
      processingTimeMs: this.nowFn() - startedAt,
    };
  }
}
