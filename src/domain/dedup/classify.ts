import type { SimilarityVector } from '../similarity/similarity-engine.js';
import type { ConfidenceLevel, MatchType } from './types.js';

/** Confidence above which an exact/likely duplicate merges without review. */
export const AUTO_MERGE_CONFIDENCE = 0.9;

/** Thresholds are checked in priority order; first hit wins. */
export function classifyMatch(s: SimilarityVector): MatchType {
  if (s.overall > 0.95 && s.title > 0.9 && s.date > 0.8) return 'exact_duplicate';
  if (s.overall > 0.85 && s.title > 0.8 && s.date > 0.7) return 'likely_duplicate';
  if (s.overall > 0.7 && (s.title > 0.7 || (s.date > 0.9 && s.location > 0.8))) return 'similar_event';
  if (s.overall > 0.5 && (s.title > 0.5 || s.date > 0.8)) return 'related_event';
  return 'different_event';
}

export function confidenceLevelFor(confidence: number): ConfidenceLevel {
  if (confidence >= 0.95) return 'very_high';
  if (confidence >= 0.85) return 'high';
  if (confidence >= 0.7) return 'medium';
  if (confidence >= 0.5) return 'low';
  return 'very_low';
}

export function isAutoMergeable(matchType: MatchType, confidence: number): boolean {
  return (matchType === 'exact_duplicate' || matchType === 'likely_duplicate')
    && confidence > AUTO_MERGE_CONFIDENCE;
}

/** Human-readable reasons behind a match, one line per strong dimension. */
export function explainMatch(s: SimilarityVector): string[] {
  const reasons: string[] = [];

  if (s.title > 0.9) reasons.push('タイトルがほぼ同一です');
  else if (s.title > 0.7) reasons.push('タイトルが類似しています');

  if (s.date === 1) reasons.push('開催日が同一です');
  else if (s.date > 0.8) reasons.push('開催日が近接しています');

  if (s.location > 0.9) reasons.push('開催場所が同一です');
  else if (s.location > 0.7) reasons.push('開催場所が類似しています');

  if (s.category === 1) reasons.push('カテゴリが同一です');
  if (s.source < 0.5) reasons.push('同一ソースからの情報です');
  if (s.content > 0.7) reasons.push('説明文が類似しています');

  return reasons;
}
