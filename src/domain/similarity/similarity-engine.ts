import type { EventCategory, EventRecord } from '../event.js';
import { daysBetween } from '../calendar.js';
import type { Normalizer } from '../normalize/normalizer.js';
import { createFuzzyMatcher } from './string-similarity.js';
import type { FuzzyMatcher, StringSimilarity } from './string-similarity.js';

/** Per-dimension similarity of two records, every value in [0, 1]. */
export interface SimilarityVector {
  readonly title: number;
  readonly date: number;
  readonly location: number;
  readonly category: number;
  readonly source: number;
  readonly content: number;
  readonly overall: number;
}

export interface SimilarityWeights {
  readonly title: number;
  readonly date: number;
  readonly location: number;
  readonly category: number;
  readonly source: number;
}

export interface CategoryAffinity {
  readonly pair: readonly [EventCategory, EventCategory];
  readonly score: number;
}

export interface SimilarityConfig {
  readonly weights: SimilarityWeights;
  readonly categoryAffinity: readonly CategoryAffinity[];
  /** Source score when both records come from the same site. */
  readonly sameSourceScore: number;
}

export const DEFAULT_SIMILARITY_CONFIG: SimilarityConfig = {
  weights: { title: 0.4, date: 0.25, location: 0.2, category: 0.1, source: 0.05 },
  categoryAffinity: [
    { pair: ['festival', 'entertainment'], score: 0.7 },
    { pair: ['culture', 'education'], score: 0.6 },
    { pair: ['market', 'food'], score: 0.8 },
    { pair: ['sports', 'nature'], score: 0.5 },
  ],
  sameSourceScore: 0.3,
};

function affinityKey(a: EventCategory, b: EventCategory): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

/** Day-distance decay between two start dates. */
export function dateSimilarity(a: EventRecord, b: EventRecord): number {
  if (a.timing === null || b.timing === null) return 0;
  const start1 = a.timing.startDate;
  const start2 = b.timing.startDate;
  if (start1 === start2) return 1;

  const d = Math.abs(daysBetween(start1, start2));
  if (d <= 7) return 0.8 - (d / 7) * 0.3;
  if (start1.slice(0, 7) === start2.slice(0, 7)) return 0.5 - (d / 31) * 0.2;
  if (d > 365) return 0;
  return Math.max(0, 0.3 - (d / 365) * 0.3);
}

function characterJaccard(a: string, b: string): number {
  const left = new Set(a);
  const right = new Set(b);
  const union = new Set([...left, ...right]);
  if (union.size === 0) return 0;
  let shared = 0;
  for (const ch of left) {
    if (right.has(ch)) shared++;
  }
  return shared / union.size;
}

function sharesSource(a: EventRecord, b: EventRecord): boolean {
  if (a.sourceSite === b.sourceSite) return true;
  return a.sources.some((s) => b.sources.includes(s));
}

/**
 * Multi-dimensional similarity between two event records.
 *
 * Title similarity takes the strongest of several string measures, so a
 * single strong signal is enough to surface a candidate; the dedup
 * classifier thresholds decide what that candidate is.
 */
export class SimilarityEngine {
  private readonly normalizer: Normalizer;
  private readonly config: SimilarityConfig;
  private readonly matcher: FuzzyMatcher;
  /** Unordered category pair → affinity score. */
  private readonly affinity: ReadonlyMap<string, number>;

  constructor(
    normalizer: Normalizer,
    backend?: StringSimilarity,
    config: SimilarityConfig = DEFAULT_SIMILARITY_CONFIG,
  ) {
    this.normalizer = normalizer;
    this.config = config;
    this.matcher = createFuzzyMatcher(backend);
    this.affinity = new Map(
      config.categoryAffinity.map(({ pair, score }) => [affinityKey(pair[0], pair[1]), score]),
    );
  }

  titleSimilarity(title1: string, title2: string): number {
    const a = this.normalizer.normalizeTitle(title1);
    const b = this.normalizer.normalizeTitle(title2);
    if (a === '' || b === '') return 0;
    if (a === b) return 1;

    const scores = [
      this.matcher.ratio(a, b),
      this.matcher.partialRatio(a, b),
      this.matcher.tokenSortRatio(a, b),
      this.matcher.tokenSetRatio(a, b),
      characterJaccard(a, b),
    ];

    const [shorter, longer] = [...a].length <= [...b].length ? [a, b] : [b, a];
    const shortLength = [...shorter].length;
    if (shortLength > 3 && longer.includes(shorter)) {
      scores.push(shortLength / [...longer].length);
    }

    return Math.max(...scores);
  }

  locationSimilarity(a: EventRecord, b: EventRecord): number {
    const name1 = a.location?.name ?? '';
    const name2 = b.location?.name ?? '';
    if (name1 === '' || name2 === '') return 0;

    const loc1 = this.normalizer.normalizeLocation(name1);
    const loc2 = this.normalizer.normalizeLocation(name2);
    if (loc1 === '' || loc2 === '') return 0;
    if (loc1 === loc2) return 1;
    return this.matcher.ratio(loc1, loc2);
  }

  categorySimilarity(a: EventCategory, b: EventCategory): number {
    if (a === b) return 1;
    return this.affinity.get(affinityKey(a, b)) ?? 0;
  }

  contentSimilarity(a: EventRecord, b: EventRecord): number {
    const d1 = a.description.trim().toLowerCase();
    const d2 = b.description.trim().toLowerCase();
    if (d1 === '' || d2 === '') return 0;
    return this.matcher.tokenSetRatio(d1, d2);
  }

  compare(a: EventRecord, b: EventRecord): SimilarityVector {
    const w = this.config.weights;
    const title = this.titleSimilarity(a.title, b.title);
    const date = dateSimilarity(a, b);
    const location = this.locationSimilarity(a, b);
    const category = this.categorySimilarity(a.category, b.category);
    const source = sharesSource(a, b) ? this.config.sameSourceScore : 1;
    const content = this.contentSimilarity(a, b);

    const weighted = title * w.title
      + date * w.date
      + location * w.location
      + category * w.category
      + source * w.source;

    return {
      title,
      date,
      location,
      category,
      source,
      content,
      overall: Math.min(1, Math.max(0, weighted)),
    };
  }
}
