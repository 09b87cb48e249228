export type { StringSimilarity, FuzzyMatcher } from './string-similarity.js';
export { indelSimilarity, createFuzzyMatcher } from './string-similarity.js';
export type { SimilarityVector, SimilarityWeights, SimilarityConfig, CategoryAffinity } from './similarity-engine.js';
export { SimilarityEngine, dateSimilarity, DEFAULT_SIMILARITY_CONFIG } from './similarity-engine.js';
