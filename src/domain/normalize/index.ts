export type { Normalizer, NormalizerConfig } from './normalizer.js';
export { createNormalizer, foldText, foldKana, DEFAULT_NORMALIZER_CONFIG } from './normalizer.js';
