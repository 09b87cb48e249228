import stringSimilarity from 'string-similarity';
import { indelSimilarity } from '../../domain/index.js';
import type { StringSimilarity } from '../../domain/index.js';

export const SIMILARITY_BACKENDS = ['indel', 'dice'] as const;
export type SimilarityBackendName = (typeof SIMILARITY_BACKENDS)[number];

/**
 * Sørensen–Dice coefficient over character bigrams, from `string-similarity`.
 * Strings shorter than two characters only match when identical.
 */
export const diceSimilarity: StringSimilarity = {
  name: 'dice',
  ratio(a, b) {
    if (a === b) return 1;
    if (a === '' || b === '') return 0;
    return stringSimilarity.compareTwoStrings(a, b);
  },
};

export function selectSimilarityBackend(name: SimilarityBackendName): StringSimilarity {
  return name === 'dice' ? diceSimilarity : indelSimilarity;
}
