import { describe, it, expect } from 'vitest';
import { indelSimilarity } from '../../src/domain/index.js';
import { diceSimilarity, selectSimilarityBackend } from '../../src/infrastructure/index.js';

describe('diceSimilarity', () => {
  it('scores bigram overlap', () => {
    expect(diceSimilarity.ratio('night', 'nacht')).toBe(0.25);
  });

  it('treats identical strings as 1 and empty strings as 0', () => {
    expect(diceSimilarity.ratio('祭', '祭')).toBe(1);
    expect(diceSimilarity.ratio('', 'まつり')).toBe(0);
  });
});

describe('selectSimilarityBackend', () => {
  it('maps names to backends', () => {
    expect(selectSimilarityBackend('dice')).toBe(diceSimilarity);
    expect(selectSimilarityBackend('indel')).toBe(indelSimilarity);
  });
});
