import { describe, it, expect } from 'vitest';
import {
  createFuzzyMatcher,
  createNormalizer,
  dateSimilarity,
  indelSimilarity,
  SimilarityEngine,
} from '../../src/domain/index.js';
import { makeRecord } from '../helpers.js';

const engine = new SimilarityEngine(createNormalizer());

describe('indelSimilarity', () => {
  it('is 2·LCS over the combined length', () => {
    expect(indelSimilarity.ratio('abc', 'abd')).toBeCloseTo(4 / 6);
    expect(indelSimilarity.ratio('kitten', 'sitting')).toBeCloseTo(8 / 13);
  });

  it('is 1 for equal strings and 0 against an empty one', () => {
    expect(indelSimilarity.ratio('まつり', 'まつり')).toBe(1);
    expect(indelSimilarity.ratio('まつり', '')).toBe(0);
  });
});

describe('createFuzzyMatcher', () => {
  const matcher = createFuzzyMatcher();

  it('finds the shorter string inside the longer one', () => {
    expect(matcher.partialRatio('七夕', '高岡七夕まつり')).toBe(1);
  });

  it('ignores token order', () => {
    expect(matcher.tokenSortRatio('jazz night toyama', 'toyama jazz night')).toBe(1);
  });
});

describe('dateSimilarity', () => {
  it('decays with the distance between start dates', () => {
    const a = makeRecord({ timing: { startDate: '2025-08-02' } });
    expect(dateSimilarity(a, makeRecord({ timing: { startDate: '2025-08-02' } }))).toBe(1);
    expect(dateSimilarity(a, makeRecord({ timing: { startDate: '2025-08-05' } }))).toBeCloseTo(0.8 - (3 / 7) * 0.3);
    expect(dateSimilarity(a, makeRecord({ timing: null }))).toBe(0);
  });
});

describe('SimilarityEngine', () => {
  const a = makeRecord({
    title: '第72回 高岡七夕まつり',
    category: 'festival',
    location: { name: '高岡市中心部' },
    sourceSite: 'toyama-navi',
  });
  const b = makeRecord({
    title: '高岡七夕祭り2025',
    category: 'festival',
    location: { name: '高岡市' },
    sourceSite: 'takaoka-info',
  });

  it('scores the same festival from two sites as identical on every dimension', () => {
    const v = engine.compare(a, b);
    expect(v.title).toBe(1);
    expect(v.date).toBe(1);
    expect(v.location).toBe(1);
    expect(v.category).toBe(1);
    expect(v.source).toBe(1);
    expect(v.overall).toBeCloseTo(1);
  });

  it('is symmetric', () => {
    const c = makeRecord({ title: '富山マラソン', category: 'sports', timing: { startDate: '2025-11-02' } });
    expect(engine.compare(a, c).overall).toBeCloseTo(engine.compare(c, a).overall);
  });

  it('gives a shared source the configured same-source score', () => {
    const sameSite = makeRecord({ title: '高岡七夕祭り2025', sourceSite: 'toyama-navi' });
    expect(engine.compare(a, sameSite).source).toBe(0.3);
  });

  it('uses category affinity for related categories', () => {
    expect(engine.categorySimilarity('market', 'food')).toBe(0.8);
    expect(engine.categorySimilarity('food', 'market')).toBe(0.8);
    expect(engine.categorySimilarity('sports', 'business')).toBe(0);
  });
});
