import { describe, expect, it } from 'vitest';
import {
  bigramSimilarity,
  claimSimilarity,
  cosineSimilarity,
  findSimilar,
  jaccardSimilarity,
  similarityTokens,
} from '../../../src/services/claimSimilarity';

describe('similarityTokens', () => {
  it('drops punctuation, stopwords and short words', () => {
    expect(similarityTokens('The dam in Kerala has burst!')).toEqual(['dam', 'kerala', 'burst']);
    expect(similarityTokens('Is it true that an 5G tower spreads COVID?')).toEqual(['tower', 'spreads', 'covid']);
  });
});

describe('word measures', () => {
  it('computes Jaccard over word sets', () => {
    expect(jaccardSimilarity(['dam', 'kerala', 'burst'], ['dam', 'burst', 'chennai'])).toBe(0.5);
    expect(jaccardSimilarity([], ['dam'])).toBe(0);
  });

  it('computes cosine over word counts', () => {
    expect(cosineSimilarity(['flood', 'flood', 'chennai'], ['flood', 'chennai'])).toBeCloseTo(3 / Math.sqrt(10), 10);
    expect(cosineSimilarity(['flood'], ['curfew'])).toBe(0);
  });
});

describe('bigramSimilarity', () => {
  it('scores shared character pairs', () => {
    expect(bigramSimilarity('Night', 'nacht')).toBe(0.25);
    expect(bigramSimilarity('Dam  burst', 'dam burst')).toBe(1);
  });

  it('is zero for texts too short to compare', () => {
    expect(bigramSimilarity('', '')).toBe(0);
    expect(bigramSimilarity('a', 'b')).toBe(0);
  });
});

describe('claimSimilarity', () => {
  it('is one for the same claim and zero for unrelated single words', () => {
    expect(claimSimilarity('Dam burst in Kerala', 'dam burst in kerala')).toBeCloseTo(1, 10);
    expect(claimSimilarity('flood', 'curfew')).toBe(0);
  });
});

describe('findSimilar', () => {
  const past = ['dam burst in kerala', 'dam burst in kerala today', 'schools closed in delhi'];
  const text = (claim: string) => claim;

  it('returns matches above the threshold, best first, with rounded scores', () => {
    expect(findSimilar('Dam burst in Kerala', past, text)).toEqual([
      { item: 'dam burst in kerala', score: 1 },
      { item: 'dam burst in kerala today', score: 0.829 },
    ]);
  });

  it('honours threshold and limit', () => {
    expect(findSimilar('Dam burst in Kerala', past, text, { threshold: 0.9 })).toEqual([
      { item: 'dam burst in kerala', score: 1 },
    ]);
    expect(findSimilar('Dam burst in Kerala', past, text, { limit: 1 })).toHaveLength(1);
  });

  it('skips candidates without text', () => {
    expect(findSimilar('Dam burst in Kerala', [''], text, { threshold: 0 })).toEqual([]);
  });
});
