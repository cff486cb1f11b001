import { describe, expect, it } from 'vitest';
import { TrendingStore } from '../../../src/services/trendingStore';
import { makeClaim, makeResult } from '../../helpers/fakes';

function resultFor(text: string) {
  return makeResult({ claim: makeClaim({ rawText: text, normalizedText: text.toLowerCase(), assertion: text }) });
}

describe('TrendingStore', () => {
  it('counts every sighting of the same claim', () => {
    const store = new TrendingStore({ maxEntries: 10, halfLifeMs: 1000, now: () => 0 });
    store.record(resultFor('Dam burst'));
    store.record(resultFor('Dam burst'));
    expect(store.entry('dam burst')?.seenCount).toBe(2);
    expect(store.size).toBe(1);
  });

  it('ranks by decayed score so a fresh claim can overtake a stale popular one', () => {
    let now = 0;
    const store = new TrendingStore({ maxEntries: 10, halfLifeMs: 1000, now: () => now });
    for (let i = 0; i < 3; i++) {
      store.record(resultFor('Stale'));
    }
    now = 5000;
    store.record(resultFor('Fresh'));

    const ranked = store.list(10);
    expect(ranked.map(entry => entry.result.claim.assertion)).toEqual(['Fresh', 'Stale']);
    expect(ranked[0].score).toBe(1);
    expect(ranked[1].score).toBeCloseTo(3 * Math.exp(-5), 10);
  });

  it('evicts the lowest-scoring entry once over capacity', () => {
    const store = new TrendingStore({ maxEntries: 2, halfLifeMs: 1000, now: () => 0 });
    store.record(resultFor('A'));
    store.record(resultFor('A'));
    store.record(resultFor('B'));
    store.record(resultFor('C'));

    expect(store.size).toBe(2);
    expect(store.entry('b')).toBeUndefined();
    expect(store.entry('a')?.seenCount).toBe(2);
    expect(store.entry('c')?.seenCount).toBe(1);
  });

  it('limits the listing', () => {
    const store = new TrendingStore({ maxEntries: 10, halfLifeMs: 1000, now: () => 0 });
    ['A', 'B', 'C'].forEach(text => store.record(resultFor(text)));
    expect(store.list(2)).toHaveLength(2);
    expect(store.list(0)).toEqual([]);
  });
});
