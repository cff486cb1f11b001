import { FactCheckResult, TrendingEntry } from '../interfaces/factCheckResult';
import { claimKey } from '../utils/normalize';

export interface TrendingRecorder {
  record(result: FactCheckResult): void;
}

export interface TrendingStoreOptions {
  maxEntries: number;
  halfLifeMs: number;
  now?: () => number;
}

export interface RankedEntry extends TrendingEntry {
  score: number;
}

/**
 * Bounded registry of recently checked claims, ranked by
 * seenCount * exp(-age / halfLife). Over capacity, the lowest score goes.
 */
export class TrendingStore implements TrendingRecorder {
  private readonly entries = new Map<string, TrendingEntry>();
  private readonly maxEntries: number;
  private readonly halfLifeMs: number;
  private readonly now: () => number;

  constructor(opts: TrendingStoreOptions) {
    this.maxEntries = Math.max(1, opts.maxEntries);
    this.halfLifeMs = Math.max(1, opts.halfLifeMs);
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  record(result: FactCheckResult): void {
    const key = claimKey(result.claim.normalizedText);
    const now = this.now();
    const previous = this.entries.get(key);
    this.entries.set(
      key,
      Object.freeze({ key, result, lastSeenAt: now, seenCount: (previous?.seenCount ?? 0) + 1 })
    );
    if (this.entries.size > this.maxEntries) {
      this.evictLowest(key, now);
    }
  }

  entry(normalizedText: string): TrendingEntry | undefined {
    return this.entries.get(claimKey(normalizedText));
  }

  score(entry: TrendingEntry, now: number = this.now()): number {
    const age = Math.max(0, now - entry.lastSeenAt);
    return entry.seenCount * Math.exp(-age / this.halfLifeMs);
  }

  /** Top `n` entries by decayed score; ties go to the most recently seen. */
  list(n: number): RankedEntry[] {
    const now = this.now();
    return [...this.entries.values()]
      .map(entry => ({ ...entry, score: this.score(entry, now) }))
      .sort((a, b) => b.score - a.score || b.lastSeenAt - a.lastSeenAt)
      .slice(0, Math.max(0, n));
  }

  private evictLowest(keep: string, now: number): void {
    let lowestKey: string | undefined;
    let lowestScore = Infinity;
    for (const [key, entry] of this.entries) {
      if (key === keep) {
        continue;
      }
      const score = this.score(entry, now);
      if (score < lowestScore) {
        lowestScore = score;
        lowestKey = key;
      }
    }
    if (lowestKey !== undefined) {
      this.entries.delete(lowestKey);
    }
  }
}
