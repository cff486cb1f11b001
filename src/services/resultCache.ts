import { CacheEntry, FactCheckResult, Severity, Verdict } from '../interfaces/factCheckResult';
import { ResultStore } from '../models/factCheckModel';
import { logError, logInfo } from '../utils/logger';
import { claimKey } from '../utils/normalize';

export interface ResultCacheOptions {
  maxEntries: number;
  defaultTtlMs: number;
  now?: () => number;
  store?: ResultStore;
}

export interface CacheStats {
  entries: number;
  maxEntries: number;
  hits: number;
  misses: number;
  byVerdict: Partial<Record<Verdict, number>>;
  bySeverity: Partial<Record<Severity, number>>;
  persistent: boolean;
}

/**
 * Content-addressed result cache keyed by the hash of the normalized claim.
 * Map insertion order is the recency order: reads move an entry to the end.
 * Entries are frozen and only ever replaced whole.
 */
export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private readonly store?: ResultStore;
  private hits = 0;
  private misses = 0;

  constructor(opts: ResultCacheOptions) {
    this.maxEntries = Math.max(1, opts.maxEntries);
    this.defaultTtlMs = opts.defaultTtlMs;
    this.now = opts.now ?? Date.now;
    this.store = opts.store;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(normalizedText: string): Promise<FactCheckResult | null> {
    const key = claimKey(normalizedText);
    const cached = this.touch(key);
    if (cached) {
      this.hits++;
      return cached.result;
    }
    if (!this.store) {
      this.misses++;
      return null;
    }

    let stored: CacheEntry | null = null;
    try {
      stored = await this.store.load(key);
    } catch (err) {
      logError('Result store read failed', { key, error: err });
    }

    // A put that landed while the store was being read wins
    const raced = this.touch(key);
    if (raced) {
      this.hits++;
      return raced.result;
    }
    if (!stored || stored.expiresAt <= this.now() || stored.normalizedText !== normalizedText) {
      this.misses++;
      return null;
    }
    this.insert(Object.freeze({ ...stored, key }));
    this.hits++;
    logInfo('Cache', `Restored ${key.slice(0, 12)} from the result store`);
    return stored.result;
  }

  /** Whole-entry replacement; persistence failures are logged, never thrown. */
  async put(normalizedText: string, result: FactCheckResult, ttlMs: number = this.defaultTtlMs): Promise<void> {
    const key = claimKey(normalizedText);
    const entry: CacheEntry = Object.freeze({ key, normalizedText, result, expiresAt: this.now() + ttlMs });
    this.insert(entry);
    if (!this.store) {
      return;
    }
    try {
      await this.store.save(entry);
    } catch (err) {
      logError('Result store write failed', { key, error: err });
    }
  }

  /** Unexpired entries in recency order, oldest first. Does not count as a read. */
  live(): CacheEntry[] {
    const now = this.now();
    return [...this.entries.values()].filter(entry => entry.expiresAt > now);
  }

  /** The most recently checked unexpired results, newest `createdAt` first. */
  recent(limit: number): CacheEntry[] {
    return this.live()
      .sort((a, b) => Date.parse(b.result.createdAt) - Date.parse(a.result.createdAt))
      .slice(0, Math.max(0, limit));
  }

  stats(): CacheStats {
    const now = this.now();
    const byVerdict: Partial<Record<Verdict, number>> = {};
    const bySeverity: Partial<Record<Severity, number>> = {};
    let entries = 0;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt <= now) {
        continue;
      }
      entries++;
      byVerdict[entry.result.verdict] = (byVerdict[entry.result.verdict] ?? 0) + 1;
      bySeverity[entry.result.severity] = (bySeverity[entry.result.severity] ?? 0) + 1;
    }
    return {
      entries,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      byVerdict,
      bySeverity,
      persistent: this.store !== undefined,
    };
  }

  private touch(key: string): CacheEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    this.entries.delete(key);
    if (entry.expiresAt <= this.now()) {
      return null;
    }
    this.entries.set(key, entry);
    return entry;
  }

  private insert(entry: CacheEntry): void {
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);
    if (this.entries.size <= this.maxEntries) {
      return;
    }
    const now = this.now();
    for (const [key, existing] of this.entries) {
      if (existing.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) {
        break;
      }
      this.entries.delete(key);
    }
  }
}
