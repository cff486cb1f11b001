import { Claim } from './claim';
import { EvidenceSet } from './evidence';

export const VERDICTS = ['true', 'mostlyTrue', 'mixed', 'mostlyFalse', 'false', 'unverifiable'] as const;
export type Verdict = (typeof VERDICTS)[number];

export const SEVERITIES = ['critical', 'high', 'medium', 'low'] as const;
export type Severity = (typeof SEVERITIES)[number];

export interface FactCheckResult {
  readonly claim: Claim;
  readonly evidenceSet: EvidenceSet;
  readonly verdict: Verdict;
  readonly confidence: number;
  readonly severity: Severity;
  readonly explanationEn: string;
  readonly explanationHi: string;
  readonly correction: string;
  readonly sourcesConsulted: readonly string[];
  readonly createdAt: string;
}

export interface CacheEntry {
  readonly key: string;
  readonly normalizedText: string;
  readonly result: FactCheckResult;
  /** Epoch milliseconds. */
  readonly expiresAt: number;
}

export interface TrendingEntry {
  readonly key: string;
  readonly result: FactCheckResult;
  readonly lastSeenAt: number;
  readonly seenCount: number;
}
