export const CRISIS_CATEGORIES = ['health', 'naturalDisaster', 'civilUnrest', 'other'] as const;
export type CrisisCategory = (typeof CRISIS_CATEGORIES)[number];

export interface Claim {
  readonly rawText: string;
  /** Normalized form of the raw input; the cache and trending key derive from it. */
  readonly normalizedText: string;
  /** The single verifiable assertion the extractor identified. */
  readonly assertion: string;
  readonly crisisCategory: CrisisCategory;
  readonly extractionConfidence: number;
  readonly entities: readonly string[];
}

export type QueryIntent = 'direct' | 'negation' | 'factCheck' | 'entity' | 'fallback';

export interface SearchQuery {
  readonly text: string;
  readonly intent: QueryIntent;
}
