export const SOURCE_KINDS = ['encyclopedia', 'news', 'factCheckRegistry', 'webSearch'] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

export const STANCES = ['supports', 'refutes', 'neutral', 'unknown'] as const;
export type Stance = (typeof STANCES)[number];

export interface EvidenceItem {
  readonly sourceId: string;
  readonly sourceKind: SourceKind;
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly publisher?: string;
  readonly publishedAt?: string;
  readonly stance: Stance;
  readonly sourceWeight: number;
}

/** Deduplicated evidence, ordered by source weight. */
export type EvidenceSet = readonly EvidenceItem[];
