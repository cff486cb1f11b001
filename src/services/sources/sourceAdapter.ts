import { SearchQuery } from '../../interfaces/claim';
import { EvidenceItem, SourceKind } from '../../interfaces/evidence';

export interface SearchBudget {
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * One evidence provider. `search` resolves to [] when the provider has nothing,
 * and rejects only with an AdapterFailure.
 */
export interface SourceAdapter {
  readonly id: string;
  readonly kind: SourceKind;
  /** Static evidentiary reliability in [0, 1]. */
  readonly sourceWeight: number;
  search(query: SearchQuery, budget: SearchBudget): Promise<EvidenceItem[]>;
}
