import { SearchQuery } from '../interfaces/claim';
import { EvidenceItem, EvidenceSet } from '../interfaces/evidence';
import { abortable, abortAfter, DeadlineExceeded, linkedController, throwIfAborted } from '../utils/abort';
import { AdapterFailure, AdapterFailureReason } from '../utils/errors';
import { logInfo, logWarn } from '../utils/logger';
import { claimKey, normalizeClaimText } from '../utils/normalize';
import { hostOf, normalizeUrl } from '../utils/url';
import { classifyRequestError } from './sources/http';
import { SourceAdapter } from './sources/sourceAdapter';

export interface AggregationOptions {
  perSourceTimeoutMs: number;
  overallBudgetMs: number;
  signal?: AbortSignal;
  maxPerDomain?: number;
  maxItems?: number;
}

export type CallStatus = 'ok' | 'empty' | 'failed' | 'timedOut' | 'abandoned';

export interface CallOutcome {
  adapterId: string;
  query: string;
  status: CallStatus;
  reason?: AdapterFailureReason;
  itemCount: number;
}

export interface AggregationResult {
  evidence: EvidenceSet;
  outcomes: CallOutcome[];
  /** Adapters that answered at least one call. */
  sourcesConsulted: string[];
}

export const DEFAULT_MAX_PER_DOMAIN = 3;
export const DEFAULT_MAX_ITEMS = 20;

export function dedupeKey(item: EvidenceItem): string {
  const url = item.url ? normalizeUrl(item.url) : null;
  return url ?? `snippet:${claimKey(normalizeClaimText(item.snippet))}`;
}

/**
 * Merges raw adapter output into an EvidenceSet: one item per dedupe key (the
 * heavier one wins, first seen on ties), ordered by weight, capped per domain
 * and overall.
 */
export function mergeEvidence(
  items: readonly EvidenceItem[],
  maxPerDomain: number = DEFAULT_MAX_PER_DOMAIN,
  maxItems: number = DEFAULT_MAX_ITEMS
): EvidenceSet {
  const byKey = new Map<string, EvidenceItem>();
  for (const item of items) {
    const key = dedupeKey(item);
    const existing = byKey.get(key);
    if (!existing || item.sourceWeight > existing.sourceWeight) {
      byKey.set(key, item);
    }
  }

  // Array.prototype.sort is stable, so ties keep arrival order
  const ordered = [...byKey.values()].sort((a, b) => b.sourceWeight - a.sourceWeight);

  const perDomain = new Map<string, number>();
  const merged: EvidenceItem[] = [];
  for (const item of ordered) {
    const domain = hostOf(item.url) ?? item.sourceId;
    const count = perDomain.get(domain) ?? 0;
    if (count >= maxPerDomain) {
      continue;
    }
    perDomain.set(domain, count + 1);
    merged.push(Object.freeze({ ...item }));
    if (merged.length >= maxItems) {
      break;
    }
  }
  return Object.freeze(merged);
}

/**
 * Fans out one call per (query, adapter) pair. Each call has its own timeout;
 * the whole fan-out is bounded by `overallBudgetMs`, after which whatever has
 * arrived is merged. Adapter failures only reduce coverage. Aborting `signal`
 * cancels every call and rethrows the abort reason.
 */
export async function aggregate(
  queries: readonly SearchQuery[],
  adapters: readonly SourceAdapter[],
  options: AggregationOptions
): Promise<AggregationResult> {
  const { perSourceTimeoutMs, overallBudgetMs, signal } = options;
  throwIfAborted(signal);

  const fanOut = linkedController(signal);
  const clearBudget = abortAfter(fanOut, overallBudgetMs, 'evidence search');
  const batches: EvidenceItem[][] = [];

  const calls = queries.flatMap(query =>
    adapters.map(async (adapter): Promise<CallOutcome> => {
      const slot = batches.push([]) - 1;
      const call = linkedController(fanOut.signal);
      const clearCallTimer = abortAfter(call, perSourceTimeoutMs, `${adapter.id} search`);
      try {
        const items = await abortable(
          adapter.search(query, { timeoutMs: perSourceTimeoutMs, signal: call.signal }),
          call.signal
        );
        batches[slot] = items;
        return { adapterId: adapter.id, query: query.text, status: items.length ? 'ok' : 'empty', itemCount: items.length };
      } catch (err) {
        return describeFailure(adapter.id, query.text, err, fanOut.signal.aborted);
      } finally {
        clearCallTimer();
        call.abort();
      }
    })
  );

  let outcomes: CallOutcome[];
  try {
    outcomes = await Promise.all(calls);
  } finally {
    clearBudget();
  }
  throwIfAborted(signal);

  const evidence = mergeEvidence(batches.flat(), options.maxPerDomain, options.maxItems);
  const sourcesConsulted = adapters
    .map(adapter => adapter.id)
    .filter(id => outcomes.some(outcome => outcome.adapterId === id && (outcome.status === 'ok' || outcome.status === 'empty')));

  const abandoned = outcomes.filter(outcome => outcome.status === 'abandoned').length;
  logInfo(
    'Search',
    `${outcomes.length} calls, ${evidence.length} evidence items from ${sourcesConsulted.length} sources` +
      (abandoned ? ` (${abandoned} abandoned at the ${overallBudgetMs}ms budget)` : '')
  );
  return { evidence, outcomes, sourcesConsulted };
}

function describeFailure(adapterId: string, query: string, err: unknown, budgetSpent: boolean): CallOutcome {
  if (budgetSpent) {
    return { adapterId, query, status: 'abandoned', itemCount: 0 };
  }
  if (err instanceof DeadlineExceeded) {
    logWarn('Search', `${adapterId} timed out for "${query}"`);
    return { adapterId, query, status: 'timedOut', itemCount: 0 };
  }
  const failure = err instanceof AdapterFailure ? err : classifyRequestError(adapterId, err);
  logWarn('Search', `${adapterId} failed for "${query}" (${failure.reason})`, failure);
  return { adapterId, query, status: 'failed', reason: failure.reason, itemCount: 0 };
}
