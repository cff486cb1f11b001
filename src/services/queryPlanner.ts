import { Claim, SearchQuery } from '../interfaces/claim';
import { normalizeClaimText, truncateAtWord } from '../utils/normalize';

export const MAX_QUERIES = 5;
const MAX_QUERY_LENGTH = 300;

/**
 * Diversified search queries for a claim: the assertion itself, a fact-check
 * query, a negated query and an entity-focused query. Pure; never empty.
 */
export function planQueries(claim: Claim, maxQueries: number = MAX_QUERIES): SearchQuery[] {
  const assertion = truncateAtWord(claim.assertion, MAX_QUERY_LENGTH - 20);
  const candidates: SearchQuery[] = [];

  if (assertion) {
    candidates.push({ text: assertion, intent: 'direct' });
    candidates.push({ text: `${assertion} fact check`, intent: 'factCheck' });
    candidates.push({ text: `${assertion} debunked false`, intent: 'negation' });
  }
  if (claim.entities.length > 0) {
    candidates.push({ text: `${claim.entities.slice(0, 3).join(' ')} latest news`, intent: 'entity' });
  }

  const seen = new Set<string>();
  const queries: SearchQuery[] = [];
  for (const candidate of candidates) {
    const key = normalizeClaimText(candidate.text);
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    queries.push(candidate);
  }

  if (queries.length === 0) {
    const fallback = truncateAtWord(claim.rawText, MAX_QUERY_LENGTH);
    return [{ text: fallback, intent: 'fallback' }];
  }
  return queries.slice(0, Math.max(1, maxQueries));
}
