// Words that carry no meaning for matching claims against each other
const STOPWORDS = new Set([
  'the', 'a', 'an', 'is', 'it', 'that', 'this', 'was', 'were', 'has', 'have', 'had', 'be', 'been', 'are',
  'or', 'and', 'to', 'in', 'on', 'at', 'for', 'of', 'with', 'as', 'by', 'from',
  'true', 'false', 'claim', 'claims', 'said', 'says', 'according',
]);

export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;
export const MAX_SIMILAR_MATCHES = 5;

/** Lower-cased content words longer than two characters, punctuation removed. */
export function similarityTokens(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .split(/\s+/)
    .filter(word => word.length > 2 && !STOPWORDS.has(word));
}

export function jaccardSimilarity(a: readonly string[], b: readonly string[]): number {
  const setA = new Set(a);
  const setB = new Set(b);
  if (setA.size === 0 || setB.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const word of setA) {
    if (setB.has(word)) {
      shared++;
    }
  }
  return shared / (setA.size + setB.size - shared);
}

function counts(words: readonly string[]): Map<string, number> {
  const counted = new Map<string, number>();
  for (const word of words) {
    counted.set(word, (counted.get(word) ?? 0) + 1);
  }
  return counted;
}

/** Cosine of the word-frequency vectors. */
export function cosineSimilarity(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  const countsA = counts(a);
  const countsB = counts(b);
  let dot = 0;
  for (const [word, count] of countsA) {
    dot += count * (countsB.get(word) ?? 0);
  }
  const magnitude = (counted: Map<string, number>) =>
    Math.sqrt([...counted.values()].reduce((sum, count) => sum + count * count, 0));
  return dot / (magnitude(countsA) * magnitude(countsB));
}

/**
 * Sørensen–Dice coefficient over character bigrams of the whole lower-cased
 * text; rewards shared phrasing that word sets miss.
 */
export function bigramSimilarity(a: string, b: string): number {
  const left = a.toLowerCase().replace(/\s+/g, ' ').trim();
  const right = b.toLowerCase().replace(/\s+/g, ' ').trim();
  if (left === right) {
    return left ? 1 : 0;
  }
  if (left.length < 2 || right.length < 2) {
    return 0;
  }
  const bigramsA = new Map<string, number>();
  for (let i = 0; i < left.length - 1; i++) {
    const bigram = left.slice(i, i + 2);
    bigramsA.set(bigram, (bigramsA.get(bigram) ?? 0) + 1);
  }
  let shared = 0;
  for (let i = 0; i < right.length - 1; i++) {
    const bigram = right.slice(i, i + 2);
    const available = bigramsA.get(bigram) ?? 0;
    if (available > 0) {
      bigramsA.set(bigram, available - 1);
      shared++;
    }
  }
  return (2 * shared) / (left.length - 1 + (right.length - 1));
}

/** Weighted blend: cosine 0.4, Jaccard 0.3, bigram 0.3. */
export function claimSimilarity(a: string, b: string): number {
  const tokensA = similarityTokens(a);
  const tokensB = similarityTokens(b);
  return 0.4 * cosineSimilarity(tokensA, tokensB) + 0.3 * jaccardSimilarity(tokensA, tokensB) + 0.3 * bigramSimilarity(a, b);
}

export interface SimilarMatch<T> {
  item: T;
  /** Rounded to three decimals. */
  score: number;
}

export interface FindSimilarOptions {
  threshold?: number;
  limit?: number;
}

/** Candidates scoring at least `threshold` against the query, best first. */
export function findSimilar<T>(
  query: string,
  candidates: Iterable<T>,
  textOf: (candidate: T) => string,
  opts: FindSimilarOptions = {}
): SimilarMatch<T>[] {
  const threshold = opts.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const limit = opts.limit ?? MAX_SIMILAR_MATCHES;
  const matches: SimilarMatch<T>[] = [];
  for (const item of candidates) {
    const text = textOf(item);
    if (!text) {
      continue;
    }
    const score = Math.round(claimSimilarity(query, text) * 1000) / 1000;
    if (score >= threshold) {
      matches.push({ item, score });
    }
  }
  return matches.sort((a, b) => b.score - a.score).slice(0, limit);
}
