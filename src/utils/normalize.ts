import crypto from 'crypto';

// Quotes, brackets and sentence punctuation that wrap a pasted claim
const EDGE_PUNCTUATION = /^[\s"'`“”‘’«».,!?;:()[\]{}…]+|[\s"'`“”‘’«».,!?;:()[\]{}…]+$/gu;

/**
 * Canonical form of claim text: typographic quotes folded to ASCII, Unicode NFKC,
 * lower-cased, whitespace collapsed, surrounding quotes and punctuation removed.
 * Pure and idempotent.
 */
export function normalizeClaimText(text: string): string {
  // Folded before NFKC, which would expand ″ into two primes
  return text
    .replace(/[‘’‛′]/g, "'")
    .replace(/[“”„″]/g, '"')
    .normalize('NFKC')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(EDGE_PUNCTUATION, '')
    .trim();
}

/** Content address of a normalized claim. */
export function claimKey(normalizedText: string): string {
  return crypto.createHash('sha256').update(normalizedText).digest('hex');
}

/** Shortens text to at most `max` characters, preferring a word boundary. */
export function truncateAtWord(text: string, max: number): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed.length <= max) {
    return collapsed;
  }
  const room = collapsed.slice(0, max - 1);
  const lastSpace = room.lastIndexOf(' ');
  const cut = lastSpace > max / 2 ? room.slice(0, lastSpace) : room;
  return `${cut.replace(/[\s.,;:!?-]+$/, '')}…`;
}
