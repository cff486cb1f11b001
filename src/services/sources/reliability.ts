import table from '../../data/source-reliability.json';
import { hostOf } from '../../utils/url';

export type DomainGroup = 'official' | 'factCheck' | 'news' | 'academic';

const GROUPS: ReadonlyArray<[DomainGroup, Record<string, number>]> = [
  ['official', table.official],
  ['factCheck', table.factCheck],
  ['news', table.news],
  ['academic', table.academic],
];

const KNOWN_DOMAINS = new Map<string, number>(GROUPS.flatMap(([, domains]) => Object.entries(domains)));
const DOMAIN_GROUPS = new Map<string, DomainGroup>(
  GROUPS.flatMap(([group, domains]) => Object.keys(domains).map((domain): [string, DomainGroup] => [domain, group]))
);
const SUFFIXES = Object.entries(table.suffixes).sort(([a], [b]) => b.length - a.length);
const OFFICIAL_SUFFIX = /\.(gov|gov\.in|nic\.in)$/;
const ACADEMIC_SUFFIX = /\.(edu|ac\.in|ac\.uk)$/;

/** Looks up the host, then each parent domain, stopping short of the bare TLD. */
function lookupParents<T>(host: string, known: Map<string, T>): T | undefined {
  const labels = host.split('.');
  for (let i = 0; i < labels.length - 1; i++) {
    const value = known.get(labels.slice(i).join('.'));
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Reliability of a URL's domain from the known-source table, or null when the
 * domain is unknown. Subdomains inherit their parent's score.
 */
export function domainReliability(url: string): number | null {
  const host = hostOf(url);
  if (!host) {
    return null;
  }
  const score = lookupParents(host, KNOWN_DOMAINS);
  if (score !== undefined) {
    return score;
  }
  for (const [suffix, suffixScore] of SUFFIXES) {
    if (host.endsWith(suffix)) {
      return suffixScore;
    }
  }
  return null;
}

/** Which group of the known-source table a URL's domain belongs to, if any. */
export function domainGroup(url: string): DomainGroup | null {
  const host = hostOf(url);
  if (!host) {
    return null;
  }
  const group = lookupParents(host, DOMAIN_GROUPS);
  if (group) {
    return group;
  }
  if (OFFICIAL_SUFFIX.test(host)) {
    return 'official';
  }
  return ACADEMIC_SUFFIX.test(host) ? 'academic' : null;
}

/** An item never weighs less than its adapter's static weight. */
export function evidenceWeight(adapterWeight: number, url: string): number {
  const domainScore = domainReliability(url);
  return domainScore === null ? adapterWeight : Math.max(adapterWeight, domainScore);
}
