import { EvidenceSet, SOURCE_KINDS, SourceKind } from '../interfaces/evidence';
import { hostOf } from '../utils/url';
import { domainGroup } from './sources/reliability';

/** Source kinds plus official bodies, which may surface through any adapter. */
type DiversityType = SourceKind | 'official';

const IDEAL_TYPES: readonly DiversityType[] = [...SOURCE_KINDS, 'official'];
// No single domain should carry more than this share of the evidence
const CLUSTER_SHARE = 0.4;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/** Mean source weight of the evidence; 0 when there is none. */
export function overallReliability(evidence: EvidenceSet): number {
  if (evidence.length === 0) {
    return 0;
  }
  const total = evidence.reduce((sum, item) => sum + item.sourceWeight, 0);
  return round3(total / evidence.length);
}

/**
 * Score in [0, 1] for how varied the evidence is. Up to 0.5 comes from distinct
 * domains (reduced when one domain dominates), up to 0.5 from the spread of
 * source types, plus 0.1 each for a fact-check registry and an official body.
 */
export function sourceDiversity(evidence: EvidenceSet): number {
  if (evidence.length === 0) {
    return 0;
  }
  const domains = new Map<string, number>();
  const types = new Set<DiversityType>();
  for (const item of evidence) {
    const host = hostOf(item.url);
    if (host) {
      domains.set(host, (domains.get(host) ?? 0) + 1);
    }
    types.add(domainGroup(item.url) === 'official' ? 'official' : item.sourceKind);
  }

  let domainScore = Math.min(0.5, (domains.size / evidence.length) * 0.6);
  const largest = domains.size > 0 ? Math.max(...domains.values()) / evidence.length : 0;
  if (largest > CLUSTER_SHARE) {
    domainScore *= 1 - (largest - CLUSTER_SHARE);
  }

  let typeScore = (IDEAL_TYPES.filter(type => types.has(type)).length / IDEAL_TYPES.length) * 0.5;
  if (types.has('factCheckRegistry')) {
    typeScore += 0.1;
  }
  if (types.has('official')) {
    typeScore += 0.1;
  }
  return round3(Math.min(1, domainScore + typeScore));
}
