import { z } from 'zod';
import { Claim } from '../interfaces/claim';
import { EvidenceItem, EvidenceSet, Stance } from '../interfaces/evidence';
import { Verdict } from '../interfaces/factCheckResult';
import { throwIfAborted } from '../utils/abort';
import { SynthesisFailure } from '../utils/errors';
import { logWarn } from '../utils/logger';
import { truncateAtWord } from '../utils/normalize';
import { LanguageModel } from './llm/languageModel';

/** Tunable thresholds of the verdict policy. Shares are fractions of total weighted mass. */
export interface SynthesisPolicy {
  /** Supporting and refuting shares both at or above this make the verdict `mixed`. */
  mixedFloor: number;
  /** Minimum share of the stanced mass the leading side needs to avoid `mixed`. */
  clearMajority: number;
  /** Leading-side share of the stanced mass required for `true`/`false`. */
  decisiveMajority: number;
  /** Opposing mass at or above this share of the total rules out `true`/`false`. */
  materialOpposition: number;
  /** Below this share of stanced mass the evidence does not take a position. */
  minStanceShare: number;
  recencyFloor: number;
  recencyHalfLifeDays: number;
  undatedRecencyFactor: number;
  unverifiableConfidence: number;
  maxConfidence: number;
  confidenceWeights: { margin: number; count: number; diversity: number };
}

export const DEFAULT_SYNTHESIS_POLICY: Readonly<SynthesisPolicy> = Object.freeze({
  mixedFloor: 0.25,
  clearMajority: 0.6,
  decisiveMajority: 0.85,
  materialOpposition: 0.3,
  minStanceShare: 0.15,
  recencyFloor: 0.5,
  recencyHalfLifeDays: 30,
  undatedRecencyFactor: 0.75,
  unverifiableConfidence: 0.1,
  maxConfidence: 0.98,
  confidenceWeights: Object.freeze({ margin: 0.5, count: 0.3, diversity: 0.2 }),
});

const SOURCE_KIND_COUNT = 4;
const DAY_MS = 86_400_000;

export interface StanceTally {
  supports: number;
  refutes: number;
  /** Neutral and unknown mass. */
  other: number;
  total: number;
  /** Items that support or refute. */
  stancedCount: number;
  /** Distinct source kinds among stanced items. */
  stancedKinds: number;
}

export interface Synthesis {
  verdict: Verdict;
  confidence: number;
  /** The input evidence carrying assessed stances. */
  evidence: EvidenceSet;
  tally: StanceTally;
  reasoning: string;
}

export const stanceAssessmentSchema = z.object({
  assessments: z.array(
    z.object({
      index: z.number().int(),
      stance: z.enum(['supports', 'refutes', 'neutral']),
    })
  ),
  reasoning: z.string().default(''),
});

export function recencyFactor(publishedAt: string | undefined, now: number, policy: SynthesisPolicy): number {
  const published = publishedAt ? Date.parse(publishedAt) : NaN;
  if (Number.isNaN(published) || published > now) {
    return policy.undatedRecencyFactor;
  }
  const ageDays = (now - published) / DAY_MS;
  return policy.recencyFloor + (1 - policy.recencyFloor) * Math.pow(2, -ageDays / policy.recencyHalfLifeDays);
}

export function tallyStances(evidence: EvidenceSet, now: number, policy: SynthesisPolicy): StanceTally {
  const tally: StanceTally = { supports: 0, refutes: 0, other: 0, total: 0, stancedCount: 0, stancedKinds: 0 };
  const kinds = new Set<string>();
  for (const item of evidence) {
    const mass = item.sourceWeight * recencyFactor(item.publishedAt, now, policy);
    tally.total += mass;
    if (item.stance === 'supports' || item.stance === 'refutes') {
      tally[item.stance] += mass;
      tally.stancedCount++;
      kinds.add(item.sourceKind);
    } else {
      tally.other += mass;
    }
  }
  tally.stancedKinds = kinds.size;
  return tally;
}

export function decideVerdict(tally: StanceTally, policy: SynthesisPolicy = DEFAULT_SYNTHESIS_POLICY): Verdict {
  const { supports, refutes, total } = tally;
  const stanced = supports + refutes;
  if (stanced <= 0 || total <= 0 || stanced / total < policy.minStanceShare) {
    return 'unverifiable';
  }
  if (supports / total >= policy.mixedFloor && refutes / total >= policy.mixedFloor) {
    return 'mixed';
  }
  const leading = Math.max(supports, refutes);
  const opposing = Math.min(supports, refutes);
  const dominance = leading / stanced;
  if (dominance < policy.clearMajority) {
    return 'mixed';
  }
  const decisive = dominance >= policy.decisiveMajority && opposing < policy.materialOpposition * total;
  if (supports > refutes) {
    return decisive ? 'true' : 'mostlyTrue';
  }
  return decisive ? 'false' : 'mostlyFalse';
}

/** Monotonic in margin, stanced evidence count and source diversity; bounded by `maxConfidence`. */
export function computeConfidence(tally: StanceTally, verdict: Verdict, policy: SynthesisPolicy = DEFAULT_SYNTHESIS_POLICY): number {
  if (verdict === 'unverifiable' || tally.total <= 0) {
    return policy.unverifiableConfidence;
  }
  const { margin, count, diversity } = policy.confidenceWeights;
  const raw =
    margin * (Math.abs(tally.supports - tally.refutes) / tally.total) +
    count * (tally.stancedCount / (tally.stancedCount + 2)) +
    diversity * Math.min(1, tally.stancedKinds / SOURCE_KIND_COUNT);
  const bounded = Math.min(policy.maxConfidence, Math.max(0, raw));
  return Math.round(bounded * 1000) / 1000;
}

export function buildSynthesisPrompt(claim: Claim, evidence: EvidenceSet): string {
  const listing = evidence
    .map((item, index) => {
      const date = item.publishedAt ? ` (${item.publishedAt.slice(0, 10)})` : '';
      const publisher = item.publisher ?? item.sourceId;
      return `[${index}] ${publisher}${date}: ${item.title}\n${truncateAtWord(item.snippet, 400)}`;
    })
    .join('\n\n');
  return `
You are a fact-checking analyst. Judge each numbered evidence item ONLY by what it says,
not by your own knowledge, and decide its stance toward the claim:
- "supports": the item affirms the claim.
- "refutes": the item contradicts or debunks the claim, including fact-checks rating it false or misleading.
- "neutral": the item is related but takes no position.

Claim (${claim.crisisCategory}): "${claim.assertion.replace(/"/g, '\\"')}"

Evidence:
${listing}

Return one assessment per item and a short reasoning (at most 3 sentences) citing item numbers.
Output format: {
  "assessments": [{ "index": number, "stance": "supports" | "refutes" | "neutral" }],
  "reasoning": "string"
}
`;
}

function applyAssessments(evidence: EvidenceSet, output: z.infer<typeof stanceAssessmentSchema>): EvidenceSet {
  const assessed = new Map<number, Stance>();
  for (const { index, stance } of output.assessments) {
    if (index >= 0 && index < evidence.length) {
      assessed.set(index, stance);
    }
  }
  return Object.freeze(
    evidence.map((item, index): EvidenceItem => {
      const stance = assessed.get(index);
      return stance === undefined || stance === item.stance ? item : Object.freeze({ ...item, stance });
    })
  );
}

export interface EvidenceSynthesizerOptions {
  policy?: Partial<SynthesisPolicy>;
  now?: () => number;
}

export class EvidenceSynthesizer {
  readonly policy: SynthesisPolicy;
  private readonly now: () => number;

  constructor(private readonly llm: LanguageModel, opts: EvidenceSynthesizerOptions = {}) {
    this.policy = { ...DEFAULT_SYNTHESIS_POLICY, ...opts.policy };
    this.now = opts.now ?? Date.now;
  }

  /**
   * The model assesses stances; the verdict and confidence follow from the
   * weighted tally. Empty evidence is unverifiable without a model call.
   */
  async synthesize(claim: Claim, evidence: EvidenceSet, signal?: AbortSignal): Promise<Synthesis> {
    if (evidence.length === 0) {
      return this.conclude(evidence, '');
    }

    const prompt = buildSynthesisPrompt(claim, evidence);
    let lastError: unknown;
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        const output = await this.llm.complete(prompt, stanceAssessmentSchema, { signal, temperature: 0.1 });
        return this.conclude(applyAssessments(evidence, output), output.reasoning.trim());
      } catch (err) {
        throwIfAborted(signal);
        lastError = err;
        logWarn('Synthesizer', `Stance assessment attempt ${attempt} failed`, err);
      }
    }
    throw new SynthesisFailure('Could not assess the evidence for this claim', { cause: lastError });
  }

  private conclude(evidence: EvidenceSet, reasoning: string): Synthesis {
    const tally = tallyStances(evidence, this.now(), this.policy);
    const verdict = decideVerdict(tally, this.policy);
    return { verdict, confidence: computeConfidence(tally, verdict, this.policy), evidence, tally, reasoning };
  }
}
