import { z } from 'zod';
import { Claim } from '../interfaces/claim';
import { EvidenceSet } from '../interfaces/evidence';
import { Verdict } from '../interfaces/factCheckResult';
import { abortReason, DeadlineExceeded, throwIfAborted } from '../utils/abort';
import { ExplanationFailure } from '../utils/errors';
import { logError } from '../utils/logger';
import { truncateAtWord } from '../utils/normalize';
import { LanguageModel } from './llm/languageModel';

export const MAX_CORRECTION_LENGTH = 200;

export const VERDICT_LABELS: Readonly<Record<Verdict, { en: string; hi: string }>> = Object.freeze({
  true: { en: 'TRUE', hi: 'सत्य' },
  mostlyTrue: { en: 'MOSTLY TRUE', hi: 'अधिकतर सत्य' },
  mixed: { en: 'MIXED', hi: 'मिश्रित' },
  mostlyFalse: { en: 'MOSTLY FALSE', hi: 'अधिकतर असत्य' },
  false: { en: 'FALSE', hi: 'असत्य' },
  unverifiable: { en: 'UNVERIFIABLE', hi: 'असत्यापित' },
});

const EN_VERDICT_LINE = /\bverdict:\s*(mostly true|mostly false|unverifiable|mixed|true|false)\b/i;
// Longer labels first: असत्य contains सत्य, असत्यापित contains असत्य
const HI_VERDICT_LINE = /निर्णय:\s*(अधिकतर सत्य|अधिकतर असत्य|असत्यापित|असत्य|मिश्रित|सत्य)/;
const STRIP_VERDICT_LINES = /^\s*(\*\*)?\s*(verdict|निर्णय)\s*:[^\n]*\n?/gim;

/** Recovers the verdict a text asserts through its verdict line, in English or Hindi. */
export function detectVerdict(text: string): Verdict | null {
  const en = EN_VERDICT_LINE.exec(text);
  if (en) {
    const label = en[1].toUpperCase();
    return findVerdict(entry => entry.en === label);
  }
  const hi = HI_VERDICT_LINE.exec(text);
  if (hi) {
    const label = hi[1];
    return findVerdict(entry => entry.hi === label);
  }
  return null;
}

function findVerdict(predicate: (labels: { en: string; hi: string }) => boolean): Verdict | null {
  for (const [verdict, labels] of Object.entries(VERDICT_LABELS)) {
    if (predicate(labels)) {
      return toVerdict(verdict);
    }
  }
  return null;
}

function toVerdict(value: string): Verdict | null {
  switch (value) {
    case 'true':
    case 'mostlyTrue':
    case 'mixed':
    case 'mostlyFalse':
    case 'false':
    case 'unverifiable':
      return value;
    default:
      return null;
  }
}

export function verdictLineEn(verdict: Verdict): string {
  return `Verdict: ${VERDICT_LABELS[verdict].en}.`;
}

export function verdictLineHi(verdict: Verdict): string {
  return `निर्णय: ${VERDICT_LABELS[verdict].hi}।`;
}

export function fallbackExplanationEn(verdict: Verdict): string {
  return `${verdictLineEn(verdict)} See sources.`;
}

export function fallbackExplanationHi(verdict: Verdict): string {
  return `${verdictLineHi(verdict)} स्रोत देखें।`;
}

/** Text up to and including its first sentence terminator (Latin or Devanagari danda). */
export function firstSentence(text: string): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  const end = /[.!?।](?=\s|$)/.exec(collapsed);
  return end ? collapsed.slice(0, end.index + 1) : collapsed;
}

/** One short imperative sentence that needs no model. */
export function fallbackCorrection(verdict: Verdict, assertion: string): string {
  const subject = truncateAtWord(firstSentence(assertion).replace(/[.!?।]+$/, ''), 120);
  switch (verdict) {
    case 'false':
      return boundCorrection(`Do not share "${subject}": it is FALSE and not supported by evidence.`);
    case 'mostlyFalse':
      return boundCorrection(`Check official sources before sharing "${subject}": it is MISLEADING.`);
    case 'mixed':
      return boundCorrection(`Check official sources before sharing "${subject}": it is PARTLY TRUE.`);
    case 'mostlyTrue':
      return boundCorrection(`Share "${subject}" with care: it is MOSTLY TRUE, with caveats.`);
    case 'true':
      return boundCorrection(`You can share "${subject}": it is TRUE and confirmed by reliable sources.`);
    case 'unverifiable':
      return boundCorrection(`Do not share "${subject}" until officials confirm it: it is UNVERIFIED.`);
  }
}

/** First sentence only, whitespace collapsed, at most MAX_CORRECTION_LENGTH characters. */
export function boundCorrection(text: string): string {
  return truncateAtWord(firstSentence(text), MAX_CORRECTION_LENGTH);
}

export interface Explanation {
  explanationEn: string;
  explanationHi: string;
  correction: string;
}

export const englishExplanationSchema = z.object({
  explanation: z.string().trim().min(1),
  correction: z.string().trim().min(1),
});

export const hindiTranslationSchema = z.object({
  translation: z.string().trim().min(1),
});

function stripVerdictLines(text: string): string {
  return text.replace(STRIP_VERDICT_LINES, '').trim();
}

export function buildEnglishPrompt(claim: Claim, evidence: EvidenceSet, verdict: Verdict, confidence: number): string {
  const sources = evidence
    .slice(0, 8)
    .map((item, index) => `[${index + 1}] ${item.publisher ?? item.sourceId} (${item.stance}): ${truncateAtWord(item.snippet, 240)}`)
    .join('\n');
  return `
You write short public explanations for crisis fact-checks. The verdict has already been decided;
explain it, do not change it.

Claim: "${claim.assertion.replace(/"/g, '\\"')}"
Verdict: ${VERDICT_LABELS[verdict].en} (confidence ${Math.round(confidence * 100)}%)
Evidence:
${sources || '(no evidence was found)'}

Rules:
- "explanation": 2-4 plain sentences for the general public, citing evidence by number. Do not start with a verdict line.
- "correction": ONE short imperative sentence people can repost, at most ${MAX_CORRECTION_LENGTH} characters.
  For false claims state the negation explicitly in capitals (e.g. "Hot water DOES NOT cure the flu").

Output format: { "explanation": "string", "correction": "string" }
`;
}

export function buildHindiPrompt(explanationEn: string): string {
  return `
Translate the following fact-check explanation into simple, natural Hindi (Devanagari script).
Translate faithfully: do not add, remove or soften any statement, and keep the citation numbers.

Text: "${explanationEn.replace(/"/g, '\\"')}"

Output format: { "translation": "string" }
`;
}

export class ExplanationGenerator {
  constructor(private readonly llm: LanguageModel) {}

  /**
   * English first; the Hindi text is a translation of the English body. Any
   * failure falls back to templates and never touches the verdict.
   */
  async explain(
    claim: Claim,
    evidence: EvidenceSet,
    verdict: Verdict,
    confidence: number,
    signal?: AbortSignal
  ): Promise<Explanation> {
    let english: z.infer<typeof englishExplanationSchema>;
    try {
      english = await this.llm.complete(buildEnglishPrompt(claim, evidence, verdict, confidence), englishExplanationSchema, {
        signal,
        temperature: 0.3,
      });
    } catch (err) {
      throwIfAborted(signal);
      const failure = new ExplanationFailure('English explanation could not be generated', { cause: err });
      logError('Explanation fallback used', failure);
      return {
        explanationEn: fallbackExplanationEn(verdict),
        explanationHi: fallbackExplanationHi(verdict),
        correction: fallbackCorrection(verdict, claim.assertion),
      };
    }

    const bodyEn = stripVerdictLines(english.explanation);
    const explanationEn = bodyEn ? `${verdictLineEn(verdict)}\n${bodyEn}` : fallbackExplanationEn(verdict);
    const correction = boundCorrection(english.correction) || fallbackCorrection(verdict, claim.assertion);

    let explanationHi = fallbackExplanationHi(verdict);
    if (bodyEn) {
      try {
        const hindi = await this.llm.complete(buildHindiPrompt(bodyEn), hindiTranslationSchema, { signal, temperature: 0.1 });
        const bodyHi = stripVerdictLines(hindi.translation);
        const asserted = detectVerdict(bodyHi);
        if (bodyHi && (asserted === null || asserted === verdict)) {
          explanationHi = `${verdictLineHi(verdict)}\n${bodyHi}`;
        }
      } catch (err) {
        // A deadline keeps the English already generated; a cancellation does not
        if (signal?.aborted && !(abortReason(signal) instanceof DeadlineExceeded)) {
          throw abortReason(signal);
        }
        logError('Hindi explanation fallback used', new ExplanationFailure('Hindi translation failed', { cause: err }));
      }
    }

    return { explanationEn, explanationHi, correction };
  }
}
