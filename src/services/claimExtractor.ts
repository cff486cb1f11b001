import { z } from 'zod';
import { Claim, CRISIS_CATEGORIES } from '../interfaces/claim';
import { throwIfAborted } from '../utils/abort';
import { ExtractionFailure } from '../utils/errors';
import { logWarn } from '../utils/logger';
import { normalizeClaimText } from '../utils/normalize';
import { LanguageModel } from './llm/languageModel';

export const extractionSchema = z.object({
  claim: z.string().trim().min(1),
  crisisCategory: z.enum(CRISIS_CATEGORIES),
  confidence: z.number().min(0).max(1),
  entities: z.array(z.string()),
});

export type ExtractionOutput = z.infer<typeof extractionSchema>;

export function buildExtractionPrompt(rawText: string, strict: boolean): string {
  const strictRules = strict
    ? `
Your previous answer could not be used. Reply with ONE JSON object and nothing else:
no markdown, no commentary, every field present, "crisisCategory" spelled exactly as listed,
"confidence" a number between 0 and 1, "entities" an array (possibly empty).
`
    : '';
  return `
You are a fact-checking assistant working during a crisis event. Identify the single dominant
verifiable assertion in the user's message and classify the crisis it concerns.

Rules:
- Restate the assertion as one clear, neutral, checkable sentence in English.
- "crisisCategory" is one of: health, naturalDisaster, civilUnrest, other.
  health = disease, treatment, vaccines, hospitals. naturalDisaster = earthquakes, floods,
  cyclones, fires, evacuations. civilUnrest = riots, curfews, protests, violence.
- "confidence" is how sure you are that the restated assertion captures the message.
- "entities" lists the key people, places, organisations and substances mentioned.
${strictRules}
Message: "${rawText.replace(/"/g, '\\"')}"

Output format: {
  "claim": "string",
  "crisisCategory": "health" | "naturalDisaster" | "civilUnrest" | "other",
  "confidence": number,
  "entities": ["string"]
}
`;
}

export class ClaimExtractor {
  constructor(private readonly llm: LanguageModel) {}

  /** One attempt, then one stricter re-prompt; a second failure is fatal for the run. */
  async extract(rawText: string, signal?: AbortSignal): Promise<Claim> {
    let lastError: unknown;
    for (const strict of [false, true]) {
      try {
        const output = await this.llm.complete(buildExtractionPrompt(rawText, strict), extractionSchema, {
          signal,
          temperature: strict ? 0 : 0.2,
        });
        return toClaim(rawText, output);
      } catch (err) {
        throwIfAborted(signal);
        lastError = err;
        logWarn('Extractor', strict ? 'Strict re-prompt failed' : 'Extraction attempt failed, re-prompting', err);
      }
    }
    throw new ExtractionFailure('Could not extract a verifiable claim from the input', { cause: lastError });
  }
}

function toClaim(rawText: string, output: ExtractionOutput): Claim {
  const entities = [...new Set(output.entities.map(entity => entity.trim()).filter(Boolean))];
  return Object.freeze({
    rawText,
    normalizedText: normalizeClaimText(rawText),
    assertion: output.claim.replace(/\s+/g, ' '),
    crisisCategory: output.crisisCategory,
    extractionConfidence: output.confidence,
    entities: Object.freeze(entities),
  });
}
