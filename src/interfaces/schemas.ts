import { z } from 'zod';
import { CRISIS_CATEGORIES } from './claim';
import { SOURCE_KINDS, STANCES } from './evidence';
import { SEVERITIES, VERDICTS } from './factCheckResult';

export const claimSchema = z.object({
  rawText: z.string(),
  normalizedText: z.string(),
  assertion: z.string(),
  crisisCategory: z.enum(CRISIS_CATEGORIES),
  extractionConfidence: z.number().min(0).max(1),
  entities: z.array(z.string()),
});

export const evidenceItemSchema = z.object({
  sourceId: z.string(),
  sourceKind: z.enum(SOURCE_KINDS),
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
  publisher: z.string().optional(),
  publishedAt: z.string().optional(),
  stance: z.enum(STANCES),
  sourceWeight: z.number().min(0).max(1),
});

/** Shape of a result read back from persistent storage. */
export const factCheckResultSchema = z.object({
  claim: claimSchema,
  evidenceSet: z.array(evidenceItemSchema),
  verdict: z.enum(VERDICTS),
  confidence: z.number().min(0).max(1),
  severity: z.enum(SEVERITIES),
  explanationEn: z.string(),
  explanationHi: z.string(),
  correction: z.string(),
  sourcesConsulted: z.array(z.string()),
  createdAt: z.string(),
});
