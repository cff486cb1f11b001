import { z } from 'zod';

export interface CompletionOptions {
  signal?: AbortSignal;
  temperature?: number;
}

/**
 * Opaque text-completion capability. Implementations return output that has
 * already been validated against `schema`, or throw a CompletionError.
 */
export interface LanguageModel {
  complete<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: CompletionOptions): Promise<T>;
}

export class CompletionError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CompletionError';
  }
}

/** Parses model output that may be wrapped in a markdown fence or surrounded by prose. */
export function parseJsonResponse(text: string): unknown {
  const cleaned = text
    .replace(/```(?:json|JSON)?\s*/g, '')
    .replace(/```/g, '')
    .trim();
  if (!cleaned) {
    throw new CompletionError('Language model returned an empty response');
  }
  try {
    return JSON.parse(cleaned);
  } catch (err) {
    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start !== -1 && end > start) {
      try {
        return JSON.parse(cleaned.slice(start, end + 1));
      } catch {
        // fall through to the error below
      }
    }
    throw new CompletionError('Language model response was not valid JSON', { cause: err });
  }
}

export function validateCompletion<T>(raw: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new CompletionError(`Language model response did not match the expected structure${where}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
