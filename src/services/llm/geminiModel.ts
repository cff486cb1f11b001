import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import pRetry from 'p-retry';
import { z } from 'zod';
import { throwIfAborted } from '../../utils/abort';
import { logWarn } from '../../utils/logger';
import { CompletionError, CompletionOptions, LanguageModel, parseJsonResponse, validateCompletion } from './languageModel';

export interface GeminiModelOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  retries?: number;
}

export class GeminiModel implements LanguageModel {
  private readonly model: GenerativeModel;
  private readonly timeoutMs: number;
  private readonly retries: number;

  constructor(opts: GeminiModelOptions) {
    const genAI = new GoogleGenerativeAI(opts.apiKey);
    this.model = genAI.getGenerativeModel({ model: opts.model });
    this.timeoutMs = opts.timeoutMs;
    this.retries = opts.retries ?? 2;
  }

  async complete<T>(prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: CompletionOptions = {}): Promise<T> {
    const { signal } = options;
    let text: string;
    try {
      const result = await pRetry(
        () => {
          if (signal?.aborted) {
            throw new pRetry.AbortError('Request aborted');
          }
          return this.model.generateContent(
            {
              contents: [{ role: 'user', parts: [{ text: prompt }] }],
              generationConfig: {
                responseMimeType: 'application/json',
                temperature: options.temperature ?? 0.3,
              },
            },
            { timeout: this.timeoutMs, signal }
          );
        },
        {
          retries: this.retries,
          minTimeout: 1000,
          maxTimeout: 5000,
          onFailedAttempt: error => {
            logWarn('LLM', `Gemini attempt ${error.attemptNumber} failed (${error.retriesLeft} retries left)`, error);
          },
        }
      );
      text = result.response.text();
    } catch (err) {
      throwIfAborted(signal);
      throw new CompletionError('Language model request failed', { cause: err });
    }

    return validateCompletion(parseJsonResponse(text), schema);
  }
}
