import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { AdapterFailure, AdapterFailureReason } from '../../utils/errors';
import { redact } from '../../utils/logger';
import { SearchBudget } from './sourceAdapter';

export const USER_AGENT = 'crisis-check/1.0 (claim verification service)';

export function createHttpClient(): AxiosInstance {
  return axios.create({
    headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
    maxContentLength: 2_000_000,
  });
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  try {
    return JSON.stringify(data) ?? '';
  } catch {
    return '';
  }
}

/** Maps a failed provider request onto the adapter failure taxonomy. */
export function classifyRequestError(adapterId: string, err: unknown): AdapterFailure {
  if (err instanceof AdapterFailure) {
    return err;
  }
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    let reason: AdapterFailureReason = 'unreachable';
    if (status === 429) {
      reason = 'rateLimited';
    } else if (status === 403 && /quota|rate.?limit/i.test(bodyText(err.response?.data))) {
      reason = 'rateLimited';
    } else if (status === 400 || status === 422) {
      reason = 'malformed';
    }
    const detail = status ? `HTTP ${status}` : err.code ?? 'network error';
    return new AdapterFailure(adapterId, reason, `${adapterId} request failed: ${redact(detail)}`, { cause: err });
  }
  if (err instanceof SyntaxError) {
    return new AdapterFailure(adapterId, 'malformed', `${adapterId} returned an unparseable body`, { cause: err });
  }
  return new AdapterFailure(adapterId, 'unreachable', `${adapterId} request failed`, { cause: err });
}

/**
 * Performs one provider request under the call's budget and validates the body.
 * Resolves to null on 404, which providers use for "nothing found".
 */
export async function requestJson<T>(
  http: AxiosInstance,
  adapterId: string,
  config: AxiosRequestConfig,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  budget: SearchBudget
): Promise<T | null> {
  let data: unknown;
  try {
    const response = await http.request<unknown>({
      ...config,
      timeout: budget.timeoutMs,
      signal: budget.signal,
    });
    data = response.data;
  } catch (err) {
    if (axios.isAxiosError(err) && err.response?.status === 404) {
      return null;
    }
    throw classifyRequestError(adapterId, err);
  }

  if (typeof data === 'string') {
    try {
      data = JSON.parse(data);
    } catch (err) {
      throw classifyRequestError(adapterId, err);
    }
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new AdapterFailure(adapterId, 'malformed', `${adapterId} response had an unexpected shape`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function stripHtml(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
}
