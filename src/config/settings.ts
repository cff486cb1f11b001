import { z } from 'zod';
import { ConfigError } from '../utils/errors';

// Values copied verbatim from .env.example count as unset
const PLACEHOLDER = /^your_.*_here$/i;

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform(value => (value && !PLACEHOLDER.test(value) ? value : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  GEMINI_API_KEY: z
    .string({ required_error: 'is required' })
    .trim()
    .min(1, 'is required')
    .refine(value => !PLACEHOLDER.test(value), 'is still the placeholder value'),
  GEMINI_MODEL: z.string().trim().min(1).default('gemini-2.0-flash'),
  GOOGLE_FACTCHECK_API_KEY: optionalSecret,
  NEWSAPI_KEY: optionalSecret,
  TAVILY_API_KEY: optionalSecret,
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  CORS_ORIGINS: z.string().default('*'),
  MONGODB_URI: optionalSecret,
  CACHE_TTL_SECONDS: positiveInt(86_400),
  CACHE_MAX_ENTRIES: positiveInt(1000),
  TRENDING_MAX_ENTRIES: positiveInt(100),
  TRENDING_HALF_LIFE_SECONDS: positiveInt(21_600),
  PER_SOURCE_TIMEOUT_MS: positiveInt(8000),
  SEARCH_BUDGET_MS: positiveInt(15_000),
  PIPELINE_BUDGET_MS: positiveInt(60_000),
  LLM_TIMEOUT_MS: positiveInt(20_000),
  MAX_CLAIM_LENGTH: positiveInt(2000),
});

export interface Settings {
  geminiApiKey: string;
  geminiModel: string;
  googleFactCheckApiKey?: string;
  newsApiKey?: string;
  tavilyApiKey?: string;
  port: number;
  corsOrigins: string[] | '*';
  mongodbUri?: string;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  trendingMaxEntries: number;
  trendingHalfLifeMs: number;
  perSourceTimeoutMs: number;
  searchBudgetMs: number;
  pipelineBudgetMs: number;
  llmTimeoutMs: number;
  maxClaimLength: number;
}

function parseOrigins(raw: string): string[] | '*' {
  const origins = raw
    .split(',')
    .map(origin => origin.trim())
    .filter(Boolean);
  return origins.length === 0 || origins.includes('*') ? '*' : origins;
}

/** Validates the environment; every problem is listed in one ConfigError. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  // Blank variables fall back to their defaults
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    geminiApiKey: e.GEMINI_API_KEY,
    geminiModel: e.GEMINI_MODEL,
    googleFactCheckApiKey: e.GOOGLE_FACTCHECK_API_KEY,
    newsApiKey: e.NEWSAPI_KEY,
    tavilyApiKey: e.TAVILY_API_KEY,
    port: e.PORT,
    corsOrigins: parseOrigins(e.CORS_ORIGINS),
    mongodbUri: e.MONGODB_URI,
    cacheTtlMs: e.CACHE_TTL_SECONDS * 1000,
    cacheMaxEntries: e.CACHE_MAX_ENTRIES,
    trendingMaxEntries: e.TRENDING_MAX_ENTRIES,
    trendingHalfLifeMs: e.TRENDING_HALF_LIFE_SECONDS * 1000,
    perSourceTimeoutMs: e.PER_SOURCE_TIMEOUT_MS,
    searchBudgetMs: e.SEARCH_BUDGET_MS,
    pipelineBudgetMs: e.PIPELINE_BUDGET_MS,
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    maxClaimLength: e.MAX_CLAIM_LENGTH,
  };
}
