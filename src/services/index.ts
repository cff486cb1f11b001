import { Settings } from '../config/settings';
import { MongoResultStore, ResultStore } from '../models/factCheckModel';
import { ClaimExtractor } from './claimExtractor';
import { EvidenceSynthesizer } from './evidenceSynthesizer';
import { ExplanationGenerator } from './explanationGenerator';
import { GeminiModel } from './llm/geminiModel';
import { LanguageModel } from './llm/languageModel';
import { FactCheckPipeline } from './pipeline';
import { ResultCache } from './resultCache';
import { createSourceAdapters } from './sources';
import { SourceAdapter } from './sources/sourceAdapter';
import { TrendingStore } from './trendingStore';

export interface Services {
  pipeline: FactCheckPipeline;
  cache: ResultCache;
  trending: TrendingStore;
}

export interface ServiceOverrides {
  llm?: LanguageModel;
  adapters?: SourceAdapter[];
  /** `null` keeps results in memory even when MONGODB_URI is set. */
  store?: ResultStore | null;
  now?: () => number;
}

/** Wires the pipeline and its shared stores from settings; tests swap in fakes via overrides. */
export function buildServices(settings: Settings, overrides: ServiceOverrides = {}): Services {
  const llm =
    overrides.llm ??
    new GeminiModel({ apiKey: settings.geminiApiKey, model: settings.geminiModel, timeoutMs: settings.llmTimeoutMs });
  const adapters = overrides.adapters ?? createSourceAdapters(settings);
  const store =
    overrides.store === null ? undefined : overrides.store ?? (settings.mongodbUri ? new MongoResultStore() : undefined);

  const cache = new ResultCache({
    maxEntries: settings.cacheMaxEntries,
    defaultTtlMs: settings.cacheTtlMs,
    now: overrides.now,
    store,
  });
  const trending = new TrendingStore({
    maxEntries: settings.trendingMaxEntries,
    halfLifeMs: settings.trendingHalfLifeMs,
    now: overrides.now,
  });
  const pipeline = new FactCheckPipeline(
    {
      extractor: new ClaimExtractor(llm),
      synthesizer: new EvidenceSynthesizer(llm, { now: overrides.now }),
      explainer: new ExplanationGenerator(llm),
      adapters,
      cache,
      trending,
    },
    {
      maxClaimLength: settings.maxClaimLength,
      perSourceTimeoutMs: settings.perSourceTimeoutMs,
      searchBudgetMs: settings.searchBudgetMs,
      pipelineBudgetMs: settings.pipelineBudgetMs,
      now: overrides.now,
    }
  );
  return { pipeline, cache, trending };
}
