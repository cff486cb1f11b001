import { describe, expect, it } from 'vitest';
import { loadSettings } from '../../../src/config/settings';
import { ConfigError } from '../../../src/utils/errors';

describe('loadSettings', () => {
  it('applies defaults around the required model key', () => {
    const settings = loadSettings({ GEMINI_API_KEY: 'test-secret' });

    expect(settings).toEqual({
      geminiApiKey: 'test-secret',
      geminiModel: 'gemini-2.0-flash',
      googleFactCheckApiKey: undefined,
      newsApiKey: undefined,
      tavilyApiKey: undefined,
      port: 5000,
      corsOrigins: '*',
      mongodbUri: undefined,
      cacheTtlMs: 86_400_000,
      cacheMaxEntries: 1000,
      trendingMaxEntries: 100,
      trendingHalfLifeMs: 21_600_000,
      perSourceTimeoutMs: 8000,
      searchBudgetMs: 15_000,
      pipelineBudgetMs: 60_000,
      llmTimeoutMs: 20_000,
      maxClaimLength: 2000,
    });
  });

  it('converts units and splits origin lists', () => {
    const settings = loadSettings({
      GEMINI_API_KEY: 'test-secret',
      NEWSAPI_KEY: 'test-news-key',
      CACHE_TTL_SECONDS: '60',
      PORT: '8080',
      CORS_ORIGINS: 'https://a.example, https://b.example',
    });

    expect(settings.newsApiKey).toBe('test-news-key');
    expect(settings.cacheTtlMs).toBe(60_000);
    expect(settings.port).toBe(8080);
    expect(settings.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
  });

  it('treats blank and placeholder optional values as unset', () => {
    const settings = loadSettings({
      GEMINI_API_KEY: 'test-secret',
      TAVILY_API_KEY: 'your_tavily_api_key_here',
      MAX_CLAIM_LENGTH: '  ',
    });

    expect(settings.tavilyApiKey).toBeUndefined();
    expect(settings.maxClaimLength).toBe(2000);
  });

  it('reports every problem at once', () => {
    const load = () => loadSettings({ GEMINI_API_KEY: 'your_gemini_api_key_here', PORT: 'eighty' });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow(/GEMINI_API_KEY is still the placeholder value; PORT /);
  });

  it('requires the model key', () => {
    expect(() => loadSettings({})).toThrow('Invalid configuration: GEMINI_API_KEY is required');
  });
});
