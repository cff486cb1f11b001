import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SearchQuery } from '../../interfaces/claim';
import { EvidenceItem } from '../../interfaces/evidence';
import { hostOf } from '../../utils/url';
import { truncateAtWord } from '../../utils/normalize';
import { createHttpClient, requestJson } from './http';
import { evidenceWeight } from './reliability';
import { SearchBudget, SourceAdapter } from './sourceAdapter';

const TAVILY_SEARCH_API = 'https://api.tavily.com/search';

const searchSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(''),
        url: z.string(),
        content: z.string().default(''),
        published_date: z.string().nullish(),
      })
    )
    .default([]),
});

export interface TavilyAdapterOptions {
  apiKey: string;
  http?: AxiosInstance;
  maxResults?: number;
}

/** General web search; the broadest and least curated source. */
export class TavilyAdapter implements SourceAdapter {
  readonly id = 'tavily';
  readonly kind = 'webSearch';
  readonly sourceWeight = 0.6;
  private readonly apiKey: string;
  private readonly http: AxiosInstance;
  private readonly maxResults: number;

  constructor(opts: TavilyAdapterOptions) {
    this.apiKey = opts.apiKey;
    this.http = opts.http ?? createHttpClient();
    this.maxResults = opts.maxResults ?? 5;
  }

  async search(query: SearchQuery, budget: SearchBudget): Promise<EvidenceItem[]> {
    const body = await requestJson(
      this.http,
      this.id,
      {
        method: 'POST',
        url: TAVILY_SEARCH_API,
        headers: { Authorization: `Bearer ${this.apiKey}`, 'Content-Type': 'application/json' },
        data: {
          query: query.text,
          max_results: this.maxResults,
          search_depth: 'basic',
          include_answer: false,
        },
      },
      searchSchema,
      budget
    );
    if (!body) {
      return [];
    }

    return body.results
      .filter(result => result.content.trim() || result.title.trim())
      .slice(0, this.maxResults)
      .map((result): EvidenceItem => ({
        sourceId: this.id,
        sourceKind: this.kind,
        title: result.title || result.url,
        url: result.url,
        snippet: truncateAtWord(result.content, 500),
        publisher: hostOf(result.url) ?? undefined,
        publishedAt: result.published_date ?? undefined,
        stance: 'unknown',
        sourceWeight: evidenceWeight(this.sourceWeight, result.url),
      }));
  }
}
