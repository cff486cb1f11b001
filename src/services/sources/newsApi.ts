import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SearchQuery } from '../../interfaces/claim';
import { EvidenceItem } from '../../interfaces/evidence';
import { AdapterFailure } from '../../utils/errors';
import { truncateAtWord } from '../../utils/normalize';
import { createHttpClient, requestJson, stripHtml } from './http';
import { evidenceWeight } from './reliability';
import { SearchBudget, SourceAdapter } from './sourceAdapter';

const EVERYTHING_API = 'https://newsapi.org/v2/everything';

const everythingSchema = z.object({
  status: z.string(),
  code: z.string().optional(),
  message: z.string().optional(),
  articles: z
    .array(
      z.object({
        source: z.object({ name: z.string().nullish() }).nullish(),
        title: z.string().nullish(),
        description: z.string().nullish(),
        content: z.string().nullish(),
        url: z.string(),
        publishedAt: z.string().nullish(),
      })
    )
    .default([]),
});

export interface NewsApiAdapterOptions {
  apiKey: string;
  http?: AxiosInstance;
  maxResults?: number;
}

export class NewsApiAdapter implements SourceAdapter {
  readonly id = 'newsApi';
  readonly kind = 'news';
  readonly sourceWeight = 0.7;
  private readonly apiKey: string;
  private readonly http: AxiosInstance;
  private readonly maxResults: number;

  constructor(opts: NewsApiAdapterOptions) {
    this.apiKey = opts.apiKey;
    this.http = opts.http ?? createHttpClient();
    this.maxResults = opts.maxResults ?? 5;
  }

  async search(query: SearchQuery, budget: SearchBudget): Promise<EvidenceItem[]> {
    const body = await requestJson(
      this.http,
      this.id,
      {
        method: 'GET',
        url: EVERYTHING_API,
        headers: { 'X-Api-Key': this.apiKey },
        params: {
          q: query.text,
          pageSize: this.maxResults,
          sortBy: 'relevancy',
          language: 'en',
        },
      },
      everythingSchema,
      budget
    );
    if (!body) {
      return [];
    }
    if (body.status !== 'ok') {
      const reason = body.code === 'rateLimited' ? 'rateLimited' : 'malformed';
      throw new AdapterFailure(this.id, reason, `newsApi reported ${body.code ?? 'an error'}`);
    }

    return body.articles
      .filter(article => article.title && article.title !== '[Removed]')
      .slice(0, this.maxResults)
      .map((article): EvidenceItem => ({
        sourceId: this.id,
        sourceKind: this.kind,
        title: stripHtml(article.title ?? ''),
        url: article.url,
        snippet: truncateAtWord(stripHtml(article.description ?? article.content ?? ''), 500),
        publisher: article.source?.name ?? undefined,
        publishedAt: article.publishedAt ?? undefined,
        stance: 'unknown',
        sourceWeight: evidenceWeight(this.sourceWeight, article.url),
      }));
  }
}
