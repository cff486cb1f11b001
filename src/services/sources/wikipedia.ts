import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SearchQuery } from '../../interfaces/claim';
import { EvidenceItem } from '../../interfaces/evidence';
import { truncateAtWord } from '../../utils/normalize';
import { createHttpClient, requestJson } from './http';
import { evidenceWeight } from './reliability';
import { SearchBudget, SourceAdapter } from './sourceAdapter';

const WIKIPEDIA_API = 'https://en.wikipedia.org/w/api.php';

const searchResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(
        z.object({
          pageid: z.number().optional(),
          title: z.string(),
          index: z.number().optional(),
          extract: z.string().optional(),
          fullurl: z.string().optional(),
          missing: z.boolean().optional(),
        })
      ),
    })
    .optional(),
});

export interface WikipediaAdapterOptions {
  http?: AxiosInstance;
  maxResults?: number;
}

/** Encyclopedia background: intro extracts of the best-matching articles, one request per query. */
export class WikipediaAdapter implements SourceAdapter {
  readonly id = 'wikipedia';
  readonly kind = 'encyclopedia';
  readonly sourceWeight = 0.75;
  private readonly http: AxiosInstance;
  private readonly maxResults: number;

  constructor(opts: WikipediaAdapterOptions = {}) {
    this.http = opts.http ?? createHttpClient();
    this.maxResults = opts.maxResults ?? 3;
  }

  async search(query: SearchQuery, budget: SearchBudget): Promise<EvidenceItem[]> {
    const body = await requestJson(
      this.http,
      this.id,
      {
        method: 'GET',
        url: WIKIPEDIA_API,
        params: {
          action: 'query',
          format: 'json',
          formatversion: 2,
          generator: 'search',
          gsrsearch: query.text,
          gsrlimit: this.maxResults,
          prop: 'extracts|info',
          exintro: 1,
          explaintext: 1,
          exsentences: 3,
          inprop: 'url',
        },
      },
      searchResponseSchema,
      budget
    );
    const pages = body?.query?.pages ?? [];

    return [...pages]
      .filter(page => !page.missing && page.extract && page.extract.trim())
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      .slice(0, this.maxResults)
      .map((page): EvidenceItem => {
        const url = page.fullurl ?? `https://en.wikipedia.org/wiki/${encodeURIComponent(page.title.replace(/ /g, '_'))}`;
        return {
          sourceId: this.id,
          sourceKind: this.kind,
          title: page.title,
          url,
          snippet: truncateAtWord(page.extract ?? '', 500),
          publisher: 'Wikipedia',
          stance: 'unknown',
          sourceWeight: evidenceWeight(this.sourceWeight, url),
        };
      });
  }
}
