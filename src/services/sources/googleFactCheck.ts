import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SearchQuery } from '../../interfaces/claim';
import { EvidenceItem, Stance } from '../../interfaces/evidence';
import { truncateAtWord } from '../../utils/normalize';
import { createHttpClient, requestJson, stripHtml } from './http';
import { evidenceWeight } from './reliability';
import { SearchBudget, SourceAdapter } from './sourceAdapter';

const CLAIM_SEARCH_API = 'https://factchecktools.googleapis.com/v1alpha1/claims:search';

const claimSearchSchema = z.object({
  claims: z
    .array(
      z.object({
        text: z.string().optional(),
        claimant: z.string().optional(),
        claimDate: z.string().optional(),
        claimReview: z
          .array(
            z.object({
              publisher: z.object({ name: z.string().optional(), site: z.string().optional() }).optional(),
              url: z.string(),
              title: z.string().optional(),
              reviewDate: z.string().optional(),
              textualRating: z.string().optional(),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

const REFUTING_RATINGS =
  /\b(false|fake|hoax|misleading|incorrect|inaccurate|untrue|wrong|baseless|fabricated|pants on fire|no evidence|unproven|unconfirmed|unverified|unsupported|debunked|scam|satire|distorted|altered|manipulated)\b/i;
// A negated supporting word ("Not accurate", "Not verified") is a refutation
const NEGATED_SUPPORT = /\b(not|never|isn't|wasn't)\s+(\w+\s+)?(true|correct|accurate|confirmed|verified|legit|proven|supported)\b/i;
const SUPPORTING_RATINGS = /\b(true|correct|accurate|confirmed|verified|legit)\b/i;

/**
 * Maps a publisher's textual rating onto a stance toward the reviewed claim.
 * Mixed ratings ("Half true", "Mixture", "Partly false") are neutral; negated
 * and refuting ratings are checked before supporting ones.
 */
export function ratingToStance(rating: string | undefined): Stance {
  if (!rating) {
    return 'unknown';
  }
  if (/\b(mixed|mixture|half[ -]true|partly|partially)\b/i.test(rating)) {
    return 'neutral';
  }
  if (NEGATED_SUPPORT.test(rating) || REFUTING_RATINGS.test(rating)) {
    return 'refutes';
  }
  if (SUPPORTING_RATINGS.test(rating)) {
    return 'supports';
  }
  return 'unknown';
}

export interface GoogleFactCheckAdapterOptions {
  apiKey: string;
  http?: AxiosInstance;
  maxResults?: number;
  languageCode?: string;
}

/** Published fact-checks from the ClaimReview registry; the rating already carries a stance. */
export class GoogleFactCheckAdapter implements SourceAdapter {
  readonly id = 'googleFactCheck';
  readonly kind = 'factCheckRegistry';
  readonly sourceWeight = 0.9;
  private readonly apiKey: string;
  private readonly http: AxiosInstance;
  private readonly maxResults: number;
  private readonly languageCode?: string;

  constructor(opts: GoogleFactCheckAdapterOptions) {
    this.apiKey = opts.apiKey;
    this.http = opts.http ?? createHttpClient();
    this.maxResults = opts.maxResults ?? 5;
    this.languageCode = opts.languageCode;
  }

  async search(query: SearchQuery, budget: SearchBudget): Promise<EvidenceItem[]> {
    const body = await requestJson(
      this.http,
      this.id,
      {
        method: 'GET',
        url: CLAIM_SEARCH_API,
        params: {
          query: query.text,
          pageSize: this.maxResults,
          languageCode: this.languageCode,
          key: this.apiKey,
        },
      },
      claimSearchSchema,
      budget
    );
    if (!body) {
      return [];
    }

    const items: EvidenceItem[] = [];
    for (const claim of body.claims) {
      for (const review of claim.claimReview) {
        const rating = review.textualRating ? stripHtml(review.textualRating) : undefined;
        const claimText = claim.text ? stripHtml(claim.text) : '';
        const snippet = [
          claimText && `Claim: ${claimText}`,
          claim.claimant && `Claimant: ${claim.claimant}`,
          rating && `Rating: ${rating}`,
        ]
          .filter(Boolean)
          .join(' | ');
        items.push({
          sourceId: this.id,
          sourceKind: this.kind,
          title: review.title ? stripHtml(review.title) : claimText || review.url,
          url: review.url,
          snippet: truncateAtWord(snippet, 500),
          publisher: review.publisher?.name ?? review.publisher?.site,
          publishedAt: review.reviewDate ?? claim.claimDate,
          stance: ratingToStance(rating),
          sourceWeight: evidenceWeight(this.sourceWeight, review.url),
        });
      }
    }
    return items.slice(0, this.maxResults);
  }
}
