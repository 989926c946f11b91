/**
 * News Client
 *
 * NewsAPI `top-headlines` collaborator for the news adapter.
 */

import { z } from 'zod';
import { createLogger, type Logger } from '../../logging/logger.js';
import { errorMessage } from '../../utils/async.js';

export const ArticleSchema = z
  .object({
    title: z.string().nullish(),
    description: z.string().nullish(),
    url: z.string().nullish(),
    source: z.object({ name: z.string().nullish() }).passthrough().nullish(),
  })
  .passthrough();

const HeadlinesSchema = z
  .object({
    status: z.string().optional(),
    articles: z.array(ArticleSchema).default([]),
  })
  .passthrough();

export type Article = z.infer<typeof ArticleSchema>;

export interface HeadlinesQuery {
  category?: string;
  keyword?: string;
  country: string;
}

export type NewsOutcome = { articles: Article[] } | { error: string };

export interface NewsClient {
  getTopHeadlines(query: HeadlinesQuery, signal?: AbortSignal): Promise<NewsOutcome>;
}

export interface NewsApiClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
  fetch?: typeof fetch;
}

export class NewsApiClient implements NewsClient {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(options: NewsApiClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? 'https://newsapi.org/v2';
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.logger = options.logger ?? createLogger('news-client');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getTopHeadlines(query: HeadlinesQuery, signal?: AbortSignal): Promise<NewsOutcome> {
    if (!this.apiKey) {
      return { error: 'News API key is not configured' };
    }

    const url = new URL(`${this.baseUrl.replace(/\/$/, '')}/top-headlines`);
    url.searchParams.set('apiKey', this.apiKey);
    url.searchParams.set('country', query.country);
    if (query.category) url.searchParams.set('category', query.category);
    if (query.keyword) url.searchParams.set('q', query.keyword);

    const signals = [AbortSignal.timeout(this.timeoutMs)];
    if (signal) signals.push(signal);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.any(signals) });
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Error fetching news');
      return { error: `Network error: ${errorMessage(error)}` };
    }

    if (!response.ok) {
      const body = await response.text().catch((error: unknown) => `<unreadable: ${errorMessage(error)}>`);
      this.logger.error({ status: response.status, body }, 'NewsAPI returned an error');
      return { error: `News API error: ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Unreadable NewsAPI response');
      return { error: `Unexpected error: ${errorMessage(error)}` };
    }

    const parsed = HeadlinesSchema.safeParse(body);
    if (!parsed.success) {
      return { error: 'Unexpected response from news service' };
    }
    return { articles: parsed.data.articles };
  }
}
