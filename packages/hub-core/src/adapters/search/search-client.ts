/**
 * Search Client
 *
 * Web search collaborator for the search adapter. Failures of the remote
 * service are reported in the result (`{ error }`) rather than thrown.
 */

import { z } from 'zod';
import { createLogger, type Logger } from '../../logging/logger.js';
import { errorMessage } from '../../utils/async.js';

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export type SearchOutcome = { results: SearchResult[] } | { error: string };

export interface SearchClient {
  search(query: string, options?: { signal?: AbortSignal }): Promise<SearchOutcome>;
}

// Instant Answer API response, only the fields we read
const TopicSchema = z
  .object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
  })
  .passthrough();

const InstantAnswerSchema = z
  .object({
    Heading: z.string().optional(),
    Abstract: z.string().optional(),
    AbstractURL: z.string().optional(),
    Results: z.array(TopicSchema).optional(),
    RelatedTopics: z.array(TopicSchema).optional(),
  })
  .passthrough();

type InstantAnswer = z.infer<typeof InstantAnswerSchema>;

export interface DuckDuckGoSearchClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
  fetch?: typeof fetch;
}

/**
 * DuckDuckGo Instant Answer client
 */
export class DuckDuckGoSearchClient implements SearchClient {
  private baseUrl: string;
  private timeoutMs: number;
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(options: DuckDuckGoSearchClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://api.duckduckgo.com';
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.logger = options.logger ?? createLogger('search-client');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: string, options: { signal?: AbortSignal } = {}): Promise<SearchOutcome> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('no_html', '1');
    url.searchParams.set('no_redirect', '1');
    url.searchParams.set('skip_disambig', '1');

    const signals = [AbortSignal.timeout(this.timeoutMs)];
    if (options.signal) signals.push(options.signal);

    this.logger.info({ query }, 'Searching DuckDuckGo');

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.any(signals), redirect: 'follow' });
    } catch (error) {
      this.logger.error({ query, error: errorMessage(error) }, 'Network error searching DuckDuckGo');
      return { error: `Network error: ${errorMessage(error)}` };
    }

    if (!response.ok) {
      this.logger.error({ query, status: response.status }, 'HTTP error searching DuckDuckGo');
      return { error: `HTTP error: ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.logger.error({ query, error: errorMessage(error) }, 'Unreadable DuckDuckGo response');
      return { error: `Unexpected error: ${errorMessage(error)}` };
    }

    const parsed = InstantAnswerSchema.safeParse(body);
    if (!parsed.success) {
      return { error: 'Unexpected response from search service' };
    }

    return { results: this.mapResults(query, parsed.data) };
  }

  private mapResults(query: string, data: InstantAnswer): SearchResult[] {
    const results: SearchResult[] = [];

    if (data.Results && data.Results.length > 0) {
      for (const item of data.Results) {
        results.push({ title: item.Text ?? '', url: item.FirstURL ?? '', snippet: item.Text ?? '' });
      }
    } else if (data.Abstract) {
      results.push({
        title: data.Heading || query,
        url: data.AbstractURL || `https://duckduckgo.com/?q=${encodeURIComponent(query)}`,
        snippet: data.Abstract,
      });
    }

    for (const topic of data.RelatedTopics ?? []) {
      // grouped topics carry no Text of their own
      if (topic.Text) {
        results.push({ title: topic.Text, url: topic.FirstURL ?? '', snippet: topic.Text });
      }
    }

    return results;
  }
}
