/**
 * Search Adapter
 *
 * `search_web` and `search_news` over a {@link SearchClient}.
 */

import type { Logger } from '../../logging/logger.js';
import { AgentAdapter } from '../agent-adapter.js';
import { clamp, createAgentFunction, numberParam, stringParam, truncate } from '../builder.js';
import type { FunctionOutcome } from '../types.js';
import type { SearchClient, SearchOutcome, SearchResult } from './search-client.js';

export const DEFAULT_MAX_RESULTS = 5;
export const MAX_RESULTS_LIMIT = 10;
export const WEB_SNIPPET_LENGTH = 200;
export const NEWS_SNIPPET_LENGTH = 250;

function resolveMaxResults(value: number | undefined): number {
  return clamp(Math.floor(value ?? DEFAULT_MAX_RESULTS), 1, MAX_RESULTS_LIMIT);
}

function formatItems(
  results: SearchResult[],
  markers: { item: string; snippet: string },
  snippetLength: number
): string[] {
  const lines: string[] = [];
  for (const result of results) {
    lines.push(`${markers.item} **${result.title || 'No Title'}**`);
    if (result.snippet.length > 10) {
      lines.push(`   ${markers.snippet} ${truncate(result.snippet, snippetLength)}`);
    }
    lines.push(`   🔗 ${result.url || '#'}`);
    lines.push('');
  }
  return lines;
}

export function formatSearchResults(query: string, results: SearchResult[], maxResults: number): string {
  if (results.length === 0) {
    return `🔍 No search results found for '${query}'. Please try a different search term.`;
  }

  const shown = results.slice(0, maxResults);
  return [
    `🔍 Top ${shown.length} search results for **${query}**:`,
    '',
    ...formatItems(shown, { item: '🔸', snippet: '📝' }, WEB_SNIPPET_LENGTH),
  ]
    .join('\n')
    .trimEnd();
}

export function formatNewsResults(query: string, results: SearchResult[], maxResults: number): string {
  if (results.length === 0) {
    return `📰 No news results found for '${query}'. Please try a different search term.`;
  }

  const shown = results.slice(0, maxResults);
  return [
    `📰 Latest news about **${query}** (${shown.length} articles):`,
    '',
    ...formatItems(shown, { item: '📄', snippet: '📋' }, NEWS_SNIPPET_LENGTH),
  ]
    .join('\n')
    .trimEnd();
}

function toOutcome(outcome: SearchOutcome, render: (results: SearchResult[]) => string): FunctionOutcome {
  if ('error' in outcome) {
    return { ok: false, error: outcome.error };
  }
  return { ok: true, text: render(outcome.results) };
}

export interface SearchAdapterOptions {
  id?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export function createSearchAdapter(client: SearchClient, options: SearchAdapterOptions = {}): AgentAdapter {
  const adapter = new AgentAdapter({
    id: options.id ?? 'web_search_agent',
    name: 'Web Search Agent',
    description: 'Performs web searches and returns relevant results',
    timeoutMs: options.timeoutMs,
    logger: options.logger,
  });

  adapter.register(
    createAgentFunction()
      .name('search_web')
      .description('Search the web and return relevant results')
      .requiredParam('query', 'string', 'The search query to look for on the web')
      .optionalParam('max_results', 'number', 'Maximum number of results to return (1-10)', DEFAULT_MAX_RESULTS)
      .tags('search', 'web', 'internet')
      .handler(async (input, { signal }) => {
        const query = stringParam(input, 'query') ?? '';
        const outcome = await client.search(query, { signal });
        return toOutcome(outcome, (results) =>
          formatSearchResults(query, results, resolveMaxResults(numberParam(input, 'max_results')))
        );
      })
      .build()
  );

  adapter.register(
    createAgentFunction()
      .name('search_news')
      .description('Search for recent news articles')
      .requiredParam('query', 'string', 'The news search query')
      .optionalParam('max_results', 'number', 'Maximum number of news results to return (1-10)', DEFAULT_MAX_RESULTS)
      .tags('search', 'news', 'articles')
      .handler(async (input, { signal }) => {
        const query = stringParam(input, 'query') ?? '';
        const outcome = await client.search(`${query} news`, { signal });
        return toOutcome(outcome, (results) =>
          formatNewsResults(query, results, resolveMaxResults(numberParam(input, 'max_results')))
        );
      })
      .build()
  );

  return adapter;
}
