/**
 * News Adapter
 *
 * `get_latest_news` over a {@link NewsClient}.
 */

import type { Logger } from '../../logging/logger.js';
import { AgentAdapter, AgentFunctionValidationError } from '../agent-adapter.js';
import { createAgentFunction, stringParam, truncate } from '../builder.js';
import type { Article, HeadlinesQuery, NewsClient } from './news-client.js';

export const DEFAULT_COUNTRY = 'us';
export const MAX_ARTICLES = 5;
export const DESCRIPTION_LENGTH = 150;

function describeQuery({ category, keyword }: HeadlinesQuery): string {
  if (category && keyword) return `'${keyword}' in ${category} category`;
  if (category) return `${category} category`;
  return `'${keyword ?? ''}'`;
}

export function formatNews(query: HeadlinesQuery, articles: Article[]): string {
  const country = query.country.toUpperCase();

  if (articles.length === 0) {
    const terms: string[] = [];
    if (query.category) terms.push(`category '${query.category}'`);
    if (query.keyword) terms.push(`keyword '${query.keyword}'`);
    return `📰 No news articles found for ${terms.join(' and ')} in ${country}.`;
  }

  const lines = [`📰 Latest news for ${describeQuery(query)} (${country}):`, ''];
  for (const article of articles.slice(0, MAX_ARTICLES)) {
    const description = article.description ?? '';
    lines.push(`🔸 **${article.title || 'No Title'}**`);
    lines.push(`   📍 Source: ${article.source?.name || 'Unknown Source'}`);
    if (description.length > 10) {
      lines.push(`   📝 ${truncate(description, DESCRIPTION_LENGTH)}`);
    }
    lines.push(`   🔗 ${article.url || '#'}`);
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

export interface NewsAdapterOptions {
  id?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export function createNewsAdapter(client: NewsClient, options: NewsAdapterOptions = {}): AgentAdapter {
  const adapter = new AgentAdapter({
    id: options.id ?? 'news_agent',
    name: 'News Agent',
    description: 'Fetches the latest headlines by category, keyword or country',
    timeoutMs: options.timeoutMs,
    logger: options.logger,
  });

  adapter.register(
    createAgentFunction()
      .name('get_latest_news')
      .description('Get latest news articles by category, keyword, or country')
      .optionalParam('category', 'string', 'News category (business, technology, sports, ...)')
      .optionalParam('keyword', 'string', 'Keyword to search headlines for')
      .optionalParam('country', 'string', 'Two-letter country code', DEFAULT_COUNTRY)
      .tags('news', 'articles', 'headlines', 'current')
      .handler(async (input, { signal }) => {
        const query: HeadlinesQuery = {
          category: stringParam(input, 'category') || undefined,
          keyword: stringParam(input, 'keyword') || undefined,
          country: stringParam(input, 'country') || DEFAULT_COUNTRY,
        };
        if (!query.category && !query.keyword) {
          throw new AgentFunctionValidationError(
            'get_latest_news',
            'category',
            'Specify either a category or a keyword'
          );
        }

        const outcome = await client.getTopHeadlines(query, signal);
        if ('error' in outcome) {
          return { ok: false, error: outcome.error };
        }
        return { ok: true, text: formatNews(query, outcome.articles) };
      })
      .build()
  );

  return adapter;
}
