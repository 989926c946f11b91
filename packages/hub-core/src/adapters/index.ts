/**
 * Agent Adapters
 *
 * Function registry, builder and the bundled search, weather and news adapters.
 */

// Types
export * from './types.js';

// Adapter base and errors
export { AgentAdapter, AgentFunctionValidationError, AgentFunctionExecutionError } from './agent-adapter.js';
export type { AgentAdapterOptions, AdapterStats } from './agent-adapter.js';

// Builder
export { AgentFunctionBuilder, createAgentFunction, stringParam, numberParam, clamp, truncate } from './builder.js';

// Search
export { DuckDuckGoSearchClient } from './search/search-client.js';
export type { SearchClient, SearchOutcome, SearchResult, DuckDuckGoSearchClientOptions } from './search/search-client.js';
export { createSearchAdapter, formatSearchResults, formatNewsResults } from './search/search-adapter.js';
export type { SearchAdapterOptions } from './search/search-adapter.js';

// Weather
export { WeatherApiClient } from './weather/weather-client.js';
export type {
  WeatherClient,
  WeatherOutcome,
  CurrentWeather,
  WeatherForecast,
  WeatherApiClientOptions,
} from './weather/weather-client.js';
export { createWeatherAdapter, formatCurrentWeather, formatForecast } from './weather/weather-adapter.js';
export type { WeatherAdapterOptions } from './weather/weather-adapter.js';

// News
export { NewsApiClient } from './news/news-client.js';
export type { NewsClient, NewsOutcome, Article, HeadlinesQuery, NewsApiClientOptions } from './news/news-client.js';
export { createNewsAdapter, formatNews } from './news/news-adapter.js';
export type { NewsAdapterOptions } from './news/news-adapter.js';
