/**
 * Hub entry point: loads config, wires the broker, query handler, adapters
 * and HTTP transport, and drains everything on SIGINT/SIGTERM.
 */

import { MessageBroker } from './broker/message-broker.js';
import { loadConfig, missingApiKeys } from './config/settings.js';
import { configureLogger, createLogger, toError } from './logging/logger.js';
import { QueryHandler } from './query/query-handler.js';
import { DuckDuckGoSearchClient } from './adapters/search/search-client.js';
import { createSearchAdapter } from './adapters/search/search-adapter.js';
import { WeatherApiClient } from './adapters/weather/weather-client.js';
import { createWeatherAdapter } from './adapters/weather/weather-adapter.js';
import { NewsApiClient } from './adapters/news/news-client.js';
import { createNewsAdapter } from './adapters/news/news-adapter.js';
import { startServer } from './api/server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = configureLogger(config.logLevel);

  const missing = missingApiKeys(config);
  if (missing.length > 0) {
    logger.warn({ missing }, 'Collaborator API keys not configured; those functions will report errors');
  }

  const broker = new MessageBroker({ logger: createLogger('broker', logger) });
  const queryHandler = new QueryHandler(broker, {
    latencyMs: config.query.latencyMs,
    drainTimeoutMs: config.query.drainTimeoutMs,
    logger: createLogger('query-handler', logger),
  });

  const adapters = [
    createSearchAdapter(
      new DuckDuckGoSearchClient({ baseUrl: config.search.baseUrl, logger: createLogger('search-client', logger) }),
      { logger: createLogger('adapter:web_search_agent', logger) }
    ),
    createWeatherAdapter(
      new WeatherApiClient({
        apiKey: config.weather.apiKey,
        baseUrl: config.weather.baseUrl,
        logger: createLogger('weather-client', logger),
      }),
      { logger: createLogger('adapter:weather_agent', logger) }
    ),
    createNewsAdapter(
      new NewsApiClient({
        apiKey: config.news.apiKey,
        baseUrl: config.news.baseUrl,
        logger: createLogger('news-client', logger),
      }),
      { logger: createLogger('adapter:news_agent', logger) }
    ),
  ];

  queryHandler.start();

  const server = await startServer(
    { broker, queryHandler, adapters, logger },
    {
      host: config.server.host,
      port: config.server.port,
      cors: { origin: config.server.corsOrigin, credentials: true },
    }
  );

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    await queryHandler.stop();
    await server.close();
    broker.shutdown();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: toError(error) }, 'Shutdown failed');
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  createLogger('main').fatal({ err: toError(error) }, 'Failed to start hub');
  process.exit(1);
});
