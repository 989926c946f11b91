/**
 * Hub Settings
 *
 * Reads the process environment into a typed configuration. Every value has
 * a default so the hub starts with an empty environment; collaborator API
 * keys are optional and reported by {@link missingApiKeys}.
 */

import { z } from 'zod';
import type { LevelWithSilent } from 'pino';

export interface HubConfig {
  server: {
    host: string;
    port: number;
    corsOrigin: string | boolean;
  };
  logLevel: LevelWithSilent;
  query: {
    latencyMs: number;
    drainTimeoutMs?: number;
  };
  search: {
    baseUrl: string;
  };
  weather: {
    apiKey: string;
    baseUrl: string;
  };
  news: {
    apiKey: string;
    baseUrl: string;
  };
}

export const defaultConfig: HubConfig = {
  server: {
    host: '0.0.0.0',
    port: 3000,
    corsOrigin: true,
  },
  logLevel: 'info',
  query: {
    latencyMs: 1000,
  },
  search: {
    baseUrl: 'https://api.duckduckgo.com',
  },
  weather: {
    apiKey: '',
    baseUrl: 'https://api.weatherapi.com/v1',
  },
  news: {
    apiKey: '',
    baseUrl: 'https://newsapi.org/v2',
  },
};

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  HUB_HOST: z.string().min(1).optional(),
  HUB_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  CORS_ORIGIN: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  QUERY_LATENCY_MS: z.coerce.number().int().nonnegative().optional(),
  DRAIN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  SEARCH_API_URL: z.string().url().optional(),
  WEATHER_API_KEY: z.string().optional(),
  WEATHER_API_URL: z.string().url().optional(),
  NEWS_API_KEY: z.string().optional(),
  NEWS_API_URL: z.string().url().optional(),
});

type Env = Record<string, string | undefined>;

function parseCorsOrigin(value: string | undefined): string | boolean {
  if (value === undefined || value === 'true') return defaultConfig.server.corsOrigin;
  if (value === 'false') return false;
  return value;
}

/**
 * Load configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: Env = process.env): HubConfig {
  const present: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  return {
    server: {
      host: vars.HUB_HOST ?? defaultConfig.server.host,
      port: vars.HUB_PORT ?? defaultConfig.server.port,
      corsOrigin: parseCorsOrigin(vars.CORS_ORIGIN),
    },
    logLevel: vars.LOG_LEVEL ?? defaultConfig.logLevel,
    query: {
      latencyMs: vars.QUERY_LATENCY_MS ?? defaultConfig.query.latencyMs,
      drainTimeoutMs: vars.DRAIN_TIMEOUT_MS,
    },
    search: {
      baseUrl: vars.SEARCH_API_URL ?? defaultConfig.search.baseUrl,
    },
    weather: {
      apiKey: vars.WEATHER_API_KEY ?? defaultConfig.weather.apiKey,
      baseUrl: vars.WEATHER_API_URL ?? defaultConfig.weather.baseUrl,
    },
    news: {
      apiKey: vars.NEWS_API_KEY ?? defaultConfig.news.apiKey,
      baseUrl: vars.NEWS_API_URL ?? defaultConfig.news.baseUrl,
    },
  };
}

/**
 * Names of collaborator API keys that are not configured
 */
export function missingApiKeys(config: HubConfig): string[] {
  const missing: string[] = [];
  if (!config.weather.apiKey) missing.push('WEATHER_API_KEY');
  if (!config.news.apiKey) missing.push('NEWS_API_KEY');
  return missing;
}
