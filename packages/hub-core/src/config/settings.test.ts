import { describe, it, expect } from 'vitest';
import { ConfigError, defaultConfig, loadConfig, missingApiKeys } from './settings.js';

describe('loadConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(defaultConfig);
  });

  it('reads and coerces environment variables', () => {
    const config = loadConfig({
      HUB_HOST: '127.0.0.1',
      HUB_PORT: '8080',
      LOG_LEVEL: 'debug',
      QUERY_LATENCY_MS: '0',
      DRAIN_TIMEOUT_MS: '5000',
      WEATHER_API_KEY: 'test-secret',
      NEWS_API_URL: 'https://news.test/v2',
    });

    expect(config.server).toEqual({ host: '127.0.0.1', port: 8080, corsOrigin: true });
    expect(config.logLevel).toBe('debug');
    expect(config.query).toEqual({ latencyMs: 0, drainTimeoutMs: 5000 });
    expect(config.weather).toEqual({ apiKey: 'test-secret', baseUrl: 'https://api.weatherapi.com/v1' });
    expect(config.news).toEqual({ apiKey: '', baseUrl: 'https://news.test/v2' });
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ HUB_PORT: '', NEWS_API_KEY: '' })).toEqual(defaultConfig);
  });

  it.each([
    { value: 'false', expected: false },
    { value: 'true', expected: true },
    { value: 'https://app.test', expected: 'https://app.test' },
  ])('parses CORS_ORIGIN=$value', ({ value, expected }) => {
    expect(loadConfig({ CORS_ORIGIN: value }).server.corsOrigin).toBe(expected);
  });

  it('lists every invalid variable in a ConfigError', () => {
    let caught: unknown;
    try {
      loadConfig({ HUB_PORT: 'not-a-port', LOG_LEVEL: 'loud', SEARCH_API_URL: 'nope' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual(['HUB_PORT', 'LOG_LEVEL', 'SEARCH_API_URL']);
      expect(caught.message.startsWith('Invalid configuration: HUB_PORT: ')).toBe(true);
    }
  });
});

describe('missingApiKeys', () => {
  it('names the collaborator keys that are unset', () => {
    expect(missingApiKeys(defaultConfig)).toEqual(['WEATHER_API_KEY', 'NEWS_API_KEY']);
    expect(missingApiKeys(loadConfig({ WEATHER_API_KEY: 'test-secret', NEWS_API_KEY: 'test-secret' }))).toEqual([]);
  });
});
