/**
 * Weather Client
 *
 * WeatherAPI.com collaborator for the weather adapter.
 */

import { z } from 'zod';
import { createLogger, type Logger } from '../../logging/logger.js';
import { errorMessage } from '../../utils/async.js';

const ConditionSchema = z.object({ text: z.string() }).passthrough();

const LocationSchema = z
  .object({
    name: z.string(),
    country: z.string().optional(),
  })
  .passthrough();

export const CurrentWeatherSchema = z
  .object({
    location: LocationSchema,
    current: z
      .object({
        temp_c: z.number(),
        feelslike_c: z.number().optional(),
        wind_kph: z.number(),
        humidity: z.number(),
        condition: ConditionSchema,
      })
      .passthrough(),
  })
  .passthrough();

export const ForecastSchema = z
  .object({
    location: LocationSchema,
    forecast: z.object({
      forecastday: z.array(
        z
          .object({
            date: z.string(),
            day: z
              .object({
                maxtemp_c: z.number(),
                mintemp_c: z.number(),
                daily_chance_of_rain: z.number().optional(),
                condition: ConditionSchema,
              })
              .passthrough(),
          })
          .passthrough()
      ),
    }),
  })
  .passthrough();

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;
export type WeatherForecast = z.infer<typeof ForecastSchema>;

export type WeatherOutcome<T> = { data: T } | { error: string };

export interface WeatherClient {
  getCurrentWeather(location: string, signal?: AbortSignal): Promise<WeatherOutcome<CurrentWeather>>;
  getForecast(location: string, days: number, signal?: AbortSignal): Promise<WeatherOutcome<WeatherForecast>>;
}

export interface WeatherApiClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
  fetch?: typeof fetch;
}

export class WeatherApiClient implements WeatherClient {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(options: WeatherApiClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? 'https://api.weatherapi.com/v1';
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.logger = options.logger ?? createLogger('weather-client');
    this.fetchImpl = options.fetch ?? fetch;
  }

  getCurrentWeather(location: string, signal?: AbortSignal): Promise<WeatherOutcome<CurrentWeather>> {
    return this.get('current.json', { q: location }, CurrentWeatherSchema, signal);
  }

  getForecast(location: string, days: number, signal?: AbortSignal): Promise<WeatherOutcome<WeatherForecast>> {
    return this.get('forecast.json', { q: location, days: String(days) }, ForecastSchema, signal);
  }

  private async get<T>(
    endpoint: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<WeatherOutcome<T>> {
    if (!this.apiKey) {
      return { error: 'Weather API key is not configured' };
    }

    const url = new URL(`${this.baseUrl.replace(/\/$/, '')}/${endpoint}`);
    url.searchParams.set('key', this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const signals = [AbortSignal.timeout(this.timeoutMs)];
    if (signal) signals.push(signal);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.any(signals) });
    } catch (error) {
      this.logger.error({ endpoint, error: errorMessage(error) }, 'Weather request failed');
      return { error: `Network error: ${errorMessage(error)}` };
    }

    if (!response.ok) {
      this.logger.error({ endpoint, status: response.status }, 'Weather API returned an error');
      return { error: `Weather API error: ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.logger.error({ endpoint, error: errorMessage(error) }, 'Unreadable weather response');
      return { error: `Unexpected error: ${errorMessage(error)}` };
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return { error: 'Unexpected response from weather service' };
    }
    return { data: parsed.data };
  }
}
