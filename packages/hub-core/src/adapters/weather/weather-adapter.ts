/**
 * Weather Adapter
 *
 * `get_current_weather` and `get_weather_forecast` over a {@link WeatherClient}.
 */

import type { Logger } from '../../logging/logger.js';
import { AgentAdapter } from '../agent-adapter.js';
import { clamp, createAgentFunction, numberParam, stringParam } from '../builder.js';
import type { CurrentWeather, WeatherClient, WeatherForecast } from './weather-client.js';

export const DEFAULT_FORECAST_DAYS = 3;
export const MAX_FORECAST_DAYS = 10;

function displayLocation(location: { name: string; country?: string }): string {
  return location.country ? `${location.name}, ${location.country}` : location.name;
}

export function formatCurrentWeather(data: CurrentWeather): string {
  const { current } = data;
  const lines = [
    `🌤️ Current weather in ${displayLocation(data.location)}:`,
    '',
    `• Condition: ${current.condition.text}`,
  ];

  let temperature = `• Temperature: ${current.temp_c}°C`;
  if (current.feelslike_c !== undefined && Math.abs(current.feelslike_c - current.temp_c) > 1) {
    temperature += ` (feels like ${current.feelslike_c}°C)`;
  }
  lines.push(temperature, `• Wind: ${current.wind_kph} km/h`, `• Humidity: ${current.humidity}%`);

  return lines.join('\n');
}

export function formatForecast(data: WeatherForecast, days: number): string {
  const forecastDays = data.forecast.forecastday.slice(0, days);
  const lines = [`📅 Weather forecast for ${displayLocation(data.location)} (${forecastDays.length} days):`, ''];

  forecastDays.forEach(({ date, day }, index) => {
    const label = index === 0 ? 'Today' : index === 1 ? 'Tomorrow' : date;
    lines.push(`🗓️ **${label}** (${date}):`);
    lines.push(`   • ${day.condition.text}`);
    lines.push(`   • High: ${day.maxtemp_c}°C, Low: ${day.mintemp_c}°C`);
    const chanceOfRain = day.daily_chance_of_rain ?? 0;
    if (chanceOfRain > 0) {
      lines.push(`   • Chance of rain: ${chanceOfRain}%`);
    }
    lines.push('');
  });

  return lines.join('\n').trimEnd();
}

export interface WeatherAdapterOptions {
  id?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export function createWeatherAdapter(client: WeatherClient, options: WeatherAdapterOptions = {}): AgentAdapter {
  const adapter = new AgentAdapter({
    id: options.id ?? 'weather_agent',
    name: 'Weather Agent',
    description: 'Provides current weather and forecasts for any location',
    timeoutMs: options.timeoutMs,
    logger: options.logger,
  });

  adapter.register(
    createAgentFunction()
      .name('get_current_weather')
      .description('Get the current weather for a location')
      .requiredParam('location', 'string', 'City name, postcode or coordinates')
      .tags('weather', 'current', 'temperature')
      .handler(async (input, { signal }) => {
        const location = stringParam(input, 'location') ?? '';
        const outcome = await client.getCurrentWeather(location, signal);
        if ('error' in outcome) {
          return { ok: false, error: outcome.error };
        }
        return { ok: true, text: formatCurrentWeather(outcome.data) };
      })
      .build()
  );

  adapter.register(
    createAgentFunction()
      .name('get_weather_forecast')
      .description('Get a multi-day weather forecast for a location')
      .requiredParam('location', 'string', 'City name, postcode or coordinates')
      .optionalParam('days', 'number', 'Number of days to forecast (1-10)', DEFAULT_FORECAST_DAYS)
      .tags('weather', 'forecast')
      .handler(async (input, { signal }) => {
        const location = stringParam(input, 'location') ?? '';
        const days = clamp(Math.floor(numberParam(input, 'days') ?? DEFAULT_FORECAST_DAYS), 1, MAX_FORECAST_DAYS);
        const outcome = await client.getForecast(location, days, signal);
        if ('error' in outcome) {
          return { ok: false, error: outcome.error };
        }
        return { ok: true, text: formatForecast(outcome.data, days) };
      })
      .build()
  );

  return adapter;
}
