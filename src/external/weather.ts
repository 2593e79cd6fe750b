import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { CancelledError } from '../shared/errors.js';
import { redactUrl, type RandomSource } from '../shared/utils.js';
import type { StaticFetcher } from '../crawl/staticFetcher.js';
import type { DelayPolicy } from '../crawl/delay.js';

export type WeatherObservation = {
  city: string;
  temperature: number;
  humidity: number;
  weather_condition: string;
  timestamp: string;
};

const WeatherResponseSchema = z.object({
  main: z.object({ temp: z.number(), humidity: z.number() }),
  weather: z.array(z.object({ main: z.string() })).min(1),
});

const MOCK_CONDITIONS = ['Clear', 'Clouds', 'Rain', 'Snow', 'Thunderstorm'];

export function weatherUrl(baseUrl: string, city: string, apiKey: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('q', city);
  url.searchParams.set('appid', apiKey);
  url.searchParams.set('units', 'metric');
  return url.toString();
}

/**
 * Synthetic daily observations for `days` days back from `now`, one row per
 * city per day. Used when no API key is configured.
 */
export function mockWeather(
  cities: readonly string[],
  days: number,
  random: RandomSource,
  now: Date = new Date(),
): WeatherObservation[] {
  const rows: WeatherObservation[] = [];
  for (const city of cities) {
    for (let daysBack = 0; daysBack < days; daysBack++) {
      const at = new Date(now.getTime() - daysBack * 24 * 3600 * 1000);
      rows.push({
        city,
        temperature: Math.round((-10 + random() * 45) * 10) / 10,
        humidity: 20 + Math.floor(random() * 81),
        weather_condition: MOCK_CONDITIONS[Math.floor(random() * MOCK_CONDITIONS.length)] ?? 'Clear',
        timestamp: at.toISOString(),
      });
    }
  }
  return rows;
}

export interface WeatherOptions {
  baseUrl: string;
  apiKey: string;
  cities: readonly string[];
  mockDays: number;
  random: RandomSource;
  clock?: () => Date;
  signal?: AbortSignal;
}

/**
 * Current conditions per city. A city that fails is logged and skipped.
 */
export async function fetchWeather(
  fetcher: StaticFetcher,
  delay: DelayPolicy,
  options: WeatherOptions,
): Promise<WeatherObservation[]> {
  const clock = options.clock ?? (() => new Date());
  if (!options.apiKey) {
    logger.warn('No weather API key configured, generating mock weather data');
    return mockWeather(options.cities, options.mockDays, options.random, clock());
  }

  const rows: WeatherObservation[] = [];
  let first = true;
  for (const city of options.cities) {
    if (!first) await delay.wait(options.signal);
    first = false;

    const url = weatherUrl(options.baseUrl, city, options.apiKey);
    try {
      const body = await fetcher.fetchJson(url, options.signal);
      const parsed = WeatherResponseSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn({ city, url: redactUrl(url) }, 'Unexpected weather payload');
        continue;
      }
      rows.push({
        city,
        temperature: parsed.data.main.temp,
        humidity: parsed.data.main.humidity,
        weather_condition: parsed.data.weather[0]?.main ?? '',
        timestamp: clock().toISOString(),
      });
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      logger.warn(
        { city, url: redactUrl(url), error: err instanceof Error ? err.message : String(err) },
        'Weather fetch failed',
      );
    }
  }
  return rows;
}
