import { logger } from '../shared/logger.js';
import type { RandomSource } from '../shared/utils.js';

export type EconomicIndicators = {
  date: string;
  unemployment_rate: number;
  inflation_rate: number;
  consumer_confidence: number;
  gdp_growth: number;
};

const DAY_MS = 24 * 3600 * 1000;

function uniform(random: RandomSource, min: number, max: number): number {
  return Math.round((min + random() * (max - min)) * 10) / 10;
}

/**
 * Synthetic daily macro indicators, oldest first, ending on the UTC date of
 * `now`. There is no live source for these; the series only gives the
 * warehouse something to join sales against.
 */
export function mockEconomicIndicators(
  days: number,
  random: RandomSource,
  now: Date = new Date(),
): EconomicIndicators[] {
  const rows: EconomicIndicators[] = [];
  for (let daysBack = days - 1; daysBack >= 0; daysBack--) {
    rows.push({
      date: new Date(now.getTime() - daysBack * DAY_MS).toISOString().slice(0, 10),
      unemployment_rate: uniform(random, 3.5, 8.0),
      inflation_rate: uniform(random, 0.5, 6.0),
      consumer_confidence: uniform(random, 80, 130),
      gdp_growth: uniform(random, -2.0, 5.0),
    });
  }
  logger.debug({ days, rows: rows.length }, 'Generated mock economic indicators');
  return rows;
}
