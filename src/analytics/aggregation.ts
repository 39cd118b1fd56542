/**
 * Aggregation - descriptive statistics over observed prices
 */

import { cleanSeries, extractPrice, type CleanOptions } from '../series/cleaner.js';
import { mean, percentile, populationStdDev } from '../utils/math.js';
import type { RawRecord } from '../types.js';
import type { AggregateStats } from './types.js';

export const EMPTY_STATS: Readonly<AggregateStats> = Object.freeze({
  count: 0,
  avgPrice: 0,
  minPrice: 0,
  maxPrice: 0,
  priceRange: 0,
  stdDeviation: 0,
  medianPrice: 0,
  percentile25: 0,
  percentile75: 0,
});

/**
 * Clean the records and summarize every row that carries a price.
 * Returns zeroed stats (count 0) when nothing usable remains.
 */
export function aggregate(records: readonly RawRecord[], options: CleanOptions = {}): AggregateStats {
  const series = cleanSeries(records, options);
  if (series.rows.length === 0 || series.priceFields.length === 0) {
    return { ...EMPTY_STATS };
  }

  const prices: number[] = [];
  for (const row of series.rows) {
    const price = extractPrice(row);
    if (price !== null) prices.push(price);
  }

  return summarizePrices(prices);
}

/**
 * Statistics over an already-clean list of prices.
 */
export function summarizePrices(prices: readonly number[]): AggregateStats {
  if (prices.length === 0) return { ...EMPTY_STATS };

  const sorted = [...prices].sort((a, b) => a - b);
  const minPrice = sorted[0];
  const maxPrice = sorted[sorted.length - 1];
  const avgPrice = mean(sorted);

  return {
    count: sorted.length,
    avgPrice,
    minPrice,
    maxPrice,
    priceRange: maxPrice - minPrice,
    stdDeviation: populationStdDev(sorted, avgPrice),
    medianPrice: percentile(sorted, 50),
    percentile25: percentile(sorted, 25),
    percentile75: percentile(sorted, 75),
  };
}
