/**
 * Trend Analyzer - classifies the direction of a price series
 *
 * Fits an ordinary least-squares line over the observation index (not the
 * calendar time) of the prices inside the lookback window, then classifies
 * the slope relative to the mean price.
 */

import { createLogger } from '../utils/logger.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../utils/config.js';
import { cleanSeries, extractPrice, getTimestamp, type CleanOptions } from '../series/cleaner.js';
import { mean, percentChange, populationStdDev, safeDiv } from '../utils/math.js';
import type { RawRecord } from '../types.js';
import type { TrendDirection, TrendOptions, TrendResult } from './types.js';

const logger = createLogger('trend-analyzer');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function stableResult(dataPoints: number): TrendResult {
  return {
    trend: 'stable',
    trendStrength: 0,
    priceChange: 0,
    priceChangePercent: 0,
    volatility: 0,
    slope: 0,
    dataPoints,
  };
}

/**
 * Analyze the price trend over the last `windowDays` days. Records without
 * any date column are used in full, in their given order.
 */
export function analyzeTrend(
  records: readonly RawRecord[],
  options: TrendOptions & CleanOptions = {},
): TrendResult {
  const windowDays = options.windowDays ?? DEFAULT_ANALYSIS_CONFIG.trendWindowDays;
  const stableSlopeRatio = options.stableSlopeRatio ?? DEFAULT_ANALYSIS_CONFIG.stableSlopeRatio;
  const now = options.now ?? Date.now();

  const series = cleanSeries(records, options);
  const dateField = series.sortedBy;

  let rows = series.rows;
  if (dateField) {
    const cutoff = now - windowDays * MS_PER_DAY;
    rows = rows.filter((row) => {
      const ts = getTimestamp(row, dateField);
      return ts !== null && ts >= cutoff;
    });
  }

  const prices: number[] = [];
  for (const row of rows) {
    const price = extractPrice(row);
    if (price !== null) prices.push(price);
  }

  if (prices.length < 2) {
    logger.debug({ points: prices.length, windowDays }, 'Not enough points for a trend');
    return stableResult(prices.length);
  }

  const slope = fitSlope(prices);
  const avg = mean(prices);
  const first = prices[0];
  const last = prices[prices.length - 1];

  return {
    trend: classifySlope(slope, avg, stableSlopeRatio),
    trendStrength: safeDiv(Math.abs(slope), avg, 0) * 100,
    priceChange: last - first,
    priceChangePercent: percentChange(first, last),
    volatility: safeDiv(populationStdDev(prices, avg), avg, 0) * 100,
    slope,
    dataPoints: prices.length,
  };
}

/**
 * Least-squares slope of `values` against x = 0..n-1.
 */
export function fitSlope(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;

  const xMean = (n - 1) / 2;
  const yMean = mean(values);
  let numerator = 0;
  let denominator = 0;
  for (let i = 0; i < n; i++) {
    const dx = i - xMean;
    numerator += dx * (values[i] - yMean);
    denominator += dx * dx;
  }
  return safeDiv(numerator, denominator, 0);
}

export function classifySlope(slope: number, avgPrice: number, stableSlopeRatio: number): TrendDirection {
  if (slope === 0 || Math.abs(slope) < stableSlopeRatio * avgPrice) return 'stable';
  return slope > 0 ? 'increasing' : 'decreasing';
}
