/**
 * Competitive Position - where a candidate price sits among competitor prices
 */

import { normalizeProductName, nameSimilarity } from '../parsing/text.js';
import { getField } from '../utils/fields.js';
import { mean, median } from '../utils/math.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../utils/config.js';
import type { CompetitivePosition, MarketPosition } from './types.js';

// =============================================================================
// PRICE POSITION BUCKET
// =============================================================================

export type PricePositionBucket = 'low' | 'middle' | 'high' | 'unknown';

/**
 * Bucket a price by the fraction of competitor prices strictly below it:
 * under 0.25 is `low`, under 0.75 `middle`, otherwise `high`.
 */
export function pricePositionBucket(price: number, competitorPrices: readonly number[]): PricePositionBucket {
  if (competitorPrices.length === 0) return 'unknown';
  const below = competitorPrices.filter((p) => p < price).length;
  const fraction = below / competitorPrices.length;
  if (fraction < 0.25) return 'low';
  if (fraction < 0.75) return 'middle';
  return 'high';
}

// =============================================================================
// analyzeCompetitivePosition
// =============================================================================

export function analyzeCompetitivePosition(
  targetPrice: number,
  competitorPrices: readonly number[],
): CompetitivePosition {
  const prices = competitorPrices.filter((p) => Number.isFinite(p) && p > 0).sort((a, b) => a - b);
  if (prices.length === 0) {
    return { position: 'unknown', percentile: null, priceGaps: null, marketStats: null };
  }

  const min = prices[0];
  const max = prices[prices.length - 1];
  const average = mean(prices);
  const mid = median(prices);

  let position: MarketPosition;
  let pct: number;
  if (targetPrice <= min) {
    position = 'lowest';
    pct = 0;
  } else if (targetPrice >= max) {
    position = 'highest';
    pct = 100;
  } else {
    pct = (prices.filter((p) => p <= targetPrice).length / prices.length) * 100;
    if (pct <= 25) position = 'low';
    else if (pct <= 50) position = 'below_average';
    else if (pct <= 75) position = 'above_average';
    else position = 'high';
  }

  return {
    position,
    percentile: pct,
    priceGaps: {
      toLowest: targetPrice - min,
      toHighest: max - targetPrice,
      toAverage: targetPrice - average,
      toMedian: targetPrice - mid,
    },
    marketStats: {
      min,
      max,
      average,
      median: mid,
      spread: max - min,
    },
  };
}

// =============================================================================
// filterRelevantCompetitors
// =============================================================================

/**
 * Keep the records whose product name is at least `threshold` similar
 * (word-set Jaccard) to the target product name.
 */
export function filterRelevantCompetitors<T extends object>(
  records: readonly T[],
  targetProduct: string,
  threshold = DEFAULT_ANALYSIS_CONFIG.similarityThreshold,
): T[] {
  if (normalizeProductName(targetProduct).length === 0) return [];

  return records.filter((record) => {
    const name = getField(record, 'productName', ['name', 'title']);
    return typeof name === 'string' && nameSimilarity(targetProduct, name) >= threshold;
  });
}
