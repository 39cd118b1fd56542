/**
 * Report Sections - fixed-default formatting of each part of an analysis result
 *
 * Every formatter reads through the field accessors, so structured objects
 * (camelCase) and plain mappings (snake_case) format identically, and every
 * output field is present with a default when the input lacks it.
 */

import { aggregate } from '../analytics/aggregation.js';
import { analyzeCompetitivePosition, pricePositionBucket } from '../analytics/competitive.js';
import { analyzeTrend } from '../analytics/trend.js';
import { parsePrice } from '../parsing/value-parser.js';
import { parseTimestamp } from '../parsing/dates.js';
import { getField, readNumber, readString } from '../utils/fields.js';
import { percentChange, round2 } from '../utils/math.js';
import type { AnalysisConfig } from '../utils/config.js';
import type { RawRecord } from '../types.js';
import type {
  CompetitiveAnalysisSection,
  FormattedCompetitor,
  MarketAnalysisSection,
  PricingRecommendationSection,
  RecommendationItem,
  RiskAssessmentSection,
  RiskItem,
} from './types.js';

const COMPETITOR_PRICE_KEYS = ['current_price', 'currentPrice', 'sale_price', 'salePrice'];
const COMPETITOR_DATE_KEYS = ['updated_at', 'scraped_at', 'scrapedAt', 'timestamp', 'date'];

// =============================================================================
// PRICING RECOMMENDATION
// =============================================================================

export function formatPricingRecommendation(source: unknown): PricingRecommendationSection {
  const recommendedPrice = readNumber(source, 'recommendedPrice', 0, ['suggested_price', 'suggestedPrice']);
  const currentPrice = readNumber(source, 'currentPrice', 0);

  return {
    recommendedPrice,
    currentPrice,
    priceChange: round2(recommendedPrice - currentPrice),
    priceChangePercent: round2(percentChange(currentPrice, recommendedPrice)),
    confidenceScore: readNumber(source, 'confidenceScore', 0, ['confidence']),
    expectedMargin: readNumber(source, 'expectedMargin', 0, ['profit_margin_estimate', 'profitMarginEstimate']),
    strategy: readString(source, 'strategy', 'unknown', ['strategy_type', 'strategyType']),
    reasoning: readString(source, 'reasoning', ''),
  };
}

// =============================================================================
// COMPETITORS
// =============================================================================

export function formatCompetitor(source: unknown, config: Pick<AnalysisConfig, 'decimalStyle'>): FormattedCompetitor {
  const rawPrice = getField(source, 'price', COMPETITOR_PRICE_KEYS);
  const rawUpdated = getField(source, 'lastUpdated', COMPETITOR_DATE_KEYS);
  const updatedAt = parseTimestamp(rawUpdated);

  return {
    name: readString(source, 'name', 'Unknown', ['competitor', 'websiteName', 'website_name', 'website', 'source']),
    price: parsePrice(rawPrice, { decimalStyle: config.decimalStyle }) ?? 0,
    url: readString(source, 'url', ''),
    marketPosition: readString(source, 'marketPosition', 'unknown'),
    similarityScore: readNumber(source, 'similarityScore', 0, ['similarity']),
    lastUpdated:
      updatedAt !== null
        ? new Date(updatedAt).toISOString()
        : readString(source, 'lastUpdated', 'unknown', COMPETITOR_DATE_KEYS),
  };
}

/**
 * Format the competitor list and compute price statistics and the position
 * of the recommended price among competitors with an observed price.
 */
export function formatCompetitiveAnalysis(
  competitors: readonly unknown[],
  recommendedPrice: number,
  config: AnalysisConfig,
  now: number,
): CompetitiveAnalysisSection {
  const formatted = competitors.map((c) => formatCompetitor(c, config));
  const records = competitors.map(toSeriesRecord);

  const stats = aggregate(records, { decimalStyle: config.decimalStyle });
  const observed = formatted.map((c) => c.price).filter((p) => p > 0);

  const hasDates = records.some((r) => r.updated_at !== undefined);
  const priceTrend = hasDates
    ? analyzeTrend(records, {
        windowDays: config.trendWindowDays,
        stableSlopeRatio: config.stableSlopeRatio,
        decimalStyle: config.decimalStyle,
        now,
      })
    : null;

  return {
    totalCompetitors: formatted.length,
    competitors: formatted,
    priceStatistics: {
      minPrice: round2(stats.minPrice),
      maxPrice: round2(stats.maxPrice),
      avgPrice: round2(stats.avgPrice),
      medianPrice: round2(stats.medianPrice),
      pricePosition: pricePositionBucket(recommendedPrice, observed),
    },
    priceTrend,
    positionDetail: analyzeCompetitivePosition(recommendedPrice, observed),
  };
}

/** Reduce a competitor entry to the columns the series cleaner reads. */
function toSeriesRecord(source: unknown): RawRecord {
  const record: Record<string, unknown> = {
    name: getField(source, 'name', ['competitor', 'websiteName', 'website_name', 'website', 'source']),
    url: getField(source, 'url'),
    price: getField(source, 'price', COMPETITOR_PRICE_KEYS),
  };
  const updated = getField(source, 'lastUpdated', COMPETITOR_DATE_KEYS);
  if (updated !== undefined) record.updated_at = updated;
  return record;
}

// =============================================================================
// MARKET
// =============================================================================

export function formatMarketAnalysis(source: unknown): MarketAnalysisSection {
  return {
    marketSize: readString(source, 'marketSize', 'unknown'),
    growthRate: readNumber(source, 'growthRate', 0),
    demandLevel: readString(source, 'demandLevel', 'moderate', ['demand']),
    trend: readString(source, 'trend', 'neutral', ['market_trend', 'marketTrend']),
    seasonality: readString(source, 'seasonality', 'unknown'),
    competitiveIntensity: readString(source, 'competitiveIntensity', 'moderate', ['competition_level']),
    priceSensitivity: readString(source, 'priceSensitivity', 'moderate'),
  };
}

// =============================================================================
// RISKS
// =============================================================================

export function formatRisk(source: unknown): RiskItem {
  if (typeof source === 'string') {
    return { ...formatRisk({}), description: source.trim() };
  }
  return {
    riskType: readString(source, 'riskType', 'general', ['type', 'category']),
    description: readString(source, 'description', '', ['risk']),
    impactLevel: readString(source, 'impactLevel', 'medium', ['impact', 'level', 'severity']).toLowerCase(),
    probability: readString(source, 'probability', 'medium', ['likelihood']).toLowerCase(),
    mitigationStrategy: readString(source, 'mitigationStrategy', '', ['mitigation']),
    timeline: readString(source, 'timeline', 'unknown', ['timeframe']),
  };
}

export function formatRiskAssessment(risks: readonly unknown[]): RiskAssessmentSection {
  const formatted = risks.map(formatRisk);
  let highRisks = 0;
  let mediumRisks = 0;
  let lowRisks = 0;

  for (const risk of formatted) {
    switch (risk.impactLevel) {
      case 'high':
        highRisks++;
        break;
      case 'medium':
      case 'moderate':
        mediumRisks++;
        break;
      case 'low':
        lowRisks++;
        break;
      default:
        break;
    }
  }

  return {
    totalRisks: formatted.length,
    highRisks,
    mediumRisks,
    lowRisks,
    risks: formatted,
  };
}

// =============================================================================
// RECOMMENDATIONS
// =============================================================================

export function formatRecommendation(source: unknown): RecommendationItem {
  if (typeof source === 'string') {
    return { ...formatRecommendation({}), description: source.trim() };
  }
  return {
    title: readString(source, 'title', 'Recommendation'),
    description: readString(source, 'description', ''),
    priority: readString(source, 'priority', 'medium').toLowerCase(),
    category: readString(source, 'category', 'general'),
    implementationEffort: readString(source, 'implementationEffort', 'medium', ['effort']),
    timeline: readString(source, 'timeline', 'short-term'),
    expectedImpact: readString(source, 'expectedImpact', '', ['impact']),
  };
}
