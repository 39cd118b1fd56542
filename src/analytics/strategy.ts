/**
 * Pricing Strategy - candidate prices, strategy options, elasticity and
 * performance-driven adjustments
 */

import { createLogger } from '../utils/logger.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../utils/config.js';
import { mean, median, round2, safeDiv } from '../utils/math.js';
import type { OptimalPrice, PerformanceMetrics, PriceTarget, StrategyOption } from './types.js';

const logger = createLogger('pricing-strategy');

/** Markup on top of the minimum margin when there is no competitor data */
const COST_PLUS_BUFFER = 0.1;

export const DEFAULT_ELASTICITY = -1.5;

// =============================================================================
// calculateOptimalPrice
// =============================================================================

/**
 * Price for one strategy target. Without competitor prices this is
 * cost-plus; otherwise the result is never below cost × (1 + minMargin).
 */
export function calculateOptimalPrice(
  costPrice: number,
  competitorPrices: readonly number[],
  target: PriceTarget = 'balanced',
  minMargin = DEFAULT_ANALYSIS_CONFIG.minProfitMargin,
): OptimalPrice {
  const prices = competitorPrices.filter((p) => Number.isFinite(p) && p > 0);

  if (prices.length === 0) {
    return {
      price: round2(costPrice * (1 + minMargin + COST_PLUS_BUFFER)),
      rationale: 'Cost-plus pricing due to lack of competitive data',
      marginAdjusted: false,
    };
  }

  let price: number;
  let rationale: string;
  switch (target) {
    case 'penetration':
      price = Math.min(...prices) * 0.95;
      rationale = 'Penetration pricing to gain market share';
      break;
    case 'premium':
      price = Math.max(...prices) * 1.05;
      rationale = 'Premium pricing for brand positioning';
      break;
    case 'competitive':
      price = mean(prices);
      rationale = 'Competitive pricing at market average';
      break;
    case 'balanced':
    default:
      price = (mean(prices) + median(prices)) / 2;
      rationale = 'Balanced pricing between average and median';
      break;
  }

  const floor = costPrice * (1 + minMargin);
  if (price < floor) {
    return {
      price: round2(floor),
      rationale: `${rationale} (adjusted for minimum ${round2(minMargin * 100)}% margin)`,
      marginAdjusted: true,
    };
  }

  return { price: round2(price), rationale, marginAdjusted: false };
}

// =============================================================================
// generatePricingStrategies
// =============================================================================

interface StrategyTemplate {
  strategyName: string;
  target: PriceTarget;
  competitivePosition: string;
  confidenceScore: number;
  riskLevel: string;
  implementationNotes: string[];
}

const STRATEGY_TEMPLATES: readonly StrategyTemplate[] = [
  {
    strategyName: 'Market Penetration',
    target: 'penetration',
    competitivePosition: 'Low/Aggressive',
    confidenceScore: 0.7,
    riskLevel: 'Medium-High',
    implementationNotes: [
      'Monitor competitor responses closely',
      'Plan for potential price wars',
      'Focus on volume-based profitability',
    ],
  },
  {
    strategyName: 'Competitive Parity',
    target: 'competitive',
    competitivePosition: 'Market Average',
    confidenceScore: 0.8,
    riskLevel: 'Low-Medium',
    implementationNotes: [
      'Safe middle-ground approach',
      'Monitor market trends regularly',
      'Differentiate through non-price factors',
    ],
  },
  {
    strategyName: 'Premium Positioning',
    target: 'premium',
    competitivePosition: 'High/Premium',
    confidenceScore: 0.6,
    riskLevel: 'Medium',
    implementationNotes: [
      'Justify premium with superior features/service',
      'Target quality-conscious customers',
      'Invest in brand building',
    ],
  },
  {
    strategyName: 'Dynamic Balanced',
    target: 'balanced',
    competitivePosition: 'Optimal Balance',
    confidenceScore: 0.85,
    riskLevel: 'Low',
    implementationNotes: [
      'Best overall risk-reward ratio',
      'Flexible for market changes',
      'Monitor and adjust regularly',
    ],
  },
];

/**
 * One option per strategy target, highest confidence first.
 */
export function generatePricingStrategies(
  costPrice: number,
  competitorPrices: readonly number[],
  minMargin = DEFAULT_ANALYSIS_CONFIG.minProfitMargin,
): StrategyOption[] {
  return STRATEGY_TEMPLATES.map((template) => {
    const optimal = calculateOptimalPrice(costPrice, competitorPrices, template.target, minMargin);
    return {
      ...template,
      implementationNotes: [...template.implementationNotes],
      recommendedPrice: optimal.price,
      rationale: optimal.rationale,
      profitMargin: round2(safeDiv(optimal.price - costPrice, costPrice, 0)),
    };
  }).sort((a, b) => b.confidenceScore - a.confidenceScore);
}

// =============================================================================
// calculatePriceElasticity
// =============================================================================

/**
 * Mean of (volume change / price change) over consecutive periods.
 * Periods with no price change, or a zero base price or volume, are skipped;
 * with nothing left the default elasticity is returned.
 */
export function calculatePriceElasticity(
  historicalPrices: readonly number[],
  historicalVolumes: readonly number[],
): number {
  const n = Math.min(historicalPrices.length, historicalVolumes.length);
  if (n < 2) return DEFAULT_ELASTICITY;

  const elasticities: number[] = [];
  for (let i = 1; i < n; i++) {
    const prevPrice = historicalPrices[i - 1];
    const prevVolume = historicalVolumes[i - 1];
    if (prevPrice === 0 || prevVolume === 0) continue;

    const priceChange = (historicalPrices[i] - prevPrice) / prevPrice;
    const volumeChange = (historicalVolumes[i] - prevVolume) / prevVolume;
    if (priceChange === 0 || !Number.isFinite(priceChange) || !Number.isFinite(volumeChange)) continue;

    elasticities.push(volumeChange / priceChange);
  }

  if (elasticities.length === 0) {
    logger.debug({ periods: n }, 'No usable price changes, using default elasticity');
    return DEFAULT_ELASTICITY;
  }
  return mean(elasticities);
}

// =============================================================================
// recommendPricingAdjustments
// =============================================================================

const HOLIDAY_MONTHS = [11, 12, 1];
const SUMMER_MONTHS = [6, 7, 8];

/**
 * Adjustment hints from current performance against targets. Missing metrics
 * read as 0. The season comes from the UTC month of `now`.
 */
export function recommendPricingAdjustments(
  current: PerformanceMetrics,
  targets: PerformanceMetrics,
  now: number = Date.now(),
): string[] {
  const recommendations: string[] = [];

  if ((current.revenue ?? 0) < (targets.revenue ?? 0)) {
    recommendations.push(
      (current.volume ?? 0) < (targets.volume ?? 0)
        ? 'Consider price reduction to stimulate demand'
        : 'Volume is good, consider slight price increase',
    );
  }

  if ((current.margin ?? 0) < (targets.margin ?? 0)) {
    recommendations.push('Margins below target - evaluate cost optimization or price increase');
  }

  if ((current.marketShare ?? 0) < (targets.marketShare ?? 0)) {
    recommendations.push('Consider competitive pricing or promotional campaigns');
  }

  const month = new Date(now).getUTCMonth() + 1;
  if (HOLIDAY_MONTHS.includes(month)) {
    recommendations.push('Consider holiday pricing strategy');
  } else if (SUMMER_MONTHS.includes(month)) {
    recommendations.push('Evaluate seasonal demand patterns');
  }

  return recommendations.length > 0 ? recommendations : ['Current pricing appears optimal'];
}
