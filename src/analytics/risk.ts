/**
 * Pricing Risk - rule-based risk assessment and market scenario projection
 */

import { mean, round2 } from '../utils/math.js';
import type {
  MarketScenario,
  PricingRisk,
  PricingStrategy,
  RiskAssessment,
  RiskLevel,
} from './types.js';

const RISK_RANK: Record<RiskLevel, number> = { low: 0, medium: 1, high: 2 };

/** Premium threshold over the competitor average */
const PREMIUM_RATIO = 1.2;
/** Undercut threshold below the competitor average */
const AGGRESSIVE_RATIO = 0.8;

export function assessPricingRisk(
  recommendedPrice: number,
  competitorPrices: readonly number[],
  strategy?: PricingStrategy,
): RiskAssessment {
  const risks: PricingRisk[] = [];
  const prices = competitorPrices.filter((p) => Number.isFinite(p) && p > 0);

  if (prices.length === 0) {
    risks.push({
      riskType: 'market_intelligence',
      description: 'Limited competitive intelligence',
      impactLevel: 'medium',
      probability: 'high',
      mitigationStrategy: 'Invest in market research',
    });
  }

  const avgCompetitor = prices.length > 0 ? mean(prices) : recommendedPrice;

  if (recommendedPrice > avgCompetitor * PREMIUM_RATIO) {
    risks.push({
      riskType: 'positioning',
      description: 'Significant premium over competition',
      impactLevel: 'high',
      probability: 'medium',
      mitigationStrategy: 'Ensure clear value differentiation',
    });
  } else if (recommendedPrice < avgCompetitor * AGGRESSIVE_RATIO) {
    risks.push({
      riskType: 'competitive_response',
      description: 'Aggressive pricing may trigger price war',
      impactLevel: 'medium',
      probability: 'high',
      mitigationStrategy: 'Monitor competitor reactions closely',
    });
  }

  if (strategy === 'premium') {
    risks.push({
      riskType: 'brand',
      description: 'Premium positioning requires brand strength',
      impactLevel: 'medium',
      probability: 'medium',
      mitigationStrategy: 'Invest in brand building and quality',
    });
  } else if (strategy === 'penetration') {
    risks.push({
      riskType: 'margin',
      description: 'Low margins may impact profitability',
      impactLevel: 'medium',
      probability: 'medium',
      mitigationStrategy: 'Focus on operational efficiency',
    });
  }

  const overallRisk = risks.reduce<RiskLevel>(
    (worst, risk) => (RISK_RANK[risk.impactLevel] > RISK_RANK[worst] ? risk.impactLevel : worst),
    'low',
  );

  return { overallRisk, risks };
}

/**
 * Base, optimistic and pessimistic revenue projections for a price.
 */
export function simulateMarketScenarios(basePrice: number, estimatedDemand = 1000): MarketScenario[] {
  const scenarios: Array<Omit<MarketScenario, 'revenueProjection'>> = [
    { scenarioName: 'Base Case', probability: 0.6, priceImpact: 1.0, volumeImpact: 1.0 },
    { scenarioName: 'Optimistic', probability: 0.2, priceImpact: 1.05, volumeImpact: 1.3 },
    { scenarioName: 'Pessimistic', probability: 0.2, priceImpact: 0.9, volumeImpact: 0.7 },
  ];

  return scenarios.map((s) => ({
    ...s,
    revenueProjection: round2(basePrice * s.priceImpact * estimatedDemand * s.volumeImpact),
  }));
}
