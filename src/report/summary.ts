/**
 * Analysis Summary - headline figures and key insights for a formatted report
 */

import type { AnalysisConfig } from '../utils/config.js';
import type {
  AnalysisSummary,
  CompetitiveAnalysisSection,
  MarketAnalysisSection,
  PricingRecommendationSection,
  RiskAssessmentSection,
  SummaryRiskLevel,
} from './types.js';

export interface SummaryInput {
  pricing: PricingRecommendationSection;
  competitive: CompetitiveAnalysisSection;
  market: MarketAnalysisSection;
  risk: RiskAssessmentSection;
  /** True when the market data named a trend explicitly */
  marketTrendGiven: boolean;
}

export function generateSummary(
  input: SummaryInput,
  config: Pick<AnalysisConfig, 'significantChangePct' | 'mediumRiskThreshold'>,
): AnalysisSummary {
  const { pricing, competitive, market, risk } = input;
  const keyInsights: string[] = [];

  const changePct = pricing.priceChangePercent;
  if (Math.abs(changePct) > config.significantChangePct) {
    const direction = changePct > 0 ? 'increase' : 'decrease';
    keyInsights.push(`significant price ${direction} recommended: ${Math.abs(changePct).toFixed(1)}%`);
  }

  if (risk.highRisks >= 1) {
    keyInsights.push(`${risk.highRisks} high-impact risks identified`);
  }

  let riskLevel: SummaryRiskLevel = 'moderate';
  if (risk.highRisks >= 1) riskLevel = 'high';
  else if (risk.totalRisks >= config.mediumRiskThreshold) riskLevel = 'medium';

  return {
    totalCompetitorsAnalyzed: competitive.totalCompetitors,
    priceRecommendationConfidence: pricing.confidenceScore,
    marketTrend: resolveMarketTrend(input.marketTrendGiven, market, competitive),
    riskLevel,
    keyInsights,
  };
}

/**
 * The market data's own trend wins; otherwise the competitor price trend
 * when it was fitted on at least two points.
 */
function resolveMarketTrend(
  given: boolean,
  market: MarketAnalysisSection,
  competitive: CompetitiveAnalysisSection,
): string {
  if (given) return market.trend;
  const priceTrend = competitive.priceTrend;
  if (priceTrend && priceTrend.dataPoints >= 2) return priceTrend.trend;
  return market.trend;
}
