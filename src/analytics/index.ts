/**
 * Analytics Module - aggregate statistics, trends, competitive position, risk and strategy
 */

export { aggregate, summarizePrices, EMPTY_STATS } from './aggregation.js';
export { analyzeTrend, fitSlope, classifySlope } from './trend.js';
export {
  analyzeCompetitivePosition,
  filterRelevantCompetitors,
  pricePositionBucket,
} from './competitive.js';
export type { PricePositionBucket } from './competitive.js';
export { assessPricingRisk, simulateMarketScenarios } from './risk.js';
export {
  DEFAULT_ELASTICITY,
  calculateOptimalPrice,
  calculatePriceElasticity,
  generatePricingStrategies,
  recommendPricingAdjustments,
} from './strategy.js';
export type {
  AggregateStats,
  CompetitivePosition,
  MarketPosition,
  MarketScenario,
  MarketStats,
  OptimalPrice,
  PerformanceMetrics,
  PriceGaps,
  PriceTarget,
  PricingRisk,
  PricingStrategy,
  RiskAssessment,
  RiskLevel,
  StrategyOption,
  TrendDirection,
  TrendOptions,
  TrendResult,
} from './types.js';
