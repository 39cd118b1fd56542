/**
 * Analytics Types - aggregate statistics, trends, competitive position and risk
 */

// =============================================================================
// AGGREGATES
// =============================================================================

export interface AggregateStats {
  count: number;
  avgPrice: number;
  minPrice: number;
  maxPrice: number;
  priceRange: number;
  stdDeviation: number;
  medianPrice: number;
  percentile25: number;
  percentile75: number;
}

// =============================================================================
// TRENDS
// =============================================================================

export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

export interface TrendResult {
  trend: TrendDirection;
  /** |slope| as a percentage of the mean price */
  trendStrength: number;
  priceChange: number;
  priceChangePercent: number;
  /** Coefficient of variation, in percent */
  volatility: number;
  slope: number;
  /** Price points inside the window that the fit used */
  dataPoints: number;
}

export interface TrendOptions {
  windowDays?: number;
  /** |slope| below this fraction of the mean price is `stable` */
  stableSlopeRatio?: number;
  /** Reference time for the window, epoch ms. Defaults to Date.now(). */
  now?: number;
}

// =============================================================================
// COMPETITIVE POSITION
// =============================================================================

export type MarketPosition =
  | 'lowest'
  | 'low'
  | 'below_average'
  | 'above_average'
  | 'high'
  | 'highest'
  | 'unknown';

export interface PriceGaps {
  toLowest: number;
  toHighest: number;
  toAverage: number;
  toMedian: number;
}

export interface MarketStats {
  min: number;
  max: number;
  average: number;
  median: number;
  spread: number;
}

export interface CompetitivePosition {
  position: MarketPosition;
  /** Share of competitor prices at or below the target, 0-100 */
  percentile: number | null;
  priceGaps: PriceGaps | null;
  marketStats: MarketStats | null;
}

// =============================================================================
// RISK & SCENARIOS
// =============================================================================

export type RiskLevel = 'low' | 'medium' | 'high';

export type PricingStrategy = 'premium' | 'competitive' | 'penetration' | 'value_based';

export interface PricingRisk {
  riskType: string;
  description: string;
  impactLevel: RiskLevel;
  probability: RiskLevel;
  mitigationStrategy: string;
}

export interface RiskAssessment {
  overallRisk: RiskLevel;
  risks: PricingRisk[];
}

export interface MarketScenario {
  scenarioName: string;
  probability: number;
  priceImpact: number;
  volumeImpact: number;
  revenueProjection: number;
}

// =============================================================================
// STRATEGY
// =============================================================================

export type PriceTarget = 'penetration' | 'premium' | 'competitive' | 'balanced';

export interface OptimalPrice {
  price: number;
  rationale: string;
  /** True when the price was raised to the minimum-margin floor */
  marginAdjusted: boolean;
}

export interface StrategyOption {
  strategyName: string;
  target: PriceTarget;
  recommendedPrice: number;
  rationale: string;
  competitivePosition: string;
  /** (price - cost) / cost */
  profitMargin: number;
  confidenceScore: number;
  riskLevel: string;
  implementationNotes: string[];
}

export interface PerformanceMetrics {
  revenue?: number;
  volume?: number;
  margin?: number;
  marketShare?: number;
}
