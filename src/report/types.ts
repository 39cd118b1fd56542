/**
 * Report Types - the formatted pricing analysis document
 */

import type { PricePositionBucket } from '../analytics/competitive.js';
import type { CompetitivePosition, TrendResult } from '../analytics/types.js';
import type { AnalysisConfig } from '../utils/config.js';

// =============================================================================
// SECTIONS
// =============================================================================

export interface PricingRecommendationSection {
  recommendedPrice: number;
  currentPrice: number;
  priceChange: number;
  priceChangePercent: number;
  confidenceScore: number;
  expectedMargin: number;
  strategy: string;
  reasoning: string;
}

export interface FormattedCompetitor {
  name: string;
  /** 0 when no price could be read */
  price: number;
  url: string;
  marketPosition: string;
  similarityScore: number;
  lastUpdated: string;
}

export interface CompetitorPriceStatistics {
  minPrice: number;
  maxPrice: number;
  avgPrice: number;
  medianPrice: number;
  pricePosition: PricePositionBucket;
}

export interface CompetitiveAnalysisSection {
  totalCompetitors: number;
  competitors: FormattedCompetitor[];
  priceStatistics: CompetitorPriceStatistics;
  /** Trend over dated competitor observations, null when none carry dates */
  priceTrend: TrendResult | null;
  positionDetail: CompetitivePosition;
}

export interface MarketAnalysisSection {
  marketSize: string;
  growthRate: number;
  demandLevel: string;
  trend: string;
  seasonality: string;
  competitiveIntensity: string;
  priceSensitivity: string;
}

export interface RiskItem {
  riskType: string;
  description: string;
  impactLevel: string;
  probability: string;
  mitigationStrategy: string;
  timeline: string;
}

export interface RiskAssessmentSection {
  totalRisks: number;
  highRisks: number;
  mediumRisks: number;
  lowRisks: number;
  risks: RiskItem[];
}

export interface RecommendationItem {
  title: string;
  description: string;
  priority: string;
  category: string;
  implementationEffort: string;
  timeline: string;
  expectedImpact: string;
}

export type SummaryRiskLevel = 'high' | 'medium' | 'moderate';

export interface AnalysisSummary {
  totalCompetitorsAnalyzed: number;
  priceRecommendationConfidence: number;
  marketTrend: string;
  riskLevel: SummaryRiskLevel;
  keyInsights: string[];
}

// =============================================================================
// DOCUMENTS
// =============================================================================

export interface FormattedResult {
  timestamp: string;
  analysisSummary: AnalysisSummary;
  pricingRecommendation: PricingRecommendationSection;
  competitiveAnalysis: CompetitiveAnalysisSection;
  marketAnalysis: MarketAnalysisSection;
  riskAssessment: RiskAssessmentSection;
  recommendations: RecommendationItem[];
}

/** Returned in place of a FormattedResult when formatting fails. */
export interface DegradedResult {
  timestamp: string;
  error: string;
  rawResults: string;
}

export type PricingReport = FormattedResult | DegradedResult;

export function isDegraded(report: PricingReport): report is DegradedResult {
  return 'error' in report;
}

export interface FormatOptions extends Partial<AnalysisConfig> {
  /** Clock for the document timestamp and the trend window */
  now?: Date | number;
}
