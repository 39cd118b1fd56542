/**
 * pricesense - price observation cleaning, competitor statistics, trend
 * classification and pricing report formatting
 *
 * Every export is a pure, synchronous transformation except the table
 * export, which writes a file.
 */

export { parsePrice, parseSpec, ZERO_PRICE_POLICY } from './parsing/value-parser.js';
export type { ParsePriceOptions, SpecValue, ZeroPricePolicy } from './parsing/value-parser.js';
export { cleanCount, cleanRating, nameSimilarity, normalizeProductName } from './parsing/text.js';
export { parseTimestamp } from './parsing/dates.js';

export { cleanSeries, extractPrice, getTimestamp } from './series/cleaner.js';
export type { CleanOptions } from './series/cleaner.js';

export * from './analytics/index.js';

export { normalizeSpecKey, normalizeSpecs } from './specs/normalizer.js';
export type { NormalizedSpecMap } from './specs/normalizer.js';
export {
  PRODUCT_CATEGORIES,
  productInputSchema,
  validateProductInput,
  validateSpecifications,
} from './specs/validation.js';
export type { ProductInput, ValidationResult } from './specs/validation.js';

export { buildReport, formatPricingResults } from './report/formatter.js';
export { FormattingError } from './report/errors.js';
export type { FormatOutcome, FormatStage } from './report/errors.js';
export { generateSummary } from './report/summary.js';
export { isDegraded } from './report/types.js';
export type {
  AnalysisSummary,
  CompetitiveAnalysisSection,
  CompetitorPriceStatistics,
  DegradedResult,
  FormatOptions,
  FormattedCompetitor,
  FormattedResult,
  MarketAnalysisSection,
  PricingRecommendationSection,
  PricingReport,
  RecommendationItem,
  RiskAssessmentSection,
  RiskItem,
  SummaryRiskLevel,
} from './report/types.js';

export * from './export/index.js';

export {
  DEFAULT_ANALYSIS_CONFIG,
  loadConfig,
  resolveConfig,
} from './utils/config.js';
export type { AnalysisConfig, DecimalStyle, ExportDelimiter } from './utils/config.js';
export { createLogger, logger } from './utils/logger.js';

export { DATE_FIELDS, PRICE_FIELDS } from './types.js';
export type {
  CleanedRow,
  CleanedSeries,
  DateField,
  PriceField,
  RawRecord,
  Timestamp,
} from './types.js';
