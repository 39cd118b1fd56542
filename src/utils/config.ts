/**
 * Configuration loading for the pricing analysis core
 *
 * Thresholds and parsing policy come from PRICESENSE_* environment variables
 * (optionally via a .env file in the working directory). Every operation also
 * accepts an explicit partial config, so nothing here runs implicitly.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger.js';

const logger = createLogger('config');

export const DECIMAL_STYLES = ['auto', 'point', 'comma'] as const;
export type DecimalStyle = (typeof DECIMAL_STYLES)[number];

export const EXPORT_DELIMITERS = ['comma', 'tab', 'pipe'] as const;
export type ExportDelimiter = (typeof EXPORT_DELIMITERS)[number];

const configSchema = z.object({
  trendWindowDays: z.coerce.number().int().positive().default(30),
  stableSlopeRatio: z.coerce.number().nonnegative().default(0.01),
  significantChangePct: z.coerce.number().nonnegative().default(10),
  mediumRiskThreshold: z.coerce.number().int().positive().default(3),
  decimalStyle: z.enum(DECIMAL_STYLES).default('auto'),
  exportDelimiter: z.enum(EXPORT_DELIMITERS).default('comma'),
  similarityThreshold: z.coerce.number().min(0).max(1).default(0.7),
  minProfitMargin: z.coerce.number().min(0).default(0.15),
});

export type AnalysisConfig = z.infer<typeof configSchema>;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = Object.freeze(configSchema.parse({}));

/**
 * Merge caller overrides onto the defaults. Undefined keys keep the default.
 */
export function resolveConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  const d = DEFAULT_ANALYSIS_CONFIG;
  return {
    trendWindowDays: overrides.trendWindowDays ?? d.trendWindowDays,
    stableSlopeRatio: overrides.stableSlopeRatio ?? d.stableSlopeRatio,
    significantChangePct: overrides.significantChangePct ?? d.significantChangePct,
    mediumRiskThreshold: overrides.mediumRiskThreshold ?? d.mediumRiskThreshold,
    decimalStyle: overrides.decimalStyle ?? d.decimalStyle,
    exportDelimiter: overrides.exportDelimiter ?? d.exportDelimiter,
    similarityThreshold: overrides.similarityThreshold ?? d.similarityThreshold,
    minProfitMargin: overrides.minProfitMargin ?? d.minProfitMargin,
  };
}

/**
 * Load config from environment variables. When no env object is passed,
 * `.env` in the working directory is read first (existing vars win).
 *
 * Throws a ZodError on invalid values.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): AnalysisConfig {
  let source = env;
  if (!source) {
    dotenvConfig();
    source = process.env;
  }

  const config = configSchema.parse({
    trendWindowDays: blankToUndefined(source.PRICESENSE_TREND_WINDOW_DAYS),
    stableSlopeRatio: blankToUndefined(source.PRICESENSE_STABLE_SLOPE_RATIO),
    significantChangePct: blankToUndefined(source.PRICESENSE_SIGNIFICANT_CHANGE_PCT),
    mediumRiskThreshold: blankToUndefined(source.PRICESENSE_MEDIUM_RISK_THRESHOLD),
    decimalStyle: blankToUndefined(source.PRICESENSE_DECIMAL_STYLE),
    exportDelimiter: blankToUndefined(source.PRICESENSE_EXPORT_DELIMITER),
    similarityThreshold: blankToUndefined(source.PRICESENSE_SIMILARITY_THRESHOLD),
    minProfitMargin: blankToUndefined(source.PRICESENSE_MIN_PROFIT_MARGIN),
  });

  logger.debug({ config }, 'Analysis config loaded');
  return config;
}

function blankToUndefined(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
