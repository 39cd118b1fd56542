/**
 * Result Formatter - assembles the pricing analysis document
 *
 * Takes a raw analysis result (pricing recommendation, competitors, market
 * data, risks, recommendations) as a structured object or a plain mapping
 * and produces one self-consistent document. Formatting never throws: a
 * failure yields a degraded document carrying the error message and a
 * rendering of the input.
 */

import { inspect } from 'util';
import { createLogger } from '../utils/logger.js';
import { resolveConfig, type AnalysisConfig } from '../utils/config.js';
import { getField, isRecord, readList, readObject } from '../utils/fields.js';
import { FormattingError, errorMessage, type FormatOutcome, type FormatStage } from './errors.js';
import {
  formatCompetitiveAnalysis,
  formatMarketAnalysis,
  formatPricingRecommendation,
  formatRecommendation,
  formatRiskAssessment,
} from './sections.js';
import { generateSummary } from './summary.js';
import type { DegradedResult, FormatOptions, FormattedResult, PricingReport } from './types.js';

const logger = createLogger('result-formatter');

const PRICING_KEYS = ['optimization_strategy', 'optimizationStrategy'];
const COMPETITOR_KEYS = ['competitor_data', 'competitorData', 'sources'];
const MARKET_KEYS = ['market_analysis', 'marketAnalysis'];
const RISK_KEYS = ['primary_risks', 'primaryRisks', 'risk_factors', 'riskFactors'];

// =============================================================================
// formatPricingResults
// =============================================================================

export function formatPricingResults(results: unknown, options: FormatOptions = {}): PricingReport {
  const { now: clock, ...overrides } = options;
  const requested = clock instanceof Date ? clock.getTime() : clock;
  const now = requested !== undefined && Number.isFinite(requested) ? requested : Date.now();
  const timestamp = new Date(now).toISOString();

  const outcome = buildReport(results, resolveConfig(overrides), now, timestamp);
  if (outcome.ok) return outcome.value;

  logger.error({ stage: outcome.error.stage, err: outcome.error }, 'Formatting failed, returning degraded report');
  return degradedReport(timestamp, outcome.error.message, results);
}

/**
 * Assemble the document. Failures come back as a FormattingError naming
 * the stage that failed.
 */
export function buildReport(
  results: unknown,
  config: AnalysisConfig,
  now: number,
  timestamp: string,
): FormatOutcome<FormattedResult> {
  if (!isRecord(results)) {
    return {
      ok: false,
      error: new FormattingError('input', `Analysis results must be an object, got ${describeType(results)}`),
    };
  }

  let stage: FormatStage = 'pricing';
  try {
    // Recommendation fields may be nested or sit on the result itself
    const pricingSource = readObject(results, 'pricingRecommendation', PRICING_KEYS) ?? results;
    const pricing = formatPricingRecommendation(pricingSource);

    stage = 'competitors';
    const competitive = formatCompetitiveAnalysis(
      readList(results, 'competitors', COMPETITOR_KEYS),
      pricing.recommendedPrice,
      config,
      now,
    );

    stage = 'market';
    const marketSource = readObject(results, 'marketData', MARKET_KEYS);
    const market = formatMarketAnalysis(marketSource);
    const marketTrendGiven = getField(marketSource, 'trend', ['market_trend', 'marketTrend']) !== undefined;

    stage = 'risks';
    const risk = formatRiskAssessment(readList(results, 'risks', RISK_KEYS));

    stage = 'recommendations';
    const recommendations = readList(results, 'recommendations').map(formatRecommendation);

    stage = 'summary';
    const analysisSummary = generateSummary({ pricing, competitive, market, risk, marketTrendGiven }, config);

    return {
      ok: true,
      value: {
        timestamp,
        analysisSummary,
        pricingRecommendation: pricing,
        competitiveAnalysis: competitive,
        marketAnalysis: market,
        riskAssessment: risk,
        recommendations,
      },
    };
  } catch (err) {
    return { ok: false, error: new FormattingError(stage, errorMessage(err), { cause: err }) };
  }
}

// =============================================================================
// DEGRADED OUTPUT
// =============================================================================

function degradedReport(timestamp: string, error: string, results: unknown): DegradedResult {
  return { timestamp, error, rawResults: renderRaw(results) };
}

/**
 * JSON when the value serializes, otherwise util.inspect (which copes with
 * cycles and does not invoke getters).
 */
function renderRaw(value: unknown): string {
  try {
    const json = JSON.stringify(value);
    if (json !== undefined) return json;
  } catch (err) {
    logger.debug({ err }, 'Raw results are not JSON-serializable');
  }
  return inspect(value, { depth: 4, getters: false });
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
