/**
 * Numeric helpers shared by the analytics modules.
 */

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function safeDiv(numerator: number, denominator: number, fallback = 0): number {
  if (!Number.isFinite(denominator) || denominator === 0) return fallback;
  const result = numerator / denominator;
  return Number.isFinite(result) ? result : fallback;
}

export function sum(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/**
 * Population standard deviation (divides by n, not n - 1).
 */
export function populationStdDev(values: readonly number[], avg = mean(values)): number {
  if (values.length < 2) return 0;
  const variance = values.reduce((s, v) => s + (v - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Inclusive percentile with linear interpolation between closest ranks.
 * `sortedValues` must be ascending; `p` is in [0, 100].
 */
export function percentile(sortedValues: readonly number[], p: number): number {
  const n = sortedValues.length;
  if (n === 0) return 0;
  if (n === 1) return sortedValues[0];

  const rank = (Math.min(100, Math.max(0, p)) / 100) * (n - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const weight = rank - lower;
  return sortedValues[lower] + (sortedValues[upper] - sortedValues[lower]) * weight;
}

export function median(values: readonly number[]): number {
  return percentile([...values].sort((a, b) => a - b), 50);
}

/**
 * Percentage change from `from` to `to`; 0 when `from` is 0.
 */
export function percentChange(from: number, to: number): number {
  return safeDiv(to - from, from, 0) * 100;
}
