/**
 * Value Parser - turns raw scraped scalars into prices and comparable spec values
 *
 * Prices arrive as numbers or as text in mixed formats ("₹79,900",
 * "$1,234.56", "12,34 €"). Spec values arrive as free text ("256GB",
 * "8 GB RAM", "6.5 inch"). Anything that cannot be read yields null,
 * never 0 and never a sentinel.
 */

import type { DecimalStyle } from '../utils/config.js';

// =============================================================================
// PRICE POLICY
// =============================================================================

/**
 * How an observed price of exactly 0 is treated. `absent` reads it as
 * "no data"; `keep` is for catalogs that list free items.
 */
export type ZeroPricePolicy = 'absent' | 'keep';

export const ZERO_PRICE_POLICY: ZeroPricePolicy = 'absent';

export interface ParsePriceOptions {
  zeroPolicy?: ZeroPricePolicy;
  /**
   * `auto` resolves a lone comma by the length of its final segment
   * (2 chars = decimal, otherwise grouping). `point` and `comma` fix the
   * decimal separator explicitly.
   */
  decimalStyle?: DecimalStyle;
  /**
   * Drop separators at either end of the digits before the separator rule
   * runs, for labels such as "Rs. 499" or "1,299.-". Off by default.
   */
  trimLabels?: boolean;
}

// =============================================================================
// parsePrice
// =============================================================================

export function parsePrice(raw: unknown, options: ParsePriceOptions = {}): number | null {
  const zeroPolicy = options.zeroPolicy ?? ZERO_PRICE_POLICY;
  const decimalStyle = options.decimalStyle ?? 'auto';

  if (typeof raw === 'number') {
    return acceptPrice(raw, zeroPolicy);
  }
  if (typeof raw !== 'string') return null;

  let stripped = raw.replace(/[^\d.,]/g, '');
  if (options.trimLabels) stripped = stripped.replace(/^[.,]+|[.,]+$/g, '');
  if (stripped.length === 0) return null;

  const normalized = normalizeSeparators(stripped, decimalStyle);
  if (!/^\d*\.?\d*$/.test(normalized) || !/\d/.test(normalized)) return null;

  return acceptPrice(Number(normalized), zeroPolicy);
}

function normalizeSeparators(text: string, style: DecimalStyle): string {
  switch (style) {
    case 'point':
      return text.replace(/,/g, '');
    case 'comma':
      return text.replace(/\./g, '').replace(/,/g, '.');
    case 'auto':
    default: {
      const hasComma = text.includes(',');
      const hasPoint = text.includes('.');
      if (hasComma && hasPoint) return text.replace(/,/g, '');
      if (!hasComma) return text;

      const segments = text.split(',');
      const last = segments[segments.length - 1];
      return last.length === 2 ? text.replace(/,/g, '.') : text.replace(/,/g, '');
    }
  }
}

function acceptPrice(value: number, zeroPolicy: ZeroPricePolicy): number | null {
  if (!Number.isFinite(value) || value < 0) return null;
  if (value === 0 && zeroPolicy === 'absent') return null;
  return value;
}

// =============================================================================
// parseSpec
// =============================================================================

export type SpecValue = number | string;

const NUM = String.raw`(\d+(?:\.\d+)?)`;

const STORAGE_PATTERN = new RegExp(`^${NUM}\\s*(tb|gb|mb)(?:\\s*(?:storage|rom|ssd|hdd))?$`);
const RAM_AFTER_PATTERN = new RegExp(`^${NUM}\\s*(gb|mb)\\s*(?:ram|memory)$`);
const RAM_BEFORE_PATTERN = new RegExp(`^(?:ram|memory)\\s*:?\\s*${NUM}\\s*(gb|mb)$`);
const SCREEN_PATTERN = new RegExp(`^${NUM}\\s*(?:inches|inch|in\\.|"|”)$`);
const NUMERIC_PATTERN = new RegExp(`^${NUM}$`);

const GB_PER_UNIT: Record<string, number> = {
  tb: 1024,
  gb: 1,
  mb: 1 / 1024,
};

function toGigabytes(amount: string, unit: string): number {
  return Number(amount) * (GB_PER_UNIT[unit] ?? 1);
}

/**
 * Normalize a free-text spec value. Patterns are tried in a fixed order
 * (storage, RAM, screen size, plain number) and the first match wins;
 * unmatched text comes back trimmed and lower-cased.
 *
 * Storage and memory sizes are expressed in GB, screen sizes in inches.
 */
export function parseSpec(raw: string): SpecValue {
  const text = raw.trim().toLowerCase();

  const storage = STORAGE_PATTERN.exec(text);
  if (storage) return toGigabytes(storage[1], storage[2]);

  const ram = RAM_AFTER_PATTERN.exec(text) ?? RAM_BEFORE_PATTERN.exec(text);
  if (ram) return toGigabytes(ram[1], ram[2]);

  const screen = SCREEN_PATTERN.exec(text);
  if (screen) return Number(screen[1]);

  if (NUMERIC_PATTERN.test(text)) return Number(text);

  return text;
}
