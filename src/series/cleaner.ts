/**
 * Series Cleaner - normalizes raw price observations into an ordered series
 *
 * Parses every recognized price and date column, drops exact duplicate rows
 * and sorts by the preferred date column when one exists.
 */

import { createLogger } from '../utils/logger.js';
import { parsePrice, type ParsePriceOptions } from '../parsing/value-parser.js';
import { parseTimestamp } from '../parsing/dates.js';
import {
  DATE_FIELDS,
  PRICE_FIELDS,
  type CleanedRow,
  type CleanedSeries,
  type DateField,
  type PriceField,
  type RawRecord,
  type Timestamp,
} from '../types.js';

const logger = createLogger('series-cleaner');

/** Order in which a row's price columns are consulted for "the" price. */
const PRICE_PREFERENCE: readonly PriceField[] = ['price', 'current_price', 'sale_price', 'original_price'];

export type CleanOptions = ParsePriceOptions;

// =============================================================================
// cleanSeries
// =============================================================================

export function cleanSeries(records: readonly RawRecord[], options: CleanOptions = {}): CleanedSeries {
  if (records.length === 0) {
    return emptySeries();
  }

  const priceFields = PRICE_FIELDS.filter((field) => records.some((r) => field in r));
  const dateFields = DATE_FIELDS.filter((field) => records.some((r) => field in r));

  let unparseablePrices = 0;
  let unparseableDates = 0;

  const parsed: CleanedRow[] = records.map((record) => {
    const row: Record<string, unknown> = { ...record };

    for (const field of priceFields) {
      const raw = record[field];
      const price = parsePrice(raw, options);
      if (price === null && isPresent(raw)) unparseablePrices++;
      row[field] = price;
    }

    for (const field of dateFields) {
      const raw = record[field];
      const ts = parseTimestamp(raw);
      if (ts === null && isPresent(raw)) unparseableDates++;
      row[field] = ts;
    }

    return row;
  });

  const unique = dropDuplicates(parsed);
  const sortedBy = dateFields.length > 0 ? dateFields[0] : null;
  const rows = sortedBy ? sortByTimestamp(unique, sortedBy) : unique;

  if (unparseablePrices > 0 || unparseableDates > 0) {
    logger.debug({ unparseablePrices, unparseableDates }, 'Unreadable values set to null');
  }

  return {
    rows,
    priceFields,
    dateFields,
    sortedBy,
    unparseablePrices,
    unparseableDates,
    duplicatesRemoved: parsed.length - unique.length,
  };
}

function emptySeries(): CleanedSeries {
  return {
    rows: [],
    priceFields: [],
    dateFields: [],
    sortedBy: null,
    unparseablePrices: 0,
    unparseableDates: 0,
    duplicatesRemoved: 0,
  };
}

function isPresent(raw: unknown): boolean {
  return raw !== null && raw !== undefined && raw !== '';
}

// =============================================================================
// DEDUPLICATION & ORDERING
// =============================================================================

function rowKey(row: CleanedRow): string | null {
  const entries = Object.keys(row)
    .sort()
    .map((key) => [key, row[key] === undefined ? null : row[key]]);
  try {
    return JSON.stringify(entries);
  } catch (err) {
    // Circular or BigInt values: the row cannot be compared, keep it
    logger.debug({ err }, 'Row not serializable, skipping duplicate check');
    return null;
  }
}

function dropDuplicates(rows: CleanedRow[]): CleanedRow[] {
  const seen = new Set<string>();
  const unique: CleanedRow[] = [];

  for (const row of rows) {
    const key = rowKey(row);
    if (key !== null) {
      if (seen.has(key)) continue;
      seen.add(key);
    }
    unique.push(row);
  }

  return unique;
}

/**
 * Stable ascending sort; rows without a timestamp go last in input order.
 */
function sortByTimestamp(rows: CleanedRow[], field: DateField): CleanedRow[] {
  return [...rows].sort((a, b) => {
    const ta = getTimestamp(a, field);
    const tb = getTimestamp(b, field);
    if (ta === null && tb === null) return 0;
    if (ta === null) return 1;
    if (tb === null) return -1;
    return ta - tb;
  });
}

// =============================================================================
// ROW ACCESSORS
// =============================================================================

/**
 * The row's observed price: the first non-null column among price,
 * current_price, sale_price and original_price.
 */
export function extractPrice(row: CleanedRow): number | null {
  for (const field of PRICE_PREFERENCE) {
    const value = row[field];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return null;
}

export function getTimestamp(row: CleanedRow, field: DateField): Timestamp | null {
  const value = row[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
