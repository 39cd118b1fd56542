/**
 * Shared record types
 *
 * Records arrive from the collection layer loosely typed: any key may be
 * missing, and values may be numbers, strings, dates or null.
 */

// =============================================================================
// RAW INPUT
// =============================================================================

export const PRICE_FIELDS = ['price', 'current_price', 'original_price', 'sale_price'] as const;
export type PriceField = (typeof PRICE_FIELDS)[number];

/** Preference order used for sorting by date. */
export const DATE_FIELDS = ['date', 'timestamp', 'scraped_at', 'updated_at'] as const;
export type DateField = (typeof DATE_FIELDS)[number];

export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * Anything the formatter reads fields from: a plain mapping or a structured
 * object exposing the same fields as properties.
 */
export type FieldSource = object;

// =============================================================================
// CLEANED OUTPUT
// =============================================================================

/** Epoch milliseconds. */
export type Timestamp = number;

export interface CleanedRow {
  readonly [field: string]: unknown;
}

export interface CleanedSeries {
  rows: CleanedRow[];
  /** Price fields present in at least one input record. */
  priceFields: PriceField[];
  /** Date fields present in at least one input record. */
  dateFields: DateField[];
  /** The field rows were sorted by, or null when insertion order was kept. */
  sortedBy: DateField | null;
  unparseablePrices: number;
  unparseableDates: number;
  duplicatesRemoved: number;
}
