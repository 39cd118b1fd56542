/**
 * Date coercion for scraped timestamps.
 */

import type { Timestamp } from '../types.js';

/** Epoch values below this are read as seconds, at or above as milliseconds. */
const EPOCH_SECONDS_LIMIT = 1e11;

/**
 * Coerce a raw date to epoch milliseconds. Accepts Date objects, epoch
 * numbers (seconds or milliseconds), numeric strings and any string
 * `Date.parse` understands. Compact `YYYYMMDD` strings read as UTC dates.
 * Returns null when the value cannot be read.
 */
export function parseTimestamp(raw: unknown): Timestamp | null {
  if (raw instanceof Date) {
    const ms = raw.getTime();
    return Number.isFinite(ms) ? ms : null;
  }

  if (typeof raw === 'number') {
    return epochToMillis(raw);
  }

  if (typeof raw !== 'string') return null;

  const text = raw.trim();
  if (text.length === 0) return null;

  const compact = compactDate(text);
  if (compact !== null) return compact;

  if (/^\d+(?:\.\d+)?$/.test(text)) {
    return epochToMillis(Number(text));
  }

  const ms = Date.parse(text);
  return Number.isFinite(ms) ? ms : null;
}

/**
 * "20261015" -> 2026-10-15T00:00Z. Only real calendar dates from 1970 on
 * match; other 8-digit strings fall through to the epoch reading.
 */
function compactDate(text: string): Timestamp | null {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(text);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1970 || month < 1 || month > 12 || day < 1) return null;

  const ms = Date.UTC(year, month - 1, day);
  // Date.UTC rolls overflowing days into the next month
  return new Date(ms).getUTCDate() === day ? ms : null;
}

function epochToMillis(value: number): Timestamp | null {
  if (!Number.isFinite(value) || value < 0) return null;
  return value < EPOCH_SECONDS_LIMIT ? Math.round(value * 1000) : Math.round(value);
}
