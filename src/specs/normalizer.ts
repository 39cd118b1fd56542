/**
 * Spec Normalizer - maps free-text product attributes onto comparable units
 */

import { parseSpec } from '../parsing/value-parser.js';
import { isRecord } from '../utils/fields.js';

export type NormalizedSpecMap = Record<string, unknown>;

/** "Screen Size" -> "screen_size", "ram-type" -> "ram_type" */
export function normalizeSpecKey(key: string): string {
  return key.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/**
 * Normalize keys and string values. Non-string values pass through.
 * Normalizing an already-normalized map returns an equal map.
 */
export function normalizeSpecs(specs: unknown): NormalizedSpecMap {
  const normalized: NormalizedSpecMap = {};
  if (!isRecord(specs)) return normalized;

  for (const [key, value] of Object.entries(specs)) {
    normalized[normalizeSpecKey(key)] = typeof value === 'string' ? parseSpec(value) : value;
  }
  return normalized;
}
