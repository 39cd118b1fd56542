/**
 * Field accessors for loosely typed records
 *
 * Analysis results may arrive as structured objects (camelCase properties)
 * or as plain mappings (snake_case keys). `getField` reads the structured
 * property first and falls back to the mapping key, so callers never branch
 * on the input's shape.
 */

import type { FieldSource } from '../types.js';

/** `recommendedPrice` -> `recommended_price` */
export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a field by its camelCase name, then its snake_case form, then any
 * aliases. Null and undefined count as absent.
 */
export function getField(source: unknown, key: string, aliases: readonly string[] = []): unknown {
  if (!isRecord(source)) return undefined;

  const candidates = [key, toSnakeCase(key), ...aliases];
  for (const candidate of candidates) {
    const value = source[candidate];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

export function readString(
  source: unknown,
  key: string,
  fallback: string,
  aliases: readonly string[] = [],
): string {
  const value = getField(source, key, aliases);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : fallback;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date && Number.isFinite(value.getTime())) return value.toISOString();
  return fallback;
}

/**
 * Read a numeric field. Numeric strings are accepted ("0.85", " 12 ");
 * anything else yields the fallback.
 */
export function readNumber(
  source: unknown,
  key: string,
  fallback: number,
  aliases: readonly string[] = [],
): number {
  const value = getField(source, key, aliases);
  if (typeof value === 'number') return Number.isFinite(value) ? value : fallback;
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

/**
 * Read a list field. A single non-array value is not wrapped; it yields [].
 */
export function readList(source: unknown, key: string, aliases: readonly string[] = []): unknown[] {
  const value = getField(source, key, aliases);
  return Array.isArray(value) ? value : [];
}

export function readObject(
  source: unknown,
  key: string,
  aliases: readonly string[] = [],
): FieldSource | undefined {
  const value = getField(source, key, aliases);
  return isRecord(value) ? value : undefined;
}
