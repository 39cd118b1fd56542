/**
 * Competitor Table Export - flattens a report's competitors into delimited rows
 */

import { readFileSync, writeFileSync } from 'fs';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../utils/config.js';
import { isRecord, readList, readNumber, readObject, readString } from '../utils/fields.js';
import { DELIMITER_MAP, generateCSV, parseDelimitedRecords } from './formats.js';
import type { CSVCell, CompetitorTableRow, TableExportOptions } from './types.js';

const logger = createLogger('table-export');

export const COMPETITOR_TABLE_HEADERS = [
  'timestamp',
  'competitor_name',
  'competitor_price',
  'market_position',
  'similarity_score',
];

/**
 * One row per competitor entry. Entries that are not objects are skipped,
 * so a partially malformed report still exports what it can.
 */
export function competitorRows(report: unknown): CSVCell[][] {
  const timestamp = readString(report, 'timestamp', '');
  const analysis = readObject(report, 'competitiveAnalysis');
  const rows: CSVCell[][] = [];

  for (const competitor of readList(analysis, 'competitors')) {
    if (!isRecord(competitor)) continue;
    rows.push([
      timestamp,
      readString(competitor, 'name', 'Unknown'),
      readNumber(competitor, 'price', 0),
      readString(competitor, 'marketPosition', 'unknown'),
      readNumber(competitor, 'similarityScore', 0),
    ]);
  }

  return rows;
}

/**
 * Write the report's competitors to `destination` as delimited text.
 * Returns false when there is nothing to export or the write fails.
 */
export function exportToTable(report: unknown, destination: string, options: TableExportOptions = {}): boolean {
  if (readString(report, 'error', '') !== '') {
    logger.warn({ destination }, 'Report is degraded, nothing to export');
    return false;
  }

  const rows = competitorRows(report);
  if (rows.length === 0) {
    logger.warn({ destination }, 'No competitor rows to export');
    return false;
  }

  const delimiter = DELIMITER_MAP[options.delimiter ?? DEFAULT_ANALYSIS_CONFIG.exportDelimiter];
  const content = generateCSV(COMPETITOR_TABLE_HEADERS, rows, { delimiter });

  try {
    writeFileSync(destination, `${content}\n`, 'utf8');
  } catch (err) {
    logger.error({ destination, err }, 'Failed to write competitor table');
    return false;
  }

  logger.info({ destination, rows: rows.length }, 'Competitor table exported');
  return true;
}

/**
 * Read an exported competitor table back into typed rows.
 * Throws if the file cannot be read.
 */
export function readTable(source: string, options: TableExportOptions = {}): CompetitorTableRow[] {
  const delimiter = DELIMITER_MAP[options.delimiter ?? DEFAULT_ANALYSIS_CONFIG.exportDelimiter];
  const text = readFileSync(source, 'utf8');

  return parseDelimitedRecords(text, delimiter).map((record) => ({
    timestamp: record.timestamp ?? '',
    competitorName: record.competitor_name ?? '',
    competitorPrice: toNumber(record.competitor_price),
    marketPosition: record.market_position ?? '',
    similarityScore: toNumber(record.similarity_score),
  }));
}

function toNumber(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}
