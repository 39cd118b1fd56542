/**
 * Tabular Export Types
 */

import type { ExportDelimiter } from '../utils/config.js';

export interface CSVOptions {
  delimiter?: string;
  /** Defaults to true */
  includeHeader?: boolean;
}

export type CSVCell = string | number | boolean | null | undefined;

export interface TableExportOptions {
  delimiter?: ExportDelimiter;
}

/** One exported competitor row, read back with numeric columns parsed. */
export interface CompetitorTableRow {
  timestamp: string;
  competitorName: string;
  competitorPrice: number;
  marketPosition: string;
  similarityScore: number;
}
