/**
 * Export Module - delimited-text generation and competitor table export
 */

export {
  DELIMITER_MAP,
  escapeCell,
  generateCSV,
  parseDelimited,
  parseDelimitedRecords,
} from './formats.js';

export {
  COMPETITOR_TABLE_HEADERS,
  competitorRows,
  exportToTable,
  readTable,
} from './table.js';

export type {
  CSVCell,
  CSVOptions,
  CompetitorTableRow,
  TableExportOptions,
} from './types.js';
