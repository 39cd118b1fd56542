/**
 * Delimited text - generation and parsing
 *
 * Both halves use the double quote as the only quote character.
 */

import type { ExportDelimiter } from '../utils/config.js';
import type { CSVCell, CSVOptions } from './types.js';

export const DELIMITER_MAP: Record<ExportDelimiter, string> = {
  comma: ',',
  tab: '\t',
  pipe: '|',
};

/** Quote character for both writing and parsing */
const QUOTE = '"';

// =============================================================================
// CSV GENERATION
// =============================================================================

/**
 * Quote a cell when it holds the delimiter, a quote or a line break;
 * embedded quotes are doubled. Null and undefined write as empty cells.
 */
export function escapeCell(value: CSVCell, delimiter: string): string {
  if (value === null || value === undefined) return '';

  const text = String(value);
  const needsQuotes =
    text.includes(delimiter) || text.includes(QUOTE) || /[\r\n]/.test(text);

  return needsQuotes ? QUOTE + text.replaceAll(QUOTE, QUOTE + QUOTE) + QUOTE : text;
}

/**
 * Join a header row and data rows into delimited text, one line per row,
 * with no trailing newline.
 */
export function generateCSV(
  headers: readonly string[],
  rows: readonly CSVCell[][],
  options: CSVOptions = {},
): string {
  const delimiter = options.delimiter ?? ',';
  const body: ReadonlyArray<readonly CSVCell[]> = options.includeHeader === false ? rows : [headers, ...rows];

  return body.map((row) => row.map((cell) => escapeCell(cell, delimiter)).join(delimiter)).join('\n');
}

// =============================================================================
// CSV PARSING
// =============================================================================

/**
 * Parse delimited text into rows of fields. Handles a UTF-8 BOM, CRLF line
 * endings, quoted fields with embedded delimiters or newlines, and escaped
 * quotes (""). Blank lines are skipped.
 */
export function parseDelimited(text: string, delimiter = ','): string[][] {
  let data = text;
  if (data.charCodeAt(0) === 0xfeff) {
    data = data.slice(1);
  }

  const rows: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let i = 0;

  const endRow = () => {
    fields.push(current);
    if (fields.length > 1 || fields[0].length > 0) rows.push(fields);
    fields = [];
    current = '';
  };

  while (i < data.length) {
    const ch = data[i];

    if (inQuotes) {
      if (ch === QUOTE) {
        // Escaped quote ""
        if (data[i + 1] === QUOTE) {
          current += QUOTE;
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      current += ch;
      i++;
      continue;
    }

    if (ch === QUOTE && current.length === 0) {
      inQuotes = true;
    } else if (ch === delimiter) {
      fields.push(current);
      current = '';
    } else if (ch === '\r' && data[i + 1] === '\n') {
      endRow();
      i++;
    } else if (ch === '\n' || ch === '\r') {
      endRow();
    } else {
      current += ch;
    }
    i++;
  }

  if (current.length > 0 || fields.length > 0) endRow();
  return rows;
}

/**
 * Parse delimited text with a header row into header-keyed records.
 * Missing trailing cells read as ''.
 */
export function parseDelimitedRecords(text: string, delimiter = ','): Array<Record<string, string>> {
  const [header, ...body] = parseDelimited(text, delimiter);
  if (!header) return [];

  return body.map((fields) => {
    const record: Record<string, string> = {};
    header.forEach((name, index) => {
      record[name.trim()] = fields[index] ?? '';
    });
    return record;
  });
}
