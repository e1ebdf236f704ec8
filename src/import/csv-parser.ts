/**
 * CSV Parser - Parse CSV/TSV/pipe-delimited sales exports into a raw table
 *
 * Handles:
 * - Auto-detection of delimiter (comma, tab, pipe)
 * - UTF-8 BOM stripping
 * - Windows (\r\n) and Unix (\n) line endings
 * - Quoted fields with embedded delimiters/newlines
 *
 * Cells stay as strings (empty cells become null); typing happens in the
 * dataset cleaning steps.
 */

import { createLogger } from '../utils/logger';
import type { RawRow, RawTable } from '../dataset/types';
import type { Delimiter, ParseOptions } from './types';

const logger = createLogger('csv-parser');

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

const DELIMITER_MAP: Record<Exclude<Delimiter, 'auto'>, string> = {
  comma: ',',
  tab: '\t',
  pipe: '|',
};

const CANDIDATES = [',', '\t', '|'];

/** Delimiter occurrences in a line, ignoring any inside quotes. */
function countOutsideQuotes(line: string, delimiter: string): number {
  let count = 0;
  let quoted = false;
  for (const ch of line) {
    if (ch === '"') quoted = !quoted;
    else if (ch === delimiter && !quoted) count++;
  }
  return count;
}

/**
 * Pick the candidate that splits the first lines most often; one that gives
 * every sampled line the same field count wins outright. Ties go to the
 * earlier candidate, and text with none of them is read as comma-separated.
 */
export function detectDelimiter(text: string): string {
  const sample = text.split(/\r?\n/).slice(0, 10).filter((line) => line.length > 0);
  let best = ',';
  let bestScore = 0;

  for (const candidate of CANDIDATES) {
    const counts = sample.map((line) => countOutsideQuotes(line, candidate));
    const total = counts.reduce((a, b) => a + b, 0);
    if (total === 0) continue;

    const consistent = counts.every((c) => c === counts[0]);
    const score = total / counts.length + (consistent ? 10 : 0);
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}

// ---------------------------------------------------------------------------
// Record splitting and field parsing
// ---------------------------------------------------------------------------

/** Split on newlines outside quotes; quotes stay in place for parseFields. */
function splitRecords(text: string): string[] {
  const records: string[] = [];
  let current = '';
  let quoted = false;

  for (const ch of text) {
    if (ch === '\n' && !quoted) {
      records.push(current);
      current = '';
      continue;
    }
    if (ch === '"') quoted = !quoted;
    current += ch;
  }
  records.push(current);
  return records;
}

/**
 * Fields of one record, trimmed. A quote opens a quoted field only at the
 * start of a field; inside it `""` is a literal quote.
 */
export function parseFields(record: string, delimiter: string): string[] {
  const fields: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < record.length; i++) {
    const ch = record[i];
    if (quoted) {
      if (ch !== '"') {
        field += ch;
      } else if (record[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (ch === '"' && field.trim().length === 0) {
      field = '';
      quoted = true;
    } else if (ch === delimiter) {
      fields.push(field.trim());
      field = '';
    } else {
      field += ch;
    }
  }

  fields.push(field.trim());
  return fields;
}

// ---------------------------------------------------------------------------
// Main parse function
// ---------------------------------------------------------------------------

/**
 * Parse CSV text into a raw table. The first non-blank record is the header.
 * Returns a table with no columns when the text holds no records.
 */
export function parseSalesCsv(csvData: string, options: ParseOptions = {}): RawTable {
  const { delimiter: delimiterOption = 'auto' } = options;

  let data = csvData;
  if (data.charCodeAt(0) === 0xfeff) {
    data = data.slice(1);
  }
  data = data.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  const delimiter = delimiterOption === 'auto' ? detectDelimiter(data) : DELIMITER_MAP[delimiterOption];

  const lines = splitRecords(data).filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    return { columns: [], rows: [] };
  }

  const columns = parseFields(lines[0], delimiter);
  const rows: RawRow[] = [];
  let shortRows = 0;

  for (let i = 1; i < lines.length; i++) {
    const fields = parseFields(lines[i], delimiter);
    if (fields.length < columns.length) shortRows++;

    const row: RawRow = {};
    columns.forEach((column, index) => {
      const value = fields[index];
      row[column] = value === undefined || value.length === 0 ? null : value;
    });
    rows.push(row);
  }

  if (shortRows > 0) {
    logger.debug({ shortRows }, 'Rows with fewer fields than the header were padded with nulls');
  }
  logger.debug(
    { delimiter: delimiter === '\t' ? 'tab' : delimiter, columns: columns.length, rows: rows.length },
    'CSV parsing complete',
  );

  return { columns, rows };
}
