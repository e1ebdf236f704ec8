/**
 * Sales source import - read a delimited file into a raw table
 */

import { readFileSync } from 'fs';
import { createLogger } from '../utils/logger';
import { SourceReadError, errorMessage } from '../utils/errors';
import type { RawTable } from '../dataset/types';
import { parseSalesCsv } from './csv-parser';
import type { ParseOptions } from './types';

const logger = createLogger('import');

/**
 * Read and parse a sales file. Unreadable files and files without a header
 * row throw SourceReadError; nothing else in the import is fatal.
 */
export function readSalesSource(path: string, options: ParseOptions = {}): RawTable {
  logger.info({ path }, 'Loading sales data');

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    logger.error({ path, error: errorMessage(err) }, 'Data file could not be read');
    throw new SourceReadError(path, `Cannot read data file ${path}: ${errorMessage(err)}`, err);
  }

  const table = parseSalesCsv(text, options);
  if (table.columns.length === 0) {
    throw new SourceReadError(path, `Data file ${path} has no header row`);
  }

  logger.info({ rows: table.rows.length, columns: table.columns.length }, 'Loaded sales data');
  return table;
}

export { parseSalesCsv, parseFields, detectDelimiter } from './csv-parser';
export type { Delimiter, ParseOptions } from './types';
