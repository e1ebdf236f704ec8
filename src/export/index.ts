/**
 * Cleaned dataset export
 *
 * Writes the cleaned records as CSV so raw-record charts and audits can read
 * exactly what the metrics were computed from.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { createLogger } from '../utils/logger';
import type { CleanedDataset } from '../dataset/types';
import { generateCSV } from './formats';

const logger = createLogger('export');

export const CLEANED_DATA_HEADERS = [
  'date',
  'product_id',
  'units_sold',
  'avg_price',
  'revenue',
  'year',
  'month',
  'quarter',
];

export function cleanedDatasetToCsv(dataset: CleanedDataset): string {
  const rows = dataset.records.map((r) => [
    r.date,
    r.productId,
    r.unitsSold,
    r.avgPrice,
    r.revenue,
    r.year,
    r.month,
    r.quarter,
  ]);
  return generateCSV(CLEANED_DATA_HEADERS, rows);
}

/**
 * Write the cleaned dataset to `outputPath`, creating parent directories.
 */
export function writeCleanedDataset(dataset: CleanedDataset, outputPath: string): string {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, cleanedDatasetToCsv(dataset), 'utf-8');
  logger.info({ path: outputPath, rows: dataset.records.length }, 'Cleaned data saved');
  return outputPath;
}

export { generateCSV } from './formats';
export type { CSVValue } from './types';
