/**
 * Dataset Preparer - validate, clean and summarize raw sales tables
 *
 * Produces an immutable CleanedDataset. Row defects are dropped and counted;
 * only a missing required column is fatal.
 */

import { createLogger } from '../utils/logger';
import { DatasetValidationError } from '../utils/errors';
import { CLEANING_STEPS, deriveRecord, type WorkingRow } from './cleaning';
import {
  DEFAULT_COLUMN_SCHEMA,
  type CleanedDataset,
  type CleanedRecord,
  type ColumnSchema,
  type DatasetSummary,
  type RawTable,
  type StepOutcome,
  type ValidationResult,
} from './types';

const logger = createLogger('dataset-preparer');

export interface DatasetPreparer {
  readonly schema: Readonly<ColumnSchema>;
  validate(raw: RawTable): ValidationResult;
  clean(raw: RawTable): CleanedDataset;
  summary(dataset: CleanedDataset): DatasetSummary;
}

export function createDatasetPreparer(schema: Partial<ColumnSchema> = {}): DatasetPreparer {
  const resolved: Readonly<ColumnSchema> = Object.freeze({ ...DEFAULT_COLUMN_SCHEMA, ...schema });
  const required = [resolved.date, resolved.unitsSold, resolved.avgPrice, resolved.productId];

  function validate(raw: RawTable): ValidationResult {
    const present = new Set(raw.columns);
    const errors = required
      .filter((column) => !present.has(column))
      .map((column) => `Missing required column: ${column}`);

    if (errors.length > 0) {
      logger.warn({ errors }, 'Validation errors');
      return { ok: false, errors };
    }
    logger.debug('Data validation passed');
    return { ok: true, errors: [] };
  }

  function clean(raw: RawTable): CleanedDataset {
    const validation = validate(raw);
    if (!validation.ok) {
      throw new DatasetValidationError(validation.errors);
    }

    logger.info({ rows: raw.rows.length }, 'Starting data cleaning');

    const ctx = { schema: resolved, columns: raw.columns };
    let rows: WorkingRow[] = raw.rows.map((row, index) => ({
      index,
      raw: row,
      day: null,
      productId: null,
      unitsSold: null,
      avgPrice: null,
    }));

    const steps: StepOutcome[] = [];
    for (const step of CLEANING_STEPS) {
      const before = rows.length;
      rows = step.apply(rows, ctx);
      const dropped = before - rows.length;
      steps.push({ step: step.name, reason: step.reason, dropped });
      if (dropped > 0) {
        logger.info({ step: step.name, reason: step.reason, dropped }, `Removed ${dropped} rows`);
      }
    }

    const records: Readonly<CleanedRecord>[] = [];
    for (const row of rows) {
      const record = deriveRecord(row);
      if (record) records.push(Object.freeze(record));
    }
    steps.push({ step: 'derive-fields', reason: 'none', dropped: rows.length - records.length });

    const report = Object.freeze({
      inputRows: raw.rows.length,
      outputRows: records.length,
      steps: Object.freeze(steps.map((s) => Object.freeze(s))),
    });

    logger.info({ rows: records.length }, 'Data cleaning complete');
    return Object.freeze({ records: Object.freeze(records), report });
  }

  function summary(dataset: CleanedDataset): DatasetSummary {
    const { records } = dataset;
    if (records.length === 0) {
      return {
        totalRows: 0,
        dateRange: null,
        products: 0,
        totalUnitsSold: 0,
        totalRevenue: 0,
        avgPrice: 0,
      };
    }

    let totalUnitsSold = 0;
    let totalRevenue = 0;
    let priceSum = 0;
    const products = new Set<string>();
    for (const r of records) {
      totalUnitsSold += r.unitsSold;
      totalRevenue += r.revenue;
      priceSum += r.avgPrice;
      products.add(r.productId);
    }

    // Records are date-sorted, so the ends are the range
    const result: DatasetSummary = {
      totalRows: records.length,
      dateRange: { start: records[0].date, end: records[records.length - 1].date },
      products: products.size,
      totalUnitsSold,
      totalRevenue,
      avgPrice: priceSum / records.length,
    };
    logger.debug({ summary: result }, 'Data summary');
    return result;
  }

  return { schema: resolved, validate, clean, summary };
}
