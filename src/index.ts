/**
 * sales-metrics — deterministic sales analytics
 *
 * Library entry point. The CLI lives in ./cli.
 */

export { createDatasetPreparer } from './dataset/preparer';
export type { DatasetPreparer } from './dataset/preparer';
export { parseCalendarDay } from './dataset/dates';
export { DEFAULT_COLUMN_SCHEMA } from './dataset/types';
export type {
  RawValue,
  RawRow,
  RawTable,
  ColumnSchema,
  SalesRecord,
  CleanedRecord,
  CleanedDataset,
  CleaningReport,
  StepOutcome,
  DatasetSummary,
  ValidationResult,
} from './dataset/types';

export * from './analytics';

export { readSalesSource, parseSalesCsv } from './import';
export { cleanedDatasetToCsv, writeCleanedDataset } from './export';
export { createPipeline } from './pipeline';
export type { SalesPipeline, PipelineResult, PipelineRunOptions } from './pipeline';
export { generateSampleData, sampleDataToCsv } from './sample/generator';
export { loadConfig, describeConfig } from './utils/config';
export type { AppConfig } from './utils/config';
export { PipelineError, SourceReadError, DatasetValidationError, ConfigError } from './utils/errors';
export { createLogger } from './utils/logger';
