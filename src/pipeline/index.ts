/**
 * Sales Pipeline - load, validate, clean and measure in one run
 *
 * Each run builds its own preparer, dataset and engine; nothing is shared
 * between runs.
 */

import { join } from 'path';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { describeConfig, type AppConfig } from '../utils/config';
import { readSalesSource } from '../import';
import { writeCleanedDataset } from '../export';
import { createDatasetPreparer } from '../dataset/preparer';
import type { CleanedDataset, DatasetSummary, RawTable } from '../dataset/types';
import { createMetricsEngine } from '../analytics/engine';
import type { MetricsInsights, MetricsResult } from '../analytics/types';

const logger = createLogger('pipeline');

export const CLEANED_DATA_FILE = join('processed', 'cleaned_sales_data.csv');

export interface PipelineRunOptions {
  /** Overrides config.dataFile */
  dataFile?: string;
  /** Use this table instead of reading a file */
  table?: RawTable;
  /** Write the cleaned CSV (default true) */
  saveCleaned?: boolean;
}

export interface PipelineResult {
  dataset: CleanedDataset;
  summary: DatasetSummary;
  metrics: MetricsResult;
  insights: MetricsInsights;
  /** Null when the cleaned CSV was not written */
  cleanedPath: string | null;
}

export interface SalesPipeline {
  run(options?: PipelineRunOptions): PipelineResult;
  /** Load and clean only */
  prepare(options?: PipelineRunOptions): { dataset: CleanedDataset; summary: DatasetSummary };
}

export function createPipeline(config: AppConfig): SalesPipeline {
  function prepare(options: PipelineRunOptions = {}): { dataset: CleanedDataset; summary: DatasetSummary } {
    const preparer = createDatasetPreparer(config.columns);
    const raw = options.table ?? readSalesSource(options.dataFile ?? config.dataFile);

    // clean validates first and throws DatasetValidationError
    const dataset = preparer.clean(raw);
    const summary = preparer.summary(dataset);
    logger.info({ summary }, 'Data summary');
    return { dataset, summary };
  }

  return {
    prepare,

    run(options: PipelineRunOptions = {}): PipelineResult {
      logger.info({ config: describeConfig(config) }, 'Starting pipeline execution');

      try {
        logger.info('STEP 1: Data loading and cleaning');
        const { dataset, summary } = prepare(options);

        let cleanedPath: string | null = null;
        if (options.saveCleaned ?? true) {
          cleanedPath = writeCleanedDataset(dataset, join(config.outputDir, CLEANED_DATA_FILE));
        }

        logger.info('STEP 2: Metrics calculation');
        const engine = createMetricsEngine(dataset, { topN: config.topN });
        const metrics = engine.calculateAll();
        const insights = engine.getInsights(metrics);

        logger.info(
          { bestProduct: insights.bestProduct, elasticProducts: insights.elasticProducts.length },
          'Pipeline execution completed',
        );
        return { dataset, summary, metrics, insights, cleanedPath };
      } catch (err) {
        logger.error({ error: errorMessage(err) }, 'Pipeline execution failed');
        throw err;
      }
    },
  };
}
