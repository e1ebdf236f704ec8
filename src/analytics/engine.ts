/**
 * Metrics Engine - trends, price elasticity and product performance over a
 * cleaned dataset snapshot.
 */

import { createLogger } from '../utils/logger';
import type { CleanedDataset } from '../dataset/types';
import { calculateTrends } from './trends';
import { calculateElasticity } from './elasticity';
import { calculatePerformance, DEFAULT_TOP_N } from './performance';
import { valueOrNull } from './measure';
import type {
  ElasticityMetrics,
  MetricsInsights,
  MetricsOptions,
  MetricsResult,
  PerformanceMetrics,
  TrendMetrics,
} from './types';

const logger = createLogger('metrics');

export interface MetricsEngine {
  calculateTrends(): TrendMetrics;
  calculateElasticity(): ElasticityMetrics;
  calculatePerformance(topN?: number): PerformanceMetrics;
  calculateAll(): MetricsResult;
  getInsights(result: MetricsResult): MetricsInsights;
}

export function createMetricsEngine(dataset: CleanedDataset, options: MetricsOptions = {}): MetricsEngine {
  const { records } = dataset;
  const defaultTopN = options.topN ?? DEFAULT_TOP_N;

  if (records.length === 0) {
    logger.warn('Empty dataset: metrics will be empty or undefined');
  }

  function trends(): TrendMetrics {
    const result = calculateTrends(records);
    logger.info(
      {
        months: result.monthly.length,
        years: result.yearly.length,
        avgYoyUnitsGrowth: valueOrNull(result.overallGrowth.avgYoyUnitsGrowth),
      },
      'Calculated sales trends',
    );
    return result;
  }

  function elasticity(): ElasticityMetrics {
    const result = calculateElasticity(records);
    logger.info({ products: result.size }, 'Calculated price elasticity');
    return result;
  }

  function performance(topN: number = defaultTopN): PerformanceMetrics {
    const result = calculatePerformance(records, topN);
    logger.info(
      { products: result.table.length, bestSelling: result.leaders.bestSelling },
      'Calculated product performance',
    );
    return result;
  }

  return {
    calculateTrends: trends,
    calculateElasticity: elasticity,
    calculatePerformance: performance,

    calculateAll(): MetricsResult {
      logger.info({ records: records.length }, 'Starting metrics calculation');
      return {
        trends: trends(),
        elasticity: elasticity(),
        performance: performance(),
      };
    },

    getInsights(result: MetricsResult): MetricsInsights {
      const elasticProducts: string[] = [];
      for (const [productId, record] of result.elasticity) {
        if (record.classification === 'elastic') elasticProducts.push(productId);
      }
      return {
        avgYoyUnitsGrowth: result.trends.overallGrowth.avgYoyUnitsGrowth,
        bestProduct: result.performance.leaders.bestSelling,
        elasticProducts,
      };
    },
  };
}
