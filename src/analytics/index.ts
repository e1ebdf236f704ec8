/**
 * Sales metrics: trends, price elasticity, product performance
 */

export { createMetricsEngine } from './engine';
export type { MetricsEngine } from './engine';
export { calculateTrends } from './trends';
export { calculateElasticity, classifyElasticity, productElasticity, groupByProduct } from './elasticity';
export { calculatePerformance, competitionRank, DEFAULT_TOP_N } from './performance';
export {
  UNDEFINED,
  defined,
  isDefined,
  valueOrNull,
  pctChange,
  pctChangeSeries,
  meanOfDefined,
  sampleStdDev,
} from './measure';
export type { Measure } from './measure';
export { metricsToJson, insightsToJson } from './serialize';
export type { Json } from './serialize';
export type {
  PeriodAggregate,
  OverallGrowth,
  TrendMetrics,
  ElasticityClass,
  ElasticityRecord,
  ElasticityMetrics,
  ProductPerformance,
  PerformanceLeaders,
  PerformanceMetrics,
  MetricsResult,
  MetricsInsights,
  MetricsOptions,
} from './types';
