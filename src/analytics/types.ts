/**
 * Sales Metrics Types
 */

import type { Measure } from './measure';

// =============================================================================
// TRENDS
// =============================================================================

export interface PeriodAggregate {
  /** "YYYY-MM" for monthly periods, "YYYY" for yearly */
  period: string;
  year: number;
  /** Absent on yearly aggregates */
  month: number | null;
  unitsSold: number;
  revenue: number;
  /** Unweighted mean of the records' average prices */
  avgPrice: number;
  unitsGrowth: Measure;
  revenueGrowth: Measure;
}

export interface OverallGrowth {
  avgMonthlyUnitsGrowth: Measure;
  avgMonthlyRevenueGrowth: Measure;
  avgYoyUnitsGrowth: Measure;
  avgYoyRevenueGrowth: Measure;
}

export interface TrendMetrics {
  monthly: PeriodAggregate[];
  yearly: PeriodAggregate[];
  overallGrowth: OverallGrowth;
}

// =============================================================================
// PRICE ELASTICITY
// =============================================================================

export type ElasticityClass = 'elastic' | 'inelastic';

export interface ElasticityRecord {
  productId: string;
  coefficient: number;
  classification: ElasticityClass;
  avgPrice: number;
  avgUnits: number;
  /** Dated observations for the product */
  observations: number;
  /** Price-change pairs that survived filtering */
  pricePairs: number;
}

export type ElasticityMetrics = ReadonlyMap<string, ElasticityRecord>;

// =============================================================================
// PRODUCT PERFORMANCE
// =============================================================================

export interface ProductPerformance {
  productId: string;
  observations: number;
  totalUnits: number;
  avgUnits: number;
  unitsStdDev: Measure;
  totalRevenue: number;
  avgRevenue: number;
  avgPrice: number;
  /** Percent of all units sold */
  marketShare: number;
  /** Coefficient of variation of units sold; lower is steadier */
  stability: Measure;
  /** Competition rank by total revenue, 1 = highest */
  revenueRank: number;
}

export interface PerformanceLeaders {
  bestSelling: string | null;
  highestRevenue: string | null;
  mostStable: string | null;
}

export interface PerformanceMetrics {
  /** Sorted by total revenue, descending */
  table: ProductPerformance[];
  topPerformers: ProductPerformance[];
  leaders: PerformanceLeaders;
}

// =============================================================================
// RESULT
// =============================================================================

export interface MetricsResult {
  trends: TrendMetrics;
  elasticity: ElasticityMetrics;
  performance: PerformanceMetrics;
}

export interface MetricsInsights {
  avgYoyUnitsGrowth: Measure;
  bestProduct: string | null;
  elasticProducts: string[];
}

export interface MetricsOptions {
  /** Rows kept in `topPerformers` (default 5) */
  topN?: number;
}
