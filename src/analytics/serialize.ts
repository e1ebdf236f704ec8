/**
 * Plain-JSON view of a MetricsResult for reporting collaborators.
 *
 * Undefined measures become null and the elasticity map becomes an object
 * keyed by product id, in map order.
 */

import { valueOrNull } from './measure';
import type { MetricsInsights, MetricsResult, PeriodAggregate, ProductPerformance } from './types';

export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

function periodToJson(p: PeriodAggregate): Json {
  return {
    period: p.period,
    year: p.year,
    month: p.month,
    unitsSold: p.unitsSold,
    revenue: p.revenue,
    avgPrice: p.avgPrice,
    unitsGrowth: valueOrNull(p.unitsGrowth),
    revenueGrowth: valueOrNull(p.revenueGrowth),
  };
}

function productToJson(p: ProductPerformance): Json {
  return {
    productId: p.productId,
    observations: p.observations,
    totalUnits: p.totalUnits,
    avgUnits: p.avgUnits,
    unitsStdDev: valueOrNull(p.unitsStdDev),
    totalRevenue: p.totalRevenue,
    avgRevenue: p.avgRevenue,
    avgPrice: p.avgPrice,
    marketShare: p.marketShare,
    stability: valueOrNull(p.stability),
    revenueRank: p.revenueRank,
  };
}

export function metricsToJson(result: MetricsResult): Json {
  const { trends, elasticity, performance } = result;
  // fromEntries defines own keys, so an id like "__proto__" stays a plain key
  const elasticityJson: { [key: string]: Json } = Object.fromEntries(
    [...elasticity].map(([productId, r]): [string, Json] => [
      productId,
      {
        coefficient: r.coefficient,
        classification: r.classification,
        avgPrice: r.avgPrice,
        avgUnits: r.avgUnits,
        observations: r.observations,
        pricePairs: r.pricePairs,
      },
    ]),
  );

  return {
    trends: {
      monthly: trends.monthly.map(periodToJson),
      yearly: trends.yearly.map(periodToJson),
      overallGrowth: {
        avgMonthlyUnitsGrowth: valueOrNull(trends.overallGrowth.avgMonthlyUnitsGrowth),
        avgMonthlyRevenueGrowth: valueOrNull(trends.overallGrowth.avgMonthlyRevenueGrowth),
        avgYoyUnitsGrowth: valueOrNull(trends.overallGrowth.avgYoyUnitsGrowth),
        avgYoyRevenueGrowth: valueOrNull(trends.overallGrowth.avgYoyRevenueGrowth),
      },
    },
    elasticity: elasticityJson,
    performance: {
      table: performance.table.map(productToJson),
      topPerformers: performance.topPerformers.map(productToJson),
      leaders: { ...performance.leaders },
    },
  };
}

export function insightsToJson(insights: MetricsInsights): Json {
  return {
    avgYoyUnitsGrowth: valueOrNull(insights.avgYoyUnitsGrowth),
    bestProduct: insights.bestProduct,
    elasticProducts: [...insights.elasticProducts],
  };
}
