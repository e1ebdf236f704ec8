/**
 * Product Performance
 *
 * Per-product volume, revenue, market share and sales stability, ranked by
 * total revenue.
 */

import type { CleanedRecord } from '../dataset/types';
import { defined, mean, sampleStdDev, sum, UNDEFINED, type Measure } from './measure';
import { groupByProduct } from './elasticity';
import type { PerformanceLeaders, PerformanceMetrics, ProductPerformance } from './types';

export const DEFAULT_TOP_N = 5;

/**
 * Standard competition ranking ("1224"): equal values share the best rank and
 * the next distinct value skips ahead by the size of the tie.
 */
export function competitionRank(values: readonly number[]): number[] {
  const order = values.map((value, index) => ({ value, index })).sort((a, b) => b.value - a.value);
  const ranks = new Array<number>(values.length);
  for (let i = 0; i < order.length; i++) {
    const tiedWithPrevious = i > 0 && order[i].value === order[i - 1].value;
    ranks[order[i].index] = tiedWithPrevious ? ranks[order[i - 1].index] : i + 1;
  }
  return ranks;
}

function coefficientOfVariation(stdDev: Measure, avg: number): Measure {
  if (!stdDev.defined || avg === 0) return UNDEFINED;
  return defined(stdDev.value / avg);
}

function pickLeaders(table: readonly ProductPerformance[]): PerformanceLeaders {
  if (table.length === 0) {
    return { bestSelling: null, highestRevenue: null, mostStable: null };
  }

  let bestSelling = table[0];
  let mostStable: { productId: string; value: number } | null = null;
  for (const row of table) {
    if (row.totalUnits > bestSelling.totalUnits) bestSelling = row;
    if (row.stability.defined && (mostStable === null || row.stability.value < mostStable.value)) {
      mostStable = { productId: row.productId, value: row.stability.value };
    }
  }

  return {
    bestSelling: bestSelling.productId,
    highestRevenue: table[0].productId,
    mostStable: mostStable?.productId ?? null,
  };
}

export function calculatePerformance(
  records: readonly CleanedRecord[],
  topN: number = DEFAULT_TOP_N,
): PerformanceMetrics {
  const groups = [...groupByProduct(records)];
  const grandTotalUnits = sum(records.map((r) => r.unitsSold));

  const rows = groups.map(([productId, observations]) => {
    const units = observations.map((o) => o.unitsSold);
    const revenues = observations.map((o) => o.revenue);
    const totalUnits = sum(units);
    const avgUnits = mean(units);
    const unitsStdDev = sampleStdDev(units);
    return {
      productId,
      observations: observations.length,
      totalUnits,
      avgUnits,
      unitsStdDev,
      totalRevenue: sum(revenues),
      avgRevenue: mean(revenues),
      avgPrice: mean(observations.map((o) => o.avgPrice)),
      marketShare: grandTotalUnits > 0 ? (totalUnits / grandTotalUnits) * 100 : 0,
      stability: coefficientOfVariation(unitsStdDev, avgUnits),
    };
  });

  const ranks = competitionRank(rows.map((r) => r.totalRevenue));
  const table: ProductPerformance[] = rows
    .map((row, i) => ({ ...row, revenueRank: ranks[i] }))
    .sort((a, b) => b.totalRevenue - a.totalRevenue);

  const safeTopN = Math.max(0, Math.floor(topN));

  return {
    table,
    topPerformers: table.slice(0, safeTopN),
    leaders: pickLeaders(table),
  };
}
