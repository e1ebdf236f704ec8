/**
 * Sales Trends
 *
 * Monthly and yearly aggregates with period-over-period growth. The first
 * period at each granularity has no growth value.
 */

import type { CleanedRecord } from '../dataset/types';
import { mean, meanOfDefined, pctChangeSeries } from './measure';
import type { PeriodAggregate, TrendMetrics } from './types';

interface Bucket {
  year: number;
  month: number | null;
  units: number;
  revenue: number;
  prices: number[];
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

function aggregate(
  records: readonly CleanedRecord[],
  keyOf: (r: CleanedRecord) => { year: number; month: number | null },
): PeriodAggregate[] {
  const buckets = new Map<number, Bucket>();

  for (const r of records) {
    const { year, month } = keyOf(r);
    const sortKey = year * 100 + (month ?? 0);
    let bucket = buckets.get(sortKey);
    if (!bucket) {
      bucket = { year, month, units: 0, revenue: 0, prices: [] };
      buckets.set(sortKey, bucket);
    }
    bucket.units += r.unitsSold;
    bucket.revenue += r.revenue;
    bucket.prices.push(r.avgPrice);
  }

  const ordered = [...buckets.entries()].sort((a, b) => a[0] - b[0]).map(([, b]) => b);
  const unitsGrowth = pctChangeSeries(ordered.map((b) => b.units));
  const revenueGrowth = pctChangeSeries(ordered.map((b) => b.revenue));

  return ordered.map((b, i) => ({
    period: b.month === null ? String(b.year) : `${b.year}-${pad2(b.month)}`,
    year: b.year,
    month: b.month,
    unitsSold: b.units,
    revenue: b.revenue,
    avgPrice: mean(b.prices),
    unitsGrowth: unitsGrowth[i],
    revenueGrowth: revenueGrowth[i],
  }));
}

export function calculateTrends(records: readonly CleanedRecord[]): TrendMetrics {
  const monthly = aggregate(records, (r) => ({ year: r.year, month: r.month }));
  const yearly = aggregate(records, (r) => ({ year: r.year, month: null }));

  return {
    monthly,
    yearly,
    overallGrowth: {
      avgMonthlyUnitsGrowth: meanOfDefined(monthly.map((p) => p.unitsGrowth)),
      avgMonthlyRevenueGrowth: meanOfDefined(monthly.map((p) => p.revenueGrowth)),
      avgYoyUnitsGrowth: meanOfDefined(yearly.map((p) => p.unitsGrowth)),
      avgYoyRevenueGrowth: meanOfDefined(yearly.map((p) => p.revenueGrowth)),
    },
  };
}
