/**
 * Price Elasticity of Demand
 *
 * Elasticity = % change in units / % change in price, averaged over the
 * consecutive observations of a product where the price actually moved.
 */

import type { CleanedRecord } from '../dataset/types';
import { mean, pctChangeSeries } from './measure';
import type { ElasticityClass, ElasticityMetrics, ElasticityRecord } from './types';

/** |E| > 1 is elastic; exactly 1 stays inelastic. */
export function classifyElasticity(coefficient: number): ElasticityClass {
  return Math.abs(coefficient) > 1 ? 'elastic' : 'inelastic';
}

/**
 * Group records by product, preserving chronological order within each group
 * and first-appearance order across groups.
 */
export function groupByProduct(records: readonly CleanedRecord[]): Map<string, CleanedRecord[]> {
  const groups = new Map<string, CleanedRecord[]>();
  for (const r of records) {
    const group = groups.get(r.productId);
    if (group) {
      group.push(r);
    } else {
      groups.set(r.productId, [r]);
    }
  }
  return groups;
}

/**
 * Elasticity for a single product's observations, or null when no
 * observation pair carries a usable price change.
 */
export function productElasticity(productId: string, observations: readonly CleanedRecord[]): ElasticityRecord | null {
  if (observations.length < 2) return null;

  const priceChanges = pctChangeSeries(observations.map((o) => o.avgPrice));
  const unitChanges = pctChangeSeries(observations.map((o) => o.unitsSold));

  const ratios: number[] = [];
  for (let i = 1; i < observations.length; i++) {
    const price = priceChanges[i];
    const units = unitChanges[i];
    if (!price.defined || !units.defined || price.value === 0) continue;
    const ratio = units.value / price.value;
    if (Number.isFinite(ratio)) ratios.push(ratio);
  }

  if (ratios.length === 0) return null;

  const coefficient = mean(ratios);
  return {
    productId,
    coefficient,
    classification: classifyElasticity(coefficient),
    avgPrice: mean(observations.map((o) => o.avgPrice)),
    avgUnits: mean(observations.map((o) => o.unitsSold)),
    observations: observations.length,
    pricePairs: ratios.length,
  };
}

export function calculateElasticity(records: readonly CleanedRecord[]): ElasticityMetrics {
  const result = new Map<string, ElasticityRecord>();
  for (const [productId, observations] of groupByProduct(records)) {
    const record = productElasticity(productId, observations);
    if (record) result.set(productId, record);
  }
  return result;
}
