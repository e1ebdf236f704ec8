/**
 * Sample sales data for demos and smoke runs
 *
 * One row per product per month with an upward trend, a yearly seasonal swing
 * and seeded noise. The same options always produce the same table.
 */

import { generateCSV } from '../export/formats';
import type { RawTable } from '../dataset/types';

export interface SampleProduct {
  id: string;
  basePrice: number;
  baseVolume: number;
}

export const SAMPLE_LINEUP: readonly SampleProduct[] = [
  { id: 'Compact C1', basePrice: 38_000, baseVolume: 480 },
  { id: 'Compact C3', basePrice: 42_000, baseVolume: 850 },
  { id: 'Sedan S5', basePrice: 55_000, baseVolume: 620 },
  { id: 'Sedan S7', basePrice: 88_000, baseVolume: 180 },
  { id: 'Crossover X3', basePrice: 45_000, baseVolume: 920 },
  { id: 'Crossover X5', basePrice: 62_000, baseVolume: 720 },
  { id: 'Crossover X7', basePrice: 76_000, baseVolume: 280 },
  { id: 'Electric E4', basePrice: 58_000, baseVolume: 320 },
  { id: 'Electric EX', basePrice: 85_000, baseVolume: 210 },
  { id: 'Sport R3', basePrice: 72_000, baseVolume: 150 },
  { id: 'Sport R5', basePrice: 105_000, baseVolume: 95 },
];

export const SAMPLE_COLUMNS = ['date', 'model', 'units_sold', 'avg_price'];

export interface SampleOptions {
  months?: number;
  seed?: number;
  startYear?: number;
  products?: readonly SampleProduct[];
}

/** mulberry32: small deterministic PRNG returning floats in [0, 1). */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function uniform(random: () => number, min: number, max: number): number {
  return min + (max - min) * random();
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function generateSampleData(options: SampleOptions = {}): RawTable {
  const { months = 24, seed = 42, startYear = 2022, products = SAMPLE_LINEUP } = options;
  const random = createRandom(seed);
  const rows: RawTable['rows'] = [];

  for (let offset = 0; offset < months; offset++) {
    const year = startYear + Math.floor(offset / 12);
    const month = (offset % 12) + 1;
    const date = `${year}-${month < 10 ? `0${month}` : month}-01`;

    const trendFactor = 1 + offset * 0.01;
    const seasonalFactor = 1 + 0.2 * Math.sin((2 * Math.PI * offset) / 12);

    for (const product of products) {
      const units = Math.floor(product.baseVolume * trendFactor * seasonalFactor * uniform(random, 0.85, 1.15));
      const price = round2(product.basePrice * uniform(random, 0.95, 1.05));
      rows.push({ date, model: product.id, units_sold: units, avg_price: price });
    }
  }

  return { columns: [...SAMPLE_COLUMNS], rows };
}

export function sampleDataToCsv(table: RawTable): string {
  const rows = table.rows.map((row) =>
    table.columns.map((column) => {
      const value = row[column];
      return value instanceof Date ? value.toISOString() : value;
    }),
  );
  return generateCSV(table.columns, rows);
}
