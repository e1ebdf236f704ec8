/**
 * Row-level cleaning steps
 *
 * Each step takes the surviving rows and returns the rows that pass it. The
 * order is fixed: later steps rely on fields filled in by earlier ones.
 */

import { parseCalendarDay, quarterOf, type CalendarDay } from './dates';
import type {
  CleanedRecord,
  CleaningStepName,
  ColumnSchema,
  DropReason,
  RawRow,
  RawValue,
} from './types';

export interface WorkingRow {
  /** Position in the raw input, used only for stable ordering */
  index: number;
  raw: RawRow;
  day: CalendarDay | null;
  productId: string | null;
  unitsSold: number | null;
  avgPrice: number | null;
}

export interface StepContext {
  schema: ColumnSchema;
  /** Raw column names in source order, used for duplicate detection */
  columns: string[];
}

export interface CleaningStep {
  name: CleaningStepName;
  /** Reason recorded against every row this step removes */
  reason: DropReason;
  apply(rows: WorkingRow[], ctx: StepContext): WorkingRow[];
}

// =============================================================================
// VALUE HELPERS
// =============================================================================

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function isMissing(value: RawValue): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim().length === 0;
  return Number.isNaN(value.getTime());
}

/**
 * Coerce a raw cell to a finite number. Currency symbols, thousands
 * separators and whitespace are stripped from strings.
 */
export function toNumber(value: RawValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const cleaned = value.replace(/[$€£,\s]/g, '');
  if (!NUMERIC.test(cleaned)) return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

function keyPart(value: RawValue): string {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'd:invalid' : `d:${value.toISOString()}`;
  if (typeof value === 'number') return `n:${value}`;
  return `s:${value}`;
}

function duplicateKey(row: WorkingRow, ctx: StepContext): string {
  const parts = ctx.columns.map((column) =>
    // Dates compare after parsing so "2022-1-5" and "2022-01-05" collide
    column === ctx.schema.date && row.day ? `d:${row.day.iso}` : keyPart(row.raw[column]),
  );
  return JSON.stringify(parts);
}

// =============================================================================
// STEPS
// =============================================================================

const parseDates: CleaningStep = {
  name: 'parse-dates',
  reason: 'invalid_date',
  apply(rows, ctx) {
    const out: WorkingRow[] = [];
    for (const row of rows) {
      const day = parseCalendarDay(row.raw[ctx.schema.date]);
      if (day) out.push({ ...row, day });
    }
    return out;
  },
};

const sortByDate: CleaningStep = {
  name: 'sort-by-date',
  reason: 'none',
  apply(rows) {
    return [...rows].sort((a, b) => {
      const diff = (a.day?.timestamp ?? 0) - (b.day?.timestamp ?? 0);
      return diff !== 0 ? diff : a.index - b.index;
    });
  },
};

const dropMissing: CleaningStep = {
  name: 'drop-missing',
  reason: 'missing_value',
  apply(rows, { schema }) {
    const out: WorkingRow[] = [];
    for (const row of rows) {
      const product = row.raw[schema.productId];
      if (isMissing(row.raw[schema.unitsSold]) || isMissing(row.raw[schema.avgPrice]) || isMissing(product)) {
        continue;
      }
      const productId = product instanceof Date ? product.toISOString() : String(product).trim();
      out.push({ ...row, productId });
    }
    return out;
  },
};

const dropDuplicates: CleaningStep = {
  name: 'drop-duplicates',
  reason: 'duplicate',
  apply(rows, ctx) {
    const seen = new Set<string>();
    const out: WorkingRow[] = [];
    for (const row of rows) {
      const key = duplicateKey(row, ctx);
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(row);
    }
    return out;
  },
};

const coerceNumeric: CleaningStep = {
  name: 'coerce-numeric',
  reason: 'non_numeric',
  apply(rows, { schema }) {
    const out: WorkingRow[] = [];
    for (const row of rows) {
      const unitsSold = toNumber(row.raw[schema.unitsSold]);
      const avgPrice = toNumber(row.raw[schema.avgPrice]);
      if (unitsSold === null || avgPrice === null) continue;
      out.push({ ...row, unitsSold, avgPrice });
    }
    return out;
  },
};

const dropNonPositive: CleaningStep = {
  name: 'drop-non-positive',
  reason: 'non_positive',
  apply(rows) {
    return rows.filter((row) => (row.unitsSold ?? 0) > 0 && (row.avgPrice ?? 0) > 0);
  },
};

/** Row-dropping steps in execution order. Field derivation runs after these. */
export const CLEANING_STEPS: readonly CleaningStep[] = [
  parseDates,
  sortByDate,
  dropMissing,
  dropDuplicates,
  coerceNumeric,
  dropNonPositive,
];

// =============================================================================
// DERIVATION
// =============================================================================

/**
 * Build the final record. Returns null only if an earlier step was skipped and
 * left a field unset.
 */
export function deriveRecord(row: WorkingRow): CleanedRecord | null {
  const { day, productId, unitsSold, avgPrice } = row;
  if (day === null || productId === null || unitsSold === null || avgPrice === null) {
    return null;
  }
  return {
    date: day.iso,
    timestamp: day.timestamp,
    productId,
    unitsSold,
    avgPrice,
    revenue: unitsSold * avgPrice,
    year: day.year,
    month: day.month,
    quarter: quarterOf(day.month),
  };
}
