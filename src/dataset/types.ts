/**
 * Sales Dataset Types
 */

// =============================================================================
// RAW INPUT
// =============================================================================

export type RawValue = string | number | Date | null | undefined;

export type RawRow = Record<string, RawValue>;

export interface RawTable {
  /** Header names in source order */
  columns: string[];
  rows: RawRow[];
}

/**
 * Names of the raw columns holding each required field.
 */
export interface ColumnSchema {
  date: string;
  productId: string;
  unitsSold: string;
  avgPrice: string;
}

export const DEFAULT_COLUMN_SCHEMA: Readonly<ColumnSchema> = Object.freeze({
  date: 'date',
  productId: 'model',
  unitsSold: 'units_sold',
  avgPrice: 'avg_price',
});

// =============================================================================
// CLEANED RECORDS
// =============================================================================

export interface SalesRecord {
  /** UTC calendar day, YYYY-MM-DD */
  date: string;
  /** Epoch ms of the start of `date` (UTC) */
  timestamp: number;
  productId: string;
  unitsSold: number;
  avgPrice: number;
}

export interface CleanedRecord extends SalesRecord {
  revenue: number;
  year: number;
  month: number;      // 1-12
  quarter: number;    // 1-4
}

// =============================================================================
// CLEANING AUDIT
// =============================================================================

export type CleaningStepName =
  | 'parse-dates'
  | 'sort-by-date'
  | 'drop-missing'
  | 'drop-duplicates'
  | 'coerce-numeric'
  | 'drop-non-positive'
  | 'derive-fields';

export type DropReason =
  | 'invalid_date'
  | 'missing_value'
  | 'duplicate'
  | 'non_numeric'
  | 'non_positive'
  | 'none';

export interface StepOutcome {
  step: CleaningStepName;
  reason: DropReason;
  dropped: number;
}

export interface CleaningReport {
  inputRows: number;
  outputRows: number;
  steps: readonly Readonly<StepOutcome>[];
}

export interface CleanedDataset {
  readonly records: readonly Readonly<CleanedRecord>[];
  readonly report: Readonly<CleaningReport>;
}

// =============================================================================
// VALIDATION & SUMMARY
// =============================================================================

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

export interface DatasetSummary {
  totalRows: number;
  dateRange: { start: string; end: string } | null;
  products: number;
  totalUnitsSold: number;
  totalRevenue: number;
  avgPrice: number;
}
