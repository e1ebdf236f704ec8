/**
 * Measure - a number that may be explicitly absent
 *
 * Growth rates, averages of growth rates, standard deviations and stability
 * coefficients are all Measures. Absent means "no data", never zero.
 */

export type Measure =
  | { readonly defined: true; readonly value: number }
  | { readonly defined: false };

export const UNDEFINED: Measure = Object.freeze({ defined: false });

export function defined(value: number): Measure {
  return Number.isFinite(value) ? { defined: true, value } : UNDEFINED;
}

export function isDefined(m: Measure): m is { readonly defined: true; readonly value: number } {
  return m.defined;
}

/** Numeric value or null, for serialization and display. */
export function valueOrNull(m: Measure): number | null {
  return m.defined ? m.value : null;
}

// =============================================================================
// STATISTICS
// =============================================================================

export function sum(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0);
}

/** Arithmetic mean; 0 for an empty list. Callers guard emptiness where it matters. */
export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/**
 * Percentage change from `previous` to `current`. Undefined when the previous
 * value is zero or either side is not finite.
 */
export function pctChange(previous: number, current: number): Measure {
  if (!Number.isFinite(previous) || !Number.isFinite(current) || previous === 0) {
    return UNDEFINED;
  }
  return defined(((current - previous) / previous) * 100);
}

/** Period-over-period changes; the first element is always undefined. */
export function pctChangeSeries(values: readonly number[]): Measure[] {
  return values.map((v, i) => (i === 0 ? UNDEFINED : pctChange(values[i - 1], v)));
}

/** Mean of the defined measures, undefined when there are none. */
export function meanOfDefined(measures: readonly Measure[]): Measure {
  const values: number[] = [];
  for (const m of measures) {
    if (m.defined) values.push(m.value);
  }
  return values.length === 0 ? UNDEFINED : defined(mean(values));
}

/**
 * Sample standard deviation (Bessel's correction, n - 1). Undefined for fewer
 * than two values.
 */
export function sampleStdDev(values: readonly number[]): Measure {
  if (values.length < 2) return UNDEFINED;
  const avg = mean(values);
  const squares = values.reduce((s, v) => s + (v - avg) ** 2, 0);
  return defined(Math.sqrt(squares / (values.length - 1)));
}
