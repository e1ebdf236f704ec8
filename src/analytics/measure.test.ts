import { describe, it, expect } from 'vitest';
import {
  UNDEFINED,
  defined,
  isDefined,
  mean,
  meanOfDefined,
  pctChange,
  pctChangeSeries,
  sampleStdDev,
  valueOrNull,
} from './measure';

describe('pctChange', () => {
  it('computes percentage change from the previous value', () => {
    expect(pctChange(100, 150)).toEqual({ defined: true, value: 50 });
    expect(valueOrNull(pctChange(50, 40))).toBeCloseTo(-20, 10);
  });

  it('is undefined when the previous value is zero', () => {
    expect(pctChange(0, 5)).toEqual(UNDEFINED);
  });

  it('is undefined for non-finite inputs', () => {
    expect(pctChange(Number.NaN, 5).defined).toBe(false);
    expect(pctChange(5, Number.POSITIVE_INFINITY).defined).toBe(false);
  });

  it('reports zero change as a defined zero', () => {
    expect(pctChange(150, 150)).toEqual({ defined: true, value: 0 });
  });
});

describe('pctChangeSeries', () => {
  it('leaves the first period undefined', () => {
    const series = pctChangeSeries([100, 110, 99]);
    expect(series[0].defined).toBe(false);
    expect(valueOrNull(series[1])).toBeCloseTo(10, 10);
    expect(valueOrNull(series[2])).toBeCloseTo(-10, 10);
  });

  it('returns an empty series for no values', () => {
    expect(pctChangeSeries([])).toEqual([]);
  });
});

describe('meanOfDefined', () => {
  it('averages only the defined measures', () => {
    expect(meanOfDefined([UNDEFINED, defined(10), defined(20)])).toEqual({ defined: true, value: 15 });
  });

  it('is undefined rather than zero when nothing is defined', () => {
    const result = meanOfDefined([UNDEFINED]);
    expect(result.defined).toBe(false);
    expect(valueOrNull(result)).toBeNull();
    expect(meanOfDefined([]).defined).toBe(false);
  });
});

describe('sampleStdDev', () => {
  it('uses the n - 1 denominator', () => {
    // Mean 5, squared deviations sum to 32, 32 / 7
    expect(valueOrNull(sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9]))).toBeCloseTo(Math.sqrt(32 / 7), 10);
  });

  it('is undefined for a single value', () => {
    expect(sampleStdDev([42]).defined).toBe(false);
  });

  it('is zero for identical values', () => {
    expect(sampleStdDev([3, 3, 3])).toEqual({ defined: true, value: 0 });
  });
});

describe('defined / isDefined', () => {
  it('turns non-finite numbers into the undefined marker', () => {
    expect(defined(Number.NaN)).toEqual(UNDEFINED);
    expect(isDefined(defined(1))).toBe(true);
    expect(isDefined(UNDEFINED)).toBe(false);
  });

  it('mean of an empty list is zero', () => {
    expect(mean([])).toBe(0);
  });
});
