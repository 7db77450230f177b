/**
 * TimeSeries Tests
 *
 * Construction, strict arithmetic and range queries.
 */

import { describe, it, expect } from 'vitest';
import { ImpactModelError, isImpactModelError } from './errors.js';
import { TimeSeries } from './timeseries.js';

const tam = () => TimeSeries.fromRecord('tam', 'TWh', { 2020: 100, 2021: 110, 2022: 120 });

function thrown(fn: () => unknown): ImpactModelError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ImpactModelError) return err;
    throw err;
  }
  throw new Error('expected an ImpactModelError');
}

describe('construction', () => {
  it('builds from parallel arrays', () => {
    const s = TimeSeries.fromArrays('a', 'TWh', [2020, 2021], [1, 2]);
    expect(s.years()).toEqual([2020, 2021]);
    expect(s.values()).toEqual([1, 2]);
    expect(s.name).toBe('a');
    expect(s.unit).toBe('TWh');
  });

  it('sorts records and points by year', () => {
    const s = TimeSeries.fromPoints('p', 'u', [
      { year: 2022, value: 3 },
      { year: 2020, value: 1 },
      { year: 2021, value: 2 },
    ]);
    expect(s.years()).toEqual([2020, 2021, 2022]);
    expect(s.values()).toEqual([1, 2, 3]);
  });

  it('rejects duplicate, descending and fractional years', () => {
    const err = thrown(() => TimeSeries.fromArrays('bad', 'u', [2020, 2020, 2019, 2021.5], [1, 2, 3, 4]));
    expect(err.kind).toBe('InvalidSeries');
    expect(err.details.problems).toEqual([
      'duplicate year 2020',
      'year 2019 follows 2020 (years must ascend)',
      'year 2021.5 is not an integer',
    ]);
  });

  it('rejects non-finite values and length mismatches', () => {
    const err = thrown(() => TimeSeries.fromArrays('bad', 'u', [2020, 2021], [NaN]));
    expect(err.details.problems).toEqual([
      '2 years but 1 values',
      'value for 2020 is not finite (NaN)',
    ]);
  });

  it('builds constant and ranged series', () => {
    expect(TimeSeries.constant('c', 'u', [2020, 2025], 7).values()).toEqual([7, 7]);
    const r = TimeSeries.range('r', 'u', 2020, 2023, y => y - 2020);
    expect(r.years()).toEqual([2020, 2021, 2022, 2023]);
    expect(r.values()).toEqual([0, 1, 2, 3]);
  });

  it('allows an empty series', () => {
    const s = TimeSeries.fromArrays('empty', 'u', [], []);
    expect(s.length).toBe(0);
    expect(s.firstYear).toBeUndefined();
    expect(s.peak()).toBeNull();
  });

  it('is frozen', () => {
    expect(Object.isFrozen(tam())).toBe(true);
    expect(Object.isFrozen(tam().values())).toBe(true);
  });
});

describe('valueAt', () => {
  it('returns present years', () => {
    expect(tam().valueAt(2021)).toBe(110);
  });

  it('throws MissingYear for absent years by default', () => {
    const err = thrown(() => tam().valueAt(2030));
    expect(err.kind).toBe('MissingYear');
    expect(err.details).toEqual({ series: 'tam', year: 2030 });
  });

  it('interpolates interior gaps under the linear policy only', () => {
    const s = TimeSeries.fromRecord('gappy', 'u', { 2020: 0, 2024: 40 });
    expect(s.valueAt(2021, 'linear')).toBe(10);
    expect(isImpactModelError(thrown(() => s.valueAt(2021)), 'MissingYear')).toBe(true);
    expect(isImpactModelError(thrown(() => s.valueAt(2025, 'linear')), 'MissingYear')).toBe(true);
  });
});

describe('arithmetic', () => {
  it('adds and subtracts aligned series', () => {
    const adoption = TimeSeries.fromRecord('adoption', 'TWh', { 2020: 10, 2021: 20, 2022: 30 });
    const diff = tam().subtract(adoption);
    expect(diff.values()).toEqual([90, 90, 90]);
    expect(diff.name).toBe('tam - adoption');
    expect(tam().add(adoption, { name: 'total' }).values()).toEqual([110, 130, 150]);
  });

  it('refuses to combine different units', () => {
    const other = TimeSeries.fromRecord('other', 'PJ', { 2020: 1, 2021: 1, 2022: 1 });
    const err = thrown(() => tam().subtract(other));
    expect(err.kind).toBe('UnitMismatch');
    expect(err.details).toEqual({ left: 'tam', leftUnit: 'TWh', right: 'other', rightUnit: 'PJ' });
  });

  it('refuses to combine different year sets', () => {
    const short = TimeSeries.fromRecord('short', 'TWh', { 2020: 1, 2021: 1 });
    expect(thrown(() => tam().add(short)).kind).toBe('YearRangeMismatch');
  });

  it('checks units before years', () => {
    const both = TimeSeries.fromRecord('both', 'PJ', { 2020: 1 });
    expect(thrown(() => tam().add(both)).kind).toBe('UnitMismatch');
  });

  it('scales by a scalar or a series', () => {
    expect(tam().scale(2).values()).toEqual([200, 220, 240]);
    const factor = TimeSeries.fromRecord('ef', 'tCO2/TWh', { 2020: 1, 2021: 2, 2022: 3 });
    const scaled = tam().scale(factor);
    expect(scaled.values()).toEqual([100, 220, 360]);
    expect(scaled.unit).toBe('tCO2/TWh*TWh');
  });

  it('floors values and snaps residues within epsilon', () => {
    const s = TimeSeries.fromArrays('r', 'u', [2020, 2021, 2022], [-5, 1e-12, 3]);
    expect(s.clampMin(0, 1e-9).values()).toEqual([0, 0, 3]);
    expect(s.clampMin(0).values()).toEqual([0, 1e-12, 3]);
  });

  it('never mutates its operands', () => {
    const a = tam();
    a.scale(3);
    a.clampMin(105);
    expect(a.values()).toEqual([100, 110, 120]);
  });
});

describe('queries', () => {
  it('slices an inclusive window', () => {
    expect(tam().slice({ startYear: 2021 }).years()).toEqual([2021, 2022]);
    expect(tam().slice({ startYear: 2019, endYear: 2020 }).values()).toEqual([100]);
    expect(tam().slice({ startYear: 2030 }).length).toBe(0);
  });

  it('sums, averages and accumulates', () => {
    expect(tam().sum()).toBe(330);
    expect(tam().sum({ endYear: 2021 })).toBe(210);
    expect(tam().mean({ startYear: 2021 })).toBe(115);
    expect(tam().mean({ startYear: 2030 })).toBeNaN();
    const c = tam().cumulative();
    expect(c.values()).toEqual([100, 210, 330]);
    expect(c.name).toBe('cumulative tam');
  });

  it('finds extremes and threshold crossings', () => {
    const s = TimeSeries.fromRecord('s', 'u', { 2020: 5, 2021: -2, 2022: 8, 2023: -2 });
    expect(s.peak()).toEqual({ year: 2022, value: 8 });
    expect(s.trough()).toEqual({ year: 2021, value: -2 });
    expect(s.firstYearBelow(0)).toBe(2021);
    expect(s.firstYearAbove(6)).toBe(2022);
    expect(s.firstYearAbove(100)).toBeNull();
  });

  it('annualizes growth across gaps', () => {
    const s = TimeSeries.fromRecord('g', 'u', { 2020: 100, 2022: 121, 2023: 0, 2024: 5 });
    const rates = s.growthRates();
    expect(rates.map(r => r.year)).toEqual([2022, 2023, 2024]);
    expect(rates[0].rate).toBeCloseTo(0.1, 12);
    expect(rates[1].rate).toBe(-1);
    expect(rates[2].rate).toBeNull();
  });

  it('compares by unit, years and values, ignoring the name', () => {
    expect(tam().equals(tam().rename('other'))).toBe(true);
    expect(tam().equals(tam().scale(1, { unit: 'PJ' }))).toBe(false);
    expect(tam().toRecord()).toEqual({ 2020: 100, 2021: 110, 2022: 120 });
  });
});
