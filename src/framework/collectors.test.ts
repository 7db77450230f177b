/**
 * Collector Tests
 *
 * Aggregators and windowed metric collection.
 */

import { describe, it, expect } from 'vitest';
import { aggregate, collectMetrics } from './collectors.js';
import { TimeSeries } from './timeseries.js';

const impact = TimeSeries.fromRecord('impact', 'tCO2', { 2020: 2, 2021: -1, 2022: -4, 2023: 3 });

describe('aggregate', () => {
  it('reduces with the named aggregators', () => {
    expect(aggregate(impact, 'sum')).toBe(0);
    expect(aggregate(impact, 'first')).toBe(2);
    expect(aggregate(impact, 'last')).toBe(3);
    expect(aggregate(impact, 'max')).toBe(3);
    expect(aggregate(impact, 'min')).toBe(-4);
    expect(aggregate(impact, 'mean')).toBe(0);
  });

  it('reduces with the structured aggregators', () => {
    expect(aggregate(impact, { peak: true })).toEqual({ year: 2023, value: 3 });
    expect(aggregate(impact, { trough: true })).toEqual({ year: 2022, value: -4 });
    expect(aggregate(impact, { firstBelow: 0 })).toBe(2021);
    expect(aggregate(impact, { firstAbove: 2 })).toBe(2023);
    expect(aggregate(impact, { custom: values => values.length })).toBe(4);
  });

  it('handles an empty series', () => {
    const empty = impact.slice({ startYear: 2030 });
    expect(aggregate(empty, 'sum')).toBe(0);
    expect(aggregate(empty, 'last')).toBeNaN();
    expect(aggregate(empty, { peak: true })).toBeNull();
  });
});

describe('collectMetrics', () => {
  it('applies each definition within the window', () => {
    const out = collectMetrics(
      impact,
      [
        { as: 'total', aggregator: 'sum' },
        { as: 'worst', aggregator: { trough: true } },
      ],
      { startYear: 2021, endYear: 2022 }
    );
    expect(out).toEqual({ total: -5, worst: { year: 2022, value: -4 } });
  });
});
