/**
 * Statistics Tests
 *
 * Estimate summaries with missing entries, quartiles and percentile ranks.
 */

import { describe, it, expect } from 'vitest';
import {
  filterMissing,
  highDev,
  isMissing,
  lowDev,
  percentileRank,
  quartiles,
  s25,
  s75,
  smax,
  smean,
  smedian,
  smin,
  spvar,
  sstdev,
} from './stats.js';

describe('missing values', () => {
  it('treats NaN, null and undefined as missing', () => {
    expect([NaN, null, undefined, 0].map(isMissing)).toEqual([true, true, true, false]);
    expect(filterMissing([1, null, NaN, 2, undefined])).toEqual([1, 2]);
  });

  it('reports NaN as missing without treating it as null', () => {
    const v: number = NaN;
    expect(isMissing(v)).toBe(true);
    expect(typeof v).toBe('number');
    expect(filterMissing([NaN, 0, -0.5])).toEqual([0, -0.5]);
  });

  it('ignores missing entries in every statistic', () => {
    const vs = [3, null, 1, NaN, 2];
    expect(smin(vs)).toBe(1);
    expect(smax(vs)).toBe(3);
    expect(smean(vs)).toBe(2);
    expect(smedian(vs)).toBe(2);
  });

  it('returns NaN when nothing remains', () => {
    expect(smean([null, NaN])).toBeNaN();
    expect(smin([])).toBeNaN();
  });
});

describe('quantiles', () => {
  it('takes the mean of the middle pair for even counts', () => {
    expect(smedian([4, 1, 3, 2])).toBe(2.5);
  });

  it('uses the exclusive method', () => {
    expect(quartiles([1, 2, 3, 4, 5, 6, 7, 8])).toEqual([2.25, 4.5, 6.75]);
    expect(quartiles([40, 20, 30])).toEqual([20, 30, 40]);
  });

  it('needs more than two values for quartiles', () => {
    expect(s25([1, 2])).toBeNaN();
    expect(s75([1, 2, null])).toBeNaN();
    expect(s75([20, 30, 40])).toBe(40);
  });
});

describe('spread', () => {
  const vs = [2, 4, 4, 4, 5, 5, 7, 9];

  it('computes population variance and sample deviation', () => {
    expect(spvar(vs)).toBe(4);
    expect(sstdev(vs)).toBeCloseTo(Math.sqrt(32 / 7), 12);
    expect(sstdev([1])).toBeNaN();
  });

  it('derives low and high cases from the deviation', () => {
    expect(lowDev([1, 3])).toBeCloseTo(2 - Math.SQRT2, 12);
    expect(highDev([1, 3])).toBeCloseTo(2 + Math.SQRT2, 12);
    expect(lowDev([1, 3], 2, true)).toBe(0);
  });
});

describe('percentileRank', () => {
  const vs = [30, 10, 20];

  it('maps the data range onto 0..1', () => {
    expect(percentileRank(vs, 10)).toBe(0);
    expect(percentileRank(vs, 20)).toBe(0.5);
    expect(percentileRank(vs, 15)).toBe(0.25);
    expect(percentileRank(vs, 30)).toBe(1);
  });

  it('extends linearly beyond the data', () => {
    expect(percentileRank(vs, 0)).toBe(-0.5);
    expect(percentileRank(vs, 40)).toBe(1.5);
  });

  it('counts estimates below the value when not extended', () => {
    expect(percentileRank(vs, 25, false)).toBeCloseTo(2 / 3, 12);
  });

  it('places a single repeated estimate at the middle', () => {
    expect(percentileRank([5, 5], 5)).toBe(0.5);
    expect(percentileRank([5, 5], 6)).toBe(1);
  });
});
