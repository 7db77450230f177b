/**
 * Approximate value comparison
 */

import { TimeSeries } from '../framework/timeseries.js';
import { isMissing } from './stats.js';

export interface ValueEqOptions {
  /** Treat NaN, null and undefined as zero (default true) */
  allZero?: boolean;
  /** Absolute tolerance (default 1e-6) */
  thresh?: number;
  /** Relative tolerance (default 1e-6) */
  rel?: number;
}

/**
 * True if `a` equals or is very close to `b`.
 *
 * With allZero (the default), missing values count as zero. Without it,
 * two missing values are equal to each other and nothing else.
 */
export function valueEq(
  a: number | null | undefined,
  b: number | null | undefined,
  options: ValueEqOptions = {}
): boolean {
  const { allZero = true, thresh = 1e-6, rel = 1e-6 } = options;

  if (allZero) {
    a = isMissing(a) ? 0 : a;
    b = isMissing(b) ? 0 : b;
  }

  if (a === undefined || a === null || b === undefined || b === null) return a === b;
  if (Number.isNaN(a) || Number.isNaN(b)) return Number.isNaN(a) && Number.isNaN(b);

  if (a === b) return true;
  return Math.abs(a - b) <= Math.max(thresh, rel * Math.abs(b));
}

/**
 * Two series with the same unit and years whose values are pairwise valueEq.
 */
export function seriesValueEq(a: TimeSeries, b: TimeSeries, options: ValueEqOptions = {}): boolean {
  if (!a.alignedWith(b)) return false;
  const bv = b.values();
  return a.values().every((v, i) => valueEq(v, bv[i], options));
}
