/**
 * Summary statistics over a set of estimates
 *
 * Every function ignores missing entries (NaN, null, undefined) and returns
 * NaN when too few values remain to compute the statistic.
 */

export type MaybeNumber = number | null | undefined;

/** True for NaN, null and undefined */
export function isMissing(x: unknown): boolean {
  return x === null || x === undefined || (typeof x === 'number' && Number.isNaN(x));
}

export function filterMissing(vs: readonly MaybeNumber[]): number[] {
  const out: number[] = [];
  for (const v of vs) {
    if (typeof v === 'number' && !Number.isNaN(v)) out.push(v);
  }
  return out;
}

export function smin(vs: readonly MaybeNumber[]): number {
  const xs = filterMissing(vs);
  return xs.length ? Math.min(...xs) : NaN;
}

export function smax(vs: readonly MaybeNumber[]): number {
  const xs = filterMissing(vs);
  return xs.length ? Math.max(...xs) : NaN;
}

export function smean(vs: readonly MaybeNumber[]): number {
  const xs = filterMissing(vs);
  if (xs.length === 0) return NaN;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}

export function smedian(vs: readonly MaybeNumber[]): number {
  const xs = filterMissing(vs).sort((a, b) => a - b);
  if (xs.length === 0) return NaN;
  const mid = Math.floor(xs.length / 2);
  return xs.length % 2 === 1 ? xs[mid] : (xs[mid - 1] + xs[mid]) / 2;
}

/**
 * Quartile cut points [q25, q50, q75] using the exclusive method
 * (position i·(n+1)/4 in the sorted data, interpolated, clipped to the
 * data's first and last entries).
 */
export function quartiles(vs: readonly MaybeNumber[]): [number, number, number] {
  const xs = filterMissing(vs).sort((a, b) => a - b);
  const n = 4;
  const m = xs.length + 1;
  const result: number[] = [];
  for (let i = 1; i < n; i++) {
    let j = Math.floor((i * m) / n);
    j = j < 1 ? 1 : j > xs.length - 1 ? xs.length - 1 : j;
    const delta = i * m - j * n;
    result.push((xs[j - 1] * (n - delta) + xs[j] * delta) / n);
  }
  return [result[0], result[1], result[2]];
}

/** 25th percentile; needs more than two values */
export function s25(vs: readonly MaybeNumber[]): number {
  return filterMissing(vs).length > 2 ? quartiles(vs)[0] : NaN;
}

/** 75th percentile; needs more than two values */
export function s75(vs: readonly MaybeNumber[]): number {
  return filterMissing(vs).length > 2 ? quartiles(vs)[2] : NaN;
}

/**
 * Population variance. Estimates are usually the complete set of known
 * values for a quantity, not a sample of them.
 */
export function spvar(vs: readonly MaybeNumber[]): number {
  const xs = filterMissing(vs);
  if (xs.length === 0) return NaN;
  const mean = xs.reduce((a, b) => a + b, 0) / xs.length;
  return xs.reduce((acc, x) => acc + (x - mean) ** 2, 0) / xs.length;
}

/** Sample standard deviation; needs at least two values */
export function sstdev(vs: readonly MaybeNumber[]): number {
  const xs = filterMissing(vs);
  if (xs.length < 2) return NaN;
  const mean = xs.reduce((a, b) => a + b, 0) / xs.length;
  return Math.sqrt(xs.reduce((acc, x) => acc + (x - mean) ** 2, 0) / (xs.length - 1));
}

/**
 * mean - n·stdev, optionally floored at zero
 */
export function lowDev(vs: readonly MaybeNumber[], n: number = 1, minZero: boolean = false): number {
  const r = smean(vs) - n * sstdev(vs);
  return minZero && r < 0 ? 0 : r;
}

/**
 * mean + n·stdev
 */
export function highDev(vs: readonly MaybeNumber[], n: number = 1): number {
  return smean(vs) + n * sstdev(vs);
}

/**
 * Position of `v` within the estimates on a 0..1 scale.
 *
 * extended (default): linear interpolation between neighbouring sorted
 * estimates (min → 0, max → 1), continuing linearly past either end so
 * values outside the data give ranks below 0 or above 1.
 *
 * Not extended: the fraction of estimates strictly below `v`.
 */
export function percentileRank(vs: readonly MaybeNumber[], v: number, extended: boolean = true): number {
  const xs = filterMissing(vs).sort((a, b) => a - b);
  if (xs.length === 0) return NaN;

  if (!extended) {
    return xs.filter(x => x < v).length / xs.length;
  }

  const lo = xs[0];
  const hi = xs[xs.length - 1];
  const range = hi - lo;
  if (range === 0) {
    return v < lo ? 0 : v > hi ? 1 : 0.5;
  }
  if (v < lo) return (v - lo) / range;
  if (v > hi) return 1 + (v - hi) / range;

  const steps = xs.length - 1;
  for (let k = 0; k < steps; k++) {
    if (v >= xs[k] && v <= xs[k + 1]) {
      if (xs[k + 1] === xs[k]) return k / steps;
      return (k + (v - xs[k]) / (xs[k + 1] - xs[k])) / steps;
    }
  }
  return 1;
}
