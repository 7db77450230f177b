/**
 * UnitAligner
 *
 * Brings two series onto one canonical year range and one unit before
 * arithmetic. The right-hand series is converted into the left-hand
 * unit through declared conversions only; undeclared unit pairs fail.
 *
 * Policies:
 * - intersection (default): keep only years both series have
 * - union: keep every year either has. Years outside a series' own
 *   range are filled at the edges: 'forward' repeats its nearest value
 *   (first value before it starts, last value after it ends), 'zero'
 *   uses 0. Gaps inside its range are interpolated linearly under
 *   either fill.
 *
 * Under either policy, two series with no year in common fail with
 * EmptyIntersection.
 */

import { EmptyIntersectionError, IncompatibleUnitsError } from './errors.js';
import { TimeSeries } from './timeseries.js';
import { AlignmentPolicy, FillPolicy, ParamMeta, Unit, ValidationResult, Year } from './types.js';
import { UnitRegistry } from './units.js';
import { checkRanges, validatedMerge } from './validated-merge.js';

// =============================================================================
// OPTIONS
// =============================================================================

export interface AlignerOptions {
  /** Common-range policy */
  policy: AlignmentPolicy;
  /** Edge fill under the union policy */
  fill: FillPolicy;
  /** Declared unit conversions */
  units: UnitRegistry;
}

export const alignerDefaults: AlignerOptions = {
  policy: 'intersection',
  fill: 'forward',
  units: UnitRegistry.empty(),
};

export const alignerMeta: Partial<Record<keyof AlignerOptions, ParamMeta>> = {
  policy: {
    description: "Common year range: 'intersection' keeps shared years, 'union' keeps all years and fills gaps.",
    unit: 'enum',
  },
  fill: {
    description: "Edge fill under 'union': repeat the nearest value, or use zero.",
    unit: 'enum',
  },
};

export function validateAlignerOptions(options: AlignerOptions): ValidationResult {
  const result = checkRanges(options, alignerMeta);
  if (options.policy !== 'intersection' && options.policy !== 'union') {
    result.errors.push(`policy must be 'intersection' or 'union', got '${String(options.policy)}'`);
  }
  if (options.fill !== 'forward' && options.fill !== 'zero') {
    result.errors.push(`fill must be 'forward' or 'zero', got '${String(options.fill)}'`);
  }
  if (options.policy === 'intersection' && options.fill !== alignerDefaults.fill) {
    result.warnings.push(`fill '${options.fill}' has no effect under the intersection policy`);
  }
  result.valid = result.errors.length === 0;
  return result;
}

export function mergeAlignerOptions(partial: Partial<AlignerOptions> = {}): AlignerOptions {
  return validatedMerge(
    'unit-aligner',
    validateAlignerOptions,
    p => ({ ...alignerDefaults, ...p }),
    partial
  );
}

// =============================================================================
// ALIGNER
// =============================================================================

export interface AlignedPair {
  years: readonly Year[];
  unit: Unit;
  left: TimeSeries;
  right: TimeSeries;
}

export class UnitAligner {
  readonly options: AlignerOptions;

  constructor(options: Partial<AlignerOptions> = {}) {
    this.options = mergeAlignerOptions(options);
  }

  /**
   * Convert a series into `unit`. Identity when units already match.
   */
  convert(series: TimeSeries, unit: Unit): TimeSeries {
    if (series.unit === unit) return series;
    const factor = this.options.units.factor(series.unit, unit);
    if (factor === undefined) {
      throw new IncompatibleUnitsError(series.unit, unit);
    }
    return series.scale(factor, { unit });
  }

  /**
   * Align `b` to `a`: common years per policy, `b` expressed in `a`'s unit.
   */
  align(a: TimeSeries, b: TimeSeries): AlignedPair {
    const right = this.convert(b, a.unit);

    const shared = a.years().filter(y => right.has(y));
    if (shared.length === 0) {
      throw new EmptyIntersectionError(a.name, b.name);
    }

    const years = this.options.policy === 'intersection'
      ? shared
      : [...new Set([...a.years(), ...right.years()])].sort((x, y) => x - y);

    return {
      years,
      unit: a.unit,
      left: this.reindex(a, years),
      right: this.reindex(right, years),
    };
  }

  private reindex(series: TimeSeries, years: readonly Year[]): TimeSeries {
    const values = series.values();
    const own = series.years();
    const first = own[0];
    const last = own[own.length - 1];

    const out = years.map(year => {
      if (year >= first && year <= last) return series.valueAt(year, 'linear');
      if (this.options.fill === 'zero') return 0;
      return year < first ? values[0] : values[values.length - 1];
    });

    return TimeSeries.fromArrays(series.name, series.unit, years, out);
  }
}
