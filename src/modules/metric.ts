/**
 * Metric computation
 *
 * metric(year) = solution(year) × adoption(year)
 *              + conventional(year) × conventionalShare(year)
 *
 * Coefficients are constants or series. A series coefficient must have a
 * value for every adoption year; nothing is interpolated here.
 */

import { assertAligned } from '../framework/alignment.js';
import { MissingCoefficientYearError } from '../framework/errors.js';
import { TimeSeries } from '../framework/timeseries.js';
import { Unit, Year } from '../framework/types.js';
import { Coefficient, CoefficientPair } from './scenario.js';

/**
 * Per-year coefficient values over `years`.
 *
 * @throws MissingCoefficientYear listing every uncovered year
 */
export function resolveCoefficient(
  coefficient: Coefficient,
  years: readonly Year[],
  metric: string,
  role: 'solution' | 'conventional'
): number[] {
  if (typeof coefficient === 'number') {
    return years.map(() => coefficient);
  }
  const missing = years.filter(y => !coefficient.has(y));
  if (missing.length > 0) {
    throw new MissingCoefficientYearError(metric, role, missing);
  }
  return years.map(y => coefficient.valueAt(y));
}

/**
 * Unit of a metric trajectory: the declared unit, otherwise the
 * coefficient unit times the adoption unit.
 */
export function metricUnit(coefficients: CoefficientPair, adoptionUnit: Unit): Unit {
  if (coefficients.unit) return coefficients.unit;
  const series = [coefficients.solution, coefficients.conventional].find(
    (c): c is TimeSeries => typeof c !== 'number'
  );
  return series ? `${series.unit}*${adoptionUnit}` : adoptionUnit;
}

/**
 * Metric trajectory for one adoption trajectory and its conventional share.
 *
 * @throws UnitMismatch / YearRangeMismatch when adoption and conventional differ
 * @throws MissingCoefficientYear when a series coefficient has gaps
 */
export function computeMetric(
  adoption: TimeSeries,
  conventional: TimeSeries,
  coefficients: CoefficientPair,
  metric: string = 'metric'
): TimeSeries {
  assertAligned(adoption, conventional);

  const years = adoption.years();
  const sol = resolveCoefficient(coefficients.solution, years, metric, 'solution');
  const conv = resolveCoefficient(coefficients.conventional, years, metric, 'conventional');
  const a = adoption.values();
  const c = conventional.values();

  return TimeSeries.fromArrays(
    `${metric} (${adoption.name})`,
    metricUnit(coefficients, adoption.unit),
    years,
    years.map((_, i) => sol[i] * a[i] + conv[i] * c[i])
  );
}
