/**
 * Error types
 *
 * Every failure the engine reports is an ImpactModelError with a `kind`
 * discriminant. Nothing is recovered locally: lookups, arithmetic and
 * impact computation throw, batch operations collect.
 */

import { Unit, Year } from './types.js';

export type ErrorKind =
  | 'MissingYear'
  | 'UnitMismatch'
  | 'YearRangeMismatch'
  | 'IncompatibleUnits'
  | 'EmptyIntersection'
  | 'InconsistentHorizon'
  | 'MissingCoefficientYear'
  | 'UnknownMetric'
  | 'UnknownScenario'
  | 'InvalidSeries'
  | 'InvalidDefinition'
  | 'InvalidOptions';

export class ImpactModelError extends Error {
  public readonly kind: ErrorKind;
  public readonly details: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.details = details;
  }
}

export class MissingYearError extends ImpactModelError {
  constructor(series: string, year: Year) {
    super('MissingYear', `Series '${series}' has no value for year ${year}`, { series, year });
  }
}

export class UnitMismatchError extends ImpactModelError {
  constructor(left: string, leftUnit: Unit, right: string, rightUnit: Unit) {
    super(
      'UnitMismatch',
      `Cannot combine '${left}' (${leftUnit}) with '${right}' (${rightUnit})`,
      { left, leftUnit, right, rightUnit }
    );
  }
}

export class YearRangeMismatchError extends ImpactModelError {
  constructor(left: string, leftYears: readonly Year[], right: string, rightYears: readonly Year[]) {
    super(
      'YearRangeMismatch',
      `Year ranges differ: '${left}' ${describeYears(leftYears)} vs '${right}' ${describeYears(rightYears)}`,
      { left, right, leftYears: [...leftYears], rightYears: [...rightYears] }
    );
  }
}

export class IncompatibleUnitsError extends ImpactModelError {
  constructor(from: Unit, to: Unit) {
    super('IncompatibleUnits', `No declared conversion from '${from}' to '${to}'`, { from, to });
  }
}

export class EmptyIntersectionError extends ImpactModelError {
  constructor(left: string, right: string) {
    super('EmptyIntersection', `Series '${left}' and '${right}' share no years`, { left, right });
  }
}

export class InconsistentHorizonError extends ImpactModelError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('InconsistentHorizon', message, details);
  }
}

export class MissingCoefficientYearError extends ImpactModelError {
  constructor(metric: string, role: 'solution' | 'conventional', years: readonly Year[]) {
    super(
      'MissingCoefficientYear',
      `Metric '${metric}': ${role} coefficient has no value for ${years.length === 1 ? 'year' : 'years'} ${years.join(', ')}`,
      { metric, role, years: [...years] }
    );
  }
}

export class UnknownMetricError extends ImpactModelError {
  constructor(metric: string, available: readonly string[]) {
    super(
      'UnknownMetric',
      `Unknown metric '${metric}' (declared: ${available.join(', ') || 'none'})`,
      { metric, available: [...available] }
    );
  }
}

export class UnknownScenarioError extends ImpactModelError {
  constructor(solution: string, scenario: string) {
    super('UnknownScenario', `Solution '${solution}' has no scenario '${scenario}'`, { solution, scenario });
  }
}

export class InvalidSeriesError extends ImpactModelError {
  constructor(series: string, problems: readonly string[]) {
    super('InvalidSeries', `Invalid series '${series}':\n  ${problems.join('\n  ')}`, {
      series,
      problems: [...problems],
    });
  }
}

export class InvalidDefinitionError extends ImpactModelError {
  constructor(subject: string, problems: readonly string[]) {
    super('InvalidDefinition', `Invalid definition of '${subject}':\n  ${problems.join('\n  ')}`, {
      subject,
      problems: [...problems],
    });
  }
}

export class InvalidOptionsError extends ImpactModelError {
  constructor(component: string, problems: readonly string[]) {
    super('InvalidOptions', `[${component}] Invalid options:\n  ${problems.join('\n  ')}`, {
      component,
      problems: [...problems],
    });
  }
}

/**
 * Narrow an unknown thrown value, optionally to one kind.
 */
export function isImpactModelError(err: unknown, kind?: ErrorKind): err is ImpactModelError {
  return err instanceof ImpactModelError && (kind === undefined || err.kind === kind);
}

function describeYears(years: readonly Year[]): string {
  if (years.length === 0) return '[]';
  return `[${years[0]}..${years[years.length - 1]}] (${years.length} years)`;
}
