/**
 * Adoption trajectories
 *
 * How much of the market the solution serves each year. Projected and
 * reference trajectories share one shape and differ only in their role.
 */

import { TimeSeries } from '../framework/timeseries.js';
import { Unit, Year } from '../framework/types.js';
import { Market } from './market.js';

export type AdoptionRole = 'PROJECTED' | 'REFERENCE';

/**
 * Soft-bound violation found by validateAgainst().
 *
 * - negative: adoption below zero; magnitude = -adoption
 * - exceeds-tam: adoption above demand; magnitude = adoption - demand
 * - missing-tam-year: the market has no value for this adoption year;
 *   magnitude = adoption
 */
export interface AdoptionWarning {
  year: Year;
  kind: 'negative' | 'exceeds-tam' | 'missing-tam-year';
  magnitude: number;
}

export class AdoptionTrajectory {
  readonly role: AdoptionRole;
  readonly series: TimeSeries;

  constructor(role: AdoptionRole, series: TimeSeries) {
    this.role = role;
    this.series = series;
    Object.freeze(this);
  }

  static projected(series: TimeSeries): AdoptionTrajectory {
    return new AdoptionTrajectory('PROJECTED', series);
  }

  static reference(series: TimeSeries): AdoptionTrajectory {
    return new AdoptionTrajectory('REFERENCE', series);
  }

  get name(): string {
    return this.series.name;
  }

  get unit(): Unit {
    return this.series.unit;
  }

  years(): readonly Year[] {
    return this.series.years();
  }

  valueAt(year: Year): number {
    return this.series.valueAt(year);
  }

  /**
   * Check 0 <= adoption <= demand for every adoption year.
   *
   * Never throws: real input data can transiently break the bound, so
   * violations are returned for the caller to judge.
   */
  validateAgainst(market: Market): AdoptionWarning[] {
    const warnings: AdoptionWarning[] = [];

    for (const { year, value } of this.series.entries()) {
      if (value < 0) {
        warnings.push({ year, kind: 'negative', magnitude: -value });
        continue;
      }
      if (!market.series.has(year)) {
        warnings.push({ year, kind: 'missing-tam-year', magnitude: value });
        continue;
      }
      const demand = market.demandAt(year);
      if (value > demand) {
        warnings.push({ year, kind: 'exceeds-tam', magnitude: value - demand });
      }
    }

    return warnings;
  }
}
