/**
 * Scenario
 *
 * One projected adoption trajectory for a solution, compared against the
 * solution's reference scenario. Every solution uses this same shape;
 * only the data differs.
 *
 * A scenario owns its projected trajectory and its coefficient mapping.
 * Market and reference scenario are shared with the solution and held by
 * reference. Nothing derived is cached here.
 */

import { InvalidDefinitionError } from '../framework/errors.js';
import { TimeSeries } from '../framework/timeseries.js';
import { Unit, Year, YearWindow } from '../framework/types.js';
import { AdoptionTrajectory } from './adoption.js';
import { Market } from './market.js';
import { ReferenceScenario } from './reference.js';

/** A per-unit coefficient: constant, or changing over time */
export type Coefficient = number | TimeSeries;

/**
 * Per-unit coefficients of one metric, e.g. emissions per functional unit
 * for the solution and for the conventional mix it displaces.
 */
export interface CoefficientPair {
  solution: Coefficient;
  conventional: Coefficient;
  /** Unit of the resulting metric trajectory (e.g. 'tCO2') */
  unit?: Unit;
  description?: string;
  /** Free-form provenance, e.g. { source: 'PMA 2020', choice: 'high' } */
  meta?: Readonly<Record<string, string>>;
}

/**
 * Metric name -> coefficients.
 *
 * A Map keeps insertion order for every key. A plain object lists
 * integer-like keys ('2', '10') first in ascending order, before all
 * other keys; use a Map when such metric names must keep their place.
 */
export type CoefficientTable =
  | Readonly<Record<string, CoefficientPair>>
  | ReadonlyMap<string, CoefficientPair>;

export interface ScenarioInit {
  name: string;
  description?: string;
  market: Market;
  projected: AdoptionTrajectory;
  reference: ReferenceScenario;
  /** Key order is the metric order */
  coefficients: CoefficientTable;
  /** First year of reported results (defaults to the first market year) */
  reportStartYear?: Year;
  /** Last year of reported results (defaults to the last market year) */
  reportEndYear?: Year;
}

export class Scenario {
  readonly name: string;
  readonly description: string;
  readonly market: Market;
  readonly projected: AdoptionTrajectory;
  readonly reference: ReferenceScenario;
  readonly coefficients: ReadonlyMap<string, Readonly<CoefficientPair>>;
  readonly reportStartYear: Year | undefined;
  readonly reportEndYear: Year | undefined;

  constructor(init: ScenarioInit) {
    if (init.projected.role !== 'PROJECTED') {
      throw new InvalidDefinitionError(init.projected.name, [
        `scenario '${init.name}' needs a PROJECTED trajectory, got ${init.projected.role}`,
      ]);
    }
    if (init.reference.market !== init.market && !init.reference.market.series.equals(init.market.series)) {
      throw new InvalidDefinitionError(init.name, [
        `reference scenario '${init.reference.name}' is measured against market '${init.reference.market.name}', not '${init.market.name}'`,
      ]);
    }

    this.name = init.name;
    this.description = init.description ?? '';
    this.market = init.market;
    this.projected = init.projected;
    this.reference = init.reference;
    this.coefficients = new Map(
      coefficientEntries(init.coefficients).map(
        ([metric, pair]): [string, Readonly<CoefficientPair>] => [metric, Object.freeze({ ...pair })]
      )
    );
    this.reportStartYear = init.reportStartYear ?? init.market.series.firstYear;
    this.reportEndYear = init.reportEndYear ?? init.market.series.lastYear;
    Object.freeze(this);
  }

  /**
   * Metric names in declaration order.
   */
  metricNames(): string[] {
    return [...this.coefficients.keys()];
  }

  coefficientsFor(metric: string): Readonly<CoefficientPair> | undefined {
    return this.coefficients.get(metric);
  }

  reportWindow(): YearWindow {
    return { startYear: this.reportStartYear, endYear: this.reportEndYear };
  }
}

function isCoefficientMap(table: CoefficientTable): table is ReadonlyMap<string, CoefficientPair> {
  return table instanceof Map;
}

function coefficientEntries(table: CoefficientTable): Array<[string, CoefficientPair]> {
  return isCoefficientMap(table) ? [...table.entries()] : Object.entries(table);
}
