/**
 * Market (Total Addressable Market)
 *
 * Total demand for the good or service a solution addresses, independent
 * of any adoption. Owned by the solution definition and shared read-only
 * by every scenario and by the reference scenario.
 */

import { TimeSeries } from '../framework/timeseries.js';
import { Unit, Year } from '../framework/types.js';

export class Market {
  readonly series: TimeSeries;

  constructor(series: TimeSeries) {
    this.series = series;
    Object.freeze(this);
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

  /**
   * Demand in a year. Throws MissingYear if the year is not covered.
   */
  demandAt(year: Year): number {
    return this.series.valueAt(year);
  }

  /**
   * Years where demand grows faster than `maxAnnualGrowth` or shrinks
   * faster than `-maxAnnualGrowth` (informational).
   */
  growthOutliers(maxAnnualGrowth: number): Array<{ year: Year; rate: number }> {
    const out: Array<{ year: Year; rate: number }> = [];
    for (const { year, rate } of this.series.growthRates()) {
      if (rate !== null && Math.abs(rate) > maxAnnualGrowth) {
        out.push({ year, rate });
      }
    }
    return out;
  }
}
