/**
 * Result Helpers
 *
 * Convenience functions for handing impact results to presentation code.
 */

import { TimeSeries } from './framework/timeseries.js';
import { Year } from './framework/types.js';
import { Impact, ImpactBatch } from './modules/impact-engine.js';

/**
 * Impact value for a specific year.
 *
 * @returns the value, or undefined if the year is not in the horizon
 */
export function getAtYear(impact: Impact, year: Year): number | undefined {
  return impact.series.has(year) ? impact.series.valueAt(year) : undefined;
}

/**
 * One row per year, one column per series: { year, [column]: value }.
 * Years are the union of all series; a series without a year leaves
 * its column out of that row.
 */
export function toRows(columns: Readonly<Record<string, TimeSeries>>): Array<Record<string, number>> {
  const years = new Set<Year>();
  for (const series of Object.values(columns)) {
    for (const y of series.years()) years.add(y);
  }

  return [...years]
    .sort((a, b) => a - b)
    .map(year => {
      const row: Record<string, number> = { year };
      for (const [name, series] of Object.entries(columns)) {
        if (series.has(year)) row[name] = series.valueAt(year);
      }
      return row;
    });
}

/**
 * Rows of every successful impact in a batch, keyed by metric name.
 */
export function batchToRows(batch: ImpactBatch): Array<Record<string, number>> {
  const columns: Record<string, TimeSeries> = {};
  for (const [metric, impact] of batch.impacts) {
    columns[metric] = impact.series;
  }
  return toRows(columns);
}
