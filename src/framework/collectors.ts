/**
 * Declarative Summary Collection
 *
 * Collectors reduce a series to named summary metrics within a year
 * window. This file is domain-independent; the impact summary built on
 * it lives in ../standard-collectors.ts.
 *
 * Usage:
 *   const metrics = collectMetrics(series, [
 *     { as: 'total', aggregator: 'sum' },
 *     { as: 'peak', aggregator: { peak: true } },
 *   ], { startYear: 2020, endYear: 2050 });
 */

import { TimeSeries } from './timeseries.js';
import { Point, Year, YearWindow } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Metric aggregation types
 */
export type MetricAggregator =
  | 'sum'                                   // Total across the window
  | 'last'                                  // Value at final year
  | 'first'                                 // Value at first year
  | 'max'                                   // Maximum value
  | 'min'                                   // Minimum value
  | 'mean'                                  // Average value
  | { peak: true }                          // { year, value } of maximum
  | { trough: true }                        // { year, value } of minimum
  | { firstBelow: number }                  // First year strictly below threshold
  | { firstAbove: number }                  // First year strictly above threshold
  | { custom: (values: readonly number[], years: readonly Year[]) => number | Point | Year | null };

export interface MetricDef {
  as: string;
  aggregator: MetricAggregator;
}

export type CollectedValue = number | Point | Year | null;

// =============================================================================
// AGGREGATION
// =============================================================================

/**
 * Reduce a (windowed) series with one aggregator. An empty window sums
 * to 0, gives NaN for other numeric reductions and null for year/point
 * reductions.
 */
export function aggregate(series: TimeSeries, aggregator: MetricAggregator): CollectedValue {
  if (typeof aggregator === 'string') {
    return aggregateNamed(series, aggregator);
  }

  if ('peak' in aggregator) return series.peak();
  if ('trough' in aggregator) return series.trough();
  if ('firstBelow' in aggregator) return series.firstYearBelow(aggregator.firstBelow);
  if ('firstAbove' in aggregator) return series.firstYearAbove(aggregator.firstAbove);
  return aggregator.custom(series.values(), series.years());
}

function aggregateNamed(series: TimeSeries, aggregator: Extract<MetricAggregator, string>): number {
  const values = series.values();
  if (values.length === 0) return aggregator === 'sum' ? 0 : NaN;
  switch (aggregator) {
    case 'sum':
      return series.sum();
    case 'last':
      return values[values.length - 1];
    case 'first':
      return values[0];
    case 'max':
      return Math.max(...values);
    case 'min':
      return Math.min(...values);
    case 'mean':
      return series.mean();
  }
}

/**
 * Apply every metric definition to the series within the window.
 */
export function collectMetrics(
  series: TimeSeries,
  defs: readonly MetricDef[],
  window: YearWindow = {}
): Record<string, CollectedValue> {
  const windowed = series.slice(window);
  const out: Record<string, CollectedValue> = {};
  for (const def of defs) {
    out[def.as] = aggregate(windowed, def.aggregator);
  }
  return out;
}
