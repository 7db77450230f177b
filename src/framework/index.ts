/**
 * Framework barrel export.
 *
 * All generic, domain-independent primitives: series, units, alignment,
 * errors, options merging and summary collectors.
 * Domain types (Market, Scenario, etc.) live in ../modules/.
 */

export * from './types.js';
export * from './errors.js';
export * from './alignment.js';
export * from './timeseries.js';
export * from './units.js';
export * from './unit-aligner.js';
export * from './series-input.js';
export * from './validated-merge.js';
export { aggregate, collectMetrics } from './collectors.js';
export type { MetricAggregator, MetricDef, CollectedValue } from './collectors.js';
