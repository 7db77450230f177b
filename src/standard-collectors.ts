/**
 * Standard Impact Collectors
 *
 * Domain-specific summary of an Impact over its scenario's report window.
 * Domain-independent aggregation lives in ./framework/collectors.ts.
 */

import { CollectedValue, MetricDef, collectMetrics } from './framework/collectors.js';
import { Point, Year, YearWindow } from './framework/types.js';
import { Impact } from './modules/impact-engine.js';

export const impactSummaryCollectors: readonly MetricDef[] = [
  { as: 'cumulative', aggregator: 'sum' },
  { as: 'final', aggregator: 'last' },
  { as: 'mean', aggregator: 'mean' },
  { as: 'peak', aggregator: { peak: true } },
  { as: 'trough', aggregator: { trough: true } },
  { as: 'firstYearNegative', aggregator: { firstBelow: 0 } },
];

export interface ImpactSummary {
  metric: string;
  scenario: string;
  unit: string;
  window: YearWindow;
  /** Sum of impact across the window */
  cumulative: number;
  /** Impact in the last window year */
  final: number;
  mean: number;
  /** Largest increase over the reference */
  peak: Point | null;
  /** Largest reduction below the reference */
  trough: Point | null;
  /** First year the scenario falls below the reference */
  firstYearNegative: Year | null;
}

/**
 * Summarize an impact over a window (defaults to the whole series).
 */
export function summarizeImpact(impact: Impact, window: YearWindow = {}): ImpactSummary {
  const m = collectMetrics(impact.series, impactSummaryCollectors, window);
  return {
    metric: impact.metric,
    scenario: impact.scenario,
    unit: impact.unit,
    window,
    cumulative: asNumber(m.cumulative),
    final: asNumber(m.final),
    mean: asNumber(m.mean),
    peak: asPoint(m.peak),
    trough: asPoint(m.trough),
    firstYearNegative: typeof m.firstYearNegative === 'number' ? m.firstYearNegative : null,
  };
}

function asNumber(v: CollectedValue | undefined): number {
  return typeof v === 'number' ? v : NaN;
}

function asPoint(v: CollectedValue | undefined): Point | null {
  return v !== null && v !== undefined && typeof v === 'object' ? v : null;
}
