/**
 * solution-impact - scenario-versus-reference impact engine for climate solutions
 *
 * Main entry point for programmatic use.
 */

// Framework primitives
export * from './framework/index.js';

// Domain model
export { Market } from './modules/market.js';
export { AdoptionTrajectory } from './modules/adoption.js';
export type { AdoptionRole, AdoptionWarning } from './modules/adoption.js';
export { ReferenceScenario } from './modules/reference.js';
export { Scenario } from './modules/scenario.js';
export type { Coefficient, CoefficientPair, CoefficientTable, ScenarioInit } from './modules/scenario.js';

// Computation
export { deriveConventional, DEFAULT_FLOOR_EPSILON } from './modules/conventional.js';
export { computeMetric, resolveCoefficient, metricUnit } from './modules/metric.js';
export {
  ImpactEngine,
  computeImpact,
  computeImpactAll,
  engineDefaults,
  engineMeta,
  mergeEngineOptions,
  validateEngineOptions,
} from './modules/impact-engine.js';
export type { EngineOptions, Impact, ImpactBatch, ImpactOutcome, ImpactWarnings } from './modules/impact-engine.js';

// Solutions
export { Solution, defineSolution, mergeCoefficients, deltaCoefficients, SolutionInputSchema } from './solution.js';
export type { SolutionInput, ScenarioDefinition } from './solution.js';

// Parameter meta-analysis
export { ParameterMetaAnalysis } from './modules/meta-analysis.js';
export type { Estimate, MetaAnalysisInput, Quantiles, LowMeanHigh, CoefficientChoice } from './modules/meta-analysis.js';

// Summaries and result helpers
export { summarizeImpact, impactSummaryCollectors } from './standard-collectors.js';
export type { ImpactSummary } from './standard-collectors.js';
export { getAtYear, toRows, batchToRows } from './helpers.js';

// Primitives
export { lerp, floorAt, growthRate } from './primitives/math.js';
export * from './primitives/stats.js';
export { valueEq, seriesValueEq } from './primitives/compare.js';
export type { ValueEqOptions } from './primitives/compare.js';
