/**
 * Impact Engine
 *
 * Compares a scenario against its reference for each declared metric:
 *
 *   conventional_s = floor0(tam - projected)    conventional_r = floor0(tam - reference)
 *   metric_s = coef · (projected, conventional_s)
 *   metric_r = coef · (reference, conventional_r)
 *   impact   = metric_s - metric_r
 *
 * Both sides are measured against the scenario's market. Horizons are
 * never reconciled here: a projected, reference or market year range that
 * differs from the others is an upstream data defect (InconsistentHorizon).
 *
 * The engine is pure: inputs are never mutated, nothing is cached, and
 * repeated calls give identical results.
 */

import { sameYears } from '../framework/alignment.js';
import { ImpactModelError, InconsistentHorizonError, UnknownMetricError } from '../framework/errors.js';
import { TimeSeries } from '../framework/timeseries.js';
import { ParamMeta, Unit, ValidationResult, Year } from '../framework/types.js';
import { UnitAligner } from '../framework/unit-aligner.js';
import { UnitRegistry } from '../framework/units.js';
import { checkRanges, validatedMerge } from '../framework/validated-merge.js';
import { AdoptionTrajectory, AdoptionWarning } from './adoption.js';
import { DEFAULT_FLOOR_EPSILON, deriveConventional } from './conventional.js';
import { Market } from './market.js';
import { computeMetric } from './metric.js';
import { Scenario } from './scenario.js';

// =============================================================================
// OPTIONS
// =============================================================================

export interface EngineOptions {
  /** Conventional-share residues below this become exactly zero */
  floorEpsilon: number;
  /** Market growth above this annual rate is reported as a warning */
  maxMarketGrowth: number;
  /** Log adoption and market warnings to the console */
  logWarnings: boolean;
  /**
   * Declared unit conversions. Adoption in a different unit from the
   * market is converted when a conversion is declared.
   */
  units: UnitRegistry;
}

export const engineDefaults: EngineOptions = {
  floorEpsilon: DEFAULT_FLOOR_EPSILON,
  maxMarketGrowth: 0.5,
  logWarnings: false,
  units: UnitRegistry.empty(),
};

export const engineMeta: Partial<Record<keyof EngineOptions, ParamMeta>> = {
  floorEpsilon: {
    description: 'Tolerance below which TAM minus adoption is snapped to zero.',
    unit: 'functional units',
    range: { min: 0, max: 1e-3, default: DEFAULT_FLOOR_EPSILON },
  },
  maxMarketGrowth: {
    description: 'Largest plausible year-over-year change in total demand before a warning is raised.',
    unit: 'fraction/yr',
    range: { min: 0, default: 0.5 },
  },
  logWarnings: {
    description: 'Print adoption bound and market growth warnings with console.warn.',
    unit: 'boolean',
  },
};

export function validateEngineOptions(options: EngineOptions): ValidationResult {
  const result = checkRanges(options, engineMeta);
  if (options.floorEpsilon > 1e-6) {
    result.warnings.push(`floorEpsilon ${options.floorEpsilon} may hide real conventional demand`);
  }
  result.valid = result.errors.length === 0;
  return result;
}

export function mergeEngineOptions(partial: Partial<EngineOptions> = {}): EngineOptions {
  return validatedMerge(
    'impact-engine',
    validateEngineOptions,
    p => ({ ...engineDefaults, ...p }),
    partial
  );
}

// =============================================================================
// RESULTS
// =============================================================================

export interface ImpactWarnings {
  projected: AdoptionWarning[];
  reference: AdoptionWarning[];
  market: Array<{ year: Year; rate: number }>;
}

/**
 * Scenario-minus-reference result for one metric.
 */
export interface Impact {
  metric: string;
  scenario: string;
  unit: Unit;
  /** metric_scenario - metric_reference */
  series: TimeSeries;
  /** Metric trajectory under projected adoption */
  scenarioTrajectory: TimeSeries;
  /** Metric trajectory under reference adoption */
  referenceTrajectory: TimeSeries;
  conventional: { projected: TimeSeries; reference: TimeSeries };
  warnings: ImpactWarnings;
}

export type ImpactOutcome =
  | { ok: true; impact: Impact }
  | { ok: false; error: ImpactModelError };

/**
 * Per-metric outcomes of computeImpactAll, keyed in metric declaration order.
 */
export interface ImpactBatch {
  scenario: string;
  outcomes: Map<string, ImpactOutcome>;
  impacts: Map<string, Impact>;
  failures: Map<string, ImpactModelError>;
}

// =============================================================================
// ENGINE
// =============================================================================

export class ImpactEngine {
  readonly options: EngineOptions;
  private readonly aligner: UnitAligner;

  constructor(options: Partial<EngineOptions> = {}) {
    this.options = mergeEngineOptions(options);
    this.aligner = new UnitAligner({ units: this.options.units });
  }

  /**
   * Impact of a scenario on one metric.
   *
   * @throws UnknownMetric when the scenario declares no such metric
   * @throws InconsistentHorizon when market, projected and reference years differ
   * @throws UnitMismatch / IncompatibleUnits when adoption and market units cannot be reconciled
   * @throws MissingCoefficientYear when a series coefficient has gaps
   */
  computeImpact(scenario: Scenario, metric: string): Impact {
    const coefficients = scenario.coefficientsFor(metric);
    if (!coefficients) {
      throw new UnknownMetricError(metric, scenario.metricNames());
    }

    const market = scenario.market;
    const projected = this.inMarketUnit(scenario.projected, market);
    const reference = this.inMarketUnit(scenario.reference.adoption, market);
    this.checkHorizons(scenario.name, market, projected, reference);

    const conventionalProjected = deriveConventional(market, projected, this.options.floorEpsilon);
    const conventionalReference = deriveConventional(market, reference, this.options.floorEpsilon);

    const scenarioTrajectory = computeMetric(projected.series, conventionalProjected, coefficients, metric);
    const referenceTrajectory = computeMetric(reference.series, conventionalReference, coefficients, metric);

    if (!scenarioTrajectory.alignedWith(referenceTrajectory)) {
      throw new InconsistentHorizonError(
        `Scenario '${scenario.name}': '${metric}' trajectories are not aligned`,
        { scenario: scenario.name, metric }
      );
    }

    const series = scenarioTrajectory.subtract(referenceTrajectory, {
      name: `${metric} impact (${scenario.name})`,
    });

    const warnings: ImpactWarnings = {
      projected: projected.validateAgainst(market),
      reference: reference.validateAgainst(market),
      market: market.growthOutliers(this.options.maxMarketGrowth),
    };
    if (this.options.logWarnings) {
      logWarnings(scenario.name, metric, warnings);
    }

    return {
      metric,
      scenario: scenario.name,
      unit: series.unit,
      series,
      scenarioTrajectory,
      referenceTrajectory,
      conventional: { projected: conventionalProjected, reference: conventionalReference },
      warnings,
    };
  }

  /**
   * Impact for every declared metric. A failing metric is recorded and
   * the rest are still computed.
   */
  computeImpactAll(scenario: Scenario): ImpactBatch {
    const outcomes = new Map<string, ImpactOutcome>();
    const impacts = new Map<string, Impact>();
    const failures = new Map<string, ImpactModelError>();

    for (const metric of scenario.metricNames()) {
      try {
        const impact = this.computeImpact(scenario, metric);
        outcomes.set(metric, { ok: true, impact });
        impacts.set(metric, impact);
      } catch (err) {
        if (!(err instanceof ImpactModelError)) throw err;
        outcomes.set(metric, { ok: false, error: err });
        failures.set(metric, err);
      }
    }

    return { scenario: scenario.name, outcomes, impacts, failures };
  }

  private inMarketUnit(adoption: AdoptionTrajectory, market: Market): AdoptionTrajectory {
    if (adoption.unit === market.unit || !this.options.units.canConvert(adoption.unit, market.unit)) {
      return adoption;
    }
    return new AdoptionTrajectory(adoption.role, this.aligner.convert(adoption.series, market.unit));
  }

  private checkHorizons(
    scenario: string,
    market: Market,
    projected: AdoptionTrajectory,
    reference: AdoptionTrajectory
  ): void {
    if (!sameYears(projected.years(), reference.years())) {
      throw new InconsistentHorizonError(
        `Scenario '${scenario}': projected adoption ${span(projected.years())} and reference adoption ${span(reference.years())} cover different years`,
        { scenario, projected: [...projected.years()], reference: [...reference.years()] }
      );
    }
    if (!sameYears(market.years(), projected.years())) {
      throw new InconsistentHorizonError(
        `Scenario '${scenario}': market ${span(market.years())} and adoption ${span(projected.years())} cover different years`,
        { scenario, market: [...market.years()], adoption: [...projected.years()] }
      );
    }
  }
}

/**
 * Impact of one metric with a default-configured engine.
 */
export function computeImpact(scenario: Scenario, metric: string, options?: Partial<EngineOptions>): Impact {
  return new ImpactEngine(options).computeImpact(scenario, metric);
}

/**
 * Impact of every metric with a default-configured engine.
 */
export function computeImpactAll(scenario: Scenario, options?: Partial<EngineOptions>): ImpactBatch {
  return new ImpactEngine(options).computeImpactAll(scenario);
}

function span(years: readonly Year[]): string {
  if (years.length === 0) return '[]';
  return `[${years[0]}..${years[years.length - 1]}]`;
}

function logWarnings(scenario: string, metric: string, warnings: ImpactWarnings): void {
  const prefix = `[impact-engine] ${scenario} / ${metric}`;
  for (const w of warnings.projected) {
    console.warn(`${prefix}: projected adoption ${w.kind} in ${w.year} (by ${w.magnitude})`);
  }
  for (const w of warnings.reference) {
    console.warn(`${prefix}: reference adoption ${w.kind} in ${w.year} (by ${w.magnitude})`);
  }
  for (const w of warnings.market) {
    console.warn(`${prefix}: market demand changes ${(w.rate * 100).toFixed(1)}% in ${w.year}`);
  }
}
