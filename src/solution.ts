/**
 * Solution definitions
 *
 * A solution is a technology or practice that displaces a conventional
 * mix. It owns the market it serves, its single reference scenario, its
 * reference coefficients (the "normal case" per-unit values) and a set of
 * named scenarios. Scenarios only state what differs from the reference:
 * their own adoption, and any coefficient fields they override.
 *
 * Definitions arrive as plain data from a loading collaborator and are
 * validated here before anything is built.
 */

import { z } from 'zod';
import {
  InvalidDefinitionError,
  UnknownMetricError,
  UnknownScenarioError,
} from './framework/errors.js';
import {
  CoefficientValueInput,
  CoefficientValueSchema,
  SeriesInputSchema,
  formatIssues,
  seriesFromInput,
} from './framework/series-input.js';
import { TimeSeries } from './framework/timeseries.js';
import { Unit, Year } from './framework/types.js';
import { seriesValueEq, valueEq } from './primitives/compare.js';
import { AdoptionTrajectory } from './modules/adoption.js';
import { Market } from './modules/market.js';
import { ReferenceScenario } from './modules/reference.js';
import { Coefficient, CoefficientPair, Scenario } from './modules/scenario.js';

// =============================================================================
// SCHEMAS
// =============================================================================

export const CoefficientInputSchema = z
  .object({
    solution: CoefficientValueSchema,
    conventional: CoefficientValueSchema,
    unit: z.string().min(1).optional(),
    description: z.string().optional(),
    meta: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

const COEFFICIENT_FIELDS: ReadonlySet<string> = new Set(Object.keys(CoefficientInputSchema.shape));

export const CoefficientOverrideSchema = CoefficientInputSchema.partial();

export const ScenarioInputSchema = z
  .object({
    description: z.string().optional(),
    adoption: SeriesInputSchema,
    coefficients: z.record(z.string(), CoefficientOverrideSchema).optional(),
    reportStartYear: z.number().int().optional(),
    reportEndYear: z.number().int().optional(),
  })
  .refine(
    s => s.reportStartYear === undefined || s.reportEndYear === undefined || s.reportStartYear <= s.reportEndYear,
    { message: 'reportStartYear must not be after reportEndYear', path: ['reportEndYear'] }
  );

export const SolutionInputSchema = z
  .object({
    identifier: z.string().regex(/^[a-z0-9_-]+$/i, 'identifier must be letters, digits, _ or -'),
    title: z.string().min(1),
    info: z.string().optional(),
    /** Things built or deployed, e.g. 'km of bike lanes' */
    implementationUnits: z.string().min(1),
    /** Units of value delivered, e.g. 'billion passenger-km' */
    functionalUnits: z.string().min(1),
    tam: SeriesInputSchema,
    reference: z.object({
      name: z.string().min(1).default('Reference'),
      adoption: SeriesInputSchema,
    }),
    referenceCoefficients: z.record(z.string(), CoefficientInputSchema),
    scenarios: z.record(z.string(), ScenarioInputSchema).default({}),
    /** Short names for scenarios, e.g. { PDS1: 'Plausible 2050' } */
    scenarioAliases: z.record(z.string(), z.string()).default({}),
  })
  .superRefine((s, ctx) => {
    for (const [alias, target] of Object.entries(s.scenarioAliases)) {
      if (!(target in s.scenarios)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `alias '${alias}' points to unknown scenario '${target}'`,
          path: ['scenarioAliases', alias],
        });
      }
    }
  });

export type SolutionInput = z.input<typeof SolutionInputSchema>;
type ParsedSolution = z.output<typeof SolutionInputSchema>;
type CoefficientInput = z.output<typeof CoefficientInputSchema>;
type CoefficientOverrideInput = z.output<typeof CoefficientOverrideSchema>;

// =============================================================================
// SCENARIO DEFINITIONS
// =============================================================================

/**
 * A scenario in built form: adoption already a series, overrides keyed by
 * metric. Fields an override leaves out come from the reference.
 */
export interface ScenarioDefinition {
  name: string;
  description?: string;
  adoption: TimeSeries;
  coefficients?: Readonly<Record<string, Partial<CoefficientPair>>>;
  reportStartYear?: Year;
  reportEndYear?: Year;
}

/**
 * Overlay scenario overrides on reference coefficients, field by field.
 * Metrics the reference lacks must be given in full. An override's `meta`
 * replaces the reference's; without one the reference's is kept.
 */
export function mergeCoefficients(
  reference: Readonly<Record<string, CoefficientPair>>,
  overrides: Readonly<Record<string, Partial<CoefficientPair>>> = {}
): Record<string, CoefficientPair> {
  const merged: Record<string, CoefficientPair> = {};

  for (const [metric, pair] of Object.entries(reference)) {
    merged[metric] = { ...pair, ...definedFields(overrides[metric] ?? {}) };
  }

  for (const [metric, override] of Object.entries(overrides)) {
    if (metric in reference) continue;
    const { solution, conventional } = override;
    if (solution === undefined || conventional === undefined) {
      throw new UnknownMetricError(metric, Object.keys(reference));
    }
    merged[metric] = { ...definedFields(override), solution, conventional };
  }

  return merged;
}

function definedFields(override: Partial<CoefficientPair>): Partial<CoefficientPair> {
  const out: Partial<CoefficientPair> = {};
  if (override.solution !== undefined) out.solution = override.solution;
  if (override.conventional !== undefined) out.conventional = override.conventional;
  if (override.unit !== undefined) out.unit = override.unit;
  if (override.description !== undefined) out.description = override.description;
  if (override.meta !== undefined) out.meta = override.meta;
  return out;
}

/**
 * Reduce full coefficients to what differs from the reference; the
 * inverse of mergeCoefficients. Coefficients are compared with valueEq /
 * seriesValueEq. Metrics equal to the reference in every field are left
 * out. A field the reference sets cannot be cleared by an override, so
 * such differences are not expressible and are dropped.
 */
export function deltaCoefficients(
  reference: Readonly<Record<string, CoefficientPair>>,
  full: Readonly<Record<string, CoefficientPair>>
): Record<string, Partial<CoefficientPair>> {
  const delta: Record<string, Partial<CoefficientPair>> = {};

  for (const [metric, pair] of Object.entries(full)) {
    const base = reference[metric];
    if (base === undefined) {
      delta[metric] = definedFields(pair);
      continue;
    }

    const diff: Partial<CoefficientPair> = {};
    if (!coefficientEq(base.solution, pair.solution)) diff.solution = pair.solution;
    if (!coefficientEq(base.conventional, pair.conventional)) diff.conventional = pair.conventional;
    if (pair.unit !== undefined && pair.unit !== base.unit) diff.unit = pair.unit;
    if (pair.description !== undefined && pair.description !== base.description) diff.description = pair.description;
    if (pair.meta !== undefined && !metaEq(base.meta, pair.meta)) diff.meta = pair.meta;

    if (Object.keys(diff).length > 0) delta[metric] = diff;
  }

  return delta;
}

function coefficientEq(a: Coefficient, b: Coefficient): boolean {
  if (typeof a === 'number' && typeof b === 'number') return valueEq(a, b, { allZero: false });
  if (typeof a !== 'number' && typeof b !== 'number') return seriesValueEq(a, b, { allZero: false });
  return false;
}

function metaEq(a: Readonly<Record<string, string>> | undefined, b: Readonly<Record<string, string>>): boolean {
  if (a === undefined) return false;
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every(k => a[k] === b[k]);
}

// =============================================================================
// SOLUTION
// =============================================================================

export class Solution {
  readonly identifier: string;
  readonly title: string;
  readonly info: string | undefined;
  readonly implementationUnits: Unit;
  readonly functionalUnits: Unit;
  readonly market: Market;
  readonly reference: ReferenceScenario;
  readonly referenceCoefficients: Readonly<Record<string, Readonly<CoefficientPair>>>;
  private readonly scenarioDefinitions: ReadonlyMap<string, ScenarioDefinition>;
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(init: {
    identifier: string;
    title: string;
    info?: string;
    implementationUnits: Unit;
    functionalUnits: Unit;
    market: Market;
    reference: ReferenceScenario;
    referenceCoefficients: Readonly<Record<string, CoefficientPair>>;
    scenarios?: readonly ScenarioDefinition[];
    scenarioAliases?: Readonly<Record<string, string>>;
  }) {
    this.identifier = init.identifier;
    this.title = init.title;
    this.info = init.info;
    this.implementationUnits = init.implementationUnits;
    this.functionalUnits = init.functionalUnits;
    this.market = init.market;
    this.reference = init.reference;
    this.referenceCoefficients = Object.freeze({ ...init.referenceCoefficients });
    this.scenarioDefinitions = new Map(
      (init.scenarios ?? []).map((s): [string, ScenarioDefinition] => [s.name, s])
    );
    this.aliases = new Map<string, string>(Object.entries(init.scenarioAliases ?? {}));
    Object.freeze(this);
  }

  /**
   * Scenario names mapped to their descriptions.
   */
  listScenarios(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [name, def] of this.scenarioDefinitions) {
      out[name] = def.description ?? '';
    }
    return out;
  }

  /**
   * Resolve an alias or scenario name to the scenario name.
   *
   * @throws UnknownScenario
   */
  resolveScenarioName(name: string): string {
    const resolved = this.aliases.get(name) ?? name;
    if (!this.scenarioDefinitions.has(resolved)) {
      throw new UnknownScenarioError(this.identifier, name);
    }
    return resolved;
  }

  /**
   * Build a Scenario from a registered name/alias or from a definition.
   * A fresh Scenario is built on every call.
   */
  loadScenario(scenario: string | ScenarioDefinition): Scenario {
    const def = typeof scenario === 'string'
      ? this.definitionFor(this.resolveScenarioName(scenario))
      : scenario;

    return new Scenario({
      name: def.name,
      description: def.description,
      market: this.market,
      projected: AdoptionTrajectory.projected(def.adoption),
      reference: this.reference,
      coefficients: mergeCoefficients(this.referenceCoefficients, def.coefficients),
      reportStartYear: def.reportStartYear,
      reportEndYear: def.reportEndYear,
    });
  }

  private definitionFor(name: string): ScenarioDefinition {
    const def = this.scenarioDefinitions.get(name);
    if (!def) throw new UnknownScenarioError(this.identifier, name);
    return def;
  }
}

// =============================================================================
// DEFINITION FROM PLAIN DATA
// =============================================================================

/**
 * Validate plain solution data and build a Solution.
 *
 * @throws InvalidDefinition listing every schema problem
 * @throws InvalidSeries when a series breaks ordering or finiteness rules
 * @throws UnknownMetric when a scenario overrides an undeclared metric partially
 */
export function defineSolution(input: unknown): Solution {
  const parsed = SolutionInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidDefinitionError(solutionLabel(input), formatIssues(parsed.error));
  }
  return buildSolution(parsed.data);
}

function buildSolution(data: ParsedSolution): Solution {
  const unit = data.functionalUnits;
  const market = new Market(seriesFromInput(data.tam, { name: `${data.identifier} TAM`, unit }));
  const reference = new ReferenceScenario(
    data.reference.name,
    market,
    AdoptionTrajectory.reference(
      seriesFromInput(data.reference.adoption, { name: `${data.identifier} reference adoption`, unit })
    )
  );

  const referenceCoefficients: Record<string, CoefficientPair> = {};
  for (const [metric, input] of Object.entries(data.referenceCoefficients)) {
    warnUnknownFields(data.identifier, 'reference', metric, input);
    referenceCoefficients[metric] = buildPair(metric, input, data.functionalUnits);
  }

  const scenarios = Object.entries(data.scenarios).map(([name, s]): ScenarioDefinition => {
    const overrides: Record<string, Partial<CoefficientPair>> = {};
    for (const [metric, override] of Object.entries(s.coefficients ?? {})) {
      warnUnknownFields(data.identifier, name, metric, override);
      overrides[metric] = buildOverride(metric, override, data.functionalUnits);
    }
    return {
      name,
      description: s.description,
      adoption: seriesFromInput(s.adoption, { name: `${name} adoption`, unit }),
      coefficients: overrides,
      reportStartYear: s.reportStartYear,
      reportEndYear: s.reportEndYear,
    };
  });

  return new Solution({
    identifier: data.identifier,
    title: data.title,
    info: data.info,
    implementationUnits: data.implementationUnits,
    functionalUnits: data.functionalUnits,
    market,
    reference,
    referenceCoefficients,
    scenarios,
    scenarioAliases: data.scenarioAliases,
  });
}

function buildPair(metric: string, input: CoefficientInput, functionalUnits: Unit): CoefficientPair {
  const pair: CoefficientPair = {
    solution: buildCoefficient(input.solution, metric, 'solution', input.unit, functionalUnits),
    conventional: buildCoefficient(input.conventional, metric, 'conventional', input.unit, functionalUnits),
  };
  if (input.unit !== undefined) pair.unit = input.unit;
  if (input.description !== undefined) pair.description = input.description;
  if (input.meta !== undefined) pair.meta = input.meta;
  return pair;
}

function buildOverride(metric: string, input: CoefficientOverrideInput, functionalUnits: Unit): Partial<CoefficientPair> {
  const out: Partial<CoefficientPair> = {};
  if (input.solution !== undefined) {
    out.solution = buildCoefficient(input.solution, metric, 'solution', input.unit, functionalUnits);
  }
  if (input.conventional !== undefined) {
    out.conventional = buildCoefficient(input.conventional, metric, 'conventional', input.unit, functionalUnits);
  }
  if (input.unit !== undefined) out.unit = input.unit;
  if (input.description !== undefined) out.description = input.description;
  if (input.meta !== undefined) out.meta = input.meta;
  return out;
}

function warnUnknownFields(solution: string, scenario: string, metric: string, input: object): void {
  for (const field of Object.keys(input)) {
    if (!COEFFICIENT_FIELDS.has(field)) {
      console.warn(`[solution] ${solution} / ${scenario}: ignoring unknown coefficient field '${field}' of '${metric}'`);
    }
  }
}

function buildCoefficient(
  value: CoefficientValueInput,
  metric: string,
  role: 'solution' | 'conventional',
  metricUnit: Unit | undefined,
  functionalUnits: Unit
): Coefficient {
  if (typeof value === 'number') return value;
  return seriesFromInput(value, {
    name: `${metric} ${role} coefficient`,
    unit: `${metricUnit ?? '1'}/${functionalUnits}`,
  });
}

function solutionLabel(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'identifier' in input && typeof input.identifier === 'string') {
    return input.identifier;
  }
  return 'solution';
}
