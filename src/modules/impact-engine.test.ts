/**
 * Impact Engine Tests
 *
 * Tests for scenario-versus-reference impact, horizon checks and batch runs.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ImpactModelError } from '../framework/errors.js';
import { TimeSeries } from '../framework/timeseries.js';
import { UnitRegistry } from '../framework/units.js';
import { AdoptionTrajectory } from './adoption.js';
import { ImpactEngine, computeImpact, computeImpactAll } from './impact-engine.js';
import { Market } from './market.js';
import { ReferenceScenario } from './reference.js';
import { CoefficientPair, Scenario } from './scenario.js';

// =============================================================================
// FIXTURES
// =============================================================================

interface Fixture {
  tam?: TimeSeries;
  projected?: TimeSeries;
  reference?: TimeSeries;
  coefficients?: Record<string, CoefficientPair>;
}

function series(name: string, values: Record<number, number>, unit: string = 'TWh'): TimeSeries {
  return TimeSeries.fromRecord(name, unit, values);
}

function makeScenario(fixture: Fixture = {}): Scenario {
  const market = new Market(fixture.tam ?? series('tam', { 2020: 100, 2021: 110 }));
  const reference = new ReferenceScenario(
    'Reference',
    market,
    AdoptionTrajectory.reference(fixture.reference ?? series('reference', { 2020: 20, 2021: 20 }))
  );
  return new Scenario({
    name: 'Test',
    market,
    projected: AdoptionTrajectory.projected(fixture.projected ?? series('projected', { 2020: 20, 2021: 30 })),
    reference,
    coefficients: fixture.coefficients ?? { emissions: { solution: 1, conventional: 5 } },
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

// =============================================================================
// computeImpact
// =============================================================================

describe('computeImpact', () => {
  it('compares scenario and reference metric trajectories', () => {
    const impact = new ImpactEngine().computeImpact(makeScenario(), 'emissions');

    expect(impact.conventional.projected.toRecord()).toEqual({ 2020: 80, 2021: 80 });
    expect(impact.conventional.reference.toRecord()).toEqual({ 2020: 80, 2021: 90 });
    expect(impact.scenarioTrajectory.toRecord()).toEqual({ 2020: 420, 2021: 430 });
    expect(impact.referenceTrajectory.toRecord()).toEqual({ 2020: 420, 2021: 470 });
    expect(impact.series.toRecord()).toEqual({ 2020: 0, 2021: -40 });
    expect(impact.series.name).toBe('emissions impact (Test)');
    expect(impact.metric).toBe('emissions');
    expect(impact.scenario).toBe('Test');
    expect(impact.unit).toBe('TWh');
  });

  it('is zero everywhere when the scenario follows the reference', () => {
    const same = series('adoption', { 2020: 20, 2021: 35 });
    const impact = computeImpact(makeScenario({ projected: same, reference: same }), 'emissions');
    expect(impact.series.values()).toEqual([0, 0]);
  });

  it('is idempotent and leaves its inputs untouched', () => {
    const scenario = makeScenario();
    const engine = new ImpactEngine();
    const first = engine.computeImpact(scenario, 'emissions');
    const second = engine.computeImpact(scenario, 'emissions');
    expect(first.series.equals(second.series)).toBe(true);
    expect(first.series).not.toBe(second.series);
    expect(scenario.market.series.values()).toEqual([100, 110]);
    expect(scenario.projected.series.values()).toEqual([20, 30]);
  });

  it('uses the declared metric unit', () => {
    const impact = computeImpact(
      makeScenario({ coefficients: { emissions: { solution: 1, conventional: 5, unit: 'MtCO2' } } }),
      'emissions'
    );
    expect(impact.unit).toBe('MtCO2');
    expect(impact.series.unit).toBe('MtCO2');
  });

  it('rejects an undeclared metric', () => {
    expect(() => computeImpact(makeScenario(), 'water')).toThrow(
      expect.objectContaining({ kind: 'UnknownMetric', details: { metric: 'water', available: ['emissions'] } })
    );
  });

  it('rejects a market horizon longer than adoption', () => {
    const scenario = makeScenario({
      tam: TimeSeries.range('tam', 'TWh', 2020, 2050, () => 100),
      projected: TimeSeries.range('projected', 'TWh', 2020, 2040, () => 10),
      reference: TimeSeries.range('reference', 'TWh', 2020, 2040, () => 5),
    });
    expect(() => computeImpact(scenario, 'emissions')).toThrow(
      expect.objectContaining({
        kind: 'InconsistentHorizon',
        message: "Scenario 'Test': market [2020..2050] and adoption [2020..2040] cover different years",
      })
    );
  });

  it('rejects projected and reference adoption over different years', () => {
    const scenario = makeScenario({ reference: series('reference', { 2020: 20, 2021: 20, 2022: 20 }) });
    expect(() => computeImpact(scenario, 'emissions')).toThrow(
      expect.objectContaining({ kind: 'InconsistentHorizon' })
    );
  });

  it('rejects series coefficients with gaps', () => {
    const scenario = makeScenario({
      coefficients: {
        emissions: { solution: series('ef', { 2020: 1 }, 'tCO2/TWh'), conventional: 5 },
      },
    });
    expect(() => computeImpact(scenario, 'emissions')).toThrow(
      expect.objectContaining({ kind: 'MissingCoefficientYear', details: { metric: 'emissions', role: 'solution', years: [2021] } })
    );
  });

  it('floors the conventional share when adoption exceeds demand and warns', () => {
    const impact = computeImpact(
      makeScenario({ projected: series('projected', { 2020: 20, 2021: 130 }) }),
      'emissions'
    );
    expect(impact.conventional.projected.toRecord()).toEqual({ 2020: 80, 2021: 0 });
    expect(impact.scenarioTrajectory.toRecord()).toEqual({ 2020: 420, 2021: 130 });
    expect(impact.warnings.projected).toEqual([{ year: 2021, kind: 'exceeds-tam', magnitude: 20 }]);
    expect(impact.warnings.reference).toEqual([]);
    expect(impact.warnings.market).toEqual([]);
  });

  it('logs warnings when asked', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    new ImpactEngine({ logWarnings: true }).computeImpact(
      makeScenario({ projected: series('projected', { 2020: 20, 2021: 130 }) }),
      'emissions'
    );
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[impact-engine] Test / emissions: projected adoption exceeds-tam in 2021 (by 20)');
  });

  it('stays quiet by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    computeImpact(makeScenario({ projected: series('projected', { 2020: 20, 2021: 130 }) }), 'emissions');
    expect(warn).not.toHaveBeenCalled();
  });
});

// =============================================================================
// UNITS
// =============================================================================

describe('adoption units', () => {
  const gwh = () => ({
    projected: series('projected', { 2020: 20000, 2021: 30000 }, 'GWh'),
    reference: series('reference', { 2020: 20000, 2021: 20000 }, 'GWh'),
  });

  it('converts adoption into the market unit through declared conversions', () => {
    const units = UnitRegistry.empty().with('GWh', 'TWh', 0.001);
    const impact = computeImpact(makeScenario(gwh()), 'emissions', { units });
    expect(impact.series.unit).toBe('TWh');
    expect(impact.series.valueAt(2020)).toBeCloseTo(0, 9);
    expect(impact.series.valueAt(2021)).toBeCloseTo(-40, 9);
  });

  it('fails without a declared conversion', () => {
    expect(() => computeImpact(makeScenario(gwh()), 'emissions')).toThrow(
      expect.objectContaining({ kind: 'UnitMismatch' })
    );
  });
});

// =============================================================================
// computeImpactAll
// =============================================================================

describe('computeImpactAll', () => {
  it('computes every metric in declaration order', () => {
    const scenario = makeScenario({
      coefficients: {
        water: { solution: 2, conventional: 1 },
        emissions: { solution: 1, conventional: 5 },
      },
    });
    const batch = computeImpactAll(scenario);
    expect([...batch.outcomes.keys()]).toEqual(['water', 'emissions']);
    expect(batch.failures.size).toBe(0);
    expect(batch.impacts.get('emissions')?.series.toRecord()).toEqual({ 2020: 0, 2021: -40 });
    // water: 2a + (tam - a)  ->  scenario {120, 140}, reference {120, 130}
    expect(batch.impacts.get('water')?.series.toRecord()).toEqual({ 2020: 0, 2021: 10 });
  });

  it('keeps going past a failing metric', () => {
    const scenario = makeScenario({
      coefficients: {
        emissions: { solution: 1, conventional: 5 },
        cost: { solution: series('capex', { 2021: 3 }, 'USD/TWh'), conventional: 1 },
      },
    });
    const batch = new ImpactEngine().computeImpactAll(scenario);

    expect(batch.scenario).toBe('Test');
    expect([...batch.impacts.keys()]).toEqual(['emissions']);
    expect([...batch.failures.keys()]).toEqual(['cost']);
    expect(batch.failures.get('cost')?.kind).toBe('MissingCoefficientYear');

    const outcome = batch.outcomes.get('cost');
    expect(outcome?.ok).toBe(false);
    if (outcome && !outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ImpactModelError);
    }
  });
});

// =============================================================================
// OPTIONS
// =============================================================================

describe('engine options', () => {
  it('applies defaults', () => {
    const engine = new ImpactEngine();
    expect(engine.options.floorEpsilon).toBe(1e-9);
    expect(engine.options.maxMarketGrowth).toBe(0.5);
    expect(engine.options.logWarnings).toBe(false);
  });

  it('rejects out-of-range options', () => {
    expect(() => new ImpactEngine({ floorEpsilon: -1 })).toThrow(
      expect.objectContaining({ kind: 'InvalidOptions', details: { component: 'impact-engine', problems: ['floorEpsilon must be >= 0, got -1'] } })
    );
  });

  it('warns about a coarse floor epsilon', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    new ImpactEngine({ floorEpsilon: 1e-4 });
    expect(warn).toHaveBeenCalledWith('[impact-engine] Warning: floorEpsilon 0.0001 may hide real conventional demand');
  });

  it('reports market growth beyond the configured limit', () => {
    const impact = computeImpact(makeScenario(), 'emissions', { maxMarketGrowth: 0.05 });
    expect(impact.warnings.market).toHaveLength(1);
    expect(impact.warnings.market[0].year).toBe(2021);
    expect(impact.warnings.market[0].rate).toBeCloseTo(0.1, 12);
  });
});
