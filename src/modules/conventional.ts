/**
 * Conventional share derivation
 *
 * conventional(year) = max(tam(year) - adoption(year), 0)
 *
 * Always recomputed from its inputs, never stored.
 */

import { TimeSeries } from '../framework/timeseries.js';
import { AdoptionTrajectory } from './adoption.js';
import { Market } from './market.js';

/** Residues below this are treated as zero by default */
export const DEFAULT_FLOOR_EPSILON = 1e-9;

/**
 * The part of the market not served by the solution.
 *
 * Values below `floorEpsilon` (including negative values when adoption
 * exceeds demand) become exactly zero.
 *
 * @throws UnitMismatch / YearRangeMismatch when market and adoption are not aligned
 */
export function deriveConventional(
  market: Market,
  adoption: AdoptionTrajectory,
  floorEpsilon: number = DEFAULT_FLOOR_EPSILON
): TimeSeries {
  return market.series
    .subtract(adoption.series)
    .clampMin(0, floorEpsilon, { name: `conventional (${adoption.name})` });
}
