/**
 * Primitive mathematical functions
 *
 * Pure functions used by series arithmetic.
 */

/**
 * Linear interpolation between two values
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * Math.max(0, Math.min(1, t));
}

/**
 * Floor a value, snapping anything within `epsilon` above the floor onto it.
 *
 * floorAt(1e-12, 0, 1e-9) === 0
 */
export function floorAt(value: number, floor: number, epsilon: number = 0): number {
  return value < floor + epsilon ? floor : value;
}

/**
 * Annual growth rate between two consecutive values: next / prev - 1.
 * Null when the previous value is zero (rate undefined).
 */
export function growthRate(prev: number, next: number): number | null {
  if (prev === 0) return null;
  return next / prev - 1;
}
