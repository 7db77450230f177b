/**
 * Strict alignment check shared by every binary series operation.
 */

import { UnitMismatchError, YearRangeMismatchError } from './errors.js';
import { Unit, Year } from './types.js';

/** The part of a series the alignment check looks at */
export interface Aligned {
  readonly name: string;
  readonly unit: Unit;
  years(): readonly Year[];
}

export function sameYears(a: readonly Year[], b: readonly Year[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Throws YearRangeMismatch unless both series cover exactly the same years.
 */
export function assertSameYears(a: Aligned, b: Aligned): void {
  if (!sameYears(a.years(), b.years())) {
    throw new YearRangeMismatchError(a.name, a.years(), b.name, b.years());
  }
}

/**
 * Throws UnitMismatch on differing units, then YearRangeMismatch on
 * differing year sets.
 */
export function assertAligned(a: Aligned, b: Aligned): void {
  if (a.unit !== b.unit) {
    throw new UnitMismatchError(a.name, a.unit, b.name, b.unit);
  }
  assertSameYears(a, b);
}
