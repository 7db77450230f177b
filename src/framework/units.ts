/**
 * Declared unit conversions
 *
 * Conversions are explicit: two units are compatible only if they are
 * identical or a factor has been declared between them. A declared
 * conversion implies its inverse.
 */

import { Unit } from './types.js';

export interface UnitConversion {
  from: Unit;
  to: Unit;
  /** Multiply a value in `from` by this to get `to` */
  factor: number;
}

export class UnitRegistry {
  private readonly conversions: ReadonlyMap<string, number>;

  private constructor(conversions: ReadonlyMap<string, number>) {
    this.conversions = conversions;
    Object.freeze(this);
  }

  static empty(): UnitRegistry {
    return new UnitRegistry(new Map());
  }

  static of(conversions: readonly UnitConversion[]): UnitRegistry {
    return conversions.reduce((reg, c) => reg.with(c.from, c.to, c.factor), UnitRegistry.empty());
  }

  /**
   * Returns a new registry with one more conversion declared.
   */
  with(from: Unit, to: Unit, factor: number): UnitRegistry {
    if (!Number.isFinite(factor) || factor === 0) {
      throw new RangeError(`Conversion factor ${from} -> ${to} must be finite and non-zero, got ${factor}`);
    }
    const next = new Map(this.conversions);
    next.set(key(from, to), factor);
    next.set(key(to, from), 1 / factor);
    return new UnitRegistry(next);
  }

  /**
   * Factor converting `from` into `to`, or undefined when none is declared.
   */
  factor(from: Unit, to: Unit): number | undefined {
    if (from === to) return 1;
    return this.conversions.get(key(from, to));
  }

  canConvert(from: Unit, to: Unit): boolean {
    return this.factor(from, to) !== undefined;
  }
}

function key(from: Unit, to: Unit): string {
  return `${from}\u0000${to}`;
}
