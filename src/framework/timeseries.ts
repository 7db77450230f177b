/**
 * Year-indexed time series
 *
 * The value type every other component operates on. A series is an
 * ordered list of (year, value) points with a unit tag and a name.
 * Years are unique and strictly ascending; gaps are allowed.
 *
 * Instances are frozen. Every transformation returns a new series.
 */

import { assertAligned, assertSameYears, sameYears } from './alignment.js';
import { InvalidSeriesError, MissingYearError } from './errors.js';
import { InterpolationPolicy, Point, Unit, Year, YearWindow } from './types.js';
import { floorAt, growthRate, lerp } from '../primitives/math.js';

/** Options for operations that produce a renamed / re-unitized series */
export interface DeriveOptions {
  name?: string;
  unit?: Unit;
}

export class TimeSeries {
  readonly name: string;
  readonly unit: Unit;
  private readonly _years: readonly Year[];
  private readonly _values: readonly number[];
  private readonly index: ReadonlyMap<Year, number>;

  private constructor(name: string, unit: Unit, years: readonly Year[], values: readonly number[]) {
    this.name = name;
    this.unit = unit;
    this._years = Object.freeze([...years]);
    this._values = Object.freeze([...values]);
    this.index = new Map(years.map((y, i): [Year, number] => [y, i]));
    Object.freeze(this);
  }

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  /**
   * Build from parallel arrays. Years must be integers, unique and
   * strictly ascending; values must be finite.
   */
  static fromArrays(name: string, unit: Unit, years: readonly Year[], values: readonly number[]): TimeSeries {
    const problems: string[] = [];

    if (years.length !== values.length) {
      problems.push(`${years.length} years but ${values.length} values`);
    }
    for (let i = 0; i < years.length; i++) {
      if (!Number.isInteger(years[i])) {
        problems.push(`year ${years[i]} is not an integer`);
      } else if (i > 0 && years[i] === years[i - 1]) {
        problems.push(`duplicate year ${years[i]}`);
      } else if (i > 0 && years[i] < years[i - 1]) {
        problems.push(`year ${years[i]} follows ${years[i - 1]} (years must ascend)`);
      }
    }
    for (let i = 0; i < values.length; i++) {
      if (!Number.isFinite(values[i])) {
        problems.push(`value for ${years[i] ?? `index ${i}`} is not finite (${values[i]})`);
      }
    }

    if (problems.length > 0) {
      throw new InvalidSeriesError(name, problems);
    }
    return new TimeSeries(name, unit, years, values);
  }

  /**
   * Build from unordered points; points are sorted by year.
   */
  static fromPoints(name: string, unit: Unit, points: readonly Point[]): TimeSeries {
    const sorted = [...points].sort((a, b) => a.year - b.year);
    return TimeSeries.fromArrays(
      name,
      unit,
      sorted.map(p => p.year),
      sorted.map(p => p.value)
    );
  }

  /**
   * Build from a year-keyed record, e.g. { 2020: 100, 2021: 110 }.
   */
  static fromRecord(name: string, unit: Unit, record: Readonly<Record<number, number>>): TimeSeries {
    const points = Object.entries(record).map(([year, value]) => ({ year: Number(year), value }));
    return TimeSeries.fromPoints(name, unit, points);
  }

  /**
   * Same value for every given year.
   */
  static constant(name: string, unit: Unit, years: readonly Year[], value: number): TimeSeries {
    return TimeSeries.fromArrays(name, unit, years, years.map(() => value));
  }

  /**
   * Consecutive years startYear..endYear, value from a function of the year.
   */
  static range(name: string, unit: Unit, startYear: Year, endYear: Year, fn: (year: Year) => number): TimeSeries {
    const years: Year[] = [];
    for (let y = startYear; y <= endYear; y++) years.push(y);
    return TimeSeries.fromArrays(name, unit, years, years.map(fn));
  }

  // ===========================================================================
  // ACCESS
  // ===========================================================================

  get length(): number {
    return this._years.length;
  }

  get firstYear(): Year | undefined {
    return this._years[0];
  }

  get lastYear(): Year | undefined {
    return this._years[this._years.length - 1];
  }

  years(): readonly Year[] {
    return this._years;
  }

  values(): readonly number[] {
    return this._values;
  }

  has(year: Year): boolean {
    return this.index.has(year);
  }

  /**
   * Value at a year.
   *
   * With the default 'none' policy an absent year throws MissingYear.
   * With 'linear', a year strictly between two present years is
   * interpolated; years outside the covered range still throw.
   */
  valueAt(year: Year, policy: InterpolationPolicy = 'none'): number {
    const i = this.index.get(year);
    if (i !== undefined) return this._values[i];

    if (policy === 'linear' && this.length >= 2) {
      const hi = this._years.findIndex(y => y > year);
      if (hi > 0) {
        const y0 = this._years[hi - 1];
        const y1 = this._years[hi];
        return lerp(this._values[hi - 1], this._values[hi], (year - y0) / (y1 - y0));
      }
    }

    throw new MissingYearError(this.name, year);
  }

  entries(): Point[] {
    return this._years.map((year, i) => ({ year, value: this._values[i] }));
  }

  toRecord(): Record<number, number> {
    const out: Record<number, number> = {};
    for (let i = 0; i < this._years.length; i++) {
      out[this._years[i]] = this._values[i];
    }
    return out;
  }

  // ===========================================================================
  // ALIGNMENT
  // ===========================================================================

  /**
   * Same year set and same unit.
   */
  alignedWith(other: TimeSeries): boolean {
    return this.unit === other.unit && sameYears(this._years, other._years);
  }

  /**
   * Same unit, years and values (name ignored).
   */
  equals(other: TimeSeries): boolean {
    if (!this.alignedWith(other)) return false;
    return this._values.every((v, i) => v === other._values[i]);
  }

  // ===========================================================================
  // ARITHMETIC
  // ===========================================================================

  add(other: TimeSeries, options: DeriveOptions = {}): TimeSeries {
    assertAligned(this, other);
    return this.derive(
      this._values.map((v, i) => v + other._values[i]),
      options.name ?? `${this.name} + ${other.name}`,
      options.unit ?? this.unit
    );
  }

  subtract(other: TimeSeries, options: DeriveOptions = {}): TimeSeries {
    assertAligned(this, other);
    return this.derive(
      this._values.map((v, i) => v - other._values[i]),
      options.name ?? `${this.name} - ${other.name}`,
      options.unit ?? this.unit
    );
  }

  /**
   * Multiply by a scalar or, year by year, by another series.
   *
   * A series factor must cover exactly the same years (YearRangeMismatch
   * otherwise); units multiply, so the result unit is `a*b` unless given.
   */
  scale(factor: number | TimeSeries, options: DeriveOptions = {}): TimeSeries {
    if (typeof factor === 'number') {
      return this.derive(
        this._values.map(v => v * factor),
        options.name ?? this.name,
        options.unit ?? this.unit
      );
    }
    assertSameYears(this, factor);
    return this.derive(
      this._values.map((v, i) => v * factor._values[i]),
      options.name ?? `${this.name} * ${factor.name}`,
      options.unit ?? `${factor.unit}*${this.unit}`
    );
  }

  /**
   * Floor every value at `min`. Values below `min + epsilon` become
   * exactly `min`.
   */
  clampMin(min: number, epsilon: number = 0, options: DeriveOptions = {}): TimeSeries {
    return this.derive(
      this._values.map(v => floorAt(v, min, epsilon)),
      options.name ?? this.name,
      options.unit ?? this.unit
    );
  }

  map(fn: (value: number, year: Year) => number, options: DeriveOptions = {}): TimeSeries {
    return this.derive(
      this._values.map((v, i) => fn(v, this._years[i])),
      options.name ?? this.name,
      options.unit ?? this.unit
    );
  }

  rename(name: string): TimeSeries {
    return new TimeSeries(name, this.unit, this._years, this._values);
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Points within an inclusive window. Bounds need not be present years.
   */
  slice(window: YearWindow = {}): TimeSeries {
    const start = window.startYear ?? -Infinity;
    const end = window.endYear ?? Infinity;
    const years: Year[] = [];
    const values: number[] = [];
    for (let i = 0; i < this._years.length; i++) {
      if (this._years[i] >= start && this._years[i] <= end) {
        years.push(this._years[i]);
        values.push(this._values[i]);
      }
    }
    return new TimeSeries(this.name, this.unit, years, values);
  }

  /**
   * Running total
   */
  cumulative(): TimeSeries {
    let sum = 0;
    return this.derive(
      this._values.map(v => (sum += v)),
      `cumulative ${this.name}`,
      this.unit
    );
  }

  sum(window: YearWindow = {}): number {
    return this.slice(window)._values.reduce((a, b) => a + b, 0);
  }

  /**
   * Mean over a window; NaN when the window is empty.
   */
  mean(window: YearWindow = {}): number {
    const part = this.slice(window);
    return part.length === 0 ? NaN : part.sum() / part.length;
  }

  peak(): Point | null {
    return this.extreme((a, b) => a > b);
  }

  trough(): Point | null {
    return this.extreme((a, b) => a < b);
  }

  firstYearAbove(threshold: number): Year | null {
    const i = this._values.findIndex(v => v > threshold);
    return i === -1 ? null : this._years[i];
  }

  firstYearBelow(threshold: number): Year | null {
    const i = this._values.findIndex(v => v < threshold);
    return i === -1 ? null : this._years[i];
  }

  /**
   * Year-over-year growth, annualized across gaps. The first year has
   * no rate; a zero predecessor gives a null rate.
   */
  growthRates(): Array<{ year: Year; rate: number | null }> {
    const out: Array<{ year: Year; rate: number | null }> = [];
    for (let i = 1; i < this._years.length; i++) {
      const span = this._years[i] - this._years[i - 1];
      const total = growthRate(this._values[i - 1], this._values[i]);
      out.push({
        year: this._years[i],
        rate: total === null ? null : span === 1 ? total : Math.pow(1 + total, 1 / span) - 1,
      });
    }
    return out;
  }

  private extreme(better: (a: number, b: number) => boolean): Point | null {
    if (this.length === 0) return null;
    let best = 0;
    for (let i = 1; i < this._values.length; i++) {
      if (better(this._values[i], this._values[best])) best = i;
    }
    return { year: this._years[best], value: this._values[best] };
  }

  private derive(values: readonly number[], name: string, unit: Unit): TimeSeries {
    return new TimeSeries(name, unit, this._years, values);
  }
}
