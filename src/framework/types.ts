/**
 * Core types for the impact framework
 */

/** Absolute calendar year (e.g. 2020) */
export type Year = number;

/** Unit tag carried by every series (e.g. 'TWh', 'tCO2/TWh') */
export type Unit = string;

/** A single (year, value) observation */
export interface Point {
  year: Year;
  value: number;
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Range constraint for numeric options
 */
export interface Range {
  min?: number;
  max?: number;
  default: number;
}

/**
 * Option metadata for documentation and validation
 */
export interface ParamMeta {
  description: string;
  unit: string;
  range?: Range;
}

/** How a missing year is resolved on lookup */
export type InterpolationPolicy = 'none' | 'linear';

/** Common-range policy used when aligning two series */
export type AlignmentPolicy = 'intersection' | 'union';

/** How edge years are filled under the union policy */
export type FillPolicy = 'forward' | 'zero';

/** Inclusive year window */
export interface YearWindow {
  startYear?: Year;
  endYear?: Year;
}
