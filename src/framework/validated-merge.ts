/**
 * Validate-on-Construct Pattern
 *
 * Options are validated at construction time, so invalid options never
 * exist. Each component's merge function calls validatedMerge() internally.
 */

import { InvalidOptionsError } from './errors.js';
import { ParamMeta, ValidationResult } from './types.js';

/**
 * Wraps a component's merge + validate into a single operation.
 * Throws InvalidOptions on validation errors, logs warnings to console.
 *
 * @param component - Component name for messages
 * @param validateFn - Component's validate function
 * @param mergeFn - Function that merges partial options with defaults
 * @param partial - Partial options to merge
 * @returns Fully merged and validated options
 */
export function validatedMerge<TOptions>(
  component: string,
  validateFn: (options: TOptions) => ValidationResult,
  mergeFn: (partial: Partial<TOptions>) => TOptions,
  partial: Partial<TOptions>
): TOptions {
  const merged = mergeFn(partial);

  const result = validateFn(merged);

  if (result.warnings.length > 0) {
    for (const warning of result.warnings) {
      console.warn(`[${component}] Warning: ${warning}`);
    }
  }

  if (!result.valid) {
    throw new InvalidOptionsError(component, result.errors);
  }

  return merged;
}

/**
 * Check numeric options against the ranges declared in their metadata.
 * Non-finite values and out-of-range values are errors.
 */
export function checkRanges<TOptions extends object>(
  options: TOptions,
  meta: Partial<Record<keyof TOptions, ParamMeta>>
): ValidationResult {
  const errors: string[] = [];

  for (const key of Object.keys(meta) as Array<keyof TOptions & string>) {
    const range = meta[key]?.range;
    const value = options[key];
    if (!range || typeof value !== 'number') continue;

    if (!Number.isFinite(value)) {
      errors.push(`${key} must be a finite number, got ${value}`);
    } else if (range.min !== undefined && value < range.min) {
      errors.push(`${key} must be >= ${range.min}, got ${value}`);
    } else if (range.max !== undefined && value > range.max) {
      errors.push(`${key} must be <= ${range.max}, got ${value}`);
    }
  }

  return { valid: errors.length === 0, errors, warnings: [] };
}
