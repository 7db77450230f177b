/**
 * Plain-data series input
 *
 * Data-loading collaborators hand over plain objects; these schemas turn
 * them into TimeSeries. Two shapes are accepted:
 *
 *   { values: { "2020": 100, "2021": 110 } }
 *   { years: [2020, 2021], values: [100, 110] }
 *
 * Both may carry an optional `name` and `unit`.
 */

import { z } from 'zod';
import { InvalidSeriesError } from './errors.js';
import { TimeSeries } from './timeseries.js';
import { Unit } from './types.js';

const YearKey = z.string().regex(/^-?\d+$/, 'Year keys must be integers');

export const RecordSeriesSchema = z.object({
  name: z.string().min(1).optional(),
  unit: z.string().min(1).optional(),
  values: z.record(YearKey, z.number().finite()),
});

export const ArraySeriesSchema = z
  .object({
    name: z.string().min(1).optional(),
    unit: z.string().min(1).optional(),
    years: z.array(z.number().int()),
    values: z.array(z.number().finite()),
  })
  .refine(s => s.years.length === s.values.length, {
    message: 'years and values must have the same length',
    path: ['values'],
  });

export const SeriesInputSchema = z.union([ArraySeriesSchema, RecordSeriesSchema]);

export type SeriesInput = z.infer<typeof SeriesInputSchema>;

/** Scalar or series coefficient input */
export const CoefficientValueSchema = z.union([z.number().finite(), SeriesInputSchema]);

export type CoefficientValueInput = z.infer<typeof CoefficientValueSchema>;

/**
 * Format zod issues as "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Build a series from already-parsed input, falling back to the given
 * name and unit where the input carries none.
 */
export function seriesFromInput(input: SeriesInput, fallback: { name: string; unit: Unit }): TimeSeries {
  const name = input.name ?? fallback.name;
  const unit = input.unit ?? fallback.unit;

  if ('years' in input) {
    return TimeSeries.fromArrays(name, unit, input.years, input.values);
  }

  const record: Record<number, number> = {};
  for (const [year, value] of Object.entries(input.values)) {
    record[Number(year)] = value;
  }
  return TimeSeries.fromRecord(name, unit, record);
}

/**
 * Validate unknown input and build a series.
 *
 * @throws InvalidSeriesError listing every schema problem
 */
export function parseSeries(input: unknown, fallback: { name: string; unit: Unit }): TimeSeries {
  const parsed = SeriesInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSeriesError(fallback.name, formatIssues(parsed.error));
  }
  return seriesFromInput(parsed.data, fallback);
}
