/**
 * Parameter Meta-Analysis
 *
 * Backing data for a scalar coefficient: published estimates collected
 * from the literature, converted to one standard unit, and summarized so
 * a scenario can pick the mean, a low or high case, or the median.
 */

import { z } from 'zod';
import { InvalidDefinitionError } from '../framework/errors.js';
import { formatIssues } from '../framework/series-input.js';
import { Unit } from '../framework/types.js';
import {
  highDev,
  lowDev,
  percentileRank,
  s25,
  s75,
  smax,
  smean,
  smedian,
  smin,
} from '../primitives/stats.js';

export const EstimateSchema = z.object({
  /** Value in the analysis' standard unit; null when not yet converted */
  value: z.number().nullable(),
  citation: z.string().optional(),
  link: z.string().optional(),
  /** Originally published value, when a conversion was applied */
  rawValue: z.number().optional(),
  rawUnits: z.string().optional(),
  notes: z.string().optional(),
  /** Partition the estimate applies to, e.g. 'Latin America, Suburban' */
  subDomain: z.string().optional(),
});

export const MetaAnalysisInputSchema = z.object({
  parameter: z.string().min(1),
  title: z.string().optional(),
  notes: z.string().optional(),
  unit: z.string().min(1),
  estimates: z.array(EstimateSchema).default([]),
});

export type Estimate = z.output<typeof EstimateSchema>;
export type MetaAnalysisInput = z.input<typeof MetaAnalysisInputSchema>;

export interface Quantiles {
  min: number;
  q25: number;
  median: number;
  q75: number;
  max: number;
}

export interface LowMeanHigh {
  low: number;
  mean: number;
  high: number;
}

export type CoefficientChoice = 'low' | 'mean' | 'high' | 'median';

export class ParameterMetaAnalysis {
  readonly parameter: string;
  readonly title: string | undefined;
  readonly notes: string | undefined;
  readonly unit: Unit;
  readonly estimates: readonly Readonly<Estimate>[];

  constructor(init: { parameter: string; unit: Unit; title?: string; notes?: string; estimates?: readonly Estimate[] }) {
    this.parameter = init.parameter;
    this.unit = init.unit;
    this.title = init.title;
    this.notes = init.notes;
    this.estimates = Object.freeze((init.estimates ?? []).map(e => Object.freeze({ ...e })));
    Object.freeze(this);
  }

  /**
   * Validate plain data and build an analysis.
   *
   * @throws InvalidDefinition listing every schema problem
   */
  static parse(input: unknown): ParameterMetaAnalysis {
    const parsed = MetaAnalysisInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidDefinitionError('meta-analysis', formatIssues(parsed.error));
    }
    return new ParameterMetaAnalysis(parsed.data);
  }

  values(): Array<number | null> {
    return this.estimates.map(e => e.value);
  }

  /**
   * Estimates for one sub-domain (matched against the comma-separated list).
   */
  forSubDomain(subDomain: string): ParameterMetaAnalysis {
    const wanted = subDomain.trim().toLowerCase();
    return new ParameterMetaAnalysis({
      parameter: this.parameter,
      unit: this.unit,
      title: this.title,
      notes: this.notes,
      estimates: this.estimates.filter(e =>
        (e.subDomain ?? '').split(',').some(part => part.trim().toLowerCase() === wanted)
      ),
    });
  }

  quantiles(): Quantiles {
    const vs = this.values();
    return {
      min: smin(vs),
      q25: s25(vs),
      median: smedian(vs),
      q75: s75(vs),
      max: smax(vs),
    };
  }

  lowMeanHigh(): LowMeanHigh {
    const vs = this.values();
    return { low: lowDev(vs), mean: smean(vs), high: highDev(vs) };
  }

  percentileRank(value: number, extended: boolean = true): number {
    return percentileRank(this.values(), value, extended);
  }

  /**
   * A scalar coefficient picked from the estimates.
   */
  coefficient(choice: CoefficientChoice = 'mean'): number {
    if (choice === 'median') return this.quantiles().median;
    return this.lowMeanHigh()[choice];
  }
}
