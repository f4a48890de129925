/**
 * Pipeline configuration and results
 */

import type {
  AnySplitName,
  Dataset,
  FoldContext,
  InputShapes,
  Tensor,
} from '@strata/core';
import { z } from 'zod';
import { EncoderDeclarationSchema, EncoderStepSchema, type FittedEncoderset } from '../features/Encoderset.js';
import { InterpolaterStepSchema } from '../features/interpolation.js';
import { WindowSpecSchema } from '../windows/types.js';

export function isDataset(value: unknown): value is Dataset {
  if (typeof value !== 'object' || value === null || !('kind' in value) || !('id' in value)) {
    return false;
  }
  if (value.kind === 'tabular') {
    return 'rows' in value && Array.isArray(value.rows);
  }
  if (value.kind === 'sequence') {
    return 'sequences' in value && Array.isArray(value.sequences);
  }
  return false;
}

const DatasetSchema = z.custom<Dataset>(isDataset, {
  message: 'Expected a dataset built with tabular(), fromRecords() or sequence()',
});

export const FeatureInputSchema = z
  .object({
    dataset: DatasetSchema,
    includeColumns: z.array(z.string()).optional(),
    excludeColumns: z.array(z.string()).optional(),
    interpolaters: z.array(InterpolaterStepSchema).default([]),
    window: WindowSpecSchema.optional(),
    encoders: z.array(EncoderStepSchema).default([]),
  })
  .strict();

export const TargetSchema = z
  .object({
    dataset: DatasetSchema,
    /** One column, or several (e.g. an already one-hot label) */
    column: z.union([z.string(), z.array(z.string())]),
    /** Linearly fill missing values of float label columns */
    interpolate: z.boolean().default(false),
    encoder: EncoderDeclarationSchema.optional(),
  })
  .strict();

export const StratifierConfigSchema = z
  .object({
    sizeTest: z.number().optional(),
    sizeValidation: z.number().optional(),
    foldCount: z.number().int().optional(),
    binCount: z.number().int().optional(),
    /** Stratify unlabeled data by a column of the first input's dataset */
    stratifyColumn: z.string().optional(),
    seed: z.number().int().nonnegative().optional(),
    foldRemainder: z.enum(['first', 'last']).default('first'),
  })
  .strict();

export const PipelineConfigSchema = z
  .object({
    id: z.string().min(1).optional(),
    inputs: z.array(FeatureInputSchema).min(1),
    target: TargetSchema.optional(),
    stratifier: StratifierConfigSchema.default({}),
  })
  .strict();

export type FeatureInputConfig = z.output<typeof FeatureInputSchema>;
export type TargetConfig = z.output<typeof TargetSchema>;
export type StratifierConfig = z.output<typeof StratifierConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type PipelineConfig = z.output<typeof PipelineConfigSchema>;

/**
 * Tensors of one split in one fold context
 */
export interface SplitTensors {
  readonly split: AnySplitName;
  readonly foldIndex: FoldContext;
  /** Sample indices, ascending */
  readonly indices: readonly number[];
  /** One tensor per feature input */
  readonly features: readonly Tensor[];
  readonly label: Tensor | null;
}

/**
 * Transformers fit for one (pipeline, fold) context
 */
export interface FittedContext {
  readonly foldIndex: FoldContext;
  readonly inputs: readonly FittedEncoderset[];
  readonly label: FittedEncoderset | null;
  readonly shapes: InputShapes;
}

/**
 * New samples encoded with train-only fits
 */
export interface EncodedSamples {
  readonly sampleCount: number;
  readonly features: readonly Tensor[];
  readonly label: Tensor | null;
}

export interface NewSamples {
  /** One dataset per feature input, holding the same columns */
  readonly inputs: readonly Dataset[];
  readonly target?: Dataset;
}
