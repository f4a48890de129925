/**
 * Encoder Registry
 *
 * Maps encoder kinds to definitions. Options are coerced (dense output, no
 * in-place mutation), then validated against the kind's schema.
 */

import { ConfigurationError } from '@strata/utils';
import { z } from 'zod';
import { logger } from '../../logger.js';
import { LabelBinarizer, OneHotEncoder, OrdinalEncoder } from './categorical.js';
import { MinMaxScaler, RobustScaler, StandardScaler } from './scalers.js';
import type { Encoder, EncoderDefinition, EncoderOptions } from './types.js';

// Encoders always emit dense copies. These keys are accepted and coerced to
// that behaviour; no encoder reads them.
const CommonOptions = {
  sparse: z.boolean().optional(),
  sparseOutput: z.boolean().optional(),
  copy: z.boolean().optional(),
};

const StandardScalerSchema = z
  .object({ ...CommonOptions, withMean: z.boolean().default(true), withStd: z.boolean().default(true) })
  .strict();

const MinMaxScalerSchema = z
  .object({
    ...CommonOptions,
    featureRange: z
      .tuple([z.number(), z.number()])
      .refine(([low, high]) => low < high, 'featureRange must be increasing')
      .default([0, 1]),
  })
  .strict();

const EmptySchema = z.object(CommonOptions).strict();

const OneHotSchema = z
  .object({ ...CommonOptions, handleUnknown: z.enum(['ignore', 'error']).default('ignore') })
  .strict();

const OrdinalSchema = z
  .object({
    ...CommonOptions,
    handleUnknown: z.enum(['ignore', 'error']).default('error'),
    unknownValue: z.number().default(-1),
  })
  .strict();

function parseOptions<TOut>(
  schema: z.ZodType<TOut, z.ZodTypeDef, unknown>,
  kind: string,
  options: EncoderOptions
): TOut {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid options for ${kind}: ${parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ')}`,
      'encoder.options',
      { kind }
    );
  }
  return parsed.data;
}

/**
 * Force dense output and copy semantics, logging every override
 */
export function coerceEncoderOptions(kind: string, options: EncoderOptions): EncoderOptions {
  const coerced: Record<string, unknown> = { ...options };
  for (const key of ['sparse', 'sparseOutput']) {
    if (coerced[key] === true) {
      logger.info('Encoder option coerced', { kind, option: key, from: true, to: false });
      coerced[key] = false;
    }
  }
  if (coerced.copy === false) {
    logger.info('Encoder option coerced', { kind, option: 'copy', from: false, to: true });
    coerced.copy = true;
  }
  return coerced;
}

export class EncoderRegistry {
  private definitions: Map<string, EncoderDefinition> = new Map();

  constructor() {
    this.registerDefaultEncoders();
  }

  register(definition: EncoderDefinition): void {
    this.definitions.set(definition.kind, definition);
  }

  get(kind: string): EncoderDefinition | undefined {
    return this.definitions.get(kind);
  }

  /**
   * Definition for a kind, or a ConfigurationError naming the known kinds
   */
  require(kind: string, configKey: string): EncoderDefinition {
    const definition = this.definitions.get(kind);
    if (!definition) {
      throw new ConfigurationError(
        `Unknown encoder kind '${kind}' (known: ${this.listKinds().join(', ')})`,
        configKey,
        { kind }
      );
    }
    return definition;
  }

  listKinds(): string[] {
    return Array.from(this.definitions.keys());
  }

  /**
   * Fresh, unfitted encoder with coerced options
   */
  create(kind: string, options: EncoderOptions, configKey: string): Encoder {
    return this.require(kind, configKey).create(coerceEncoderOptions(kind, options));
  }

  private registerDefaultEncoders(): void {
    this.register({
      kind: 'standard_scaler',
      name: 'Standard Scaler',
      numericOnly: true,
      supportsMultipleColumns: true,
      create: (options) => new StandardScaler(parseOptions(StandardScalerSchema, 'standard_scaler', options)),
    });

    this.register({
      kind: 'min_max_scaler',
      name: 'Min-Max Scaler',
      numericOnly: true,
      supportsMultipleColumns: true,
      create: (options) => new MinMaxScaler(parseOptions(MinMaxScalerSchema, 'min_max_scaler', options)),
    });

    this.register({
      kind: 'robust_scaler',
      name: 'Robust Scaler',
      numericOnly: true,
      supportsMultipleColumns: true,
      create: (options) => {
        parseOptions(EmptySchema, 'robust_scaler', options);
        return new RobustScaler();
      },
    });

    this.register({
      kind: 'one_hot_encoder',
      name: 'One-Hot Encoder',
      numericOnly: false,
      supportsMultipleColumns: true,
      create: (options) => new OneHotEncoder(parseOptions(OneHotSchema, 'one_hot_encoder', options)),
    });

    this.register({
      kind: 'ordinal_encoder',
      name: 'Ordinal Encoder',
      numericOnly: false,
      supportsMultipleColumns: true,
      create: (options) => new OrdinalEncoder(parseOptions(OrdinalSchema, 'ordinal_encoder', options)),
    });

    this.register({
      kind: 'label_binarizer',
      name: 'Label Binarizer',
      numericOnly: false,
      supportsMultipleColumns: false,
      create: (options) => {
        parseOptions(EmptySchema, 'label_binarizer', options);
        return new LabelBinarizer();
      },
    });
  }
}

export const defaultEncoderRegistry = new EncoderRegistry();

/**
 * Register a custom encoder kind on the default registry
 */
export function registerEncoder(definition: EncoderDefinition): void {
  defaultEncoderRegistry.register(definition);
}
