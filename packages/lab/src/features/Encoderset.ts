/**
 * Encoderset
 *
 * Ordered encoder steps over a fixed column list. Each step claims the
 * columns its filter matches among those not claimed by an earlier step;
 * whatever no step claims passes through unencoded.
 */

import type { Dtype, Matrix, Row, Scalar } from '@strata/core';
import { ConfigurationError } from '@strata/utils';
import { z } from 'zod';
import { logger } from '../logger.js';
import { ColumnFilterSchema, resolveFilter } from './column-filter.js';
import { assertFitSource, type FitSource } from './fit-source.js';
import { coerceEncoderOptions, defaultEncoderRegistry, type EncoderRegistry } from './encoders/EncoderRegistry.js';
import { toNumber } from './encoders/base.js';
import type { Encoder, EncoderDefinition, EncoderOptions } from './encoders/types.js';

export const EncoderDeclarationSchema = z
  .object({
    kind: z.string().min(1),
    options: z.record(z.unknown()).default({}),
  })
  .strict();

export type EncoderDeclarationInput = z.input<typeof EncoderDeclarationSchema>;
export type EncoderDeclaration = z.output<typeof EncoderDeclarationSchema>;

export const EncoderStepSchema = ColumnFilterSchema.extend({
  encoder: EncoderDeclarationSchema,
}).strict();

export type EncoderStepInput = z.input<typeof EncoderStepSchema>;
export type EncoderStep = z.output<typeof EncoderStepSchema>;

export interface EncoderStepPlan {
  readonly index: number;
  readonly kind: string;
  readonly definition: EncoderDefinition;
  readonly options: EncoderOptions;
  readonly columns: readonly string[];
  readonly columnIndices: readonly number[];
}

export interface ResolveEncodersetOptions {
  columns: readonly string[];
  dtypes: Readonly<Record<string, Dtype>>;
  steps: readonly EncoderStep[];
  configKey: string;
  registry?: EncoderRegistry;
}

function project(rows: readonly Row[], indices: readonly number[]): Row[] {
  return rows.map((row) => indices.map((index) => row[index] ?? null));
}

export class Encoderset {
  private constructor(
    readonly columns: readonly string[],
    readonly steps: readonly EncoderStepPlan[],
    readonly leftover: readonly string[],
    private readonly leftoverIndices: readonly number[]
  ) {}

  /**
   * Resolve filters and validate every step. Throws ConfigurationError /
   * FilterError; never touches data.
   */
  static resolve(options: ResolveEncodersetOptions): Encoderset {
    const { columns, dtypes, steps, configKey } = options;
    const registry = options.registry ?? defaultEncoderRegistry;
    let remaining: readonly string[] = columns;
    const plans: EncoderStepPlan[] = [];

    steps.forEach((step, index) => {
      const stepKey = `${configKey}[${index}]`;
      const definition = registry.require(step.encoder.kind, stepKey);
      if (remaining.length === 0) {
        throw new ConfigurationError('Every column is already claimed by an earlier encoder step', stepKey);
      }
      const { matched, remaining: rest } = resolveFilter(remaining, dtypes, step, stepKey);

      if (!definition.supportsMultipleColumns && matched.length > 1) {
        throw new ConfigurationError(
          `${definition.kind} takes a single column, but its filter matched ${matched.length}: ${matched.join(', ')}`,
          stepKey
        );
      }
      if (definition.numericOnly) {
        const nonNumeric = matched.filter((column) => dtypes[column] === 'string');
        if (nonNumeric.length > 0) {
          throw new ConfigurationError(
            `${definition.kind} needs numeric columns, got string column(s) ${nonNumeric.join(', ')}`,
            stepKey
          );
        }
      }

      const coerced = coerceEncoderOptions(definition.kind, step.encoder.options);
      // option errors surface at build time
      definition.create(coerced);

      plans.push({
        index,
        kind: definition.kind,
        definition,
        options: coerced,
        columns: matched,
        columnIndices: matched.map((column) => columns.indexOf(column)),
      });
      remaining = rest;
    });

    const unencodedStrings = remaining.filter((column) => dtypes[column] === 'string');
    if (unencodedStrings.length > 0) {
      throw new ConfigurationError(
        `String column(s) ${unencodedStrings.join(', ')} are not claimed by any encoder`,
        configKey
      );
    }

    return new Encoderset(
      [...columns],
      plans,
      remaining,
      remaining.map((column) => columns.indexOf(column))
    );
  }

  /**
   * Fit every step on the fit-source rows only
   */
  fit(rows: readonly Row[], source: FitSource): FittedEncoderset {
    assertFitSource(source, 'Encoderset.fit');
    const fitRows = source.rows.map((index) => {
      const row = rows[index];
      if (row === undefined) {
        throw new RangeError(`Fit row ${index} out of range (${rows.length} rows)`);
      }
      return row;
    });
    if (fitRows.length === 0 && this.steps.length > 0) {
      throw new ConfigurationError('Cannot fit encoders on an empty fit split', 'encoders', {
        split: source.split,
        foldIndex: source.foldIndex,
      });
    }

    const encoders = this.steps.map((step) => {
      const encoder = step.definition.create(step.options);
      encoder.fit(project(fitRows, step.columnIndices));
      return encoder;
    });

    logger.debug('Fitted encoders', {
      split: source.split,
      foldIndex: source.foldIndex,
      rows: fitRows.length,
      steps: this.steps.map((step) => ({ kind: step.kind, columns: step.columns })),
    });

    return new FittedEncoderset(this, encoders, this.leftoverIndices);
  }
}

/**
 * Encoders fit for one (pipeline, fold) context
 */
export class FittedEncoderset {
  private readonly widths: number[];

  constructor(
    readonly plan: Encoderset,
    private readonly encoders: readonly Encoder[],
    private readonly leftoverIndices: readonly number[]
  ) {
    this.widths = plan.steps.map((step, i) => this.encoderAt(i).outputColumns(step.columns).length);
  }

  private encoderAt(index: number): Encoder {
    const encoder = this.encoders[index];
    if (!encoder) {
      throw new RangeError(`No encoder for step ${index}`);
    }
    return encoder;
  }

  /**
   * Encoded step outputs in step order, then the leftover columns in their
   * original order
   */
  transform(rows: readonly Row[]): number[][] {
    const stepOutputs = this.plan.steps.map((step, i) => this.encoderAt(i).transform(project(rows, step.columnIndices)));
    return rows.map((row, r) => [
      ...stepOutputs.flatMap((output) => output[r] ?? []),
      ...this.leftoverIndices.map((index) => toNumber(row[index] ?? null)),
    ]);
  }

  /**
   * Decode back to the original column order
   */
  inverseTransform(encoded: Matrix): Scalar[][] {
    const expected = this.outputColumns().length;
    const decodedSteps: Scalar[][][] = [];
    let offset = 0;
    this.plan.steps.forEach((_, i) => {
      const width = this.widths[i] ?? 0;
      const slice = encoded.map((row) => row.slice(offset, offset + width));
      decodedSteps.push(this.encoderAt(i).inverseTransform(slice));
      offset += width;
    });

    return encoded.map((row, r) => {
      if (row.length !== expected) {
        throw new RangeError(`Expected ${expected} encoded columns, got ${row.length}`);
      }
      const decoded: Scalar[] = new Array<Scalar>(this.plan.columns.length).fill(null);
      this.plan.steps.forEach((step, i) => {
        const values = decodedSteps[i]?.[r] ?? [];
        step.columnIndices.forEach((columnIndex, c) => {
          decoded[columnIndex] = values[c] ?? null;
        });
      });
      this.leftoverIndices.forEach((columnIndex, c) => {
        const value = row[offset + c];
        decoded[columnIndex] = value === undefined || Number.isNaN(value) ? null : value;
      });
      return decoded;
    });
  }

  outputColumns(): string[] {
    return [
      ...this.plan.steps.flatMap((step, i) => this.encoderAt(i).outputColumns(step.columns)),
      ...this.plan.leftover,
    ];
  }

  /**
   * Learned parameters per step
   */
  params(): Array<{ kind: string; columns: readonly string[]; params: Readonly<Record<string, unknown>> }> {
    return this.plan.steps.map((step, i) => ({
      kind: step.kind,
      columns: step.columns,
      params: this.encoderAt(i).getParams(),
    }));
  }
}
