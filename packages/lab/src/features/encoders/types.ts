/**
 * Encoder contract
 *
 * An encoder sees only the columns its step claimed, as rows of raw cells.
 */

import type { Matrix, Row, Scalar } from '@strata/core';

export interface Encoder {
  readonly kind: string;
  fit(rows: readonly Row[]): void;
  transform(rows: readonly Row[]): number[][];
  inverseTransform(encoded: Matrix): Scalar[][];
  /** Names of the encoded output columns */
  outputColumns(columns: readonly string[]): string[];
  /** Learned state, for inspection and tests */
  getParams(): Readonly<Record<string, unknown>>;
}

export type EncoderOptions = Readonly<Record<string, unknown>>;

export interface EncoderDefinition {
  kind: string;
  name: string;
  /** Rejects string columns at build time */
  numericOnly: boolean;
  /** Can be given more than one column at once */
  supportsMultipleColumns: boolean;
  create(options: EncoderOptions): Encoder;
}
