/**
 * Categorical encoders
 */

import { argmax, type Matrix, type Row, type Scalar } from '@strata/core';
import { ValidationError } from '@strata/utils';
import { BaseEncoder, column } from './base.js';

const TYPE_ORDER = ['boolean', 'number', 'string'];

/**
 * Deterministic category order: booleans, numbers, strings, then missing
 */
export function compareCategories(a: Scalar, b: Scalar): number {
  if (a === b) {
    return 0;
  }
  if (a === null) {
    return 1;
  }
  if (b === null) {
    return -1;
  }
  const typeDelta = TYPE_ORDER.indexOf(typeof a) - TYPE_ORDER.indexOf(typeof b);
  if (typeDelta !== 0) {
    return typeDelta;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  return String(a) < String(b) ? -1 : 1;
}

export function uniqueCategories(values: readonly Scalar[]): Scalar[] {
  return [...new Set(values)].sort(compareCategories);
}

function formatCategory(value: Scalar): string {
  return value === null ? 'null' : String(value);
}

export type HandleUnknown = 'ignore' | 'error';

export interface OneHotEncoderOptions {
  handleUnknown: HandleUnknown;
}

/**
 * One indicator column per category per input column (`column=value`).
 * Unknown categories encode to all zeros when ignored.
 */
export class OneHotEncoder extends BaseEncoder {
  readonly kind = 'one_hot_encoder';
  private categories: Scalar[][] = [];

  constructor(private readonly options: OneHotEncoderOptions = { handleUnknown: 'ignore' }) {
    super();
  }

  protected fitColumns(rows: readonly Row[], width: number): void {
    this.categories = [];
    for (let i = 0; i < width; i++) {
      this.categories.push(uniqueCategories(column(rows, i)));
    }
  }

  protected transformRows(rows: readonly Row[]): number[][] {
    return rows.map((row) =>
      row.flatMap((value, i) => {
        const categories = this.categories[i] ?? [];
        const position = categories.indexOf(value);
        if (position === -1 && this.options.handleUnknown === 'error') {
          throw new ValidationError(`${this.kind}: unknown category ${JSON.stringify(value)} in column ${i}`, {
            column: i,
          });
        }
        return categories.map((_, c) => (c === position ? 1 : 0));
      })
    );
  }

  protected inverseRows(encoded: Matrix): Scalar[][] {
    return encoded.map((row) => {
      let offset = 0;
      return this.categories.map((categories) => {
        const block = row.slice(offset, offset + categories.length);
        offset += categories.length;
        if (!block.some((value) => value > 0)) {
          return null;
        }
        return categories[argmax(block)] ?? null;
      });
    });
  }

  outputColumns(columns: readonly string[]): string[] {
    this.requireFitted();
    return columns.flatMap((name, i) =>
      (this.categories[i] ?? []).map((category) => `${name}=${formatCategory(category)}`)
    );
  }

  getParams(): Readonly<Record<string, unknown>> {
    return { categories: this.categories.map((categories) => [...categories]) };
  }
}

export interface OrdinalEncoderOptions {
  handleUnknown: HandleUnknown;
  /** Code for unknown categories when they are ignored */
  unknownValue: number;
}

/**
 * Category → position in the sorted category list
 */
export class OrdinalEncoder extends BaseEncoder {
  readonly kind = 'ordinal_encoder';
  private categories: Scalar[][] = [];

  constructor(private readonly options: OrdinalEncoderOptions = { handleUnknown: 'error', unknownValue: -1 }) {
    super();
  }

  protected fitColumns(rows: readonly Row[], width: number): void {
    this.categories = [];
    for (let i = 0; i < width; i++) {
      this.categories.push(uniqueCategories(column(rows, i)));
    }
  }

  protected transformRows(rows: readonly Row[]): number[][] {
    return rows.map((row) =>
      row.map((value, i) => {
        const position = (this.categories[i] ?? []).indexOf(value);
        if (position !== -1) {
          return position;
        }
        if (this.options.handleUnknown === 'error') {
          throw new ValidationError(`${this.kind}: unknown category ${JSON.stringify(value)} in column ${i}`, {
            column: i,
          });
        }
        return this.options.unknownValue;
      })
    );
  }

  protected inverseRows(encoded: Matrix): Scalar[][] {
    return encoded.map((row) => row.map((code, i) => (this.categories[i] ?? [])[Math.round(code)] ?? null));
  }

  outputColumns(columns: readonly string[]): string[] {
    return [...columns];
  }

  getParams(): Readonly<Record<string, unknown>> {
    return { categories: this.categories.map((categories) => [...categories]) };
  }
}

/**
 * Single-column binarizer: two classes → one 0/1 column, more → one-hot
 */
export class LabelBinarizer extends BaseEncoder {
  readonly kind = 'label_binarizer';
  private classes: Scalar[] = [];

  protected fitColumns(rows: readonly Row[], width: number): void {
    if (width !== 1) {
      throw new RangeError(`${this.kind} takes exactly one column, got ${width}`);
    }
    this.classes = uniqueCategories(column(rows, 0));
  }

  private get binary(): boolean {
    return this.classes.length <= 2;
  }

  protected transformRows(rows: readonly Row[]): number[][] {
    return rows.map((row) => {
      const position = this.classes.indexOf(row[0] ?? null);
      if (this.binary) {
        return [position === 1 ? 1 : 0];
      }
      return this.classes.map((_, c) => (c === position ? 1 : 0));
    });
  }

  protected inverseRows(encoded: Matrix): Scalar[][] {
    return encoded.map((row) => {
      if (this.binary) {
        return [this.classes[(row[0] ?? 0) >= 0.5 ? 1 : 0] ?? null];
      }
      return [this.classes[argmax(row)] ?? null];
    });
  }

  outputColumns(columns: readonly string[]): string[] {
    this.requireFitted();
    const name = columns[0] ?? 'label';
    if (this.binary) {
      return [`${name}=${formatCategory(this.classes[1] ?? null)}`];
    }
    return this.classes.map((category) => `${name}=${formatCategory(category)}`);
  }

  getParams(): Readonly<Record<string, unknown>> {
    return { classes: [...this.classes] };
  }
}
