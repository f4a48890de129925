import type { Matrix, Row, Scalar } from '@strata/core';
import type { Encoder } from './types.js';

/**
 * Numeric view of a cell: booleans as 0/1, missing as NaN
 */
export function toNumber(value: Scalar): number {
  if (value === null) {
    return Number.NaN;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'number') {
    return value;
  }
  throw new TypeError(`Expected a numeric value, got ${JSON.stringify(value)}`);
}

export function column(rows: readonly Row[], index: number): Scalar[] {
  return rows.map((row) => row[index] ?? null);
}

export function finite(values: readonly number[]): number[] {
  return values.filter((value) => Number.isFinite(value));
}

/**
 * Shared bookkeeping: fit-before-use and column count checks
 */
export abstract class BaseEncoder implements Encoder {
  abstract readonly kind: string;
  protected columnCount: number | null = null;

  fit(rows: readonly Row[]): void {
    if (rows.length === 0) {
      throw new RangeError(`${this.kind}: cannot fit on zero rows`);
    }
    const width = rows[0]?.length ?? 0;
    this.fitColumns(rows, width);
    this.columnCount = width;
  }

  transform(rows: readonly Row[]): number[][] {
    const width = this.requireFitted();
    for (const row of rows) {
      if (row.length !== width) {
        throw new RangeError(`${this.kind}: expected ${width} columns, got ${row.length}`);
      }
    }
    return this.transformRows(rows);
  }

  inverseTransform(encoded: Matrix): Scalar[][] {
    this.requireFitted();
    return this.inverseRows(encoded);
  }

  protected requireFitted(): number {
    if (this.columnCount === null) {
      throw new Error(`${this.kind} used before fit`);
    }
    return this.columnCount;
  }

  abstract outputColumns(columns: readonly string[]): string[];
  abstract getParams(): Readonly<Record<string, unknown>>;
  protected abstract fitColumns(rows: readonly Row[], width: number): void;
  protected abstract transformRows(rows: readonly Row[]): number[][];
  protected abstract inverseRows(encoded: Matrix): Scalar[][];
}
