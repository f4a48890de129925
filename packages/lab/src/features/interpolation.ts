/**
 * Interpolation
 *
 * Linear fill of missing float values along the row (time) axis; values
 * before the first / after the last known value take the nearest known value.
 *
 * Fit-split rows are filled from fit-split rows alone. Each other split is
 * filled together with the (already filled) fit rows and keeps only its own
 * rows, so evaluation values never reach the training rows.
 */

import type { Dtype, Row, Scalar } from '@strata/core';
import { FilterError } from '@strata/utils';
import { z } from 'zod';
import { ColumnFilterSchema, resolveFilter } from './column-filter.js';
import { assertFitSource, type FitSource } from './fit-source.js';

export const InterpolaterStepSchema = ColumnFilterSchema.extend({
  method: z.literal('linear').default('linear'),
}).strict();

export type InterpolaterStepInput = z.input<typeof InterpolaterStepSchema>;
export type InterpolaterStep = z.output<typeof InterpolaterStepSchema>;

export type InterpolationLayout =
  /** Tabular rows; `groups` are the row sets of each non-fit split */
  | { readonly kind: 'rows'; readonly groups: readonly (readonly number[])[] }
  /** Stacked sequences; each sample is filled on its own */
  | { readonly kind: 'sequences'; readonly timesteps: number };

/**
 * Fill missing values of `values` located at `positions` (ascending)
 */
export function interpolateLinear(positions: readonly number[], values: readonly (number | null)[]): (number | null)[] {
  const known: number[] = [];
  values.forEach((value, i) => {
    if (value !== null && Number.isFinite(value)) {
      known.push(i);
    }
  });
  if (known.length === 0) {
    return [...values];
  }

  const result: (number | null)[] = [...values];
  let cursor = 0;
  for (let i = 0; i < values.length; i++) {
    while (cursor < known.length && (known[cursor] ?? Infinity) < i) {
      cursor++;
    }
    if (known[cursor] === i) {
      continue;
    }
    const next = known[cursor];
    const prev = cursor > 0 ? known[cursor - 1] : undefined;
    const prevValue = prev === undefined ? null : values[prev] ?? null;
    const nextValue = next === undefined ? null : values[next] ?? null;

    if (prev !== undefined && next !== undefined && prevValue !== null && nextValue !== null) {
      const x0 = positions[prev] ?? prev;
      const x1 = positions[next] ?? next;
      const x = positions[i] ?? i;
      result[i] = x1 === x0 ? prevValue : prevValue + ((nextValue - prevValue) * (x - x0)) / (x1 - x0);
    } else {
      result[i] = prevValue ?? nextValue;
    }
  }
  return result;
}

function numeric(value: Scalar): number | null {
  return typeof value === 'number' ? value : null;
}

export interface ResolveInterpolatersetOptions {
  columns: readonly string[];
  dtypes: Readonly<Record<string, Dtype>>;
  steps: readonly InterpolaterStep[];
  configKey: string;
}

export class Interpolaterset {
  private constructor(
    readonly columns: readonly string[],
    readonly interpolated: readonly string[],
    private readonly columnIndices: readonly number[]
  ) {}

  static resolve(options: ResolveInterpolatersetOptions): Interpolaterset {
    const { columns, dtypes, steps, configKey } = options;
    let remaining: readonly string[] = columns;
    const claimed: string[] = [];

    steps.forEach((step, index) => {
      const stepKey = `${configKey}[${index}]`;
      // without criteria a step takes the remaining float columns
      const filter =
        step.dtypes === undefined && step.columns === undefined ? { ...step, dtypes: ['float' as const] } : step;
      const { matched, remaining: rest } = resolveFilter(remaining, dtypes, filter, stepKey);
      const nonFloat = matched.filter((column) => dtypes[column] !== 'float');
      if (nonFloat.length > 0) {
        throw new FilterError(
          `Interpolation applies to float columns only, got ${nonFloat.join(', ')}`,
          stepKey,
          { columns: nonFloat }
        );
      }
      claimed.push(...matched);
      remaining = rest;
    });

    const ordered = columns.filter((column) => claimed.includes(column));
    return new Interpolaterset(
      [...columns],
      ordered,
      ordered.map((column) => columns.indexOf(column))
    );
  }

  get isEmpty(): boolean {
    return this.columnIndices.length === 0;
  }

  /**
   * Fill a fold context's rows, fit split first
   */
  apply(rows: readonly Row[], layout: InterpolationLayout, source: FitSource): Row[] {
    assertFitSource(source, 'Interpolaterset.apply');
    if (this.isEmpty) {
      return [...rows];
    }
    if (layout.kind === 'sequences') {
      return this.applySequences(rows, layout.timesteps);
    }

    const result: Scalar[][] = rows.map((row) => [...row]);
    const fitRows = [...source.rows].sort((a, b) => a - b);
    const done = new Set(fitRows);
    const passes: Array<{ anchors: number[]; own: number[] }> = [{ anchors: [], own: fitRows }];

    for (const group of layout.groups) {
      const own = group.filter((row) => !done.has(row));
      own.forEach((row) => done.add(row));
      if (own.length > 0) {
        passes.push({ anchors: fitRows, own });
      }
    }

    // rows outside every split (pruned window leads) come last
    const outside = rows.map((_, i) => i).filter((row) => !done.has(row));
    if (outside.length > 0) {
      passes.push({ anchors: rows.map((_, i) => i).filter((row) => done.has(row)), own: outside });
    }

    for (const columnIndex of this.columnIndices) {
      for (const { anchors, own } of passes) {
        this.fill(result, columnIndex, anchors, own);
      }
    }
    return result;
  }

  /**
   * Fill new data on its own (inference). No transformer state is learned.
   */
  applyStandalone(rows: readonly Row[], timesteps: number | null): Row[] {
    if (this.isEmpty) {
      return [...rows];
    }
    if (timesteps !== null) {
      return this.applySequences(rows, timesteps);
    }
    const result: Scalar[][] = rows.map((row) => [...row]);
    const all = rows.map((_, i) => i);
    for (const columnIndex of this.columnIndices) {
      this.fill(result, columnIndex, [], all);
    }
    return result;
  }

  private applySequences(rows: readonly Row[], timesteps: number): Row[] {
    const result: Scalar[][] = rows.map((row) => [...row]);
    for (let start = 0; start < rows.length; start += timesteps) {
      const block = Array.from({ length: Math.min(timesteps, rows.length - start) }, (_, i) => start + i);
      for (const columnIndex of this.columnIndices) {
        this.fill(result, columnIndex, [], block);
      }
    }
    return result;
  }

  /**
   * Interpolate over anchors ∪ own (row order), writing only `own`
   */
  private fill(result: Scalar[][], columnIndex: number, anchors: readonly number[], own: readonly number[]): void {
    const positions = [...new Set([...anchors, ...own])].sort((a, b) => a - b);
    const values = positions.map((row) => numeric(result[row]?.[columnIndex] ?? null));
    const filled = interpolateLinear(positions, values);
    const write = new Set(own);
    positions.forEach((row, i) => {
      const target = result[row];
      if (target && write.has(row)) {
        target[columnIndex] = filled[i] ?? null;
      }
    });
  }
}
