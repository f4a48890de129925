/**
 * Leakage guard
 *
 * Every fit (encoder or interpolation) receives a FitSource built from the
 * splitset or foldset: the fit split's sample indices and the rows behind
 * them. Only `train` (plain context) or `fold_train` (fold context) may be
 * fit on, and a fit may read no row outside its split.
 */

import type { AnySplitName, FoldContext, Foldset, Splitset } from '@strata/core';
import { ConfigurationError, LeakageGuardViolation } from '@strata/utils';

export interface FitSource {
  readonly split: AnySplitName;
  readonly foldIndex: FoldContext;
  /** Sample indices of the fit split */
  readonly samples: readonly number[];
  /** Row indices (not sample indices) the fit reads */
  readonly rows: readonly number[];
  /** Every row the fit split's samples cover */
  readonly permittedRows: ReadonlySet<number>;
}

export type RowsOfSamples = (samples: readonly number[]) => number[];

const sameRows: RowsOfSamples = (samples) => [...samples];

export function fitSplitFor(foldIndex: FoldContext): AnySplitName {
  return foldIndex === null ? 'train' : 'fold_train';
}

/**
 * Sample indices a fold context may fit on
 */
export function fitSamplesFor(splitset: Splitset, foldset: Foldset | null, foldIndex: FoldContext): readonly number[] {
  if (foldIndex === null) {
    return splitset.samples.train;
  }
  const fold = foldset?.folds[foldIndex];
  if (!fold) {
    throw new ConfigurationError(`Fold ${foldIndex} does not exist`, 'foldIndex');
  }
  return fold.samples.fold_train;
}

/**
 * Fit source over a fit split's samples; `rowsOf` maps samples to the rows
 * behind them (windows and sequences span several rows)
 */
export function createFitSource(
  foldIndex: FoldContext,
  samples: readonly number[],
  rowsOf: RowsOfSamples = sameRows
): FitSource {
  const rows = rowsOf(samples);
  return { split: fitSplitFor(foldIndex), foldIndex, samples, rows, permittedRows: new Set(rows) };
}

export function assertFitSource(source: FitSource, operation: string): void {
  const expected = fitSplitFor(source.foldIndex);
  if (source.split !== expected) {
    throw new LeakageGuardViolation(
      `${operation} attempted to fit on '${source.split}' in fold context ${source.foldIndex ?? 'none'}; only '${expected}' may be fit on`,
      { operation, split: source.split, foldIndex: source.foldIndex }
    );
  }
  const outside = source.rows.filter((row) => !source.permittedRows.has(row));
  if (outside.length > 0) {
    throw new LeakageGuardViolation(
      `${operation} attempted to fit on ${outside.length} row(s) outside '${source.split}' in fold context ${source.foldIndex ?? 'none'}`,
      { operation, split: source.split, foldIndex: source.foldIndex, rows: outside.slice(0, 10) }
    );
  }
}
