/**
 * Splits and folds
 */

export type SplitName = 'train' | 'validation' | 'test';
export type FoldSplitName = 'fold_train' | 'fold_evaluation';
export type AnySplitName = SplitName | FoldSplitName;

export const SPLIT_ORDER: readonly SplitName[] = ['train', 'validation', 'test'];
export const FOLD_SPLIT_ORDER: readonly FoldSplitName[] = ['fold_train', 'fold_evaluation'];

/** `null` is the plain (non-fold) context; otherwise a fold index */
export type FoldContext = number | null;

export type Supervision = 'supervised' | 'unsupervised';

export interface SplitSize {
  readonly percent: number;
  readonly count: number;
}

export interface SplitSamples {
  readonly train: readonly number[];
  readonly validation?: readonly number[];
  readonly test?: readonly number[];
}

/**
 * Partition of sample indices 0..N-1. Each list is sorted ascending.
 */
export interface Splitset {
  readonly sampleCount: number;
  readonly samples: SplitSamples;
  readonly sizes: Readonly<Partial<Record<SplitName, SplitSize>>>;
  readonly supervision: Supervision;
  readonly binCount: number | null;
  readonly stratifyColumn: string | null;
  readonly seed: number;
}

export interface Fold {
  readonly foldIndex: number;
  readonly samples: Readonly<Record<FoldSplitName, readonly number[]>>;
}

export interface Foldset {
  readonly foldCount: number;
  readonly folds: readonly Fold[];
}

export function splitNames(splitset: Splitset): SplitName[] {
  return SPLIT_ORDER.filter((name) => splitset.samples[name] !== undefined);
}
