/**
 * Stratifier types
 */

import type { Foldset, Scalar, Splitset, Supervision } from '@strata/core';

/** Which folds absorb the remainder when train does not divide evenly */
export type FoldRemainderPolicy = 'first' | 'last';

export interface StratifyRequest {
  sampleCount: number;
  /**
   * One value per sample to stratify by (label class, or a reduced feature
   * column). `null` entries are a stratum of their own.
   */
  stratifyValues?: readonly Scalar[] | null;
  /** Bin `stratifyValues` into quantiles instead of treating them as classes */
  continuous?: boolean;
  binCount?: number | null;
  sizeTest?: number;
  sizeValidation?: number;
  foldCount?: number;
  seed: number;
  foldRemainder?: FoldRemainderPolicy;
  supervision?: Supervision;
  stratifyColumn?: string | null;
}

export interface StratifyResult {
  splitset: Splitset;
  foldset: Foldset | null;
}
