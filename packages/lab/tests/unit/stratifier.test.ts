import { describe, it, expect } from 'vitest';
import type { Scalar } from '@strata/core';
import { ConfigurationError } from '@strata/utils';
import { Stratifier, allocateCounts } from '../../src/stratification/Stratifier.js';

function binaryLabels(zeros: number, ones: number): Scalar[] {
  return [...Array.from({ length: zeros }, () => 0), ...Array.from({ length: ones }, () => 1)];
}

const countBelow = (indices: readonly number[], limit: number) => indices.filter((i) => i < limit).length;

describe('allocateCounts', () => {
  it('should apportion by largest remainder', () => {
    expect(allocateCounts([30, 70], 20)).toEqual([6, 14]);
    expect(allocateCounts([1, 1, 1], 2)).toEqual([1, 1, 0]);
    expect(allocateCounts([5, 3], 3)).toEqual([2, 1]);
  });

  it('should never give a group more than its size', () => {
    expect(allocateCounts([1, 9], 2)).toEqual([0, 2]);
    expect(allocateCounts([0, 0], 3)).toEqual([0, 0]);
  });
});

describe('Stratifier', () => {
  const stratifier = new Stratifier();

  it('should keep the class mix in test and in every fold', () => {
    const { splitset, foldset } = stratifier.split({
      sampleCount: 100,
      stratifyValues: binaryLabels(30, 70),
      sizeTest: 0.2,
      foldCount: 4,
      seed: 7,
    });

    const test = splitset.samples.test ?? [];
    expect(test).toHaveLength(20);
    expect(countBelow(test, 30)).toBe(6);
    expect(splitset.samples.train).toHaveLength(80);
    expect(splitset.sizes.test).toEqual({ count: 20, percent: 0.2 });
    expect(splitset.supervision).toBe('supervised');

    expect(foldset?.foldCount).toBe(4);
    for (const fold of foldset?.folds ?? []) {
      expect(fold.samples.fold_evaluation).toHaveLength(20);
      expect(countBelow(fold.samples.fold_evaluation, 30)).toBe(6);
      expect(fold.samples.fold_train).toHaveLength(60);
    }
  });

  it('should carve folds from train only', () => {
    const { splitset, foldset } = stratifier.split({
      sampleCount: 100,
      stratifyValues: binaryLabels(30, 70),
      sizeTest: 0.2,
      foldCount: 4,
      seed: 7,
    });

    const test = new Set(splitset.samples.test);
    const evaluated = (foldset?.folds ?? []).flatMap((fold) => fold.samples.fold_evaluation);
    expect(evaluated.some((index) => test.has(index))).toBe(false);
    expect([...evaluated].sort((a, b) => a - b)).toEqual(splitset.samples.train);
  });

  it('should split validation from the remainder', () => {
    const { splitset } = stratifier.split({
      sampleCount: 100,
      stratifyValues: binaryLabels(40, 60),
      sizeTest: 0.25,
      sizeValidation: 0.25,
      seed: 1,
    });

    expect(splitset.samples.test).toHaveLength(25);
    expect(splitset.samples.validation).toHaveLength(25);
    expect(splitset.samples.train).toHaveLength(50);
    expect(countBelow(splitset.samples.test ?? [], 40)).toBe(10);
    expect(countBelow(splitset.samples.validation ?? [], 40)).toBe(10);
    expect(countBelow(splitset.samples.train, 40)).toBe(20);
  });

  it('should bin continuous values into quantile strata', () => {
    const { splitset } = stratifier.split({
      sampleCount: 100,
      stratifyValues: Array.from({ length: 100 }, (_, i) => i + 0.5),
      continuous: true,
      binCount: 4,
      sizeTest: 0.2,
      seed: 3,
    });

    const test = splitset.samples.test ?? [];
    expect(splitset.binCount).toBe(4);
    for (const start of [0, 25, 50, 75]) {
      expect(test.filter((i) => i >= start && i < start + 25)).toHaveLength(5);
    }
  });

  it('should put every sample in train without sizeTest', () => {
    const { splitset, foldset } = stratifier.split({ sampleCount: 5, seed: 1 });

    expect(splitset.samples).toEqual({ train: [0, 1, 2, 3, 4] });
    expect(foldset).toBeNull();
    expect(splitset.supervision).toBe('unsupervised');
  });

  it('should deal the remainder to the last folds when asked', () => {
    const { foldset } = stratifier.split({ sampleCount: 10, foldCount: 3, seed: 1, foldRemainder: 'last' });

    expect(foldset?.folds.map((fold) => fold.samples.fold_evaluation.length)).toEqual([3, 3, 4]);
  });

  it('should deal the remainder to the first folds by default', () => {
    const { foldset } = stratifier.split({ sampleCount: 10, foldCount: 3, seed: 1 });

    expect(foldset?.folds.map((fold) => fold.samples.fold_evaluation.length)).toEqual([4, 3, 3]);
  });

  it('should be deterministic for a seed', () => {
    const request = { sampleCount: 50, stratifyValues: binaryLabels(20, 30), sizeTest: 0.3, foldCount: 5, seed: 11 };

    expect(stratifier.split(request)).toEqual(stratifier.split(request));
  });

  describe('configuration errors', () => {
    it.each([
      ['sizeValidation without sizeTest', { sizeValidation: 0.2 }],
      ['proportions summing to 1', { sizeTest: 0.5, sizeValidation: 0.5 }],
      ['sizeTest outside (0, 1)', { sizeTest: 1.5 }],
      ['foldCount below 2', { foldCount: 1 }],
      ['foldCount above the train size', { sizeTest: 0.5, foldCount: 6 }],
      ['a test split that rounds to everything', { sizeTest: 0.95 }],
    ])('should reject %s', (_, options) => {
      expect(() => stratifier.split({ sampleCount: 10, seed: 1, ...options })).toThrow(ConfigurationError);
    });

    it('should reject a stratum with a single sample', () => {
      expect(() =>
        stratifier.split({ sampleCount: 10, stratifyValues: binaryLabels(1, 9), sizeTest: 0.2, seed: 1 })
      ).toThrow(/at least 2 samples/);
    });

    it('should reject continuous stratification without a bin count', () => {
      expect(() =>
        stratifier.split({ sampleCount: 4, stratifyValues: [0.1, 0.2, 0.3, 0.4], continuous: true, seed: 1 })
      ).toThrow(ConfigurationError);
    });
  });
});
