/**
 * Property tests for stratified splits
 *
 * Invariants:
 * 1. train / validation / test partition 0..N-1 exactly
 * 2. Each class's share of test is within one sample of its quota
 * 3. Fold evaluations partition train; each class is dealt within one sample per fold
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { Scalar } from '@strata/core';
import { Stratifier } from '../../src/stratification/Stratifier.js';

const classSizesArb = fc.array(fc.integer({ min: 2, max: 30 }), { minLength: 1, maxLength: 4 });

function labelsFor(sizes: readonly number[]): Scalar[] {
  return sizes.flatMap((size, label) => Array.from({ length: size }, () => `class-${label}`));
}

describe('Stratifier - Property Tests', () => {
  const stratifier = new Stratifier();

  it('should partition every sample exactly once', () => {
    fc.assert(
      fc.property(
        classSizesArb,
        fc.constantFrom(0.1, 0.2, 0.3),
        fc.constantFrom(undefined, 0.1, 0.2),
        fc.nat(),
        (sizes, sizeTest, sizeValidation, seed) => {
          const labels = labelsFor(sizes);
          fc.pre(labels.length >= 10);
          const { splitset } = stratifier.split({
            sampleCount: labels.length,
            stratifyValues: labels,
            sizeTest,
            sizeValidation,
            seed,
          });

          const all = [
            ...splitset.samples.train,
            ...(splitset.samples.validation ?? []),
            ...(splitset.samples.test ?? []),
          ].sort((a, b) => a - b);
          expect(all).toEqual(Array.from({ length: labels.length }, (_, i) => i));
        }
      ),
      { numRuns: 100 }
    );
  });

  it('should allocate test samples within one of each class quota', () => {
    fc.assert(
      fc.property(classSizesArb, fc.constantFrom(0.1, 0.2, 0.3, 0.4), fc.nat(), (sizes, sizeTest, seed) => {
        const labels = labelsFor(sizes);
        fc.pre(labels.length >= 5);
        const { splitset } = stratifier.split({ sampleCount: labels.length, stratifyValues: labels, sizeTest, seed });

        const test = splitset.samples.test ?? [];
        sizes.forEach((size, label) => {
          const inTest = test.filter((index) => labels[index] === `class-${label}`).length;
          const quota = (size * test.length) / labels.length;
          expect(Math.abs(inTest - quota)).toBeLessThan(1);
        });
      }),
      { numRuns: 100 }
    );
  });

  it('should deal folds evenly within each class', () => {
    fc.assert(
      fc.property(classSizesArb, fc.integer({ min: 2, max: 5 }), fc.nat(), (sizes, foldCount, seed) => {
        const labels = labelsFor(sizes);
        fc.pre(labels.length >= foldCount);
        const { splitset, foldset } = stratifier.split({
          sampleCount: labels.length,
          stratifyValues: labels,
          foldCount,
          seed,
        });

        const folds = foldset?.folds ?? [];
        expect(folds).toHaveLength(foldCount);
        const evaluated = folds.flatMap((fold) => fold.samples.fold_evaluation).sort((a, b) => a - b);
        expect(evaluated).toEqual(splitset.samples.train);

        sizes.forEach((size, label) => {
          for (const fold of folds) {
            const count = fold.samples.fold_evaluation.filter((index) => labels[index] === `class-${label}`).length;
            expect(count).toBeGreaterThanOrEqual(Math.floor(size / foldCount));
            expect(count).toBeLessThanOrEqual(Math.ceil(size / foldCount));
          }
        });
      }),
      { numRuns: 100 }
    );
  });
});
