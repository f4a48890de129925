/**
 * Stratifier
 *
 * Partitions sample indices into train / validation / test, then carves
 * cross-validation folds out of train only. Every split keeps the class mix
 * (or the quantile-bin mix of a continuous target) of the population.
 */

import { deriveSeed, SeededRNG, shuffle, type Fold, type Foldset, type Scalar, type SplitSize, type Splitset } from '@strata/core';
import { ConfigurationError } from '@strata/utils';
import { logger } from '../logger.js';
import { valuesToBins } from './binning.js';
import type { FoldRemainderPolicy, StratifyRequest, StratifyResult } from './types.js';

interface Stratum {
  key: string;
  members: number[];
}

const UNSTRATIFIED = 'all';

function stratumKey(value: Scalar): string {
  return value === null ? 'null' : `${typeof value}:${String(value)}`;
}

/**
 * Group indices by key; groups are ordered by key so results do not depend
 * on sample order.
 */
function groupStrata(indices: readonly number[], keys: ReadonlyMap<number, string>): Stratum[] {
  const groups = new Map<string, number[]>();
  for (const index of indices) {
    const key = keys.get(index) ?? UNSTRATIFIED;
    const members = groups.get(key);
    if (members) {
      members.push(index);
    } else {
      groups.set(key, [index]);
    }
  }
  return [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, members]) => ({ key, members }));
}

/**
 * Largest-remainder apportionment of `total` across groups of the given sizes
 */
export function allocateCounts(sizes: readonly number[], total: number): number[] {
  const population = sizes.reduce((sum, size) => sum + size, 0);
  if (population === 0) {
    return sizes.map(() => 0);
  }
  const quotas = sizes.map((size) => (size * total) / population);
  const base = quotas.map((quota) => Math.floor(quota + 1e-9));
  let remaining = total - base.reduce((sum, count) => sum + count, 0);

  const order = sizes
    .map((size, index) => ({ index, size, fraction: (quotas[index] ?? 0) - (base[index] ?? 0) }))
    .sort((a, b) => b.fraction - a.fraction || b.size - a.size || a.index - b.index);

  for (const { index, size } of order) {
    if (remaining <= 0) {
      break;
    }
    if ((base[index] ?? 0) < size) {
      base[index] = (base[index] ?? 0) + 1;
      remaining--;
    }
  }
  return base;
}

function sorted(indices: Iterable<number>): number[] {
  return [...indices].sort((a, b) => a - b);
}

export class Stratifier {
  split(request: StratifyRequest): StratifyResult {
    const { sampleCount, sizeTest, sizeValidation, seed } = request;
    this.validateProportions(sizeTest, sizeValidation);

    if (sampleCount < 1) {
      throw new ConfigurationError('Cannot split an empty dataset', 'sampleCount');
    }
    const values = request.stratifyValues ?? null;
    if (values !== null && values.length !== sampleCount) {
      throw new ConfigurationError(
        `Expected ${sampleCount} stratification values, got ${values.length}`,
        'stratifyValues'
      );
    }

    const binCount = this.resolveBinCount(request);
    const allIndices = Array.from({ length: sampleCount }, (_, i) => i);
    const keys = this.stratumKeys(allIndices, values, request.continuous ?? false, binCount);

    const samples: { train: number[]; validation?: number[]; test?: number[] } = { train: allIndices };

    if (sizeTest !== undefined) {
      const rng = new SeededRNG(deriveSeed(seed, 'split'));
      const strata = groupStrata(allIndices, keys).map((stratum) => ({
        key: stratum.key,
        members: shuffle(stratum.members, rng),
      }));
      if (values !== null) {
        this.requireStratumSize(strata, 2, 'sizeTest');
      }

      const testCount = Math.ceil(sampleCount * sizeTest);
      this.requireNonEmpty('test', testCount, sampleCount - testCount);
      const test = this.take(strata, testCount);

      if (sizeValidation !== undefined) {
        const restCount = sampleCount - testCount;
        const validationCount = Math.ceil(restCount * (sizeValidation / (1 - sizeTest)));
        this.requireNonEmpty('validation', validationCount, restCount - validationCount);
        samples.validation = sorted(this.take(strata, validationCount));
      }

      samples.test = sorted(test);
      samples.train = sorted(strata.flatMap((stratum) => stratum.members));
    }

    const sizes: Partial<Record<'train' | 'validation' | 'test', SplitSize>> = {};
    for (const name of ['train', 'validation', 'test'] as const) {
      const members = samples[name];
      if (members) {
        sizes[name] = { count: members.length, percent: members.length / sampleCount };
      }
    }

    const splitset: Splitset = {
      sampleCount,
      samples,
      sizes,
      supervision: request.supervision ?? (values !== null && !request.stratifyColumn ? 'supervised' : 'unsupervised'),
      binCount,
      stratifyColumn: request.stratifyColumn ?? null,
      seed,
    };

    logger.debug('Split samples', {
      sampleCount,
      train: samples.train.length,
      validation: samples.validation?.length ?? 0,
      test: samples.test?.length ?? 0,
      strata: new Set(keys.values()).size || 1,
    });

    const foldset =
      request.foldCount !== undefined
        ? this.fold(samples.train, values, request.continuous ?? false, binCount, request.foldCount, seed, request.foldRemainder ?? 'first')
        : null;

    return { splitset, foldset };
  }

  /**
   * Carve folds from the train indices only
   */
  private fold(
    train: readonly number[],
    values: readonly Scalar[] | null,
    continuous: boolean,
    binCount: number | null,
    foldCount: number,
    seed: number,
    remainderPolicy: FoldRemainderPolicy
  ): Foldset {
    if (!Number.isInteger(foldCount) || foldCount < 2) {
      throw new ConfigurationError(`foldCount must be an integer >= 2, got ${foldCount}`, 'foldCount');
    }
    if (foldCount > train.length) {
      throw new ConfigurationError(
        `foldCount ${foldCount} exceeds the ${train.length} training samples`,
        'foldCount'
      );
    }
    if (foldCount === 2) {
      logger.warn('foldCount of 2 leaves only half the training samples for each fit', { foldCount });
    }

    // continuous targets are re-binned on the train subset alone
    const keys = this.stratumKeys(train, values, continuous, binCount);
    const rng = new SeededRNG(deriveSeed(seed, 'folds'));
    const strata = groupStrata(train, keys).map((stratum) => ({
      key: stratum.key,
      members: shuffle(stratum.members, rng),
    }));

    if (values !== null) {
      this.requireStratumSize(strata, 2, 'foldCount');
      const small = strata.filter((stratum) => stratum.members.length < foldCount);
      if (small.length > 0) {
        logger.warn('Some strata have fewer samples than folds; those folds will lack them', {
          foldCount,
          strata: small.map((stratum) => ({ key: stratum.key, size: stratum.members.length })),
        });
      }
    }

    const remainder = train.length % foldCount;
    if (remainder !== 0) {
      logger.warn('Training samples do not divide evenly into folds', {
        trainCount: train.length,
        foldCount,
        remainder,
        extraSampleFolds: remainderPolicy,
      });
    }

    const evaluation: number[][] = Array.from({ length: foldCount }, () => []);
    strata
      .flatMap((stratum) => stratum.members)
      .forEach((index, position) => {
        const cursor = position % foldCount;
        const foldIndex = remainderPolicy === 'first' ? cursor : foldCount - 1 - cursor;
        evaluation[foldIndex]?.push(index);
      });

    const folds: Fold[] = evaluation.map((members, foldIndex) => {
      const held = new Set(members);
      return {
        foldIndex,
        samples: {
          fold_train: train.filter((index) => !held.has(index)),
          fold_evaluation: sorted(members),
        },
      };
    });

    return { foldCount, folds };
  }

  private validateProportions(sizeTest: number | undefined, sizeValidation: number | undefined): void {
    if (sizeTest !== undefined && !(sizeTest > 0 && sizeTest < 1)) {
      throw new ConfigurationError(`sizeTest must be in (0, 1), got ${sizeTest}`, 'sizeTest');
    }
    if (sizeValidation !== undefined) {
      if (sizeTest === undefined) {
        throw new ConfigurationError('sizeValidation requires sizeTest', 'sizeValidation');
      }
      if (!(sizeValidation > 0 && sizeValidation < 1)) {
        throw new ConfigurationError(`sizeValidation must be in (0, 1), got ${sizeValidation}`, 'sizeValidation');
      }
      if (sizeTest + sizeValidation >= 1) {
        throw new ConfigurationError(
          `sizeTest + sizeValidation must be < 1, got ${sizeTest + sizeValidation}`,
          'sizeValidation'
        );
      }
    }
  }

  private resolveBinCount(request: StratifyRequest): number | null {
    const binCount = request.binCount ?? null;
    if (binCount !== null && (!Number.isInteger(binCount) || binCount < 2)) {
      throw new ConfigurationError(`binCount must be an integer >= 2, got ${binCount}`, 'binCount');
    }
    if (request.continuous && binCount === null) {
      throw new ConfigurationError('Continuous stratification needs a binCount', 'binCount');
    }
    return request.continuous ? binCount : null;
  }

  private stratumKeys(
    indices: readonly number[],
    values: readonly Scalar[] | null,
    continuous: boolean,
    binCount: number | null
  ): Map<number, string> {
    const keys = new Map<number, string>();
    if (values === null) {
      return keys;
    }
    const subset = indices.map((index) => values[index] ?? null);
    if (continuous && binCount !== null) {
      const bins = valuesToBins(
        subset.map((value) => (typeof value === 'number' ? value : null)),
        binCount
      );
      indices.forEach((index, i) => {
        const bin = bins[i];
        keys.set(index, bin === null || bin === undefined ? 'null' : `bin:${bin}`);
      });
      return keys;
    }
    indices.forEach((index, i) => keys.set(index, stratumKey(subset[i] ?? null)));
    return keys;
  }

  private requireStratumSize(strata: readonly Stratum[], minimum: number, configKey: string): void {
    const tooSmall = strata.filter((stratum) => stratum.members.length < minimum);
    if (tooSmall.length > 0) {
      throw new ConfigurationError(
        `Every stratum needs at least ${minimum} samples; too small: ${tooSmall
          .map((stratum) => `${stratum.key} (${stratum.members.length})`)
          .join(', ')}`,
        configKey
      );
    }
  }

  private requireNonEmpty(split: string, splitCount: number, restCount: number): void {
    if (splitCount < 1 || restCount < 1) {
      throw new ConfigurationError(
        `The ${split} split would leave an empty split (${splitCount} vs ${restCount} samples)`,
        split === 'test' ? 'sizeTest' : 'sizeValidation'
      );
    }
  }

  /**
   * Remove `count` samples from the strata (front of each shuffled stratum),
   * apportioned by stratum size
   */
  private take(strata: Stratum[], count: number): number[] {
    const allocation = allocateCounts(
      strata.map((stratum) => stratum.members.length),
      count
    );
    const taken: number[] = [];
    strata.forEach((stratum, i) => {
      const n = allocation[i] ?? 0;
      taken.push(...stratum.members.slice(0, n));
      stratum.members = stratum.members.slice(n);
    });
    return taken;
  }
}
