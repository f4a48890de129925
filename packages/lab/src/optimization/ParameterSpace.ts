/**
 * ParameterSpace
 *
 * Expands a hyperparameter space into concrete combinations.
 *
 * Input:
 *   { learning_rate: [0.01, 0.001], units: [32, 64, 128] }
 *
 * Output: Hyperparamcombo[] (cartesian product, declaration order, first
 * parameter outermost), optionally narrowed by a seeded search.
 */

import {
  computeParameterHash,
  deriveSeed,
  SeededRNG,
  sampleWithoutReplacement,
  stableStringify,
  type HyperparameterSpace,
  type HyperparameterValue,
  type Hyperparamcombo,
} from '@strata/core';
import { ConfigurationError, getRuntimeConfig } from '@strata/utils';
import { logger } from '../logger.js';
import { ExpansionOptionsSchema, type ExpansionOptions, type ExpansionStrategy, type SpaceValidation } from './types.js';

const LARGE_SPACE_WARNING = 10000;

export class ParameterSpace {
  /**
   * Expand the space. An absent or empty space yields a single empty combo.
   */
  expand(space: HyperparameterSpace | undefined, options: ExpansionOptions = {}): Hyperparamcombo[] {
    const parsed = ExpansionOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid expansion options: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
        'expansion'
      );
    }

    const resolvedSpace = space ?? {};
    const validation = this.validate(resolvedSpace);
    if (!validation.valid) {
      throw new ConfigurationError(`Invalid hyperparameter space: ${validation.errors.join('; ')}`, 'hyperparameters', {
        errors: validation.errors,
      });
    }

    const grid = this.generateCombos(resolvedSpace);
    const strategy = this.resolveStrategy(parsed.data);
    const seed = parsed.data.seed ?? getRuntimeConfig().randomSeed;

    switch (strategy) {
      case 'grid':
        return grid;
      case 'random':
        return this.sampleInGridOrder(grid, parsed.data, seed);
      case 'permute':
        return this.permute(grid, parsed.data.permuteCount ?? grid.length, seed);
    }
  }

  /**
   * Full cartesian product in declaration order
   */
  generateCombos(space: HyperparameterSpace): Hyperparamcombo[] {
    const paramNames = Object.keys(space);
    const paramValues = paramNames.map((name) => space[name] ?? []);

    const assignments: Array<Record<string, HyperparameterValue>> = [];
    this.cartesianProduct(paramValues, 0, {}, paramNames, assignments);

    logger.debug('Generated hyperparameter combos', {
      paramCount: paramNames.length,
      totalCombos: assignments.length,
    });

    return assignments.map((hyperparameters, index) => ({
      comboId: computeParameterHash(hyperparameters),
      index,
      hyperparameters,
    }));
  }

  private cartesianProduct(
    paramValues: ReadonlyArray<readonly HyperparameterValue[]>,
    index: number,
    current: Record<string, HyperparameterValue>,
    paramNames: readonly string[],
    results: Array<Record<string, HyperparameterValue>>
  ): void {
    if (index === paramValues.length) {
      results.push({ ...current });
      return;
    }

    const values = paramValues[index] ?? [];
    const paramName = paramNames[index] ?? '';

    for (const value of values) {
      current[paramName] = value;
      this.cartesianProduct(paramValues, index + 1, current, paramNames, results);
    }
  }

  private resolveStrategy(options: ExpansionOptions): ExpansionStrategy {
    const searching = options.searchCount !== undefined || options.searchPercent !== undefined;
    if (options.searchCount !== undefined && options.searchPercent !== undefined) {
      throw new ConfigurationError('searchCount and searchPercent are mutually exclusive', 'searchCount');
    }
    if (searching && options.permuteCount !== undefined) {
      throw new ConfigurationError('permuteCount cannot be combined with a random search', 'permuteCount');
    }
    if (options.permuteCount !== undefined) {
      return 'permute';
    }
    return searching ? 'random' : 'grid';
  }

  /**
   * Seeded subset without replacement, returned in grid order
   */
  private sampleInGridOrder(grid: Hyperparamcombo[], options: ExpansionOptions, seed: number): Hyperparamcombo[] {
    let count: number;
    if (options.searchCount !== undefined) {
      if (options.searchCount < 1) {
        throw new ConfigurationError(`searchCount must be >= 1, got ${options.searchCount}`, 'searchCount');
      }
      count = options.searchCount;
      if (count > grid.length) {
        logger.info('searchCount exceeds the number of combinations, using all of them', {
          searchCount: count,
          totalCombos: grid.length,
        });
        return grid;
      }
    } else {
      const percent = options.searchPercent ?? 1;
      if (!(percent > 0 && percent <= 1)) {
        throw new ConfigurationError(`searchPercent must be in (0, 1], got ${percent}`, 'searchPercent');
      }
      count = Math.ceil(grid.length * percent);
    }

    const rng = new SeededRNG(deriveSeed(seed, 'hyperparameter-search'));
    const chosen = new Set(sampleWithoutReplacement(grid, count, rng).map((combo) => combo.index));
    return grid.filter((combo) => chosen.has(combo.index));
  }

  /**
   * Distinct combos in seeded random order
   */
  private permute(grid: Hyperparamcombo[], permuteCount: number, seed: number): Hyperparamcombo[] {
    if (permuteCount < 1) {
      throw new ConfigurationError(`permuteCount must be >= 1, got ${permuteCount}`, 'permuteCount');
    }
    if (permuteCount > grid.length) {
      logger.info('permuteCount exceeds the number of combinations, permuting all of them', {
        permuteCount,
        totalCombos: grid.length,
      });
    }
    const rng = new SeededRNG(deriveSeed(seed, 'hyperparameter-permute'));
    return sampleWithoutReplacement(grid, permuteCount, rng);
  }

  /**
   * Total combination count without generating them
   */
  estimateComboCount(space: HyperparameterSpace): number {
    return Object.values(space).reduce<number>((product, values) => product * values.length, 1);
  }

  validate(space: HyperparameterSpace): SpaceValidation {
    const errors: string[] = [];

    for (const [paramName, values] of Object.entries(space)) {
      if (!Array.isArray(values)) {
        errors.push(`Parameter ${paramName} must be an array`);
        continue;
      }

      if (values.length === 0) {
        errors.push(`Parameter ${paramName} has no values`);
        continue;
      }

      const kinds = new Set(values.map(valueKind));
      kinds.delete('null');
      if (kinds.size > 1) {
        errors.push(`Parameter ${paramName} has mixed types`);
      }

      const seen = new Set<string>();
      const repeated = new Set<string>();
      for (const value of values) {
        const key = stableStringify(value);
        if (seen.has(key)) {
          repeated.add(key);
        }
        seen.add(key);
      }
      if (repeated.size > 0) {
        errors.push(`Parameter ${paramName} repeats ${[...repeated].join(', ')}`);
      }
    }

    const totalCombos = this.estimateComboCount(space);
    if (totalCombos > LARGE_SPACE_WARNING) {
      logger.warn('Hyperparameter space is very large', {
        totalCombos,
        params: Object.keys(space),
      });
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }
}

function valueKind(value: HyperparameterValue): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Convenience wrapper around ParameterSpace#expand
 */
export function expandHyperparameters(
  space: HyperparameterSpace | undefined,
  options?: ExpansionOptions
): Hyperparamcombo[] {
  return new ParameterSpace().expand(space, options);
}
