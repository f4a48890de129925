/**
 * Pipeline
 *
 * Declarative preparation of one or more feature inputs and an optional
 * target. `build` validates the whole configuration and stratifies (index
 * work only); `materialize` interpolates, fits encoders per fold context on
 * the fit split, encodes every split and caches the tensors.
 */

import {
  argmax,
  computeParameterHash,
  sha256Hex,
  stableStringify,
  type Dataset,
  type Dtype,
  type Foldset,
  type Scalar,
  type Splitset,
  type Supervision,
} from '@strata/core';
import { ConfigurationError, getRuntimeConfig } from '@strata/utils';
import { columnIndex, projectRows, sampleCount, timestepsOf } from '../dataset/Dataset.js';
import { selectFeatureColumns, selectLabelColumns } from '../dataset/selection.js';
import { Encoderset } from '../features/Encoderset.js';
import { defaultEncoderRegistry, type EncoderRegistry } from '../features/encoders/EncoderRegistry.js';
import { compareCategories } from '../features/encoders/categorical.js';
import { toNumber } from '../features/encoders/base.js';
import { Interpolaterset } from '../features/interpolation.js';
import { logger } from '../logger.js';
import { Stratifier } from '../stratification/Stratifier.js';
import { Windower } from '../windows/Windower.js';
import type { WindowPlan } from '../windows/types.js';
import { materializePipeline, type MaterializedPipeline } from './MaterializedPipeline.js';
import { SplitCache } from './SplitCache.js';
import {
  PipelineConfigSchema,
  type FeatureInputConfig,
  type PipelineConfig,
  type PipelineConfigInput,
  type TargetConfig,
} from './types.js';

export interface ResolvedInput {
  readonly index: number;
  readonly dataset: Dataset;
  readonly columns: readonly string[];
  readonly interpolaters: Interpolaterset;
  readonly encoders: Encoderset;
  readonly window: WindowPlan | null;
  /** Timesteps per sample for sequence datasets */
  readonly timesteps: number | null;
  readonly sampleCount: number;
}

export interface ResolvedTarget {
  readonly dataset: Dataset;
  readonly columns: readonly string[];
  readonly interpolaters: Interpolaterset;
  readonly encoders: Encoderset;
}

export interface PipelineBuildOptions {
  cache?: SplitCache;
  registry?: EncoderRegistry;
}

interface StratificationSource {
  values: Scalar[] | null;
  continuous: boolean;
  binCount: number | null;
  supervision: Supervision;
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

function datasetFingerprint(dataset: Dataset): string {
  return sha256Hex(stableStringify(dataset));
}

/**
 * One value per sample: median of numbers, otherwise the most frequent value
 */
export function reduceSampleValues(values: readonly Scalar[]): Scalar {
  const numbers = values.filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
  if (numbers.length > 0 && numbers.length === values.filter((value) => value !== null).length) {
    const sorted = [...numbers].sort((a, b) => a - b);
    const middle = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 1
      ? sorted[middle] ?? null
      : ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2;
  }
  const counts = new Map<Scalar, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  let best: Scalar = null;
  let bestCount = 0;
  for (const [value, count] of [...counts.entries()].sort(([a], [b]) => compareCategories(a, b))) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export class Pipeline {
  readonly id: string;
  readonly configHash: string;
  readonly splitset: Splitset;
  readonly foldset: Foldset | null;
  readonly sampleCount: number;
  readonly supervision: Supervision;
  /** Self-supervised: the label is the shifted window */
  readonly windowed: boolean;

  private materialized: MaterializedPipeline | null = null;

  private constructor(
    readonly config: PipelineConfig,
    readonly inputs: readonly ResolvedInput[],
    readonly target: ResolvedTarget | null,
    readonly cache: SplitCache,
    seed: number,
    stratification: StratificationSource
  ) {
    this.configHash = computeParameterHash({
      inputs: config.inputs.map((input) => ({ ...input, dataset: datasetFingerprint(input.dataset) })),
      target: config.target ? { ...config.target, dataset: datasetFingerprint(config.target.dataset) } : null,
      stratifier: { ...config.stratifier, seed },
    });
    this.id = config.id ?? `pipeline_${this.configHash.slice(0, 12)}`;
    this.windowed = inputs.some((input) => input.window !== null);
    this.sampleCount = inputs[0]?.sampleCount ?? 0;
    this.supervision = stratification.supervision;

    const { splitset, foldset } = new Stratifier().split({
      sampleCount: this.sampleCount,
      stratifyValues: stratification.values,
      continuous: stratification.continuous,
      binCount: stratification.binCount,
      sizeTest: config.stratifier.sizeTest,
      sizeValidation: config.stratifier.sizeValidation,
      foldCount: config.stratifier.foldCount,
      seed,
      foldRemainder: config.stratifier.foldRemainder,
      supervision: stratification.supervision,
      stratifyColumn: config.stratifier.stratifyColumn ?? null,
    });
    this.splitset = splitset;
    this.foldset = foldset;
  }

  /**
   * Validate a configuration and stratify its samples.
   * Every configuration problem surfaces here as a ConfigurationError.
   */
  static build(input: PipelineConfigInput, options: PipelineBuildOptions = {}): Pipeline {
    const parsed = PipelineConfigSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid pipeline configuration: ${formatIssues(parsed.error.issues)}`, 'pipeline');
    }
    const config = parsed.data;
    const registry = options.registry ?? defaultEncoderRegistry;
    const windower = new Windower();

    if (config.inputs.some((feature) => feature.window !== undefined)) {
      if (config.inputs.length > 1) {
        throw new ConfigurationError('Windowed features support a single input', 'inputs');
      }
      if (config.target) {
        throw new ConfigurationError(
          'Windowed features cannot be combined with a label; the shifted window is the target',
          'target'
        );
      }
    }

    const target = config.target ? Pipeline.resolveTarget(config.target, registry) : null;
    const inputs = config.inputs.map((feature, index) => Pipeline.resolveInput(feature, index, target, registry, windower));

    const counts = new Set(inputs.map((resolved) => resolved.sampleCount));
    if (counts.size > 1) {
      throw new ConfigurationError(
        `Feature inputs disagree on sample count: ${inputs.map((resolved) => resolved.sampleCount).join(', ')}`,
        'inputs'
      );
    }
    const count = inputs[0]?.sampleCount ?? 0;
    if (target && sampleCount(target.dataset) !== count) {
      throw new ConfigurationError(
        `Label has ${sampleCount(target.dataset)} samples, features have ${count}`,
        'target'
      );
    }

    const runtime = getRuntimeConfig();
    const seed = config.stratifier.seed ?? runtime.randomSeed;
    const stratification = Pipeline.stratificationSource(config, inputs, target, runtime.defaultBinCount);

    const pipeline = new Pipeline(config, inputs, target, options.cache ?? new SplitCache(), seed, stratification);

    logger.info('Pipeline built', {
      pipelineId: pipeline.id,
      configHash: pipeline.configHash,
      sampleCount: pipeline.sampleCount,
      inputs: inputs.length,
      supervision: pipeline.supervision,
      foldCount: pipeline.foldset?.foldCount ?? null,
    });

    return pipeline;
  }

  private static resolveTarget(target: TargetConfig, registry: EncoderRegistry): ResolvedTarget {
    if (target.dataset.kind !== 'tabular') {
      throw new ConfigurationError('Labels must come from a tabular dataset', 'target.dataset');
    }
    const columns = selectLabelColumns(target.dataset, target.column, 'target.column');
    const dtypes = target.dataset.dtypes;

    if (target.interpolate) {
      const nonFloat = columns.filter((column) => dtypes[column] !== 'float');
      if (nonFloat.length > 0) {
        throw new ConfigurationError(
          `Label interpolation applies to float columns only, got ${nonFloat.join(', ')}`,
          'target.interpolate'
        );
      }
    }

    return {
      dataset: target.dataset,
      columns,
      interpolaters: Interpolaterset.resolve({
        columns,
        dtypes,
        steps: target.interpolate ? [{ include: true, columns, method: 'linear' }] : [],
        configKey: 'target.interpolate',
      }),
      encoders: Encoderset.resolve({
        columns,
        dtypes,
        steps: target.encoder ? [{ include: true, encoder: target.encoder }] : [],
        configKey: 'target.encoder',
        registry,
      }),
    };
  }

  private static resolveInput(
    feature: FeatureInputConfig,
    index: number,
    target: ResolvedTarget | null,
    registry: EncoderRegistry,
    windower: Windower
  ): ResolvedInput {
    const configKey = `inputs[${index}]`;
    const dataset = feature.dataset;
    const reserved = target && target.dataset.id === dataset.id ? target.columns : [];
    const columns = selectFeatureColumns(dataset, feature, configKey, reserved);
    const dtypes = dataset.dtypes;

    const interpolaters = Interpolaterset.resolve({
      columns,
      dtypes,
      steps: feature.interpolaters,
      configKey: `${configKey}.interpolaters`,
    });
    const encoders = Encoderset.resolve({
      columns,
      dtypes,
      steps: feature.encoders,
      configKey: `${configKey}.encoders`,
      registry,
    });

    let window: WindowPlan | null = null;
    if (feature.window) {
      if (dataset.kind !== 'tabular') {
        throw new ConfigurationError('Windows apply to tabular datasets only', `${configKey}.window`);
      }
      window = windower.plan(dataset.rows.length, feature.window);
    }

    return {
      index,
      dataset,
      columns,
      interpolaters,
      encoders,
      window,
      timesteps: dataset.kind === 'sequence' ? timestepsOf(dataset) : null,
      sampleCount: window ? window.windowCount : sampleCount(dataset),
    };
  }

  private static stratificationSource(
    config: PipelineConfig,
    inputs: readonly ResolvedInput[],
    target: ResolvedTarget | null,
    defaultBinCount: number
  ): StratificationSource {
    const { binCount, stratifyColumn } = config.stratifier;

    if (target) {
      if (stratifyColumn !== undefined) {
        throw new ConfigurationError('stratifyColumn applies to unlabeled pipelines only', 'stratifier.stratifyColumn');
      }
      const rows = projectRows(target.dataset, target.columns);
      if (target.columns.length > 1) {
        if (binCount !== undefined) {
          throw new ConfigurationError('binCount does not apply to multi-column labels', 'stratifier.binCount');
        }
        return {
          values: rows.map((row) => argmax(row.map(toNumber))),
          continuous: false,
          binCount: null,
          supervision: 'supervised',
        };
      }
      const dtype = target.dataset.dtypes[target.columns[0] ?? ''] ?? 'string';
      return {
        values: rows.map((row) => row[0] ?? null),
        ...Pipeline.binning(dtype, binCount, defaultBinCount),
        supervision: 'supervised',
      };
    }

    const first = inputs[0];
    if (stratifyColumn === undefined || !first) {
      if (binCount !== undefined) {
        throw new ConfigurationError('binCount needs a label or a stratifyColumn', 'stratifier.binCount');
      }
      return { values: null, continuous: false, binCount: null, supervision: 'unsupervised' };
    }

    const dataset = first.dataset;
    const index = columnIndex(dataset, stratifyColumn);
    const dtype = dataset.dtypes[stratifyColumn] ?? 'string';
    let values: Scalar[];
    if (dataset.kind === 'sequence') {
      values = dataset.sequences.map((seq) => reduceSampleValues(seq.map((row) => row[index] ?? null)));
    } else if (first.window) {
      values = first.window.samplesUnshifted.map((rows) =>
        reduceSampleValues(rows.map((row) => dataset.rows[row]?.[index] ?? null))
      );
    } else {
      values = dataset.rows.map((row) => row[index] ?? null);
    }

    return {
      values,
      ...Pipeline.binning(dtype, binCount, defaultBinCount),
      supervision: 'unsupervised',
    };
  }

  private static binning(
    dtype: Dtype,
    binCount: number | undefined,
    defaultBinCount: number
  ): { continuous: boolean; binCount: number | null } {
    if (dtype === 'float') {
      return { continuous: true, binCount: binCount ?? defaultBinCount };
    }
    if (binCount !== undefined) {
      if (dtype !== 'int') {
        throw new ConfigurationError(`binCount does not apply to ${dtype} values`, 'stratifier.binCount');
      }
      return { continuous: true, binCount };
    }
    return { continuous: false, binCount: null };
  }

  /**
   * Encode every split of every fold context, once. Later calls return the
   * cached result.
   */
  materialize(): MaterializedPipeline {
    if (this.materialized && this.cache.status(this.id, this.configHash) === 'current') {
      logger.debug('Pipeline already materialized', { pipelineId: this.id });
      return this.materialized;
    }
    this.materialized = materializePipeline(this);
    return this.materialized;
  }
}
