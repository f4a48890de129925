/**
 * Materialization of a built pipeline and read access to its cached splits
 */

import {
  FOLD_SPLIT_ORDER,
  SPLIT_ORDER,
  takeTensor,
  type AnySplitName,
  type Cube,
  type FoldContext,
  type Foldset,
  type InputShapes,
  type Matrix,
  type Shape,
  type Splitset,
  type Supervision,
  type Tensor,
} from '@strata/core';
import { ConfigurationError } from '@strata/utils';
import { projectRows } from '../dataset/Dataset.js';
import { createFitSource, fitSamplesFor, fitSplitFor } from '../features/fit-source.js';
import type { FittedEncoderset } from '../features/Encoderset.js';
import type { InterpolationLayout } from '../features/interpolation.js';
import { logger } from '../logger.js';
import { Windower } from '../windows/Windower.js';
import type { Pipeline, ResolvedInput } from './Pipeline.js';
import type { EncodedSamples, FittedContext, NewSamples, SplitTensors } from './types.js';

const windower = new Windower();

function chunk(rows: Matrix, size: number): Cube {
  const result: Matrix[] = [];
  for (let start = 0; start < rows.length; start += size) {
    result.push(rows.slice(start, start + size));
  }
  return result;
}

/**
 * Row indices (of the projected row array) behind a set of samples
 */
function rowsOfSamples(input: ResolvedInput, samples: readonly number[]): number[] {
  if (input.window) {
    return windower.rowsOf(input.window, samples);
  }
  if (input.timesteps !== null) {
    const timesteps = input.timesteps;
    return samples.flatMap((sample) => Array.from({ length: timesteps }, (_, t) => sample * timesteps + t));
  }
  return [...samples];
}

function layoutFor(input: ResolvedInput, evaluationSamples: ReadonlyArray<readonly number[]>): InterpolationLayout {
  if (input.timesteps !== null) {
    return { kind: 'sequences', timesteps: input.timesteps };
  }
  return { kind: 'rows', groups: evaluationSamples.map((samples) => rowsOfSamples(input, samples)) };
}

/**
 * Split name → sample indices for a fold context
 */
export function contextSplits(
  splitset: Splitset,
  foldset: Foldset | null,
  foldIndex: FoldContext
): Array<[AnySplitName, readonly number[]]> {
  const plain = SPLIT_ORDER.flatMap((name): Array<[AnySplitName, readonly number[]]> => {
    const samples = splitset.samples[name];
    return samples ? [[name, samples]] : [];
  });
  if (foldIndex === null) {
    return plain;
  }
  const fold = foldset?.folds[foldIndex];
  if (!fold) {
    throw new ConfigurationError(`Fold ${foldIndex} does not exist`, 'foldIndex');
  }
  return [
    ...FOLD_SPLIT_ORDER.map((name): [AnySplitName, readonly number[]] => [name, fold.samples[name]]),
    ...plain.filter(([name]) => name !== 'train'),
  ];
}

function featureShape(input: ResolvedInput, width: number): Shape {
  if (input.window) {
    return [input.window.spec.sizeWindow, width];
  }
  if (input.timesteps !== null) {
    return [input.timesteps, width];
  }
  return [width];
}

interface EncodedInput {
  fitted: FittedEncoderset;
  samples: Tensor;
  shifted: Cube | null;
}

function encodeInput(input: ResolvedInput, foldIndex: FoldContext, fitSamples: readonly number[], evaluation: ReadonlyArray<readonly number[]>): EncodedInput {
  const raw = projectRows(input.dataset, input.columns);
  const fitSource = createFitSource(foldIndex, fitSamples, (samples) => rowsOfSamples(input, samples));
  const filled = input.interpolaters.apply(raw, layoutFor(input, evaluation), fitSource);
  const fitted = input.encoders.fit(filled, fitSource);
  const encoded = fitted.transform(filled);

  if (input.window) {
    return {
      fitted,
      samples: windower.apply(encoded, input.window.samplesUnshifted),
      shifted: input.window.samplesShifted ? windower.apply(encoded, input.window.samplesShifted) : null,
    };
  }
  if (input.timesteps !== null) {
    return { fitted, samples: chunk(encoded, input.timesteps), shifted: null };
  }
  return { fitted, samples: encoded, shifted: null };
}

/**
 * Run interpolation and encoding for every fold context and fill the cache
 */
export function materializePipeline(pipeline: Pipeline): MaterializedPipeline {
  const { cache, id, configHash, splitset, foldset } = pipeline;
  if (cache.status(id, configHash) === 'stale') {
    logger.info('Pipeline configuration changed, replacing cached splits', { pipelineId: id });
    cache.evict(id);
  }

  const contexts: FoldContext[] = [null, ...(foldset?.folds.map((fold) => fold.foldIndex) ?? [])];
  const startedAt = Date.now();

  for (const foldIndex of contexts) {
    const splits = contextSplits(splitset, foldset, foldIndex);
    const fitName = fitSplitFor(foldIndex);
    const fitSamples = fitSamplesFor(splitset, foldset, foldIndex);
    const evaluation = splits.filter(([name]) => name !== fitName).map(([, samples]) => samples);

    const encodedInputs = pipeline.inputs.map((input) => encodeInput(input, foldIndex, fitSamples, evaluation));

    let label: Tensor | null = null;
    let labelFitted: FittedEncoderset | null = null;
    let labelShape: Shape | null = null;
    const target = pipeline.target;
    if (target) {
      const raw = projectRows(target.dataset, target.columns);
      const fitSource = createFitSource(foldIndex, fitSamples);
      const filled = target.interpolaters.apply(raw, { kind: 'rows', groups: evaluation }, fitSource);
      labelFitted = target.encoders.fit(filled, fitSource);
      label = labelFitted.transform(filled);
      labelShape = [labelFitted.outputColumns().length];
    } else {
      const shifted = encodedInputs[0]?.shifted ?? null;
      const first = pipeline.inputs[0];
      if (shifted && first) {
        label = shifted;
        labelShape = featureShape(first, encodedInputs[0]?.fitted.outputColumns().length ?? 0);
      }
    }

    const shapes: InputShapes = {
      featuresShape: pipeline.inputs.map((input, i) =>
        featureShape(input, encodedInputs[i]?.fitted.outputColumns().length ?? 0)
      ),
      labelShape,
    };

    cache.putFitted(id, configHash, {
      foldIndex,
      inputs: encodedInputs.map((encoded) => encoded.fitted),
      label: labelFitted,
      shapes,
    });

    for (const [split, indices] of splits) {
      cache.putSplit(id, configHash, {
        split,
        foldIndex,
        indices,
        features: encodedInputs.map((encoded) => takeTensor(encoded.samples, indices)),
        label: label ? takeTensor(label, indices) : null,
      });
    }
  }

  logger.info('Pipeline materialized', {
    pipelineId: id,
    contexts: contexts.length,
    sampleCount: pipeline.sampleCount,
    durationMs: Date.now() - startedAt,
  });

  return new MaterializedPipeline(pipeline);
}

export class MaterializedPipeline {
  constructor(private readonly pipeline: Pipeline) {}

  get pipelineId(): string {
    return this.pipeline.id;
  }

  get configHash(): string {
    return this.pipeline.configHash;
  }

  get splitset(): Splitset {
    return this.pipeline.splitset;
  }

  get foldset(): Foldset | null {
    return this.pipeline.foldset;
  }

  get supervision(): Supervision {
    return this.pipeline.supervision;
  }

  get sampleCount(): number {
    return this.pipeline.sampleCount;
  }

  /**
   * `null` plus every fold index
   */
  foldContexts(): FoldContext[] {
    return [null, ...(this.pipeline.foldset?.folds.map((fold) => fold.foldIndex) ?? [])];
  }

  splitNames(foldIndex: FoldContext): AnySplitName[] {
    return contextSplits(this.pipeline.splitset, this.pipeline.foldset, foldIndex).map(([name]) => name);
  }

  /**
   * Cached tensors; CacheMissError / StaleCacheError otherwise
   */
  getSplit(foldIndex: FoldContext, split: AnySplitName): SplitTensors {
    return this.pipeline.cache.getSplit(this.pipeline.id, this.pipeline.configHash, foldIndex, split);
  }

  getFitted(foldIndex: FoldContext): FittedContext {
    return this.pipeline.cache.getFitted(this.pipeline.id, this.pipeline.configHash, foldIndex);
  }

  getInputShapes(foldIndex: FoldContext): InputShapes {
    return this.getFitted(foldIndex).shapes;
  }

  /**
   * Encode new raw samples with the fits of a fold context. Windows are cut
   * without a shifted target.
   */
  encodeNew(samples: NewSamples, foldIndex: FoldContext = null): EncodedSamples {
    const fitted = this.getFitted(foldIndex);
    const { inputs, target } = this.pipeline;
    if (samples.inputs.length !== inputs.length) {
      throw new ConfigurationError(
        `Expected ${inputs.length} feature dataset(s), got ${samples.inputs.length}`,
        'inputs'
      );
    }

    const features = inputs.map((input, i): Tensor => {
      const dataset = samples.inputs[i];
      const fit = fitted.inputs[i];
      if (!dataset || !fit) {
        throw new ConfigurationError(`Missing feature dataset ${i}`, 'inputs');
      }
      if (dataset.kind !== input.dataset.kind) {
        throw new ConfigurationError(
          `Input ${i} expects a ${input.dataset.kind} dataset, got ${dataset.kind}`,
          'inputs'
        );
      }
      const raw = projectRows(dataset, input.columns);
      const timesteps = dataset.kind === 'sequence' ? dataset.sequences[0]?.length ?? 0 : null;
      const encoded = fit.transform(input.interpolaters.applyStandalone(raw, timesteps));

      if (input.window) {
        const plan = windower.plan(encoded.length, { ...input.window.spec, recordShifted: false });
        return windower.apply(encoded, plan.samplesUnshifted);
      }
      if (timesteps !== null) {
        return chunk(encoded, timesteps);
      }
      return encoded;
    });

    let label: Tensor | null = null;
    if (samples.target && target && fitted.label) {
      const raw = projectRows(samples.target, target.columns);
      label = fitted.label.transform(target.interpolaters.applyStandalone(raw, null));
    }

    return {
      sampleCount: features[0]?.length ?? 0,
      features,
      label,
    };
  }
}
