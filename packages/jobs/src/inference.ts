/**
 * Inference with a trained predictor on new raw samples
 */

import {
  flattenToMatrix,
  sampleShape,
  type Algorithm,
  type FoldContext,
  type Hyperparameters,
  type LossFn,
  type Matrix,
  type OptimizerSpec,
  type Prediction,
  type PredictorRecord,
  type Scalar,
} from '@strata/core';
import type { MaterializedPipeline, NewSamples } from '@strata/lab';
import { ConfigurationError } from '@strata/utils';
import { defaultLoss, defaultPredict } from './algorithm.js';
import { logger } from './logger.js';
import { evaluateSplit, roundMetrics, type Evaluator } from './metrics.js';

export interface InferenceRequest<TModel, TOptimizer = OptimizerSpec> {
  materialized: MaterializedPipeline;
  algorithm: Algorithm<TModel, TOptimizer>;
  model: TModel;
  /** When given, encoded feature shapes are checked against the ones it was trained on */
  predictor?: PredictorRecord;
  samples: NewSamples;
  /** Fold context whose fits encode the samples */
  foldIndex?: FoldContext;
  /** Passed to `algorithm.lose` when scoring labelled samples */
  hyperparameters?: Hyperparameters;
  evaluator?: Evaluator;
}

export interface InferenceResult {
  readonly sampleCount: number;
  readonly predictions: Matrix;
  readonly probabilities: Matrix | null;
  /** Predictions mapped back through the fitted label encoders; null when the widths do not line up */
  readonly decoded: Scalar[][] | null;
  /** Present when the samples carry a target */
  readonly metrics: Record<string, number> | null;
}

function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

export async function inferWithPredictor<TModel, TOptimizer = OptimizerSpec>(
  request: InferenceRequest<TModel, TOptimizer>
): Promise<InferenceResult> {
  const { materialized, algorithm, model, predictor, samples } = request;
  const foldIndex = request.foldIndex ?? null;
  const encoded = materialized.encodeNew(samples, foldIndex);

  if (predictor && encoded.sampleCount > 0) {
    encoded.features.forEach((tensor, i) => {
      const expected = predictor.inputShapes.featuresShape[i] ?? [];
      const actual = sampleShape(tensor);
      if (!sameShape(actual, expected)) {
        throw new ConfigurationError(
          `Input ${i} encodes to shape [${actual.join(', ')}], predictor ${predictor.id} expects [${expected.join(', ')}]`,
          'inputs'
        );
      }
    });
  }

  const prediction: Prediction | undefined = algorithm.predict
    ? await algorithm.predict(model, encoded.features)
    : await defaultPredict(algorithm.analysisType, model, encoded.features);
  if (!prediction) {
    throw new ConfigurationError('predict returned nothing', 'algorithm.predict');
  }

  const labelEncoder = materialized.getFitted(foldIndex).label;
  const width = prediction.predictions[0]?.length ?? 0;
  const decoded =
    labelEncoder && width === labelEncoder.outputColumns().length
      ? labelEncoder.inverseTransform(prediction.predictions)
      : null;

  let metrics: Record<string, number> | null = null;
  if (encoded.label) {
    const loser: LossFn = algorithm.lose?.(request.hyperparameters ?? {}) ?? defaultLoss(algorithm.analysisType);
    const evaluator = request.evaluator ?? evaluateSplit;
    metrics = roundMetrics(
      evaluator({
        analysisType: algorithm.analysisType,
        split: 'inference',
        labels: flattenToMatrix(encoded.label),
        prediction,
        loser,
      })
    );
  }

  logger.debug('Inference completed', {
    pipelineId: materialized.pipelineId,
    foldIndex,
    predictorId: predictor?.id ?? null,
    sampleCount: encoded.sampleCount,
  });

  return {
    sampleCount: encoded.sampleCount,
    predictions: prediction.predictions,
    probabilities: prediction.probabilities,
    decoded,
    metrics,
  };
}
