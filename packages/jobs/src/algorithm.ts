/**
 * Default training callables
 *
 * Used by the job runner when an Algorithm leaves `predict`, `lose` or
 * `optimize` out.
 */

import {
  argmax,
  flattenToMatrix,
  isPredictingModel,
  type AnalysisType,
  type Hyperparameters,
  type LossFn,
  type Matrix,
  type OptimizerSpec,
  type Prediction,
  type Tensor,
  type Vector,
} from '@strata/core';
import { ConfigurationError } from '@strata/utils';

const EPSILON = 1e-7;
const DEFAULT_LEARNING_RATE = 0.01;

function clampProbability(p: number): number {
  return Math.min(Math.max(p, EPSILON), 1 - EPSILON);
}

function pairRows(labels: Matrix, outputs: Matrix): Array<[Vector, Vector]> {
  if (labels.length !== outputs.length) {
    throw new RangeError(`Label and output row counts differ: ${labels.length} vs ${outputs.length}`);
  }
  return labels.map((label, i): [Vector, Vector] => [label, outputs[i] ?? []]);
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Mean binary cross-entropy over every label element
 */
export const binaryCrossEntropy: LossFn = (labels, outputs) => {
  const terms = pairRows(labels, outputs).flatMap(([label, output]) =>
    label.map((y, j) => {
      const p = clampProbability(output[j] ?? 0);
      return -(y * Math.log(p) + (1 - y) * Math.log(1 - p));
    })
  );
  return mean(terms);
};

/**
 * Mean categorical cross-entropy per row. A single-column label holds the
 * class index.
 */
export const categoricalCrossEntropy: LossFn = (labels, outputs) => {
  const terms = pairRows(labels, outputs).map(([label, output]) => {
    if (label.length === 1 && output.length > 1) {
      return -Math.log(clampProbability(output[Math.round(label[0] ?? 0)] ?? 0));
    }
    return -label.reduce((sum, y, j) => sum + y * Math.log(clampProbability(output[j] ?? 0)), 0);
  });
  return mean(terms);
};

export const meanSquaredError: LossFn = (labels, outputs) => {
  const terms = pairRows(labels, outputs).flatMap(([label, output]) =>
    label.map((y, j) => (y - (output[j] ?? 0)) ** 2)
  );
  return mean(terms);
};

export function defaultLoss(analysisType: AnalysisType): LossFn {
  switch (analysisType) {
    case 'classification_binary':
      return binaryCrossEntropy;
    case 'classification_multi':
      return categoricalCrossEntropy;
    case 'regression':
      return meanSquaredError;
  }
}

export function defaultOptimizer(hyperparameters: Hyperparameters): OptimizerSpec {
  const learningRate = hyperparameters['learningRate'];
  return {
    name: 'adamax',
    learningRate: typeof learningRate === 'number' ? learningRate : DEFAULT_LEARNING_RATE,
  };
}

/**
 * Turn raw model outputs into predictions for an analysis type
 */
export function toPrediction(analysisType: AnalysisType, raw: Matrix): Prediction {
  switch (analysisType) {
    case 'classification_binary':
      return {
        predictions: raw.map((row) => row.map((p) => (p >= 0.5 ? 1 : 0))),
        probabilities: raw,
      };
    case 'classification_multi':
      return {
        predictions: raw.map((row) => {
          if (row.length === 1) {
            return [Math.round(row[0] ?? 0)];
          }
          const best = argmax(row);
          return row.map((_, j) => (j === best ? 1 : 0));
        }),
        probabilities: raw,
      };
    case 'regression':
      return { predictions: raw, probabilities: null };
  }
}

/**
 * Score features with the model handle's own `predict(features)`
 */
export async function defaultPredict(
  analysisType: AnalysisType,
  model: unknown,
  features: readonly Tensor[]
): Promise<Prediction> {
  if (!isPredictingModel(model)) {
    throw new ConfigurationError(
      'The model handle has no predict(features) method and the algorithm defines no predict callable',
      'algorithm.predict'
    );
  }
  const raw = await model.predict(features);
  return toPrediction(analysisType, flattenToMatrix(raw));
}
