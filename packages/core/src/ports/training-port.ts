/**
 * Training Port
 *
 * The callables a queue drives for every job. Only `build` and `train` are
 * required; the job runner supplies defaults for the rest.
 */

import type { Matrix, Tensor } from '../types/dataset.js';
import type { AnalysisType, Hyperparameters, InputShapes, TrainingHistory } from '../types/jobs.js';

type MaybePromise<T> = T | Promise<T>;

/**
 * Tensors handed to a training callable for one split
 */
export interface TrainingSamples {
  readonly features: readonly Tensor[];
  readonly label: Tensor | null;
}

/**
 * Scores outputs against labels, lower is better
 */
export type LossFn = (labels: Matrix, outputs: Matrix) => number;

export interface OptimizerSpec {
  readonly name: string;
  readonly learningRate: number;
}

export interface BuildContext extends InputShapes {
  readonly hyperparameters: Hyperparameters;
}

export interface TrainContext<TModel, TOptimizer> {
  readonly model: TModel;
  readonly loser: LossFn;
  readonly optimizer: TOptimizer | OptimizerSpec;
  readonly samplesTrain: TrainingSamples;
  /** null when neither validation nor an unhidden test split exists */
  readonly samplesEvaluate: TrainingSamples | null;
  readonly hyperparameters: Hyperparameters;
}

export interface TrainResult<TModel> {
  readonly model: TModel;
  readonly history?: TrainingHistory;
}

export interface Prediction {
  /** Thresholded / arg-maxed outputs for classification, raw outputs for regression */
  readonly predictions: Matrix;
  /** Raw class scores; null for regression */
  readonly probabilities: Matrix | null;
}

/**
 * Model handles that can score features themselves. The default predict
 * callable uses this.
 */
export interface PredictingModel {
  predict(features: readonly Tensor[]): MaybePromise<Tensor>;
}

export function isPredictingModel(model: unknown): model is PredictingModel {
  return (
    typeof model === 'object' &&
    model !== null &&
    'predict' in model &&
    typeof model.predict === 'function'
  );
}

/**
 * User-supplied training capability.
 *
 * A callable that returns `undefined` (or a promise of it) fails the job.
 */
export interface Algorithm<TModel, TOptimizer = OptimizerSpec> {
  readonly analysisType: AnalysisType;
  build(context: BuildContext): MaybePromise<TModel | undefined>;
  train(context: TrainContext<TModel, TOptimizer>): MaybePromise<TrainResult<TModel> | undefined>;
  predict?(model: TModel, features: readonly Tensor[]): MaybePromise<Prediction | undefined>;
  lose?(hyperparameters: Hyperparameters): LossFn | undefined;
  optimize?(hyperparameters: Hyperparameters, model: TModel): TOptimizer | undefined;
}
