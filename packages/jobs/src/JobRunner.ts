/**
 * Job Runner
 * ==========
 * Runs one job: build → lose → optimize → train → predict every split →
 * metrics. Everything a user callable throws (or a callable returning
 * nothing) is recorded on the job as a JobExecutionError; the runner itself
 * only rejects for defects.
 */

import {
  flattenToMatrix,
  type Algorithm,
  type AnySplitName,
  type ClockPort,
  type EntityStore,
  type FoldContext,
  type InputShapes,
  type JobRecord,
  type LossFn,
  type OptimizerSpec,
  type Prediction,
  type PredictorRecord,
  type TrainResult,
  type TrainingSamples,
} from '@strata/core';
import type { MaterializedPipeline, SplitTensors } from '@strata/lab';
import {
  InvalidStateError,
  JobExecutionError,
  LeakageGuardViolation,
  describeError,
  handleError,
  toError,
} from '@strata/utils';
import { defaultLoss, defaultOptimizer, defaultPredict } from './algorithm.js';
import { logger } from './logger.js';
import { roundMetrics, aggregateMetrics, type Evaluator } from './metrics.js';
import { isoOf, nowUtc, secondsBetween } from './time.js';

/**
 * Cached tensors of one fold context, resolved once per queue run
 */
export interface StagedContext {
  readonly foldIndex: FoldContext;
  readonly keyTrain: AnySplitName;
  readonly keyEvaluation: AnySplitName | null;
  readonly splits: ReadonlyMap<AnySplitName, SplitTensors>;
  readonly inputShapes: InputShapes;
}

/**
 * Resolve the splits a job sees. Without folds the model trains on `train`
 * and evaluates on `validation`, falling back to `test`; with folds it uses
 * `fold_train` / `fold_evaluation`. `hideTest` removes `test` entirely.
 */
export function stageContext(
  materialized: MaterializedPipeline,
  foldIndex: FoldContext,
  hideTest: boolean
): StagedContext {
  const names = materialized.splitNames(foldIndex).filter((name) => !(hideTest && name === 'test'));
  const splits = new Map<AnySplitName, SplitTensors>(
    names.map((name): [AnySplitName, SplitTensors] => [name, materialized.getSplit(foldIndex, name)])
  );

  let keyEvaluation: AnySplitName | null = null;
  if (foldIndex !== null) {
    keyEvaluation = 'fold_evaluation';
  } else if (splits.has('validation')) {
    keyEvaluation = 'validation';
  } else if (splits.has('test')) {
    keyEvaluation = 'test';
  }

  return {
    foldIndex,
    keyTrain: foldIndex === null ? 'train' : 'fold_train',
    keyEvaluation,
    splits,
    inputShapes: materialized.getInputShapes(foldIndex),
  };
}

export type JobOutcome<TModel> =
  | { readonly status: 'succeeded'; readonly job: JobRecord; readonly predictor: PredictorRecord; readonly model: TModel }
  | { readonly status: 'failed'; readonly job: JobRecord; readonly error: JobExecutionError };

export interface JobRunnerOptions<TModel, TOptimizer> {
  algorithm: Algorithm<TModel, TOptimizer>;
  store: EntityStore;
  clock: ClockPort;
  evaluator: Evaluator;
}

type MaybePromise<T> = T | Promise<T>;

function toSamples(tensors: SplitTensors): TrainingSamples {
  return { features: tensors.features, label: tensors.label };
}

export class JobRunner<TModel, TOptimizer = OptimizerSpec> {
  constructor(private readonly options: JobRunnerOptions<TModel, TOptimizer>) {}

  async run(job: JobRecord, staged: StagedContext): Promise<JobOutcome<TModel>> {
    if (job.status !== 'pending') {
      throw new InvalidStateError(`Job ${job.key} is ${job.status}, expected pending`, { jobId: job.id });
    }
    const { store, clock } = this.options;
    const started = nowUtc(clock);
    const running = store.jobs.update(job.id, { status: 'running', startedAt: isoOf(started), error: null });

    try {
      const { predictor, model } = await this.execute(running, staged);
      const succeeded = store.jobs.update(job.id, {
        status: 'succeeded',
        predictorId: predictor.id,
        finishedAt: predictor.timeSucceeded,
      });
      logger.info('Job succeeded', {
        jobId: job.id,
        jobKey: job.key,
        predictorId: predictor.id,
        durationSeconds: predictor.durationSeconds,
      });
      return { status: 'succeeded', job: succeeded, predictor, model };
    } catch (error) {
      const failure =
        error instanceof JobExecutionError
          ? error
          : new JobExecutionError(`Job ${job.key} failed: ${toError(error).message}`, job.key, error);
      const failed = store.jobs.update(job.id, {
        status: 'failed',
        error: describeError(failure),
        finishedAt: isoOf(nowUtc(clock)),
      });
      if (error instanceof LeakageGuardViolation) {
        handleError(error, { jobId: job.id, jobKey: job.key });
        throw error;
      }
      logger.warn('Job failed', {
        jobId: job.id,
        jobKey: job.key,
        error: failure.message,
      });
      return { status: 'failed', job: failed, error: failure };
    }
  }

  /**
   * Invoke one user callable, rejecting `undefined`/`null` results
   */
  private async step<T>(job: JobRecord, name: string, fn: () => MaybePromise<T | undefined>): Promise<T> {
    let value: T | undefined;
    try {
      value = await fn();
    } catch (error) {
      if (error instanceof LeakageGuardViolation) {
        throw error;
      }
      throw new JobExecutionError(`${name} failed for job ${job.key}: ${toError(error).message}`, job.key, error, {
        step: name,
      });
    }
    if (value === undefined || value === null) {
      throw new JobExecutionError(`${name} returned nothing for job ${job.key}`, job.key, undefined, { step: name });
    }
    return value;
  }

  private async execute(
    job: JobRecord,
    staged: StagedContext
  ): Promise<{ predictor: PredictorRecord; model: TModel }> {
    const { algorithm, store, clock, evaluator } = this.options;
    const { analysisType } = algorithm;
    const hyperparameters = job.hyperparameters;
    const started = nowUtc(clock);

    const train = staged.splits.get(staged.keyTrain);
    if (!train) {
      throw new JobExecutionError(`Split ${staged.keyTrain} is not available to job ${job.key}`, job.key);
    }
    const evaluation = staged.keyEvaluation ? staged.splits.get(staged.keyEvaluation) ?? null : null;

    const model = await this.step<TModel>(job, 'build', () =>
      algorithm.build({ ...staged.inputShapes, hyperparameters })
    );
    const loser = await this.step<LossFn>(job, 'lose', () =>
      algorithm.lose ? algorithm.lose(hyperparameters) : defaultLoss(analysisType)
    );
    const optimizer = await this.step<TOptimizer | OptimizerSpec>(job, 'optimize', () =>
      algorithm.optimize ? algorithm.optimize(hyperparameters, model) : defaultOptimizer(hyperparameters)
    );
    const trained = await this.step<TrainResult<TModel>>(job, 'train', () =>
      algorithm.train({
        model,
        loser,
        optimizer,
        samplesTrain: toSamples(train),
        samplesEvaluate: evaluation ? toSamples(evaluation) : null,
        hyperparameters,
      })
    );

    const metrics: Record<string, Record<string, number>> = {};
    for (const [split, tensors] of staged.splits) {
      const prediction = await this.step<Prediction>(job, 'predict', () =>
        algorithm.predict
          ? algorithm.predict(trained.model, tensors.features)
          : defaultPredict(analysisType, trained.model, tensors.features)
      );
      if (!tensors.label) {
        continue;
      }
      metrics[split] = roundMetrics(
        evaluator({ analysisType, split, labels: flattenToMatrix(tensors.label), prediction, loser })
      );
    }

    const finished = nowUtc(clock);
    const predictor = store.predictors.insert((id) => ({
      id,
      jobId: job.id,
      history: trained.history ?? {},
      metrics,
      metricsAggregate: aggregateMetrics(metrics),
      inputShapes: staged.inputShapes,
      timeStarted: isoOf(started),
      timeSucceeded: isoOf(finished),
      durationSeconds: secondsBetween(started, finished),
    }));

    return { predictor, model: trained.model };
  }
}
