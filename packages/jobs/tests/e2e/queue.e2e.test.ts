/**
 * End-to-end: pipeline materialization feeding a queue of training jobs
 */

import { describe, it, expect, vi } from 'vitest';
import { flattenToMatrix, type Algorithm, type BuildContext, type Matrix, type Tensor } from '@strata/core';
import { Pipeline, tabular, type MaterializedPipeline } from '@strata/lab';
import { createInMemoryArena } from '@strata/storage';
import { InvalidStateError, LeakageGuardViolation } from '@strata/utils';
import { Queue } from '../../src/Queue.js';

const N = 20;
const range = (n: number) => Array.from({ length: n }, (_, i) => i);

const features = tabular({ id: 'features', columns: ['x', 'noise'], rows: range(N).map((i) => [i, i % 3]) });
const labels = tabular({ id: 'labels', columns: ['y'], rows: range(N).map((i) => [i < 8 ? 1 : 0]) });

const fixedClock = { nowMs: () => Date.UTC(2024, 0, 1) };

function materialize(foldCount?: number): MaterializedPipeline {
  return Pipeline.build({
    inputs: [{ dataset: features, encoders: [{ columns: ['x'], encoder: { kind: 'standard_scaler' } }] }],
    target: { dataset: labels, column: 'y' },
    stratifier: { sizeTest: 0.25, foldCount, seed: 4 },
  }).materialize();
}

/**
 * Scores 0.9 below the scaled mean of x, 0.1 above it
 */
interface ThresholdModel {
  readonly units: number;
  predict(features: readonly Tensor[]): Matrix;
}

function thresholdModel(units: number): ThresholdModel {
  return {
    units,
    predict: (inputs) => flattenToMatrix(inputs[0] ?? []).map((row) => [(row[0] ?? 0) < 0 ? 0.9 : 0.1]),
  };
}

function unitsOf(context: BuildContext): number {
  const units = context.hyperparameters['units'];
  return typeof units === 'number' ? units : 0;
}

function algorithm(overrides: Partial<Algorithm<ThresholdModel>> = {}): Algorithm<ThresholdModel> {
  return {
    analysisType: 'classification_binary',
    build: (context) => thresholdModel(unitsOf(context)),
    train: ({ model }) => ({ model, history: { loss: [0.5, 0.25] } }),
    ...overrides,
  };
}

const space = { units: [1, 2, 3, 4], rate: [0.1, 0.2] };

describe('Queue end-to-end', () => {
  it('should record a failing build and finish every other job', async () => {
    const build = vi.fn((context: BuildContext) => {
      if (context.hyperparameters['units'] === 3 && context.hyperparameters['rate'] === 0.2) {
        throw new Error('boom');
      }
      return thresholdModel(unitsOf(context));
    });
    const queue = new Queue({
      materialized: materialize(),
      algorithm: algorithm({ build }),
      hyperparameters: space,
      useFolds: false,
      clock: fixedClock,
    });

    const report = await queue.runJobs();

    expect(report).toMatchObject({ total: 8, succeeded: 7, failed: 1, pending: 0, stopped: false });
    const failed = report.jobs.filter((job) => job.status === 'failed');
    expect(failed.map((job) => job.position)).toEqual([5]);
    expect(failed[0]?.error).toMatchObject({
      name: 'JobExecutionError',
      code: 'JOB_EXECUTION_ERROR',
      message: `build failed for job ${failed[0]?.key}: boom`,
      cause: { name: 'Error', message: 'boom' },
    });
    expect(build).toHaveBeenCalledWith({ featuresShape: [[2]], labelShape: [1], hyperparameters: { units: 1, rate: 0.1 } });
  });

  it('should store a predictor for every succeeded job', async () => {
    const queue = new Queue({
      materialized: materialize(),
      algorithm: algorithm(),
      hyperparameters: { units: [2] },
      useFolds: false,
      clock: fixedClock,
    });

    const report = await queue.runJobs();
    const job = report.jobs[0];
    const predictor = job ? queue.getPredictor(job.id) : null;

    expect(job).toMatchObject({
      status: 'succeeded',
      startedAt: '2024-01-01T00:00:00.000Z',
      finishedAt: '2024-01-01T00:00:00.000Z',
    });
    expect(predictor).toMatchObject({
      history: { loss: [0.5, 0.25] },
      inputShapes: { featuresShape: [[2]], labelShape: [1] },
      timeStarted: '2024-01-01T00:00:00.000Z',
      timeSucceeded: '2024-01-01T00:00:00.000Z',
      durationSeconds: 0,
    });
    expect(Object.keys(predictor?.metrics ?? {})).toEqual(['train', 'test']);
    expect(Object.keys(predictor?.metrics.test ?? {})).toEqual(['accuracy', 'f1', 'loss', 'precision', 'recall']);
    expect(Object.keys(predictor?.metricsAggregate ?? {})).toEqual(['accuracy', 'f1', 'loss', 'precision', 'recall']);
    expect(queue.getModel(predictor?.id ?? -1).units).toBe(2);
  });

  describe('job samples', () => {
    function recordingTrain() {
      const seen: Array<[number, number | null]> = [];
      const train: Algorithm<ThresholdModel>['train'] = ({ model, samplesTrain, samplesEvaluate }) => {
        seen.push([samplesTrain.label?.length ?? 0, samplesEvaluate ? samplesEvaluate.label?.length ?? 0 : null]);
        return { model };
      };
      return { seen, train };
    }

    it('should train on train and evaluate on test without validation', async () => {
      const { seen, train } = recordingTrain();
      const queue = new Queue({ materialized: materialize(), algorithm: algorithm({ train }), useFolds: false });

      await queue.runJobs();

      expect(seen).toEqual([[15, 5]]);
    });

    it('should drop the test split when it is hidden', async () => {
      const { seen, train } = recordingTrain();
      const queue = new Queue({
        materialized: materialize(),
        algorithm: algorithm({ train }),
        useFolds: false,
        hideTest: true,
      });

      const report = await queue.runJobs();
      const predictor = queue.getPredictor(report.jobs[0]?.id ?? -1);

      expect(seen).toEqual([[15, null]]);
      expect(Object.keys(predictor?.metrics ?? {})).toEqual(['train']);
    });

    it('should use fold_train and fold_evaluation per fold', async () => {
      const { seen, train } = recordingTrain();
      const queue = new Queue({ materialized: materialize(3), algorithm: algorithm({ train }) });

      const report = await queue.runJobs();
      const predictor = queue.getPredictor(report.jobs[2]?.id ?? -1);

      expect(report.jobs.map((job) => job.foldIndex)).toEqual([0, 1, 2]);
      expect(seen).toEqual([
        [10, 5],
        [10, 5],
        [10, 5],
      ]);
      expect(Object.keys(predictor?.metrics ?? {})).toEqual(['fold_train', 'fold_evaluation', 'test']);
    });
  });

  it('should fail a job whose callable returns nothing', async () => {
    const queue = new Queue({
      materialized: materialize(),
      algorithm: algorithm({ train: () => undefined }),
      hyperparameters: { units: [1, 2] },
      useFolds: false,
    });

    const report = await queue.runJobs();

    expect(report.failed).toBe(2);
    expect(report.jobs[0]?.error?.message).toBe(`train returned nothing for job ${report.jobs[0]?.key}`);
  });

  it('should skip succeeded jobs and keep failed jobs on a rerun', async () => {
    const build = vi.fn((context: BuildContext) => {
      if (unitsOf(context) === 4) {
        throw new Error('too wide');
      }
      return thresholdModel(unitsOf(context));
    });
    const store = createInMemoryArena();
    const queue = new Queue({
      materialized: materialize(),
      algorithm: algorithm({ build }),
      hyperparameters: space,
      useFolds: false,
      store,
    });

    await queue.runJobs();
    const second = await queue.runJobs();

    expect(build).toHaveBeenCalledTimes(8);
    expect(second).toMatchObject({ succeeded: 6, failed: 2, pending: 0 });
    expect(queue.record.runCount).toBe(2);
    expect(store.predictors.count()).toBe(6);
  });

  it('should halt between jobs after stop and resume on the next run', async () => {
    const queue = new Queue({
      materialized: materialize(),
      algorithm: algorithm(),
      hyperparameters: space,
      useFolds: false,
      concurrency: 1,
    });

    const stopped = await queue.runJobs({ onProgress: () => queue.stop() });

    expect(stopped).toMatchObject({ succeeded: 1, pending: 7, stopped: true });

    const resumed = await queue.runJobs();

    expect(resumed).toMatchObject({ succeeded: 8, pending: 0, stopped: false });
  });

  it('should not start any job once the signal is aborted', async () => {
    const build = vi.fn((context: BuildContext) => thresholdModel(unitsOf(context)));
    const queue = new Queue({
      materialized: materialize(),
      algorithm: algorithm({ build }),
      hyperparameters: space,
      useFolds: false,
    });
    const controller = new AbortController();
    controller.abort();

    const report = await queue.runJobs({ signal: controller.signal });

    expect(report).toMatchObject({ succeeded: 0, pending: 8, stopped: true });
    expect(build).not.toHaveBeenCalled();
  });

  it('should report monotonic progress', async () => {
    const completed: number[] = [];
    const queue = new Queue({
      materialized: materialize(),
      algorithm: algorithm(),
      hyperparameters: space,
      useFolds: false,
    });

    await queue.runJobs({ onProgress: (progress) => completed.push(progress.completed) });

    expect(completed).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(queue.progress()).toEqual({ completed: 8, total: 8 });
  });

  it('should run up to concurrency jobs at once', async () => {
    let inFlight = 0;
    let peak = 0;
    const queue = new Queue({
      materialized: materialize(),
      algorithm: algorithm({
        train: async ({ model }) => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await new Promise((resolve) => setTimeout(resolve, 5));
          inFlight--;
          return { model };
        },
      }),
      hyperparameters: space,
      useFolds: false,
      concurrency: 3,
    });

    const report = await queue.runJobs();

    expect(report.succeeded).toBe(8);
    expect(peak).toBe(3);
  });

  it('should let in-flight jobs finish before rethrowing a leakage violation', async () => {
    const queue = new Queue({
      materialized: materialize(),
      algorithm: algorithm({
        build: (context) => {
          if (unitsOf(context) === 1) {
            throw new LeakageGuardViolation('fit on test rows');
          }
          return thresholdModel(unitsOf(context));
        },
        train: async ({ model }) => {
          await new Promise((resolve) => setTimeout(resolve, 10));
          return { model };
        },
      }),
      hyperparameters: { units: [1, 2, 3] },
      useFolds: false,
      concurrency: 2,
    });

    await expect(queue.runJobs()).rejects.toThrow(LeakageGuardViolation);

    expect(queue.jobs().map((job) => job.status)).toEqual(['failed', 'succeeded', 'pending']);
    await expect(queue.runJobs()).resolves.toMatchObject({ succeeded: 2, failed: 1, pending: 0 });
  });

  it('should refuse a second run while one is in progress', async () => {
    const queue = new Queue({ materialized: materialize(), algorithm: algorithm(), useFolds: false });

    const first = queue.runJobs();

    await expect(queue.runJobs()).rejects.toThrow(InvalidStateError);
    await expect(first).resolves.toMatchObject({ succeeded: 1 });
  });

  describe('inference', () => {
    it('should encode, predict, decode and score new samples', async () => {
      const queue = new Queue({ materialized: materialize(), algorithm: algorithm(), useFolds: false });
      const report = await queue.runJobs();

      const result = await queue.infer(report.jobs[0]?.id ?? -1, {
        inputs: [tabular({ id: 'fresh', columns: ['x', 'noise'], rows: [[0, 0], [19, 1]] })],
        target: tabular({ id: 'fresh-labels', columns: ['y'], rows: [[1], [0]] }),
      });

      expect(result).toEqual({
        sampleCount: 2,
        predictions: [[1], [0]],
        probabilities: [[0.9], [0.1]],
        decoded: [[1], [0]],
        metrics: { accuracy: 1, f1: 1, loss: 0.105, precision: 1, recall: 1 },
      });
    });

    it('should refuse a job without a predictor', async () => {
      const queue = new Queue({
        materialized: materialize(),
        algorithm: algorithm({ train: () => undefined }),
        useFolds: false,
      });
      const report = await queue.runJobs();

      await expect(
        queue.infer(report.jobs[0]?.id ?? -1, {
          inputs: [tabular({ id: 'fresh', columns: ['x', 'noise'], rows: [[0, 0]] })],
        })
      ).rejects.toThrow(InvalidStateError);
    });
  });
});
