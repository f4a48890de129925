/**
 * Queue
 * =====
 * Expands hyperparameters into combos and enumerates one job per
 * (combo, fold, repeat), combos outermost and repeats innermost. Jobs are
 * recorded in the arena and run by a pool of async workers.
 *
 * A queue never rejects because a job failed: failures are recorded on the
 * job and reported. Succeeded jobs are skipped on later runs; failed jobs
 * stay failed.
 */

import { z } from 'zod';
import {
  createSystemClock,
  type Algorithm,
  type ClockPort,
  type EntityStore,
  type FoldContext,
  type Hyperparamcombo,
  type HyperparameterSpace,
  type JobRecord,
  type OptimizerSpec,
  type PipelineRecord,
  type PredictorRecord,
  type QueueRecord,
} from '@strata/core';
import { ParameterSpace, type ExpansionOptions, type MaterializedPipeline, type NewSamples } from '@strata/lab';
import { createInMemoryArena } from '@strata/storage';
import { ConfigurationError, InvalidStateError, NotFoundError, getRuntimeConfig } from '@strata/utils';
import { inferWithPredictor, type InferenceResult } from './inference.js';
import { JobRunner, stageContext, type StagedContext } from './JobRunner.js';
import { logger } from './logger.js';
import { evaluateSplit, type Evaluator } from './metrics.js';
import { isoOf, nowUtc } from './time.js';

export const QueueSettingsSchema = z
  .object({
    repeatCount: z.number().int().min(1).optional(),
    hideTest: z.boolean().optional(),
    useFolds: z.boolean().optional(),
    concurrency: z.number().int().min(1).optional(),
  })
  .strict();

export type QueueSettings = z.infer<typeof QueueSettingsSchema>;

export interface QueueOptions<TModel, TOptimizer = OptimizerSpec> extends QueueSettings {
  materialized: MaterializedPipeline;
  algorithm: Algorithm<TModel, TOptimizer>;
  hyperparameters?: HyperparameterSpace;
  expansion?: ExpansionOptions;
  /** @default evaluateSplit */
  evaluator?: Evaluator;
  /** @default a fresh in-memory arena */
  store?: EntityStore;
  /** @default system clock */
  clock?: ClockPort;
}

/**
 * One enumerated job before it is recorded
 */
export interface JobSpec {
  readonly key: string;
  readonly position: number;
  readonly combo: Hyperparamcombo;
  readonly foldIndex: FoldContext;
  readonly repeatIndex: number;
}

export interface QueueProgress {
  readonly completed: number;
  readonly total: number;
}

export interface RunJobsOptions {
  /** Halts the run between jobs */
  signal?: AbortSignal;
  onProgress?: (progress: QueueProgress) => void;
}

export interface QueueReport {
  readonly queueId: number;
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly pending: number;
  /** True when a stop request or abort left jobs pending */
  readonly stopped: boolean;
  readonly jobs: readonly JobRecord[];
}

export function jobKey(comboId: string, foldIndex: FoldContext, repeatIndex: number): string {
  return `combo:${comboId.slice(0, 12)}|fold:${foldIndex ?? 'none'}|repeat:${repeatIndex}`;
}

function foldKey(foldIndex: FoldContext): string {
  return foldIndex === null ? 'none' : String(foldIndex);
}

export class Queue<TModel, TOptimizer = OptimizerSpec> {
  readonly id: number;
  readonly combos: readonly Hyperparamcombo[];
  readonly repeatCount: number;
  readonly hideTest: boolean;
  readonly useFolds: boolean;
  readonly concurrency: number;

  private readonly materialized: MaterializedPipeline;
  private readonly algorithm: Algorithm<TModel, TOptimizer>;
  private readonly store: EntityStore;
  private readonly clock: ClockPort;
  private readonly runner: JobRunner<TModel, TOptimizer>;
  private readonly models = new Map<number, TModel>();
  private running = false;
  private stopRequested = false;

  constructor(options: QueueOptions<TModel, TOptimizer>) {
    const parsed = QueueSettingsSchema.safeParse({
      repeatCount: options.repeatCount,
      hideTest: options.hideTest,
      useFolds: options.useFolds,
      concurrency: options.concurrency,
    });
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid queue options: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
        'queue'
      );
    }
    const settings = parsed.data;
    const runtime = getRuntimeConfig();
    const { materialized } = options;

    this.materialized = materialized;
    this.algorithm = options.algorithm;
    this.repeatCount = settings.repeatCount ?? runtime.repeatCount;
    this.concurrency = settings.concurrency ?? runtime.queueConcurrency;
    this.hideTest = settings.hideTest ?? false;
    this.useFolds = settings.useFolds ?? materialized.foldset !== null;

    if (this.useFolds && materialized.foldset === null) {
      throw new ConfigurationError(`Pipeline ${materialized.pipelineId} has no folds to run`, 'useFolds');
    }
    if (materialized.getInputShapes(null).labelShape === null) {
      throw new ConfigurationError(
        `Pipeline ${materialized.pipelineId} has no label: declare a target or a window that records shifted rows`,
        'target'
      );
    }

    this.combos = new ParameterSpace().expand(options.hyperparameters, options.expansion);
    this.store = options.store ?? createInMemoryArena();
    this.clock = options.clock ?? createSystemClock();
    this.runner = new JobRunner<TModel, TOptimizer>({
      algorithm: options.algorithm,
      store: this.store,
      clock: this.clock,
      evaluator: options.evaluator ?? evaluateSplit,
    });

    const createdAt = isoOf(nowUtc(this.clock));
    this.registerPipeline(createdAt);
    const queue = this.store.queues.insert((id): QueueRecord => ({
      id,
      pipelineId: materialized.pipelineId,
      analysisType: options.algorithm.analysisType,
      comboCount: this.combos.length,
      foldCount: this.useFolds ? materialized.foldset?.foldCount ?? null : null,
      repeatCount: this.repeatCount,
      hideTest: this.hideTest,
      runCount: 0,
      createdAt,
    }));
    this.id = queue.id;

    for (const spec of this.enumerate()) {
      this.store.jobs.insert((id): JobRecord => ({
        id,
        queueId: queue.id,
        key: spec.key,
        position: spec.position,
        comboId: spec.combo.comboId,
        comboIndex: spec.combo.index,
        hyperparameters: spec.combo.hyperparameters,
        foldIndex: spec.foldIndex,
        repeatIndex: spec.repeatIndex,
        status: 'pending',
        error: null,
        predictorId: null,
        startedAt: null,
        finishedAt: null,
      }));
    }

    logger.info('Queue created', {
      queueId: this.id,
      pipelineId: materialized.pipelineId,
      combos: this.combos.length,
      folds: this.useFolds ? materialized.foldset?.foldCount : null,
      repeatCount: this.repeatCount,
      jobs: this.combos.length * this.foldContexts().length * this.repeatCount,
    });
  }

  private registerPipeline(registeredAt: string): PipelineRecord {
    const { pipelineId, configHash } = this.materialized;
    const existing = this.store.pipelines.where(
      (record) => record.pipelineId === pipelineId && record.configHash === configHash
    )[0];
    return (
      existing ??
      this.store.pipelines.insert((id) => ({
        id,
        pipelineId,
        configHash,
        sampleCount: this.materialized.sampleCount,
        foldCount: this.materialized.foldset?.foldCount ?? null,
        registeredAt,
      }))
    );
  }

  private foldContexts(): FoldContext[] {
    if (!this.useFolds) {
      return [null];
    }
    return this.materialized.foldContexts().filter((fold) => fold !== null);
  }

  /**
   * Every job of this queue in run order. Pure: calling it again yields the
   * same list.
   */
  enumerate(): JobSpec[] {
    const specs: JobSpec[] = [];
    for (const combo of this.combos) {
      for (const foldIndex of this.foldContexts()) {
        for (let repeatIndex = 0; repeatIndex < this.repeatCount; repeatIndex++) {
          specs.push({
            key: jobKey(combo.comboId, foldIndex, repeatIndex),
            position: specs.length,
            combo,
            foldIndex,
            repeatIndex,
          });
        }
      }
    }
    return specs;
  }

  get record(): QueueRecord {
    return this.store.queues.get(this.id);
  }

  jobs(): JobRecord[] {
    return this.store.jobs
      .where((job) => job.queueId === this.id)
      .sort((a, b) => a.position - b.position);
  }

  progress(): QueueProgress {
    const jobs = this.jobs();
    return {
      completed: jobs.filter((job) => job.status === 'succeeded' || job.status === 'failed').length,
      total: jobs.length,
    };
  }

  /**
   * Halt after the jobs currently in flight
   */
  stop(): void {
    this.stopRequested = true;
    logger.info('Queue stop requested', { queueId: this.id });
  }

  async runJobs(options: RunJobsOptions = {}): Promise<QueueReport> {
    if (this.running) {
      throw new InvalidStateError(`Queue ${this.id} is already running`, { queueId: this.id });
    }
    this.running = true;
    this.stopRequested = false;

    try {
      const record = this.record;
      this.store.queues.update(this.id, { runCount: record.runCount + 1 });

      const pending = this.jobs().filter((job) => job.status === 'pending');
      const staged = new Map<string, StagedContext>();
      for (const job of pending) {
        const key = foldKey(job.foldIndex);
        if (!staged.has(key)) {
          staged.set(key, stageContext(this.materialized, job.foldIndex, this.hideTest));
        }
      }

      logger.info('Running queue', {
        queueId: this.id,
        total: this.progress().total,
        pending: pending.length,
        concurrency: this.concurrency,
      });

      const halted = (): boolean => this.stopRequested || options.signal?.aborted === true;
      let cursor = 0;
      let defect = false;

      const worker = async (workerId: number): Promise<void> => {
        while (!defect && !halted() && cursor < pending.length) {
          const job = pending[cursor++];
          const context = job ? staged.get(foldKey(job.foldIndex)) : undefined;
          if (!job || !context) {
            continue;
          }
          logger.debug('Worker picked job', { workerId, jobId: job.id, jobKey: job.key });
          try {
            const outcome = await this.runner.run(job, context);
            if (outcome.status === 'succeeded') {
              this.models.set(outcome.predictor.id, outcome.model);
            }
          } catch (error) {
            defect = true;
            throw error;
          }
          options.onProgress?.(this.progress());
        }
      };

      // every worker settles before a defect is rethrown
      const workerCount = Math.min(this.concurrency, pending.length);
      const settled = await Promise.allSettled(Array.from({ length: workerCount }, (_, i) => worker(i)));
      const rejected = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (rejected) {
        throw rejected.reason;
      }

      const report = this.report(halted());
      logger.info('Queue run completed', {
        queueId: this.id,
        succeeded: report.succeeded,
        failed: report.failed,
        pending: report.pending,
        stopped: report.stopped,
      });
      return report;
    } finally {
      this.running = false;
    }
  }

  report(haltRequested = false): QueueReport {
    const jobs = this.jobs();
    const count = (status: JobRecord['status']): number => jobs.filter((job) => job.status === status).length;
    const pending = count('pending');
    return {
      queueId: this.id,
      total: jobs.length,
      succeeded: count('succeeded'),
      failed: count('failed'),
      pending,
      stopped: haltRequested && pending > 0,
      jobs,
    };
  }

  getPredictor(jobId: number): PredictorRecord | null {
    const job = this.store.jobs.get(jobId);
    return job.predictorId === null ? null : this.store.predictors.get(job.predictorId);
  }

  /**
   * Trained model handle of a predictor produced by this queue instance
   */
  getModel(predictorId: number): TModel {
    const model = this.models.get(predictorId);
    if (model === undefined) {
      throw new NotFoundError('model', predictorId);
    }
    return model;
  }

  /**
   * Encode new samples with the fits of a job's fold context and score them
   * with its trained model
   */
  async infer(jobId: number, samples: NewSamples): Promise<InferenceResult> {
    const job = this.store.jobs.get(jobId);
    const predictor = this.getPredictor(jobId);
    if (!predictor) {
      throw new InvalidStateError(`Job ${job.key} has no predictor (status ${job.status})`, { jobId });
    }
    return inferWithPredictor({
      materialized: this.materialized,
      algorithm: this.algorithm,
      predictor,
      model: this.getModel(predictor.id),
      samples,
      foldIndex: job.foldIndex,
      hyperparameters: job.hyperparameters,
    });
  }
}
