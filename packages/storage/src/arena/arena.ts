import type {
  EntityStore,
  JobRecord,
  PipelineRecord,
  PredictorRecord,
  QueueRecord,
} from '@strata/core';
import { InMemoryEntityRepository } from './in-memory-repository.js';

/**
 * In-process arena holding every table of a run
 */
export class InMemoryArena implements EntityStore {
  readonly pipelines = new InMemoryEntityRepository<PipelineRecord>('pipeline');
  readonly queues = new InMemoryEntityRepository<QueueRecord>('queue');
  readonly jobs = new InMemoryEntityRepository<JobRecord>('job');
  readonly predictors = new InMemoryEntityRepository<PredictorRecord>('predictor');

  /**
   * Jobs of a queue in enumeration order
   */
  jobsOfQueue(queueId: number): JobRecord[] {
    return this.jobs
      .where((job) => job.queueId === queueId)
      .sort((a, b) => a.position - b.position);
  }

  predictorOfJob(jobId: number): PredictorRecord | null {
    return this.predictors.where((predictor) => predictor.jobId === jobId)[0] ?? null;
  }
}

export function createInMemoryArena(): InMemoryArena {
  return new InMemoryArena();
}
