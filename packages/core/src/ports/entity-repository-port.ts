/**
 * Entity Repository Port
 *
 * Flat, id-addressed tables. Relationships between entities are integer ids
 * and are followed with `where`, never with object references.
 */

import type { JobRecord, PipelineRecord, PredictorRecord, QueueRecord } from '../types/jobs.js';

export interface EntityRepository<T extends { readonly id: number }> {
  /**
   * Insert a new entity. The repository allocates the id.
   */
  insert(create: (id: number) => T): T;

  /**
   * Get entity by id, throws NotFoundError when absent
   */
  get(id: number): T;

  /**
   * Get entity by id or null
   */
  find(id: number): T | null;

  /**
   * Replace fields of an existing entity, returns the new version
   */
  update(id: number, patch: Partial<Omit<T, 'id'>>): T;

  /**
   * All entities matching the predicate, in id order
   */
  where(predicate: (entity: T) => boolean): T[];

  all(): T[];

  count(): number;
}

/**
 * All tables of one arena
 */
export interface EntityStore {
  readonly pipelines: EntityRepository<PipelineRecord>;
  readonly queues: EntityRepository<QueueRecord>;
  readonly jobs: EntityRepository<JobRecord>;
  readonly predictors: EntityRepository<PredictorRecord>;
}
