/**
 * Split cache
 *
 * Materialized split tensors keyed by (pipelineId, foldIndex, splitName),
 * fitted transformers keyed by (pipelineId, foldIndex). Every entry carries
 * the configuration hash it was built from.
 */

import { deepFreeze, type AnySplitName, type FoldContext } from '@strata/core';
import { CacheMissError, StaleCacheError } from '@strata/utils';
import { logger } from '../logger.js';
import type { FittedContext, SplitTensors } from './types.js';

interface CacheEntry<T> {
  configHash: string;
  value: T;
}

/** Entries of one pipeline, keyed by fold context (and split name) */
interface PipelineEntries {
  splits: Map<string, CacheEntry<SplitTensors>>;
  fits: Map<string, CacheEntry<FittedContext>>;
}

export interface SplitCacheStats {
  hits: number;
  misses: number;
  stale: number;
  entries: number;
}

export class SplitCache {
  private readonly pipelines = new Map<string, PipelineEntries>();
  private stats = { hits: 0, misses: 0, stale: 0 };

  static splitKey(foldIndex: FoldContext, split: AnySplitName): string {
    return `${foldIndex ?? 'none'}:${split}`;
  }

  static fitKey(foldIndex: FoldContext): string {
    return foldIndex === null ? 'none' : String(foldIndex);
  }

  private entriesOf(pipelineId: string): PipelineEntries {
    let entries = this.pipelines.get(pipelineId);
    if (!entries) {
      entries = { splits: new Map(), fits: new Map() };
      this.pipelines.set(pipelineId, entries);
    }
    return entries;
  }

  putSplit(pipelineId: string, configHash: string, tensors: SplitTensors): void {
    const key = SplitCache.splitKey(tensors.foldIndex, tensors.split);
    this.entriesOf(pipelineId).splits.set(key, { configHash, value: deepFreeze(tensors) });
  }

  getSplit(pipelineId: string, configHash: string, foldIndex: FoldContext, split: AnySplitName): SplitTensors {
    const key = SplitCache.splitKey(foldIndex, split);
    return this.read(this.pipelines.get(pipelineId)?.splits, pipelineId, key, configHash);
  }

  putFitted(pipelineId: string, configHash: string, fitted: FittedContext): void {
    this.entriesOf(pipelineId).fits.set(SplitCache.fitKey(fitted.foldIndex), { configHash, value: fitted });
  }

  getFitted(pipelineId: string, configHash: string, foldIndex: FoldContext): FittedContext {
    const key = SplitCache.fitKey(foldIndex);
    return this.read(this.pipelines.get(pipelineId)?.fits, pipelineId, key, configHash);
  }

  private read<T>(
    table: Map<string, CacheEntry<T>> | undefined,
    pipelineId: string,
    key: string,
    configHash: string
  ): T {
    const entry = table?.get(key);
    const fullKey = `${pipelineId}:${key}`;
    if (!entry) {
      this.stats.misses++;
      throw new CacheMissError(fullKey);
    }
    if (entry.configHash !== configHash) {
      this.stats.stale++;
      throw new StaleCacheError(fullKey, configHash, entry.configHash);
    }
    this.stats.hits++;
    return entry.value;
  }

  /**
   * Whether any entry exists for the pipeline, and whether it is current
   */
  status(pipelineId: string, configHash: string): 'absent' | 'current' | 'stale' {
    const splits = this.pipelines.get(pipelineId)?.splits;
    if (!splits || splits.size === 0) {
      return 'absent';
    }
    for (const entry of splits.values()) {
      if (entry.configHash !== configHash) {
        return 'stale';
      }
    }
    return 'current';
  }

  /**
   * Drop every entry of a pipeline, returns how many split entries went
   */
  evict(pipelineId: string): number {
    const evicted = this.pipelines.get(pipelineId)?.splits.size ?? 0;
    this.pipelines.delete(pipelineId);
    logger.debug('Evicted cached splits', { pipelineId, evicted });
    return evicted;
  }

  getStats(): SplitCacheStats {
    let entries = 0;
    for (const { splits } of this.pipelines.values()) {
      entries += splits.size;
    }
    return { ...this.stats, entries };
  }
}
