import { describe, it, expect } from 'vitest';
import type { Algorithm } from '@strata/core';
import { Pipeline, tabular } from '@strata/lab';
import { createInMemoryArena } from '@strata/storage';
import { ConfigurationError } from '@strata/utils';
import { Queue, jobKey } from '../../src/Queue.js';

const N = 20;
const range = (n: number) => Array.from({ length: n }, (_, i) => i);

const features = tabular({ id: 'features', columns: ['x', 'noise'], rows: range(N).map((i) => [i, i % 3]) });
const labels = tabular({ id: 'labels', columns: ['y'], rows: range(N).map((i) => [i < 8 ? 1 : 0]) });

const materialized = Pipeline.build({
  inputs: [{ dataset: features }],
  target: { dataset: labels, column: 'y' },
  stratifier: { sizeTest: 0.25, foldCount: 3, seed: 4 },
}).materialize();

const algorithm: Algorithm<{ id: string }> = {
  analysisType: 'classification_binary',
  build: () => ({ id: 'model' }),
  train: ({ model }) => ({ model }),
};

describe('Queue', () => {
  describe('enumeration', () => {
    it('should order jobs by combo, then fold, then repeat', () => {
      const queue = new Queue({ materialized, algorithm, hyperparameters: { a: [1, 2] }, repeatCount: 2 });
      const specs = queue.enumerate();

      expect(specs).toHaveLength(12);
      expect(specs.slice(0, 3).map((spec) => [spec.combo.index, spec.foldIndex, spec.repeatIndex])).toEqual([
        [0, 0, 0],
        [0, 0, 1],
        [0, 1, 0],
      ]);
      expect([specs[6]?.combo.index, specs[6]?.foldIndex, specs[6]?.repeatIndex]).toEqual([1, 0, 0]);
      expect(specs.map((spec) => spec.position)).toEqual(range(12));
    });

    it('should build keys from the combo id, fold and repeat', () => {
      const queue = new Queue({ materialized, algorithm, hyperparameters: { a: [1] }, useFolds: false });
      const [spec] = queue.enumerate();

      expect(spec?.key).toBe(`combo:${spec?.combo.comboId.slice(0, 12)}|fold:none|repeat:0`);
      expect(jobKey('abcdefabcdefabcdef', 2, 1)).toBe('combo:abcdefabcdef|fold:2|repeat:1');
    });

    it('should enumerate the same jobs every time', () => {
      const options = {
        materialized,
        algorithm,
        hyperparameters: { a: [1, 2, 3], b: ['x', 'y'] },
        expansion: { searchCount: 4, seed: 9 },
        repeatCount: 2,
      };
      const first = new Queue(options).enumerate().map((spec) => spec.key);
      const second = new Queue(options).enumerate().map((spec) => spec.key);

      expect(second).toEqual(first);
      expect(new Set(first).size).toBe(first.length);
    });

    it('should record one pending job per enumerated spec', () => {
      const store = createInMemoryArena();
      const queue = new Queue({ materialized, algorithm, hyperparameters: { a: [1, 2] }, useFolds: false, store });

      expect(store.jobsOfQueue(queue.id).map((job) => [job.key, job.status])).toEqual(
        queue.enumerate().map((spec) => [spec.key, 'pending'])
      );
      expect(queue.record).toMatchObject({ comboCount: 2, foldCount: null, repeatCount: 1, runCount: 0 });
      expect(store.pipelines.all()).toHaveLength(1);
    });

    it('should register a pipeline once per store', () => {
      const store = createInMemoryArena();
      new Queue({ materialized, algorithm, store });
      new Queue({ materialized, algorithm, store, useFolds: false });

      expect(store.pipelines.count()).toBe(1);
      expect(store.queues.count()).toBe(2);
    });

    it('should run a single empty combo without a space', () => {
      const queue = new Queue({ materialized, algorithm, useFolds: false });

      expect(queue.enumerate().map((spec) => spec.combo.hyperparameters)).toEqual([{}]);
    });

    it('should default to folds when the pipeline has them', () => {
      expect(new Queue({ materialized, algorithm }).useFolds).toBe(true);
    });
  });

  describe('configuration errors', () => {
    it('should reject folds on a pipeline without them', () => {
      const plain = Pipeline.build({
        inputs: [{ dataset: features }],
        target: { dataset: labels, column: 'y' },
        stratifier: { sizeTest: 0.25, seed: 4 },
      }).materialize();

      expect(() => new Queue({ materialized: plain, algorithm, useFolds: true })).toThrow(ConfigurationError);
    });

    it.each([
      ['concurrency', { concurrency: 0 }],
      ['repeatCount', { repeatCount: 1.5 }],
    ])('should reject an invalid %s', (_name, settings) => {
      expect(() => new Queue({ materialized, algorithm, ...settings })).toThrow(/Invalid queue options/);
    });

    it('should reject a pipeline without a label', () => {
      const unlabeled = Pipeline.build({ inputs: [{ dataset: features }] }).materialize();

      expect(() => new Queue({ materialized: unlabeled, algorithm })).toThrow(/has no label/);
    });
  });
});
