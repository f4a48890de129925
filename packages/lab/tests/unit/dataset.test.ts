import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@strata/utils';
import { fromRecords, inferDtype, projectRows, sampleCount, sequence, tabular } from '../../src/dataset/Dataset.js';
import { selectFeatureColumns, selectLabelColumns } from '../../src/dataset/selection.js';

const people = tabular({
  id: 'people',
  columns: ['age', 'height', 'city', 'member'],
  rows: [
    [31, 1.8, 'oslo', true],
    [45, null, 'rome', false],
  ],
});

describe('Dataset builders', () => {
  it('should infer dtypes from values', () => {
    expect(people.dtypes).toEqual({ age: 'int', height: 'float', city: 'string', member: 'bool' });
    expect(inferDtype([null, null])).toBe('float');
    expect(inferDtype([1, 2.5])).toBe('float');
  });

  it('should honour declared dtypes', () => {
    const dataset = tabular({ id: 'd', columns: ['x'], rows: [[1], [2]], dtypes: { x: 'float' } });

    expect(dataset.dtypes.x).toBe('float');
  });

  it('should reject values that do not match a declared dtype', () => {
    expect(() => tabular({ id: 'd', columns: ['x'], rows: [[1.5]], dtypes: { x: 'int' } })).toThrow(
      "Dataset 'd' column 'x' is int but holds 1.5"
    );
  });

  it.each([
    ['duplicate columns', { id: 'd', columns: ['x', 'x'], rows: [] }],
    ['ragged rows', { id: 'd', columns: ['x', 'y'], rows: [[1]] }],
    ['a dtype for an unknown column', { id: 'd', columns: ['x'], rows: [[1]], dtypes: { y: 'int' as const } }],
  ])('should reject %s', (_, init) => {
    expect(() => tabular(init)).toThrow(ConfigurationError);
  });

  it('should build from records in key order', () => {
    const dataset = fromRecords('r', [
      { b: 1, a: 'x' },
      { b: 2, a: 'y' },
    ]);

    expect(dataset.columns).toEqual(['b', 'a']);
    expect(dataset.rows).toEqual([
      [1, 'x'],
      [2, 'y'],
    ]);
  });

  it('should require equal sequence lengths', () => {
    expect(() =>
      sequence({ id: 's', columns: ['x'], sequences: [[[1], [2]], [[3]]] })
    ).toThrow(/sequence 1 has 1 timesteps, expected 2/);
  });

  it('should stack sequences when projecting rows', () => {
    const dataset = sequence({
      id: 's',
      columns: ['x', 'y'],
      sequences: [
        [
          [1, 10],
          [2, 20],
        ],
        [
          [3, 30],
          [4, 40],
        ],
      ],
    });

    expect(sampleCount(dataset)).toBe(2);
    expect(projectRows(dataset, ['y'])).toEqual([[10], [20], [30], [40]]);
  });
});

describe('column selection', () => {
  it('should keep dataset order for included columns', () => {
    expect(selectFeatureColumns(people, { includeColumns: ['city', 'age'] }, 'inputs[0]')).toEqual(['age', 'city']);
  });

  it('should drop excluded and reserved columns', () => {
    expect(selectFeatureColumns(people, { excludeColumns: ['city'] }, 'inputs[0]', ['member'])).toEqual([
      'age',
      'height',
    ]);
  });

  it.each([
    ['include and exclude together', { includeColumns: ['age'], excludeColumns: ['city'] }],
    ['unknown columns', { includeColumns: ['weight'] }],
    ['excluding every column', { excludeColumns: ['age', 'height', 'city', 'member'] }],
  ])('should reject %s', (_, selection) => {
    expect(() => selectFeatureColumns(people, selection, 'inputs[0]')).toThrow(ConfigurationError);
  });

  it('should refuse label columns as features', () => {
    expect(() => selectFeatureColumns(people, { includeColumns: ['member'] }, 'inputs[0]', ['member'])).toThrow(
      /cannot also be features/
    );
  });

  it('should normalize label columns', () => {
    expect(selectLabelColumns(people, 'member', 'target.column')).toEqual(['member']);
    expect(() => selectLabelColumns(people, ['age', 'age'], 'target.column')).toThrow(ConfigurationError);
    expect(() => selectLabelColumns(people, 'weight', 'target.column')).toThrow(ConfigurationError);
  });
});
