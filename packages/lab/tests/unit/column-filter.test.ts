import { describe, it, expect } from 'vitest';
import type { Dtype } from '@strata/core';
import { FilterError } from '@strata/utils';
import { ColumnFilterSchema, resolveFilter, type ColumnFilterInput } from '../../src/features/column-filter.js';

const columns = ['age', 'height', 'city', 'member'];
const dtypes: Record<string, Dtype> = { age: 'int', height: 'float', city: 'string', member: 'bool' };

function resolve(filter: ColumnFilterInput, available: readonly string[] = columns) {
  return resolveFilter(available, dtypes, ColumnFilterSchema.parse(filter), 'encoders[0]');
}

describe('resolveFilter', () => {
  it('should match by dtype', () => {
    expect(resolve({ dtypes: ['float', 'int'] })).toEqual({
      matched: ['age', 'height'],
      remaining: ['city', 'member'],
    });
  });

  it('should match by name', () => {
    expect(resolve({ columns: ['city'] })).toEqual({
      matched: ['city'],
      remaining: ['age', 'height', 'member'],
    });
  });

  it('should match by dtype and name together', () => {
    expect(resolve({ dtypes: ['bool'], columns: ['age'] }).matched).toEqual(['age', 'member']);
  });

  it('should invert the match for exclusions', () => {
    expect(resolve({ include: false, dtypes: ['string'] }).matched).toEqual(['age', 'height', 'member']);
  });

  it('should take every available column without criteria', () => {
    expect(resolve({}, ['height', 'member'])).toEqual({ matched: ['height', 'member'], remaining: [] });
  });

  it.each([
    ['a dtype no column has', { dtypes: ['float' as const] }, ['age', 'city']],
    ['a column that is not available', { columns: ['weight'] }, columns],
    ['a column matched by dtype and by name', { dtypes: ['int' as const], columns: ['age'] }, columns],
    ['an exclusion without criteria', { include: false }, columns],
    ['an exclusion of every column', { include: false, dtypes: ['int' as const] }, ['age']],
  ])('should reject %s', (_, filter, available) => {
    expect(() => resolve(filter, available)).toThrow(FilterError);
  });
});
