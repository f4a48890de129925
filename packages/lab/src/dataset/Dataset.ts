/**
 * Dataset builders
 *
 * Datasets are immutable and referenced by id. Builders validate cell values
 * against the declared dtypes and infer dtypes that were not declared.
 */

import type { Dataset, Dtype, Row, Scalar, SequenceDataset, TabularDataset } from '@strata/core';
import { ConfigurationError } from '@strata/utils';

export interface TabularInit {
  id: string;
  columns: readonly string[];
  rows: readonly Row[];
  dtypes?: Readonly<Partial<Record<string, Dtype>>>;
}

export interface SequenceInit {
  id: string;
  columns: readonly string[];
  sequences: readonly (readonly Row[])[];
  dtypes?: Readonly<Partial<Record<string, Dtype>>>;
}

/**
 * Infer a dtype from the non-missing values of a column
 */
export function inferDtype(values: readonly Scalar[]): Dtype {
  const present = values.filter((value): value is number | string | boolean => value !== null);
  if (present.length === 0) {
    return 'float';
  }
  if (present.every((value) => typeof value === 'boolean')) {
    return 'bool';
  }
  if (present.every((value) => typeof value === 'number')) {
    return present.every((value) => Number.isInteger(value)) ? 'int' : 'float';
  }
  return 'string';
}

function matchesDtype(value: Scalar, dtype: Dtype): boolean {
  if (value === null) {
    return true;
  }
  switch (dtype) {
    case 'float':
      return typeof value === 'number';
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'string':
      return typeof value === 'string';
    case 'bool':
      return typeof value === 'boolean';
  }
}

function resolveDtypes(
  datasetId: string,
  columns: readonly string[],
  rows: readonly Row[],
  declared: Readonly<Partial<Record<string, Dtype>>> = {}
): Record<string, Dtype> {
  if (new Set(columns).size !== columns.length) {
    throw new ConfigurationError(`Dataset '${datasetId}' has duplicate column names`, 'columns', {
      datasetId,
    });
  }
  for (const name of Object.keys(declared)) {
    if (!columns.includes(name)) {
      throw new ConfigurationError(`Dataset '${datasetId}' declares a dtype for unknown column '${name}'`, 'dtypes', {
        datasetId,
      });
    }
  }

  rows.forEach((row, rowIndex) => {
    if (row.length !== columns.length) {
      throw new ConfigurationError(
        `Dataset '${datasetId}' row ${rowIndex} has ${row.length} values, expected ${columns.length}`,
        'rows',
        { datasetId }
      );
    }
  });

  const dtypes: Record<string, Dtype> = {};
  columns.forEach((column, columnIndex) => {
    const values = rows.map((row) => row[columnIndex] ?? null);
    const dtype = declared[column] ?? inferDtype(values);
    const offending = values.find((value) => !matchesDtype(value, dtype));
    if (offending !== undefined) {
      throw new ConfigurationError(
        `Dataset '${datasetId}' column '${column}' is ${dtype} but holds ${JSON.stringify(offending)}`,
        'dtypes',
        { datasetId, column }
      );
    }
    dtypes[column] = dtype;
  });
  return dtypes;
}

export function tabular(init: TabularInit): TabularDataset {
  const dtypes = resolveDtypes(init.id, init.columns, init.rows, init.dtypes);
  return {
    kind: 'tabular',
    id: init.id,
    columns: [...init.columns],
    dtypes,
    rows: init.rows.map((row) => [...row]),
  };
}

/**
 * Tabular dataset from row objects; columns follow the first record's key order
 */
export function fromRecords(
  id: string,
  records: ReadonlyArray<Readonly<Record<string, Scalar>>>,
  dtypes?: Readonly<Partial<Record<string, Dtype>>>
): TabularDataset {
  const first = records[0];
  if (!first) {
    throw new ConfigurationError(`Dataset '${id}' has no records`, 'rows', { datasetId: id });
  }
  const columns = Object.keys(first);
  const rows = records.map((record) => columns.map((column) => record[column] ?? null));
  return tabular({ id, columns, rows, dtypes });
}

export function sequence(init: SequenceInit): SequenceDataset {
  const timesteps = init.sequences[0]?.length ?? 0;
  init.sequences.forEach((seq, index) => {
    if (seq.length !== timesteps) {
      throw new ConfigurationError(
        `Dataset '${init.id}' sequence ${index} has ${seq.length} timesteps, expected ${timesteps}`,
        'sequences',
        { datasetId: init.id }
      );
    }
  });
  const dtypes = resolveDtypes(init.id, init.columns, init.sequences.flat(), init.dtypes);
  return {
    kind: 'sequence',
    id: init.id,
    columns: [...init.columns],
    dtypes,
    sequences: init.sequences.map((seq) => seq.map((row) => [...row])),
  };
}

export function sampleCount(dataset: Dataset): number {
  return dataset.kind === 'tabular' ? dataset.rows.length : dataset.sequences.length;
}

export function columnIndex(dataset: Dataset, column: string): number {
  const index = dataset.columns.indexOf(column);
  if (index === -1) {
    throw new ConfigurationError(`Column '${column}' does not exist in dataset '${dataset.id}'`, 'columns', {
      datasetId: dataset.id,
      column,
    });
  }
  return index;
}

/**
 * Rows restricted to the given columns, in the given column order.
 * Sequence datasets are stacked: sample-major, then timestep.
 */
export function projectRows(dataset: Dataset, columns: readonly string[]): Row[] {
  const indices = columns.map((column) => columnIndex(dataset, column));
  const rows = dataset.kind === 'tabular' ? dataset.rows : dataset.sequences.flat();
  return rows.map((row) => indices.map((index) => row[index] ?? null));
}

export function dtypesOf(dataset: Dataset, columns: readonly string[]): Dtype[] {
  return columns.map((column) => {
    const dtype = dataset.dtypes[column];
    if (dtype === undefined) {
      throw new ConfigurationError(`Column '${column}' does not exist in dataset '${dataset.id}'`, 'columns', {
        datasetId: dataset.id,
        column,
      });
    }
    return dtype;
  });
}

export function timestepsOf(dataset: SequenceDataset): number {
  return dataset.sequences[0]?.length ?? 0;
}
