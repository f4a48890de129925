/**
 * Dataset and tensor types
 */

export type Dtype = 'float' | 'int' | 'string' | 'bool';

export const DTYPES: readonly Dtype[] = ['float', 'int', 'string', 'bool'];

/** A single cell. `null` is a missing value. */
export type Scalar = number | string | boolean | null;

export type Row = readonly Scalar[];

interface DatasetBase {
  readonly id: string;
  readonly columns: readonly string[];
  readonly dtypes: Readonly<Record<string, Dtype>>;
}

/** rows × columns */
export interface TabularDataset extends DatasetBase {
  readonly kind: 'tabular';
  readonly rows: readonly Row[];
}

/** samples × timesteps × columns */
export interface SequenceDataset extends DatasetBase {
  readonly kind: 'sequence';
  readonly sequences: readonly (readonly Row[])[];
}

export type Dataset = TabularDataset | SequenceDataset;

export type Vector = readonly number[];
export type Matrix = readonly Vector[];
export type Cube = readonly Matrix[];
export type Tensor = Matrix | Cube;

/** Per-sample shape, e.g. [columns] or [timesteps, columns] */
export type Shape = readonly number[];
