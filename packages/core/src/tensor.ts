/**
 * Tensor helpers
 */

import type { Cube, Matrix, Shape, Tensor, Vector } from './types/dataset.js';

export function isCube(tensor: Tensor): tensor is Cube {
  const first = tensor[0];
  return first !== undefined && Array.isArray(first[0]);
}

export function isMatrix(tensor: Tensor): tensor is Matrix {
  return !isCube(tensor);
}

/**
 * Rows (samples) at the given indices, in index order
 */
export function takeSamples<T>(items: readonly T[], indices: readonly number[]): T[] {
  return indices.map((index) => {
    const item = items[index];
    if (item === undefined) {
      throw new RangeError(`Sample index ${index} out of range (length ${items.length})`);
    }
    return item;
  });
}

export function takeTensor(tensor: Tensor, indices: readonly number[]): Tensor {
  return isCube(tensor) ? takeSamples(tensor, indices) : takeSamples(tensor, indices);
}

/**
 * Collapse a cube to a matrix by stacking its rows
 */
export function flattenToMatrix(tensor: Tensor): Matrix {
  if (isCube(tensor)) {
    return tensor.flatMap((matrix) => matrix);
  }
  return tensor;
}

/**
 * Shape of the full tensor, e.g. [samples, columns]
 */
export function shapeOf(tensor: Tensor): number[] {
  if (isCube(tensor)) {
    const first = tensor[0];
    return [tensor.length, first ? first.length : 0, first?.[0]?.length ?? 0];
  }
  return [tensor.length, tensor[0]?.length ?? 0];
}

/**
 * Per-sample shape (drops the leading sample axis)
 */
export function sampleShape(tensor: Tensor): Shape {
  return shapeOf(tensor).slice(1);
}

export function argmax(values: Vector): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}

/**
 * Recursively freeze arrays and plain objects so cached values cannot be mutated
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}
