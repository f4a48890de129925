/**
 * Numeric scalers. Missing values are ignored while fitting and stay NaN.
 */

import type { Matrix, Row, Scalar } from '@strata/core';
import { quantile } from '../../stratification/binning.js';
import { BaseEncoder, column, finite, toNumber } from './base.js';

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Zero scale would divide by zero; such columns are left unscaled */
function safeScale(scale: number): number {
  return scale === 0 || !Number.isFinite(scale) ? 1 : scale;
}

abstract class AffineScaler extends BaseEncoder {
  protected offsets: number[] = [];
  protected scales: number[] = [];

  outputColumns(columns: readonly string[]): string[] {
    return [...columns];
  }

  protected transformRows(rows: readonly Row[]): number[][] {
    return rows.map((row) =>
      row.map((value, i) => (toNumber(value) - (this.offsets[i] ?? 0)) / (this.scales[i] ?? 1))
    );
  }

  protected inverseRows(encoded: Matrix): Scalar[][] {
    return encoded.map((row) => row.map((value, i) => value * (this.scales[i] ?? 1) + (this.offsets[i] ?? 0)));
  }
}

export interface StandardScalerOptions {
  withMean: boolean;
  withStd: boolean;
}

export class StandardScaler extends AffineScaler {
  readonly kind = 'standard_scaler';

  constructor(private readonly options: StandardScalerOptions = { withMean: true, withStd: true }) {
    super();
  }

  protected fitColumns(rows: readonly Row[], width: number): void {
    this.offsets = [];
    this.scales = [];
    for (let i = 0; i < width; i++) {
      const values = finite(column(rows, i).map(toNumber));
      const mu = mean(values);
      const variance = mean(values.map((value) => (value - mu) ** 2));
      this.offsets.push(this.options.withMean ? mu : 0);
      this.scales.push(this.options.withStd ? safeScale(Math.sqrt(variance)) : 1);
    }
  }

  getParams(): Readonly<Record<string, unknown>> {
    return { mean: [...this.offsets], scale: [...this.scales] };
  }
}

export interface MinMaxScalerOptions {
  featureRange: readonly [number, number];
}

export class MinMaxScaler extends BaseEncoder {
  readonly kind = 'min_max_scaler';
  private minimums: number[] = [];
  private ranges: number[] = [];

  constructor(private readonly options: MinMaxScalerOptions = { featureRange: [0, 1] }) {
    super();
  }

  outputColumns(columns: readonly string[]): string[] {
    return [...columns];
  }

  protected fitColumns(rows: readonly Row[], width: number): void {
    this.minimums = [];
    this.ranges = [];
    for (let i = 0; i < width; i++) {
      const values = finite(column(rows, i).map(toNumber));
      const min = values.length ? Math.min(...values) : 0;
      const max = values.length ? Math.max(...values) : 0;
      this.minimums.push(min);
      this.ranges.push(safeScale(max - min));
    }
  }

  protected transformRows(rows: readonly Row[]): number[][] {
    const [low, high] = this.options.featureRange;
    return rows.map((row) =>
      row.map((value, i) => ((toNumber(value) - (this.minimums[i] ?? 0)) / (this.ranges[i] ?? 1)) * (high - low) + low)
    );
  }

  protected inverseRows(encoded: Matrix): Scalar[][] {
    const [low, high] = this.options.featureRange;
    return encoded.map((row) =>
      row.map((value, i) => ((value - low) / (high - low)) * (this.ranges[i] ?? 1) + (this.minimums[i] ?? 0))
    );
  }

  getParams(): Readonly<Record<string, unknown>> {
    return { min: [...this.minimums], range: [...this.ranges], featureRange: [...this.options.featureRange] };
  }
}

/**
 * Centers on the median and scales by the interquartile range
 */
export class RobustScaler extends AffineScaler {
  readonly kind = 'robust_scaler';

  protected fitColumns(rows: readonly Row[], width: number): void {
    this.offsets = [];
    this.scales = [];
    for (let i = 0; i < width; i++) {
      const sorted = finite(column(rows, i).map(toNumber)).sort((a, b) => a - b);
      const median = sorted.length ? quantile(sorted, 0.5) : 0;
      const iqr = sorted.length ? quantile(sorted, 0.75) - quantile(sorted, 0.25) : 1;
      this.offsets.push(median);
      this.scales.push(safeScale(iqr));
    }
  }

  getParams(): Readonly<Record<string, unknown>> {
    return { center: [...this.offsets], scale: [...this.scales] };
  }
}
