/**
 * Metrics evaluator
 *
 * Per-split scores for each analysis type plus the across-split summary
 * stored on every predictor.
 */

import {
  argmax,
  type AnalysisType,
  type LossFn,
  type Matrix,
  type MetricSummary,
  type MetricsAggregate,
  type MetricsBySplit,
  type Prediction,
  type Vector,
} from '@strata/core';

export interface EvaluationInput {
  readonly analysisType: AnalysisType;
  readonly split: string;
  readonly labels: Matrix;
  readonly prediction: Prediction;
  readonly loser: LossFn;
}

export type Evaluator = (input: EvaluationInput) => Record<string, number>;

function classOf(row: Vector): number {
  return row.length === 1 ? Math.round(row[0] ?? 0) : argmax(row);
}

function accuracy(labels: Matrix, predictions: Matrix): number {
  if (labels.length === 0) {
    return 0;
  }
  const correct = labels.filter((row, i) => classOf(row) === classOf(predictions[i] ?? [])).length;
  return correct / labels.length;
}

function binaryScores(labels: Matrix, predictions: Matrix): Record<string, number> {
  let tp = 0;
  let fp = 0;
  let fn = 0;
  labels.forEach((row, i) => {
    const actual = classOf(row);
    const predicted = classOf(predictions[i] ?? []);
    if (predicted === 1 && actual === 1) tp++;
    else if (predicted === 1) fp++;
    else if (actual === 1) fn++;
  });
  const precision = tp + fp === 0 ? 0 : tp / (tp + fp);
  const recall = tp + fn === 0 ? 0 : tp / (tp + fn);
  const f1 = precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);
  return { accuracy: accuracy(labels, predictions), precision, recall, f1 };
}

function regressionScores(labels: Matrix, predictions: Matrix): Record<string, number> {
  const actual = labels.flat();
  const predicted = predictions.flat();
  if (actual.length === 0) {
    return { mae: 0, mse: 0, r2: 0 };
  }
  const residuals = actual.map((y, i) => y - (predicted[i] ?? 0));
  const mae = residuals.reduce((sum, r) => sum + Math.abs(r), 0) / actual.length;
  const ssRes = residuals.reduce((sum, r) => sum + r * r, 0);
  const mean = actual.reduce((sum, y) => sum + y, 0) / actual.length;
  const ssTot = actual.reduce((sum, y) => sum + (y - mean) ** 2, 0);
  // constant labels: perfect fit scores 1, anything else 0
  const r2 = ssTot === 0 ? (ssRes === 0 ? 1 : 0) : 1 - ssRes / ssTot;
  return { mae, mse: ssRes / actual.length, r2 };
}

/**
 * Default evaluator. Classification losses score the probabilities when the
 * prediction carries them.
 */
export const evaluateSplit: Evaluator = ({ analysisType, labels, prediction, loser }): Record<string, number> => {
  const { predictions, probabilities } = prediction;
  switch (analysisType) {
    case 'classification_binary':
      return { ...binaryScores(labels, predictions), loss: loser(labels, probabilities ?? predictions) };
    case 'classification_multi':
      return { accuracy: accuracy(labels, predictions), loss: loser(labels, probabilities ?? predictions) };
    case 'regression':
      return { ...regressionScores(labels, predictions), loss: loser(labels, predictions) };
  }
};

export function roundMetric(value: number): number {
  return Number.isFinite(value) ? Math.round(value * 1000) / 1000 : value;
}

/**
 * Round to 3 decimals and order keys by metric name
 */
export function roundMetrics(metrics: Readonly<Record<string, number>>): Record<string, number> {
  const rounded: Record<string, number> = {};
  for (const name of Object.keys(metrics).sort()) {
    rounded[name] = roundMetric(metrics[name] ?? Number.NaN);
  }
  return rounded;
}

export function summarize(values: readonly number[]): MetricSummary {
  if (values.length === 0) {
    return { mean: Number.NaN, median: Number.NaN, pstdev: Number.NaN, minimum: Number.NaN, maximum: Number.NaN };
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const middle = Math.floor(sorted.length / 2);
  const median =
    sorted.length % 2 === 1 ? sorted[middle] ?? Number.NaN : ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return {
    mean,
    median,
    pstdev: Math.sqrt(variance),
    minimum: sorted[0] ?? Number.NaN,
    maximum: sorted[sorted.length - 1] ?? Number.NaN,
  };
}

/**
 * Summary of each metric across the splits that report it
 */
export function aggregateMetrics(metrics: MetricsBySplit): MetricsAggregate {
  const values = new Map<string, number[]>();
  for (const splitMetrics of Object.values(metrics)) {
    for (const [name, value] of Object.entries(splitMetrics)) {
      const list = values.get(name) ?? [];
      list.push(value);
      values.set(name, list);
    }
  }

  const aggregate: Record<string, MetricSummary> = {};
  for (const name of [...values.keys()].sort()) {
    aggregate[name] = summarize(values.get(name) ?? []);
  }
  return aggregate;
}
