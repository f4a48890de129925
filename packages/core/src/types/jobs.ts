/**
 * Hyperparameters, jobs and predictors
 */

import type { ErrorRecord } from '@strata/utils';
import type { Shape } from './dataset.js';

export type AnalysisType = 'classification_binary' | 'classification_multi' | 'regression';

export type HyperparameterValue =
  | string
  | number
  | boolean
  | null
  | readonly HyperparameterValue[];

export type Hyperparameters = Readonly<Record<string, HyperparameterValue>>;

/** Parameter name → candidate values */
export type HyperparameterSpace = Readonly<Record<string, readonly HyperparameterValue[]>>;

export interface Hyperparamcombo {
  /** sha256 of the key-sorted assignments */
  readonly comboId: string;
  /** Position in the full grid */
  readonly index: number;
  readonly hyperparameters: Hyperparameters;
}

export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export type MetricsBySplit = Readonly<Record<string, Readonly<Record<string, number>>>>;

export interface MetricSummary {
  readonly mean: number;
  readonly median: number;
  readonly pstdev: number;
  readonly minimum: number;
  readonly maximum: number;
}

export type MetricsAggregate = Readonly<Record<string, MetricSummary>>;

/** Metric name → one value per epoch */
export type TrainingHistory = Readonly<Record<string, readonly number[]>>;

export interface InputShapes {
  /** Per-sample shape of each feature input, in input order */
  readonly featuresShape: readonly Shape[];
  /** Per-sample label shape; null when there is no label */
  readonly labelShape: Shape | null;
}

// ============================================================================
// Arena records
// ============================================================================

export interface PipelineRecord {
  readonly id: number;
  readonly pipelineId: string;
  readonly configHash: string;
  readonly sampleCount: number;
  readonly foldCount: number | null;
  readonly registeredAt: string;
}

export interface QueueRecord {
  readonly id: number;
  readonly pipelineId: string;
  readonly analysisType: AnalysisType;
  readonly comboCount: number;
  readonly foldCount: number | null;
  readonly repeatCount: number;
  readonly hideTest: boolean;
  readonly runCount: number;
  readonly createdAt: string;
}

export interface JobRecord {
  readonly id: number;
  readonly queueId: number;
  /** combo:<id>|fold:<i|none>|repeat:<r> */
  readonly key: string;
  readonly position: number;
  readonly comboId: string;
  readonly comboIndex: number;
  readonly hyperparameters: Hyperparameters;
  readonly foldIndex: number | null;
  readonly repeatIndex: number;
  readonly status: JobStatus;
  readonly error: ErrorRecord | null;
  readonly predictorId: number | null;
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
}

export interface PredictorRecord {
  readonly id: number;
  readonly jobId: number;
  readonly history: TrainingHistory;
  readonly metrics: MetricsBySplit;
  readonly metricsAggregate: MetricsAggregate;
  readonly inputShapes: InputShapes;
  readonly timeStarted: string;
  readonly timeSucceeded: string;
  readonly durationSeconds: number;
}
