/**
 * @strata/lab - data preparation
 *
 * Datasets, stratified splits and folds, windowing, interpolation, encoders,
 * hyperparameter expansion and the pipeline that ties them together.
 */

export * from './dataset/Dataset.js';
export * from './dataset/selection.js';
export * from './stratification/types.js';
export * from './stratification/binning.js';
export * from './stratification/Stratifier.js';
export * from './windows/types.js';
export * from './windows/Windower.js';
export * from './features/column-filter.js';
export * from './features/fit-source.js';
export * from './features/encoders/index.js';
export * from './features/Encoderset.js';
export * from './features/interpolation.js';
export * from './optimization/types.js';
export * from './optimization/ParameterSpace.js';
export * from './pipeline/types.js';
export * from './pipeline/SplitCache.js';
export * from './pipeline/Pipeline.js';
export * from './pipeline/MaterializedPipeline.js';
