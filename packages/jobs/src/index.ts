export * from './algorithm.js';
export * from './metrics.js';
export * from './JobRunner.js';
export * from './Queue.js';
export * from './inference.js';
