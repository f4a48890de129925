export * from './dataset.js';
export * from './splits.js';
export * from './jobs.js';
