export * from './types/index.js';
export * from './ports/index.js';
export * from './determinism.js';
export * from './parameter-hash.js';
export * from './tensor.js';
