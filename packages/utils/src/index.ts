export * from './logger.js';
export * from './errors.js';
export * from './error-handler.js';
export * from './config/index.js';
export { createPackageLogger, getPackageLoggers } from './logging/index.js';
