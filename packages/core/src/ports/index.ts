export * from './entity-repository-port.js';
export * from './clockPort.js';
export * from './training-port.js';
