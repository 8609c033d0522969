export * from './types.js';
export * from './validator.js';
export * from './metrics.js';
export * from './scheduler.js';
export * from './options.js';
