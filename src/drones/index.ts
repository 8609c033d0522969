export * from './types.js';
export * from './percept.js';
export * from './deliberation.js';
export * from './drone.js';
