/**
 * Zone Relay - Core Module
 */

export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './logger.js';
export * from './rng.js';
