/**
 * Zone Relay
 *
 * Three-zone drone waste-processing simulation core.
 */

export * from './core/index.js';
export * from './world/grid.js';
export * from './world/waste-registry.js';
export * from './world/knowledge-store.js';
export * from './drones/index.js';
export * from './strategies/index.js';
export * from './simulation/index.js';
