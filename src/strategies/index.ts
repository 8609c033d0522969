/**
 * Exploration Strategies
 */

import type { ExplorationStrategyName } from '../core/types.js';
import { MemoryWalk } from './memory-walk.js';
import { RandomWalk } from './random-walk.js';
import { GridScan } from './grid-scan.js';
import { SpiralSearch } from './spiral-search.js';
import type { ExplorationStrategy } from './types.js';

export type { ExplorationStrategy, ExploreContext } from './types.js';
export { RandomWalk } from './random-walk.js';
export { MemoryWalk } from './memory-walk.js';
export { SpiralSearch } from './spiral-search.js';
export { GridScan } from './grid-scan.js';

const STRATEGY_FACTORIES: Record<ExplorationStrategyName, () => ExplorationStrategy> = {
  'random-walk': () => new RandomWalk(),
  'memory-walk': () => new MemoryWalk(),
  'spiral-search': () => new SpiralSearch(),
  'grid-scan': () => new GridScan(),
};

/** Strategies keep per-drone state, so every drone gets a fresh instance */
export function createStrategy(name: ExplorationStrategyName): ExplorationStrategy {
  return STRATEGY_FACTORIES[name]();
}
