/**
 * Exploration Strategy Types
 */

import type { SeededRNG } from '../core/rng.js';
import type { ExplorationStrategyName, Position } from '../core/types.js';
import type { ZoneBounds } from '../drones/types.js';

export interface ExploreContext {
  position: Position;
  /** Free reachable neighbours, east/north/west/south */
  options: Position[];
  /** Visit counts keyed by positionKey */
  visited: ReadonlyMap<string, number>;
  /** Sweep area of the drone's own zone */
  bounds: ZoneBounds;
  rng: SeededRNG;
}

export interface ExplorationStrategy {
  readonly name: ExplorationStrategyName;
  next(ctx: ExploreContext): Position | null;
}
