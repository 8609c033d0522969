/**
 * Random Walk
 *
 * Uniform choice among the free neighbours.
 */

import type { Position } from '../core/types.js';
import type { ExplorationStrategy, ExploreContext } from './types.js';

export class RandomWalk implements ExplorationStrategy {
  readonly name = 'random-walk' as const;

  next(ctx: ExploreContext): Position | null {
    return ctx.rng.pick(ctx.options) ?? null;
  }
}
