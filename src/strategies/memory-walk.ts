/**
 * Memory Walk
 *
 * Random walk biased toward the least visited neighbours,
 * so a drone spreads over its zone instead of circling.
 */

import { positionKey, type Position } from '../core/types.js';
import type { ExplorationStrategy, ExploreContext } from './types.js';

export class MemoryWalk implements ExplorationStrategy {
  readonly name = 'memory-walk' as const;

  next(ctx: ExploreContext): Position | null {
    if (ctx.options.length === 0) return null;
    const visits = (p: Position) => ctx.visited.get(positionKey(p)) ?? 0;
    const fewest = Math.min(...ctx.options.map(visits));
    return ctx.rng.pick(ctx.options.filter((p) => visits(p) === fewest)) ?? null;
  }
}
