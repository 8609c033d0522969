/**
 * Spiral Search
 *
 * Walks an outward square spiral: east, north, west, south, with the arm
 * growing by one every two turns. When the next spiral cell is not free
 * the drone takes a random free neighbour and the spiral carries on.
 */

import { DIRECTION_ORDER, offset } from '../world/grid.js';
import { samePosition, type Position } from '../core/types.js';
import type { ExplorationStrategy, ExploreContext } from './types.js';

export class SpiralSearch implements ExplorationStrategy {
  readonly name = 'spiral-search' as const;

  private directionIndex = 0;
  private segmentLength = 1;
  private stepsTaken = 0;
  private turnsInLap = 0;

  next(ctx: ExploreContext): Position | null {
    const direction = DIRECTION_ORDER[this.directionIndex] ?? 'east';
    const desired = offset(ctx.position, direction);
    this.advance();

    if (ctx.options.some((p) => samePosition(p, desired))) {
      return desired;
    }
    return ctx.rng.pick(ctx.options) ?? null;
  }

  private advance(): void {
    this.stepsTaken++;
    if (this.stepsTaken < this.segmentLength) return;

    this.stepsTaken = 0;
    this.directionIndex = (this.directionIndex + 1) % DIRECTION_ORDER.length;
    this.turnsInLap++;
    if (this.turnsInLap >= 2) {
      this.turnsInLap = 0;
      this.segmentLength++;
    }
  }
}
