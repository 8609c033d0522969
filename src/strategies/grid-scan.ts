/**
 * Grid Scan
 *
 * Boustrophedon sweep of the drone's own zone: east along a row, one row
 * down, west along the next. After the last row the sweep starts over at
 * the zone's north-west cell. A blocked step falls back to a random free
 * neighbour and the scan target is kept.
 */

import { samePosition, type Position } from '../core/types.js';
import type { ZoneBounds } from '../drones/types.js';
import type { ExplorationStrategy, ExploreContext } from './types.js';

type SweepDirection = 'east' | 'west';

export class GridScan implements ExplorationStrategy {
  readonly name = 'grid-scan' as const;

  private target: Position | null = null;
  private direction: SweepDirection = 'east';

  next(ctx: ExploreContext): Position | null {
    const { bounds } = ctx;
    let target = this.target ?? { x: bounds.minX, y: bounds.minY };
    // Twice at most: a restart can land on the drone's own cell
    for (let i = 0; i < 2 && samePosition(target, ctx.position); i++) {
      target = this.advance(ctx.position, bounds);
    }
    this.target = target;

    const toward = this.stepsToward(ctx.position, target);
    const step = toward.find((p) => ctx.options.some((o) => samePosition(o, p)));
    return step ?? ctx.rng.pick(ctx.options) ?? null;
  }

  private advance(from: Position, bounds: ZoneBounds): Position {
    let { x, y } = from;
    if (this.direction === 'east') {
      if (x < bounds.maxX) {
        x++;
      } else {
        y++;
        this.direction = 'west';
      }
    } else if (x > bounds.minX) {
      x--;
    } else {
      y++;
      this.direction = 'east';
    }

    if (y > bounds.maxY) {
      this.direction = 'east';
      return { x: bounds.minX, y: bounds.minY };
    }
    return { x, y };
  }

  /** Useful single steps, horizontal before vertical */
  private stepsToward(from: Position, target: Position): Position[] {
    const steps: Position[] = [];
    if (target.x > from.x) steps.push({ x: from.x + 1, y: from.y });
    if (target.x < from.x) steps.push({ x: from.x - 1, y: from.y });
    if (target.y > from.y) steps.push({ x: from.x, y: from.y + 1 });
    if (target.y < from.y) steps.push({ x: from.x, y: from.y - 1 });
    return steps;
  }
}
