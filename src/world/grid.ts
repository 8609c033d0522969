/**
 * Grid
 *
 * Cell occupancy and resting waste. No behavior beyond checked queries and
 * mutations; zone classification is a pure function of the column.
 */

import { BoundsError, InvariantViolation, OccupancyError, RegistryError } from '../core/errors.js';
import {
  positionKey,
  samePosition,
  type DroneId,
  type Position,
  type WasteId,
  type ZoneType,
} from '../core/types.js';

export interface GridOptions {
  width: number;
  height: number;
  /** Resting waste items allowed per cell (default 1) */
  maxWastePerCell?: number;
}

export interface CellView {
  position: Position;
  zone: ZoneType;
  droneId: DroneId | null;
  wasteIds: WasteId[];
}

export interface GridSnapshot {
  width: number;
  height: number;
  maxWastePerCell: number;
  transferColumns: [number, number];
  dropColumn: number;
  /** Row-major, y then x */
  cells: CellView[];
}

/** 4-connected moves, in the order neighbors() reports them */
export const DIRECTIONS = {
  east: { x: 1, y: 0 },
  north: { x: 0, y: -1 },
  west: { x: -1, y: 0 },
  south: { x: 0, y: 1 },
} as const satisfies Record<string, Position>;

export type Direction = keyof typeof DIRECTIONS;

export const DIRECTION_ORDER: readonly Direction[] = ['east', 'north', 'west', 'south'];

export function offset(pos: Position, direction: Direction): Position {
  const d = DIRECTIONS[direction];
  return { x: pos.x + d.x, y: pos.y + d.y };
}

export class Grid {
  readonly width: number;
  readonly height: number;
  readonly maxWastePerCell: number;
  readonly zoneWidth: number;

  private drones = new Map<string, DroneId>();
  private dronePositions = new Map<DroneId, Position>();
  private waste = new Map<string, WasteId[]>();

  constructor(options: GridOptions) {
    this.width = options.width;
    this.height = options.height;
    this.maxWastePerCell = options.maxWastePerCell ?? 1;
    this.zoneWidth = this.width / 3;
  }

  // --------------------------------------------------------------------------
  // Zone classification
  // --------------------------------------------------------------------------

  zoneOf(x: number): ZoneType {
    const zone = Math.floor(x / this.zoneWidth);
    if (zone <= 0) return 0;
    if (zone === 1) return 1;
    return 2;
  }

  zoneStart(zone: ZoneType): number {
    return zone * this.zoneWidth;
  }

  /** Easternmost column of a zone */
  zoneEnd(zone: ZoneType): number {
    return (zone + 1) * this.zoneWidth - 1;
  }

  /** Transfer column of zones 0 and 1; zone 2 ends in the drop column instead */
  transferColumn(zone: ZoneType): number | null {
    return zone === 2 ? null : this.zoneEnd(zone);
  }

  get dropColumn(): number {
    return this.width - 1;
  }

  isTransferColumn(x: number): boolean {
    return x === this.zoneEnd(0) || x === this.zoneEnd(1);
  }

  isDropColumn(x: number): boolean {
    return x === this.dropColumn;
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  inBounds(pos: Position): boolean {
    return pos.x >= 0 && pos.x < this.width && pos.y >= 0 && pos.y < this.height;
  }

  private assertInBounds(pos: Position): void {
    if (!this.inBounds(pos)) {
      throw new BoundsError(
        'OUT_OF_BOUNDS',
        `Position (${pos.x}, ${pos.y}) is outside the ${this.width}x${this.height} grid`
      );
    }
  }

  cellAt(pos: Position): CellView {
    this.assertInBounds(pos);
    const key = positionKey(pos);
    return {
      position: { x: pos.x, y: pos.y },
      zone: this.zoneOf(pos.x),
      droneId: this.drones.get(key) ?? null,
      wasteIds: [...(this.waste.get(key) ?? [])],
    };
  }

  droneAt(pos: Position): DroneId | null {
    return this.drones.get(positionKey(pos)) ?? null;
  }

  dronePosition(id: DroneId): Position | undefined {
    const pos = this.dronePositions.get(id);
    return pos ? { x: pos.x, y: pos.y } : undefined;
  }

  wasteAt(pos: Position): WasteId[] {
    return [...(this.waste.get(positionKey(pos)) ?? [])];
  }

  hasWasteRoom(pos: Position): boolean {
    return (this.waste.get(positionKey(pos))?.length ?? 0) < this.maxWastePerCell;
  }

  /** In-bounds 4-connected neighbours, east/north/west/south */
  neighbors(pos: Position): Position[] {
    return DIRECTION_ORDER.map((d) => offset(pos, d)).filter((p) => this.inBounds(p));
  }

  // --------------------------------------------------------------------------
  // Mutations
  // --------------------------------------------------------------------------

  placeDrone(id: DroneId, pos: Position): void {
    this.assertInBounds(pos);
    const key = positionKey(pos);
    const occupant = this.drones.get(key);
    if (occupant !== undefined) {
      throw new OccupancyError('CELL_OCCUPIED', `Cell (${pos.x}, ${pos.y}) holds drone ${occupant}`);
    }
    this.drones.set(key, id);
    this.dronePositions.set(id, { x: pos.x, y: pos.y });
  }

  moveDrone(id: DroneId, from: Position, to: Position): void {
    const current = this.dronePositions.get(id);
    if (!current || !samePosition(current, from)) {
      throw new InvariantViolation('DRONE_MISPLACED', `Drone ${id} is not at (${from.x}, ${from.y})`);
    }
    this.assertInBounds(to);
    const toKey = positionKey(to);
    const occupant = this.drones.get(toKey);
    if (occupant !== undefined) {
      throw new OccupancyError('CELL_OCCUPIED', `Cell (${to.x}, ${to.y}) holds drone ${occupant}`);
    }
    this.drones.delete(positionKey(from));
    this.drones.set(toKey, id);
    this.dronePositions.set(id, { x: to.x, y: to.y });
  }

  placeWaste(wasteId: WasteId, pos: Position): void {
    this.assertInBounds(pos);
    const key = positionKey(pos);
    const resting = this.waste.get(key) ?? [];
    if (resting.length >= this.maxWastePerCell) {
      throw new OccupancyError('CELL_OCCUPIED', `Cell (${pos.x}, ${pos.y}) already holds waste`);
    }
    this.waste.set(key, [...resting, wasteId]);
  }

  /** Remove a resting item (the oldest one when no id is given) */
  removeWaste(pos: Position, wasteId?: WasteId): WasteId {
    this.assertInBounds(pos);
    const key = positionKey(pos);
    const resting = this.waste.get(key) ?? [];
    const target = wasteId ?? resting[0];
    if (target === undefined) {
      throw new RegistryError('EMPTY_CELL', `No waste at (${pos.x}, ${pos.y})`);
    }
    if (!resting.includes(target)) {
      throw new RegistryError('UNKNOWN_WASTE', `Waste ${target} is not at (${pos.x}, ${pos.y})`);
    }
    const remaining = resting.filter((w) => w !== target);
    if (remaining.length === 0) {
      this.waste.delete(key);
    } else {
      this.waste.set(key, remaining);
    }
    return target;
  }

  snapshot(): GridSnapshot {
    const cells: CellView[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        cells.push(this.cellAt({ x, y }));
      }
    }
    return {
      width: this.width,
      height: this.height,
      maxWastePerCell: this.maxWastePerCell,
      transferColumns: [this.zoneEnd(0), this.zoneEnd(1)],
      dropColumn: this.dropColumn,
      cells,
    };
  }
}
