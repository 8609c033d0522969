/**
 * Waste Registry
 *
 * Owns waste identity, type and lifecycle timestamps. Transformed inputs
 * leave the registry; deposited items stay, marked completed.
 */

import { RegistryError } from '../core/errors.js';
import {
  compareWasteIds,
  type DroneId,
  type Position,
  type WasteId,
  type WasteType,
} from '../core/types.js';
import type { Grid } from './grid.js';

export type WasteLocation =
  | { kind: 'grid'; position: Position }
  | { kind: 'held'; droneId: DroneId }
  | { kind: 'completed' };

export interface WasteItem {
  id: WasteId;
  type: WasteType;
  /** Tick of first appearance, spawned or produced */
  createdStep: number;
  /** Tick of deposit at the drop column */
  completedStep?: number;
  /** Types along the item's lineage, oldest first */
  typeHistory: WasteType[];
  /** Inputs of the transform that produced this item */
  mergedFrom?: [WasteId, WasteId];
  /** Tick of that transform */
  transformedStep?: number;
  location: WasteLocation;
}

export interface TransformResult {
  item: WasteItem;
  consumed: [WasteItem, WasteItem];
}

export interface WasteRegistrySnapshot {
  items: WasteItem[];
}

function cloneLocation(location: WasteLocation): WasteLocation {
  switch (location.kind) {
    case 'grid':
      return { kind: 'grid', position: { ...location.position } };
    case 'held':
      return { kind: 'held', droneId: location.droneId };
    case 'completed':
      return { kind: 'completed' };
  }
}

function cloneItem(item: WasteItem): WasteItem {
  return {
    ...item,
    typeHistory: [...item.typeHistory],
    mergedFrom: item.mergedFrom ? [item.mergedFrom[0], item.mergedFrom[1]] : undefined,
    location: cloneLocation(item.location),
  };
}

function nextType(type: WasteType): WasteType | null {
  if (type === 0) return 1;
  if (type === 1) return 2;
  return null;
}

export class WasteRegistry {
  private items = new Map<WasteId, WasteItem>();
  private nextId = 1;

  constructor(private readonly grid: Grid) {}

  private allocateId(): WasteId {
    return `waste-${this.nextId++}`;
  }

  private require(id: WasteId): WasteItem {
    const item = this.items.get(id);
    if (!item) {
      throw new RegistryError('UNKNOWN_WASTE', `Unknown waste ${id}`);
    }
    return item;
  }

  get(id: WasteId): WasteItem | undefined {
    const item = this.items.get(id);
    return item ? cloneItem(item) : undefined;
  }

  has(id: WasteId): boolean {
    return this.items.has(id);
  }

  all(): WasteItem[] {
    return [...this.items.values()]
      .sort((a, b) => compareWasteIds(a.id, b.id))
      .map(cloneItem);
  }

  /** Create a new item resting on the grid */
  spawn(type: WasteType, pos: Position, step: number): WasteItem {
    const id = this.allocateId();
    this.grid.placeWaste(id, pos);
    const item: WasteItem = {
      id,
      type,
      createdStep: step,
      typeHistory: [type],
      location: { kind: 'grid', position: { x: pos.x, y: pos.y } },
    };
    this.items.set(id, item);
    return cloneItem(item);
  }

  /** Create an item already held by a drone (scenario layouts) */
  spawnHeld(type: WasteType, droneId: DroneId, step: number): WasteItem {
    const item: WasteItem = {
      id: this.allocateId(),
      type,
      createdStep: step,
      typeHistory: [type],
      location: { kind: 'held', droneId },
    };
    this.items.set(item.id, item);
    return cloneItem(item);
  }

  /** Lift a resting item off the grid into a drone's hold */
  pick(id: WasteId, droneId: DroneId): WasteItem {
    const item = this.require(id);
    if (item.location.kind !== 'grid') {
      throw new RegistryError('UNKNOWN_WASTE', `Waste ${id} is not resting on the grid`);
    }
    this.grid.removeWaste(item.location.position, id);
    item.location = { kind: 'held', droneId };
    return cloneItem(item);
  }

  /** Put a held item down on the grid */
  put(id: WasteId, pos: Position): WasteItem {
    const item = this.require(id);
    if (item.location.kind !== 'held') {
      throw new RegistryError('UNKNOWN_WASTE', `Waste ${id} is not held by a drone`);
    }
    this.grid.placeWaste(id, pos);
    item.location = { kind: 'grid', position: { x: pos.x, y: pos.y } };
    return cloneItem(item);
  }

  /**
   * Merge two held items of type t < 2 into one item of type t + 1.
   * The result keeps the earlier createdStep of its inputs.
   */
  transform(aId: WasteId, bId: WasteId, step: number): TransformResult {
    const a = this.require(aId);
    const b = this.require(bId);
    const produced = nextType(a.type);

    if (
      aId === bId ||
      a.type !== b.type ||
      produced === null ||
      a.location.kind !== 'held' ||
      b.location.kind !== 'held' ||
      a.location.droneId !== b.location.droneId
    ) {
      throw new RegistryError(
        'INCOMPATIBLE_ITEMS',
        `Cannot transform ${aId} (type ${a.type}) with ${bId} (type ${b.type})`
      );
    }

    const earlier = b.createdStep < a.createdStep ? b : a;
    const item: WasteItem = {
      id: this.allocateId(),
      type: produced,
      createdStep: earlier.createdStep,
      typeHistory: [...earlier.typeHistory, produced],
      mergedFrom: [aId, bId],
      transformedStep: step,
      location: { kind: 'held', droneId: a.location.droneId },
    };

    this.items.delete(aId);
    this.items.delete(bId);
    this.items.set(item.id, item);

    return { item: cloneItem(item), consumed: [cloneItem(a), cloneItem(b)] };
  }

  /** Mark a held item deposited at the drop column */
  complete(id: WasteId, step: number): WasteItem {
    const item = this.require(id);
    if (item.completedStep !== undefined) {
      throw new RegistryError('ALREADY_COMPLETED', `Waste ${id} was completed at tick ${item.completedStep}`);
    }
    if (item.location.kind !== 'held') {
      throw new RegistryError('UNKNOWN_WASTE', `Waste ${id} is not held by a drone`);
    }
    item.completedStep = step;
    item.location = { kind: 'completed' };
    return cloneItem(item);
  }

  snapshot(): WasteRegistrySnapshot {
    return { items: this.all() };
  }
}
