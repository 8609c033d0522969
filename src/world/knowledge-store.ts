/**
 * Shared Knowledge Store
 *
 * The only coordination channel between drones: which waste is known to
 * rest where, and which drone has claimed it. One store per run, owned by
 * the scheduler and handed to drones as a read-only view.
 */

import { OccupancyError, RegistryError } from '../core/errors.js';
import {
  compareWasteIds,
  manhattan,
  type DroneId,
  type Position,
  type WasteId,
  type WasteType,
} from '../core/types.js';

export type KnowledgeStatus =
  | { kind: 'available' }
  | { kind: 'claimed'; droneId: DroneId; since: number };

export interface KnownWaste {
  wasteId: WasteId;
  type: WasteType;
  position: Position;
  status: KnowledgeStatus;
}

/** Read side handed to drones during deliberation */
export interface KnowledgeView {
  get(wasteId: WasteId): KnownWaste | undefined;
  claimOf(droneId: DroneId): WasteId | undefined;
  queryNearby(pos: Position, radius: number): Iterable<KnownWaste>;
}

function cloneEntry(entry: KnownWaste): KnownWaste {
  return {
    wasteId: entry.wasteId,
    type: entry.type,
    position: { ...entry.position },
    status: { ...entry.status },
  };
}

export class SharedKnowledgeStore implements KnowledgeView {
  private entries = new Map<WasteId, KnownWaste>();

  get size(): number {
    return this.entries.size;
  }

  get(wasteId: WasteId): KnownWaste | undefined {
    const entry = this.entries.get(wasteId);
    return entry ? cloneEntry(entry) : undefined;
  }

  /** Record a sighting. An existing claim survives re-reporting. */
  reportAvailable(pos: Position, wasteId: WasteId, type: WasteType): void {
    const existing = this.entries.get(wasteId);
    if (existing) {
      existing.position = { x: pos.x, y: pos.y };
      return;
    }
    this.entries.set(wasteId, {
      wasteId,
      type,
      position: { x: pos.x, y: pos.y },
      status: { kind: 'available' },
    });
  }

  claim(wasteId: WasteId, droneId: DroneId, tick: number): void {
    const entry = this.entries.get(wasteId);
    if (!entry) {
      throw new RegistryError('UNKNOWN_WASTE', `Waste ${wasteId} is not known`);
    }
    if (entry.status.kind === 'claimed') {
      if (entry.status.droneId === droneId) return;
      throw new OccupancyError(
        'ALREADY_CLAIMED',
        `Waste ${wasteId} is claimed by drone ${entry.status.droneId}`
      );
    }
    entry.status = { kind: 'claimed', droneId, since: tick };
  }

  release(wasteId: WasteId): boolean {
    const entry = this.entries.get(wasteId);
    if (!entry || entry.status.kind !== 'claimed') return false;
    entry.status = { kind: 'available' };
    return true;
  }

  releaseAllFor(droneId: DroneId): WasteId[] {
    const released: WasteId[] = [];
    for (const entry of this.entries.values()) {
      if (entry.status.kind === 'claimed' && entry.status.droneId === droneId) {
        entry.status = { kind: 'available' };
        released.push(entry.wasteId);
      }
    }
    return released.sort(compareWasteIds);
  }

  /** Drop an entry once its waste has been collected */
  forget(wasteId: WasteId): boolean {
    return this.entries.delete(wasteId);
  }

  claimOf(droneId: DroneId): WasteId | undefined {
    for (const entry of this.entries.values()) {
      if (entry.status.kind === 'claimed' && entry.status.droneId === droneId) {
        return entry.wasteId;
      }
    }
    return undefined;
  }

  /**
   * Available waste within a Manhattan radius, nearest first, ties by id.
   */
  *queryNearby(pos: Position, radius: number): Generator<KnownWaste> {
    const matches = [...this.entries.values()]
      .filter((e) => e.status.kind === 'available' && manhattan(e.position, pos) <= radius)
      .sort(
        (a, b) =>
          manhattan(a.position, pos) - manhattan(b.position, pos) ||
          compareWasteIds(a.wasteId, b.wasteId)
      );
    for (const entry of matches) {
      yield cloneEntry(entry);
    }
  }

  /** Release claims held for at least `timeout` ticks */
  expireClaims(tick: number, timeout: number): WasteId[] {
    if (timeout <= 0) return [];
    const expired: WasteId[] = [];
    for (const entry of this.entries.values()) {
      if (entry.status.kind === 'claimed' && tick - entry.status.since >= timeout) {
        entry.status = { kind: 'available' };
        expired.push(entry.wasteId);
      }
    }
    return expired.sort(compareWasteIds);
  }

  snapshot(): KnownWaste[] {
    return [...this.entries.values()]
      .sort((a, b) => compareWasteIds(a.wasteId, b.wasteId))
      .map(cloneEntry);
  }
}
