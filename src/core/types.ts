/**
 * Zone Relay - Core Types
 *
 * Type definitions shared by the world model, drones and scheduler.
 */

// ============================================================================
// GRID TYPES
// ============================================================================

export interface Position {
  x: number;
  y: number;
}

/** Zone index, west to east: 0 = green, 1 = yellow, 2 = red */
export type ZoneType = 0 | 1 | 2;

/** Waste type shares the zone numbering (green/yellow/red) */
export type WasteType = ZoneType;

export const ZONE_TYPES: readonly ZoneType[] = [0, 1, 2];

export const WASTE_COLORS: Record<WasteType, 'green' | 'yellow' | 'red'> = {
  0: 'green',
  1: 'yellow',
  2: 'red',
};

export type DroneId = number;
export type WasteId = string;

export function isZoneType(value: unknown): value is ZoneType {
  return value === 0 || value === 1 || value === 2;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function positionKey(pos: Position): string {
  return `${pos.x},${pos.y}`;
}

// ============================================================================
// LOG TYPES
// ============================================================================

export interface LogEntry {
  ts: string;
  droneId: DroneId | null;
  zone: ZoneType | null;
  step: string;
  tick: number;
  details?: Record<string, unknown>;
}

// ============================================================================
// POLICY TYPES
// ============================================================================

/** Movement used by the Explore rule */
export type ExplorationStrategyName = 'random-walk' | 'memory-walk' | 'spiral-search' | 'grid-scan';

export const EXPLORATION_STRATEGIES: readonly ExplorationStrategyName[] = [
  'random-walk',
  'memory-walk',
  'spiral-search',
  'grid-scan',
];

/**
 * What a stalled drone does.
 * 'none' leaves it stuck; 'release' puts its lone item back for another drone.
 */
export type DeadlockPolicy = 'none' | 'release';

export const DEADLOCK_POLICIES: readonly DeadlockPolicy[] = ['none', 'release'];

/** Orders 'waste-2' before 'waste-10' */
export function compareWasteIds(a: WasteId, b: WasteId): number {
  const na = Number(a.slice(a.lastIndexOf('-') + 1));
  const nb = Number(b.slice(b.lastIndexOf('-') + 1));
  if (Number.isNaN(na) || Number.isNaN(nb) || na === nb) return a < b ? -1 : a > b ? 1 : 0;
  return na - nb;
}
