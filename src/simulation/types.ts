/**
 * Simulation Types
 *
 * Options, layouts and the per-tick report handed back to callers.
 */

import type {
  DeadlockPolicy,
  DroneId,
  ExplorationStrategyName,
  Position,
  WasteId,
  WasteType,
  ZoneType,
} from '../core/types.js';
import type { DroneAction, DroneSnapshot } from '../drones/types.js';

// ============================================================================
// OPTIONS
// ============================================================================

export type ZoneCounts = [number, number, number];

export interface SimulationPolicies {
  /** Manhattan radius for shared knowledge queries */
  perceptionRadius: number;
  strategy: ExplorationStrategyName;
  deadlockPolicy: DeadlockPolicy;
  /** Ticks a lone own-type item may be carried before stalling (0 disables) */
  carryTimeout: number;
  /** Claims older than this are released (0 keeps them until pickup) */
  claimTimeoutTicks: number;
  maxWastePerCell: number;
  /** Run moves to 'stopped' after this many ticks (0 means no limit) */
  maxTicks: number;
}

export const DEFAULT_POLICIES: SimulationPolicies = {
  perceptionRadius: 4,
  strategy: 'random-walk',
  deadlockPolicy: 'none',
  carryTimeout: 50,
  claimTimeoutTicks: 0,
  maxWastePerCell: 1,
  maxTicks: 0,
};

export interface SimulationOptions extends Partial<SimulationPolicies> {
  width: number;
  height: number;
  /** Initial waste of each type, placed in the matching zone */
  zoneWasteCounts: ZoneCounts;
  /** Drones per zone */
  zoneDroneCounts: ZoneCounts;
  seed: number;
}

/** Explicit placement, used to reproduce a scenario exactly */
export interface SimulationLayout {
  width: number;
  height: number;
  /** Drone ids follow array order, starting at 1 */
  drones: Array<{
    zoneType: ZoneType;
    position: Position;
    inventory?: WasteType[];
  }>;
  wastes: Array<{
    type: WasteType;
    position: Position;
    createdStep?: number;
  }>;
}

export type LayoutOptions = Partial<SimulationPolicies> & { seed?: number };

export type SimulationState = 'idle' | 'running' | 'paused' | 'stopped';

// ============================================================================
// TICK REPORT
// ============================================================================

export type WasteEventKind = 'pick' | 'drop' | 'transform' | 'deposit' | 'release';

export interface WasteEvent {
  tick: number;
  kind: WasteEventKind;
  droneId: DroneId;
  /** Items affected; for a transform, the produced item */
  wasteIds: WasteId[];
  /** Transform inputs */
  consumed?: [WasteId, WasteId];
  position: Position;
}

export type ConflictKind = 'cell' | 'claim' | 'action';

export interface ConflictRecord {
  droneId: DroneId;
  kind: ConflictKind;
  code: string;
  action: DroneAction['kind'];
}

export interface TickReport {
  tick: number;
  agents: DroneSnapshot[];
  wasteEvents: WasteEvent[];
  conflicts: ConflictRecord[];
}
