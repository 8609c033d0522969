/**
 * Drone Types
 *
 * Percepts, actions and private knowledge of a zone-specialized drone.
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
import type { KnownWaste } from '../world/knowledge-store.js';

// ============================================================================
// CONFIG
// ============================================================================

export interface DroneConfig {
  id: DroneId;
  zoneType: ZoneType;
  /** Seed for the drone's own RNG */
  seed: number;
  strategy: ExplorationStrategyName;
  deadlockPolicy: DeadlockPolicy;
  /** Ticks a lone own-type item may be carried before the drone counts as stalled (0 disables) */
  carryTimeout: number;
}

export const INVENTORY_CAPACITY = 2;
export const ACTION_HISTORY_LENGTH = 20;

// ============================================================================
// PERCEPTS
// ============================================================================

export interface PerceivedWaste {
  wasteId: WasteId;
  type: WasteType;
  position: Position;
  claimedBy: DroneId | null;
}

export interface NeighborView {
  position: Position;
  droneId: DroneId | null;
  /** Within the drone's reachable columns */
  reachable: boolean;
  waste: PerceivedWaste[];
}

export interface ZoneBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/** Read-only view of the grid around a drone, taken before anyone acts */
export interface Percept {
  tick: number;
  position: Position;
  /** Zone of the current column */
  zone: ZoneType;
  /** Transfer column for zones 0/1, drop column for zone 2; also the reachable limit */
  boundaryColumn: number;
  /** Cells of the drone's own zone worth sweeping (the drop column excluded) */
  scanBounds: ZoneBounds;
  onTransferColumn: boolean;
  onDropColumn: boolean;
  cellWaste: PerceivedWaste[];
  /** The current cell can take one more resting item */
  cellHasRoom: boolean;
  neighbors: NeighborView[];
  /** Available waste from the shared store, nearest first */
  knownWaste: KnownWaste[];
  /** Store entry this drone holds a claim on */
  claim: KnownWaste | null;
}

// ============================================================================
// ACTIONS
// ============================================================================

export type MoveReason = 'east' | 'approach' | 'explore';

export type DroneAction =
  | { kind: 'transform' }
  | { kind: 'deposit' }
  | { kind: 'drop'; wasteId: WasteId }
  | { kind: 'release'; wasteId: WasteId }
  | { kind: 'pick'; wasteId: WasteId }
  | { kind: 'move'; to: Position; reason: MoveReason; claim?: WasteId }
  | { kind: 'noop'; reason: string; claim?: WasteId };

export type ActionKind = DroneAction['kind'];

export type DecisionRule =
  | 'transform'
  | 'deposit'
  | 'drop'
  | 'advance-east'
  | 'release'
  | 'pick'
  | 'explore';

export interface Decision {
  rule: DecisionRule;
  action: DroneAction;
}

export function isMovement(action: DroneAction): boolean {
  return action.kind === 'move' || (action.kind === 'noop' && action.claim !== undefined);
}

// ============================================================================
// KNOWLEDGE
// ============================================================================

export interface InventoryItem {
  id: WasteId;
  type: WasteType;
}

/** 'stalled' is the domain's deadlock: a lone item carried past the timeout */
export type DroneStatus = 'idle' | 'working' | 'stalled';

export interface DroneKnowledge {
  lastPercept: Percept | null;
  /** Forces eastward movement until the output is dropped */
  justTransformed: boolean;
  claim: WasteId | null;
  actions: ActionKind[];
  /** Visit counts keyed by positionKey */
  visited: Map<string, number>;
  carryTimeout: number;
  status: DroneStatus;
  /** Released items this drone will not pick again */
  ignoredWaste: Set<WasteId>;
}

export interface DroneSnapshot {
  id: DroneId;
  zoneType: ZoneType;
  position: Position;
  inventory: InventoryItem[];
  status: DroneStatus;
  claim: WasteId | null;
  justTransformed: boolean;
  carryTimeout: number;
  lastRule: DecisionRule | null;
  lastAction: DroneAction | null;
}
