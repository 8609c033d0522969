/**
 * Drone
 *
 * One zone-specialized agent: takes a percept, updates its private
 * knowledge and deliberates to exactly one proposed action. The drone
 * never touches the grid, registry or store; the scheduler applies what
 * it proposes and reports the outcome back through the mutators below.
 */

import { InvariantViolation } from '../core/errors.js';
import { logDecision } from '../core/logger.js';
import { SeededRNG } from '../core/rng.js';
import { positionKey, type Position, type WasteId, type WasteType, type ZoneType } from '../core/types.js';
import { createStrategy, type ExplorationStrategy } from '../strategies/index.js';
import { deliberate, exploreAction, type DeliberationContext } from './deliberation.js';
import {
  ACTION_HISTORY_LENGTH,
  INVENTORY_CAPACITY,
  type Decision,
  type DroneConfig,
  type DroneKnowledge,
  type DroneSnapshot,
  type InventoryItem,
  type Percept,
} from './types.js';

/** Types a zone-t drone may carry: t and t + 1, or only red in the red zone */
export function allowedTypes(zone: ZoneType): WasteType[] {
  if (zone === 0) return [0, 1];
  if (zone === 1) return [1, 2];
  return [2];
}

export class Drone {
  readonly id: number;
  readonly zoneType: ZoneType;

  private config: DroneConfig;
  private rng: SeededRNG;
  private strategy: ExplorationStrategy;
  private inventory: InventoryItem[] = [];
  private knowledge: DroneKnowledge;
  private lastDecision: Decision | null = null;
  /** Explore target for the current percept; undefined until first asked */
  private exploreTarget: Position | null | undefined;

  constructor(config: DroneConfig) {
    this.config = config;
    this.id = config.id;
    this.zoneType = config.zoneType;
    this.rng = new SeededRNG(config.seed);
    this.strategy = createStrategy(config.strategy);
    this.knowledge = {
      lastPercept: null,
      justTransformed: false,
      claim: null,
      actions: [],
      visited: new Map(),
      carryTimeout: config.carryTimeout,
      status: 'idle',
      ignoredWaste: new Set(),
    };
  }

  // --------------------------------------------------------------------------
  // Percept → knowledge → decision
  // --------------------------------------------------------------------------

  perceive(percept: Percept): void {
    this.knowledge.lastPercept = percept;
    this.exploreTarget = undefined;
    const key = positionKey(percept.position);
    this.knowledge.visited.set(key, (this.knowledge.visited.get(key) ?? 0) + 1);
    // The store is the source of truth for claims; expired ones vanish here
    this.knowledge.claim = percept.claim?.wasteId ?? null;
  }

  deliberate(): Decision {
    const ctx = this.context();
    const decision = deliberate(ctx);
    this.lastDecision = decision;
    logDecision(this.id, this.zoneType, ctx.percept.tick, decision.rule, decision.action.kind);
    this.knowledge.actions.push(decision.action.kind);
    if (this.knowledge.actions.length > ACTION_HISTORY_LENGTH) {
      this.knowledge.actions.shift();
    }
    return decision;
  }

  /**
   * Explore move against the same percept, used when a claim is lost mid-tick.
   * Reuses the target deliberation drew, so stateful strategies advance once per tick.
   */
  exploreFallback(): Position | null {
    const action = exploreAction(this.context());
    return action.kind === 'move' ? action.to : null;
  }

  private context(): DeliberationContext {
    const percept = this.knowledge.lastPercept;
    if (!percept) {
      throw new InvariantViolation('DRONE_MISPLACED', `Drone ${this.id} deliberated without a percept`);
    }
    return {
      droneId: this.id,
      zoneType: this.zoneType,
      inventory: this.inventory,
      percept,
      knowledge: this.knowledge,
      deadlockPolicy: this.config.deadlockPolicy,
      explore: () => this.explore(percept),
    };
  }

  private explore(percept: Percept): Position | null {
    if (this.exploreTarget === undefined) {
      this.exploreTarget = this.strategy.next({
        position: percept.position,
        options: percept.neighbors
          .filter((n) => n.reachable && n.droneId === null)
          .map((n) => n.position),
        visited: this.knowledge.visited,
        bounds: percept.scanBounds,
        rng: this.rng,
      });
    }
    return this.exploreTarget;
  }

  // --------------------------------------------------------------------------
  // Outcomes applied by the scheduler
  // --------------------------------------------------------------------------

  /** Throws when taking `item` would break the inventory invariants */
  assertCanHold(item: InventoryItem): void {
    if (!allowedTypes(this.zoneType).includes(item.type)) {
      throw new InvariantViolation(
        'INCOMPATIBLE_WASTE_TYPE',
        `Zone ${this.zoneType} drone ${this.id} cannot carry type ${item.type} waste`
      );
    }
    if (this.inventory.length >= INVENTORY_CAPACITY) {
      throw new InvariantViolation('INVENTORY_OVERFLOW', `Drone ${this.id} inventory is full`);
    }
    if (this.inventory.some((w) => w.type !== item.type)) {
      throw new InvariantViolation(
        'INCOMPATIBLE_WASTE_TYPE',
        `Drone ${this.id} cannot mix type ${item.type} with its inventory`
      );
    }
  }

  hold(item: InventoryItem): void {
    this.assertCanHold(item);
    this.inventory.push({ id: item.id, type: item.type });
  }

  remove(wasteId: WasteId): InventoryItem | undefined {
    const index = this.inventory.findIndex((w) => w.id === wasteId);
    if (index === -1) return undefined;
    const [removed] = this.inventory.splice(index, 1);
    if (!this.inventory.some((w) => w.type !== this.zoneType)) {
      this.knowledge.justTransformed = false;
    }
    return removed;
  }

  /** Swap the two transform inputs for the produced item */
  completeTransform(output: InventoryItem): void {
    this.inventory = [];
    this.hold(output);
    this.knowledge.justTransformed = true;
  }

  setClaim(wasteId: WasteId | null): void {
    this.knowledge.claim = wasteId;
  }

  ignore(wasteId: WasteId): void {
    this.knowledge.ignoredWaste.add(wasteId);
  }

  /**
   * Carry-timeout bookkeeping at the end of a tick.
   * Returns true on the tick the drone becomes stalled.
   */
  endTick(): boolean {
    const lone = this.inventory.length === 1 ? this.inventory[0] : undefined;
    const waitingForPair = this.zoneType !== 2 && lone !== undefined && lone.type === this.zoneType;

    if (!waitingForPair || this.config.carryTimeout <= 0) {
      this.knowledge.carryTimeout = this.config.carryTimeout;
      this.knowledge.status = this.inventory.length > 0 ? 'working' : 'idle';
      return false;
    }

    this.knowledge.carryTimeout = Math.max(0, this.knowledge.carryTimeout - 1);
    if (this.knowledge.carryTimeout === 0 && this.knowledge.status !== 'stalled') {
      this.knowledge.status = 'stalled';
      return true;
    }
    if (this.knowledge.status !== 'stalled') {
      this.knowledge.status = 'working';
    }
    return false;
  }

  // --------------------------------------------------------------------------
  // Read access
  // --------------------------------------------------------------------------

  getInventory(): InventoryItem[] {
    return this.inventory.map((w) => ({ ...w }));
  }

  getKnowledge(): Readonly<DroneKnowledge> {
    return this.knowledge;
  }

  getLastDecision(): Decision | null {
    return this.lastDecision;
  }

  snapshot(position: Position): DroneSnapshot {
    return {
      id: this.id,
      zoneType: this.zoneType,
      position: { x: position.x, y: position.y },
      inventory: this.getInventory(),
      status: this.knowledge.status,
      claim: this.knowledge.claim,
      justTransformed: this.knowledge.justTransformed,
      carryTimeout: this.knowledge.carryTimeout,
      lastRule: this.lastDecision?.rule ?? null,
      lastAction: this.lastDecision ? { ...this.lastDecision.action } : null,
    };
  }
}

export function createDrone(config: DroneConfig): Drone {
  return new Drone(config);
}
