/**
 * Scheduler
 *
 * Owns the grid, registry and knowledge store for one run and advances
 * it tick by tick. Every drone perceives the same pre-tick state; the
 * proposals are then applied in ascending drone id, movement first, so
 * the lower id wins every contested cell or claim.
 */

import { getDroneSeed } from '../core/config.js';
import {
  ConfigError,
  InvariantViolation,
  OccupancyError,
  RegistryError,
  StateError,
  isRecoverable,
} from '../core/errors.js';
import { logConflict, logError, logRunEvent, logStalled, logWasteEvent } from '../core/logger.js';
import { SeededRNG } from '../core/rng.js';
import {
  ZONE_TYPES,
  samePosition,
  type DroneId,
  type Position,
  type WasteId,
  type ZoneType,
} from '../core/types.js';
import { createDrone, type Drone } from '../drones/drone.js';
import { buildPercept, visibleCells, type PerceptSource } from '../drones/percept.js';
import {
  INVENTORY_CAPACITY,
  isMovement,
  type DroneAction,
  type DroneSnapshot,
} from '../drones/types.js';
import { Grid, type GridSnapshot } from '../world/grid.js';
import { SharedKnowledgeStore, type KnownWaste } from '../world/knowledge-store.js';
import { WasteRegistry, type WasteRegistrySnapshot } from '../world/waste-registry.js';
import { MetricsCollector, type RunRecord } from './metrics.js';
import {
  DEFAULT_POLICIES,
  type ConflictKind,
  type ConflictRecord,
  type LayoutOptions,
  type SimulationLayout,
  type SimulationOptions,
  type SimulationPolicies,
  type SimulationState,
  type TickReport,
  type WasteEvent,
} from './types.js';
import { validateLayout, validateSimulationOptions, wasteColumns } from './validator.js';

interface World {
  grid: Grid;
  registry: WasteRegistry;
  store: SharedKnowledgeStore;
  /** Ascending id */
  drones: Drone[];
}

interface RunSetup {
  width: number;
  height: number;
  seed: number;
  policies: SimulationPolicies;
  build: () => World;
}

/** Per-tick scratch collected during the apply phase */
interface TickLog {
  tick: number;
  events: WasteEvent[];
  conflicts: ConflictRecord[];
}

function resolvePolicies(options: Partial<SimulationPolicies>): SimulationPolicies {
  return {
    perceptionRadius: options.perceptionRadius ?? DEFAULT_POLICIES.perceptionRadius,
    strategy: options.strategy ?? DEFAULT_POLICIES.strategy,
    deadlockPolicy: options.deadlockPolicy ?? DEFAULT_POLICIES.deadlockPolicy,
    carryTimeout: options.carryTimeout ?? DEFAULT_POLICIES.carryTimeout,
    claimTimeoutTicks: options.claimTimeoutTicks ?? DEFAULT_POLICIES.claimTimeoutTicks,
    maxWastePerCell: options.maxWastePerCell ?? DEFAULT_POLICIES.maxWastePerCell,
    maxTicks: options.maxTicks ?? DEFAULT_POLICIES.maxTicks,
  };
}

function columnsOf(grid: Grid, from: number, to: number): Position[] {
  const cells: Position[] = [];
  for (let x = from; x <= to; x++) {
    for (let y = 0; y < grid.height; y++) {
      cells.push({ x, y });
    }
  }
  return cells;
}

// ============================================================================
// WORLD BUILDERS
// ============================================================================

function emptyWorld(width: number, height: number, policies: SimulationPolicies): World {
  const grid = new Grid({ width, height, maxWastePerCell: policies.maxWastePerCell });
  return {
    grid,
    registry: new WasteRegistry(grid),
    store: new SharedKnowledgeStore(),
    drones: [],
  };
}

interface DroneSeeding {
  seed: number;
  policies: SimulationPolicies;
}

function spawnDrone(world: World, seeding: DroneSeeding, zone: ZoneType, index: number, pos: Position): Drone {
  const drone = createDrone({
    id: world.drones.length + 1,
    zoneType: zone,
    seed: getDroneSeed(seeding.seed, zone, index),
    strategy: seeding.policies.strategy,
    deadlockPolicy: seeding.policies.deadlockPolicy,
    carryTimeout: seeding.policies.carryTimeout,
  });
  world.grid.placeDrone(drone.id, pos);
  world.drones.push(drone);
  return drone;
}

function buildSeededWorld(options: SimulationOptions, policies: SimulationPolicies): World {
  const world = emptyWorld(options.width, options.height, policies);
  const { grid, registry } = world;
  const rng = new SeededRNG(options.seed);

  for (const zone of ZONE_TYPES) {
    const cells = rng.shuffle(columnsOf(grid, grid.zoneStart(zone), grid.zoneEnd(zone)));
    for (let i = 0; i < options.zoneDroneCounts[zone]; i++) {
      const pos = cells[i];
      if (!pos) break;
      spawnDrone(world, { seed: options.seed, policies }, zone, i, pos);
    }
  }

  for (const zone of ZONE_TYPES) {
    const start = grid.zoneStart(zone);
    const cells = columnsOf(grid, start, start + wasteColumns(grid.width, zone) - 1);
    let remaining = options.zoneWasteCounts[zone];
    // One item per cell per pass
    let placed = 1;
    while (remaining > 0 && placed > 0) {
      placed = 0;
      for (const pos of rng.shuffle(cells)) {
        if (remaining === 0) break;
        if (!grid.hasWasteRoom(pos)) continue;
        registry.spawn(zone, pos, 0);
        remaining--;
        placed++;
      }
    }
  }

  return world;
}

function buildLayoutWorld(layout: SimulationLayout, seed: number, policies: SimulationPolicies): World {
  const world = emptyWorld(layout.width, layout.height, policies);
  const perZone: Record<ZoneType, number> = { 0: 0, 1: 0, 2: 0 };

  for (const placement of layout.drones) {
    const index = perZone[placement.zoneType]++;
    const drone = spawnDrone(world, { seed, policies }, placement.zoneType, index, placement.position);
    for (const type of placement.inventory ?? []) {
      const item = world.registry.spawnHeld(type, drone.id, 0);
      drone.hold({ id: item.id, type: item.type });
    }
  }
  for (const waste of layout.wastes) {
    world.registry.spawn(waste.type, waste.position, waste.createdStep ?? 0);
  }
  return world;
}

// ============================================================================
// SIMULATION
// ============================================================================

export class Simulation {
  private world: World;
  private metrics = new MetricsCollector();
  private currentTick = 0;
  private currentState: SimulationState = 'idle';

  private constructor(private readonly setup: RunSetup) {
    this.world = setup.build();
    this.sample();
  }

  /**
   * Seeded random placement: drones anywhere in their own zone, waste of
   * type t in zone t (never on the drop column).
   */
  static initialize(options: SimulationOptions): Simulation {
    const result = validateSimulationOptions(options);
    if (!result.valid) {
      throw new ConfigError(result.errors);
    }
    const policies = resolvePolicies(options);
    const sim = new Simulation({
      width: options.width,
      height: options.height,
      seed: options.seed,
      policies,
      build: () => buildSeededWorld(options, policies),
    });
    logRunEvent('initialized', 0, {
      width: options.width,
      height: options.height,
      seed: options.seed,
      drones: options.zoneDroneCounts,
      waste: options.zoneWasteCounts,
      strategy: policies.strategy,
      deadlockPolicy: policies.deadlockPolicy,
    });
    return sim;
  }

  /** Explicit placement; drone ids follow the layout order */
  static fromLayout(layout: SimulationLayout, options: LayoutOptions = {}): Simulation {
    const result = validateLayout(layout, options);
    if (!result.valid) {
      throw new ConfigError(result.errors);
    }
    const policies = resolvePolicies(options);
    const seed = options.seed ?? 0;
    const sim = new Simulation({
      width: layout.width,
      height: layout.height,
      seed,
      policies,
      build: () => buildLayoutWorld(layout, seed, policies),
    });
    logRunEvent('initialized', 0, {
      width: layout.width,
      height: layout.height,
      seed,
      drones: layout.drones.length,
      waste: layout.wastes.length,
      strategy: policies.strategy,
      deadlockPolicy: policies.deadlockPolicy,
    });
    return sim;
  }

  get state(): SimulationState {
    return this.currentState;
  }

  get tick(): number {
    return this.currentTick;
  }

  get policies(): Readonly<SimulationPolicies> {
    return this.setup.policies;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  private assertNotStopped(): void {
    if (this.currentState === 'stopped') {
      throw new StateError('SIMULATION_STOPPED', `Simulation stopped at tick ${this.currentTick}`);
    }
  }

  start(): void {
    this.assertNotStopped();
    if (this.currentState === 'idle') {
      this.currentState = 'running';
      logRunEvent('started', this.currentTick);
    }
  }

  pause(): void {
    if (this.currentState === 'running') {
      this.currentState = 'paused';
      logRunEvent('paused', this.currentTick);
    }
  }

  resume(): void {
    this.assertNotStopped();
    if (this.currentState === 'paused') {
      this.currentState = 'running';
      logRunEvent('resumed', this.currentTick);
    }
  }

  stop(): void {
    if (this.currentState !== 'stopped') {
      this.currentState = 'stopped';
      logRunEvent('stopped', this.currentTick);
    }
  }

  /** Advance exactly one tick. A paused run steps once and stays paused. */
  step(): TickReport {
    this.assertNotStopped();
    if (this.currentState === 'idle') {
      this.currentState = 'running';
    }
    try {
      return this.executeTick();
    } catch (error) {
      this.currentState = 'stopped';
      logError(null, null, this.currentTick + 1, error, 'tick');
      throw error;
    }
  }

  run(ticks: number): TickReport[] {
    this.assertNotStopped();
    const reports: TickReport[] = [];
    for (let i = 0; i < ticks && this.currentState !== 'stopped'; i++) {
      reports.push(this.step());
    }
    return reports;
  }

  /** Rebuild from the same options and seed */
  reset(): void {
    this.world = this.setup.build();
    this.metrics = new MetricsCollector();
    this.currentTick = 0;
    this.currentState = 'idle';
    this.sample();
    logRunEvent('reset', 0);
  }

  // --------------------------------------------------------------------------
  // Tick
  // --------------------------------------------------------------------------

  private executeTick(): TickReport {
    const tick = this.currentTick + 1;
    const { grid, registry, store, drones } = this.world;
    const { policies } = this.setup;

    // (a) claims, sightings, percepts
    const expired = store.expireClaims(tick, policies.claimTimeoutTicks);
    if (expired.length > 0) {
      logRunEvent('claims_expired', tick, { wasteIds: expired });
    }
    for (const drone of drones) {
      for (const cell of visibleCells(grid, this.positionOf(drone.id))) {
        for (const wasteId of grid.wasteAt(cell)) {
          const item = registry.get(wasteId);
          if (item) store.reportAvailable(cell, wasteId, item.type);
        }
      }
    }
    const source: PerceptSource = { grid, registry, store };
    for (const drone of drones) {
      drone.perceive(buildPercept(source, drone.id, drone.zoneType, tick, policies.perceptionRadius));
    }

    // (b, c) independent deliberation against the same snapshot
    const proposals = drones.map((drone) => ({ drone, action: drone.deliberate().action }));

    const log: TickLog = { tick, events: [], conflicts: [] };
    const applied = new Map<DroneId, DroneAction>();

    // (d) movement, ascending id
    for (const { drone, action } of proposals) {
      if (isMovement(action)) {
        applied.set(drone.id, this.applyMovement(drone, action, log));
      }
    }

    // (e) everything else, against the move-updated state
    for (const { drone, action } of proposals) {
      if (!isMovement(action)) {
        applied.set(drone.id, this.applyAction(drone, action, log));
      }
    }

    // (f) bookkeeping
    let stalledDrones = 0;
    for (const drone of drones) {
      if (drone.endTick()) {
        logStalled(drone.id, drone.zoneType, tick, drone.getInventory()[0]?.id);
      }
      if (drone.getKnowledge().status === 'stalled') stalledDrones++;
      this.metrics.recordAction(drone.id, applied.get(drone.id)?.kind ?? 'noop');
    }
    for (const conflict of log.conflicts) this.metrics.recordConflict(conflict);
    for (const event of log.events) this.metrics.recordWasteEvent(event);

    this.currentTick = tick;
    this.metrics.sample({ tick, grid, registry, stalledDrones });

    if (policies.maxTicks > 0 && tick >= policies.maxTicks) {
      this.currentState = 'stopped';
      logRunEvent('max_ticks_reached', tick, { maxTicks: policies.maxTicks });
    }

    return {
      tick,
      agents: this.agentSnapshots(),
      wasteEvents: log.events,
      conflicts: log.conflicts,
    };
  }

  private positionOf(droneId: DroneId): Position {
    const pos = this.world.grid.dronePosition(droneId);
    if (!pos) {
      throw new InvariantViolation('DRONE_MISPLACED', `Drone ${droneId} is not on the grid`);
    }
    return pos;
  }

  private conflict(log: TickLog, drone: Drone, kind: ConflictKind, code: string, action: DroneAction): void {
    log.conflicts.push({ droneId: drone.id, kind, code, action: action.kind });
    logConflict(drone.id, drone.zoneType, log.tick, code, { kind, action: action.kind });
  }

  private applyMovement(drone: Drone, action: DroneAction, log: TickLog): DroneAction {
    const { grid, store } = this.world;
    let current = action;

    const claim = action.kind === 'move' || action.kind === 'noop' ? action.claim : undefined;
    if (claim !== undefined) {
      try {
        store.claim(claim, drone.id, log.tick);
        drone.setClaim(claim);
      } catch (error) {
        if (!isRecoverable(error)) throw error;
        this.conflict(log, drone, 'claim', error.code, action);
        drone.setClaim(null);
        const to = drone.exploreFallback();
        current = to ? { kind: 'move', to, reason: 'explore' } : { kind: 'noop', reason: 'claim_lost' };
      }
    }

    if (current.kind !== 'move') return current;

    try {
      grid.moveDrone(drone.id, this.positionOf(drone.id), current.to);
      return current;
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      this.conflict(log, drone, 'cell', error.code, current);
      return { kind: 'noop', reason: 'cell_taken' };
    }
  }

  private applyAction(drone: Drone, action: DroneAction, log: TickLog): DroneAction {
    try {
      this.execute(drone, action, log);
      return action;
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      this.conflict(log, drone, 'action', error.code, action);
      return { kind: 'noop', reason: error.code.toLowerCase() };
    }
  }

  private execute(drone: Drone, action: DroneAction, log: TickLog): void {
    const { grid, registry, store } = this.world;
    const position = this.positionOf(drone.id);
    const emit = (event: Omit<WasteEvent, 'tick' | 'droneId' | 'position'>): void => {
      log.events.push({ ...event, tick: log.tick, droneId: drone.id, position });
      logWasteEvent(drone.id, drone.zoneType, log.tick, event.kind, event.wasteIds);
    };

    switch (action.kind) {
      case 'pick': {
        const item = registry.get(action.wasteId);
        if (!item || item.location.kind !== 'grid' || !samePosition(item.location.position, position)) {
          throw new RegistryError('UNKNOWN_WASTE', `Waste ${action.wasteId} is not on drone ${drone.id}'s cell`);
        }
        const status = store.get(action.wasteId)?.status;
        if (status && status.kind === 'claimed' && status.droneId !== drone.id) {
          throw new OccupancyError('ALREADY_CLAIMED', `Waste ${action.wasteId} is claimed by drone ${status.droneId}`);
        }
        if (item.type !== drone.zoneType) {
          throw new InvariantViolation(
            'INCOMPATIBLE_WASTE_TYPE',
            `Zone ${drone.zoneType} drone ${drone.id} cannot pick type ${item.type} waste`
          );
        }
        drone.assertCanHold({ id: item.id, type: item.type });
        registry.pick(item.id, drone.id);
        drone.hold({ id: item.id, type: item.type });
        store.forget(item.id);
        if (drone.getKnowledge().claim === item.id) drone.setClaim(null);
        if (drone.getInventory().length >= INVENTORY_CAPACITY) {
          store.releaseAllFor(drone.id);
          drone.setClaim(null);
        }
        emit({ kind: 'pick', wasteIds: [item.id] });
        return;
      }

      case 'transform': {
        const [a, b] = drone.getInventory();
        if (!a || !b) {
          throw new RegistryError('INCOMPATIBLE_ITEMS', `Drone ${drone.id} needs two items to transform`);
        }
        const result = registry.transform(a.id, b.id, log.tick);
        drone.completeTransform({ id: result.item.id, type: result.item.type });
        emit({ kind: 'transform', wasteIds: [result.item.id], consumed: [a.id, b.id] });
        return;
      }

      case 'drop':
      case 'release': {
        const held = drone.getInventory().find((w) => w.id === action.wasteId);
        if (!held) {
          throw new RegistryError('UNKNOWN_WASTE', `Drone ${drone.id} does not hold ${action.wasteId}`);
        }
        registry.put(held.id, position);
        drone.remove(held.id);
        store.reportAvailable(position, held.id, held.type);
        if (action.kind === 'release') drone.ignore(held.id);
        emit({ kind: action.kind, wasteIds: [held.id] });
        return;
      }

      case 'deposit': {
        if (!grid.isDropColumn(position.x)) {
          throw new InvariantViolation('DRONE_MISPLACED', `Drone ${drone.id} deposited away from the drop column`);
        }
        const deposited = drone.getInventory().map((w) => w.id);
        for (const id of deposited) {
          registry.complete(id, log.tick);
          drone.remove(id);
        }
        emit({ kind: 'deposit', wasteIds: deposited });
        return;
      }

      case 'move':
      case 'noop':
        return;
    }
  }

  private sample(): void {
    const stalledDrones = this.world.drones.filter((d) => d.getKnowledge().status === 'stalled').length;
    this.metrics.sample({
      tick: this.currentTick,
      grid: this.world.grid,
      registry: this.world.registry,
      stalledDrones,
    });
  }

  // --------------------------------------------------------------------------
  // Read-only views
  // --------------------------------------------------------------------------

  gridSnapshot(): GridSnapshot {
    return this.world.grid.snapshot();
  }

  agentSnapshot(id: DroneId): DroneSnapshot | undefined {
    const drone = this.world.drones.find((d) => d.id === id);
    return drone ? drone.snapshot(this.positionOf(drone.id)) : undefined;
  }

  agentSnapshots(): DroneSnapshot[] {
    return this.world.drones.map((d) => d.snapshot(this.positionOf(d.id)));
  }

  wasteRegistrySnapshot(): WasteRegistrySnapshot {
    return this.world.registry.snapshot();
  }

  knowledgeSnapshot(): KnownWaste[] {
    return this.world.store.snapshot();
  }

  exportRun(): RunRecord {
    return this.metrics.exportRun({
      seed: this.setup.seed,
      width: this.setup.width,
      height: this.setup.height,
    });
  }

  /**
   * Deposit one item outside the tick loop, stamped with the current tick.
   * Only an item held by a drone standing on the drop column qualifies;
   * a second completion of the same item fails.
   */
  completeWaste(wasteId: WasteId): void {
    const { grid, registry } = this.world;
    const location = registry.get(wasteId)?.location;
    if (location?.kind !== 'held') {
      // Unknown, resting or completed: the registry reports which
      registry.complete(wasteId, this.currentTick);
      return;
    }
    const holderId = location.droneId;
    const holder = this.world.drones.find((d) => d.id === holderId);
    if (!holder || !grid.isDropColumn(this.positionOf(holder.id).x)) {
      throw new RegistryError('UNKNOWN_WASTE', `Waste ${wasteId} is not on the drop column`);
    }
    registry.complete(wasteId, this.currentTick);
    holder.remove(wasteId);
  }
}

export function initialize(options: SimulationOptions): Simulation {
  return Simulation.initialize(options);
}
