/**
 * Metrics Collector
 *
 * Passive observer. The scheduler feeds it applied actions, conflicts and
 * waste events, and asks it to sample the world at the end of every tick.
 * Nothing here feeds back into the simulation.
 */

import { compareWasteIds, type DroneId, type WasteId, type WasteType, type ZoneType } from '../core/types.js';
import type { ActionKind } from '../drones/types.js';
import type { Grid } from '../world/grid.js';
import type { WasteItem, WasteRegistry } from '../world/waste-registry.js';
import type { ConflictRecord, WasteEvent } from './types.js';

export interface MetricsCounters {
  picks: number;
  drops: number;
  transforms: number;
  deposits: number;
  releases: number;
  moves: number;
  noops: number;
  cellConflicts: number;
  claimConflicts: number;
  actionFailures: number;
}

export interface WasteRecord {
  type: WasteType;
  typeHistory: WasteType[];
  createdStep: number;
  completedStep: number | null;
  /** Tick the item was used up as a transform input */
  consumedStep: number | null;
  mergedFrom: [WasteId, WasteId] | null;
}

export interface TickAggregate {
  tick: number;
  /** Uncompleted waste per zone, resting or held */
  zoneWaste: Record<ZoneType, number>;
  completed: number;
  stalledDrones: number;
}

export interface RunRecord {
  seed: number;
  width: number;
  height: number;
  ticks: number;
  counters: MetricsCounters;
  wastes: Record<WasteId, WasteRecord>;
  aggregates: TickAggregate[];
  /** Ticks each drone ended on a NoOp, keyed by drone id */
  idleTicks: Record<string, number>;
}

export interface SampleInput {
  tick: number;
  grid: Grid;
  registry: WasteRegistry;
  stalledDrones: number;
}

export interface RunMeta {
  seed: number;
  width: number;
  height: number;
}

function emptyCounters(): MetricsCounters {
  return {
    picks: 0,
    drops: 0,
    transforms: 0,
    deposits: 0,
    releases: 0,
    moves: 0,
    noops: 0,
    cellConflicts: 0,
    claimConflicts: 0,
    actionFailures: 0,
  };
}

const EVENT_COUNTERS = {
  pick: 'picks',
  drop: 'drops',
  transform: 'transforms',
  deposit: 'deposits',
  release: 'releases',
} as const satisfies Record<WasteEvent['kind'], keyof MetricsCounters>;

export class MetricsCollector {
  private counters = emptyCounters();
  private wastes = new Map<WasteId, WasteRecord>();
  private aggregates: TickAggregate[] = [];
  private idle = new Map<DroneId, number>();
  private lastTick = 0;

  recordAction(droneId: DroneId, kind: ActionKind): void {
    if (kind === 'move') this.counters.moves++;
    if (kind === 'noop') {
      this.counters.noops++;
      this.idle.set(droneId, (this.idle.get(droneId) ?? 0) + 1);
    } else if (!this.idle.has(droneId)) {
      this.idle.set(droneId, 0);
    }
  }

  recordConflict(conflict: ConflictRecord): void {
    switch (conflict.kind) {
      case 'cell':
        this.counters.cellConflicts++;
        break;
      case 'claim':
        this.counters.claimConflicts++;
        break;
      case 'action':
        this.counters.actionFailures++;
        break;
    }
  }

  recordWasteEvent(event: WasteEvent): void {
    this.counters[EVENT_COUNTERS[event.kind]]++;
    if (event.consumed) {
      for (const id of event.consumed) {
        const record = this.wastes.get(id);
        if (record) record.consumedStep = event.tick;
      }
    }
  }

  /** End-of-tick sample; tick 0 is the initial state */
  sample(input: SampleInput): TickAggregate {
    const zoneWaste: Record<ZoneType, number> = { 0: 0, 1: 0, 2: 0 };
    let completed = 0;

    for (const item of input.registry.all()) {
      this.track(item);
      if (item.location.kind === 'completed') {
        completed++;
        continue;
      }
      const x =
        item.location.kind === 'grid'
          ? item.location.position.x
          : input.grid.dronePosition(item.location.droneId)?.x;
      if (x !== undefined) zoneWaste[input.grid.zoneOf(x)]++;
    }

    const aggregate: TickAggregate = {
      tick: input.tick,
      zoneWaste,
      completed,
      stalledDrones: input.stalledDrones,
    };
    this.aggregates.push(aggregate);
    this.lastTick = input.tick;
    return aggregate;
  }

  private track(item: WasteItem): void {
    const existing = this.wastes.get(item.id);
    if (existing) {
      existing.completedStep = item.completedStep ?? null;
      return;
    }
    this.wastes.set(item.id, {
      type: item.type,
      typeHistory: [...item.typeHistory],
      createdStep: item.createdStep,
      completedStep: item.completedStep ?? null,
      consumedStep: null,
      mergedFrom: item.mergedFrom ? [item.mergedFrom[0], item.mergedFrom[1]] : null,
    });
  }

  getCounters(): MetricsCounters {
    return { ...this.counters };
  }

  exportRun(meta: RunMeta): RunRecord {
    const wastes: Record<WasteId, WasteRecord> = {};
    for (const [id, record] of [...this.wastes].sort((a, b) => compareWasteIds(a[0], b[0]))) {
      wastes[id] = structuredClone(record);
    }
    const idleTicks: Record<string, number> = {};
    for (const [id, count] of [...this.idle].sort((a, b) => a[0] - b[0])) {
      idleTicks[String(id)] = count;
    }
    return {
      seed: meta.seed,
      width: meta.width,
      height: meta.height,
      ticks: this.lastTick,
      counters: this.getCounters(),
      wastes,
      aggregates: this.aggregates.map((a) => ({ ...a, zoneWaste: { ...a.zoneWaste } })),
      idleTicks,
    };
  }
}
