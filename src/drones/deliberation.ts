/**
 * Deliberation
 *
 * Ordered decision table, first match wins:
 *   transform > deposit > drop > advance-east > release > pick > explore
 *
 * Rules read only the percept and the drone's knowledge. The explore
 * callback is the one place a rule draws on the drone's RNG.
 */

import {
  manhattan,
  samePosition,
  type DeadlockPolicy,
  type DroneId,
  type Position,
  type WasteId,
  type WasteType,
  type ZoneType,
} from '../core/types.js';
import type { KnownWaste } from '../world/knowledge-store.js';
import {
  INVENTORY_CAPACITY,
  type Decision,
  type DecisionRule,
  type DroneAction,
  type DroneKnowledge,
  type InventoryItem,
  type Percept,
} from './types.js';

export interface DeliberationContext {
  droneId: DroneId;
  zoneType: ZoneType;
  inventory: readonly InventoryItem[];
  percept: Percept;
  knowledge: Pick<DroneKnowledge, 'justTransformed' | 'status' | 'ignoredWaste'>;
  deadlockPolicy: DeadlockPolicy;
  /** Explore movement target, null when boxed in */
  explore: () => Position | null;
}

export interface Rule {
  name: DecisionRule;
  decide: (ctx: DeliberationContext) => DroneAction | null;
}

/** Type a zone's drones carry east: t + 1, or red for the red zone */
export function outputType(zone: ZoneType): WasteType {
  return zone === 0 ? 1 : 2;
}

/** One step that shortens the Manhattan distance, horizontal moves first */
export function stepToward(percept: Percept, target: Position): Position | null {
  const here = manhattan(percept.position, target);
  const options = percept.neighbors.filter(
    (n) => n.reachable && n.droneId === null && manhattan(n.position, target) < here
  );
  const horizontal = options.find((n) => n.position.y === percept.position.y);
  return (horizontal ?? options[0])?.position ?? null;
}

export function exploreAction(ctx: DeliberationContext): DroneAction {
  const to = ctx.explore();
  return to ? { kind: 'move', to, reason: 'explore' } : { kind: 'noop', reason: 'boxed_in' };
}

function approach(ctx: DeliberationContext, target: KnownWaste): DroneAction {
  const to = stepToward(ctx.percept, target.position);
  return to
    ? { kind: 'move', to, reason: 'approach', claim: target.wasteId }
    : { kind: 'noop', reason: 'path_blocked', claim: target.wasteId };
}

function pickable(ctx: DeliberationContext, wasteId: WasteId): boolean {
  return !ctx.knowledge.ignoredWaste.has(wasteId);
}

/** The red zone's boundary is the drop column, where nothing can be picked */
function targetColumnAllowed(ctx: DeliberationContext, x: number): boolean {
  const { boundaryColumn } = ctx.percept;
  return ctx.zoneType === 2 ? x < boundaryColumn : x <= boundaryColumn;
}

export const DECISION_TABLE: readonly Rule[] = [
  {
    name: 'transform',
    decide: (ctx) =>
      ctx.zoneType !== 2 &&
      ctx.inventory.length === INVENTORY_CAPACITY &&
      ctx.inventory.every((w) => w.type === ctx.zoneType)
        ? { kind: 'transform' }
        : null,
  },
  {
    name: 'deposit',
    decide: (ctx) =>
      ctx.zoneType === 2 && ctx.percept.onDropColumn && ctx.inventory.length > 0
        ? { kind: 'deposit' }
        : null,
  },
  {
    name: 'drop',
    decide: (ctx) => {
      if (ctx.zoneType === 2) return null;
      if (ctx.percept.position.x !== ctx.percept.boundaryColumn || !ctx.percept.cellHasRoom) return null;
      const output = ctx.inventory.find((w) => w.type === outputType(ctx.zoneType));
      return output ? { kind: 'drop', wasteId: output.id } : null;
    },
  },
  {
    name: 'advance-east',
    decide: (ctx) => {
      const { percept } = ctx;
      if (ctx.inventory.length === 0 || percept.position.x >= percept.boundaryColumn) return null;
      const carryingOutput = ctx.inventory.some((w) => w.type === outputType(ctx.zoneType));
      if (!ctx.knowledge.justTransformed && !carryingOutput) return null;

      const east = percept.neighbors.find(
        (n) => n.position.x === percept.position.x + 1 && n.position.y === percept.position.y
      );
      if (east && east.reachable && east.droneId === null) {
        return { kind: 'move', to: east.position, reason: 'east' };
      }
      // Blocked: explore for this tick only
      return exploreAction(ctx);
    },
  },
  {
    name: 'release',
    decide: (ctx) => {
      if (ctx.deadlockPolicy !== 'release' || ctx.knowledge.status !== 'stalled') return null;
      const lone = ctx.inventory.length === 1 ? ctx.inventory[0] : undefined;
      if (!lone || lone.type !== ctx.zoneType || ctx.zoneType === 2) return null;
      if (!ctx.percept.cellHasRoom || ctx.percept.onTransferColumn) return null;
      return { kind: 'release', wasteId: lone.id };
    },
  },
  {
    name: 'pick',
    decide: (ctx) => {
      const { percept } = ctx;
      if (ctx.inventory.length >= INVENTORY_CAPACITY) return null;
      if (!ctx.inventory.every((w) => w.type === ctx.zoneType)) return null;

      if (targetColumnAllowed(ctx, percept.position.x)) {
        const here = percept.cellWaste.find(
          (w) =>
            w.type === ctx.zoneType &&
            pickable(ctx, w.wasteId) &&
            (w.claimedBy === null || w.claimedBy === ctx.droneId)
        );
        if (here) return { kind: 'pick', wasteId: here.wasteId };
      }

      if (percept.claim && !samePosition(percept.claim.position, percept.position)) {
        return approach(ctx, percept.claim);
      }

      const candidate = percept.knownWaste.find(
        (k) =>
          k.type === ctx.zoneType &&
          targetColumnAllowed(ctx, k.position.x) &&
          pickable(ctx, k.wasteId) &&
          !samePosition(k.position, percept.position)
      );
      return candidate ? approach(ctx, candidate) : null;
    },
  },
  {
    name: 'explore',
    decide: exploreAction,
  },
];

export function deliberate(ctx: DeliberationContext, table: readonly Rule[] = DECISION_TABLE): Decision {
  for (const rule of table) {
    const action = rule.decide(ctx);
    if (action) return { rule: rule.name, action };
  }
  return { rule: 'explore', action: { kind: 'noop', reason: 'no_rule' } };
}
