/**
 * Decision table tests
 *
 * Percepts are captured from a real grid so each rule sees exactly what
 * the scheduler would hand it.
 */

import { describe, it, expect } from 'vitest';
import type { Position, ZoneType } from '../core/types.js';
import { Grid } from '../world/grid.js';
import { SharedKnowledgeStore } from '../world/knowledge-store.js';
import { WasteRegistry } from '../world/waste-registry.js';
import { deliberate, stepToward, type DeliberationContext } from './deliberation.js';
import { buildPercept, type PerceptSource } from './percept.js';
import type { InventoryItem, Percept } from './types.js';

const EXPLORE_TARGET: Position = { x: -1, y: -1 };

function world(): PerceptSource & { grid: Grid; registry: WasteRegistry; store: SharedKnowledgeStore } {
  const grid = new Grid({ width: 9, height: 3 });
  return { grid, registry: new WasteRegistry(grid), store: new SharedKnowledgeStore() };
}

function perceive(w: PerceptSource, zone: ZoneType, pos: Position, droneId = 1): Percept {
  w.grid.placeDrone(droneId, pos);
  return buildPercept(w, droneId, zone, 1, 4);
}

function context(
  percept: Percept,
  zoneType: ZoneType,
  inventory: InventoryItem[] = [],
  overrides: Partial<DeliberationContext> = {}
): DeliberationContext {
  return {
    droneId: 1,
    zoneType,
    inventory,
    percept,
    knowledge: { justTransformed: false, status: 'idle', ignoredWaste: new Set() },
    deadlockPolicy: 'none',
    explore: () => EXPLORE_TARGET,
    ...overrides,
  };
}

const green = (id: string): InventoryItem => ({ id, type: 0 });
const yellow = (id: string): InventoryItem => ({ id, type: 1 });
const red = (id: string): InventoryItem => ({ id, type: 2 });

describe('deliberate', () => {
  describe('transform', () => {
    it('fires with two own-type items, ahead of any movement', () => {
      const w = world();
      const percept = perceive(w, 0, { x: 1, y: 1 });
      expect(deliberate(context(percept, 0, [green('a'), green('b')]))).toEqual({
        rule: 'transform',
        action: { kind: 'transform' },
      });
    });

    it('never fires for the red zone', () => {
      const w = world();
      const percept = perceive(w, 2, { x: 8, y: 0 });
      expect(deliberate(context(percept, 2, [red('a'), red('b')])).rule).toBe('deposit');
    });
  });

  describe('deposit and drop', () => {
    it('deposits red waste on the drop column', () => {
      const w = world();
      const percept = perceive(w, 2, { x: 8, y: 1 });
      expect(deliberate(context(percept, 2, [red('r')])).action).toEqual({ kind: 'deposit' });
    });

    it('drops the output item on the transfer column', () => {
      const w = world();
      const percept = perceive(w, 0, { x: 2, y: 1 });
      expect(deliberate(context(percept, 0, [yellow('waste-9')]))).toEqual({
        rule: 'drop',
        action: { kind: 'drop', wasteId: 'waste-9' },
      });
    });

    it('drops red waste at the yellow transfer column', () => {
      const w = world();
      const percept = perceive(w, 1, { x: 5, y: 0 });
      expect(deliberate(context(percept, 1, [red('r')])).action).toEqual({ kind: 'drop', wasteId: 'r' });
    });

    it('waits for room when the transfer cell already holds waste', () => {
      const w = world();
      w.registry.spawn(1, { x: 2, y: 1 }, 0);
      const percept = perceive(w, 0, { x: 2, y: 1 });
      expect(deliberate(context(percept, 0, [yellow('waste-9')]))).toEqual({
        rule: 'explore',
        action: { kind: 'move', to: EXPLORE_TARGET, reason: 'explore' },
      });
    });
  });

  describe('advance east', () => {
    it('moves one column east while carrying output', () => {
      const w = world();
      const percept = perceive(w, 0, { x: 1, y: 1 });
      expect(deliberate(context(percept, 0, [yellow('y')]))).toEqual({
        rule: 'advance-east',
        action: { kind: 'move', to: { x: 2, y: 1 }, reason: 'east' },
      });
    });

    it('explores for one tick when the east cell holds a drone', () => {
      const w = world();
      w.grid.placeDrone(2, { x: 2, y: 1 });
      const percept = perceive(w, 0, { x: 1, y: 1 });
      expect(deliberate(context(percept, 0, [yellow('y')]))).toEqual({
        rule: 'advance-east',
        action: { kind: 'move', to: EXPLORE_TARGET, reason: 'explore' },
      });
    });

    it('moves red waste toward the drop column', () => {
      const w = world();
      const percept = perceive(w, 2, { x: 6, y: 2 });
      expect(deliberate(context(percept, 2, [red('r')])).action).toEqual({
        kind: 'move',
        to: { x: 7, y: 2 },
        reason: 'east',
      });
    });
  });

  describe('release', () => {
    const stalled = { justTransformed: false, status: 'stalled' as const, ignoredWaste: new Set<string>() };

    it('puts a lone item down when stalled under the release policy', () => {
      const w = world();
      const percept = perceive(w, 0, { x: 1, y: 1 });
      const ctx = context(percept, 0, [green('waste-4')], { knowledge: stalled, deadlockPolicy: 'release' });
      expect(deliberate(ctx)).toEqual({ rule: 'release', action: { kind: 'release', wasteId: 'waste-4' } });
    });

    it('keeps the item under the default policy', () => {
      const w = world();
      const percept = perceive(w, 0, { x: 1, y: 1 });
      const ctx = context(percept, 0, [green('waste-4')], { knowledge: stalled });
      expect(deliberate(ctx).rule).toBe('explore');
    });

    it('never releases onto a transfer column', () => {
      const w = world();
      const percept = perceive(w, 0, { x: 2, y: 1 });
      const ctx = context(percept, 0, [green('waste-4')], { knowledge: stalled, deadlockPolicy: 'release' });
      expect(deliberate(ctx).rule).toBe('explore');
    });
  });

  describe('pick', () => {
    it('picks compatible waste on the current cell', () => {
      const w = world();
      w.registry.spawn(0, { x: 0, y: 0 }, 0);
      const percept = perceive(w, 0, { x: 0, y: 0 });
      expect(deliberate(context(percept, 0))).toEqual({
        rule: 'pick',
        action: { kind: 'pick', wasteId: 'waste-1' },
      });
    });

    it('ignores waste of another type', () => {
      const w = world();
      w.registry.spawn(1, { x: 0, y: 0 }, 0);
      const percept = perceive(w, 0, { x: 0, y: 0 });
      expect(deliberate(context(percept, 0)).rule).toBe('explore');
    });

    it('leaves waste claimed by another drone', () => {
      const w = world();
      w.registry.spawn(0, { x: 0, y: 0 }, 0);
      w.store.reportAvailable({ x: 0, y: 0 }, 'waste-1', 0);
      w.store.claim('waste-1', 2, 1);
      const percept = perceive(w, 0, { x: 0, y: 0 });
      expect(deliberate(context(percept, 0)).rule).toBe('explore');
    });

    it('keeps approaching its existing claim', () => {
      const w = world();
      w.registry.spawn(0, { x: 0, y: 2 }, 0);
      w.store.reportAvailable({ x: 0, y: 2 }, 'waste-1', 0);
      w.store.claim('waste-1', 1, 1);
      const percept = perceive(w, 0, { x: 0, y: 0 });
      expect(deliberate(context(percept, 0))).toEqual({
        rule: 'pick',
        action: { kind: 'move', to: { x: 0, y: 1 }, reason: 'approach', claim: 'waste-1' },
      });
    });

    it('waits holding the claim when every step toward it is blocked', () => {
      const w = world();
      w.registry.spawn(0, { x: 0, y: 2 }, 0);
      w.store.reportAvailable({ x: 0, y: 2 }, 'waste-1', 0);
      w.store.claim('waste-1', 1, 1);
      w.grid.placeDrone(2, { x: 0, y: 1 });
      const percept = perceive(w, 0, { x: 0, y: 0 });
      expect(deliberate(context(percept, 0)).action).toEqual({
        kind: 'noop',
        reason: 'path_blocked',
        claim: 'waste-1',
      });
    });

    it('targets the nearest compatible known waste', () => {
      const w = world();
      w.store.reportAvailable({ x: 2, y: 0 }, 'waste-1', 0);
      w.store.reportAvailable({ x: 1, y: 0 }, 'waste-2', 1);
      const percept = perceive(w, 0, { x: 0, y: 0 });
      expect(deliberate(context(percept, 0)).action).toEqual({
        kind: 'move',
        to: { x: 1, y: 0 },
        reason: 'approach',
        claim: 'waste-1',
      });
    });

    it('skips waste it released earlier', () => {
      const w = world();
      w.store.reportAvailable({ x: 2, y: 0 }, 'waste-1', 0);
      const percept = perceive(w, 0, { x: 0, y: 0 });
      const ctx = context(percept, 0, [], {
        knowledge: { justTransformed: false, status: 'idle', ignoredWaste: new Set(['waste-1']) },
      });
      expect(deliberate(ctx).rule).toBe('explore');
    });

    it('never targets red waste on the drop column', () => {
      const w = world();
      w.store.reportAvailable({ x: 8, y: 1 }, 'waste-1', 2);
      const percept = perceive(w, 2, { x: 7, y: 1 });
      expect(deliberate(context(percept, 2)).rule).toBe('explore');
    });

    it('does not pick while carrying output', () => {
      const w = world();
      w.registry.spawn(0, { x: 2, y: 0 }, 0);
      const percept = perceive(w, 0, { x: 2, y: 0 });
      expect(deliberate(context(percept, 0, [yellow('y')])).rule).toBe('explore');
    });
  });

  describe('explore', () => {
    it('waits when boxed in', () => {
      const w = world();
      const percept = perceive(w, 0, { x: 0, y: 0 });
      expect(deliberate(context(percept, 0, [], { explore: () => null }))).toEqual({
        rule: 'explore',
        action: { kind: 'noop', reason: 'boxed_in' },
      });
    });

    it('falls back to a no-op when no rule matches', () => {
      const w = world();
      const percept = perceive(w, 0, { x: 0, y: 0 });
      expect(deliberate(context(percept, 0), [])).toEqual({
        rule: 'explore',
        action: { kind: 'noop', reason: 'no_rule' },
      });
    });
  });
});

describe('stepToward', () => {
  it('prefers horizontal steps', () => {
    const w = world();
    const percept = perceive(w, 1, { x: 3, y: 0 });
    expect(stepToward(percept, { x: 5, y: 2 })).toEqual({ x: 4, y: 0 });
  });

  it('stays inside reachable columns', () => {
    const w = world();
    const percept = perceive(w, 0, { x: 2, y: 0 });
    expect(stepToward(percept, { x: 4, y: 0 })).toBeNull();
  });
});

describe('buildPercept', () => {
  it('bounds the sweep to the own zone, short of the drop column', () => {
    const w = world();
    expect(perceive(w, 2, { x: 6, y: 0 }).scanBounds).toEqual({ minX: 6, maxX: 7, minY: 0, maxY: 2 });
    expect(perceive(w, 1, { x: 4, y: 1 }, 2).scanBounds).toEqual({ minX: 3, maxX: 5, minY: 0, maxY: 2 });
  });
});
