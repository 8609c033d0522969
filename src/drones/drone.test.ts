import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InvariantViolation } from '../core/errors.js';
import { logDecision } from '../core/logger.js';
import { Grid } from '../world/grid.js';
import { SharedKnowledgeStore } from '../world/knowledge-store.js';
import { WasteRegistry } from '../world/waste-registry.js';
import { Drone, allowedTypes, createDrone } from './drone.js';
import { buildPercept } from './percept.js';
import type { DroneConfig } from './types.js';

vi.mock('../core/logger.js', () => ({
  logDecision: vi.fn(),
}));

const baseConfig: DroneConfig = {
  id: 1,
  zoneType: 0,
  seed: 1234,
  strategy: 'random-walk',
  deadlockPolicy: 'none',
  carryTimeout: 3,
};

function expectCode(fn: () => void, code: string): void {
  try {
    fn();
    expect.fail(`expected ${code}`);
  } catch (error) {
    expect(error).toBeInstanceOf(InvariantViolation);
    expect(error instanceof InvariantViolation && error.code).toBe(code);
  }
}

describe('Drone', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('lists the types each zone may carry', () => {
    expect(allowedTypes(0)).toEqual([0, 1]);
    expect(allowedTypes(1)).toEqual([1, 2]);
    expect(allowedTypes(2)).toEqual([2]);
  });

  describe('perceive and deliberate', () => {
    function setup() {
      const grid = new Grid({ width: 9, height: 3 });
      const registry = new WasteRegistry(grid);
      const store = new SharedKnowledgeStore();
      grid.placeDrone(1, { x: 0, y: 0 });
      registry.spawn(0, { x: 0, y: 0 }, 0);
      return { grid, registry, store };
    }

    it('counts visits and follows the store for its claim', () => {
      const source = setup();
      source.store.reportAvailable({ x: 0, y: 0 }, 'waste-1', 0);
      source.store.claim('waste-1', 1, 1);
      const drone = createDrone(baseConfig);

      drone.perceive(buildPercept(source, 1, 0, 1, 4));
      drone.perceive(buildPercept(source, 1, 0, 2, 4));
      expect(drone.getKnowledge().visited.get('0,0')).toBe(2);
      expect(drone.getKnowledge().claim).toBe('waste-1');

      source.store.release('waste-1');
      drone.perceive(buildPercept(source, 1, 0, 3, 4));
      expect(drone.getKnowledge().claim).toBeNull();
    });

    it('records the decision and logs it', () => {
      const source = setup();
      const drone = new Drone(baseConfig);
      drone.perceive(buildPercept(source, 1, 0, 5, 4));

      const decision = drone.deliberate();
      expect(decision).toEqual({ rule: 'pick', action: { kind: 'pick', wasteId: 'waste-1' } });
      expect(drone.getKnowledge().actions).toEqual(['pick']);
      expect(drone.getLastDecision()).toEqual(decision);
      expect(logDecision).toHaveBeenCalledWith(1, 0, 5, 'pick', 'pick');
    });

    it('keeps a bounded action history', () => {
      const source = setup();
      const drone = new Drone(baseConfig);
      drone.perceive(buildPercept(source, 1, 0, 1, 4));
      for (let i = 0; i < 25; i++) drone.deliberate();
      expect(drone.getKnowledge().actions).toHaveLength(20);
    });

    it('draws one explore target per tick, shared with the claim fallback', () => {
      const grid = new Grid({ width: 9, height: 3 });
      const source = { grid, registry: new WasteRegistry(grid), store: new SharedKnowledgeStore() };
      grid.placeDrone(2, { x: 4, y: 1 });
      const drone = createDrone({ ...baseConfig, id: 2, zoneType: 1, strategy: 'spiral-search' });

      drone.perceive(buildPercept(source, 2, 1, 1, 4));
      expect(drone.deliberate()).toEqual({
        rule: 'explore',
        action: { kind: 'move', to: { x: 5, y: 1 }, reason: 'explore' },
      });
      expect(drone.exploreFallback()).toEqual({ x: 5, y: 1 });

      grid.moveDrone(2, { x: 4, y: 1 }, { x: 5, y: 1 });
      drone.perceive(buildPercept(source, 2, 1, 2, 4));
      // The spiral turns north after its first step
      expect(drone.deliberate().action).toEqual({ kind: 'move', to: { x: 5, y: 0 }, reason: 'explore' });
    });

    it('refuses to deliberate before its first percept', () => {
      expectCode(() => new Drone(baseConfig).deliberate(), 'DRONE_MISPLACED');
    });
  });

  describe('inventory', () => {
    it('rejects types outside its zone', () => {
      const drone = new Drone(baseConfig);
      expectCode(() => drone.hold({ id: 'r', type: 2 }), 'INCOMPATIBLE_WASTE_TYPE');
    });

    it('rejects mixing types', () => {
      const drone = new Drone(baseConfig);
      drone.hold({ id: 'g', type: 0 });
      expectCode(() => drone.hold({ id: 'y', type: 1 }), 'INCOMPATIBLE_WASTE_TYPE');
    });

    it('holds at most two items', () => {
      const drone = new Drone(baseConfig);
      drone.hold({ id: 'a', type: 0 });
      drone.hold({ id: 'b', type: 0 });
      expectCode(() => drone.hold({ id: 'c', type: 0 }), 'INVENTORY_OVERFLOW');
    });

    it('sets and clears the just-transformed flag', () => {
      const drone = new Drone(baseConfig);
      drone.hold({ id: 'a', type: 0 });
      drone.hold({ id: 'b', type: 0 });
      drone.completeTransform({ id: 'y', type: 1 });
      expect(drone.getInventory()).toEqual([{ id: 'y', type: 1 }]);
      expect(drone.getKnowledge().justTransformed).toBe(true);

      expect(drone.remove('y')).toEqual({ id: 'y', type: 1 });
      expect(drone.getKnowledge().justTransformed).toBe(false);
      expect(drone.remove('y')).toBeUndefined();
    });
  });

  describe('carry timeout', () => {
    it('stalls once a lone item has been carried for the timeout', () => {
      const drone = new Drone(baseConfig);
      drone.hold({ id: 'g', type: 0 });

      expect(drone.endTick()).toBe(false);
      expect(drone.getKnowledge().carryTimeout).toBe(2);
      expect(drone.endTick()).toBe(false);
      expect(drone.endTick()).toBe(true);
      expect(drone.getKnowledge().status).toBe('stalled');
      expect(drone.endTick()).toBe(false);
      expect(drone.getKnowledge().status).toBe('stalled');
    });

    it('resets when the pair is complete', () => {
      const drone = new Drone(baseConfig);
      drone.hold({ id: 'a', type: 0 });
      drone.endTick();
      drone.endTick();
      drone.endTick();
      drone.hold({ id: 'b', type: 0 });
      expect(drone.endTick()).toBe(false);
      expect(drone.getKnowledge()).toMatchObject({ carryTimeout: 3, status: 'working' });
    });

    it('never runs for red drones or when disabled', () => {
      const red = new Drone({ ...baseConfig, zoneType: 2 });
      red.hold({ id: 'r', type: 2 });
      const disabled = new Drone({ ...baseConfig, carryTimeout: 0 });
      disabled.hold({ id: 'g', type: 0 });
      for (let i = 0; i < 5; i++) {
        expect(red.endTick()).toBe(false);
        expect(disabled.endTick()).toBe(false);
      }
      expect(red.getKnowledge().status).toBe('working');
      expect(disabled.getKnowledge().status).toBe('working');
    });
  });

  it('snapshots its visible state', () => {
    const drone = new Drone({ ...baseConfig, id: 4, zoneType: 1 });
    drone.hold({ id: 'waste-2', type: 1 });
    expect(drone.snapshot({ x: 3, y: 2 })).toEqual({
      id: 4,
      zoneType: 1,
      position: { x: 3, y: 2 },
      inventory: [{ id: 'waste-2', type: 1 }],
      status: 'idle',
      claim: null,
      justTransformed: false,
      carryTimeout: 3,
      lastRule: null,
      lastAction: null,
    });
  });
});
