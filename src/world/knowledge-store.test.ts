import { describe, it, expect } from 'vitest';
import { OccupancyError, RegistryError } from '../core/errors.js';
import { SharedKnowledgeStore } from './knowledge-store.js';

describe('SharedKnowledgeStore', () => {
  it('records sightings idempotently', () => {
    const store = new SharedKnowledgeStore();
    store.reportAvailable({ x: 1, y: 1 }, 'waste-1', 0);
    store.reportAvailable({ x: 1, y: 1 }, 'waste-1', 0);
    expect(store.size).toBe(1);
    expect(store.get('waste-1')).toEqual({
      wasteId: 'waste-1',
      type: 0,
      position: { x: 1, y: 1 },
      status: { kind: 'available' },
    });
  });

  describe('claims', () => {
    it('grants a claim to one drone only', () => {
      const store = new SharedKnowledgeStore();
      store.reportAvailable({ x: 0, y: 0 }, 'waste-1', 0);
      store.claim('waste-1', 1, 4);
      store.claim('waste-1', 1, 5);
      expect(store.get('waste-1')?.status).toEqual({ kind: 'claimed', droneId: 1, since: 4 });
      expect(() => store.claim('waste-1', 2, 5)).toThrow(OccupancyError);
      expect(store.claimOf(1)).toBe('waste-1');
      expect(store.claimOf(2)).toBeUndefined();
    });

    it('refuses claims on unknown waste', () => {
      expect(() => new SharedKnowledgeStore().claim('waste-9', 1, 1)).toThrow(RegistryError);
    });

    it('keeps a claim when the item is reported again', () => {
      const store = new SharedKnowledgeStore();
      store.reportAvailable({ x: 0, y: 0 }, 'waste-1', 0);
      store.claim('waste-1', 3, 1);
      store.reportAvailable({ x: 0, y: 0 }, 'waste-1', 0);
      expect(store.get('waste-1')?.status.kind).toBe('claimed');
    });

    it('releases claims individually and per drone', () => {
      const store = new SharedKnowledgeStore();
      store.reportAvailable({ x: 0, y: 0 }, 'waste-1', 0);
      store.reportAvailable({ x: 1, y: 0 }, 'waste-2', 0);
      store.reportAvailable({ x: 2, y: 0 }, 'waste-10', 0);
      store.claim('waste-10', 1, 1);
      store.claim('waste-2', 1, 1);
      store.claim('waste-1', 2, 1);

      expect(store.releaseAllFor(1)).toEqual(['waste-2', 'waste-10']);
      expect(store.release('waste-1')).toBe(true);
      expect(store.release('waste-1')).toBe(false);
    });

    it('expires claims after the timeout', () => {
      const store = new SharedKnowledgeStore();
      store.reportAvailable({ x: 0, y: 0 }, 'waste-1', 0);
      store.claim('waste-1', 1, 3);
      expect(store.expireClaims(10, 0)).toEqual([]);
      expect(store.expireClaims(7, 5)).toEqual([]);
      expect(store.expireClaims(8, 5)).toEqual(['waste-1']);
      expect(store.get('waste-1')?.status).toEqual({ kind: 'available' });
    });
  });

  describe('queryNearby', () => {
    it('yields available entries by distance then id', () => {
      const store = new SharedKnowledgeStore();
      store.reportAvailable({ x: 2, y: 0 }, 'waste-3', 0);
      store.reportAvailable({ x: 0, y: 2 }, 'waste-2', 0);
      store.reportAvailable({ x: 1, y: 0 }, 'waste-5', 0);
      store.reportAvailable({ x: 5, y: 5 }, 'waste-4', 0);
      store.reportAvailable({ x: 0, y: 1 }, 'waste-6', 0);
      store.claim('waste-6', 9, 1);

      const ids = [...store.queryNearby({ x: 0, y: 0 }, 2)].map((k) => k.wasteId);
      expect(ids).toEqual(['waste-5', 'waste-2', 'waste-3']);
    });

    it('is lazy', () => {
      const store = new SharedKnowledgeStore();
      store.reportAvailable({ x: 0, y: 0 }, 'waste-1', 0);
      store.reportAvailable({ x: 1, y: 0 }, 'waste-2', 0);
      const first = store.queryNearby({ x: 0, y: 0 }, 3).next();
      expect(first.done).toBe(false);
      expect(first.value?.wasteId).toBe('waste-1');
    });
  });

  it('forgets collected items', () => {
    const store = new SharedKnowledgeStore();
    store.reportAvailable({ x: 0, y: 0 }, 'waste-1', 0);
    expect(store.forget('waste-1')).toBe(true);
    expect(store.get('waste-1')).toBeUndefined();
    expect(store.snapshot()).toEqual([]);
  });
});
