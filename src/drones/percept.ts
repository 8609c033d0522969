/**
 * Percept capture
 *
 * Builds the read-only neighbourhood view each drone deliberates on.
 * A drone sees its own cell and the four adjacent ones; beyond that it
 * only knows what the shared store reports.
 */

import { InvariantViolation } from '../core/errors.js';
import type { DroneId, Position, ZoneType } from '../core/types.js';
import type { Grid } from '../world/grid.js';
import type { KnowledgeView } from '../world/knowledge-store.js';
import type { WasteRegistry } from '../world/waste-registry.js';
import type { PerceivedWaste, Percept } from './types.js';

export interface PerceptSource {
  grid: Grid;
  registry: WasteRegistry;
  store: KnowledgeView;
}

/** Cells a drone standing at `pos` can see */
export function visibleCells(grid: Grid, pos: Position): Position[] {
  return [{ x: pos.x, y: pos.y }, ...grid.neighbors(pos)];
}

function wasteOn(source: PerceptSource, pos: Position): PerceivedWaste[] {
  const seen: PerceivedWaste[] = [];
  for (const wasteId of source.grid.wasteAt(pos)) {
    const item = source.registry.get(wasteId);
    if (!item) continue;
    const status = source.store.get(wasteId)?.status;
    seen.push({
      wasteId,
      type: item.type,
      position: { x: pos.x, y: pos.y },
      claimedBy: status && status.kind === 'claimed' ? status.droneId : null,
    });
  }
  return seen;
}

export function buildPercept(
  source: PerceptSource,
  droneId: DroneId,
  zoneType: ZoneType,
  tick: number,
  radius: number
): Percept {
  const { grid, store } = source;
  const position = grid.dronePosition(droneId);
  if (!position) {
    throw new InvariantViolation('DRONE_MISPLACED', `Drone ${droneId} is not on the grid`);
  }
  const boundaryColumn = grid.zoneEnd(zoneType);

  const neighbors = grid.neighbors(position).map((p) => ({
    position: p,
    droneId: grid.droneAt(p),
    reachable: p.x <= boundaryColumn,
    waste: wasteOn(source, p),
  }));

  const claimId = store.claimOf(droneId);
  const claim = claimId !== undefined ? store.get(claimId) ?? null : null;

  return {
    tick,
    position,
    zone: grid.zoneOf(position.x),
    boundaryColumn,
    scanBounds: {
      minX: grid.zoneStart(zoneType),
      maxX: zoneType === 2 ? grid.dropColumn - 1 : boundaryColumn,
      minY: 0,
      maxY: grid.height - 1,
    },
    onTransferColumn: grid.isTransferColumn(position.x),
    onDropColumn: grid.isDropColumn(position.x),
    cellWaste: wasteOn(source, position),
    cellHasRoom: grid.hasWasteRoom(position),
    neighbors,
    knownWaste: [...store.queryNearby(position, radius)],
    claim,
  };
}
