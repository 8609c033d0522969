/**
 * Simulation Validator
 *
 * Checks options and layouts before anything is built.
 * Only configuration problems surface to the caller; everything past
 * initialize is absorbed by the scheduler.
 */

import type { ValidationError } from '../core/errors.js';
import {
  DEADLOCK_POLICIES,
  EXPLORATION_STRATEGIES,
  isZoneType,
  positionKey,
  type Position,
  type ZoneType,
} from '../core/types.js';
import { allowedTypes } from '../drones/drone.js';
import { INVENTORY_CAPACITY } from '../drones/types.js';
import type { SimulationLayout, SimulationOptions, SimulationPolicies } from './types.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function isInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function checkMin(errors: ValidationError[], path: string, value: unknown, min: number): void {
  if (!isInt(value) || value < min) {
    errors.push({ path, message: `Must be an integer >= ${min}` });
  }
}

function checkDimensions(errors: ValidationError[], width: unknown, height: unknown): boolean {
  const before = errors.length;
  if (!isInt(width) || width < 3 || width % 3 !== 0) {
    errors.push({ path: 'width', message: 'Must be a positive integer divisible by 3' });
  }
  checkMin(errors, 'height', height, 1);
  return errors.length === before;
}

function checkPolicies(errors: ValidationError[], policies: Partial<SimulationPolicies>): void {
  if (policies.perceptionRadius !== undefined) {
    checkMin(errors, 'perceptionRadius', policies.perceptionRadius, 0);
  }
  if (policies.carryTimeout !== undefined) {
    checkMin(errors, 'carryTimeout', policies.carryTimeout, 0);
  }
  if (policies.claimTimeoutTicks !== undefined) {
    checkMin(errors, 'claimTimeoutTicks', policies.claimTimeoutTicks, 0);
  }
  if (policies.maxWastePerCell !== undefined) {
    checkMin(errors, 'maxWastePerCell', policies.maxWastePerCell, 1);
  }
  if (policies.maxTicks !== undefined) {
    checkMin(errors, 'maxTicks', policies.maxTicks, 0);
  }
  if (policies.strategy !== undefined && !EXPLORATION_STRATEGIES.includes(policies.strategy)) {
    errors.push({ path: 'strategy', message: `Must be one of ${EXPLORATION_STRATEGIES.join(', ')}` });
  }
  if (policies.deadlockPolicy !== undefined && !DEADLOCK_POLICIES.includes(policies.deadlockPolicy)) {
    errors.push({ path: 'deadlockPolicy', message: `Must be one of ${DEADLOCK_POLICIES.join(', ')}` });
  }
}

/** Columns a zone's initial waste may rest in; the drop column never holds spawned waste */
export function wasteColumns(width: number, zone: ZoneType): number {
  const zoneWidth = width / 3;
  return zone === 2 ? zoneWidth - 1 : zoneWidth;
}

/**
 * Validate options for a seeded random placement
 */
export function validateSimulationOptions(options: SimulationOptions): ValidationResult {
  const errors: ValidationError[] = [];
  const dimensionsOk = checkDimensions(errors, options.width, options.height);

  if (!Number.isFinite(options.seed)) {
    errors.push({ path: 'seed', message: 'Must be a finite number' });
  }

  checkPolicies(errors, options);

  const perCell = isInt(options.maxWastePerCell) && options.maxWastePerCell > 1 ? options.maxWastePerCell : 1;
  for (const zone of [0, 1, 2] as const) {
    const drones = options.zoneDroneCounts[zone];
    const waste = options.zoneWasteCounts[zone];
    checkMin(errors, `zoneDroneCounts[${zone}]`, drones, 0);
    checkMin(errors, `zoneWasteCounts[${zone}]`, waste, 0);

    if (!dimensionsOk || !isInt(drones) || !isInt(waste)) continue;

    const zoneCells = (options.width / 3) * options.height;
    if (drones > zoneCells) {
      errors.push({
        path: `zoneDroneCounts[${zone}]`,
        message: `Zone ${zone} has room for ${zoneCells} drones`,
      });
    }
    const wasteRoom = wasteColumns(options.width, zone) * options.height * perCell;
    if (waste > wasteRoom) {
      errors.push({
        path: `zoneWasteCounts[${zone}]`,
        message: `Zone ${zone} has room for ${wasteRoom} waste items`,
      });
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validate an explicit drone and waste layout
 */
export function validateLayout(
  layout: SimulationLayout,
  policies: Partial<SimulationPolicies> = {}
): ValidationResult {
  const errors: ValidationError[] = [];
  if (!checkDimensions(errors, layout.width, layout.height)) {
    return { valid: false, errors };
  }
  checkPolicies(errors, policies);

  const zoneWidth = layout.width / 3;
  const inBounds = (p: Position): boolean =>
    isInt(p.x) && isInt(p.y) && p.x >= 0 && p.x < layout.width && p.y >= 0 && p.y < layout.height;

  const occupied = new Set<string>();
  layout.drones.forEach((drone, i) => {
    const path = `drones[${i}]`;
    if (!isZoneType(drone.zoneType)) {
      errors.push({ path: `${path}.zoneType`, message: 'Must be 0, 1 or 2' });
      return;
    }
    if (!inBounds(drone.position)) {
      errors.push({ path: `${path}.position`, message: 'Outside the grid' });
      return;
    }
    if (drone.position.x > (drone.zoneType + 1) * zoneWidth - 1) {
      errors.push({ path: `${path}.position`, message: `Beyond zone ${drone.zoneType} reachable columns` });
    }
    const key = positionKey(drone.position);
    if (occupied.has(key)) {
      errors.push({ path: `${path}.position`, message: 'Cell already holds a drone' });
    }
    occupied.add(key);

    const inventory = drone.inventory ?? [];
    if (inventory.length > INVENTORY_CAPACITY) {
      errors.push({ path: `${path}.inventory`, message: `At most ${INVENTORY_CAPACITY} items` });
    }
    const allowed = allowedTypes(drone.zoneType);
    if (inventory.some((t) => !allowed.includes(t))) {
      errors.push({ path: `${path}.inventory`, message: `Zone ${drone.zoneType} drones carry ${allowed.join('/')}` });
    } else if (inventory.some((t) => t !== inventory[0])) {
      errors.push({ path: `${path}.inventory`, message: 'Items must share one type' });
    }
  });

  const perCell = new Map<string, number>();
  const capacity = policies.maxWastePerCell ?? 1;
  layout.wastes.forEach((waste, i) => {
    const path = `wastes[${i}]`;
    if (!isZoneType(waste.type)) {
      errors.push({ path: `${path}.type`, message: 'Must be 0, 1 or 2' });
    }
    if (!inBounds(waste.position)) {
      errors.push({ path: `${path}.position`, message: 'Outside the grid' });
      return;
    }
    if (waste.createdStep !== undefined) {
      checkMin(errors, `${path}.createdStep`, waste.createdStep, 0);
    }
    const key = positionKey(waste.position);
    const count = (perCell.get(key) ?? 0) + 1;
    perCell.set(key, count);
    if (count > capacity) {
      errors.push({ path: `${path}.position`, message: `Cell holds at most ${capacity} waste items` });
    }
  });

  return { valid: errors.length === 0, errors };
}
