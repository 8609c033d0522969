/**
 * Zone Relay - Errors
 *
 * Every failure raised by the world model carries a code.
 * The scheduler absorbs occupancy and registry errors as NoOp;
 * invariant violations abort the run.
 */

export type BoundsErrorCode = 'OUT_OF_BOUNDS';
export type OccupancyErrorCode = 'CELL_OCCUPIED' | 'ALREADY_CLAIMED';
export type RegistryErrorCode =
  | 'EMPTY_CELL'
  | 'INCOMPATIBLE_ITEMS'
  | 'ALREADY_COMPLETED'
  | 'UNKNOWN_WASTE';
export type InvariantErrorCode =
  | 'INCOMPATIBLE_WASTE_TYPE'
  | 'INVENTORY_OVERFLOW'
  | 'DRONE_MISPLACED';
export type ConfigErrorCode = 'INVALID_CONFIG';
export type StateErrorCode = 'SIMULATION_STOPPED';

export type SimulationErrorCode =
  | BoundsErrorCode
  | OccupancyErrorCode
  | RegistryErrorCode
  | InvariantErrorCode
  | ConfigErrorCode
  | StateErrorCode;

/** Validation error */
export interface ValidationError {
  path: string;
  message: string;
}

export abstract class SimulationError<C extends SimulationErrorCode = SimulationErrorCode> extends Error {
  readonly code: C;

  constructor(code: C, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Position outside the grid. Fatal to the call, not the run. */
export class BoundsError extends SimulationError<BoundsErrorCode> {}

/** Cell or claim conflict. Always recovered as NoOp. */
export class OccupancyError extends SimulationError<OccupancyErrorCode> {}

/** Missing, incompatible or already completed waste. Recovered as NoOp. */
export class RegistryError extends SimulationError<RegistryErrorCode> {}

/** An impossible state; aborts the run. */
export class InvariantViolation extends SimulationError<InvariantErrorCode> {}

export class StateError extends SimulationError<StateErrorCode> {}

export class ConfigError extends SimulationError<ConfigErrorCode> {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(
      'INVALID_CONFIG',
      `Invalid configuration: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`
    );
    this.errors = errors;
  }
}

/** Errors that normal drone behaviour can produce and the scheduler turns into NoOp */
export function isRecoverable(error: unknown): error is OccupancyError | RegistryError {
  return error instanceof OccupancyError || error instanceof RegistryError;
}
