/**
 * Zone Relay - Logger
 *
 * JSON line logging for structured output.
 * Format: { ts, droneId, zone, step, tick, details? }
 */

import type { DroneId, LogEntry, ZoneType } from './types.js';

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function log(entry: Omit<LogEntry, 'ts'>): void {
  const fullEntry: LogEntry = {
    ts: new Date().toISOString(),
    ...entry,
  };
  console.log(JSON.stringify(fullEntry));
}

export function logVerbose(entry: Omit<LogEntry, 'ts'>): void {
  if (!verbose) return;
  log(entry);
}

export function logError(
  droneId: DroneId | null,
  zone: ZoneType | null,
  tick: number,
  error: unknown,
  context?: string
): void {
  log({
    droneId,
    zone,
    step: 'error',
    tick,
    details: {
      context,
      code: error instanceof Error && 'code' in error ? String(error.code) : undefined,
      message: error instanceof Error ? error.message : String(error),
    },
  });
}

export function logRunEvent(step: string, tick: number, details?: Record<string, unknown>): void {
  log({
    droneId: null,
    zone: null,
    step,
    tick,
    details,
  });
}

export function logDecision(
  droneId: DroneId,
  zone: ZoneType,
  tick: number,
  rule: string,
  action: string
): void {
  logVerbose({
    droneId,
    zone,
    step: 'decide',
    tick,
    details: { rule, action },
  });
}

export function logConflict(
  droneId: DroneId,
  zone: ZoneType,
  tick: number,
  reason: string,
  details?: Record<string, unknown>
): void {
  logVerbose({
    droneId,
    zone,
    step: 'conflict',
    tick,
    details: { reason, ...details },
  });
}

export function logWasteEvent(
  droneId: DroneId,
  zone: ZoneType,
  tick: number,
  kind: string,
  wasteIds: string[]
): void {
  logVerbose({
    droneId,
    zone,
    step: kind,
    tick,
    details: { wasteIds },
  });
}

export function logStalled(
  droneId: DroneId,
  zone: ZoneType,
  tick: number,
  wasteId: string | undefined
): void {
  log({
    droneId,
    zone,
    step: 'stalled',
    tick,
    details: { wasteId, reason: 'carry_timeout' },
  });
}
