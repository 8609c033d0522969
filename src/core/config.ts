/**
 * Zone Relay - Configuration
 *
 * Parses environment variables and CLI arguments.
 * Env vars take precedence over defaults, CLI flags over env vars.
 */

import { ConfigError } from './errors.js';
import {
  DEADLOCK_POLICIES,
  EXPLORATION_STRATEGIES,
  type DeadlockPolicy,
  type ExplorationStrategyName,
  type ZoneType,
} from './types.js';

export interface RunnerConfig {
  /** Grid width, must be divisible by 3 */
  width: number;
  /** Grid height */
  height: number;
  /** Initial waste per zone */
  greenWaste: number;
  yellowWaste: number;
  redWaste: number;
  /** Drones per zone */
  greenDrones: number;
  yellowDrones: number;
  redDrones: number;
  /** Base random seed */
  baseSeed: number;
  /** Tick limit for the run */
  ticks: number;
  /** Delay between ticks in milliseconds (0 runs flat out) */
  tickIntervalMs: number;
  /** Manhattan radius for shared knowledge queries */
  perceptionRadius: number;
  /** Explore rule movement */
  strategy: ExplorationStrategyName;
  /** What a stalled drone does */
  deadlockPolicy: DeadlockPolicy;
  /** Ticks a drone may hold a lone item before it counts as stalled */
  carryTimeout: number;
  /** Claim expiry in ticks (0 keeps claims until pickup) */
  claimTimeoutTicks: number;
  /** Resting waste items a cell may hold */
  maxWastePerCell: number;
  /** Tick summary period */
  summaryEvery: number;
  /** Enable verbose logging */
  verbose: boolean;
}

export const DEFAULT_CONFIG: RunnerConfig = {
  width: 9,
  height: 6,
  greenWaste: 8,
  yellowWaste: 2,
  redWaste: 1,
  greenDrones: 3,
  yellowDrones: 2,
  redDrones: 2,
  baseSeed: 42,
  ticks: 200,
  tickIntervalMs: 0,
  perceptionRadius: 4,
  strategy: 'random-walk',
  deadlockPolicy: 'none',
  carryTimeout: 50,
  claimTimeoutTicks: 0,
  maxWastePerCell: 1,
  summaryEvery: 10,
  verbose: false,
};

function parseIntEnv(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined) return fallback;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function parseBoolEnv(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val.toLowerCase() === 'true' || val === '1';
}

function parseChoice<T extends string>(path: string, value: string, choices: readonly T[]): T {
  const match = choices.find((c) => c === value);
  if (match === undefined) {
    throw new ConfigError([{ path, message: `Must be one of ${choices.join(', ')}` }]);
  }
  return match;
}

function parseChoiceEnv<T extends string>(key: string, choices: readonly T[], fallback: T): T {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return parseChoice(key, val, choices);
}

export function loadConfig(): RunnerConfig {
  return {
    width: parseIntEnv('ZR_WIDTH', DEFAULT_CONFIG.width),
    height: parseIntEnv('ZR_HEIGHT', DEFAULT_CONFIG.height),
    greenWaste: parseIntEnv('ZR_GREEN_WASTE', DEFAULT_CONFIG.greenWaste),
    yellowWaste: parseIntEnv('ZR_YELLOW_WASTE', DEFAULT_CONFIG.yellowWaste),
    redWaste: parseIntEnv('ZR_RED_WASTE', DEFAULT_CONFIG.redWaste),
    greenDrones: parseIntEnv('ZR_GREEN_DRONES', DEFAULT_CONFIG.greenDrones),
    yellowDrones: parseIntEnv('ZR_YELLOW_DRONES', DEFAULT_CONFIG.yellowDrones),
    redDrones: parseIntEnv('ZR_RED_DRONES', DEFAULT_CONFIG.redDrones),
    baseSeed: parseIntEnv('ZR_SEED', DEFAULT_CONFIG.baseSeed),
    ticks: parseIntEnv('ZR_TICKS', DEFAULT_CONFIG.ticks),
    tickIntervalMs: parseIntEnv('ZR_TICK_INTERVAL_MS', DEFAULT_CONFIG.tickIntervalMs),
    perceptionRadius: parseIntEnv('ZR_PERCEPTION_RADIUS', DEFAULT_CONFIG.perceptionRadius),
    strategy: parseChoiceEnv('ZR_STRATEGY', EXPLORATION_STRATEGIES, DEFAULT_CONFIG.strategy),
    deadlockPolicy: parseChoiceEnv('ZR_DEADLOCK_POLICY', DEADLOCK_POLICIES, DEFAULT_CONFIG.deadlockPolicy),
    carryTimeout: parseIntEnv('ZR_CARRY_TIMEOUT', DEFAULT_CONFIG.carryTimeout),
    claimTimeoutTicks: parseIntEnv('ZR_CLAIM_TIMEOUT', DEFAULT_CONFIG.claimTimeoutTicks),
    maxWastePerCell: parseIntEnv('ZR_WASTE_PER_CELL', DEFAULT_CONFIG.maxWastePerCell),
    summaryEvery: parseIntEnv('ZR_SUMMARY_EVERY', DEFAULT_CONFIG.summaryEvery),
    verbose: parseBoolEnv('ZR_VERBOSE', DEFAULT_CONFIG.verbose),
  };
}

export function parseCliArgs(args: string[]): Partial<RunnerConfig> {
  const result: Partial<RunnerConfig> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--width':
        if (next) result.width = parseInt(next, 10);
        i++;
        break;
      case '--height':
        if (next) result.height = parseInt(next, 10);
        i++;
        break;
      case '--green-waste':
        if (next) result.greenWaste = parseInt(next, 10);
        i++;
        break;
      case '--yellow-waste':
        if (next) result.yellowWaste = parseInt(next, 10);
        i++;
        break;
      case '--red-waste':
        if (next) result.redWaste = parseInt(next, 10);
        i++;
        break;
      case '--green':
        if (next) result.greenDrones = parseInt(next, 10);
        i++;
        break;
      case '--yellow':
        if (next) result.yellowDrones = parseInt(next, 10);
        i++;
        break;
      case '--red':
        if (next) result.redDrones = parseInt(next, 10);
        i++;
        break;
      case '--seed':
        if (next) result.baseSeed = parseInt(next, 10);
        i++;
        break;
      case '--ticks':
        if (next) result.ticks = parseInt(next, 10);
        i++;
        break;
      case '--tick-interval':
        if (next) result.tickIntervalMs = parseInt(next, 10);
        i++;
        break;
      case '--radius':
        if (next) result.perceptionRadius = parseInt(next, 10);
        i++;
        break;
      case '--strategy':
        if (next) result.strategy = parseChoice('--strategy', next, EXPLORATION_STRATEGIES);
        i++;
        break;
      case '--deadlock-policy':
        if (next) result.deadlockPolicy = parseChoice('--deadlock-policy', next, DEADLOCK_POLICIES);
        i++;
        break;
      case '--carry-timeout':
        if (next) result.carryTimeout = parseInt(next, 10);
        i++;
        break;
      case '--claim-timeout':
        if (next) result.claimTimeoutTicks = parseInt(next, 10);
        i++;
        break;
      case '--waste-per-cell':
        if (next) result.maxWastePerCell = parseInt(next, 10);
        i++;
        break;
      case '--summary-every':
        if (next) result.summaryEvery = parseInt(next, 10);
        i++;
        break;
      case '--verbose':
      case '-v':
        result.verbose = true;
        break;
    }
  }

  return result;
}

export function mergeConfig(envConfig: RunnerConfig, cliOverrides: Partial<RunnerConfig>): RunnerConfig {
  return { ...envConfig, ...cliOverrides };
}

export function getDroneSeed(baseSeed: number, zone: ZoneType, index: number): number {
  // Deterministic seed per drone: baseSeed, zone and index
  const zoneOffsets: Record<ZoneType, number> = {
    0: 0,
    1: 1000,
    2: 2000,
  };
  return baseSeed * 31 + zoneOffsets[zone] + index;
}
