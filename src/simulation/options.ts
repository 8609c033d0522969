/**
 * Runner configuration → simulation options
 */

import type { RunnerConfig } from '../core/config.js';
import type { SimulationOptions } from './types.js';

export function optionsFromConfig(config: RunnerConfig): SimulationOptions {
  return {
    width: config.width,
    height: config.height,
    zoneWasteCounts: [config.greenWaste, config.yellowWaste, config.redWaste],
    zoneDroneCounts: [config.greenDrones, config.yellowDrones, config.redDrones],
    seed: config.baseSeed,
    perceptionRadius: config.perceptionRadius,
    strategy: config.strategy,
    deadlockPolicy: config.deadlockPolicy,
    carryTimeout: config.carryTimeout,
    claimTimeoutTicks: config.claimTimeoutTicks,
    maxWastePerCell: config.maxWastePerCell,
    maxTicks: config.ticks,
  };
}
