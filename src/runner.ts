#!/usr/bin/env node
/**
 * Zone Relay - Runner
 *
 * Drives one simulation run from env/CLI configuration and logs
 * summaries as JSON lines.
 */

import {
  loadConfig,
  parseCliArgs,
  mergeConfig,
  setVerbose,
  logError,
  logRunEvent,
  ZONE_TYPES,
  WASTE_COLORS,
} from './core/index.js';
import { Simulation, optionsFromConfig, type TickReport } from './simulation/index.js';

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function summarize(sim: Simulation, report?: TickReport): Record<string, unknown> {
  const record = sim.exportRun();
  const latest = record.aggregates[record.aggregates.length - 1];
  const zoneWaste: Record<string, number> = {};
  for (const zone of ZONE_TYPES) {
    zoneWaste[WASTE_COLORS[zone]] = latest?.zoneWaste[zone] ?? 0;
  }
  return {
    zoneWaste,
    completed: latest?.completed ?? 0,
    stalledDrones: latest?.stalledDrones ?? 0,
    conflicts: report?.conflicts.length ?? 0,
    ...record.counters,
  };
}

async function main(): Promise<void> {
  const envConfig = loadConfig();
  const cliOverrides = parseCliArgs(process.argv.slice(2));
  const config = mergeConfig(envConfig, cliOverrides);

  setVerbose(config.verbose);

  logRunEvent('runner_start', 0, {
    width: config.width,
    height: config.height,
    ticks: config.ticks,
    tickIntervalMs: config.tickIntervalMs,
  });

  const sim = Simulation.initialize(optionsFromConfig(config));
  sim.start();

  const shutdown = (reason: string): void => {
    logRunEvent('runner_shutdown', sim.tick, { reason });
    sim.stop();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  while (sim.state !== 'stopped') {
    const report = sim.step();

    if (config.summaryEvery > 0 && report.tick % config.summaryEvery === 0) {
      logRunEvent('tick_summary', report.tick, summarize(sim, report));
    }

    // Yields to the event loop so signals get through
    await sleep(config.tickIntervalMs);
  }

  logRunEvent('runner_complete', sim.tick, summarize(sim));
}

main().catch((error: unknown) => {
  logError(null, null, 0, error, 'runner_fatal');
  process.exit(1);
});
