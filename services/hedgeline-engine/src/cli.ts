#!/usr/bin/env node
import 'dotenv/config';

import { Logger, parseLogLevel } from '@hedgeline/shared';
import chalk from 'chalk';
import { Command } from 'commander';

import { loadConfigFromEnvironment } from './config/EnvironmentLoader';
import { createEngine, createSimulatedVenues, guardVenue } from './engine/createEngine';
import type { CycleResult } from './types/cycle';

interface CliOptions {
  singleCycle: boolean;
  logLevel?: string;
  sequential: boolean;
}

function printResult(result: CycleResult): void {
  const status = result.success ? chalk.green('OK') : chalk.red(result.state);
  console.log(
    `${status} cycle ${result.cycleId} ${result.token} ` +
      `A=${result.sideA ?? '-'} B=${result.sideB ?? '-'} size=${result.positionSize} ` +
      `value=$${result.positionValue.toFixed(2)} held=${result.actualHoldSeconds}s ` +
      `funding=$${result.fundingEarned.toFixed(4)}`,
  );
  if (result.errorMessage) {
    console.log(chalk.yellow(`  ${result.errorMessage}`));
  }
}

async function run(options: CliOptions): Promise<number> {
  const logger = Logger.getInstance('hedgeline');
  if (options.logLevel) {
    logger.setLogLevel(parseLogLevel(options.logLevel));
  }

  const loaded = loadConfigFromEnvironment();
  const config = options.sequential
    ? { ...loaded, execution: { ...loaded.execution, parallelOpen: false } }
    : loaded;
  if (!config.simulation.enabled) {
    console.error(chalk.red('Only simulation venues are bundled; set HEDGELINE_SIMULATION_MODE=true'));
    return 1;
  }

  const simulated = createSimulatedVenues(config);
  const venues = {
    A: guardVenue(simulated.A, config, logger),
    B: guardVenue(simulated.B, config, logger),
  };
  const engine = createEngine(config, venues, { logger });
  engine.on('cycle:end', printResult);
  engine.on('emergency', (action) => {
    console.error(chalk.red(`EMERGENCY ${action.reason}: ${action.details}`));
  });

  await engine.start();
  try {
    if (options.singleCycle) {
      const result = await engine.runCycle();
      return result.success ? 0 : 1;
    }
    await engine.runContinuous();
    return engine.getSafetyMonitor().emergencyTriggered ? 1 : 0;
  } finally {
    await engine.stop();
  }
}

const program = new Command();

program
  .name('hedgeline')
  .description('Delta-neutral funding-rate cycle engine')
  .version('0.1.0')
  .option('--single-cycle', 'Run one cycle and exit', false)
  .option('--log-level <level>', 'DEBUG, INFO, WARN or ERROR')
  .option('--sequential', 'Open the two legs one after another', false)
  .action(async (options: CliOptions) => {
    process.exitCode = await run(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
