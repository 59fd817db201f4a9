#!/usr/bin/env tsx
/*
 * Headless driver that loads a synthetic world, runs snapshot cycles against
 * it and prints a single-line JSON summary to stdout. Exits non-zero when a
 * cycle could not write any document.
 */

import { Console } from 'node:console';
import path from 'node:path';
import process from 'node:process';

import { createConsoleTelemetry } from '@transit-telemetry/core';

import type { CliArgs } from './src/simulate.js';
import { CliUsageError, USAGE, parseArgs, runSimulation } from './src/simulate.js';
import { SimulationInputError, loadConfigFile, loadWorldFile } from './src/world-file.js';

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}\n`);
      console.error(USAGE);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  if (args.help || args.world === undefined) {
    // stdout stays reserved for the JSON summary.
    console.error(USAGE);
    return;
  }

  const world = await loadWorldFile(path.resolve(args.world));
  const config = args.config ? await loadConfigFile(path.resolve(args.config)) : undefined;

  const { summary } = runSimulation({
    world,
    cycles: args.cycles,
    config,
    indent: args.indent,
    failStage: args.failStage,
    outDir: args.out ? path.resolve(args.out) : undefined,
    ...(args.verbose
      ? {
          telemetry: createConsoleTelemetry({
            label: 'snapshot-sim',
            ticks: false,
            output: new Console({ stdout: process.stderr, stderr: process.stderr }),
          }),
        }
      : {}),
  });

  process.stdout.write(`${JSON.stringify(summary)}\n`);

  if (summary.failed > 0) {
    console.error(`${summary.failed} cycle(s) could not write a document`);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  if (error instanceof SimulationInputError) {
    console.error(`snapshot-sim: ${error.message}`);
  } else {
    console.error('snapshot-sim failed:', error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});
