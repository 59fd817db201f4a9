import {
  createFileSnapshotSink,
  createInMemoryRuntime,
  resolveTelemetryConfig,
  summarizeCycleHistory,
  type FakeWorld,
  type SnapshotCycleOutcome,
  type SnapshotStages,
  type TelemetryConfigOverrides,
  type TelemetryFacade,
} from '@transit-telemetry/core';

export const STAGE_NAMES: readonly (keyof SnapshotStages)[] = [
  'buildStations',
  'resolveLines',
  'collectVehicles',
  'enrichVehicles',
  'buildPaths',
  'refreshCaches',
  'readGameTime',
  'computeStats',
  'serialize',
];

export function isStageName(value: string): value is keyof SnapshotStages {
  return STAGE_NAMES.some((name) => name === value);
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface CliArgs {
  world?: string;
  cycles: number;
  out?: string;
  config?: string;
  indent?: number;
  failStage?: keyof SnapshotStages;
  verbose: boolean;
  help: boolean;
}

function readValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function readCount(raw: string, flag: string, min: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new CliUsageError(`${flag} must be an integer >= ${min}`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { cycles: 1, verbose: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (a === '--world') {
      args.world = readValue(argv, ++i, a);
    } else if (a === '--cycles') {
      args.cycles = readCount(readValue(argv, ++i, a), a, 1);
    } else if (a === '--out') {
      args.out = readValue(argv, ++i, a);
    } else if (a === '--config') {
      args.config = readValue(argv, ++i, a);
    } else if (a === '--indent') {
      args.indent = readCount(readValue(argv, ++i, a), a, 0);
    } else if (a === '--fail-stage') {
      const stage = readValue(argv, ++i, a);
      if (!isStageName(stage)) {
        throw new CliUsageError(`--fail-stage must be one of: ${STAGE_NAMES.join(', ')}`);
      }
      args.failStage = stage;
    } else if (a === '--verbose') {
      args.verbose = true;
    } else if (a === '--help' || a === '-h') {
      args.help = true;
    } else {
      throw new CliUsageError(`unknown argument: ${String(a)}`);
    }
  }

  if (!args.help && args.world === undefined) {
    throw new CliUsageError('--world <file> is required');
  }
  return args;
}

export const USAGE =
  `Usage: snapshot-sim --world <file> [options]\n\n` +
  `Options:\n` +
  `  --world <file>        World description (.json or .json5, required)\n` +
  `  --cycles <n>          Snapshot cycles to run (default: 1)\n` +
  `  --out <dir>           Also write telemetry.json and the capability report to <dir>\n` +
  `  --config <file>       Configuration overrides (.json or .json5)\n` +
  `  --indent <n>          Indent the document with <n> spaces\n` +
  `  --fail-stage <name>   Make one pipeline stage throw on every cycle\n` +
  `  --verbose             Log pipeline telemetry to stderr\n`;

export function failingStages(stage: keyof SnapshotStages | undefined): Partial<SnapshotStages> {
  const stages: { -readonly [K in keyof SnapshotStages]?: SnapshotStages[K] } = {};
  if (stage !== undefined) {
    stages[stage] = (): never => {
      throw new Error(`${stage} disabled by --fail-stage`);
    };
  }
  return stages;
}

export interface SimulationInput {
  readonly world: FakeWorld;
  readonly cycles: number;
  readonly config?: TelemetryConfigOverrides;
  readonly indent?: number;
  readonly failStage?: keyof SnapshotStages;
  readonly outDir?: string;
  readonly telemetry?: TelemetryFacade;
}

export interface SimulationSummary {
  readonly cycles: number;
  readonly writeCount: number;
  readonly written: number;
  readonly fallbacks: number;
  readonly failed: number;
  readonly stageFailures: Readonly<Record<string, number>>;
  readonly maxDurationMs: number;
  readonly avgDurationMs: number;
  readonly counts: Readonly<Record<string, number>>;
  readonly output?: string;
}

/**
 * Initializes a runtime over `world` and drives it with tick deltas of one
 * write interval each, so every requested cycle produces a write.
 */
export function runSimulation(input: SimulationInput): {
  readonly summary: SimulationSummary;
  readonly latest?: string;
} {
  const overrides: TelemetryConfigOverrides = {
    ...input.config,
    ...(input.indent !== undefined
      ? { serializer: { indent: ' '.repeat(input.indent) } }
      : {}),
  };
  const config = resolveTelemetryConfig(overrides);
  const fileSink = input.outDir ? createFileSnapshotSink({ directory: input.outDir }) : undefined;

  const { runtime, sink: memory } = createInMemoryRuntime(input.world, {
    config: overrides,
    stages: failingStages(input.failStage),
    ...(input.telemetry ? { telemetry: input.telemetry } : {}),
    ...(fileSink ? { sink: fileSink } : {}),
  });

  const outcomes: Record<SnapshotCycleOutcome, number> = { written: 0, fallback: 0, failed: 0 };
  const countLatest = (): void => {
    const report = runtime.latestReport;
    if (report) {
      outcomes[report.outcome] += 1;
    }
  };

  runtime.init();
  countLatest();
  for (let cycle = 1; cycle < input.cycles; cycle += 1) {
    if (runtime.tick(config.trigger.writeIntervalSeconds)) {
      countLatest();
    }
  }

  // Stage failures and durations cover the cycles still held in the history.
  const summary = summarizeCycleHistory(runtime.cycleHistory.snapshot());

  return {
    summary: {
      cycles: outcomes.written + outcomes.fallback + outcomes.failed,
      writeCount: runtime.latestReport?.writeCount ?? 0,
      written: outcomes.written,
      fallbacks: outcomes.fallback,
      failed: outcomes.failed,
      stageFailures: summary.stageFailures,
      maxDurationMs: Number(summary.maxDurationMs.toFixed(3)),
      avgDurationMs: Number(summary.avgDurationMs.toFixed(3)),
      counts: runtime.latestReport?.counts ?? {},
      ...(fileSink ? { output: fileSink.snapshotPath } : {}),
    },
    latest: memory.latest(),
  };
}
