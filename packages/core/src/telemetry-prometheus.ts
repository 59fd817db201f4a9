import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

import type { TelemetryEventData, TelemetryFacade } from './telemetry.js';
import { createConsoleTelemetry, silentTelemetry } from './telemetry.js';

export interface PrometheusTelemetryOptions {
  readonly registry?: Registry;
  readonly prefix?: string;
  readonly collectDefaultMetrics?: boolean;
  /** Mirror events to the console. Defaults to `true`. */
  readonly log?: boolean;
}

interface SnapshotMetrics {
  readonly written: Counter<string>;
  readonly fallbacks: Counter<string>;
  readonly stageFailures: Counter<string>;
  readonly hostFailures: Counter<string>;
  readonly collectionSize: Gauge<string>;
}

const DEFAULT_PREFIX = 'transit_telemetry_';

export interface PrometheusTelemetryFacade extends TelemetryFacade {
  readonly registry: Registry;
}

export function createPrometheusTelemetry(
  options: PrometheusTelemetryOptions = {},
): PrometheusTelemetryFacade {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? DEFAULT_PREFIX;

  if (options.collectDefaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const errors = new Counter({
    name: `${prefix}errors_total`,
    help: 'Total number of telemetry errors emitted by the extractor.',
    registers: [registry],
    labelNames: ['event'],
  });

  const warnings = new Counter({
    name: `${prefix}warnings_total`,
    help: 'Total number of telemetry warnings emitted by the extractor.',
    registers: [registry],
    labelNames: ['event'],
  });

  const ticks = new Counter({
    name: `${prefix}host_ticks_total`,
    help: 'Total number of host ticks fed to the write throttle.',
    registers: [registry],
  });

  const snapshot: SnapshotMetrics = {
    written: new Counter({
      name: `${prefix}snapshots_written_total`,
      help: 'Total number of snapshot documents written, fallback documents included.',
      registers: [registry],
    }),
    fallbacks: new Counter({
      name: `${prefix}snapshots_fallback_total`,
      help: 'Total number of fallback documents written after a failed cycle.',
      registers: [registry],
    }),
    stageFailures: new Counter({
      name: `${prefix}stage_failures_total`,
      help: 'Total number of isolated pipeline stage failures.',
      registers: [registry],
      labelNames: ['stage'],
    }),
    hostFailures: new Counter({
      name: `${prefix}host_call_failures_total`,
      help: 'Total number of failed host API calls per operation.',
      registers: [registry],
      labelNames: ['operation'],
    }),
    collectionSize: new Gauge({
      name: `${prefix}collection_size`,
      help: 'Entries per collection in the most recent snapshot.',
      registers: [registry],
      labelNames: ['collection'],
    }),
  };

  const mirror = (options.log ?? true) ? createConsoleTelemetry({ ticks: false }) : silentTelemetry;

  const facade: PrometheusTelemetryFacade = {
    recordError(event: string, data?: TelemetryEventData) {
      errors.inc({ event });
      if (event === 'SnapshotStageFailed' && typeof data?.stage === 'string') {
        snapshot.stageFailures.inc({ stage: data.stage });
      }
      mirror.recordError(event, data);
    },
    recordWarning(event: string, data?: TelemetryEventData) {
      warnings.inc({ event });
      mirror.recordWarning(event, data);
    },
    recordProgress(event: string, data?: TelemetryEventData) {
      if (event === 'SnapshotWritten') {
        snapshot.written.inc();
        if (data?.fallback === true) {
          snapshot.fallbacks.inc();
        }
      }
      mirror.recordProgress(event, data);
    },
    recordCounters(group: string, counters: Readonly<Record<string, number>>) {
      if (group === 'snapshot') {
        updateLabelledGauge(snapshot.collectionSize, 'collection', counters);
      } else if (group === 'host.failures') {
        updateLabelledCounter(snapshot.hostFailures, 'operation', counters);
      }
    },
    recordTick() {
      ticks.inc();
    },
    registry,
  };

  return facade;
}

function updateLabelledGauge(
  gauge: Gauge<string>,
  label: string,
  values: Readonly<Record<string, number>>,
): void {
  for (const [key, value] of Object.entries(values)) {
    if (key.length === 0 || !Number.isFinite(value)) {
      continue;
    }
    gauge.set({ [label]: key }, value);
  }
}

// Host failure counts are taken per cycle, so each value is an increment.
function updateLabelledCounter(
  counter: Counter<string>,
  label: string,
  values: Readonly<Record<string, number>>,
): void {
  for (const [key, value] of Object.entries(values)) {
    if (key.length === 0 || !Number.isFinite(value) || value <= 0) {
      continue;
    }
    counter.inc({ [label]: key }, value);
  }
}
