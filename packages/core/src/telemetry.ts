/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

/**
 * Sink for everything the pipeline reports about itself. Implementations
 * must not throw back into the caller; the global `telemetry` facade guards
 * against ones that do.
 */
export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
  recordTick(): void;
}

export type TelemetryConsole = Pick<Console, 'error' | 'warn' | 'info' | 'debug'>;

export interface ConsoleTelemetryOptions {
  /** Tag placed before the level in every line. Defaults to `telemetry`. */
  readonly label?: string;
  /** Log host ticks, which arrive every frame. Defaults to `true`. */
  readonly ticks?: boolean;
  readonly output?: TelemetryConsole;
}

/**
 * A no-op telemetry implementation that silently discards all events.
 * This is the default telemetry facade.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
  recordTick() {},
};

/**
 * Creates a telemetry facade that logs every event as `[label:level] event`.
 * Use this when running the extractor by hand to see which stages degraded.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@transit-telemetry/core';
 * setTelemetry(createConsoleTelemetry());
 */
export function createConsoleTelemetry(options: ConsoleTelemetryOptions = {}): TelemetryFacade {
  const label = options.label ?? 'telemetry';
  const output = options.output ?? console;
  const logTicks = options.ticks ?? true;

  return {
    recordError(event, data) {
      output.error(`[${label}:error] ${event}`, data);
    },
    recordWarning(event, data) {
      output.warn(`[${label}:warning] ${event}`, data);
    },
    recordProgress(event, data) {
      output.info(`[${label}:progress] ${event}`, data);
    },
    recordCounters(group, counters) {
      output.info(`[${label}:counters] ${group}`, counters);
    },
    recordTick() {
      if (logTicks) {
        output.debug(`[${label}:tick]`);
      }
    },
  };
}

/**
 * Wraps a facade so that every event carries the given context fields.
 * Fields supplied with an individual event win over the shared context.
 */
export function createContextualTelemetry(
  base: TelemetryFacade,
  context: TelemetryEventData,
): TelemetryFacade {
  const merge = (data?: TelemetryEventData): TelemetryEventData => ({
    ...context,
    ...data,
  });

  return {
    recordError(event, data) {
      base.recordError(event, merge(data));
    },
    recordWarning(event, data) {
      base.recordWarning(event, merge(data));
    },
    recordProgress(event, data) {
      base.recordProgress(event, merge(data));
    },
    recordCounters(group, counters) {
      base.recordCounters(group, counters);
    },
    recordTick() {
      base.recordTick();
    },
  };
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

function forward(deliver: (facade: TelemetryFacade) => void): void {
  try {
    deliver(activeTelemetry);
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}

/**
 * Process-wide facade used when a component is not handed its own. Delivers
 * to whatever `setTelemetry` installed last.
 */
export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    forward((facade) => facade.recordError(event, data));
  },
  recordWarning(event, data) {
    forward((facade) => facade.recordWarning(event, data));
  },
  recordProgress(event, data) {
    forward((facade) => facade.recordProgress(event, data));
  },
  recordCounters(group, counters) {
    forward((facade) => facade.recordCounters(group, counters));
  },
  recordTick() {
    forward((facade) => facade.recordTick());
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}
