import type { FakeWorld } from './host/fake-host.js';
import type { TelemetryEventData, TelemetryFacade } from './telemetry.js';

export type RecordedLevel = 'error' | 'warning' | 'progress';

export interface RecordedEvent {
  readonly level: RecordedLevel;
  readonly event: string;
  readonly data?: TelemetryEventData;
}

export interface RecordingTelemetry extends TelemetryFacade {
  readonly events: RecordedEvent[];
  readonly counters: Array<{ group: string; counters: Readonly<Record<string, number>> }>;
  ticks: number;
  named(event: string): RecordedEvent[];
}

export function createRecordingTelemetry(): RecordingTelemetry {
  const events: RecordedEvent[] = [];
  const counters: RecordingTelemetry['counters'] = [];
  const recording: RecordingTelemetry = {
    events,
    counters,
    ticks: 0,
    named(event) {
      return events.filter((entry) => entry.event === event);
    },
    recordError(event, data) {
      events.push({ level: 'error', event, data });
    },
    recordWarning(event, data) {
      events.push({ level: 'warning', event, data });
    },
    recordProgress(event, data) {
      events.push({ level: 'progress', event, data });
    },
    recordCounters(group, values) {
      counters.push({ group, counters: values });
    },
    recordTick() {
      recording.ticks += 1;
    },
  };
  return recording;
}

/**
 * One station ("Central"), one line from Central to an unnamed terminal
 * (entity 42), and one rail vehicle that just left Central.
 */
export function createCentralWorld(): FakeWorld {
  return {
    entities: {
      '1': { name: 'Central', position: { x: 0, y: 0, z: 0 }, terminals: [11, 12] },
      '10': { name: 'Red Line', vehicleType: 'RAIL', stops: [1, 42] },
      '42': { position: { x: 100, y: 0, z: 0 } },
      '100': {
        name: 'Train 1',
        carrier: 'RAIL',
        state: 'EN_ROUTE',
        lineIdx: 10,
        stopIndex: 0,
        speed: 12.5,
        position: [50, 0, 0],
        cargoLoad: { PASSENGERS: 30 },
        capacities: { PASSENGERS: 120 },
      },
    },
    stations: [1],
    lines: [10],
    vehicles: [100],
    gameTime: { year: 1950, month: 3, day: 14 },
  };
}
