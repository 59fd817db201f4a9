import { describe, expect, it } from 'vitest';

import { createCycleHistory } from '../diagnostics/cycle-history.js';
import { probeHostCapabilities } from '../host/capability-probe.js';
import { EntityAccessor } from '../host/entity-accessor.js';
import type { FakeHostOptions } from '../host/fake-host.js';
import { createFakeHost } from '../host/fake-host.js';
import type { SnapshotSink } from '../output/snapshot-sink.js';
import { createMemorySnapshotSink } from '../output/snapshot-sink.js';
import { resolveTelemetryConfig } from '../config.js';
import { parseSnapshotDocument } from '../snapshot/snapshot-schema.js';
import { createCentralWorld, createRecordingTelemetry } from '../test-helpers.js';
import type { SnapshotOrchestratorOptions } from './snapshot-orchestrator.js';
import { SnapshotOrchestrator } from './snapshot-orchestrator.js';

function createSteppingClock() {
  let now = 0;
  return {
    now() {
      now += 1;
      return now;
    },
  };
}

function setup(
  overrides: Partial<SnapshotOrchestratorOptions> = {},
  hostOptions: FakeHostOptions = {},
) {
  const telemetry = createRecordingTelemetry();
  const accessor = new EntityAccessor(
    probeHostCapabilities(createFakeHost(createCentralWorld(), hostOptions), { telemetry }),
    telemetry,
  );
  const sink = createMemorySnapshotSink();
  const orchestrator = new SnapshotOrchestrator({
    accessor,
    sink,
    telemetry,
    clock: createSteppingClock(),
    ...overrides,
  });
  return { orchestrator, sink, telemetry };
}

function latestDocument(sink: { latest(): string | undefined }) {
  const text = sink.latest();
  if (text === undefined) {
    throw new Error('nothing written');
  }
  return parseSnapshotDocument(text);
}

describe('SnapshotOrchestrator', () => {
  it('writes a complete document for a healthy host', () => {
    const { orchestrator, sink, telemetry } = setup();

    const report = orchestrator.runCycle();
    const document = latestDocument(sink);

    expect(report.outcome).toBe('written');
    expect(report.phases).toEqual([
      'BuildingStations',
      'ResolvingLines',
      'CollectingVehicles',
      'Enriching',
      'BuildingPaths',
      'RefreshingCaches',
      'ComputingStats',
      'Serializing',
      'Written',
    ]);
    expect(report.stages.every((stage) => stage.ok)).toBe(true);
    expect(report.counts).toEqual({
      vehicles: 1,
      lines: 1,
      stations: 1,
      paths: 1,
      tracks: 0,
      signals: 0,
    });
    expect(report.caches).toEqual({ tracks: 'refreshed', signals: 'refreshed' });

    expect(document.write_count).toBe(1);
    expect(document.game_time).toEqual({ year: 1950, month: 3, day: 14 });
    expect(document.stations[0]?.name).toBe('Central');
    expect(document.lines[0]?.stops[1]?.name).toBe('Stop #42');
    expect(document.vehicles[0]).toMatchObject({
      id: 100,
      line_name: 'Red Line',
      speed_kmh: 45,
      last_stop_id: 1,
      last_stop_name: 'Central',
      next_stop_id: 42,
      next_stop_name: 'Stop #42',
      raw_stop_index: 0,
    });
    expect(document.paths).toEqual([
      {
        line_id: 10,
        points: [
          { x: 0, y: 0 },
          { x: 100, y: 0 },
        ],
      },
    ]);
    expect(document.stats).toEqual({
      total_vehicles: 1,
      total_passengers: 30,
      total_lines: 1,
      total_stations: 1,
      vehicles_by_type: { RAIL: 1 },
    });
    expect(telemetry.named('SnapshotWritten')).toEqual([
      { level: 'progress', event: 'SnapshotWritten', data: { writeCount: 1, fallback: false } },
    ]);
    expect(orchestrator.currentPhase).toBe('Idle');
  });

  it('counts writes across cycles', () => {
    const { orchestrator, sink } = setup();
    orchestrator.runCycle();
    orchestrator.runCycle();

    expect(orchestrator.writeCount).toBe(2);
    expect(sink.snapshots).toHaveLength(2);
    expect(latestDocument(sink).write_count).toBe(2);
  });

  it('replaces a failed stage with its empty output and keeps the rest', () => {
    const { orchestrator, sink, telemetry } = setup({
      stages: {
        collectVehicles: () => {
          throw new Error('vehicle table locked');
        },
      },
    });

    const report = orchestrator.runCycle();
    const document = latestDocument(sink);

    expect(report.outcome).toBe('written');
    expect(report.stages.find((stage) => stage.stage === 'CollectingVehicles')).toEqual({
      stage: 'CollectingVehicles',
      ok: false,
      durationMs: 1,
      error: 'vehicle table locked',
    });
    expect(document.vehicles).toEqual([]);
    expect(document.lines).toHaveLength(1);
    expect(document.stations).toHaveLength(1);
    expect(document.paths).toHaveLength(1);
    expect(telemetry.named('SnapshotStageFailed')).toEqual([
      {
        level: 'error',
        event: 'SnapshotStageFailed',
        data: { stage: 'CollectingVehicles', message: 'vehicle table locked' },
      },
    ]);
  });

  it('builds the empty station resolver from the configured limits', () => {
    let nameSearchDepth: number | undefined;
    const { orchestrator } = setup({
      config: resolveTelemetryConfig({ limits: { nameSearchDepth: 2 } }),
      stages: {
        buildStations: () => {
          throw new Error('station table locked');
        },
        resolveLines: (_accessor, stations) => {
          nameSearchDepth = stations.nameSearchDepth;
          return [];
        },
      },
    });

    const report = orchestrator.runCycle();

    expect(report.stages.find((stage) => stage.stage === 'BuildingStations')?.ok).toBe(false);
    expect(nameSearchDepth).toBe(2);
  });

  it('keeps vehicles unenriched when enrichment fails', () => {
    const { orchestrator, sink } = setup({
      stages: {
        enrichVehicles: () => {
          throw new Error('bad stop list');
        },
      },
    });
    orchestrator.runCycle();

    expect(latestDocument(sink).vehicles[0]).toMatchObject({
      id: 100,
      line_name: '',
      next_stop_name: '',
    });
  });

  it('writes null game time when the clock read fails', () => {
    const { orchestrator, sink } = setup({
      stages: {
        readGameTime: () => {
          throw new Error('no clock');
        },
      },
    });

    const report = orchestrator.runCycle();

    expect(latestDocument(sink).game_time).toBeNull();
    expect(latestDocument(sink).stats.total_vehicles).toBe(1);
    expect(report.stages.find((stage) => stage.stage === 'ComputingStats')?.error).toBe(
      'no clock',
    );
  });

  it('writes the fallback document when serialization fails', () => {
    const { orchestrator, sink } = setup({
      stages: {
        serialize: () => {
          throw new Error('encoder broke');
        },
      },
    });

    const report = orchestrator.runCycle();
    const document = latestDocument(sink);

    expect(report.outcome).toBe('fallback');
    expect(report.phases.slice(-2)).toEqual(['Serializing', 'FallbackWritten']);
    expect(document.write_count).toBe(1);
    expect(document.vehicles).toEqual([]);
    expect(document.game_time).toBeNull();
  });

  it('falls back when the sink rejects the snapshot', () => {
    const written: string[] = [];
    let attempts = 0;
    const sink: SnapshotSink = {
      writeSnapshot(text) {
        attempts += 1;
        if (attempts === 1) {
          throw new Error('disk full');
        }
        written.push(text);
      },
    };
    const { orchestrator, telemetry } = setup({ sink });

    const report = orchestrator.runCycle();

    expect(report.outcome).toBe('fallback');
    expect(report.error).toBe('disk full');
    expect(report.counts).toEqual({});
    expect(telemetry.named('SnapshotCycleFailed')).toEqual([
      {
        level: 'error',
        event: 'SnapshotCycleFailed',
        data: { writeCount: 1, phase: 'Serializing', message: 'disk full' },
      },
    ]);
    expect(written).toHaveLength(1);
    expect(parseSnapshotDocument(written[0] ?? '').write_count).toBe(1);
    expect(orchestrator.writeCount).toBe(1);
  });

  it('does not count a cycle that could not write anything', () => {
    const sink: SnapshotSink = {
      writeSnapshot() {
        throw new Error('read-only volume');
      },
    };
    const { orchestrator, telemetry } = setup({ sink });

    const report = orchestrator.runCycle();

    expect(report.outcome).toBe('failed');
    expect(orchestrator.writeCount).toBe(0);
    expect(telemetry.named('SnapshotWriteFailed')).toEqual([
      {
        level: 'error',
        event: 'SnapshotWriteFailed',
        data: { writeCount: 1, message: 'read-only volume' },
      },
    ]);
    expect(orchestrator.runCycle().writeCount).toBe(1);
  });

  it('reports host call failures and records the cycle history', () => {
    const history = createCycleHistory({ capacity: 5 });
    const { orchestrator, telemetry } = setup(
      { history },
      { failing: ['scripting.getGameTime'] },
    );

    const report = orchestrator.runCycle();

    expect(report.hostFailures).toEqual({ 'scripting.getGameTime': 1 });
    expect(telemetry.counters).toContainEqual({
      group: 'host.failures',
      counters: { 'scripting.getGameTime': 1 },
    });
    expect(history.snapshot().entries).toEqual([report]);
  });
});
