import { describe, expect, it } from 'vitest';

import {
  DEFAULT_TELEMETRY_CONFIG,
  createInMemoryRuntime,
  createMemorySnapshotSink,
  parseSnapshotDocument,
} from './index.js';
import { createCentralWorld, createRecordingTelemetry } from './test-helpers.js';

describe('createInMemoryRuntime', () => {
  it('runs the whole pipeline against a synthetic world', () => {
    const { runtime, sink } = createInMemoryRuntime(createCentralWorld());

    runtime.init();
    const latest = sink.latest();

    expect(latest).toBeDefined();
    const document = parseSnapshotDocument(latest ?? '');
    expect(document.vehicles[0]?.next_stop_name).toBe('Stop #42');
    expect(document.lines[0]?.name).toBe('Red Line');
  });

  it('resolves configuration overrides', () => {
    const telemetry = createRecordingTelemetry();
    const { runtime, sink } = createInMemoryRuntime(createCentralWorld(), {
      telemetry,
      config: { trigger: { writeIntervalSeconds: 0.5 }, serializer: { indent: '  ' } },
    });

    runtime.init();
    expect(runtime.tick(0.5)).toBe(true);
    expect(sink.snapshots).toHaveLength(2);
    expect(sink.latest()?.startsWith('{\n  "game_time": {')).toBe(true);
    expect(DEFAULT_TELEMETRY_CONFIG.trigger.writeIntervalSeconds).toBe(2);
  });

  it('forwards writes to an outer sink', () => {
    const outer = createMemorySnapshotSink();
    const { runtime, sink } = createInMemoryRuntime(createCentralWorld(), { sink: outer });

    runtime.init();

    expect(outer.snapshots).toEqual(sink.snapshots);
    expect([...outer.diagnostics.keys()]).toEqual(['telemetry_diag.txt']);
  });

  it('degrades to an empty document when the host exposes nothing', () => {
    const { runtime, sink } = createInMemoryRuntime(createCentralWorld(), {
      hostOptions: {
        omit: [
          'scripting.getEntity',
          'scripting.getVehicle',
          'scripting.getLine',
          'scripting.getVehicles',
          'scripting.getLines',
          'scripting.getStations',
          'scripting.getEntityList',
          'scripting.getGameTime',
          'engine.getEntityList',
          'engine.getComponent',
          'engine.getGameTime',
          'engine.enumerateRegion',
          'transportNetwork.getLine',
          'types',
        ],
      },
    });

    expect(runtime.init()?.outcome).toBe('written');
    const document = parseSnapshotDocument(sink.latest() ?? '');
    expect(document.vehicles).toEqual([]);
    expect(document.lines).toEqual([]);
    expect(document.game_time).toBeNull();
    expect(document.write_count).toBe(1);
  });
});
