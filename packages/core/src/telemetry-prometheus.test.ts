import { describe, expect, it } from 'vitest';
import { Registry } from 'prom-client';

import { createPrometheusTelemetry } from './telemetry-prometheus.js';

function createTelemetry() {
  const registry = new Registry();
  const telemetry = createPrometheusTelemetry({
    registry,
    collectDefaultMetrics: false,
    prefix: 'test_',
    log: false,
  });
  return { registry, telemetry };
}

describe('createPrometheusTelemetry', () => {
  it('counts written and fallback snapshots', async () => {
    const { registry, telemetry } = createTelemetry();

    telemetry.recordProgress('SnapshotWritten', { writeCount: 1, fallback: false });
    telemetry.recordProgress('SnapshotWritten', { writeCount: 2, fallback: true });
    telemetry.recordProgress('SnapshotEventTriggered', { event: 'vehicle_arrived' });

    const written = await registry.getSingleMetric('test_snapshots_written_total')?.get();
    const fallbacks = await registry.getSingleMetric('test_snapshots_fallback_total')?.get();

    expect(written?.values[0]?.value).toBe(2);
    expect(fallbacks?.values[0]?.value).toBe(1);
  });

  it('labels stage failures and events', async () => {
    const { registry, telemetry } = createTelemetry();

    telemetry.recordError('SnapshotStageFailed', { stage: 'BuildingPaths', message: 'x' });
    telemetry.recordError('SnapshotStageFailed', { stage: 'BuildingPaths', message: 'y' });
    telemetry.recordError('SnapshotStageFailed', { stage: 7 });
    telemetry.recordWarning('HostCallFailed', { operation: 'scripting.getEntity' });

    const stageFailures = await registry.getSingleMetric('test_stage_failures_total')?.get();
    const errors = await registry.getSingleMetric('test_errors_total')?.get();
    const warnings = await registry.getSingleMetric('test_warnings_total')?.get();

    expect(stageFailures?.values).toEqual([
      expect.objectContaining({ value: 2, labels: { stage: 'BuildingPaths' } }),
    ]);
    expect(errors?.values).toEqual([
      expect.objectContaining({ value: 3, labels: { event: 'SnapshotStageFailed' } }),
    ]);
    expect(warnings?.values).toEqual([
      expect.objectContaining({ value: 1, labels: { event: 'HostCallFailed' } }),
    ]);
  });

  it('tracks collection sizes and accumulates host failures', async () => {
    const { registry, telemetry } = createTelemetry();

    telemetry.recordCounters('snapshot', { vehicles: 4, lines: 2 });
    telemetry.recordCounters('snapshot', { vehicles: 3, lines: 2 });
    telemetry.recordCounters('host.failures', { 'scripting.getEntity': 2, 'engine.getComponent': 0 });
    telemetry.recordCounters('host.failures', { 'scripting.getEntity': 1 });
    telemetry.recordTick();
    telemetry.recordTick();

    const sizes = await registry.getSingleMetric('test_collection_size')?.get();
    const hostFailures = await registry.getSingleMetric('test_host_call_failures_total')?.get();
    const ticks = await registry.getSingleMetric('test_host_ticks_total')?.get();

    expect(sizes?.values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ value: 3, labels: { collection: 'vehicles' } }),
        expect.objectContaining({ value: 2, labels: { collection: 'lines' } }),
      ]),
    );
    expect(hostFailures?.values).toEqual([
      expect.objectContaining({ value: 3, labels: { operation: 'scripting.getEntity' } }),
    ]);
    expect(ticks?.values[0]?.value).toBe(2);
  });
});
