import { describe, expect, it } from 'vitest';

import { probeHostCapabilities } from '../host/capability-probe.js';
import { EntityAccessor } from '../host/entity-accessor.js';
import { createFakeHost } from '../host/fake-host.js';
import { createRecordingTelemetry } from '../test-helpers.js';
import { collectSignals, readSignalAspect } from './signal-collector.js';

describe('readSignalAspect', () => {
  it('maps booleans and numbers to proceed or stop', () => {
    expect(readSignalAspect({ state: true })).toBe(1);
    expect(readSignalAspect({ state: 0 })).toBe(0);
    expect(readSignalAspect({ signalState: 2 })).toBe(1);
    expect(readSignalAspect({ signalState: false })).toBe(0);
  });

  it('reports unknown for missing or unreadable states', () => {
    expect(readSignalAspect(undefined)).toBe(-1);
    expect(readSignalAspect({})).toBe(-1);
    expect(readSignalAspect({ state: 'green' })).toBe(-1);
    expect(readSignalAspect({ state: Number.NaN })).toBe(-1);
  });
});

describe('collectSignals', () => {
  it('reads positions and aspects for every enumerated signal', () => {
    const telemetry = createRecordingTelemetry();
    const host = createFakeHost({
      entities: {
        '300': { position: { x: 1.234, y: 2, z: 0 } },
        '301': { position: [5, 6, 7] },
      },
      signals: [300, 301, 302],
      components: {
        '300': { SIGNAL: { state: 1 } },
        '301': { SIGNAL: { signalState: false } },
      },
    });
    const accessor = new EntityAccessor(probeHostCapabilities(host, { telemetry }), telemetry);

    expect(collectSignals(accessor)).toEqual([
      { id: 300, position: { x: 1.23, y: 2, z: 0 }, state: 1 },
      { id: 301, position: { x: 5, y: 6, z: 7 }, state: 0 },
      { id: 302, position: { x: 0, y: 0, z: 0 }, state: -1 },
    ]);
  });
});
