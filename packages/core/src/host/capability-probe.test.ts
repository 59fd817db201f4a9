import { describe, expect, it } from 'vitest';

import { createRecordingTelemetry } from '../test-helpers.js';
import { probeHostCapabilities } from './capability-probe.js';
import { createFakeHost } from './fake-host.js';

describe('probeHostCapabilities', () => {
  it('orders enumerator candidates by preference', () => {
    const capabilities = probeHostCapabilities(createFakeHost({}));
    const labels = (kind: keyof typeof capabilities.enumerators): string[] =>
      capabilities.enumerators[kind].map((candidate) => candidate.label);

    expect(labels('vehicle').slice(0, 3)).toEqual([
      'scripting.getVehicles',
      'engine.getEntityList(VEHICLE)',
      'engine.getEntityList(10)',
    ]);
    expect(labels('vehicle')).toHaveLength(17);
    expect(labels('line')).toEqual([
      'scripting.getLines',
      'scripting.getEntityList(LINE)',
      'scripting.getEntityList(entity.LINE)',
      'scripting.getEntityList(TRANSPORT_LINE)',
    ]);
    expect(labels('stationGroup')).toEqual([
      'engine.getEntityList(STATION_GROUP)',
      'scripting.getEntityList(STATION_GROUP)',
    ]);
    expect(labels('signal')[0]).toBe('engine.getEntityList(SIGNAL)');
    expect(labels('edge')).toEqual(['engine.getEntityList(BASE_EDGE)']);
    expect(capabilities.missing).toEqual([]);
    expect(capabilities.componentTypes.SIGNAL).toBe(205);
  });

  it('reports every missing capability once', () => {
    const telemetry = createRecordingTelemetry();
    const capabilities = probeHostCapabilities({}, { telemetry });

    expect(capabilities.available).toEqual([]);
    expect(capabilities.missing).toEqual([
      'enumerate.vehicle',
      'enumerate.line',
      'enumerate.station',
      'enumerate.stationGroup',
      'enumerate.signal',
      'enumerate.edge',
      'lookup.entity',
      'lookup.vehicle',
      'lookup.line',
      'component',
      'enumerateRegion',
      'gameTime',
      'lineEdges',
    ]);
    expect(telemetry.named('HostCapabilityUnavailable')).toHaveLength(13);
    expect(telemetry.events[0]?.data).toEqual({ capability: 'enumerate.vehicle' });
  });

  it('uses symbolic component names and skips signals without a type table', () => {
    const capabilities = probeHostCapabilities(createFakeHost({}, { omit: ['types'] }));

    expect(capabilities.componentTypes.BASE_EDGE).toBe('BASE_EDGE');
    expect(capabilities.enumerators.signal).toEqual([]);
    expect(capabilities.enumerators.edge).toEqual([]);
    expect(capabilities.entityTypeNames).toEqual([]);
  });
});
