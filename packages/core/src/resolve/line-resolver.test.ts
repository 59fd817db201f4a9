import { describe, expect, it } from 'vitest';

import { probeHostCapabilities } from '../host/capability-probe.js';
import { EntityAccessor } from '../host/entity-accessor.js';
import type { FakeWorld } from '../host/fake-host.js';
import { createFakeHost } from '../host/fake-host.js';
import { createCentralWorld, createRecordingTelemetry } from '../test-helpers.js';
import { resolveLine, resolveLines } from './line-resolver.js';
import { buildStationIndex } from './station-resolver.js';

function setup(world: FakeWorld) {
  const telemetry = createRecordingTelemetry();
  const accessor = new EntityAccessor(
    probeHostCapabilities(createFakeHost(world), { telemetry }),
    telemetry,
  );
  return { accessor, stations: buildStationIndex(accessor) };
}

describe('resolveLines', () => {
  it('resolves stops to stations and names unnamed terminals by id', () => {
    const { accessor, stations } = setup(createCentralWorld());
    expect(resolveLines(accessor, stations)).toEqual([
      {
        id: 10,
        name: 'Red Line',
        vehicleType: 'RAIL',
        stops: [
          { index: 1, stationId: 1, rawStopId: 1, name: 'Central' },
          { index: 2, stationId: 42, rawStopId: 42, name: 'Stop #42' },
        ],
        stopCount: 2,
      },
    ]);
  });

  it('takes stop names from the stop record before the station', () => {
    const world = createCentralWorld();
    const { accessor, stations } = setup({
      ...world,
      entities: {
        ...world.entities,
        '10': {
          name: 'Stop #3',
          stops: [
            { stationEntity: 11, stopName: 'Central Platform 1' },
            { stationEntity: 42, name: 'Stop #9' },
            { stationEntity: 43 },
          ],
        },
        '43': { terminal: { terminalName: 'Quarry Siding' } },
      },
    });
    const line = resolveLine(10, accessor, stations);

    expect(line.name).toBe('Line #10');
    expect(line.vehicleType).toBe('UNKNOWN');
    expect(line.stops.map((stop) => [stop.stationId, stop.name])).toEqual([
      [1, 'Central Platform 1'],
      [42, 'Stop #42'],
      [43, 'Quarry Siding'],
    ]);
  });

  it('returns an empty line when the host has no record', () => {
    const { accessor, stations } = setup({ lines: [5] });
    expect(resolveLine(5, accessor, stations)).toEqual({
      id: 5,
      name: 'Line #5',
      vehicleType: 'UNKNOWN',
      stops: [],
      stopCount: 0,
    });
  });
});
