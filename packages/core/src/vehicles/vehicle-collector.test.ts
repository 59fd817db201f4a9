import { describe, expect, it } from 'vitest';

import { probeHostCapabilities } from '../host/capability-probe.js';
import { EntityAccessor } from '../host/entity-accessor.js';
import type { FakeWorld } from '../host/fake-host.js';
import { createFakeHost } from '../host/fake-host.js';
import { createCentralWorld, createRecordingTelemetry } from '../test-helpers.js';
import type { VehicleCollectOptions } from './vehicle-collector.js';
import { collectVehicles, toKmh } from './vehicle-collector.js';

function accessorFor(world: FakeWorld): EntityAccessor {
  const telemetry = createRecordingTelemetry();
  return new EntityAccessor(probeHostCapabilities(createFakeHost(world), { telemetry }), telemetry);
}

const everything: VehicleCollectOptions = {
  includeCargo: true,
  includeRoad: true,
  coordinateDigits: 2,
};

const mixedFleet: FakeWorld = {
  entities: {
    '1': { carrier: 'RAIL', capacities: { PASSENGERS: 100 } },
    '2': { carrier: 'ROAD', capacities: { PASSENGERS: 40 } },
    '3': { carrier: 'RAIL', capacities: { COAL: 60 } },
    '4': { carrier: 'TRAM', capacities: { PASSENGERS: 80, MAIL: 5 } },
  },
  vehicles: [1, 2, 3, 4, 5],
};

describe('collectVehicles', () => {
  it('builds vehicle states with defaults for missing fields', () => {
    expect(collectVehicles(accessorFor(createCentralWorld()), everything)).toEqual([
      {
        id: 100,
        name: 'Train 1',
        type: 'RAIL',
        state: 'EN_ROUTE',
        lineId: 10,
        lineName: '',
        position: { x: 50, y: 0, z: 0 },
        speedMs: 12.5,
        speedKmh: 45,
        direction: 1,
        passengers: 30,
        capacity: 120,
        cargo: 0,
        cargoCapacity: 0,
        lastStopId: 0,
        lastStopName: '',
        nextStopId: 0,
        nextStopName: '',
        rawStopIndex: 0,
      },
    ]);
  });

  it('skips vehicles the host has no record for', () => {
    expect(collectVehicles(accessorFor(mixedFleet), everything).map((v) => v.id)).toEqual([
      1, 2, 3, 4,
    ]);
  });

  it('filters road vehicles and cargo-only vehicles on request', () => {
    const accessor = accessorFor(mixedFleet);
    expect(
      collectVehicles(accessor, { ...everything, includeRoad: false }).map((v) => v.id),
    ).toEqual([1, 3]);
    expect(
      collectVehicles(accessor, { ...everything, includeCargo: false }).map((v) => v.id),
    ).toEqual([1, 2, 4]);
  });

  it('names unnamed vehicles by id', () => {
    const [vehicle] = collectVehicles(accessorFor(mixedFleet), everything);
    expect(vehicle?.name).toBe('Vehicle #1');
    expect(vehicle?.position).toEqual({ x: 0, y: 0, z: 0 });
    expect(vehicle?.rawStopIndex).toBe(-1);
  });
});

describe('toKmh', () => {
  it('converts to one decimal', () => {
    expect(toKmh(10)).toBe(36);
    expect(toKmh(13.9)).toBe(50);
    expect(toKmh(0)).toBe(0);
  });
});
