import { describe, expect, it } from 'vitest';

import {
  decodeLineRecord,
  decodeSignalRecord,
  decodeStationRecord,
  decodeVehicleRecord,
  splitLoad,
} from './records.js';

describe('decodeStationRecord', () => {
  it('collects member ids from every member field in order', () => {
    const record = decodeStationRecord(1, {
      name: 'Central',
      position: [10, 20, 1],
      terminals: [11, 12],
      stops: { a: 13 },
      group: { id: 90 },
    });
    expect(record.name).toBe('Central');
    expect(record.position).toEqual({ x: 10, y: 20, z: 1 });
    expect(record.memberIds).toEqual([11, 12, 13]);
    expect(record.stationIds).toBeUndefined();
    expect(record.groupId).toBe(90);
  });

  it('marks records with a station list as groups', () => {
    const record = decodeStationRecord(2, { name: ' ', stations: [3, 4] });
    expect(record.name).toBeUndefined();
    expect(record.stationIds).toEqual([3, 4]);
  });
});

describe('decodeLineRecord', () => {
  it('reads stops from waypoints and the kind from the transport mode', () => {
    expect(
      decodeLineRecord(10, { name: 'Blue', transportMode: 'TRAM', waypoints: [1, 2] }),
    ).toEqual({ id: 10, name: 'Blue', vehicleType: 'TRAM', stops: [1, 2] });
    expect(decodeLineRecord(11, {})).toEqual({
      id: 11,
      name: undefined,
      vehicleType: 'UNKNOWN',
      stops: [],
    });
  });
});

describe('decodeVehicleRecord', () => {
  it('splits passenger and cargo loads', () => {
    expect(splitLoad({ PASSENGERS: 12, COAL: 5, GRAIN: 2.7 })).toEqual({ passengers: 12, cargo: 7 });
    expect(splitLoad(undefined)).toEqual({ passengers: 0, cargo: 0 });
  });

  it('reads the line from the transport vehicle as a last resort', () => {
    const record = decodeVehicleRecord(100, {
      velocity: 3.14159,
      transportVehicle: { lineIdx: 10 },
    });
    expect(record).toEqual({
      id: 100,
      name: undefined,
      position: undefined,
      speedMs: 3.142,
      lineId: 10,
      load: { passengers: 0, cargo: 0 },
      capacity: { passengers: 0, cargo: 0 },
      state: 'UNKNOWN',
      carrier: 'UNKNOWN',
      stopIndex: -1,
    });
  });

  it('prefers the direct line fields', () => {
    expect(decodeVehicleRecord(1, { line: { entity: 20 }, lineId: 30 }).lineId).toBe(20);
    expect(decodeVehicleRecord(1, { stopIndex: 2.9 }).stopIndex).toBe(2);
  });
});

describe('decodeSignalRecord', () => {
  it('tolerates a missing entity', () => {
    expect(decodeSignalRecord(5, undefined)).toEqual({ id: 5, position: undefined });
  });
});
