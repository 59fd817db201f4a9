import type { HostRecord, Vec3 } from './fields.js';
import {
  firstPresent,
  isHostRecord,
  readIdList,
  readList,
  readNonBlankText,
  readPosition,
  roundTo,
  toEntityId,
  toInt,
} from './fields.js';

/*
 * Candidate field names for undocumented host records. The order of every
 * list is significant: the first present field wins.
 */

export const STATION_MEMBER_FIELDS = [
  'terminals',
  'components',
  'platforms',
  'nodes',
  'stops',
  'tracks',
] as const;

export const STATION_GROUP_FIELDS = ['stationGroup', 'group'] as const;

export const LINE_STOP_FIELDS = ['stops', 'waypoints'] as const;

export const LINE_KIND_FIELDS = ['vehicleType', 'transportMode'] as const;

export const VEHICLE_SPEED_FIELDS = ['speed', 'velocity'] as const;

export const VEHICLE_LINE_FIELDS = [
  'lineIdx',
  'line',
  'lineId',
  'lineEntity',
  'lineEntityId',
] as const;

export const PASSENGER_KEYS = ['PASSENGERS', 'passengers'] as const;

export const SIGNAL_STATE_FIELDS = [
  'state',
  'signalState',
  'mainState',
  'aspect',
  'value',
] as const;

export const UNKNOWN = 'UNKNOWN';

export interface StationRecord {
  readonly id: number;
  readonly name?: string;
  readonly position?: Vec3;
  readonly memberIds: readonly number[];
  /** Present when the record is itself a group of stations. */
  readonly stationIds?: readonly number[];
  readonly groupId?: number;
  readonly raw: HostRecord;
}

export interface StationGroupRecord {
  readonly id: number;
  readonly stationIds: readonly number[];
}

export interface LineRecord {
  readonly id: number;
  readonly name?: string;
  readonly vehicleType: string;
  readonly stops: readonly unknown[];
}

export interface LoadSplit {
  readonly passengers: number;
  readonly cargo: number;
}

export interface VehicleRecord {
  readonly id: number;
  readonly name?: string;
  readonly position?: Vec3;
  readonly speedMs: number;
  readonly lineId: number;
  readonly load: LoadSplit;
  readonly capacity: LoadSplit;
  readonly state: string;
  readonly carrier: string;
  readonly stopIndex: number;
}

export interface SignalRecord {
  readonly id: number;
  readonly position?: Vec3;
}

function optionalId(value: unknown): number | undefined {
  const id = toEntityId(value);
  return id > 0 ? id : undefined;
}

export function decodeStationRecord(
  id: number,
  raw: HostRecord,
  digits = 2,
): StationRecord {
  const memberIds = STATION_MEMBER_FIELDS.flatMap((field) => readIdList(raw[field]));
  const stations = raw.stations;
  const hasStationList = Array.isArray(stations) || isHostRecord(stations);
  return {
    id,
    name: readNonBlankText(raw.name),
    position: readPosition(raw, digits),
    memberIds,
    stationIds: hasStationList ? readIdList(stations) : undefined,
    groupId: optionalId(firstPresent(raw, STATION_GROUP_FIELDS)),
    raw,
  };
}

export function decodeStationGroupRecord(
  id: number,
  raw: HostRecord,
): StationGroupRecord {
  return { id, stationIds: readIdList(raw.stations) };
}

export function decodeLineRecord(id: number, raw: HostRecord): LineRecord {
  const kind = readNonBlankText(firstPresent(raw, LINE_KIND_FIELDS));
  return {
    id,
    name: readNonBlankText(raw.name),
    vehicleType: kind ?? UNKNOWN,
    stops: readList(firstPresent(raw, LINE_STOP_FIELDS)),
  };
}

/**
 * Splits a per-cargo map into the passenger entry and the sum of every other
 * entry.
 */
export function splitLoad(value: unknown): LoadSplit {
  if (!isHostRecord(value)) {
    return { passengers: 0, cargo: 0 };
  }
  const passengers = toInt(firstPresent(value, PASSENGER_KEYS));
  let cargo = 0;
  for (const [key, amount] of Object.entries(value)) {
    if (key !== 'PASSENGERS' && key !== 'passengers') {
      cargo += toInt(amount);
    }
  }
  return { passengers, cargo };
}

function readVehicleLineId(raw: HostRecord): number {
  const direct = firstPresent(raw, VEHICLE_LINE_FIELDS);
  if (direct !== undefined) {
    return toEntityId(direct);
  }
  const transport = raw.transportVehicle;
  return isHostRecord(transport) ? toEntityId(transport.lineIdx) : 0;
}

export function decodeVehicleRecord(
  id: number,
  raw: HostRecord,
  digits = 2,
): VehicleRecord {
  return {
    id,
    name: readNonBlankText(raw.name),
    position: readPosition(raw, digits),
    speedMs: roundTo(firstPresent(raw, VEHICLE_SPEED_FIELDS), 3),
    lineId: readVehicleLineId(raw),
    load: splitLoad(raw.cargoLoad),
    capacity: splitLoad(raw.capacities),
    state: readNonBlankText(raw.state) ?? UNKNOWN,
    carrier: readNonBlankText(raw.carrier) ?? UNKNOWN,
    stopIndex:
      raw.stopIndex === undefined || raw.stopIndex === null ? -1 : toInt(raw.stopIndex),
  };
}

export function decodeSignalRecord(id: number, raw: HostRecord | undefined, digits = 2): SignalRecord {
  return { id, position: raw ? readPosition(raw, digits) : undefined };
}
