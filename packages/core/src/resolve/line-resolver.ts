import type { EntityAccessor } from '../host/entity-accessor.js';
import { isHostRecord } from '../host/fields.js';
import { decodeLineRecord } from '../host/records.js';
import { findNameDeep, isUsableName, pickName, STOP_NAME_FIELDS } from './names.js';
import type { StationResolver, StopStation } from './station-resolver.js';

export interface ResolvedStop {
  /** 1-based position in the host's stop order. */
  readonly index: number;
  readonly stationId: number;
  readonly rawStopId: number;
  readonly name: string;
}

export interface ResolvedLine {
  readonly id: number;
  readonly name: string;
  readonly vehicleType: string;
  readonly stops: readonly ResolvedStop[];
  readonly stopCount: number;
}

function stopDisplayName(
  stop: unknown,
  location: StopStation,
  stations: StationResolver,
): string {
  const direct = isHostRecord(stop) ? pickName(stop, STOP_NAME_FIELDS) : undefined;
  if (direct !== undefined) {
    return direct;
  }

  const station = location.resolved ? stations.getStation(location.stationId) : undefined;
  if (station && isUsableName(station.name)) {
    return station.name;
  }

  const depth = stations.nameSearchDepth;
  const deep =
    findNameDeep(stations.entity(location.rawStopId), depth) ??
    (location.stationId !== location.rawStopId
      ? findNameDeep(stations.entity(location.stationId), depth)
      : undefined);
  if (deep !== undefined) {
    return deep;
  }

  if (station) {
    return station.name;
  }
  return `Stop #${location.stationId !== 0 ? location.stationId : location.rawStopId}`;
}

export function resolveLine(
  id: number,
  accessor: EntityAccessor,
  stations: StationResolver,
): ResolvedLine {
  const raw = accessor.getLine(id);
  const record = raw ? decodeLineRecord(id, raw) : undefined;
  const name =
    record?.name !== undefined && isUsableName(record.name) ? record.name : `Line #${id}`;

  const stops = (record?.stops ?? []).map((stop, position): ResolvedStop => {
    const location = stations.extractStopStation(stop);
    return {
      index: position + 1,
      stationId: location.stationId,
      rawStopId: location.rawStopId,
      name: stopDisplayName(stop, location, stations),
    };
  });

  return {
    id,
    name,
    vehicleType: record?.vehicleType ?? 'UNKNOWN',
    stops,
    stopCount: stops.length,
  };
}

/**
 * Resolves every enumerated line against the cycle's station index, keeping
 * the host's line and stop order.
 */
export function resolveLines(
  accessor: EntityAccessor,
  stations: StationResolver,
): ResolvedLine[] {
  return accessor.enumerate('line').map((id) => resolveLine(id, accessor, stations));
}
