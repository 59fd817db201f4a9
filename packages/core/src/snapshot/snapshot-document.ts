import type { Point2, Vec3 } from '../host/fields.js';
import { isHostRecord } from '../host/fields.js';
import type { LinePath } from '../geometry/path-builder.js';
import type { TrackEdge } from '../geometry/track-collector.js';
import type { ResolvedLine } from '../resolve/line-resolver.js';
import type { Station } from '../resolve/station-resolver.js';
import type { SignalState } from '../signals/signal-collector.js';
import type { VehicleState } from '../vehicles/vehicle-collector.js';
import type { DeterministicEncodeOptions } from '../serializer/deterministic-json.js';
import { encodeDeterministic } from '../serializer/deterministic-json.js';
import { SNAPSHOT_SCHEMA_VERSION } from '../version.js';
import type {
  SnapshotDocument,
  SnapshotGameTime,
  SnapshotLine,
  SnapshotStation,
  SnapshotStats,
  SnapshotVehicle,
} from './snapshot-schema.js';

export interface SnapshotContents {
  readonly vehicles: readonly VehicleState[];
  readonly lines: readonly ResolvedLine[];
  readonly stations: readonly Station[];
  readonly paths: readonly LinePath[];
  readonly tracks: readonly TrackEdge[];
  readonly signals: readonly SignalState[];
}

export const EMPTY_CONTENTS: SnapshotContents = Object.freeze({
  vehicles: [],
  lines: [],
  stations: [],
  paths: [],
  tracks: [],
  signals: [],
});

export const EMPTY_STATS: SnapshotStats = Object.freeze({
  total_vehicles: 0,
  total_passengers: 0,
  total_lines: 0,
  total_stations: 0,
  vehicles_by_type: {},
});

export function computeStats(contents: SnapshotContents): SnapshotStats {
  const byType = new Map<string, number>();
  let passengers = 0;
  for (const vehicle of contents.vehicles) {
    passengers += vehicle.passengers;
    byType.set(vehicle.type, (byType.get(vehicle.type) ?? 0) + 1);
  }
  return {
    total_vehicles: contents.vehicles.length,
    total_passengers: passengers,
    total_lines: contents.lines.length,
    total_stations: contents.stations.length,
    vehicles_by_type: Object.fromEntries(byType),
  };
}

/**
 * Host clocks come back as numbers, strings or records of calendar fields.
 * Anything else is reported as `null`.
 */
export function normalizeGameTime(value: unknown): SnapshotGameTime {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return [...value];
  }
  if (isHostRecord(value)) {
    return { ...value };
  }
  return null;
}

const point = ({ x, y }: Point2): Point2 => ({ x, y });
const position = ({ x, y, z }: Vec3): Vec3 => ({ x, y, z });

function toVehicleEntry(vehicle: VehicleState): SnapshotVehicle {
  return {
    id: vehicle.id,
    name: vehicle.name,
    type: vehicle.type,
    state: vehicle.state,
    line_id: vehicle.lineId,
    line_name: vehicle.lineName,
    position: position(vehicle.position),
    speed_ms: vehicle.speedMs,
    speed_kmh: vehicle.speedKmh,
    direction: vehicle.direction,
    passengers: vehicle.passengers,
    capacity: vehicle.capacity,
    cargo: vehicle.cargo,
    cargo_capacity: vehicle.cargoCapacity,
    last_stop_id: vehicle.lastStopId,
    last_stop_name: vehicle.lastStopName,
    next_stop_id: vehicle.nextStopId,
    next_stop_name: vehicle.nextStopName,
    raw_stop_index: vehicle.rawStopIndex,
  };
}

function toLineEntry(line: ResolvedLine): SnapshotLine {
  return {
    id: line.id,
    name: line.name,
    vehicle_type: line.vehicleType,
    stops: line.stops.map((stop) => ({
      index: stop.index,
      station_id: stop.stationId,
      raw_stop_id: stop.rawStopId,
      name: stop.name,
    })),
    stop_count: line.stopCount,
  };
}

function toStationEntry(station: Station): SnapshotStation {
  return {
    id: station.id,
    name: station.name,
    pos: position(station.position),
    is_group: station.isGroup,
  };
}

export function toSnapshotDocument(
  writeCount: number,
  gameTime: unknown,
  contents: SnapshotContents,
  stats: SnapshotStats = computeStats(contents),
): SnapshotDocument {
  return {
    schema_version: SNAPSHOT_SCHEMA_VERSION,
    write_count: writeCount,
    game_time: normalizeGameTime(gameTime),
    stats,
    vehicles: contents.vehicles.map(toVehicleEntry),
    lines: contents.lines.map(toLineEntry),
    stations: contents.stations.map(toStationEntry),
    paths: contents.paths.map((path) => ({
      line_id: path.lineId,
      points: path.points.map(point),
    })),
    tracks: contents.tracks.map((track) => ({
      id: track.id,
      kind: track.kind,
      points: track.points.map(point),
    })),
    signals: contents.signals.map((signal) => ({
      id: signal.id,
      pos: position(signal.position),
      state: signal.state,
    })),
  };
}

/**
 * Minimal valid document written when a cycle fails outside every stage.
 */
export function createFallbackDocument(writeCount: number): SnapshotDocument {
  return toSnapshotDocument(writeCount, null, EMPTY_CONTENTS, EMPTY_STATS);
}

/**
 * Encodes a document for writing. `vehicles_by_type` is keyed by host carrier
 * names, which may be digit runs; passed as a string-keyed Map it always
 * encodes as an object.
 */
export function encodeSnapshotDocument(
  document: SnapshotDocument,
  options: DeterministicEncodeOptions = {},
): string {
  return encodeDeterministic(
    {
      ...document,
      stats: {
        ...document.stats,
        vehicles_by_type: new Map(Object.entries(document.stats.vehicles_by_type)),
      },
    },
    options,
  );
}
