import type { EntityAccessor } from '../host/entity-accessor.js';
import type { Vec3 } from '../host/fields.js';
import { ZERO_POSITION, roundTo } from '../host/fields.js';
import type { VehicleRecord } from '../host/records.js';
import { decodeVehicleRecord } from '../host/records.js';

export interface VehicleState {
  readonly id: number;
  readonly name: string;
  /** Carrier kind reported by the host (`RAIL`, `ROAD`, `TRAM`, ...). */
  readonly type: string;
  readonly state: string;
  readonly lineId: number;
  readonly lineName: string;
  readonly position: Vec3;
  readonly speedMs: number;
  readonly speedKmh: number;
  readonly direction: number;
  readonly passengers: number;
  readonly capacity: number;
  readonly cargo: number;
  readonly cargoCapacity: number;
  readonly lastStopId: number;
  readonly lastStopName: string;
  readonly nextStopId: number;
  readonly nextStopName: string;
  readonly rawStopIndex: number;
}

export interface VehicleCollectOptions {
  readonly includeCargo: boolean;
  readonly includeRoad: boolean;
  readonly coordinateDigits: number;
}

const ROAD_CARRIERS: ReadonlySet<string> = new Set(['ROAD', 'TRAM']);

export const KMH_PER_MS = 3.6;

export function toKmh(speedMs: number): number {
  return roundTo(speedMs * KMH_PER_MS, 1);
}

function isIncluded(record: VehicleRecord, options: VehicleCollectOptions): boolean {
  if (!options.includeRoad && ROAD_CARRIERS.has(record.carrier)) {
    return false;
  }
  const cargoOnly = record.capacity.passengers === 0 && record.capacity.cargo > 0;
  return options.includeCargo || !cargoOnly;
}

export function toVehicleState(record: VehicleRecord): VehicleState {
  return {
    id: record.id,
    name: record.name ?? `Vehicle #${record.id}`,
    type: record.carrier,
    state: record.state,
    lineId: record.lineId,
    lineName: '',
    position: record.position ?? ZERO_POSITION,
    speedMs: record.speedMs,
    speedKmh: toKmh(record.speedMs),
    direction: 1,
    passengers: record.load.passengers,
    capacity: record.capacity.passengers,
    cargo: record.load.cargo,
    cargoCapacity: record.capacity.cargo,
    lastStopId: 0,
    lastStopName: '',
    nextStopId: 0,
    nextStopName: '',
    rawStopIndex: record.stopIndex,
  };
}

export function collectVehicles(
  accessor: EntityAccessor,
  options: VehicleCollectOptions,
): VehicleState[] {
  const vehicles: VehicleState[] = [];
  for (const id of accessor.enumerate('vehicle')) {
    const raw = accessor.getVehicle(id);
    if (!raw) {
      continue;
    }
    const record = decodeVehicleRecord(id, raw, options.coordinateDigits);
    if (isIncluded(record, options)) {
      vehicles.push(toVehicleState(record));
    }
  }
  return vehicles;
}
