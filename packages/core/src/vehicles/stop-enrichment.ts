import type { ResolvedLine, ResolvedStop } from '../resolve/line-resolver.js';
import type { VehicleState } from './vehicle-collector.js';

export interface StopPair {
  readonly next?: ResolvedStop;
  readonly last?: ResolvedStop;
}

/**
 * Next and last stop for a 0-based host stop index. The host reports the
 * stop the vehicle departed, so the next stop follows it and wraps to the
 * first stop after the end of the list.
 */
export function locateStops(rawStopIndex: number, stops: readonly ResolvedStop[]): StopPair {
  const count = stops.length;
  if (rawStopIndex < 0 || count === 0) {
    return {};
  }
  const next = (rawStopIndex + 1) % count;
  const last = next - 1 < 0 ? count - 1 : next - 1;
  return { next: stops[next], last: stops[last] };
}

function stopId(stop: ResolvedStop): number {
  return stop.stationId !== 0 ? stop.stationId : stop.rawStopId;
}

/**
 * Adds line names and next/last stops. Vehicles without a known line are
 * returned unchanged.
 */
export function enrichVehicles(
  vehicles: readonly VehicleState[],
  lines: readonly ResolvedLine[],
): VehicleState[] {
  const byId = new Map(lines.map((line) => [line.id, line]));
  return vehicles.map((vehicle) => {
    const line = vehicle.lineId !== 0 ? byId.get(vehicle.lineId) : undefined;
    if (!line) {
      return vehicle;
    }
    const { next, last } = locateStops(vehicle.rawStopIndex, line.stops);
    return {
      ...vehicle,
      lineName: line.name,
      nextStopId: next && stopId(next) !== 0 ? stopId(next) : vehicle.nextStopId,
      nextStopName: next ? next.name : vehicle.nextStopName,
      lastStopId: last && stopId(last) !== 0 ? stopId(last) : vehicle.lastStopId,
      lastStopName: last ? last.name : vehicle.lastStopName,
    };
  });
}
