import type { EntityAccessor } from '../host/entity-accessor.js';
import type { Point2 } from '../host/fields.js';
import { toInt } from '../host/fields.js';
import type { RegionBounds } from '../host/host-api.js';
import type { Station } from '../resolve/station-resolver.js';
import type { CurveSamplingOptions } from './curve.js';
import type { EdgeComponents } from './edge-geometry.js';
import { edgePolyline, readEdgeComponents } from './edge-geometry.js';

export type TrackKind = 'rail' | 'tram' | 'other';

export interface TrackEdge {
  readonly id: number;
  readonly kind: TrackKind;
  readonly points: readonly Point2[];
}

export interface TrackCollectOptions {
  readonly includeStreets: boolean;
  readonly regionMargin: number;
  readonly sampling: CurveSamplingOptions;
}

/**
 * Bounding box of all station positions grown by `margin` on every side.
 */
export function stationBounds(
  stations: readonly Station[],
  margin: number,
): RegionBounds | undefined {
  if (stations.length === 0) {
    return undefined;
  }
  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  for (const { position } of stations) {
    minX = Math.min(minX, position.x);
    minY = Math.min(minY, position.y);
    maxX = Math.max(maxX, position.x);
    maxY = Math.max(maxY, position.y);
  }
  return { minX: minX - margin, minY: minY - margin, maxX: maxX + margin, maxY: maxY + margin };
}

function classifyEdge(
  components: EdgeComponents,
  includeStreets: boolean,
): TrackKind | undefined {
  if (components.kinds.has('TRACK_EDGE')) {
    return 'rail';
  }
  const street = components.street;
  if (street) {
    if (toInt(street.tramTrackType) > 0 || street.hasTram === true) {
      return 'tram';
    }
    return includeStreets ? 'other' : undefined;
  }
  return 'other';
}

function edgeIds(
  accessor: EntityAccessor,
  stations: readonly Station[],
  margin: number,
): number[] {
  const enumerated = accessor.enumerate('edge');
  if (enumerated.length > 0) {
    return [...new Set(enumerated)];
  }
  const bounds = stationBounds(stations, margin);
  return bounds ? [...new Set(accessor.enumerateRegion(bounds))] : [];
}

/**
 * Full network scan producing the fine per-edge polylines. Expensive; the
 * cache manager decides how often it runs.
 */
export function collectTrackEdges(
  accessor: EntityAccessor,
  stations: readonly Station[],
  options: TrackCollectOptions,
): TrackEdge[] {
  const tracks: TrackEdge[] = [];
  for (const id of edgeIds(accessor, stations, options.regionMargin)) {
    const components = readEdgeComponents(accessor, id);
    if (!components.geometry) {
      continue;
    }
    const kind = classifyEdge(components, options.includeStreets);
    if (kind === undefined) {
      continue;
    }
    const points = edgePolyline(accessor, id, options.sampling, components);
    if (points.length >= 2) {
      tracks.push({ id, kind, points });
    }
  }
  return tracks;
}
