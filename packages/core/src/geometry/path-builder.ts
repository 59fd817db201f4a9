import type { EntityAccessor } from '../host/entity-accessor.js';
import type { Point2 } from '../host/fields.js';
import { readPosition } from '../host/fields.js';
import type { ResolvedLine } from '../resolve/line-resolver.js';
import type { StationResolver } from '../resolve/station-resolver.js';
import type { CurveSamplingOptions } from './curve.js';
import { edgePolyline } from './edge-geometry.js';

export interface LinePath {
  readonly lineId: number;
  readonly points: readonly Point2[];
}

export interface PathBuildOptions {
  readonly followLineEdges: boolean;
  readonly sampling: CurveSamplingOptions;
}

/**
 * Concatenated geometry of the first published edge list of a line that
 * yields any points.
 */
function lineEdgePoints(
  accessor: EntityAccessor,
  lineId: number,
  sampling: CurveSamplingOptions,
): Point2[] {
  for (const edgeList of accessor.getLineEdgeLists(lineId)) {
    const points = edgeList.flatMap((edgeId) => edgePolyline(accessor, edgeId, sampling));
    if (points.length > 0) {
      return points;
    }
  }
  return [];
}

function stopPoints(line: ResolvedLine, stations: StationResolver, digits: number): Point2[] {
  const points: Point2[] = [];
  for (const stop of line.stops) {
    const station = stations.getStation(stop.stationId);
    const position =
      station?.position ??
      (stop.rawStopId !== 0 ? readPosition(stations.entity(stop.rawStopId), digits) : undefined);
    if (position) {
      points.push({ x: position.x, y: position.y });
    }
  }
  return points;
}

/**
 * Coarse per-line route shapes. Lines that yield no points get no entry.
 */
export function buildLinePaths(
  lines: readonly ResolvedLine[],
  stations: StationResolver,
  accessor: EntityAccessor,
  options: PathBuildOptions,
): LinePath[] {
  const paths: LinePath[] = [];
  for (const line of lines) {
    let points = options.followLineEdges
      ? lineEdgePoints(accessor, line.id, options.sampling)
      : [];
    if (points.length === 0) {
      points = stopPoints(line, stations, options.sampling.coordinateDigits);
    }
    if (points.length > 0) {
      paths.push({ lineId: line.id, points });
    }
  }
  return paths;
}
