import type { Point2 } from '../host/fields.js';
import { roundTo } from '../host/fields.js';

export type CurveParams =
  | { readonly kind: 'straight'; readonly start: Point2; readonly end: Point2 }
  | {
      readonly kind: 'arc';
      readonly center: Point2;
      readonly radius: number;
      /** Radians. */
      readonly startAngle: number;
      readonly endAngle: number;
    }
  | {
      readonly kind: 'spline';
      readonly start: Point2;
      readonly end: Point2;
      readonly startTangent: Point2;
      readonly endTangent: Point2;
    }
  | { readonly kind: 'polyline'; readonly points: readonly Point2[] };

export interface CurveSamplingOptions {
  readonly arcSubdivisions: number;
  readonly splineSubdivisions: number;
  /** Squared tangent length below which a spline is drawn straight. */
  readonly degenerateTangentSq: number;
  readonly coordinateDigits: number;
}

export const DEFAULT_CURVE_SAMPLING: CurveSamplingOptions = Object.freeze({
  arcSubdivisions: 10,
  splineSubdivisions: 8,
  degenerateTangentSq: 0.01,
  coordinateDigits: 2,
});

const lengthSq = (vector: Point2): number => vector.x * vector.x + vector.y * vector.y;

export function isDegenerateTangent(tangent: Point2, thresholdSq: number): boolean {
  return lengthSq(tangent) < thresholdSq;
}

function sampleArc(
  center: Point2,
  radius: number,
  startAngle: number,
  endAngle: number,
  subdivisions: number,
): Point2[] {
  const points: Point2[] = [];
  const span = endAngle - startAngle;
  for (let step = 0; step <= subdivisions; step += 1) {
    const angle = startAngle + (span * step) / subdivisions;
    points.push({
      x: center.x + radius * Math.cos(angle),
      y: center.y + radius * Math.sin(angle),
    });
  }
  return points;
}

/**
 * Cubic Hermite interpolation between two endpoints with their tangents.
 */
function sampleHermite(
  start: Point2,
  end: Point2,
  startTangent: Point2,
  endTangent: Point2,
  subdivisions: number,
): Point2[] {
  const points: Point2[] = [];
  for (let step = 0; step <= subdivisions; step += 1) {
    const t = step / subdivisions;
    const t2 = t * t;
    const t3 = t2 * t;
    const h00 = 2 * t3 - 3 * t2 + 1;
    const h10 = t3 - 2 * t2 + t;
    const h01 = -2 * t3 + 3 * t2;
    const h11 = t3 - t2;
    points.push({
      x: h00 * start.x + h10 * startTangent.x + h01 * end.x + h11 * endTangent.x,
      y: h00 * start.y + h10 * startTangent.y + h01 * end.y + h11 * endTangent.y,
    });
  }
  return points;
}

function roundPoint(point: Point2, digits: number): Point2 {
  return { x: roundTo(point.x, digits), y: roundTo(point.y, digits) };
}

function samplePoints(params: CurveParams, sampling: CurveSamplingOptions): Point2[] {
  switch (params.kind) {
    case 'straight':
      return [params.start, params.end];
    case 'arc':
      return sampleArc(
        params.center,
        params.radius,
        params.startAngle,
        params.endAngle,
        Math.max(1, sampling.arcSubdivisions),
      );
    case 'spline':
      if (
        isDegenerateTangent(params.startTangent, sampling.degenerateTangentSq) &&
        isDegenerateTangent(params.endTangent, sampling.degenerateTangentSq)
      ) {
        return [params.start, params.end];
      }
      return sampleHermite(
        params.start,
        params.end,
        params.startTangent,
        params.endTangent,
        Math.max(1, sampling.splineSubdivisions),
      );
    case 'polyline':
      return [...params.points];
  }
}

/**
 * Samples curve parameters into a polyline. Points that are not finite are
 * dropped.
 */
export function reconstructCurve(
  params: CurveParams,
  options: Partial<CurveSamplingOptions> = {},
): Point2[] {
  const sampling = { ...DEFAULT_CURVE_SAMPLING, ...options };
  return samplePoints(params, sampling)
    .filter((point) => Number.isFinite(point.x) && Number.isFinite(point.y))
    .map((point) => roundPoint(point, sampling.coordinateDigits));
}
