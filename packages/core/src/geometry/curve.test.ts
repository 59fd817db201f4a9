import { describe, expect, it } from 'vitest';

import { isDegenerateTangent, reconstructCurve } from './curve.js';
import { readCurveParams } from './edge-geometry.js';

describe('reconstructCurve', () => {
  it('draws a straight edge as its two endpoints', () => {
    expect(
      reconstructCurve({ kind: 'straight', start: { x: 0, y: 0 }, end: { x: 5, y: 5 } }),
    ).toEqual([
      { x: 0, y: 0 },
      { x: 5, y: 5 },
    ]);
  });

  it('samples arcs into subdivisions + 1 points', () => {
    const points = reconstructCurve(
      { kind: 'arc', center: { x: 0, y: 0 }, radius: 10, startAngle: 0, endAngle: Math.PI / 2 },
      { arcSubdivisions: 2 },
    );
    expect(points).toEqual([
      { x: 10, y: 0 },
      { x: 7.07, y: 7.07 },
      { x: 0, y: 10 },
    ]);
  });

  it('samples a straight Hermite spline at even steps', () => {
    const points = reconstructCurve({
      kind: 'spline',
      start: { x: 0, y: 0 },
      end: { x: 10, y: 0 },
      startTangent: { x: 10, y: 0 },
      endTangent: { x: 10, y: 0 },
    });
    expect(points).toHaveLength(9);
    expect(points.map((point) => point.x)).toEqual([
      0, 1.25, 2.5, 3.75, 5, 6.25, 7.5, 8.75, 10,
    ]);
    expect(points.every((point) => point.y === 0)).toBe(true);
  });

  it('draws a spline with near-zero tangents as a straight segment', () => {
    const points = reconstructCurve({
      kind: 'spline',
      start: { x: 1, y: 2 },
      end: { x: 30, y: 40 },
      startTangent: { x: 0.05, y: 0 },
      endTangent: { x: 0, y: 0.05 },
    });
    expect(points).toEqual([
      { x: 1, y: 2 },
      { x: 30, y: 40 },
    ]);
  });

  it('drops non-finite points and rounds the rest', () => {
    expect(
      reconstructCurve({
        kind: 'polyline',
        points: [
          { x: 0, y: 0 },
          { x: Number.NaN, y: 1 },
          { x: 1.234, y: 5.678 },
        ],
      }),
    ).toEqual([
      { x: 0, y: 0 },
      { x: 1.23, y: 5.68 },
    ]);
  });
});

describe('isDegenerateTangent', () => {
  it('compares the squared length against the threshold', () => {
    expect(isDegenerateTangent({ x: 0.05, y: 0.05 }, 0.01)).toBe(true);
    expect(isDegenerateTangent({ x: 0.1, y: 0.1 }, 0.01)).toBe(false);
  });
});

describe('readCurveParams', () => {
  const noNodes = (): undefined => undefined;

  it('prefers sampled coordinates', () => {
    expect(
      readCurveParams({ geometry: { coords: [[0, 0], [1, 1]], radius: 4 } }, noNodes),
    ).toEqual({
      kind: 'polyline',
      points: [
        { x: 0, y: 0 },
        { x: 1, y: 1 },
      ],
    });
    expect(readCurveParams({ geo: { params: { pos: [[1, 2], [3, 4]] } } }, noNodes)).toEqual({
      kind: 'polyline',
      points: [
        { x: 1, y: 2 },
        { x: 3, y: 4 },
      ],
    });
  });

  it('reads arcs from a start angle and a span', () => {
    expect(
      readCurveParams({ center: [0, 0], radius: 5, startAngle: 0.5, angleSpan: 1 }, noNodes),
    ).toEqual({ kind: 'arc', center: { x: 0, y: 0 }, radius: 5, startAngle: 0.5, endAngle: 1.5 });
  });

  it('reads splines from endpoints and tangents', () => {
    expect(
      readCurveParams({ p0: [0, 0], p1: [10, 0], t0: [1, 0], tangent1: { x: 1, y: 0 } }, noNodes),
    ).toEqual({
      kind: 'spline',
      start: { x: 0, y: 0 },
      end: { x: 10, y: 0 },
      startTangent: { x: 1, y: 0 },
      endTangent: { x: 1, y: 0 },
    });
  });

  it('falls back to node positions for the endpoints', () => {
    const nodes = new Map([
      [7, { x: 1, y: 1 }],
      [8, { x: 2, y: 3 }],
    ]);
    expect(readCurveParams({ node0: 7, node1: 8 }, (id) => nodes.get(id))).toEqual({
      kind: 'straight',
      start: { x: 1, y: 1 },
      end: { x: 2, y: 3 },
    });
  });

  it('returns undefined without endpoints', () => {
    expect(readCurveParams({ p0: [0, 0] }, noNodes)).toBeUndefined();
  });
});
