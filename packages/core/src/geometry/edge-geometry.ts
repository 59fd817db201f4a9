import type { EntityAccessor } from '../host/entity-accessor.js';
import type { HostRecord, Point2 } from '../host/fields.js';
import {
  firstPresent,
  isHostRecord,
  readList,
  readPoint2,
  toEntityId,
} from '../host/fields.js';
import type { ComponentKind } from '../host/host-api.js';
import { isFiniteNumber } from '../validation/primitives.js';
import type { CurveParams, CurveSamplingOptions } from './curve.js';
import { reconstructCurve } from './curve.js';

const GEOMETRY_FIELDS = ['geometry', 'geo', 'geom'] as const;
const COORDINATE_FIELDS = [
  'coords',
  'points',
  'vertices',
  'samples',
  'middle',
  'positions',
] as const;

export const EDGE_COMPONENT_ORDER: readonly ComponentKind[] = [
  'BASE_EDGE',
  'TRACK_EDGE',
  'STREET_EDGE',
];

export type NodePositionLookup = (nodeId: number) => Point2 | undefined;

function readCoordinates(geometry: HostRecord): readonly unknown[] | undefined {
  const coords = firstPresent(geometry, COORDINATE_FIELDS);
  if (coords !== undefined) {
    return readList(coords);
  }
  const params = geometry.params;
  if (isHostRecord(params) && params.pos !== undefined) {
    return readList(params.pos);
  }
  return undefined;
}

function readAngles(
  pick: (keys: readonly string[]) => unknown,
): readonly [number, number] | undefined {
  const pairs: ReadonlyArray<readonly [string, string]> = [
    ['startAngle', 'endAngle'],
    ['angle0', 'angle1'],
  ];
  for (const [startKey, endKey] of pairs) {
    const start = pick([startKey]);
    const end = pick([endKey]);
    if (isFiniteNumber(start) && isFiniteNumber(end)) {
      return [start, end];
    }
  }
  const start = pick(['startAngle']);
  const span = pick(['angleSpan', 'span']);
  if (isFiniteNumber(start) && isFiniteNumber(span)) {
    return [start, start + span];
  }
  return undefined;
}

/**
 * Classifies a raw edge component into curve parameters. Explicit sampled
 * coordinates win over arc data, arc data over tangents, tangents over bare
 * endpoints.
 */
export function readCurveParams(
  component: HostRecord,
  nodePosition: NodePositionLookup,
): CurveParams | undefined {
  const geometryValue = firstPresent(component, GEOMETRY_FIELDS);
  const geometry = isHostRecord(geometryValue) ? geometryValue : undefined;

  if (geometry) {
    const coordinates = readCoordinates(geometry);
    if (coordinates !== undefined) {
      const points = coordinates
        .map((coordinate) => readPoint2(coordinate, 6))
        .filter((point): point is Point2 => point !== undefined);
      return { kind: 'polyline', points };
    }
  }

  const sources = geometry ? [geometry, component] : [component];
  const pick = (keys: readonly string[]): unknown => {
    for (const source of sources) {
      const value = firstPresent(source, keys);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  };

  const center = readPoint2(pick(['center']), 6);
  const radius = pick(['radius']);
  const angles = readAngles(pick);
  if (center && isFiniteNumber(radius) && angles) {
    return { kind: 'arc', center, radius, startAngle: angles[0], endAngle: angles[1] };
  }

  const start =
    readPoint2(pick(['p0', 'pos0']), 6) ?? nodePosition(toEntityId(pick(['node0'])));
  const end =
    readPoint2(pick(['p1', 'pos1']), 6) ?? nodePosition(toEntityId(pick(['node1'])));
  if (!start || !end) {
    return undefined;
  }

  const startTangent = readPoint2(pick(['tangent0', 't0']), 6);
  const endTangent = readPoint2(pick(['tangent1', 't1']), 6);
  if (startTangent && endTangent) {
    return { kind: 'spline', start, end, startTangent, endTangent };
  }
  return { kind: 'straight', start, end };
}

export function nodePositionFrom(accessor: EntityAccessor): NodePositionLookup {
  return (nodeId) => {
    if (nodeId <= 0) {
      return undefined;
    }
    return readPoint2(accessor.getComponent(nodeId, 'BASE_NODE')?.position, 6);
  };
}

export interface EdgeComponents {
  readonly geometry?: HostRecord;
  readonly kinds: ReadonlySet<ComponentKind>;
  readonly street?: HostRecord;
}

/**
 * Looks up the edge components in order; the first one found supplies the
 * geometry.
 */
export function readEdgeComponents(accessor: EntityAccessor, edgeId: number): EdgeComponents {
  const kinds = new Set<ComponentKind>();
  let geometry: HostRecord | undefined;
  let street: HostRecord | undefined;
  for (const kind of EDGE_COMPONENT_ORDER) {
    const component = accessor.getComponent(edgeId, kind);
    if (!component) {
      continue;
    }
    kinds.add(kind);
    geometry ??= component;
    if (kind === 'STREET_EDGE') {
      street = component;
    }
  }
  return { geometry, kinds, street };
}

export function edgePolyline(
  accessor: EntityAccessor,
  edgeId: number,
  sampling: CurveSamplingOptions,
  components: EdgeComponents = readEdgeComponents(accessor, edgeId),
): Point2[] {
  if (!components.geometry) {
    return [];
  }
  const params = readCurveParams(components.geometry, nodePositionFrom(accessor));
  return params ? reconstructCurve(params, sampling) : [];
}
