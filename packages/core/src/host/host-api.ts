/**
 * Shape of the simulation host as observed across its versions. Nothing here
 * is guaranteed: any namespace or member may be missing, and every call may
 * throw or return data in an unexpected shape. Only the capability probe
 * reads these members directly.
 */

export interface RegionBounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

/** Game-script namespace (string-keyed lookups). */
export interface HostScriptingInterface {
  readonly getEntity?: (id: number) => unknown;
  readonly getVehicle?: (id: number) => unknown;
  readonly getLine?: (id: number) => unknown;
  readonly getVehicles?: () => unknown;
  readonly getLines?: () => unknown;
  readonly getStations?: () => unknown;
  readonly getEntityList?: (kindName: string) => unknown;
  readonly getGameTime?: () => unknown;
}

export interface HostTransportNetwork {
  readonly getLine?: (lineId: number) => unknown;
  readonly getLineObject?: (lineId: number) => unknown;
  readonly getLineData?: (lineId: number) => unknown;
  readonly getLineEdges?: (lineId: number) => unknown;
}

/** Engine namespace (type-constant keyed lookups). */
export interface HostEngine {
  readonly getEntityList?: (type: unknown) => unknown;
  readonly getComponent?: (id: number, type: unknown) => unknown;
  readonly getGameTime?: () => unknown;
  readonly enumerateRegion?: (bounds: RegionBounds, type: unknown) => unknown;
  readonly transportNetwork?: HostTransportNetwork;
}

export interface HostTypeTables {
  readonly entityTypes?: Readonly<Record<string, unknown>>;
  readonly componentTypes?: Readonly<Record<string, unknown>>;
}

export interface HostApi {
  readonly scripting?: HostScriptingInterface;
  readonly engine?: HostEngine;
  readonly types?: HostTypeTables;
}

export type EnumerableKind =
  | 'vehicle'
  | 'line'
  | 'station'
  | 'stationGroup'
  | 'signal'
  | 'edge';

export const ENUMERABLE_KINDS: readonly EnumerableKind[] = [
  'vehicle',
  'line',
  'station',
  'stationGroup',
  'signal',
  'edge',
];

export type ComponentKind =
  | 'BASE_EDGE'
  | 'BASE_NODE'
  | 'TRACK_EDGE'
  | 'STREET_EDGE'
  | 'SIGNAL';

export const COMPONENT_KINDS: readonly ComponentKind[] = [
  'BASE_EDGE',
  'BASE_NODE',
  'TRACK_EDGE',
  'STREET_EDGE',
  'SIGNAL',
];
