import type { HostRecord } from './fields.js';
import { isHostRecord } from './fields.js';
import type { ComponentKind, HostApi, RegionBounds } from './host-api.js';
import { COMPONENT_KINDS } from './host-api.js';

/**
 * Plain description of a host world. Keys of `entities`, `components` and
 * `lineEdges` are entity ids.
 */
export interface FakeWorld {
  readonly entities?: Readonly<Record<string, HostRecord>>;
  readonly vehicles?: readonly number[];
  readonly lines?: readonly number[];
  readonly stations?: readonly number[];
  readonly stationGroups?: readonly number[];
  readonly signals?: readonly number[];
  readonly edges?: readonly number[];
  readonly components?: Readonly<
    Record<string, Readonly<Partial<Record<ComponentKind, HostRecord>>>>
  >;
  readonly lineEdges?: Readonly<Record<string, readonly number[]>>;
  readonly gameTime?: unknown;
}

export type FakeHostCapability =
  | 'scripting.getEntity'
  | 'scripting.getVehicle'
  | 'scripting.getLine'
  | 'scripting.getVehicles'
  | 'scripting.getLines'
  | 'scripting.getStations'
  | 'scripting.getEntityList'
  | 'scripting.getGameTime'
  | 'engine.getEntityList'
  | 'engine.getComponent'
  | 'engine.getGameTime'
  | 'engine.enumerateRegion'
  | 'transportNetwork.getLine'
  | 'types';

export interface FakeHostOptions {
  /** Capabilities the host does not expose at all. */
  readonly omit?: readonly FakeHostCapability[];
  /** Capabilities that exist but throw on every call. */
  readonly failing?: readonly FakeHostCapability[];
}

export interface FakeHost extends HostApi {
  /** Number of calls per capability, including failed ones. */
  readonly calls: ReadonlyMap<FakeHostCapability, number>;
  /** Replaces the set of capabilities that throw. */
  setFailing(capabilities: readonly FakeHostCapability[]): void;
}

export const FAKE_ENTITY_TYPES = Object.freeze({
  VEHICLE: 101,
  STATION_GROUP: 102,
  SIGNAL: 103,
  BASE_EDGE: 104,
});

export const FAKE_COMPONENT_TYPES: Readonly<Record<ComponentKind, number>> = Object.freeze({
  BASE_EDGE: 201,
  BASE_NODE: 202,
  TRACK_EDGE: 203,
  STREET_EDGE: 204,
  SIGNAL: 205,
});

function inBounds(record: HostRecord | undefined, bounds: RegionBounds): boolean {
  const position = record?.position;
  if (!isHostRecord(position)) {
    return true;
  }
  const { x, y } = position;
  if (typeof x !== 'number' || typeof y !== 'number') {
    return true;
  }
  return x >= bounds.minX && x <= bounds.maxX && y >= bounds.minY && y <= bounds.maxY;
}

/**
 * In-process stand-in for the simulation host, built from a plain world
 * description. Used by tests and the headless simulator.
 */
export function createFakeHost(world: FakeWorld, options: FakeHostOptions = {}): FakeHost {
  const omitted = new Set(options.omit ?? []);
  let failing = new Set(options.failing ?? []);
  const calls = new Map<FakeHostCapability, number>();

  function expose<TArgs extends unknown[]>(
    name: FakeHostCapability,
    fn: (...args: TArgs) => unknown,
  ): ((...args: TArgs) => unknown) | undefined {
    if (omitted.has(name)) {
      return undefined;
    }
    return (...args: TArgs) => {
      calls.set(name, (calls.get(name) ?? 0) + 1);
      if (failing.has(name)) {
        throw new Error(`${name} failed`);
      }
      return fn(...args);
    };
  }

  const entity = (id: number): HostRecord | undefined => world.entities?.[String(id)];
  const listOf = (ids: readonly number[] | undefined): number[] => [...(ids ?? [])];

  const byEntityType = new Map<unknown, readonly number[] | undefined>([
    [FAKE_ENTITY_TYPES.VEHICLE, world.vehicles],
    [FAKE_ENTITY_TYPES.STATION_GROUP, world.stationGroups],
    [FAKE_ENTITY_TYPES.SIGNAL, world.signals],
    [FAKE_ENTITY_TYPES.BASE_EDGE, world.edges],
  ]);
  const byListName = new Map<string, readonly number[] | undefined>([
    ['LINE', world.lines],
    ['STATION', world.stations],
    ['STATION_GROUP', world.stationGroups],
  ]);
  // Hosts without a type table are addressed by symbolic component names.
  const componentKindOf = new Map<unknown, ComponentKind>();
  for (const kind of COMPONENT_KINDS) {
    componentKindOf.set(FAKE_COMPONENT_TYPES[kind], kind);
    componentKindOf.set(kind, kind);
  }

  const host: FakeHost = {
    calls,
    setFailing(capabilities) {
      failing = new Set(capabilities);
    },
    scripting: {
      getEntity: expose('scripting.getEntity', entity),
      getVehicle: expose('scripting.getVehicle', (id: number) =>
        world.vehicles?.includes(id) ? entity(id) : undefined,
      ),
      getLine: expose('scripting.getLine', (id: number) =>
        world.lines?.includes(id) ? entity(id) : undefined,
      ),
      getVehicles: expose('scripting.getVehicles', () => listOf(world.vehicles)),
      getLines: expose('scripting.getLines', () => listOf(world.lines)),
      getStations: expose('scripting.getStations', () => listOf(world.stations)),
      getEntityList: expose('scripting.getEntityList', (kindName: string) =>
        listOf(byListName.get(kindName)),
      ),
      getGameTime: expose('scripting.getGameTime', () => world.gameTime),
    },
    engine: {
      getEntityList: expose('engine.getEntityList', (type: unknown) =>
        listOf(byEntityType.get(type)),
      ),
      getComponent: expose('engine.getComponent', (id: number, type: unknown) => {
        const kind = componentKindOf.get(type);
        return kind ? world.components?.[String(id)]?.[kind] : undefined;
      }),
      getGameTime: expose('engine.getGameTime', () => world.gameTime),
      enumerateRegion: expose('engine.enumerateRegion', (bounds: RegionBounds) =>
        listOf(world.edges).filter((id) => inBounds(entity(id), bounds)),
      ),
      transportNetwork: {
        getLine: expose('transportNetwork.getLine', (lineId: number) => {
          const edges = world.lineEdges?.[String(lineId)];
          return edges ? { edgeList: [...edges] } : undefined;
        }),
      },
    },
    types: omitted.has('types')
      ? undefined
      : { entityTypes: FAKE_ENTITY_TYPES, componentTypes: FAKE_COMPONENT_TYPES },
  };
  return host;
}
