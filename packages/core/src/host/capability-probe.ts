import type { TelemetryFacade } from '../telemetry.js';
import { telemetry as defaultTelemetry } from '../telemetry.js';
import type {
  ComponentKind,
  EnumerableKind,
  HostApi,
  RegionBounds,
} from './host-api.js';

export interface EnumeratorCandidate {
  readonly label: string;
  readonly list: () => unknown;
}

export interface LookupCandidate {
  readonly label: string;
  readonly lookup: (id: number) => unknown;
}

export interface ComponentLookup {
  readonly label: string;
  readonly lookup: (id: number, type: unknown) => unknown;
}

export interface RegionEnumerator {
  readonly label: string;
  readonly enumerate: (bounds: RegionBounds) => unknown;
}

export interface ClockCandidate {
  readonly label: string;
  readonly read: () => unknown;
}

export interface LineEdgeSource {
  readonly label: string;
  readonly read: (lineId: number) => unknown;
  /**
   * Fields of the returned record that hold edge lists. Absent when the
   * source returns the edge list itself.
   */
  readonly listFields?: readonly string[];
}

/**
 * Result of probing the host once at startup. Every entry is an ordered list
 * of candidates; callers walk them in order and stop at the first one that
 * yields data.
 */
export interface HostCapabilities {
  readonly enumerators: Readonly<Record<EnumerableKind, readonly EnumeratorCandidate[]>>;
  readonly entityLookups: readonly LookupCandidate[];
  readonly vehicleLookups: readonly LookupCandidate[];
  readonly lineLookups: readonly LookupCandidate[];
  readonly componentLookup?: ComponentLookup;
  readonly componentTypes: Readonly<Record<ComponentKind, unknown>>;
  readonly regionEnumerator?: RegionEnumerator;
  readonly gameClocks: readonly ClockCandidate[];
  readonly lineEdgeSources: readonly LineEdgeSource[];
  readonly available: readonly string[];
  readonly missing: readonly string[];
  readonly entityTypeNames: readonly string[];
  readonly componentTypeNames: readonly string[];
}

export interface ProbeOptions {
  readonly telemetry?: TelemetryFacade;
}

const VEHICLE_TYPE_NAMES = ['VEHICLE', 'TRANSPORT_VEHICLE', 'Vehicle', 'vehicle'] as const;
const VEHICLE_RAW_TYPES = [10, 9, 8, 7, 6, 5, 4, 3, 11, 12, 13, 14, 15, 2, 1] as const;
const LINE_LIST_NAMES = ['LINE', 'entity.LINE', 'TRANSPORT_LINE'] as const;
const STATION_LIST_NAMES = ['STATION', 'entity.STATION'] as const;
const SIGNAL_TYPE_NAMES = ['SIGNAL', 'RAIL_SIGNAL', 'RAILROAD_SIGNAL'] as const;
const SIGNAL_RAW_TYPES = [18, 17, 16, 19, 20] as const;
const EDGE_TYPE_NAMES = ['BASE_EDGE', 'TRACK_EDGE', 'EDGE'] as const;
const LINE_EDGE_LIST_FIELDS = ['edgeList', 'edges', 'edgeIds', 'segments'] as const;

/**
 * Entity types whose upper-cased name contains `fragment`, skipping names the
 * explicit candidates already cover.
 */
function entityTypesMatching(
  entityTypes: Readonly<Record<string, unknown>>,
  fragment: string,
  exclude: readonly string[],
): Array<[string, unknown]> {
  return Object.entries(entityTypes).filter(
    ([name, value]) =>
      value !== undefined &&
      !exclude.includes(name) &&
      name.toUpperCase().includes(fragment),
  );
}

export function probeHostCapabilities(
  host: HostApi,
  options: ProbeOptions = {},
): HostCapabilities {
  const telemetry = options.telemetry ?? defaultTelemetry;
  const available: string[] = [];
  const missing: string[] = [];

  const note = (capability: string, present: boolean): void => {
    (present ? available : missing).push(capability);
  };

  const scripting = host.scripting;
  const engine = host.engine;
  const entityTypes = host.types?.entityTypes;
  const componentTable = host.types?.componentTypes;

  const scriptingList = scripting?.getEntityList;
  const engineList = engine?.getEntityList;

  const engineEnumerator = (label: string, type: unknown): EnumeratorCandidate[] =>
    engineList ? [{ label, list: () => engineList.call(engine, type) }] : [];

  const namedEngineEnumerators = (names: readonly string[]): EnumeratorCandidate[] => {
    if (!entityTypes) {
      return [];
    }
    return names.flatMap((name) =>
      entityTypes[name] === undefined
        ? []
        : engineEnumerator(`engine.getEntityList(${name})`, entityTypes[name]),
    );
  };

  const matchingEngineEnumerators = (
    fragment: string,
    exclude: readonly string[],
  ): EnumeratorCandidate[] =>
    entityTypes
      ? entityTypesMatching(entityTypes, fragment, exclude).flatMap(([name, value]) =>
          engineEnumerator(`engine.getEntityList(${name})`, value),
        )
      : [];

  const rawEngineEnumerators = (types: readonly number[]): EnumeratorCandidate[] =>
    types.flatMap((type) => engineEnumerator(`engine.getEntityList(${type})`, type));

  const scriptingNamedLists = (names: readonly string[]): EnumeratorCandidate[] =>
    scriptingList
      ? names.map((name) => ({
          label: `scripting.getEntityList(${name})`,
          list: () => scriptingList.call(scripting, name),
        }))
      : [];

  const scriptingCall = (
    name: 'getVehicles' | 'getLines' | 'getStations',
  ): EnumeratorCandidate[] => {
    const fn = scripting?.[name];
    return fn ? [{ label: `scripting.${name}`, list: () => fn.call(scripting) }] : [];
  };

  const vehicle = [
    ...scriptingCall('getVehicles'),
    ...namedEngineEnumerators(VEHICLE_TYPE_NAMES),
    ...matchingEngineEnumerators('VEHICLE', VEHICLE_TYPE_NAMES),
    ...rawEngineEnumerators(VEHICLE_RAW_TYPES),
  ];
  const line = [...scriptingCall('getLines'), ...scriptingNamedLists(LINE_LIST_NAMES)];
  const station = [
    ...scriptingCall('getStations'),
    ...scriptingNamedLists(STATION_LIST_NAMES),
  ];
  const stationGroup = [
    ...namedEngineEnumerators(['STATION_GROUP']),
    ...scriptingNamedLists(['STATION_GROUP']),
  ];
  // Signals are only enumerated on hosts that publish an entity type table.
  const signal = entityTypes
    ? [
        ...namedEngineEnumerators(SIGNAL_TYPE_NAMES),
        ...matchingEngineEnumerators('SIGNAL', SIGNAL_TYPE_NAMES),
        ...rawEngineEnumerators(SIGNAL_RAW_TYPES),
      ]
    : [];
  const edge = namedEngineEnumerators(EDGE_TYPE_NAMES);

  const enumerators: Record<EnumerableKind, readonly EnumeratorCandidate[]> = {
    vehicle,
    line,
    station,
    stationGroup,
    signal,
    edge,
  };
  for (const [kind, candidates] of Object.entries(enumerators)) {
    note(`enumerate.${kind}`, candidates.length > 0);
  }

  const lookup = (
    label: string,
    fn: ((id: number) => unknown) | undefined,
    self: unknown,
  ): LookupCandidate[] => (fn ? [{ label, lookup: (id) => fn.call(self, id) }] : []);

  const entityLookups = lookup('scripting.getEntity', scripting?.getEntity, scripting);
  const vehicleLookups = [
    ...lookup('scripting.getVehicle', scripting?.getVehicle, scripting),
    ...entityLookups,
  ];
  const lineLookups = [
    ...lookup('scripting.getLine', scripting?.getLine, scripting),
    ...entityLookups,
  ];
  note('lookup.entity', entityLookups.length > 0);
  note('lookup.vehicle', vehicleLookups.length > 0);
  note('lookup.line', lineLookups.length > 0);

  const getComponent = engine?.getComponent;
  const componentLookup: ComponentLookup | undefined = getComponent
    ? { label: 'engine.getComponent', lookup: (id, type) => getComponent.call(engine, id, type) }
    : undefined;
  note('component', componentLookup !== undefined);

  // Hosts without a component type table accept the symbolic names.
  const componentType = (kind: ComponentKind): unknown => componentTable?.[kind] ?? kind;
  const componentTypes: Record<ComponentKind, unknown> = {
    BASE_EDGE: componentType('BASE_EDGE'),
    BASE_NODE: componentType('BASE_NODE'),
    TRACK_EDGE: componentType('TRACK_EDGE'),
    STREET_EDGE: componentType('STREET_EDGE'),
    SIGNAL: componentType('SIGNAL'),
  };

  const enumerateRegion = engine?.enumerateRegion;
  const edgeType = EDGE_TYPE_NAMES.map((name) => entityTypes?.[name]).find(
    (value) => value !== undefined,
  );
  const regionEnumerator: RegionEnumerator | undefined = enumerateRegion
    ? {
        label: 'engine.enumerateRegion',
        enumerate: (bounds) => enumerateRegion.call(engine, bounds, edgeType ?? 'BASE_EDGE'),
      }
    : undefined;
  note('enumerateRegion', regionEnumerator !== undefined);

  const gameClocks: ClockCandidate[] = [];
  const scriptingClock = scripting?.getGameTime;
  if (scriptingClock) {
    gameClocks.push({ label: 'scripting.getGameTime', read: () => scriptingClock.call(scripting) });
  }
  const engineClock = engine?.getGameTime;
  if (engineClock) {
    gameClocks.push({ label: 'engine.getGameTime', read: () => engineClock.call(engine) });
  }
  note('gameTime', gameClocks.length > 0);

  const network = engine?.transportNetwork;
  const lineEdgeSources: LineEdgeSource[] = [];
  for (const name of ['getLine', 'getLineObject', 'getLineData'] as const) {
    const fn = network?.[name];
    if (fn) {
      lineEdgeSources.push({
        label: `transportNetwork.${name}`,
        read: (lineId) => fn.call(network, lineId),
        listFields: LINE_EDGE_LIST_FIELDS,
      });
    }
  }
  const getLineEdges = network?.getLineEdges;
  if (getLineEdges) {
    lineEdgeSources.push({
      label: 'transportNetwork.getLineEdges',
      read: (lineId) => getLineEdges.call(network, lineId),
    });
  }
  note('lineEdges', lineEdgeSources.length > 0);

  for (const capability of missing) {
    telemetry.recordWarning('HostCapabilityUnavailable', { capability });
  }

  return Object.freeze({
    enumerators: Object.freeze(enumerators),
    entityLookups,
    vehicleLookups,
    lineLookups,
    componentLookup,
    componentTypes: Object.freeze(componentTypes),
    regionEnumerator,
    gameClocks,
    lineEdgeSources,
    available: Object.freeze(available),
    missing: Object.freeze(missing),
    entityTypeNames: Object.keys(entityTypes ?? {}),
    componentTypeNames: Object.keys(componentTable ?? {}),
  });
}
