export interface TelemetryConfig {
  readonly trigger: {
    /**
     * Accumulated tick time (seconds) between two snapshot writes.
     *
     * @defaultValue `2`
     */
    readonly writeIntervalSeconds: number;
    /**
     * Amount each external event adds to the accumulator; at most one write
     * happens per unit.
     *
     * @defaultValue `1`
     */
    readonly eventUnit: number;
  };
  readonly caches: {
    /**
     * Snapshot cycles between full track-network scans.
     *
     * @defaultValue `30`
     */
    readonly trackRefreshCycles: number;
    /**
     * Snapshot cycles between signal state refreshes.
     *
     * @defaultValue `10`
     */
    readonly signalRefreshCycles: number;
  };
  readonly vehicles: {
    /** @defaultValue `true` */
    readonly includeCargo: boolean;
    /** @defaultValue `true` */
    readonly includeRoad: boolean;
  };
  readonly tracks: {
    /**
     * Emit plain street edges (without tram tracks) as `other`.
     *
     * @defaultValue `false`
     */
    readonly includeStreets: boolean;
    /**
     * Margin added around the station bounding box when edges have to be
     * found by region scan.
     *
     * @defaultValue `500`
     */
    readonly regionMargin: number;
  };
  readonly paths: {
    /**
     * Draw line paths from the host's line edge lists before falling back to
     * the stop-to-stop shape.
     *
     * @defaultValue `false`
     */
    readonly followLineEdges: boolean;
  };
  readonly geometry: {
    /** @defaultValue `10` */
    readonly arcSubdivisions: number;
    /** @defaultValue `8` */
    readonly splineSubdivisions: number;
    /**
     * Squared tangent length under which a spline is drawn as a straight
     * segment.
     *
     * @defaultValue `0.01`
     */
    readonly degenerateTangentSq: number;
    /** @defaultValue `2` */
    readonly coordinateDigits: number;
  };
  readonly limits: {
    /** @defaultValue `4` */
    readonly nameSearchDepth: number;
    /** @defaultValue `5` */
    readonly stationSearchDepth: number;
    /** @defaultValue `20` */
    readonly serializerMaxDepth: number;
    /** @defaultValue `60` */
    readonly cycleHistoryCapacity: number;
  };
  readonly serializer: {
    /**
     * Indentation unit of the written document; empty writes compact JSON.
     *
     * @defaultValue `''`
     */
    readonly indent: string;
  };
}

export type TelemetryConfigOverrides = Readonly<{
  readonly [Section in keyof TelemetryConfig]?: Partial<TelemetryConfig[Section]>;
}>;

export const DEFAULT_TELEMETRY_CONFIG: TelemetryConfig = Object.freeze({
  trigger: Object.freeze({ writeIntervalSeconds: 2, eventUnit: 1 }),
  caches: Object.freeze({ trackRefreshCycles: 30, signalRefreshCycles: 10 }),
  vehicles: Object.freeze({ includeCargo: true, includeRoad: true }),
  tracks: Object.freeze({ includeStreets: false, regionMargin: 500 }),
  paths: Object.freeze({ followLineEdges: false }),
  geometry: Object.freeze({
    arcSubdivisions: 10,
    splineSubdivisions: 8,
    degenerateTangentSq: 0.01,
    coordinateDigits: 2,
  }),
  limits: Object.freeze({
    nameSearchDepth: 4,
    stationSearchDepth: 5,
    serializerMaxDepth: 20,
    cycleHistoryCapacity: 60,
  }),
  serializer: Object.freeze({ indent: '' }),
});

/** Upper bounds applied after overrides; deeper or finer settings stall a cycle. */
export const TELEMETRY_CONFIG_HARD_CAPS = Object.freeze({
  subdivisions: 64,
  coordinateDigits: 6,
  searchDepth: 12,
  serializerMaxDepth: 64,
  cycleHistoryCapacity: 1000,
  indentLength: 8,
});

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toPositiveNumber(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric !== undefined && numeric > 0 ? numeric : undefined;
}

function toNonNegativeNumber(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric !== undefined && numeric >= 0 ? numeric : undefined;
}

function toPositiveInt(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || numeric <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(numeric));
}

function toNonNegativeInt(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric !== undefined && numeric >= 0 ? Math.floor(numeric) : undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function toIndent(value: unknown): string | undefined {
  if (typeof value !== 'string' || !/^[ \t]*$/.test(value)) {
    return undefined;
  }
  return value.slice(0, TELEMETRY_CONFIG_HARD_CAPS.indentLength);
}

function resolveGeometryConfig(
  overrides: TelemetryConfigOverrides['geometry'],
): TelemetryConfig['geometry'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_TELEMETRY_CONFIG.geometry;
  const caps = TELEMETRY_CONFIG_HARD_CAPS;
  return {
    arcSubdivisions: Math.min(
      toPositiveInt(source.arcSubdivisions) ?? defaults.arcSubdivisions,
      caps.subdivisions,
    ),
    splineSubdivisions: Math.min(
      toPositiveInt(source.splineSubdivisions) ?? defaults.splineSubdivisions,
      caps.subdivisions,
    ),
    degenerateTangentSq:
      toNonNegativeNumber(source.degenerateTangentSq) ?? defaults.degenerateTangentSq,
    coordinateDigits: Math.min(
      toNonNegativeInt(source.coordinateDigits) ?? defaults.coordinateDigits,
      caps.coordinateDigits,
    ),
  };
}

function resolveLimitsConfig(
  overrides: TelemetryConfigOverrides['limits'],
): TelemetryConfig['limits'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_TELEMETRY_CONFIG.limits;
  const caps = TELEMETRY_CONFIG_HARD_CAPS;
  return {
    nameSearchDepth: Math.min(
      toPositiveInt(source.nameSearchDepth) ?? defaults.nameSearchDepth,
      caps.searchDepth,
    ),
    stationSearchDepth: Math.min(
      toPositiveInt(source.stationSearchDepth) ?? defaults.stationSearchDepth,
      caps.searchDepth,
    ),
    serializerMaxDepth: Math.min(
      toPositiveInt(source.serializerMaxDepth) ?? defaults.serializerMaxDepth,
      caps.serializerMaxDepth,
    ),
    cycleHistoryCapacity: Math.min(
      toPositiveInt(source.cycleHistoryCapacity) ?? defaults.cycleHistoryCapacity,
      caps.cycleHistoryCapacity,
    ),
  };
}

export function resolveTelemetryConfig(overrides?: TelemetryConfigOverrides): TelemetryConfig {
  const defaults = DEFAULT_TELEMETRY_CONFIG;
  const trigger = overrides?.trigger ?? {};
  const caches = overrides?.caches ?? {};
  const vehicles = overrides?.vehicles ?? {};
  const tracks = overrides?.tracks ?? {};
  const paths = overrides?.paths ?? {};
  const serializer = overrides?.serializer ?? {};

  return Object.freeze({
    trigger: Object.freeze({
      writeIntervalSeconds:
        toPositiveNumber(trigger.writeIntervalSeconds) ?? defaults.trigger.writeIntervalSeconds,
      eventUnit: toPositiveNumber(trigger.eventUnit) ?? defaults.trigger.eventUnit,
    }),
    caches: Object.freeze({
      trackRefreshCycles:
        toPositiveInt(caches.trackRefreshCycles) ?? defaults.caches.trackRefreshCycles,
      signalRefreshCycles:
        toPositiveInt(caches.signalRefreshCycles) ?? defaults.caches.signalRefreshCycles,
    }),
    vehicles: Object.freeze({
      includeCargo: toBoolean(vehicles.includeCargo) ?? defaults.vehicles.includeCargo,
      includeRoad: toBoolean(vehicles.includeRoad) ?? defaults.vehicles.includeRoad,
    }),
    tracks: Object.freeze({
      includeStreets: toBoolean(tracks.includeStreets) ?? defaults.tracks.includeStreets,
      regionMargin: toNonNegativeNumber(tracks.regionMargin) ?? defaults.tracks.regionMargin,
    }),
    paths: Object.freeze({
      followLineEdges: toBoolean(paths.followLineEdges) ?? defaults.paths.followLineEdges,
    }),
    geometry: Object.freeze(resolveGeometryConfig(overrides?.geometry)),
    limits: Object.freeze(resolveLimitsConfig(overrides?.limits)),
    serializer: Object.freeze({
      indent: toIndent(serializer.indent) ?? defaults.serializer.indent,
    }),
  });
}
