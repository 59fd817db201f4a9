import { DEFAULT_TELEMETRY_CONFIG, resolveTelemetryConfig } from './config.js';
import type { TelemetryConfigOverrides } from './config.js';
import { createFakeHost } from './host/fake-host.js';
import type { FakeHostOptions, FakeWorld } from './host/fake-host.js';
import type { HostApi } from './host/host-api.js';
import { createMemorySnapshotSink } from './output/snapshot-sink.js';
import type { MemorySnapshotSink, SnapshotSink } from './output/snapshot-sink.js';
import { TelemetryRuntime } from './runtime/telemetry-runtime.js';
import type { TelemetryRuntimeOptions } from './runtime/telemetry-runtime.js';

export interface CreateTelemetryRuntimeOptions
  extends Omit<TelemetryRuntimeOptions, 'config'> {
  readonly config?: TelemetryConfigOverrides;
}

/**
 * Resolves the configuration overrides and builds a runtime for `host`.
 * Call `init()` on the result from the host's first lifecycle hook.
 */
export function createTelemetryRuntime(options: CreateTelemetryRuntimeOptions): TelemetryRuntime {
  return new TelemetryRuntime({
    ...options,
    config: options.config ? resolveTelemetryConfig(options.config) : DEFAULT_TELEMETRY_CONFIG,
  });
}

export interface InMemoryRuntime {
  readonly host: HostApi;
  readonly sink: MemorySnapshotSink;
  readonly runtime: TelemetryRuntime;
}

/**
 * Runtime over a synthetic world kept in memory, for tests and the simulator.
 */
export function createInMemoryRuntime(
  world: FakeWorld,
  options: Omit<CreateTelemetryRuntimeOptions, 'host' | 'sink'> & {
    readonly hostOptions?: FakeHostOptions;
    readonly sink?: SnapshotSink;
  } = {},
): InMemoryRuntime {
  const { hostOptions, sink: outerSink, ...runtimeOptions } = options;
  const host = createFakeHost(world, hostOptions);
  const sink = createMemorySnapshotSink();
  const forwardingSink: SnapshotSink = outerSink
    ? {
        writeSnapshot(text) {
          outerSink.writeSnapshot(text);
          sink.writeSnapshot(text);
        },
        writeDiagnostics(fileName, text) {
          outerSink.writeDiagnostics?.(fileName, text);
          sink.writeDiagnostics(fileName, text);
        },
      }
    : sink;
  const runtime = createTelemetryRuntime({ ...runtimeOptions, host, sink: forwardingSink });
  return { host, sink, runtime };
}

export {
  DEFAULT_TELEMETRY_CONFIG,
  TELEMETRY_CONFIG_HARD_CAPS,
  resolveTelemetryConfig,
  type TelemetryConfig,
  type TelemetryConfigOverrides,
} from './config.js';
export {
  createConsoleTelemetry,
  createContextualTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type ConsoleTelemetryOptions,
  type TelemetryConsole,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';
export { CORE_VERSION, SNAPSHOT_SCHEMA_VERSION } from './version.js';
export {
  COMPONENT_KINDS,
  ENUMERABLE_KINDS,
  type ComponentKind,
  type EnumerableKind,
  type HostApi,
  type HostEngine,
  type HostScriptingInterface,
  type HostTransportNetwork,
  type HostTypeTables,
  type RegionBounds,
} from './host/host-api.js';
export {
  probeHostCapabilities,
  type HostCapabilities,
  type ProbeOptions,
} from './host/capability-probe.js';
export { EntityAccessor, type EnumerationResult } from './host/entity-accessor.js';
export {
  ZERO_POSITION,
  isHostRecord,
  roundTo,
  toEntityId,
  type HostRecord,
  type Point2,
  type Vec3,
} from './host/fields.js';
export {
  decodeLineRecord,
  decodeSignalRecord,
  decodeStationGroupRecord,
  decodeStationRecord,
  decodeVehicleRecord,
  type LineRecord,
  type SignalRecord,
  type StationGroupRecord,
  type StationRecord,
  type VehicleRecord,
} from './host/records.js';
export {
  FAKE_COMPONENT_TYPES,
  FAKE_ENTITY_TYPES,
  createFakeHost,
  type FakeHost,
  type FakeHostCapability,
  type FakeHostOptions,
  type FakeWorld,
} from './host/fake-host.js';
export { boundedSearch, type BoundedSearchOptions } from './traversal/bounded-search.js';
export { findNameDeep, isPlaceholderName, isUsableName } from './resolve/names.js';
export {
  StationResolver,
  buildStationIndex,
  type Station,
  type StationIndexOptions,
  type StationResolution,
  type StopStation,
} from './resolve/station-resolver.js';
export {
  resolveLine,
  resolveLines,
  type ResolvedLine,
  type ResolvedStop,
} from './resolve/line-resolver.js';
export {
  DEFAULT_CURVE_SAMPLING,
  reconstructCurve,
  type CurveParams,
  type CurveSamplingOptions,
} from './geometry/curve.js';
export { edgePolyline, readCurveParams } from './geometry/edge-geometry.js';
export {
  collectTrackEdges,
  stationBounds,
  type TrackCollectOptions,
  type TrackEdge,
  type TrackKind,
} from './geometry/track-collector.js';
export { buildLinePaths, type LinePath, type PathBuildOptions } from './geometry/path-builder.js';
export {
  collectVehicles,
  toKmh,
  type VehicleCollectOptions,
  type VehicleState,
} from './vehicles/vehicle-collector.js';
export { enrichVehicles, locateStops, type StopPair } from './vehicles/stop-enrichment.js';
export {
  SIGNAL_UNKNOWN,
  collectSignals,
  readSignalAspect,
  type SignalAspect,
  type SignalState,
} from './signals/signal-collector.js';
export {
  AgedCache,
  SnapshotCacheManager,
  type CacheCycleReport,
  type CacheRefreshOutcome,
} from './cache/cache-manager.js';
export {
  SNAPSHOT_PHASES,
  StageError,
  attemptStage,
  recoverStage,
  type SnapshotPhase,
  type SnapshotStage,
  type StageResult,
} from './orchestrator/stage.js';
export {
  DEFAULT_SNAPSHOT_STAGES,
  SnapshotOrchestrator,
  type SnapshotOrchestratorOptions,
  type SnapshotStages,
} from './orchestrator/snapshot-orchestrator.js';
export {
  DEFAULT_MAX_DEPTH,
  encodeDeterministic,
  escapeJsonString,
  type DeterministicEncodeOptions,
} from './serializer/deterministic-json.js';
export {
  parseSnapshotDocument,
  snapshotDocumentSchema,
  type SnapshotDocument,
  type SnapshotGameTime,
  type SnapshotLine,
  type SnapshotStation,
  type SnapshotStats,
  type SnapshotVehicle,
} from './snapshot/snapshot-schema.js';
export {
  EMPTY_CONTENTS,
  computeStats,
  createFallbackDocument,
  encodeSnapshotDocument,
  toSnapshotDocument,
  type SnapshotContents,
} from './snapshot/snapshot-document.js';
export {
  DEFAULT_DIAGNOSTICS_FILE,
  DEFAULT_SNAPSHOT_FILE,
  createFileSnapshotSink,
  createMemorySnapshotSink,
  writeFileAtomic,
  type FileSnapshotSink,
  type MemorySnapshotSink,
  type SnapshotSink,
} from './output/snapshot-sink.js';
export { WriteThrottle, type WriteReason, type WriteThrottleOptions } from './scheduler/write-throttle.js';
export { TelemetryRuntime, type TelemetryRuntimeOptions } from './runtime/telemetry-runtime.js';
export { renderCapabilityReport } from './diagnostics/capability-report.js';
export {
  createCycleHistory,
  summarizeCycleHistory,
  type CycleHistory,
  type CycleHistorySnapshot,
  type CycleHistorySummary,
  type HighResolutionClock,
  type SnapshotCycleOutcome,
  type SnapshotCycleReport,
  type StageTiming,
} from './diagnostics/cycle-history.js';
