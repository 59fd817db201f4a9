import type { CacheCycleReport, CacheRefreshContext } from '../cache/cache-manager.js';
import { SnapshotCacheManager } from '../cache/cache-manager.js';
import type { TelemetryConfig } from '../config.js';
import { DEFAULT_TELEMETRY_CONFIG } from '../config.js';
import type {
  CycleHistory,
  HighResolutionClock,
  SnapshotCycleOutcome,
  SnapshotCycleReport,
  StageTiming,
} from '../diagnostics/cycle-history.js';
import { getDefaultHighResolutionClock } from '../diagnostics/cycle-history.js';
import type { CurveSamplingOptions } from '../geometry/curve.js';
import type { LinePath } from '../geometry/path-builder.js';
import { buildLinePaths } from '../geometry/path-builder.js';
import type { EntityAccessor } from '../host/entity-accessor.js';
import type { SnapshotSink } from '../output/snapshot-sink.js';
import type { ResolvedLine } from '../resolve/line-resolver.js';
import { resolveLines } from '../resolve/line-resolver.js';
import type { StationIndexOptions } from '../resolve/station-resolver.js';
import { StationResolver, buildStationIndex } from '../resolve/station-resolver.js';
import type { SnapshotContents } from '../snapshot/snapshot-document.js';
import {
  EMPTY_STATS,
  computeStats,
  createFallbackDocument,
  encodeSnapshotDocument,
  toSnapshotDocument,
} from '../snapshot/snapshot-document.js';
import type { SnapshotDocument, SnapshotStats } from '../snapshot/snapshot-schema.js';
import type { TelemetryFacade } from '../telemetry.js';
import { telemetry as defaultTelemetry } from '../telemetry.js';
import { enrichVehicles } from '../vehicles/stop-enrichment.js';
import type { VehicleState } from '../vehicles/vehicle-collector.js';
import { collectVehicles } from '../vehicles/vehicle-collector.js';
import type { SnapshotPhase, SnapshotStage, StageResult } from './stage.js';
import { attemptStage, describeError, recoverStage } from './stage.js';

/**
 * The replaceable work of each pipeline stage. Tests swap single entries to
 * inject failures; everything else keeps the default implementation.
 */
export interface SnapshotStages {
  readonly buildStations: (accessor: EntityAccessor, config: TelemetryConfig) => StationResolver;
  readonly resolveLines: (
    accessor: EntityAccessor,
    stations: StationResolver,
  ) => readonly ResolvedLine[];
  readonly collectVehicles: (
    accessor: EntityAccessor,
    config: TelemetryConfig,
  ) => readonly VehicleState[];
  readonly enrichVehicles: (
    vehicles: readonly VehicleState[],
    lines: readonly ResolvedLine[],
  ) => readonly VehicleState[];
  readonly buildPaths: (
    lines: readonly ResolvedLine[],
    stations: StationResolver,
    accessor: EntityAccessor,
    config: TelemetryConfig,
  ) => readonly LinePath[];
  readonly refreshCaches: (
    caches: SnapshotCacheManager,
    context: CacheRefreshContext,
  ) => CacheCycleReport;
  readonly readGameTime: (accessor: EntityAccessor) => unknown;
  readonly computeStats: (contents: SnapshotContents) => SnapshotStats;
  readonly serialize: (document: SnapshotDocument, config: TelemetryConfig) => string;
}

export function samplingFromConfig(config: TelemetryConfig): CurveSamplingOptions {
  return {
    arcSubdivisions: config.geometry.arcSubdivisions,
    splineSubdivisions: config.geometry.splineSubdivisions,
    degenerateTangentSq: config.geometry.degenerateTangentSq,
    coordinateDigits: config.geometry.coordinateDigits,
  };
}

export function stationIndexOptionsFromConfig(config: TelemetryConfig): StationIndexOptions {
  return {
    nameSearchDepth: config.limits.nameSearchDepth,
    stationSearchDepth: config.limits.stationSearchDepth,
    coordinateDigits: config.geometry.coordinateDigits,
  };
}

export const DEFAULT_SNAPSHOT_STAGES: SnapshotStages = Object.freeze({
  buildStations: (accessor: EntityAccessor, config: TelemetryConfig) =>
    buildStationIndex(accessor, stationIndexOptionsFromConfig(config)),
  resolveLines,
  collectVehicles: (accessor: EntityAccessor, config: TelemetryConfig) =>
    collectVehicles(accessor, {
      includeCargo: config.vehicles.includeCargo,
      includeRoad: config.vehicles.includeRoad,
      coordinateDigits: config.geometry.coordinateDigits,
    }),
  enrichVehicles,
  buildPaths: (
    lines: readonly ResolvedLine[],
    stations: StationResolver,
    accessor: EntityAccessor,
    config: TelemetryConfig,
  ) =>
    buildLinePaths(lines, stations, accessor, {
      followLineEdges: config.paths.followLineEdges,
      sampling: samplingFromConfig(config),
    }),
  refreshCaches: (caches: SnapshotCacheManager, context: CacheRefreshContext) =>
    caches.cycle(context),
  readGameTime: (accessor: EntityAccessor) => accessor.getGameTime(),
  computeStats,
  serialize: (document: SnapshotDocument, config: TelemetryConfig) =>
    encodeSnapshotDocument(document, {
      maxDepth: config.limits.serializerMaxDepth,
      indent: config.serializer.indent,
    }),
});

export interface SnapshotOrchestratorOptions {
  readonly accessor: EntityAccessor;
  readonly sink: SnapshotSink;
  readonly config?: TelemetryConfig;
  readonly telemetry?: TelemetryFacade;
  readonly stages?: Partial<SnapshotStages>;
  readonly history?: CycleHistory;
  readonly clock?: HighResolutionClock;
  /** Replaces the cache manager built from `config`. */
  readonly caches?: SnapshotCacheManager;
}

/**
 * Mutable bookkeeping of a single cycle. Created at the start of `runCycle`
 * and discarded once the report is built.
 */
class CycleRecorder {
  readonly phases: SnapshotPhase[] = [];
  readonly stages: StageTiming[] = [];

  constructor(
    private readonly clock: HighResolutionClock,
    private readonly telemetry: TelemetryFacade,
  ) {}

  run<T>(stage: SnapshotStage, run: () => T, fallback: T): T {
    this.phases.push(stage);
    const startedAt = this.clock.now();
    const result = attemptStage(stage, run);
    this.time(stage, startedAt, result);
    return recoverStage(result, fallback, this.telemetry);
  }

  time(stage: SnapshotStage, startedAt: number, ...results: StageResult<unknown>[]): void {
    const failed = results.find((result) => !result.ok);
    this.stages.push({
      stage,
      ok: failed === undefined,
      durationMs: Math.max(0, this.clock.now() - startedAt),
      ...(failed && !failed.ok ? { error: describeError(failed.error.cause) } : {}),
    });
  }
}

function collectionCounts(document: SnapshotDocument): Record<string, number> {
  return {
    vehicles: document.vehicles.length,
    lines: document.lines.length,
    stations: document.stations.length,
    paths: document.paths.length,
    tracks: document.tracks.length,
    signals: document.signals.length,
  };
}

/**
 * Runs the extraction pipeline and writes one document per cycle.
 *
 * Every stage is isolated: a failing stage is reported with its name and
 * replaced by its empty output, and the pipeline continues. A failure outside
 * the stages writes the fallback document instead. `runCycle` never throws.
 */
export class SnapshotOrchestrator {
  private readonly accessor: EntityAccessor;
  private readonly sink: SnapshotSink;
  private readonly config: TelemetryConfig;
  private readonly telemetry: TelemetryFacade;
  private readonly stages: SnapshotStages;
  private readonly history?: CycleHistory;
  private readonly clock: HighResolutionClock;
  private readonly caches: SnapshotCacheManager;
  private writes = 0;
  private phase: SnapshotPhase = 'Idle';

  constructor(options: SnapshotOrchestratorOptions) {
    this.accessor = options.accessor;
    this.sink = options.sink;
    this.config = options.config ?? DEFAULT_TELEMETRY_CONFIG;
    this.telemetry = options.telemetry ?? defaultTelemetry;
    this.stages = { ...DEFAULT_SNAPSHOT_STAGES, ...options.stages };
    this.history = options.history;
    this.clock = options.clock ?? getDefaultHighResolutionClock();
    this.caches =
      options.caches ??
      new SnapshotCacheManager(
        {
          trackRefreshCycles: this.config.caches.trackRefreshCycles,
          signalRefreshCycles: this.config.caches.signalRefreshCycles,
          tracks: {
            includeStreets: this.config.tracks.includeStreets,
            regionMargin: this.config.tracks.regionMargin,
            sampling: samplingFromConfig(this.config),
          },
          coordinateDigits: this.config.geometry.coordinateDigits,
        },
        this.telemetry,
      );
  }

  /** Number of documents written so far, fallback documents included. */
  get writeCount(): number {
    return this.writes;
  }

  /** Phase the orchestrator is in; `Idle` between cycles. */
  get currentPhase(): SnapshotPhase {
    return this.phase;
  }

  get cacheManager(): SnapshotCacheManager {
    return this.caches;
  }

  runCycle(): SnapshotCycleReport {
    const startedAt = this.clock.now();
    const writeCount = this.writes + 1;
    const recorder = new CycleRecorder(this.clock, this.telemetry);
    let outcome: SnapshotCycleOutcome;
    let counts: Record<string, number> = {};
    let caches: CacheCycleReport | undefined;
    let cycleError: string | undefined;

    try {
      const built = this.build(writeCount, recorder);
      caches = built.caches;
      counts = collectionCounts(built.document);
      outcome = this.serializeAndWrite(built.document, writeCount, recorder);
    } catch (error) {
      cycleError = describeError(error);
      this.telemetry.recordError('SnapshotCycleFailed', {
        writeCount,
        phase: this.phase,
        message: cycleError,
      });
      counts = {};
      outcome = this.writeFallback(writeCount, recorder);
    }

    this.phase = 'Idle';
    const hostFailures = this.accessor.takeCycleFailures();
    const report: SnapshotCycleReport = {
      writeCount,
      outcome,
      phases: recorder.phases,
      stages: recorder.stages,
      counts,
      ...(caches ? { caches } : {}),
      hostFailures,
      startedAt,
      durationMs: Math.max(0, this.clock.now() - startedAt),
      ...(cycleError !== undefined ? { error: cycleError } : {}),
    };

    this.telemetry.recordCounters('snapshot', counts);
    if (Object.keys(hostFailures).length > 0) {
      this.telemetry.recordCounters('host.failures', hostFailures);
    }
    this.history?.record(report);
    return report;
  }

  private enter(phase: SnapshotPhase, recorder: CycleRecorder): void {
    this.phase = phase;
    if (phase === 'Written' || phase === 'FallbackWritten') {
      recorder.phases.push(phase);
    }
  }

  private build(
    writeCount: number,
    recorder: CycleRecorder,
  ): { document: SnapshotDocument; caches?: CacheCycleReport } {
    const { accessor, config, stages } = this;

    this.enter('BuildingStations', recorder);
    const stations = recorder.run(
      'BuildingStations',
      () => stages.buildStations(accessor, config),
      StationResolver.empty(accessor, stationIndexOptionsFromConfig(config)),
    );
    const stationList = stations.listStations();

    this.enter('ResolvingLines', recorder);
    const lines = recorder.run('ResolvingLines', () => stages.resolveLines(accessor, stations), []);

    this.enter('CollectingVehicles', recorder);
    const collected = recorder.run(
      'CollectingVehicles',
      () => stages.collectVehicles(accessor, config),
      [],
    );

    this.enter('Enriching', recorder);
    const vehicles = recorder.run(
      'Enriching',
      () => stages.enrichVehicles(collected, lines),
      collected,
    );

    this.enter('BuildingPaths', recorder);
    const paths = recorder.run(
      'BuildingPaths',
      () => stages.buildPaths(lines, stations, accessor, config),
      [],
    );

    this.enter('RefreshingCaches', recorder);
    const caches = recorder.run<CacheCycleReport | undefined>(
      'RefreshingCaches',
      () => stages.refreshCaches(this.caches, { accessor, stations: stationList }),
      undefined,
    );

    const contents: SnapshotContents = {
      vehicles,
      lines,
      stations: stationList,
      paths,
      tracks: this.caches.tracks.current,
      signals: this.caches.signals.current,
    };

    this.enter('ComputingStats', recorder);
    recorder.phases.push('ComputingStats');
    const statsStartedAt = this.clock.now();
    const gameTimeResult = attemptStage('ComputingStats', () => stages.readGameTime(accessor));
    const statsResult = attemptStage('ComputingStats', () => stages.computeStats(contents));
    recorder.time('ComputingStats', statsStartedAt, gameTimeResult, statsResult);
    const gameTime = recoverStage(gameTimeResult, null, this.telemetry);
    const stats = recoverStage(statsResult, EMPTY_STATS, this.telemetry);

    return {
      document: toSnapshotDocument(writeCount, gameTime, contents, stats),
      ...(caches ? { caches } : {}),
    };
  }

  private serializeAndWrite(
    document: SnapshotDocument,
    writeCount: number,
    recorder: CycleRecorder,
  ): SnapshotCycleOutcome {
    this.enter('Serializing', recorder);
    const text = recorder.run<string | undefined>(
      'Serializing',
      () => this.stages.serialize(document, this.config),
      undefined,
    );
    if (text === undefined) {
      return this.writeFallback(writeCount, recorder);
    }
    this.sink.writeSnapshot(text);
    this.writes = writeCount;
    this.enter('Written', recorder);
    this.telemetry.recordProgress('SnapshotWritten', { writeCount, fallback: false });
    return 'written';
  }

  private writeFallback(writeCount: number, recorder: CycleRecorder): SnapshotCycleOutcome {
    try {
      const text = encodeSnapshotDocument(createFallbackDocument(writeCount), {
        indent: this.config.serializer.indent,
      });
      this.sink.writeSnapshot(text);
    } catch (error) {
      this.telemetry.recordError('SnapshotWriteFailed', {
        writeCount,
        message: describeError(error),
      });
      return 'failed';
    }
    this.writes = writeCount;
    this.enter('FallbackWritten', recorder);
    this.telemetry.recordProgress('SnapshotWritten', { writeCount, fallback: true });
    return 'fallback';
  }
}
