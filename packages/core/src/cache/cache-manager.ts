import type { EntityAccessor } from '../host/entity-accessor.js';
import type { TrackCollectOptions, TrackEdge } from '../geometry/track-collector.js';
import { collectTrackEdges } from '../geometry/track-collector.js';
import { attemptStage, describeError } from '../orchestrator/stage.js';
import type { Station } from '../resolve/station-resolver.js';
import type { SignalState } from '../signals/signal-collector.js';
import { collectSignals } from '../signals/signal-collector.js';
import type { TelemetryFacade } from '../telemetry.js';

export type CacheRefreshOutcome = 'refreshed' | 'retained' | 'failed';

/**
 * A value refreshed every `refreshEvery` cycles. A failed refresh keeps the
 * last good value and retries on the next cycle.
 *
 * A refresh that returns but reports itself `degraded` (host calls failed
 * while it ran) also counts as failed. Its partial value is adopted only
 * while nothing has loaded yet.
 */
export class AgedCache<T> {
  private value: T;
  private ageInCycles = 0;
  private loaded = false;

  constructor(
    readonly name: string,
    private readonly refreshEvery: number,
    initial: T,
    private readonly telemetry: TelemetryFacade,
  ) {
    this.value = initial;
  }

  get current(): T {
    return this.value;
  }

  get age(): number {
    return this.ageInCycles;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  cycle(
    refresh: () => T,
    degraded: () => string | undefined = () => undefined,
  ): CacheRefreshOutcome {
    this.ageInCycles += 1;
    if (this.loaded && this.ageInCycles < this.refreshEvery) {
      return 'retained';
    }
    const result = attemptStage(`cache:${this.name}`, refresh);
    if (!result.ok) {
      this.warnFailed(describeError(result.error.cause));
      return 'failed';
    }
    const problem = degraded();
    if (problem !== undefined) {
      if (!this.loaded) {
        this.value = result.value;
      }
      this.warnFailed(problem);
      return 'failed';
    }
    this.value = result.value;
    this.ageInCycles = 0;
    this.loaded = true;
    return 'refreshed';
  }

  private warnFailed(message: string): void {
    this.telemetry.recordWarning('SnapshotCacheRefreshFailed', {
      cache: this.name,
      age: this.ageInCycles,
      message,
    });
  }
}

function hostFailuresSince(accessor: EntityAccessor, before: number): () => string | undefined {
  return () => {
    const failed = accessor.failedCallCount - before;
    return failed > 0 ? `${failed} host call(s) failed during refresh` : undefined;
  };
}

export interface CacheRefreshContext {
  readonly accessor: EntityAccessor;
  readonly stations: readonly Station[];
}

export interface SnapshotCacheOptions {
  readonly trackRefreshCycles: number;
  readonly signalRefreshCycles: number;
  readonly tracks: TrackCollectOptions;
  readonly coordinateDigits: number;
}

export interface CacheCycleReport {
  readonly tracks: CacheRefreshOutcome;
  readonly signals: CacheRefreshOutcome;
}

export interface CacheRefreshers {
  readonly tracks: (context: CacheRefreshContext) => readonly TrackEdge[];
  readonly signals: (context: CacheRefreshContext) => readonly SignalState[];
}

/**
 * Owns the slowly changing collections that survive between cycles.
 */
export class SnapshotCacheManager {
  readonly tracks: AgedCache<readonly TrackEdge[]>;
  readonly signals: AgedCache<readonly SignalState[]>;
  private readonly refreshers: CacheRefreshers;

  constructor(
    options: SnapshotCacheOptions,
    telemetry: TelemetryFacade,
    refreshers: Partial<CacheRefreshers> = {},
  ) {
    this.tracks = new AgedCache('tracks', options.trackRefreshCycles, [], telemetry);
    this.signals = new AgedCache('signals', options.signalRefreshCycles, [], telemetry);
    this.refreshers = {
      tracks:
        refreshers.tracks ??
        ((context) => collectTrackEdges(context.accessor, context.stations, options.tracks)),
      signals:
        refreshers.signals ??
        ((context) => collectSignals(context.accessor, options.coordinateDigits)),
    };
  }

  cycle(context: CacheRefreshContext): CacheCycleReport {
    const { accessor } = context;
    const tracks = this.tracks.cycle(
      () => this.refreshers.tracks(context),
      hostFailuresSince(accessor, accessor.failedCallCount),
    );
    const signals = this.signals.cycle(
      () => this.refreshers.signals(context),
      hostFailuresSince(accessor, accessor.failedCallCount),
    );
    return { tracks, signals };
  }
}
