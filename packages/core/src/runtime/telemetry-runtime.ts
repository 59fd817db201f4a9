import type { TelemetryConfig } from '../config.js';
import { DEFAULT_TELEMETRY_CONFIG } from '../config.js';
import { renderCapabilityReport } from '../diagnostics/capability-report.js';
import type {
  CycleHistory,
  HighResolutionClock,
  SnapshotCycleReport,
} from '../diagnostics/cycle-history.js';
import { createCycleHistory } from '../diagnostics/cycle-history.js';
import type { HostCapabilities } from '../host/capability-probe.js';
import { probeHostCapabilities } from '../host/capability-probe.js';
import { EntityAccessor } from '../host/entity-accessor.js';
import type { HostApi } from '../host/host-api.js';
import type { SnapshotStages } from '../orchestrator/snapshot-orchestrator.js';
import { SnapshotOrchestrator } from '../orchestrator/snapshot-orchestrator.js';
import { describeError } from '../orchestrator/stage.js';
import type { SnapshotSink } from '../output/snapshot-sink.js';
import { DEFAULT_DIAGNOSTICS_FILE } from '../output/snapshot-sink.js';
import { WriteThrottle } from '../scheduler/write-throttle.js';
import type { TelemetryFacade } from '../telemetry.js';
import { telemetry as defaultTelemetry } from '../telemetry.js';
import { CORE_VERSION, SNAPSHOT_SCHEMA_VERSION } from '../version.js';

export interface TelemetryRuntimeOptions {
  readonly host: HostApi;
  readonly sink: SnapshotSink;
  readonly config?: TelemetryConfig;
  readonly telemetry?: TelemetryFacade;
  readonly stages?: Partial<SnapshotStages>;
  readonly clock?: HighResolutionClock;
  readonly diagnosticsFileName?: string;
}

/**
 * Entry points the host calls: `init` from any of its lifecycle hooks, `tick`
 * from its update callback and `handleEvent` from its event callback.
 * Everything runs synchronously on the host's thread.
 */
export class TelemetryRuntime {
  private readonly options: TelemetryRuntimeOptions;
  private readonly config: TelemetryConfig;
  private readonly telemetry: TelemetryFacade;
  private readonly history: CycleHistory;
  private readonly throttle: WriteThrottle;
  private orchestrator?: SnapshotOrchestrator;
  private capabilities?: HostCapabilities;
  private running = false;
  private lastReport?: SnapshotCycleReport;

  constructor(options: TelemetryRuntimeOptions) {
    this.options = options;
    this.config = options.config ?? DEFAULT_TELEMETRY_CONFIG;
    this.telemetry = options.telemetry ?? defaultTelemetry;
    this.history = createCycleHistory({ capacity: this.config.limits.cycleHistoryCapacity });
    this.throttle = new WriteThrottle(() => {
      this.runCycle();
    }, this.config.trigger);
  }

  get isInitialized(): boolean {
    return this.orchestrator !== undefined;
  }

  get hostCapabilities(): HostCapabilities | undefined {
    return this.capabilities;
  }

  get cycleHistory(): CycleHistory {
    return this.history;
  }

  get latestReport(): SnapshotCycleReport | undefined {
    return this.lastReport;
  }

  /**
   * Probes the host, writes the capability report and the first snapshot.
   * Later calls return the existing state without probing again.
   */
  init(): SnapshotCycleReport | undefined {
    if (this.orchestrator) {
      return undefined;
    }
    const capabilities = probeHostCapabilities(this.options.host, { telemetry: this.telemetry });
    const accessor = new EntityAccessor(capabilities, this.telemetry);
    this.capabilities = capabilities;
    this.orchestrator = new SnapshotOrchestrator({
      accessor,
      sink: this.options.sink,
      config: this.config,
      telemetry: this.telemetry,
      stages: this.options.stages,
      history: this.history,
      clock: this.options.clock,
    });

    this.writeCapabilityReport(capabilities, accessor);
    return this.runCycle();
  }

  /**
   * Feeds a tick delta in seconds.
   *
   * @returns whether a snapshot was written
   */
  tick(deltaSeconds?: number): boolean {
    if (!this.orchestrator) {
      return false;
    }
    this.telemetry.recordTick();
    return this.throttle.advance(deltaSeconds);
  }

  /**
   * Registers a host event. The event name is only reported through telemetry.
   *
   * @returns whether a snapshot was written
   */
  handleEvent(name: string): boolean {
    if (!this.orchestrator) {
      return false;
    }
    const fired = this.throttle.nudge();
    if (fired) {
      this.telemetry.recordProgress('SnapshotEventTriggered', { event: name });
    }
    return fired;
  }

  private runCycle(): SnapshotCycleReport | undefined {
    const orchestrator = this.orchestrator;
    if (!orchestrator || this.running) {
      return undefined;
    }
    this.running = true;
    try {
      this.lastReport = orchestrator.runCycle();
      return this.lastReport;
    } finally {
      this.running = false;
    }
  }

  private writeCapabilityReport(capabilities: HostCapabilities, accessor: EntityAccessor): void {
    const writeDiagnostics = this.options.sink.writeDiagnostics;
    if (!writeDiagnostics) {
      return;
    }
    const vehicles = accessor.enumerateDetailed('vehicle');
    const report = renderCapabilityReport(capabilities, {
      coreVersion: CORE_VERSION,
      schemaVersion: SNAPSHOT_SCHEMA_VERSION,
      vehicleSource: vehicles.source,
      vehicleCount: vehicles.ids.length,
    });
    try {
      writeDiagnostics.call(
        this.options.sink,
        this.options.diagnosticsFileName ?? DEFAULT_DIAGNOSTICS_FILE,
        report,
      );
    } catch (error) {
      this.telemetry.recordWarning('CapabilityReportWriteFailed', {
        message: describeError(error),
      });
    }
  }
}
