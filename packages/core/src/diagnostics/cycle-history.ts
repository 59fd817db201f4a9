import type { CacheCycleReport } from '../cache/cache-manager.js';
import type { SnapshotPhase, SnapshotStage } from '../orchestrator/stage.js';

export interface HighResolutionClock {
  now(): number;
}

export type SnapshotCycleOutcome = 'written' | 'fallback' | 'failed';

export interface StageTiming {
  readonly stage: SnapshotStage;
  readonly ok: boolean;
  readonly durationMs: number;
  readonly error?: string;
}

export interface SnapshotCycleReport {
  readonly writeCount: number;
  readonly outcome: SnapshotCycleOutcome;
  /** Phases entered, in order, ending with `Written` or `FallbackWritten`. */
  readonly phases: readonly SnapshotPhase[];
  readonly stages: readonly StageTiming[];
  /** Collection sizes of the written document. */
  readonly counts: Readonly<Record<string, number>>;
  readonly caches?: CacheCycleReport;
  readonly hostFailures: Readonly<Record<string, number>>;
  readonly startedAt: number;
  readonly durationMs: number;
  readonly error?: string;
}

export interface CycleHistoryOptions {
  readonly capacity?: number;
}

export interface CycleHistorySnapshot {
  readonly capacity: number;
  readonly size: number;
  readonly droppedEntries: number;
  readonly lastWriteCount?: number;
  readonly entries: readonly SnapshotCycleReport[];
}

export interface CycleHistory {
  record(report: SnapshotCycleReport): void;
  snapshot(): CycleHistorySnapshot;
  clear(): void;
}

export const DEFAULT_CYCLE_HISTORY_CAPACITY = 60;

export function getDefaultHighResolutionClock(): HighResolutionClock {
  return { now: () => performance.now() };
}

/**
 * Fixed-capacity ring of recent cycle reports. Once full, each new report
 * replaces the oldest one and is counted in `droppedEntries`.
 */
export function createCycleHistory(options: CycleHistoryOptions = {}): CycleHistory {
  const capacityOption = options.capacity;
  const capacity =
    typeof capacityOption === 'number' && Number.isFinite(capacityOption) && capacityOption >= 0
      ? Math.floor(capacityOption)
      : DEFAULT_CYCLE_HISTORY_CAPACITY;

  const ring: Array<SnapshotCycleReport | undefined> = new Array<SnapshotCycleReport | undefined>(
    capacity,
  ).fill(undefined);
  let writeIndex = 0;
  let size = 0;
  let droppedEntries = 0;
  let lastWriteCount: number | undefined;

  return {
    record(report) {
      lastWriteCount = report.writeCount;
      if (capacity === 0) {
        droppedEntries += 1;
        return;
      }
      if (size === capacity) {
        droppedEntries += 1;
      } else {
        size += 1;
      }
      ring[writeIndex] = Object.freeze({ ...report });
      writeIndex = (writeIndex + 1) % capacity;
    },
    snapshot() {
      const entries: SnapshotCycleReport[] = [];
      const startIndex = size === capacity ? writeIndex : 0;
      for (let i = 0; i < size; i += 1) {
        const entry = ring[(startIndex + i) % capacity];
        if (entry) {
          entries.push(entry);
        }
      }
      return Object.freeze({
        capacity,
        size,
        droppedEntries,
        lastWriteCount,
        entries: Object.freeze(entries),
      });
    },
    clear() {
      ring.fill(undefined);
      writeIndex = 0;
      size = 0;
      droppedEntries = 0;
      lastWriteCount = undefined;
    },
  };
}

export interface CycleHistorySummary {
  readonly totalEntries: number;
  readonly dropped: number;
  readonly fallbackCount: number;
  readonly failedCount: number;
  readonly stageFailures: Readonly<Record<string, number>>;
  readonly maxDurationMs: number;
  readonly avgDurationMs: number;
  readonly last?: SnapshotCycleReport;
}

export function summarizeCycleHistory(history: CycleHistorySnapshot): CycleHistorySummary {
  const entries = history.entries;
  const stageFailures: Record<string, number> = {};
  let fallbackCount = 0;
  let failedCount = 0;
  let maxDurationMs = 0;
  let totalDurationMs = 0;

  for (const entry of entries) {
    if (entry.outcome === 'fallback') fallbackCount += 1;
    if (entry.outcome === 'failed') failedCount += 1;
    if (entry.durationMs > maxDurationMs) maxDurationMs = entry.durationMs;
    totalDurationMs += entry.durationMs;
    for (const stage of entry.stages) {
      if (!stage.ok) {
        stageFailures[stage.stage] = (stageFailures[stage.stage] ?? 0) + 1;
      }
    }
  }

  return Object.freeze({
    totalEntries: entries.length,
    dropped: history.droppedEntries,
    fallbackCount,
    failedCount,
    stageFailures,
    maxDurationMs,
    avgDurationMs: entries.length > 0 ? totalDurationMs / entries.length : 0,
    last: entries.at(-1),
  });
}
