import type { TelemetryFacade } from '../telemetry.js';

export const SNAPSHOT_PHASES = [
  'Idle',
  'BuildingStations',
  'ResolvingLines',
  'CollectingVehicles',
  'Enriching',
  'BuildingPaths',
  'RefreshingCaches',
  'ComputingStats',
  'Serializing',
  'Written',
  'FallbackWritten',
] as const;

export type SnapshotPhase = (typeof SNAPSHOT_PHASES)[number];

/** Phases that run extraction work and can fail on their own. */
export type SnapshotStage = Exclude<SnapshotPhase, 'Idle' | 'Written' | 'FallbackWritten'>;

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class StageError extends Error {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super(`${stage} failed: ${describeError(cause)}`, { cause });
    this.name = 'StageError';
    this.stage = stage;
  }
}

export type StageResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: StageError };

export function attemptStage<T>(stage: string, run: () => T): StageResult<T> {
  try {
    return { ok: true, value: run() };
  } catch (error) {
    return { ok: false, error: new StageError(stage, error) };
  }
}

/**
 * Unwraps a stage result, substituting `fallback` and reporting the failure
 * with the stage's identity.
 */
export function recoverStage<T>(
  result: StageResult<T>,
  fallback: T,
  telemetry: TelemetryFacade,
): T {
  if (result.ok) {
    return result.value;
  }
  telemetry.recordError('SnapshotStageFailed', {
    stage: result.error.stage,
    message: describeError(result.error.cause),
  });
  return fallback;
}
