import { randomUUID } from 'node:crypto';
import { mkdirSync, renameSync, unlinkSync, writeFileSync } from 'node:fs';
import path from 'node:path';

/**
 * Destination of serialized snapshots. Calls are synchronous because the
 * host drives the extractor from a synchronous callback.
 */
export interface SnapshotSink {
  writeSnapshot(text: string): void;
  writeDiagnostics?(fileName: string, text: string): void;
}

export interface FileSnapshotSinkOptions {
  readonly directory: string;
  readonly fileName?: string;
}

export const DEFAULT_SNAPSHOT_FILE = 'telemetry.json';
export const DEFAULT_DIAGNOSTICS_FILE = 'telemetry_diag.txt';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function safeUnlink(targetPath: string): void {
  try {
    unlinkSync(targetPath);
  } catch (error) {
    if (isMissingFileError(error)) {
      return;
    }
    throw error;
  }
}

/**
 * Replaces `targetPath` in one step so readers never observe a partial file.
 */
export function writeFileAtomic(targetPath: string, content: string): void {
  mkdirSync(path.dirname(targetPath), { recursive: true });
  const tempPath = path.join(
    path.dirname(targetPath),
    `.tmp-${path.basename(targetPath)}-${randomUUID()}`,
  );
  try {
    writeFileSync(tempPath, content, 'utf8');
    renameSync(tempPath, targetPath);
  } finally {
    safeUnlink(tempPath);
  }
}

export interface FileSnapshotSink extends SnapshotSink {
  readonly snapshotPath: string;
  writeDiagnostics(fileName: string, text: string): void;
}

export function createFileSnapshotSink(options: FileSnapshotSinkOptions): FileSnapshotSink {
  const snapshotPath = path.join(options.directory, options.fileName ?? DEFAULT_SNAPSHOT_FILE);
  return {
    snapshotPath,
    writeSnapshot(text) {
      writeFileAtomic(snapshotPath, text);
    },
    writeDiagnostics(fileName, text) {
      writeFileAtomic(path.join(options.directory, path.basename(fileName)), text);
    },
  };
}

export interface MemorySnapshotSink extends SnapshotSink {
  readonly snapshots: readonly string[];
  readonly diagnostics: ReadonlyMap<string, string>;
  latest(): string | undefined;
  writeDiagnostics(fileName: string, text: string): void;
}

export function createMemorySnapshotSink(): MemorySnapshotSink {
  const snapshots: string[] = [];
  const diagnostics = new Map<string, string>();
  return {
    snapshots,
    diagnostics,
    latest() {
      return snapshots.at(-1);
    },
    writeSnapshot(text) {
      snapshots.push(text);
    },
    writeDiagnostics(fileName, text) {
      diagnostics.set(fileName, text);
    },
  };
}
