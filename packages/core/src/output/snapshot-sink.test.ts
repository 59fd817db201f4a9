import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  createFileSnapshotSink,
  createMemorySnapshotSink,
  writeFileAtomic,
} from './snapshot-sink.js';

describe('file snapshot sink', () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(path.join(tmpdir(), 'snapshot-sink-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('replaces the snapshot file and leaves no temporary files', () => {
    const sink = createFileSnapshotSink({ directory });

    sink.writeSnapshot('{"write_count":1}');
    sink.writeSnapshot('{"write_count":2}');

    expect(sink.snapshotPath).toBe(path.join(directory, 'telemetry.json'));
    expect(readFileSync(sink.snapshotPath, 'utf8')).toBe('{"write_count":2}');
    expect(readdirSync(directory)).toEqual(['telemetry.json']);
  });

  it('keeps diagnostics inside the output directory', () => {
    const sink = createFileSnapshotSink({ directory, fileName: 'state.json' });

    sink.writeDiagnostics('../../escape.txt', 'report');

    expect(readFileSync(path.join(directory, 'escape.txt'), 'utf8')).toBe('report');
  });

  it('creates missing parent directories', () => {
    const target = path.join(directory, 'nested', 'deeper', 'out.json');
    writeFileAtomic(target, '[]');
    expect(readFileSync(target, 'utf8')).toBe('[]');
  });
});

describe('memory snapshot sink', () => {
  it('keeps every snapshot and the latest diagnostics per file', () => {
    const sink = createMemorySnapshotSink();
    expect(sink.latest()).toBeUndefined();

    sink.writeSnapshot('a');
    sink.writeSnapshot('b');
    sink.writeDiagnostics('diag.txt', 'first');
    sink.writeDiagnostics('diag.txt', 'second');

    expect(sink.snapshots).toEqual(['a', 'b']);
    expect(sink.latest()).toBe('b');
    expect(sink.diagnostics.get('diag.txt')).toBe('second');
  });
});
