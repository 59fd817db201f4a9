import { describe, expect, it } from 'vitest';

import { CORE_VERSION, SNAPSHOT_SCHEMA_VERSION } from './version.js';

describe('version constants', () => {
  it('uses a semver library version', () => {
    expect(CORE_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    expect(CORE_VERSION).toBe('0.1.0');
  });

  it('documents the current snapshot schema', () => {
    // Bump together with the document schema and its consumers.
    expect(Number.isInteger(SNAPSHOT_SCHEMA_VERSION)).toBe(true);
    expect(SNAPSHOT_SCHEMA_VERSION).toBe(4);
  });
});
