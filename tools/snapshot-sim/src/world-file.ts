import { promises as fs } from 'node:fs';
import path from 'node:path';

import JSON5 from 'json5';
import { z } from 'zod';

import type { FakeWorld, TelemetryConfigOverrides } from '@transit-telemetry/core';

export class SimulationInputError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`${filePath}: ${message}`, options);
    this.name = 'SimulationInputError';
    this.filePath = filePath;
  }
}

const record = z.record(z.unknown());
const idList = z.array(z.number().int().positive());

const componentsSchema = z
  .object({
    BASE_EDGE: record,
    BASE_NODE: record,
    TRACK_EDGE: record,
    STREET_EDGE: record,
    SIGNAL: record,
  })
  .partial()
  .strict();

export const worldFileSchema = z
  .object({
    entities: z.record(record),
    vehicles: idList,
    lines: idList,
    stations: idList,
    stationGroups: idList,
    signals: idList,
    edges: idList,
    components: z.record(componentsSchema),
    lineEdges: z.record(idList),
    gameTime: z.unknown(),
  })
  .partial()
  .strict();

const positiveNumber = z.number().positive();
const positiveInt = z.number().int().positive();

export const configFileSchema = z
  .object({
    trigger: z
      .object({ writeIntervalSeconds: positiveNumber, eventUnit: positiveNumber })
      .partial()
      .strict(),
    caches: z
      .object({ trackRefreshCycles: positiveInt, signalRefreshCycles: positiveInt })
      .partial()
      .strict(),
    vehicles: z.object({ includeCargo: z.boolean(), includeRoad: z.boolean() }).partial().strict(),
    tracks: z
      .object({ includeStreets: z.boolean(), regionMargin: z.number().nonnegative() })
      .partial()
      .strict(),
    paths: z.object({ followLineEdges: z.boolean() }).partial().strict(),
    geometry: z
      .object({
        arcSubdivisions: positiveInt,
        splineSubdivisions: positiveInt,
        degenerateTangentSq: z.number().nonnegative(),
        coordinateDigits: z.number().int().nonnegative(),
      })
      .partial()
      .strict(),
    limits: z
      .object({
        nameSearchDepth: positiveInt,
        stationSearchDepth: positiveInt,
        serializerMaxDepth: positiveInt,
        cycleHistoryCapacity: positiveInt,
      })
      .partial()
      .strict(),
    serializer: z
      .object({ indent: z.string().regex(/^[ \t]*$/, 'indent may only contain spaces and tabs') })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

async function readStructuredFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new SimulationInputError(filePath, 'file could not be read', { cause: error });
  }
  try {
    const parsed: unknown =
      path.extname(filePath) === '.json5' ? JSON5.parse(raw) : JSON.parse(raw);
    return parsed;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SimulationInputError(filePath, `invalid syntax (${detail})`, { cause: error });
  }
}

/**
 * Reads a synthetic world description (`.json` or `.json5`).
 */
export async function loadWorldFile(filePath: string): Promise<FakeWorld> {
  const result = worldFileSchema.safeParse(await readStructuredFile(filePath));
  if (!result.success) {
    throw new SimulationInputError(filePath, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Reads configuration overrides. Unlike the runtime, which falls back to
 * defaults, the simulator rejects invalid values so typos surface early.
 */
export async function loadConfigFile(filePath: string): Promise<TelemetryConfigOverrides> {
  const result = configFileSchema.safeParse(await readStructuredFile(filePath));
  if (!result.success) {
    throw new SimulationInputError(filePath, formatIssues(result.error));
  }
  return result.data;
}
