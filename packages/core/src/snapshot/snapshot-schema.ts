import { z } from 'zod';

import { SNAPSHOT_SCHEMA_VERSION } from '../version.js';

const entityId = z.number().int();
const count = z.number().int().nonnegative();

const pointSchema = z.object({ x: z.number(), y: z.number() });
const positionSchema = z.object({ x: z.number(), y: z.number(), z: z.number() });

export const snapshotVehicleSchema = z.object({
  id: entityId,
  name: z.string(),
  type: z.string(),
  state: z.string(),
  line_id: entityId,
  line_name: z.string(),
  position: positionSchema,
  speed_ms: z.number(),
  speed_kmh: z.number(),
  direction: z.number(),
  passengers: z.number().int(),
  capacity: z.number().int(),
  cargo: z.number().int(),
  cargo_capacity: z.number().int(),
  last_stop_id: entityId,
  last_stop_name: z.string(),
  next_stop_id: entityId,
  next_stop_name: z.string(),
  raw_stop_index: z.number().int(),
});

export const snapshotStopSchema = z.object({
  index: z.number().int().positive(),
  station_id: entityId,
  raw_stop_id: entityId,
  name: z.string(),
});

export const snapshotLineSchema = z.object({
  id: entityId,
  name: z.string(),
  vehicle_type: z.string(),
  stops: z.array(snapshotStopSchema),
  stop_count: count,
});

export const snapshotStationSchema = z.object({
  id: entityId,
  name: z.string(),
  pos: positionSchema,
  is_group: z.boolean(),
});

export const snapshotPathSchema = z.object({
  line_id: entityId,
  points: z.array(pointSchema),
});

export const snapshotTrackSchema = z.object({
  id: entityId,
  kind: z.enum(['rail', 'tram', 'other']),
  points: z.array(pointSchema),
});

export const snapshotSignalSchema = z.object({
  id: entityId,
  pos: positionSchema,
  state: z.union([z.literal(1), z.literal(0), z.literal(-1)]),
});

export const snapshotStatsSchema = z.object({
  total_vehicles: count,
  total_passengers: z.number().int(),
  total_lines: count,
  total_stations: count,
  vehicles_by_type: z.record(count),
});

export const gameTimeSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.array(z.unknown()),
  z.record(z.unknown()),
  z.null(),
]);

export const snapshotDocumentSchema = z.object({
  schema_version: z.literal(SNAPSHOT_SCHEMA_VERSION),
  write_count: count,
  game_time: gameTimeSchema,
  stats: snapshotStatsSchema,
  vehicles: z.array(snapshotVehicleSchema),
  lines: z.array(snapshotLineSchema),
  stations: z.array(snapshotStationSchema),
  paths: z.array(snapshotPathSchema),
  tracks: z.array(snapshotTrackSchema),
  signals: z.array(snapshotSignalSchema),
});

export type SnapshotDocument = z.infer<typeof snapshotDocumentSchema>;
export type SnapshotVehicle = z.infer<typeof snapshotVehicleSchema>;
export type SnapshotLine = z.infer<typeof snapshotLineSchema>;
export type SnapshotStation = z.infer<typeof snapshotStationSchema>;
export type SnapshotStats = z.infer<typeof snapshotStatsSchema>;
export type SnapshotGameTime = z.infer<typeof gameTimeSchema>;

/**
 * Parses and validates a written snapshot. Throws on malformed text or a
 * document that breaks the contract.
 */
export function parseSnapshotDocument(text: string): SnapshotDocument {
  const parsed: unknown = JSON.parse(text);
  return snapshotDocumentSchema.parse(parsed);
}
