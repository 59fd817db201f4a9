import { isFiniteNumber, isNonBlankString, isPlainRecord } from '../validation/primitives.js';

/**
 * Untyped record handed back by the host. Field presence and value shapes
 * vary between host versions, so every read goes through the helpers below.
 */
export type HostRecord = Readonly<Record<string, unknown>>;

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface Point2 {
  readonly x: number;
  readonly y: number;
}

export const ZERO_POSITION: Vec3 = Object.freeze({ x: 0, y: 0, z: 0 });

const ENTITY_ID_FIELDS = ['entity', 'id', 'entityId', 'entity_id'] as const;

export function isHostRecord(value: unknown): value is HostRecord {
  return isPlainRecord(value);
}

export function toInt(value: unknown): number {
  return isFiniteNumber(value) ? Math.floor(value) : 0;
}

/**
 * Reads an entity id from a bare number or from a record that wraps one.
 * Returns 0 when nothing usable is present.
 */
export function toEntityId(value: unknown): number {
  if (isFiniteNumber(value)) {
    return Math.floor(value);
  }
  if (isHostRecord(value)) {
    for (const key of ENTITY_ID_FIELDS) {
      const candidate = value[key];
      if (isFiniteNumber(candidate)) {
        return Math.floor(candidate);
      }
    }
  }
  return 0;
}

/**
 * First field whose value is neither absent nor `false`.
 */
export function firstPresent(
  record: HostRecord,
  keys: readonly string[],
): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null && value !== false) {
      return value;
    }
  }
  return undefined;
}

export function roundTo(value: unknown, digits = 2): number {
  if (!isFiniteNumber(value)) {
    return 0;
  }
  const factor = 10 ** digits;
  const rounded = Math.floor(value * factor + 0.5) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function readText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (isFiniteNumber(value)) {
    return String(value);
  }
  return undefined;
}

export function readNonBlankText(value: unknown): string | undefined {
  const text = readText(value);
  return isNonBlankString(text) ? text : undefined;
}

function numberAt(values: readonly unknown[], index: number): number | undefined {
  const value = values[index];
  return isFiniteNumber(value) ? value : undefined;
}

/**
 * Reads a point from `[x, y, z]` or `{ x, y, z }`. Missing coordinates are 0;
 * a value with no numeric x or y is not a point.
 */
export function readVec3(value: unknown, digits = 2): Vec3 | undefined {
  if (Array.isArray(value)) {
    const x = numberAt(value, 0);
    const y = numberAt(value, 1);
    if (x === undefined || y === undefined) {
      return undefined;
    }
    return { x: roundTo(x, digits), y: roundTo(y, digits), z: roundTo(numberAt(value, 2) ?? 0, digits) };
  }
  if (isHostRecord(value)) {
    const { x, y, z } = value;
    if (!isFiniteNumber(x) || !isFiniteNumber(y)) {
      return undefined;
    }
    return { x: roundTo(x, digits), y: roundTo(y, digits), z: roundTo(isFiniteNumber(z) ? z : 0, digits) };
  }
  return undefined;
}

export function readPoint2(value: unknown, digits = 2): Point2 | undefined {
  const point = readVec3(value, digits);
  return point ? { x: point.x, y: point.y } : undefined;
}

function readTransformTranslation(transform: unknown, digits: number): Vec3 | undefined {
  if (!Array.isArray(transform)) {
    return undefined;
  }
  // Column-major 4x4 keeps the translation in the last column; some hosts
  // hand out the row-major layout instead.
  const layouts: ReadonlyArray<readonly [number, number, number]> = [
    [12, 13, 14],
    [3, 7, 11],
  ];
  for (const [ix, iy, iz] of layouts) {
    const x = numberAt(transform, ix);
    const y = numberAt(transform, iy);
    if (x !== undefined && y !== undefined) {
      return {
        x: roundTo(x, digits),
        y: roundTo(y, digits),
        z: roundTo(numberAt(transform, iz) ?? 0, digits),
      };
    }
  }
  return undefined;
}

/**
 * Position of an entity record: `position` as array or vector, else the
 * translation of its `transform` matrix.
 */
export function readPosition(record: unknown, digits = 2): Vec3 | undefined {
  if (!isHostRecord(record)) {
    return undefined;
  }
  return readVec3(record.position, digits) ?? readTransformTranslation(record.transform, digits);
}

/**
 * Positive entity ids listed in a field. Accepts arrays of ids or id-bearing
 * records, and keyed maps whose values are ids.
 */
export function readIdList(value: unknown): number[] {
  const items: readonly unknown[] = Array.isArray(value)
    ? value
    : isHostRecord(value)
      ? Object.values(value)
      : [];
  const ids: number[] = [];
  for (const item of items) {
    const id = toEntityId(item);
    if (id > 0) {
      ids.push(id);
    }
  }
  return ids;
}

export function readList(value: unknown): readonly unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (isHostRecord(value)) {
    return Object.values(value);
  }
  return [];
}
