import type { HostRecord } from '../host/fields.js';
import { boundedSearch } from '../traversal/bounded-search.js';

const PLACEHOLDER_NAME = /^(?:Stop|Station) #\d+$/;

export const STOP_NAME_FIELDS = [
  'name',
  'stopName',
  'stationName',
  'terminalName',
  'label',
] as const;

export const ENTITY_NAME_FIELDS = ['name', 'stationName', 'terminalName'] as const;

const ENTITY_NAME_KEYS: ReadonlySet<string> = new Set(ENTITY_NAME_FIELDS);

/**
 * Auto-generated labels (`Stop #7`, `Station #3`) and blank text.
 */
export function isPlaceholderName(name: string): boolean {
  const trimmed = name.trim();
  return trimmed.length === 0 || PLACEHOLDER_NAME.test(trimmed);
}

export function isUsableName(value: unknown): value is string {
  return typeof value === 'string' && !isPlaceholderName(value);
}

export function pickName(
  record: HostRecord | undefined,
  fields: readonly string[],
): string | undefined {
  if (!record) {
    return undefined;
  }
  for (const field of fields) {
    const value = record[field];
    if (isUsableName(value)) {
      return value;
    }
  }
  return undefined;
}

/**
 * Searches nested host data for the first usable value stored under one of
 * the entity name fields.
 */
export function findNameDeep(root: unknown, maxDepth: number): string | undefined {
  return boundedSearch<string>(
    root,
    (value, key) =>
      key !== undefined && ENTITY_NAME_KEYS.has(key) && isUsableName(value)
        ? value
        : undefined,
    { maxDepth, preferredKeys: ENTITY_NAME_FIELDS },
  );
}
