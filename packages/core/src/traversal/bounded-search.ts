/**
 * Returns a found value, or `undefined` to keep searching.
 */
export type SearchVisitor<T> = (
  value: unknown,
  key: string | undefined,
  depth: number,
) => T | undefined;

export interface BoundedSearchOptions {
  /** Deepest level visited; the root is depth 0. */
  readonly maxDepth: number;
  /** Keys inspected first at every container, in order. */
  readonly preferredKeys?: readonly string[];
}

function isContainer(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function entriesOf(
  container: object,
  preferredKeys: readonly string[],
): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = Array.isArray(container)
    ? container.map((item, index) => [String(index), item])
    : Object.entries(container);
  if (preferredKeys.length === 0) {
    return entries;
  }
  const byKey = new Map(entries);
  const ordered: Array<[string, unknown]> = [];
  for (const key of preferredKeys) {
    if (byKey.has(key)) {
      ordered.push([key, byKey.get(key)]);
    }
  }
  for (const entry of entries) {
    if (!preferredKeys.includes(entry[0])) {
      ordered.push(entry);
    }
  }
  return ordered;
}

/**
 * Depth-first search over nested records and arrays. Each object is entered
 * at most once, so any reference graph terminates.
 */
export function boundedSearch<T>(
  root: unknown,
  visit: SearchVisitor<T>,
  options: BoundedSearchOptions,
): T | undefined {
  const visited = new WeakSet<object>();
  const preferredKeys = options.preferredKeys ?? [];

  const walk = (value: unknown, key: string | undefined, depth: number): T | undefined => {
    if (depth > options.maxDepth) {
      return undefined;
    }
    const found = visit(value, key, depth);
    if (found !== undefined) {
      return found;
    }
    if (!isContainer(value) || visited.has(value)) {
      return undefined;
    }
    visited.add(value);
    for (const [childKey, child] of entriesOf(value, preferredKeys)) {
      const nested = walk(child, childKey, depth + 1);
      if (nested !== undefined) {
        return nested;
      }
    }
    return undefined;
  };

  return walk(root, undefined, 0);
}
