/**
 * Deterministic JSON encoder for snapshot documents.
 *
 * Keyed mappings whose keys are exactly `1..N` encode as sequences; every
 * other mapping encodes as an object with keys sorted by their string form.
 * Values that JSON cannot represent (NaN, infinities, functions, symbols,
 * bigints, class instances) encode as `null`, as does anything nested deeper
 * than `maxDepth` or already on the current path.
 */

export interface DeterministicEncodeOptions {
  /** Deepest nesting level encoded; the root is depth 0. */
  readonly maxDepth?: number;
  /** Indentation unit; empty for compact output. */
  readonly indent?: string;
}

export const DEFAULT_MAX_DEPTH = 20;

const CANONICAL_INDEX = /^[1-9]\d*$/;

type Entry = readonly [string, unknown];

type Classified =
  | { readonly kind: 'sequence'; readonly items: readonly unknown[] }
  | { readonly kind: 'object'; readonly entries: readonly Entry[] };

const unicodeEscape = (code: number): string => `\\u${code.toString(16).padStart(4, '0')}`;

// Iterating by code point keeps valid pairs together; a one-unit surrogate is
// unpaired and would not survive a UTF-8 write.
function isLoneSurrogate(char: string): boolean {
  const code = char.charCodeAt(0);
  return char.length === 1 && code >= 0xd800 && code <= 0xdfff;
}

export function escapeJsonString(text: string): string {
  let out = '"';
  for (const char of text) {
    const code = char.charCodeAt(0);
    switch (char) {
      case '\\':
        out += '\\\\';
        break;
      case '"':
        out += '\\"';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\t':
        out += '\\t';
        break;
      default:
        out += code < 0x20 || isLoneSurrogate(char) ? unicodeEscape(code) : char;
    }
  }
  return `${out}"`;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * True when `keys` is exactly the set `1..keys.length`.
 */
export function isIndexKeySet(keys: readonly string[]): boolean {
  if (keys.length === 0) {
    return false;
  }
  const seen = new Set<number>();
  for (const key of keys) {
    if (!CANONICAL_INDEX.test(key)) {
      return false;
    }
    const index = Number(key);
    if (index > keys.length || seen.has(index)) {
      return false;
    }
    seen.add(index);
  }
  return true;
}

function sortEntries(entries: readonly Entry[]): Entry[] {
  return [...entries].sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));
}

function classifyEntries(entries: readonly Entry[]): Classified {
  if (!isIndexKeySet(entries.map(([key]) => key))) {
    return { kind: 'object', entries: sortEntries(entries) };
  }
  const items = new Array<unknown>(entries.length);
  for (const [key, item] of entries) {
    items[Number(key) - 1] = item;
  }
  return { kind: 'sequence', items };
}

function classifyMap(map: ReadonlyMap<unknown, unknown>): Classified {
  const entries: Entry[] = [];
  let numericKeys = true;
  for (const [key, item] of map) {
    if (item === undefined) {
      continue;
    }
    numericKeys &&= typeof key === 'number';
    entries.push([String(key), item]);
  }
  // A string key "1" names a field; only numeric keys can index a sequence.
  return numericKeys ? classifyEntries(entries) : { kind: 'object', entries: sortEntries(entries) };
}

function classify(value: object): Classified | undefined {
  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value };
  }
  if (value instanceof Map) {
    return classifyMap(value);
  }
  if (isPlainObject(value)) {
    return classifyEntries(Object.entries(value).filter(([, item]) => item !== undefined));
  }
  return undefined;
}

function encodeNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return 'null';
  }
  return Object.is(value, -0) ? '0' : String(value);
}

export function encodeDeterministic(
  value: unknown,
  options: DeterministicEncodeOptions = {},
): string {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const indent = options.indent ?? '';
  const ancestors = new Set<object>();

  const encode = (current: unknown, depth: number): string => {
    if (depth > maxDepth) {
      return 'null';
    }
    switch (typeof current) {
      case 'string':
        return escapeJsonString(current);
      case 'number':
        return encodeNumber(current);
      case 'boolean':
        return current ? 'true' : 'false';
    }
    if (typeof current !== 'object' || current === null || ancestors.has(current)) {
      return 'null';
    }
    const classified = classify(current);
    if (!classified) {
      return 'null';
    }

    ancestors.add(current);
    const inner = indent.repeat(depth + 1);
    const outer = indent.repeat(depth);
    let parts: string[];
    if (classified.kind === 'sequence') {
      parts = [];
      for (let index = 0; index < classified.items.length; index += 1) {
        parts.push(encode(classified.items[index], depth + 1));
      }
    } else {
      const separator = indent === '' ? ':' : ': ';
      parts = classified.entries.map(
        ([key, item]) => `${escapeJsonString(key)}${separator}${encode(item, depth + 1)}`,
      );
    }
    ancestors.delete(current);

    const [open, close] = classified.kind === 'sequence' ? ['[', ']'] : ['{', '}'];
    if (parts.length === 0) {
      return `${open}${close}`;
    }
    if (indent === '') {
      return `${open}${parts.join(',')}${close}`;
    }
    return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${outer}${close}`;
  };

  return encode(value, 0);
}
