import { describe, expect, it } from 'vitest';

import { boundedSearch } from './bounded-search.js';

const findNumber = (value: unknown): number | undefined =>
  typeof value === 'number' ? value : undefined;

describe('boundedSearch', () => {
  it('visits preferred keys before the remaining ones', () => {
    const root = { a: 1, b: { c: 2 }, target: 3 };
    expect(boundedSearch(root, findNumber, { maxDepth: 3, preferredKeys: ['target'] })).toBe(3);
    expect(boundedSearch(root, findNumber, { maxDepth: 3 })).toBe(1);
  });

  it('stops descending past maxDepth', () => {
    const root = { level1: { level2: { level3: 7 } } };
    expect(boundedSearch(root, findNumber, { maxDepth: 2 })).toBeUndefined();
    expect(boundedSearch(root, findNumber, { maxDepth: 3 })).toBe(7);
  });

  it('terminates on reference cycles', () => {
    const node: Record<string, unknown> = { name: 'loop' };
    node.next = node;
    node.items = [node, { other: node }];
    expect(boundedSearch(node, findNumber, { maxDepth: 50 })).toBeUndefined();
  });

  it('passes keys and depths to the visitor', () => {
    const seen: string[] = [];
    boundedSearch(
      { a: [10] },
      (_value, key, depth) => {
        seen.push(`${key ?? '<root>'}@${depth}`);
        return undefined;
      },
      { maxDepth: 5 },
    );
    expect(seen).toEqual(['<root>@0', 'a@1', '0@2']);
  });
});
