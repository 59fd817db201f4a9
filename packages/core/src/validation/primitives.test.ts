import { describe, expect, it } from 'vitest';

import { isFiniteNumber, isNonBlankString, isPlainRecord } from './primitives.js';

describe('validation/primitives', () => {
  it('treats whitespace-only names as blank', () => {
    expect(isNonBlankString(' Central ')).toBe(true);
    expect(isNonBlankString('\t\n')).toBe(false);
    expect(isNonBlankString('')).toBe(false);
    expect(isNonBlankString(42)).toBe(false);
  });

  it('rejects non-finite host numbers', () => {
    expect(isFiniteNumber(-12.5)).toBe(true);
    expect(isFiniteNumber(Number.NaN)).toBe(false);
    expect(isFiniteNumber(Number.NEGATIVE_INFINITY)).toBe(false);
    expect(isFiniteNumber('7')).toBe(false);
  });

  it('accepts only keyed objects as records', () => {
    expect(isPlainRecord({ name: 'Central' })).toBe(true);
    expect(isPlainRecord([1, 2])).toBe(false);
    expect(isPlainRecord(null)).toBe(false);
    expect(isPlainRecord('entity')).toBe(false);
  });
});
