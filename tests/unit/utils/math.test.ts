/**
 * Math Utility Tests
 */

import { describe, it, expect } from 'vitest';
import { safeMin, safeMax, mean, roundTo } from '../../../src/utils/math.js';

describe('safeMin / safeMax', () => {
  it('return extremes', () => {
    expect(safeMin([3, 1, 2])).toBe(1);
    expect(safeMax([3, 1, 2])).toBe(3);
  });

  it('empty -> undefined', () => {
    expect(safeMin([])).toBeUndefined();
    expect(safeMax([])).toBeUndefined();
  });

  it('handles arrays beyond the spread-argument limit', () => {
    const big = Array.from({ length: 200_000 }, (_, i) => i);
    expect(safeMin(big)).toBe(0);
    expect(safeMax(big)).toBe(199_999);
  });
});

describe('mean', () => {
  it('averages values', () => {
    expect(mean([50, 100])).toBe(75);
  });

  it('empty -> undefined', () => {
    expect(mean([])).toBeUndefined();
  });
});

describe('roundTo', () => {
  it('rounds half up to the given places', () => {
    expect(roundTo(90.909090909, 2)).toBe(90.91);
    expect(roundTo(9.090909, 2)).toBe(9.09);
    expect(roundTo(2.5, 0)).toBe(3);
  });

  it('rounds the binary value, so 1.005 -> 1', () => {
    expect(roundTo(1.005, 2)).toBe(1);
  });
});
