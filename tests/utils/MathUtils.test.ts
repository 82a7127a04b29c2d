import { describe, it, expect } from 'vitest';
import {
  equals, manhattan, chebyshev, saturatingSub, stepToward, centroid, ORTHOGONAL_STEPS,
} from '../../src/utils/MathUtils';

describe('equals', () => {
  it('compares by value', () => {
    expect(equals({ x: 3, y: 4 }, { x: 3, y: 4 })).toBe(true);
    expect(equals({ x: 3, y: 4 }, { x: 4, y: 3 })).toBe(false);
  });
});

describe('grid distances', () => {
  it('manhattan sums axis distances', () => {
    expect(manhattan({ x: 0, y: 0 }, { x: 3, y: -4 })).toBe(7);
  });

  it('chebyshev takes the larger axis distance', () => {
    expect(chebyshev({ x: 0, y: 0 }, { x: 3, y: -4 })).toBe(4);
  });
});

describe('saturatingSub', () => {
  it('subtracts normally when the result stays positive', () => {
    expect(saturatingSub(10, 3)).toBe(7);
  });

  it('stops at zero', () => {
    expect(saturatingSub(3, 10)).toBe(0);
    expect(saturatingSub(5, 5)).toBe(0);
  });
});

describe('stepToward', () => {
  it('moves along x first', () => {
    expect(stepToward({ x: 0, y: 0 }, { x: 3, y: 5 })).toEqual({ x: 1, y: 0 });
  });

  it('moves along y once x matches', () => {
    expect(stepToward({ x: 3, y: 7 }, { x: 3, y: 5 })).toEqual({ x: 0, y: -1 });
  });

  it('is zero at the target', () => {
    expect(stepToward({ x: 2, y: 2 }, { x: 2, y: 2 })).toEqual({ x: 0, y: 0 });
  });
});

describe('centroid', () => {
  it('floors the mean', () => {
    expect(centroid([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 4, y: 3 }])).toEqual({ x: 1, y: 1 });
  });

  it('is the origin for no points', () => {
    expect(centroid([])).toEqual({ x: 0, y: 0 });
  });
});

describe('ORTHOGONAL_STEPS', () => {
  it('lists the four unit steps in fixed order', () => {
    expect(ORTHOGONAL_STEPS).toEqual([
      { x: 1, y: 0 },
      { x: 0, y: 1 },
      { x: -1, y: 0 },
      { x: 0, y: -1 },
    ]);
  });
});
