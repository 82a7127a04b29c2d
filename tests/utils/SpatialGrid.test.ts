import { describe, it, expect, beforeEach } from 'vitest';
import { SpatialGrid } from '../../src/utils/SpatialGrid';

describe('SpatialGrid', () => {
  let grid: SpatialGrid;

  beforeEach(() => {
    grid = new SpatialGrid(10); // 10-cell buckets
  });

  describe('insert and getInRadius', () => {
    it('returns empty array when grid is empty', () => {
      expect(grid.getInRadius(0, 0, 5)).toEqual([]);
    });

    it('finds entity in same bucket', () => {
      grid.insert(1, 5, 5);
      expect(grid.getInRadius(5, 5, 1)).toEqual([1]);
    });

    it('finds entity in adjacent bucket', () => {
      grid.insert(1, 15, 15); // bucket (1,1)
      expect(grid.getInRadius(5, 5, 1)).toContain(1);
    });

    it('does not find entity 2+ buckets away for a small radius', () => {
      grid.insert(1, 25, 25); // bucket (2,2)
      expect(grid.getInRadius(0, 0, 5)).not.toContain(1);
    });

    it('finds multiple entities', () => {
      grid.insert(1, 5, 5);
      grid.insert(2, 7, 7);
      grid.insert(3, 3, 3);
      expect([...grid.getInRadius(5, 5, 2)].sort()).toEqual([1, 2, 3]);
    });

    it('spans ceil(radius / cellSize) buckets each way', () => {
      grid.insert(1, 0, 0);
      grid.insert(2, 25, 0); // bucket (2,0)
      grid.insert(3, 35, 0); // bucket (3,0)
      const result = grid.getInRadius(0, 0, 20);
      expect(result).toContain(1);
      expect(result).toContain(2);
      expect(result).not.toContain(3);
    });
  });

  describe('clear', () => {
    it('removes all entities', () => {
      grid.insert(1, 5, 5);
      grid.insert(2, 15, 15);
      grid.clear();
      expect(grid.getInRadius(5, 5, 1)).toEqual([]);
      expect(grid.getInRadius(15, 15, 1)).toEqual([]);
    });
  });

  describe('results', () => {
    it('returns a fresh array per query', () => {
      grid.insert(1, 5, 5);
      const a = grid.getInRadius(5, 5, 1);
      const b = grid.getInRadius(5, 5, 1);
      expect(a).not.toBe(b);
      expect(a).toEqual(b);
    });
  });

  describe('negative coordinates', () => {
    it('handles negative positions', () => {
      grid.insert(42, -5, -5);
      expect(grid.getInRadius(-3, -3, 1)).toContain(42);
    });
  });
});
