import type { Entity, TerrainState, Vec2 } from '../core/Types';
import type { EntityRules } from '../config/EntityRules';

export const FREE = -1;

/**
 * Static terrain cost grid plus per-tick occupancy.
 * Occupancy is rebuilt from scratch by `setOccupancy`; nothing carries over.
 */
export class GameMap {
  private readonly terrainCost: Uint16Array;
  private occupant: Int32Array;
  private staticCell: Uint8Array;

  constructor(readonly size: number, terrain?: TerrainState) {
    const cells = size * size;
    this.terrainCost = new Uint16Array(cells).fill(1);
    this.occupant = new Int32Array(cells).fill(FREE);
    this.staticCell = new Uint8Array(cells);
    if (terrain) this.setTerrain(terrain);
  }

  setTerrain(terrain: TerrainState): void {
    const n = Math.min(terrain.cost.length, this.terrainCost.length);
    for (let i = 0; i < n; i++) {
      this.terrainCost[i] = Math.max(0, Math.floor(terrain.cost[i]));
    }
  }

  /** Recompute occupancy from the given entities only. */
  setOccupancy(entities: readonly Entity[], rules: EntityRules): void {
    this.occupant.fill(FREE);
    this.staticCell.fill(0);
    for (const entity of entities) {
      const def = rules[entity.kind];
      for (let dy = 0; dy < def.size; dy++) {
        for (let dx = 0; dx < def.size; dx++) {
          const x = entity.position.x + dx;
          const y = entity.position.y + dy;
          if (!this.contains({ x, y })) continue;
          const i = y * this.size + x;
          this.occupant[i] = entity.id;
          if (!def.canMove) this.staticCell[i] = 1;
        }
      }
    }
  }

  contains(p: Vec2): boolean {
    return p.x >= 0 && p.y >= 0 && p.x < this.size && p.y < this.size;
  }

  index(p: Vec2): number {
    return p.y * this.size + p.x;
  }

  /** Traversal cost of the terrain; 0 means impassable. */
  terrainCostAt(p: Vec2): number {
    return this.contains(p) ? this.terrainCost[this.index(p)] : 0;
  }

  /** Terrain allows walking here, ignoring who stands on it. */
  isTerrainPassable(p: Vec2): boolean {
    return this.terrainCostAt(p) > 0;
  }

  /** Terrain is passable and no building, wall or resource covers the cell. */
  isPassable(p: Vec2): boolean {
    return this.isTerrainPassable(p) && this.staticCell[this.index(p)] === 0;
  }

  occupantAt(p: Vec2): number {
    return this.contains(p) ? this.occupant[this.index(p)] : FREE;
  }

  isFree(p: Vec2): boolean {
    return this.isPassable(p) && this.occupant[this.index(p)] === FREE;
  }

  /** Every cell of a size×size square at `position` is inside the map and free. */
  isFreeSquare(position: Vec2, size: number): boolean {
    for (let dy = 0; dy < size; dy++) {
      for (let dx = 0; dx < size; dx++) {
        if (!this.isFree({ x: position.x + dx, y: position.y + dy })) return false;
      }
    }
    return true;
  }
}
