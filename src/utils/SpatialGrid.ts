/**
 * Spatial hash grid for neighbor queries over entity ids.
 * Reduces all-pairs proximity checks to the handful of ids in nearby cells.
 * Results are candidates: callers still filter by exact distance.
 */
export class SpatialGrid {
  private readonly invCellSize: number;
  private cells = new Map<number, number[]>();

  constructor(readonly cellSize: number) {
    this.invCellSize = 1 / cellSize;
  }

  clear(): void {
    this.cells.clear();
  }

  private key(cx: number, cy: number): number {
    // Pack two 16-bit signed ints into one 32-bit number
    return ((cx & 0xFFFF) << 16) | (cy & 0xFFFF);
  }

  insert(id: number, x: number, y: number): void {
    const k = this.key(Math.floor(x * this.invCellSize), Math.floor(y * this.invCellSize));
    let cell = this.cells.get(k);
    if (!cell) {
      cell = [];
      this.cells.set(k, cell);
    }
    cell.push(id);
  }

  /** Ids in every cell touched by a square of half-width `radius`. */
  getInRadius(x: number, y: number, radius: number): number[] {
    const span = Math.ceil(radius * this.invCellSize);
    const cx = Math.floor(x * this.invCellSize);
    const cy = Math.floor(y * this.invCellSize);
    const result: number[] = [];
    for (let dy = -span; dy <= span; dy++) {
      for (let dx = -span; dx <= span; dx++) {
        const cell = this.cells.get(this.key(cx + dx, cy + dy));
        if (cell) {
          for (let i = 0; i < cell.length; i++) {
            result.push(cell[i]);
          }
        }
      }
    }
    return result;
  }
}
