import type { Vec2 } from '../core/Types';
/** Half-open rectangle [min, max). */
export interface Rect {
  min: Vec2;
  max: Vec2;
}

export function rect(minX: number, minY: number, maxX: number, maxY: number): Rect {
  return { min: { x: minX, y: minY }, max: { x: maxX, y: maxY } };
}

/** Footprint of a square entity of `size` cells anchored at its min corner. */
export function footprint(position: Vec2, size: number): Rect {
  return rect(position.x, position.y, position.x + size, position.y + size);
}

/** Manhattan distance from a cell to the nearest cell of a rectangle; 0 inside. */
export function distanceToRect(r: Rect, p: Vec2): number {
  const dx = p.x < r.min.x ? r.min.x - p.x : p.x >= r.max.x ? p.x - (r.max.x - 1) : 0;
  const dy = p.y < r.min.y ? r.min.y - p.y : p.y >= r.max.y ? p.y - (r.max.y - 1) : 0;
  return dx + dy;
}

/** Manhattan distance between the nearest cells of two rectangles. */
export function rectDistance(a: Rect, b: Rect): number {
  const dx = Math.max(0, b.min.x - (a.max.x - 1), a.min.x - (b.max.x - 1));
  const dy = Math.max(0, b.min.y - (a.max.y - 1), a.min.y - (b.max.y - 1));
  return dx + dy;
}

/** Cells orthogonally adjacent to a square footprint, clockwise from the top-left side. */
export function borderCells(position: Vec2, size: number): Vec2[] {
  const cells: Vec2[] = [];
  for (let x = position.x; x < position.x + size; x++) cells.push({ x, y: position.y - 1 });
  for (let y = position.y; y < position.y + size; y++) cells.push({ x: position.x + size, y });
  for (let x = position.x + size - 1; x >= position.x; x--) cells.push({ x, y: position.y + size });
  for (let y = position.y + size - 1; y >= position.y; y--) cells.push({ x: position.x - 1, y });
  return cells;
}
