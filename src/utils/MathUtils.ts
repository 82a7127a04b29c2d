import type { Vec2 } from '../core/Types';

export function equals(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Grid distance used by the host for ranges: |dx| + |dy|. */
export function manhattan(a: Vec2, b: Vec2): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function chebyshev(a: Vec2, b: Vec2): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

/** Integer subtraction that stops at zero. Health and resources never go negative. */
export function saturatingSub(value: number, amount: number): number {
  return value > amount ? value - amount : 0;
}

/** Unit step toward `to` along one axis, x first. Zero vector when already there. */
export function stepToward(from: Vec2, to: Vec2): Vec2 {
  if (from.x !== to.x) return { x: Math.sign(to.x - from.x), y: 0 };
  if (from.y !== to.y) return { x: 0, y: Math.sign(to.y - from.y) };
  return { x: 0, y: 0 };
}

/** Integer mean of a set of points (floor division, as the host rounds). */
export function centroid(points: readonly Vec2[]): Vec2 {
  if (points.length === 0) return { x: 0, y: 0 };
  let sx = 0;
  let sy = 0;
  for (const p of points) {
    sx += p.x;
    sy += p.y;
  }
  return { x: Math.floor(sx / points.length), y: Math.floor(sy / points.length) };
}

export const ORTHOGONAL_STEPS: readonly Vec2[] = [
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 0, y: -1 },
];
