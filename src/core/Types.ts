// Shared data model: what the transport hands us each tick, and what we hand back.

export const ENTITY_KINDS = [
  'wall',
  'house',
  'builderBase',
  'builderUnit',
  'meleeBase',
  'meleeUnit',
  'rangedBase',
  'rangedUnit',
  'resource',
  'turret',
] as const;

export type EntityKind = typeof ENTITY_KINDS[number];

export interface Vec2 {
  x: number;
  y: number;
}

/** One entity as reported by the host. Position is the min corner of its footprint. */
export interface Entity {
  readonly id: number;
  readonly kind: EntityKind;
  /** Player id, or null for neutral entities (resources). */
  readonly owner: number | null;
  readonly position: Vec2;
  readonly health: number;
  /** False while a building is still under construction. */
  readonly active: boolean;
}

export interface PlayerState {
  readonly id: number;
  readonly score: number;
  readonly resource: number;
}

export interface TerrainState {
  /** Row-major traversal cost per cell; 0 marks an impassable cell. */
  readonly cost: readonly number[];
}

export interface WorldSnapshot {
  readonly tick: number;
  readonly myId: number;
  readonly mapSize: number;
  readonly entities: readonly Entity[];
  readonly players: readonly PlayerState[];
  readonly terrain?: TerrainState;
}

export type EntityAction =
  | { kind: 'noop' }
  | { kind: 'hold' }
  | { kind: 'move'; target: Vec2; route: Vec2[] }
  | { kind: 'attack'; targetId: number; target: Vec2 }
  | { kind: 'gather'; targetId: number; target: Vec2 }
  | { kind: 'build'; entityKind: EntityKind; target: Vec2 }
  | { kind: 'produce'; entityKind: EntityKind; target: Vec2 }
  | { kind: 'repair'; targetId: number; target: Vec2 };

export type ActionKind = EntityAction['kind'];

export interface ActionRecord {
  entityId: number;
  action: EntityAction;
}

export const NOOP: EntityAction = { kind: 'noop' };

// ── Result type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T, E = Error>(value: T): Result<T, E> {
  return { ok: true, value };
}

export function err<T, E = Error>(error: E): Result<T, E> {
  return { ok: false, error };
}
