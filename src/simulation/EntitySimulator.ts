import type { EntityKind, PlayerState, Vec2 } from '../core/Types';
import type { EntityRules } from '../config/EntityRules';
import { loadDefaultEntityRules } from '../config/EntityRules';
import { DeadlineExceededError } from '../core/Errors';
import type { Deadline } from '../core/Deadline';
import { footprint, type Rect } from '../utils/Geometry';
import { DefaultResolutionRules, type Intent, type ResolutionRules } from './ResolutionRules';

export interface SimEntity {
  id: number;
  kind: EntityKind;
  owner: number | null;
  position: Vec2;
  health: number;
  active: boolean;
}

export interface SimPlayer {
  id: number;
  resource: number;
  score: number;
  damageDone: number;
  damageReceived: number;
  produced: number;
}

/** What an entity is told to do; repeated on every simulated tick. */
export type SimAction =
  | { kind: 'none' }
  | { kind: 'move'; target: Vec2; route?: readonly Vec2[] }
  | { kind: 'attack'; targetId: number }
  | { kind: 'autoAttack' }
  | { kind: 'gather'; targetId: number }
  | { kind: 'repair'; targetId: number }
  | { kind: 'produce'; entityKind: EntityKind; target: Vec2 }
  | { kind: 'build'; entityKind: EntityKind; target: Vec2 };

export interface SimulatedState {
  /** Ticks actually simulated. */
  tick: number;
  entities: SimEntity[];
  players: SimPlayer[];
  destroyed: number[];
  /** Entities whose action referenced something absent or dead. */
  skipped: number[];
}

/** Just enough of the map for bounds and terrain checks. */
export interface SimulationMap {
  readonly size: number;
  isTerrainPassable(p: Vec2): boolean;
}

export interface SimulateOptions {
  players: readonly PlayerState[];
  rules?: EntityRules;
  resolution?: ResolutionRules;
  map?: SimulationMap;
  deadline?: Deadline;
}

function cellKey(p: Vec2): number {
  return p.y * 65536 + p.x;
}

/**
 * Mutable working state of one simulation run. Owns copies of everything it
 * touches; nothing leaks back to the caller's objects.
 */
export class SimulationWorld {
  entities: SimEntity[];
  private readonly byId = new Map<number, SimEntity>();
  private readonly players = new Map<number, SimPlayer>();
  private readonly occupancy = new Map<number, number>();
  private spawnedId = 0;

  constructor(
    readonly rules: EntityRules,
    entities: readonly SimEntity[],
    players: readonly PlayerState[],
    private readonly map?: SimulationMap,
  ) {
    this.entities = entities
      .map(e => ({ ...e, position: { ...e.position } }))
      .sort((a, b) => a.id - b.id);
    for (const e of this.entities) {
      this.byId.set(e.id, e);
      this.occupy(e);
    }
    for (const p of players) {
      this.players.set(p.id, { id: p.id, resource: p.resource, score: p.score, damageDone: 0, damageReceived: 0, produced: 0 });
    }
  }

  entity(id: number): SimEntity | undefined {
    return this.byId.get(id);
  }

  isAlive(id: number): boolean {
    const e = this.byId.get(id);
    return e !== undefined && e.health > 0;
  }

  player(owner: number | null): SimPlayer | undefined {
    return owner === null ? undefined : this.players.get(owner);
  }

  footprintOf(e: SimEntity): Rect {
    return footprint(e.position, this.rules[e.kind].size);
  }

  isInside(p: Vec2): boolean {
    if (p.x < 0 || p.y < 0) return false;
    if (!this.map) return true;
    return p.x < this.map.size && p.y < this.map.size && this.map.isTerrainPassable(p);
  }

  occupantAt(p: Vec2): number | undefined {
    return this.occupancy.get(cellKey(p));
  }

  isCellFree(p: Vec2): boolean {
    return this.isInside(p) && !this.occupancy.has(cellKey(p));
  }

  isSquareFree(position: Vec2, size: number): boolean {
    for (let dy = 0; dy < size; dy++) {
      for (let dx = 0; dx < size; dx++) {
        if (!this.isCellFree({ x: position.x + dx, y: position.y + dy })) return false;
      }
    }
    return true;
  }

  /** Relocate a single-cell entity. Caller has checked the destination. */
  moveEntity(e: SimEntity, to: Vec2): void {
    this.release(e);
    e.position = { x: to.x, y: to.y };
    this.occupy(e);
  }

  spawn(kind: EntityKind, owner: number | null, position: Vec2, active: boolean, health: number): SimEntity {
    // Negative ids never collide with host ids
    const e: SimEntity = { id: --this.spawnedId, kind, owner, position: { ...position }, health, active };
    this.entities.push(e);
    this.entities.sort((a, b) => a.id - b.id);
    this.byId.set(e.id, e);
    this.occupy(e);
    return e;
  }

  /** Remove dead entities; returns their ids in ascending order. */
  removeDead(): number[] {
    const dead: number[] = [];
    for (const e of this.entities) {
      if (e.health > 0) continue;
      dead.push(e.id);
      this.release(e);
      this.byId.delete(e.id);
    }
    if (dead.length > 0) this.entities = this.entities.filter(e => e.health > 0);
    return dead;
  }

  snapshotPlayers(): SimPlayer[] {
    return [...this.players.values()].map(p => ({ ...p })).sort((a, b) => a.id - b.id);
  }

  snapshotEntities(): SimEntity[] {
    return this.entities.map(e => ({ ...e, position: { ...e.position } }));
  }

  private occupy(e: SimEntity): void {
    this.forEachCell(e, key => this.occupancy.set(key, e.id));
  }

  private release(e: SimEntity): void {
    this.forEachCell(e, key => {
      if (this.occupancy.get(key) === e.id) this.occupancy.delete(key);
    });
  }

  private forEachCell(e: SimEntity, fn: (key: number) => void): void {
    const size = this.rules[e.kind].size;
    for (let dy = 0; dy < size; dy++) {
      for (let dx = 0; dx < size; dx++) {
        fn(cellKey({ x: e.position.x + dx, y: e.position.y + dy }));
      }
    }
  }
}

function referencedId(action: SimAction): number | null {
  switch (action.kind) {
    case 'attack':
    case 'gather':
    case 'repair':
      return action.targetId;
    default:
      return null;
  }
}

/**
 * Project `entities` forward `horizon` ticks under `actions`. Each tick:
 * movement, then combat, then economy, then removal of the dead.
 * Deterministic for identical input.
 */
export function simulate(
  entities: readonly SimEntity[],
  actions: ReadonlyMap<number, SimAction>,
  horizon: number,
  options: SimulateOptions,
): SimulatedState {
  const resolution = options.resolution ?? DefaultResolutionRules;
  const world = new SimulationWorld(options.rules ?? loadDefaultEntityRules(), entities, options.players, options.map);
  const destroyed: number[] = [];
  const skipped = new Set<number>();

  for (const entityId of actions.keys()) {
    if (!world.isAlive(entityId)) skipped.add(entityId);
  }

  let tick = 0;
  for (; tick < horizon; tick++) {
    const deadline = options.deadline;
    if (deadline && deadline.expired()) {
      throw new DeadlineExceededError('simulation', deadline.overrun());
    }

    const intents: { entity: SimEntity; intent: Intent }[] = [];
    for (const entity of world.entities) {
      if (entity.health <= 0 || !entity.active) continue;
      const explicit = actions.get(entity.id);
      const action = explicit ?? resolution.defaultAction(entity, world);
      const ref = referencedId(action);
      if (ref !== null && !world.isAlive(ref)) {
        if (explicit) skipped.add(entity.id);
        continue;
      }
      intents.push({ entity, intent: resolution.resolveIntent(entity, action, world) });
    }

    resolution.resolveMovement(world, intents);
    resolution.resolveCombat(world, intents);
    resolution.resolveEconomy(world, intents);
    destroyed.push(...world.removeDead());
  }

  return {
    tick,
    entities: world.snapshotEntities(),
    players: world.snapshotPlayers(),
    destroyed: destroyed.sort((a, b) => a - b),
    skipped: [...skipped].sort((a, b) => a - b),
  };
}
