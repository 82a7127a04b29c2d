import type { Entity, EntityKind, PlayerState, Vec2, WorldSnapshot } from './Types';
import type { EntityRules, EntityTypeDef } from '../config/EntityRules';
import { isBaseKind, isProtectedKind } from '../config/EntityRules';
import { OutOfOrderSnapshotError, StaleReferenceError } from './Errors';
import {
  Position, Health, Owner, Kind, Footprint, Armed, Inactive, NEUTRAL_OWNER,
  entityQuery, armedQuery,
  addEntity, removeEntity, addComponent, removeComponent, hasComponent,
  createEntityWorld, kindToId,
  type World,
} from './ECS';
import { GameMap } from '../simulation/GameMap';
import { SpatialGrid } from '../utils/SpatialGrid';
import { borderCells, footprint, type Rect } from '../utils/Geometry';
import { centroid, manhattan } from '../utils/MathUtils';
import { createLogger } from '../utils/Logger';

const log = createLogger('WorldModel');

const SPATIAL_CELL_SIZE = 8;
/** Enemies with a shorter reach still count as dangerous at this distance. */
const MIN_THREAT_RANGE = 3;

export interface OwnerChange {
  id: number;
  from: number | null;
  to: number | null;
}

/** Structural change between two consecutive ingests. */
export interface WorldDelta {
  tick: number;
  /** True when the snapshot repeated the last tick and was ignored. */
  duplicate: boolean;
  appeared: number[];
  /** Last known state of entities that disappeared. */
  vanished: Entity[];
  ownerChanged: OwnerChange[];
}

export interface WorldModelOptions {
  historySize: number;
}

/**
 * Authoritative view of the match as of the last ingested snapshot.
 * Only `ingest` mutates it; everything else is a read.
 */
export class WorldModel {
  private current: WorldSnapshot | null = null;
  private readonly snapshots: WorldSnapshot[] = [];
  private byId = new Map<number, Entity>();
  private sorted: Entity[] = [];
  private playersById = new Map<number, PlayerState>();
  private gameMap: GameMap | null = null;
  private readonly spatial = new SpatialGrid(SPATIAL_CELL_SIZE);

  // ECS mirror of the snapshot; backs owner/kind/armed queries
  private readonly ecs: World = createEntityWorld();
  private readonly eidByHostId = new Map<number, number>();
  private readonly hostIdByEid = new Map<number, number>();

  private start: Vec2 | null = null;
  private protectedRadiusCache: number | null = null;

  constructor(readonly rules: EntityRules, private readonly options: WorldModelOptions = { historySize: 16 }) {}

  // ── Ingestion ────────────────────────────────────────────────

  ingest(snapshot: WorldSnapshot): WorldDelta {
    const last = this.current;
    if (last) {
      if (snapshot.tick < last.tick) {
        throw new OutOfOrderSnapshotError(last.tick, snapshot.tick);
      }
      if (snapshot.tick === last.tick) {
        log.debug(`Duplicate snapshot for tick ${snapshot.tick} ignored`);
        return { tick: snapshot.tick, duplicate: true, appeared: [], vanished: [], ownerChanged: [] };
      }
    }

    const previous = this.byId;
    const next = new Map<number, Entity>();
    for (const entity of snapshot.entities) next.set(entity.id, entity);

    const appeared: number[] = [];
    const ownerChanged: OwnerChange[] = [];
    for (const [id, entity] of next) {
      const before = previous.get(id);
      if (!before) {
        appeared.push(id);
      } else if (before.owner !== entity.owner) {
        ownerChanged.push({ id, from: before.owner, to: entity.owner });
      }
    }
    const vanished: Entity[] = [];
    for (const [id, entity] of previous) {
      if (!next.has(id)) vanished.push(entity);
    }
    appeared.sort((a, b) => a - b);
    vanished.sort((a, b) => a.id - b.id);
    ownerChanged.sort((a, b) => a.id - b.id);

    this.current = snapshot;
    this.byId = next;
    this.sorted = [...next.values()].sort((a, b) => a.id - b.id);
    this.playersById = new Map(snapshot.players.map(p => [p.id, p]));
    this.protectedRadiusCache = null;

    this.snapshots.push(snapshot);
    while (this.snapshots.length > this.options.historySize) this.snapshots.shift();

    this.syncEcs(vanished);
    this.rebuildMap(snapshot);
    this.rebuildSpatial();
    if (!this.start) this.start = this.findStartPosition(snapshot);

    return { tick: snapshot.tick, duplicate: false, appeared, vanished, ownerChanged };
  }

  private syncEcs(vanished: readonly Entity[]): void {
    const w = this.ecs;
    for (const entity of vanished) {
      const eid = this.eidByHostId.get(entity.id);
      if (eid === undefined) continue;
      removeEntity(w, eid);
      this.eidByHostId.delete(entity.id);
      this.hostIdByEid.delete(eid);
    }
    for (const entity of this.sorted) {
      let eid = this.eidByHostId.get(entity.id);
      const def = this.rules[entity.kind];
      if (eid === undefined) {
        eid = addEntity(w);
        this.eidByHostId.set(entity.id, eid);
        this.hostIdByEid.set(eid, entity.id);
        addComponent(w, Position, eid);
        addComponent(w, Health, eid);
        addComponent(w, Owner, eid);
        addComponent(w, Kind, eid);
        addComponent(w, Footprint, eid);
        if (def.attack && !def.attack.harvests) addComponent(w, Armed, eid);
      }
      Position.x[eid] = entity.position.x;
      Position.y[eid] = entity.position.y;
      Health.current[eid] = entity.health;
      Health.max[eid] = def.maxHealth;
      Owner.playerId[eid] = entity.owner ?? NEUTRAL_OWNER;
      Kind.id[eid] = kindToId(entity.kind);
      Footprint.size[eid] = def.size;
      const inactive = hasComponent(w, Inactive, eid);
      if (!entity.active && !inactive) addComponent(w, Inactive, eid);
      else if (entity.active && inactive) removeComponent(w, Inactive, eid);
    }
  }

  private rebuildMap(snapshot: WorldSnapshot): void {
    if (!this.gameMap || this.gameMap.size !== snapshot.mapSize) {
      this.gameMap = new GameMap(snapshot.mapSize, snapshot.terrain);
    } else if (snapshot.terrain) {
      this.gameMap.setTerrain(snapshot.terrain);
    }
    this.gameMap.setOccupancy(this.sorted, this.rules);
  }

  private rebuildSpatial(): void {
    this.spatial.clear();
    for (const entity of this.sorted) {
      this.spatial.insert(entity.id, entity.position.x, entity.position.y);
    }
  }

  private findStartPosition(snapshot: WorldSnapshot): Vec2 {
    const mine = this.sorted.filter(e => e.owner === snapshot.myId);
    const bases = mine.filter(e => isBaseKind(e.kind));
    if (bases.length > 0) return centroid(bases.map(e => e.position));
    if (mine.length > 0) return mine[0].position;
    const mid = Math.floor(snapshot.mapSize / 2);
    return { x: mid, y: mid };
  }

  // ── Snapshot accessors ───────────────────────────────────────

  get hasSnapshot(): boolean {
    return this.current !== null;
  }

  get tick(): number {
    return this.current?.tick ?? -1;
  }

  get myId(): number {
    return this.current?.myId ?? -1;
  }

  get mapSize(): number {
    return this.current?.mapSize ?? 0;
  }

  get map(): GameMap {
    if (!this.gameMap) this.gameMap = new GameMap(0);
    return this.gameMap;
  }

  snapshot(): WorldSnapshot | null {
    return this.current;
  }

  /** Recent snapshots, oldest first, at most `historySize` of them. */
  history(): readonly WorldSnapshot[] {
    return this.snapshots;
  }

  def(kind: EntityKind): EntityTypeDef {
    return this.rules[kind];
  }

  // ── Entity accessors ─────────────────────────────────────────

  entity(id: number): Entity | undefined {
    return this.byId.get(id);
  }

  /** Like entity(), for ids that must still be present. */
  require(id: number): Entity {
    const e = this.byId.get(id);
    if (!e) throw new StaleReferenceError(id);
    return e;
  }

  hasEntity(id: number): boolean {
    return this.byId.has(id);
  }

  /** All entities, sorted by id. */
  entities(): readonly Entity[] {
    return this.sorted;
  }

  byOwner(owner: number | null): Entity[] {
    const wanted = owner ?? NEUTRAL_OWNER;
    return this.collect(entityQuery(this.ecs), eid => Owner.playerId[eid] === wanted);
  }

  byKind(kind: EntityKind): Entity[] {
    const wanted = kindToId(kind);
    return this.collect(entityQuery(this.ecs), eid => Kind.id[eid] === wanted);
  }

  mine(): Entity[] {
    return this.byOwner(this.myId);
  }

  myOfKind(kind: EntityKind): Entity[] {
    const wanted = kindToId(kind);
    const me = this.myId;
    return this.collect(entityQuery(this.ecs), eid => Kind.id[eid] === wanted && Owner.playerId[eid] === me);
  }

  /** Own entities below max health. */
  myDamaged(): Entity[] {
    const me = this.myId;
    return this.collect(entityQuery(this.ecs), eid => Owner.playerId[eid] === me && Health.current[eid] < Health.max[eid]);
  }

  opponents(): Entity[] {
    const me = this.myId;
    return this.collect(entityQuery(this.ecs), eid => {
      const owner = Owner.playerId[eid];
      return owner !== me && owner !== NEUTRAL_OWNER;
    });
  }

  /** Opponent entities that can deal damage. */
  armedOpponents(): Entity[] {
    const me = this.myId;
    return this.collect(armedQuery(this.ecs), eid => {
      const owner = Owner.playerId[eid];
      return owner !== me && owner !== NEUTRAL_OWNER && !hasComponent(this.ecs, Inactive, eid);
    });
  }

  resources(): Entity[] {
    return this.byKind('resource');
  }

  /** Entities whose anchor cell is within Manhattan `radius` of `center`, sorted by id. */
  inRadius(center: Vec2, radius: number): Entity[] {
    const out: Entity[] = [];
    for (const id of this.spatial.getInRadius(center.x, center.y, radius)) {
      const entity = this.byId.get(id);
      if (entity && manhattan(entity.position, center) <= radius) out.push(entity);
    }
    return out.sort((a, b) => a.id - b.id);
  }

  private collect(eids: readonly number[], keep: (eid: number) => boolean): Entity[] {
    const out: Entity[] = [];
    for (const eid of eids) {
      if (!keep(eid)) continue;
      const hostId = this.hostIdByEid.get(eid);
      const entity = hostId === undefined ? undefined : this.byId.get(hostId);
      if (entity) out.push(entity);
    }
    return out.sort((a, b) => a.id - b.id);
  }

  // ── Players & economy ────────────────────────────────────────

  players(): PlayerState[] {
    return [...this.playersById.values()].sort((a, b) => a.id - b.id);
  }

  player(id: number): PlayerState | undefined {
    return this.playersById.get(id);
  }

  myPlayer(): PlayerState | undefined {
    return this.player(this.myId);
  }

  myResource(): number {
    return this.myPlayer()?.resource ?? 0;
  }

  populationUse(): number {
    let total = 0;
    for (const e of this.mine()) total += this.rules[e.kind].populationUse;
    return total;
  }

  /** Population capacity from active own buildings. */
  populationProvide(): number {
    let total = 0;
    for (const e of this.mine()) {
      if (e.active) total += this.rules[e.kind].populationProvide;
    }
    return total;
  }

  // ── Spatial reasoning ────────────────────────────────────────

  get startPosition(): Vec2 {
    return this.start ?? { x: 0, y: 0 };
  }

  /** Radius around the start position covering own protected entities plus their sight. */
  protectedRadius(): number {
    if (this.protectedRadiusCache !== null) return this.protectedRadiusCache;
    let radius = 0;
    const start = this.startPosition;
    for (const e of this.mine()) {
      if (!isProtectedKind(e.kind)) continue;
      radius = Math.max(radius, manhattan(e.position, start) + this.rules[e.kind].sightRange);
    }
    this.protectedRadiusCache = radius;
    return radius;
  }

  isInsideProtectedPerimeter(p: Vec2): boolean {
    return manhattan(p, this.startPosition) <= this.protectedRadius();
  }

  /** Some armed opponent could hit `p` from where it stands now. */
  isAttackedByOpponents(p: Vec2): boolean {
    for (const enemy of this.armedOpponents()) {
      const reach = Math.max(this.rules[enemy.kind].attack?.range ?? 0, MIN_THREAT_RANGE);
      if (manhattan(enemy.position, p) <= reach) return true;
    }
    return false;
  }

  distanceToNearestOpponent(p: Vec2): number | null {
    let best: number | null = null;
    for (const enemy of this.armedOpponents()) {
      const d = manhattan(enemy.position, p);
      if (best === null || d < best) best = d;
    }
    return best;
  }

  /** First free cell bordering a size×size footprint, clockwise from the top-left. */
  findFreeCellNear(position: Vec2, size: number): Vec2 | null {
    for (const cell of borderCells(position, size)) {
      if (this.map.isFree(cell)) return cell;
    }
    return null;
  }

  /**
   * Anchor for a new building of `kind` near `near`: a free square with a
   * one-cell free margin so units can still walk around it.
   */
  findBuildSite(kind: EntityKind, near: Vec2): Vec2 | null {
    const size = this.rules[kind].size;
    const map = this.map;
    const maxRadius = Math.floor(map.size / 2);
    for (let r = 1; r <= maxRadius; r++) {
      for (let dy = -r; dy <= r; dy++) {
        for (let dx = -r; dx <= r; dx++) {
          if (Math.abs(dx) !== r && Math.abs(dy) !== r) continue;
          const anchor = { x: near.x + dx, y: near.y + dy };
          const margin = { x: anchor.x - 1, y: anchor.y - 1 };
          if (!map.isFreeSquare(anchor, size)) continue;
          if (!this.isClearMargin(margin, size + 2)) continue;
          return anchor;
        }
      }
    }
    return null;
  }

  private isClearMargin(position: Vec2, size: number): boolean {
    const map = this.map;
    for (let dy = 0; dy < size; dy++) {
      for (let dx = 0; dx < size; dx++) {
        const p = { x: position.x + dx, y: position.y + dy };
        // Map edges count as clear: nothing needs to walk past them
        if (map.contains(p) && !map.isFree(p)) return false;
      }
    }
    return true;
  }

  /** Occupied rect as mirrored in the ECS; rules size for entities not in this snapshot. */
  footprintOf(entity: Entity): Rect {
    const eid = this.eidByHostId.get(entity.id);
    if (eid === undefined) return footprint(entity.position, this.rules[entity.kind].size);
    return footprint({ x: Position.x[eid], y: Position.y[eid] }, Footprint.size[eid]);
  }
}
