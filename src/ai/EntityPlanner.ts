import type { ActionRecord, Entity, EntityAction, Vec2 } from '../core/Types';
import { NOOP } from '../core/Types';
import type { WorldModel } from '../core/WorldModel';
import type { PlannerConfig } from '../config/PlannerConfig';
import type { Deadline } from '../core/Deadline';
import type { EventBus } from '../core/EventBus';
import { DeadlineExceededError, StaleReferenceError } from '../core/Errors';
import type { PlannerStats } from './PlannerStats';
import type { Role } from './RoleAssignment';
import type { Task, TaskTarget } from './TaskAssignment';
import type { Candidate, Evaluation } from './CandidateEvaluator';
import { simplifyRoute, type PathPlanner, type Route } from '../simulation/PathPlanner';
import { borderCells, footprint, rectDistance } from '../utils/Geometry';
import { equals, manhattan, ORTHOGONAL_STEPS } from '../utils/MathUtils';
import { createLogger } from '../utils/Logger';

const log = createLogger('EntityPlanner');

/** Widest footprint in the rules; bounds the search for entities in attack reach. */
const MAX_FOOTPRINT = 5;

/** Everything the planner knows about one entity this tick. */
export interface EntityDecision {
  entityId: number;
  candidates: Candidate[];
  evaluations: Evaluation[];
}

export interface EntityPlannerOptions {
  config: PlannerConfig;
  paths: PathPlanner;
  stats: PlannerStats;
  bus: EventBus;
}

/** Identity of an action for de-duplication: same key, same command to the host. */
export function actionKey(action: EntityAction): string {
  switch (action.kind) {
    case 'noop':
    case 'hold':
      return action.kind;
    case 'move':
      return `move:${action.target.x},${action.target.y}:${action.route[1]?.x},${action.route[1]?.y}`;
    case 'attack':
    case 'gather':
    case 'repair':
      return `${action.kind}:${action.targetId}`;
    case 'build':
    case 'produce':
      return `${action.kind}:${action.entityKind}:${action.target.x},${action.target.y}`;
  }
}

/** Candidate list capped at a fixed size, ignoring repeats of the same action. */
class CandidateList {
  readonly items: Candidate[] = [];
  private readonly keys = new Set<string>();

  constructor(private readonly limit: number) {}

  get full(): boolean {
    return this.items.length >= this.limit;
  }

  add(candidate: Candidate | null): void {
    if (!candidate || this.full) return;
    const key = actionKey(candidate.action);
    if (this.keys.has(key)) return;
    this.keys.add(key);
    this.items.push(candidate);
  }
}

const HOLD: Candidate = { action: { kind: 'hold' }, sim: { kind: 'none' }, nextCell: null, objective: null };
const IDLE: Candidate = { action: NOOP, sim: { kind: 'none' }, nextCell: null, objective: null };

/**
 * Enumerates the actions an entity could take this tick given its role and
 * task. The first candidate is the heuristic choice, committed when there is
 * no time left to evaluate the rest.
 */
export class EntityPlanner {
  private readonly lastRoutes = new Map<number, Route>();

  constructor(private readonly options: EntityPlannerOptions) {}

  generate(entity: Entity, role: Role, task: Task | undefined, world: WorldModel, deadline: Deadline): Candidate[] {
    const list = new CandidateList(this.options.config.maxCandidatesPerEntity);
    const def = world.def(entity.kind);

    if (!def.canMove) {
      this.generateStatic(entity, role, task, world, list);
      return list.items;
    }

    // A task whose target vanished since reconcile yields no candidates of its own
    try {
      switch (role) {
        case 'gather':
          this.generateGather(entity, task, world, deadline, list);
          break;
        case 'build':
          this.generateBuild(entity, task, world, deadline, list);
          break;
        case 'repair':
          this.generateRepair(entity, task, world, deadline, list);
          break;
        case 'defend':
        case 'attack':
          this.generateFight(entity, task, world, deadline, list);
          break;
        case 'scout':
          if (task) list.add(this.moveToward(entity, task.target.position, world, deadline));
          for (const c of this.attacks(entity, world)) list.add(c);
          break;
        case 'produce':
        case 'idle':
          if (def.attack && !def.attack.harvests) {
            for (const c of this.attacks(entity, world)) list.add(c);
          } else {
            for (const c of this.gathers(entity, world)) list.add(c);
          }
          break;
      }
    } catch (error) {
      if (!(error instanceof StaleReferenceError)) throw error;
      log.debug(`Entity ${entity.id}: ${error.message}, task skipped`);
    }
    list.add(this.retreat(entity, world));
    list.add(HOLD);
    return list.items;
  }

  /**
   * Move toward a task target: the nearest free cell bordering a static
   * target, the target's cell otherwise. Null when already there.
   */
  approach(entity: Entity, target: TaskTarget, world: WorldModel, deadline: Deadline): Candidate | null {
    let goal: Vec2 | null = target.position;
    if (target.entityId !== undefined) {
      const other = world.require(target.entityId);
      const def = world.def(other.kind);
      if (!def.canMove) goal = this.nearestApproach(entity, other.position, def.size, world);
    }
    return goal ? this.moveToward(entity, goal, world, deadline) : null;
  }

  /** Forget routes of entities that are gone. */
  prune(liveIds: ReadonlySet<number>): void {
    for (const id of this.lastRoutes.keys()) {
      if (!liveIds.has(id)) this.lastRoutes.delete(id);
    }
    this.options.paths.forget(liveIds);
  }

  private generateStatic(entity: Entity, role: Role, task: Task | undefined, world: WorldModel, list: CandidateList): void {
    const def = world.def(entity.kind);
    if (role === 'produce' && task?.target.entityKind) {
      const kind = task.target.entityKind;
      list.add({
        action: { kind: 'produce', entityKind: kind, target: task.target.position },
        sim: { kind: 'produce', entityKind: kind, target: task.target.position },
        nextCell: null,
        objective: null,
      });
    }
    if (def.attack) {
      for (const c of this.attacks(entity, world)) list.add(c);
    }
    list.add(IDLE);
  }

  private generateGather(entity: Entity, task: Task | undefined, world: WorldModel, deadline: Deadline, list: CandidateList): void {
    for (const c of this.gathers(entity, world, task?.target.entityId)) list.add(c);
    if (task && !equals(entity.position, task.target.position)) {
      list.add(this.moveToward(entity, task.target.position, world, deadline));
    }
  }

  private generateBuild(entity: Entity, task: Task | undefined, world: WorldModel, deadline: Deadline, list: CandidateList): void {
    const kind = task?.target.entityKind;
    if (!task || !kind) return;
    const site = task.target.position;
    const size = world.def(kind).size;
    const here = footprint(entity.position, 1);
    if (rectDistance(here, footprint(site, size)) <= 1 && world.map.isFreeSquare(site, size)) {
      list.add({
        action: { kind: 'build', entityKind: kind, target: site },
        sim: { kind: 'build', entityKind: kind, target: site },
        nextCell: null,
        objective: site,
      });
    }
    const approach = this.nearestApproach(entity, site, size, world);
    if (approach) list.add(this.moveToward(entity, approach, world, deadline));
  }

  private generateRepair(entity: Entity, task: Task | undefined, world: WorldModel, deadline: Deadline, list: CandidateList): void {
    if (task?.target.entityId === undefined) return;
    const target = world.require(task.target.entityId);
    const size = world.def(target.kind).size;
    if (rectDistance(footprint(entity.position, 1), world.footprintOf(target)) <= 1) {
      list.add({
        action: { kind: 'repair', targetId: target.id, target: target.position },
        sim: { kind: 'repair', targetId: target.id },
        nextCell: null,
        objective: null,
      });
    }
    const approach = this.nearestApproach(entity, target.position, size, world);
    if (approach) list.add(this.moveToward(entity, approach, world, deadline));
  }

  private generateFight(entity: Entity, task: Task | undefined, world: WorldModel, deadline: Deadline, list: CandidateList): void {
    const target = task?.target.entityId === undefined ? undefined : world.require(task.target.entityId);
    for (const c of this.attacks(entity, world, target?.id)) list.add(c);
    if (!target) {
      if (task) list.add(this.moveToward(entity, task.target.position, world, deadline));
      return;
    }
    const range = world.def(entity.kind).attack?.range ?? 0;
    if (rectDistance(footprint(entity.position, 1), world.footprintOf(target)) <= range) return;
    const targetDef = world.def(target.kind);
    const goal = targetDef.canMove
      ? target.position
      : this.nearestApproach(entity, target.position, targetDef.size, world);
    if (goal) list.add(this.moveToward(entity, goal, world, deadline));
  }

  /** Attacks on opponents in range; `preferred` first, then weakest, then lowest id. */
  private attacks(entity: Entity, world: WorldModel, preferred?: number): Candidate[] {
    const attack = world.def(entity.kind).attack;
    if (!attack || attack.harvests) return [];
    const here = world.footprintOf(entity);
    const inRange = world.inRadius(entity.position, attack.range + 2 * MAX_FOOTPRINT)
      .filter(e => e.owner !== null && e.owner !== entity.owner)
      .filter(e => rectDistance(here, world.footprintOf(e)) <= attack.range)
      .sort((a, b) =>
        Number(b.id === preferred) - Number(a.id === preferred)
        || a.health - b.health
        || a.id - b.id);
    return inRange.map(e => ({
      action: { kind: 'attack', targetId: e.id, target: e.position },
      sim: { kind: 'attack', targetId: e.id },
      nextCell: null,
      objective: null,
    }));
  }

  /** Resources within harvesting reach; `preferred` first, then most depleted, then lowest id. */
  private gathers(entity: Entity, world: WorldModel, preferred?: number): Candidate[] {
    const attack = world.def(entity.kind).attack;
    if (!attack || !attack.harvests) return [];
    return world.inRadius(entity.position, attack.range)
      .filter(e => e.kind === 'resource')
      .sort((a, b) =>
        Number(b.id === preferred) - Number(a.id === preferred)
        || a.health - b.health
        || a.id - b.id)
      .map(e => ({
        action: { kind: 'gather', targetId: e.id, target: e.position },
        sim: { kind: 'gather', targetId: e.id },
        nextCell: null,
        objective: null,
      }));
  }

  /** Step to the free neighbour farthest from the nearest armed opponent, while one is in reach. */
  private retreat(entity: Entity, world: WorldModel): Candidate | null {
    if (!world.isAttackedByOpponents(entity.position)) return null;
    let best: { cell: Vec2; distance: number } | null = null;
    for (const step of ORTHOGONAL_STEPS) {
      const cell = { x: entity.position.x + step.x, y: entity.position.y + step.y };
      if (!world.map.isFree(cell)) continue;
      const distance = world.distanceToNearestOpponent(cell) ?? 0;
      if (!best || distance > best.distance) best = { cell, distance };
    }
    if (!best) return null;
    const route = [entity.position, best.cell];
    return {
      action: { kind: 'move', target: best.cell, route },
      sim: { kind: 'move', target: best.cell, route },
      nextCell: best.cell,
      objective: null,
    };
  }

  /** Free cell bordering a footprint, closest to the entity (or the entity's own cell if it already borders it). */
  private nearestApproach(entity: Entity, position: Vec2, size: number, world: WorldModel): Vec2 | null {
    let best: Vec2 | null = null;
    let bestDistance = Infinity;
    for (const cell of borderCells(position, size)) {
      const mine = equals(cell, entity.position);
      if (!mine && !world.map.isFree(cell)) continue;
      const d = manhattan(cell, entity.position);
      if (d < bestDistance) {
        best = cell;
        bestDistance = d;
      }
    }
    return best;
  }

  private moveToward(entity: Entity, goal: Vec2, world: WorldModel, deadline: Deadline): Candidate | null {
    if (equals(entity.position, goal)) return null;
    const { config, paths, stats, bus } = this.options;
    stats.increment('pathCalls');
    const result = paths.planFor(entity.id, world.tick, entity.position, goal, deadline.slice(config.pathBudgetMs));

    let route: Route;
    if (result.ok) {
      route = result.value;
    } else {
      if (result.error instanceof DeadlineExceededError) {
        stats.increment('deadlineHits');
        bus.emit('deadline:hit', { tick: world.tick, phase: 'path', overrunMs: result.error.overrunMs });
      }
      log.debug(`Entity ${entity.id}: ${result.error.message}, using fallback route`);
      stats.increment('fallbacks');
      route = paths.fallbackRoute(entity.position, goal, this.lastRoutes.get(entity.id));
    }
    if (route.length < 2) return null;
    this.lastRoutes.set(entity.id, route);
    return {
      action: { kind: 'move', target: goal, route: simplifyRoute(route) },
      sim: { kind: 'move', target: goal, route },
      nextCell: route[1],
      objective: goal,
    };
  }
}

/**
 * Pick one action per entity. Entities are visited in ascending id; each takes
 * its best-scoring candidate (ties to the lower index), skipping moves into a
 * cell a lower id already claimed. Unevaluated candidates follow the scored
 * ones in generation order.
 */
export function mergeDecisions(decisions: readonly EntityDecision[]): ActionRecord[] {
  const claimed = new Set<string>();
  const records: ActionRecord[] = [];
  for (const decision of [...decisions].sort((a, b) => a.entityId - b.entityId)) {
    const scored = [...decision.evaluations].sort((a, b) => b.score - a.score || a.index - b.index);
    const order = scored.map(e => e.index);
    const evaluated = new Set(order);
    for (let i = 0; i < decision.candidates.length; i++) {
      if (!evaluated.has(i)) order.push(i);
    }

    let action: EntityAction = NOOP;
    for (const index of order) {
      const candidate = decision.candidates[index];
      if (candidate.nextCell) {
        const key = `${candidate.nextCell.x},${candidate.nextCell.y}`;
        if (claimed.has(key)) continue;
        claimed.add(key);
      }
      action = candidate.action;
      break;
    }
    records.push({ entityId: decision.entityId, action });
  }
  return records;
}
