import type { Result, Vec2 } from '../core/Types';
import { ok, err } from '../core/Types';
import { UnreachableError, DeadlineExceededError } from '../core/Errors';
import { Deadline } from '../core/Deadline';
import { FREE, type GameMap } from './GameMap';
import { MinHeap } from '../utils/MinHeap';
import { ORTHOGONAL_STEPS, equals, manhattan } from '../utils/MathUtils';
import { createLogger } from '../utils/Logger';

const log = createLogger('PathPlanner');

/** Expansions between deadline checks. */
const DEADLINE_CHECK_INTERVAL = 64;
/** Direction slot for the start state, which has no incoming step. */
const NO_DIR = ORTHOGONAL_STEPS.length;
const DIR_SLOTS = NO_DIR + 1;

/** Cells from start to goal inclusive; consecutive cells are orthogonal neighbours. */
export type Route = Vec2[];

export type PlanResult = Result<Route, UnreachableError | DeadlineExceededError>;

export interface PathProfile {
  /** Entity doing the moving; its own cell carries no occupancy penalty. */
  moverId?: number;
  occupancyPenalty?: number;
  maxNodes?: number;
}

export interface PathPlannerOptions {
  occupancyPenalty: number;
  maxNodes: number;
}

interface SearchNode {
  state: number;
  g: number;
  h: number;
  turns: number;
  seq: number;
}

interface CachedRoute {
  tick: number;
  goal: Vec2;
  route: Route;
}

function compareNodes(a: SearchNode, b: SearchNode): number {
  return (a.g + a.h) - (b.g + b.h)
    || a.turns - b.turns
    || a.h - b.h
    || a.seq - b.seq;
}

/**
 * A* over the 4-connected grid. Search state is (cell, incoming direction) so
 * that among equal-cost routes the one with fewer turns wins.
 */
export class PathPlanner {
  private readonly cache = new Map<number, CachedRoute>();
  private searches = 0;
  private expansions = 0;

  constructor(
    private readonly source: { readonly map: GameMap },
    private readonly options: PathPlannerOptions,
  ) {}

  get stats(): { searches: number; expansions: number } {
    return { searches: this.searches, expansions: this.expansions };
  }

  plan(start: Vec2, goal: Vec2, profile: PathProfile = {}, deadline: Deadline = Deadline.unbounded()): PlanResult {
    if (deadline.expired()) {
      return err(new DeadlineExceededError('path search', deadline.overrun()));
    }
    const map = this.source.map;
    if (!map.contains(start) || !map.isPassable(goal)) {
      return err(new UnreachableError(start, goal));
    }
    if (equals(start, goal)) return ok([{ x: start.x, y: start.y }]);

    this.searches++;
    const penalty = profile.occupancyPenalty ?? this.options.occupancyPenalty;
    const maxNodes = profile.maxNodes ?? this.options.maxNodes;
    const moverId = profile.moverId;
    const size = map.size;

    const bestG = new Float64Array(size * size * DIR_SLOTS).fill(Infinity);
    const bestTurns = new Int32Array(size * size * DIR_SLOTS);
    const parent = new Int32Array(size * size * DIR_SLOTS).fill(-1);
    const closed = new Uint8Array(size * size * DIR_SLOTS);
    const open = new MinHeap<SearchNode>(compareNodes);

    const startState = map.index(start) * DIR_SLOTS + NO_DIR;
    bestG[startState] = 0;
    let seq = 0;
    open.push({ state: startState, g: 0, h: manhattan(start, goal), turns: 0, seq: seq++ });

    let expanded = 0;
    for (let node = open.pop(); node !== undefined; node = open.pop()) {
      const { state } = node;
      if (closed[state]) continue;
      closed[state] = 1;

      const cell = Math.floor(state / DIR_SLOTS);
      const dir = state % DIR_SLOTS;
      const x = cell % size;
      const y = Math.floor(cell / size);
      if (x === goal.x && y === goal.y) {
        this.expansions += expanded;
        return ok(this.reconstruct(parent, state, size));
      }

      expanded++;
      if (expanded > maxNodes) {
        this.expansions += expanded;
        log.debug(`Node limit ${maxNodes} hit searching (${start.x},${start.y}) -> (${goal.x},${goal.y})`);
        return err(new UnreachableError(start, goal));
      }
      if (expanded % DEADLINE_CHECK_INTERVAL === 0 && deadline.expired()) {
        this.expansions += expanded;
        return err(new DeadlineExceededError('path search', deadline.overrun()));
      }

      for (let d = 0; d < ORTHOGONAL_STEPS.length; d++) {
        const step = ORTHOGONAL_STEPS[d];
        const next = { x: x + step.x, y: y + step.y };
        if (!map.contains(next) || !map.isPassable(next)) continue;
        const occupant = map.occupantAt(next);
        const stepCost = map.terrainCostAt(next) + (occupant !== FREE && occupant !== moverId ? penalty : 0);
        const g = node.g + stepCost;
        const turns = node.turns + (dir !== NO_DIR && dir !== d ? 1 : 0);
        const nextState = map.index(next) * DIR_SLOTS + d;
        if (closed[nextState]) continue;
        if (g > bestG[nextState] || (g === bestG[nextState] && turns >= bestTurns[nextState])) continue;
        bestG[nextState] = g;
        bestTurns[nextState] = turns;
        parent[nextState] = state;
        open.push({ state: nextState, g, h: manhattan(next, goal), turns, seq: seq++ });
      }
    }

    this.expansions += expanded;
    return err(new UnreachableError(start, goal));
  }

  /**
   * Plan for a specific mover, reusing last tick's route toward the same goal
   * when every cell still ahead of the mover is free.
   */
  planFor(moverId: number, tick: number, start: Vec2, goal: Vec2, deadline?: Deadline): PlanResult {
    const cached = this.cache.get(moverId);
    if (cached && cached.tick === tick - 1 && equals(cached.goal, goal)) {
      const suffix = this.reusableSuffix(cached.route, start, moverId);
      if (suffix) {
        this.cache.set(moverId, { tick, goal, route: suffix });
        return ok(suffix);
      }
    }
    const result = this.plan(start, goal, { moverId }, deadline);
    if (result.ok) this.cache.set(moverId, { tick, goal, route: result.value });
    else this.cache.delete(moverId);
    return result;
  }

  /** Drop cached routes of entities that no longer exist. */
  forget(liveIds: ReadonlySet<number>): void {
    for (const id of this.cache.keys()) {
      if (!liveIds.has(id)) this.cache.delete(id);
    }
  }

  /**
   * Cheap route for when search failed or ran out of time: the still-passable
   * suffix of `previous` if the mover is on it, else axis steps toward the goal.
   * Always starts at `start`.
   */
  fallbackRoute(start: Vec2, goal: Vec2, previous?: readonly Vec2[]): Route {
    const map = this.source.map;
    if (previous) {
      const at = previous.findIndex(p => equals(p, start));
      if (at >= 0) {
        const route: Route = [{ x: start.x, y: start.y }];
        for (let i = at + 1; i < previous.length && map.isPassable(previous[i]); i++) {
          route.push({ x: previous[i].x, y: previous[i].y });
        }
        if (route.length > 1) return route;
      }
    }

    const route: Route = [{ x: start.x, y: start.y }];
    let current = start;
    while (!equals(current, goal)) {
      const xStep = { x: current.x + Math.sign(goal.x - current.x), y: current.y };
      const yStep = { x: current.x, y: current.y + Math.sign(goal.y - current.y) };
      if (current.x !== goal.x && map.isPassable(xStep)) current = xStep;
      else if (current.y !== goal.y && map.isPassable(yStep)) current = yStep;
      else break;
      route.push(current);
    }
    return route;
  }

  private reusableSuffix(route: Route, start: Vec2, moverId: number): Route | null {
    const at = route.findIndex(p => equals(p, start));
    if (at < 0) return null;
    const map = this.source.map;
    for (let i = at + 1; i < route.length; i++) {
      const p = route[i];
      if (!map.isPassable(p)) return null;
      const occupant = map.occupantAt(p);
      if (occupant !== FREE && occupant !== moverId) return null;
    }
    return route.slice(at);
  }

  private reconstruct(parent: Int32Array, goalState: number, size: number): Route {
    const route: Route = [];
    for (let state = goalState; state >= 0; state = parent[state]) {
      const cell = Math.floor(state / DIR_SLOTS);
      route.push({ x: cell % size, y: Math.floor(cell / size) });
    }
    return route.reverse();
  }
}

/** Drop collinear waypoints, keeping the endpoints and every turn. */
export function simplifyRoute(route: readonly Vec2[]): Vec2[] {
  if (route.length <= 2) return [...route];
  const result = [route[0]];
  for (let i = 1; i < route.length - 1; i++) {
    const prev = route[i - 1];
    const curr = route[i];
    const next = route[i + 1];
    const dx1 = curr.x - prev.x;
    const dy1 = curr.y - prev.y;
    const dx2 = next.x - curr.x;
    const dy2 = next.y - curr.y;
    if (dx1 !== dx2 || dy1 !== dy2) result.push(curr);
  }
  result.push(route[route.length - 1]);
  return result;
}
