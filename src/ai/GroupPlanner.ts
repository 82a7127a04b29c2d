import type { Entity, Vec2 } from '../core/Types';
import type { WorldModel } from '../core/WorldModel';
import type { PlannerConfig } from '../config/PlannerConfig';
import type { Deadline } from '../core/Deadline';
import { StaleReferenceError } from '../core/Errors';
import type { MovingAverageTracker } from '../utils/MovingAverage';
import { centroid, chebyshev } from '../utils/MathUtils';
import { createLogger } from '../utils/Logger';
import type { Group } from './Grouping';
import type { Task, TaskKind } from './TaskAssignment';
import type { Candidate, CandidateEvaluator, Evaluation } from './CandidateEvaluator';
import { actionKey, type EntityPlanner } from './EntityPlanner';

const log = createLogger('GroupPlanner');

/** Tasks a whole group pursues together. */
const SHARED_OBJECTIVE: ReadonlySet<TaskKind> = new Set<TaskKind>(['attack', 'defend', 'scout']);

const HOLD: Candidate = { action: { kind: 'hold' }, sim: { kind: 'none' }, nextCell: null, objective: null };

export type Manoeuvre = 'advance' | 'regroup';

export interface ManoeuvreOption {
  manoeuvre: Manoeuvre;
  /** Member id → what it plays in the joint simulation. */
  members: Map<number, Candidate>;
}

export interface GroupPlan extends ManoeuvreOption {
  groupId: number;
  score: number;
  raw: number;
  hash: number;
}

export interface GroupPlannerOptions {
  config: PlannerConfig;
  planner: EntityPlanner;
  evaluator: CandidateEvaluator;
}

/**
 * Plans combat groups as a unit. Each manoeuvre gives every member a move and
 * the group is simulated once; the winning manoeuvre becomes one extra
 * candidate per member, scored with the joint outcome.
 */
export class GroupPlanner {
  constructor(private readonly options: GroupPlannerOptions) {}

  plan(group: Group, task: Task, world: WorldModel, tracker: MovingAverageTracker, deadline: Deadline): GroupPlan | null {
    const members = this.membersOf(group, task, world);
    if (!members) return null;

    let best: GroupPlan | null = null;
    for (const option of this.manoeuvres(members, task, world, deadline)) {
      if (deadline.expired()) break;
      const outcome = this.options.evaluator.evaluateGroup(members, option.members, world, tracker, deadline);
      if (!outcome) break;
      // Earlier manoeuvres win ties
      if (!best || outcome.score > best.score) best = { groupId: group.id, ...option, ...outcome };
    }
    if (best) log.debug(`Group ${group.id}: ${best.manoeuvre} on ${task.key}, score ${best.score.toFixed(2)}`);
    return best;
  }

  /**
   * Joint moves worth simulating: everyone toward the task target, and while
   * the group is strung out, everyone toward a rally point.
   */
  manoeuvres(members: readonly Entity[], task: Task, world: WorldModel, deadline: Deadline): ManoeuvreOption[] {
    const { planner, config } = this.options;
    const options: ManoeuvreOption[] = [];

    try {
      const advance = new Map<number, Candidate>();
      for (const m of members) advance.set(m.id, planner.approach(m, task.target, world, deadline) ?? HOLD);
      options.push({ manoeuvre: 'advance', members: advance });
    } catch (error) {
      if (!(error instanceof StaleReferenceError)) throw error;
      log.debug(`Task ${task.key}: ${error.message}, no advance`);
    }

    const center = centroid(members.map(m => m.position));
    const spread = Math.max(...members.map(m => chebyshev(m.position, center)));
    if (spread > config.groupingDistance / 2) {
      const rally = world.map.isFree(center) ? center : world.findFreeCellNear(center, 1);
      if (rally) options.push({ manoeuvre: 'regroup', members: this.moveAll(members, rally, world, deadline) });
    }

    return options.filter(o => [...o.members.values()].some(c => c !== HOLD));
  }

  private membersOf(group: Group, task: Task, world: WorldModel): Entity[] | null {
    if (group.class !== 'combat' || !SHARED_OBJECTIVE.has(task.kind)) return null;
    const members: Entity[] = [];
    for (const id of group.members) {
      const e = world.entity(id);
      if (e) members.push(e);
    }
    return members.length >= 2 ? members : null;
  }

  private moveAll(members: readonly Entity[], goal: Vec2, world: WorldModel, deadline: Deadline): Map<number, Candidate> {
    const out = new Map<number, Candidate>();
    for (const m of members) out.set(m.id, this.options.planner.approach(m, { position: goal }, world, deadline) ?? HOLD);
    return out;
  }
}

/** Put the shared candidate first, dropping own candidates that repeat it, within `limit`. */
export function prependShared(own: readonly Candidate[], shared: Candidate, limit: number): Candidate[] {
  const key = actionKey(shared.action);
  const rest = own.filter(c => actionKey(c.action) !== key);
  return [shared, ...rest.slice(0, Math.max(0, limit - 1))];
}

/** Evaluations for a list built by prependShared: the joint outcome at index 0, own ones shifted by one. */
export function withSharedEvaluation(plan: GroupPlan, own: readonly Evaluation[]): Evaluation[] {
  return [
    { index: 0, score: plan.score, raw: plan.raw, hash: plan.hash },
    ...own.map(e => ({ ...e, index: e.index + 1 })),
  ];
}
