import type { EntityKind, Vec2 } from '../core/Types';
import type { PlannerConfig } from '../config/PlannerConfig';
import type { Group } from './Grouping';
import type { Role } from './RoleAssignment';
import type { OpportunitySurvey } from './Opportunities';
import { manhattan } from '../utils/MathUtils';
import { Indicator, pressure, type MovingAverageTracker } from '../utils/MovingAverage';

export type TaskKind = 'harvest' | 'defend' | 'attack' | 'scout' | 'build' | 'repair' | 'produce';
export type TaskStatus = 'open' | 'assigned' | 'completed' | 'abandoned';

export interface TaskTarget {
  position: Vec2;
  entityId?: number;
  entityKind?: EntityKind;
}

export interface Task {
  id: number;
  kind: TaskKind;
  /** Dedupe key: one live task per key. */
  key: string;
  target: TaskTarget;
  basePriority: number;
  priority: number;
  requiredSize: number;
  status: TaskStatus;
  /** Group bound this tick, or null while open. */
  groupId: number | null;
  assignees: number[];
  unassignedTicks: number;
  createdTick: number;
}

/** A task-worthy opportunity seen this tick. */
export interface TaskObservation {
  kind: TaskKind;
  key: string;
  target: TaskTarget;
  basePriority: number;
  requiredSize: number;
}

export const ROLE_FOR_TASK: Readonly<Record<TaskKind, Role>> = {
  harvest: 'gather',
  defend: 'defend',
  attack: 'attack',
  scout: 'scout',
  build: 'build',
  repair: 'repair',
  produce: 'produce',
};

export const TASK_BASE_PRIORITY: Readonly<Record<TaskKind, number>> = {
  defend: 100,
  build: 50,
  attack: 40,
  repair: 30,
  produce: 20,
  harvest: 10,
  scout: 5,
};

/** Tasks whose disappearance from the survey means the job is done rather than stale. */
const COMPLETE_WHEN_UNOBSERVED: ReadonlySet<TaskKind> = new Set<TaskKind>(['defend', 'repair']);

export type TaskConfig = Pick<
  PlannerConfig,
  'taskPriorityDecay' | 'taskAgingRate' | 'taskMaxEscalation' | 'taskAbandonPriority' | 'attackGroupSize'
>;

export function observeTasks(survey: OpportunitySurvey, config: Pick<PlannerConfig, 'attackGroupSize'>): TaskObservation[] {
  const out: TaskObservation[] = [];
  for (const t of survey.threats) {
    out.push({
      kind: 'defend',
      key: `defend:${t.enemyId}`,
      target: { position: t.position, entityId: t.enemyId },
      basePriority: TASK_BASE_PRIORITY.defend + t.power,
      requiredSize: 1,
    });
  }
  for (const b of survey.buildNeeds) {
    out.push({
      kind: 'build',
      key: `build:${b.entityKind}`,
      target: { position: b.position, entityKind: b.entityKind },
      basePriority: TASK_BASE_PRIORITY.build,
      requiredSize: 1,
    });
  }
  for (const a of survey.attackTargets) {
    out.push({
      kind: 'attack',
      key: `attack:${a.entityId}`,
      target: { position: a.position, entityId: a.entityId },
      basePriority: TASK_BASE_PRIORITY.attack,
      requiredSize: config.attackGroupSize,
    });
  }
  for (const d of survey.damaged) {
    out.push({
      kind: 'repair',
      key: `repair:${d.entityId}`,
      target: { position: d.position, entityId: d.entityId },
      basePriority: TASK_BASE_PRIORITY.repair,
      requiredSize: 1,
    });
  }
  for (const p of survey.produceOptions) {
    out.push({
      kind: 'produce',
      key: `produce:${p.baseId}`,
      target: { position: p.position, entityId: p.baseId, entityKind: p.entityKind },
      basePriority: TASK_BASE_PRIORITY.produce,
      requiredSize: 1,
    });
  }
  for (const h of survey.harvestSpots) {
    out.push({
      kind: 'harvest',
      key: `harvest:${h.position.x},${h.position.y}`,
      target: { position: h.position, entityId: h.resourceId },
      basePriority: TASK_BASE_PRIORITY.harvest,
      requiredSize: 1,
    });
  }
  for (const s of survey.scoutTargets) {
    out.push({
      kind: 'scout',
      key: `scout:${s.x},${s.y}`,
      target: { position: s },
      basePriority: TASK_BASE_PRIORITY.scout,
      requiredSize: 1,
    });
  }
  return out;
}

export interface ReconcileContext {
  tick: number;
  observations: readonly TaskObservation[];
  /** Ids present in the current snapshot. */
  liveIds: ReadonlySet<number>;
  nextTaskId: number;
  config: TaskConfig;
  /** Smoothed indicators that scale decay and aging. */
  tracker: MovingAverageTracker;
}

export interface ReconcileResult {
  /** Live tasks (open or assigned), ascending id. */
  tasks: Task[];
  opened: Task[];
  /** Tasks completed or abandoned this tick. */
  closed: Task[];
  /** Group id → task id. */
  bindings: Map<number, number>;
  nextTaskId: number;
}

/** Smoothed threat at which defence urgency grows by half. */
const THREAT_HALF = 10;

/**
 * Urgency multiplier in [1, 2). Defence scales with smoothed threat, harvest
 * with how little income is coming in; other kinds are flat.
 */
export function taskPressure(kind: TaskKind, tracker: MovingAverageTracker): number {
  switch (kind) {
    case 'defend':
      return 1 + pressure(tracker, Indicator.Threat, THREAT_HALF);
    case 'harvest':
      // Income is a speed and reads 0 until two samples exist
      if (tracker.samples(Indicator.Income) < 2) return 1;
      return 1 + 1 / (Math.max(0, tracker.get(Indicator.Income)) + 1);
    default:
      return 1;
  }
}

/** Task a produce or build job is pinned to: only the group holding it can do the job. */
function pinnedEntity(task: Task): number | null {
  return task.kind === 'produce' && task.target.entityId !== undefined ? task.target.entityId : null;
}

function canTake(task: Task, group: Group, role: Role | undefined): boolean {
  if (role !== ROLE_FOR_TASK[task.kind]) return false;
  if (group.members.length < task.requiredSize) return false;
  const pinned = pinnedEntity(task);
  return pinned === null || group.members.includes(pinned);
}

function reopen(task: Task): void {
  task.status = 'open';
  task.groupId = null;
  task.assignees = [];
}

/**
 * One reconciliation pass. Pure: previous tasks are copied, never mutated.
 * Closes finished work, rebinds surviving assignments, opens tasks for new
 * observations and binds open tasks to free groups.
 */
export function reconcile(
  previous: readonly Task[],
  groups: ReadonlyMap<number, Group>,
  roles: ReadonlyMap<number, Role>,
  context: ReconcileContext,
): ReconcileResult {
  const { config, tick, tracker } = context;
  const observed = new Map<string, TaskObservation>();
  for (const o of context.observations) {
    if (!observed.has(o.key)) observed.set(o.key, o);
  }

  const groupOfEntity = new Map<number, Group>();
  for (const g of groups.values()) {
    for (const id of g.members) groupOfEntity.set(id, g);
  }

  const live: Task[] = [];
  const closed: Task[] = [];
  const boundGroups = new Map<number, number>();
  const decaying = new Set<number>();

  // (a) close or refresh what we already had
  for (const prev of [...previous].sort((a, b) => a.id - b.id)) {
    if (prev.status === 'completed' || prev.status === 'abandoned') continue;
    const task: Task = { ...prev, target: { ...prev.target }, assignees: [...prev.assignees] };
    const observation = observed.get(task.key);

    if (task.target.entityId !== undefined && !context.liveIds.has(task.target.entityId)) {
      task.status = task.kind === 'defend' || task.kind === 'attack' || task.kind === 'harvest' ? 'completed' : 'abandoned';
    } else if (observation) {
      task.target = { ...observation.target };
      task.basePriority = observation.basePriority;
      task.requiredSize = observation.requiredSize;
      task.priority = Math.max(task.priority, task.basePriority);
    } else if (COMPLETE_WHEN_UNOBSERVED.has(task.kind)) {
      task.status = 'completed';
    } else {
      task.priority *= 1 - config.taskPriorityDecay / taskPressure(task.kind, tracker);
      decaying.add(task.id);
      if (task.priority < config.taskAbandonPriority) task.status = 'abandoned';
    }

    if (task.status === 'completed' || task.status === 'abandoned') {
      task.groupId = null;
      task.assignees = [];
      closed.push(task);
      continue;
    }

    // Follow the members into whatever group holds them now
    if (task.status === 'assigned') {
      const holder = task.assignees
        .map(id => groupOfEntity.get(id))
        .find((g): g is Group => g !== undefined);
      if (holder && !boundGroups.has(holder.id) && canTake(task, holder, roles.get(holder.id))) {
        task.groupId = holder.id;
        task.assignees = [...holder.members];
        boundGroups.set(holder.id, task.id);
      } else {
        reopen(task);
      }
    }
    live.push(task);
  }

  // (b) open tasks for new observations
  const knownKeys = new Set(live.map(t => t.key));
  const opened: Task[] = [];
  let nextTaskId = context.nextTaskId;
  for (const o of observed.values()) {
    if (knownKeys.has(o.key)) continue;
    const task: Task = {
      id: nextTaskId++,
      kind: o.kind,
      key: o.key,
      target: { ...o.target },
      basePriority: o.basePriority,
      priority: o.basePriority,
      requiredSize: o.requiredSize,
      status: 'open',
      groupId: null,
      assignees: [],
      unassignedTicks: 0,
      createdTick: tick,
    };
    live.push(task);
    opened.push(task);
  }

  // (c) bind open tasks to free groups: priority, then travel distance, then group id
  const pairs: { task: Task; group: Group; distance: number }[] = [];
  for (const task of live) {
    if (task.status !== 'open') continue;
    for (const group of groups.values()) {
      if (boundGroups.has(group.id) || !canTake(task, group, roles.get(group.id))) continue;
      pairs.push({ task, group, distance: manhattan(group.centroid, task.target.position) });
    }
  }
  pairs.sort((a, b) =>
    b.task.priority - a.task.priority
    || a.distance - b.distance
    || a.group.id - b.group.id
    || a.task.id - b.task.id);
  for (const { task, group } of pairs) {
    if (task.status !== 'open' || boundGroups.has(group.id)) continue;
    task.status = 'assigned';
    task.groupId = group.id;
    task.assignees = [...group.members];
    task.unassignedTicks = 0;
    boundGroups.set(group.id, task.id);
  }

  // Observed work still waiting for a group escalates, up to the cap
  for (const task of live) {
    if (task.status !== 'open' || task.createdTick === tick || decaying.has(task.id)) continue;
    task.unassignedTicks++;
    task.priority = Math.min(
      task.basePriority * config.taskMaxEscalation,
      task.priority + task.basePriority * config.taskAgingRate * taskPressure(task.kind, tracker),
    );
  }

  live.sort((a, b) => a.id - b.id);
  return { tasks: live, opened, closed, bindings: boundGroups, nextTaskId };
}
