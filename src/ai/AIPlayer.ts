import type { ActionRecord, Entity, WorldSnapshot } from '../core/Types';
import { WorldModel, type WorldDelta } from '../core/WorldModel';
import { Deadline, systemClock, type Clock } from '../core/Deadline';
import { EventBus } from '../core/EventBus';
import { loadDefaultEntityRules, type EntityRules } from '../config/EntityRules';
import { resolvePlannerConfig, type PlannerConfig, type PlannerConfigOverrides } from '../config/PlannerConfig';
import { PathPlanner } from '../simulation/PathPlanner';
import type { ResolutionRules } from '../simulation/ResolutionRules';
import { createDefaultTracker, Indicator, type MovingAverageTracker } from '../utils/MovingAverage';
import { createLogger } from '../utils/Logger';
import { partition, type Group } from './Grouping';
import { assignRoles, type Role } from './RoleAssignment';
import { observeTasks, reconcile, type Task } from './TaskAssignment';
import { surveyOpportunities } from './Opportunities';
import { EntityPlanner, mergeDecisions, type EntityDecision } from './EntityPlanner';
import { CandidateEvaluator } from './CandidateEvaluator';
import { GroupPlanner, prependShared, withSharedEvaluation, type GroupPlan } from './GroupPlanner';
import { PlannerStats, type PlannerStatsSnapshot } from './PlannerStats';

const log = createLogger('AIPlayer');

export interface TickResult {
  tick: number;
  /** Exactly one per controlled entity, ascending entity id. */
  actions: ActionRecord[];
  /** Role of every controlled entity. */
  roles: Map<number, Role>;
  /** Live tasks after reconciliation. */
  tasks: Task[];
  stats: PlannerStatsSnapshot;
}

export interface AIPlayerOptions {
  config?: PlannerConfigOverrides;
  rules?: EntityRules;
  resolution?: ResolutionRules;
  clock?: Clock;
}

// Per-tick decision pipeline: ingest, partition, roles, tasks, group manoeuvres, candidates, evaluate, commit
export class AIPlayer {
  readonly config: PlannerConfig;
  readonly rules: EntityRules;
  readonly world: WorldModel;
  readonly events = new EventBus();
  readonly stats = new PlannerStats();
  readonly tracker: MovingAverageTracker;

  private readonly clock: Clock;
  private readonly paths: PathPlanner;
  private readonly planner: EntityPlanner;
  private readonly evaluator: CandidateEvaluator;
  private readonly groupPlanner: GroupPlanner;

  // State carried between ticks
  private groups = new Map<number, Group>();
  private roles = new Map<number, Role>();
  private tasks: Task[] = [];
  private nextTaskId = 1;
  private lastResult: TickResult | null = null;
  private previousOwn = new Map<number, Entity>();
  private gathered = 0;
  private lastResource: number | null = null;

  constructor(options: AIPlayerOptions = {}) {
    this.config = resolvePlannerConfig(options.config);
    this.rules = options.rules ?? loadDefaultEntityRules();
    this.clock = options.clock ?? systemClock;
    this.world = new WorldModel(this.rules, { historySize: this.config.historySize });
    this.tracker = createDefaultTracker(this.config.emaAlpha);
    this.paths = new PathPlanner(this.world, {
      occupancyPenalty: this.config.occupancyPenalty,
      maxNodes: this.config.pathMaxNodes,
    });
    this.planner = new EntityPlanner({ config: this.config, paths: this.paths, stats: this.stats, bus: this.events });
    this.evaluator = new CandidateEvaluator({
      config: this.config,
      rules: this.rules,
      stats: this.stats,
      bus: this.events,
      resolution: options.resolution,
    });
    this.groupPlanner = new GroupPlanner({ config: this.config, planner: this.planner, evaluator: this.evaluator });
  }

  /**
   * Decide one action per controlled entity. Throws OutOfOrderSnapshotError
   * for a tick older than the last one; a repeated tick returns the previous
   * decision unchanged.
   */
  tick(snapshot: WorldSnapshot): TickResult {
    const deadline = Deadline.after(this.config.tickBudgetMs, this.clock);
    const delta = this.world.ingest(snapshot);
    if (delta.duplicate && this.lastResult) return this.lastResult;

    this.stats.beginTick();
    const world = this.world;
    const mine = world.mine();
    const liveIds = new Set(world.entities().map(e => e.id));
    this.planner.prune(liveIds);

    // Partition, roles, tasks
    const groups = partition(mine, this.config, this.groups);
    const survey = surveyOpportunities(world, this.config);
    const observations = observeTasks(survey, this.config);
    const roleResult = assignRoles(groups, world, this.tasks, {
      observations,
      tracker: this.tracker,
      previousRoles: this.roles,
      config: this.config,
    });
    const groupRoles = new Map<number, Role>();
    for (const [groupId, assignment] of roleResult.byGroup) groupRoles.set(groupId, assignment.role);

    const reconciled = reconcile(this.tasks, groups, groupRoles, {
      tick: snapshot.tick,
      observations,
      liveIds,
      nextTaskId: this.nextTaskId,
      config: this.config,
      tracker: this.tracker,
    });

    // Candidates and evaluation, lowest id first, until the commit reserve
    const evalDeadline = deadline.withReserve(this.config.commitReserveMs);
    const taskById = new Map(reconciled.tasks.map(t => [t.id, t]));
    const groupOf = new Map<number, number>();
    for (const g of groups.values()) for (const id of g.members) groupOf.set(id, g.id);

    // Group manoeuvres first, so every member can weigh the joint move
    const plans = new Map<number, GroupPlan>();
    for (const group of [...groups.values()].sort((a, b) => a.id - b.id)) {
      if (evalDeadline.expired()) break;
      const taskId = reconciled.bindings.get(group.id);
      const task = taskId === undefined ? undefined : taskById.get(taskId);
      if (!task) continue;
      const plan = this.groupPlanner.plan(group, task, world, this.tracker, evalDeadline);
      if (plan) plans.set(group.id, plan);
    }

    const decisions: EntityDecision[] = [];
    for (const entity of mine) {
      const role = roleResult.byEntity.get(entity.id) ?? 'idle';
      if (evalDeadline.expired()) {
        decisions.push({ entityId: entity.id, candidates: [], evaluations: [] });
        continue;
      }
      const groupId = groupOf.get(entity.id);
      const taskId = groupId === undefined ? undefined : reconciled.bindings.get(groupId);
      const task = taskId === undefined ? undefined : taskById.get(taskId);
      const own = this.planner.generate(entity, role, task, world, evalDeadline);
      const plan = groupId === undefined ? undefined : plans.get(groupId);
      const shared = plan?.members.get(entity.id);

      if (plan && shared) {
        const candidates = prependShared(own, shared, this.config.maxCandidatesPerEntity);
        this.stats.increment('candidates', candidates.length);
        const batch = this.evaluator.evaluate(entity, candidates.slice(1), world, this.tracker, evalDeadline);
        decisions.push({ entityId: entity.id, candidates, evaluations: withSharedEvaluation(plan, batch.evaluations) });
        continue;
      }
      this.stats.increment('candidates', own.length);
      const batch = this.evaluator.evaluate(entity, own, world, this.tracker, evalDeadline);
      decisions.push({ entityId: entity.id, candidates: own, evaluations: batch.evaluations });
    }

    const actions = mergeDecisions(decisions);

    // Commit: carried state, tracker, events
    this.commitState(groups, roleResult.byEntity, reconciled.tasks, reconciled.nextTaskId);
    this.updateTracker(delta, decisions, snapshot.tick);
    for (const task of reconciled.opened) {
      this.events.emit('task:opened', { taskId: task.id, kind: task.kind, key: task.key });
    }
    for (const task of reconciled.closed) {
      if (task.status === 'completed' || task.status === 'abandoned') {
        this.events.emit('task:closed', { taskId: task.id, kind: task.kind, status: task.status });
      }
    }

    const stats = this.stats.endTick(deadline.elapsed());
    if (deadline.expired()) {
      log.warn(`Tick ${snapshot.tick} overran its budget by ${deadline.overrun().toFixed(2)}ms`);
    }
    this.events.emit('tick:committed', { tick: snapshot.tick, actionCount: actions.length, stats });

    const result: TickResult = {
      tick: snapshot.tick,
      actions,
      roles: new Map(roleResult.byEntity),
      tasks: reconciled.tasks,
      stats,
    };
    this.lastResult = result;
    return result;
  }

  private commitState(groups: Map<number, Group>, roles: Map<number, Role>, tasks: Task[], nextTaskId: number): void {
    for (const [entityId, role] of roles) {
      const from = this.roles.get(entityId) ?? null;
      if (from !== role) this.events.emit('role:changed', { entityId, from, to: role });
    }
    this.groups = groups;
    this.roles = roles;
    this.tasks = tasks;
    this.nextTaskId = nextTaskId;
  }

  private updateTracker(delta: WorldDelta, decisions: readonly EntityDecision[], tick: number): void {
    const world = this.world;

    // Income: cumulative resource gained, as a speed
    const resource = world.myResource();
    if (this.lastResource !== null && resource > this.lastResource) this.gathered += resource - this.lastResource;
    this.lastResource = resource;
    this.tracker.record(Indicator.Income, this.gathered, tick);

    let threat = 0;
    for (const enemy of world.armedOpponents()) {
      if (world.isInsideProtectedPerimeter(enemy.position)) threat += world.def(enemy.kind).attack?.damage ?? 0;
    }
    this.tracker.record(Indicator.Threat, threat, tick);

    let damage = 0;
    const own = new Map<number, Entity>();
    for (const e of world.mine()) {
      own.set(e.id, e);
      const before = this.previousOwn.get(e.id);
      if (before && before.health > e.health) damage += before.health - e.health;
    }
    for (const lost of delta.vanished) {
      if (this.previousOwn.has(lost.id)) damage += lost.health;
    }
    this.previousOwn = own;
    this.tracker.record(Indicator.DamageTaken, damage, tick);

    let best = 0;
    let scored = 0;
    for (const d of decisions) {
      if (d.evaluations.length === 0) continue;
      best += Math.max(...d.evaluations.map(e => Math.abs(e.raw)));
      scored++;
    }
    if (scored > 0) this.tracker.record(Indicator.ScoreBaseline, best / scored, tick);
  }
}
