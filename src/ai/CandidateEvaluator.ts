import type { Entity, EntityAction, Vec2 } from '../core/Types';
import type { WorldModel } from '../core/WorldModel';
import type { PlannerConfig } from '../config/PlannerConfig';
import type { EntityRules } from '../config/EntityRules';
import type { Deadline } from '../core/Deadline';
import type { EventBus } from '../core/EventBus';
import type { PlannerStats } from './PlannerStats';
import { DeadlineExceededError } from '../core/Errors';
import { simulate, type SimAction, type SimulatedState } from '../simulation/EntitySimulator';
import type { ResolutionRules } from '../simulation/ResolutionRules';
import { hashSimulatedState } from '../simulation/SimulationHash';
import { Indicator, type MovingAverageTracker } from '../utils/MovingAverage';
import { manhattan } from '../utils/MathUtils';
import { createLogger } from '../utils/Logger';

const log = createLogger('CandidateEvaluator');

/** Damage dealt counts this much toward progress per point. */
const DAMAGE_PROGRESS = 0.1;

const NOOP_CANDIDATE: Candidate = { action: { kind: 'noop' }, sim: { kind: 'none' }, nextCell: null, objective: null };

export interface Candidate {
  /** What gets emitted if this candidate wins. */
  action: EntityAction;
  /** How the simulator should play it. */
  sim: SimAction;
  /** Cell the entity enters next tick, for move conflicts. */
  nextCell: Vec2 | null;
  /** Where the entity is trying to get to, for progress scoring. */
  objective: Vec2 | null;
}

export interface Evaluation {
  index: number;
  score: number;
  /** Score before baseline normalization. */
  raw: number;
  hash: number;
}

/** Joint outcome of one group manoeuvre. */
export interface GroupEvaluation {
  score: number;
  raw: number;
  hash: number;
}

export interface EvaluationBatch {
  evaluations: Evaluation[];
  /** True when the deadline cut the batch short. */
  truncated: boolean;
}

export interface EvaluatorOptions {
  config: PlannerConfig;
  rules: EntityRules;
  stats: PlannerStats;
  bus: EventBus;
  resolution?: ResolutionRules;
}

/**
 * Simulates each candidate of one entity over the planning horizon and scores
 * the outcome. Evaluations run one after another and stop at the deadline;
 * an evaluation that finishes past it is thrown away.
 */
export class CandidateEvaluator {
  constructor(private readonly options: EvaluatorOptions) {}

  evaluate(
    entity: Entity,
    candidates: readonly Candidate[],
    world: WorldModel,
    tracker: MovingAverageTracker,
    deadline: Deadline,
  ): EvaluationBatch {
    const { config, stats } = this.options;
    const evaluations: Evaluation[] = [];
    const seen = new Set<number>();
    const neighbours = world.inRadius(entity.position, config.simulationRadius);

    for (let index = 0; index < candidates.length; index++) {
      if (deadline.expired()) return { evaluations, truncated: true };
      const state = this.run(neighbours, new Map([[entity.id, candidates[index].sim]]), world, deadline);
      if (!state) return { evaluations, truncated: true };

      stats.increment('evaluations');
      const hash = hashSimulatedState(state);
      if (seen.has(hash)) stats.increment('duplicateOutcomes');
      seen.add(hash);
      const raw = this.rawScore(entity, candidates[index], state, world, tracker);
      evaluations.push({ index, score: this.normalize(raw, tracker), raw, hash });
    }
    return { evaluations, truncated: false };
  }

  /**
   * Simulates a whole group under one set of member actions and scores the
   * mean member outcome. Null when the deadline cuts it short.
   */
  evaluateGroup(
    members: readonly Entity[],
    candidates: ReadonlyMap<number, Candidate>,
    world: WorldModel,
    tracker: MovingAverageTracker,
    deadline: Deadline,
  ): GroupEvaluation | null {
    const { config, stats } = this.options;
    if (members.length === 0 || deadline.expired()) return null;

    const neighbours = new Map<number, Entity>();
    for (const member of members) {
      for (const e of world.inRadius(member.position, config.simulationRadius)) neighbours.set(e.id, e);
    }
    const actions = new Map<number, SimAction>();
    for (const [id, candidate] of candidates) actions.set(id, candidate.sim);

    const sorted = [...neighbours.values()].sort((a, b) => a.id - b.id);
    const state = this.run(sorted, actions, world, deadline);
    if (!state) return null;

    stats.increment('groupEvaluations');
    let total = 0;
    for (const member of members) {
      const candidate = candidates.get(member.id) ?? NOOP_CANDIDATE;
      total += this.rawScore(member, candidate, state, world, tracker);
    }
    const raw = total / members.length;
    return { score: this.normalize(raw, tracker), raw, hash: hashSimulatedState(state) };
  }

  /** Raw score divided by the smoothed score baseline. */
  score(entity: Entity, candidate: Candidate, state: SimulatedState, world: WorldModel, tracker: MovingAverageTracker): number {
    return this.normalize(this.rawScore(entity, candidate, state, world, tracker), tracker);
  }

  /** Weighted progress, survival and resource outcome, normalized by smoothed indicators. */
  rawScore(entity: Entity, candidate: Candidate, state: SimulatedState, world: WorldModel, tracker: MovingAverageTracker): number {
    const { config, rules } = this.options;
    const weights = config.scoreWeights;
    const me = world.myPlayer();
    const after = state.players.find(p => p.id === world.myId);
    const self = state.entities.find(e => e.id === entity.id);

    let progress = 0;
    if (candidate.objective && self) {
      progress = manhattan(entity.position, candidate.objective) - manhattan(self.position, candidate.objective);
    }
    progress += (after?.damageDone ?? 0) * DAMAGE_PROGRESS;
    progress += (after?.score ?? 0) - (me?.score ?? 0);

    let survival = -(after?.damageReceived ?? 0);
    if (!self) survival -= rules[entity.kind].maxHealth;
    survival /= Math.max(1, 1 + tracker.get(Indicator.DamageTaken));

    // Spending on new entities is not a loss: count what was bought at cost
    let resource = (after?.resource ?? 0) - (me?.resource ?? 0);
    for (const e of state.entities) {
      if (e.id < 0 && e.owner === world.myId) resource += rules[e.kind].cost;
    }
    resource /= Math.max(1, tracker.get(Indicator.Income) * config.simulationHorizon);

    return weights.progress * progress + weights.survival * survival + weights.resource * resource;
  }

  private normalize(raw: number, tracker: MovingAverageTracker): number {
    return raw / Math.max(1, tracker.get(Indicator.ScoreBaseline));
  }

  private run(
    neighbours: readonly Entity[],
    actions: ReadonlyMap<number, SimAction>,
    world: WorldModel,
    deadline: Deadline,
  ): SimulatedState | null {
    const { config, rules, resolution, stats } = this.options;
    let state: SimulatedState;
    try {
      state = simulate(neighbours, actions, config.simulationHorizon, {
        players: world.players(), rules, resolution, map: world.map, deadline,
      });
    } catch (error) {
      if (!(error instanceof DeadlineExceededError)) throw error;
      this.reportOverrun(world.tick, error.overrunMs);
      return null;
    }
    if (deadline.expired()) {
      this.reportOverrun(world.tick, deadline.overrun());
      return null;
    }
    stats.increment('staleSkips', state.skipped.length);
    return state;
  }

  private reportOverrun(tick: number, overrunMs: number): void {
    this.options.stats.increment('deadlineHits');
    this.options.bus.emit('deadline:hit', { tick, phase: 'evaluation', overrunMs });
    log.debug(`Evaluation cut at tick ${tick}, ${overrunMs.toFixed(2)}ms over`);
  }
}
