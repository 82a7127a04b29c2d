// Tuning knobs. Treated as immutable once the planner is constructed.

export interface ScoreWeights {
  progress: number;
  survival: number;
  resource: number;
}

export interface PlannerConfig {
  /** Wall-clock budget for one tick, in milliseconds. */
  tickBudgetMs: number;
  /** Time kept back for the commit step; candidate work stops once less than this remains. */
  commitReserveMs: number;
  /** Upper bound on a single path search. */
  pathBudgetMs: number;
  /** Nodes a single path search may expand before giving up. */
  pathMaxNodes: number;
  /** Extra step cost for a cell currently held by another movable entity. */
  occupancyPenalty: number;

  /** Ticks the entity simulator projects per candidate. */
  simulationHorizon: number;
  /** Manhattan radius of the entity subset copied into each simulation. */
  simulationRadius: number;
  maxCandidatesPerEntity: number;
  scoreWeights: ScoreWeights;

  /** Value bonus for keeping the previous role; suppresses flip-flopping. */
  roleHysteresis: number;
  /** Per-tick fractional decay of tasks whose opportunity was not re-observed. */
  taskPriorityDecay: number;
  /** Per-tick fractional escalation of tasks that stay unassigned. */
  taskAgingRate: number;
  /** Cap on escalation, as a multiple of base priority. */
  taskMaxEscalation: number;
  /** Decayed tasks below this priority are abandoned. */
  taskAbandonPriority: number;

  /** Chebyshev distance that links two combat units into one group. */
  groupingDistance: number;
  /** Chebyshev distance that links two gatherers into one group. */
  gathererGroupingDistance: number;

  /** Radius around an own asset inside which an armed enemy counts as a threat. */
  detectionRange: number;
  /** Combat units required before an attack task is opened. */
  attackGroupSize: number;
  /** Builders the agent aims to keep. */
  targetGatherers: number;
  /** Snapshots kept for trend queries. */
  historySize: number;
  /** Smoothing factor for exponential indicators. */
  emaAlpha: number;
}

export const DEFAULT_PLANNER_CONFIG: Readonly<PlannerConfig> = Object.freeze({
  tickBudgetMs: 40,
  commitReserveMs: 2,
  pathBudgetMs: 4,
  pathMaxNodes: 4000,
  occupancyPenalty: 3,

  simulationHorizon: 4,
  simulationRadius: 12,
  maxCandidatesPerEntity: 8,
  scoreWeights: Object.freeze({ progress: 4, survival: 1, resource: 2 }),

  roleHysteresis: 2,
  taskPriorityDecay: 0.2,
  taskAgingRate: 0.05,
  taskMaxEscalation: 3,
  taskAbandonPriority: 0.5,

  groupingDistance: 6,
  gathererGroupingDistance: 1,

  detectionRange: 10,
  attackGroupSize: 6,
  targetGatherers: 60,
  historySize: 16,
  emaAlpha: 0.3,
});

export type PlannerConfigOverrides = Partial<Omit<PlannerConfig, 'scoreWeights'>> & {
  scoreWeights?: Partial<ScoreWeights>;
};

/** Overlay overrides on the defaults. Values are assumed valid; loading and validation live upstream. */
export function resolvePlannerConfig(overrides: PlannerConfigOverrides = {}): PlannerConfig {
  const { scoreWeights, ...rest } = overrides;
  return {
    ...DEFAULT_PLANNER_CONFIG,
    ...rest,
    scoreWeights: { ...DEFAULT_PLANNER_CONFIG.scoreWeights, ...scoreWeights },
  };
}
