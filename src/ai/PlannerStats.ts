/**
 * Planner counters, per tick and cumulative. Read by tests and attached to
 * every TickResult; nothing here changes decisions.
 */

export interface PlannerStatsSnapshot {
  candidates: number;
  evaluations: number;
  /** Joint simulations of a whole group manoeuvre. */
  groupEvaluations: number;
  /** Evaluations whose outcome hashed equal to an earlier candidate of the same entity. */
  duplicateOutcomes: number;
  pathCalls: number;
  fallbacks: number;
  deadlineHits: number;
  staleSkips: number;
  /** Wall time spent on the tick. */
  elapsedMs: number;
}

export type StatCounter = Exclude<keyof PlannerStatsSnapshot, 'elapsedMs'>;

function emptySnapshot(): PlannerStatsSnapshot {
  return {
    candidates: 0,
    evaluations: 0,
    groupEvaluations: 0,
    duplicateOutcomes: 0,
    pathCalls: 0,
    fallbacks: 0,
    deadlineHits: 0,
    staleSkips: 0,
    elapsedMs: 0,
  };
}

export class PlannerStats {
  private current = emptySnapshot();
  private readonly cumulative = emptySnapshot();
  private ticks = 0;

  beginTick(): void {
    this.current = emptySnapshot();
  }

  increment(counter: StatCounter, by = 1): void {
    this.current[counter] += by;
    this.cumulative[counter] += by;
  }

  endTick(elapsedMs: number): PlannerStatsSnapshot {
    this.current.elapsedMs = elapsedMs;
    this.cumulative.elapsedMs += elapsedMs;
    this.ticks++;
    return this.tick();
  }

  tick(): PlannerStatsSnapshot {
    return { ...this.current };
  }

  totals(): PlannerStatsSnapshot & { ticks: number } {
    return { ...this.cumulative, ticks: this.ticks };
  }
}
