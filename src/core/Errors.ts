/**
 * Planner error taxonomy.
 *
 * Only OutOfOrderSnapshotError and RulesFormatError escape to the caller.
 * The rest are recovered where they occur: a fallback route, a truncated
 * search, a skipped action.
 */

export type PlannerErrorCode =
  | 'UNREACHABLE'
  | 'DEADLINE_EXCEEDED'
  | 'STALE_REFERENCE'
  | 'OUT_OF_ORDER_SNAPSHOT'
  | 'RULES_FORMAT';

export abstract class PlannerError extends Error {
  abstract readonly code: PlannerErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnreachableError extends PlannerError {
  readonly code = 'UNREACHABLE' as const;

  constructor(
    readonly start: { x: number; y: number },
    readonly goal: { x: number; y: number },
  ) {
    super(`No route from (${start.x},${start.y}) to (${goal.x},${goal.y})`);
  }
}

export class DeadlineExceededError extends PlannerError {
  readonly code = 'DEADLINE_EXCEEDED' as const;

  constructor(readonly operation: string, readonly overrunMs: number) {
    super(`${operation} ran out of time (${overrunMs.toFixed(2)}ms over)`);
  }
}

export class StaleReferenceError extends PlannerError {
  readonly code = 'STALE_REFERENCE' as const;

  constructor(readonly entityId: number) {
    super(`Entity ${entityId} is no longer present`);
  }
}

export class OutOfOrderSnapshotError extends PlannerError {
  readonly code = 'OUT_OF_ORDER_SNAPSHOT' as const;

  constructor(readonly lastTick: number, readonly receivedTick: number) {
    super(`Snapshot for tick ${receivedTick} arrived after tick ${lastTick}`);
  }
}

export class RulesFormatError extends PlannerError {
  readonly code = 'RULES_FORMAT' as const;

  constructor(readonly path: string, detail: string) {
    super(`Invalid entity rules at ${path}: ${detail}`);
  }
}
