/**
 * Cooperative time budget. Work checks `expired()` at safe points and stops;
 * nothing is preempted.
 */

export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

export class Deadline {
  private constructor(
    private readonly clock: Clock,
    readonly startedAt: number,
    readonly expiresAt: number,
  ) {}

  static after(budgetMs: number, clock: Clock = systemClock): Deadline {
    const now = clock();
    return new Deadline(clock, now, now + Math.max(0, budgetMs));
  }

  /** A deadline that never expires, for callers with no budget. */
  static unbounded(clock: Clock = systemClock): Deadline {
    return new Deadline(clock, clock(), Infinity);
  }

  now(): number {
    return this.clock();
  }

  elapsed(): number {
    return this.clock() - this.startedAt;
  }

  remaining(): number {
    return Math.max(0, this.expiresAt - this.clock());
  }

  /** True once the budget is spent. A zero budget is expired from the start. */
  expired(): boolean {
    return this.clock() >= this.expiresAt;
  }

  overrun(): number {
    return Math.max(0, this.clock() - this.expiresAt);
  }

  /** A sub-deadline of at most `budgetMs`, never outliving this one. */
  slice(budgetMs: number): Deadline {
    const now = this.clock();
    return new Deadline(this.clock, now, Math.min(this.expiresAt, now + Math.max(0, budgetMs)));
  }

  /** This deadline moved earlier by `reserveMs`, for work that must leave time behind it. */
  withReserve(reserveMs: number): Deadline {
    return new Deadline(this.clock, this.startedAt, this.expiresAt - reserveMs);
  }
}
