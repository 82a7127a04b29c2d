/**
 * Smoothed scalar series consumed by role hysteresis, task aging and score
 * normalization. Consumers only read through MovingAverageTracker.get().
 */

export interface Smoother {
  add(value: number, tick: number): void;
  get(): number;
  readonly samples: number;
}

/**
 * Average rate of change of a cumulative counter, e.g. resource gathered
 * per tick. Keeps at most `maxValues` samples spanning at most `maxInterval` ticks.
 */
export class MovingAverageSpeed implements Smoother {
  private values: { value: number; tick: number }[] = [];
  private duration = 0;
  private distance = 0;

  constructor(private readonly maxValues: number, private readonly maxInterval: number) {
    if (maxValues < 2) throw new RangeError(`maxValues must be >= 2, got ${maxValues}`);
  }

  get samples(): number { return this.values.length; }

  add(value: number, tick: number): void {
    while (this.values.length >= this.maxValues
      || (this.values.length >= 2 && this.duration >= this.maxInterval)) {
      const removed = this.values.shift();
      const first = this.values[0];
      if (removed && first) {
        this.distance -= first.value - removed.value;
        this.duration -= first.tick - removed.tick;
      }
    }
    const last = this.values[this.values.length - 1];
    if (last) {
      this.distance += value - last.value;
      this.duration += tick - last.tick;
    }
    this.values.push({ value, tick });
  }

  get(): number {
    if (this.values.length < 2 || this.duration === 0) return 0;
    return this.distance / this.duration;
  }
}

/** Exponential moving average; the first sample seeds the value. */
export class ExponentialAverage implements Smoother {
  private value = 0;
  private count = 0;

  constructor(private readonly alpha: number) {
    if (!(alpha > 0 && alpha <= 1)) throw new RangeError(`alpha must be in (0, 1], got ${alpha}`);
  }

  get samples(): number { return this.count; }

  add(value: number): void {
    this.value = this.count === 0 ? value : this.alpha * value + (1 - this.alpha) * this.value;
    this.count++;
  }

  get(): number {
    return this.value;
  }
}

/** Plain mean of the last `size` samples. */
export class WindowAverage implements Smoother {
  private values: number[] = [];
  private sum = 0;

  constructor(private readonly size: number) {
    if (size < 1) throw new RangeError(`size must be >= 1, got ${size}`);
  }

  get samples(): number { return this.values.length; }

  add(value: number): void {
    this.values.push(value);
    this.sum += value;
    if (this.values.length > this.size) {
      this.sum -= this.values.shift() ?? 0;
    }
  }

  get(): number {
    return this.values.length === 0 ? 0 : this.sum / this.values.length;
  }
}

export type SeriesSpec =
  | { kind: 'speed'; maxValues: number; maxInterval: number }
  | { kind: 'ema'; alpha: number }
  | { kind: 'window'; size: number };

function createSmoother(spec: SeriesSpec): Smoother {
  switch (spec.kind) {
    case 'speed': return new MovingAverageSpeed(spec.maxValues, spec.maxInterval);
    case 'ema': return new ExponentialAverage(spec.alpha);
    case 'window': return new WindowAverage(spec.size);
  }
}

/** Indicator names the planner records every tick. */
export const Indicator = {
  /** Cumulative resource gathered, as a per-tick speed. */
  Income: 'income',
  /** Enemy attack power inside the protected perimeter. */
  Threat: 'threat',
  /** Own health lost per tick. */
  DamageTaken: 'damageTaken',
  /** Best candidate score per tick, used as a normalization baseline. */
  ScoreBaseline: 'scoreBaseline',
} as const;

export type IndicatorName = typeof Indicator[keyof typeof Indicator];

export class MovingAverageTracker {
  private series = new Map<string, Smoother>();

  define(name: string, spec: SeriesSpec): this {
    this.series.set(name, createSmoother(spec));
    return this;
  }

  has(name: string): boolean {
    return this.series.has(name);
  }

  /** Record a sample; unknown names are defined on the fly with `fallback`. */
  record(name: string, value: number, tick: number, fallback: SeriesSpec = { kind: 'ema', alpha: 0.3 }): void {
    let smoother = this.series.get(name);
    if (!smoother) {
      smoother = createSmoother(fallback);
      this.series.set(name, smoother);
    }
    smoother.add(value, tick);
  }

  /** Smoothed value, or 0 for a series with no samples. */
  get(name: string): number {
    return this.series.get(name)?.get() ?? 0;
  }

  samples(name: string): number {
    return this.series.get(name)?.samples ?? 0;
  }

  snapshot(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [name, smoother] of this.series) out[name] = smoother.get();
    return out;
  }
}

export function createDefaultTracker(emaAlpha: number): MovingAverageTracker {
  return new MovingAverageTracker()
    .define(Indicator.Income, { kind: 'speed', maxValues: 20, maxInterval: 50 })
    .define(Indicator.Threat, { kind: 'ema', alpha: emaAlpha })
    .define(Indicator.DamageTaken, { kind: 'ema', alpha: emaAlpha })
    .define(Indicator.ScoreBaseline, { kind: 'window', size: 10 });
}

/** Smoothed value mapped into [0, 1); `half` is the value that maps to 0.5. */
export function pressure(tracker: MovingAverageTracker, name: string, half: number): number {
  const value = Math.max(0, tracker.get(name));
  return value / (value + half);
}
