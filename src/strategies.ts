import type { StageAchievement, StageRange } from "./types";
import type { DivisionOptions, ReactiveBound, SizeBound } from "./config";
import { Blend, DivisionScenario, makeHomogenousDivisions } from "./division";

/** Information about the level above used by derived size bounds. */
export interface DivisionContext {
  /** Mean number of steps the level above spent per sub-goal stage. */
  readonly meanSubPlanLength: number;
}

/** Progress reported to a reactive strategy after each search increment. */
export interface ReactionInput {
  readonly level: number;
  /** Stage range of the partial problem being solved. */
  readonly range: StageRange;
  /** Unblended range of the partial problem; defaults to `range`. */
  readonly nominal?: StageRange;
  /** The stage this increment added and the step it was achieved at. */
  readonly achievement: StageAchievement;
  /** The stage was achieved strictly later than its predecessor. */
  readonly unique: boolean;
  /** Duration of the increment. */
  readonly incrementMs: number;
}

export interface Reaction {
  readonly divide: boolean;
  /** Halt the solve at this point; otherwise the division is continuous. */
  readonly interrupt: boolean;
  /** Steps before the division left unfixed by a continuous division. */
  readonly backwardsHorizon: number;
  readonly rationale: string;
}

/**
 * Decides how a level's stage range is split into partial problems, and
 * optionally reacts to search progress with further divisions.
 */
export interface DivisionStrategy {
  readonly name: DivisionOptions["strategy"];
  /** Whether {@link DivisionStrategy.react} can divide. */
  readonly reactive: boolean;
  /** Proactively divide `range` at `level`. */
  divide(level: number, range: StageRange, context?: DivisionContext): DivisionScenario;
  /** Evaluate search progress. Called after every increment of a sequential-yield solve. */
  react(input: ReactionInput): Reaction;
  /** Clear all reactive counters. Called once per planning run. */
  reset(): void;
}

const NO_REACTION: Reaction = { divide: false, interrupt: false, backwardsHorizon: 0, rationale: "" };

/**
 * Resolves a size bound to a number of stages for a range of `size` stages.
 * Fractions round to the nearest stage, never below one.
 */
export function trueSizeBound(bound: SizeBound, size: number, context?: DivisionContext): number {
  if (typeof bound === "number") return bound;
  if ("fraction" in bound) return Math.min(Math.max(1, Math.round(size * bound.fraction)), Math.max(1, size));
  const perStage = Math.max(1, context?.meanSubPlanLength ?? 1);
  return Math.max(1, Math.round(bound.derived / perStage));
}

// ── Proactive ────────────────────────────────────────────────────────────────

abstract class ProactiveStrategy implements DivisionStrategy {
  abstract readonly name: DivisionOptions["strategy"];
  readonly reactive: boolean = false;

  constructor(
    protected readonly blend: Blend,
    protected readonly minimumSize: number
  ) {}

  /** Number of partial problems to produce for `size` stages. */
  protected abstract problems(size: number, context?: DivisionContext): number;

  divide(level: number, range: StageRange, context?: DivisionContext): DivisionScenario {
    const size = Math.max(0, range.last - range.first + 1);
    if (size < Math.max(2, this.minimumSize)) {
      return new DivisionScenario(level, range.first, range.last);
    }
    const points = makeHomogenousDivisions(this.problems(size, context), size, range.first, this.blend);
    return new DivisionScenario(level, range.first, range.last, points);
  }

  react(_input: ReactionInput): Reaction {
    return NO_REACTION;
  }

  reset(): void {}
}

/** Never divides. */
export class NoDivision extends ProactiveStrategy {
  readonly name = "none";

  constructor() {
    super(Blend.none, Number.MAX_SAFE_INTEGER);
  }

  protected problems(): number {
    return 1;
  }
}

/** A fixed number of partial problems. */
export class BasicStrategy extends ProactiveStrategy {
  readonly name = "basic";

  constructor(private readonly count: number, blend: Blend, minimumSize: number) {
    super(blend, minimumSize);
  }

  protected problems(size: number): number {
    return Math.min(this.count, size);
  }
}

/** Evenly sized partials no larger than the bound: `⌈N / B⌉`, optionally capped. */
export class SteadyStrategy extends ProactiveStrategy {
  readonly name = "steady";

  constructor(
    private readonly bound: SizeBound,
    private readonly maxProblems: number | undefined,
    blend: Blend,
    minimumSize: number
  ) {
    super(blend, minimumSize);
  }

  protected problems(size: number, context?: DivisionContext): number {
    const count = Math.ceil(size / trueSizeBound(this.bound, size, context));
    return this.maxProblems === undefined ? count : Math.min(count, this.maxProblems);
  }
}

/** As many partials as still reach the bound: `⌊N / B⌋`, at least one. */
export class HastyStrategy extends ProactiveStrategy {
  readonly name = "hasty";

  constructor(private readonly bound: SizeBound, blend: Blend, minimumSize: number) {
    super(blend, minimumSize);
  }

  protected problems(size: number, context?: DivisionContext): number {
    return Math.max(1, Math.floor(size / trueSizeBound(this.bound, size, context)));
  }
}

// ── Reactive ─────────────────────────────────────────────────────────────────

interface Monitor {
  lastIndex?: number;
  lastTime: number;
  stages: number;
  cumulativeMs: number;
}

/**
 * Tracks progress since the last division per level and decides whether
 * a reactive bound has been exceeded.
 */
class ReactiveMonitor {
  private readonly monitors = new Map<string, Monitor>();

  constructor(
    private readonly bound: ReactiveBound,
    private readonly clock: () => number
  ) {}

  /** Records an increment and reports whether the bound is now exceeded. */
  record(key: string, input: ReactionInput): boolean {
    const monitor = this.get(key);
    monitor.stages += 1;
    monitor.cumulativeMs += input.incrementMs;
    switch (this.bound.type) {
      case "stages":
        return monitor.stages >= this.bound.value;
      case "wall-time":
        return this.clock() - monitor.lastTime >= this.bound.value;
      case "cumulative-time":
        return monitor.cumulativeMs >= this.bound.value;
      case "incremental-time":
        return input.incrementMs >= this.bound.value;
    }
  }

  lastIndex(key: string): number | undefined {
    return this.get(key).lastIndex;
  }

  divided(key: string, index: number): void {
    this.monitors.set(key, { lastIndex: index, lastTime: this.clock(), stages: 0, cumulativeMs: 0 });
  }

  reset(): void {
    this.monitors.clear();
  }

  describe(): string {
    return `${this.bound.type} bound ${this.bound.value} exceeded`;
  }

  private get(key: string): Monitor {
    let monitor = this.monitors.get(key);
    if (monitor === undefined) {
      monitor = { lastTime: this.clock(), stages: 0, cumulativeMs: 0 };
      this.monitors.set(key, monitor);
    }
    return monitor;
  }
}

interface ReactiveSettings {
  readonly preemptive: boolean;
  readonly backwardsHorizon: number;
}

/**
 * Whether a division may be committed after `input`: only at a uniquely
 * achieved stage unless preemptive, never inside the left blend or at the
 * last stage of the range, and never twice at the same index.
 */
function canDivide(input: ReactionInput, preemptive: boolean, lastIndex: number | undefined): boolean {
  const index = input.achievement.index;
  const first = (input.nominal ?? input.range).first;
  return (preemptive || input.unique) && index >= first && index !== input.range.last && index !== lastIndex;
}

/** Divides whenever its single reactive bound is exceeded. */
export class RelentlessStrategy implements DivisionStrategy {
  readonly name: DivisionOptions["strategy"] = "relentless";
  readonly reactive = true;
  private readonly monitor: ReactiveMonitor;

  constructor(
    bound: ReactiveBound,
    private readonly interrupting: boolean,
    private readonly settings: ReactiveSettings,
    clock: () => number
  ) {
    this.monitor = new ReactiveMonitor(bound, clock);
  }

  divide(level: number, range: StageRange): DivisionScenario {
    return new DivisionScenario(level, range.first, range.last);
  }

  react(input: ReactionInput): Reaction {
    const key = String(input.level);
    const exceeded = this.monitor.record(key, input);
    if (!exceeded || !canDivide(input, this.settings.preemptive, this.monitor.lastIndex(key))) {
      return NO_REACTION;
    }
    this.monitor.divided(key, input.achievement.index);
    return {
      divide: true,
      interrupt: this.interrupting,
      backwardsHorizon: this.settings.backwardsHorizon,
      rationale: this.monitor.describe(),
    };
  }

  reset(): void {
    this.monitor.reset();
  }
}

/**
 * Interrupts on one bound and commits continuous divisions on another.
 * The interrupting bound takes precedence when both are exceeded.
 */
export class ImpetuousStrategy implements DivisionStrategy {
  readonly name = "impetuous";
  readonly reactive = true;
  private readonly interrupt: ReactiveMonitor;
  private readonly continuous: ReactiveMonitor;

  constructor(
    interruptBound: ReactiveBound,
    continuousBound: ReactiveBound,
    private readonly settings: ReactiveSettings,
    clock: () => number
  ) {
    this.interrupt = new ReactiveMonitor(interruptBound, clock);
    this.continuous = new ReactiveMonitor(continuousBound, clock);
  }

  divide(level: number, range: StageRange): DivisionScenario {
    return new DivisionScenario(level, range.first, range.last);
  }

  react(input: ReactionInput): Reaction {
    const key = String(input.level);
    const interruptExceeded = this.interrupt.record(key, input);
    const continuousExceeded = this.continuous.record(key, input);
    const lastIndex = this.interrupt.lastIndex(key) ?? this.continuous.lastIndex(key);
    if (!canDivide(input, this.settings.preemptive, lastIndex)) return NO_REACTION;
    const index = input.achievement.index;
    if (interruptExceeded) {
      this.interrupt.divided(key, index);
      this.continuous.divided(key, index);
      return { divide: true, interrupt: true, backwardsHorizon: 0, rationale: this.interrupt.describe() };
    }
    if (continuousExceeded) {
      this.continuous.divided(key, index);
      return {
        divide: true,
        interrupt: false,
        backwardsHorizon: this.settings.backwardsHorizon,
        rationale: this.continuous.describe(),
      };
    }
    return NO_REACTION;
  }

  reset(): void {
    this.interrupt.reset();
    this.continuous.reset();
  }
}

/** A naive proactive basis of fixed size, refined by a reactive bound. */
export class RapidStrategy extends RelentlessStrategy {
  override readonly name = "rapid";
  private readonly basis: BasicStrategy;

  constructor(
    problems: number,
    blend: Blend,
    minimumSize: number,
    bound: ReactiveBound,
    interrupting: boolean,
    settings: ReactiveSettings,
    clock: () => number
  ) {
    super(bound, interrupting, settings, clock);
    this.basis = new BasicStrategy(problems, blend, minimumSize);
  }

  override divide(level: number, range: StageRange, context?: DivisionContext): DivisionScenario {
    return this.basis.divide(level, range, context);
  }
}

/** Instantiates the strategy described by validated division options. */
export function createStrategy(options: DivisionOptions, clock: () => number = () => performance.now()): DivisionStrategy {
  switch (options.strategy) {
    case "none":
      return new NoDivision();
    case "basic":
      return new BasicStrategy(options.problems, toBlend(options.blend), options.minimumSize);
    case "hasty":
      return new HastyStrategy(options.bound, toBlend(options.blend), options.minimumSize);
    case "steady":
      return new SteadyStrategy(options.bound, options.maxProblems, toBlend(options.blend), options.minimumSize);
    case "relentless":
      return new RelentlessStrategy(options.bound, options.interrupting, options, clock);
    case "impetuous":
      return new ImpetuousStrategy(options.interruptBound, options.continuousBound, options, clock);
    case "rapid":
      return new RapidStrategy(
        options.problems,
        toBlend(options.blend),
        options.minimumSize,
        options.bound,
        options.interrupting,
        options,
        clock
      );
  }
}

function toBlend(blend: { left: number | { fraction: number }; right: number | { fraction: number } }): Blend {
  return new Blend(blend.left, blend.right);
}
