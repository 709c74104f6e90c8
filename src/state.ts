import type {
  AchievementType,
  FinalGoal,
  FluentLiteral,
  FluentState,
  StageAchievement,
  StageLiteral,
  SubGoalStage,
} from "./types";

function hasFluent(state: FluentState, fluent: string): boolean {
  return Object.prototype.hasOwnProperty.call(state, fluent);
}

/** Value of `fluent` in `state`, or `undefined` when unassigned. */
export function valueOf(state: FluentState, fluent: string): string | undefined {
  return hasFluent(state, fluent) ? state[fluent] : undefined;
}

/** True when the fluent currently holds one of the literal's values. */
export function literalHolds(state: FluentState, literal: StageLiteral): boolean {
  const value = valueOf(state, literal.fluent);
  return value !== undefined && literal.values.includes(value);
}

/** True when every literal of the stage holds in `state`. */
export function stageHolds(state: FluentState, stage: SubGoalStage): boolean {
  return stage.literals.every((literal) => literalHolds(state, literal));
}

/** Tests a final goal directly against fluent values. */
export function satisfiesGoal(state: FluentState, goal: FinalGoal): boolean {
  return goal.every((literal) => (valueOf(state, literal.fluent) === literal.value) === literal.truth);
}

/** Fluents whose value differs between two consecutive states, sorted by name. */
export function changedFluents(before: FluentState, after: FluentState): FluentLiteral[] {
  return Object.keys(after)
    .filter((fluent) => valueOf(before, fluent) !== after[fluent])
    .sort()
    .map((fluent) => ({ fluent, value: after[fluent] }));
}

/** Canonical string form of a state, stable under key order. */
export function stateKey(state: FluentState): string {
  return Object.keys(state)
    .sort()
    .map((fluent) => `${fluent}=${state[fluent]}`)
    .join(",");
}

export function formatLiteral(literal: StageLiteral): string {
  return literal.values.length === 1
    ? `${literal.fluent}=${literal.values[0]}`
    : `${literal.fluent}∈{${literal.values.join("|")}}`;
}

// ── Stage achievement tracking ───────────────────────────────────────────────

/**
 * Follows a state sequence and records the step at which each stage of a
 * constraint is achieved. A stage is only considered once its predecessor is
 * achieved, and several stages may be achieved at the same step.
 *
 * Under `sequential` achievement a literal counts once it has held at any
 * state since (and including) the step the previous stage was achieved.
 *
 * @example
 * ```ts
 * const tracker = new StageTracker(stages, "simultaneous");
 * states.forEach((state, i) => tracker.observe(state, startStep + i));
 * tracker.achievements; // [{ index: 1, step: 3 }, ...]
 * ```
 */
export class StageTracker {
  private cursor = 0;
  private seen = new Set<string>();
  private readonly achieved: StageAchievement[] = [];

  constructor(
    private readonly stages: ReadonlyArray<SubGoalStage>,
    private readonly achievement: AchievementType
  ) {}

  /** Number of stages achieved so far. */
  get count(): number {
    return this.cursor;
  }

  get done(): boolean {
    return this.cursor >= this.stages.length;
  }

  get achievements(): ReadonlyArray<StageAchievement> {
    return this.achieved;
  }

  /**
   * Feeds the state at `step` and returns the stages it achieves.
   * States must be observed in step order.
   */
  observe(state: FluentState, step: number): StageAchievement[] {
    const newly: StageAchievement[] = [];
    if (this.achievement === "sequential") this.remember(state);
    while (this.cursor < this.stages.length) {
      const stage = this.stages[this.cursor];
      if (!this.holds(stage, state)) break;
      const record = { index: stage.index, step };
      this.achieved.push(record);
      newly.push(record);
      this.cursor += 1;
      if (this.achievement === "sequential") {
        this.seen = new Set();
        this.remember(state);
      }
    }
    return newly;
  }

  /** Independent copy, used when branching a search over successor states. */
  clone(): StageTracker {
    const copy = new StageTracker(this.stages, this.achievement);
    copy.cursor = this.cursor;
    copy.seen = new Set(this.seen);
    copy.achieved.push(...this.achieved);
    return copy;
  }

  /** Identifies the tracker's progress for duplicate detection. */
  key(): string {
    if (this.done || this.achievement === "simultaneous") return String(this.cursor);
    return `${this.cursor}|${[...this.seen].sort().join(",")}`;
  }

  private holds(stage: SubGoalStage, state: FluentState): boolean {
    if (this.achievement === "simultaneous") return stageHolds(state, stage);
    return stage.literals.every((literal) =>
      literal.values.some((value) => this.seen.has(`${literal.fluent}=${value}`))
    );
  }

  private remember(state: FluentState): void {
    for (const fluent of Object.keys(state)) {
      this.seen.add(`${fluent}=${state[fluent]}`);
    }
  }
}
