import type {
  AbstractionHierarchy,
  ActionSet,
  ControllerState,
  FluentState,
  MonolevelPlan,
  PlanResult,
  PlannerHooks,
  PlanningProblem,
  StageAchievement,
  StageRange,
  SubGoalStage,
} from "./types";
import type { PlannerOptions, PlannerOptionsInput } from "./config";
import type { SolveResult, SolverOracle } from "./solver";
import type { DivisionStrategy } from "./strategies";
import type { PartialRecord } from "./tree";
import { parsePlannerOptions } from "./config";
import { ConfigurationError, HcrError, PlanningFailureError, RefinementFailureError } from "./errors";
import { MonolevelSolver } from "./solver";
import { sequenceStages } from "./sequencer";
import { validateHierarchy } from "./hierarchy";
import { satisfiesGoal } from "./state";
import { createStrategy } from "./strategies";
import { ProblemDivisionTree } from "./tree";
import { DivisionScenario } from "./division";
import * as log from "./logger";

/**
 * Configuration accepted by {@link createPlanner}.
 *
 * @template TTheory - Domain theory reference handed to the oracle.
 */
export interface PlannerConfig<TTheory> {
  readonly hierarchy: AbstractionHierarchy<TTheory>;
  readonly oracle: SolverOracle<TTheory>;
  /** Raw options, validated on construction. */
  readonly options?: PlannerOptionsInput;
  readonly hooks?: PlannerHooks;
  /** Millisecond clock used for timings and time bounds. Defaults to `performance.now`. */
  readonly clock?: () => number;
}

/** The outcome of a complete run: one concatenated plan per level. */
export interface HierarchicalPlan {
  /** `levels[i]` is the plan of level `i + 1`. */
  readonly levels: ReadonlyArray<MonolevelPlan>;
  readonly ground: MonolevelPlan;
  readonly tree: ProblemDivisionTree;
  /** Every solved partial problem, in the order produced. */
  readonly results: ReadonlyArray<PlanResult>;
  readonly timeMs: number;
}

export type PlanningOutcome =
  | { readonly success: true; readonly plan: HierarchicalPlan }
  | { readonly success: false; readonly error: HcrError };

/** Mutable progress of one level during a run. */
interface LevelProgress {
  readonly level: number;
  /** Conformance constraint received so far; `stages[i].index === i + 1`. */
  readonly stages: SubGoalStage[];
  /** `actions[s - 1]` is planned at step `s`. */
  readonly actions: ActionSet[];
  /** `states[s]` is the state at step `s`. */
  readonly states: FluentState[];
  readonly achievedAt: Map<number, number>;
  readonly yieldSteps: StageAchievement[];
  readonly queue: PartialRecord[];
  /** Partials whose steps have been sequenced but not yet divided (complete-first). */
  readonly undivided: PartialRecord[];
  /** Child stage indices ending each parent partial's contribution (complete-first). */
  readonly boundaries: number[];
  /** Stages already handed to the division engine. */
  divided: number;
  committedStep: number;
  /** Steps already converted into the level below's constraint. */
  sequencedUpTo: number;
  increments: number;
  attempts: number;
  timeMs: number;
  complete: boolean;
}

/**
 * Hierarchical conformance refinement controller. Solves the top level
 * unconstrained, then refines each level's plan one level down through
 * sub-goal stages, divided into partial problems that are solved in order.
 *
 * @template TTheory - Domain theory reference handed to the oracle.
 *
 * @example
 * ```ts
 * const planner = createPlanner({ hierarchy, oracle, options: { division: { strategy: "steady", bound: 3 } } });
 * const result = await planner.plan();
 * if (result.success) {
 *   result.plan.ground.actions.forEach((set, i) => console.log(i + 1, set));
 * }
 * ```
 */
export class HcrPlanner<TTheory> {
  readonly options: PlannerOptions;
  private readonly hierarchy: AbstractionHierarchy<TTheory>;
  private readonly hooks?: PlannerHooks;
  private readonly clock: () => number;
  private readonly strategy: DivisionStrategy;
  private readonly solver: MonolevelSolver<TTheory>;

  private progress: LevelProgress[] = [];
  private _tree = new ProblemDivisionTree();
  private _results: PlanResult[] = [];
  private _state: ControllerState = "solving-top";
  private started = 0;
  private failed = false;

  /** @throws {ConfigurationError} if the options or the hierarchy are invalid. */
  constructor(config: PlannerConfig<TTheory>) {
    this.options = parsePlannerOptions(config.options ?? {});
    validateHierarchy(config.hierarchy);
    this.hierarchy = config.hierarchy;
    this.hooks = config.hooks;
    this.clock = config.clock ?? (() => performance.now());
    this.strategy = createStrategy(this.options.division, this.clock);
    this.solver = new MonolevelSolver(config.oracle, {
      searchMode: this.options.searchMode,
      achievement: this.options.achievement,
      actionPlanning: this.options.actionPlanning,
      search: this.options.search,
      strategy: this.strategy,
      hooks: this.hooks,
      clock: this.clock,
    });
    log.setVerbosity(this.options.verbosity);
    this.reset();
  }

  get state(): ControllerState {
    return this._state;
  }

  get tree(): ProblemDivisionTree {
    return this._tree;
  }

  get results(): ReadonlyArray<PlanResult> {
    return this._results;
  }

  /** Whether the ground level has achieved its final goal. */
  get finished(): boolean {
    return this.ground.complete;
  }

  /** Discards all progress so the next {@link HcrPlanner.step} starts a fresh run. */
  reset(): void {
    this.progress = this.hierarchy.levels.map((level) => ({
      level: level.index,
      stages: [],
      actions: [],
      states: [level.initialState],
      achievedAt: new Map(),
      yieldSteps: [],
      queue: [],
      undivided: [],
      boundaries: [],
      divided: 0,
      committedStep: 0,
      sequencedUpTo: 0,
      increments: 0,
      attempts: 0,
      timeMs: 0,
      complete: false,
    }));
    this._tree = new ProblemDivisionTree();
    this._results = [];
    this.failed = false;
    this.started = this.clock();
    this.strategy.reset();

    const top = this.level(this.hierarchy.top);
    const node = this._tree.addNode(new DivisionScenario(top.level, 1, 0), [], true);
    top.queue.push(...node.partials);
    this.setState("solving-top", top.level);
    log.section(`Planning over ${this.hierarchy.levels.length} level(s)`);
  }

  /**
   * Solves the next partial problem chosen by the online method.
   *
   * @returns Ground-level results committed by this step, oldest first.
   * @throws {HcrError} on any planning failure; the run cannot continue afterwards.
   */
  async step(signal?: AbortSignal): Promise<PlanResult[]> {
    if (this.failed) throw new HcrError("Run has failed; call reset() to start again");
    if (this.finished) return [];
    const progress = this.selectLevel();
    const partial = progress.queue.shift();
    if (partial === undefined) throw new HcrError("No pending partial problem", { level: progress.level });
    try {
      return await this.solvePartial(progress, partial, signal);
    } catch (err) {
      partial.status = "failed";
      this.failed = true;
      this.setState("failed", progress.level);
      log.error(err instanceof Error ? err.message : String(err));
      throw err;
    }
  }

  /**
   * Runs to completion and returns every level's plan, or the failure
   * that ended the run. Starts from scratch on every call.
   */
  async plan(signal?: AbortSignal): Promise<PlanningOutcome> {
    this.reset();
    try {
      while (!this.finished) await this.step(signal);
    } catch (err) {
      if (err instanceof HcrError) return { success: false, error: err };
      throw err;
    }
    return { success: true, plan: this.snapshot() };
  }

  /** Concatenated plans of every level as they currently stand. */
  snapshot(): HierarchicalPlan {
    const levels = this.progress.map((progress) => this.levelPlan(progress));
    return {
      levels,
      ground: levels[0],
      tree: this._tree,
      results: [...this._results],
      timeMs: this.clock() - this.started,
    };
  }

  // ── Scheduling ────────────────────────────────────────────────────────────

  /**
   * Complete-first always works on the highest level with pending partials.
   * Otherwise start from the lowest pending level and move up while that
   * level has no more than `lookahead` partials waiting.
   */
  private selectLevel(): LevelProgress {
    const pending = this.progress.filter((progress) => progress.queue.length > 0);
    if (pending.length === 0) throw new HcrError("No level has pending partial problems");
    if (this.options.onlineMethod === "complete-first") return pending[pending.length - 1];
    const lookahead = this.options.onlineMethod === "ground-first" ? 0 : this.options.lookahead;
    let choice = pending[0];
    for (const candidate of pending.slice(1)) {
      if (choice.queue.length > lookahead) break;
      choice = candidate;
    }
    return choice;
  }

  // ── Solving ───────────────────────────────────────────────────────────────

  private async solvePartial(
    progress: LevelProgress,
    partial: PartialRecord,
    signal?: AbortSignal
  ): Promise<PlanResult[]> {
    const level = this.hierarchy.getLevel(progress.level);
    const range = partial.blended;
    const startStep = this.stepOfStage(progress, range.first - 1);
    const existingLength = progress.actions.length;
    this.truncate(progress, startStep, range.first);

    const constraint = progress.stages.slice(range.first - 1, range.last);
    const problem: PlanningProblem = {
      level: progress.level,
      startStep,
      initialState: progress.states[startStep],
      finalGoal: level.finalGoal,
      achieveFinalGoal: partial.final,
      constraint,
      minimumBound:
        progress.level === this.hierarchy.top
          ? undefined
          : this.minimumBound(progress, existingLength, startStep + constraint.length, partial.final),
    };
    this.setState(progress.level === this.hierarchy.top ? "solving-top" : "solving-partial", progress.level);

    let solved: SolveResult;
    try {
      solved = await this.solver.solve(problem, level.theory, { signal, range, nominal: partial.nominal, partial: partial.number });
    } catch (err) {
      if (err instanceof PlanningFailureError && progress.level !== this.hierarchy.top) {
        throw new RefinementFailureError({ level: progress.level, partial: partial.number, range }, err);
      }
      throw err;
    }

    const { plan } = solved;
    progress.actions.push(...plan.actions);
    progress.states.push(...plan.states.slice(1));
    for (const achievement of plan.achievements) progress.achievedAt.set(achievement.index, achievement.step);
    progress.yieldSteps.push(...plan.yieldSteps);
    progress.attempts += plan.statistics.attempts;
    progress.timeMs += plan.statistics.timeMs;

    for (const point of solved.divisions) {
      const created = this._tree.divideReactively(partial, point);
      if (created !== undefined) progress.queue.unshift(created);
    }
    partial.status = solved.interrupted ? "interrupted" : "solved";
    if (partial.final && !solved.interrupted) progress.complete = true;

    const next = progress.queue[0];
    const fromStep = progress.committedStep;
    const toStep =
      progress.complete || next === undefined
        ? progress.actions.length
        : Math.min(this.stepOfStage(progress, next.blended.first - 1), progress.actions.length);
    progress.committedStep = toStep;
    partial.committed = { fromStep, toStep };

    progress.increments += 1;
    const result: PlanResult = {
      level: progress.level,
      node: partial.node,
      partial: partial.number,
      range: partial.blended,
      plan,
      committed: { fromStep, toStep },
      isFinal: progress.complete,
      increment: progress.increments,
      elapsedMs: this.clock() - this.started,
    };
    this._results.push(result);
    this.hooks?.onPartialSolved?.(result);
    log.planned(progress.level, partial.number, plan.length, plan.actionCount);

    if (progress.level > 1) {
      this.refine(progress, partial);
    }
    if (progress.level === 1) {
      if (progress.complete) this.setState("complete", 1);
      if (toStep > fromStep || progress.complete) {
        this.hooks?.onYield?.(result);
        log.yielded(result.increment, fromStep, toStep, progress.complete);
        return [result];
      }
    }
    return [];
  }

  /** Absolute step at which stage `index` was achieved; stage 0 is the level's start. */
  /**
   * Revising blended stages never shortens the plan already found at a
   * level, and a final refinement is at least as long as its parent plan.
   */
  private minimumBound(progress: LevelProgress, existingLength: number, stageBound: number, final: boolean): number {
    const bound = Math.max(existingLength, stageBound);
    return final ? Math.max(bound, this.level(progress.level + 1).actions.length) : bound;
  }

  private stepOfStage(progress: LevelProgress, index: number): number {
    if (index <= 0) return 0;
    const step = progress.achievedAt.get(index);
    if (step === undefined) {
      throw new HcrError(`Stage ${index} has not been achieved`, { level: progress.level });
    }
    return step;
  }

  /** Drops everything planned after `step` and every achievement from stage `fromStage` on. */
  private truncate(progress: LevelProgress, step: number, fromStage: number): void {
    if (step < progress.committedStep) {
      throw new HcrError(`Cannot revise committed step ${progress.committedStep}`, { level: progress.level });
    }
    progress.actions.length = step;
    progress.states.length = step + 1;
    for (const index of [...progress.achievedAt.keys()]) {
      if (index >= fromStage) progress.achievedAt.delete(index);
    }
    const kept = progress.yieldSteps.filter((achievement) => achievement.index < fromStage);
    progress.yieldSteps.splice(0, progress.yieldSteps.length, ...kept);
  }

  // ── Refinement ────────────────────────────────────────────────────────────

  /** Turns newly committed steps of `parent` into stages of the level below and divides them. */
  private refine(parent: LevelProgress, partial: PartialRecord): void {
    const child = this.level(parent.level - 1);
    const mapping = this.hierarchy.getLevel(child.level).mapping;
    if (mapping === undefined) {
      throw new ConfigurationError([`level ${child.level} has no abstraction mapping`]);
    }
    this.setState("refining", child.level);
    const stages = sequenceStages(
      { level: parent.level, states: parent.states, actions: parent.actions },
      parent.sequencedUpTo,
      parent.committedStep,
      mapping,
      child.stages.length + 1
    );
    parent.sequencedUpTo = parent.committedStep;
    child.stages.push(...stages);

    if (this.options.onlineMethod === "complete-first") {
      child.undivided.push(partial);
      if (stages.length > 0) child.boundaries.push(child.stages.length);
      if (!parent.complete) return;
      const sources = child.undivided.splice(0);
      this.divide(child, sources, true, child.boundaries);
      return;
    }
    this.divide(child, [partial], parent.complete, []);
  }

  private divide(
    child: LevelProgress,
    sources: ReadonlyArray<PartialRecord>,
    final: boolean,
    boundaries: ReadonlyArray<number>
  ): void {
    const range: StageRange = { first: child.divided + 1, last: child.stages.length };
    if (range.last < range.first) {
      if (!final) return;
      const lastQueued = child.queue[child.queue.length - 1];
      if (lastQueued !== undefined) {
        lastQueued.final = true;
        return;
      }
    }
    this.setState("dividing", child.level);
    const scenario = this.strategy.divide(child.level, range, {
      meanSubPlanLength: this.meanSubPlanLength(this.level(child.level + 1)),
    });
    if (this.options.inheritDivisions) {
      for (const boundary of boundaries) scenario.addInherited(boundary);
    }
    const node = this._tree.addNode(scenario, sources, final);
    child.divided = range.last < range.first ? child.divided : range.last;
    child.queue.push(...node.partials);
    this.hooks?.onDivision?.(child.level, range, node.partials.length);
    log.divided(child.level, range.first, range.last, node.partials.length);
  }

  private meanSubPlanLength(progress: LevelProgress): number {
    if (progress.achievedAt.size === 0) return 1;
    return progress.actions.length / progress.achievedAt.size;
  }

  // ── Helpers ───────────────────────────────────────────────────────────────

  private get ground(): LevelProgress {
    return this.level(1);
  }

  private level(index: number): LevelProgress {
    const progress = this.progress[index - 1];
    if (progress === undefined) throw new ConfigurationError([`level ${index} does not exist`]);
    return progress;
  }

  private setState(state: ControllerState, level: number): void {
    this._state = state;
    this.hooks?.onStateChange?.(state, level);
  }

  private levelPlan(progress: LevelProgress): MonolevelPlan {
    const achievements = [...progress.achievedAt.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, step]) => ({ index, step }));
    const length = progress.actions.length;
    const lastAchieved = achievements[achievements.length - 1];
    const finalState = progress.states[progress.states.length - 1];
    return {
      level: progress.level,
      startStep: 0,
      endStep: length,
      actions: [...progress.actions],
      states: [...progress.states],
      achievements,
      length,
      actionCount: progress.actions.reduce((total, set) => total + set.length, 0),
      trailing: lastAchieved !== undefined && lastAchieved.step < length,
      isFinal: progress.complete && satisfiesGoal(finalState, this.hierarchy.getLevel(progress.level).finalGoal),
      yieldSteps: [...progress.yieldSteps],
      statistics: {
        attempts: progress.attempts,
        bound: length,
        increments: progress.increments,
        timeMs: progress.timeMs,
      },
    };
  }
}

/**
 * Creates a hierarchical conformance refinement planner.
 *
 * @throws {ConfigurationError} if `config.options` is invalid.
 *
 * @example
 * ```ts
 * const result = await createPlanner({ hierarchy, oracle }).plan();
 * if (result.success) {
 *   console.log(result.plan.ground.length);
 * }
 * ```
 */
export function createPlanner<TTheory>(config: PlannerConfig<TTheory>): HcrPlanner<TTheory> {
  return new HcrPlanner(config);
}
