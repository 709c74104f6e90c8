import type {
  AchievementType,
  ActionPlanning,
  ActionSet,
  FinalGoal,
  FluentState,
  MonolevelPlan,
  PlannerHooks,
  PlanningProblem,
  SearchMode,
  StageAchievement,
  StageRange,
  SubGoalStage,
} from "./types";
import type { SearchLimits } from "./config";
import type { DivisionStrategy } from "./strategies";
import { DivisionPoint } from "./division";
import type { ProblemAttribution } from "./errors";
import { PlanningCancelledError, PlanningFailureError, SolverError } from "./errors";
import { StageTracker, satisfiesGoal, stateKey } from "./state";
import * as log from "./logger";

// ── Oracle interface ─────────────────────────────────────────────────────────

/**
 * A bounded planning program: find the shortest plan from `startState`
 * that ends no later than step `bound` and passes through `stages` in order.
 */
export interface BoundedProgram<TTheory> {
  readonly level: number;
  readonly theory: TTheory;
  readonly startStep: number;
  readonly startState: FluentState;
  /** Absolute step the plan may not extend beyond. */
  readonly bound: number;
  readonly stages: ReadonlyArray<SubGoalStage>;
  readonly achievement: AchievementType;
  readonly actionPlanning: ActionPlanning;
  /** Present when the final goal must hold at the last step. */
  readonly finalGoal?: FinalGoal;
  /** Action sets the plan must begin with. */
  readonly fixedPrefix: ReadonlyArray<ActionSet>;
}

/**
 * An optimal satisfying model. `actions[i]` happens at step
 * `startStep + i + 1`; `states` holds one more entry than `actions`,
 * starting with the start state.
 */
export interface OracleModel {
  readonly actions: ReadonlyArray<ActionSet>;
  readonly states: ReadonlyArray<FluentState>;
  readonly cost?: number;
}

export type ModelOutcome = { readonly status: "model"; readonly model: OracleModel };
/** `exhausted` reports that no plan exists at any bound. */
export type UnsatOutcome = { readonly status: "unsat"; readonly exhausted?: boolean };
export type ErrorOutcome = { readonly status: "error"; readonly message: string };
export type OracleOutcome = ModelOutcome | UnsatOutcome | ErrorOutcome;

/**
 * External declarative solver. Implementations must stop work and may
 * reject once `signal` is aborted.
 */
export interface SolverOracle<TTheory> {
  solve(program: BoundedProgram<TTheory>, signal: AbortSignal): Promise<OracleOutcome>;
}

// ── Decoding ─────────────────────────────────────────────────────────────────

export interface DecodedModel {
  readonly actions: ReadonlyArray<ActionSet>;
  readonly states: ReadonlyArray<FluentState>;
  readonly achievements: ReadonlyArray<StageAchievement>;
  readonly trailing: boolean;
  readonly isFinal: boolean;
}

function actionSetKey(actions: ActionSet): string {
  return actions
    .map((literal) => `${literal.agent}:${literal.action}`)
    .sort()
    .join(";");
}

/**
 * Maps a returned model to its steps and the step each stage is achieved at.
 * Stage `i` is achieved at the first step, not before stage `i - 1`, at
 * which it holds under the program's achievement type.
 *
 * @throws {SolverError} when the model does not satisfy the program.
 */
export function decodeModel<TTheory>(
  program: BoundedProgram<TTheory>,
  model: OracleModel,
  problem?: ProblemAttribution
): DecodedModel {
  const invalid = (detail: string): SolverError => new SolverError("invalid-model", detail, problem);
  const { actions, states } = model;

  if (states.length !== actions.length + 1) {
    throw invalid(`expected ${actions.length + 1} states, got ${states.length}`);
  }
  if (program.startStep + actions.length > program.bound) {
    throw invalid(`plan of ${actions.length} steps exceeds bound ${program.bound}`);
  }
  if (stateKey(states[0]) !== stateKey(program.startState)) {
    throw invalid("first state differs from the start state");
  }
  if (program.actionPlanning === "sequential" && actions.some((set) => set.length > 1)) {
    throw invalid("concurrent actions under sequential action planning");
  }
  program.fixedPrefix.forEach((set, i) => {
    if (actions[i] === undefined || actionSetKey(actions[i]) !== actionSetKey(set)) {
      throw invalid(`step ${program.startStep + i + 1} deviates from the fixed prefix`);
    }
  });

  const tracker = new StageTracker(program.stages, program.achievement);
  states.forEach((state, i) => tracker.observe(state, program.startStep + i));
  if (!tracker.done) {
    throw invalid(`stage ${program.stages[tracker.count].index} is never achieved`);
  }

  const last = states[states.length - 1];
  if (program.finalGoal !== undefined && !satisfiesGoal(last, program.finalGoal)) {
    throw invalid("final goal does not hold in the last state");
  }

  const achievements = tracker.achievements;
  const endStep = program.startStep + actions.length;
  const lastAchieved = achievements.length > 0 ? achievements[achievements.length - 1].step : undefined;
  return {
    actions,
    states,
    achievements,
    trailing: lastAchieved !== undefined && lastAchieved < endStep,
    isFinal: program.finalGoal !== undefined,
  };
}

// ── Solver ───────────────────────────────────────────────────────────────────

export interface SolverSettings {
  readonly searchMode: SearchMode;
  readonly achievement: AchievementType;
  readonly actionPlanning: ActionPlanning;
  readonly search: SearchLimits;
  /** Consulted after every sequential-yield increment when reactive. */
  readonly strategy?: DivisionStrategy;
  readonly hooks?: PlannerHooks;
  readonly clock?: () => number;
}

export interface SolveCall {
  readonly signal?: AbortSignal;
  /** Stage range of the partial being solved, reported to reactive strategies. */
  readonly range?: StageRange;
  /** Unblended range of the partial; reactive divisions never fall before its first stage. */
  readonly nominal?: StageRange;
  readonly partial?: number;
}

/** Outcome of one monolevel solve. */
export interface SolveResult {
  readonly plan: MonolevelPlan;
  /** Reactive divisions committed during the solve, in order. */
  readonly divisions: ReadonlyArray<DivisionPoint>;
  /**
   * The solve halted at the last interrupting division. The plan ends
   * where its last stage was achieved; the remaining stages still need
   * solving from its final state.
   */
  readonly interrupted: boolean;
}

interface SolveContext {
  readonly started: number;
  readonly problem: ProblemAttribution;
  readonly signal?: AbortSignal;
  attempts: number;
  retried: boolean;
}

interface Solved<TTheory> {
  readonly program: BoundedProgram<TTheory>;
  readonly model: OracleModel;
}

type ProgramBase<TTheory> = Omit<BoundedProgram<TTheory>, "bound">;

/**
 * Solves one planning problem at one level by iterative deepening over a
 * {@link SolverOracle}.
 *
 * @example
 * ```ts
 * const solver = new MonolevelSolver(oracle, { searchMode: "standard", achievement: "sequential",
 *   actionPlanning: "sequential", search: parsePlannerOptions().search });
 * const { plan } = await solver.solve(problem, theory);
 * ```
 */
export class MonolevelSolver<TTheory> {
  private readonly clock: () => number;

  constructor(
    private readonly oracle: SolverOracle<TTheory>,
    private readonly settings: SolverSettings
  ) {
    this.clock = settings.clock ?? (() => performance.now());
  }

  /**
   * @throws {PlanningFailureError} when no plan exists within the limits.
   * @throws {SolverError} when the oracle fails and no retry is left.
   * @throws {PlanningCancelledError} when `call.signal` is aborted.
   */
  async solve(problem: PlanningProblem, theory: TTheory, call: SolveCall = {}): Promise<SolveResult> {
    const stages = problem.constraint;
    const range = call.range ?? {
      first: stages.length > 0 ? stages[0].index : 1,
      last: stages.length > 0 ? stages[stages.length - 1].index : 0,
    };
    const ctx: SolveContext = {
      started: this.clock(),
      problem: { level: problem.level, partial: call.partial, range },
      signal: call.signal,
      attempts: 0,
      retried: false,
    };

    if (this.settings.searchMode === "sequential-yield" && stages.length > 0) {
      return this.solveIncrementally(problem, theory, range, call.nominal ?? range, ctx);
    }

    const base = this.programBase(problem, theory, stages, problem.achieveFinalGoal, []);
    const solved = await this.deepen(base, this.initialBound(problem), ctx);
    const decoded = decodeModel(solved.program, solved.model, ctx.problem);
    return {
      plan: this.toPlan(problem, decoded, [], solved.program.bound, 0, ctx),
      divisions: [],
      interrupted: false,
    };
  }

  private async solveIncrementally(
    problem: PlanningProblem,
    theory: TTheory,
    range: StageRange,
    nominal: StageRange,
    ctx: SolveContext
  ): Promise<SolveResult> {
    const { strategy, hooks } = this.settings;
    const stages = problem.constraint;
    const yieldSteps: StageAchievement[] = [];
    const divisions: DivisionPoint[] = [];
    let prefix: ReadonlyArray<ActionSet> = [];
    let bound = this.initialBound(problem);
    let latest: DecodedModel | undefined;

    for (let k = 1; k <= stages.length; k++) {
      const incrementStarted = this.clock();
      const final = k === stages.length && problem.achieveFinalGoal;
      const base = this.programBase(problem, theory, stages.slice(0, k), final, prefix);
      const solved = await this.deepen(base, bound, ctx);
      const decoded = decodeModel(solved.program, solved.model, ctx.problem);
      bound = solved.program.bound;
      latest = decoded;

      const achievement = decoded.achievements[k - 1];
      const previousStep = k === 1 ? problem.startStep : decoded.achievements[k - 2].step;
      const unique = achievement.step > previousStep;
      yieldSteps.push(achievement);
      hooks?.onStageAchieved?.(problem.level, achievement);
      log.detail(`level ${problem.level}: stage ${achievement.index} achieved at step ${achievement.step}`);

      if (strategy?.reactive === true) {
        const reaction = strategy.react({
          level: problem.level,
          range,
          nominal,
          achievement,
          unique,
          incrementMs: this.clock() - incrementStarted,
        });
        if (reaction.divide) {
          const point = new DivisionPoint(achievement.index, {
            reactiveStep: achievement.step,
            interrupting: reaction.interrupt,
            preemptive: !unique,
          });
          divisions.push(point);
          hooks?.onReactiveDivision?.(problem.level, point.index, point.interrupting);
          log.detail(`level ${problem.level}: reactive division after stage ${point.index} (${reaction.rationale})`);
          if (reaction.interrupt) {
            const cut = achievement.step - problem.startStep;
            const truncated: DecodedModel = {
              actions: decoded.actions.slice(0, cut),
              states: decoded.states.slice(0, cut + 1),
              achievements: decoded.achievements,
              trailing: false,
              isFinal: false,
            };
            return {
              plan: this.toPlan(problem, truncated, yieldSteps, bound, k, ctx),
              divisions,
              interrupted: true,
            };
          }
          const fixed = Math.max(0, achievement.step - reaction.backwardsHorizon - problem.startStep);
          prefix = decoded.actions.slice(0, fixed);
        }
      }
      if (ctx.signal?.aborted === true) throw new PlanningCancelledError(ctx.problem);
    }

    if (latest === undefined) {
      throw new SolverError("invalid-model", "no increment was solved", ctx.problem);
    }
    return {
      plan: this.toPlan(problem, latest, yieldSteps, bound, stages.length, ctx),
      divisions,
      interrupted: false,
    };
  }

  private initialBound(problem: PlanningProblem): number {
    const { initialBound } = this.settings.search;
    if (this.settings.searchMode === "minimum-bound") {
      return Math.max(problem.startStep + Math.max(initialBound, problem.constraint.length), problem.minimumBound ?? 0);
    }
    return problem.startStep + initialBound;
  }

  private programBase(
    problem: PlanningProblem,
    theory: TTheory,
    stages: ReadonlyArray<SubGoalStage>,
    withFinalGoal: boolean,
    fixedPrefix: ReadonlyArray<ActionSet>
  ): ProgramBase<TTheory> {
    return {
      level: problem.level,
      theory,
      startStep: problem.startStep,
      startState: problem.initialState,
      stages,
      achievement: this.settings.achievement,
      actionPlanning: this.settings.actionPlanning,
      finalGoal: withFinalGoal ? problem.finalGoal : undefined,
      fixedPrefix,
    };
  }

  private async deepen(base: ProgramBase<TTheory>, from: number, ctx: SolveContext): Promise<Solved<TTheory>> {
    const { boundStep, lengthLimit, timeLimitMs } = this.settings.search;
    const cap = base.startStep + lengthLimit;
    let bound = Math.min(from, cap);
    let tried = bound;

    while (bound <= cap) {
      if (ctx.signal?.aborted === true) throw new PlanningCancelledError(ctx.problem);
      if (timeLimitMs !== undefined && this.clock() - ctx.started > timeLimitMs) {
        throw new PlanningFailureError("time-cap", tried, ctx.problem);
      }
      const program: BoundedProgram<TTheory> = { ...base, bound };
      const outcome = await this.attempt(program, ctx);
      tried = bound;
      this.settings.hooks?.onSolveAttempt?.(base.level, bound, outcome.status);
      log.detail(`level ${base.level}: bound ${bound} → ${outcome.status}`);
      if (outcome.status === "model") return { program, model: outcome.model };
      if (outcome.exhausted === true) {
        throw new PlanningFailureError("unsatisfiable", bound, ctx.problem);
      }
      bound += boundStep;
    }
    throw new PlanningFailureError("length-cap", tried, ctx.problem);
  }

  /** One oracle call, retried once with a relaxed timeout when configured. */
  private async attempt(program: BoundedProgram<TTheory>, ctx: SolveContext): Promise<ModelOutcome | UnsatOutcome> {
    const { retryOnSolverError, retryTimeoutFactor } = this.settings.search;
    let timeout = this.settings.search.attemptTimeoutMs;
    for (;;) {
      try {
        const outcome = await this.call(program, timeout, ctx);
        if (outcome.status === "error") {
          throw new SolverError("oracle-error", outcome.message, ctx.problem);
        }
        return outcome;
      } catch (err) {
        if (ctx.signal?.aborted === true) throw new PlanningCancelledError(ctx.problem);
        const error =
          err instanceof SolverError
            ? err
            : new SolverError("exception", err instanceof Error ? err.message : String(err), ctx.problem, err);
        if (!retryOnSolverError || ctx.retried) throw error;
        ctx.retried = true;
        timeout = timeout === undefined ? undefined : timeout * retryTimeoutFactor;
        log.warn(`${error.message}; retrying once${timeout === undefined ? "" : ` with a ${timeout} ms timeout`}`);
      }
    }
  }

  private async call(
    program: BoundedProgram<TTheory>,
    timeout: number | undefined,
    ctx: SolveContext
  ): Promise<OracleOutcome> {
    const controller = new AbortController();
    const forward = (): void => controller.abort();
    ctx.signal?.addEventListener("abort", forward, { once: true });
    let timer: ReturnType<typeof setTimeout> | undefined;
    ctx.attempts += 1;
    try {
      const pending = this.oracle.solve(program, controller.signal);
      if (timeout === undefined) return await pending;
      const expiry = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(new SolverError("timeout", `no answer within ${timeout} ms at bound ${program.bound}`, ctx.problem));
          controller.abort();
        }, timeout);
      });
      return await Promise.race([pending, expiry]);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      ctx.signal?.removeEventListener("abort", forward);
    }
  }

  private toPlan(
    problem: PlanningProblem,
    decoded: DecodedModel,
    yieldSteps: ReadonlyArray<StageAchievement>,
    bound: number,
    increments: number,
    ctx: SolveContext
  ): MonolevelPlan {
    const length = decoded.actions.length;
    return {
      level: problem.level,
      startStep: problem.startStep,
      endStep: problem.startStep + length,
      actions: decoded.actions,
      states: decoded.states,
      achievements: decoded.achievements,
      length,
      actionCount: decoded.actions.reduce((total, set) => total + set.length, 0),
      trailing: decoded.trailing,
      isFinal: decoded.isFinal,
      yieldSteps,
      statistics: { attempts: ctx.attempts, bound, increments, timeMs: this.clock() - ctx.started },
    };
  }
}
