import type { StageRange } from "./types";

/** Identifies the problem instance a failure belongs to. */
export interface ProblemAttribution {
  readonly level: number;
  /** 1-based partial number within its division, when the failure is partial-specific. */
  readonly partial?: number;
  readonly range?: StageRange;
}

function describe(problem: ProblemAttribution | undefined): string {
  if (problem === undefined) return "";
  let where = ` [level ${problem.level}`;
  if (problem.partial !== undefined) where += `, partial ${problem.partial}`;
  if (problem.range !== undefined) where += `, stages ${problem.range.first}..${problem.range.last}`;
  return where + "]";
}

/**
 * Base class of every error raised by the planner. Catch this to handle
 * all planning failures uniformly.
 */
export class HcrError extends Error {
  /** The problem instance the failure is attributed to, if any. */
  readonly problem?: ProblemAttribution;

  constructor(message: string, problem?: ProblemAttribution, options?: { cause?: unknown }) {
    super(message + describe(problem), options);
    this.name = "HcrError";
    this.problem = problem;
  }
}

export type PlanningFailureReason = "unsatisfiable" | "length-cap" | "time-cap";

/**
 * Thrown when no plan exists within the search limits. This is an expected
 * outcome for unsatisfiable problems and is never retried.
 *
 * @example
 * ```ts
 * const result = await createPlanner({ hierarchy, oracle }).plan();
 * if (!result.success && result.error instanceof PlanningFailureError) {
 *   console.error(`No plan (${result.error.reason}) at bound ${result.error.bound}`);
 * }
 * ```
 */
export class PlanningFailureError extends HcrError {
  readonly reason: PlanningFailureReason;
  /** Last absolute bound that was tried. */
  readonly bound: number;

  constructor(reason: PlanningFailureReason, bound: number, problem?: ProblemAttribution) {
    const text: Record<PlanningFailureReason, string> = {
      unsatisfiable: "Problem is unsatisfiable",
      "length-cap": `No plan found within the length limit (bound ${bound})`,
      "time-cap": `No plan found within the time limit (bound ${bound})`,
    };
    super(text[reason], problem);
    this.name = "PlanningFailureError";
    this.reason = reason;
    this.bound = bound;
  }
}

export type SolverErrorKind = "oracle-error" | "exception" | "timeout" | "invalid-model";

/** Thrown when the solver oracle crashes, errors, times out or returns an unusable model. */
export class SolverError extends HcrError {
  readonly kind: SolverErrorKind;

  constructor(kind: SolverErrorKind, detail: string, problem?: ProblemAttribution, cause?: unknown) {
    super(`Solver ${kind}: ${detail}`, problem, cause === undefined ? undefined : { cause });
    this.name = "SolverError";
    this.kind = kind;
  }
}

/**
 * Thrown before any solving starts when the hierarchy, a mapping or the
 * planner options are invalid.
 */
export class ConfigurationError extends HcrError {
  /** Individual validation messages. */
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Thrown when a constrained level cannot be refined given its parent's
 * fixed plan. The parent is never re-planned.
 */
export class RefinementFailureError extends HcrError {
  constructor(problem: ProblemAttribution, cause: PlanningFailureError) {
    super(`Cannot refine the parent plan: ${cause.reason}`, problem, { cause });
    this.name = "RefinementFailureError";
  }
}

/** Thrown when a run is cancelled through its abort signal. */
export class PlanningCancelledError extends HcrError {
  constructor(problem?: ProblemAttribution) {
    super("Planning was cancelled", problem);
    this.name = "PlanningCancelledError";
  }
}
