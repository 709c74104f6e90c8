import type { PlanResult } from "./types";
import type { HcrPlanner } from "./planner";
import { HcrError, PlanningCancelledError } from "./errors";

/** An event handed to the execution collaborator. */
export type YieldEvent =
  | { readonly kind: "plan"; readonly increment: number; readonly result: PlanResult }
  | { readonly kind: "failure"; readonly error: HcrError };

export interface OnlineOptions {
  /** Stops the loop between (and, through the oracle, during) solves. */
  readonly signal?: AbortSignal;
}

/**
 * Streams ground-level plans while the planner keeps refining. Each `plan`
 * event carries the steps committed since the previous one; the last is
 * marked final. A failure ends the stream with a `failure` event;
 * cancellation ends it silently.
 *
 * @example
 * ```ts
 * for await (const event of yieldPlans(planner, { signal })) {
 *   if (event.kind === "plan") executor.enqueue(event.result);
 * }
 * ```
 */
export async function* yieldPlans<TTheory>(
  planner: HcrPlanner<TTheory>,
  options: OnlineOptions = {}
): AsyncGenerator<YieldEvent, void, undefined> {
  const { signal } = options;
  planner.reset();
  let increment = 0;
  while (!planner.finished) {
    if (signal?.aborted === true) return;
    let results: PlanResult[];
    try {
      results = await planner.step(signal);
    } catch (err) {
      if (err instanceof PlanningCancelledError) return;
      if (err instanceof HcrError) {
        yield { kind: "failure", error: err };
        return;
      }
      throw err;
    }
    for (const result of results) {
      increment += 1;
      yield { kind: "plan", increment, result };
    }
  }
}

/** Receives each ground-level plan in order; may be asynchronous. */
export type PlanExecutor = (result: PlanResult) => void | Promise<void>;

export interface OnlineSummary {
  /** Plans handed to the executor. */
  readonly yields: number;
  /** Whether the final ground plan was reached. */
  readonly completed: boolean;
  /** Milliseconds from the start of the run to the first yield. */
  readonly latencyMs?: number;
  /** Mean milliseconds between consecutive yields. */
  readonly averageYieldMs?: number;
  readonly error?: HcrError;
}

/**
 * Runs the yield loop and hands every plan to `executor`, waiting for each
 * hand-off before continuing.
 */
export async function executeOnline<TTheory>(
  planner: HcrPlanner<TTheory>,
  executor: PlanExecutor,
  options: OnlineOptions = {}
): Promise<OnlineSummary> {
  const times: number[] = [];
  let error: HcrError | undefined;
  let completed = false;
  for await (const event of yieldPlans(planner, options)) {
    if (event.kind === "failure") {
      error = event.error;
      break;
    }
    times.push(event.result.elapsedMs);
    completed = event.result.isFinal;
    await executor(event.result);
  }
  const gaps = times.slice(1).map((time, i) => time - times[i]);
  return {
    yields: times.length,
    completed,
    latencyMs: times[0],
    averageYieldMs: gaps.length > 0 ? gaps.reduce((a, b) => a + b, 0) / gaps.length : undefined,
    error,
  };
}
