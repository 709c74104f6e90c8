import type { MonolevelPlan, PlanResult } from "./types";
import type { HierarchicalPlan } from "./planner";

/** Reporting metrics of one level's concatenated plan. */
export interface LevelMetrics {
  readonly level: number;
  readonly length: number;
  readonly actions: number;
  readonly stages: number;
  /** Steps spent on each stage: `a(i) - a(i - 1)`, with `a(0)` the start step. */
  readonly subPlanLengths: ReadonlyArray<number>;
  /** Plan length relative to the level above. Undefined at the top. */
  readonly lengthExpansion?: number;
  /** Action count relative to the level above. Undefined at the top. */
  readonly actionExpansion?: number;
  /** Sample standard deviation of the sub-plan lengths. */
  readonly expansionDeviation: number;
  /** Coefficient of variation of the sub-plan lengths; 0 is perfectly balanced. */
  readonly balance: number;
  /** Steps per action; below 1 only with concurrent actions. */
  readonly compression: number;
  /** Stages whose final achievement step differs from the greedy one. */
  readonly interleavingQuantity: number;
  /** Total steps by which final achievement steps differ from greedy ones. */
  readonly interleavingScore: number;
}

export interface PlanMetrics {
  readonly levels: ReadonlyArray<LevelMetrics>;
  /** Milliseconds to the first ground-level plan. */
  readonly latencyMs?: number;
  /** Mean milliseconds between ground-level plans. */
  readonly averageYieldMs?: number;
  readonly totalMs: number;
}

function mean(values: ReadonlyArray<number>): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

/** Sample standard deviation; zero for fewer than two values. */
export function standardDeviation(values: ReadonlyArray<number>): number {
  if (values.length < 2) return 0;
  const average = mean(values);
  const squares = values.reduce((total, value) => total + (value - average) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function subPlanLengths(plan: MonolevelPlan): number[] {
  let previous = plan.startStep;
  return plan.achievements.map((achievement) => {
    const length = achievement.step - previous;
    previous = achievement.step;
    return length;
  });
}

export function levelMetrics(plan: MonolevelPlan, parent?: MonolevelPlan): LevelMetrics {
  const lengths = subPlanLengths(plan);
  const average = mean(lengths);
  const deviation = standardDeviation(lengths);
  const greedy = new Map(plan.yieldSteps.map((achievement) => [achievement.index, achievement.step]));
  let quantity = 0;
  let score = 0;
  for (const achievement of plan.achievements) {
    const step = greedy.get(achievement.index);
    if (step === undefined || step === achievement.step) continue;
    quantity += 1;
    score += Math.abs(achievement.step - step);
  }
  return {
    level: plan.level,
    length: plan.length,
    actions: plan.actionCount,
    stages: plan.achievements.length,
    subPlanLengths: lengths,
    lengthExpansion: parent !== undefined && parent.length > 0 ? plan.length / parent.length : undefined,
    actionExpansion:
      parent !== undefined && parent.actionCount > 0 ? plan.actionCount / parent.actionCount : undefined,
    expansionDeviation: deviation,
    balance: average > 0 ? deviation / average : 0,
    compression: plan.actionCount > 0 ? plan.length / plan.actionCount : 1,
    interleavingQuantity: quantity,
    interleavingScore: score,
  };
}

function groundYields(results: ReadonlyArray<PlanResult>): number[] {
  return results
    .filter((result) => result.level === 1 && (result.committed.toStep > result.committed.fromStep || result.isFinal))
    .map((result) => result.elapsedMs);
}

/** Computes reporting metrics for every level of a finished run. */
export function computeMetrics(plan: HierarchicalPlan): PlanMetrics {
  const levels = plan.levels.map((level, i) => levelMetrics(level, plan.levels[i + 1]));
  const yields = groundYields(plan.results);
  const gaps = yields.slice(1).map((time, i) => time - yields[i]);
  return {
    levels,
    latencyMs: yields[0],
    averageYieldMs: gaps.length > 0 ? mean(gaps) : undefined,
    totalMs: plan.timeMs,
  };
}
