export type {
  FluentState,
  FluentLiteral,
  GoalLiteral,
  FinalGoal,
  StageLiteral,
  ActionLiteral,
  ActionSet,
  StageSource,
  SubGoalStage,
  StageRange,
  StageAchievement,
  RelaxedMapping,
  CondensedMapping,
  TaskingMapping,
  AbstractionMapping,
  AbstractionKind,
  AbstractionLevel,
  AbstractionHierarchy,
  SearchMode,
  AchievementType,
  ActionPlanning,
  OnlineMethod,
  PlanningProblem,
  SolveStatistics,
  MonolevelPlan,
  PlanResult,
  ControllerState,
  PlannerHooks,
} from "./types";

export { HierarchyBuilder, buildHierarchy, hierarchyIssues, validateHierarchy } from "./hierarchy";
export type { LevelDefinition, ProblemLoader } from "./hierarchy";

export { MonolevelSolver, decodeModel } from "./solver";
export type {
  BoundedProgram,
  OracleModel,
  OracleOutcome,
  SolverOracle,
  SolverSettings,
  SolveCall,
  SolveResult,
  DecodedModel,
} from "./solver";

export { sequenceStages, mapEffects } from "./sequencer";
export type { EffectSource } from "./sequencer";
export { Blend, DivisionPoint, DivisionScenario, makeHomogenousDivisions } from "./division";
export type { BlendQuantity, DivisionPointOptions } from "./division";
export {
  NoDivision,
  BasicStrategy,
  SteadyStrategy,
  HastyStrategy,
  RelentlessStrategy,
  ImpetuousStrategy,
  RapidStrategy,
  createStrategy,
  trueSizeBound,
} from "./strategies";
export type { DivisionStrategy, DivisionContext, Reaction, ReactionInput } from "./strategies";
export { ProblemDivisionTree } from "./tree";
export type { DivisionNode, PartialRecord, PartialStatus } from "./tree";

export { createPlanner, HcrPlanner } from "./planner";
export type { PlannerConfig, HierarchicalPlan, PlanningOutcome } from "./planner";
export { yieldPlans, executeOnline } from "./online";
export type { YieldEvent, OnlineOptions, OnlineSummary, PlanExecutor } from "./online";

export { computeMetrics, levelMetrics, subPlanLengths, standardDeviation } from "./metrics";
export type { LevelMetrics, PlanMetrics } from "./metrics";

export {
  DEFAULTS,
  plannerConfigSchema,
  parsePlannerOptions,
  loadPlannerConfig,
} from "./config";
export type { PlannerOptions, PlannerOptionsInput, DivisionOptions, SearchLimits, SizeBound, ReactiveBound } from "./config";

export { setVerbosity, getVerbosity } from "./logger";
export type { Verbosity } from "./logger";

export {
  HcrError,
  PlanningFailureError,
  SolverError,
  ConfigurationError,
  RefinementFailureError,
  PlanningCancelledError,
} from "./errors";
export type { ProblemAttribution, PlanningFailureReason, SolverErrorKind } from "./errors";

export { satisfiesGoal, stageHolds, literalHolds, changedFluents, StageTracker } from "./state";
