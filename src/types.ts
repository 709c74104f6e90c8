/**
 * An immutable assignment of values to fluents at one plan step.
 * Fluent names and values are opaque strings supplied by the domain theory.
 */
export type FluentState = Readonly<Record<string, string>>;

/** A single `fluent = value` fact. */
export interface FluentLiteral {
  readonly fluent: string;
  readonly value: string;
}

/**
 * A final-goal literal. With `truth: true` the fluent must hold `value`;
 * with `truth: false` it must hold anything else.
 */
export interface GoalLiteral extends FluentLiteral {
  readonly truth: boolean;
}

/** The final-goal test of a planning problem, checked against fluent values. */
export type FinalGoal = ReadonlyArray<GoalLiteral>;

/**
 * A sub-goal literal. It is satisfied when the fluent holds any one of
 * `values`; relaxed and tasking levels always produce a single value,
 * condensed levels produce a disjunction over concrete entities.
 */
export interface StageLiteral {
  readonly fluent: string;
  readonly values: ReadonlyArray<string>;
}

/** An action planned for one agent at one step. */
export interface ActionLiteral {
  readonly agent: string;
  readonly action: string;
}

/** All actions planned at one step. Holds one element under sequential action planning. */
export type ActionSet = ReadonlyArray<ActionLiteral>;

/** The abstract effect a sub-goal stage was derived from. */
export interface StageSource {
  /** Level of the plan that produced the effect. */
  readonly level: number;
  /** Step of that plan whose effects were mapped. */
  readonly step: number;
  readonly actions: ActionSet;
}

/**
 * An intermediate state a refined plan must pass through.
 * Indices are 1-based and strictly increasing within a level.
 */
export interface SubGoalStage {
  readonly index: number;
  readonly literals: ReadonlyArray<StageLiteral>;
  readonly source?: StageSource;
}

/** Inclusive range of stage indices. `last < first` denotes an empty range. */
export interface StageRange {
  readonly first: number;
  readonly last: number;
}

/** The step at which a stage was achieved. */
export interface StageAchievement {
  readonly index: number;
  readonly step: number;
}

// ── Abstraction mappings ─────────────────────────────────────────────────────

/** Abstract effects pass through to the level below unchanged. */
export interface RelaxedMapping {
  readonly kind: "relaxed";
}

/**
 * Abstract entities stand for groups of concrete ones. Every effect whose
 * value names an abstract entity becomes a disjunction over its members.
 */
export interface CondensedMapping {
  readonly kind: "condensed";
  /** Abstract entity → concrete entities it condenses. */
  readonly entities: Readonly<Record<string, ReadonlyArray<string>>>;
}

/**
 * Designer-supplied decomposition of abstract task literals. Keys are
 * `fluent=value`; each maps to the ordered stages (lists of literals)
 * that realise the task one level down.
 */
export interface TaskingMapping {
  readonly kind: "tasking";
  readonly tasks: Readonly<Record<string, ReadonlyArray<ReadonlyArray<StageLiteral>>>>;
  /** When true, effects without a task entry become one trailing stage. */
  readonly passthrough?: boolean;
}

/**
 * Translation of a level's upper neighbour's effects into this level's
 * sub-goal stages.
 */
export type AbstractionMapping = RelaxedMapping | CondensedMapping | TaskingMapping;

export type AbstractionKind = AbstractionMapping["kind"];

// ── Hierarchy ────────────────────────────────────────────────────────────────

/**
 * One model in the abstraction hierarchy. Level 1 is the ground level;
 * indices increase towards more abstract models.
 *
 * @template TTheory - Domain theory reference, opaque to the planner and
 *   handed unchanged to the {@link SolverOracle}.
 */
export interface AbstractionLevel<TTheory> {
  readonly index: number;
  readonly theory: TTheory;
  /** Mapping from the upper neighbour. Absent at the top level. */
  readonly mapping?: AbstractionMapping;
  readonly initialState: FluentState;
  readonly finalGoal: FinalGoal;
}

/** Immutable, ordered stack of abstraction levels. */
export interface AbstractionHierarchy<TTheory> {
  readonly levels: ReadonlyArray<AbstractionLevel<TTheory>>;
  /** Index of the most abstract level. */
  readonly top: number;
  getLevel(index: number): AbstractionLevel<TTheory>;
}

// ── Problems & plans ─────────────────────────────────────────────────────────

export type SearchMode = "standard" | "minimum-bound" | "sequential-yield";

/**
 * How a stage counts as achieved.
 * - `simultaneous`: all of its literals hold in one state.
 * - `sequential`: each literal has held at some state since the previous
 *   stage was achieved.
 */
export type AchievementType = "sequential" | "simultaneous";

/** Whether one step may hold several agents' actions. */
export type ActionPlanning = "sequential" | "concurrent";

export type OnlineMethod = "ground-first" | "complete-first" | "hybrid";

/** A single problem handed to the monolevel solver. */
export interface PlanningProblem {
  readonly level: number;
  /** Absolute step the problem starts from. */
  readonly startStep: number;
  readonly initialState: FluentState;
  readonly finalGoal: FinalGoal;
  /** Whether the final goal must hold at the end of the plan. */
  readonly achieveFinalGoal: boolean;
  /** Ordered conformance constraint. Empty for a complete problem. */
  readonly constraint: ReadonlyArray<SubGoalStage>;
  /** Absolute step no plan for this problem can end before. First bound tried under minimum-bound search. */
  readonly minimumBound?: number;
}

export interface SolveStatistics {
  /** Oracle calls made, including retries. */
  readonly attempts: number;
  /** Absolute bound of the successful attempt. */
  readonly bound: number;
  /** Sequential-yield increments performed. Zero in other modes. */
  readonly increments: number;
  readonly timeMs: number;
}

/**
 * A complete or partial plan at a single level.
 * `actions[i]` is planned at step `startStep + i + 1` and
 * `states[i]` is the state at step `startStep + i`.
 */
export interface MonolevelPlan {
  readonly level: number;
  readonly startStep: number;
  readonly endStep: number;
  readonly actions: ReadonlyArray<ActionSet>;
  readonly states: ReadonlyArray<FluentState>;
  readonly achievements: ReadonlyArray<StageAchievement>;
  /** Number of steps. */
  readonly length: number;
  /** Number of individual actions. */
  readonly actionCount: number;
  /** Steps remain after the last stage was achieved. */
  readonly trailing: boolean;
  /** The final goal holds at `endStep`. */
  readonly isFinal: boolean;
  /** Greedy achievement steps recorded by sequential-yield search. */
  readonly yieldSteps: ReadonlyArray<StageAchievement>;
  readonly statistics: SolveStatistics;
}

/** A solved partial problem, reported as soon as it is produced. */
export interface PlanResult {
  readonly level: number;
  /** Division tree node the partial belongs to. */
  readonly node: number;
  /** 1-based partial number within its node. */
  readonly partial: number;
  readonly range: StageRange;
  readonly plan: MonolevelPlan;
  /** Steps committed by this partial; later partials never revise them. */
  readonly committed: { readonly fromStep: number; readonly toStep: number };
  readonly isFinal: boolean;
  /** Running count of plans produced at this level. */
  readonly increment: number;
  /** Milliseconds since the run started. */
  readonly elapsedMs: number;
}

// ── Observability ────────────────────────────────────────────────────────────

export type ControllerState =
  | "solving-top"
  | "dividing"
  | "solving-partial"
  | "refining"
  | "complete"
  | "failed";

/**
 * Optional callbacks for observing a planning run. All hooks are
 * synchronous and their return values are ignored.
 */
export interface PlannerHooks {
  /** Called whenever the refinement controller changes state. */
  onStateChange?: (state: ControllerState, level: number) => void;
  /** Called after each oracle call. */
  onSolveAttempt?: (level: number, bound: number, status: "model" | "unsat" | "error") => void;
  /** Called after each sequential-yield increment that achieves a stage. */
  onStageAchieved?: (level: number, achievement: StageAchievement) => void;
  /** Called when a range of stages is divided into partial problems. */
  onDivision?: (level: number, range: StageRange, partials: number) => void;
  /** Called when a reactive division is committed during search. */
  onReactiveDivision?: (level: number, index: number, interrupting: boolean) => void;
  /** Called for every solved partial problem at every level. */
  onPartialSolved?: (result: PlanResult) => void;
  /** Called for every ground-level plan handed to the executor. */
  onYield?: (result: PlanResult) => void;
}
