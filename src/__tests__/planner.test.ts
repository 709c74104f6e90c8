import { createPlanner } from "../planner";
import type { PlannerConfig } from "../planner";
import type { AbstractionHierarchy, ActionSet, PlanResult } from "../types";
import type { PlannerOptionsInput } from "../config";
import {
  ConfigurationError,
  HcrError,
  PlanningCancelledError,
  PlanningFailureError,
  RefinementFailureError,
} from "../errors";
import { BreadthFirstOracle } from "./fixtures/oracle";
import type { TestTheory } from "./fixtures/oracle";
import {
  ROOMS,
  blocksAbstract,
  blocksGround,
  goal,
  hierarchyOf,
  lampAbstract,
  lampGround,
  roomsAbstract,
  roomsGround,
} from "./fixtures/domains";

// ── Helper fixtures ───────────────────────────────────────────────────────────

const act = (action: string): ActionSet => [{ agent: "robot", action }];

const BLOCKS_PLAN = [act("unstack(A,B)"), act("putdown(A)"), act("unstack(B,C)"), act("stack(B,A)")];

function blocks(options: PlannerOptionsInput = {}): PlannerConfig<TestTheory> {
  return { hierarchy: hierarchyOf(blocksGround(), blocksAbstract()), oracle: new BreadthFirstOracle(), options };
}

function threeLevelBlocks(options: PlannerOptionsInput): PlannerConfig<TestTheory> {
  return {
    hierarchy: hierarchyOf(blocksGround(), blocksAbstract({ kind: "relaxed" }), blocksAbstract()),
    oracle: new BreadthFirstOracle(),
    options,
  };
}

function lamp(options: PlannerOptionsInput = {}): PlannerConfig<TestTheory> {
  return { hierarchy: hierarchyOf(lampGround(), lampAbstract()), oracle: new BreadthFirstOracle(), options };
}

/** Ground results that handed steps to the executor. */
function yields(results: ReadonlyArray<PlanResult>): PlanResult[] {
  return results.filter(
    (result) => result.level === 1 && (result.committed.toStep > result.committed.fromStep || result.isFinal)
  );
}

/** The committed slice of each yielded plan, in order. */
function concatenate(results: ReadonlyArray<PlanResult>): ActionSet[] {
  return yields(results).flatMap((result) =>
    result.plan.actions.slice(
      result.committed.fromStep - result.plan.startStep,
      result.committed.toStep - result.plan.startStep
    )
  );
}

// ── Basic refinement ─────────────────────────────────────────────────────────

describe("createPlanner – undivided refinement", () => {
  it("refines the abstract plan into a ground plan", async () => {
    const result = await createPlanner(blocks()).plan();

    expect(result.success).toBe(true);
    if (!result.success) return;
    const { plan } = result;
    expect(plan.levels[1].actions).toEqual([act("move(A,table)"), act("move(B,A)")]);
    expect(plan.ground.actions).toEqual(BLOCKS_PLAN);
    expect(plan.ground.achievements).toEqual([
      { index: 1, step: 2 },
      { index: 2, step: 4 },
    ]);
    expect(plan.ground.isFinal).toBe(true);
    expect(plan.ground.trailing).toBe(false);
    expect(plan.ground.statistics.attempts).toBe(4);
    expect(plan.levels[1].statistics.attempts).toBe(2);
  });

  it("records the refinement in the division tree", async () => {
    const result = await createPlanner(blocks()).plan();

    if (!result.success) throw result.error;
    const { tree, results } = result.plan;
    expect(tree.nodes).toHaveLength(2);
    expect(tree.node(0).level).toBe(2);
    expect(tree.node(0).partials[0].refinedBy).toEqual([1]);
    expect(tree.node(1).sources).toEqual([{ node: 0, partial: 1 }]);
    expect(results.map((r) => r.level)).toEqual([2, 1]);
  });

  it("maps condensed entities to a disjunction and may end with trailing steps", async () => {
    const planner = createPlanner({
      hierarchy: hierarchyOf(roomsGround(ROOMS), roomsAbstract()),
      oracle: new BreadthFirstOracle(),
    });
    const result = await planner.plan();

    if (!result.success) throw result.error;
    expect(result.plan.ground.actions).toEqual([act("go(c2)"), act("go(c3)"), act("go(c4)")]);
    expect(result.plan.ground.achievements).toEqual([{ index: 1, step: 2 }]);
    expect(result.plan.ground.trailing).toBe(true);
  });

  it("plans a single level directly", async () => {
    const planner = createPlanner({
      hierarchy: hierarchyOf({ ...lampGround(), mapping: undefined }),
      oracle: new BreadthFirstOracle(),
    });
    const result = await planner.plan();

    if (!result.success) throw result.error;
    expect(result.plan.ground.actions).toEqual([act("go(c)"), act("press(c)")]);
    expect(result.plan.levels).toHaveLength(1);
  });
});

// ── Division ─────────────────────────────────────────────────────────────────

describe("createPlanner – divided refinement", () => {
  it("solves partial problems in order and yields each committed prefix", async () => {
    const result = await createPlanner(blocks({ division: { strategy: "steady", bound: 1 } })).plan();

    if (!result.success) throw result.error;
    const { ground, tree, results } = result.plan;
    expect(tree.atLevel(1)[0].partials.map((p) => p.nominal)).toEqual([
      { first: 1, last: 1 },
      { first: 2, last: 2 },
    ]);
    expect(yields(results).map((r) => r.committed)).toEqual([
      { fromStep: 0, toStep: 2 },
      { fromStep: 2, toStep: 4 },
    ]);
    expect(yields(results).map((r) => r.isFinal)).toEqual([false, true]);
    expect(ground.actions).toEqual(BLOCKS_PLAN);
  });

  it("yields plans whose concatenation is the ground plan", async () => {
    const result = await createPlanner(blocks({ division: { strategy: "steady", bound: 1 } })).plan();

    if (!result.success) throw result.error;
    expect(concatenate(result.plan.results)).toEqual(result.plan.ground.actions);
  });

  it("may lengthen the ground plan when partials cannot see ahead", async () => {
    const undivided = await createPlanner(lamp()).plan();
    const divided = await createPlanner(lamp({ division: { strategy: "steady", bound: 1 } })).plan();

    if (!undivided.success) throw undivided.error;
    if (!divided.success) throw divided.error;
    expect(undivided.plan.ground.actions).toEqual([act("go(c)"), act("press(c)")]);
    expect(divided.plan.ground.actions).toEqual([act("go(a)"), act("press(a)"), act("go(b)"), act("go(c)")]);
  });

  it("lets a blended partial revise uncommitted steps of its predecessor", async () => {
    const result = await createPlanner(
      lamp({ division: { strategy: "steady", bound: 1, blend: { left: 1 } } })
    ).plan();

    if (!result.success) throw result.error;
    const ground = result.plan.results.filter((r) => r.level === 1);
    expect(ground.map((r) => r.range)).toEqual([
      { first: 1, last: 1 },
      { first: 1, last: 2 },
    ]);
    expect(ground[0].committed).toEqual({ fromStep: 0, toStep: 0 });
    expect(yields(result.plan.results)).toHaveLength(1);
    expect(result.plan.ground.actions).toEqual([act("go(c)"), act("press(c)")]);
  });

  it("starts a blended partial's search at the length already planned", async () => {
    const oracle = new BreadthFirstOracle();
    const options: PlannerOptionsInput = {
      searchMode: "minimum-bound",
      division: { strategy: "steady", bound: 1, blend: { left: 1 } },
    };
    const result = await createPlanner({ ...lamp(options), oracle }).plan();

    if (!result.success) throw result.error;
    const ground = oracle.programs.filter((program) => program.level === 1);
    expect(ground.map((program) => [program.startStep, program.stages.length, program.bound])).toEqual([
      [0, 1, 1],
      [0, 1, 2],
      [0, 2, 2],
    ]);
    expect(result.plan.ground.actions).toEqual([act("go(c)"), act("press(c)")]);
  });

  it("never lengthens the ground plan by adding blend", async () => {
    const lengths: number[] = [];
    for (const left of [0, 1, { fraction: 1 }]) {
      const result = await createPlanner(lamp({ division: { strategy: "steady", bound: 1, blend: { left } } })).plan();
      if (!result.success) throw result.error;
      lengths.push(result.plan.ground.actions.length);
    }

    expect(lengths).toEqual([4, 2, 2]);
  });
});

// ── Online methods ───────────────────────────────────────────────────────────

describe("createPlanner – online methods", () => {
  const division = { strategy: "steady" as const, bound: 1 };

  it("ground-first refines as soon as a partial is available", async () => {
    const result = await createPlanner(threeLevelBlocks({ division })).plan();

    if (!result.success) throw result.error;
    expect(result.plan.results.map((r) => r.level)).toEqual([3, 2, 1, 2, 1]);
    expect(result.plan.ground.actions).toEqual(BLOCKS_PLAN);
  });

  it("complete-first finishes each level before descending", async () => {
    const result = await createPlanner(threeLevelBlocks({ division, onlineMethod: "complete-first" })).plan();

    if (!result.success) throw result.error;
    expect(result.plan.results.map((r) => r.level)).toEqual([3, 2, 2, 1, 1]);
    expect(result.plan.ground.actions).toEqual(BLOCKS_PLAN);
  });

  it("hybrid lets a level run ahead by the lookahead", async () => {
    const result = await createPlanner(
      threeLevelBlocks({ division, onlineMethod: "hybrid", lookahead: 1 })
    ).plan();

    if (!result.success) throw result.error;
    expect(result.plan.results.map((r) => r.level)).toEqual([3, 2, 2, 1, 1]);
  });
});

// ── Reactive division ────────────────────────────────────────────────────────

describe("createPlanner – reactive division", () => {
  it("interrupts a partial and continues with the remaining stages", async () => {
    const result = await createPlanner(
      blocks({
        searchMode: "sequential-yield",
        division: { strategy: "relentless", bound: { type: "stages", value: 1 } },
      })
    ).plan();

    if (!result.success) throw result.error;
    const { ground, tree, results } = result.plan;
    const node = tree.atLevel(1)[0];
    expect(node.scenario.points.map((p) => [p.index, p.reactiveStep, p.interrupting])).toEqual([[1, 2, true]]);
    expect(node.partials.map((p) => p.status)).toEqual(["interrupted", "solved"]);
    expect(node.partials.map((p) => p.final)).toEqual([false, true]);
    expect(yields(results).map((r) => r.committed)).toEqual([
      { fromStep: 0, toStep: 2 },
      { fromStep: 2, toStep: 4 },
    ]);
    expect(ground.yieldSteps).toEqual([
      { index: 1, step: 2 },
      { index: 2, step: 4 },
    ]);
    expect(ground.actions).toEqual(BLOCKS_PLAN);
  });
});

// ── Failures ─────────────────────────────────────────────────────────────────

describe("createPlanner – failures", () => {
  const contradictory = () => ({
    hierarchy: hierarchyOf({ ...blocksGround(goal({ "on(A)": "A" })), mapping: undefined }),
    oracle: new BreadthFirstOracle(),
  });

  it("reports an unsatisfiable top level", async () => {
    const result = await createPlanner(contradictory()).plan();

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(PlanningFailureError);
    if (!(result.error instanceof PlanningFailureError)) return;
    expect(result.error.reason).toBe("unsatisfiable");
  });

  it("stops at the length limit", async () => {
    const result = await createPlanner({ ...contradictory(), options: { search: { lengthLimit: 3 } } }).plan();

    if (result.success) throw new Error("expected a failure");
    expect(result.error).toBeInstanceOf(PlanningFailureError);
    if (!(result.error instanceof PlanningFailureError)) return;
    expect(result.error.reason).toBe("length-cap");
    expect(result.error.bound).toBe(3);
  });

  it("attributes a failed refinement to the partial problem", async () => {
    const unreachable = { kind: "condensed" as const, entities: { R1: ["c1", "c2"], R2: ["c5"] } };
    const planner = createPlanner({
      hierarchy: hierarchyOf(roomsGround(unreachable), roomsAbstract()),
      oracle: new BreadthFirstOracle(),
    });
    const result = await planner.plan();

    if (result.success) throw new Error("expected a failure");
    expect(result.error).toBeInstanceOf(RefinementFailureError);
    expect(result.error.problem).toEqual({ level: 1, partial: 1, range: { first: 1, last: 1 } });
    expect(result.error.cause).toBeInstanceOf(PlanningFailureError);
    expect(planner.state).toBe("failed");
    expect(planner.tree.atLevel(1)[0].partials[0].status).toBe("failed");
  });

  it("refuses to step after a failure until reset", async () => {
    const planner = createPlanner(contradictory());
    await planner.plan();

    await expect(planner.step()).rejects.toThrow(HcrError);
    planner.reset();
    expect(planner.state).toBe("solving-top");
  });

  it("ends with a cancellation when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await createPlanner(blocks()).plan(controller.signal);

    if (result.success) throw new Error("expected a failure");
    expect(result.error).toBeInstanceOf(PlanningCancelledError);
  });

  it("rejects invalid options before planning", () => {
    expect(() =>
      createPlanner(blocks({ division: { strategy: "relentless", bound: { type: "stages", value: 1 } } }))
    ).toThrow(ConfigurationError);
    expect(() => createPlanner(blocks({ lookahead: -1 }))).toThrow(ConfigurationError);
  });

  it("rejects a hand-built hierarchy before calling the oracle", () => {
    const oracle = new BreadthFirstOracle();
    const levels = [
      { ...lampGround(), mapping: undefined, index: 1 },
      { ...lampAbstract(), index: 2 },
    ];
    const hierarchy: AbstractionHierarchy<TestTheory> = {
      levels,
      top: 2,
      getLevel: (index) => levels[index - 1],
    };

    expect(() => createPlanner({ hierarchy, oracle })).toThrow(
      "Invalid configuration: level 1 has no abstraction mapping to level 2"
    );
    expect(oracle.programs).toHaveLength(0);
  });
});

// ── Stepping ─────────────────────────────────────────────────────────────────

describe("HcrPlanner – step", () => {
  it("returns ground results as they are committed", async () => {
    const planner = createPlanner(blocks({ division: { strategy: "steady", bound: 1 } }));

    expect(await planner.step()).toEqual([]);
    expect(planner.state).toBe("dividing");
    const first = await planner.step();
    expect(first.map((r) => r.committed)).toEqual([{ fromStep: 0, toStep: 2 }]);
    expect(planner.finished).toBe(false);
    const second = await planner.step();
    expect(second.map((r) => r.isFinal)).toEqual([true]);
    expect(planner.finished).toBe(true);
    expect(planner.state).toBe("complete");
    expect(await planner.step()).toEqual([]);
  });
});
