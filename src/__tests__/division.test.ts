import { Blend, DivisionPoint, DivisionScenario, makeHomogenousDivisions } from "../division";

const ranges = (scenario: DivisionScenario, ignoreBlend = false) =>
  Array.from({ length: scenario.problemCount }, (_, i) => scenario.getStageRange(i + 1, ignoreBlend));

// ── Blend ────────────────────────────────────────────────────────────────────

describe("Blend – resolve", () => {
  it("clamps absolute quantities to the neighbour size", () => {
    expect(Blend.resolve(2, 5)).toBe(2);
    expect(Blend.resolve(7, 5)).toBe(5);
    expect(Blend.resolve(-1, 5)).toBe(0);
  });

  it("rounds fractional quantities down", () => {
    expect(Blend.resolve({ fraction: 0.5 }, 5)).toBe(2);
    expect(Blend.resolve({ fraction: 1 }, 0)).toBe(0);
  });
});

// ── Division points ──────────────────────────────────────────────────────────

describe("DivisionPoint", () => {
  it("is proactive and shifting without a reactive step", () => {
    const point = new DivisionPoint(3, { blend: new Blend(1, 1) });
    expect(point.proactive).toBe(true);
    expect(point.shifting).toBe(true);
    expect(point.blend.left).toBe(1);
  });

  it("never blends when reactive", () => {
    const point = new DivisionPoint(3, { reactiveStep: 4, blend: new Blend(1, 1) });
    expect(point.reactive).toBe(true);
    expect(point.blend).toBe(Blend.none);
  });

  it("shifts only when interrupting if reactive", () => {
    expect(new DivisionPoint(3, { reactiveStep: 4 }).shifting).toBe(false);
    expect(new DivisionPoint(3, { reactiveStep: 4, interrupting: true }).shifting).toBe(true);
  });
});

// ── Scenarios ────────────────────────────────────────────────────────────────

describe("DivisionScenario – stage ranges", () => {
  it("partitions the range at each point", () => {
    const scenario = new DivisionScenario(1, 1, 6, [new DivisionPoint(4), new DivisionPoint(2)]);
    expect(scenario.problemCount).toBe(3);
    expect(ranges(scenario)).toEqual([
      { first: 1, last: 2 },
      { first: 3, last: 4 },
      { first: 5, last: 6 },
    ]);
  });

  it("extends blended ranges into their neighbours", () => {
    const blend = new Blend(1, 1);
    const scenario = new DivisionScenario(1, 1, 6, [
      new DivisionPoint(2, { blend }),
      new DivisionPoint(4, { blend }),
    ]);
    expect(ranges(scenario)).toEqual([
      { first: 1, last: 3 },
      { first: 2, last: 5 },
      { first: 4, last: 6 },
    ]);
    expect(ranges(scenario, true)).toEqual([
      { first: 1, last: 2 },
      { first: 3, last: 4 },
      { first: 5, last: 6 },
    ]);
  });

  it("resolves fractional blends against the neighbour's nominal size", () => {
    const scenario = new DivisionScenario(1, 1, 10, [
      new DivisionPoint(4, { blend: new Blend({ fraction: 0.5 }, 0) }),
    ]);
    expect(ranges(scenario)).toEqual([
      { first: 1, last: 4 },
      { first: 3, last: 10 },
    ]);
  });

  it("never blends past the neighbour or the scenario bounds", () => {
    const scenario = new DivisionScenario(1, 1, 4, [new DivisionPoint(2, { blend: new Blend(10, 10) })]);
    expect(ranges(scenario)).toEqual([
      { first: 1, last: 4 },
      { first: 1, last: 4 },
    ]);
  });

  it("describes an empty range as a single empty partial", () => {
    const scenario = new DivisionScenario(2, 1, 0);
    expect(scenario.size).toBe(0);
    expect(scenario.getStageRange(1)).toEqual({ first: 1, last: 0 });
  });

  it("rejects unknown partials and points outside the range", () => {
    const scenario = new DivisionScenario(1, 1, 6, [new DivisionPoint(3)]);
    expect(() => scenario.getStageRange(0)).toThrow(RangeError);
    expect(() => scenario.getStageRange(3)).toThrow(RangeError);
    expect(() => new DivisionScenario(1, 1, 6, [new DivisionPoint(6)])).toThrow(RangeError);
  });
});

describe("DivisionScenario – inherited points", () => {
  it("adds a point unless one already splits there", () => {
    const scenario = new DivisionScenario(1, 1, 6, [new DivisionPoint(3)]);
    scenario.addInherited(3);
    scenario.addInherited(6);
    scenario.addInherited(1);

    expect(scenario.points.map((point) => point.index)).toEqual([1, 3]);
    expect(scenario.points[0].inherited).toBe(true);
    expect(scenario.problemCount).toBe(3);
  });
});

describe("DivisionScenario – reactive updates", () => {
  it("records continuous points without adding partials", () => {
    const scenario = new DivisionScenario(1, 1, 6);
    expect(scenario.updateReactively(new DivisionPoint(2, { reactiveStep: 3 }), 1)).toBe(false);
    expect(scenario.points).toHaveLength(1);
    expect(scenario.problemCount).toBe(1);
  });

  it("splits the partial when interrupted inside its nominal range", () => {
    const scenario = new DivisionScenario(1, 1, 6, [new DivisionPoint(4)]);
    const added = scenario.updateReactively(new DivisionPoint(2, { reactiveStep: 2, interrupting: true }), 1);

    expect(added).toBe(true);
    expect(ranges(scenario)).toEqual([
      { first: 1, last: 2 },
      { first: 3, last: 4 },
      { first: 5, last: 6 },
    ]);
  });

  it("ignores an interruption at the partial's own boundary", () => {
    const scenario = new DivisionScenario(1, 1, 6, [new DivisionPoint(4)]);
    expect(scenario.updateReactively(new DivisionPoint(4, { reactiveStep: 5, interrupting: true }), 1)).toBe(false);
    expect(scenario.points).toHaveLength(1);
  });

  it("ignores an interruption inside the left blend", () => {
    const scenario = new DivisionScenario(1, 1, 6, [new DivisionPoint(3, { blend: new Blend(2, 0) })]);
    expect(scenario.getStageRange(2)).toEqual({ first: 2, last: 6 });

    expect(scenario.updateReactively(new DivisionPoint(2, { reactiveStep: 2, interrupting: true }), 2)).toBe(false);
    expect(scenario.updateReactively(new DivisionPoint(3, { reactiveStep: 3, interrupting: true }), 2)).toBe(false);
    expect(scenario.points.map((point) => point.index)).toEqual([3]);
    expect(ranges(scenario, true)).toEqual([
      { first: 1, last: 3 },
      { first: 4, last: 6 },
    ]);
  });

  it("moves the boundary when interrupted inside the right blend", () => {
    const scenario = new DivisionScenario(1, 1, 6, [new DivisionPoint(3, { blend: new Blend(0, 2) })]);
    expect(scenario.getStageRange(1)).toEqual({ first: 1, last: 5 });

    const added = scenario.updateReactively(new DivisionPoint(4, { reactiveStep: 6, interrupting: true }), 1);

    expect(added).toBe(false);
    expect(ranges(scenario)).toEqual([
      { first: 1, last: 4 },
      { first: 5, last: 6 },
    ]);
  });
});

// ── Homogenous divisions ─────────────────────────────────────────────────────

describe("makeHomogenousDivisions", () => {
  it("puts the smaller partials first", () => {
    expect(makeHomogenousDivisions(2, 5, 1).map((point) => point.index)).toEqual([2]);
    expect(makeHomogenousDivisions(3, 7, 1).map((point) => point.index)).toEqual([2, 4]);
  });

  it("never makes more partials than stages", () => {
    expect(makeHomogenousDivisions(5, 3, 1).map((point) => point.index)).toEqual([1, 2]);
    expect(makeHomogenousDivisions(0, 5, 1)).toEqual([]);
  });

  it("offsets points by the first stage and attaches the blend", () => {
    const blend = new Blend(1, 0);
    const points = makeHomogenousDivisions(2, 4, 4, blend);
    expect(points.map((point) => point.index)).toEqual([5]);
    expect(points[0].blend).toBe(blend);
  });
});
