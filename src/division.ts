import type { StageRange } from "./types";

// ── Blend ────────────────────────────────────────────────────────────────────

/**
 * A blend quantity: an absolute number of stages, or a fraction in (0, 1]
 * of the neighbouring partial problem's nominal size (rounded down).
 */
export type BlendQuantity = number | { readonly fraction: number };

/**
 * Stage overlap shared between neighbouring partial problems. The left
 * quantity extends the partial to the right of a division point backwards;
 * the right quantity extends the partial to its left forwards.
 */
export class Blend {
  static readonly none = new Blend(0, 0);

  constructor(
    readonly left: BlendQuantity = 0,
    readonly right: BlendQuantity = 0
  ) {}

  /** Number of stages a quantity amounts to next to a neighbour of `neighbourSize` stages. */
  static resolve(quantity: BlendQuantity, neighbourSize: number): number {
    const size = Math.max(0, neighbourSize);
    const amount = typeof quantity === "number"
      ? Math.floor(quantity)
      : Math.floor(quantity.fraction * size);
    return Math.min(Math.max(0, amount), size);
  }
}

// ── Division points ──────────────────────────────────────────────────────────

export interface DivisionPointOptions {
  readonly blend?: Blend;
  /** Copied from a division of the level above. */
  readonly inherited?: boolean;
  /** Plan step at which a reactive division was committed. Absent for proactive points. */
  readonly reactiveStep?: number;
  /** Reactive only: the solve was halted at this point. */
  readonly interrupting?: boolean;
  /** Reactive only: committed before the stage was uniquely achieved. */
  readonly preemptive?: boolean;
}

/**
 * A split after stage `index`: the partial on the left ends at `index`
 * and the partial on the right starts at `index + 1`.
 */
export class DivisionPoint {
  readonly index: number;
  readonly blend: Blend;
  readonly inherited: boolean;
  readonly reactiveStep?: number;
  readonly interrupting: boolean;
  readonly preemptive: boolean;

  constructor(index: number, options: DivisionPointOptions = {}) {
    this.index = index;
    this.reactiveStep = options.reactiveStep;
    // Reactive points never blend.
    this.blend = options.reactiveStep === undefined ? options.blend ?? Blend.none : Blend.none;
    this.inherited = options.inherited ?? false;
    this.interrupting = options.interrupting ?? false;
    this.preemptive = options.preemptive ?? false;
  }

  get proactive(): boolean {
    return this.reactiveStep === undefined;
  }

  get reactive(): boolean {
    return !this.proactive;
  }

  /** Whether the point starts a new partial problem. Continuous points only record progress. */
  get shifting(): boolean {
    return this.proactive || this.interrupting;
  }
}

// ── Scenarios ────────────────────────────────────────────────────────────────

/**
 * One decision splitting the stage range `first..last` of a level into
 * an ordered sequence of partial problems.
 */
export class DivisionScenario {
  private readonly _points: DivisionPoint[];

  constructor(
    readonly level: number,
    readonly first: number,
    readonly last: number,
    points: ReadonlyArray<DivisionPoint> = []
  ) {
    for (const point of points) this.assertInside(point);
    this._points = [...points].sort((a, b) => a.index - b.index);
  }

  get points(): ReadonlyArray<DivisionPoint> {
    return this._points;
  }

  get shiftingPoints(): ReadonlyArray<DivisionPoint> {
    return this._points.filter((point) => point.shifting);
  }

  /** Number of partial problems the scenario produces. */
  get problemCount(): number {
    return this.shiftingPoints.length + 1;
  }

  get size(): number {
    return Math.max(0, this.last - this.first + 1);
  }

  /**
   * Stage range of partial problem `problem` (1-based). Nominal ranges
   * partition `first..last`; blended ranges overlap their neighbours.
   */
  getStageRange(problem: number, ignoreBlend = false): StageRange {
    const shifting = this.shiftingPoints;
    if (!Number.isInteger(problem) || problem < 1 || problem > shifting.length + 1) {
      throw new RangeError(`Partial problem ${problem} is outside 1..${shifting.length + 1}`);
    }
    const bounds = [this.first - 1, ...shifting.map((point) => point.index), this.last];
    const nominal = { first: bounds[problem - 1] + 1, last: bounds[problem] };
    if (ignoreBlend) return nominal;

    let first = nominal.first;
    let last = nominal.last;
    if (problem > 1) {
      const point = shifting[problem - 2];
      const previousSize = bounds[problem - 1] - bounds[problem - 2];
      first -= Blend.resolve(point.blend.left, previousSize);
    }
    if (problem <= shifting.length) {
      const point = shifting[problem - 1];
      const nextSize = bounds[problem + 1] - bounds[problem];
      last += Blend.resolve(point.blend.right, nextSize);
    }
    return { first: Math.max(first, this.first), last: Math.min(last, this.last) };
  }

  /** Adds a point inherited from the level above unless one exists at its index. */
  addInherited(index: number): void {
    if (index < this.first || index >= this.last) return;
    if (this._points.some((point) => point.index === index && point.shifting)) return;
    this.insert(new DivisionPoint(index, { inherited: true }));
  }

  /**
   * Records a division committed while solving partial problem `problem`.
   * An interrupting point inside that partial's nominal range splits it in
   * two; one inside its right blend replaces the point that ends it. One
   * inside its left blend, or where a shifting point already exists, is
   * ignored.
   *
   * @returns Whether the number of partial problems grew.
   */
  updateReactively(point: DivisionPoint, problem: number): boolean {
    this.assertInside(point);
    if (!point.interrupting) {
      this.insert(point);
      return false;
    }
    const nominal = this.getStageRange(problem, true);
    if (point.index < nominal.first || this.shiftingPoints.some((existing) => existing.index === point.index)) {
      return false;
    }
    if (point.index < nominal.last) {
      this.insert(point);
      return true;
    }
    const owner = this.shiftingPoints[problem - 1];
    this._points.splice(this._points.indexOf(owner), 1);
    this.insert(point);
    return false;
  }

  private insert(point: DivisionPoint): void {
    const at = this._points.findIndex((existing) => existing.index > point.index);
    if (at === -1) this._points.push(point);
    else this._points.splice(at, 0, point);
  }

  private assertInside(point: DivisionPoint): void {
    if (point.index < this.first || point.index >= this.last) {
      throw new RangeError(
        `Division point ${point.index} is outside ${this.first}..${this.last - 1} of level ${this.level}`
      );
    }
  }
}

/**
 * Evenly spreads `problems` partial problems over `size` stages starting at
 * `first`. Smaller partials of `⌊size / problems⌋` stages come first,
 * followed by `size mod problems` partials one stage larger.
 *
 * @returns The `problems - 1` division points.
 */
export function makeHomogenousDivisions(
  problems: number,
  size: number,
  first: number,
  blend: Blend = Blend.none
): DivisionPoint[] {
  const count = Math.min(Math.max(1, Math.floor(problems)), Math.max(1, size));
  const small = Math.floor(size / count);
  const large = size % count;
  const points: DivisionPoint[] = [];
  let end = first - 1;
  for (let problem = 1; problem < count; problem++) {
    end += problem <= count - large ? small : small + 1;
    points.push(new DivisionPoint(end, { blend }));
  }
  return points;
}
