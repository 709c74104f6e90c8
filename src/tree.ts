import type { StageRange } from "./types";
import type { DivisionPoint, DivisionScenario } from "./division";

export type PartialStatus = "pending" | "solved" | "interrupted" | "failed";

/** A partial problem within a division scenario node. */
export interface PartialRecord {
  /** Node the partial belongs to. */
  readonly node: number;
  /** 1-based position within the node; renumbered when a reactive division splits a partial. */
  number: number;
  nominal: StageRange;
  blended: StageRange;
  status: PartialStatus;
  /** Includes the last stage of the level and must achieve the final goal. */
  final: boolean;
  /** Nodes at the level below that refine this partial's committed steps. */
  readonly refinedBy: number[];
  /** Steps of the level plan this partial committed. */
  committed?: { fromStep: number; toStep: number };
}

/** A division scenario and the partial problems it produced. */
export interface DivisionNode {
  readonly id: number;
  readonly level: number;
  readonly scenario: DivisionScenario;
  /** Partials one level up whose committed steps this node refines. */
  readonly sources: ReadonlyArray<{ readonly node: number; readonly partial: number }>;
  readonly partials: PartialRecord[];
}

/**
 * Arena of division scenario nodes. Nodes are referenced by index and
 * link to their refinements through their partial records.
 */
export class ProblemDivisionTree {
  private readonly _nodes: DivisionNode[] = [];

  get nodes(): ReadonlyArray<DivisionNode> {
    return this._nodes;
  }

  node(id: number): DivisionNode {
    const node = this._nodes[id];
    if (node === undefined) throw new RangeError(`Division tree has no node ${id}`);
    return node;
  }

  /** Nodes at `level`, in creation order. */
  atLevel(level: number): DivisionNode[] {
    return this._nodes.filter((node) => node.level === level);
  }

  /**
   * Adds a node for `scenario` and links it from every source partial.
   * The last partial is marked final when `final` is set.
   */
  addNode(scenario: DivisionScenario, sources: ReadonlyArray<PartialRecord>, final: boolean): DivisionNode {
    const id = this._nodes.length;
    const node: DivisionNode = {
      id,
      level: scenario.level,
      scenario,
      sources: sources.map((source) => ({ node: source.node, partial: source.number })),
      partials: [],
    };
    for (let number = 1; number <= scenario.problemCount; number++) {
      node.partials.push({
        node: id,
        number,
        nominal: scenario.getStageRange(number, true),
        blended: scenario.getStageRange(number),
        status: "pending",
        final: final && number === scenario.problemCount,
        refinedBy: [],
      });
    }
    for (const source of sources) source.refinedBy.push(id);
    this._nodes.push(node);
    return node;
  }

  /**
   * Applies a reactive division committed while solving `partial` and
   * resynchronises the node's records with its scenario.
   *
   * @returns The newly created partial, if the division created one.
   */
  divideReactively(partial: PartialRecord, point: DivisionPoint): PartialRecord | undefined {
    const node = this.node(partial.node);
    const grew = node.scenario.updateReactively(point, partial.number);
    let created: PartialRecord | undefined;
    if (grew) {
      created = {
        node: node.id,
        number: partial.number + 1,
        nominal: { first: point.index + 1, last: partial.nominal.last },
        blended: { first: point.index + 1, last: partial.blended.last },
        status: "pending",
        final: partial.final,
        refinedBy: [],
      };
      partial.final = false;
      node.partials.splice(partial.number, 0, created);
    }
    node.partials.forEach((record, i) => {
      record.number = i + 1;
      record.nominal = node.scenario.getStageRange(record.number, true);
      record.blended = node.scenario.getStageRange(record.number);
    });
    return created;
  }

  /** Number of partials at `level`, across all of its nodes. */
  partialCount(level: number): number {
    return this.atLevel(level).reduce((total, node) => total + node.partials.length, 0);
  }
}
