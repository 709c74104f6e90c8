import type {
  AbstractionHierarchy,
  AbstractionLevel,
  AbstractionMapping,
  FinalGoal,
  FluentState,
} from "./types";
import { ConfigurationError } from "./errors";

/** Everything a loader supplies for one level, keyed by level index. */
export interface LevelDefinition<TTheory> {
  readonly theory: TTheory;
  readonly mapping?: AbstractionMapping;
  readonly initialState: FluentState;
  readonly finalGoal: FinalGoal;
}

/**
 * Supplies theory, mapping and initial-state/final-goal pairs per level.
 * Level 1 is the ground level; `levels()` lists every available index.
 */
export interface ProblemLoader<TTheory> {
  levels(): ReadonlyArray<number>;
  load(level: number): LevelDefinition<TTheory>;
}

function mappingIssues(level: number, mapping: AbstractionMapping): string[] {
  const issues: string[] = [];
  switch (mapping.kind) {
    case "relaxed":
      break;
    case "condensed":
      for (const [entity, members] of Object.entries(mapping.entities)) {
        if (members.length === 0) {
          issues.push(`level ${level}: condensed entity "${entity}" has no concrete members`);
        }
      }
      break;
    case "tasking":
      for (const [task, stages] of Object.entries(mapping.tasks)) {
        if (!/^[^=]+=[^=]+$/.test(task)) {
          issues.push(`level ${level}: task key "${task}" is not of the form fluent=value`);
        }
        if (stages.length === 0 || stages.some((stage) => stage.length === 0)) {
          issues.push(`level ${level}: task "${task}" maps to an empty stage`);
        }
        if (stages.some((stage) => stage.some((literal) => literal.values.length === 0))) {
          issues.push(`level ${level}: task "${task}" has a literal without values`);
        }
      }
      break;
  }
  return issues;
}

interface MappedLevel {
  readonly index: number;
  readonly mapping?: AbstractionMapping;
}

/**
 * Lists every structural problem of a stack of levels: gaps in the indices
 * from 1, a missing mapping below the top, a mapping at the top and
 * malformed mappings.
 */
export function hierarchyIssues(levels: ReadonlyArray<MappedLevel>): string[] {
  if (levels.length === 0) return ["hierarchy has no levels"];
  const sorted = [...levels].sort((a, b) => a.index - b.index);
  const issues: string[] = [];
  sorted.forEach((level, position) => {
    if (level.index !== position + 1) issues.push(`level ${position + 1} is missing`);
  });
  const top = sorted[sorted.length - 1].index;
  for (const { index, mapping } of sorted) {
    if (index === top && mapping !== undefined) {
      issues.push(`top level ${index} must not have an abstraction mapping`);
    } else if (index !== top && mapping === undefined) {
      issues.push(`level ${index} has no abstraction mapping to level ${index + 1}`);
    } else if (mapping !== undefined) {
      issues.push(...mappingIssues(index, mapping));
    }
  }
  return issues;
}

/**
 * Checks a hierarchy that may not have come from a {@link HierarchyBuilder}.
 *
 * @throws {ConfigurationError} listing every problem found.
 */
export function validateHierarchy<TTheory>(hierarchy: AbstractionHierarchy<TTheory>): void {
  const issues = hierarchyIssues(hierarchy.levels);
  const highest = hierarchy.levels.reduce((max, level) => Math.max(max, level.index), 0);
  if (hierarchy.levels.length > 0 && hierarchy.top !== highest) {
    issues.push(`top level is ${hierarchy.top} but the highest level is ${highest}`);
  }
  if (issues.length > 0) throw new ConfigurationError(issues);
}

/**
 * Incrementally assembles an {@link AbstractionHierarchy}. Levels may be
 * registered in any order; {@link HierarchyBuilder.build} validates the
 * stack and freezes it.
 *
 * @template TTheory - Domain theory reference handed to the solver oracle.
 *
 * @example
 * ```ts
 * const hierarchy = new HierarchyBuilder<MyTheory>()
 *   .registerLevel(1, { theory: ground, mapping: { kind: "relaxed" }, initialState, finalGoal })
 *   .registerLevel(2, { theory: abstract, initialState: abstractInitial, finalGoal: abstractGoal })
 *   .build();
 * ```
 */
export class HierarchyBuilder<TTheory> {
  private readonly definitions = new Map<number, LevelDefinition<TTheory>>();

  /**
   * Register the definition of one level. Overwrites any earlier
   * definition of the same index.
   *
   * @throws {ConfigurationError} if `index` is not a positive integer.
   */
  registerLevel(index: number, definition: LevelDefinition<TTheory>): this {
    if (!Number.isInteger(index) || index < 1) {
      throw new ConfigurationError([`level index ${index} must be a positive integer`]);
    }
    this.definitions.set(index, definition);
    return this;
  }

  /**
   * Checks that levels are contiguous from 1, that every level below the
   * top has a well-formed mapping and that the top level has none.
   *
   * @throws {ConfigurationError} listing every problem found.
   */
  validate(): this {
    const issues = hierarchyIssues(
      [...this.definitions.entries()].map(([index, definition]) => ({ index, mapping: definition.mapping }))
    );
    if (issues.length > 0) throw new ConfigurationError(issues);
    return this;
  }

  /** Validates and returns the immutable hierarchy. */
  build(): AbstractionHierarchy<TTheory> {
    this.validate();
    const levels: AbstractionLevel<TTheory>[] = [...this.definitions.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, definition]) =>
        Object.freeze({
          index,
          theory: definition.theory,
          mapping: definition.mapping,
          initialState: Object.freeze({ ...definition.initialState }),
          finalGoal: Object.freeze([...definition.finalGoal]),
        })
      );
    const frozen = Object.freeze(levels);
    return Object.freeze({
      levels: frozen,
      top: frozen.length,
      getLevel(index: number): AbstractionLevel<TTheory> {
        const level = frozen[index - 1];
        if (level === undefined) {
          throw new ConfigurationError([`level ${index} does not exist`]);
        }
        return level;
      },
    });
  }
}

/** Builds a hierarchy from every level a loader provides. */
export function buildHierarchy<TTheory>(loader: ProblemLoader<TTheory>): AbstractionHierarchy<TTheory> {
  const builder = new HierarchyBuilder<TTheory>();
  for (const index of loader.levels()) {
    builder.registerLevel(index, loader.load(index));
  }
  return builder.build();
}
