import type {
  AbstractionMapping,
  ActionSet,
  CondensedMapping,
  FluentLiteral,
  FluentState,
  StageLiteral,
  SubGoalStage,
  TaskingMapping,
} from "./types";
import { changedFluents } from "./state";

/** The slice of a solved level plan whose effects are to be sequenced. */
export interface EffectSource {
  readonly level: number;
  /** `states[s]` is the state at absolute step `s`. */
  readonly states: ReadonlyArray<FluentState>;
  /** `actions[s - 1]` is the action set planned at absolute step `s`. */
  readonly actions: ReadonlyArray<ActionSet>;
}

type StageMapper<M extends AbstractionMapping> = (
  effects: ReadonlyArray<FluentLiteral>,
  mapping: M
) => StageLiteral[][];

const single = (literal: FluentLiteral): StageLiteral => ({
  fluent: literal.fluent,
  values: [literal.value],
});

function mapRelaxed(effects: ReadonlyArray<FluentLiteral>): StageLiteral[][] {
  return [effects.map(single)];
}

const mapCondensed: StageMapper<CondensedMapping> = (effects, mapping) => [
  effects.map((literal) => {
    const members = Object.prototype.hasOwnProperty.call(mapping.entities, literal.value)
      ? mapping.entities[literal.value]
      : undefined;
    return { fluent: literal.fluent, values: members === undefined ? [literal.value] : [...members] };
  }),
];

const mapTasking: StageMapper<TaskingMapping> = (effects, mapping) => {
  const stages: StageLiteral[][] = [];
  const untasked: StageLiteral[] = [];
  for (const literal of effects) {
    const key = `${literal.fluent}=${literal.value}`;
    if (Object.prototype.hasOwnProperty.call(mapping.tasks, key)) {
      stages.push(...mapping.tasks[key].map((stage) => [...stage]));
    } else if (mapping.passthrough === true) {
      untasked.push(single(literal));
    }
  }
  if (untasked.length > 0) stages.push(untasked);
  return stages;
};

/** Maps the effects of one abstract step to zero or more ordered stages. */
export function mapEffects(
  effects: ReadonlyArray<FluentLiteral>,
  mapping: AbstractionMapping
): StageLiteral[][] {
  if (effects.length === 0) return [];
  switch (mapping.kind) {
    case "relaxed":
      return mapRelaxed(effects);
    case "condensed":
      return mapCondensed(effects, mapping);
    case "tasking":
      return mapTasking(effects, mapping);
  }
}

/**
 * Converts the effects of steps `fromStep + 1 .. toStep` of a solved plan
 * into the conformance constraint of the level below. Steps without
 * effects produce no stage. Stage indices continue from `nextIndex`.
 *
 * @example
 * ```ts
 * const stages = sequenceStages(parentPlan, 0, parentPlan.states.length - 1, { kind: "relaxed" }, 1);
 * ```
 */
export function sequenceStages(
  source: EffectSource,
  fromStep: number,
  toStep: number,
  mapping: AbstractionMapping,
  nextIndex: number
): SubGoalStage[] {
  const stages: SubGoalStage[] = [];
  let index = nextIndex;
  for (let step = fromStep + 1; step <= toStep; step++) {
    const effects = changedFluents(source.states[step - 1], source.states[step]);
    for (const literals of mapEffects(effects, mapping)) {
      stages.push({
        index,
        literals,
        source: { level: source.level, step, actions: source.actions[step - 1] ?? [] },
      });
      index += 1;
    }
  }
  return stages;
}
