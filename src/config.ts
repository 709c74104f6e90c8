import { readFile } from "node:fs/promises";

import { parse as parseYaml } from "yaml";
import { z, ZodError } from "zod";

import { ConfigurationError } from "./errors";

// ── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULTS = {
  initialBound: 1,
  boundStep: 1,
  lengthLimit: 64,
  retryTimeoutFactor: 2,
  minimumSize: 2,
  lookahead: 0,
} as const;

// ── Division ─────────────────────────────────────────────────────────────────

export const blendQuantitySchema = z.union([
  z.number().int().min(0),
  z.object({ fraction: z.number().gt(0).max(1) }),
]);

export const blendSchema = z
  .object({
    left: blendQuantitySchema.default(0),
    right: blendQuantitySchema.default(0),
  })
  .default({});

export const sizeBoundSchema = z.union([
  z.number().int().positive(),
  z.object({ fraction: z.number().gt(0).max(1) }),
  z.object({ derived: z.number().positive() }),
]);

export type SizeBound = z.infer<typeof sizeBoundSchema>;

export const reactiveBoundSchema = z.object({
  type: z.enum(["stages", "wall-time", "cumulative-time", "incremental-time"]),
  value: z.number().positive(),
});

export type ReactiveBound = z.infer<typeof reactiveBoundSchema>;

const proactiveFields = {
  blend: blendSchema,
  minimumSize: z.number().int().min(1).default(DEFAULTS.minimumSize),
};

const reactiveFields = {
  preemptive: z.boolean().default(false),
  backwardsHorizon: z.number().int().min(0).default(0),
};

export const divisionSchema = z.discriminatedUnion("strategy", [
  z.object({ strategy: z.literal("none") }),
  z.object({
    strategy: z.literal("basic"),
    problems: z.number().int().positive(),
    ...proactiveFields,
  }),
  z.object({
    strategy: z.literal("hasty"),
    bound: sizeBoundSchema,
    ...proactiveFields,
  }),
  z.object({
    strategy: z.literal("steady"),
    bound: sizeBoundSchema,
    maxProblems: z.number().int().positive().optional(),
    ...proactiveFields,
  }),
  z.object({
    strategy: z.literal("relentless"),
    bound: reactiveBoundSchema,
    interrupting: z.boolean().default(true),
    ...reactiveFields,
  }),
  z.object({
    strategy: z.literal("impetuous"),
    interruptBound: reactiveBoundSchema,
    continuousBound: reactiveBoundSchema,
    ...reactiveFields,
  }),
  z.object({
    strategy: z.literal("rapid"),
    problems: z.number().int().positive(),
    bound: reactiveBoundSchema,
    interrupting: z.boolean().default(true),
    ...proactiveFields,
    ...reactiveFields,
  }),
]);

export type DivisionOptions = z.infer<typeof divisionSchema>;

const REACTIVE_STRATEGIES: ReadonlyArray<DivisionOptions["strategy"]> = ["relentless", "impetuous", "rapid"];

// ── Search ───────────────────────────────────────────────────────────────────

export const searchSchema = z
  .object({
    initialBound: z.number().int().positive().default(DEFAULTS.initialBound),
    boundStep: z.number().int().positive().default(DEFAULTS.boundStep),
    /** Maximum plan length of a single solve, relative to its start step. */
    lengthLimit: z.number().int().positive().default(DEFAULTS.lengthLimit),
    /** Cumulative time limit of a single solve. */
    timeLimitMs: z.number().positive().optional(),
    /** Time limit of a single oracle call. */
    attemptTimeoutMs: z.number().positive().optional(),
    retryOnSolverError: z.boolean().default(false),
    retryTimeoutFactor: z.number().min(1).default(DEFAULTS.retryTimeoutFactor),
  })
  .default({});

export type SearchLimits = z.infer<typeof searchSchema>;

// ── Planner ──────────────────────────────────────────────────────────────────

export const plannerConfigSchema = z
  .object({
    searchMode: z.enum(["standard", "minimum-bound", "sequential-yield"]).default("standard"),
    achievement: z.enum(["sequential", "simultaneous"]).default("sequential"),
    actionPlanning: z.enum(["sequential", "concurrent"]).default("sequential"),
    onlineMethod: z.enum(["ground-first", "complete-first", "hybrid"]).default("ground-first"),
    /** Pending partials a level may run ahead by under the hybrid method. */
    lookahead: z.number().int().min(0).default(DEFAULTS.lookahead),
    /** Under complete-first, keep the parent's partial boundaries as division points. */
    inheritDivisions: z.boolean().default(true),
    division: divisionSchema.default({ strategy: "none" }),
    search: searchSchema,
    verbosity: z.enum(["disable", "minimal", "simple", "standard", "verbose"]).default("disable"),
  })
  .superRefine((config, ctx) => {
    if (REACTIVE_STRATEGIES.includes(config.division.strategy) && config.searchMode !== "sequential-yield") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["division", "strategy"],
        message: `reactive strategy "${config.division.strategy}" requires the sequential-yield search mode`,
      });
    }
  });

/** Validated planner options with every default applied. */
export type PlannerOptions = z.output<typeof plannerConfigSchema>;

/** Planner options as written by the user; omitted fields take their defaults. */
export type PlannerOptionsInput = z.input<typeof plannerConfigSchema>;

// ── Public API ───────────────────────────────────────────────────────────────

function toIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validate raw planner options and apply defaults.
 *
 * @throws {ConfigurationError} listing every invalid field.
 */
export function parsePlannerOptions(input: unknown = {}): PlannerOptions {
  const result = plannerConfigSchema.safeParse(input);
  if (!result.success) throw new ConfigurationError(toIssues(result.error));
  return result.data;
}

/**
 * Load planner options from a YAML (or `.json`) file.
 * Throws a {@link ConfigurationError} if the file is unparseable or invalid.
 */
export async function loadPlannerConfig(configPath: string): Promise<PlannerOptions> {
  const raw = await readFile(configPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = configPath.endsWith(".json") ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([`${configPath}: ${detail}`]);
  }

  return parsePlannerOptions(parsed ?? {});
}
