/**
 * Experiment configuration schema.
 *
 * An experiment names its pipeline plus per-stage search, reduction and
 * resource settings. Every per-stage table is keyed by stage name and may
 * only name stages the pipeline declares. The loaded configuration is
 * frozen and stays unchanged for the whole run.
 */

import { z } from "zod";
import { isIntegerLikeStageName } from "../../pipeline/graph.js";
import type { JsonValue } from "../../pipeline/types.js";
import { InvalidBudgetError, isValidBudgetCount } from "../../resources/budget.js";

export const DEFAULT_SAVE_PATH = "stagewise_output";

/**
 * Stage names may not contain dots or whitespace: link targets use dots to
 * separate the stage name from the output path. Integer-like names are
 * rejected because object keys of that form lose their declared order.
 */
export const StageNameSchema = z
  .string()
  .min(1)
  .regex(/^[^.\s]+$/, "Stage names may not contain dots or whitespace")
  .refine((name) => !isIntegerLikeStageName(name), {
    message: "Stage names may not be integers; declared order would be lost",
  });

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const GridAlgorithmSchema = z
  .object({
    type: z.literal("grid"),
  })
  .strict();

export const RandomAlgorithmSchema = z
  .object({
    type: z.literal("random"),
    /** Number of configurations to sample */
    trials: z.number().int().min(1).describe("Number of sampled configurations"),
    /** Seed for reproducible sampling */
    seed: z.number().int().optional().describe("Sampling seed (default 0)"),
  })
  .strict();

/**
 * Search algorithm for one stage. Absent means exhaustive grid search.
 */
export const AlgorithmConfigSchema = z.discriminatedUnion("type", [
  GridAlgorithmSchema,
  RandomAlgorithmSchema,
]);

export type AlgorithmConfig = z.infer<typeof AlgorithmConfigSchema>;

/** Number of best trials a stage keeps for downstream stages. */
export const ReduceCountSchema = z.number().int().min(1);

const stageTable = <T extends z.ZodTypeAny>(value: T) =>
  z.record(StageNameSchema, value).default({});

export const ExperimentConfigSchema = z
  .object({
    name: z.string().min(1).describe("Experiment name"),

    savePath: z
      .string()
      .min(1)
      .default(DEFAULT_SAVE_PATH)
      .describe("Directory receiving run output and logs"),

    pipeline: z
      .record(StageNameSchema, JsonValueSchema)
      .refine((pipeline) => Object.keys(pipeline).length > 0, {
        message: "Pipeline must declare at least one stage",
      })
      .describe("Stage name → stage specification, in dependency order"),

    algorithm: stageTable(AlgorithmConfigSchema).describe(
      "Per-stage search algorithm; grid search when absent"
    ),

    reduce: stageTable(ReduceCountSchema).describe(
      "Per-stage number of best trials to keep; all trials when absent"
    ),

    cpusPerTrial: stageTable(z.number()).describe(
      "Per-stage CPU budget; 1 when absent"
    ),

    gpusPerTrial: stageTable(z.number()).describe(
      "Per-stage GPU budget; 0 when absent"
    ),
  })
  .strict()
  .superRefine((experiment, ctx) => {
    const tables = ["algorithm", "reduce", "cpusPerTrial", "gpusPerTrial"] as const;
    for (const table of tables) {
      for (const stage of Object.keys(experiment[table])) {
        if (!Object.hasOwn(experiment.pipeline, stage)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [table, stage],
            message: `Unknown stage "${stage}"`,
          });
        }
      }
    }

    const budgets = [
      ["cpusPerTrial", "cpus"],
      ["gpusPerTrial", "gpus"],
    ] as const;
    for (const [table, resource] of budgets) {
      for (const [stage, value] of Object.entries(experiment[table])) {
        if (!isValidBudgetCount(resource, value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [table, stage],
            message: new InvalidBudgetError(stage, resource, value).message,
          });
        }
      }
    }
  });

export type ExperimentConfig = z.infer<typeof ExperimentConfigSchema>;

/** Configuration as written, before defaults are applied. */
export type ExperimentConfigInput = z.input<typeof ExperimentConfigSchema>;
