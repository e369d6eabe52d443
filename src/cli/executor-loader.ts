/**
 * Load a TrialExecutor from a module on disk.
 *
 * The module must export the executor as `executeTrial` or as its default
 * export. Its return value is validated on every call.
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";

import { JsonValueSchema } from "../config/experiment/index.js";
import type { TrialContext, TrialExecutor, TrialOutcome } from "../stage/index.js";

export class ExecutorLoadError extends Error {
  constructor(
    public readonly modulePath: string,
    message: string
  ) {
    super(message);
    this.name = "ExecutorLoadError";
  }
}

export class InvalidTrialOutcomeError extends Error {
  constructor(
    public readonly trialId: string,
    detail: string
  ) {
    super(`Executor returned an invalid outcome for ${trialId}: ${detail}`);
    this.name = "InvalidTrialOutcomeError";
  }
}

export const TrialOutcomeSchema = z
  .object({
    metric: z.number().finite(),
    output: JsonValueSchema,
  })
  .strict();

function pickExport(mod: unknown): unknown {
  if (typeof mod !== "object" || mod === null) {
    return undefined;
  }
  if ("executeTrial" in mod) {
    return mod.executeTrial;
  }
  if ("default" in mod) {
    return mod.default;
  }
  return undefined;
}

export async function loadTrialExecutor(modulePath: string): Promise<TrialExecutor> {
  const absolute = resolve(modulePath);

  let mod: unknown;
  try {
    mod = await import(pathToFileURL(absolute).href);
  } catch (err) {
    throw new ExecutorLoadError(
      absolute,
      `Cannot load executor module ${absolute}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const candidate = pickExport(mod);
  if (typeof candidate !== "function") {
    throw new ExecutorLoadError(
      absolute,
      `Executor module ${absolute} must export a function as "executeTrial" or default`
    );
  }

  return async (context: TrialContext): Promise<TrialOutcome> => {
    const raw: unknown = await candidate(context);
    const parsed = TrialOutcomeSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new InvalidTrialOutcomeError(context.trialId, detail);
    }
    return parsed.data;
  };
}
