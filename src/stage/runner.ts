/**
 * Trial-based stage runner.
 *
 * Runs one stage as a batch of trials:
 *
 *   1. Resolve links in the stage specification against the best trial of
 *      each dependency stage.
 *   2. Expand search options into trial configurations with the stage's
 *      algorithm.
 *   3. Execute each trial through the injected TrialExecutor, in order.
 *   4. Rank by metric and apply the stage's reduction.
 *
 * Any trial failure fails the stage.
 */

import { createSilentLogger, type Logger } from "../logging/index.js";
import {
  isJsonObject,
  resolveLinks,
  UnknownStageError,
  type JsonValue,
  type LinkTarget,
} from "../pipeline/index.js";
import { reduceTrials } from "./reduction.js";
import { createSearchAlgorithm } from "./search.js";
import type {
  StageRequest,
  StageResult,
  StageRunner,
  TrialExecutor,
  TrialResult,
} from "./types.js";

export class UnresolvedLinkError extends Error {
  constructor(
    public readonly stage: string,
    public readonly link: string,
    reason: string
  ) {
    super(`Stage "${stage}" cannot resolve link "${link}": ${reason}`);
    this.name = "UnresolvedLinkError";
  }
}

export class TrialFailedError extends Error {
  constructor(
    public readonly stage: string,
    public readonly trialId: string,
    cause: unknown
  ) {
    super(
      `Trial ${trialId} of stage "${stage}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "TrialFailedError";
  }
}

/**
 * Walk `path` into a JSON value. Numeric segments index arrays.
 */
export function selectPath(value: JsonValue, path: readonly string[]): JsonValue | undefined {
  let current: JsonValue | undefined = value;
  for (const segment of path) {
    if (Array.isArray(current)) {
      current = /^\d+$/.test(segment) ? current[Number(segment)] : undefined;
    } else if (current !== undefined && isJsonObject(current) && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

export class TrialStageRunner implements StageRunner {
  private readonly logger: Logger;

  constructor(
    private readonly executor: TrialExecutor,
    logger?: Logger
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  async run(
    request: StageRequest,
    dependencies: ReadonlyMap<string, StageResult>
  ): Promise<StageResult> {
    const spec = request.pipeline.stages[request.name];
    if (spec === undefined) {
      throw new UnknownStageError(request.name);
    }

    const resolved = resolveLinks(spec, (link) =>
      this.lookupLink(request.name, link, dependencies)
    );
    const candidates = createSearchAlgorithm(request.algorithm).propose(resolved);
    this.logger.debug("Stage trials proposed", {
      stage: request.name,
      algorithm: request.algorithm.type,
      trials: candidates.length,
    });

    const trials: TrialResult[] = [];
    for (const [index, params] of candidates.entries()) {
      const trialId = `${request.name}/trial-${index}`;
      try {
        const outcome = await this.executor({
          stage: request.name,
          trialId,
          params,
          cpus: request.cpus,
          gpus: request.gpus,
          environment: request.environment,
        });
        trials.push({ id: trialId, params, metric: outcome.metric, output: outcome.output });
      } catch (err) {
        throw new TrialFailedError(request.name, trialId, err);
      }
    }

    return Object.freeze({
      stage: request.name,
      trials: Object.freeze(reduceTrials(request.name, trials, request.reduction)),
    });
  }

  private lookupLink(
    stage: string,
    link: LinkTarget,
    dependencies: ReadonlyMap<string, StageResult>
  ): JsonValue {
    const upstream = dependencies.get(link.stage);
    if (upstream === undefined) {
      throw new UnresolvedLinkError(stage, link.raw, `no result for stage "${link.stage}"`);
    }
    const best = upstream.trials[0];
    if (best === undefined) {
      throw new UnresolvedLinkError(stage, link.raw, `stage "${link.stage}" kept no trials`);
    }
    const value = selectPath(best.output, link.path);
    if (value === undefined) {
      throw new UnresolvedLinkError(stage, link.raw, `path not found in output`);
    }
    return value;
  }
}

/**
 * Executor that scores every trial 0 and echoes its configuration as output.
 */
export const echoTrialExecutor: TrialExecutor = async ({ params }) => ({
  metric: 0,
  output: params,
});
