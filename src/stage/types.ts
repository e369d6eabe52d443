/**
 * Stage execution boundary.
 */

import type { AlgorithmConfig } from "../config/experiment/index.js";
import type { Environment } from "../experiment/environment.js";
import type { JsonValue, SubPipeline } from "../pipeline/index.js";

export interface TrialResult {
  readonly id: string;
  /** Stage specification with links resolved and search options chosen */
  readonly params: JsonValue;
  /** Higher is better */
  readonly metric: number;
  readonly output: JsonValue;
}

export interface StageResult {
  readonly stage: string;
  /** Kept trials, best first */
  readonly trials: readonly TrialResult[];
}

/**
 * Everything a runner needs to execute one stage.
 */
export interface StageRequest {
  readonly name: string;
  readonly pipeline: SubPipeline;
  readonly algorithm: AlgorithmConfig;
  /** Number of best trials to keep; undefined keeps all */
  readonly reduction: number | undefined;
  readonly cpus: number;
  readonly gpus: number;
  readonly environment: Environment;
}

export interface StageRunner {
  /**
   * Execute one stage. `dependencies` holds the result of every direct
   * dependency, keyed by stage name.
   */
  run(
    request: StageRequest,
    dependencies: ReadonlyMap<string, StageResult>
  ): Promise<StageResult>;
}

export interface TrialContext {
  readonly stage: string;
  readonly trialId: string;
  readonly params: JsonValue;
  readonly cpus: number;
  readonly gpus: number;
  readonly environment: Environment;
}

export interface TrialOutcome {
  readonly metric: number;
  readonly output: JsonValue;
}

/**
 * The computation a trial performs.
 */
export type TrialExecutor = (context: TrialContext) => Promise<TrialOutcome>;
