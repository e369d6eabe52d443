/**
 * Execution runtime boundary.
 *
 * The runtime is the substrate stages run on. Submission returns a handle
 * at once; the runtime, not the caller, holds a task back until the handles
 * it depends on have resolved.
 */

import type { ResourceBudget } from "../resources/index.js";

/**
 * Opaque reference to a submitted task. Usable both as a join target and as
 * a dependency of later submissions.
 */
export interface StageHandle<T = unknown> {
  readonly id: string;
  readonly stage: string;
  readonly result: Promise<T>;
}

export interface TaskSubmission<T, D = unknown> {
  /** Stage name, used for handle ids and error reporting */
  readonly name: string;
  /** Work to run once every dependency has resolved, given their results in order */
  readonly run: (dependencyResults: D[]) => Promise<T>;
  /** Handles that must resolve before `run` starts */
  readonly dependencies: readonly StageHandle<D>[];
  readonly resources: ResourceBudget;
}

export interface RuntimeInitOptions {
  /** Run one task at a time */
  readonly debug?: boolean;
}

/**
 * Process-wide runtime lifecycle. Initialised once before the first
 * submission and shut down after the last join.
 */
export interface RuntimeLifecycle {
  init(options?: RuntimeInitOptions): Promise<void>;
  shutdown(): Promise<void>;
  isInitialized(): boolean;
}

export interface ExecutionRuntime extends RuntimeLifecycle {
  /**
   * Submit a task. Never blocks; never starts `run` before its dependencies
   * resolve.
   */
  submit<T, D = unknown>(submission: TaskSubmission<T, D>): StageHandle<T>;

  /**
   * Wait for every handle. Resolves with results in handle order, or rejects
   * with the first failure to occur.
   */
  join<T>(handles: readonly StageHandle<T>[]): Promise<T[]>;

  /** Total resources; a task asking for more can never be admitted. */
  capacity(): ResourceBudget;
}
