import { DependencyFailedError } from "../runtime/index.js";

/**
 * A stage was reached before one of its dependencies was submitted: the
 * declared order is not a topological order.
 */
export class UnresolvedDependencyError extends Error {
  constructor(
    public readonly stage: string,
    public readonly dependency: string
  ) {
    super(
      `Stage "${stage}" depends on "${dependency}", which is declared after it. ` +
        `Declare every stage after the stages it links to.`
    );
    this.name = "UnresolvedDependencyError";
  }
}

/**
 * A submitted stage failed. Aborts the run.
 */
export class StageExecutionError extends Error {
  constructor(
    public readonly stage: string,
    cause: unknown
  ) {
    super(
      `Stage "${stage}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "StageExecutionError";
  }
}

/**
 * Normalise a join failure to the StageExecutionError of the stage that
 * originally failed.
 */
export function toStageExecutionError(err: unknown, fallbackStage: string): StageExecutionError {
  if (err instanceof StageExecutionError) {
    return err;
  }
  if (err instanceof DependencyFailedError) {
    return toStageExecutionError(err.cause, err.dependency);
  }
  return new StageExecutionError(fallbackStage, err);
}
