import { formatBudget, type ResourceBudget } from "../resources/index.js";

export class RuntimeNotInitializedError extends Error {
  constructor() {
    super("Execution runtime is not initialized; call init() before submitting");
    this.name = "RuntimeNotInitializedError";
  }
}

export class InsufficientResourcesError extends Error {
  constructor(
    public readonly stage: string,
    public readonly requested: ResourceBudget,
    public readonly capacity: ResourceBudget
  ) {
    super(
      `Stage "${stage}" requests ${formatBudget(requested)}, ` +
        `but the runtime only has ${formatBudget(capacity)}`
    );
    this.name = "InsufficientResourcesError";
  }
}

/**
 * A task was not run because one of its dependencies failed.
 */
export class DependencyFailedError extends Error {
  constructor(
    public readonly stage: string,
    public readonly dependency: string,
    cause: unknown
  ) {
    super(`Stage "${stage}" not run: dependency "${dependency}" failed`, { cause });
    this.name = "DependencyFailedError";
  }
}
