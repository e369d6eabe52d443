/**
 * Per-stage resource budgets.
 *
 * Budgets are advisory: they are handed to the execution runtime, whose
 * admission control decides when a stage may start. A stage without an
 * entry gets DEFAULT_BUDGET.
 */

export interface ResourceBudget {
  readonly cpus: number;
  readonly gpus: number;
}

/** Stage name → count, for one resource kind. */
export type BudgetTable = Readonly<Record<string, number>>;

export type ResourceKind = keyof ResourceBudget;

export const DEFAULT_BUDGET: ResourceBudget = Object.freeze({ cpus: 1, gpus: 0 });

export class InvalidBudgetError extends Error {
  constructor(
    public readonly stage: string,
    public readonly resource: ResourceKind,
    public readonly value: unknown
  ) {
    super(
      `Invalid ${resource} budget for stage "${stage}": ${String(value)} ` +
        `(${resource === "cpus" ? "must be a positive number" : "must be a non-negative number"})`
    );
    this.name = "InvalidBudgetError";
  }
}

/**
 * A count is a finite number; CPUs must be positive, GPUs non-negative.
 */
export function isValidBudgetCount(resource: ResourceKind, value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isFinite(value) &&
    (resource === "cpus" ? value > 0 : value >= 0)
  );
}

function checkCount(stage: string, resource: ResourceKind, value: unknown): number {
  if (!isValidBudgetCount(resource, value)) {
    throw new InvalidBudgetError(stage, resource, value);
  }
  return value;
}

function lookup(
  table: BudgetTable,
  stage: string,
  resource: ResourceKind
): number {
  if (!Object.hasOwn(table, stage)) {
    return DEFAULT_BUDGET[resource];
  }
  return checkCount(stage, resource, table[stage]);
}

/**
 * Resolve the budget for one stage.
 *
 * @throws InvalidBudgetError on a negative or non-finite count, or zero CPUs
 */
export function resolveBudget(
  stage: string,
  cpusPerStage: BudgetTable = {},
  gpusPerStage: BudgetTable = {}
): ResourceBudget {
  return Object.freeze({
    cpus: lookup(cpusPerStage, stage, "cpus"),
    gpus: lookup(gpusPerStage, stage, "gpus"),
  });
}

/**
 * Check every entry of both tables, including entries for stages that are
 * never looked up.
 */
export function validateBudgetTables(
  cpusPerStage: BudgetTable = {},
  gpusPerStage: BudgetTable = {}
): void {
  for (const [stage, value] of Object.entries(cpusPerStage)) {
    checkCount(stage, "cpus", value);
  }
  for (const [stage, value] of Object.entries(gpusPerStage)) {
    checkCount(stage, "gpus", value);
  }
}

export function fitsWithin(request: ResourceBudget, capacity: ResourceBudget): boolean {
  return request.cpus <= capacity.cpus && request.gpus <= capacity.gpus;
}

export function formatBudget(budget: ResourceBudget): string {
  return `${budget.cpus} CPU / ${budget.gpus} GPU`;
}
