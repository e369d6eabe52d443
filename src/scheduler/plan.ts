/**
 * Submission planning.
 *
 * Walks the pipeline in declared order and records, per stage, everything
 * the submission loop needs. All configuration errors surface here, before
 * any stage is submitted.
 */

import {
  DEFAULT_ALGORITHM,
  type AlgorithmConfig,
} from "../config/experiment/index.js";
import { PipelineGraph, type PipelineSpec, type SubPipeline } from "../pipeline/index.js";
import {
  formatBudget,
  resolveBudget,
  validateBudgetTables,
  type BudgetTable,
  type ResourceBudget,
} from "../resources/index.js";
import { UnresolvedDependencyError } from "./errors.js";

export interface PlanInput {
  readonly pipeline: PipelineSpec;
  /** Per-stage search algorithm; grid when absent */
  readonly algorithm?: Readonly<Record<string, AlgorithmConfig>>;
  /** Per-stage number of trials to keep; all when absent */
  readonly reduce?: Readonly<Record<string, number>>;
  readonly cpusPerTrial?: BudgetTable;
  readonly gpusPerTrial?: BudgetTable;
}

export interface PlannedStage {
  readonly stage: string;
  readonly pipeline: SubPipeline;
  readonly dependencies: readonly string[];
  readonly algorithm: AlgorithmConfig;
  readonly reduction: number | undefined;
  readonly budget: ResourceBudget;
}

function lookup<T>(table: Readonly<Record<string, T>> | undefined, stage: string): T | undefined {
  return table !== undefined && Object.hasOwn(table, stage) ? table[stage] : undefined;
}

/**
 * @throws UnknownReferenceError if a stage links to a stage not in the pipeline
 * @throws PipelineCycleError if links form a cycle
 * @throws InvalidBudgetError on a malformed budget entry
 * @throws UnresolvedDependencyError if a stage is declared before a dependency
 */
export function planSubmissions(input: PlanInput): PlannedStage[] {
  const graph = PipelineGraph.create(input.pipeline);
  validateBudgetTables(input.cpusPerTrial, input.gpusPerTrial);

  const planned = new Set<string>();
  const plan: PlannedStage[] = [];

  for (const stage of graph.stageNames()) {
    const pipeline = graph.subPipeline(stage);

    for (const dependency of pipeline.dependencies) {
      if (!planned.has(dependency)) {
        throw new UnresolvedDependencyError(stage, dependency);
      }
    }

    plan.push(
      Object.freeze({
        stage,
        pipeline,
        dependencies: pipeline.dependencies,
        algorithm: lookup(input.algorithm, stage) ?? DEFAULT_ALGORITHM,
        reduction: lookup(input.reduce, stage),
        budget: resolveBudget(stage, input.cpusPerTrial, input.gpusPerTrial),
      })
    );
    planned.add(stage);
  }

  return plan;
}

/**
 * One line per stage: order, name, dependencies, budget, search.
 */
export function formatPlan(plan: readonly PlannedStage[]): string {
  return plan
    .map((entry, index) => {
      const deps = entry.dependencies.length > 0 ? entry.dependencies.join(", ") : "-";
      const keep = entry.reduction === undefined ? "all" : `top ${entry.reduction}`;
      return `${index + 1}. ${entry.stage}  deps: ${deps}  budget: ${formatBudget(entry.budget)}  search: ${entry.algorithm.type}  keep: ${keep}`;
    })
    .join("\n");
}
