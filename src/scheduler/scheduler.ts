/**
 * Experiment scheduler.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SUBMIT EAGERLY, JOIN ONCE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The scheduler walks the stages in declared order and submits each one to
 * the execution runtime as soon as it is reached. A stage's dependencies are
 * passed as the HANDLES returned for earlier submissions, never as resolved
 * results: the runtime holds the stage back until those handles resolve.
 * The loop itself never waits, so independent branches of the pipeline run
 * concurrently while dependent ones serialize through their handles.
 *
 * The only suspension point is the final join over every handle. The first
 * stage failure rejects the join and the run with a StageExecutionError;
 * stages still running are left to finish on the runtime. If the runtime
 * refuses a submission part way through, the stages already submitted are
 * abandoned the same way.
 */

import type { Environment } from "../experiment/environment.js";
import type { Logger } from "../logging/index.js";
import { fitsWithin } from "../resources/index.js";
import {
  InsufficientResourcesError,
  RuntimeNotInitializedError,
  type ExecutionRuntime,
  type StageHandle,
} from "../runtime/index.js";
import type { StageRequest, StageResult, StageRunner } from "../stage/index.js";
import {
  StageExecutionError,
  UnresolvedDependencyError,
  toStageExecutionError,
} from "./errors.js";
import { planSubmissions, type PlanInput, type PlannedStage } from "./plan.js";

export interface SchedulerRunInput extends PlanInput {
  readonly environment: Environment;
}

export interface ExperimentSummary {
  readonly runId: string;
  /** Stage names in submission order */
  readonly stages: readonly string[];
  readonly results: ReadonlyMap<string, StageResult>;
}

export interface SchedulerOptions {
  readonly runtime: ExecutionRuntime;
  readonly runner: StageRunner;
  readonly logger: Logger;
}

export class ExperimentScheduler {
  private readonly runtime: ExecutionRuntime;
  private readonly runner: StageRunner;
  private readonly logger: Logger;

  constructor(options: SchedulerOptions) {
    this.runtime = options.runtime;
    this.runner = options.runner;
    this.logger = options.logger;
  }

  /**
   * Submit every stage in dependency order and wait for all of them.
   *
   * @throws UnknownReferenceError, PipelineCycleError, InvalidBudgetError,
   *   UnresolvedDependencyError before any submission
   * @throws StageExecutionError if a stage fails
   */
  async run(input: SchedulerRunInput): Promise<ExperimentSummary> {
    const plan = planSubmissions(input);
    this.checkRuntime(plan);

    const handles = new Map<string, StageHandle<StageResult>>();
    try {
      for (const entry of plan) {
        handles.set(entry.stage, this.submit(entry, handles, input.environment));
      }
    } catch (err) {
      this.abandon(handles.values());
      throw err;
    }

    this.logger.info("All stages submitted", { stages: handles.size });

    let results: StageResult[];
    try {
      results = await this.runtime.join([...handles.values()]);
    } catch (err) {
      const failure = toStageExecutionError(err, "(unknown)");
      this.logger.error("Experiment failed", {
        stage: failure.stage,
        message: failure.message,
      });
      throw failure;
    }

    this.logger.info("Experiment completed", { stages: results.length });
    return Object.freeze({
      runId: input.environment.runId,
      stages: plan.map((entry) => entry.stage),
      results: new Map(plan.map((entry, index) => [entry.stage, results[index]])),
    });
  }

  /**
   * Stages already submitted keep running on the runtime but are never
   * joined; their failures are logged instead.
   */
  private abandon(handles: Iterable<StageHandle<StageResult>>): void {
    for (const handle of handles) {
      void handle.result.catch((err: unknown) => {
        this.logger.warn("Abandoned stage failed", {
          stage: handle.stage,
          handle: handle.id,
          message: err instanceof Error ? err.message : String(err),
        });
      });
    }
  }

  private checkRuntime(plan: readonly PlannedStage[]): void {
    if (!this.runtime.isInitialized()) {
      throw new RuntimeNotInitializedError();
    }
    for (const entry of plan) {
      const capacity = this.runtime.capacity();
      if (!fitsWithin(entry.budget, capacity)) {
        throw new InsufficientResourcesError(entry.stage, entry.budget, capacity);
      }
    }
  }

  private submit(
    entry: PlannedStage,
    handles: ReadonlyMap<string, StageHandle<StageResult>>,
    environment: Environment
  ): StageHandle<StageResult> {
    const dependencies = entry.dependencies.map((dependency) => {
      const handle = handles.get(dependency);
      if (handle === undefined) {
        throw new UnresolvedDependencyError(entry.stage, dependency);
      }
      return handle;
    });

    const request: StageRequest = {
      name: entry.stage,
      pipeline: entry.pipeline,
      algorithm: entry.algorithm,
      reduction: entry.reduction,
      cpus: entry.budget.cpus,
      gpus: entry.budget.gpus,
      environment,
    };

    const handle = this.runtime.submit<StageResult, StageResult>({
      name: entry.stage,
      dependencies,
      resources: entry.budget,
      run: (dependencyResults) =>
        this.execute(request, entry.dependencies, dependencyResults),
    });

    this.logger.info("Stage submitted", {
      stage: entry.stage,
      handle: handle.id,
      dependencies: dependencies.map((dependency) => dependency.id),
      cpus: entry.budget.cpus,
      gpus: entry.budget.gpus,
    });
    return handle;
  }

  private async execute(
    request: StageRequest,
    names: readonly string[],
    dependencyResults: readonly StageResult[]
  ): Promise<StageResult> {
    const dependencies = new Map<string, StageResult>();
    dependencyResults.forEach((result, index) => {
      dependencies.set(names[index] ?? result.stage, result);
    });
    this.logger.info("Stage started", { stage: request.name });
    try {
      const result = await this.runner.run(request, dependencies);
      this.logger.info("Stage completed", {
        stage: request.name,
        trials: result.trials.length,
      });
      return result;
    } catch (err) {
      throw new StageExecutionError(request.name, err);
    }
  }
}
