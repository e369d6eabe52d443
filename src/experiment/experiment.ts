/**
 * Experiment: the top-level aggregate of one run.
 *
 * Built once from validated configuration and never modified. `run()`
 * wires the environment, the runtime lifecycle, the stage runner and the
 * scheduler together:
 *
 *   const experiment = Experiment.fromConfig(raw);
 *   const summary = await experiment.run({ executor });
 *
 * A runtime passed in already initialised is left running; otherwise the
 * experiment initialises it and shuts it down when the run ends.
 */

import { join } from "node:path";

import {
  loadExperimentConfig,
  type ExperimentConfig,
} from "../config/experiment/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import { LocalRuntime, type ExecutionRuntime } from "../runtime/index.js";
import {
  ExperimentScheduler,
  planSubmissions,
  type ExperimentSummary,
  type PlannedStage,
} from "../scheduler/index.js";
import {
  echoTrialExecutor,
  TrialStageRunner,
  type StageRunner,
  type TrialExecutor,
} from "../stage/index.js";
import { createEnvironment, type Environment } from "./environment.js";

export interface ExperimentRunOptions {
  /** Execution runtime; a LocalRuntime with `cpus`/`gpus` capacity when absent */
  runtime?: ExecutionRuntime;
  /** Stage runner; a TrialStageRunner over `executor` when absent */
  runner?: StageRunner;
  /** Trial computation for the default runner; echoes params when absent */
  executor?: TrialExecutor;
  environment?: Environment;
  /** Used when no environment is given */
  debug?: boolean;
  /** Capacity of the default LocalRuntime */
  cpus?: number;
  gpus?: number;
  /** Defaults to a logger writing under `<savePath>/logs` */
  logger?: Logger;
}

export class Experiment {
  private constructor(public readonly config: Readonly<ExperimentConfig>) {}

  /**
   * @throws ExperimentConfigError if `input` is not a valid experiment
   */
  static fromConfig(input: unknown): Experiment {
    return new Experiment(loadExperimentConfig(input));
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Validate the pipeline and return the submission plan without running it.
   */
  plan(): PlannedStage[] {
    return planSubmissions(this.config);
  }

  async run(options: ExperimentRunOptions = {}): Promise<ExperimentSummary> {
    const environment =
      options.environment ??
      createEnvironment({ savePath: this.config.savePath, debug: options.debug });

    const logger = (
      options.logger ??
      createLogger({ logDir: join(environment.savePath, "logs"), logFile: "experiment.log" })
    ).child({ experiment: this.config.name, runId: environment.runId });

    const runtime =
      options.runtime ??
      new LocalRuntime({ cpus: options.cpus, gpus: options.gpus, logger });
    const runner =
      options.runner ?? new TrialStageRunner(options.executor ?? echoTrialExecutor, logger);

    const ownsRuntime = !runtime.isInitialized();
    if (ownsRuntime) {
      await runtime.init({ debug: environment.debug });
    }

    logger.info("Experiment starting", {
      stages: Object.keys(this.config.pipeline).length,
      savePath: environment.savePath,
      debug: environment.debug,
    });

    try {
      const scheduler = new ExperimentScheduler({ runtime, runner, logger });
      return await scheduler.run({ ...this.config, environment });
    } finally {
      if (ownsRuntime) {
        await runtime.shutdown();
      }
    }
  }
}
