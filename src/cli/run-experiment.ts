#!/usr/bin/env node
/**
 * CLI command to validate and run an experiment.
 *
 * Usage:
 *   npx tsx src/cli/run-experiment.ts --config <path> [options]
 *   npm run run-experiment -- --config experiments/example.yaml
 *
 * Options:
 *   --config <path>      Experiment file (.json, .yaml, .yml)
 *   --executor <path>    Module exporting the trial executor (default: echo)
 *   --save-path <path>   Override the experiment's save path
 *   --debug              Run stages one at a time
 *   --dry-run            Validate and print the submission plan only
 *   --json               Print the plan or summary as JSON
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - Experiment completed (or plan printed)
 *   1 - Configuration error or stage failure
 */

import { join } from "node:path";
import { parseArgs } from "node:util";

import {
  config as appConfig,
  ConfigError,
  ExperimentConfigError,
  readExperimentFile,
  validateConfig,
} from "../config/index.js";
import { Experiment } from "../experiment/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { formatPlan, StageExecutionError, type ExperimentSummary, type PlannedStage } from "../scheduler/index.js";
import type { TrialExecutor } from "../stage/index.js";
import { ExecutorLoadError, loadTrialExecutor } from "./executor-loader.js";

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: run-experiment --config <path> [options]

Options:
  --config <path>      Experiment file (.json, .yaml, .yml)
  --executor <path>    Module exporting the trial executor (default: echo)
  --save-path <path>   Override the experiment's save path
  --debug              Run stages one at a time
  --dry-run            Validate and print the submission plan only
  --json               Print the plan or summary as JSON
  -h, --help           Show this help message
`;

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      config: { type: "string" },
      executor: { type: "string" },
      "save-path": { type: "string" },
      debug: { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (values.config === undefined) {
    console.error("Missing required option: --config <path>");
    console.log(HELP);
    process.exit(1);
  }

  return { ...values, config: values.config };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function planToJson(plan: readonly PlannedStage[]): unknown {
  return plan.map((entry) => ({
    stage: entry.stage,
    dependencies: entry.dependencies,
    cpus: entry.budget.cpus,
    gpus: entry.budget.gpus,
    algorithm: entry.algorithm,
    reduce: entry.reduction ?? null,
  }));
}

function summaryToJson(summary: ExperimentSummary): unknown {
  return {
    runId: summary.runId,
    stages: summary.stages.map((stage) => ({
      stage,
      trials: summary.results.get(stage)?.trials ?? [],
    })),
  };
}

function printSummary(summary: ExperimentSummary): void {
  console.log("");
  console.log(c("bold", `Run ${summary.runId}`));
  for (const stage of summary.stages) {
    const trials = summary.results.get(stage)?.trials ?? [];
    const best = trials[0];
    const bestText = best === undefined ? "" : `, best ${best.id} (metric ${best.metric})`;
    console.log(`${c("green", "✓")} ${c("bold", stage)}: ${trials.length} trial(s) kept${bestText}`);
  }
}

/**
 * The --save-path flag wins over the file; the environment only fills in a
 * save path the file leaves out.
 */
function applySavePath(
  raw: unknown,
  flag: string | undefined,
  fromEnv: string | undefined
): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return raw;
  }
  const savePath = flag ?? ("savePath" in raw ? undefined : fromEnv);
  return savePath === undefined ? raw : { ...raw, savePath };
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();
  initRunId();

  const settings = validateConfig(appConfig);
  const raw = readExperimentFile(args.config);
  const experiment = Experiment.fromConfig(
    applySavePath(raw, args["save-path"], settings.savePath)
  );

  if (args["dry-run"]) {
    const plan = experiment.plan();
    console.log(args.json ? JSON.stringify(planToJson(plan), null, 2) : formatPlan(plan));
    return;
  }

  const executor: TrialExecutor | undefined =
    args.executor === undefined ? undefined : await loadTrialExecutor(args.executor);

  const summary = await experiment.run({
    executor,
    debug: args.debug || settings.debug,
    cpus: settings.cpus,
    gpus: settings.gpus,
    logger: createLogger({
      level: settings.logLevel,
      logDir: join(experiment.config.savePath, "logs"),
      logFile: "experiment.log",
      console: !args.json,
    }),
  });

  if (args.json) {
    console.log(JSON.stringify(summaryToJson(summary), null, 2));
  } else {
    printSummary(summary);
  }
}

main().catch((err: unknown) => {
  if (err instanceof ExperimentConfigError) {
    console.error(c("red", err.format()));
  } else if (err instanceof ConfigError || err instanceof ExecutorLoadError) {
    console.error(c("red", `${err.name}: ${err.message}`));
  } else if (err instanceof StageExecutionError) {
    console.error(c("red", `${err.name}: ${err.message}`));
    if (err.cause instanceof Error && err.cause.stack) {
      console.error(err.cause.stack);
    }
  } else {
    console.error(err);
  }
  process.exit(1);
});
