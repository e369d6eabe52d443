/**
 * Experiment scheduler tests.
 *
 * Run: node --import tsx --test src/scheduler/scheduler.test.ts
 *
 * Tests cover:
 *   1. Submission order and dependency handle threading
 *   2. Defaults handed to the stage runner
 *   3. Configuration errors raised before any submission
 *   4. Failure propagation from the join and from a refused submission
 *   5. Concurrency of independent branches
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { createEnvironment } from "../experiment/environment.js";
import { createSilentLogger, type LogContext, type Logger } from "../logging/index.js";
import { UnknownReferenceError, type PipelineSpec } from "../pipeline/index.js";
import { InvalidBudgetError, type ResourceBudget } from "../resources/index.js";
import {
  InsufficientResourcesError,
  LocalRuntime,
  RuntimeNotInitializedError,
  type ExecutionRuntime,
  type RuntimeInitOptions,
  type StageHandle,
  type TaskSubmission,
} from "../runtime/index.js";
import type { StageRequest, StageResult, StageRunner } from "../stage/index.js";
import { StageExecutionError, UnresolvedDependencyError } from "./errors.js";
import { formatPlan, planSubmissions } from "./plan.js";
import { ExperimentScheduler, type SchedulerRunInput } from "./scheduler.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST DOUBLES
// ═══════════════════════════════════════════════════════════════════════════

interface RecordedSubmission {
  readonly name: string;
  readonly dependencies: readonly StageHandle[];
  readonly resources: ResourceBudget;
  readonly handle: StageHandle;
}

/**
 * Runtime that records submissions and joins, delegating execution to an
 * in-process LocalRuntime.
 */
class RecordingRuntime implements ExecutionRuntime {
  readonly events: string[] = [];
  readonly submissions: RecordedSubmission[] = [];
  private readonly inner: LocalRuntime;

  constructor(capacity: ResourceBudget = { cpus: 8, gpus: 2 }) {
    this.inner = new LocalRuntime(capacity);
  }

  init(options?: RuntimeInitOptions): Promise<void> {
    return this.inner.init(options);
  }

  shutdown(): Promise<void> {
    return this.inner.shutdown();
  }

  isInitialized(): boolean {
    return this.inner.isInitialized();
  }

  capacity(): ResourceBudget {
    return this.inner.capacity();
  }

  submit<T, D = unknown>(submission: TaskSubmission<T, D>): StageHandle<T> {
    const handle = this.inner.submit(submission);
    this.events.push(`submit:${submission.name}`);
    this.submissions.push({
      name: submission.name,
      dependencies: submission.dependencies,
      resources: submission.resources,
      handle,
    });
    return handle;
  }

  join<T>(handles: readonly StageHandle<T>[]): Promise<T[]> {
    this.events.push("join");
    return this.inner.join(handles);
  }
}

/**
 * Runtime that refuses one stage at submission time.
 */
class RefusingRuntime extends RecordingRuntime {
  constructor(private readonly refused: string) {
    super();
  }

  override submit<T, D = unknown>(submission: TaskSubmission<T, D>): StageHandle<T> {
    if (submission.name === this.refused) {
      throw new Error(`runtime refused ${submission.name}`);
    }
    return super.submit(submission);
  }
}

/** Logger that keeps warnings as "message: stage" lines. */
function warningLogger(warnings: string[]): Logger {
  const ignore = () => {};
  const logger: Logger = {
    debug: ignore,
    info: ignore,
    warn: (message: string, context?: LogContext) => {
      warnings.push(`${message}: ${String(context?.stage)}`);
    },
    error: ignore,
    child: () => logger,
  };
  return logger;
}

/**
 * Runner that records each call and can hold or fail chosen stages.
 */
class ScriptedRunner implements StageRunner {
  readonly requests: StageRequest[] = [];
  readonly received = new Map<string, string[]>();
  readonly events: string[] = [];

  constructor(private readonly steps: Record<string, () => Promise<void>> = {}) {}

  async run(
    request: StageRequest,
    dependencies: ReadonlyMap<string, StageResult>
  ): Promise<StageResult> {
    this.requests.push(request);
    this.received.set(request.name, [...dependencies.keys()]);
    this.events.push(`start:${request.name}`);
    if (Object.hasOwn(this.steps, request.name)) {
      await this.steps[request.name]?.();
    }
    this.events.push(`end:${request.name}`);
    return {
      stage: request.name,
      trials: [{ id: `${request.name}/trial-0`, params: null, metric: 1, output: request.name }],
    };
  }

  callsFor(stage: string): number {
    return this.requests.filter((request) => request.name === stage).length;
  }
}

function gate(): { promise: Promise<void>; open: () => void } {
  let open = () => {};
  const promise = new Promise<void>((resolve) => {
    open = () => resolve();
  });
  return { promise, open };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

const ENVIRONMENT = createEnvironment({ savePath: "out", runId: "test-run" });

/** A independent, B depends on A, C independent. */
const ABC: PipelineSpec = {
  A: { rows: 10 },
  B: { input: { $link: "A" } },
  C: { title: "independent" },
};

async function setup(steps: Record<string, () => Promise<void>> = {}) {
  const runtime = new RecordingRuntime();
  await runtime.init();
  const runner = new ScriptedRunner(steps);
  const scheduler = new ExperimentScheduler({ runtime, runner, logger: createSilentLogger() });
  return { runtime, runner, scheduler };
}

function input(pipeline: PipelineSpec, extra: Partial<SchedulerRunInput> = {}): SchedulerRunInput {
  return { pipeline, environment: ENVIRONMENT, ...extra };
}

// ═══════════════════════════════════════════════════════════════════════════
// SUBMISSION
// ═══════════════════════════════════════════════════════════════════════════

describe("submission", () => {
  test("threads dependency handles and submits everything before joining", async () => {
    const { runtime, scheduler } = await setup();
    await scheduler.run(input(ABC));

    assert.deepEqual(runtime.events, ["submit:A", "submit:B", "submit:C", "join"]);

    const [a, b, c] = runtime.submissions;
    assert.ok(a && b && c);
    assert.equal(a.dependencies.length, 0);
    assert.equal(c.dependencies.length, 0);
    assert.equal(b.dependencies.length, 1);
    assert.strictEqual(b.dependencies[0], a.handle);
  });

  test("every stage runs exactly once and the summary holds every result", async () => {
    const { runner, scheduler } = await setup();
    const summary = await scheduler.run(input(ABC));

    for (const stage of ["A", "B", "C"]) {
      assert.equal(runner.callsFor(stage), 1);
    }
    assert.equal(summary.runId, "test-run");
    assert.deepEqual(summary.stages, ["A", "B", "C"]);
    assert.deepEqual([...summary.results.keys()], ["A", "B", "C"]);
    assert.equal(summary.results.get("B")?.trials[0]?.output, "B");
  });

  test("the runner receives resolved results of direct dependencies only", async () => {
    const { runner, scheduler } = await setup();
    await scheduler.run(
      input({
        A: {},
        B: { input: { $link: "A" } },
        C: { input: { $link: "B" } },
      })
    );
    assert.deepEqual(runner.received.get("A"), []);
    assert.deepEqual(runner.received.get("B"), ["A"]);
    assert.deepEqual(runner.received.get("C"), ["B"]);
  });

  test("applies default search, no reduction and default budgets", async () => {
    const { runtime, runner, scheduler } = await setup();
    await scheduler.run(
      input(ABC, {
        algorithm: { B: { type: "random", trials: 2 } },
        reduce: { B: 1 },
        cpusPerTrial: { B: 4 },
        gpusPerTrial: { B: 1 },
      })
    );

    const requestFor = (stage: string) => runner.requests.find((r) => r.name === stage);
    assert.deepEqual(requestFor("A")?.algorithm, { type: "grid" });
    assert.equal(requestFor("A")?.reduction, undefined);
    assert.equal(requestFor("A")?.cpus, 1);
    assert.equal(requestFor("A")?.gpus, 0);

    assert.deepEqual(requestFor("B")?.algorithm, { type: "random", trials: 2 });
    assert.equal(requestFor("B")?.reduction, 1);
    assert.equal(requestFor("B")?.cpus, 4);
    assert.equal(requestFor("B")?.gpus, 1);
    assert.deepEqual(Object.keys(requestFor("B")?.pipeline.stages ?? {}), ["A", "B"]);
    assert.strictEqual(requestFor("C")?.environment, ENVIRONMENT);

    assert.deepEqual(
      runtime.submissions.map((s) => s.resources),
      [
        { cpus: 1, gpus: 0 },
        { cpus: 4, gpus: 1 },
        { cpus: 1, gpus: 0 },
      ]
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION ERRORS
// ═══════════════════════════════════════════════════════════════════════════

describe("configuration errors", () => {
  test("a dependency declared after its dependent raises UnresolvedDependencyError", async () => {
    const { runtime, scheduler } = await setup();
    await assert.rejects(
      scheduler.run(input({ B: { input: { $link: "A" } }, A: {}, C: {} })),
      (err: unknown) => {
        assert.ok(err instanceof UnresolvedDependencyError);
        assert.equal(err.stage, "B");
        assert.equal(err.dependency, "A");
        return true;
      }
    );
    assert.deepEqual(runtime.submissions, []);
  });

  test("a reference to an undeclared stage raises UnknownReferenceError before submission", async () => {
    const { runtime, scheduler } = await setup();
    await assert.rejects(
      scheduler.run(input({ A: {}, B: { input: { $link: "Z" } } })),
      UnknownReferenceError
    );
    assert.deepEqual(runtime.events, []);
  });

  test("a malformed budget raises InvalidBudgetError before submission", async () => {
    const { runtime, scheduler } = await setup();
    await assert.rejects(
      scheduler.run(input(ABC, { gpusPerTrial: { C: -1 } })),
      InvalidBudgetError
    );
    assert.deepEqual(runtime.events, []);
  });

  test("a budget beyond runtime capacity is rejected before submission", async () => {
    const { runtime, scheduler } = await setup();
    await assert.rejects(
      scheduler.run(input(ABC, { gpusPerTrial: { C: 3 } })),
      InsufficientResourcesError
    );
    assert.deepEqual(runtime.events, []);
  });

  test("an uninitialized runtime is rejected", async () => {
    const runtime = new RecordingRuntime();
    const scheduler = new ExperimentScheduler({
      runtime,
      runner: new ScriptedRunner(),
      logger: createSilentLogger(),
    });
    await assert.rejects(scheduler.run(input(ABC)), RuntimeNotInitializedError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURES
// ═══════════════════════════════════════════════════════════════════════════

describe("failures", () => {
  test("a failing stage rejects the run with StageExecutionError", async () => {
    const held = gate();
    const { runner, scheduler } = await setup({
      B: async () => {
        throw new Error("out of memory");
      },
      C: () => held.promise,
    });

    await assert.rejects(scheduler.run(input(ABC)), (err: unknown) => {
      assert.ok(err instanceof StageExecutionError);
      assert.equal(err.stage, "B");
      assert.ok(err.cause instanceof Error);
      assert.equal(err.cause.message, "out of memory");
      return true;
    });
    // C was still running when the run failed
    assert.equal(runner.events.includes("end:C"), false);
    held.open();
  });

  test("a failure upstream is reported against the stage that failed", async () => {
    const { runner, scheduler } = await setup({
      A: async () => {
        throw new Error("no data");
      },
    });

    await assert.rejects(scheduler.run(input(ABC)), (err: unknown) => {
      assert.ok(err instanceof StageExecutionError);
      assert.equal(err.stage, "A");
      return true;
    });
    assert.equal(runner.callsFor("B"), 0);
  });
});

describe("refused submission", () => {
  test("stages submitted before the refusal are never left unhandled", async () => {
    const holdA = gate();
    const runtime = new RefusingRuntime("C");
    await runtime.init();
    const warnings: string[] = [];
    const scheduler = new ExperimentScheduler({
      runtime,
      runner: new ScriptedRunner({
        A: async () => {
          await holdA.promise;
          throw new Error("no data");
        },
      }),
      logger: warningLogger(warnings),
    });

    const unhandled: unknown[] = [];
    const onUnhandled = (reason: unknown) => unhandled.push(reason);
    process.on("unhandledRejection", onUnhandled);
    try {
      await assert.rejects(scheduler.run(input(ABC)), { message: "runtime refused C" });
      assert.deepEqual(
        runtime.submissions.map((s) => s.name),
        ["A", "B"]
      );

      holdA.open();
      await flush();
      await flush();
    } finally {
      process.off("unhandledRejection", onUnhandled);
    }

    assert.deepEqual(unhandled, []);
    assert.deepEqual(warnings, ["Abandoned stage failed: A", "Abandoned stage failed: B"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// CONCURRENCY
// ═══════════════════════════════════════════════════════════════════════════

describe("concurrency", () => {
  test("independent branches do not wait for each other", async () => {
    const holdA = gate();
    const { runner, scheduler } = await setup({ A: () => holdA.promise });

    const running = scheduler.run(input(ABC));
    await flush();

    assert.ok(runner.events.includes("end:C"), "C should finish while A is held");
    assert.equal(runner.events.includes("start:B"), false);

    holdA.open();
    await running;
    assert.ok(runner.events.indexOf("start:B") > runner.events.indexOf("end:A"));
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// PLANNING
// ═══════════════════════════════════════════════════════════════════════════

describe("planSubmissions", () => {
  test("lists stages in declared order with their dependencies", () => {
    const plan = planSubmissions({ pipeline: ABC, reduce: { B: 2 } });
    assert.deepEqual(
      plan.map((entry) => [entry.stage, entry.dependencies]),
      [
        ["A", []],
        ["B", ["A"]],
        ["C", []],
      ]
    );
  });

  test("formatPlan prints one line per stage", () => {
    const plan = planSubmissions({ pipeline: ABC, reduce: { B: 2 } });
    assert.equal(
      formatPlan(plan),
      [
        "1. A  deps: -  budget: 1 CPU / 0 GPU  search: grid  keep: all",
        "2. B  deps: A  budget: 1 CPU / 0 GPU  search: grid  keep: top 2",
        "3. C  deps: -  budget: 1 CPU / 0 GPU  search: grid  keep: all",
      ].join("\n")
    );
  });
});
