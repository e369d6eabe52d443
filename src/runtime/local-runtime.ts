/**
 * In-process execution runtime.
 *
 * Tasks run on the Node.js event loop, admitted through a SlotPool sized by
 * the runtime's CPU/GPU capacity. Each task first waits on its dependency
 * handles, then on the pool, then runs. In debug mode the pool admits one
 * task at a time so stages execute strictly one after another.
 *
 * USAGE:
 *
 *   const runtime = new LocalRuntime({ cpus: 8, gpus: 1 });
 *   await runtime.init();
 *
 *   const a = runtime.submit({ name: "a", run: async () => 1, dependencies: [], resources });
 *   const b = runtime.submit({ name: "b", run: async ([x]) => x + 1, dependencies: [a], resources });
 *
 *   await runtime.join([a, b]);   // [1, 2]
 *   await runtime.shutdown();
 */

import { createSilentLogger, type Logger } from "../logging/index.js";
import type { ResourceBudget } from "../resources/index.js";
import {
  DependencyFailedError,
  InsufficientResourcesError,
  RuntimeNotInitializedError,
} from "./errors.js";
import { SlotPool } from "./slot-pool.js";
import type {
  ExecutionRuntime,
  RuntimeInitOptions,
  StageHandle,
  TaskSubmission,
} from "./types.js";

export interface LocalRuntimeOptions {
  /** CPU capacity (default 4) */
  cpus?: number;
  /** GPU capacity (default 0) */
  gpus?: number;
  logger?: Logger;
}

export class LocalRuntime implements ExecutionRuntime {
  private readonly limits: ResourceBudget;
  private readonly logger: Logger;
  private pool: SlotPool | null = null;
  private submitted = 0;
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: LocalRuntimeOptions = {}) {
    this.limits = Object.freeze({ cpus: options.cpus ?? 4, gpus: options.gpus ?? 0 });
    this.logger = options.logger ?? createSilentLogger();
  }

  async init(options: RuntimeInitOptions = {}): Promise<void> {
    if (this.pool) {
      return;
    }
    const debug = options.debug ?? false;
    this.pool = new SlotPool(this.limits, debug ? 1 : Infinity);
    this.logger.debug("Local runtime initialized", { ...this.limits, debug });
  }

  async shutdown(): Promise<void> {
    if (!this.pool) {
      return;
    }
    if (this.active > 0) {
      this.logger.debug("Waiting for in-flight tasks", { active: this.active });
      await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
    }
    this.pool = null;
    this.logger.debug("Local runtime shut down", { submitted: this.submitted });
  }

  isInitialized(): boolean {
    return this.pool !== null;
  }

  capacity(): ResourceBudget {
    return this.limits;
  }

  submit<T, D = unknown>(submission: TaskSubmission<T, D>): StageHandle<T> {
    const pool = this.pool;
    if (!pool) {
      throw new RuntimeNotInitializedError();
    }
    if (!pool.fits(submission.resources)) {
      throw new InsufficientResourcesError(
        submission.name,
        submission.resources,
        this.limits
      );
    }

    this.submitted++;
    const id = `${submission.name}#${this.submitted}`;
    return Object.freeze({
      id,
      stage: submission.name,
      result: this.execute(pool, submission),
    });
  }

  async join<T>(handles: readonly StageHandle<T>[]): Promise<T[]> {
    return Promise.all(handles.map((handle) => handle.result));
  }

  private async execute<T, D>(pool: SlotPool, submission: TaskSubmission<T, D>): Promise<T> {
    this.active++;
    try {
      const dependencyResults = await Promise.all(
        submission.dependencies.map((handle) =>
          handle.result.catch((err: unknown) => {
            throw new DependencyFailedError(submission.name, handle.stage, err);
          })
        )
      );

      const release = await pool.acquire(submission.resources);
      try {
        this.logger.debug("Task started", { stage: submission.name });
        return await submission.run(dependencyResults);
      } finally {
        release();
      }
    } finally {
      this.active--;
      if (this.active === 0) {
        this.notifyIdle();
      }
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
