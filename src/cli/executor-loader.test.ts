/**
 * Executor loader tests.
 *
 * Run: node --import tsx --test src/cli/executor-loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, test } from "node:test";

import { createEnvironment } from "../experiment/environment.js";
import type { TrialContext } from "../stage/index.js";
import {
  ExecutorLoadError,
  InvalidTrialOutcomeError,
  loadTrialExecutor,
} from "./executor-loader.js";

const CONTEXT: TrialContext = {
  stage: "train",
  trialId: "train/trial-0",
  params: { lr: 0.1 },
  cpus: 1,
  gpus: 0,
  environment: createEnvironment({ savePath: "out", runId: "loader-test" }),
};

describe("loadTrialExecutor", () => {
  const dir = mkdtempSync(join(tmpdir(), "stagewise-executor-"));
  after(() => rmSync(dir, { recursive: true, force: true }));

  function writeModule(name: string, source: string): string {
    const path = join(dir, name);
    writeFileSync(path, source);
    return path;
  }

  test("uses the executeTrial export", async () => {
    const path = writeModule(
      "named.mjs",
      "export async function executeTrial(ctx) { return { metric: 2, output: { id: ctx.trialId } }; }\n"
    );
    const executor = await loadTrialExecutor(path);
    assert.deepEqual(await executor(CONTEXT), { metric: 2, output: { id: "train/trial-0" } });
  });

  test("falls back to the default export", async () => {
    const path = writeModule(
      "default.mjs",
      "export default async (ctx) => ({ metric: 0, output: ctx.params });\n"
    );
    const executor = await loadTrialExecutor(path);
    assert.deepEqual(await executor(CONTEXT), { metric: 0, output: { lr: 0.1 } });
  });

  test("rejects a module without an executor function", async () => {
    const path = writeModule("empty.mjs", "export const executeTrial = 42;\n");
    await assert.rejects(loadTrialExecutor(path), (err: unknown) => {
      assert.ok(err instanceof ExecutorLoadError);
      assert.match(err.message, /must export a function as "executeTrial" or default$/);
      return true;
    });
  });

  test("rejects a module that cannot be loaded", async () => {
    await assert.rejects(loadTrialExecutor(join(dir, "missing.mjs")), ExecutorLoadError);
  });

  test("validates every outcome", async () => {
    const path = writeModule(
      "invalid.mjs",
      'export async function executeTrial() { return { metric: "high", output: 1 }; }\n'
    );
    const executor = await loadTrialExecutor(path);
    await assert.rejects(executor(CONTEXT), (err: unknown) => {
      assert.ok(err instanceof InvalidTrialOutcomeError);
      assert.equal(err.trialId, "train/trial-0");
      assert.match(err.message, /^Executor returned an invalid outcome for train\/trial-0: metric: /);
      return true;
    });
  });
});
