/**
 * Shared run environment, built once before the first submission and handed
 * unchanged to every stage.
 */

import { ensureRunId } from "../logging/index.js";

export interface Environment {
  /** Directory receiving run output */
  readonly savePath: string;
  /** Debug (local, serial) execution */
  readonly debug: boolean;
  /** Run ID stamped on logs and outputs */
  readonly runId: string;
}

export function createEnvironment(options: {
  savePath: string;
  debug?: boolean;
  runId?: string;
}): Environment {
  return Object.freeze({
    savePath: options.savePath,
    debug: options.debug ?? false,
    runId: options.runId ?? ensureRunId(),
  });
}
