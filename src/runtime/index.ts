/**
 * Execution runtime: boundary types, lifecycle and the in-process runtime.
 */

export type {
  StageHandle,
  TaskSubmission,
  RuntimeInitOptions,
  RuntimeLifecycle,
  ExecutionRuntime,
} from "./types.js";
export {
  RuntimeNotInitializedError,
  InsufficientResourcesError,
  DependencyFailedError,
} from "./errors.js";
export { SlotPool, type Release } from "./slot-pool.js";
export { LocalRuntime, type LocalRuntimeOptions } from "./local-runtime.js";
