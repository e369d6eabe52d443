export {
  ExperimentScheduler,
  type ExperimentSummary,
  type SchedulerOptions,
  type SchedulerRunInput,
} from "./scheduler.js";
export { planSubmissions, formatPlan, type PlanInput, type PlannedStage } from "./plan.js";
export {
  UnresolvedDependencyError,
  StageExecutionError,
  toStageExecutionError,
} from "./errors.js";
