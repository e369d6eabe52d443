/**
 * Stage execution: runner boundary, search algorithms, reduction.
 */

export type {
  TrialResult,
  StageResult,
  StageRequest,
  StageRunner,
  TrialContext,
  TrialOutcome,
  TrialExecutor,
} from "./types.js";
export {
  GRID_KEY,
  GridSearch,
  RandomSearch,
  InvalidSearchSpaceError,
  createSearchAlgorithm,
  searchDimensions,
  materialize,
  mulberry32,
  type SearchAlgorithm,
} from "./search.js";
export { reduceTrials, InvalidReductionError } from "./reduction.js";
export {
  TrialStageRunner,
  TrialFailedError,
  UnresolvedLinkError,
  echoTrialExecutor,
  selectPath,
} from "./runner.js";
