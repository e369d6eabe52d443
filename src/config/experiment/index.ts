/**
 * Experiment configuration module.
 *
 * Usage:
 *   import { loadExperimentFile } from "./config/experiment/index.js";
 *
 *   const experiment = loadExperimentFile("experiments/example.yaml");
 */

export type {
  AlgorithmConfig,
  ExperimentConfig,
  ExperimentConfigInput,
} from "./schema.js";

export {
  ExperimentConfigSchema,
  AlgorithmConfigSchema,
  GridAlgorithmSchema,
  RandomAlgorithmSchema,
  ReduceCountSchema,
  StageNameSchema,
  JsonValueSchema,
  DEFAULT_SAVE_PATH,
} from "./schema.js";

export {
  loadExperimentConfig,
  loadExperimentFile,
  readExperimentFile,
  validateExperimentConfig,
  deepFreeze,
  ExperimentConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_ALGORITHM, DEFAULT_RANDOM_SEED } from "./defaults.js";
