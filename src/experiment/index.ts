export { Experiment, type ExperimentRunOptions } from "./experiment.js";
export { createEnvironment, type Environment } from "./environment.js";
