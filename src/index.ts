/**
 * Stagewise: dependency-ordered dispatch of multi-stage experiment pipelines.
 */

export * from "./pipeline/index.js";
export * from "./resources/index.js";
export * from "./runtime/index.js";
export * from "./stage/index.js";
export * from "./scheduler/index.js";
export * from "./experiment/index.js";
export * from "./config/experiment/index.js";
export { ConfigError, config, loadConfig, validateConfig, type AppConfig } from "./config/index.js";
export * from "./logging/index.js";
