/**
 * Application configuration.
 * Validates and exposes typed configuration values read from the environment.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvNumber,
} from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Re-export experiment configuration module
export * from "./experiment/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Debug mode: the local runtime executes one stage at a time */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Output location used when an experiment does not name one */
  readonly savePath: string | undefined;
  /** CPU capacity of the local runtime */
  readonly cpus: number;
  /** GPU capacity of the local runtime */
  readonly gpus: number;
}

/**
 * Read configuration from the environment.
 */
export function loadConfig(): AppConfig {
  const savePath = optionalEnv("STAGEWISE_SAVE_PATH", "");
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "stagewise"),
    savePath: savePath === "" ? undefined : savePath,
    cpus: optionalEnvNumber("STAGEWISE_CPUS", 4),
    gpus: optionalEnvNumber("STAGEWISE_GPUS", 0),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the configuration and narrow its log level.
 * Call this at startup to fail fast.
 */
export function validateConfig(
  appConfig: AppConfig = config
): AppConfig & { readonly logLevel: LogLevel } {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  const logLevel = appConfig.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (appConfig.cpus <= 0) {
    throw new ConfigError(
      `Invalid STAGEWISE_CPUS: ${appConfig.cpus}. At least one CPU slot is required.`
    );
  }

  return { ...appConfig, logLevel };
}
