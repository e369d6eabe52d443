/**
 * Environment variable loading and validation.
 *
 * `.env` is read once on import; every accessor below reads `process.env`
 * at call time and throws ConfigError on malformed values.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or empty.
 */
export function requireEnv(key: string): string {
  const value = readEnv(key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

export function optionalEnvInt(key: string, defaultValue: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Get an optional non-negative number (fractional values allowed).
 * Used for resource capacities such as CPU counts.
 */
export function optionalEnvNumber(key: string, defaultValue: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(
      `Environment variable ${key} must be a non-negative number, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}
