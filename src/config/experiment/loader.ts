/**
 * Experiment configuration loader and validator.
 *
 * Responsible for:
 * - Reading experiment files (JSON or YAML)
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";
import { ExperimentConfigSchema, type ExperimentConfig } from "./schema.js";

/**
 * Structured validation error for experiment configuration.
 */
export class ExperimentConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "ExperimentConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Experiment configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "file" for read/parse failures */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load experiment configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen ExperimentConfig
 * @throws ExperimentConfigError if validation fails
 */
export function loadExperimentConfig(input: unknown): Readonly<ExperimentConfig> {
  const result = ExperimentConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ExperimentConfigError(
      `Invalid experiment configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate experiment configuration without throwing.
 */
export function validateExperimentConfig(input: unknown): {
  success: boolean;
  config?: ExperimentConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = ExperimentConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Read an experiment file. `.yaml` and `.yml` are parsed as YAML, anything
 * else as JSON.
 *
 * @throws ExperimentConfigError if the file cannot be read or parsed
 */
export function readExperimentFile(filePath: string): unknown {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw fileError(filePath, `cannot read file (${describe(err)})`);
  }

  const extension = extname(filePath).toLowerCase();
  try {
    return extension === ".yaml" || extension === ".yml"
      ? parseYaml(text)
      : JSON.parse(text);
  } catch (err) {
    throw fileError(filePath, `cannot parse ${extension || "file"} (${describe(err)})`);
  }
}

/**
 * Read, validate and freeze an experiment file.
 */
export function loadExperimentFile(filePath: string): Readonly<ExperimentConfig> {
  return loadExperimentConfig(readExperimentFile(filePath));
}

function fileError(filePath: string, message: string): ExperimentConfigError {
  return new ExperimentConfigError(`Invalid experiment file: ${filePath}`, [
    { path: [], message, code: "file" },
  ]);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
