/**
 * Run ID generation and management.
 * Every experiment run carries one run ID, stamped on each log line and
 * handed to stages through their environment.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(): string {
  const now = new Date();
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Start a new run and return its ID.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Return the current run ID, starting a run if none is active.
 */
export function ensureRunId(): string {
  return currentRunId ?? initRunId();
}

/**
 * Get the current run ID, or null before any run started.
 */
export function getRunId(): string | null {
  return currentRunId;
}
