import type { TrialResult } from "./types.js";

export class InvalidReductionError extends Error {
  constructor(public readonly stage: string, public readonly keep: number) {
    super(`Invalid reduction for stage "${stage}": keep must be a positive integer, got ${keep}`);
    this.name = "InvalidReductionError";
  }
}

/**
 * Order trials best first (stable on ties) and keep the top `keep`.
 * `keep` undefined keeps every trial.
 */
export function reduceTrials(
  stage: string,
  trials: readonly TrialResult[],
  keep: number | undefined
): TrialResult[] {
  if (keep !== undefined && (!Number.isInteger(keep) || keep < 1)) {
    throw new InvalidReductionError(stage, keep);
  }
  const ranked = [...trials].sort((a, b) => b.metric - a.metric);
  return keep === undefined ? ranked : ranked.slice(0, keep);
}
