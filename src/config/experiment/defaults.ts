/**
 * Defaults applied to stages without explicit settings.
 */

import type { AlgorithmConfig } from "./schema.js";

/** Exhaustive search over every `$grid` option. */
export const DEFAULT_ALGORITHM: AlgorithmConfig = Object.freeze({ type: "grid" });

/** Seed used by random search when none is configured. */
export const DEFAULT_RANDOM_SEED = 0;
