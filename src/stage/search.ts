/**
 * Search algorithms.
 *
 * A stage specification marks each searchable value with a grid option:
 *
 *   { "lr": { "$grid": [0.1, 0.01] }, "layers": { "$grid": [1, 2] } }
 *
 * An algorithm turns the specification into the list of concrete trial
 * configurations. `grid` proposes every combination; `random` proposes a
 * seeded sample of distinct combinations.
 */

import type { AlgorithmConfig } from "../config/experiment/index.js";
import { DEFAULT_ALGORITHM, DEFAULT_RANDOM_SEED } from "../config/experiment/index.js";
import { isJsonObject, type JsonObject, type JsonValue } from "../pipeline/index.js";

export const GRID_KEY = "$grid";

export class InvalidSearchSpaceError extends Error {
  constructor(public readonly path: readonly string[], reason: string) {
    super(`Invalid search option at ${path.length > 0 ? path.join(".") : "(root)"}: ${reason}`);
    this.name = "InvalidSearchSpaceError";
  }
}

export interface SearchAlgorithm {
  readonly kind: AlgorithmConfig["type"];
  /** Concrete trial configurations, without any `$grid` option left. */
  propose(space: JsonValue): JsonValue[];
}

// ---------------------------------------------------------------------------
// Search space
// ---------------------------------------------------------------------------

function gridOptions(value: JsonValue, path: readonly string[]): JsonValue[] | null {
  if (!isJsonObject(value) || !Object.hasOwn(value, GRID_KEY)) {
    return null;
  }
  const options = value[GRID_KEY];
  if (Object.keys(value).length !== 1) {
    throw new InvalidSearchSpaceError(path, `"${GRID_KEY}" must be the only key`);
  }
  if (!Array.isArray(options) || options.length === 0) {
    throw new InvalidSearchSpaceError(path, `"${GRID_KEY}" must be a non-empty array`);
  }
  return options;
}

/**
 * Option lists of every grid node, depth first in document order.
 */
export function searchDimensions(space: JsonValue): JsonValue[][] {
  const dimensions: JsonValue[][] = [];

  const visit = (value: JsonValue, path: string[]): void => {
    const options = gridOptions(value, path);
    if (options) {
      dimensions.push(options);
    } else if (Array.isArray(value)) {
      value.forEach((item, index) => visit(item, [...path, String(index)]));
    } else if (isJsonObject(value)) {
      for (const [key, child] of Object.entries(value)) {
        visit(child, [...path, key]);
      }
    }
  };

  visit(space, []);
  return dimensions;
}

/**
 * Replace the k-th grid node with its `choice[k]`-th option.
 */
export function materialize(space: JsonValue, choice: readonly number[]): JsonValue {
  let next = 0;

  const build = (value: JsonValue, path: string[]): JsonValue => {
    const options = gridOptions(value, path);
    if (options) {
      const picked = options[choice[next] ?? 0];
      next++;
      return picked ?? null;
    }
    if (Array.isArray(value)) {
      return value.map((item, index) => build(item, [...path, String(index)]));
    }
    if (isJsonObject(value)) {
      const copy: JsonObject = {};
      for (const [key, child] of Object.entries(value)) {
        copy[key] = build(child, [...path, key]);
      }
      return copy;
    }
    return value;
  };

  return build(space, []);
}

/**
 * Decode a combination number into one option index per dimension, the last
 * dimension varying fastest.
 */
function decode(sizes: readonly number[], combination: number): number[] {
  const choice = new Array<number>(sizes.length).fill(0);
  let remainder = combination;
  for (let i = sizes.length - 1; i >= 0; i--) {
    const size = sizes[i] ?? 1;
    choice[i] = remainder % size;
    remainder = Math.floor(remainder / size);
  }
  return choice;
}

function combinationCount(sizes: readonly number[]): number {
  return sizes.reduce((total, size) => total * size, 1);
}

// ---------------------------------------------------------------------------
// Algorithms
// ---------------------------------------------------------------------------

export class GridSearch implements SearchAlgorithm {
  readonly kind = "grid" as const;

  propose(space: JsonValue): JsonValue[] {
    const sizes = searchDimensions(space).map((options) => options.length);
    const total = combinationCount(sizes);
    const trials: JsonValue[] = [];
    for (let combination = 0; combination < total; combination++) {
      trials.push(materialize(space, decode(sizes, combination)));
    }
    return trials;
  }
}

export class RandomSearch implements SearchAlgorithm {
  readonly kind = "random" as const;

  constructor(
    private readonly trials: number,
    private readonly seed: number = DEFAULT_RANDOM_SEED
  ) {}

  propose(space: JsonValue): JsonValue[] {
    const sizes = searchDimensions(space).map((options) => options.length);
    const total = combinationCount(sizes);

    if (this.trials >= total) {
      return new GridSearch().propose(space);
    }

    const random = mulberry32(this.seed);
    const picked = new Set<number>();
    while (picked.size < this.trials) {
      picked.add(Math.floor(random() * total));
    }
    return [...picked].map((combination) => materialize(space, decode(sizes, combination)));
  }
}

/**
 * Small seeded PRNG returning floats in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createSearchAlgorithm(
  config: AlgorithmConfig = DEFAULT_ALGORITHM
): SearchAlgorithm {
  switch (config.type) {
    case "grid":
      return new GridSearch();
    case "random":
      return new RandomSearch(config.trials, config.seed);
  }
}
