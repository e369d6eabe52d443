/**
 * Pipeline dependency graph.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STAGES, LINKS AND ORDER
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A pipeline is an ordered mapping from stage name to stage specification.
 * A stage depends on every stage its specification links to. The graph is
 * built and validated once:
 *
 * 1. Every link must name a stage in the mapping (UnknownReferenceError).
 * 2. The link relation must be acyclic (PipelineCycleError).
 *
 * Both checks run at construction, so a bad pipeline is rejected before any
 * stage is submitted. Declared order is NOT repaired here: callers that
 * submit in declared order rely on it being topological, and
 * `isDeclaredOrderTopological()` / `topologicalOrder()` let them check.
 */

import { collectLinks } from "./links.js";
import type { PipelineSpec, StageSpec, SubPipeline } from "./types.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class UnknownReferenceError extends Error {
  constructor(
    public readonly stage: string,
    public readonly reference: string
  ) {
    super(`Stage "${stage}" references unknown stage "${reference}"`);
    this.name = "UnknownReferenceError";
  }
}

export class UnknownStageError extends Error {
  constructor(public readonly stage: string) {
    super(`Unknown stage: "${stage}"`);
    this.name = "UnknownStageError";
  }
}

export class InvalidStageNameError extends Error {
  constructor(public readonly stage: string) {
    super(
      `Invalid stage name "${stage}": integer-like names are listed before ` +
        `all others, so the declared order cannot be kept`
    );
    this.name = "InvalidStageNameError";
  }
}

export class PipelineCycleError extends Error {
  constructor(public readonly cycle: readonly string[]) {
    super(`Pipeline contains a cycle: ${cycle.join(" -> ")}`);
    this.name = "PipelineCycleError";
  }
}

/**
 * Keys such as "0" or "42" are enumerated in ascending numeric order ahead
 * of every other key, whatever order they were declared in.
 */
export function isIntegerLikeStageName(name: string): boolean {
  return /^(0|[1-9]\d*)$/.test(name) && Number(name) < 2 ** 32 - 1;
}

// ---------------------------------------------------------------------------
// Graph
// ---------------------------------------------------------------------------

/**
 * Immutable dependency view over a pipeline.
 *
 * @example
 *   const graph = PipelineGraph.create({
 *     prepare: { rows: 100 },
 *     train: { data: { $link: "prepare" } },
 *   });
 *
 *   graph.dependenciesOf("train");        // Set { "prepare" }
 *   graph.subPipeline("train").stages;    // { prepare, train }
 */
export class PipelineGraph {
  private readonly names: readonly string[];
  private readonly position: ReadonlyMap<string, number>;

  private constructor(
    private readonly stages: PipelineSpec,
    private readonly dependencyIndex: ReadonlyMap<string, readonly string[]>
  ) {
    this.names = Object.freeze(Object.keys(stages));
    this.position = new Map(this.names.map((name, index) => [name, index]));
  }

  /**
   * Build and validate the graph for a pipeline.
   *
   * @throws InvalidStageNameError if a stage name is integer-like
   * @throws UnknownReferenceError if a link names a stage not in the pipeline
   * @throws PipelineCycleError if links form a cycle (including a self-link)
   */
  static create(pipeline: PipelineSpec): PipelineGraph {
    const index = new Map<string, readonly string[]>();

    for (const [name, spec] of Object.entries(pipeline)) {
      if (isIntegerLikeStageName(name)) {
        throw new InvalidStageNameError(name);
      }
      index.set(name, Object.freeze(directDependencies(name, spec, pipeline)));
    }

    const cycle = findCycle(Object.keys(pipeline), index);
    if (cycle) {
      throw new PipelineCycleError(cycle);
    }

    return new PipelineGraph(pipeline, index);
  }

  /** Stage names in declared order. */
  stageNames(): readonly string[] {
    return this.names;
  }

  has(stage: string): boolean {
    return this.dependencyIndex.has(stage);
  }

  /**
   * Stages that `stage` links to directly. Never contains `stage` itself.
   */
  dependenciesOf(stage: string): ReadonlySet<string> {
    return new Set(this.requireDependencies(stage));
  }

  /**
   * Stages that link directly to `stage`, in declared order.
   */
  dependents(stage: string): string[] {
    this.requireDependencies(stage);
    return this.names.filter((name) =>
      this.requireDependencies(name).includes(stage)
    );
  }

  /**
   * Restrict the pipeline to `stage` and everything it transitively depends on.
   */
  subPipeline(stage: string): SubPipeline {
    const closure = new Set<string>();
    const pending = [stage];

    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || closure.has(current)) {
        continue;
      }
      closure.add(current);
      pending.push(...this.requireDependencies(current));
    }

    const stages: Record<string, StageSpec> = {};
    for (const name of this.names) {
      if (closure.has(name)) {
        stages[name] = this.stages[name];
      }
    }

    return Object.freeze({
      name: stage,
      stages: Object.freeze(stages),
      dependencies: this.requireDependencies(stage),
    });
  }

  /**
   * True when every stage's dependencies are declared before it.
   */
  isDeclaredOrderTopological(): boolean {
    return this.names.every((name, index) =>
      this.requireDependencies(name).every(
        (dependency) => (this.position.get(dependency) ?? Infinity) < index
      )
    );
  }

  /**
   * A topological order that keeps declared order wherever dependencies allow.
   */
  topologicalOrder(): string[] {
    const emitted = new Set<string>();
    const order: string[] = [];

    while (order.length < this.names.length) {
      const next = this.names.find(
        (name) =>
          !emitted.has(name) &&
          this.requireDependencies(name).every((dependency) => emitted.has(dependency))
      );
      // Unreachable after cycle validation in create()
      if (next === undefined) {
        throw new PipelineCycleError(this.names.filter((name) => !emitted.has(name)));
      }
      emitted.add(next);
      order.push(next);
    }

    return order;
  }

  private requireDependencies(stage: string): readonly string[] {
    const dependencies = this.dependencyIndex.get(stage);
    if (dependencies === undefined) {
      throw new UnknownStageError(stage);
    }
    return dependencies;
  }
}

// ---------------------------------------------------------------------------
// Construction helpers
// ---------------------------------------------------------------------------

function directDependencies(
  name: string,
  spec: StageSpec,
  pipeline: PipelineSpec
): string[] {
  const dependencies: string[] = [];

  for (const link of collectLinks(spec)) {
    if (!Object.hasOwn(pipeline, link.stage)) {
      throw new UnknownReferenceError(name, link.stage);
    }
    if (link.stage === name) {
      throw new PipelineCycleError([name, name]);
    }
    if (!dependencies.includes(link.stage)) {
      dependencies.push(link.stage);
    }
  }

  return dependencies;
}

/**
 * Depth-first search for a cycle; returns its path (first node repeated at
 * the end) or null.
 */
function findCycle(
  names: readonly string[],
  index: ReadonlyMap<string, readonly string[]>
): string[] | null {
  const state = new Map<string, "visiting" | "done">();
  const path: string[] = [];

  const visit = (name: string): string[] | null => {
    const current = state.get(name);
    if (current === "done") {
      return null;
    }
    if (current === "visiting") {
      return [...path.slice(path.indexOf(name)), name];
    }

    state.set(name, "visiting");
    path.push(name);
    for (const dependency of index.get(name) ?? []) {
      const cycle = visit(dependency);
      if (cycle) {
        return cycle;
      }
    }
    path.pop();
    state.set(name, "done");
    return null;
  };

  for (const name of names) {
    const cycle = visit(name);
    if (cycle) {
      return cycle;
    }
  }
  return null;
}
