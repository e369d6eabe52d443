/**
 * Pipeline data model.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Specification of one stage. Opaque to the scheduler apart from the links
 * embedded in it.
 */
export type StageSpec = JsonValue;

/**
 * Ordered mapping from stage name to stage specification.
 * Key order is the declared order and must be a topological order.
 */
export type PipelineSpec = Readonly<Record<string, StageSpec>>;

/**
 * A stage together with everything it transitively depends on.
 */
export interface SubPipeline {
  /** The stage this view is scoped to */
  readonly name: string;
  /** The stage and its transitive inputs, in declared order */
  readonly stages: PipelineSpec;
  /** Direct dependencies, in order of first reference */
  readonly dependencies: readonly string[];
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
