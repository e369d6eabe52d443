/**
 * Pipeline module: data model, link references, dependency graph.
 */

export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  StageSpec,
  PipelineSpec,
  SubPipeline,
} from "./types.js";
export { isJsonObject } from "./types.js";

export {
  LINK_KEY,
  isLink,
  parseLinkTarget,
  collectLinks,
  resolveLinks,
  InvalidLinkError,
  type LinkNode,
  type LinkTarget,
} from "./links.js";

export {
  PipelineGraph,
  isIntegerLikeStageName,
  InvalidStageNameError,
  UnknownReferenceError,
  UnknownStageError,
  PipelineCycleError,
} from "./graph.js";
