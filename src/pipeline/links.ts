/**
 * Link references between stages.
 *
 * A link is an object with the single key `$link` whose value names another
 * stage, optionally followed by a dotted path into that stage's output:
 *
 *   { "model": { "$link": "train.model" } }   // stage "train", path ["model"]
 *   { "data": { "$link": "prepare" } }        // the whole output of "prepare"
 */

import { isJsonObject, type JsonObject, type JsonValue } from "./types.js";

export const LINK_KEY = "$link";

export type LinkNode = { [LINK_KEY]: string };

export interface LinkTarget {
  /** Referenced stage name */
  readonly stage: string;
  /** Path into the referenced stage's output (may be empty) */
  readonly path: readonly string[];
  /** The link text as written */
  readonly raw: string;
}

export class InvalidLinkError extends Error {
  constructor(public readonly target: string, reason: string) {
    super(`Invalid link "${target}": ${reason}`);
    this.name = "InvalidLinkError";
  }
}

export function isLink(value: JsonValue): value is LinkNode {
  if (!isJsonObject(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length === 1 && keys[0] === LINK_KEY && typeof value[LINK_KEY] === "string";
}

export function parseLinkTarget(raw: string): LinkTarget {
  const [stage, ...path] = raw.split(".");
  if (stage === undefined || stage.trim() === "") {
    throw new InvalidLinkError(raw, "missing stage name");
  }
  if (path.some((segment) => segment === "")) {
    throw new InvalidLinkError(raw, "empty path segment");
  }
  return Object.freeze({ stage, path: Object.freeze(path), raw });
}

/**
 * Enumerate the links of a stage specification, depth first in document order.
 */
export function collectLinks(spec: JsonValue): LinkTarget[] {
  const found: LinkTarget[] = [];

  const visit = (value: JsonValue): void => {
    if (isLink(value)) {
      found.push(parseLinkTarget(value[LINK_KEY]));
    } else if (Array.isArray(value)) {
      value.forEach(visit);
    } else if (isJsonObject(value)) {
      Object.values(value).forEach(visit);
    }
  };

  visit(spec);
  return found;
}

/**
 * Copy a specification, replacing each link with the value `lookup` returns.
 */
export function resolveLinks(
  spec: JsonValue,
  lookup: (link: LinkTarget) => JsonValue
): JsonValue {
  if (isLink(spec)) {
    return lookup(parseLinkTarget(spec[LINK_KEY]));
  }
  if (Array.isArray(spec)) {
    return spec.map((item) => resolveLinks(item, lookup));
  }
  if (isJsonObject(spec)) {
    const copy: JsonObject = {};
    for (const [key, value] of Object.entries(spec)) {
      copy[key] = resolveLinks(value, lookup);
    }
    return copy;
  }
  return spec;
}
