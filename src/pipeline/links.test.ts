/**
 * Link reference tests.
 *
 * Run: node --import tsx --test src/pipeline/links.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import {
  collectLinks,
  InvalidLinkError,
  isLink,
  parseLinkTarget,
  resolveLinks,
} from "./links.js";

// ═══════════════════════════════════════════════════════════════════════════
// RECOGNITION
// ═══════════════════════════════════════════════════════════════════════════

describe("isLink", () => {
  test("accepts a single $link key with a string value", () => {
    assert.equal(isLink({ $link: "train.model" }), true);
  });

  test("rejects objects with extra keys", () => {
    assert.equal(isLink({ $link: "train", other: 1 }), false);
  });

  test("rejects non-string targets and non-objects", () => {
    assert.equal(isLink({ $link: 3 }), false);
    assert.equal(isLink(["$link"]), false);
    assert.equal(isLink("$link"), false);
    assert.equal(isLink(null), false);
  });
});

describe("parseLinkTarget", () => {
  test("splits stage from path", () => {
    const target = parseLinkTarget("train.model.weights");
    assert.equal(target.stage, "train");
    assert.deepEqual(target.path, ["model", "weights"]);
    assert.equal(target.raw, "train.model.weights");
  });

  test("a bare stage name has an empty path", () => {
    assert.deepEqual(parseLinkTarget("prepare").path, []);
  });

  test("rejects empty stage and empty segments", () => {
    assert.throws(() => parseLinkTarget(""), InvalidLinkError);
    assert.throws(() => parseLinkTarget(".model"), InvalidLinkError);
    assert.throws(() => parseLinkTarget("train..model"), InvalidLinkError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// TRAVERSAL
// ═══════════════════════════════════════════════════════════════════════════

describe("collectLinks", () => {
  test("finds nested links in document order", () => {
    const links = collectLinks({
      data: { $link: "prepare" },
      model: { layers: [{ $link: "pretrain.encoder" }, 3] },
      optimizer: { lr: 0.1 },
    });
    assert.deepEqual(
      links.map((link) => link.raw),
      ["prepare", "pretrain.encoder"]
    );
  });

  test("returns nothing for a spec without links", () => {
    assert.deepEqual(collectLinks({ rows: 10, tags: ["a"] }), []);
    assert.deepEqual(collectLinks(42), []);
  });
});

describe("resolveLinks", () => {
  test("replaces every link with the looked-up value", () => {
    const resolved = resolveLinks(
      { data: { $link: "prepare.rows" }, list: [{ $link: "prepare" }], keep: true },
      (link) => `<${link.raw}>`
    );
    assert.deepEqual(resolved, {
      data: "<prepare.rows>",
      list: ["<prepare>"],
      keep: true,
    });
  });

  test("does not modify the input", () => {
    const spec = { data: { $link: "prepare" } };
    resolveLinks(spec, () => 1);
    assert.deepEqual(spec, { data: { $link: "prepare" } });
  });
});
