import { describe, test, expect } from "vitest";

import { inject, opaque, setBaseType, type Chunk } from "../../src/model/chunks.js";
import { createChunkTree, DEFAULTS_TREE_ID } from "../../src/model/chunk-tree.js";
import { normalizePathForId } from "../../src/model/identity.js";
import { sourceSpan } from "../../src/model/span.js";
import { mergeChunkTrees } from "../../src/inheritance/merge.js";
import { MODEL_DIRECTIVE } from "../../src/parsing/directive-parser.js";
import {
  resolveModelType,
  sanitizeClassName,
  sanitizeIdentifier,
  substituteModelType,
} from "../../src/emit/naming.js";

const PAGE = normalizePathForId("/app/Index.page");

function effectiveOf(defaults: Chunk[], page: Chunk[]) {
  return mergeChunkTrees(createChunkTree(DEFAULTS_TREE_ID, defaults), [], createChunkTree(PAGE, page));
}

describe("sanitizeIdentifier", () => {
  test.each([
    ["App.Models", "App_Models"],
    ["@strata/runtime", "_strata_runtime"],
    ["a-b c", "a_b_c"],
    ["9lives", "_9lives"],
    ["$ok", "$ok"],
    ["", "_"],
  ])("%j -> %j", (input, expected) => {
    expect(sanitizeIdentifier(input)).toBe(expected);
  });
});

describe("sanitizeClassName", () => {
  test("derives the class name from the root-relative path", () => {
    expect(sanitizeClassName("/Views/Home/Index.page")).toBe("_Views_Home_Index_page");
  });

  test("distinct directories give distinct names", () => {
    expect(sanitizeClassName("/Admin/Index.page")).not.toBe(sanitizeClassName("/Views/Index.page"));
  });
});

describe("resolveModelType", () => {
  test("uses the page's model directive", () => {
    expect(resolveModelType(effectiveOf([], [opaque(MODEL_DIRECTIVE, "Person")]), "unknown")).toBe("Person");
  });

  test("falls back to the default without one", () => {
    expect(resolveModelType(effectiveOf([], [opaque("markup", "<p></p>")]), "unknown")).toBe("unknown");
  });
});

describe("substituteModelType", () => {
  test("replaces the placeholder in the base type and injections, keeping spans", () => {
    const span = sourceSpan(PAGE, 0, 12);
    const plain = inject("JsonHelper", "Json");
    const effective = effectiveOf(
      [setBaseType("Page<TModel>"), plain],
      [inject("Grid<TModel, TModelRow>", "Grid", span)],
    );

    const substituted = substituteModelType(effective, "Person");

    expect(substituted.baseType).toEqual(setBaseType("Page<Person>"));
    expect(substituted.injections).toEqual([plain, inject("Grid<Person, TModelRow>", "Grid", span)]);
    expect(substituted.injections[0]).toBe(plain);
    expect(effective.baseType?.typeName).toBe("Page<TModel>");
  });

  test("dollar signs in the model type are copied literally", () => {
    const effective = effectiveOf([setBaseType("Page<TModel>"), inject("HtmlHelper<TModel>", "Html")], []);

    const substituted = substituteModelType(effective, "A$$B");

    expect(substituted.baseType?.typeName).toBe("Page<A$$B>");
    expect(substituted.injections[0]?.typeName).toBe("HtmlHelper<A$$B>");
  });

  test("a tree without a base type keeps none", () => {
    expect(substituteModelType(effectiveOf([], []), "Person").baseType).toBeNull();
  });
});
