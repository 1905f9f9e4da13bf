import { describe, test, expect } from "vitest";

import {
  addTagHelper,
  inject,
  namespaceImport,
  opaque,
  removeTagHelper,
  setBaseType,
  type Chunk,
} from "../../src/model/chunks.js";
import { createChunkTree, DEFAULTS_TREE_ID } from "../../src/model/chunk-tree.js";
import { normalizePathForId } from "../../src/model/identity.js";
import { sourceSpan } from "../../src/model/span.js";
import { mergeChunkTrees } from "../../src/inheritance/merge.js";
import { generatePageModule, referenceGenerator } from "../../src/emit/generator.js";
import { substituteModelType, type NamingContext } from "../../src/emit/naming.js";

const PAGE = normalizePathForId("/app/Views/Home/Index.page");

const naming: NamingContext = {
  relativePath: "/Views/Home/Index.page",
  className: "_Views_Home_Index_page",
  namespace: "Strata.Views",
  modelType: "Person",
};

function effectiveOf(defaults: Chunk[], page: Chunk[]) {
  return mergeChunkTrees(createChunkTree(DEFAULTS_TREE_ID, defaults), [], createChunkTree(PAGE, page));
}

describe("generatePageModule", () => {
  test("emits imports, the page class and its static members", () => {
    const effective = substituteModelType(
      effectiveOf(
        [
          namespaceImport("@strata/runtime"),
          inject("HtmlHelper<TModel>", "Html"),
          addTagHelper("UrlResolutionTagHelper, @strata/runtime"),
          setBaseType("Page<TModel>"),
        ],
        [opaque("markup", "<h1>Hello</h1>")],
      ),
      "Person",
    );

    const generated = generatePageModule(effective, naming);

    expect(generated.code).toBe(
      [
        '// Generated from "/Views/Home/Index.page".',
        'import * as _strata_runtime from "@strata/runtime";',
        "",
        "export namespace Strata.Views {",
        "  export class _Views_Home_Index_page extends Page<Person> {",
        "    static readonly namespaces: readonly object[] = [_strata_runtime];",
        "    static readonly tagHelpers: readonly string[] = [",
        '      "UrlResolutionTagHelper, @strata/runtime",',
        "    ];",
        "",
        "    Html!: HtmlHelper<Person>;",
        "",
        '    static readonly injectedProperties: readonly string[] = ["Html"];',
        "",
        '    static readonly template: string = "<h1>Hello</h1>";',
        "  }",
        "}",
        "",
      ].join("\n"),
    );
    expect(generated.mappings).toEqual([]);
    expect(generated.diagnostics).toEqual([]);
  });

  test("an empty tree still produces a class", () => {
    const generated = generatePageModule(effectiveOf([], []), { ...naming, relativePath: "/a.page", className: "_a_page" });

    expect(generated.code).toBe(
      [
        '// Generated from "/a.page".',
        "",
        "export namespace Strata.Views {",
        "  export class _a_page {",
        "    static readonly namespaces: readonly object[] = [];",
        "    static readonly tagHelpers: readonly string[] = [];",
        "",
        "    static readonly injectedProperties: readonly string[] = [];",
        "",
        '    static readonly template: string = "";',
        "  }",
        "}",
        "",
      ].join("\n"),
    );
  });

  test("authored chunks map onto the lines generated for them", () => {
    const nsSpan = sourceSpan(PAGE, 0, 36);
    const baseSpan = sourceSpan(PAGE, 37, 70);
    const injectSpan = sourceSpan(PAGE, 71, 110);
    const helperSpan = sourceSpan(PAGE, 111, 150);
    const effective = effectiveOf(
      [],
      [
        namespaceImport("App.Models", nsSpan),
        setBaseType("AppPage", baseSpan),
        inject("Logger", "Log", injectSpan),
        addTagHelper("*, App.TagHelpers", helperSpan),
      ],
    );

    const { code, mappings } = generatePageModule(effective, naming);
    const projected = mappings.map((m) => [m.source, code.slice(m.target.start, m.target.end)]);

    expect(projected).toEqual([
      [nsSpan, 'import * as App_Models from "App.Models";'],
      [baseSpan, "export class _Views_Home_Index_page extends AppPage {"],
      [helperSpan, '"*, App.TagHelpers",'],
      [injectSpan, "Log!: Logger;"],
    ]);
  });

  test("namespace aliases that collide after sanitizing get a suffix", () => {
    const { code } = generatePageModule(effectiveOf([namespaceImport("a.b"), namespaceImport("a_b")], []), naming);
    expect(code.split("\n").slice(1, 3)).toEqual(['import * as a_b from "a.b";', 'import * as a_b_2 from "a_b";']);
    expect(code).toContain("    static readonly namespaces: readonly object[] = [a_b, a_b_2];\n");
  });

  test("markup chunks join into the template; the model chunk is not markup", () => {
    const { code } = generatePageModule(
      effectiveOf([], [opaque("model", "Person"), opaque("markup", "<h1>Hi</h1>"), opaque("markup", '<p class="x"></p>')]),
      naming,
    );
    expect(code).toContain('    static readonly template: string = "<h1>Hi</h1>\\n<p class=\\"x\\"></p>";\n');
  });

  test("removes that had no effect are reported as warnings", () => {
    const span = sourceSpan(PAGE, 3, 40);
    const generated = generatePageModule(effectiveOf([addTagHelper("A")], [removeTagHelper("Missing*", span)]), naming);

    expect(generated.diagnostics).toEqual([
      {
        code: "tag-helper-remove-unmatched",
        message: "Removing tag helpers 'Missing*' had no effect; no matching lookup was registered.",
        stage: "emit",
        severity: "warning",
        span,
        data: { lookup: "Missing*" },
      },
    ]);
  });

  test("equal inputs give identical output", () => {
    const build = () => effectiveOf([namespaceImport("X"), inject("T", "P")], [opaque("markup", "<p></p>")]);
    expect(referenceGenerator.generate(build(), naming)).toEqual(referenceGenerator.generate(build(), naming));
  });
});
