import { describe, test, expect, vi } from "vitest";

import { createPageCompiler, normalizePageCompilerOptions } from "../../src/facade.js";
import { normalizePathForId } from "../../src/model/identity.js";
import { createMemoryFileProvider, type MemoryFileProvider } from "../../src/io/memory-provider.js";
import { ContractErrorCode } from "../../src/shared/errors.js";
import type { Logger } from "../../src/shared/logger.js";

const PAGE = normalizePathForId("/app/Views/Home/Index.page");

const PAGE_CONTENT = [
  '<model type="Person"></model>',
  '<using namespace="App.Models"></using>',
  "<h1>Hello</h1>",
].join("\n");

const IMPORTS = {
  "/app/_imports.page": '<using namespace="App.Shared"></using>',
  "/app/Views/_imports.page": [
    '<add-tag-helper lookup="*, App.TagHelpers"></add-tag-helper>',
    '<inject type="Logger<TModel>" as="Log"></inject>',
  ].join("\n"),
};

function setup(files: Record<string, string> = IMPORTS, logger?: Logger) {
  const provider: MemoryFileProvider = createMemoryFileProvider({ files });
  const compiler = createPageCompiler({ root: "/app", provider, ...(logger ? { logger } : {}) });
  return { provider, compiler };
}

function capturingLogger() {
  return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe("createPageCompiler", () => {
  test("compiles a page against defaults and every ancestor imports file", async () => {
    const { compiler } = setup();

    const result = await compiler.compile(PAGE, PAGE_CONTENT);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.code).toBe(
      [
        '// Generated from "/Views/Home/Index.page".',
        'import * as _strata_runtime from "@strata/runtime";',
        'import * as _strata_runtime_rendering from "@strata/runtime/rendering";',
        'import * as App_Shared from "App.Shared";',
        'import * as App_Models from "App.Models";',
        "",
        "export namespace Strata.Views {",
        "  export class _Views_Home_Index_page extends Page<Person> {",
        '    static readonly namespaces: readonly object[] = [_strata_runtime, _strata_runtime_rendering, App_Shared, App_Models];',
        "    static readonly tagHelpers: readonly string[] = [",
        '      "UrlResolutionTagHelper, @strata/runtime",',
        '      "*, App.TagHelpers",',
        "    ];",
        "",
        "    Html!: HtmlHelper<Person>;",
        "    Json!: JsonHelper;",
        "    Component!: ComponentHelper;",
        "    Url!: UrlHelper;",
        "    ModelExpressionProvider!: ModelExpressionProvider;",
        "    Log!: Logger<Person>;",
        "",
        '    static readonly injectedProperties: readonly string[] = ["Html", "Json", "Component", "Url", "ModelExpressionProvider", "Log"];',
        "",
        '    static readonly template: string = "<h1>Hello</h1>";',
        "  }",
        "}",
        "",
      ].join("\n"),
    );
    expect(result.naming).toEqual({
      relativePath: "/Views/Home/Index.page",
      className: "_Views_Home_Index_page",
      namespace: "Strata.Views",
      modelType: "Person",
    });
    expect(result.diagnostics).toEqual([]);
  });

  test("mappings point generated lines back at the files that authored them", async () => {
    const { compiler } = setup();

    const result = await compiler.compile(PAGE, PAGE_CONTENT);

    if (!result.ok) throw new Error("expected a successful compile");
    const sources = result.mappings.map((m) => [m.source.file, result.code.slice(m.target.start, m.target.end)]);
    expect(sources).toEqual([
      ["/app/_imports.page", 'import * as App_Shared from "App.Shared";'],
      [PAGE, 'import * as App_Models from "App.Models";'],
      ["/app/Views/_imports.page", '"*, App.TagHelpers",'],
      ["/app/Views/_imports.page", "Log!: Logger<Person>;"],
    ]);
  });

  test("pages without a model directive use the default model", async () => {
    const { compiler } = setup({});

    const result = await compiler.compile(PAGE, "<p>plain</p>");

    if (!result.ok) throw new Error("expected a successful compile");
    expect(result.naming.modelType).toBe("unknown");
    expect(result.effective.baseType?.typeName).toBe("Page<unknown>");
    expect(result.code).toContain("    Html!: HtmlHelper<unknown>;\n");
  });

  test("a page parse error is fatal and reports only the page's diagnostics", async () => {
    const logger = capturingLogger();
    const { compiler } = setup(IMPORTS, logger);

    const result = await compiler.compile(PAGE, '<inject type="Logger"></inject>');

    expect(result.ok).toBe(false);
    expect(result.diagnostics.map((d) => [d.code, d.stage, d.severity])).toEqual([
      ["directive-missing-attribute", "parse", "error"],
    ]);
    expect(logger.warn).toHaveBeenCalledWith("/Views/Home/Index.page: 1 parse error(s)");
    expect(compiler.cache.stats().parses).toBe(0);
  });

  test("a broken ancestor is skipped with warnings", async () => {
    const { compiler } = setup({
      "/app/_imports.page": "<inherits></inherits>",
      "/app/Views/_imports.page": '<using namespace="App.Shared"></using>',
    });

    const result = await compiler.compile(PAGE, PAGE_CONTENT);

    if (!result.ok) throw new Error("expected a successful compile");
    expect(result.effective.baseType?.typeName).toBe("Page<Person>");
    expect(result.effective.namespaces.map((c) => c.name)).toContain("App.Shared");
    expect(result.diagnostics.map((d) => [d.code, d.severity])).toEqual([
      ["directive-missing-attribute", "warning"],
      ["imports-parse-failed", "warning"],
    ]);
  });

  test("markup in an imports file is ignored with a warning", async () => {
    const { compiler } = setup({ "/app/_imports.page": "<footer>shared</footer>" });

    const result = await compiler.compile(PAGE, "<p>page</p>");

    if (!result.ok) throw new Error("expected a successful compile");
    expect(result.code).toContain('    static readonly template: string = "<p>page</p>";\n');
    expect(result.diagnostics.map((d) => d.code)).toEqual(["imports-content-ignored"]);
  });

  test("an edited ancestor is re-parsed on the next compile", async () => {
    const { compiler, provider } = setup();
    await compiler.compile(PAGE, PAGE_CONTENT);
    const parsesBefore = compiler.cache.stats().parses;

    provider.writeFile("/app/Views/_imports.page", '<inherits type="LayoutPage<TModel>"></inherits>');
    const result = await compiler.compile(PAGE, PAGE_CONTENT);

    if (!result.ok) throw new Error("expected a successful compile");
    expect(result.code).toContain("  export class _Views_Home_Index_page extends LayoutPage<Person> {\n");
    expect(compiler.cache.stats().parses).toBe(parsesBefore + 1);
  });

  test("editing an unrelated imports file does not re-parse the chain", async () => {
    const { compiler, provider } = setup({ ...IMPORTS, "/app/Admin/_imports.page": "" });
    await compiler.compile(PAGE, PAGE_CONTENT);
    const parsesBefore = compiler.cache.stats().parses;

    provider.writeFile("/app/Admin/_imports.page", '<using namespace="App.Admin"></using>');
    await compiler.compile(PAGE, PAGE_CONTENT);

    expect(compiler.cache.stats().parses).toBe(parsesBefore);
  });

  test("unchanged ancestors are served from the cache", async () => {
    const { compiler } = setup();
    await compiler.compile(PAGE, PAGE_CONTENT);
    await compiler.compile(normalizePathForId("/app/Views/Home/About.page"), "<p>about</p>");

    expect(compiler.cache.stats()).toMatchObject({ parses: 2, hits: 3 });
  });

  test("output is deterministic across compilers", async () => {
    const first = await setup().compiler.compile(PAGE, PAGE_CONTENT);
    const second = await setup().compiler.compile(PAGE, PAGE_CONTENT);
    expect(first).toEqual(second);
  });

  test("lists the inherited imports files with their status", async () => {
    const { compiler } = setup();

    const entries = await compiler.getInheritedChunkTreeResults(PAGE);

    expect(entries.map((e) => [e.file, e.status])).toEqual([
      ["/app/_imports.page", "found"],
      ["/app/Views/_imports.page", "found"],
      ["/app/Views/Home/_imports.page", "absent"],
    ]);
  });

  test("pages outside the root are rejected", async () => {
    const { compiler } = setup();
    await expect(compiler.compile(normalizePathForId("/elsewhere/Index.page"), "")).rejects.toMatchObject({
      code: ContractErrorCode.OUTSIDE_ROOT,
    });
  });

  test("a disposed compiler cannot be used", async () => {
    const { compiler } = setup();
    compiler.dispose();
    await expect(compiler.compile(PAGE, PAGE_CONTENT)).rejects.toMatchObject({ code: ContractErrorCode.DISPOSED });
    await expect(compiler.getInheritedChunkTreeResults(PAGE)).rejects.toMatchObject({ code: ContractErrorCode.DISPOSED });
  });

  test("an aborted request rejects with the signal's reason", async () => {
    const { compiler } = setup();
    const controller = new AbortController();
    controller.abort(new Error("stop"));
    await expect(compiler.compile(PAGE, PAGE_CONTENT, { signal: controller.signal })).rejects.toThrow("stop");
  });
});

describe("normalizePageCompilerOptions", () => {
  test("fills defaults and normalizes the root", () => {
    expect(normalizePageCompilerOptions({ root: "/app/" })).toEqual({
      root: "/app",
      importsFileName: "_imports.page",
      namespace: "Strata.Views",
      defaultModel: "unknown",
    });
  });

  test.each([
    [{ root: "" }],
    [{ root: "/app", importsFileName: "nested/_imports.page" }],
    [{ root: "/app", namespace: "Strata..Views" }],
    [{ root: "/app", defaultModel: "Foo<" }],
  ])("rejects %j", (options) => {
    let caught: unknown;
    try {
      normalizePageCompilerOptions(options);
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: ContractErrorCode.INVALID_OPTIONS });
  });
});
