import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, test, expect } from "vitest";

import { normalizePathForId } from "@strata/compiler";

import { createNodeFileProvider } from "../src/node-provider.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "strata-provider-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const id = (...segments: string[]) => normalizePathForId(path.join(dir, ...segments));

describe("createNodeFileProvider", () => {
  test("reports which paths are files", async () => {
    await mkdir(path.join(dir, "Views"));
    await writeFile(path.join(dir, "_imports.page"), "");
    const provider = createNodeFileProvider();

    expect(await provider.exists(id("_imports.page"))).toBe(true);
    expect(await provider.exists(id("Missing.page"))).toBe(false);
    expect(await provider.exists(id("Views"))).toBe(false);
    expect(await provider.exists(id("_imports.page", "child.page"))).toBe(false);
  });

  test("reads content as text", async () => {
    await writeFile(path.join(dir, "Index.page"), "<p>héllo</p>");
    expect(await createNodeFileProvider().readContent(id("Index.page"))).toBe("<p>héllo</p>");
  });

  test("the staleness token changes when the file changes size", async () => {
    const file = path.join(dir, "_imports.page");
    await writeFile(file, "<using namespace=\"A\"></using>");
    const provider = createNodeFileProvider();
    const before = await provider.readStalenessToken(id("_imports.page"));

    await writeFile(file, "<using namespace=\"App.Models\"></using>");

    expect(await provider.readStalenessToken(id("_imports.page"))).not.toBe(before);
  });

  test("reading a missing file rejects", async () => {
    await expect(createNodeFileProvider().readContent(id("Missing.page"))).rejects.toMatchObject({ code: "ENOENT" });
  });
});
