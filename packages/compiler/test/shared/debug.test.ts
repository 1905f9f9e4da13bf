/**
 * Debug channels: STRATA_DEBUG activation and output formatting.
 */
import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { configureDebug, debug, refreshDebugChannels } from "../../src/shared/debug.js";

function setDebugEnv(value: string | undefined): void {
  if (value === undefined) {
    delete process.env["STRATA_DEBUG"];
  } else {
    process.env["STRATA_DEBUG"] = value;
  }
  refreshDebugChannels();
}

function writeEveryChannel(): void {
  debug.parse("x");
  debug.cache("x");
  debug.chain("x");
  debug.merge("x");
  debug.emit("x");
  debug.host("x");
}

describe("debug channels", () => {
  let originalEnv: string | undefined;
  let messages: string[];

  beforeEach(() => {
    originalEnv = process.env["STRATA_DEBUG"];
    messages = [];
    configureDebug({ format: "pretty", output: (msg) => messages.push(msg) });
  });

  afterEach(() => {
    setDebugEnv(originalEnv);
    configureDebug({ format: "pretty", output: console.log });
  });

  test("nothing is written without STRATA_DEBUG", () => {
    setDebugEnv(undefined);
    writeEveryChannel();
    expect(messages).toEqual([]);
  });

  test.each(["0", "false"])("%s disables every channel", (value) => {
    setDebugEnv(value);
    writeEveryChannel();
    expect(messages).toEqual([]);
  });

  test("a comma list enables just those channels, case-insensitively", () => {
    setDebugEnv(" Cache , merge");
    writeEveryChannel();
    expect(messages).toEqual(["[cache.x]", "[merge.x]"]);
  });

  test.each(["*", "1", "true"])("%s enables every channel", (value) => {
    setDebugEnv(value);
    writeEveryChannel();
    expect(messages).toEqual(["[parse.x]", "[cache.x]", "[chain.x]", "[merge.x]", "[emit.x]", "[host.x]"]);
  });

  test("pretty format quotes strings and writes other values as they are", () => {
    setDebugEnv("cache,host");

    debug.cache("parse", { file: "/app/_imports.page", token: "3", stale: false });
    debug.host("page", { page: "/app/Index.page", ok: true, diagnostics: 0, previous: null });
    debug.host("done", {});

    expect(messages).toEqual([
      '[cache.parse] { file="/app/_imports.page", token="3", stale=false }',
      '[host.page] { page="/app/Index.page", ok=true, diagnostics=0, previous=null }',
      "[host.done]",
    ]);
  });

  test("json format emits one object per line", () => {
    setDebugEnv("chain");
    configureDebug({ format: "json" });

    debug.chain("lookup", { file: "/app/_imports.page", status: "absent" });
    debug.chain("done");

    expect(messages.map((m) => JSON.parse(m))).toEqual([
      { channel: "chain", point: "lookup", data: { file: "/app/_imports.page", status: "absent" } },
      { channel: "chain", point: "done" },
    ]);
  });
});
