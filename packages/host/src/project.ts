/**
 * Project compilation: discover pages under a root and compile them with one
 * shared compiler, so every `_imports` file is parsed once per run.
 */

import type { Dirent } from "node:fs";
import { readdir, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  createPageCompiler,
  debug,
  hasErrors,
  joinPath,
  nullLogger,
  rootRelativePath,
  type FileContentProvider,
  type Logger,
  type NormalizedPath,
  type PageCompileResult,
  type PageCompiler,
} from "@strata/compiler";
import { toGeneratedPathForPage } from "@strata/shared";

import { loadConfigFile, mergeConfigs } from "./config-file.js";
import { formatDiagnostic, hostDiagnostic } from "./diagnostics.js";
import { createNodeFileProvider } from "./node-provider.js";
import { normalizeOptions, type ResolvedStrataOptions, type StrataOptions } from "./options.js";

export interface CompileProjectOptions extends StrataOptions {
  /** Base for a relative root. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Defaults to the file system. */
  provider?: FileContentProvider;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface PageOutcome {
  readonly page: NormalizedPath;
  readonly relativePath: string;
  readonly result: PageCompileResult;
  /** Where the generated module was written, when it was. */
  readonly outputPath: string | null;
}

export interface ProjectSummary {
  pages: number;
  succeeded: number;
  failed: number;
  warnings: number;
  written: number;
}

export interface ProjectCompileResult {
  readonly root: NormalizedPath;
  readonly outcomes: readonly PageOutcome[];
  readonly summary: ProjectSummary;
}

export interface DiscoverPagesOptions {
  importsFileName: string;
  pageExtension: string;
  exclude: readonly string[];
}

/**
 * Every page under `root`, sorted. Imports files are configuration, not pages,
 * and excluded directories are not descended into.
 */
export async function discoverPages(root: NormalizedPath, options: DiscoverPagesOptions): Promise<NormalizedPath[]> {
  const pages: NormalizedPath[] = [];
  const excluded = new Set(options.exclude);

  async function walk(dir: NormalizedPath): Promise<void> {
    const entries: Dirent[] = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (!excluded.has(entry.name)) await walk(joinPath(dir, entry.name));
        continue;
      }
      if (!entry.isFile()) continue;
      if (entry.name === options.importsFileName) continue;
      if (!entry.name.endsWith(options.pageExtension)) continue;
      pages.push(joinPath(dir, entry.name));
    }
  }

  await walk(root);
  debug.host("discover", { root, pages: pages.length });
  return pages;
}

/**
 * Options from the nearest `strata.config.json` (searched from `cwd` up to
 * `cwd`'s own root) merged under the inline options.
 */
export async function resolveProjectOptions(
  inline: StrataOptions,
  context: { cwd: string },
): Promise<ResolvedStrataOptions> {
  const fileConfig = await loadConfigFile(path.parse(path.resolve(context.cwd)).root, context.cwd);
  return normalizeOptions(mergeConfigs(fileConfig, inline), context);
}

export async function compileProject(options: CompileProjectOptions): Promise<ProjectCompileResult> {
  const { cwd = process.cwd(), provider = createNodeFileProvider(), logger = nullLogger, signal, ...inline } = options;
  const resolved = normalizeOptions(inline, { cwd });
  const compiler = createPageCompiler({
    root: resolved.root,
    provider,
    importsFileName: resolved.importsFileName,
    namespace: resolved.namespace,
    defaultModel: resolved.defaultModel,
    logger,
  });

  try {
    const pages = resolved.pages ?? (await discoverPages(resolved.root, resolved));
    logger.info(`compiling ${pages.length} page(s) under ${resolved.root}`);

    const outcomes: PageOutcome[] = [];
    for (const group of inGroups(pages, resolved.concurrency)) {
      signal?.throwIfAborted();
      const settled = await Promise.all(group.map((page) => compilePage(compiler, provider, page, resolved, logger, signal)));
      outcomes.push(...settled);
    }

    const summary = summarize(outcomes);
    logger.info(
      `${summary.succeeded} compiled, ${summary.failed} failed, ${summary.warnings} warning(s), ${summary.written} written`,
    );
    return { root: resolved.root, outcomes, summary };
  } finally {
    compiler.dispose();
  }
}

async function compilePage(
  compiler: PageCompiler,
  provider: FileContentProvider,
  page: NormalizedPath,
  options: ResolvedStrataOptions,
  logger: Logger,
  signal: AbortSignal | undefined,
): Promise<PageOutcome> {
  const relativePath = rootRelativePath(options.root, page) ?? page;

  let content: string;
  try {
    content = await provider.readContent(page);
  } catch (error) {
    const diagnostic = hostDiagnostic("page-read-failed", page, error);
    logger.error(formatDiagnostic(diagnostic));
    return { page, relativePath, result: { ok: false, diagnostics: [diagnostic] }, outputPath: null };
  }

  const result = await compiler.compile(page, content, signal ? { signal } : undefined);
  for (const diagnostic of result.diagnostics) {
    const text = diagnostic.span?.file === page ? content : undefined;
    const line = formatDiagnostic(diagnostic, text);
    if (diagnostic.severity === "error") logger.error(line);
    else logger.warn(line);
  }
  debug.host("page", { page, ok: result.ok, diagnostics: result.diagnostics.length });

  if (!result.ok || !options.write) {
    return { page, relativePath, result, outputPath: null };
  }

  const outputPath = toGeneratedPathForPage(page);
  try {
    await writeFile(outputPath, result.code, "utf-8");
  } catch (error) {
    const diagnostic = hostDiagnostic("output-write-failed", outputPath, error);
    logger.error(formatDiagnostic(diagnostic));
    return {
      page,
      relativePath,
      result: { ...result, diagnostics: [...result.diagnostics, diagnostic] },
      outputPath: null,
    };
  }
  return { page, relativePath, result, outputPath };
}

function* inGroups<T>(items: readonly T[], size: number): Generator<T[]> {
  for (let i = 0; i < items.length; i += size) {
    yield items.slice(i, i + size);
  }
}

function summarize(outcomes: readonly PageOutcome[]): ProjectSummary {
  const summary: ProjectSummary = { pages: outcomes.length, succeeded: 0, failed: 0, warnings: 0, written: 0 };
  for (const outcome of outcomes) {
    const { result } = outcome;
    if (result.ok && !hasErrors(result.diagnostics)) summary.succeeded++;
    else summary.failed++;
    summary.warnings += result.diagnostics.filter((d) => d.severity === "warning").length;
    if (outcome.outputPath) summary.written++;
  }
  return summary;
}
