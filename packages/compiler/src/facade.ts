/* =======================================================================================
 * PAGE COMPILER FACADE
 * ---------------------------------------------------------------------------------------
 * parse page -> resolve ancestor chain -> merge -> name -> substitute model -> generate
 *
 * Collaborators are created (or accepted) up front in createPageCompiler; nothing
 * is initialized lazily. The chunk tree cache is the only state shared between
 * compiles, so overlapping compile() calls are safe.
 * ======================================================================================= */

import type { FileContentProvider } from "./io/file-provider.js";
import type { ChunkTree } from "./model/chunk-tree.js";
import { normalizePathForId, rootRelativePath, type NormalizedPath } from "./model/identity.js";
import { directiveParser, type TemplateParser } from "./parsing/directive-parser.js";
import { isIdentifierName, isTypeExpression } from "./parsing/type-syntax.js";
import { AncestorChainResolver, type ChainEntryResult } from "./inheritance/ancestor-chain.js";
import { ChunkTreeCache, type CacheRequestOptions } from "./inheritance/chunk-tree-cache.js";
import { DEFAULT_INHERITED_CHUNKS } from "./inheritance/defaults.js";
import { mergeChunkTrees, type EffectiveChunkTree } from "./inheritance/merge.js";
import { referenceGenerator, type CodeGenerator } from "./emit/generator.js";
import {
  resolveModelType,
  sanitizeClassName,
  substituteModelType,
  type NamingContext,
} from "./emit/naming.js";
import type { SpanMapping } from "./emit/writer.js";
import type { CompilerDiagnostic } from "./shared/diagnostics.js";
import { ContractError, ContractErrorCode } from "./shared/errors.js";
import { nullLogger, type Logger } from "./shared/logger.js";

/** Base name of the per-directory configuration file. */
export const DEFAULT_IMPORTS_FILE_NAME = "_imports.page";

/** Namespace that holds every generated page class. */
export const DEFAULT_TARGET_NAMESPACE = "Strata.Views";

/** Model type for pages without a `<model>` directive. */
export const DEFAULT_MODEL_TYPE = "unknown";

export interface PageCompilerOptions {
  /** Application root; pages and `_imports` files above it are never considered. */
  root: string;
  provider: FileContentProvider;
  parser?: TemplateParser;
  generator?: CodeGenerator;
  /** Share one cache between compilers; created from provider and parser when omitted. */
  cache?: ChunkTreeCache;
  /** Chunks every page inherits first. */
  defaults?: ChunkTree;
  importsFileName?: string;
  namespace?: string;
  defaultModel?: string;
  logger?: Logger;
}

export interface ResolvedPageCompilerOptions {
  root: NormalizedPath;
  importsFileName: string;
  namespace: string;
  defaultModel: string;
}

export type PageCompileResult =
  | {
      readonly ok: false;
      /** The page's own parse diagnostics; nothing else ran. */
      readonly diagnostics: readonly CompilerDiagnostic[];
    }
  | {
      readonly ok: true;
      readonly code: string;
      readonly mappings: readonly SpanMapping[];
      /** Merged tree with the model type already substituted. */
      readonly effective: EffectiveChunkTree;
      readonly naming: NamingContext;
      /** Page warnings, ancestor diagnostics (as warnings) and generator findings. */
      readonly diagnostics: readonly CompilerDiagnostic[];
    };

export interface PageCompiler {
  readonly options: Readonly<ResolvedPageCompilerOptions>;
  readonly cache: ChunkTreeCache;

  /** Compile one page. Throws ContractError for bad identities or after dispose(). */
  compile(page: NormalizedPath, rawContent: string, options?: CacheRequestOptions): Promise<PageCompileResult>;

  /** Every `_imports` file the page would inherit from, with its lookup outcome. */
  getInheritedChunkTreeResults(page: NormalizedPath, options?: CacheRequestOptions): Promise<readonly ChainEntryResult[]>;

  /** Dispose the chunk tree cache; the compiler is unusable afterwards. */
  dispose(): void;
}

/**
 * Validate user options and fill defaults.
 *
 * @throws ContractError(INVALID_OPTIONS)
 */
export function normalizePageCompilerOptions(options: {
  root: string;
  importsFileName?: string | undefined;
  namespace?: string | undefined;
  defaultModel?: string | undefined;
}): ResolvedPageCompilerOptions {
  if (!options.root) {
    throw new ContractError("A root directory is required.", ContractErrorCode.INVALID_OPTIONS);
  }
  const importsFileName = options.importsFileName ?? DEFAULT_IMPORTS_FILE_NAME;
  if (!importsFileName || /[\\/]/.test(importsFileName)) {
    throw new ContractError(
      `importsFileName '${importsFileName}' must be a bare file name.`,
      ContractErrorCode.INVALID_OPTIONS,
    );
  }
  const namespace = options.namespace ?? DEFAULT_TARGET_NAMESPACE;
  if (!namespace.split(".").every(isIdentifierName)) {
    throw new ContractError(`namespace '${namespace}' must be a dotted identifier.`, ContractErrorCode.INVALID_OPTIONS);
  }
  const defaultModel = options.defaultModel ?? DEFAULT_MODEL_TYPE;
  if (!isTypeExpression(defaultModel)) {
    throw new ContractError(`defaultModel '${defaultModel}' is not a type expression.`, ContractErrorCode.INVALID_OPTIONS);
  }
  return { root: normalizePathForId(options.root), importsFileName, namespace, defaultModel };
}

export function createPageCompiler(options: PageCompilerOptions): PageCompiler {
  const resolved = normalizePageCompilerOptions(options);
  const logger = options.logger ?? nullLogger;
  const parser = options.parser ?? directiveParser;
  const generator = options.generator ?? referenceGenerator;
  const defaults = options.defaults ?? DEFAULT_INHERITED_CHUNKS;
  const cache = options.cache ?? new ChunkTreeCache({ provider: options.provider, parser, logger });
  const chain = new AncestorChainResolver({
    root: resolved.root,
    importsFileName: resolved.importsFileName,
    cache,
  });
  let disposed = false;

  function assertUsable(): void {
    if (disposed) {
      throw new ContractError("PageCompiler has been disposed.", ContractErrorCode.DISPOSED);
    }
  }

  function relativePathOf(page: NormalizedPath): string {
    const relative = rootRelativePath(resolved.root, page);
    if (relative === null) {
      throw new ContractError(
        `Page '${page}' is outside the application root '${resolved.root}'.`,
        ContractErrorCode.OUTSIDE_ROOT,
        page,
      );
    }
    return relative;
  }

  async function compile(page: NormalizedPath, rawContent: string, request?: CacheRequestOptions): Promise<PageCompileResult> {
    assertUsable();
    // Identity errors surface before any work is done.
    chain.computeChain(page);
    const relativePath = relativePathOf(page);
    request?.signal?.throwIfAborted();

    const parsed = parser.parse(rawContent, page);
    if (!parsed.ok) {
      logger.warn(`${relativePath}: ${parsed.diagnostics.length} parse error(s)`);
      return { ok: false, diagnostics: parsed.diagnostics };
    }

    const resolution = await chain.resolveChain(page, request);
    const merged = mergeChunkTrees(defaults, resolution.value.trees, parsed.tree);

    const modelType = resolveModelType(merged, resolved.defaultModel);
    const naming: NamingContext = {
      relativePath,
      className: sanitizeClassName(relativePath),
      namespace: resolved.namespace,
      modelType,
    };
    const effective = substituteModelType(merged, modelType);
    const generated = generator.generate(effective, naming);

    return {
      ok: true,
      code: generated.code,
      mappings: generated.mappings,
      effective,
      naming,
      diagnostics: [...parsed.diagnostics, ...resolution.diagnostics, ...generated.diagnostics],
    };
  }

  async function getInheritedChunkTreeResults(
    page: NormalizedPath,
    request?: CacheRequestOptions,
  ): Promise<readonly ChainEntryResult[]> {
    assertUsable();
    const resolution = await chain.resolveChain(page, request);
    return resolution.value.entries;
  }

  return {
    options: resolved,
    cache,
    compile,
    getInheritedChunkTreeResults,
    dispose(): void {
      disposed = true;
      cache.dispose();
    },
  };
}
