import path from "node:path";

import {
  ContractError,
  ContractErrorCode,
  normalizePageCompilerOptions,
  normalizePathForId,
  rootRelativePath,
  type NormalizedPath,
} from "@strata/compiler";

// ============================================================================
// Options
// ============================================================================

export interface StrataOptions {
  /** Application root. Relative paths resolve against the working directory. */
  root?: string;
  /** Pages to compile, relative to the root. Discovered when omitted. */
  pages?: string[];
  /** Base name of the per-directory configuration file. */
  importsFileName?: string;
  /** Namespace holding the generated classes. */
  namespace?: string;
  /** Model type for pages without a `<model>` directive. */
  defaultModel?: string;
  /** Extension that marks a file as a page during discovery. */
  pageExtension?: string;
  /** Directory names never descended into during discovery. */
  exclude?: string[];
  /** Pages compiled at the same time. */
  concurrency?: number;
  /** Write `<page>.g.ts` beside every page that compiles. */
  write?: boolean;
}

export interface ResolvedStrataOptions {
  root: NormalizedPath;
  pages: NormalizedPath[] | null;
  importsFileName: string;
  namespace: string;
  defaultModel: string;
  pageExtension: string;
  exclude: string[];
  concurrency: number;
  write: boolean;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_PAGE_EXTENSION = ".page";

export const DEFAULT_EXCLUDED_DIRECTORIES: readonly string[] = ["node_modules"];

export const DEFAULT_CONCURRENCY = 8;

// ============================================================================
// Normalization
// ============================================================================

export interface NormalizeOptionsContext {
  /** Base for a relative `root`. */
  cwd: string;
}

/**
 * Apply defaults and validate.
 *
 * @throws ContractError(INVALID_OPTIONS)
 */
export function normalizeOptions(
  options: StrataOptions | undefined,
  context: NormalizeOptionsContext,
): ResolvedStrataOptions {
  const opts = options ?? {};
  const compiler = normalizePageCompilerOptions({
    root: path.resolve(context.cwd, opts.root ?? "."),
    importsFileName: opts.importsFileName,
    namespace: opts.namespace,
    defaultModel: opts.defaultModel,
  });

  const concurrency = opts.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ContractError(`concurrency must be a positive integer, got ${concurrency}.`, ContractErrorCode.INVALID_OPTIONS);
  }

  const pageExtension = opts.pageExtension ?? DEFAULT_PAGE_EXTENSION;
  if (!pageExtension.startsWith(".")) {
    throw new ContractError(`pageExtension '${pageExtension}' must start with a dot.`, ContractErrorCode.INVALID_OPTIONS);
  }

  return {
    ...compiler,
    pages: opts.pages ? opts.pages.map((page) => resolvePage(compiler.root, page)) : null,
    pageExtension,
    exclude: opts.exclude ? [...opts.exclude] : [...DEFAULT_EXCLUDED_DIRECTORIES],
    concurrency,
    write: opts.write ?? false,
  };
}

function resolvePage(root: NormalizedPath, page: string): NormalizedPath {
  const resolved = normalizePathForId(path.isAbsolute(page) ? page : path.posix.join(root, page));
  if (rootRelativePath(root, resolved) === null || resolved === root) {
    throw new ContractError(`Page '${page}' is outside the root '${root}'.`, ContractErrorCode.INVALID_OPTIONS);
  }
  return resolved;
}
