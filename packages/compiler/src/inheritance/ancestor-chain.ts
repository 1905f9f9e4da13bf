/**
 * Ancestor Chain Resolution
 *
 * A page inherits from every `_imports` file between the application root and
 * its own directory. The chain is computed from the path string alone; the
 * cache decides which of those files exist.
 *
 * Order is root-to-page: the outermost file comes first and the page's own
 * directory comes last, which is what gives "closer overrides farther" in the
 * merge engine.
 */

import type { ChunkTree } from "../model/chunk-tree.js";
import type { ResolveDiagCode } from "../model/diagnostics.js";
import {
  baseName,
  isNormalizedPath,
  joinPath,
  parentDirectory,
  rootRelativePath,
  type NormalizedPath,
} from "../model/identity.js";
import { buildDiagnostic, withSeverity, type CompilerDiagnostic } from "../shared/diagnostics.js";
import { withDiags, type Diagnosed } from "../shared/diagnosed.js";
import { ContractError, ContractErrorCode } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import type { CacheRequestOptions, ChunkTreeCache, ChunkTreeLookupStatus } from "./chunk-tree-cache.js";

export interface AncestorChainOptions {
  /** Application root (inclusive). Nothing above it is looked up. */
  root: NormalizedPath;
  /** Fixed base name of the per-directory configuration file. */
  importsFileName: string;
}

export interface ChainEntryResult {
  readonly file: NormalizedPath;
  readonly status: ChunkTreeLookupStatus;
  /** Present when status is "found". */
  readonly tree?: ChunkTree;
}

export interface ChainResolution {
  /** Trees that contribute to the merge, root-to-page. */
  readonly trees: readonly ChunkTree[];
  /** Every looked-up file with its outcome, root-to-page. */
  readonly entries: readonly ChainEntryResult[];
}

/**
 * `_imports` file identities that apply to `page`, root-to-page.
 *
 * @throws ContractError when `page` is unnormalized or not under the root.
 */
export function computeAncestorChain(page: NormalizedPath, options: AncestorChainOptions): NormalizedPath[] {
  const { root, importsFileName } = options;
  if (!isNormalizedPath(page)) {
    throw new ContractError(`Page identity '${page}' is not normalized.`, ContractErrorCode.UNNORMALIZED_IDENTITY, page);
  }
  if (page === root || rootRelativePath(root, page) === null) {
    throw new ContractError(`Page '${page}' is outside the application root '${root}'.`, ContractErrorCode.OUTSIDE_ROOT, page);
  }

  const directories: NormalizedPath[] = [];
  let dir = parentDirectory(page);
  for (;;) {
    directories.push(dir);
    if (dir === root) break;
    dir = parentDirectory(dir);
  }
  directories.reverse();

  // An imports file never inherits from itself.
  const selfIsImports = baseName(page) === importsFileName;
  const chain: NormalizedPath[] = [];
  for (const directory of directories) {
    const file = joinPath(directory, importsFileName);
    if (selfIsImports && file === page) continue;
    chain.push(file);
  }
  return chain;
}

export class AncestorChainResolver {
  readonly #options: AncestorChainOptions;
  readonly #cache: ChunkTreeCache;

  constructor(options: AncestorChainOptions & { cache: ChunkTreeCache }) {
    if (!isNormalizedPath(options.root)) {
      throw new ContractError(`Root '${options.root}' is not normalized.`, ContractErrorCode.INVALID_OPTIONS, options.root);
    }
    if (!options.importsFileName || /[\\/]/.test(options.importsFileName)) {
      throw new ContractError(
        `Imports file name '${options.importsFileName}' must be a bare file name.`,
        ContractErrorCode.INVALID_OPTIONS,
      );
    }
    this.#options = { root: options.root, importsFileName: options.importsFileName };
    this.#cache = options.cache;
  }

  get root(): NormalizedPath {
    return this.#options.root;
  }

  get importsFileName(): string {
    return this.#options.importsFileName;
  }

  computeChain(page: NormalizedPath): NormalizedPath[] {
    return computeAncestorChain(page, this.#options);
  }

  /**
   * Resolve every chain entry through the cache. Absent files are dropped;
   * files that failed to parse contribute nothing and surface as warnings.
   */
  async resolveChain(page: NormalizedPath, options?: CacheRequestOptions): Promise<Diagnosed<ChainResolution>> {
    const chain = this.computeChain(page);
    const lookups = await Promise.all(chain.map((file) => this.#cache.get(file, options)));

    const trees: ChunkTree[] = [];
    const entries: ChainEntryResult[] = [];
    const diagnostics: CompilerDiagnostic[] = [];

    for (const lookup of lookups) {
      debug.chain("lookup", { page, file: lookup.file, status: lookup.status });
      switch (lookup.status) {
        case "absent":
          entries.push({ file: lookup.file, status: "absent" });
          break;
        case "found":
          trees.push(lookup.tree);
          entries.push({ file: lookup.file, status: "found", tree: lookup.tree });
          diagnostics.push(...downgradeErrors(lookup.diagnostics));
          diagnostics.push(...ignoredContent(lookup.tree));
          break;
        case "error":
          entries.push({ file: lookup.file, status: "error" });
          diagnostics.push(...downgradeErrors(lookup.diagnostics));
          if (!lookup.diagnostics.some((d) => d.code === "imports-read-failed")) {
            diagnostics.push(parseFailed(lookup.file));
          }
          break;
      }
    }

    return withDiags({ trees, entries }, diagnostics);
  }
}

/** An ancestor's errors become page warnings; its other diagnostics pass through as they are. */
function downgradeErrors(diagnostics: readonly CompilerDiagnostic[]): CompilerDiagnostic[] {
  return diagnostics.map((d) => (d.severity === "error" ? withSeverity(d, "warning") : d));
}

function parseFailed(file: NormalizedPath): CompilerDiagnostic {
  const code: ResolveDiagCode = "imports-parse-failed";
  return buildDiagnostic({
    code,
    message: `Imports file '${file}' has errors and contributes no directives.`,
    stage: "resolve",
    severity: "warning",
    data: { file },
  });
}

/** Opaque chunks in an imports file never reach a page; say so once per chunk. */
function ignoredContent(tree: ChunkTree): CompilerDiagnostic[] {
  const out: CompilerDiagnostic[] = [];
  const code: ResolveDiagCode = "imports-content-ignored";
  for (const chunk of tree.chunks) {
    if (chunk.kind !== "opaque") continue;
    out.push(
      buildDiagnostic({
        code,
        message: `'${chunk.directive}' content in an imports file is not inherited and is ignored.`,
        stage: "resolve",
        severity: "warning",
        span: chunk.span,
        data: { directive: chunk.directive },
      }),
    );
  }
  return out;
}
