/**
 * Chunk Tree Cache
 *
 * Maps a normalized `_imports` file identity to its parsed chunk tree. Shared by
 * every page compiled in a session; the only shared mutable state in the
 * compiler.
 *
 * - Every request revalidates against the provider's staleness token; a changed
 *   token (or a file that appeared/disappeared) re-parses.
 * - Absent files are cached too, so pages without a local `_imports` file cost
 *   one existence check per level.
 * - Concurrent requests for one identity share a single in-flight resolution,
 *   so a file is never parsed twice at the same time.
 * - A waiter that aborts leaves; the resolution keeps running for the others
 *   and still lands in the cache.
 */

import type { ChunkTree } from "../model/chunk-tree.js";
import type { ResolveDiagCode } from "../model/diagnostics.js";
import { isNormalizedPath, type NormalizedPath } from "../model/identity.js";
import type { FileContentProvider, StalenessToken } from "../io/file-provider.js";
import type { TemplateParser } from "../parsing/directive-parser.js";
import { buildDiagnostic, type CompilerDiagnostic } from "../shared/diagnostics.js";
import { ContractError, ContractErrorCode } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { nullLogger, type Logger } from "../shared/logger.js";

export type ChunkTreeLookup =
  | {
      readonly status: "found";
      readonly file: NormalizedPath;
      readonly tree: ChunkTree;
      /** Non-fatal parser findings. */
      readonly diagnostics: readonly CompilerDiagnostic[];
    }
  | { readonly status: "absent"; readonly file: NormalizedPath }
  | {
      readonly status: "error";
      readonly file: NormalizedPath;
      readonly diagnostics: readonly CompilerDiagnostic[];
    };

export type ChunkTreeLookupStatus = ChunkTreeLookup["status"];

export interface ChunkTreeCacheOptions {
  provider: FileContentProvider;
  parser: TemplateParser;
  logger?: Logger;
}

export interface CacheRequestOptions {
  /** Abandons this request only; a shared in-flight parse keeps running. */
  signal?: AbortSignal;
}

export interface ChunkTreeCacheStats {
  /** Stored entries (found, absent and failed parses). */
  entries: number;
  /** Parser invocations since creation. */
  parses: number;
  /** Requests answered from a still-fresh entry. */
  hits: number;
  /** Requests that joined an in-flight resolution. */
  coalesced: number;
}

interface CacheEntry {
  /** `null` records that the file did not exist. */
  readonly token: StalenessToken | null;
  readonly lookup: ChunkTreeLookup;
}

export class ChunkTreeCache {
  readonly #provider: FileContentProvider;
  readonly #parser: TemplateParser;
  readonly #logger: Logger;
  readonly #entries = new Map<NormalizedPath, CacheEntry>();
  readonly #inflight = new Map<NormalizedPath, Promise<ChunkTreeLookup>>();
  /** Bumped when an in-flight resolution is detached; a stale generation never stores. */
  readonly #generations = new Map<NormalizedPath, number>();
  #disposed = false;
  #parses = 0;
  #hits = 0;
  #coalesced = 0;

  constructor(options: ChunkTreeCacheOptions) {
    this.#provider = options.provider;
    this.#parser = options.parser;
    this.#logger = options.logger ?? nullLogger;
  }

  /**
   * Resolve the chunk tree for an `_imports` file.
   *
   * @throws ContractError for unnormalized identities or after `dispose()`.
   */
  async get(file: NormalizedPath, options?: CacheRequestOptions): Promise<ChunkTreeLookup> {
    this.#assertUsable();
    assertIdentity(file);
    options?.signal?.throwIfAborted();

    let pending = this.#inflight.get(file);
    if (pending) {
      this.#coalesced++;
      debug.cache("coalesce", { file });
    } else {
      const resolution: Promise<ChunkTreeLookup> = this.#resolve(file, this.#generationOf(file)).finally(() => {
        if (this.#inflight.get(file) === resolution) this.#inflight.delete(file);
      });
      this.#inflight.set(file, resolution);
      pending = resolution;
    }
    return abortable(pending, options?.signal);
  }

  /** Current entry without revalidation, or undefined if never requested. */
  peek(file: NormalizedPath): ChunkTreeLookup | undefined {
    return this.#entries.get(file)?.lookup;
  }

  /**
   * Drop one entry; the next request re-reads and re-parses. A resolution
   * already in flight still answers its own waiters but is not stored.
   */
  invalidate(file: NormalizedPath): boolean {
    debug.cache("invalidate", { file });
    const detached = this.#detach(file);
    return this.#entries.delete(file) || detached;
  }

  clear(): void {
    for (const file of [...this.#inflight.keys()]) this.#detach(file);
    this.#entries.clear();
  }

  /** Release all entries. Further requests throw. */
  dispose(): void {
    this.#disposed = true;
    this.#inflight.clear();
    this.#entries.clear();
  }

  stats(): ChunkTreeCacheStats {
    return {
      entries: this.#entries.size,
      parses: this.#parses,
      hits: this.#hits,
      coalesced: this.#coalesced,
    };
  }

  #generationOf(file: NormalizedPath): number {
    return this.#generations.get(file) ?? 0;
  }

  #detach(file: NormalizedPath): boolean {
    if (!this.#inflight.delete(file)) return false;
    this.#generations.set(file, this.#generationOf(file) + 1);
    return true;
  }

  async #resolve(file: NormalizedPath, generation: number): Promise<ChunkTreeLookup> {
    const previous = this.#entries.get(file);

    let token: StalenessToken | null;
    try {
      token = (await this.#provider.exists(file)) ? await this.#provider.readStalenessToken(file) : null;
    } catch (error) {
      return this.#readFailure(file, generation, error);
    }

    if (previous && previous.token === token) {
      this.#hits++;
      debug.cache("hit", { file, status: previous.lookup.status });
      return previous.lookup;
    }

    if (token === null) {
      debug.cache("absent", { file });
      return this.#store(file, generation, null, { status: "absent", file });
    }

    let content: string;
    try {
      content = await this.#provider.readContent(file);
    } catch (error) {
      return this.#readFailure(file, generation, error);
    }

    this.#parses++;
    debug.cache("parse", { file, token, stale: previous !== undefined });
    const result = this.#parser.parse(content, file);
    const lookup: ChunkTreeLookup = result.ok
      ? { status: "found", file, tree: result.tree, diagnostics: result.diagnostics }
      : { status: "error", file, diagnostics: result.diagnostics };
    return this.#store(file, generation, token, lookup);
  }

  #isCurrent(file: NormalizedPath, generation: number): boolean {
    return !this.#disposed && this.#generationOf(file) === generation;
  }

  #store(
    file: NormalizedPath,
    generation: number,
    token: StalenessToken | null,
    lookup: ChunkTreeLookup,
  ): ChunkTreeLookup {
    if (this.#isCurrent(file, generation)) this.#entries.set(file, { token, lookup });
    return lookup;
  }

  #readFailure(file: NormalizedPath, generation: number, error: unknown): ChunkTreeLookup {
    // Not cached: the next request retries the read.
    if (this.#isCurrent(file, generation)) this.#entries.delete(file);
    const reason = error instanceof Error ? error.message : String(error);
    this.#logger.warn(`failed to read ${file}: ${reason}`);
    const code: ResolveDiagCode = "imports-read-failed";
    return {
      status: "error",
      file,
      diagnostics: [
        buildDiagnostic({
          code,
          message: `Could not read imports file '${file}': ${reason}`,
          stage: "resolve",
          data: { file },
        }),
      ],
    };
  }

  #assertUsable(): void {
    if (this.#disposed) {
      throw new ContractError("ChunkTreeCache has been disposed.", ContractErrorCode.DISPOSED);
    }
  }
}

function assertIdentity(file: unknown): asserts file is NormalizedPath {
  if (typeof file !== "string" || file.length === 0) {
    throw new ContractError("File identity must be a non-empty string.", ContractErrorCode.INVALID_IDENTITY);
  }
  if (!isNormalizedPath(file)) {
    throw new ContractError(
      `File identity '${file}' is not normalized; pass it through normalizePathForId first.`,
      ContractErrorCode.UNNORMALIZED_IDENTITY,
      file,
    );
  }
}

/** Settle with `promise`, or reject early with the signal's reason. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
