/**
 * In-memory File Content Provider
 *
 * Holds files in a map keyed by normalized path. Every write bumps a per-file
 * revision, which doubles as the staleness token, so tests can edit, delete and
 * re-create files between compiles and observe cache revalidation.
 */

import { normalizePathForId, type NormalizedPath } from "../model/identity.js";
import type { FileContentProvider, StalenessToken } from "./file-provider.js";

export interface MemoryFileProviderOptions {
  /** Initial files: path -> content. Paths are normalized on the way in. */
  files?: Record<string, string>;
}

export interface MemoryFileProvider extends FileContentProvider {
  /** Create or overwrite a file. */
  writeFile(path: string, content: string): void;

  /** Remove a file. Returns false if it did not exist. */
  deleteFile(path: string): boolean;

  /** Normalized paths of all files, sorted. */
  listFiles(): NormalizedPath[];
}

interface MemoryEntry {
  content: string;
  revision: number;
}

/**
 * Create an in-memory file content provider.
 *
 * @example
 * ```typescript
 * const files = createMemoryFileProvider({
 *   files: { "/app/Views/_imports.page": '<using namespace="App.Models"></using>' },
 * });
 * files.writeFile("/app/Views/_imports.page", "");  // new staleness token
 * ```
 */
export function createMemoryFileProvider(options?: MemoryFileProviderOptions): MemoryFileProvider {
  const entries = new Map<NormalizedPath, MemoryEntry>();
  // Revisions are global so delete + re-create never repeats a token.
  let nextRevision = 1;

  function writeFile(path: string, content: string): void {
    entries.set(normalizePathForId(path), { content, revision: nextRevision++ });
  }

  if (options?.files) {
    for (const [path, content] of Object.entries(options.files)) {
      writeFile(path, content);
    }
  }

  function requireEntry(file: NormalizedPath): MemoryEntry {
    const entry = entries.get(file);
    if (!entry) throw new Error(`ENOENT: no such file '${file}'`);
    return entry;
  }

  return {
    writeFile,

    deleteFile(path: string): boolean {
      return entries.delete(normalizePathForId(path));
    },

    listFiles(): NormalizedPath[] {
      return [...entries.keys()].sort();
    },

    async exists(file: NormalizedPath): Promise<boolean> {
      return entries.has(file);
    },

    async readStalenessToken(file: NormalizedPath): Promise<StalenessToken> {
      return `rev:${requireEntry(file).revision}`;
    },

    async readContent(file: NormalizedPath): Promise<string> {
      return requireEntry(file).content;
    },
  };
}
