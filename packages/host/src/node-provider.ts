/**
 * File content provider backed by the real file system.
 *
 * The staleness token combines modification time and size, so an edit that
 * keeps the same mtime granularity but changes length is still noticed.
 */

import { readFile, stat } from "node:fs/promises";

import type { FileContentProvider, NormalizedPath, StalenessToken } from "@strata/compiler";

export function createNodeFileProvider(): FileContentProvider {
  return {
    async exists(file: NormalizedPath): Promise<boolean> {
      try {
        return (await stat(file)).isFile();
      } catch (error) {
        if (isMissing(error)) return false;
        throw error;
      }
    },

    async readStalenessToken(file: NormalizedPath): Promise<StalenessToken> {
      const info = await stat(file);
      return `${info.mtimeMs}:${info.size}`;
    },

    async readContent(file: NormalizedPath): Promise<string> {
      return readFile(file, "utf-8");
    },
  };
}

function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}
