/**
 * File Content Provider
 *
 * The compiler never touches the file system directly. Hosts implement this
 * interface for their environment (Node.js, an editor's open documents, tests).
 *
 * Implementations:
 * - `createMemoryFileProvider()` - in-memory, for tests and design-time hosts
 * - `createNodeFileProvider()` - Node.js fs (in @strata/host)
 */

import type { NormalizedPath } from "../model/identity.js";

/**
 * Opaque marker compared by equality to decide whether a cached parse is stale
 * (modification time, revision number, content hash...).
 */
export type StalenessToken = string;

export interface FileContentProvider {
  /**
   * Check if a file exists.
   *
   * @returns true if the file exists and is readable
   */
  exists(file: NormalizedPath): Promise<boolean>;

  /**
   * Read the current staleness token for an existing file.
   * Two reads return the same token exactly when the content is unchanged.
   */
  readStalenessToken(file: NormalizedPath): Promise<StalenessToken>;

  /**
   * Read file contents as a UTF-8 string.
   */
  readContent(file: NormalizedPath): Promise<string>;
}
