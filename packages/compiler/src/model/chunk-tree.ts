import { isChunkOfKind, type Chunk, type ChunkKind, type ChunkOfKind } from "./chunks.js";
import type { NormalizedPath } from "./identity.js";

/** Synthetic identity for trees that exist in no source file (built-in defaults). */
export const DEFAULTS_TREE_ID = "<defaults>";

export type ChunkTreeId = NormalizedPath | typeof DEFAULTS_TREE_ID;

/**
 * Ordered chunks parsed from one file. Order is authored order and is
 * preserved by the cache and the merge engine.
 */
export interface ChunkTree {
  readonly file: ChunkTreeId;
  readonly chunks: readonly Chunk[];
}

export function createChunkTree(file: ChunkTreeId, chunks: readonly Chunk[]): ChunkTree {
  return Object.freeze({ file, chunks: Object.freeze([...chunks]) });
}

export function chunksOfKind<K extends ChunkKind>(tree: ChunkTree, kind: K): ChunkOfKind<K>[] {
  const out: ChunkOfKind<K>[] = [];
  for (const chunk of tree.chunks) {
    if (isChunkOfKind(chunk, kind)) out.push(chunk);
  }
  return out;
}

