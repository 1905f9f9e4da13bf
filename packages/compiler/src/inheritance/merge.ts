/* =======================================================================================
 * INHERITANCE MERGE ENGINE
 * ---------------------------------------------------------------------------------------
 * Folds the layers of a page's configuration into one effective tree:
 *
 *   defaults -> ancestors (root-to-page) -> page
 *
 * Each chunk kind has exactly one merge policy, looked up in MERGE_POLICIES. The
 * engine is pure: trees are never mutated, and the same inputs always produce an
 * equal effective tree.
 * ======================================================================================= */

import type {
  AddTagHelperChunk,
  Chunk,
  ChunkKind,
  InjectChunk,
  NamespaceImportChunk,
  OpaqueChunk,
  RemoveTagHelperChunk,
  SetBaseTypeChunk,
  TagHelperDirectiveChunk,
} from "../model/chunks.js";
import type { ChunkTree, ChunkTreeId } from "../model/chunk-tree.js";
import { stableHash } from "../shared/hash.js";
import { debug } from "../shared/debug.js";

export interface EffectiveChunkTree {
  /** Identity of the page the tree was merged for. */
  readonly file: ChunkTreeId;
  /** Unique by name, in first-occurrence order. */
  readonly namespaces: readonly NamespaceImportChunk[];
  /** Closest declaration wins; null when no layer declares one. */
  readonly baseType: SetBaseTypeChunk | null;
  /** Unique by property name; an override keeps the slot of the first declaration. */
  readonly injections: readonly InjectChunk[];
  /** Every add/remove directive from every layer, in fold order. */
  readonly tagHelperLog: readonly TagHelperDirectiveChunk[];
  /** The page's own opaque chunks. */
  readonly opaque: readonly OpaqueChunk[];
}

/** Where a chunk came from. Opaque content only survives from the page. */
export type MergeLayer = "defaults" | "ancestor" | "page";

interface MergeState {
  readonly namespaces: NamespaceImportChunk[];
  readonly namespaceNames: Set<string>;
  baseType: SetBaseTypeChunk | null;
  readonly injections: InjectChunk[];
  readonly injectionSlots: Map<string, number>;
  readonly tagHelperLog: TagHelperDirectiveChunk[];
  readonly opaque: OpaqueChunk[];
}

interface ChunkByKind {
  "namespace-import": NamespaceImportChunk;
  "set-base-type": SetBaseTypeChunk;
  inject: InjectChunk;
  "add-tag-helper": AddTagHelperChunk;
  "remove-tag-helper": RemoveTagHelperChunk;
  opaque: OpaqueChunk;
}

type MergePolicy<K extends ChunkKind> = (state: MergeState, chunk: ChunkByKind[K], layer: MergeLayer) => void;

type MergePolicyTable = { [K in ChunkKind]: MergePolicy<K> };

const MERGE_POLICIES: MergePolicyTable = {
  "namespace-import": (state, chunk) => {
    if (state.namespaceNames.has(chunk.name)) return;
    state.namespaceNames.add(chunk.name);
    state.namespaces.push(chunk);
  },

  "set-base-type": (state, chunk) => {
    state.baseType = chunk;
  },

  inject: (state, chunk) => {
    const slot = state.injectionSlots.get(chunk.propertyName);
    if (slot === undefined) {
      state.injectionSlots.set(chunk.propertyName, state.injections.length);
      state.injections.push(chunk);
    } else {
      state.injections[slot] = chunk;
    }
  },

  // Adds and removes are only resolved against each other at emit time.
  "add-tag-helper": (state, chunk) => {
    state.tagHelperLog.push(chunk);
  },

  "remove-tag-helper": (state, chunk) => {
    state.tagHelperLog.push(chunk);
  },

  opaque: (state, chunk, layer) => {
    if (layer === "page") state.opaque.push(chunk);
  },
};

function applyPolicy<K extends ChunkKind>(state: MergeState, kind: K, chunk: ChunkByKind[K], layer: MergeLayer): void {
  MERGE_POLICIES[kind](state, chunk, layer);
}

function foldLayer(state: MergeState, tree: ChunkTree, layer: MergeLayer): void {
  for (const chunk of tree.chunks) {
    applyPolicy(state, chunk.kind, chunk, layer);
  }
  debug.merge("layer", { file: tree.file, layer, chunks: tree.chunks.length });
}

/**
 * Merge the configuration layers that apply to a page.
 *
 * @param defaults - host-supplied chunks every page inherits
 * @param ancestors - `_imports` trees, root-to-page
 * @param page - the page's own tree
 */
export function mergeChunkTrees(
  defaults: ChunkTree,
  ancestors: readonly ChunkTree[],
  page: ChunkTree,
): EffectiveChunkTree {
  const state: MergeState = {
    namespaces: [],
    namespaceNames: new Set(),
    baseType: null,
    injections: [],
    injectionSlots: new Map(),
    tagHelperLog: [],
    opaque: [],
  };

  foldLayer(state, defaults, "defaults");
  for (const ancestor of ancestors) {
    foldLayer(state, ancestor, "ancestor");
  }
  foldLayer(state, page, "page");

  return Object.freeze({
    file: page.file,
    namespaces: Object.freeze(state.namespaces),
    baseType: state.baseType,
    injections: Object.freeze(state.injections),
    tagHelperLog: Object.freeze(state.tagHelperLog),
    opaque: Object.freeze(state.opaque),
  });
}

/** Single ordered chunk list: namespaces, base type, injections, tag helper log, opaque. */
export function flattenEffectiveTree(tree: EffectiveChunkTree): Chunk[] {
  return [
    ...tree.namespaces,
    ...(tree.baseType ? [tree.baseType] : []),
    ...tree.injections,
    ...tree.tagHelperLog,
    ...tree.opaque,
  ];
}

/** Content hash of an effective tree; equal trees hash equal across runs. */
export function fingerprintEffectiveTree(tree: EffectiveChunkTree): string {
  return stableHash({ file: tree.file, chunks: flattenEffectiveTree(tree) });
}
