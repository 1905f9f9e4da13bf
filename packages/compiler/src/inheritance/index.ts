// Inheritance - imports file discovery, caching and merging

export {
  ChunkTreeCache,
  type CacheRequestOptions,
  type ChunkTreeCacheOptions,
  type ChunkTreeCacheStats,
  type ChunkTreeLookup,
  type ChunkTreeLookupStatus,
} from "./chunk-tree-cache.js";

export {
  AncestorChainResolver,
  computeAncestorChain,
  type AncestorChainOptions,
  type ChainEntryResult,
  type ChainResolution,
} from "./ancestor-chain.js";

export {
  mergeChunkTrees,
  flattenEffectiveTree,
  fingerprintEffectiveTree,
  type EffectiveChunkTree,
  type MergeLayer,
} from "./merge.js";

export { DEFAULT_INHERITED_CHUNKS, RUNTIME_NAMESPACE } from "./defaults.js";
