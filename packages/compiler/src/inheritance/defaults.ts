import { addTagHelper, inject, namespaceImport, setBaseType } from "../model/chunks.js";
import { createChunkTree, DEFAULTS_TREE_ID, type ChunkTree } from "../model/chunk-tree.js";

/** Runtime package every generated page imports. */
export const RUNTIME_NAMESPACE = "@strata/runtime";

/**
 * Chunks every page inherits before any `_imports` file is applied.
 * Spans are null: none of these exist in a source file.
 */
export const DEFAULT_INHERITED_CHUNKS: ChunkTree = createChunkTree(DEFAULTS_TREE_ID, [
  namespaceImport(RUNTIME_NAMESPACE),
  namespaceImport(`${RUNTIME_NAMESPACE}/rendering`),
  inject("HtmlHelper<TModel>", "Html"),
  inject("JsonHelper", "Json"),
  inject("ComponentHelper", "Component"),
  inject("UrlHelper", "Url"),
  inject("ModelExpressionProvider", "ModelExpressionProvider"),
  addTagHelper(`UrlResolutionTagHelper, ${RUNTIME_NAMESPACE}`),
  setBaseType("Page<TModel>"),
]);
