/* =======================================================================================
 * CHUNK MODEL
 * ---------------------------------------------------------------------------------------
 * One chunk per parsed configuration directive. Chunks are a closed union keyed by
 * `kind`; per-kind behavior (merge policy, emission) is table-driven elsewhere, so a
 * new directive kind means one new variant here plus one table entry per consumer.
 *
 * Chunks are frozen on construction. Consumers never mutate them; the merge engine
 * replaces whole chunks instead.
 * ======================================================================================= */

import type { SourceSpan } from "./span.js";

/** Placeholder in type names substituted with the page model type at compile time. */
export const MODEL_TOKEN = "TModel";

export interface NamespaceImportChunk {
  readonly kind: "namespace-import";
  readonly name: string;
  readonly span: SourceSpan | null;
}

export interface SetBaseTypeChunk {
  readonly kind: "set-base-type";
  /** May contain {@link MODEL_TOKEN}. */
  readonly typeName: string;
  readonly span: SourceSpan | null;
}

export interface InjectChunk {
  readonly kind: "inject";
  readonly typeName: string;
  /** Merge identity: a later layer with the same property name replaces this chunk. */
  readonly propertyName: string;
  readonly span: SourceSpan | null;
}

export interface AddTagHelperChunk {
  readonly kind: "add-tag-helper";
  readonly lookup: string;
  readonly span: SourceSpan | null;
}

export interface RemoveTagHelperChunk {
  readonly kind: "remove-tag-helper";
  readonly lookup: string;
  readonly span: SourceSpan | null;
}

/**
 * Any directive without inheritance semantics (`markup`, `model`, ...).
 * Survives only in the tree of the page that declared it.
 */
export interface OpaqueChunk {
  readonly kind: "opaque";
  readonly directive: string;
  readonly payload: string;
  readonly span: SourceSpan | null;
}

export type Chunk =
  | NamespaceImportChunk
  | SetBaseTypeChunk
  | InjectChunk
  | AddTagHelperChunk
  | RemoveTagHelperChunk
  | OpaqueChunk;

export type ChunkKind = Chunk["kind"];

export type ChunkOfKind<K extends ChunkKind> = Extract<Chunk, { kind: K }>;

export type TagHelperDirectiveChunk = AddTagHelperChunk | RemoveTagHelperChunk;

/* --------------------------
 * Constructors
 * ------------------------ */

export function namespaceImport(name: string, span: SourceSpan | null = null): NamespaceImportChunk {
  return Object.freeze({ kind: "namespace-import", name, span });
}

export function setBaseType(typeName: string, span: SourceSpan | null = null): SetBaseTypeChunk {
  return Object.freeze({ kind: "set-base-type", typeName, span });
}

export function inject(typeName: string, propertyName: string, span: SourceSpan | null = null): InjectChunk {
  return Object.freeze({ kind: "inject", typeName, propertyName, span });
}

export function addTagHelper(lookup: string, span: SourceSpan | null = null): AddTagHelperChunk {
  return Object.freeze({ kind: "add-tag-helper", lookup, span });
}

export function removeTagHelper(lookup: string, span: SourceSpan | null = null): RemoveTagHelperChunk {
  return Object.freeze({ kind: "remove-tag-helper", lookup, span });
}

export function opaque(directive: string, payload: string, span: SourceSpan | null = null): OpaqueChunk {
  return Object.freeze({ kind: "opaque", directive, payload, span });
}

/* --------------------------
 * Guards
 * ------------------------ */

export function isChunkOfKind<K extends ChunkKind>(chunk: Chunk, kind: K): chunk is ChunkOfKind<K> {
  return chunk.kind === kind;
}

export function isTagHelperDirective(chunk: Chunk): chunk is TagHelperDirectiveChunk {
  return chunk.kind === "add-tag-helper" || chunk.kind === "remove-tag-helper";
}

/** Replace whole-word occurrences of {@link MODEL_TOKEN} in a type name. */
export function substituteModelToken(typeName: string, modelType: string): string {
  return typeName.replace(/\bTModel\b/g, () => modelType);
}
