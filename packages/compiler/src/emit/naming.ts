/* =======================================================================================
 * NAMING
 * ---------------------------------------------------------------------------------------
 * Everything the generator needs to know about a page besides its merged chunks:
 * the class it becomes, the namespace that holds it and the model type that
 * replaces the `TModel` placeholder.
 * ======================================================================================= */

import ts from "typescript";

import { inject, setBaseType, substituteModelToken, type SetBaseTypeChunk } from "../model/chunks.js";
import type { EffectiveChunkTree } from "../inheritance/merge.js";
import { MODEL_DIRECTIVE } from "../parsing/directive-parser.js";

export interface NamingContext {
  /** Page path relative to the application root, "/"-prefixed. */
  readonly relativePath: string;
  readonly className: string;
  readonly namespace: string;
  /** Substituted for `TModel` in the base type and injected property types. */
  readonly modelType: string;
}

/**
 * Turn arbitrary text into an identifier: every character that cannot appear in
 * an identifier becomes `_`, and `_` is prepended when the first character
 * cannot start one.
 */
export function sanitizeIdentifier(text: string): string {
  let out = "";
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    out += ts.isIdentifierPart(code, ts.ScriptTarget.Latest) ? ch : "_";
  }
  const first = out.codePointAt(0);
  if (first === undefined || !ts.isIdentifierStart(first, ts.ScriptTarget.Latest)) {
    out = `_${out}`;
  }
  return out;
}

/** Class name for a page, from its root-relative path ("/Views/Home/Index.page" -> "_Views_Home_Index_page"). */
export function sanitizeClassName(relativePath: string): string {
  return sanitizeIdentifier(relativePath);
}

/** The page's own `<model>` type, or `defaultModel` when it declares none. */
export function resolveModelType(effective: EffectiveChunkTree, defaultModel: string): string {
  const model = effective.opaque.find((chunk) => chunk.directive === MODEL_DIRECTIVE);
  return model ? model.payload : defaultModel;
}

/**
 * Replace `TModel` in the base type and in injected property types.
 * Chunks without the placeholder are kept as-is.
 */
export function substituteModelType(effective: EffectiveChunkTree, modelType: string): EffectiveChunkTree {
  return Object.freeze({
    ...effective,
    baseType: effective.baseType && substituteBase(effective.baseType, modelType),
    injections: Object.freeze(
      effective.injections.map((chunk) => {
        const typeName = substituteModelToken(chunk.typeName, modelType);
        return typeName === chunk.typeName ? chunk : inject(typeName, chunk.propertyName, chunk.span);
      }),
    ),
  });
}

function substituteBase(chunk: SetBaseTypeChunk, modelType: string): SetBaseTypeChunk {
  const typeName = substituteModelToken(chunk.typeName, modelType);
  return typeName === chunk.typeName ? chunk : setBaseType(typeName, chunk.span);
}
