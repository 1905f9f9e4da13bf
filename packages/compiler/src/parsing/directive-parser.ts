/**
 * Directive Parser
 *
 * Reference template parser: turns page and `_imports` file text into a chunk
 * tree. Directives are HTML meta elements at the top level of the template:
 *
 *   <using namespace="App.Models"></using>
 *   <inherits type="LayoutPage<TModel>"></inherits>
 *   <inject type="HtmlHelper<TModel>" as="Html"></inject>
 *   <add-tag-helper lookup="*, App.TagHelpers"></add-tag-helper>
 *   <remove-tag-helper lookup="App.TagHelpers.Legacy*"></remove-tag-helper>
 *   <model type="Person"></model>
 *
 * Everything else is carried through as `markup` opaque chunks. parse5 nests
 * content under an unclosed meta element; that content is treated as if it
 * followed the element.
 */

import { parseFragment, serializeOuter } from "parse5";
import type { DefaultTreeAdapterMap, Token } from "parse5";

import {
  addTagHelper,
  inject,
  namespaceImport,
  opaque,
  removeTagHelper,
  setBaseType,
  type Chunk,
} from "../model/chunks.js";
import { createChunkTree, type ChunkTree } from "../model/chunk-tree.js";
import type { ParseDiagCode } from "../model/diagnostics.js";
import type { NormalizedPath } from "../model/identity.js";
import { sourceSpan, type SourceSpan } from "../model/span.js";
import { buildDiagnostic, hasErrors, type CompilerDiagnostic } from "../shared/diagnostics.js";
import { debug } from "../shared/debug.js";
import { isIdentifierName, isNamespaceName, isTypeExpression } from "./type-syntax.js";

type P5DocumentFragment = DefaultTreeAdapterMap["documentFragment"];
type P5Node = DefaultTreeAdapterMap["childNode"];
type P5Element = DefaultTreeAdapterMap["element"];
type P5Text = DefaultTreeAdapterMap["textNode"];
type P5Template = DefaultTreeAdapterMap["template"];
type ElementLocation = Token.ElementLocation;

export type ParseResult =
  | { readonly ok: true; readonly tree: ChunkTree; readonly diagnostics: readonly CompilerDiagnostic[] }
  | { readonly ok: false; readonly diagnostics: readonly CompilerDiagnostic[] };

/** Template parser contract, shared by page content and `_imports` files. */
export interface TemplateParser {
  parse(content: string, file: NormalizedPath): ParseResult;
}

/** Directive name of the opaque chunk carrying template markup. */
export const MARKUP_DIRECTIVE = "markup";

/** Directive name of the opaque chunk carrying the page model type. */
export const MODEL_DIRECTIVE = "model";

export const DIRECTIVE_TAGS = new Set([
  "using",
  "inherits",
  "inject",
  "add-tag-helper",
  "remove-tag-helper",
  MODEL_DIRECTIVE,
]);

interface ParseContext {
  readonly file: NormalizedPath;
  readonly text: string;
  readonly chunks: Chunk[];
  readonly diagnostics: CompilerDiagnostic[];
  modelSpan: SourceSpan | null;
}

/** Parse template text into a chunk tree. */
export function parseTemplate(content: string, file: NormalizedPath): ParseResult {
  const fragment: P5DocumentFragment = parseFragment(content, { sourceCodeLocationInfo: true });
  const ctx: ParseContext = { file, text: content, chunks: [], diagnostics: [], modelSpan: null };

  visitTopLevel(fragment.childNodes, ctx);

  debug.parse("template", {
    file,
    chunks: ctx.chunks.length,
    diagnostics: ctx.diagnostics.length,
  });

  if (hasErrors(ctx.diagnostics)) {
    return { ok: false, diagnostics: ctx.diagnostics };
  }
  return { ok: true, tree: createChunkTree(file, ctx.chunks), diagnostics: ctx.diagnostics };
}

/** The default {@link TemplateParser}. */
export const directiveParser: TemplateParser = { parse: parseTemplate };

function visitTopLevel(nodes: readonly P5Node[], ctx: ParseContext): void {
  for (const node of nodes) {
    if (isElement(node)) {
      const tag = node.tagName.toLowerCase();
      if (DIRECTIVE_TAGS.has(tag)) {
        const chunk = readDirective(node, tag, ctx);
        if (chunk) ctx.chunks.push(chunk);
        visitTopLevel(node.childNodes, ctx);
        continue;
      }
      reportNestedDirectives(node, ctx);
      pushMarkup(node, ctx);
      continue;
    }
    if (isText(node)) {
      if (node.value.trim().length > 0) pushMarkup(node, ctx);
    }
    // Comments carry nothing.
  }
}

/* --------------------------
 * Directives
 * ------------------------ */

function readDirective(el: P5Element, tag: string, ctx: ParseContext): Chunk | null {
  const span = startTagSpan(el, ctx);
  switch (tag) {
    case "using": {
      const name = requireAttr(el, tag, "namespace", ctx);
      if (name === null) return null;
      if (!isNamespaceName(name)) {
        report(ctx, "directive-invalid-namespace", `'${name}' is not a valid namespace name.`, attrSpan(el, "namespace", ctx));
        return null;
      }
      return namespaceImport(name, span);
    }
    case "inherits": {
      const typeName = requireType(el, tag, ctx);
      return typeName === null ? null : setBaseType(typeName, span);
    }
    case "inject": {
      const typeName = requireType(el, tag, ctx);
      const propertyName = requireAttr(el, tag, "as", ctx);
      if (propertyName !== null && !isIdentifierName(propertyName)) {
        report(ctx, "directive-invalid-identifier", `'${propertyName}' is not a valid property name.`, attrSpan(el, "as", ctx));
        return null;
      }
      if (typeName === null || propertyName === null) return null;
      return inject(typeName, propertyName, span);
    }
    case "add-tag-helper": {
      const lookup = requireAttr(el, tag, "lookup", ctx);
      return lookup === null ? null : addTagHelper(lookup, span);
    }
    case "remove-tag-helper": {
      const lookup = requireAttr(el, tag, "lookup", ctx);
      return lookup === null ? null : removeTagHelper(lookup, span);
    }
    case MODEL_DIRECTIVE: {
      if (ctx.modelSpan) {
        report(ctx, "directive-duplicate-model", "Only one <model> directive is allowed per page.", span, [
          { message: "First <model> directive.", span: ctx.modelSpan },
        ]);
        return null;
      }
      ctx.modelSpan = span;
      const typeName = requireType(el, tag, ctx);
      return typeName === null ? null : opaque(MODEL_DIRECTIVE, typeName, span);
    }
    default:
      return null;
  }
}

function requireAttr(el: P5Element, tag: string, name: string, ctx: ParseContext): string | null {
  const value = getAttr(el, name)?.value.trim();
  if (!value) {
    report(ctx, "directive-missing-attribute", `<${tag}> requires a non-empty '${name}' attribute.`, startTagSpan(el, ctx));
    return null;
  }
  return value;
}

function requireType(el: P5Element, tag: string, ctx: ParseContext): string | null {
  const typeName = requireAttr(el, tag, "type", ctx);
  if (typeName === null) return null;
  if (!isTypeExpression(typeName)) {
    report(ctx, "directive-invalid-type", `'${typeName}' is not a valid type expression.`, attrSpan(el, "type", ctx));
    return null;
  }
  return typeName;
}

function reportNestedDirectives(el: P5Element, ctx: ParseContext): void {
  const children: readonly P5Node[] = isTemplate(el) ? el.content.childNodes : el.childNodes;
  for (const child of children) {
    if (!isElement(child)) continue;
    const tag = child.tagName.toLowerCase();
    if (DIRECTIVE_TAGS.has(tag)) {
      report(ctx, "directive-misplaced", `<${tag}> must appear at the top level of the template.`, startTagSpan(child, ctx));
    }
    reportNestedDirectives(child, ctx);
  }
}

/* --------------------------
 * Markup
 * ------------------------ */

function pushMarkup(node: P5Element | P5Text, ctx: ParseContext): void {
  const loc = node.sourceCodeLocation;
  if (!loc) {
    // Implied nodes have no authored text; re-serialize instead.
    ctx.chunks.push(opaque(MARKUP_DIRECTIVE, isElement(node) ? serializeOuter(node) : node.value, null));
    return;
  }
  const payload = ctx.text.slice(loc.startOffset, loc.endOffset);
  ctx.chunks.push(opaque(MARKUP_DIRECTIVE, payload, sourceSpan(ctx.file, loc.startOffset, loc.endOffset)));
}

/* --------------------------
 * Helpers
 * ------------------------ */

function report(
  ctx: ParseContext,
  code: ParseDiagCode,
  message: string,
  span: SourceSpan | null,
  related?: CompilerDiagnostic["related"],
): void {
  ctx.diagnostics.push(buildDiagnostic({ code, message, stage: "parse", span, ...(related ? { related } : {}) }));
}

function isElement(n: P5Node): n is P5Element {
  return "tagName" in n;
}

function isText(n: P5Node): n is P5Text {
  return n.nodeName === "#text";
}

function isTemplate(el: P5Element): el is P5Template {
  return el.tagName === "template" && "content" in el;
}

function getAttr(el: P5Element, name: string): Token.Attribute | undefined {
  return el.attrs.find((a) => a.name === name);
}

function startTagSpan(el: P5Element, ctx: ParseContext): SourceSpan | null {
  const loc: ElementLocation | undefined = el.sourceCodeLocation ?? undefined;
  const tag = loc?.startTag ?? loc;
  return tag ? sourceSpan(ctx.file, tag.startOffset, tag.endOffset) : null;
}

function attrSpan(el: P5Element, name: string, ctx: ParseContext): SourceSpan | null {
  const attrLoc = el.sourceCodeLocation?.attrs?.[name];
  return attrLoc ? sourceSpan(ctx.file, attrLoc.startOffset, attrLoc.endOffset) : startTagSpan(el, ctx);
}
