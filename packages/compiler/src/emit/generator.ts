/**
 * Reference Code Generator
 *
 * Emits one TypeScript module per page:
 *
 *   // Generated from "/Views/Home/Index.page".
 *   import * as _strata_runtime from "@strata/runtime";
 *
 *   export namespace Strata.Views {
 *     export class _Views_Home_Index_page extends Page<Person> {
 *       static readonly namespaces: readonly object[] = [_strata_runtime];
 *       static readonly tagHelpers: readonly string[] = [
 *         "UrlResolutionTagHelper, @strata/runtime",
 *       ];
 *
 *       Html!: HtmlHelper<Person>;
 *
 *       static readonly injectedProperties: readonly string[] = ["Html"];
 *
 *       static readonly template: string = "<h1>Hello</h1>";
 *     }
 *   }
 *
 * Output depends only on the effective tree and naming context.
 */

import type { NamespaceImportChunk } from "../model/chunks.js";
import type { EmitDiagCode } from "../model/diagnostics.js";
import type { EffectiveChunkTree } from "../inheritance/merge.js";
import { MARKUP_DIRECTIVE } from "../parsing/directive-parser.js";
import { buildDiagnostic, type CompilerDiagnostic } from "../shared/diagnostics.js";
import { debug } from "../shared/debug.js";
import { sanitizeIdentifier, type NamingContext } from "./naming.js";
import { resolveTagHelperLog } from "./tag-helpers.js";
import { LineWriter, type SpanMapping } from "./writer.js";

export interface GeneratedCode {
  readonly code: string;
  /** Authored chunk spans projected onto the generated text. Chunks without a span have none. */
  readonly mappings: readonly SpanMapping[];
  readonly diagnostics: readonly CompilerDiagnostic[];
}

/** Code generator contract; the facade accepts any implementation. */
export interface CodeGenerator {
  generate(effective: EffectiveChunkTree, naming: NamingContext): GeneratedCode;
}

export function generatePageModule(effective: EffectiveChunkTree, naming: NamingContext): GeneratedCode {
  const w = new LineWriter();
  const diagnostics: CompilerDiagnostic[] = [];

  w.line(`// Generated from ${JSON.stringify(naming.relativePath)}.`);

  const imports = importAliases(effective.namespaces);
  for (const { alias, chunk } of imports) {
    w.line(`import * as ${alias} from ${JSON.stringify(chunk.name)};`, chunk.span);
  }
  w.line();

  w.line(`export namespace ${naming.namespace} {`).indent();
  const base = effective.baseType;
  w.line(
    base ? `export class ${naming.className} extends ${base.typeName} {` : `export class ${naming.className} {`,
    base?.span ?? null,
  ).indent();

  // Imported namespaces, in import order, for name lookup at run time
  w.line(`static readonly namespaces: readonly object[] = [${imports.map((i) => i.alias).join(", ")}];`);

  // Tag helpers
  const tagHelpers = resolveTagHelperLog(effective.tagHelperLog);
  if (tagHelpers.registered.length === 0) {
    w.line("static readonly tagHelpers: readonly string[] = [];");
  } else {
    w.line("static readonly tagHelpers: readonly string[] = [").indent();
    for (const chunk of tagHelpers.registered) {
      w.line(`${JSON.stringify(chunk.lookup)},`, chunk.span);
    }
    w.dedent().line("];");
  }
  for (const chunk of tagHelpers.unmatched) {
    const code: EmitDiagCode = "tag-helper-remove-unmatched";
    diagnostics.push(
      buildDiagnostic({
        code,
        message: `Removing tag helpers '${chunk.lookup}' had no effect; no matching lookup was registered.`,
        stage: "emit",
        severity: "warning",
        span: chunk.span,
        data: { lookup: chunk.lookup },
      }),
    );
  }
  w.line();

  // Injected properties
  for (const chunk of effective.injections) {
    w.line(`${chunk.propertyName}!: ${chunk.typeName};`, chunk.span);
  }
  if (effective.injections.length > 0) w.line();
  const names = effective.injections.map((chunk) => JSON.stringify(chunk.propertyName));
  w.line(`static readonly injectedProperties: readonly string[] = [${names.join(", ")}];`);
  w.line();

  // Template
  const markup = effective.opaque.filter((chunk) => chunk.directive === MARKUP_DIRECTIVE).map((chunk) => chunk.payload);
  w.line(`static readonly template: string = ${JSON.stringify(markup.join("\n"))};`);

  w.dedent().line("}");
  w.dedent().line("}");

  const { code, mappings } = w.finish();
  debug.emit("page", {
    file: effective.file,
    className: naming.className,
    lines: w.lineCount,
    mappings: mappings.length,
  });
  return { code, mappings, diagnostics };
}

/** The default {@link CodeGenerator}. */
export const referenceGenerator: CodeGenerator = { generate: generatePageModule };

/** One identifier per namespace; collisions after sanitizing get a numeric suffix. */
function importAliases(
  namespaces: readonly NamespaceImportChunk[],
): { alias: string; chunk: NamespaceImportChunk }[] {
  const used = new Set<string>();
  return namespaces.map((chunk) => {
    const base = sanitizeIdentifier(chunk.name);
    let alias = base;
    for (let n = 2; used.has(alias); n++) alias = `${base}_${n}`;
    used.add(alias);
    return { alias, chunk };
  });
}
