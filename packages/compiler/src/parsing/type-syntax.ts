import ts from "typescript";

const CHECK_ALIAS = "__StrataTypeCheck";

/**
 * True when `text` parses as exactly one TypeScript type expression.
 * Only syntax is checked; names are not resolved.
 */
export function isTypeExpression(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed) return false;

  const source = `type ${CHECK_ALIAS} = ${trimmed};`;
  const sourceFile = ts.createSourceFile("type-check.ts", source, ts.ScriptTarget.Latest, false, ts.ScriptKind.TS);
  // "Foo; export const x = 1" would otherwise smuggle a second statement through.
  if (sourceFile.statements.length !== 1) return false;
  const statement = sourceFile.statements[0];
  if (!statement || !ts.isTypeAliasDeclaration(statement)) return false;

  const { diagnostics } = ts.transpileModule(source, {
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, isolatedModules: true },
  });
  return (diagnostics ?? []).length === 0;
}

/** True when `name` is a valid identifier (injected property names). */
export function isIdentifierName(name: string): boolean {
  return name.length > 0 && ts.isIdentifierText(name, ts.ScriptTarget.Latest);
}

const NAMESPACE_SEGMENT = /^[A-Za-z_$@][\w$@-]*$/;

/**
 * Namespaces are dotted or slash-separated names ("App.Models", "@strata/runtime").
 */
export function isNamespaceName(name: string): boolean {
  if (!name) return false;
  return name.split(/[./]/).every((segment) => NAMESPACE_SEGMENT.test(segment));
}
