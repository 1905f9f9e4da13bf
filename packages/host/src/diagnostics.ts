import { buildDiagnostic, lineColumnAt, type CompilerDiagnostic, type NormalizedPath } from "@strata/compiler";

/** Codes produced by the host while reading pages and writing output. */
export type HostDiagCode = "page-read-failed" | "output-write-failed";

export function hostDiagnostic(code: HostDiagCode, file: NormalizedPath | string, error: unknown): CompilerDiagnostic {
  const reason = error instanceof Error ? error.message : String(error);
  const verb = code === "page-read-failed" ? "read" : "write";
  return buildDiagnostic({
    code,
    message: `Could not ${verb} '${file}': ${reason}`,
    stage: "host",
    data: { file },
  });
}

/**
 * One-line rendering for terminal output:
 * `/app/Views/Index.page:3:5 - error directive-invalid-type: ...`.
 * Line and column need the text of the span's file; offsets are shown otherwise.
 */
export function formatDiagnostic(diag: CompilerDiagnostic, sourceText?: string): string {
  const body = `${diag.severity} ${diag.code}: ${diag.message}`;
  const span = diag.span;
  if (!span) return body;
  if (sourceText === undefined) return `${span.file}@${span.start} - ${body}`;
  const { line, column } = lineColumnAt(sourceText, span.start);
  return `${span.file}:${line}:${column} - ${body}`;
}
