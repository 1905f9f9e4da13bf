import { normalizeSpanMaybe, type SourceSpan } from "../model/span.js";

// Re-export foundation types from model
export type {
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticRelated,
  CompilerDiagnostic,
} from "../model/diagnostics.js";

import type { DiagnosticSeverity, DiagnosticStage, DiagnosticRelated, CompilerDiagnostic } from "../model/diagnostics.js";

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  /** Defaults to "error". */
  severity?: DiagnosticSeverity;
  span?: SourceSpan | null | undefined;
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder that normalizes spans and fills defaults. */
export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): CompilerDiagnostic<TCode, TData> {
  const diag: CompilerDiagnostic<TCode, TData> = {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity ?? "error",
    span: normalizeSpanMaybe(input.span),
    ...(input.related ? { related: input.related } : {}),
    ...(input.data ? { data: input.data } : {}),
  };
  return diag;
}

export function hasErrors(diagnostics: readonly CompilerDiagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === "error");
}

/** Copy of a diagnostic with a different severity (e.g. ancestor errors become page warnings). */
export function withSeverity<TDiag extends CompilerDiagnostic>(diag: TDiag, severity: DiagnosticSeverity): TDiag {
  return { ...diag, severity };
}
