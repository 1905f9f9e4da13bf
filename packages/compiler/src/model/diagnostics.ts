/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Pure type definitions with no external dependencies.
 * Builder functions live in shared/diagnostics.ts.
 * ======================================================================================= */

import type { SourceSpan } from "./span.js";

export type DiagnosticSeverity = "error" | "warning";

/** Layer that produced the diagnostic, for routing and suppression. */
export type DiagnosticStage = "parse" | "resolve" | "emit" | "host";

export interface DiagnosticRelated {
  code?: string;
  message: string;
  span?: SourceSpan | null;
}

/** Unified diagnostic envelope for every compiler layer. */
export interface CompilerDiagnostic<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  span: SourceSpan | null;
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}

/** Codes produced by the reference directive parser. */
export type ParseDiagCode =
  | "directive-missing-attribute"
  | "directive-invalid-namespace"
  | "directive-invalid-type"
  | "directive-invalid-identifier"
  | "directive-misplaced"
  | "directive-duplicate-model";

/** Codes produced while resolving the ancestor chain. */
export type ResolveDiagCode =
  | "imports-parse-failed"
  | "imports-read-failed"
  | "imports-content-ignored";

/** Codes produced by the reference code generator. */
export type EmitDiagCode = "tag-helper-remove-unmatched";
