/* =======================================================================================
 * DIAGNOSED<T>
 * ---------------------------------------------------------------------------------------
 * A value paired with the diagnostics found while producing it, so a chain
 * resolution can return a result and its warnings together.
 * ======================================================================================= */

import type { CompilerDiagnostic } from "../model/diagnostics.js";

/** A value paired with accumulated diagnostics. */
export interface Diagnosed<T> {
  readonly value: T;
  readonly diagnostics: readonly CompilerDiagnostic[];
}

/** Create a Diagnosed with a value and multiple diagnostics. */
export function withDiags<T>(value: T, diagnostics: readonly CompilerDiagnostic[]): Diagnosed<T> {
  return { value, diagnostics };
}
