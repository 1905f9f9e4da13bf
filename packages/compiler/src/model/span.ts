/* =======================================================================================
 * Span primitives (source ranges)
 * ---------------------------------------------------------------------------------------
 * Offsets are 0-based UTF-16 code units, [start, end) (end is exclusive).
 * A chunk with a `null` span has no authored location (built-in defaults); code
 * generation must not emit a line mapping for it.
 * ======================================================================================= */

import type { NormalizedPath } from "./identity.js";

export interface TextSpan {
  start: number;
  end: number;
}

export interface SourceSpan extends TextSpan {
  file: NormalizedPath;
}

export function spanLength(span: TextSpan | null | undefined): number {
  return span ? Math.max(0, span.end - span.start) : 0;
}

export function normalizeSpan<TSpan extends TextSpan>(span: TSpan): TSpan {
  if (span.start <= span.end) return span;
  const swapped: TSpan = { ...span, start: span.end, end: span.start };
  return swapped;
}

/** Normalize a span when present; returns null for null/undefined inputs. */
export function normalizeSpanMaybe<TSpan extends TextSpan>(span: TSpan | null | undefined): TSpan | null {
  return span ? normalizeSpan(span) : null;
}

export function sourceSpan(file: NormalizedPath, start: number, end: number): SourceSpan {
  return normalizeSpan({ file, start, end });
}

/** 1-based line/column of an offset, for human-facing diagnostic output. */
export function lineColumnAt(text: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  const limit = Math.min(offset, text.length);
  for (let i = 0; i < limit; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: limit - lineStart + 1 };
}
