import type { SourceSpan, TextSpan } from "../model/span.js";

/** Authored span projected onto a range of generated text. */
export interface SpanMapping {
  readonly source: SourceSpan;
  readonly target: TextSpan;
}

/**
 * Line-oriented text builder that tracks output offsets, so a line emitted for
 * an authored chunk can record where it landed.
 */
export class LineWriter {
  readonly #lines: string[] = [];
  readonly #mappings: SpanMapping[] = [];
  readonly #indentUnit: string;
  #offset = 0;
  #depth = 0;

  constructor(indentUnit = "  ") {
    this.#indentUnit = indentUnit;
  }

  /** Append one line at the current depth. A `source` span maps the line's text (indentation excluded). */
  line(text = "", source: SourceSpan | null = null): this {
    const indent = text ? this.#indentUnit.repeat(this.#depth) : "";
    const full = `${indent}${text}`;
    if (source) {
      this.#mappings.push({ source, target: { start: this.#offset + indent.length, end: this.#offset + full.length } });
    }
    this.#lines.push(full);
    this.#offset += full.length + 1;
    return this;
  }

  indent(): this {
    this.#depth++;
    return this;
  }

  dedent(): this {
    if (this.#depth > 0) this.#depth--;
    return this;
  }

  get lineCount(): number {
    return this.#lines.length;
  }

  /** Joined text, terminated by a newline. */
  finish(): { code: string; mappings: readonly SpanMapping[] } {
    return { code: `${this.#lines.join("\n")}\n`, mappings: [...this.#mappings] };
  }
}
