import type { AddTagHelperChunk, RemoveTagHelperChunk, TagHelperDirectiveChunk } from "../model/chunks.js";

export interface TagHelperResolution {
  /** Add directives still in effect, in registration order. */
  readonly registered: readonly AddTagHelperChunk[];
  /** Remove directives that matched nothing at the point they were applied. */
  readonly unmatched: readonly RemoveTagHelperChunk[];
}

/**
 * Replay the add/remove log in order.
 *
 * - `add` registers the lookup unless it is already registered.
 * - `remove` drops the exact lookup, or every lookup starting with the prefix
 *   when the text ends in `*` (`"App.Legacy*"`, or `"*"` for all).
 */
export function resolveTagHelperLog(log: readonly TagHelperDirectiveChunk[]): TagHelperResolution {
  let registered: AddTagHelperChunk[] = [];
  const unmatched: RemoveTagHelperChunk[] = [];

  for (const chunk of log) {
    if (chunk.kind === "add-tag-helper") {
      if (!registered.some((entry) => entry.lookup === chunk.lookup)) registered.push(chunk);
      continue;
    }
    const matches = lookupMatcher(chunk.lookup);
    const kept = registered.filter((entry) => !matches(entry.lookup));
    if (kept.length === registered.length) unmatched.push(chunk);
    registered = kept;
  }

  return { registered, unmatched };
}

function lookupMatcher(pattern: string): (lookup: string) => boolean {
  if (pattern.endsWith("*")) {
    const prefix = pattern.slice(0, -1);
    return (lookup) => lookup.startsWith(prefix);
  }
  return (lookup) => lookup === pattern;
}
