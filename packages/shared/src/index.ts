import { URI } from "vscode-uri";

/** Suffix appended to a page path to name its generated module. */
export const GENERATED_SUFFIX = ".g.ts";

export function fsPathFromUri(uri: string): string {
  return URI.parse(uri).fsPath;
}

/**
 * Accept either a file system path or a `file:` URI and return a file system path.
 * Malformed URIs are returned unchanged; identity checks downstream reject them.
 */
export function coerceFsPath(input: string): string {
  if (!input.startsWith("file:")) return input;
  try {
    return fsPathFromUri(input);
  } catch {
    return input;
  }
}

export function toGeneratedPathForPage(pageFsPath: string): string {
  return pageFsPath + GENERATED_SUFFIX;
}
