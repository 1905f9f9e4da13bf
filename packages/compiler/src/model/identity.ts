/* =======================================================================================
 * Identity primitives (brands, normalized paths)
 * ---------------------------------------------------------------------------------------
 * - Central place for the string brands used across compiler layers
 * - Path normalization used as the identity authority for chunk tree caching
 * ======================================================================================= */

import path from "node:path";
import { coerceFsPath } from "@strata/shared";

export type Brand<T extends string> = { readonly __brand: T };
export type Branded<TValue, TBrand extends string> = TValue & Brand<TBrand>;

export type StringId<TBrand extends string> = Branded<string, TBrand>;

/** Canonical file identity: forward slashes, no `.`/`..` segments, no trailing slash. */
export type NormalizedPath = StringId<"NormalizedPath">;

export function brandString<TBrand extends string>(value: string): StringId<TBrand> {
  return value as StringId<TBrand>;
}

/**
 * Normalize a file path (or `file:` URI) into the identity used as a cache key.
 * Lower-cases on win32 so identities compare equal on case-insensitive file systems.
 */
export function normalizePathForId(filePath: string, platform: NodeJS.Platform = process.platform): NormalizedPath {
  const fsPath = coerceFsPath(filePath).split("\\").join("/");
  let normalized = path.posix.normalize(fsPath);
  if (normalized.length > 1 && normalized.endsWith("/")) {
    normalized = normalized.slice(0, -1);
  }
  // Drive roots keep their slash ("c:/").
  if (/^[A-Za-z]:$/.test(normalized)) normalized = `${normalized}/`;
  const canonical = platform === "win32" ? normalized.toLowerCase() : normalized;
  return brandString<"NormalizedPath">(canonical);
}

/**
 * True when `value` is already in the shape `normalizePathForId` produces.
 * The chunk tree cache rejects identities that fail this check.
 */
export function isNormalizedPath(value: string, platform: NodeJS.Platform = process.platform): value is NormalizedPath {
  if (!value) return false;
  return normalizePathForId(value, platform) === value && !value.startsWith("file:");
}

/** Parent directory of a normalized path; the root maps to itself. */
export function parentDirectory(value: NormalizedPath): NormalizedPath {
  return brandString<"NormalizedPath">(path.posix.dirname(value));
}

export function joinPath(dir: NormalizedPath, name: string): NormalizedPath {
  return brandString<"NormalizedPath">(path.posix.join(dir, name));
}

export function baseName(value: NormalizedPath): string {
  return path.posix.basename(value);
}

/**
 * Path of `file` relative to `root`, always starting with "/".
 * Returns null when the file does not sit under the root.
 */
export function rootRelativePath(root: NormalizedPath, file: NormalizedPath): string | null {
  if (file === root) return "/";
  const prefix = root.endsWith("/") ? root : `${root}/`;
  if (!file.startsWith(prefix)) return null;
  return `/${file.slice(prefix.length)}`;
}
