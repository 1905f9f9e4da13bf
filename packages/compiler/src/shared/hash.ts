import { createHash } from "node:crypto";

/**
 * sha256 over a key-sorted JSON rendering of `value`.
 *
 * Accepts the data chunk trees are made of: strings, finite numbers, booleans,
 * null, arrays and plain objects. Object keys holding `undefined` are skipped,
 * so an absent optional field and a missing one hash equal.
 */
export function stableHash(value: unknown): string {
  return createHash("sha256").update(serialize(value)).digest("hex");
}

function serialize(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return `[${value.map(serialize).join(",")}]`;
  switch (typeof value) {
    case "string":
    case "boolean":
      return JSON.stringify(value);
    case "number":
      if (!Number.isFinite(value)) throw new TypeError(`Cannot hash non-finite number ${value}`);
      return JSON.stringify(value);
    case "object":
      return serializeObject(value);
    default:
      throw new TypeError(`Cannot hash a value of type ${typeof value}`);
  }
}

function serializeObject(obj: object): string {
  const parts = Object.entries(obj)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${serialize(v)}`);
  return `{${parts.join(",")}}`;
}
