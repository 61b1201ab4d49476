import type { FieldKey } from "./types.js";

/**
 * Render a location inside a value: `$` for the root, `.name` for struct
 * fields and `[n]` for positions.
 */
export function formatPath(path: readonly FieldKey[]): string {
  let result = "$";
  for (const segment of path) {
    result += typeof segment === "number" ? `[${segment}]` : `.${segment}`;
  }
  return result;
}

/**
 * Path segment for an entry key of a keyed collection.
 */
export function keySegment(key: unknown): FieldKey {
  return typeof key === "number" ? key : String(key);
}
