import { isRecord } from "../common/guards.js";
import { formatPath, keySegment } from "../delta/path.js";
import type { Delta, FieldKey } from "../delta/types.js";
import { editCounts } from "../edit-script/edit-ops.js";

/**
 * One leaf change of a delta, located by its path from the root.
 */
export type Change =
  | { readonly kind: "replaced"; readonly path: readonly FieldKey[]; readonly value: unknown }
  | {
      readonly kind: "variant-changed";
      readonly path: readonly FieldKey[];
      readonly tag: string;
      readonly payload: unknown;
    }
  | {
      readonly kind: "sequence-edited";
      readonly path: readonly FieldKey[];
      readonly deleted: number;
      readonly inserted: number;
    }
  | { readonly kind: "entry-removed"; readonly path: readonly FieldKey[]; readonly key: unknown }
  | {
      readonly kind: "entry-inserted";
      readonly path: readonly FieldKey[];
      readonly key: unknown;
      readonly value: unknown;
    };

export type ChangeKind = Change["kind"];

/**
 * Flatten a delta into its leaf changes, in delta order.
 *
 * Field, same-variant and patched-entry deltas are descended into; they do
 * not produce entries of their own.
 */
export function listChanges(delta: Delta, path: readonly FieldKey[] = []): Change[] {
  const changes: Change[] = [];
  collect(delta, path, changes);
  return changes;
}

function collect(delta: Delta, path: readonly FieldKey[], out: Change[]): void {
  switch (delta.type) {
    case "unchanged":
      return;
    case "replace":
      out.push({ kind: "replaced", path, value: delta.value });
      return;
    case "fields":
      for (const change of delta.fields) {
        collect(change.delta, [...path, change.field], out);
      }
      return;
    case "variant":
      out.push({ kind: "variant-changed", path, tag: delta.tag, payload: delta.payload });
      return;
    case "same-variant":
      collect(delta.fields, path, out);
      return;
    case "edits":
      out.push({ kind: "sequence-edited", path, ...editCounts(delta.ops) });
      return;
    case "entries":
      for (const entry of delta.entries) {
        switch (entry.change) {
          case "removed":
            out.push({ kind: "entry-removed", path, key: entry.key });
            break;
          case "inserted":
            out.push({ kind: "entry-inserted", path, key: entry.key, value: entry.value });
            break;
          case "patched":
            collect(entry.delta, [...path, keySegment(entry.key)], out);
            break;
        }
      }
      return;
  }
}

/**
 * Render a delta as text, one change per line.
 *
 * @example
 * ```typescript
 * formatChanges(point.diff({ x: 1, y: 1 }, { x: 1, y: 2 }));
 * // "$.y: replaced with 2"
 * ```
 */
export function formatChanges(delta: Delta): string {
  return listChanges(delta).map(formatChange).join("\n");
}

export function formatChange(change: Change): string {
  const at = formatPath(change.path);
  switch (change.kind) {
    case "replaced":
      return `${at}: replaced with ${formatValue(change.value)}`;
    case "variant-changed":
      return `${at}: variant changed to ${change.tag} ${formatValue(change.payload)}`;
    case "sequence-edited":
      return `${at}: ${change.deleted} deleted, ${change.inserted} inserted`;
    case "entry-removed":
      return `${at}: removed key ${formatValue(change.key)}`;
    case "entry-inserted":
      return `${at}: inserted key ${formatValue(change.key)} = ${formatValue(change.value)}`;
  }
}

/**
 * Compact single-line rendering of a value carried by a delta.
 */
export function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "bigint") {
    return `${value}n`;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => formatValue(item)).join(", ")}]`;
  }
  if (value instanceof Map) {
    const entries = Array.from(
      value,
      ([key, item]: [unknown, unknown]) => `${formatValue(key)} => ${formatValue(item)}`,
    );
    return entries.length === 0 ? "Map {}" : `Map { ${entries.join(", ")} }`;
  }
  if (value instanceof Set) {
    const items = Array.from(value, (item: unknown) => formatValue(item));
    return items.length === 0 ? "Set {}" : `Set { ${items.join(", ")} }`;
  }
  if (isRecord(value)) {
    const fields = Object.entries(value).map(([key, item]) => `${key}: ${formatValue(item)}`);
    return fields.length === 0 ? "{}" : `{ ${fields.join(", ")} }`;
  }
  return String(value);
}
