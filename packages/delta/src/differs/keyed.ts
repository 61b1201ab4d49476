import { describeValue, isRecord } from "../common/guards.js";
import { err, ok } from "../common/result.js";
import { entriesChanged, noChange } from "../delta/builders.js";
import { keySegment } from "../delta/path.js";
import type { Delta, EntryChange, FieldKey } from "../delta/types.js";
import type { PatchError } from "../errors/patch-error.js";
import { MissingKeyError, ShapeMismatchError, UnexpectedKeyError } from "../errors/patch-errors.js";
import { applyWhole, unsupportedDelta } from "../patch/apply-common.js";
import type { Diffable, PatchResult } from "./diffable.js";
import { string, unit } from "./scalar.js";

/**
 * One entry of a keyed collection.
 */
export interface KeyedEntry<K, V> {
  readonly key: K;
  readonly value: V;
}

/**
 * Differ for collections of unique keys: maps, records and sets.
 *
 * Keys are matched through the key differ's equality, so structured keys
 * such as dates or tuples match by value. Keys of one collection must be
 * distinct under that equality. An entry present on both sides with
 * different values is patched through the value differ; other entries are
 * removed or inserted whole.
 */
export abstract class KeyedDiffer<C, K, V> implements Diffable<C> {
  readonly shape = "keyed";

  readonly key: Diffable<K>;
  readonly value: Diffable<V>;

  constructor(key: Diffable<K>, value: Diffable<V>) {
    this.key = key;
    this.value = value;
  }

  protected abstract entriesOf(collection: C): KeyedEntry<K, V>[];

  protected abstract build(entries: readonly KeyedEntry<K, V>[]): C;

  abstract is(value: unknown): value is C;

  /**
   * Removed and patched entries in source order, then inserted entries in
   * target order.
   */
  diff(a: C, b: C): Delta<C> {
    const before = this.entriesOf(a);
    const after = this.entriesOf(b);
    const matched = new Array<boolean>(after.length).fill(false);
    const changes: EntryChange[] = [];

    for (const entry of before) {
      const index = this.indexOfKey(after, entry.key);
      if (index < 0) {
        changes.push({ change: "removed", key: this.key.clone(entry.key) });
        continue;
      }
      matched[index] = true;
      const delta = this.value.diff(entry.value, after[index].value);
      if (delta.type !== "unchanged") {
        changes.push({ change: "patched", key: this.key.clone(entry.key), delta });
      }
    }
    after.forEach((entry, index) => {
      if (!matched[index]) {
        changes.push({
          change: "inserted",
          key: this.key.clone(entry.key),
          value: this.value.clone(entry.value),
        });
      }
    });

    return changes.length === 0 ? noChange() : entriesChanged(changes);
  }

  apply(source: C, delta: Delta, path: readonly FieldKey[] = []): PatchResult<C> {
    const whole = applyWhole(this, source, delta, path);
    if (whole) {
      return whole;
    }
    if (delta.type !== "entries") {
      return unsupportedDelta(this.shape, delta, path);
    }

    const target = this.copyEntries(this.entriesOf(source));
    const errors: PatchError[] = [];

    for (const change of delta.entries) {
      const key = change.key;
      const kind: string = change.change;
      if (!this.key.is(key)) {
        errors.push(
          new ShapeMismatchError(
            path,
            "entry key",
            describeValue(key),
            "Entry key does not fit the key shape",
          ),
        );
        continue;
      }
      const entryPath = [...path, keySegment(key)];
      const index = this.indexOfKey(target, key);

      switch (change.change) {
        case "removed":
          if (index < 0) {
            errors.push(new MissingKeyError(path, key));
          } else {
            target.splice(index, 1);
          }
          break;
        case "inserted":
          if (index >= 0) {
            errors.push(new UnexpectedKeyError(path, key));
          } else if (!this.value.is(change.value)) {
            errors.push(
              new ShapeMismatchError(
                entryPath,
                "entry value",
                describeValue(change.value),
                "Inserted value does not fit the value shape",
              ),
            );
          } else {
            target.push({ key: this.key.clone(key), value: this.value.clone(change.value) });
          }
          break;
        case "patched": {
          if (index < 0) {
            errors.push(new MissingKeyError(path, key));
            break;
          }
          const entry = target[index];
          const result = this.value.apply(entry.value, change.delta, entryPath);
          if (result.success) {
            target[index] = { key: entry.key, value: result.value };
          } else {
            errors.push(...result.errors);
          }
          break;
        }
        default:
          errors.push(
            new ShapeMismatchError(
              path,
              "removed, inserted or patched entry",
              kind,
              `Unknown entry change ${kind}`,
            ),
          );
      }
    }

    return errors.length > 0 ? err(errors) : ok(this.build(target));
  }

  equals(a: C, b: C): boolean {
    const left = this.entriesOf(a);
    const right = this.entriesOf(b);
    if (left.length !== right.length) {
      return false;
    }
    return left.every((entry) => {
      const index = this.indexOfKey(right, entry.key);
      return index >= 0 && this.value.equals(entry.value, right[index].value);
    });
  }

  clone(value: C): C {
    return this.build(this.copyEntries(this.entriesOf(value)));
  }

  protected entriesFit(entries: Iterable<readonly [unknown, unknown]>): boolean {
    for (const [key, value] of entries) {
      if (!this.key.is(key) || !this.value.is(value)) {
        return false;
      }
    }
    return true;
  }

  private indexOfKey(entries: readonly KeyedEntry<K, V>[], key: K): number {
    return entries.findIndex((entry) => this.key.equals(entry.key, key));
  }

  private copyEntries(entries: readonly KeyedEntry<K, V>[]): KeyedEntry<K, V>[] {
    return entries.map((entry) => ({
      key: this.key.clone(entry.key),
      value: this.value.clone(entry.value),
    }));
  }
}

export class MapDiffer<K, V> extends KeyedDiffer<Map<K, V>, K, V> {
  protected entriesOf(collection: Map<K, V>): KeyedEntry<K, V>[] {
    return Array.from(collection, ([key, value]) => ({ key, value }));
  }

  protected build(entries: readonly KeyedEntry<K, V>[]): Map<K, V> {
    const collection = new Map<K, V>();
    for (const entry of entries) {
      collection.set(entry.key, entry.value);
    }
    return collection;
  }

  is(value: unknown): value is Map<K, V> {
    return value instanceof Map && this.entriesFit(value);
  }
}

export class RecordDiffer<V> extends KeyedDiffer<Record<string, V>, string, V> {
  protected entriesOf(collection: Record<string, V>): KeyedEntry<string, V>[] {
    return Object.entries(collection).map(([key, value]) => ({ key, value }));
  }

  protected build(entries: readonly KeyedEntry<string, V>[]): Record<string, V> {
    return Object.fromEntries(entries.map((entry): [string, V] => [entry.key, entry.value]));
  }

  is(value: unknown): value is Record<string, V> {
    return isRecord(value) && this.entriesFit(Object.entries(value));
  }
}

export class SetDiffer<E> extends KeyedDiffer<Set<E>, E, null> {
  protected entriesOf(collection: Set<E>): KeyedEntry<E, null>[] {
    return Array.from(collection, (key) => ({ key, value: null }));
  }

  protected build(entries: readonly KeyedEntry<E, null>[]): Set<E> {
    return new Set(entries.map((entry) => entry.key));
  }

  is(value: unknown): value is Set<E> {
    if (!(value instanceof Set)) {
      return false;
    }
    for (const item of value) {
      if (!this.key.is(item)) {
        return false;
      }
    }
    return true;
  }
}

/**
 * Differ for `Map<K, V>`.
 *
 * @example
 * ```typescript
 * const scores = map(string(), number());
 * scores.diff(new Map([["a", 1], ["b", 2]]), new Map([["b", 3], ["c", 4]]));
 * // { type: "entries", entries: [
 * //   { change: "removed", key: "a" },
 * //   { change: "patched", key: "b", delta: { type: "replace", value: 3 } },
 * //   { change: "inserted", key: "c", value: 4 },
 * // ] }
 * ```
 */
export function map<K, V>(key: Diffable<K>, value: Diffable<V>): MapDiffer<K, V> {
  return new MapDiffer(key, value);
}

/**
 * Differ for plain objects used as dictionaries, keyed by property name.
 */
export function record<V>(value: Diffable<V>): RecordDiffer<V> {
  return new RecordDiffer(string(), value);
}

/**
 * Differ for `Set<E>`. Elements are only ever removed or inserted.
 */
export function set<E>(element: Diffable<E>): SetDiffer<E> {
  return new SetDiffer(element, unit());
}
