import { isRecord } from "../common/guards.js";
import { err, ok } from "../common/result.js";
import { fieldsChanged, noChange } from "../delta/builders.js";
import type { Delta, FieldChange, FieldKey, FieldsChanged, NoChange } from "../delta/types.js";
import type { PatchError } from "../errors/patch-error.js";
import { ShapeMismatchError } from "../errors/patch-errors.js";
import { applyWhole, unsupportedDelta } from "../patch/apply-common.js";
import type { Diffable, PatchResult, ProductDiffable } from "./diffable.js";

/**
 * One differ per field of `T`.
 */
export type ProductShape<T> = { readonly [K in keyof T]-?: Diffable<T[K]> };

/**
 * Field of a product, bound to its key and differ.
 */
export interface ProductField<T> {
  readonly key: FieldKey;
  diff(a: T, b: T): Delta;
  equals(a: T, b: T): boolean;
  /** Write the patched field into `target`; returns the errors found. */
  patch(source: T, target: T, delta: Delta, path: readonly FieldKey[]): PatchError[];
  /** Write a copy of the source field into `target`. */
  copy(source: T, target: T): void;
}

function productField<T, K extends keyof T & FieldKey>(
  key: K,
  differ: Diffable<T[K]>,
): ProductField<T> {
  return {
    key,
    diff: (a, b) => differ.diff(a[key], b[key]),
    equals: (a, b) => differ.equals(a[key], b[key]),
    patch: (source, target, delta, path) => {
      const result = differ.apply(source[key], delta, path);
      if (!result.success) {
        return result.errors;
      }
      target[key] = result.value;
      return [];
    },
    copy: (source, target) => {
      target[key] = differ.clone(source[key]);
    },
  };
}

/**
 * Field-by-field differ shared by structs and tuples.
 *
 * A product with no changed field yields `unchanged`; otherwise the delta
 * lists the changed fields only, in declaration order.
 */
export abstract class ProductDiffer<T> implements ProductDiffable<T> {
  readonly shape = "product";
  readonly keys: readonly FieldKey[];

  protected readonly fields: readonly ProductField<T>[];

  constructor(fields: readonly ProductField<T>[]) {
    this.fields = fields;
    this.keys = fields.map((field) => field.key);
  }

  /** Shallow copy of the container, fields are overwritten afterwards. */
  protected abstract copyContainer(value: T): T;

  abstract is(value: unknown): value is T;

  diff(a: T, b: T): Delta<T> {
    return this.diffFields(a, b);
  }

  diffFields(a: T, b: T): FieldsChanged | NoChange {
    const changes: FieldChange[] = [];
    for (const field of this.fields) {
      const delta = field.diff(a, b);
      if (delta.type !== "unchanged") {
        changes.push({ field: field.key, delta });
      }
    }
    return changes.length === 0 ? noChange() : fieldsChanged(changes);
  }

  apply(source: T, delta: Delta, path: readonly FieldKey[] = []): PatchResult<T> {
    const whole = applyWhole(this, source, delta, path);
    if (whole) {
      return whole;
    }
    if (delta.type !== "fields") {
      return unsupportedDelta(this.shape, delta, path);
    }

    const errors: PatchError[] = [];
    const byKey = new Map<FieldKey, Delta>();
    for (const change of delta.fields) {
      if (!this.keys.includes(change.field)) {
        errors.push(
          new ShapeMismatchError(
            path,
            `one of fields ${this.keys.join(", ")}`,
            String(change.field),
            `Unknown field ${String(change.field)}`,
          ),
        );
      } else if (byKey.has(change.field)) {
        errors.push(
          new ShapeMismatchError(
            path,
            "one change per field",
            String(change.field),
            `Duplicate change for field ${String(change.field)}`,
          ),
        );
      } else {
        byKey.set(change.field, change.delta);
      }
    }

    const target = this.copyContainer(source);
    for (const field of this.fields) {
      const fieldDelta = byKey.get(field.key);
      if (fieldDelta === undefined) {
        field.copy(source, target);
      } else {
        errors.push(...field.patch(source, target, fieldDelta, [...path, field.key]));
      }
    }
    return errors.length > 0 ? err(errors) : ok(target);
  }

  equals(a: T, b: T): boolean {
    return this.fields.every((field) => field.equals(a, b));
  }

  clone(value: T): T {
    const target = this.copyContainer(value);
    for (const field of this.fields) {
      field.copy(value, target);
    }
    return target;
  }
}

/**
 * Differ for objects with named fields.
 */
export class StructDiffer<T extends object> extends ProductDiffer<T> {
  private readonly shapeOf: ProductShape<T>;

  constructor(shape: ProductShape<T>) {
    const fields: ProductField<T>[] = [];
    for (const key in shape) {
      fields.push(productField<T, Extract<keyof T, string>>(key, shape[key]));
    }
    super(fields);
    this.shapeOf = shape;
  }

  protected copyContainer(value: T): T {
    return { ...value };
  }

  is(value: unknown): value is T {
    if (!isRecord(value)) {
      return false;
    }
    for (const key in this.shapeOf) {
      if (!this.shapeOf[key].is(value[key])) {
        return false;
      }
    }
    return true;
  }
}

/**
 * Differ for fixed-length tuples, fields are positions.
 */
export class TupleDiffer<T extends unknown[]> extends ProductDiffer<T> {
  private readonly shapeOf: ProductShape<T>;
  private readonly length: number;

  constructor(shape: ProductShape<T>) {
    const length = Object.keys(shape).length;
    const fields: ProductField<T>[] = [];
    for (let index = 0; index < length; index++) {
      fields.push(productField<T, number>(index, shape[index]));
    }
    super(fields);
    this.shapeOf = shape;
    this.length = length;
  }

  protected copyContainer(value: T): T {
    return Object.assign([], value);
  }

  is(value: unknown): value is T {
    if (!Array.isArray(value) || value.length !== this.length) {
      return false;
    }
    for (let index = 0; index < this.length; index++) {
      if (!this.shapeOf[index].is(value[index])) {
        return false;
      }
    }
    return true;
  }
}

/**
 * Differ for a struct, built from one differ per field.
 *
 * @example
 * ```typescript
 * interface Point { x: number; y: number }
 * const point = struct<Point>({ x: number(), y: number() });
 * point.diff({ x: 1, y: 2 }, { x: 1, y: 3 });
 * // { type: "fields", fields: [{ field: "y", delta: { type: "replace", value: 3 } }] }
 * ```
 */
export function struct<T extends object>(shape: ProductShape<T>): StructDiffer<T> {
  return new StructDiffer<T>(shape);
}

export function tuple<T extends unknown[]>(shape: ProductShape<T>): TupleDiffer<T> {
  return new TupleDiffer<T>(shape);
}

/**
 * The zero-field product, payload of unit variants.
 */
export function empty(): TupleDiffer<[]> {
  return new TupleDiffer<[]>([]);
}
