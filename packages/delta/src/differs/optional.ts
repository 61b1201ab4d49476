import { describeValue } from "../common/guards.js";
import { errSingle } from "../common/result.js";
import { noChange, replace } from "../delta/builders.js";
import type { Delta, FieldKey } from "../delta/types.js";
import { ShapeMismatchError } from "../errors/patch-errors.js";
import { applyWhole } from "../patch/apply-common.js";
import type { Diffable, PatchResult } from "./diffable.js";

/**
 * Differ for a value that may be absent (`undefined` or `null`).
 *
 * A change of presence replaces the value; between two present values the
 * inner delta is passed through as is.
 */
export class MaybeDiffer<T, A extends null | undefined> implements Diffable<T | A> {
  readonly shape = "optional";

  readonly inner: Diffable<T>;
  private readonly absent: A;

  constructor(inner: Diffable<T>, absent: A) {
    this.inner = inner;
    this.absent = absent;
  }

  diff(a: T | A, b: T | A): Delta<T | A> {
    if (this.isAbsent(a) || this.isAbsent(b)) {
      return this.isAbsent(a) && this.isAbsent(b) ? noChange() : replace(this.clone(b));
    }
    return this.inner.diff(a, b);
  }

  apply(source: T | A, delta: Delta, path: readonly FieldKey[] = []): PatchResult<T | A> {
    const whole = applyWhole(this, source, delta, path);
    if (whole) {
      return whole;
    }
    if (this.isAbsent(source)) {
      return errSingle(
        new ShapeMismatchError(
          path,
          "present value",
          describeValue(source),
          `Delta of kind ${delta.type} applied to an absent value`,
        ),
      );
    }
    return this.inner.apply(source, delta, path);
  }

  equals(a: T | A, b: T | A): boolean {
    if (this.isAbsent(a) || this.isAbsent(b)) {
      return this.isAbsent(a) && this.isAbsent(b);
    }
    return this.inner.equals(a, b);
  }

  is(value: unknown): value is T | A {
    return value === this.absent || this.inner.is(value);
  }

  clone(value: T | A): T | A {
    return this.isAbsent(value) ? value : this.inner.clone(value);
  }

  private isAbsent(value: T | A): value is A {
    return value === this.absent;
  }
}

/**
 * Differ for `T | undefined`, such as optional fields.
 */
export function optional<T>(inner: Diffable<T>): MaybeDiffer<T, undefined> {
  return new MaybeDiffer(inner, undefined);
}

/**
 * Differ for `T | null`.
 */
export function nullable<T>(inner: Diffable<T>): MaybeDiffer<T, null> {
  return new MaybeDiffer(inner, null);
}
