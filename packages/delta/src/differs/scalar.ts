import { noChange, replace } from "../delta/builders.js";
import type { Delta, FieldKey } from "../delta/types.js";
import { applyWhole, unsupportedDelta } from "../patch/apply-common.js";
import type { Diffable, PatchResult } from "./diffable.js";

export interface ScalarOptions<T> {
  /** Equality of two values. Defaults to `Object.is`. */
  equals?: (a: T, b: T) => boolean;
  /** Copy of a value. Defaults to identity, which suits immutable values. */
  clone?: (value: T) => T;
}

/**
 * Differ for atomic values: a change is always a full replacement.
 */
export class ScalarDiffer<T> implements Diffable<T> {
  readonly shape = "scalar";

  private readonly guard: (value: unknown) => value is T;
  private readonly eq: (a: T, b: T) => boolean;
  private readonly copy: (value: T) => T;

  constructor(guard: (value: unknown) => value is T, options: ScalarOptions<T> = {}) {
    this.guard = guard;
    this.eq = options.equals ?? Object.is;
    this.copy = options.clone ?? ((value) => value);
  }

  diff(a: T, b: T): Delta<T> {
    return this.eq(a, b) ? noChange() : replace(this.copy(b));
  }

  apply(source: T, delta: Delta, path: readonly FieldKey[] = []): PatchResult<T> {
    return applyWhole(this, source, delta, path) ?? unsupportedDelta(this.shape, delta, path);
  }

  equals(a: T, b: T): boolean {
    return this.eq(a, b);
  }

  is(value: unknown): value is T {
    return this.guard(value);
  }

  clone(value: T): T {
    return this.copy(value);
  }
}

/**
 * Differ for a custom atomic type.
 */
export function scalar<T>(
  guard: (value: unknown) => value is T,
  options?: ScalarOptions<T>,
): ScalarDiffer<T> {
  return new ScalarDiffer(guard, options);
}

export function string(): ScalarDiffer<string> {
  return scalar((value): value is string => typeof value === "string");
}

/**
 * Numbers compare with `Object.is`: `NaN` equals itself, `0` and `-0` differ.
 */
export function number(): ScalarDiffer<number> {
  return scalar((value): value is number => typeof value === "number");
}

export function boolean(): ScalarDiffer<boolean> {
  return scalar((value): value is boolean => typeof value === "boolean");
}

export function bigint(): ScalarDiffer<bigint> {
  return scalar((value): value is bigint => typeof value === "bigint");
}

/**
 * Differ for one of a fixed set of primitive values, such as a string enum.
 */
export function literal<const V extends readonly (string | number | boolean)[]>(
  ...values: V
): ScalarDiffer<V[number]> {
  return scalar((value): value is V[number] => values.some((candidate) => candidate === value));
}

/**
 * Differ for `Date`, compared by time value.
 */
export function date(): ScalarDiffer<Date> {
  return scalar((value): value is Date => value instanceof Date, {
    equals: (a, b) => Object.is(a.getTime(), b.getTime()),
    clone: (value) => new Date(value.getTime()),
  });
}

/**
 * Differ for the unit value `null`. Never changes.
 */
export function unit(): ScalarDiffer<null> {
  return scalar((value): value is null => value === null);
}
