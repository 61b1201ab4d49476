import type { Result } from "../common/result.js";
import type { Delta, FieldKey, FieldsChanged, NoChange } from "../delta/types.js";
import type { PatchError } from "../errors/patch-error.js";

/**
 * Structural category of a diffable type. Decides which delta kinds its
 * differ produces and accepts.
 */
export type Shape = "scalar" | "product" | "sum" | "sequence" | "keyed" | "optional";

export type PatchResult<T> = Result<T, PatchError>;

/**
 * Diff/patch capability of one type.
 *
 * Per-type capabilities are assembled from the combinators of this package
 * (`struct`, `tuple`, `sum`, `array`, ...) and bottom out at scalar differs.
 * Differs are chosen by composition, never by inspecting values at run time.
 *
 * Contract:
 * - `apply(a, diff(a, b))` succeeds with a value equal to `b`;
 * - `diff(a, a)` is `{ type: "unchanged" }`;
 * - `diff` is pure and never fails; `apply` never throws, it reports
 *   mismatches in the returned result.
 */
export interface Diffable<T> {
  readonly shape: Shape;

  /**
   * Compute the delta turning `a` into `b`. Values embedded in the delta
   * are deep copies.
   */
  diff(a: T, b: T): Delta<T>;

  /**
   * Reconstruct a value from `source` and a delta computed against it.
   *
   * @param path location of `source` inside the root value, used in errors
   */
  apply(source: T, delta: Delta, path?: readonly FieldKey[]): PatchResult<T>;

  equals(a: T, b: T): boolean;

  /**
   * Shape guard. Validates values carried by deltas before they are used.
   */
  is(value: unknown): value is T;

  /**
   * Deep copy.
   */
  clone(value: T): T;
}

/**
 * Capability of a product type: its delta is a field map.
 */
export interface ProductDiffable<T> extends Diffable<T> {
  readonly shape: "product";

  /** Field identifiers in declaration order. */
  readonly keys: readonly FieldKey[];

  diffFields(a: T, b: T): FieldsChanged | NoChange;
}

/**
 * Value type described by a differ.
 */
export type Infer<D> = D extends Diffable<infer T> ? T : never;
