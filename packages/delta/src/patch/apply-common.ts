import { describeValue } from "../common/guards.js";
import { errSingle, ok } from "../common/result.js";
import type { Delta, FieldKey } from "../delta/types.js";
import type { Diffable, PatchResult, Shape } from "../differs/diffable.js";
import { ShapeMismatchError } from "../errors/patch-errors.js";

/**
 * Apply the delta kinds every shape accepts: `unchanged` and `replace`.
 *
 * @returns the patch result, or `undefined` when the delta is shape-specific
 */
export function applyWhole<T>(
  differ: Diffable<T>,
  source: T,
  delta: Delta,
  path: readonly FieldKey[],
): PatchResult<T> | undefined {
  switch (delta.type) {
    case "unchanged":
      return ok(differ.clone(source));
    case "replace": {
      const value = delta.value;
      if (!differ.is(value)) {
        return errSingle(
          new ShapeMismatchError(
            path,
            differ.shape,
            describeValue(value),
            `Replacement value does not fit the ${differ.shape} shape`,
          ),
        );
      }
      return ok(differ.clone(value));
    }
    default:
      return undefined;
  }
}

/**
 * Failure for a delta kind the shape does not accept.
 */
export function unsupportedDelta<T>(
  shape: Shape,
  delta: Delta,
  path: readonly FieldKey[],
): PatchResult<T> {
  return errSingle(new ShapeMismatchError(path, `${shape} delta`, `${delta.type} delta`));
}
