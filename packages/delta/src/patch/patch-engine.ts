import type { DeltaLogger } from "../common/logger.js";
import type { Delta } from "../delta/types.js";
import type { Diffable, PatchResult } from "../differs/diffable.js";
import { PatchFailedError } from "../errors/patch-errors.js";

export interface PatchOptions {
  logger?: DeltaLogger;
}

/**
 * Compute the delta turning `a` into `b`.
 */
export function diff<T>(differ: Diffable<T>, a: T, b: T): Delta<T> {
  return differ.diff(a, b);
}

/**
 * Apply a delta to `source`. The source is never modified; on success the
 * result is a new value, on failure no partial value is returned.
 */
export function apply<T>(
  differ: Diffable<T>,
  source: T,
  delta: Delta,
  options: PatchOptions = {},
): PatchResult<T> {
  const result = differ.apply(source, delta, []);
  if (!result.success) {
    options.logger?.debug?.(`Patch of ${differ.shape} value failed`, result.errors);
  }
  return result;
}

/**
 * Apply a delta, throwing {@link PatchFailedError} when it does not fit.
 */
export function applyOrThrow<T>(
  differ: Diffable<T>,
  source: T,
  delta: Delta,
  options: PatchOptions = {},
): T {
  const result = apply(differ, source, delta, options);
  if (!result.success) {
    throw new PatchFailedError(result.errors);
  }
  return result.value;
}
