import { formatPath } from "../delta/path.js";
import type { FieldKey } from "../delta/types.js";

export type PatchErrorCode =
  | "SHAPE_MISMATCH"
  | "SEQUENCE_OUT_OF_BOUNDS"
  | "MISSING_KEY"
  | "UNEXPECTED_KEY";

/**
 * Base class for all errors reported when a delta cannot be applied.
 *
 * `path` locates the failing part from the root of the patched value.
 */
export class PatchError extends Error {
  readonly code: PatchErrorCode;
  readonly path: readonly FieldKey[];

  constructor(code: PatchErrorCode, path: readonly FieldKey[], message: string) {
    super(`${message} at ${formatPath(path)}`);
    this.name = "PatchError";
    this.code = code;
    this.path = path;
  }
}
