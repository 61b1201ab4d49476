import type { FieldKey } from "../delta/types.js";
import { PatchError } from "./patch-error.js";

/**
 * The delta names a field, variant or shape the source value does not have.
 * The delta was computed against a different kind of value.
 */
export class ShapeMismatchError extends PatchError {
  readonly expected: string;
  readonly actual: string;

  constructor(path: readonly FieldKey[], expected: string, actual: string, message?: string) {
    super("SHAPE_MISMATCH", path, message ?? `Shape mismatch: expected ${expected}, got ${actual}`);
    this.name = "ShapeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A sequence edit script does not fit the source sequence: it consumes more
 * or fewer elements than the source has, or carries an invalid operation.
 */
export class SequenceOutOfBoundsError extends PatchError {
  readonly sourceLength: number;
  readonly opIndex: number;

  constructor(path: readonly FieldKey[], sourceLength: number, opIndex: number, message: string) {
    super("SEQUENCE_OUT_OF_BOUNDS", path, message);
    this.name = "SequenceOutOfBoundsError";
    this.sourceLength = sourceLength;
    this.opIndex = opIndex;
  }
}

/**
 * A keyed collection delta removes or patches a key the source lacks.
 */
export class MissingKeyError extends PatchError {
  readonly key: unknown;

  constructor(path: readonly FieldKey[], key: unknown) {
    super("MISSING_KEY", path, `Missing key: ${String(key)}`);
    this.name = "MissingKeyError";
    this.key = key;
  }
}

/**
 * A keyed collection delta inserts a key the source already has.
 */
export class UnexpectedKeyError extends PatchError {
  readonly key: unknown;

  constructor(path: readonly FieldKey[], key: unknown) {
    super("UNEXPECTED_KEY", path, `Unexpected key: ${String(key)}`);
    this.name = "UnexpectedKeyError";
    this.key = key;
  }
}

/**
 * Thrown by `applyOrThrow` when a delta cannot be applied.
 */
export class PatchFailedError extends Error {
  readonly errors: readonly PatchError[];

  constructor(errors: readonly PatchError[]) {
    super(`Patch failed: ${errors.map((e) => e.message).join("; ")}`);
    this.name = "PatchFailedError";
    this.errors = errors;
  }
}
