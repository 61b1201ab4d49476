import type { DeltaLogger } from "../common/logger.js";
import { noChange, replace, sequenceEdits } from "../delta/builders.js";
import type { Delta, FieldKey } from "../delta/types.js";
import { applyEditOps, toEditOps } from "../edit-script/edit-ops.js";
import { DEFAULT_MAX_LCS_CELLS, LcsDiff } from "../edit-script/lcs-diff.js";
import { applyWhole, unsupportedDelta } from "../patch/apply-common.js";
import type { Diffable, PatchResult } from "./diffable.js";

export interface SequenceOptions {
  /**
   * Largest LCS table, in cells, a diff may allocate. Above it the whole
   * target sequence is carried as a replacement.
   */
  maxCells?: number;
  logger?: DeltaLogger;
}

/**
 * Differ for ordered collections.
 *
 * Elements are matched whole through the element differ's equality: a
 * changed element is deleted and inserted, never patched in place.
 */
export class SequenceDiffer<E> implements Diffable<E[]> {
  readonly shape = "sequence";

  readonly element: Diffable<E>;
  private readonly maxCells: number;
  private readonly logger?: DeltaLogger;

  constructor(element: Diffable<E>, options: SequenceOptions = {}) {
    this.element = element;
    this.maxCells = options.maxCells ?? DEFAULT_MAX_LCS_CELLS;
    this.logger = options.logger;
  }

  diff(a: E[], b: E[]): Delta<E[]> {
    if (this.equals(a, b)) {
      return noChange();
    }
    const edits = LcsDiff.diff(a, b, (x, y) => this.element.equals(x, y), {
      maxCells: this.maxCells,
      logger: this.logger,
    });
    if (edits === undefined) {
      this.logger?.warn?.(
        `Sequence of ${a.length} -> ${b.length} elements replaced whole: too large to align`,
      );
      return replace(this.clone(b));
    }
    return sequenceEdits(toEditOps(edits, a.length, b, (item) => this.element.clone(item)));
  }

  apply(source: E[], delta: Delta, path: readonly FieldKey[] = []): PatchResult<E[]> {
    const whole = applyWhole(this, source, delta, path);
    if (whole) {
      return whole;
    }
    if (delta.type !== "edits") {
      return unsupportedDelta(this.shape, delta, path);
    }
    return applyEditOps(source, delta.ops, this.element, path);
  }

  equals(a: E[], b: E[]): boolean {
    if (a.length !== b.length) {
      return false;
    }
    for (let i = 0; i < a.length; i++) {
      if (!this.element.equals(a[i], b[i])) {
        return false;
      }
    }
    return true;
  }

  is(value: unknown): value is E[] {
    return Array.isArray(value) && value.every((item: unknown) => this.element.is(item));
  }

  clone(value: E[]): E[] {
    return value.map((item) => this.element.clone(item));
  }
}

export function array<E>(element: Diffable<E>, options?: SequenceOptions): SequenceDiffer<E> {
  return new SequenceDiffer(element, options);
}
