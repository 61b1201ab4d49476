import { describeValue, isNonEmptyArray, isPositiveCount } from "../common/guards.js";
import { errSingle, ok } from "../common/result.js";
import type { EditOp, FieldKey } from "../delta/types.js";
import type { Diffable, PatchResult } from "../differs/diffable.js";
import { SequenceOutOfBoundsError, ShapeMismatchError } from "../errors/patch-errors.js";
import { type EditList, EditType } from "./edit.js";

/**
 * Append an operation, merging it into the previous one of the same type.
 */
function pushOp<E>(ops: EditOp<E>[], op: EditOp<E>): void {
  const last = ops[ops.length - 1];
  if (last !== undefined) {
    if (last.type === "insert" && op.type === "insert") {
      ops[ops.length - 1] = { type: "insert", items: [...last.items, ...op.items] };
      return;
    }
    if (last.type === "keep" && op.type === "keep") {
      ops[ops.length - 1] = { type: "keep", count: last.count + op.count };
      return;
    }
    if (last.type === "delete" && op.type === "delete") {
      ops[ops.length - 1] = { type: "delete", count: last.count + op.count };
      return;
    }
  }
  ops.push(op);
}

/**
 * Convert an edit list into a canonical edit script.
 *
 * Unchanged runs become `keep`, including the trailing run, so the script
 * consumes the whole source. Each edit region becomes a `delete` followed by
 * an `insert` carrying copies of the target elements.
 *
 * @param edits Edit regions ordered by position
 * @param sourceLength Length of the source sequence
 * @param target The target sequence
 * @param clone Copy of one element
 */
export function toEditOps<E>(
  edits: EditList,
  sourceLength: number,
  target: readonly E[],
  clone: (item: E) => E,
): EditOp<E>[] {
  const ops: EditOp<E>[] = [];
  let posA = 0;

  for (const edit of edits) {
    if (edit.beginA > posA) {
      pushOp(ops, { type: "keep", count: edit.beginA - posA });
    }

    switch (edit.getType()) {
      case EditType.DELETE:
        pushOp(ops, { type: "delete", count: edit.getLengthA() });
        break;
      case EditType.INSERT:
        pushOp(ops, { type: "insert", items: target.slice(edit.beginB, edit.endB).map(clone) });
        break;
      case EditType.REPLACE:
        pushOp(ops, { type: "delete", count: edit.getLengthA() });
        pushOp(ops, { type: "insert", items: target.slice(edit.beginB, edit.endB).map(clone) });
        break;
      case EditType.EMPTY:
        break;
    }

    posA = edit.endA;
  }

  if (posA < sourceLength) {
    pushOp(ops, { type: "keep", count: sourceLength - posA });
  }

  return ops;
}

/**
 * Replay an edit script over a source sequence.
 *
 * Fails without a partial result when an operation is malformed, when the
 * script consumes more or fewer elements than the source holds, or when an
 * inserted element does not fit the element shape.
 */
export function applyEditOps<E>(
  source: readonly E[],
  ops: readonly EditOp[],
  element: Diffable<E>,
  path: readonly FieldKey[] = [],
): PatchResult<E[]> {
  const result: E[] = [];
  let pos = 0;

  for (let index = 0; index < ops.length; index++) {
    const op = ops[index];
    switch (op.type) {
      case "keep":
      case "delete": {
        if (!isPositiveCount(op.count)) {
          return errSingle(
            new SequenceOutOfBoundsError(
              path,
              source.length,
              index,
              `Invalid ${op.type} count ${String(op.count)} in operation ${index}`,
            ),
          );
        }
        if (pos + op.count > source.length) {
          return errSingle(
            new SequenceOutOfBoundsError(
              path,
              source.length,
              index,
              `Operation ${index} consumes up to element ${pos + op.count} ` +
                `of a ${source.length}-element sequence`,
            ),
          );
        }
        if (op.type === "keep") {
          for (let i = pos; i < pos + op.count; i++) {
            result.push(element.clone(source[i]));
          }
        }
        pos += op.count;
        break;
      }
      case "insert": {
        if (!isNonEmptyArray(op.items)) {
          return errSingle(
            new SequenceOutOfBoundsError(
              path,
              source.length,
              index,
              `Empty insert in operation ${index}`,
            ),
          );
        }
        for (const item of op.items) {
          if (!element.is(item)) {
            return errSingle(
              new ShapeMismatchError(
                [...path, result.length],
                "sequence element",
                describeValue(item),
                `Inserted element does not fit the element shape`,
              ),
            );
          }
          result.push(element.clone(item));
        }
        break;
      }
      default:
        return errSingle(
          new SequenceOutOfBoundsError(
            path,
            source.length,
            index,
            `Unknown edit operation at index ${index}`,
          ),
        );
    }
  }

  if (pos !== source.length) {
    return errSingle(
      new SequenceOutOfBoundsError(
        path,
        source.length,
        ops.length,
        `Edit script consumes ${pos} of ${source.length} source elements`,
      ),
    );
  }
  return ok(result);
}

/**
 * Numbers of deleted and inserted elements of an edit script.
 */
export function editCounts(ops: readonly EditOp[]): { deleted: number; inserted: number } {
  let deleted = 0;
  let inserted = 0;
  for (const op of ops) {
    if (op.type === "delete") {
      deleted += op.count;
    } else if (op.type === "insert") {
      inserted += op.items.length;
    }
  }
  return { deleted, inserted };
}

/**
 * Total number of deleted and inserted elements of an edit script.
 */
export function countEdits(ops: readonly EditOp[]): number {
  const { deleted, inserted } = editCounts(ops);
  return deleted + inserted;
}
