import type {
  Delta,
  EditOp,
  EntriesChanged,
  EntryChange,
  FieldChange,
  FieldsChanged,
  NoChange,
  Replace,
  SameVariant,
  SequenceEdits,
  VariantChanged,
} from "./types.js";

const NO_CHANGE: NoChange = { type: "unchanged" };

export function noChange(): NoChange {
  return NO_CHANGE;
}

export function replace<T>(value: T): Replace<T> {
  return { type: "replace", value };
}

export function fieldsChanged(fields: readonly FieldChange[]): FieldsChanged {
  return { type: "fields", fields };
}

export function variantChanged(tag: string, payload: unknown): VariantChanged {
  return { type: "variant", tag, payload };
}

export function sameVariant(tag: string, fields: FieldsChanged): SameVariant {
  return { type: "same-variant", tag, fields };
}

export function sequenceEdits<E>(ops: readonly EditOp<E>[]): SequenceEdits<E> {
  return { type: "edits", ops };
}

export function entriesChanged(entries: readonly EntryChange[]): EntriesChanged {
  return { type: "entries", entries };
}

/**
 * Check whether a delta describes no change at all.
 */
export function isUnchanged(delta: Delta): delta is NoChange {
  return delta.type === "unchanged";
}
