/**
 * Identifier of a product field: a property name for structs,
 * a position for tuples.
 */
export type FieldKey = string | number;

/**
 * The two values compared equal.
 */
export interface NoChange {
  readonly type: "unchanged";
}

/**
 * The target value, carried whole.
 */
export interface Replace<T = unknown> {
  readonly type: "replace";
  readonly value: T;
}

/**
 * Delta of one changed field of a product.
 */
export interface FieldChange {
  readonly field: FieldKey;
  readonly delta: Delta;
}

/**
 * Product delta. Lists changed fields only, in declared field order.
 */
export interface FieldsChanged {
  readonly type: "fields";
  readonly fields: readonly FieldChange[];
}

/**
 * Sum delta for a change of the active variant. Carries the full payload
 * of the new variant.
 */
export interface VariantChanged {
  readonly type: "variant";
  readonly tag: string;
  readonly payload: unknown;
}

/**
 * Sum delta for a payload change within the variant named by `tag`.
 */
export interface SameVariant {
  readonly type: "same-variant";
  readonly tag: string;
  readonly fields: FieldsChanged;
}

/**
 * Operation of a sequence edit script.
 *
 * `keep` and `delete` consume `count` source elements; `insert` emits
 * `items` without consuming anything.
 */
export type EditOp<E = unknown> =
  | { readonly type: "keep"; readonly count: number }
  | { readonly type: "delete"; readonly count: number }
  | { readonly type: "insert"; readonly items: readonly E[] };

/**
 * Sequence delta. Replaying the operations left to right over the source
 * produces the target.
 */
export interface SequenceEdits<E = unknown> {
  readonly type: "edits";
  readonly ops: readonly EditOp<E>[];
}

/**
 * Change of one entry of a keyed collection.
 */
export type EntryChange =
  | { readonly change: "removed"; readonly key: unknown }
  | { readonly change: "inserted"; readonly key: unknown; readonly value: unknown }
  | { readonly change: "patched"; readonly key: unknown; readonly delta: Delta };

/**
 * Keyed collection delta: removed, inserted and patched entries.
 */
export interface EntriesChanged {
  readonly type: "entries";
  readonly entries: readonly EntryChange[];
}

/**
 * Structural difference between two values of type `T`.
 *
 * Plain immutable data. Embedded values are copies owned by the delta, so a
 * delta outlives both of the values it was computed from.
 */
export type Delta<T = unknown> =
  | NoChange
  | Replace<T>
  | FieldsChanged
  | VariantChanged
  | SameVariant
  | SequenceEdits
  | EntriesChanged;

export type DeltaType = Delta["type"];
