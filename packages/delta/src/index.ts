/**
 * Structural diff and patch for typed values.
 *
 * Differs are composed per type from combinators; `diff` yields a plain-data
 * delta, `apply` reconstructs the target from the source and the delta.
 */

export type { DeltaLogger } from "./common/logger.js";
export * from "./common/result.js";
export * from "./delta/index.js";
export type { Diffable, Infer, PatchResult, ProductDiffable, Shape } from "./differs/diffable.js";
export {
  KeyedDiffer,
  type KeyedEntry,
  MapDiffer,
  map,
  RecordDiffer,
  record,
  SetDiffer,
  set,
} from "./differs/keyed.js";
export { LazyDiffer, lazy } from "./differs/lazy.js";
export { MaybeDiffer, nullable, optional } from "./differs/optional.js";
export {
  empty,
  type ProductShape,
  StructDiffer,
  struct,
  TupleDiffer,
  tuple,
} from "./differs/product.js";
export {
  bigint,
  boolean,
  date,
  literal,
  number,
  ScalarDiffer,
  type ScalarOptions,
  scalar,
  string,
  unit,
} from "./differs/scalar.js";
export { array, SequenceDiffer, type SequenceOptions } from "./differs/sequence.js";
export { SumDiffer, type SumOptions, sum, type VariantCase, variant } from "./differs/sum.js";
export { Edit, type EditList, EditType } from "./edit-script/edit.js";
export { applyEditOps, countEdits, editCounts, toEditOps } from "./edit-script/edit-ops.js";
export { DEFAULT_MAX_LCS_CELLS, LcsDiff, type LcsDiffOptions } from "./edit-script/lcs-diff.js";
export * from "./errors/index.js";
export {
  type Change,
  type ChangeKind,
  formatChange,
  formatChanges,
  formatValue,
  listChanges,
} from "./inspect/changes.js";
export { apply, applyOrThrow, diff, type PatchOptions } from "./patch/patch-engine.js";
