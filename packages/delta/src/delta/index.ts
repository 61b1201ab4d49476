export {
  entriesChanged,
  fieldsChanged,
  isUnchanged,
  noChange,
  replace,
  sameVariant,
  sequenceEdits,
  variantChanged,
} from "./builders.js";
export { formatPath, keySegment } from "./path.js";
export type {
  Delta,
  DeltaType,
  EditOp,
  EntriesChanged,
  EntryChange,
  FieldChange,
  FieldKey,
  FieldsChanged,
  NoChange,
  Replace,
  SameVariant,
  SequenceEdits,
  VariantChanged,
} from "./types.js";
