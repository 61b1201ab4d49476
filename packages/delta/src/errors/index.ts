export { PatchError, type PatchErrorCode } from "./patch-error.js";
export {
  MissingKeyError,
  PatchFailedError,
  SequenceOutOfBoundsError,
  ShapeMismatchError,
  UnexpectedKeyError,
} from "./patch-errors.js";
