export { DataLevel, CONTAINER_LEVELS, levelDepth, isFinerThan } from './levels.js';
export type { ContainerLevel } from './levels.js';
export { ModeSchema, Modes, parseMode } from './modes.js';
export type { Mode } from './modes.js';
export {
  SelectionStatus,
  Axes,
  computeSelectionStatus,
  combineStatuses,
  toStringAxis,
  axisStatus,
  axisAccepts,
  axisMatches,
  axisValue,
  singleValue,
  isSpecified,
} from './selection-status.js';
export type { Axis, AxisValue, Selector, StringAxisInput, CombineOptions } from './selection-status.js';
export { splitRepeated, validateIndex, validateSuffix, validateChannels } from './validators.js';
export type { IndexInput, SuffixInput, ChannelInput, IndexValidationError } from './validators.js';
export { FileSpec } from './file-spec.js';
export type { FileSpecInput, FileSpecFields, FileNameContext, FilePathContext } from './file-spec.js';
export { SessionSpec, verifySessionSpec } from './session-spec.js';
export type { SessionSpecInput, SessionSpecFields, SessionTuple, SessionLike, VerifySessionOptions } from './session-spec.js';
export { Predicate, toAbsolutePath } from './predicate.js';
export type {
  AbsolutePath,
  FileLike,
  PredicateInput,
  PredicateValues,
  PredicateOptions,
  PredicateFields,
  WithValuesOptions,
} from './predicate.js';
