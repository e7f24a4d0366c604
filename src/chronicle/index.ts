/**
 * Recorded execution
 *
 * Exports:
 * - record / RecordedFunction: wrap a function so calls return a Chronicle
 * - Chronicle: value + log, chained with bind
 * - unveil, readLog, checkInspectors, checkDiffs, summarize: log accessors
 */

export { Chronicle, formatLogLine, SHORT_CIRCUIT_MESSAGE, type Recorder } from './chronicle.js';
export {
  RecordedFunction,
  record,
  andThen,
  validateRecorderOptions,
  ANONYMOUS_LABEL,
  NO_OUTPUT,
  type RecordedCallable,
} from './recorder.js';
export {
  unveil,
  readLog,
  checkInspectors,
  checkDiffs,
  summarize,
  UnveilSelectorSchema,
  type UnveilSelector,
  type InspectorView,
  type DiffView,
  type ChronicleSummary,
} from './accessors.js';
export { captureCall, type Captured, type Settled } from './capture.js';
export { summarizeDiff, unifiedDiff, countCharChanges, type CharDiffCounts } from './diff.js';
export {
  safeRepr,
  describeThrown,
  renderCall,
  readParameters,
  DEFAULT_REPR_LIMIT,
  TRUNCATION_MARKER,
  type ParameterInfo,
} from './repr.js';
