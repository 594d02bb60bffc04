// @metacodec/runtime entry point
//
// Imported by the jsonization modules that metacodec generates. Keep the
// exported names stable: generated code refers to them directly.

export {
  newError,
  prependName,
  prependIndex,
  toPathString,
  type ErrorPath,
  type Segment,
  type NameSegment,
  type IndexSegment,
} from './error-path.js';
export {
  succeed,
  fail,
  failWith,
  type ParseResult,
  type ParseSuccess,
  type ParseFailure,
} from './parse-result.js';
export {
  jsonKind,
  isJsonObject,
  isJsonArray,
  type JsonKind,
  type JsonValue,
  type JsonObject,
  type JsonPrimitive,
} from './json.js';
export {
  boolFrom,
  int64From,
  float64From,
  strFrom,
  bytesFrom,
  int64ToJsonable,
  bytesToJsonable,
  INT64_MIN,
  INT64_MAX,
} from './primitives.js';
export { DeserializationError, LossyIntegerError } from './errors.js';
