import { toPathString, type ErrorPath } from './error-path.js';

/**
 * Thrown by the generated facade functions when a JSON node is not a valid
 * representation of the requested type.
 */
export class DeserializationError extends Error {
  /** JSON path of the offending value, e.g. `$.items[2].name` */
  readonly path: string;
  /** Reason of the failure without the location */
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`${reason} at: ${path}`);
    this.name = 'DeserializationError';
    this.path = path;
    this.reason = reason;
  }

  static fromErrorPath(error: ErrorPath): DeserializationError {
    return new DeserializationError(toPathString(error), error.cause);
  }
}

/**
 * Raised during serialization when an in-memory integer can not be
 * represented losslessly in JSON. This signals a defect in the caller's
 * data, not a recoverable condition.
 */
export class LossyIntegerError extends RangeError {
  readonly value: bigint;

  constructor(value: bigint) {
    super(`The number can not be losslessly represented in JSON: ${value}`);
    this.name = 'LossyIntegerError';
    this.value = value;
  }
}
