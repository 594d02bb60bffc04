import { newError, type ErrorPath } from './error-path.js';

/**
 * Outcome of a deserialization routine: either the parsed value or the
 * error path of the first failure, never both.
 */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

export interface ParseSuccess<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ParseFailure {
  readonly ok: false;
  readonly error: ErrorPath;
}

export function succeed<T>(value: T): ParseSuccess<T> {
  return { ok: true, value };
}

export function fail(cause: string): ParseFailure {
  return { ok: false, error: newError(cause) };
}

export function failWith(error: ErrorPath): ParseFailure {
  return { ok: false, error };
}
