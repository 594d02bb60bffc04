import { Buffer } from 'node:buffer';

import { LossyIntegerError } from './errors.js';
import { jsonKind } from './json.js';
import { fail, succeed, type ParseResult } from './parse-result.js';

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

// Standard alphabet, padding mandatory
const BASE64_RE =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function boolFrom(node: unknown): ParseResult<boolean> {
  if (typeof node !== 'boolean') {
    return fail(`Expected a boolean, but got ${jsonKind(node)}`);
  }
  return succeed(node);
}

export function int64From(node: unknown): ParseResult<bigint> {
  if (typeof node !== 'number') {
    return fail(`Expected a 64-bit integer, but got ${jsonKind(node)}`);
  }
  if (Number.isInteger(node)) {
    const value = BigInt(node);
    if (value >= INT64_MIN && value <= INT64_MAX) {
      return succeed(value);
    }
  }
  return fail(
    `Expected a 64-bit integer, but the conversion failed from ${String(node)}`
  );
}

export function float64From(node: unknown): ParseResult<number> {
  if (typeof node !== 'number') {
    return fail(`Expected a 64-bit float, but got ${jsonKind(node)}`);
  }
  if (!Number.isFinite(node)) {
    return fail(
      `Expected a 64-bit float, but the conversion failed from ${String(node)}`
    );
  }
  return succeed(node);
}

export function strFrom(node: unknown): ParseResult<string> {
  if (typeof node !== 'string') {
    return fail(`Expected a string, but got ${jsonKind(node)}`);
  }
  return succeed(node);
}

export function bytesFrom(node: unknown): ParseResult<Uint8Array> {
  if (typeof node !== 'string') {
    return fail(`Expected a string, but got ${jsonKind(node)}`);
  }
  if (!BASE64_RE.test(node)) {
    return fail('Expected Base64-encoded bytes, but the decoding failed');
  }
  return succeed(new Uint8Array(Buffer.from(node, 'base64')));
}

/**
 * Convert a 64-bit integer to a JSON number.
 *
 * @throws {LossyIntegerError} if the value lies outside the 64-bit range or
 * does not survive the conversion to a double
 */
export function int64ToJsonable(value: bigint): number {
  const converted = Number(value);
  if (value < INT64_MIN || value > INT64_MAX || BigInt(converted) !== value) {
    throw new LossyIntegerError(value);
  }
  return converted;
}

export function bytesToJsonable(value: Uint8Array): string {
  return Buffer.from(value).toString('base64');
}
