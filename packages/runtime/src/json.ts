// JSON values as produced by JSON.parse

export type JsonPrimitive = null | boolean | number | string;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonKind =
  | 'null'
  | 'boolean'
  | 'number'
  | 'string'
  | 'array'
  | 'object'
  | 'non-JSON value';

/** Name the JSON kind of a node for error messages. */
export function jsonKind(node: unknown): JsonKind {
  if (node === null) return 'null';
  if (Array.isArray(node)) return 'array';
  switch (typeof node) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    case 'object':
      return 'object';
    default:
      return 'non-JSON value';
  }
}

export function isJsonObject(node: unknown): node is JsonObject {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

export function isJsonArray(node: unknown): node is JsonValue[] {
  return Array.isArray(node);
}
