/**
 * AJV factory for the oracle tests
 *
 * The generated schemas declare draft 2020-12; one strict instance per
 * call so that schemas with the same $defs names never collide.
 */

import { Ajv2020 } from 'ajv/dist/2020.js';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

export function createAjv(): Ajv2020 {
  return new Ajv2020({
    strict: true,
    allErrors: true,
    strictRequired: true,
    allowUnionTypes: false,
  });
}

/**
 * Compile a validator for one definition of a generated schema, e.g.
 * `Drawing` or `Shape_choice`
 */
export function compileDefinition(
  schema: SchemaObject,
  definition: string
): ValidateFunction {
  if (!isDefinedIn(schema, definition)) {
    throw new Error(`No definition ${definition} in the generated schema`);
  }
  return createAjv().compile({ ...schema, $ref: `#/$defs/${definition}` });
}

function isDefinedIn(schema: SchemaObject, definition: string): boolean {
  const defs: unknown = schema['$defs'];
  return typeof defs === 'object' && defs !== null && definition in defs;
}

export function formatAjvErrors(errors: readonly ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    .join('; ');
}
