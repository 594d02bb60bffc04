/**
 * JSON Schema (2020-12) of the wire format
 *
 * The schema describes what the generated serializers emit: absent
 * optionals are missing rather than null, and the discriminator is
 * required for classes that participate in polymorphism.
 */

import { DIAGNOSTIC_CODES } from '../../diag/codes.js';
import { jsonModelType, jsonProperty } from '../../naming/naming.js';
import { paragraphText } from '../../model/description.js';
import type {
  AtomicAnnotation,
  ConcreteClass,
  Description,
  PrimitiveKind,
  TypeAnnotation,
} from '../../model/types.js';
import type { EmitContext, GenerationResult } from '../context.js';
import { assertNever } from '../resolver.js';
import { snippetKeys } from '../snippets.js';

export type SchemaNode =
  | null
  | boolean
  | number
  | string
  | SchemaNode[]
  | { [key: string]: SchemaNode };

type SchemaObject = { [key: string]: SchemaNode };

export const JSON_SCHEMA_DIALECT = 'https://json-schema.org/draft/2020-12/schema';

const PRIMITIVE_SCHEMAS: Record<PrimitiveKind, SchemaObject> = {
  bool: { type: 'boolean' },
  int: { type: 'integer' },
  float: { type: 'number' },
  str: { type: 'string' },
  bytearray: { type: 'string', contentEncoding: 'base64' },
};

export function choiceName(className: string): string {
  return `${className}_choice`;
}

function ref(name: string): SchemaObject {
  return { $ref: `#/$defs/${name}` };
}

function atomicSchema(annotation: AtomicAnnotation): SchemaObject {
  if (annotation.kind === 'primitive') {
    return { ...PRIMITIVE_SCHEMAS[annotation.primitive] };
  }
  const { symbol } = annotation;
  switch (symbol.kind) {
    case 'enumeration':
    case 'constrainedPrimitive':
      return ref(symbol.name);
    case 'abstractClass':
    case 'concreteClass':
      return symbol.interface !== null
        ? ref(choiceName(symbol.name))
        : ref(symbol.name);
    default:
      return assertNever(symbol, 'named type');
  }
}

function annotationSchema(annotation: TypeAnnotation): SchemaObject {
  switch (annotation.kind) {
    case 'primitive':
    case 'named':
      return atomicSchema(annotation);
    case 'list':
      return { type: 'array', items: atomicSchema(annotation.items) };
    case 'optional':
      return annotationSchema(annotation.value);
    default:
      return assertNever(annotation, 'annotation');
  }
}

function withDescription(schema: SchemaObject, description: Description | null): SchemaObject {
  if (description === null) return schema;
  return { description: paragraphText(description.summary), ...schema };
}

function classSchema(ctx: EmitContext, cls: ConcreteClass): SchemaObject {
  const properties: SchemaObject = {};
  const required: SchemaNode[] = [];
  for (const property of cls.properties) {
    const jsonName = jsonProperty(property.name);
    properties[jsonName] = withDescription(
      annotationSchema(property.type),
      property.description
    );
    if (property.type.kind !== 'optional') {
      required.push(jsonName);
    }
  }
  if (cls.serialization.withModelType) {
    properties[ctx.discriminatorKey] = { const: jsonModelType(cls.name) };
    required.push(ctx.discriminatorKey);
  }

  const schema: SchemaObject = { type: 'object', properties };
  if (required.length > 0) {
    schema['required'] = required;
  }
  schema['additionalProperties'] = false;
  return withDescription(schema, cls.description);
}

function snippetSchema(ctx: EmitContext, cls: ConcreteClass): SchemaObject | null {
  const key = snippetKeys.schemaDefinition(cls.name);
  const text = ctx.snippet(key, cls.name);
  if (text === null) return null;
  let parsed: SchemaNode;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    ctx.report(
      DIAGNOSTIC_CODES.INVALID_SNIPPET,
      cls.name,
      `The snippet "${key}" is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
    return null;
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    ctx.report(
      DIAGNOSTIC_CODES.INVALID_SNIPPET,
      cls.name,
      `The snippet "${key}" must contain a JSON object`
    );
    return null;
  }
  return parsed;
}

export function buildJsonSchema(ctx: EmitContext): SchemaObject {
  const defs: SchemaObject = {};
  for (const symbol of ctx.table.types) {
    switch (symbol.kind) {
      case 'enumeration':
        defs[symbol.name] = withDescription(
          { type: 'string', enum: symbol.literals.map((l) => l.value) },
          symbol.description
        );
        break;
      case 'constrainedPrimitive':
        defs[symbol.name] = withDescription(
          { ...PRIMITIVE_SCHEMAS[symbol.constrainee] },
          symbol.description
        );
        break;
      case 'abstractClass':
        break;
      case 'concreteClass': {
        const schema = symbol.isImplementationSpecific
          ? snippetSchema(ctx, symbol)
          : classSchema(ctx, symbol);
        if (schema !== null) {
          defs[symbol.name] = schema;
        }
        break;
      }
      default:
        assertNever(symbol, 'named type');
    }
  }
  for (const iface of ctx.table.interfaces) {
    defs[choiceName(iface.name)] = {
      oneOf: iface.implementers.map((implementer) => ref(implementer.name)),
    };
  }

  const root: SchemaObject = { $schema: JSON_SCHEMA_DIALECT };
  root['title'] = ctx.table.name;
  if (ctx.table.description !== null) {
    root['description'] = paragraphText(ctx.table.description.summary);
  }
  root['$defs'] = defs;
  return root;
}

/**
 * Generate `schema.json`
 */
export function generateJsonSchema(ctx: EmitContext): GenerationResult {
  const schema = buildJsonSchema(ctx);
  return ctx.finish([
    {
      path: 'schema.json',
      content: `${JSON.stringify(schema, null, ctx.I)}\n`,
    },
  ]);
}
