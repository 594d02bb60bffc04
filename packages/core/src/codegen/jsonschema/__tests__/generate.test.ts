import { describe, expect, it } from 'vitest';

import { formatDiagnostic } from '../../../diag/codes.js';
import { COLOR, CIRCLE, POINT, SHAPE, contextOf, model } from '../../../test-utils/models.js';
import type { CodegenOptions } from '../../../types/options.js';
import { generateJsonSchema, type SchemaNode } from '../generate.js';

function schemaTextOf(document: unknown, options: CodegenOptions = {}, snippets?: Map<string, string>): string {
  const result = generateJsonSchema(contextOf(document, options, snippets));
  if (result.isErr()) {
    throw new Error(result.error.map(formatDiagnostic).join('\n'));
  }
  return result.value[0]?.content ?? '';
}

function schemaOf(document: unknown, options: CodegenOptions = {}): { [key: string]: SchemaNode } {
  return JSON.parse(schemaTextOf(document, options));
}

function failuresOf(snippet: string | undefined): string[] {
  const clock = { kind: 'concreteClass' as const, name: 'Clock', implementationSpecific: true };
  const snippets = new Map<string, string>();
  if (snippet !== undefined) {
    snippets.set('jsonschema/definition/Clock.json', snippet);
  }
  const result = generateJsonSchema(contextOf(model(clock), {}, snippets));
  return result.isErr() ? result.error.map(formatDiagnostic) : [];
}

describe('generateJsonSchema', () => {
  it('describes every type under $defs', () => {
    expect(schemaOf(model(COLOR, SHAPE, CIRCLE, POINT))).toEqual({
      $schema: 'https://json-schema.org/draft/2020-12/schema',
      title: 'test_model',
      $defs: {
        Color: { type: 'string', enum: ['red', 'dark-blue'] },
        Circle: {
          type: 'object',
          properties: {
            color: { $ref: '#/$defs/Color' },
            radius: { type: 'number' },
            modelType: { const: 'Circle' },
          },
          required: ['color', 'radius', 'modelType'],
          additionalProperties: false,
        },
        Point: {
          type: 'object',
          properties: {
            x: { type: 'integer' },
            y: { type: 'integer' },
          },
          required: ['x'],
          additionalProperties: false,
        },
        Shape_choice: { oneOf: [{ $ref: '#/$defs/Circle' }] },
      },
    });
  });

  it('writes the root keys in a fixed order', () => {
    expect(schemaTextOf(model(POINT)).startsWith(
      [
        '{',
        '  "$schema": "https://json-schema.org/draft/2020-12/schema",',
        '  "title": "test_model",',
        '  "$defs": {',
        '    "Point": {',
        '      "type": "object",',
      ].join('\n')
    )).toBe(true);
  });

  it('refers to the choice of a class with descendants', () => {
    const canvas = {
      kind: 'concreteClass' as const,
      name: 'Canvas',
      properties: [
        { name: 'shapes', type: 'List[Shape]' },
        { name: 'highlight', type: 'Optional[Shape]' },
      ],
    };
    const defs = schemaOf(model(COLOR, SHAPE, CIRCLE, canvas))['$defs'];
    expect(defs).toMatchObject({
      Canvas: {
        properties: {
          shapes: { type: 'array', items: { $ref: '#/$defs/Shape_choice' } },
          highlight: { $ref: '#/$defs/Shape_choice' },
        },
        required: ['shapes'],
      },
    });
  });

  it('encodes bytes as Base64 strings and constrained primitives as their constrainee', () => {
    const blob = {
      kind: 'concreteClass' as const,
      name: 'Blob',
      properties: [
        { name: 'data', type: 'bytearray' },
        { name: 'label', type: 'Label' },
      ],
    };
    const label = { kind: 'constrainedPrimitive' as const, name: 'Label', constrainee: 'str' as const };
    expect(schemaOf(model(label, blob))['$defs']).toEqual({
      Label: { type: 'string' },
      Blob: {
        type: 'object',
        properties: {
          data: { type: 'string', contentEncoding: 'base64' },
          label: { $ref: '#/$defs/Label' },
        },
        required: ['data', 'label'],
        additionalProperties: false,
      },
    });
  });

  it('carries the summaries of descriptions', () => {
    const documented = {
      ...POINT,
      description: 'A point on the :class:`Grid`.\n\nMore remarks.',
      properties: [{ name: 'x', type: 'int', description: 'Abscissa.' }],
    };
    const grid = { kind: 'concreteClass' as const, name: 'Grid' };
    const schema = schemaOf({ ...model(documented, grid), description: 'Geometry.' });
    expect(schema['description']).toBe('Geometry.');
    expect(schema['$defs']).toMatchObject({
      Point: {
        description: 'A point on the Grid.',
        properties: { x: { description: 'Abscissa.', type: 'integer' } },
      },
    });
    const defs = schema['$defs'];
    const keys =
      defs !== null && typeof defs === 'object' && !Array.isArray(defs)
        ? Object.keys(defs['Point'] ?? {})
        : [];
    expect(keys).toEqual(['description', 'type', 'properties', 'required', 'additionalProperties']);
  });

  it('uses the configured discriminator key and indentation', () => {
    const text = schemaTextOf(model(COLOR, SHAPE, CIRCLE), {
      jsonization: { discriminatorKey: 'kind' },
      emit: { indent: '\t' },
    });
    expect(text).toContain('\t\t\t\t"kind": {\n\t\t\t\t\t"const": "Circle"\n\t\t\t\t}');
    expect(text).toContain('"required": [\n\t\t\t\t"color",\n\t\t\t\t"radius",\n\t\t\t\t"kind"\n\t\t\t]');
  });

  it('takes implementation-specific definitions from their snippet', () => {
    const clock = { kind: 'concreteClass' as const, name: 'Clock', implementationSpecific: true };
    const snippets = new Map([['jsonschema/definition/Clock.json', '{ "type": "integer" }\n']]);
    expect(JSON.parse(schemaTextOf(model(clock), {}, snippets))['$defs']).toEqual({
      Clock: { type: 'integer' },
    });
  });

  it('reports missing and malformed definition snippets', () => {
    expect(failuresOf(undefined)).toEqual([
      'MISSING_SNIPPET Clock: The snippet "jsonschema/definition/Clock.json" is missing',
    ]);
    expect(failuresOf('[1, 2]')).toEqual([
      'INVALID_SNIPPET Clock: The snippet "jsonschema/definition/Clock.json" must contain a JSON object',
    ]);
    const [malformed] = failuresOf('{ "type": ');
    expect(malformed?.startsWith(
      'INVALID_SNIPPET Clock: The snippet "jsonschema/definition/Clock.json" is not valid JSON: '
    )).toBe(true);
  });
});
