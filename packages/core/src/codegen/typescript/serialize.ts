/**
 * Serialization routines of jsonization.ts
 *
 * A Transformer visits an instance by its runtime class, so a property
 * typed with an interface serializes the same as the concrete class it
 * holds. Absent optionals are left out of the object.
 */

import { jsonModelType, jsonProperty, tsNaming } from '../../naming/naming.js';
import {
  concreteClassesOf,
  type ConcreteClass,
  type Enumeration,
} from '../../model/types.js';
import { blocks, tsString } from '../../util/text.js';
import type { EmitContext } from '../context.js';
import { assertNever, resolveStrategy, type AtomicStrategy } from '../resolver.js';
import { snippetKeys } from '../snippets.js';
import {
  enumToTable,
  enumerationRoutineStem,
  renderRows,
  transformMethodName,
  type Row,
} from './common.js';

/** Expression converting `value` to its JSON form, or null if it is one already */
function toJsonExpression(strategy: AtomicStrategy, value: string): string | null {
  switch (strategy.kind) {
    case 'primitive':
      switch (strategy.primitive) {
        case 'bool':
        case 'float':
        case 'str':
          return null;
        case 'int':
          return `rt.int64ToJsonable(${value})`;
        case 'bytearray':
          return `rt.bytesToJsonable(${value})`;
        default:
          return assertNever(strategy.primitive, 'primitive');
      }
    case 'enumeration':
      return `${enumerationRoutineStem(strategy.enumeration)}ToJsonable(${value})`;
    case 'interface':
    case 'class':
      return `this.transform(${value})`;
    default:
      return assertNever(strategy, 'strategy');
  }
}

function propertyRows(ctx: EmitContext, cls: ConcreteClass): Row[] {
  return cls.properties.flatMap((property): Row[] => {
    const access = `that.${tsNaming.propertyName(property.name)}`;
    const target = `result[${tsString(jsonProperty(property.name))}]`;
    const { optional, shape } = resolveStrategy(property.type);

    let expression: string;
    switch (shape.kind) {
      case 'atomic':
        expression = toJsonExpression(shape.strategy, access) ?? access;
        break;
      case 'list': {
        const item = toJsonExpression(shape.items, 'item');
        expression =
          item === null ? `[...${access}]` : `${access}.map((item) => ${item})`;
        break;
      }
      default:
        return assertNever(shape, 'shape');
    }

    if (!optional) {
      return [[2, `${target} = ${expression};`]];
    }
    return [
      [2, `if (${access} !== null) {`],
      [3, `${target} = ${expression};`],
      [2, '}'],
    ];
  });
}

function generateTransformMethod(ctx: EmitContext, cls: ConcreteClass): string {
  const { I } = ctx;
  const className = `types.${tsNaming.className(cls.name)}`;
  const head: Row = [1, `${transformMethodName(cls)}(that: ${className}): rt.JsonObject {`];

  if (cls.isImplementationSpecific) {
    const body = ctx.snippet(snippetKeys.transform(cls.name), cls.name);
    if (body === null) return '';
    return renderRows(I, [
      head,
      ...body.split('\n').map((line): Row => [2, line]),
      [1, '}'],
    ]);
  }

  const discriminator: Row[] = cls.serialization.withModelType
    ? [
        [
          2,
          `result[${tsString(ctx.discriminatorKey)}] = ${tsString(jsonModelType(cls.name))};`,
        ],
      ]
    : [];

  return renderRows(I, [
    head,
    [2, 'const result: rt.JsonObject = {};'],
    ...propertyRows(ctx, cls),
    ...discriminator,
    [2, 'return result;'],
    [1, '}'],
  ]);
}

export function generateTransformer(ctx: EmitContext): string {
  const methods = concreteClassesOf(ctx.table).map((cls) =>
    generateTransformMethod(ctx, cls)
  );
  const head = [
    '/**',
    ' * Convert instances to JSON objects by their runtime class',
    ' */',
    'class Transformer extends types.AbstractTransformer<rt.JsonObject> {',
  ].join('\n');
  return `${head}\n${blocks(methods)}\n}\n\nconst TRANSFORMER = new Transformer();`;
}

export function generateEnumerationToJsonable(ctx: EmitContext, enumeration: Enumeration): string {
  const enumName = `types.${tsNaming.enumName(enumeration.name)}`;
  return renderRows(ctx.I, [
    [0, '/**'],
    [0, ` * Convert a literal of {@link ${enumName}} to its JSON string`],
    [0, ' */'],
    [0, `export function ${enumerationRoutineStem(enumeration)}ToJsonable(that: ${enumName}): string {`],
    [1, `const text = ${enumToTable(enumeration)}.get(that);`],
    [1, 'if (text === undefined) {'],
    [2, `throw new RangeError(\`Invalid literal of ${tsNaming.enumName(enumeration.name)}: \${that}\`);`],
    [1, '}'],
    [1, 'return text;'],
    [0, '}'],
  ]);
}

export function generateToJsonable(ctx: EmitContext): string {
  return renderRows(ctx.I, [
    [0, '/**'],
    [0, ' * Serialize an instance of the model to a JSON object.'],
    [0, ' *'],
    [0, ' * @throws {@link rt.LossyIntegerError} if an integer can not be represented in JSON'],
    [0, ' */'],
    [0, 'export function toJsonable(that: types.IClass): rt.JsonObject {'],
    [1, 'return TRANSFORMER.transform(that);'],
    [0, '}'],
  ]);
}
