/**
 * Deserialization routines of jsonization.ts
 *
 * Every named type gets a `<name>FromJsonableImplementation` returning a
 * ParseResult. Failures carry an error path that each enclosing property
 * or list frame extends by one segment on the way out; the first failing
 * property of an object ends its parsing.
 */

import { jsonModelType, jsonProperty, tsNaming } from '../../naming/naming.js';
import type {
  Argument,
  ConcreteClass,
  Enumeration,
  Interface,
} from '../../model/types.js';
import { tsString } from '../../util/text.js';
import type { EmitContext } from '../context.js';
import { assertNever, resolveStrategy, type AtomicStrategy } from '../resolver.js';
import { snippetKeys } from '../snippets.js';
import {
  atomicType,
  BLANK,
  classRoutineStem,
  enumFromTable,
  enumerationRoutineStem,
  interfaceRoutineStem,
  parseRoutineOf,
  renderRows,
  requiredType,
  slotName,
  type Row,
} from './common.js';

const TYPES = 'types.';

function signature(I: string, name: string, resultType: string): string {
  return `function ${name}(\n${I}node: unknown\n): rt.ParseResult<${resultType}> {`;
}

export function generateEnumerationParse(ctx: EmitContext, enumeration: Enumeration): string {
  const { I } = ctx;
  const enumName = tsNaming.enumName(enumeration.name);
  const name = `${enumerationRoutineStem(enumeration)}FromJsonableImplementation`;
  return renderRows(I, [
    [0, signature(I, name, `${TYPES}${enumName}`)],
    [1, 'const text = rt.strFrom(node);'],
    [1, 'if (!text.ok) {'],
    [2, 'return text;'],
    [1, '}'],
    [1, `const literal = ${enumFromTable(enumeration)}.get(text.value);`],
    [1, 'if (literal === undefined) {'],
    [2, 'return rt.fail('],
    [3, `\`Not a valid JSON representation of ${enumName}: \${JSON.stringify(node)}\``],
    [2, ');'],
    [1, '}'],
    [1, 'return rt.succeed(literal);'],
    [0, '}'],
  ]);
}

export function generateInterfaceParse(ctx: EmitContext, iface: Interface): string {
  const { I } = ctx;
  const interfaceName = tsNaming.interfaceName(iface.name);
  const name = `${interfaceRoutineStem(iface)}FromJsonableImplementation`;
  const key = tsString(ctx.discriminatorKey);

  const cases = iface.implementers.flatMap((implementer): Row[] => [
    [2, `case ${tsString(jsonModelType(implementer.name))}:`],
    [3, `return ${classRoutineStem(implementer)}FromJsonableImplementation(node);`],
  ]);

  return renderRows(I, [
    [0, signature(I, name, `${TYPES}${interfaceName}`)],
    [1, 'if (!rt.isJsonObject(node)) {'],
    [2, 'return rt.fail(`Expected an object, but got ${rt.jsonKind(node)}`);'],
    [1, '}'],
    BLANK,
    [1, `const modelType = Object.hasOwn(node, ${key}) ? node[${key}] : undefined;`],
    [1, 'if (modelType === undefined || modelType === null) {'],
    [2, "return rt.fail('Expected a model type, but none is present');"],
    [1, '}'],
    [1, "if (typeof modelType !== 'string') {"],
    [2, 'return rt.fail('],
    [3, '`Expected the model type to be a string, but got ${rt.jsonKind(modelType)}`'],
    [2, ');'],
    [1, '}'],
    BLANK,
    [1, 'switch (modelType) {'],
    ...cases,
    [2, 'default:'],
    [3, `return rt.fail(\`Unexpected model type for ${interfaceName}: \${modelType}\`);`],
    [1, '}'],
    [0, '}'],
  ]);
}

function nameFailure(errorExpr: string, jsonName: string): string {
  return `rt.failWith(rt.prependName(${errorExpr}, ${tsString(jsonName)}))`;
}

function atomicCase(
  strategy: AtomicStrategy,
  slot: string,
  jsonName: string
): Row[] {
  return [
    [4, `const parsed = ${parseRoutineOf(strategy)}(value);`],
    [4, 'if (!parsed.ok) {'],
    [5, `return ${nameFailure('parsed.error', jsonName)};`],
    [4, '}'],
    [4, `${slot} = parsed.value;`],
  ];
}

function listCase(
  items: AtomicStrategy,
  slot: string,
  jsonName: string
): Row[] {
  return [
    [4, 'if (!rt.isJsonArray(value)) {'],
    [5, 'return ' + nameFailure('rt.newError(`Expected an array, but got ${rt.jsonKind(value)}`)', jsonName) + ';'],
    [4, '}'],
    [4, `const items: Array<${atomicType(items, TYPES)}> = [];`],
    [4, 'for (const [index, item] of value.entries()) {'],
    [5, 'if (item === null) {'],
    [6, 'return ' + nameFailure("rt.prependIndex(rt.newError('Expected a non-null item, but got a null'), index)", jsonName) + ';'],
    [5, '}'],
    [5, `const parsed = ${parseRoutineOf(items)}(item);`],
    [5, 'if (!parsed.ok) {'],
    [6, `return ${nameFailure('rt.prependIndex(parsed.error, index)', jsonName)};`],
    [5, '}'],
    [5, 'items.push(parsed.value);'],
    [4, '}'],
    [4, `${slot} = items;`],
  ];
}

function argumentCase(arg: Argument): Row[] {
  const jsonName = jsonProperty(arg.name);
  const slot = slotName(arg.name);
  const { shape } = resolveStrategy(arg.type);

  let body: Row[];
  switch (shape.kind) {
    case 'atomic':
      body = atomicCase(shape.strategy, slot, jsonName);
      break;
    case 'list':
      body = listCase(shape.items, slot, jsonName);
      break;
    default:
      return assertNever(shape, 'shape');
  }

  return [
    [3, `case ${tsString(jsonName)}: {`],
    [4, 'if (value === null) {'],
    [5, 'continue;'],
    [4, '}'],
    ...body,
    [4, 'break;'],
    [3, '}'],
  ];
}

export function generateClassParse(ctx: EmitContext, cls: ConcreteClass): string {
  const { I } = ctx;
  const className = `${TYPES}${tsNaming.className(cls.name)}`;
  const name = `${classRoutineStem(cls)}FromJsonableImplementation`;
  const head = signature(I, name, className);

  if (cls.isImplementationSpecific) {
    const body = ctx.snippet(snippetKeys.parse(cls.name), cls.name);
    if (body === null) return '';
    const indented = body
      .split('\n')
      .map((line) => (line.length > 0 ? I + line : line))
      .join('\n');
    return `${head}\n${indented}\n}`;
  }

  const args = cls.arguments;
  const slots = args.map((arg): Row => [
    1,
    `let ${slotName(arg.name)}: ${requiredType(arg.type, TYPES)} | undefined;`,
  ]);

  const discriminatorCase: Row[] = cls.serialization.withModelType
    ? [
        [3, `case ${tsString(ctx.discriminatorKey)}:`],
        [4, 'break;'],
      ]
    : [];

  const loopHead =
    args.length > 0
      ? 'for (const [key, value] of Object.entries(node)) {'
      : 'for (const key of Object.keys(node)) {';

  const requiredChecks = args
    .filter((arg) => arg.type.kind !== 'optional')
    .flatMap((arg): Row[] => [
      [1, `if (${slotName(arg.name)} === undefined) {`],
      [2, `return rt.fail(${tsString(`Required property "${jsonProperty(arg.name)}" is missing`)});`],
      [1, '}'],
    ]);

  const construct: Row[] =
    args.length > 0
      ? [
          [1, 'return rt.succeed('],
          [2, `new ${className}(`],
          ...args.map((arg, i): Row => [
            3,
            `${slotName(arg.name)}${i < args.length - 1 ? ',' : ''}`,
          ]),
          [2, ')'],
          [1, ');'],
        ]
      : [[1, `return rt.succeed(new ${className}());`]];

  return renderRows(I, [
    [0, head],
    [1, 'if (!rt.isJsonObject(node)) {'],
    [2, 'return rt.fail(`Expected an object, but got ${rt.jsonKind(node)}`);'],
    [1, '}'],
    ...(slots.length > 0 ? [BLANK, ...slots] : []),
    BLANK,
    [1, loopHead],
    [2, 'switch (key) {'],
    ...args.flatMap(argumentCase),
    ...discriminatorCase,
    [3, 'default:'],
    [4, 'return rt.fail(`Unexpected property: ${key}`);'],
    [2, '}'],
    [1, '}'],
    ...(requiredChecks.length > 0 ? [BLANK, ...requiredChecks] : []),
    BLANK,
    ...construct,
    [0, '}'],
  ]);
}
