/**
 * Names and type expressions shared by the TypeScript emitters
 */

import { capitalCamelCase, lowerCamelCase, tsNaming } from '../../naming/naming.js';
import type {
  Class,
  DefaultValue,
  Enumeration,
  Interface,
  NamedType,
  PrimitiveKind,
  TypeAnnotation,
} from '../../model/types.js';
import { tsString } from '../../util/text.js';
import { assertNever, resolveAtomic, type AtomicStrategy } from '../resolver.js';

export const PRIMITIVE_TYPES = {
  bool: 'boolean',
  int: 'bigint',
  float: 'number',
  str: 'string',
  bytearray: 'Uint8Array',
} as const satisfies Record<PrimitiveKind, string>;

/** Type name as seen from types.ts; `qualifier` prefixes references from other modules */
export function atomicType(strategy: AtomicStrategy, qualifier = ''): string {
  switch (strategy.kind) {
    case 'primitive':
      return PRIMITIVE_TYPES[strategy.primitive];
    case 'enumeration':
      return qualifier + tsNaming.enumName(strategy.enumeration.name);
    case 'interface':
      return qualifier + tsNaming.interfaceName(strategy.iface.name);
    case 'class':
      return qualifier + tsNaming.className(strategy.cls.name);
    default:
      return assertNever(strategy, 'strategy');
  }
}

/** TypeScript type of an annotation; optionals become `T | null` */
export function annotationType(annotation: TypeAnnotation, qualifier = ''): string {
  switch (annotation.kind) {
    case 'primitive':
    case 'named':
      return atomicType(resolveAtomic(annotation), qualifier);
    case 'list':
      return `Array<${atomicType(resolveAtomic(annotation.items), qualifier)}>`;
    case 'optional':
      return `${annotationType(annotation.value, qualifier)} | null`;
    default:
      return assertNever(annotation, 'annotation');
  }
}

/** Type without the optional wrapper */
export function requiredType(annotation: TypeAnnotation, qualifier = ''): string {
  return annotation.kind === 'optional'
    ? annotationType(annotation.value, qualifier)
    : annotationType(annotation, qualifier);
}

/** Name under which a model type is known in types.ts */
export function symbolTypeName(symbol: NamedType): string | null {
  switch (symbol.kind) {
    case 'enumeration':
      return tsNaming.enumName(symbol.name);
    case 'constrainedPrimitive':
      return null;
    case 'abstractClass':
      return tsNaming.interfaceName(symbol.name);
    case 'concreteClass':
      return tsNaming.className(symbol.name);
    default:
      return assertNever(symbol, 'named type');
  }
}

export function defaultLiteral(value: DefaultValue, annotation: TypeAnnotation, qualifier = ''): string {
  if (value.kind === 'enumerationLiteral') {
    return `${qualifier}${tsNaming.enumName(value.enumeration.name)}.${tsNaming.enumLiteralName(value.literal.name)}`;
  }
  const base = annotation.kind === 'optional' ? annotation.value : annotation;
  const primitive =
    base.kind === 'primitive'
      ? base.primitive
      : base.kind === 'named' && base.symbol.kind === 'constrainedPrimitive'
        ? base.symbol.constrainee
        : null;
  const constant = value.value;
  if (primitive === 'int' && typeof constant === 'number') {
    return `${constant}n`;
  }
  if (typeof constant === 'string') {
    return tsString(constant);
  }
  return String(constant);
}

/** A line of generated code and its indentation level */
export type Row = readonly [level: number, text: string];

export const BLANK: Row = [0, ''];

export function renderRows(I: string, rows: readonly Row[]): string {
  return rows
    .map(([level, text]) => (text === '' ? '' : I.repeat(level) + text))
    .join('\n');
}

// Routine names in jsonization.ts

export function upperSnake(name: string): string {
  return name.toUpperCase();
}

export function enumFromTable(enumeration: Enumeration): string {
  return `${upperSnake(enumeration.name)}_FROM_JSONABLE`;
}

export function enumToTable(enumeration: Enumeration): string {
  return `${upperSnake(enumeration.name)}_TO_JSONABLE`;
}

export function classRoutineStem(cls: Class): string {
  return lowerCamelCase(cls.name);
}

export function interfaceRoutineStem(iface: Interface): string {
  return `i${capitalCamelCase(iface.name)}`;
}

export function enumerationRoutineStem(enumeration: Enumeration): string {
  return lowerCamelCase(enumeration.name);
}

export function parseRoutineOf(strategy: AtomicStrategy): string {
  switch (strategy.kind) {
    case 'primitive':
      return PRIMITIVE_PARSERS[strategy.primitive];
    case 'enumeration':
      return `${enumerationRoutineStem(strategy.enumeration)}FromJsonableImplementation`;
    case 'interface':
      return `${interfaceRoutineStem(strategy.iface)}FromJsonableImplementation`;
    case 'class':
      return `${classRoutineStem(strategy.cls)}FromJsonableImplementation`;
    default:
      return assertNever(strategy, 'strategy');
  }
}

export const PRIMITIVE_PARSERS = {
  bool: 'rt.boolFrom',
  int: 'rt.int64From',
  float: 'rt.float64From',
  str: 'rt.strFrom',
  bytearray: 'rt.bytesFrom',
} as const satisfies Record<PrimitiveKind, string>;

export function transformMethodName(cls: Class): string {
  return `transform${capitalCamelCase(cls.name)}`;
}

export function slotName(argumentName: string): string {
  return lowerCamelCase(`the_${argumentName}`);
}
