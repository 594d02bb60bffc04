/**
 * Emitter of types.ts: the data structures of the model
 */

import { tsNaming } from '../../naming/naming.js';
import {
  concreteClassesOf,
  propertyOf,
  type Class,
  type ConcreteClass,
  type Enumeration,
} from '../../model/types.js';
import { blocks } from '../../util/text.js';
import type { EmitContext } from '../context.js';
import { assertNever } from '../resolver.js';
import { snippetKeys } from '../snippets.js';
import {
  annotationType,
  defaultLiteral,
  transformMethodName,
} from './common.js';
import { tsDoc } from './description.js';

function generateScaffolding(ctx: EmitContext): string {
  const { I } = ctx;
  const abstractMethods = concreteClassesOf(ctx.table).map((cls) => {
    const name = tsNaming.className(cls.name);
    return `${I}abstract ${transformMethodName(cls)}(that: ${name}): T;`;
  });

  const iClass = [
    '/**',
    ' * Common ancestor of all the classes of the model',
    ' */',
    'export interface IClass {',
    `${I}/**`,
    `${I} * Dispatch to the method of \`transformer\` for the concrete class`,
    `${I} */`,
    `${I}transform<T>(transformer: AbstractTransformer<T>): T;`,
    '}',
  ].join('\n');

  const transformer = [
    '/**',
    ' * Transform an instance by its runtime class, one method per concrete class',
    ' */',
    'export abstract class AbstractTransformer<T> {',
    `${I}transform(that: IClass): T {`,
    `${I}${I}return that.transform(this);`,
    `${I}}`,
    ...(abstractMethods.length > 0 ? ['', ...abstractMethods] : []),
    '}',
  ].join('\n');

  return blocks([iClass, transformer]);
}

function withDoc(doc: string, body: string): string {
  return doc === '' ? body : `${doc}\n${body}`;
}

function generateEnumeration(ctx: EmitContext, enumeration: Enumeration): string {
  const { I } = ctx;
  const literals = enumeration.literals.map((literal) =>
    withDoc(
      tsDoc(literal.description, I, 1),
      `${I}${tsNaming.enumLiteralName(literal.name)},`
    )
  );
  const name = tsNaming.enumName(enumeration.name);
  const body =
    literals.length > 0
      ? `export enum ${name} {\n${literals.join('\n')}\n}`
      : `export enum ${name} {}`;
  return withDoc(tsDoc(enumeration.description, I), body);
}

function generateInterface(ctx: EmitContext, cls: Class): string {
  const { I } = ctx;
  const parents = cls.inheritances.map((p) => tsNaming.interfaceName(p.name));
  const extendsClause = parents.length > 0 ? parents.join(', ') : 'IClass';

  const members = cls.properties
    .filter((p) => p.specifiedFor === cls)
    .map((p) =>
      withDoc(
        tsDoc(p.description, I, 1),
        `${I}${tsNaming.propertyName(p.name)}: ${annotationType(p.type)};`
      )
    );

  const body =
    members.length > 0
      ? `export interface ${tsNaming.interfaceName(cls.name)} extends ${extendsClause} {\n${members.join('\n')}\n}`
      : `export interface ${tsNaming.interfaceName(cls.name)} extends ${extendsClause} {}`;
  return withDoc(tsDoc(cls.description, I), body);
}

function implementsClause(cls: ConcreteClass): string {
  if (cls.interface !== null) {
    return tsNaming.interfaceName(cls.name);
  }
  if (cls.inheritances.length > 0) {
    return cls.inheritances.map((p) => tsNaming.interfaceName(p.name)).join(', ');
  }
  return 'IClass';
}

function generateConstructor(ctx: EmitContext, cls: ConcreteClass): string {
  const { I } = ctx;
  if (cls.arguments.length === 0) return '';

  const params = cls.arguments.map((arg) => {
    const name = tsNaming.variableName(arg.name);
    if (arg.type.kind !== 'optional') {
      return `${I}${I}${name}: ${annotationType(arg.type)}`;
    }
    const property = propertyOf(cls, arg.name);
    const initializer =
      arg.default !== null && property?.type.kind === 'optional'
        ? defaultLiteral(arg.default, arg.type)
        : 'null';
    return `${I}${I}${name}: ${annotationType(arg.type)} = ${initializer}`;
  });

  const assignments = cls.arguments.map((arg) => {
    const param = tsNaming.variableName(arg.name);
    const target = `this.${tsNaming.propertyName(arg.name)}`;
    const property = propertyOf(cls, arg.name);
    if (
      arg.type.kind === 'optional' &&
      property !== undefined &&
      property.type.kind !== 'optional' &&
      arg.default !== null
    ) {
      return `${I}${I}${target} = ${param} ?? ${defaultLiteral(arg.default, arg.type)};`;
    }
    return `${I}${I}${target} = ${param};`;
  });

  return [
    `${I}constructor(`,
    params.join(',\n'),
    `${I}) {`,
    ...assignments,
    `${I}}`,
  ].join('\n');
}

function generateClass(ctx: EmitContext, cls: ConcreteClass): string {
  const { I } = ctx;
  if (cls.isImplementationSpecific) {
    return ctx.snippet(snippetKeys.structure(cls.name), cls.name) ?? '';
  }

  const properties = cls.properties.map((p) =>
    withDoc(
      tsDoc(p.description, I, 1),
      `${I}${tsNaming.propertyName(p.name)}: ${annotationType(p.type)};`
    )
  );

  const transform = [
    `${I}transform<T>(transformer: AbstractTransformer<T>): T {`,
    `${I}${I}return transformer.${transformMethodName(cls)}(this);`,
    `${I}}`,
  ].join('\n');

  const members = blocks([
    properties.join('\n'),
    generateConstructor(ctx, cls),
    transform,
  ]);
  const name = tsNaming.className(cls.name);
  return withDoc(
    tsDoc(cls.description, I),
    `export class ${name} implements ${implementsClause(cls)} {\n${members}\n}`
  );
}

export function generateStructure(ctx: EmitContext, header: string): string {
  const parts: string[] = [header, generateScaffolding(ctx)];
  for (const symbol of ctx.table.types) {
    switch (symbol.kind) {
      case 'enumeration':
        parts.push(generateEnumeration(ctx, symbol));
        break;
      case 'constrainedPrimitive':
        // Represented by the constrainee
        break;
      case 'abstractClass':
        parts.push(generateInterface(ctx, symbol));
        break;
      case 'concreteClass':
        if (symbol.interface !== null) {
          parts.push(generateInterface(ctx, symbol));
        }
        parts.push(generateClass(ctx, symbol));
        break;
      default:
        assertNever(symbol, 'named type');
    }
  }
  return `${blocks(parts)}\n`;
}
