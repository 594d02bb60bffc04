/**
 * Public entry points of jsonization.ts
 *
 * The only place where a failed ParseResult turns into an exception.
 */

import { tsNaming } from '../../naming/naming.js';
import type { ConcreteClass, Enumeration, Interface } from '../../model/types.js';
import type { EmitContext } from '../context.js';
import {
  classRoutineStem,
  enumerationRoutineStem,
  interfaceRoutineStem,
  renderRows,
} from './common.js';

function facade(
  ctx: EmitContext,
  stem: string,
  typeName: string,
  summary: string
): string {
  return renderRows(ctx.I, [
    [0, '/**'],
    [0, ` * ${summary}`],
    [0, ' *'],
    [0, ' * @throws {@link rt.DeserializationError} if `node` is not a valid representation'],
    [0, ' */'],
    [0, `export function ${stem}FromJsonable(node: unknown): ${typeName} {`],
    [1, `const result = ${stem}FromJsonableImplementation(node);`],
    [1, 'if (!result.ok) {'],
    [2, 'throw rt.DeserializationError.fromErrorPath(result.error);'],
    [1, '}'],
    [1, 'return result.value;'],
    [0, '}'],
  ]);
}

export function generateEnumerationFacade(ctx: EmitContext, enumeration: Enumeration): string {
  const name = tsNaming.enumName(enumeration.name);
  return facade(
    ctx,
    enumerationRoutineStem(enumeration),
    `types.${name}`,
    `Parse a literal of {@link types.${name}} from its JSON string.`
  );
}

export function generateInterfaceFacade(ctx: EmitContext, iface: Interface): string {
  const name = tsNaming.interfaceName(iface.name);
  return facade(
    ctx,
    interfaceRoutineStem(iface),
    `types.${name}`,
    `Parse an instance of {@link types.${name}} from a JSON object, dispatching on the model type.`
  );
}

export function generateClassFacade(ctx: EmitContext, cls: ConcreteClass): string {
  const name = tsNaming.className(cls.name);
  return facade(
    ctx,
    classRoutineStem(cls),
    `types.${name}`,
    `Parse an instance of {@link types.${name}} from a JSON object.`
  );
}
