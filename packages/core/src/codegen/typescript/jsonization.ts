import { tsNaming } from '../../naming/naming.js';
import type { Enumeration } from '../../model/types.js';
import { blocks, tsString } from '../../util/text.js';
import type { EmitContext } from '../context.js';
import { assertNever } from '../resolver.js';
import { enumFromTable, enumToTable, renderRows, type Row } from './common.js';
import {
  generateClassParse,
  generateEnumerationParse,
  generateInterfaceParse,
} from './deserialize.js';
import {
  generateClassFacade,
  generateEnumerationFacade,
  generateInterfaceFacade,
} from './facade.js';
import {
  generateEnumerationToJsonable,
  generateToJsonable,
  generateTransformer,
} from './serialize.js';

function generateTables(ctx: EmitContext, enumeration: Enumeration): string {
  const enumName = `types.${tsNaming.enumName(enumeration.name)}`;
  const literal = (name: string): string =>
    `${enumName}.${tsNaming.enumLiteralName(name)}`;

  const fromRows = enumeration.literals.map((l): Row => [
    1,
    `[${tsString(l.value)}, ${literal(l.name)}],`,
  ]);
  const toRows = enumeration.literals.map((l): Row => [
    1,
    `[${literal(l.name)}, ${tsString(l.value)}],`,
  ]);

  return blocks([
    renderRows(ctx.I, [
      [0, `const ${enumFromTable(enumeration)}: ReadonlyMap<string, ${enumName}> =`],
      [1, `new Map<string, ${enumName}>([`],
      ...fromRows.map(([level, text]): Row => [level + 1, text]),
      [1, ']);'],
    ]),
    renderRows(ctx.I, [
      [0, `const ${enumToTable(enumeration)}: ReadonlyMap<${enumName}, string> =`],
      [1, `new Map<${enumName}, string>([`],
      ...toRows.map(([level, text]): Row => [level + 1, text]),
      [1, ']);'],
    ]),
  ]);
}

/**
 * Emit jsonization.ts: the codec of every named type of the model
 */
export function generateJsonization(ctx: EmitContext, header: string): string {
  const { runtimeModule, typesModule } = ctx.options.typescript;
  const imports = [
    `import * as rt from ${tsString(runtimeModule)};`,
    `import * as types from ${tsString(typesModule)};`,
  ].join('\n');

  const tables: string[] = [];
  const routines: string[] = [];
  const toJsonables: string[] = [];

  for (const symbol of ctx.table.types) {
    switch (symbol.kind) {
      case 'enumeration':
        tables.push(generateTables(ctx, symbol));
        routines.push(
          generateEnumerationParse(ctx, symbol),
          generateEnumerationFacade(ctx, symbol)
        );
        toJsonables.push(generateEnumerationToJsonable(ctx, symbol));
        break;
      case 'constrainedPrimitive':
        break;
      case 'abstractClass':
        if (symbol.interface !== null) {
          routines.push(
            generateInterfaceParse(ctx, symbol.interface),
            generateInterfaceFacade(ctx, symbol.interface)
          );
        }
        break;
      case 'concreteClass':
        if (symbol.interface !== null) {
          routines.push(
            generateInterfaceParse(ctx, symbol.interface),
            generateInterfaceFacade(ctx, symbol.interface)
          );
        }
        routines.push(
          generateClassParse(ctx, symbol),
          generateClassFacade(ctx, symbol)
        );
        break;
      default:
        assertNever(symbol, 'named type');
    }
  }

  return `${blocks([
    header,
    imports,
    ...tables,
    ...routines,
    generateTransformer(ctx),
    generateToJsonable(ctx),
    ...toJsonables,
  ])}\n`;
}
