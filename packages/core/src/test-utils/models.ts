import { formatDiagnostic } from '../diag/codes.js';
import { EmitContext } from '../codegen/context.js';
import { NO_SNIPPETS, type Snippets } from '../codegen/snippets.js';
import {
  loadModel,
  type RawClass,
  type RawEnumeration,
  type RawModel,
  type RawNamedType,
} from '../model/loader.js';
import type { NamedType, SymbolTable } from '../model/types.js';
import { resolveOptions, type CodegenOptions } from '../types/options.js';

export function model(...types: RawNamedType[]): RawModel {
  return { name: 'test_model', types };
}

export function tableOf(document: unknown): SymbolTable {
  const result = loadModel(document);
  if (result.isErr()) {
    throw new Error(result.error.map(formatDiagnostic).join('\n'));
  }
  return result.value;
}

/** Formatted diagnostics of a model that must not load */
export function diagnosticsOf(document: unknown, discriminatorKey?: string): string[] {
  const result = loadModel(document, { discriminatorKey });
  if (result.isOk()) {
    throw new Error('Expected the model to be rejected');
  }
  return result.error.map(formatDiagnostic);
}

export function symbolOf(table: SymbolTable, name: string): NamedType {
  const symbol = table.byName.get(name);
  if (symbol === undefined) {
    throw new Error(`No type named ${name}`);
  }
  return symbol;
}

export function contextOf(
  document: unknown,
  options: CodegenOptions = {},
  snippets: Snippets = NO_SNIPPETS
): EmitContext {
  return new EmitContext(tableOf(document), resolveOptions(options), snippets);
}

// Frequently used model fragments

export const POINT: RawClass = {
  kind: 'concreteClass',
  name: 'Point',
  properties: [
    { name: 'x', type: 'int' },
    { name: 'y', type: 'Optional[int]' },
  ],
};

export const COLOR: RawEnumeration = {
  kind: 'enumeration',
  name: 'Color',
  literals: [
    { name: 'Red', value: 'red' },
    { name: 'Dark_blue', value: 'dark-blue' },
  ],
};

export const SHAPE: RawClass = {
  kind: 'abstractClass',
  name: 'Shape',
  properties: [{ name: 'color', type: 'Color' }],
};

export const CIRCLE: RawClass = {
  kind: 'concreteClass',
  name: 'Circle',
  inheritances: ['Shape'],
  properties: [{ name: 'radius', type: 'float' }],
};
