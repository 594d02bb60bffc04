import {
  formatDiagnostic,
  loadModel,
  type RawModel,
  type SymbolTable,
} from '@metacodec/core';

export const SHAPES_MODEL: RawModel = {
  name: 'shapes',
  version: '1.0',
  description: 'Shapes drawn on a canvas.',
  types: [
    {
      kind: 'enumeration',
      name: 'Color',
      description: 'Fill color.',
      literals: [
        { name: 'Red', value: 'red', description: 'Like a <b>rose</b>.' },
        { name: 'Blue', value: 'blue' },
      ],
    },
    { kind: 'constrainedPrimitive', name: 'Label', constrainee: 'str' },
    {
      kind: 'abstractClass',
      name: 'Shape',
      description: 'A figure.\n\nSee :attr:`color`.',
      properties: [
        { name: 'color', type: 'Color', description: 'How the shape is filled.' },
      ],
    },
    {
      kind: 'concreteClass',
      name: 'Circle',
      inheritances: ['Shape'],
      properties: [
        { name: 'radius', type: 'float' },
        { name: 'tags', type: 'Optional[List[Label]]' },
      ],
      constructorArguments: [
        { name: 'radius', type: 'float' },
        { name: 'color', type: 'Color', default: 'Red' },
        { name: 'tags', type: 'Optional[List[Label]]', default: null },
      ],
    },
  ],
};

export function tableOf(document: unknown): SymbolTable {
  const result = loadModel(document);
  if (result.isErr()) {
    throw new Error(result.error.map(formatDiagnostic).join('\n'));
  }
  return result.value;
}
