import { describe, expect, it } from 'vitest';

import { resolveOptions } from '@metacodec/core';
import { buildReference } from './build.js';
import { SHAPES_MODEL, tableOf } from './test-utils/shapes-model.js';

describe('buildReference', () => {
  const table = tableOf(SHAPES_MODEL);

  it('groups types by kind after the model header', () => {
    const doc = buildReference(table, resolveOptions());
    const headings = doc.blocks.flatMap((b) =>
      b.kind === 'heading' ? [`${b.level} ${b.text} #${b.anchor}`] : []
    );

    expect(doc.title).toBe('shapes');
    expect(headings).toEqual([
      '1 shapes #shapes',
      '2 Enumerations #enumerations',
      '3 Color #color',
      '2 Constrained primitives #constrained-primitives',
      '3 Label #label',
      '2 Classes #classes',
      '3 Shape #shape',
      '4 Properties #shape--properties',
      '4 Constructor #shape--constructor',
      '3 Circle #circle',
      '4 Properties #circle--properties',
      '4 Constructor #circle--constructor',
    ]);
  });

  it('takes the title from the options', () => {
    const doc = buildReference(table, resolveOptions({ docs: { title: 'Canvas API' } }));
    expect(doc.blocks[0]).toEqual({
      kind: 'heading',
      level: 1,
      text: 'Canvas API',
      anchor: 'canvas-api',
    });
  });

  it('links property references to the declaring class', () => {
    const doc = buildReference(table, resolveOptions());
    expect(doc.blocks).toContainEqual({
      kind: 'paragraph',
      content: [
        { kind: 'text', text: 'See ' },
        { kind: 'link', text: 'color', anchor: 'shape-color', code: true },
        { kind: 'text', text: '.' },
      ],
    });
  });

  it('names the discriminator with the configured key', () => {
    const doc = buildReference(
      table,
      resolveOptions({ jsonization: { discriminatorKey: 'kind' } })
    );
    expect(doc.blocks).toContainEqual({
      kind: 'paragraph',
      content: [
        { kind: 'text', text: 'Serialized with ' },
        { kind: 'code', text: '"kind": "Circle"' },
        { kind: 'text', text: '.' },
      ],
    });
  });
});
