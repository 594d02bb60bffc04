import { describe, expect, it } from 'vitest';

import { resolveOptions } from '@metacodec/core';
import { buildReference } from '../build.js';
import { SHAPES_MODEL, tableOf } from '../test-utils/shapes-model.js';
import { renderMarkdown } from './markdown.js';

function render(): string[] {
  return renderMarkdown(buildReference(tableOf(SHAPES_MODEL), resolveOptions())).split('\n');
}

describe('renderMarkdown', () => {
  it('starts with the anchored title, version and description', () => {
    expect(render().slice(0, 6)).toEqual([
      '<a id="shapes"></a>',
      '# shapes',
      '',
      'Version `1.0`',
      '',
      'Shapes drawn on a canvas.',
    ]);
  });

  it('renders enumerations as tables with escaped descriptions', () => {
    const lines = render();
    const header = lines.indexOf('| Literal | Value | Description |');
    expect(header).toBeGreaterThan(0);
    expect(lines.slice(header + 1, header + 4)).toEqual([
      '|---|---|---|',
      '| `Red` | `red` | Like a \\<b\\>rose\\</b\\>. |',
      '| `Blue` | `blue` | — |',
    ]);
  });

  it('renders properties with anchors and links to their types', () => {
    const lines = render();
    expect(lines).toContain(
      '| <a id="shape-color"></a>`color` | `color` | [`Color`](#color) | How the shape is filled. |'
    );
    expect(lines).toContain(
      '| `color` (from [`Shape`](#shape)) | `color` | [`Color`](#color) | How the shape is filled. |'
    );
    expect(lines).toContain(
      '| <a id="circle-tags"></a>`tags` | `tags` | Optional\\[List\\[[`Label`](#label)\\]\\] | — |'
    );
  });

  it('lists constructor arguments with their defaults', () => {
    const lines = render();
    const start = lines.indexOf('#### Constructor', lines.indexOf('### Circle'));
    expect(lines.slice(start + 2, start + 5)).toEqual([
      '- `radius`: `float`',
      '- `color`: [`Color`](#color) = [`Color.Red`](#color)',
      '- `tags`: Optional\\[List\\[[`Label`](#label)\\]\\]',
    ]);
  });
});
