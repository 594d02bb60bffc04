import type { Emitter, EmitContext, GenerationResult } from '@metacodec/core';

import { buildReference } from './build.js';
import { renderHtml } from './render/html.js';
import { renderMarkdown } from './render/markdown.js';

/**
 * Generate `reference.md`
 */
export function generateMarkdown(ctx: EmitContext): GenerationResult {
  const doc = buildReference(ctx.table, ctx.options);
  return ctx.finish([{ path: 'reference.md', content: `${renderMarkdown(doc)}\n` }]);
}

/**
 * Generate `reference.html`
 */
export function generateHtml(ctx: EmitContext): GenerationResult {
  const doc = buildReference(ctx.table, ctx.options);
  return ctx.finish([{ path: 'reference.html', content: `${renderHtml(doc)}\n` }]);
}

export const DOCS_EMITTERS = {
  markdown: generateMarkdown,
  html: generateHtml,
} as const satisfies Record<string, Emitter>;

export type DocsTarget = keyof typeof DOCS_EMITTERS;
