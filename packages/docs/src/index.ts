// @metacodec/docs entry point

export { buildReference, annotationInlines } from './build.js';
export { generateMarkdown, generateHtml, DOCS_EMITTERS, type DocsTarget } from './emit.js';
export { renderMarkdown } from './render/markdown.js';
export { renderHtml, escapeHtml } from './render/html.js';
export type {
  DocTree,
  DocBlock,
  DocInline,
  DocParagraph,
  HeadingLevel,
} from './model/doc.js';
