/**
 * Data model of the rendered reference. The builder produces it from the
 * resolved meta-model; renderers only format it and never look at the
 * model themselves.
 */

export type DocInline =
  | { kind: 'text'; text: string }
  | { kind: 'code'; text: string }
  /** Link to an anchor of the same document; `code` renders the label as code */
  | { kind: 'link'; text: string; anchor: string; code: boolean }
  /** Link target placed inline, e.g. in the row of a property */
  | { kind: 'target'; anchor: string };

export type DocParagraph = DocInline[];

export type HeadingLevel = 1 | 2 | 3 | 4;

export type DocBlock =
  | { kind: 'heading'; level: HeadingLevel; text: string; anchor: string }
  | { kind: 'paragraph'; content: DocParagraph }
  | { kind: 'list'; items: DocParagraph[] }
  | { kind: 'table'; header: string[]; rows: DocParagraph[][] };

export interface DocTree {
  title: string;
  blocks: DocBlock[];
}
