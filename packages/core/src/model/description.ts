import type { Description, Inline, Paragraph } from './types.js';

export type ReferenceRole = 'class' | 'attr';

export type ReferenceLookup = (
  role: ReferenceRole,
  target: string
) => Inline | null;

export interface ParsedDescription {
  description: Description | null;
  /** References that did not resolve, rendered as `:role:`target`` */
  unresolved: string[];
}

const REFERENCE_RE = /:(class|attr):`([^`]+)`/g;

function isReferenceRole(value: string): value is ReferenceRole {
  return value === 'class' || value === 'attr';
}

function parseParagraph(
  text: string,
  lookup: ReferenceLookup,
  unresolved: string[]
): Paragraph {
  const inlines: Inline[] = [];
  let last = 0;
  for (const match of text.matchAll(REFERENCE_RE)) {
    const start = match.index ?? 0;
    const [whole, role = '', target = ''] = match;
    if (start > last) {
      inlines.push({ kind: 'text', text: text.slice(last, start) });
    }
    const resolved = isReferenceRole(role) ? lookup(role, target) : null;
    if (resolved === null) {
      unresolved.push(whole);
      inlines.push({ kind: 'text', text: target });
    } else {
      inlines.push(resolved);
    }
    last = start + whole.length;
  }
  if (last < text.length) {
    inlines.push({ kind: 'text', text: text.slice(last) });
  }
  return inlines;
}

/**
 * Split a description into summary and remarks (blank-line separated
 * paragraphs) and resolve its inline references.
 */
export function parseDescription(
  text: string | undefined,
  lookup: ReferenceLookup
): ParsedDescription {
  const unresolved: string[] = [];
  if (text === undefined) {
    return { description: null, unresolved };
  }

  const paragraphs = text
    .split(/\n[ \t]*\n/)
    .map((p) => p.replace(/\s+/g, ' ').trim())
    .filter((p) => p.length > 0)
    .map((p) => parseParagraph(p, lookup, unresolved));

  const [summary, ...remarks] = paragraphs;
  if (summary === undefined) {
    return { description: null, unresolved };
  }
  return { description: { summary, remarks }, unresolved };
}

export function paragraphText(paragraph: Paragraph): string {
  return paragraph
    .map((inline) => {
      switch (inline.kind) {
        case 'text':
          return inline.text;
        case 'typeRef':
          return inline.symbol.name;
        case 'propertyRef':
          return inline.property.name;
        default: {
          const exhaustive: never = inline;
          return exhaustive;
        }
      }
    })
    .join('');
}
