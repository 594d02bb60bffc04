import { tsNaming } from '../../naming/naming.js';
import type { Description, Inline, Paragraph } from '../../model/types.js';
import { docComment, indent } from '../../util/text.js';
import { assertNever } from '../resolver.js';
import { symbolTypeName } from './common.js';

function renderInline(inline: Inline): string {
  switch (inline.kind) {
    case 'text':
      return inline.text;
    case 'typeRef': {
      const name = symbolTypeName(inline.symbol);
      return name === null ? `\`${inline.symbol.name}\`` : `{@link ${name}}`;
    }
    case 'propertyRef': {
      const owner = symbolTypeName(inline.owner) ?? inline.owner.name;
      return `{@link ${owner}.${tsNaming.propertyName(inline.property.name)}}`;
    }
    default:
      return assertNever(inline, 'inline');
  }
}

function renderParagraph(paragraph: Paragraph): string {
  return paragraph.map(renderInline).join('');
}

/**
 * TSDoc comment for a model element, indented to `levels`; '' when the
 * element is undocumented and there are no extra paragraphs
 */
export function tsDoc(
  description: Description | null,
  indentUnit: string,
  levels = 0,
  extra: readonly string[] = []
): string {
  const paragraphs =
    description === null
      ? [...extra]
      : [
          renderParagraph(description.summary),
          ...description.remarks.map(renderParagraph),
          ...extra,
        ];
  return indent(docComment(paragraphs), indentUnit, levels);
}
