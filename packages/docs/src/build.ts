import {
  anchorOf,
  assertNever,
  jsonModelType,
  jsonProperty,
  type Class,
  type ConstrainedPrimitive,
  type DefaultValue,
  type Description,
  type Enumeration,
  type NamedType,
  type Paragraph,
  type Property,
  type ResolvedOptions,
  type SymbolTable,
  type TypeAnnotation,
} from '@metacodec/core';

import type { DocBlock, DocInline, DocParagraph, DocTree } from './model/doc.js';

const text = (value: string): DocInline => ({ kind: 'text', text: value });
const code = (value: string): DocInline => ({ kind: 'code', text: value });

function typeLink(symbol: NamedType): DocInline {
  return { kind: 'link', text: symbol.name, anchor: anchorOf(symbol.name), code: true };
}

/** Properties are anchored where they are declared */
function propertyAnchor(property: Property): string {
  return anchorOf(property.specifiedFor.name, property.name);
}

function sectionAnchor(cls: Class, section: string): string {
  return `${anchorOf(cls.name)}--${section}`;
}

function paragraphInlines(paragraph: Paragraph): DocParagraph {
  return paragraph.map((inline): DocInline => {
    switch (inline.kind) {
      case 'text':
        return text(inline.text);
      case 'typeRef':
        return typeLink(inline.symbol);
      case 'propertyRef':
        return {
          kind: 'link',
          text: inline.property.name,
          anchor: propertyAnchor(inline.property),
          code: true,
        };
      default:
        return assertNever(inline, 'inline');
    }
  });
}

function descriptionBlocks(description: Description | null): DocBlock[] {
  if (description === null) return [];
  return [description.summary, ...description.remarks].map((p): DocBlock => ({
    kind: 'paragraph',
    content: paragraphInlines(p),
  }));
}

function summaryOf(description: Description | null): DocParagraph {
  return description === null ? [] : paragraphInlines(description.summary);
}

function joined(items: DocInline[][], separator = ', '): DocInline[] {
  return items.flatMap((item, i) => (i === 0 ? item : [text(separator), ...item]));
}

export function annotationInlines(annotation: TypeAnnotation): DocInline[] {
  switch (annotation.kind) {
    case 'primitive':
      return [code(annotation.primitive)];
    case 'named':
      return [typeLink(annotation.symbol)];
    case 'list':
      return [text('List['), ...annotationInlines(annotation.items), text(']')];
    case 'optional':
      return [text('Optional['), ...annotationInlines(annotation.value), text(']')];
    default:
      return assertNever(annotation, 'annotation');
  }
}

function defaultInline(value: DefaultValue): DocInline {
  switch (value.kind) {
    case 'constant':
      return code(typeof value.value === 'string' ? JSON.stringify(value.value) : String(value.value));
    case 'enumerationLiteral':
      return {
        kind: 'link',
        text: `${value.enumeration.name}.${value.literal.name}`,
        anchor: anchorOf(value.enumeration.name),
        code: true,
      };
    default:
      return assertNever(value, 'default value');
  }
}

function heading(level: 1 | 2 | 3 | 4, title: string, anchor = anchorOf(title)): DocBlock {
  return { kind: 'heading', level, text: title, anchor };
}

function enumerationBlocks(enumeration: Enumeration): DocBlock[] {
  return [
    heading(3, enumeration.name),
    ...descriptionBlocks(enumeration.description),
    {
      kind: 'table',
      header: ['Literal', 'Value', 'Description'],
      rows: enumeration.literals.map((literal) => [
        [code(literal.name)],
        [code(literal.value)],
        summaryOf(literal.description),
      ]),
    },
  ];
}

function constrainedPrimitiveBlocks(primitive: ConstrainedPrimitive): DocBlock[] {
  return [
    heading(3, primitive.name),
    {
      kind: 'paragraph',
      content: [text('Constrained primitive over '), code(primitive.constrainee), text('.')],
    },
    ...descriptionBlocks(primitive.description),
  ];
}

function propertyRow(cls: Class, property: Property): DocParagraph[] {
  const name: DocParagraph =
    property.specifiedFor === cls
      ? [{ kind: 'target', anchor: propertyAnchor(property) }, code(property.name)]
      : [code(property.name), text(' (from '), typeLink(property.specifiedFor), text(')')];
  return [
    name,
    [code(jsonProperty(property.name))],
    annotationInlines(property.type),
    summaryOf(property.description),
  ];
}

function classBlocks(cls: Class, discriminatorKey: string): DocBlock[] {
  const blocks: DocBlock[] = [heading(3, cls.name)];

  const kind: DocParagraph = [
    text(cls.kind === 'abstractClass' ? 'Abstract class.' : 'Concrete class.'),
  ];
  if (cls.kind === 'concreteClass' && cls.isImplementationSpecific) {
    kind.push(text(' Its implementation is provided by hand.'));
  }
  blocks.push({ kind: 'paragraph', content: kind });

  if (cls.inheritances.length > 0) {
    blocks.push({
      kind: 'paragraph',
      content: [
        text('Inherits from '),
        ...joined(cls.inheritances.map((parent) => [typeLink(parent)])),
        text('.'),
      ],
    });
  }
  if (cls.descendants.length > 0) {
    blocks.push({
      kind: 'paragraph',
      content: [
        text('Descendants: '),
        ...joined(cls.descendants.map((child) => [typeLink(child)])),
        text('.'),
      ],
    });
  }
  if (cls.kind === 'concreteClass' && cls.serialization.withModelType) {
    blocks.push({
      kind: 'paragraph',
      content: [
        text('Serialized with '),
        code(`"${discriminatorKey}": ${JSON.stringify(jsonModelType(cls.name))}`),
        text('.'),
      ],
    });
  }

  blocks.push(...descriptionBlocks(cls.description));

  if (cls.properties.length > 0) {
    blocks.push(heading(4, 'Properties', sectionAnchor(cls, 'properties')), {
      kind: 'table',
      header: ['Property', 'JSON', 'Type', 'Description'],
      rows: cls.properties.map((property) => propertyRow(cls, property)),
    });
  }

  if (cls.arguments.length > 0) {
    blocks.push(heading(4, 'Constructor', sectionAnchor(cls, 'constructor')), {
      kind: 'list',
      items: cls.arguments.map((arg) => [
        code(arg.name),
        text(': '),
        ...annotationInlines(arg.type),
        ...(arg.default === null ? [] : [text(' = '), defaultInline(arg.default)]),
      ]),
    });
  }

  return blocks;
}

/**
 * Build the reference documentation of a model: one section per kind of
 * type, types in model order.
 */
export function buildReference(table: SymbolTable, options: ResolvedOptions): DocTree {
  const title = options.docs.title ?? table.name;
  const blocks: DocBlock[] = [heading(1, title)];

  if (table.version !== null) {
    blocks.push({ kind: 'paragraph', content: [text('Version '), code(table.version)] });
  }
  blocks.push(...descriptionBlocks(table.description));

  const enumerations: DocBlock[] = [];
  const primitives: DocBlock[] = [];
  const classes: DocBlock[] = [];
  for (const symbol of table.types) {
    switch (symbol.kind) {
      case 'enumeration':
        enumerations.push(...enumerationBlocks(symbol));
        break;
      case 'constrainedPrimitive':
        primitives.push(...constrainedPrimitiveBlocks(symbol));
        break;
      case 'abstractClass':
      case 'concreteClass':
        classes.push(...classBlocks(symbol, options.jsonization.discriminatorKey));
        break;
      default:
        assertNever(symbol, 'named type');
    }
  }

  const sections: [string, DocBlock[]][] = [
    ['Enumerations', enumerations],
    ['Constrained primitives', primitives],
    ['Classes', classes],
  ];
  for (const [name, content] of sections) {
    if (content.length > 0) {
      blocks.push(heading(2, name), ...content);
    }
  }

  return { title, blocks };
}
