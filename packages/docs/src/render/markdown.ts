import type { DocBlock, DocInline, DocParagraph, DocTree } from '../model/doc.js';

function escapeMarkdown(value: string): string {
  return value.replace(/[\\`*_[\]<>|]/g, (c) => `\\${c}`);
}

function codeSpan(value: string): string {
  // A backtick inside needs a longer fence and padding
  return value.includes('`') ? `\`\` ${value} \`\`` : `\`${value}\``;
}

function renderInline(inline: DocInline): string {
  switch (inline.kind) {
    case 'text':
      return escapeMarkdown(inline.text);
    case 'code':
      return codeSpan(inline.text);
    case 'link':
      return `[${inline.code ? codeSpan(inline.text) : escapeMarkdown(inline.text)}](#${inline.anchor})`;
    case 'target':
      return `<a id="${inline.anchor}"></a>`;
  }
}

function renderParagraph(paragraph: DocParagraph): string {
  return paragraph.map(renderInline).join('');
}

function renderCell(cell: DocParagraph): string {
  return cell.length > 0 ? renderParagraph(cell).replace(/\|/g, '\\|') : '—';
}

function renderBlock(block: DocBlock): string[] {
  switch (block.kind) {
    case 'heading':
      return [
        `<a id="${block.anchor}"></a>`,
        `${'#'.repeat(block.level)} ${escapeMarkdown(block.text)}`,
      ];
    case 'paragraph':
      return [renderParagraph(block.content)];
    case 'list':
      return block.items.map((item) => `- ${renderParagraph(item)}`);
    case 'table': {
      const header = `| ${block.header.join(' | ')} |`;
      const divider = `|${block.header.map(() => '---|').join('')}`;
      const rows = block.rows.map((row) => `| ${row.map(renderCell).join(' | ')} |`);
      return [header, divider, ...rows];
    }
  }
}

export function renderMarkdown(doc: DocTree): string {
  const lines: string[] = [];
  doc.blocks.forEach((block, idx) => {
    if (idx > 0) {
      lines.push('');
    }
    lines.push(...renderBlock(block));
  });
  return lines.join('\n');
}
