import type { DocBlock, DocInline, DocParagraph, DocTree } from '../model/doc.js';

export function escapeHtml(value: unknown): string {
  return String(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderInline(inline: DocInline): string {
  switch (inline.kind) {
    case 'text':
      return escapeHtml(inline.text);
    case 'code':
      return `<code>${escapeHtml(inline.text)}</code>`;
    case 'link': {
      const label = escapeHtml(inline.text);
      return `<a href="#${escapeHtml(inline.anchor)}">${inline.code ? `<code>${label}</code>` : label}</a>`;
    }
    case 'target':
      return `<a id="${escapeHtml(inline.anchor)}"></a>`;
  }
}

function renderParagraph(paragraph: DocParagraph): string {
  return paragraph.map(renderInline).join('');
}

function renderBlock(block: DocBlock): string {
  switch (block.kind) {
    case 'heading':
      return `<h${block.level} id="${escapeHtml(block.anchor)}">${escapeHtml(block.text)}</h${block.level}>`;
    case 'paragraph':
      return `<p>${renderParagraph(block.content)}</p>`;
    case 'list': {
      const items = block.items.map((item) => `<li>${renderParagraph(item)}</li>`).join('');
      return `<ul>${items}</ul>`;
    }
    case 'table': {
      const head = block.header.map((h) => `<th>${escapeHtml(h)}</th>`).join('');
      const rows = block.rows
        .map(
          (row) =>
            `<tr>${row.map((cell) => `<td>${renderParagraph(cell)}</td>`).join('')}</tr>`
        )
        .join('');
      return `<table><thead><tr>${head}</tr></thead><tbody>${rows}</tbody></table>`;
    }
  }
}

export function renderHtml(doc: DocTree): string {
  const styles = `body{font-family:system-ui,Segoe UI,sans-serif;margin:0;padding:2rem;background:#f7f7f8;color:#111}
main{max-width:60rem;margin:0 auto;background:#fff;border-radius:0.75rem;padding:1.5rem 2rem;box-shadow:0 1px 4px rgba(15,23,42,.08)}
h1{margin:0 0 .5rem 0;font-size:2rem}
h2{margin-top:2.5rem;border-bottom:1px solid #e5e7eb;padding-bottom:.25rem}
h3{margin-top:2rem}
table{width:100%;border-collapse:collapse;margin-top:0.5rem}
th,td{border:1px solid #e5e7eb;padding:0.5rem;text-align:left;font-size:0.9rem;vertical-align:top}
code{background:#f1f5f9;padding:0 .2rem;border-radius:.25rem;font-size:.85rem}
ul{padding-left:1.25rem}
`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <title>${escapeHtml(doc.title)}</title>
  <style>${styles}</style>
</head>
<body>
  <main>
${doc.blocks.map((block) => `    ${renderBlock(block)}`).join('\n')}
  </main>
</body>
</html>`;
}
