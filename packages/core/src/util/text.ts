// Text helpers for the emitters

/** Prefix every non-empty line of `text` with `levels` times `indent` */
export function indent(text: string, indentUnit: string, levels = 1): string {
  const prefix = indentUnit.repeat(levels);
  return text
    .split('\n')
    .map((line) => (line.length > 0 ? prefix + line : line))
    .join('\n');
}

/** Join code blocks with one blank line between them */
export function blocks(parts: readonly string[]): string {
  return parts.filter((p) => p.length > 0).join('\n\n');
}

/** Single-quoted TypeScript string literal */
export function tsString(value: string): string {
  const escaped = JSON.stringify(value)
    .slice(1, -1)
    .replace(/\\"/g, '"')
    .replace(/'/g, "\\'");
  return `'${escaped}'`;
}

/**
 * Render a TSDoc comment from paragraphs; returns '' when there are none
 */
export function docComment(paragraphs: readonly string[]): string {
  const lines: string[] = [];
  paragraphs.forEach((paragraph, i) => {
    if (i > 0) lines.push('');
    lines.push(...paragraph.replace(/\*\//g, '*\\/').split('\n'));
  });
  if (lines.length === 0) return '';
  return ['/**', ...lines.map((l) => (l === '' ? ' *' : ` * ${l}`)), ' */'].join('\n');
}
