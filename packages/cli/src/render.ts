import type { CLIErrorView } from '@metacodec/core';

const SGR = {
  reset: '\u001B[0m',
  bold: '\u001B[1m',
  red: '\u001B[31m',
} as const;

const ANSI_PATTERN =
  // eslint-disable-next-line no-control-regex
  /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g;

/**
 * Greedy word wrap; a word longer than `width` keeps a line of its own
 */
function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    const candidate = current.length > 0 ? `${current} ${word}` : word;
    if (candidate.length > width && current.length > 0) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current.length > 0) lines.push(current);
  return lines;
}

/**
 * Render the error header of a CLI failure. Diagnostic lines
 * (`view.details`) are logged by the caller before it.
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : 80;
  const title = `❌ ${view.title}`;
  const lines = [view.colors ? `${SGR.red}${SGR.bold}${title}${SGR.reset}` : title];

  if (view.location !== undefined && view.location.length > 0) {
    lines.push(...wrap(`📍 ${view.location}`, width));
  }
  if (view.workaround !== undefined && view.workaround.length > 0) {
    lines.push(...wrap(`💡 Workaround: ${view.workaround}`, width));
  }
  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  return input.replace(ANSI_PATTERN, '');
}
