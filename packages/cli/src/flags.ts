import { ConfigError, type CodegenOptions } from '@metacodec/core';

export const TARGET_NAMES = ['typescript', 'jsonschema', 'markdown', 'html'] as const;

export type Target = (typeof TARGET_NAMES)[number];

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  model?: string;
  target?: string;
  output?: string;
  snippets?: string;
  discriminatorKey?: string;
  indent?: string;
  runtimeModule?: string;
  typesModule?: string;
  title?: string;
  verbose?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

function isTarget(value: string): value is Target {
  return TARGET_NAMES.some((name) => name === value);
}

export function resolveTarget(value: string | undefined): Target {
  const normalized = (value ?? 'typescript').trim().toLowerCase();
  if (!isTarget(normalized)) {
    throw new ConfigError({
      message: `Unsupported target "${value ?? ''}". Expected one of ${TARGET_NAMES.join(', ')}.`,
      setting: 'target',
    });
  }
  return normalized;
}

/**
 * `--indent 4` means four spaces, `--indent tab` one tab
 */
export function parseIndent(value: string): string {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === 'tab') {
    return '\t';
  }
  const width = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || width < 1 || width > 8) {
    throw new ConfigError({
      message: `Invalid --indent "${value}": expected a number of spaces (1-8) or "tab"`,
      setting: 'emit.indent',
    });
  }
  return ' '.repeat(width);
}

/**
 * Parse CLI options into CodegenOptions configuration
 */
export function parseCodegenOptions(options: CliOptions): CodegenOptions {
  const codegenOptions: CodegenOptions = {};

  if (options.discriminatorKey !== undefined) {
    codegenOptions.jsonization = { discriminatorKey: options.discriminatorKey };
  }
  if (options.indent !== undefined) {
    codegenOptions.emit = { indent: parseIndent(options.indent) };
  }
  if (options.runtimeModule !== undefined || options.typesModule !== undefined) {
    codegenOptions.typescript = {
      ...(options.runtimeModule !== undefined ? { runtimeModule: options.runtimeModule } : {}),
      ...(options.typesModule !== undefined ? { typesModule: options.typesModule } : {}),
    };
  }
  if (options.title !== undefined) {
    codegenOptions.docs = { title: options.title };
  }

  return codegenOptions;
}
