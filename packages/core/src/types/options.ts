/**
 * Configuration options for metacodec code generation
 *
 * All options are optional with conservative defaults; resolveOptions()
 * fills in the defaults and validates the combination.
 */

import { ConfigError } from './errors.js';

/**
 * Wire format of the generated codecs
 */
export interface JsonizationOptions {
  /** Reserved property that names the concrete class of a polymorphic object (default: 'modelType') */
  discriminatorKey?: string;
}

/**
 * Text layout of the emitted files
 */
export interface EmitOptions {
  /** One level of indentation (default: two spaces) */
  indent?: string;
  /** Lines of the warning placed at the top of generated source files */
  banner?: string[];
}

/**
 * TypeScript target settings
 */
export interface TypeScriptOptions {
  /** Module the generated jsonization imports its support code from (default: '@metacodec/runtime') */
  runtimeModule?: string;
  /** Specifier the jsonization module uses to import the generated types (default: './types.js') */
  typesModule?: string;
}

/**
 * Rendered documentation settings
 */
export interface DocsOptions {
  /** Title of the reference; defaults to the meta-model name */
  title?: string;
}

export interface CodegenOptions {
  jsonization?: JsonizationOptions;
  emit?: EmitOptions;
  typescript?: TypeScriptOptions;
  docs?: DocsOptions;
}

export interface ResolvedOptions {
  jsonization: Required<JsonizationOptions>;
  emit: Required<EmitOptions>;
  typescript: Required<TypeScriptOptions>;
  docs: DocsOptions;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  jsonization: {
    discriminatorKey: 'modelType',
  },
  emit: {
    indent: '  ',
    banner: [
      'This code has been automatically generated by metacodec.',
      'Do NOT edit or append.',
    ],
  },
  typescript: {
    runtimeModule: '@metacodec/runtime',
    typesModule: './types.js',
  },
  docs: {},
};

const DISCRIMINATOR_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
// A JSON object inherits these, so they can not name an own property
const INHERITED_KEYS = new Set(['__proto__', ...Object.getOwnPropertyNames(Object.prototype)]);
const INDENT_RE = /^(?: +|\t+)$/;

/**
 * Resolve user options with defaults
 *
 * @throws {ConfigError} When an option value is not acceptable
 */
export function resolveOptions(
  userOptions: CodegenOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    jsonization: { ...DEFAULT_OPTIONS.jsonization, ...userOptions.jsonization },
    emit: { ...DEFAULT_OPTIONS.emit, ...userOptions.emit },
    typescript: { ...DEFAULT_OPTIONS.typescript, ...userOptions.typescript },
    docs: { ...DEFAULT_OPTIONS.docs, ...userOptions.docs },
  };

  validateOptions(resolved);

  return resolved;
}

function validateOptions(options: ResolvedOptions): void {
  const { discriminatorKey } = options.jsonization;
  if (!DISCRIMINATOR_RE.test(discriminatorKey)) {
    throw new ConfigError({
      message: `Invalid discriminator key ${JSON.stringify(discriminatorKey)}: expected an identifier`,
      setting: 'jsonization.discriminatorKey',
    });
  }
  if (INHERITED_KEYS.has(discriminatorKey)) {
    throw new ConfigError({
      message: `Invalid discriminator key ${JSON.stringify(discriminatorKey)}: it is a member of Object.prototype`,
      setting: 'jsonization.discriminatorKey',
    });
  }

  if (!INDENT_RE.test(options.emit.indent)) {
    throw new ConfigError({
      message: 'Indentation must consist of spaces only or of tabs only',
      setting: 'emit.indent',
    });
  }

  for (const line of options.emit.banner) {
    if (line.includes('*/') || /[\r\n]/.test(line)) {
      throw new ConfigError({
        message: 'Banner lines must be single lines without "*/"',
        setting: 'emit.banner',
      });
    }
  }

  if (options.typescript.runtimeModule.trim() === '') {
    throw new ConfigError({
      message: 'The runtime module specifier must not be empty',
      setting: 'typescript.runtimeModule',
    });
  }
  if (options.typescript.typesModule.trim() === '') {
    throw new ConfigError({
      message: 'The types module specifier must not be empty',
      setting: 'typescript.typesModule',
    });
  }
}
