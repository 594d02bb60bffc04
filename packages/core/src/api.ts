import { readFile } from 'node:fs/promises';

import {
  DIAGNOSTIC_CODES,
  formatDiagnostic,
  type Diagnostic,
} from './diag/codes.js';
import { ErrorCode } from './errors/codes.js';
import { EmitContext, type GenerationResult } from './codegen/context.js';
import { generateJsonSchema } from './codegen/jsonschema/generate.js';
import { NO_SNIPPETS, type Snippets } from './codegen/snippets.js';
import { generateTypeScript } from './codegen/typescript/index.js';
import { verifyConstructors } from './codegen/verify.js';
import { loadModel } from './model/loader.js';
import type { SymbolTable } from './model/types.js';
import { InputError, ModelError } from './types/errors.js';
import {
  resolveOptions,
  type CodegenOptions,
  type ResolvedOptions,
} from './types/options.js';
import { err, ok, type Result } from './types/result.js';

// NOTE: the CLI composes these entry points; keep its `generate` and `check`
// commands in sync when changing their signatures.

/**
 * Produces the files of one target from a resolved model
 */
export type Emitter = (ctx: EmitContext) => GenerationResult;

export const CORE_EMITTERS = {
  typescript: generateTypeScript,
  jsonschema: generateJsonSchema,
} as const satisfies Record<string, Emitter>;

export type CoreTarget = keyof typeof CORE_EMITTERS;

/**
 * Read and parse a meta-model file
 *
 * @throws {InputError} If the file is unreadable or not JSON
 */
export async function readModelFile(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new InputError({
      message: `Cannot read the meta-model file ${file}`,
      file,
      cause: error instanceof Error ? error : undefined,
    });
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new InputError({
      message: `The meta-model file ${file} is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`,
      file,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Resolve a parsed meta-model against the wire options it will be
 * generated with
 */
export function compileModel(
  document: unknown,
  options: ResolvedOptions = resolveOptions()
): Result<SymbolTable, Diagnostic[]> {
  return loadModel(document, {
    discriminatorKey: options.jsonization.discriminatorKey,
  });
}

/**
 * Like compileModel(), but throws
 *
 * @throws {ModelError} Carrying every model diagnostic
 */
export function compileModelOrThrow(
  document: unknown,
  options: ResolvedOptions = resolveOptions()
): SymbolTable {
  const result = compileModel(document, options);
  if (result.isErr()) {
    const structural = result.error.every(
      (d) => d.code === DIAGNOSTIC_CODES.MODEL_SCHEMA_VIOLATION
    );
    throw new ModelError({
      diagnostics: result.error,
      errorCode: structural
        ? ErrorCode.INVALID_MODEL_STRUCTURE
        : ErrorCode.MODEL_RESOLUTION_FAILED,
    });
  }
  return result.value;
}

/**
 * Run one emitter over the model. Constructor checks run first so that
 * their diagnostics are reported together with the emitter's own.
 */
export function generate(
  table: SymbolTable,
  emitter: Emitter,
  options: ResolvedOptions = resolveOptions(),
  snippets: Snippets = NO_SNIPPETS
): GenerationResult {
  const ctx = new EmitContext(table, options, snippets);
  verifyConstructors(ctx);
  return emitter(ctx);
}

/**
 * Convenience wrapper: options are resolved, the model is compiled, and
 * diagnostics of either phase are rendered one per line.
 */
export function generateFromDocument(
  document: unknown,
  emitter: Emitter,
  userOptions: CodegenOptions = {},
  snippets: Snippets = NO_SNIPPETS
): Result<ReadonlyMap<string, string>, string[]> {
  const options = resolveOptions(userOptions);
  const table = compileModel(document, options);
  if (table.isErr()) {
    return err(table.error.map(formatDiagnostic));
  }
  const files = generate(table.value, emitter, options, snippets);
  if (files.isErr()) {
    return err(files.error.map(formatDiagnostic));
  }
  return ok(new Map(files.value.map((f): [string, string] => [f.path, f.content])));
}
