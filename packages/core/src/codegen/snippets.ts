/**
 * Hand-written code for implementation-specific classes
 *
 * Snippets are addressed by keys of the form
 * `<area>/<direction>/<TypeName>.<ext>`, which are also their paths
 * relative to the snippets directory.
 */

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { InputError } from '../types/errors.js';

export type ImplementationKey = string;

export type Snippets = ReadonlyMap<ImplementationKey, string>;

export const NO_SNIPPETS: Snippets = new Map();

export const snippetKeys = {
  /** Body of `<name>FromJsonableImplementation`, returning a ParseResult */
  parse: (className: string): ImplementationKey =>
    `jsonization/parse/${className}.ts`,
  /** Body of the `transform<Name>` method of the jsonization transformer */
  transform: (className: string): ImplementationKey =>
    `jsonization/transform/${className}.ts`,
  /** Complete class declaration in types.ts */
  structure: (className: string): ImplementationKey =>
    `types/${className}.ts`,
  /** JSON Schema definition placed under `$defs` */
  schemaDefinition: (className: string): ImplementationKey =>
    `jsonschema/definition/${className}.json`,
};

async function collect(root: string, dir: string, into: Map<string, string>): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collect(root, full, into);
    } else if (entry.isFile()) {
      const key = path.relative(root, full).split(path.sep).join('/');
      into.set(key, await readFile(full, 'utf8'));
    }
  }
}

/**
 * Read every file below `dir` into a snippet map
 *
 * @throws {InputError} When the directory can not be read
 */
export async function loadSnippets(dir: string): Promise<Snippets> {
  const snippets = new Map<string, string>();
  try {
    await collect(dir, dir, snippets);
  } catch (error) {
    throw new InputError({
      message: `Could not read the snippets directory ${dir}`,
      file: dir,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return snippets;
}
