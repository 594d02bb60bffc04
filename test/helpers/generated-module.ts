/**
 * Load the TypeScript target of a model as live modules
 *
 * types.ts and jsonization.ts are transpiled with the compiler API and
 * evaluated in this process; the jsonization module gets the real
 * @metacodec/runtime sources, so tests exercise exactly the code a user
 * would compile.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import vm from 'node:vm';
import ts from 'typescript';

import {
  CORE_EMITTERS,
  generateFromDocument,
  type CodegenOptions,
  type Snippets,
} from '../../packages/core/src/index.js';
import * as runtime from '../../packages/runtime/src/index.js';

export type ModuleExports = Record<string, unknown>;

export interface GeneratedCodec {
  files: ReadonlyMap<string, string>;
  types: ModuleExports;
  jsonization: ModuleExports;
}

const REPO_ROOT = fileURLToPath(new URL('../../', import.meta.url));
const RUNTIME_ENTRY = path.join(REPO_ROOT, 'packages', 'runtime', 'src', 'index.ts');

export function readFixture(name: string): unknown {
  const file = new URL(`../fixtures/${name}`, import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return parsed;
}

/**
 * Run the TypeScript emitter; diagnostics fail the calling test
 */
export function generateTypeScriptFiles(
  document: unknown,
  options: CodegenOptions = {},
  snippets?: Snippets
): ReadonlyMap<string, string> {
  const result = generateFromDocument(document, CORE_EMITTERS.typescript, options, snippets);
  if (result.isErr()) {
    throw new Error(`Generation failed:\n${result.error.join('\n')}`);
  }
  return result.value;
}

function fileOf(files: ReadonlyMap<string, string>, name: string): string {
  const content = files.get(name);
  if (content === undefined) {
    throw new Error(`The emitter produced no ${name}`);
  }
  return content;
}

function evaluate(
  fileName: string,
  source: string,
  dependencies: Readonly<Record<string, unknown>>
): ModuleExports {
  const { outputText } = ts.transpileModule(source, {
    fileName,
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2022,
    },
  });

  const moduleExports: ModuleExports = {};
  const moduleObject = { exports: moduleExports };
  const requireDependency = (specifier: string): unknown => {
    if (!(specifier in dependencies)) {
      throw new Error(`${fileName} imports unexpected module ${specifier}`);
    }
    return dependencies[specifier];
  };

  const factory: unknown = vm.runInThisContext(
    `(function (exports, require, module) {\n${outputText}\n})`,
    { filename: fileName }
  );
  if (typeof factory !== 'function') {
    throw new Error(`Could not evaluate ${fileName}`);
  }
  Reflect.apply(factory, undefined, [moduleExports, requireDependency, moduleObject]);
  return moduleObject.exports;
}

export function loadCodec(
  files: ReadonlyMap<string, string>,
  options: CodegenOptions = {}
): GeneratedCodec {
  const runtimeModule = options.typescript?.runtimeModule ?? '@metacodec/runtime';
  const typesModule = options.typescript?.typesModule ?? './types.js';

  const types = evaluate('types.ts', fileOf(files, 'types.ts'), {});
  const jsonization = evaluate('jsonization.ts', fileOf(files, 'jsonization.ts'), {
    [runtimeModule]: runtime,
    [typesModule]: types,
  });
  return { files, types, jsonization };
}

export function compileCodec(document: unknown, options: CodegenOptions = {}): GeneratedCodec {
  return loadCodec(generateTypeScriptFiles(document, options), options);
}

/**
 * Type-check the generated files under `strict` against the runtime
 * sources; returns the compiler messages
 */
export function typeCheck(files: ReadonlyMap<string, string>): string[] {
  const dir = mkdtempSync(path.join(tmpdir(), 'metacodec-'));
  try {
    const roots: string[] = [];
    for (const [name, content] of files) {
      const file = path.join(dir, name);
      writeFileSync(file, content, 'utf8');
      roots.push(file);
    }
    const program = ts.createProgram(roots, {
      strict: true,
      noEmit: true,
      skipLibCheck: true,
      target: ts.ScriptTarget.ES2022,
      lib: ['lib.es2022.d.ts'],
      module: ts.ModuleKind.ESNext,
      moduleResolution: ts.ModuleResolutionKind.Bundler,
      baseUrl: dir,
      paths: { '@metacodec/runtime': [RUNTIME_ENTRY] },
      types: ['node'],
      typeRoots: [path.join(REPO_ROOT, 'node_modules', '@types')],
    });
    return ts.getPreEmitDiagnostics(program).map((diagnostic) => {
      const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
      const file = diagnostic.file === undefined ? '' : `${path.basename(diagnostic.file.fileName)}: `;
      return `${file}${message}`;
    });
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

// Access to the untyped exports of evaluated modules

export function exportedFunction(
  moduleExports: ModuleExports,
  name: string
): (...args: unknown[]) => unknown {
  const value = moduleExports[name];
  if (typeof value !== 'function') {
    throw new Error(`${name} is not an exported function`);
  }
  return (...args: unknown[]): unknown => Reflect.apply(value, undefined, args);
}

export function exportedClass(
  moduleExports: ModuleExports,
  name: string
): (...args: unknown[]) => object {
  const value = moduleExports[name];
  if (typeof value !== 'function') {
    throw new Error(`${name} is not an exported class`);
  }
  return (...args: unknown[]): object => {
    const instance: unknown = Reflect.construct(value, args);
    if (typeof instance !== 'object' || instance === null) {
      throw new Error(`new ${name}() did not produce an object`);
    }
    return instance;
  };
}

/** Value of a generated TypeScript enum literal */
export function enumLiteral(moduleExports: ModuleExports, enumName: string, literal: string): unknown {
  const enumeration = moduleExports[enumName];
  if (typeof enumeration !== 'object' || enumeration === null || !(literal in enumeration)) {
    throw new Error(`${enumName}.${literal} is not exported`);
  }
  const value: unknown = Reflect.get(enumeration, literal);
  return value;
}

/** Capture what a facade throws */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
