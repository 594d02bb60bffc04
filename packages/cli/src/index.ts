#!/usr/bin/env node

// CLI entry point
// - Command name: `metacodec` with subcommands `generate` and `check`.
// - `generate` loads a meta-model, runs one target (typescript, jsonschema, markdown, html)
//   and writes its files to --output; nothing is written when any diagnostic is reported.
// - `check` runs every target without writing and lists all diagnostics, or prints `ok`.

import { Command } from 'commander';
import fs from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ErrorPresenter,
  InternalError,
  GenerationFailedError,
  NO_SNIPPETS,
  compileModelOrThrow,
  formatDiagnostic,
  generate,
  isMetacodecError,
  loadSnippets,
  readModelFile,
  resolveOptions,
  type Diagnostic,
  type GeneratedFile,
  type MetacodecError,
  type Snippets,
} from '@metacodec/core';
import { renderCLIView } from './render.js';
import {
  TARGET_NAMES,
  parseCodegenOptions,
  resolveTarget,
  type CliOptions,
} from './flags.js';
import { EMITTERS } from './targets.js';

const program = new Command();

program
  .name('metacodec')
  .description('Generate typed data structures and JSON codecs from a meta-model')
  .version('0.1.0');

function log(message: string): void {
  process.stderr.write(`[metacodec] ${message}\n`);
}

async function readSnippets(dir: string | undefined): Promise<Snippets> {
  return dir === undefined
    ? NO_SNIPPETS
    : loadSnippets(path.resolve(process.cwd(), dir));
}

async function writeFiles(
  outDir: string,
  files: readonly GeneratedFile[],
  verbose: boolean
): Promise<void> {
  for (const file of files) {
    const target = path.join(outDir, ...file.path.split('/'));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, file.content, 'utf8');
    if (verbose) {
      log(`wrote ${target}`);
    }
  }
}

program
  .command('generate')
  .description('Generate the files of one target from a meta-model')
  .requiredOption('-m, --model <file>', 'Meta-model file (JSON)')
  .option(
    '-t, --target <target>',
    `Target: ${TARGET_NAMES.join('|')}`,
    'typescript'
  )
  .requiredOption('-o, --output <dir>', 'Output directory')
  .option('--snippets <dir>', 'Directory of implementation-specific snippets')
  .option('--discriminator-key <key>', 'JSON property naming the concrete class')
  .option('--indent <n>', 'Indentation: number of spaces or "tab"')
  .option('--runtime-module <specifier>', 'Module the generated codec imports its runtime from')
  .option('--types-module <specifier>', 'Specifier of the generated types module')
  .option('--title <title>', 'Title of the rendered documentation')
  .option('--verbose', 'Print effective configuration and written files to stderr')
  .action(async function (this: Command) {
    try {
      const options = this.opts<CliOptions>();
      const modelPath = options.model;
      const outputDir = options.output;
      if (modelPath === undefined) {
        throw new ConfigError({ message: 'Missing --model <file>', setting: 'model' });
      }
      if (outputDir === undefined) {
        throw new ConfigError({ message: 'Missing --output <dir>', setting: 'output' });
      }
      const verbose = options.verbose === true;

      const target = resolveTarget(options.target);
      const resolvedOptions = resolveOptions(parseCodegenOptions(options));

      // Print effective configuration if requested
      if (verbose) {
        log(`target: ${target}`);
        log(`effective config: ${JSON.stringify(resolvedOptions, null, 2)}`);
      }

      const document = await readModelFile(path.resolve(process.cwd(), modelPath));
      const table = compileModelOrThrow(document, resolvedOptions);
      const snippets = await readSnippets(options.snippets);

      const result = generate(table, EMITTERS[target], resolvedOptions, snippets);
      if (result.isErr()) {
        throw new GenerationFailedError({ diagnostics: result.error });
      }

      await writeFiles(path.resolve(process.cwd(), outputDir), result.value, verbose);
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

program
  .command('check')
  .description('Run every target without writing and report all diagnostics')
  .requiredOption('-m, --model <file>', 'Meta-model file (JSON)')
  .option('--snippets <dir>', 'Directory of implementation-specific snippets')
  .option('--discriminator-key <key>', 'JSON property naming the concrete class')
  .action(async function (this: Command) {
    try {
      const options = this.opts<CliOptions>();
      const modelPath = options.model;
      if (modelPath === undefined) {
        throw new ConfigError({ message: 'Missing --model <file>', setting: 'model' });
      }

      const resolvedOptions = resolveOptions(parseCodegenOptions(options));
      const document = await readModelFile(path.resolve(process.cwd(), modelPath));
      const table = compileModelOrThrow(document, resolvedOptions);
      const snippets = await readSnippets(options.snippets);

      // Constructor checks run for every target; report each problem once
      const seen = new Set<string>();
      const diagnostics: Diagnostic[] = [];
      for (const target of TARGET_NAMES) {
        const result = generate(table, EMITTERS[target], resolvedOptions, snippets);
        if (result.isOk()) continue;
        for (const diagnostic of result.error) {
          const key = formatDiagnostic(diagnostic);
          if (!seen.has(key)) {
            seen.add(key);
            diagnostics.push(diagnostic);
          }
        }
      }
      if (diagnostics.length > 0) {
        throw new GenerationFailedError({ diagnostics });
      }

      process.stdout.write('ok\n');
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: MetacodecError;
  if (isMetacodecError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(
      message || 'Unexpected error',
      err instanceof Error ? err : undefined
    );
  }

  const view = presenter.formatForCLI(error);
  for (const line of view.details) {
    log(line);
  }
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
