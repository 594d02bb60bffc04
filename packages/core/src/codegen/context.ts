import {
  createDiagnostic,
  DIAGNOSTIC_CODES,
  type Diagnostic,
  type DiagnosticCode,
} from '../diag/codes.js';
import type { SymbolTable } from '../model/types.js';
import type { ResolvedOptions } from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';
import type { ImplementationKey, Snippets } from './snippets.js';

export interface GeneratedFile {
  /** Path relative to the output directory, POSIX separators */
  path: string;
  content: string;
}

export type GenerationResult = Result<GeneratedFile[], Diagnostic[]>;

/**
 * State shared by the emitters of one target. Problems are collected
 * here instead of being thrown so that a run reports all of them.
 */
export class EmitContext {
  readonly #diagnostics: Diagnostic[] = [];

  constructor(
    readonly table: SymbolTable,
    readonly options: ResolvedOptions,
    readonly snippets: Snippets
  ) {}

  /** One level of indentation */
  get I(): string {
    return this.options.emit.indent;
  }

  get discriminatorKey(): string {
    return this.options.jsonization.discriminatorKey;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }

  report(code: DiagnosticCode, subject: string, message: string): void {
    this.#diagnostics.push(createDiagnostic(code, subject, message));
  }

  /**
   * Look up a snippet; a missing one is reported and yields null
   */
  snippet(key: ImplementationKey, subject: string): string | null {
    const text = this.snippets.get(key);
    if (text === undefined) {
      this.report(
        DIAGNOSTIC_CODES.MISSING_SNIPPET,
        subject,
        `The snippet "${key}" is missing`
      );
      return null;
    }
    return text.replace(/\s+$/, '');
  }

  finish(files: GeneratedFile[]): GenerationResult {
    return this.#diagnostics.length > 0
      ? err([...this.#diagnostics])
      : ok(files);
  }
}
