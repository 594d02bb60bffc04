/**
 * Turns a MetacodecError into what the CLI prints. Holds no generation logic.
 */

import { formatDiagnostic } from '../diag/codes.js';
import type { ErrorCode } from './codes.js';
import type { MetacodecError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  exitCode: number;
  location?: string;
  /** One formatted line per diagnostic */
  details: string[];
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

function envFlag(name: string): boolean {
  const value = process.env[name];
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: MetacodecError): CLIErrorView {
    const context = error.context;
    const where = context?.file ?? context?.setting ?? context?.subject;
    // Diagnostics are listed separately, so only the first line is the title
    const [headline = error.message] = error.message.split('\n');
    return {
      title: `Error ${error.errorCode}: ${headline}`,
      code: error.errorCode,
      exitCode: error.getExitCode(),
      location: where !== undefined && where !== '' ? `Location: ${where}` : undefined,
      details: error.diagnostics.map(formatDiagnostic),
      workaround: context?.suggestion,
      colors: this.useColors(),
      terminalWidth: this.options.terminalWidth ?? process.stdout.columns ?? 80,
    };
  }

  private useColors(): boolean {
    if (envFlag('NO_COLOR')) return false;
    if (envFlag('FORCE_COLOR')) return true;
    return this.options.colors ?? this.env === 'dev';
  }
}
