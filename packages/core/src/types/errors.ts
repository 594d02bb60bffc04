/**
 * Error hierarchy for metacodec
 * Provides structured error handling with context for the CLI boundary
 */

import { ErrorCode, getExitCode } from '../errors/codes.js';
import { formatDiagnostic, type Diagnostic } from '../diag/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  file?: string; // Input file the error is about
  subject?: string; // Model element, e.g. 'Circle.radius'
  setting?: string; // Option name for configuration errors
  suggestion?: string;
  [key: string]: unknown;
}

export interface MetacodecErrorParams {
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all metacodec errors
 */
export abstract class MetacodecError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: MetacodecErrorParams) {
    const { message, errorCode, context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Diagnostics carried by the error, if any */
  get diagnostics(): readonly Diagnostic[] {
    return [];
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return getExitCode(this.errorCode);
  }
}

function summarize(prefix: string, diagnostics: readonly Diagnostic[]): string {
  const lines = diagnostics.map((d) => `  - ${formatDiagnostic(d)}`);
  return [`${prefix} (${diagnostics.length} problem(s)):`, ...lines].join(
    '\n'
  );
}

/**
 * The meta-model file is malformed or does not resolve
 */
export class ModelError extends MetacodecError {
  readonly #diagnostics: readonly Diagnostic[];

  constructor(params: {
    diagnostics: readonly Diagnostic[];
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: summarize('The meta-model is invalid', params.diagnostics),
      errorCode: params.errorCode ?? ErrorCode.MODEL_RESOLUTION_FAILED,
      context: params.context,
      cause: params.cause,
    });
    this.#diagnostics = params.diagnostics;
  }

  override get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }
}

/**
 * Code generation was refused because of generation-time diagnostics;
 * nothing has been written.
 */
export class GenerationFailedError extends MetacodecError {
  readonly #diagnostics: readonly Diagnostic[];

  constructor(params: {
    diagnostics: readonly Diagnostic[];
    context?: ErrorContext;
  }) {
    const onlyMissingSnippets = params.diagnostics.every(
      (d) => d.code === 'MISSING_SNIPPET'
    );
    super({
      message: summarize('Code generation failed', params.diagnostics),
      errorCode: onlyMissingSnippets
        ? ErrorCode.MISSING_SNIPPET
        : ErrorCode.GENERATION_FAILED,
      context: onlyMissingSnippets
        ? { suggestion: 'Add the missing files to the snippets directory', ...params.context }
        : params.context,
    });
    this.#diagnostics = params.diagnostics;
  }

  override get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends MetacodecError {
  constructor(params: {
    message: string;
    setting?: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { setting: params.setting, ...(params.context ?? {}) },
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Input files that can not be read or are not JSON
 */
export class InputError extends MetacodecError {
  constructor(params: { message: string; file?: string; cause?: Error }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INPUT_ERROR,
      context: { file: params.file },
      cause: params.cause,
    });
  }
}

/**
 * Errors that indicate a defect in metacodec itself
 */
export class InternalError extends MetacodecError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isMetacodecError(error: unknown): error is MetacodecError {
  return error instanceof MetacodecError;
}
