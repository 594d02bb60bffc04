/**
 * Error Code Infrastructure
 * Stable error codes and process exit codes.
 */

// Stable error codes grouped by domain
export enum ErrorCode {
  // Model Errors (E001–E099)
  INVALID_MODEL_STRUCTURE = 'E010',
  MODEL_RESOLUTION_FAILED = 'E011',

  // Generation Errors (E100–E199)
  GENERATION_FAILED = 'E100',
  MISSING_SNIPPET = 'E101',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Input Errors (E400–E499)
  INPUT_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_MODEL_STRUCTURE]: 20,
  [ErrorCode.MODEL_RESOLUTION_FAILED]: 21,
  [ErrorCode.GENERATION_FAILED]: 30,
  [ErrorCode.MISSING_SNIPPET]: 31,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INPUT_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
