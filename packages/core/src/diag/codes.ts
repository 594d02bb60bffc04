/**
 * Diagnostic codes reported while loading a meta-model and while
 * generating code from it. Both phases collect every problem before
 * reporting, so a single run shows the complete list.
 */

export const DIAGNOSTIC_PHASES = {
  MODEL: 'model',
  GENERATE: 'generate',
} as const;

export type DiagnosticPhase =
  (typeof DIAGNOSTIC_PHASES)[keyof typeof DIAGNOSTIC_PHASES];

export const DIAGNOSTIC_CODES = {
  // model phase
  MODEL_SCHEMA_VIOLATION: 'MODEL_SCHEMA_VIOLATION',
  INVALID_IDENTIFIER: 'INVALID_IDENTIFIER',
  DUPLICATE_NAME: 'DUPLICATE_NAME',
  UNKNOWN_TYPE: 'UNKNOWN_TYPE',
  INVALID_TYPE_ANNOTATION: 'INVALID_TYPE_ANNOTATION',
  INVALID_PARENT: 'INVALID_PARENT',
  INHERITANCE_CYCLE: 'INHERITANCE_CYCLE',
  CONSTRUCTOR_MISMATCH: 'CONSTRUCTOR_MISMATCH',
  NO_IMPLEMENTERS: 'NO_IMPLEMENTERS',
  UNRESOLVED_REFERENCE: 'UNRESOLVED_REFERENCE',
  JSON_NAME_COLLISION: 'JSON_NAME_COLLISION',
  INVALID_DEFAULT: 'INVALID_DEFAULT',
  // generate phase
  MISSING_SNIPPET: 'MISSING_SNIPPET',
  ARGUMENT_TYPE_MISMATCH: 'ARGUMENT_TYPE_MISMATCH',
  INVALID_SNIPPET: 'INVALID_SNIPPET',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

const PHASE_BY_CODE: Record<DiagnosticCode, DiagnosticPhase> = {
  MODEL_SCHEMA_VIOLATION: DIAGNOSTIC_PHASES.MODEL,
  INVALID_IDENTIFIER: DIAGNOSTIC_PHASES.MODEL,
  DUPLICATE_NAME: DIAGNOSTIC_PHASES.MODEL,
  UNKNOWN_TYPE: DIAGNOSTIC_PHASES.MODEL,
  INVALID_TYPE_ANNOTATION: DIAGNOSTIC_PHASES.MODEL,
  INVALID_PARENT: DIAGNOSTIC_PHASES.MODEL,
  INHERITANCE_CYCLE: DIAGNOSTIC_PHASES.MODEL,
  CONSTRUCTOR_MISMATCH: DIAGNOSTIC_PHASES.MODEL,
  NO_IMPLEMENTERS: DIAGNOSTIC_PHASES.MODEL,
  UNRESOLVED_REFERENCE: DIAGNOSTIC_PHASES.MODEL,
  JSON_NAME_COLLISION: DIAGNOSTIC_PHASES.MODEL,
  INVALID_DEFAULT: DIAGNOSTIC_PHASES.MODEL,
  MISSING_SNIPPET: DIAGNOSTIC_PHASES.GENERATE,
  ARGUMENT_TYPE_MISMATCH: DIAGNOSTIC_PHASES.GENERATE,
  INVALID_SNIPPET: DIAGNOSTIC_PHASES.GENERATE,
};

export function getDiagnosticPhase(code: DiagnosticCode): DiagnosticPhase {
  return PHASE_BY_CODE[code];
}

export interface Diagnostic {
  code: DiagnosticCode;
  phase: DiagnosticPhase;
  /** Model element the problem is about, e.g. `Circle.radius` */
  subject: string;
  message: string;
}

export function createDiagnostic(
  code: DiagnosticCode,
  subject: string,
  message: string
): Diagnostic {
  return { code, phase: getDiagnosticPhase(code), subject, message };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.code} ${diagnostic.subject}: ${diagnostic.message}`;
}
