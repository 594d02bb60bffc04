// @metacodec/core entry point
//
// Public API:
// - High-level entry points via ./api.js: readModelFile(), compileModel(), generate()
//   and the emitters of the code targets (CORE_EMITTERS). The CLI composes these with
//   the documentation emitters of @metacodec/docs.
// - Building blocks for other emitters: the resolved model, naming rules, the
//   annotation resolver, EmitContext and snippets.
//
// NOTE: When changing the shape or defaults of the entry points exported from ./api.js,
// update the CLI commands so flags and behavior stay in sync.

export * from './api.js';

// Resolved model
export * from './model/types.js';
export {
  loadModel,
  type LoadOptions,
  type RawModel,
  type RawNamedType,
  type RawEnumeration,
  type RawConstrainedPrimitive,
  type RawClass,
  type RawProperty,
  type RawArgument,
} from './model/loader.js';
export { parseAnnotation } from './model/annotation.js';
export { paragraphText } from './model/description.js';

// Naming rules
export {
  capitalCamelCase,
  lowerCamelCase,
  jsonProperty,
  jsonModelType,
  tsNaming,
  anchorOf,
} from './naming/naming.js';

// Code generation
export {
  EmitContext,
  type GeneratedFile,
  type GenerationResult,
} from './codegen/context.js';
export {
  assertNever,
  resolveAtomic,
  resolveStrategy,
  type AtomicStrategy,
  type PropertyStrategy,
  type Shape,
} from './codegen/resolver.js';
export {
  loadSnippets,
  snippetKeys,
  NO_SNIPPETS,
  type ImplementationKey,
  type Snippets,
} from './codegen/snippets.js';
export { verifyConstructors } from './codegen/verify.js';
export { generateTypeScript } from './codegen/typescript/index.js';
export {
  generateJsonSchema,
  buildJsonSchema,
  choiceName,
  JSON_SCHEMA_DIALECT,
  type SchemaNode,
} from './codegen/jsonschema/generate.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  MetacodecError,
  ModelError,
  GenerationFailedError,
  ConfigError,
  InputError,
  InternalError,
  isMetacodecError,
  type ErrorContext,
} from './types/errors.js';
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  type Result,
} from './types/result.js';

// Diagnostics
export {
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_PHASES,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticPhase,
  createDiagnostic,
  formatDiagnostic,
  getDiagnosticPhase,
} from './diag/codes.js';

// Options
export {
  resolveOptions,
  DEFAULT_OPTIONS,
  type CodegenOptions,
  type ResolvedOptions,
  type JsonizationOptions,
  type EmitOptions,
  type TypeScriptOptions,
  type DocsOptions,
} from './types/options.js';
