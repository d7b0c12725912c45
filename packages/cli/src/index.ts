// Public API for qselect

// =============================================================================
// Config Helpers
// =============================================================================

export { defineConfig } from "./core/config";

// =============================================================================
// Programmatic Generation
// =============================================================================

export { generate, generateFile } from "./core/generator";
export {
  DEFAULT_RUNTIME_MODULE,
  generateSelectionModule,
} from "./generators/selection";

// =============================================================================
// Schema Parsing
// =============================================================================

export { buildSchemaModel, parseDocument, parseSchema } from "./core/parser";
export { loadSchemaFromFiles } from "./core/schema";
export {
  SchemaModel,
  isBuiltinScalar,
  listOf,
  named,
  namedType,
  nonNull,
} from "./core/model";

// =============================================================================
// Errors
// =============================================================================

export {
  CodegenOutputError,
  ConfigError,
  DuplicateDefinitionError,
  InvariantViolation,
  QselectError,
  SchemaSyntaxError,
  SchemaValidationError,
  UnresolvedTypeError,
} from "./core/errors";

// =============================================================================
// Config Loading (for advanced usage)
// =============================================================================

export { configSchema, loadQselectConfig } from "./core/config";

// =============================================================================
// Logger Utilities (for custom integrations)
// =============================================================================

export {
  createConsolaLogger,
  createSilentLogger,
  createViteLogger,
} from "./utils/logger";

// =============================================================================
// Types
// =============================================================================

export type {
  OverridesConfig,
  QselectConfig,
  QselectConfigInput,
  SourceConfig,
} from "./core/config";
export type { QselectErrorCode, SourceLocation } from "./core/errors";
export type {
  GenerateFileOptions,
  GenerateFileResult,
  GenerateOptions,
  GenerateResult,
} from "./core/generator";
export type {
  EnumTypeDefinition,
  FieldDefinition,
  ObjectTypeDefinition,
  ScalarTypeDefinition,
  ScalarTypeName,
  TypeDefinition,
  TypeRef,
} from "./core/model";
export type { ParseOptions, SchemaDocument } from "./core/parser";
export type { SelectionGeneratorOptions } from "./generators/selection";
export type { LogSummary, QselectLogger, ViteLoggerLike } from "./utils/logger";
