/**
 * Error taxonomy for qselect
 *
 * Every error raised by the parser, the codegen engine, the orchestrator and
 * the runtime extends `QselectError` and carries a stable `code`.
 */

export type QselectErrorCode =
  | "SYNTAX"
  | "DUPLICATE_DEFINITION"
  | "UNRESOLVED_TYPE"
  | "SCHEMA_VALIDATION"
  | "INVARIANT_VIOLATION"
  | "CODEGEN_OUTPUT"
  | "CONFIG"
  | "SELECTION"
  | "RESPONSE_SHAPE";

/**
 * Position of a token in a schema source
 */
export interface SourceLocation {
  /** File name or label of the schema source, when known */
  source?: string;
  /** 1-indexed line */
  line: number;
  /** 1-indexed column */
  column: number;
}

/**
 * Format a location as `source:line:column` (or `line:column` without a source)
 */
export function formatLocation(location: SourceLocation): string {
  const position = `${location.line}:${location.column}`;
  return location.source ? `${location.source}:${position}` : position;
}

export class QselectError extends Error {
  readonly code: QselectErrorCode;

  constructor(code: QselectErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Base for errors that point at a place in the schema text
 */
export class SchemaLocatedError extends QselectError {
  readonly location: SourceLocation | undefined;
  /** The message without the location suffix */
  readonly detail: string;

  constructor(
    code: QselectErrorCode,
    detail: string,
    location?: SourceLocation,
    options?: ErrorOptions,
  ) {
    super(
      code,
      location ? `${detail} (${formatLocation(location)})` : detail,
      options,
    );
    this.detail = detail;
    this.location = location;
  }
}

/**
 * Malformed schema text
 */
export class SchemaSyntaxError extends SchemaLocatedError {
  constructor(detail: string, location: SourceLocation, options?: ErrorOptions) {
    super("SYNTAX", detail, location, options);
  }
}

/**
 * A type, field, enum value or schema block declared twice
 */
export class DuplicateDefinitionError extends SchemaLocatedError {
  constructor(detail: string, location?: SourceLocation) {
    super("DUPLICATE_DEFINITION", detail, location);
  }
}

/**
 * A type reference naming a type that is never declared
 */
export class UnresolvedTypeError extends SchemaLocatedError {
  readonly typeName: string;

  constructor(typeName: string, detail: string, location?: SourceLocation) {
    super("UNRESOLVED_TYPE", detail, location);
    this.typeName = typeName;
  }
}

/**
 * Several semantic errors found in one parse
 */
export class SchemaValidationError extends QselectError {
  readonly errors: readonly SchemaLocatedError[];

  constructor(errors: readonly SchemaLocatedError[]) {
    super(
      "SCHEMA_VALIDATION",
      `Schema has ${errors.length} errors:\n${errors
        .map((e) => `  - ${e.message}`)
        .join("\n")}`,
    );
    this.errors = errors;
  }
}

/**
 * The codegen engine met a model that breaks the parser's guarantees.
 * Reaching this is a bug, not a user error.
 */
export class InvariantViolation extends QselectError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", `Internal error: ${message}`);
  }
}

/**
 * Writing generated output failed
 */
export class CodegenOutputError extends QselectError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("CODEGEN_OUTPUT", `Failed to write ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

/**
 * Missing or invalid configuration
 */
export class ConfigError extends QselectError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

/**
 * Message for an unknown thrown value, as the CLI and plugin report it
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
