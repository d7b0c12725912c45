/**
 * SDL Parser
 *
 * Two passes:
 * 1. `parseDocument` - tokenizes with the graphql lexer and runs a
 *    recursive-descent parser over the supported grammar:
 *
 *      Document    := Definition* EOF
 *      Definition  := Description? (TypeDef | EnumDef | ScalarDef | SchemaDef)
 *      TypeDef     := "type" Name "{" FieldDef+ "}"
 *      FieldDef    := Description? Name ":" TypeRef
 *      TypeRef     := (Name | "[" TypeRef "]") "!"?
 *      EnumDef     := "enum" Name "{" (Description? Name)+ "}"
 *      ScalarDef   := "scalar" Name
 *      SchemaDef   := "schema" "{" "query" ":" Name "}"
 *
 * 2. `buildSchemaModel` - collects every declaration across documents, then
 *    resolves references against the complete table. Forward, self and
 *    mutual references are therefore legal.
 *
 * Syntax errors stop the parse at the first one. Semantic errors are
 * collected and thrown together once both passes are done.
 */

import { GraphQLError, Lexer, Source, TokenKind } from "graphql";

import {
  DuplicateDefinitionError,
  SchemaSyntaxError,
  SchemaValidationError,
  UnresolvedTypeError,
  formatLocation,
} from "./errors";
import {
  SchemaModel,
  isBuiltinScalar,
  listOf,
  named,
  namedType,
  nonNull,
} from "./model";

import type { Token } from "graphql";
import type { SchemaLocatedError, SourceLocation } from "./errors";
import type {
  EnumTypeDefinition,
  FieldDefinition,
  ListTypeRef,
  NamedTypeRef,
  ObjectTypeDefinition,
  ScalarTypeDefinition,
  TypeDefinition,
  TypeRef,
} from "./model";

// =============================================================================
// Document Types
// =============================================================================

/**
 * A `schema { query: Name }` block
 */
export interface SchemaDefinitionNode {
  kind: "schema";
  query: string;
  location: SourceLocation;
}

export type DefinitionNode = TypeDefinition | SchemaDefinitionNode;

/**
 * Declarations read from one schema source, before reference resolution
 */
export interface SchemaDocument {
  source?: string;
  definitions: readonly DefinitionNode[];
}

export interface ParseOptions {
  /** Label used in error locations, typically the file path */
  sourceName?: string;
}

/** Definition keywords outside the supported subset */
const unsupportedKeywords = new Set([
  "interface",
  "union",
  "input",
  "extend",
  "directive",
]);

const reservedEnumValues = new Set(["true", "false", "null"]);

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse schema text into a validated, reference-resolved model
 */
export function parseSchema(
  text: string,
  options: ParseOptions = {},
): SchemaModel {
  return buildSchemaModel([parseDocument(text, options.sourceName)]);
}

/**
 * Syntactic pass over one source
 */
export function parseDocument(text: string, sourceName?: string): SchemaDocument {
  const parser = new DocumentParser(text, sourceName);
  return { source: sourceName, definitions: parser.parseDefinitions() };
}

/**
 * Semantic pass: merge documents, detect duplicates and resolve references
 */
export function buildSchemaModel(
  documents: readonly SchemaDocument[],
): SchemaModel {
  const errors: SchemaLocatedError[] = [];
  const table = new Map<string, TypeDefinition>();
  let schemaDefinition: SchemaDefinitionNode | undefined;

  // Pass 1: collect declarations
  for (const document of documents) {
    for (const definition of document.definitions) {
      if (definition.kind === "schema") {
        if (schemaDefinition) {
          errors.push(
            new DuplicateDefinitionError(
              `Schema definition is already declared at ${formatLocation(schemaDefinition.location)}`,
              definition.location,
            ),
          );
        } else {
          schemaDefinition = definition;
        }
        continue;
      }

      if (isBuiltinScalar(definition.name)) {
        errors.push(
          new DuplicateDefinitionError(
            `Type "${definition.name}" conflicts with the builtin scalar of the same name`,
            definition.location,
          ),
        );
        continue;
      }

      const existing = table.get(definition.name);
      if (existing) {
        const previous = existing.location
          ? ` at ${formatLocation(existing.location)}`
          : "";
        errors.push(
          new DuplicateDefinitionError(
            `Type "${definition.name}" is already defined${previous}`,
            definition.location,
          ),
        );
        continue;
      }

      if (definition.kind === "object") {
        errors.push(...findDuplicateFields(definition));
      } else if (definition.kind === "enum") {
        errors.push(...findDuplicateEnumValues(definition));
      }

      table.set(definition.name, definition);
    }
  }

  // Pass 2: resolve references against the full table
  const hasType = (name: string) => isBuiltinScalar(name) || table.has(name);

  for (const type of table.values()) {
    if (type.kind !== "object") continue;
    for (const field of type.fields) {
      const target = namedType(field.type);
      if (!hasType(target)) {
        errors.push(
          new UnresolvedTypeError(
            target,
            `Unknown type "${target}" referenced by field "${type.name}.${field.name}"`,
            field.location,
          ),
        );
      }
    }
  }

  const queryType = schemaDefinition?.query ?? "Query";
  const root = table.get(queryType);
  if (!root) {
    errors.push(
      new UnresolvedTypeError(
        queryType,
        schemaDefinition
          ? `Root query type "${queryType}" is not defined`
          : `No root query type: declare "type Query" or a "schema { query: ... }" block`,
        schemaDefinition?.location,
      ),
    );
  } else if (root.kind !== "object") {
    errors.push(
      new UnresolvedTypeError(
        queryType,
        `Root query type "${queryType}" must be an object type, found ${root.kind}`,
        schemaDefinition?.location ?? root.location,
      ),
    );
  }

  const [first] = errors;
  if (first) {
    throw errors.length === 1 ? first : new SchemaValidationError(errors);
  }

  return new SchemaModel(table.values(), queryType);
}

function findDuplicateFields(
  type: ObjectTypeDefinition,
): DuplicateDefinitionError[] {
  const seen = new Set<string>();
  const errors: DuplicateDefinitionError[] = [];
  for (const field of type.fields) {
    if (seen.has(field.name)) {
      errors.push(
        new DuplicateDefinitionError(
          `Field "${type.name}.${field.name}" is defined more than once`,
          field.location,
        ),
      );
    }
    seen.add(field.name);
  }
  return errors;
}

function findDuplicateEnumValues(
  type: EnumTypeDefinition,
): DuplicateDefinitionError[] {
  const seen = new Set<string>();
  const errors: DuplicateDefinitionError[] = [];
  for (const value of type.values) {
    if (seen.has(value)) {
      errors.push(
        new DuplicateDefinitionError(
          `Enum value "${type.name}.${value}" is defined more than once`,
          type.location,
        ),
      );
    }
    seen.add(value);
  }
  return errors;
}

// =============================================================================
// Recursive-Descent Parser
// =============================================================================

class DocumentParser {
  private readonly lexer: Lexer;
  private readonly sourceName: string | undefined;

  constructor(text: string, sourceName?: string) {
    this.sourceName = sourceName;
    this.lexer = new Lexer(new Source(text, sourceName));
    // Move off the <SOF> token
    this.advance();
  }

  parseDefinitions(): DefinitionNode[] {
    const definitions: DefinitionNode[] = [];
    while (!this.peek(TokenKind.EOF)) {
      definitions.push(this.parseDefinition());
    }
    return definitions;
  }

  private parseDefinition(): DefinitionNode {
    const description = this.parseDescription();
    const token = this.current();

    if (token.kind !== TokenKind.NAME) {
      throw this.unexpected(token, "a type, enum, scalar or schema definition");
    }

    switch (token.value) {
      case "type":
        return this.parseObjectType(description);
      case "enum":
        return this.parseEnumType(description);
      case "scalar":
        return this.parseScalarType(description);
      case "schema":
        return this.parseSchemaDefinition();
    }

    if (unsupportedKeywords.has(token.value)) {
      throw this.syntaxError(
        `"${token.value}" definitions are not supported`,
        token,
      );
    }
    throw this.unexpected(token, "a type, enum, scalar or schema definition");
  }

  private parseObjectType(description?: string): ObjectTypeDefinition {
    const keyword = this.expectKeyword("type");
    const name = this.expectDeclaredName("type name");
    this.rejectUnsupportedSuffix(`type "${name}"`);
    this.expect(TokenKind.BRACE_L, `"{" to open type "${name}"`);

    const fields: FieldDefinition[] = [];
    while (!this.peek(TokenKind.BRACE_R)) {
      if (this.peek(TokenKind.EOF)) {
        throw this.syntaxError(
          `Unterminated type "${name}": expected "}"`,
          this.current(),
        );
      }
      fields.push(this.parseField(name));
    }
    const close = this.current();
    this.advance();

    if (fields.length === 0) {
      throw this.syntaxError(
        `Type "${name}" must declare at least one field`,
        close,
      );
    }

    return {
      kind: "object",
      name,
      fields,
      ...(description !== undefined && { description }),
      location: this.locationOf(keyword),
    };
  }

  private parseField(typeName: string): FieldDefinition {
    const description = this.parseDescription();
    const token = this.current();
    if (token.kind !== TokenKind.NAME) {
      throw this.unexpected(token, `a field name in type "${typeName}"`);
    }
    this.rejectIntrospectionName(token);
    const name = token.value;
    this.advance();

    if (this.peek(TokenKind.PAREN_L)) {
      throw this.syntaxError(
        `Field arguments are not supported ("${typeName}.${name}")`,
        this.current(),
      );
    }
    this.expect(TokenKind.COLON, `":" after field "${typeName}.${name}"`);
    const type = this.parseTypeRef();
    this.rejectUnsupportedSuffix(`field "${typeName}.${name}"`);

    return {
      name,
      type,
      ...(description !== undefined && { description }),
      location: this.locationOf(token),
    };
  }

  private parseTypeRef(): TypeRef {
    let inner: NamedTypeRef | ListTypeRef;
    const token = this.current();

    if (token.kind === TokenKind.BRACKET_L) {
      this.advance();
      const ofType = this.parseTypeRef();
      this.expect(TokenKind.BRACKET_R, `"]" to close list type`);
      inner = listOf(ofType);
    } else if (token.kind === TokenKind.NAME) {
      this.advance();
      inner = named(token.value);
    } else {
      throw this.unexpected(token, "a type");
    }

    if (this.peek(TokenKind.BANG)) {
      this.advance();
      return nonNull(inner);
    }
    return inner;
  }

  private parseEnumType(description?: string): EnumTypeDefinition {
    const keyword = this.expectKeyword("enum");
    const name = this.expectDeclaredName("enum name");
    this.rejectUnsupportedSuffix(`enum "${name}"`);
    this.expect(TokenKind.BRACE_L, `"{" to open enum "${name}"`);

    const values: string[] = [];
    while (!this.peek(TokenKind.BRACE_R)) {
      if (this.peek(TokenKind.EOF)) {
        throw this.syntaxError(
          `Unterminated enum "${name}": expected "}"`,
          this.current(),
        );
      }
      this.parseDescription();
      const token = this.current();
      if (token.kind !== TokenKind.NAME) {
        throw this.unexpected(token, `a value in enum "${name}"`);
      }
      this.rejectIntrospectionName(token);
      if (reservedEnumValues.has(token.value)) {
        throw this.syntaxError(
          `"${token.value}" cannot be used as an enum value`,
          token,
        );
      }
      values.push(token.value);
      this.advance();
      this.rejectUnsupportedSuffix(`enum value "${name}.${token.value}"`);
    }
    const close = this.current();
    this.advance();

    if (values.length === 0) {
      throw this.syntaxError(
        `Enum "${name}" must declare at least one value`,
        close,
      );
    }

    return {
      kind: "enum",
      name,
      values,
      ...(description !== undefined && { description }),
      location: this.locationOf(keyword),
    };
  }

  private parseScalarType(description?: string): ScalarTypeDefinition {
    const keyword = this.expectKeyword("scalar");
    const name = this.expectDeclaredName("scalar name");
    this.rejectUnsupportedSuffix(`scalar "${name}"`);
    return {
      kind: "scalar",
      name,
      ...(description !== undefined && { description }),
      location: this.locationOf(keyword),
    };
  }

  private parseSchemaDefinition(): SchemaDefinitionNode {
    const keyword = this.expectKeyword("schema");
    this.expect(TokenKind.BRACE_L, `"{" to open schema definition`);

    let query: string | undefined;
    while (!this.peek(TokenKind.BRACE_R)) {
      const token = this.current();
      if (token.kind !== TokenKind.NAME) {
        throw this.unexpected(token, "a root operation type");
      }
      if (token.value === "mutation" || token.value === "subscription") {
        throw this.syntaxError(
          `Only the query root operation is supported, found "${token.value}"`,
          token,
        );
      }
      if (token.value !== "query") {
        throw this.unexpected(token, `"query"`);
      }
      this.advance();
      this.expect(TokenKind.COLON, `":" after "query"`);
      const typeName = this.expectName("root query type name");
      if (query !== undefined) {
        throw new DuplicateDefinitionError(
          `Root query type is declared more than once in schema definition`,
          this.locationOf(token),
        );
      }
      query = typeName;
    }
    this.advance();

    if (query === undefined) {
      throw this.syntaxError(
        `Schema definition must declare a query root type`,
        keyword,
      );
    }

    return { kind: "schema", query, location: this.locationOf(keyword) };
  }

  private parseDescription(): string | undefined {
    const token = this.current();
    if (
      token.kind === TokenKind.STRING ||
      token.kind === TokenKind.BLOCK_STRING
    ) {
      this.advance();
      return token.value;
    }
    return undefined;
  }

  /**
   * Directives and implemented interfaces are outside the supported subset;
   * name them explicitly instead of reporting a bare unexpected token.
   */
  private rejectUnsupportedSuffix(subject: string): void {
    const token = this.current();
    if (token.kind === TokenKind.AT) {
      throw this.syntaxError(`Directives are not supported (${subject})`, token);
    }
    if (token.kind === TokenKind.NAME && token.value === "implements") {
      throw this.syntaxError(`Interfaces are not supported (${subject})`, token);
    }
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private current(): Token {
    return this.lexer.token;
  }

  private peek(kind: TokenKind): boolean {
    return this.lexer.token.kind === kind;
  }

  private advance(): Token {
    try {
      return this.lexer.advance();
    } catch (error) {
      if (error instanceof GraphQLError) {
        const [location] = error.locations ?? [];
        throw new SchemaSyntaxError(
          error.message.replace(/^Syntax Error: /, ""),
          {
            source: this.sourceName,
            line: location?.line ?? this.lexer.token.line,
            column: location?.column ?? this.lexer.token.column,
          },
          { cause: error },
        );
      }
      throw error;
    }
  }

  private expect(kind: TokenKind, expected: string): Token {
    const token = this.current();
    if (token.kind !== kind) {
      throw this.unexpected(token, expected);
    }
    this.advance();
    return token;
  }

  private expectKeyword(keyword: string): Token {
    const token = this.current();
    if (token.kind !== TokenKind.NAME || token.value !== keyword) {
      throw this.unexpected(token, `"${keyword}"`);
    }
    this.advance();
    return token;
  }

  private expectName(expected: string): string {
    const token = this.current();
    if (token.kind !== TokenKind.NAME) {
      throw this.unexpected(token, expected);
    }
    this.advance();
    return token.value;
  }

  private expectDeclaredName(expected: string): string {
    this.rejectIntrospectionName(this.current());
    return this.expectName(expected);
  }

  /**
   * Names starting with "__" belong to GraphQL introspection
   */
  private rejectIntrospectionName(token: Token): void {
    if (token.kind === TokenKind.NAME && token.value.startsWith("__")) {
      throw this.syntaxError(
        `"${token.value}" is reserved: names cannot start with "__"`,
        token,
      );
    }
  }

  private locationOf(token: Token): SourceLocation {
    return {
      ...(this.sourceName !== undefined && { source: this.sourceName }),
      line: token.line,
      column: token.column,
    };
  }

  private syntaxError(detail: string, token: Token): SchemaSyntaxError {
    return new SchemaSyntaxError(detail, this.locationOf(token));
  }

  private unexpected(token: Token, expected: string): SchemaSyntaxError {
    return this.syntaxError(
      `Expected ${expected}, found ${describeToken(token)}`,
      token,
    );
  }
}

/**
 * Human-readable description of a token for error messages
 */
function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.EOF:
      return "end of input";
    case TokenKind.NAME:
      return `"${token.value}"`;
    case TokenKind.STRING:
    case TokenKind.BLOCK_STRING:
      return "string";
    case TokenKind.INT:
    case TokenKind.FLOAT:
      return `number ${token.value}`;
    default:
      return `"${token.kind}"`;
  }
}
