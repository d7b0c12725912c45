// ============================================================================
// Generated Identifier Names
// ============================================================================

/**
 * Words that cannot name a value binding in a module
 */
const reservedWords = new Set([
  "await",
  "break",
  "case",
  "catch",
  "class",
  "const",
  "continue",
  "debugger",
  "default",
  "delete",
  "do",
  "else",
  "enum",
  "export",
  "extends",
  "false",
  "finally",
  "for",
  "function",
  "if",
  "implements",
  "import",
  "in",
  "instanceof",
  "interface",
  "let",
  "new",
  "null",
  "package",
  "private",
  "protected",
  "public",
  "return",
  "static",
  "super",
  "switch",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "var",
  "void",
  "while",
  "with",
  "yield",
]);

/**
 * Names TypeScript keeps for its own types; a type alias cannot use them
 */
const predefinedTypeNames = new Set([
  "any",
  "bigint",
  "boolean",
  "never",
  "number",
  "object",
  "string",
  "symbol",
  "undefined",
  "unknown",
]);

/**
 * Value bindings a module cannot declare: strict mode forbids the first two,
 * TypeScript reserves the others for its globals
 */
const restrictedValueNames = new Set([
  "arguments",
  "eval",
  "globalThis",
  "undefined",
]);

/**
 * Identifiers the generated module declares for the query root
 */
export const rootHelperNames = {
  query: "query",
  request: "queryRequest",
  response: "QueryResponse",
  rootType: "rootQueryType",
} as const;

/**
 * One declaration space of the generated module. TypeScript keeps values and
 * types apart, so `const X` and `type X` do not clash, but two of either do.
 */
export class IdentifierScope {
  private readonly taken = new Set<string>();

  constructor(private readonly reserved: ReadonlySet<string>) {}

  isFree(name: string): boolean {
    return !this.reserved.has(name) && !this.taken.has(name);
  }

  /**
   * Claim `base`, appending `_` until the name is free
   */
  claim(base: string): string {
    let name = base;
    while (!this.isFree(name)) {
      name = `${name}_`;
    }
    this.taken.add(name);
    return name;
  }

  /**
   * Claim a group of names. Names that are free as written are claimed
   * first, so a suffixed name never displaces one that needed no suffix.
   */
  claimAll(bases: ReadonlyMap<string, string>): Map<string, string> {
    const claimed = new Map<string, string>();
    for (const [key, base] of bases) {
      if (this.isFree(base)) {
        claimed.set(key, this.claim(base));
      }
    }
    for (const [key, base] of bases) {
      if (!claimed.has(key)) {
        claimed.set(key, this.claim(base));
      }
    }
    return claimed;
  }
}

/**
 * Every top-level identifier a generated module declares, keyed by the
 * schema type it belongs to
 */
export interface ModuleNames {
  /** Field-token object of an object type */
  tokens: ReadonlyMap<string, string>;
  /** Selection builder alias of an object type */
  selectionTypes: ReadonlyMap<string, string>;
  /** Function starting an empty selection on an object type */
  selectFunctions: ReadonlyMap<string, string>;
  /** Union type of an enum */
  enumTypes: ReadonlyMap<string, string>;
  /** `as const` tuple of an enum's values */
  enumValues: ReadonlyMap<string, string>;
  root: { [K in keyof typeof rootHelperNames]: string };
}

/**
 * Assign every identifier of a generated module, deconflicted across types.
 *
 * Claim order: root helpers, then the names written as in the schema (field
 * tokens and enum types), then derived names. Within a group, names follow
 * the order of the given type names.
 */
export function planModuleNames(
  objectTypeNames: readonly string[],
  enumNames: readonly string[],
): ModuleNames {
  const values = new IdentifierScope(
    new Set([...reservedWords, ...restrictedValueNames]),
  );
  const types = new IdentifierScope(
    new Set([...reservedWords, ...predefinedTypeNames]),
  );

  const root = {
    query: values.claim(rootHelperNames.query),
    request: values.claim(rootHelperNames.request),
    response: types.claim(rootHelperNames.response),
    rootType: values.claim(rootHelperNames.rootType),
  };

  const derive = (names: readonly string[], toName: (name: string) => string) =>
    new Map(names.map((name) => [name, toName(name)]));

  const tokens = values.claimAll(derive(objectTypeNames, (name) => name));
  const enumTypes = types.claimAll(derive(enumNames, (name) => name));
  const selectionTypes = types.claimAll(
    derive(objectTypeNames, toSelectionTypeName),
  );
  const selectFunctions = values.claimAll(
    derive(objectTypeNames, toSelectFunctionName),
  );
  const enumValues = values.claimAll(derive(enumNames, toEnumValuesName));

  return { tokens, selectionTypes, selectFunctions, enumTypes, enumValues, root };
}

/**
 * e.g., "Episode" -> "EpisodeValues"
 */
export function toEnumValuesName(enumName: string): string {
  return `${enumName}Values`;
}

/**
 * e.g., "Character" -> "CharacterSelection"
 */
export function toSelectionTypeName(typeName: string): string {
  return `${typeName}Selection`;
}

/**
 * e.g., "Character" -> "selectCharacter"
 */
export function toSelectFunctionName(typeName: string): string {
  return `select${typeName}`;
}

// ============================================================================
// Property Naming Utilities
// ============================================================================

/**
 * Check if a property name is a valid JavaScript identifier
 * If not, it needs to be quoted in object literals
 */
export function isValidIdentifier(name: string): boolean {
  return /^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(name);
}

/**
 * Get a safe property name for use in object literals
 * Quotes the name if it's not a valid identifier
 */
export function getSafePropertyName(name: string): string {
  return isValidIdentifier(name) ? name : `"${name}"`;
}
