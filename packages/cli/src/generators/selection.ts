/**
 * Codegen engine: Schema Model -> selection module source
 *
 * For every object type the module exports a field-token object, a selection
 * builder alias and a function starting an empty selection. The root query
 * type additionally gets `query`, `queryRequest` and `QueryResponse`.
 *
 * Tokens carry their owner, name, list/nullability shape and value type as
 * literal types; the runtime's `SelectionBuilder.select` folds them into the
 * builder's phantom selection type, which is what makes unselected fields
 * inaccessible on the response.
 *
 * Output is a pure function of the model and options: types are emitted
 * sorted by name, fields and enum values in declaration order.
 */

import { InvariantViolation } from "@/core/errors";
import { isBuiltinScalar, namedType, printTypeRef } from "@/core/model";
import type { ModuleNames } from "@/utils/naming";
import { getSafePropertyName, planModuleNames } from "@/utils/naming";
import { UNMAPPED_SCALAR_TYPE, resolveScalars } from "@/utils/scalars";
import {
  createWriter,
  writeDocComment,
  writeHeader,
  writeSectionComment,
} from "@/utils/writer";

import type CodeBlockWriter from "code-block-writer";
import type {
  EnumTypeDefinition,
  FieldDefinition,
  ObjectTypeDefinition,
  ScalarTypeDefinition,
  SchemaModel,
  TypeRef,
} from "@/core/model";

export const DEFAULT_RUNTIME_MODULE = "qselect/runtime";

/** Namespace the runtime is imported under; `$` cannot appear in a GraphQL name */
const runtime = "$";
/** Module-private table of enum and custom scalar leaves */
const leafTable = "$leaves";

export interface SelectionGeneratorOptions {
  /** Module specifier generated code imports the runtime from */
  runtimeModule?: string;
  /** Custom scalar -> TypeScript type, merged over the defaults */
  scalars?: Record<string, string>;
}

interface GeneratorContext {
  model: SchemaModel;
  scalars: Record<string, string>;
  names: ModuleNames;
}

/**
 * Generate the selection module for a schema
 */
export function generateSelectionModule(
  model: SchemaModel,
  options: SelectionGeneratorOptions = {},
): string {
  const rootName = model.rootQueryType();
  const root = model.lookupObjectType(rootName);
  if (!root) {
    throw new InvariantViolation(
      `root query type "${rootName}" is not an object type in the model`,
    );
  }

  const enums = sortByName(model.enumTypes());
  const scalars = sortByName(model.scalarTypes());
  const objects = sortByName(model.objectTypes());

  const ctx: GeneratorContext = {
    model,
    scalars: resolveScalars(options.scalars),
    names: planModuleNames(
      objects.map((objectType) => objectType.name),
      enums.map((enumType) => enumType.name),
    ),
  };

  const writer = createWriter();
  writeHeader(writer);
  writer.writeLine(
    `import * as ${runtime} from ${JSON.stringify(options.runtimeModule ?? DEFAULT_RUNTIME_MODULE)};`,
  );
  writer.blankLine();

  if (enums.length > 0) {
    writeSectionComment(writer, "Enums");
    for (const enumType of enums) {
      writeEnum(writer, ctx, enumType);
    }
  }

  if (enums.length > 0 || scalars.length > 0) {
    writeSectionComment(writer, "Leaf Types");
    writeLeafTable(writer, ctx, enums, scalars);
  }

  for (const objectType of objects) {
    writeSectionComment(writer, objectType.name);
    writeObjectType(writer, ctx, objectType);
  }

  writeSectionComment(writer, "Query Root");
  writeRoot(writer, ctx, root);

  return writer.toString();
}

// =============================================================================
// Enums and Leaves
// =============================================================================

function writeEnum(
  writer: CodeBlockWriter,
  ctx: GeneratorContext,
  enumType: EnumTypeDefinition,
): void {
  const typeName = nameOf(ctx.names.enumTypes, enumType.name);
  const literals = enumType.values.map((value) => JSON.stringify(value));

  if (enumType.description) {
    writeDocComment(writer, enumType.description);
  }
  writer.writeLine(`export type ${typeName} = ${literals.join(" | ")};`);
  writer.blankLine();
  writer.writeLine(
    `export const ${nameOf(ctx.names.enumValues, enumType.name)} = [${literals.join(", ")}] as const;`,
  );
  writer.blankLine();
}

function writeLeafTable(
  writer: CodeBlockWriter,
  ctx: GeneratorContext,
  enums: readonly EnumTypeDefinition[],
  scalars: readonly ScalarTypeDefinition[],
): void {
  const entries = [
    ...enums.map((enumType) => ({
      name: enumType.name,
      expression: `${runtime}.leaf<${nameOf(ctx.names.enumTypes, enumType.name)}>(${JSON.stringify(enumType.name)}, ${nameOf(ctx.names.enumValues, enumType.name)})`,
    })),
    ...scalars.map((scalar) => ({
      name: scalar.name,
      expression: `${runtime}.leaf<${ctx.scalars[scalar.name] ?? UNMAPPED_SCALAR_TYPE}>(${JSON.stringify(scalar.name)})`,
    })),
  ].sort((a, b) => compareNames(a.name, b.name));

  writer.writeLine(`const ${leafTable} = {`);
  writer.indent(() => {
    for (const entry of entries) {
      writer.writeLine(`${getSafePropertyName(entry.name)}: ${entry.expression},`);
    }
  });
  writer.writeLine("};");
  writer.blankLine();
}

// =============================================================================
// Object Types
// =============================================================================

function writeObjectType(
  writer: CodeBlockWriter,
  ctx: GeneratorContext,
  objectType: ObjectTypeDefinition,
): void {
  const { name } = objectType;
  const tokensName = nameOf(ctx.names.tokens, name);
  const selectionType = nameOf(ctx.names.selectionTypes, name);

  writeDocComment(
    writer,
    objectType.description
      ? `${objectType.description}\n\nField tokens for \`${name}\`.`
      : `Field tokens for \`${name}\``,
  );
  writer.writeLine(`export const ${tokensName} = {`);
  writer.indent(() => {
    for (const field of objectType.fields) {
      if (field.description) {
        writeDocComment(writer, field.description);
      }
      writer.writeLine(
        `${getSafePropertyName(field.name)}: ${fieldTokenExpression(ctx, objectType, field)},`,
      );
    }
  });
  writer.writeLine("};");
  writer.blankLine();

  writer.writeLine(
    `export type ${selectionType}<S = ${runtime}.EmptySelection> = ${runtime}.SelectionBuilder<${JSON.stringify(name)}, S>;`,
  );
  writer.blankLine();

  writer.writeLine(
    `export function ${nameOf(ctx.names.selectFunctions, name)}(): ${selectionType} {`,
  );
  writer.indent(() => {
    writer.writeLine(`return ${runtime}.selectionOf(${JSON.stringify(name)});`);
  });
  writer.writeLine("}");
  writer.blankLine();
}

function fieldTokenExpression(
  ctx: GeneratorContext,
  owner: ObjectTypeDefinition,
  field: FieldDefinition,
): string {
  const target = namedType(field.type);
  const args = [
    JSON.stringify(owner.name),
    JSON.stringify(field.name),
    shapeExpression(field.type),
  ];

  if (isBuiltinScalar(target)) {
    return `${runtime}.scalarField(${[...args, `${runtime}.leaves.${target}`].join(", ")})`;
  }

  const definition = ctx.model.lookupType(target);
  if (!definition) {
    throw new InvariantViolation(
      `field "${owner.name}.${field.name}: ${printTypeRef(field.type)}" references unknown type "${target}"`,
    );
  }

  if (definition.kind === "object") {
    return `${runtime}.objectField(${[...args, JSON.stringify(target)].join(", ")})`;
  }
  return `${runtime}.scalarField(${[...args, `${leafTable}.${target}`].join(", ")})`;
}

/**
 * Runtime shape expression for a type reference, e.g.
 * `[Character!]` -> `$.list(true, $.named(false))`
 */
export function shapeExpression(ref: TypeRef, nullable = true): string {
  switch (ref.kind) {
    case "nonNull":
      return shapeExpression(ref.ofType, false);
    case "list":
      return `${runtime}.list(${nullable}, ${shapeExpression(ref.ofType)})`;
    case "named":
      return `${runtime}.named(${nullable})`;
  }
}

// =============================================================================
// Query Root
// =============================================================================

function writeRoot(
  writer: CodeBlockWriter,
  ctx: GeneratorContext,
  root: ObjectTypeDefinition,
): void {
  const helpers = ctx.names.root;
  const rootLiteral = JSON.stringify(root.name);

  writeDocComment(writer, "Name of the root query type");
  writer.writeLine(
    `export const ${helpers.rootType} = ${rootLiteral};`,
  );
  writer.blankLine();

  writeDocComment(writer, "Start an empty selection on the root query type");
  writer.writeLine(
    `export function ${helpers.query}(): ${nameOf(ctx.names.selectionTypes, root.name)} {`,
  );
  writer.indent(() => {
    writer.writeLine(`return ${runtime}.selectionOf(${rootLiteral});`);
  });
  writer.writeLine("}");
  writer.blankLine();

  writeDocComment(
    writer,
    "Freeze a root selection into a request descriptor.\nOnly selections built on the root query type are accepted.",
  );
  writer.writeLine(`export function ${helpers.request}<S>(`);
  writer.indent(() => {
    writer.writeLine(
      `selection: ${runtime}.SelectionBuilder<${rootLiteral}, S>,`,
    );
    writer.writeLine("operationName?: string,");
  });
  writer.writeLine(`): ${runtime}.QueryRequest<S> {`);
  writer.indent(() => {
    writer.writeLine(
      `return ${runtime}.createRequest(selection, operationName);`,
    );
  });
  writer.writeLine("}");
  writer.blankLine();

  writeDocComment(
    writer,
    "Response of a root selection: one accessor per selected field",
  );
  writer.writeLine(
    `export type ${helpers.response}<S> = ${runtime}.ResponseOf<S>;`,
  );
}

// =============================================================================
// Helpers
// =============================================================================

function nameOf(names: ReadonlyMap<string, string>, typeName: string): string {
  const name = names.get(typeName);
  if (name === undefined) {
    throw new InvariantViolation(`no identifier planned for type "${typeName}"`);
  }
  return name;
}

/**
 * Code-unit order, so output does not depend on the host's locale
 */
function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function sortByName<T extends { name: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => compareNames(a.name, b.name));
}
