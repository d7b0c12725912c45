import CodeBlockWriter from "code-block-writer";

/**
 * Create a code writer configured for generated files
 */
export function createWriter(): CodeBlockWriter {
  return new CodeBlockWriter({
    indentNumberOfSpaces: 2,
    useSingleQuote: false,
    newLine: "\n",
  });
}

/**
 * Write the standard header for files regenerated on every run
 */
export function writeHeader(writer: CodeBlockWriter): void {
  writer.writeLine("/* eslint-disable */");
  writer.writeLine("/* Generated by qselect. Do not edit. */");
  writer.blankLine();
}

/**
 * Write a banner comment separating sections of a generated file
 */
export function writeSectionComment(
  writer: CodeBlockWriter,
  title: string,
): void {
  const rule = `// ${"=".repeat(77)}`;
  writer.writeLine(rule);
  writer.writeLine(`// ${title}`);
  writer.writeLine(rule);
  writer.blankLine();
}

/**
 * Write a JSDoc block; multi-line text gets one ` * ` line per line
 */
export function writeDocComment(writer: CodeBlockWriter, text: string): void {
  const lines = text.replace(/\*\//g, "*\\/").split("\n");
  if (lines.length === 1) {
    writer.writeLine(`/** ${lines[0]} */`);
    return;
  }
  writer.writeLine("/**");
  for (const line of lines) {
    writer.writeLine(line ? ` * ${line}` : " *");
  }
  writer.writeLine(" */");
}
