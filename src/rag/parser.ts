import ts from "typescript";
import type { ChunkKind } from "./types.js";
import { extractMarkdownSections } from "./doc-parser.js";

/**
 * Structural unit found by a language parser
 * Line numbers are 1-indexed and inclusive
 */
export interface StructuralUnit {
  readonly symbol?: string;
  readonly kind: ChunkKind;
  readonly startLine: number;
  readonly endLine: number;
}

export type StructuralParser = (
  text: string,
  filePath: string
) => readonly StructuralUnit[];

// =============================================================================
// TypeScript / JavaScript
// =============================================================================

/**
 * Determine ScriptKind based on file extension
 */
function getScriptKind(filePath: string): ts.ScriptKind {
  if (filePath.endsWith(".tsx")) return ts.ScriptKind.TSX;
  if (filePath.endsWith(".jsx")) return ts.ScriptKind.JSX;
  if (/\.(js|mjs|cjs)$/.test(filePath)) return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}

/**
 * Name of a top-level declaration, or null for statements that are not
 * structural units (imports, expressions, re-exports)
 */
function getDeclarationName(node: ts.Statement): string | null {
  if (ts.isFunctionDeclaration(node) || ts.isClassDeclaration(node)) {
    return node.name?.text ?? "default";
  }
  if (
    ts.isInterfaceDeclaration(node) ||
    ts.isTypeAliasDeclaration(node) ||
    ts.isEnumDeclaration(node)
  ) {
    return node.name.text;
  }
  if (ts.isModuleDeclaration(node)) {
    return node.name.text;
  }
  if (ts.isVariableStatement(node)) {
    // One unit per statement; the first named declaration names it
    for (const declaration of node.declarationList.declarations) {
      if (ts.isIdentifier(declaration.name)) {
        return declaration.name.text;
      }
    }
    return null;
  }
  return null;
}

/**
 * Extract top-level declarations with the TypeScript compiler API
 * Leading JSDoc belongs to the declaration it documents
 */
export const parseTypeScript: StructuralParser = (text, filePath) => {
  const sourceFile = ts.createSourceFile(
    filePath,
    text,
    ts.ScriptTarget.Latest,
    true,
    getScriptKind(filePath)
  );

  const units: StructuralUnit[] = [];

  for (const statement of sourceFile.statements) {
    const name = getDeclarationName(statement);
    if (name === null) continue;

    const start = sourceFile.getLineAndCharacterOfPosition(
      statement.getStart(sourceFile, true)
    );
    const end = sourceFile.getLineAndCharacterOfPosition(statement.getEnd());

    units.push({
      symbol: name,
      kind: "code",
      startLine: start.line + 1, // Convert to 1-indexed
      endLine: end.line + 1,
    });
  }

  return units;
};

// =============================================================================
// Python
// =============================================================================

const PY_BLOCK_START = /^(async\s+def|def|class)\s+([A-Za-z_][A-Za-z0-9_]*)/;
const PY_DOCSTRING_START = /^[rRuUbB]{0,2}("""|''')/;

function isTopLevel(line: string): boolean {
  return line.length > 0 && !/^\s/.test(line);
}

/**
 * Line span (0-indexed) of the module docstring, or null when there is none
 */
function findModuleDocstring(lines: readonly string[]): [number, number] | null {
  let first = 0;
  while (first < lines.length) {
    const line = lines[first] ?? "";
    if (line.trim() === "" || line.startsWith("#")) {
      first++;
      continue;
    }
    break;
  }

  const opening = lines[first];
  if (opening === undefined) return null;

  const match = opening.match(PY_DOCSTRING_START);
  if (!match || match[1] === undefined) return null;

  const quote = match[1];
  const rest = opening.slice(opening.indexOf(quote) + quote.length);
  if (rest.includes(quote)) return [first, first];

  for (let i = first + 1; i < lines.length; i++) {
    if ((lines[i] ?? "").includes(quote)) return [first, i];
  }
  return null;
}

/**
 * Extract top-level `def`/`class` blocks (with their decorators) and the module
 * docstring by indentation
 */
export const parsePython: StructuralParser = (text) => {
  const lines = text.split("\n");
  const units: StructuralUnit[] = [];

  const docstring = findModuleDocstring(lines);
  if (docstring) {
    units.push({
      kind: "docstring",
      startLine: docstring[0] + 1,
      endLine: docstring[1] + 1,
    });
  }

  let i = docstring ? docstring[1] + 1 : 0;
  while (i < lines.length) {
    const line = lines[i] ?? "";

    if (!isTopLevel(line) || !(line.startsWith("@") || PY_BLOCK_START.test(line))) {
      i++;
      continue;
    }

    // Decorators stack above the definition they apply to
    const blockStart = i;
    while (i < lines.length && (lines[i] ?? "").startsWith("@")) i++;

    const header = lines[i] ?? "";
    const match = header.match(PY_BLOCK_START);
    if (!match || match[2] === undefined) {
      i = blockStart + 1;
      continue;
    }

    let blockEnd = i;
    let j = i + 1;
    while (j < lines.length) {
      const current = lines[j] ?? "";
      if (current.trim() === "") {
        j++;
        continue;
      }
      if (isTopLevel(current) && !/^[)\]}]/.test(current)) break;
      blockEnd = j;
      j++;
    }

    units.push({
      symbol: match[2],
      kind: "code",
      startLine: blockStart + 1,
      endLine: blockEnd + 1,
    });
    i = blockEnd + 1;
  }

  return units;
};

// =============================================================================
// Markdown
// =============================================================================

/**
 * One unit per heading section; text before the first heading is its own unit
 */
export const parseMarkdown: StructuralParser = (text) =>
  extractMarkdownSections(text).map((section) => ({
    ...(section.heading !== null ? { symbol: section.heading } : {}),
    kind: "markdown" as const,
    startLine: section.startLine,
    endLine: section.endLine,
  }));

// =============================================================================
// Registry
// =============================================================================

const PARSERS: Readonly<Record<string, StructuralParser>> = {
  typescript: parseTypeScript,
  javascript: parseTypeScript,
  python: parsePython,
  markdown: parseMarkdown,
};

/**
 * Get the structural parser for a language
 * @returns Parser, or null when the language has none (fallback windows apply)
 */
export function getStructuralParser(language: string): StructuralParser | null {
  return PARSERS[language.toLowerCase()] ?? null;
}

/** Line-comment markers used to classify gap chunks */
const COMMENT_PATTERNS: Readonly<Record<string, RegExp>> = {
  typescript: /^\s*(\/\/|\/\*|\*|\*\/)/,
  javascript: /^\s*(\/\/|\/\*|\*|\*\/)/,
  python: /^\s*#/,
};

/**
 * Check whether a line is a comment in the given language
 */
export function isCommentLine(line: string, language: string): boolean {
  const pattern = COMMENT_PATTERNS[language.toLowerCase()];
  return pattern ? pattern.test(line) : false;
}
