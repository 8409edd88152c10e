/**
 * Shared helpers for engine-level tests: parse inline Python, build the
 * registry, and check every file.
 */

import type { Diagnostic } from "../../types/index.js";
import { checkModule } from "../checker/file-checker.js";
import { ParserManager, type ParseResult } from "../parser/parser-manager.js";
import { collectDeclarations, type FileDeclarations } from "../registry/declarations.js";
import { loadFrameMembers } from "../registry/frame-members.js";
import { buildSchemaRegistry, type SchemaRegistry } from "../registry/schema-registry.js";
import { sortDiagnostics } from "../reporter/diagnostic-reporter.js";

export interface Analysis {
  registry: SchemaRegistry;
  /** Registry and checker diagnostics, ordered */
  diagnostics: Diagnostic[];
}

/**
 * Strips the common indentation of a template literal so fixtures can be
 * written inline.
 */
export function py(strings: TemplateStringsArray, ...values: unknown[]): string {
  const raw = strings.reduce((text, part, index) => text + part + (index < values.length ? String(values[index]) : ""), "");
  const lines = raw.replace(/^\n/, "").split("\n");
  const indents = lines.filter((line) => line.trim().length > 0).map((line) => line.length - line.trimStart().length);
  const indent = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((line) => line.slice(indent)).join("\n");
}

export function parseOk(parser: ParserManager, file: string, source: string): ParseResult {
  const result = parser.parseSource(file, source);
  if (!result.ok) {
    throw new Error(`fixture ${file} does not parse: ${result.error.message}`);
  }
  return result.value;
}

export function declarationsOf(parser: ParserManager, file: string, source: string): FileDeclarations {
  const parsed = parseOk(parser, file, source);
  try {
    return collectDeclarations(parsed.tree.rootNode, file);
  } finally {
    parsed.tree.delete();
  }
}

/**
 * Runs both phases over in-memory files keyed by path.
 */
export function analyze(parser: ParserManager, files: Record<string, string>): Analysis {
  const parsed = Object.entries(files).map(([file, source]) => ({ file, result: parseOk(parser, file, source) }));
  try {
    const frameMembers = loadFrameMembers();
    const { registry, diagnostics } = buildSchemaRegistry(
      parsed.map(({ file, result }) => collectDeclarations(result.tree.rootNode, file)),
      { reservedNames: frameMembers }
    );
    const checked = parsed.flatMap(({ file, result }) =>
      checkModule(result.tree.rootNode, file, { registry, frameMembers })
    );
    return { registry, diagnostics: sortDiagnostics([...diagnostics, ...checked]) };
  } finally {
    for (const { result } of parsed) result.tree.delete();
  }
}

/**
 * Compact form of a diagnostic for assertions.
 */
export function brief(diagnostic: Diagnostic): string {
  const hint = diagnostic.suggestion === null ? "" : ` -> ${diagnostic.suggestion}`;
  return `${diagnostic.line}:${diagnostic.column} ${diagnostic.code}: ${diagnostic.message}${hint}`;
}

export const SCHEMA_PRELUDE = py`
  from framecheck import BaseSchema, Column, ColumnSet, ColumnGroup, Frame
`;
