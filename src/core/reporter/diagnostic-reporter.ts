/**
 * Diagnostic Reporter
 *
 * Orders diagnostics, renders them for humans or machines, and decides the
 * outcome of a run.
 *
 * @module
 */

import { Chalk, type ChalkInstance } from "chalk";
import type { Diagnostic, InternalFault, OutputFormat, RunOutcome } from "../../types/index.js";

export interface RenderOptions {
  /** Colour human output; has no effect on JSON */
  color?: boolean;
}

/**
 * Orders by file path, then line, then column. Equal keys keep their
 * original relative order.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort((a, b) => {
    if (a.file !== b.file) return a.file < b.file ? -1 : 1;
    if (a.line !== b.line) return a.line - b.line;
    return a.column - b.column;
  });
}

/**
 * `findings` when any error is present, or any warning under strict mode.
 */
export function computeOutcome(diagnostics: readonly Diagnostic[], strict: boolean): RunOutcome {
  const failing = diagnostics.some((d) => d.severity === "error" || (strict && d.severity === "warning"));
  return failing ? "findings" : "success";
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function formatSummary(diagnostics: readonly Diagnostic[], filesChecked: number): string {
  const checked = `${plural(filesChecked, "file")} checked`;
  if (diagnostics.length === 0) {
    return `No problems found (${checked})`;
  }
  const errors = diagnostics.filter((d) => d.severity === "error").length;
  const warnings = diagnostics.length - errors;
  return `Found ${plural(errors, "error")} and ${plural(warnings, "warning")} (${checked})`;
}

function formatLine(diagnostic: Diagnostic, chalk: ChalkInstance): string {
  const position = chalk.bold(`${diagnostic.file}:${diagnostic.line}:${diagnostic.column}`);
  const severity =
    diagnostic.severity === "error" ? chalk.red(`${diagnostic.severity}:`) : chalk.yellow(`${diagnostic.severity}:`);
  const hint = diagnostic.suggestion === null ? "" : chalk.cyan(` (did you mean '${diagnostic.suggestion}'?)`);
  return `${position} ${severity} ${diagnostic.message}${hint}`;
}

/**
 * One line per diagnostic, a blank line, then the summary.
 */
export function formatHuman(
  diagnostics: readonly Diagnostic[],
  filesChecked: number,
  options: RenderOptions = {}
): string {
  const chalk = new Chalk({ level: options.color === true ? 1 : 0 });
  const lines = sortDiagnostics(diagnostics).map((d) => formatLine(d, chalk));
  if (lines.length > 0) {
    lines.push("");
  }
  lines.push(chalk.dim(formatSummary(diagnostics, filesChecked)));
  return lines.join("\n");
}

export function formatJson(diagnostics: readonly Diagnostic[]): string {
  const rows = sortDiagnostics(diagnostics).map((d) => ({
    file: d.file,
    line: d.line,
    column: d.column,
    severity: d.severity,
    code: d.code,
    message: d.message,
    suggestion: d.suggestion,
  }));
  return JSON.stringify(rows, null, 2);
}

export function formatReport(
  diagnostics: readonly Diagnostic[],
  filesChecked: number,
  format: OutputFormat,
  options: RenderOptions = {}
): string {
  return format === "json" ? formatJson(diagnostics) : formatHuman(diagnostics, filesChecked, options);
}

/**
 * Rendering of an internal fault, reported apart from findings.
 */
export function formatFault(fault: InternalFault): string {
  const where = [fault.filePath, fault.construct].filter((part): part is string => part !== undefined);
  const suffix = where.length > 0 ? ` (while processing ${where.join(", ")})` : "";
  return `internal error [${fault.code}]: ${fault.message}${suffix}`;
}
