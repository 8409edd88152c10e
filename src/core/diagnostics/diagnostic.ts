/**
 * Diagnostic construction
 *
 * @module
 */

import type { Diagnostic, DiagnosticCode, Severity, SourceLocation } from "../../types/index.js";
import type { FrameCheckError } from "../errors.js";

export function createDiagnostic(
  location: SourceLocation,
  severity: Severity,
  code: DiagnosticCode,
  message: string,
  suggestion: string | null = null
): Diagnostic {
  return Object.freeze({
    file: location.file,
    line: location.line,
    column: location.column,
    severity,
    code,
    message,
    suggestion,
  });
}

/**
 * Error-severity diagnostic carrying the message of a recoverable error
 * (ParsingError, SchemaConflictError).
 */
export function diagnosticFromError(
  error: FrameCheckError,
  code: DiagnosticCode,
  location: SourceLocation
): Diagnostic {
  return createDiagnostic(location, "error", code, error.message);
}
