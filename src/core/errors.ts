/**
 * Error Classes for framecheck
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Parsing errors (2xxx)
  PARSE_FAILED = "E2000",
  PARSE_SYNTAX_ERROR = "E2003",
  PARSE_TREE_SITTER_ERROR = "E2004",

  // Schema errors (3xxx)
  SCHEMA_CONFLICT = "E3000",

  // Engine errors (7xxx)
  INTERNAL_FAULT = "E7000",
  REGISTRY_NOT_FROZEN = "E7001",
  REGISTRY_FROZEN = "E7002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all framecheck errors
 */
export class FrameCheckError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "FrameCheckError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Parsing errors
 */
export class ParsingError extends FrameCheckError {
  public readonly filePath?: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context?: Record<string, unknown> & { filePath?: string; line?: number; column?: number }
  ) {
    super(message, code, context);
    this.name = "ParsingError";
    this.filePath = context?.filePath;
    this.line = context?.line;
    this.column = context?.column;
  }

  override toString(): string {
    let location = "";
    if (this.filePath) {
      location = ` at ${this.filePath}`;
      if (this.line !== undefined) {
        location += `:${this.line}`;
        if (this.column !== undefined) {
          location += `:${this.column}`;
        }
      }
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Schema composition errors: conflicting column types, cyclic composition,
 * or a select/drop naming a column the source schema does not declare.
 */
export class SchemaConflictError extends FrameCheckError {
  public readonly schemaName: string;
  public readonly columnName?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SCHEMA_CONFLICT,
    context: Record<string, unknown> & { schemaName: string; columnName?: string }
  ) {
    super(message, code, context);
    this.name = "SchemaConflictError";
    this.schemaName = context.schemaName;
    this.columnName = context.columnName;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends FrameCheckError {
  public readonly configPath?: string;

  constructor(
    message: string,
    context?: Record<string, unknown> & { configPath?: string }
  ) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
    this.configPath = context?.configPath;
  }
}

/**
 * Invariant violation inside the engine. The only fatal class: it aborts
 * the current run and is reported apart from lint findings.
 */
export class InternalFaultError extends FrameCheckError {
  public readonly filePath?: string;
  public readonly construct?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_FAULT,
    context?: Record<string, unknown> & { filePath?: string; construct?: string }
  ) {
    super(message, code, context);
    this.name = "InternalFaultError";
    this.filePath = context?.filePath;
    this.construct = context?.construct;
  }
}

/**
 * Wrap an unknown error in an InternalFaultError, keeping the location of the
 * file or construct being processed when it is known.
 */
export function wrapInternalFault(
  error: unknown,
  location: { filePath?: string; construct?: string } = {}
): InternalFaultError {
  if (error instanceof InternalFaultError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalFaultError(error.message || "An unexpected error occurred", ErrorCode.INTERNAL_FAULT, {
      ...location,
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new InternalFaultError(
    typeof error === "string" ? error : "An unexpected error occurred",
    ErrorCode.INTERNAL_FAULT,
    location
  );
}
