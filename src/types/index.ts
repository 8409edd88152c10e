/**
 * Shared types for framecheck
 */

// =============================================================================
// Source Locations
// =============================================================================

/**
 * A 1-indexed position in a source file
 */
export interface SourceLocation {
  /** Path of the file, as given to the engine */
  file: string;
  /** Line number (1-indexed) */
  line: number;
  /**
   * Column number (1-indexed), counted in UTF-16 code units as JavaScript
   * strings and LSP positions count them: `😀` takes two columns.
   */
  column: number;
}

// =============================================================================
// Schema Model
// =============================================================================

/**
 * Primitive tag of a declared column type
 */
export type ValueTypeTag = "int" | "float" | "str" | "bool" | "other";

/**
 * Declared element type of a column. Two value types are identical when
 * their `text` is equal.
 */
export interface ValueType {
  tag: ValueTypeTag;
  /** Canonical spelling (last dotted segment), e.g. "int", "datetime", "Any" */
  text: string;
}

/**
 * How literal column names are matched against a column definition
 */
export type Membership =
  | { kind: "exact"; name: string }
  | { kind: "regex"; patterns: string[] }
  | { kind: "members"; names: string[] };

/**
 * One declared column or dynamic column family (ColumnSet)
 */
export interface ColumnDefinition {
  /** Public identifier used in schema-attribute access */
  readonly name: string;
  /** Effective physical name: the alias when set, otherwise `name` */
  readonly lookupKey: string;
  readonly valueType: ValueType;
  readonly membership: Membership;
  readonly nullable: boolean;
  readonly kind: "column" | "column-set";
  readonly description?: string;
}

/**
 * How a schema came to exist
 */
export type SchemaOrigin = "class" | "add" | "select" | "drop" | "derived";

/**
 * An immutable, fully resolved named collection of columns
 */
export interface SchemaDefinition {
  readonly name: string;
  readonly declaredAt: SourceLocation;
  readonly columns: readonly ColumnDefinition[];
  /** ColumnGroup name to member names; groups contribute no columns */
  readonly groups: ReadonlyMap<string, readonly string[]>;
  readonly allowExtraColumns: boolean;
  /** Some alias or member list is only known at run time */
  readonly deferred: boolean;
  readonly origin: SchemaOrigin;
}

// =============================================================================
// Bindings & Access Sites
// =============================================================================

export type BindingConfidence = "certain" | "inferred";

/**
 * "At this program point, this variable holds data of this schema"
 */
export interface SchemaBinding {
  variable: string;
  /** null means Unknown: the variable is known to hold nothing we can verify */
  schema: SchemaDefinition | null;
  confidence: BindingConfidence;
  /** Line where the binding was established */
  boundAt: number;
}

export type AccessKind = "read" | "write";

/**
 * A located use of a possible column reference
 */
export interface AccessSite {
  kind: AccessKind;
  /** The literal or attribute name being accessed */
  name: string;
  form: "subscript" | "attribute" | "schema-reference" | "argument";
  location: SourceLocation;
}

// =============================================================================
// Diagnostics
// =============================================================================

export type Severity = "error" | "warning";

export type DiagnosticCode =
  | "ParseError"
  | "SchemaConflictError"
  | "UnknownColumn"
  | "UndeclaredColumnMutation"
  | "ReservedColumnName"
  | "DuplicateSchema"
  | "NoFilesChecked";

/**
 * One reported finding. Never mutated after creation.
 */
export interface Diagnostic {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly severity: Severity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly suggestion: string | null;
}

// =============================================================================
// Run Configuration & Results
// =============================================================================

export type OutputFormat = "human" | "json";

/**
 * Options that affect a run
 */
export interface CheckOptions {
  /** Treat warnings as failures */
  strict: boolean;
  outputFormat: OutputFormat;
}

export type RunOutcome = "success" | "findings" | "internal-failure";

/**
 * Details of an internal fault that aborted a run
 */
export interface InternalFault {
  message: string;
  code: string;
  filePath?: string;
  construct?: string;
}

/**
 * Result of one engine run
 */
export interface RunResult {
  outcome: RunOutcome;
  diagnostics: readonly Diagnostic[];
  filesChecked: number;
  durationMs: number;
  fault?: InternalFault;
}

/**
 * Source text handed to the engine
 */
export interface SourceFile {
  path: string;
  text: string;
}
