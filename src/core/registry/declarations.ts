/**
 * Schema Declaration Collector
 *
 * Phase 1 of a run: a single forward pass over one file's module-level
 * statements that records raw schema declarations. Nothing is resolved
 * here; names are kept as written and resolved later by the registry
 * builder, so declarations may refer to schemas from other files.
 *
 * @module
 */

import type { SourceLocation, ValueType, ValueTypeTag } from "../../types/index.js";
import {
  booleanLiteral,
  callParts,
  identifierName,
  locationOf,
  namedChildren,
  reduceTypeNode,
  sequenceElements,
  stringListValues,
  stringLiteralValue,
  tailName,
  type CallParts,
  type SyntaxNode,
  type TypeExpr,
} from "../parser/syntax.js";
import { schemaNameFromAnnotation, unwrapOptional } from "./frame-types.js";

// =============================================================================
// Raw Declaration Types
// =============================================================================

export interface RawColumnMember {
  kind: "column";
  name: string;
  alias: string | null;
  /** alias=DefinedLater */
  aliasDeferred: boolean;
  valueType: ValueType;
  nullable: boolean;
  description?: string;
  location: SourceLocation;
}

export interface RawColumnSetMember {
  kind: "column-set";
  name: string;
  /** Regex patterns; null when the set lists its members explicitly */
  patterns: string[] | null;
  members: string[];
  /** members=DefinedLater, or a members expression we cannot read */
  deferred: boolean;
  valueType: ValueType;
  nullable: boolean;
  description?: string;
  location: SourceLocation;
}

export interface RawGroupMember {
  kind: "group";
  name: string;
  members: string[];
  location: SourceLocation;
}

export type RawMember = RawColumnMember | RawColumnSetMember | RawGroupMember;

export interface ClassDeclaration {
  kind: "class";
  name: string;
  location: SourceLocation;
  /** Base class names, last dotted segment */
  bases: string[];
  members: RawMember[];
  /** Class-level allow_extra_columns, null when not set */
  allowExtraColumns: boolean | null;
}

export interface AddDeclaration {
  kind: "add";
  name: string;
  location: SourceLocation;
  operands: string[];
}

export interface SubsetEntry {
  name: string;
  location: SourceLocation;
}

export interface SubsetDeclaration {
  kind: "select" | "drop";
  name: string;
  location: SourceLocation;
  source: string;
  entries: SubsetEntry[];
}

export type RawDeclaration = ClassDeclaration | AddDeclaration | SubsetDeclaration;

/**
 * A module-level function whose return annotation names a schema
 */
export interface RawFactory {
  functionName: string;
  schemaName: string;
  location: SourceLocation;
}

export interface FileDeclarations {
  file: string;
  declarations: RawDeclaration[];
  factories: RawFactory[];
}

// =============================================================================
// Constants
// =============================================================================

const DESCRIPTOR_NAMES = new Set(["Column", "ColumnSet", "ColumnGroup"]);
const DEFERRED_MARKER = "DefinedLater";
const SCHEMA_SETTINGS = new Set(["allow_extra_columns", "enforce_columns", "strict", "coerce", "Config"]);
const WRAPPER_TYPES = new Set(["Series", "Index", "Annotated", "Required", "NotRequired", "Final"]);

const PRIMITIVE_TAGS: Record<string, ValueTypeTag> = {
  int: "int",
  float: "float",
  str: "str",
  bool: "bool",
};

export const ANY_TYPE: ValueType = { tag: "other", text: "Any" };

// =============================================================================
// Value Types
// =============================================================================

/**
 * Reduces an annotation or `type=` argument to a ValueType, unwrapping
 * `Series[T]`, `Annotated[T, ...]` and optional forms.
 */
export function valueTypeOf(type: TypeExpr): { valueType: ValueType; nullable: boolean } {
  const unwrapped = unwrapOptional(type);
  let current = unwrapped.type;
  let nullable = unwrapped.nullable;

  while (current.kind === "generic" && WRAPPER_TYPES.has(current.name) && current.args[0]) {
    const inner = unwrapOptional(current.args[0]);
    current = inner.type;
    nullable = nullable || inner.nullable;
  }

  if (current.kind === "name") {
    return { valueType: { tag: PRIMITIVE_TAGS[current.name] ?? "other", text: current.name }, nullable };
  }
  if (current.kind === "generic") {
    return { valueType: { tag: "other", text: current.name }, nullable };
  }
  return { valueType: ANY_TYPE, nullable };
}

// =============================================================================
// Collector
// =============================================================================

/**
 * Collects raw schema declarations and factory annotations from a parsed
 * module.
 */
export function collectDeclarations(root: SyntaxNode, file: string): FileDeclarations {
  const result: FileDeclarations = { file, declarations: [], factories: [] };
  visitModuleBlock(root, file, result);
  return result;
}

function visitModuleBlock(block: SyntaxNode, file: string, out: FileDeclarations): void {
  for (const statement of namedChildren(block)) {
    visitModuleStatement(statement, file, out);
  }
}

function visitModuleStatement(statement: SyntaxNode, file: string, out: FileDeclarations): void {
  switch (statement.type) {
    case "decorated_definition": {
      const definition = statement.childForFieldName("definition");
      if (definition) visitModuleStatement(definition, file, out);
      return;
    }
    case "class_definition": {
      const declaration = readClass(statement, file);
      if (declaration) out.declarations.push(declaration);
      return;
    }
    case "function_definition": {
      const factory = readFactory(statement, file);
      if (factory) out.factories.push(factory);
      return;
    }
    case "expression_statement": {
      const expression = namedChildren(statement)[0];
      if (expression?.type === "assignment") {
        const declaration = readAssignment(expression, file);
        if (declaration) out.declarations.push(declaration);
      }
      return;
    }
    case "if_statement":
    case "try_statement":
    case "with_statement":
      for (const block of nestedBlocks(statement)) {
        visitModuleBlock(block, file, out);
      }
      return;
    default:
      return;
  }
}

/**
 * Blocks of a compound statement, including those of its elif/else/except/
 * finally clauses.
 */
function nestedBlocks(statement: SyntaxNode): SyntaxNode[] {
  const blocks: SyntaxNode[] = [];
  for (const child of namedChildren(statement)) {
    if (child.type === "block") {
      blocks.push(child);
    } else if (
      child.type === "elif_clause" ||
      child.type === "else_clause" ||
      child.type === "except_clause" ||
      child.type === "except_group_clause" ||
      child.type === "finally_clause"
    ) {
      blocks.push(...nestedBlocks(child));
    }
  }
  return blocks;
}

// -----------------------------------------------------------------------------
// Classes
// -----------------------------------------------------------------------------

function readClass(node: SyntaxNode, file: string): ClassDeclaration | null {
  const name = node.childForFieldName("name")?.text;
  const body = node.childForFieldName("body");
  if (!name || !body) return null;

  const bases: string[] = [];
  const superclasses = node.childForFieldName("superclasses");
  if (superclasses) {
    for (const base of namedChildren(superclasses)) {
      // `metaclass=...` and other keywords are not bases
      if (base.type === "keyword_argument") continue;
      const baseNode = base.type === "subscript" ? base.childForFieldName("value") : base;
      const baseName = tailName(baseNode);
      if (baseName) bases.push(baseName);
    }
  }

  // Classes without bases are never schemas
  if (bases.length === 0) return null;

  const declaration: ClassDeclaration = {
    kind: "class",
    name,
    location: locationOf(node, file),
    bases,
    members: [],
    allowExtraColumns: null,
  };

  for (const statement of namedChildren(body)) {
    if (statement.type !== "expression_statement") continue;
    const assignment = namedChildren(statement)[0];
    if (assignment?.type !== "assignment") continue;
    readClassAssignment(assignment, file, declaration);
  }

  return declaration;
}

function readClassAssignment(assignment: SyntaxNode, file: string, declaration: ClassDeclaration): void {
  const left = assignment.childForFieldName("left");
  const name = identifierName(left);
  if (!left || !name || name.startsWith("_")) return;

  const right = assignment.childForFieldName("right");
  const annotation = assignment.childForFieldName("type");

  if (name === "allow_extra_columns") {
    const flag = booleanLiteral(right);
    if (flag !== null) declaration.allowExtraColumns = flag;
    return;
  }
  if (SCHEMA_SETTINGS.has(name)) return;

  const location = locationOf(left, file);
  const call = right ? callParts(right) : null;
  const calleeName = call ? tailName(call.callee) : null;

  if (call && calleeName && DESCRIPTOR_NAMES.has(calleeName)) {
    const member = readDescriptor(calleeName, name, call, annotation, location);
    if (member) declaration.members.push(member);
    return;
  }

  if (!annotation) return;

  const reduced = reduceTypeNode(annotation);
  if (reduced.kind === "generic" && reduced.name === "ClassVar") return;

  const { valueType, nullable } = valueTypeOf(reduced);
  const column: RawColumnMember = {
    kind: "column",
    name,
    alias: null,
    aliasDeferred: false,
    valueType,
    nullable,
    location,
  };

  // pandera-style `name: Series[int] = pa.Field(alias="x", nullable=True)`
  if (call && calleeName === "Field") {
    const alias = stringLiteralValue(call.keywords.get("alias") ?? null);
    if (alias !== null) column.alias = alias;
    if (booleanLiteral(call.keywords.get("nullable") ?? null) === true) column.nullable = true;
    const description = stringLiteralValue(call.keywords.get("description") ?? null);
    if (description !== null) column.description = description;
  }

  declaration.members.push(column);
}

function isDeferredMarker(node: SyntaxNode | undefined): boolean {
  return node !== undefined && tailName(node) === DEFERRED_MARKER;
}

function readDescriptor(
  descriptor: string,
  name: string,
  { positional, keywords }: CallParts,
  annotation: SyntaxNode | null,
  location: SourceLocation
): RawMember | null {
  if (descriptor === "ColumnGroup") {
    const membersNode = keywords.get("members") ?? positional[0];
    const elements = sequenceElements(membersNode ?? null) ?? [];
    const members: string[] = [];
    for (const element of elements) {
      const memberName = stringLiteralValue(element) ?? tailName(element);
      if (memberName) members.push(memberName);
    }
    return { kind: "group", name, members, location };
  }

  // `email: str = Column(alias="e")` takes its type from the annotation
  const typeNode =
    keywords.get("type") ??
    keywords.get("dtype") ??
    (descriptor === "Column" ? positional[0] ?? annotation ?? undefined : undefined);
  const typed = typeNode ? valueTypeOf(reduceTypeNode(typeNode)) : { valueType: ANY_TYPE, nullable: false };
  const nullable = booleanLiteral(keywords.get("nullable") ?? null) ?? typed.nullable;
  const description = stringLiteralValue(keywords.get("description") ?? null) ?? undefined;

  if (descriptor === "Column") {
    const aliasNode = keywords.get("alias");
    return {
      kind: "column",
      name,
      alias: stringLiteralValue(aliasNode ?? null),
      aliasDeferred: isDeferredMarker(aliasNode),
      valueType: typed.valueType,
      nullable,
      description,
      location,
    };
  }

  // ColumnSet
  const regexNode = keywords.get("regex");
  const membersNode = keywords.get("members");
  const set: RawColumnSetMember = {
    kind: "column-set",
    name,
    patterns: null,
    members: [],
    deferred: false,
    valueType: typed.valueType,
    nullable,
    description,
    location,
  };

  const regexText = stringLiteralValue(regexNode ?? null);
  if (regexText !== null) {
    set.patterns = [regexText];
    return set;
  }

  if (isDeferredMarker(membersNode)) {
    set.deferred = true;
    return set;
  }

  const single = stringLiteralValue(membersNode ?? null);
  const listed = single !== null ? [single] : membersNode ? stringListValues(membersNode) : [];
  if (listed === null) {
    set.deferred = true;
    return set;
  }

  if (booleanLiteral(regexNode ?? null) === true) {
    set.patterns = listed;
  } else {
    set.members = listed;
  }
  return set;
}

// -----------------------------------------------------------------------------
// Module-level assignments
// -----------------------------------------------------------------------------

function readAssignment(assignment: SyntaxNode, file: string): RawDeclaration | null {
  const left = assignment.childForFieldName("left");
  const right = assignment.childForFieldName("right");
  const name = identifierName(left);
  if (!name || !right) return null;

  const location = locationOf(assignment, file);

  const operands = addOperands(right);
  if (operands && operands.length >= 2) {
    return { kind: "add", name, location, operands };
  }

  const call = callParts(right);
  if (!call) return null;

  if (tailName(call.callee) === "combine_schemas" && call.positional.length >= 1) {
    const names = call.positional.map((arg) => tailName(arg));
    if (names.every((operand): operand is string => operand !== null)) {
      return { kind: "add", name, location, operands: names };
    }
    return null;
  }

  const callee = call.callee;
  if (callee.type !== "attribute") return null;
  const method = callee.childForFieldName("attribute")?.text;
  if (method !== "select" && method !== "drop") return null;

  const source = tailName(callee.childForFieldName("object"));
  const listNode = call.keywords.get("columns") ?? call.positional[0];
  const elements = sequenceElements(listNode ?? null);
  if (!source || !elements) return null;

  const entries: SubsetEntry[] = [];
  for (const element of elements) {
    const entryName =
      stringLiteralValue(element) ?? (element.type === "attribute" ? tailName(element) : null);
    if (entryName === null) return null;
    entries.push({ name: entryName, location: locationOf(element, file) });
  }

  return { kind: method, name, location, source, entries };
}

/**
 * Operand names of `A + B + C`, or null when any operand is not a name.
 */
function addOperands(node: SyntaxNode): string[] | null {
  const target = node.type === "parenthesized_expression" ? namedChildren(node)[0] : node;
  if (!target) return null;

  if (target.type === "binary_operator") {
    if (target.childForFieldName("operator")?.text !== "+") return null;
    const left = target.childForFieldName("left");
    const right = target.childForFieldName("right");
    if (!left || !right) return null;
    const leftOperands = addOperands(left);
    const rightOperands = addOperands(right);
    return leftOperands && rightOperands ? [...leftOperands, ...rightOperands] : null;
  }

  const name = target.type === "identifier" || target.type === "attribute" ? tailName(target) : null;
  return name ? [name] : null;
}

// -----------------------------------------------------------------------------
// Factories
// -----------------------------------------------------------------------------

function readFactory(node: SyntaxNode, file: string): RawFactory | null {
  const functionName = node.childForFieldName("name")?.text;
  const returnType = node.childForFieldName("return_type");
  if (!functionName || !returnType) return null;

  const schemaName = schemaNameFromAnnotation(reduceTypeNode(returnType));
  return schemaName ? { functionName, schemaName, location: locationOf(node, file) } : null;
}
