/**
 * Syntax Helpers
 *
 * Small read-only accessors over tree-sitter-python nodes: names, string
 * literals, call arguments, subscripts and type annotations. No semantic
 * resolution happens here.
 *
 * @module
 */

import type { Node } from "web-tree-sitter";
import type { SourceLocation } from "../../types/index.js";

// =============================================================================
// Types
// =============================================================================

export type SyntaxNode = Node;

/**
 * Positional and keyword arguments of a call
 */
export interface CallParts {
  /** The callee expression */
  callee: SyntaxNode;
  positional: SyntaxNode[];
  keywords: Map<string, SyntaxNode>;
  /** Whether `*args` or `**kwargs` were passed */
  hasSplat: boolean;
}

/**
 * Reduced form of a type annotation
 */
export type TypeExpr =
  | { kind: "name"; name: string; qualified: string }
  | { kind: "generic"; name: string; args: TypeExpr[] }
  | { kind: "union"; members: TypeExpr[] }
  | { kind: "none" }
  | { kind: "unknown" };

// =============================================================================
// Node Access
// =============================================================================

export function namedChildren(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((child): child is SyntaxNode => child !== null);
}

export function fieldChildren(node: SyntaxNode, field: string): SyntaxNode[] {
  return node.childrenForFieldName(field).filter((child): child is SyntaxNode => child !== null);
}

export function locationOf(node: SyntaxNode, file: string): SourceLocation {
  return {
    file,
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

/**
 * Walks a subtree depth-first in source order. Returning false from the
 * visitor skips the node's children.
 */
export function walk(node: SyntaxNode, visitor: (node: SyntaxNode) => boolean): void {
  const stack: SyntaxNode[] = [node];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;

    if (!visitor(current)) {
      continue;
    }

    const children = namedChildren(current);
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) {
        stack.push(child);
      }
    }
  }
}

export function unwrapParens(node: SyntaxNode): SyntaxNode {
  let current = node;
  while (current.type === "parenthesized_expression") {
    const inner = namedChildren(current)[0];
    if (!inner) break;
    current = inner;
  }
  return current;
}

// =============================================================================
// Names
// =============================================================================

export function identifierName(node: SyntaxNode | null): string | null {
  if (!node) return null;
  const target = unwrapParens(node);
  return target.type === "identifier" ? target.text : null;
}

/**
 * Full dotted name of an identifier/attribute chain: `pd.DataFrame`.
 */
export function dottedName(node: SyntaxNode | null): string | null {
  if (!node) return null;
  const target = unwrapParens(node);

  if (target.type === "identifier") {
    return target.text;
  }
  if (target.type === "attribute") {
    const objectName = dottedName(target.childForFieldName("object"));
    const attribute = target.childForFieldName("attribute");
    if (objectName && attribute) {
      return `${objectName}.${attribute.text}`;
    }
  }
  return null;
}

/**
 * Last segment of a dotted name: `pl.DataFrame` → `DataFrame`.
 */
export function tailName(node: SyntaxNode | null): string | null {
  if (!node) return null;
  const target = unwrapParens(node);

  if (target.type === "identifier") {
    return target.text;
  }
  if (target.type === "attribute") {
    return target.childForFieldName("attribute")?.text ?? null;
  }
  return null;
}

// =============================================================================
// String Literals
// =============================================================================

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  a: "\x07",
  b: "\b",
  f: "\f",
  v: "\v",
  "\\": "\\",
  "'": "'",
  '"': '"',
  "\n": "",
};

const ESCAPE = /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|N\{[^}]*\}|[0-7]{1,3}|[\s\S])/g;

/**
 * Applies Python's escape rules to non-raw string content. Unknown escapes
 * such as `\d` keep their backslash, as Python does. Returns null for
 * `\N{name}`, whose character cannot be looked up here, and for code
 * points beyond Unicode.
 */
export function unescapePython(content: string): string | null {
  let unresolved = false;
  const value = content.replace(ESCAPE, (match, escape: string) => {
    const head = escape.charAt(0);
    if (head === "N" && escape.length > 1) {
      unresolved = true;
      return match;
    }
    if (escape.length > 1 && (head === "x" || head === "u" || head === "U")) {
      const codePoint = parseInt(escape.slice(1), 16);
      if (codePoint > 0x10ffff) {
        unresolved = true;
        return match;
      }
      return String.fromCodePoint(codePoint);
    }
    if (/^[0-7]/.test(escape)) {
      return String.fromCodePoint(parseInt(escape, 8));
    }
    return SIMPLE_ESCAPES[escape] ?? match;
  });
  return unresolved ? null : value;
}

/**
 * Value of a string literal, or null when the node is not a plain literal
 * (f-string with interpolations, bytes, non-string expression).
 */
export function stringLiteralValue(node: SyntaxNode | null): string | null {
  if (!node) return null;
  const target = unwrapParens(node);

  if (target.type === "concatenated_string") {
    let value = "";
    for (const part of namedChildren(target)) {
      const partValue = stringLiteralValue(part);
      if (partValue === null) return null;
      value += partValue;
    }
    return value;
  }

  if (target.type !== "string") {
    return null;
  }

  let prefix = "";
  let content = "";
  for (const child of namedChildren(target)) {
    switch (child.type) {
      case "string_start":
        prefix = child.text.replace(/["']/g, "").toLowerCase();
        break;
      case "string_content":
        content += child.text;
        break;
      case "string_end":
        break;
      default:
        // interpolation and anything else we cannot evaluate
        return null;
    }
  }

  if (prefix.includes("b")) {
    return null;
  }
  return prefix.includes("r") ? content : unescapePython(content);
}

// =============================================================================
// Calls & Subscripts
// =============================================================================

export function callParts(node: SyntaxNode): CallParts | null {
  const target = unwrapParens(node);
  if (target.type !== "call") return null;

  const callee = target.childForFieldName("function");
  const args = target.childForFieldName("arguments");
  if (!callee) return null;

  const positional: SyntaxNode[] = [];
  const keywords = new Map<string, SyntaxNode>();
  let hasSplat = false;

  if (args && args.type === "argument_list") {
    for (const arg of namedChildren(args)) {
      if (arg.type === "keyword_argument") {
        const name = arg.childForFieldName("name");
        const value = arg.childForFieldName("value");
        if (name && value) {
          keywords.set(name.text, value);
        }
      } else if (arg.type === "list_splat" || arg.type === "dictionary_splat") {
        hasSplat = true;
      } else if (arg.type !== "comment") {
        positional.push(arg);
      }
    }
  } else if (args) {
    // generator expression as the only argument
    positional.push(args);
  }

  return { callee, positional, keywords, hasSplat };
}

/**
 * Index expressions of a subscript: `a[x]` → [x], `a[x, y]` → [x, y].
 */
export function subscriptIndices(node: SyntaxNode): SyntaxNode[] {
  return fieldChildren(node, "subscript");
}

/**
 * Elements of a list or tuple literal, or null for anything else.
 */
export function sequenceElements(node: SyntaxNode | null): SyntaxNode[] | null {
  if (!node) return null;
  const target = node.type === "parenthesized_expression" ? unwrapParens(node) : node;

  if (target.type === "list" || target.type === "tuple" || target.type === "expression_list") {
    return namedChildren(target).filter((child) => child.type !== "comment");
  }
  return null;
}

/**
 * String literal elements of a list/tuple literal; null if any element is
 * not a literal.
 */
export function stringListValues(node: SyntaxNode | null): string[] | null {
  const elements = sequenceElements(node);
  if (!elements) return null;

  const values: string[] = [];
  for (const element of elements) {
    const value = stringLiteralValue(element);
    if (value === null) return null;
    values.push(value);
  }
  return values;
}

export function booleanLiteral(node: SyntaxNode | null): boolean | null {
  if (!node) return null;
  if (node.type === "true") return true;
  if (node.type === "false") return false;
  return null;
}

// =============================================================================
// Type Annotations
// =============================================================================

const UNKNOWN_TYPE: TypeExpr = { kind: "unknown" };

function lastSegment(qualified: string): string {
  const parts = qualified.split(".");
  return parts[parts.length - 1] ?? qualified;
}

/**
 * Reduces an annotation node to a TypeExpr. Handles both the `type`
 * grammar (generic_type, member_type, union_type) and plain expressions
 * (subscript, attribute, `|`), plus quoted annotations.
 */
export function reduceTypeNode(node: SyntaxNode | null): TypeExpr {
  if (!node) return UNKNOWN_TYPE;

  switch (node.type) {
    case "type":
    case "parenthesized_expression": {
      const inner = namedChildren(node)[0];
      return inner ? reduceTypeNode(inner) : UNKNOWN_TYPE;
    }
    case "none":
      return { kind: "none" };
    case "identifier":
      return node.text === "None" ? { kind: "none" } : { kind: "name", name: node.text, qualified: node.text };
    case "attribute": {
      const qualified = dottedName(node);
      return qualified ? { kind: "name", name: lastSegment(qualified), qualified } : UNKNOWN_TYPE;
    }
    case "member_type": {
      const [base, member] = namedChildren(node);
      const reducedBase = reduceTypeNode(base ?? null);
      if (reducedBase.kind !== "name" || !member) return UNKNOWN_TYPE;
      return { kind: "name", name: member.text, qualified: `${reducedBase.qualified}.${member.text}` };
    }
    case "generic_type": {
      const children = namedChildren(node);
      const head = children[0];
      const parameters = children.find((child) => child.type === "type_parameter");
      if (!head) return UNKNOWN_TYPE;
      const reducedHead = reduceTypeNode(head);
      if (reducedHead.kind !== "name") return UNKNOWN_TYPE;
      const args = parameters ? namedChildren(parameters).map(reduceTypeNode) : [];
      return { kind: "generic", name: reducedHead.name, args };
    }
    case "subscript": {
      const head = reduceTypeNode(node.childForFieldName("value"));
      if (head.kind !== "name") return UNKNOWN_TYPE;
      const indices = subscriptIndices(node);
      const args =
        indices.length === 1 && indices[0]?.type === "tuple"
          ? namedChildren(indices[0]).map(reduceTypeNode)
          : indices.map(reduceTypeNode);
      return { kind: "generic", name: head.name, args };
    }
    case "union_type":
      return flattenUnion(namedChildren(node).map(reduceTypeNode));
    case "binary_operator": {
      const operator = node.childForFieldName("operator");
      if (operator?.text !== "|") return UNKNOWN_TYPE;
      return flattenUnion([
        reduceTypeNode(node.childForFieldName("left")),
        reduceTypeNode(node.childForFieldName("right")),
      ]);
    }
    case "string":
    case "concatenated_string": {
      const text = stringLiteralValue(node);
      return text === null ? UNKNOWN_TYPE : parseTypeString(text);
    }
    default:
      return UNKNOWN_TYPE;
  }
}

function flattenUnion(members: TypeExpr[]): TypeExpr {
  const flat: TypeExpr[] = [];
  for (const member of members) {
    if (member.kind === "union") {
      flat.push(...member.members);
    } else {
      flat.push(member);
    }
  }
  return { kind: "union", members: flat };
}

// -----------------------------------------------------------------------------
// Quoted annotations
// -----------------------------------------------------------------------------

/**
 * Parses the text of a quoted annotation such as
 * `"Annotated[pd.DataFrame, UserSchema]"` or `"PandasFrame[UserSchema] | None"`.
 */
export function parseTypeString(text: string): TypeExpr {
  const tokens = text.match(/[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*|[[\],|]/g);
  if (!tokens) return UNKNOWN_TYPE;

  let position = 0;

  const parseUnion = (): TypeExpr => {
    const members = [parsePrimary()];
    while (tokens[position] === "|") {
      position++;
      members.push(parsePrimary());
    }
    return members.length === 1 && members[0] ? members[0] : flattenUnion(members);
  };

  const parsePrimary = (): TypeExpr => {
    const token = tokens[position];
    if (token === undefined || token === "[" || token === "]" || token === "," || token === "|") {
      return UNKNOWN_TYPE;
    }
    position++;

    if (token === "None") {
      return { kind: "none" };
    }

    const name = lastSegment(token);
    if (tokens[position] !== "[") {
      return { kind: "name", name, qualified: token };
    }

    position++;
    const args: TypeExpr[] = [];
    while (position < tokens.length && tokens[position] !== "]") {
      args.push(parseUnion());
      if (tokens[position] === ",") {
        position++;
      } else if (tokens[position] !== "]") {
        return UNKNOWN_TYPE;
      }
    }
    position++;
    return { kind: "generic", name, args };
  };

  const result = parseUnion();
  return position === tokens.length ? result : UNKNOWN_TYPE;
}
