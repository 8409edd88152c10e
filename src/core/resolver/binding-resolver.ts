/**
 * Binding Resolver
 *
 * One forward traversal of a module that tracks which schema each variable
 * holds and reports every column access site on a bound receiver to a
 * sink. Bindings come from frame annotations, factory calls, and
 * schema-preserving or schema-transforming operations on bound data.
 *
 * Branches run on copies of the scope and are merged afterwards; loops are
 * re-run silently until the bindings at their head are stable. The states
 * at `continue` rejoin the loop head and the states at `break` rejoin the
 * point after the loop. Function bodies are visited after their enclosing
 * block, against its final state.
 *
 * @module
 */

import type {
  AccessKind,
  AccessSite,
  BindingConfidence,
  Diagnostic,
  SchemaBinding,
  SchemaDefinition,
} from "../../types/index.js";
import { diagnosticFromError } from "../diagnostics/diagnostic.js";
import {
  callParts,
  dottedName,
  fieldChildren,
  identifierName,
  locationOf,
  namedChildren,
  reduceTypeNode,
  sequenceElements,
  stringLiteralValue,
  subscriptIndices,
  tailName,
  unwrapParens,
  walk,
  type CallParts,
  type SyntaxNode,
} from "../parser/syntax.js";
import {
  composeSchemas,
  dropColumns,
  exactColumn,
  extendSchema,
  renameColumns,
  selectColumns,
  type SchemaShape,
} from "../registry/composition.js";
import { FRAME_TYPE_NAMES, schemaNameFromAnnotation } from "../registry/frame-types.js";
import { findColumnByName, schemaAdmits } from "../registry/membership.js";
import type { SchemaRegistry } from "../registry/schema-registry.js";
import { BindingScope } from "./binding-scope.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Receives access sites and resolver-level diagnostics
 */
export interface ResolverSink {
  access(site: AccessSite, binding: SchemaBinding): void;
  diagnostic(diagnostic: Diagnostic): void;
}

export interface ResolverContext {
  registry: SchemaRegistry;
  /** DataFrame method and property names; attribute access to them is not a column read */
  frameMembers: ReadonlySet<string>;
}

type Inference = { schema: SchemaDefinition; confidence: BindingConfidence } | null;

interface ColumnEntry {
  name: string;
  node: SyntaxNode;
  /** Set when the entry is `Schema.member` and the schema has no such member */
  unresolvedIn?: SchemaDefinition;
}

interface ColumnList {
  entries: ColumnEntry[];
  /** Every element was a literal or a resolvable schema reference */
  complete: boolean;
  /** A single name rather than a list (selects a Series) */
  single: boolean;
}

interface ColumnReceiver {
  object: SyntaxNode;
  columns: ColumnList;
}

/** States captured at `break` and `continue` within one loop body */
interface LoopExits {
  breaks: BindingScope[];
  continues: BindingScope[];
}

interface LoopPass {
  /** States that return to the loop head */
  rejoin: BindingScope[];
  breaks: BindingScope[];
}

// =============================================================================
// Constants
// =============================================================================

const PRESERVING_METHODS = new Set([
  "filter",
  "query",
  "head",
  "tail",
  "sort_values",
  "sort_index",
  "sort",
  "copy",
  "clone",
  "dropna",
  "fillna",
  "fill_null",
  "fill_nan",
  "drop_duplicates",
  "unique",
  "sample",
  "astype",
  "cast",
  "groupby",
  "group_by",
  "reset_index",
  "set_index",
  "where",
  "mask",
  "nlargest",
  "nsmallest",
  "limit",
  "slice",
  "lazy",
  "collect",
  "reindex",
]);

/** Methods whose literal arguments name columns of the receiver */
const COLUMN_ARGUMENT_METHODS: Record<string, { positional: boolean; keywords: string[] }> = {
  groupby: { positional: true, keywords: ["by"] },
  group_by: { positional: true, keywords: ["by"] },
  sort_values: { positional: true, keywords: ["by"] },
  sort: { positional: true, keywords: ["by"] },
  set_index: { positional: true, keywords: ["keys"] },
  drop_duplicates: { positional: false, keywords: ["subset"] },
  dropna: { positional: false, keywords: ["subset"] },
  unique: { positional: false, keywords: ["subset"] },
  select: { positional: true, keywords: [] },
};

/** Schema classmethods that produce data of that schema */
const SCHEMA_CONSTRUCTORS = new Set(["from_pandas", "from_polars", "from_df", "from_dict", "from_records", "validate"]);

const MASK_INDEX_TYPES = new Set([
  "comparison_operator",
  "boolean_operator",
  "not_operator",
  "unary_operator",
  "binary_operator",
  "slice",
  "call",
]);

const TERMINATING_STATEMENTS = new Set(["return_statement", "raise_statement"]);

/** Statements that hand the current state to the enclosing loop */
const LOOP_EXIT_STATEMENTS = new Set(["continue_statement", "break_statement"]);

const COMPREHENSION_TYPES = new Set([
  "list_comprehension",
  "set_comprehension",
  "dictionary_comprehension",
  "generator_expression",
]);

/** Silent re-runs of a loop body before its head state is taken as stable */
const MAX_LOOP_PASSES = 3;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Whether control never falls off the end of the block. A block ending in
 * `break` or `continue` has already handed its state to the loop.
 */
function terminates(block: SyntaxNode | null): boolean {
  if (!block) return false;
  const statements = namedChildren(block).filter((child) => child.type !== "comment");
  const last = statements[statements.length - 1];
  return last !== undefined && (TERMINATING_STATEMENTS.has(last.type) || LOOP_EXIT_STATEMENTS.has(last.type));
}

function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

function identifiersIn(node: SyntaxNode): SyntaxNode[] {
  const found: SyntaxNode[] = [];
  walk(node, (current) => {
    if (current.type === "identifier") {
      found.push(current);
      return false;
    }
    // `x.y` and `x[i]` targets bind nothing new
    return current.type !== "attribute" && current.type !== "subscript";
  });
  return found;
}

function blockOf(clause: SyntaxNode): SyntaxNode | null {
  return clause.childForFieldName("body") ?? namedChildren(clause).find((child) => child.type === "block") ?? null;
}

function isAxisColumns(node: SyntaxNode | undefined): boolean {
  if (!node) return false;
  return node.text === "1" || stringLiteralValue(node) === "columns";
}

// =============================================================================
// Resolver
// =============================================================================

export class BindingResolver {
  private file = "";
  private silent = 0;
  private readonly pending: Array<Array<() => void>> = [];
  /** Innermost loop last */
  private loops: LoopExits[] = [];

  constructor(
    private readonly context: ResolverContext,
    private readonly sink: ResolverSink
  ) {}

  /**
   * Resolves bindings across a whole module, reporting every access site
   * on a bound receiver.
   */
  resolveModule(root: SyntaxNode, file: string): void {
    this.file = file;
    this.visitBody(root, new BindingScope());
  }

  // ---------------------------------------------------------------------------
  // Reporting
  // ---------------------------------------------------------------------------

  private emitAccess(
    kind: AccessKind,
    name: string,
    form: AccessSite["form"],
    node: SyntaxNode,
    receiver: SyntaxNode | string,
    inference: NonNullable<Inference>
  ): void {
    if (this.silent > 0) return;
    this.sink.access(
      { kind, name, form, location: locationOf(node, this.file) },
      {
        variable: typeof receiver === "string" ? receiver : receiver.text,
        schema: inference.schema,
        confidence: inference.confidence,
        boundAt: lineOf(node),
      }
    );
  }

  private emitDiagnostic(diagnostic: Diagnostic): void {
    if (this.silent > 0) return;
    this.sink.diagnostic(diagnostic);
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  /**
   * Visits a module or function body, then the bodies of the functions it
   * defines.
   */
  private visitBody(block: SyntaxNode, scope: BindingScope): void {
    const queue: Array<() => void> = [];
    const enclosingLoops = this.loops;
    this.loops = [];
    this.pending.push(queue);
    try {
      this.visitBlock(block, scope);
    } finally {
      this.pending.pop();
      this.loops = enclosingLoops;
    }
    for (const task of queue) {
      task();
    }
  }

  private visitBlock(block: SyntaxNode, scope: BindingScope, functionParent: BindingScope = scope): void {
    for (const statement of namedChildren(block)) {
      this.visitStatement(statement, scope, functionParent);
    }
  }

  private visitStatement(statement: SyntaxNode, scope: BindingScope, functionParent: BindingScope): void {
    switch (statement.type) {
      case "expression_statement":
        for (const expression of namedChildren(statement)) {
          if (expression.type === "assignment") {
            this.visitAssignment(expression, scope);
          } else if (expression.type === "augmented_assignment") {
            this.visitAugmentedAssignment(expression, scope);
          } else {
            this.scan(expression, scope);
          }
        }
        return;
      case "if_statement":
        this.visitIf(statement, scope);
        return;
      case "for_statement":
      case "while_statement":
        this.visitLoop(statement, scope);
        return;
      case "try_statement":
        this.visitTry(statement, scope);
        return;
      case "with_statement":
        this.visitWith(statement, scope);
        return;
      case "match_statement":
        this.visitMatch(statement, scope);
        return;
      case "function_definition":
        this.visitFunction(statement, scope, functionParent);
        return;
      case "class_definition":
        this.visitClass(statement, scope);
        return;
      case "decorated_definition": {
        for (const child of namedChildren(statement)) {
          if (child.type === "decorator") this.scan(child, scope);
        }
        const definition = statement.childForFieldName("definition");
        if (definition) this.visitStatement(definition, scope, functionParent);
        return;
      }
      case "delete_statement":
        this.visitDelete(statement, scope);
        return;
      case "import_statement":
      case "import_from_statement":
      case "future_import_statement":
      case "global_statement":
      case "nonlocal_statement":
      case "pass_statement":
      case "comment":
        return;
      case "break_statement":
        this.loops[this.loops.length - 1]?.breaks.push(scope.clone());
        return;
      case "continue_statement":
        this.loops[this.loops.length - 1]?.continues.push(scope.clone());
        return;
      default:
        for (const child of namedChildren(statement)) {
          this.scan(child, scope);
        }
    }
  }

  private visitAssignment(node: SyntaxNode, scope: BindingScope): void {
    const targets: SyntaxNode[] = [];
    let annotation: SyntaxNode | null = null;
    let current = node;
    let value: SyntaxNode | null = null;

    // a = b = value
    for (;;) {
      const left = current.childForFieldName("left");
      if (left) targets.push(left);
      annotation = annotation ?? current.childForFieldName("type");
      const right = current.childForFieldName("right");
      if (right?.type === "assignment") {
        current = right;
        continue;
      }
      value = right;
      break;
    }

    if (value) {
      this.scan(value, scope);
    }

    let inference: Inference = null;
    if (annotation) {
      const schemaName = schemaNameFromAnnotation(reduceTypeNode(annotation));
      const schema = schemaName ? this.context.registry.get(schemaName) : undefined;
      inference = schema ? { schema, confidence: "certain" } : null;
    } else if (value) {
      inference = this.infer(value, scope, true);
    }

    for (const target of targets) {
      this.assignTarget(target, inference, scope);
    }
  }

  private assignTarget(target: SyntaxNode, inference: Inference, scope: BindingScope): void {
    switch (target.type) {
      case "identifier":
        if (inference) {
          scope.bind(target.text, inference.schema, inference.confidence, lineOf(target));
        } else {
          scope.unbind(target.text, lineOf(target));
        }
        return;
      case "subscript":
        this.visitSubscriptWrite(target, scope);
        return;
      case "attribute": {
        const object = target.childForFieldName("object");
        if (object) this.scan(object, scope);
        return;
      }
      case "pattern_list":
      case "tuple_pattern":
      case "list_pattern":
      case "tuple":
      case "list":
      case "expression_list":
      case "list_splat_pattern":
      case "parenthesized_expression":
        for (const child of namedChildren(target)) {
          this.assignTarget(child, null, scope);
        }
        return;
      default:
        this.scan(target, scope);
    }
  }

  private visitAugmentedAssignment(node: SyntaxNode, scope: BindingScope): void {
    const left = node.childForFieldName("left");
    const right = node.childForFieldName("right");
    if (right) this.scan(right, scope);
    // `df["a"] += 1` reads the column; `df += 1` keeps the binding
    if (left && left.type !== "identifier") this.scan(left, scope);
  }

  /**
   * `df["c"] = v`, `df[["a", "b"]] = v`, `df.loc[:, "c"] = v`: write sites.
   * The receiver is rebound to a schema that includes the written columns.
   */
  private visitSubscriptWrite(target: SyntaxNode, scope: BindingScope): void {
    this.scanSubscriptParts(target, scope);

    const receiver = this.columnReceiver(target, scope);
    if (!receiver) return;

    this.reportUnresolvedReferences(receiver.columns);
    const inference = this.infer(receiver.object, scope);
    if (!inference) return;

    let schema = inference.schema;
    for (const entry of receiver.columns.entries) {
      if (entry.unresolvedIn) continue;
      this.emitAccess("write", entry.name, "subscript", entry.node, receiver.object, inference);
      if (!schemaAdmits(schema, entry.name)) {
        schema = extendSchema(schema, exactColumn(entry.name), this.derivedShape(schema));
      }
    }

    const variable = identifierName(receiver.object);
    if (variable && schema !== inference.schema) {
      scope.bind(variable, schema, "inferred", lineOf(target));
    }
  }

  /**
   * `del df["c"]` reads the column and rebinds the receiver without it.
   */
  private visitDelete(node: SyntaxNode, scope: BindingScope): void {
    const targets = namedChildren(node).flatMap((child) =>
      child.type === "expression_list" ? namedChildren(child) : [child]
    );

    for (const target of targets) {
      if (target.type === "identifier") {
        scope.unbind(target.text, lineOf(target));
        continue;
      }
      if (target.type !== "subscript") {
        this.scan(target, scope);
        continue;
      }

      this.scanSubscriptParts(target, scope);
      this.checkSubscriptRead(target, scope);

      const receiver = this.columnReceiver(target, scope);
      const variable = receiver ? identifierName(receiver.object) : null;
      const inference = receiver ? this.infer(receiver.object, scope) : null;
      if (!receiver || !variable || !inference) continue;

      const names = receiver.columns.entries.filter((entry) => !entry.unresolvedIn).map((entry) => entry.name);
      const remaining = dropColumns(inference.schema, names, this.derivedShape(inference.schema));
      scope.bind(variable, remaining.schema, "inferred", lineOf(target));
    }
  }

  private visitIf(node: SyntaxNode, scope: BindingScope): void {
    const condition = node.childForFieldName("condition");
    if (condition) this.scan(condition, scope);

    const paths: BindingScope[] = [];
    const branch = (block: SyntaxNode | null): void => {
      const path = scope.clone();
      if (block) this.visitBlock(block, path);
      if (!terminates(block)) paths.push(path);
    };

    branch(node.childForFieldName("consequence"));

    let hasElse = false;
    for (const alternative of fieldChildren(node, "alternative")) {
      if (alternative.type === "elif_clause") {
        const elifCondition = alternative.childForFieldName("condition");
        if (elifCondition) this.scan(elifCondition, scope);
        branch(alternative.childForFieldName("consequence"));
      } else {
        hasElse = true;
        branch(blockOf(alternative));
      }
    }

    if (!hasElse) {
      paths.push(scope.clone());
    }
    scope.mergeFrom(paths);
  }

  private visitLoop(node: SyntaxNode, scope: BindingScope): void {
    const isFor = node.type === "for_statement";
    const body = node.childForFieldName("body");
    const condition = node.childForFieldName("condition");
    const loopTarget = node.childForFieldName("left");

    if (isFor) {
      const iterable = node.childForFieldName("right");
      if (iterable) this.scan(iterable, scope);
    }

    const runBody = (start: BindingScope): LoopPass => {
      const state = start.clone();
      if (loopTarget) {
        for (const identifier of identifiersIn(loopTarget)) {
          state.unbind(identifier.text, lineOf(identifier));
        }
      }
      const exits: LoopExits = { breaks: [], continues: [] };
      this.loops.push(exits);
      try {
        if (body) this.visitBlock(body, state);
      } finally {
        this.loops.pop();
      }
      // every path that comes back to the head for another iteration
      const rejoin = terminates(body) ? exits.continues : [state, ...exits.continues];
      return { rejoin, breaks: exits.breaks };
    };

    // Find the bindings that hold at the loop head on every iteration
    let head = scope.clone();
    this.silent++;
    try {
      for (let pass = 0; pass < MAX_LOOP_PASSES; pass++) {
        const { rejoin } = runBody(head);
        const next = scope.clone();
        next.mergeFrom([scope.clone(), ...rejoin]);
        if (next.sameBindingsAs(head)) break;
        head = next;
      }
    } finally {
      this.silent--;
    }

    if (condition) this.scan(condition, head);
    const { rejoin, breaks } = runBody(head);

    // the loop runs out at the head; `else` runs only then, never after a break
    const exhausted = head.clone();
    exhausted.mergeFrom([head, ...rejoin]);
    const alternative = node.childForFieldName("alternative");
    const elseBlock = alternative ? blockOf(alternative) : null;
    if (elseBlock) this.visitBlock(elseBlock, exhausted);

    scope.mergeFrom(elseBlock && terminates(elseBlock) ? breaks : [exhausted, ...breaks]);
  }

  private visitTry(node: SyntaxNode, scope: BindingScope): void {
    const body = node.childForFieldName("body");
    const bodyState = scope.clone();
    if (body) this.visitBlock(body, bodyState);

    let normal: BindingScope | null = terminates(body) ? null : bodyState;
    const handlers: SyntaxNode[] = [];
    let finallyBlock: SyntaxNode | null = null;

    for (const clause of namedChildren(node)) {
      if (clause.type === "except_clause" || clause.type === "except_group_clause") {
        handlers.push(clause);
      } else if (clause.type === "else_clause") {
        const elseBlock = blockOf(clause);
        if (normal && elseBlock) {
          this.visitBlock(elseBlock, normal);
          if (terminates(elseBlock)) normal = null;
        }
      } else if (clause.type === "finally_clause") {
        finallyBlock = blockOf(clause);
      }
    }

    // A handler may start from any point of the body
    const handlerStart = scope.clone();
    handlerStart.mergeFrom([scope.clone(), bodyState]);

    const paths: BindingScope[] = normal ? [normal] : [];
    for (const handler of handlers) {
      const state = handlerStart.clone();
      const block = blockOf(handler);
      for (const child of namedChildren(handler)) {
        if (child.type === "block") continue;
        if (child.type === "as_pattern") {
          const [expression, ...aliases] = namedChildren(child);
          if (expression) this.scan(expression, state);
          for (const alias of aliases) {
            for (const identifier of identifiersIn(alias)) state.unbind(identifier.text, lineOf(identifier));
          }
        } else {
          this.scan(child, state);
        }
      }
      if (block) this.visitBlock(block, state);
      if (!terminates(block)) paths.push(state);
    }

    scope.mergeFrom(paths);
    if (finallyBlock) this.visitBlock(finallyBlock, scope);
  }

  private visitWith(node: SyntaxNode, scope: BindingScope): void {
    for (const child of namedChildren(node)) {
      if (child.type !== "with_clause") continue;
      for (const item of namedChildren(child)) {
        const value = item.childForFieldName("value") ?? namedChildren(item)[0];
        if (!value) continue;
        if (value.type === "as_pattern") {
          const [expression, ...aliases] = namedChildren(value);
          if (expression) this.scan(expression, scope);
          for (const alias of aliases) {
            for (const identifier of identifiersIn(alias)) scope.unbind(identifier.text, lineOf(identifier));
          }
        } else {
          this.scan(value, scope);
        }
      }
    }

    const body = node.childForFieldName("body");
    if (body) this.visitBlock(body, scope);
  }

  private visitMatch(node: SyntaxNode, scope: BindingScope): void {
    for (const subject of fieldChildren(node, "subject")) {
      this.scan(subject, scope);
    }

    // the pre-state path covers "no case matched"
    const paths: BindingScope[] = [scope.clone()];
    const body = node.childForFieldName("body");
    for (const clause of body ? namedChildren(body) : []) {
      if (clause.type !== "case_clause") continue;
      const state = scope.clone();
      const guard = clause.childForFieldName("guard");
      if (guard) this.scan(guard, state);
      const consequence = clause.childForFieldName("consequence");
      if (consequence) this.visitBlock(consequence, state);
      if (!terminates(consequence)) paths.push(state);
    }
    scope.mergeFrom(paths);
  }

  private visitFunction(node: SyntaxNode, scope: BindingScope, functionParent: BindingScope): void {
    // a def over a bound variable replaces its data
    const name = node.childForFieldName("name");
    if (name && scope.lookup(name.text)) scope.unbind(name.text, lineOf(name));

    const parameters = node.childForFieldName("parameters");
    for (const parameter of parameters ? namedChildren(parameters) : []) {
      const defaultValue = parameter.childForFieldName("value");
      if (defaultValue) this.scan(defaultValue, scope);
    }

    const body = node.childForFieldName("body");
    const queue = this.pending[this.pending.length - 1];
    if (this.silent > 0 || !body || !queue) return;

    queue.push(() => {
      const functionScope = new BindingScope(functionParent);
      if (parameters) this.bindParameters(parameters, functionScope);
      this.visitBody(body, functionScope);
    });
  }

  private bindParameters(parameters: SyntaxNode, scope: BindingScope): void {
    for (const parameter of namedChildren(parameters)) {
      let nameNode: SyntaxNode | null = null;
      let annotation: SyntaxNode | null = null;

      switch (parameter.type) {
        case "identifier":
          nameNode = parameter;
          break;
        case "typed_parameter":
          nameNode = namedChildren(parameter).find((child) => child.type === "identifier") ?? null;
          annotation = parameter.childForFieldName("type");
          break;
        case "default_parameter":
        case "typed_default_parameter":
          nameNode = parameter.childForFieldName("name");
          annotation = parameter.childForFieldName("type");
          break;
        default:
          for (const identifier of identifiersIn(parameter)) {
            scope.unbind(identifier.text, lineOf(identifier));
          }
          continue;
      }

      if (!nameNode || nameNode.type !== "identifier") continue;

      const schemaName = annotation ? schemaNameFromAnnotation(reduceTypeNode(annotation)) : null;
      const schema = schemaName ? this.context.registry.get(schemaName) : undefined;
      if (schema) {
        scope.bind(nameNode.text, schema, "certain", lineOf(nameNode));
      } else {
        scope.unbind(nameNode.text, lineOf(nameNode));
      }
    }
  }

  private visitClass(node: SyntaxNode, scope: BindingScope): void {
    const superclasses = node.childForFieldName("superclasses");
    if (superclasses) this.scan(superclasses, scope);

    const body = node.childForFieldName("body");
    if (body) {
      // methods see the enclosing scope, not the class body
      this.visitBlock(body, new BindingScope(scope), scope);
    }

    const name = node.childForFieldName("name");
    if (name && scope.lookup(name.text)) scope.unbind(name.text, lineOf(name));
  }

  // ---------------------------------------------------------------------------
  // Expressions: access sites
  // ---------------------------------------------------------------------------

  /**
   * Walks an expression and reports every column read on a bound receiver.
   */
  private scan(node: SyntaxNode, scope: BindingScope): void {
    switch (node.type) {
      case "subscript":
        this.checkSubscriptRead(node, scope);
        this.scanSubscriptParts(node, scope);
        return;
      case "attribute": {
        this.checkAttributeRead(node, scope);
        const object = node.childForFieldName("object");
        if (object) this.scan(object, scope);
        return;
      }
      case "call":
        this.scanCall(node, scope);
        return;
      case "lambda": {
        const inner = new BindingScope(scope);
        const parameters = node.childForFieldName("parameters");
        if (parameters) {
          for (const identifier of identifiersIn(parameters)) inner.unbind(identifier.text, lineOf(identifier));
        }
        const body = node.childForFieldName("body");
        if (body) this.scan(body, inner);
        return;
      }
      case "named_expression": {
        const value = node.childForFieldName("value");
        const name = node.childForFieldName("name");
        if (!value) return;
        this.scan(value, scope);
        if (name) {
          const inference = this.infer(value, scope);
          this.assignTarget(name, inference, scope);
        }
        return;
      }
      case "keyword_argument": {
        const value = node.childForFieldName("value");
        if (value) this.scan(value, scope);
        return;
      }
      default:
        break;
    }

    if (COMPREHENSION_TYPES.has(node.type)) {
      const inner = new BindingScope(scope);
      for (const clause of namedChildren(node)) {
        if (clause.type !== "for_in_clause") continue;
        const left = clause.childForFieldName("left");
        for (const identifier of left ? identifiersIn(left) : []) {
          inner.unbind(identifier.text, lineOf(identifier));
        }
      }
      for (const child of namedChildren(node)) {
        this.scan(child, inner);
      }
      return;
    }

    for (const child of namedChildren(node)) {
      this.scan(child, scope);
    }
  }

  private scanSubscriptParts(node: SyntaxNode, scope: BindingScope): void {
    const value = node.childForFieldName("value");
    if (value) this.scan(value, scope);
    for (const index of subscriptIndices(node)) {
      this.scan(index, scope);
    }
  }

  private scanCall(node: SyntaxNode, scope: BindingScope): void {
    const parts = callParts(node);
    if (!parts) return;

    const callee = unwrapParens(parts.callee);
    if (callee.type === "attribute") {
      const object = callee.childForFieldName("object");
      const method = callee.childForFieldName("attribute")?.text;
      if (object && method) {
        this.checkMethodArguments(method, object, parts, scope);
        this.scan(object, scope);
      }
    } else {
      this.scan(callee, scope);
    }

    const args = node.childForFieldName("arguments");
    if (args) this.scan(args, scope);
  }

  private checkSubscriptRead(node: SyntaxNode, scope: BindingScope): void {
    const receiver = this.columnReceiver(node, scope);
    if (!receiver) return;

    this.reportUnresolvedReferences(receiver.columns);
    const inference = this.infer(receiver.object, scope);
    if (!inference) return;

    for (const entry of receiver.columns.entries) {
      if (!entry.unresolvedIn) {
        this.emitAccess("read", entry.name, "subscript", entry.node, receiver.object, inference);
      }
    }
  }

  private checkAttributeRead(node: SyntaxNode, scope: BindingScope): void {
    const object = node.childForFieldName("object");
    const attribute = node.childForFieldName("attribute");
    if (!object || !attribute) return;

    const name = attribute.text;
    if (name.startsWith("_") || this.context.frameMembers.has(name)) return;

    const inference = this.infer(object, scope);
    if (inference) {
      this.emitAccess("read", name, "attribute", attribute, object, inference);
    }
  }

  /**
   * Column-naming arguments of `groupby`, `sort_values`, `select`, `drop`
   * and friends are reads; `assign` keywords are writes.
   */
  private checkMethodArguments(method: string, object: SyntaxNode, parts: CallParts, scope: BindingScope): void {
    const columnArgs = COLUMN_ARGUMENT_METHODS[method];
    if (!columnArgs && method !== "drop" && method !== "assign") return;

    const inference = this.infer(object, scope);
    if (!inference) return;

    if (method === "assign") {
      for (const [keyword, value] of parts.keywords) {
        const keywordNode = value.parent?.childForFieldName("name") ?? value;
        this.emitAccess("write", keyword, "argument", keywordNode, object, inference);
      }
      return;
    }

    const argumentNodes = method === "drop" ? this.dropArgumentNodes(parts) : this.columnArgumentNodes(parts, columnArgs);
    for (const argument of argumentNodes) {
      const list = this.columnList(argument, scope) ?? this.polarsColumns(argument);
      if (!list) continue;
      this.reportUnresolvedReferences(list);
      for (const entry of list.entries) {
        if (!entry.unresolvedIn) {
          this.emitAccess("read", entry.name, "argument", entry.node, object, inference);
        }
      }
    }
  }

  private columnArgumentNodes(
    parts: CallParts,
    columnArgs: { positional: boolean; keywords: string[] } | undefined
  ): SyntaxNode[] {
    if (!columnArgs) return [];
    const nodes = columnArgs.positional ? [...parts.positional] : [];
    for (const keyword of columnArgs.keywords) {
      const value = parts.keywords.get(keyword);
      if (value) nodes.push(value);
    }
    return nodes;
  }

  /**
   * `drop(columns=...)` or `drop([...], axis=1)`. A positional drop without
   * an axis may drop rows (pandas) or columns (polars) and is not judged.
   */
  private dropArgumentNodes(parts: CallParts): SyntaxNode[] {
    const columns = parts.keywords.get("columns");
    if (columns) return [columns];
    const first = parts.positional[0];
    if (first && (isAxisColumns(parts.keywords.get("axis")) || isAxisColumns(parts.positional[1]))) {
      return [first];
    }
    return [];
  }

  private reportUnresolvedReferences(list: ColumnList): void {
    for (const entry of list.entries) {
      const schema = entry.unresolvedIn;
      if (!schema) continue;
      const object = entry.node.childForFieldName("object") ?? entry.node;
      this.emitAccess("read", entry.name, "schema-reference", entry.node, object, {
        schema,
        confidence: "certain",
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Expressions: column names
  // ---------------------------------------------------------------------------

  /**
   * Receiver and column names of `x["c"]`, `x[["a", "b"]]`, `x[S.c]` and
   * `x.loc[rows, "c"]`.
   */
  private columnReceiver(node: SyntaxNode, scope: BindingScope): ColumnReceiver | null {
    const value = node.childForFieldName("value");
    const indices = subscriptIndices(node);
    if (!value) return null;

    const target = unwrapParens(value);
    const accessor = target.type === "attribute" ? target.childForFieldName("attribute")?.text : undefined;
    if (target.type === "attribute" && (accessor === "loc" || accessor === "at")) {
      const object = target.childForFieldName("object");
      const columnPart = this.columnPart(indices);
      const columns = columnPart ? this.columnList(columnPart, scope) : null;
      return object && columns ? { object, columns } : null;
    }

    const index = indices[0];
    if (indices.length !== 1 || !index) return null;
    const columns = this.columnList(index, scope);
    return columns ? { object: value, columns } : null;
  }

  /**
   * Column selector of a `.loc[rows, cols]` index.
   */
  private columnPart(indices: SyntaxNode[]): SyntaxNode | null {
    if (indices.length === 2) return indices[1] ?? null;
    const only = indices[0];
    if (indices.length === 1 && only?.type === "tuple") {
      const elements = namedChildren(only);
      return elements.length === 2 ? (elements[1] ?? null) : null;
    }
    return null;
  }

  private columnList(node: SyntaxNode, scope: BindingScope): ColumnList | null {
    const single = this.columnEntry(node, scope);
    if (single) {
      return { entries: [single], complete: true, single: true };
    }

    const target = unwrapParens(node);
    if (target.type !== "list" && target.type !== "tuple") return null;

    const entries: ColumnEntry[] = [];
    let complete = true;
    for (const element of sequenceElements(target) ?? []) {
      const entry = this.columnEntry(element, scope);
      if (entry) {
        entries.push(entry);
      } else {
        complete = false;
      }
    }
    return { entries, complete, single: false };
  }

  private columnEntry(node: SyntaxNode, scope: BindingScope): ColumnEntry | null {
    const literal = stringLiteralValue(node);
    if (literal !== null) {
      return { name: literal, node };
    }

    const target = unwrapParens(node);
    if (target.type !== "attribute") return null;

    const object = target.childForFieldName("object");
    const member = target.childForFieldName("attribute")?.text;
    const objectName = identifierName(object);
    // a bound or shadowed variable is data, not a schema class
    if (!object || !member || (objectName !== null && scope.lookup(objectName) !== undefined)) return null;
    if (objectName === null && dottedName(object) === null) return null;

    const schema = this.context.registry.get(tailName(object) ?? "");
    if (!schema) return null;

    const column = findColumnByName(schema, member);
    if (column) {
      return { name: column.lookupKey, node: target };
    }
    if (schema.groups.has(member)) {
      return { name: member, node: target };
    }
    return { name: member, node: target, unresolvedIn: schema };
  }

  /**
   * `pl.col("a")` / `pl.col(["a", "b"])` as a selector argument.
   */
  private polarsColumns(node: SyntaxNode): ColumnList | null {
    const parts = callParts(node);
    if (!parts || tailName(parts.callee) !== "col") return null;

    const entries: ColumnEntry[] = [];
    let complete = true;
    for (const argument of parts.positional) {
      const elements = sequenceElements(argument) ?? [argument];
      for (const element of elements) {
        const literal = stringLiteralValue(element);
        if (literal === null) {
          complete = false;
        } else {
          entries.push({ name: literal, node: element });
        }
      }
    }
    return { entries, complete, single: false };
  }

  // ---------------------------------------------------------------------------
  // Expressions: inference
  // ---------------------------------------------------------------------------

  /**
   * Schema carried by the value of an expression. `report` is set only for
   * right-hand sides of assignments, so that composition conflicts are
   * reported once per site.
   */
  private infer(node: SyntaxNode, scope: BindingScope, report = false): Inference {
    const target = unwrapParens(node);

    switch (target.type) {
      case "identifier": {
        const binding = scope.lookup(target.text);
        return binding?.schema ? { schema: binding.schema, confidence: binding.confidence } : null;
      }
      case "call":
        return this.inferCall(target, scope, report);
      case "subscript":
        return this.inferSubscript(target, scope);
      case "conditional_expression": {
        const [whenTrue, , whenFalse] = namedChildren(target);
        const left = whenTrue ? this.infer(whenTrue, scope) : null;
        const right = whenFalse ? this.infer(whenFalse, scope) : null;
        return left && right && left.schema === right.schema ? { schema: left.schema, confidence: "inferred" } : null;
      }
      case "await": {
        const inner = namedChildren(target)[0];
        return inner ? this.infer(inner, scope, report) : null;
      }
      case "named_expression": {
        const value = target.childForFieldName("value");
        return value ? this.infer(value, scope, report) : null;
      }
      default:
        return null;
    }
  }

  private schemaNamed(node: SyntaxNode | null | undefined): SchemaDefinition | null {
    const name = node ? tailName(node) : null;
    return name ? (this.context.registry.get(name) ?? null) : null;
  }

  private inferCall(node: SyntaxNode, scope: BindingScope, report: boolean): Inference {
    const parts = callParts(node);
    if (!parts) return null;

    const factory = this.factorySchema(parts, scope);
    if (factory) {
      return { schema: factory, confidence: "certain" };
    }

    const callee = unwrapParens(parts.callee);
    if (callee.type === "attribute") {
      const object = callee.childForFieldName("object");
      const method = callee.childForFieldName("attribute")?.text;
      const receiver = object ? this.infer(object, scope, report) : null;
      if (receiver && method) {
        return this.inferMethod(method, receiver, parts, node, scope, report);
      }
    }

    const functionName = tailName(callee);
    if (functionName === "merge") {
      const left = parts.keywords.get("left") ?? parts.positional[0];
      const right = parts.keywords.get("right") ?? parts.positional[1];
      return this.inferUnion([left, right], node, scope, report);
    }
    if (functionName === "concat") {
      const items = sequenceElements(parts.keywords.get("objs") ?? parts.keywords.get("items") ?? parts.positional[0] ?? null);
      return items && items.length > 0 ? this.inferUnion(items, node, scope, report) : null;
    }

    return null;
  }

  /**
   * Calls whose result is known to carry a schema regardless of their
   * arguments' bindings.
   */
  private factorySchema(parts: CallParts, scope: BindingScope): SchemaDefinition | null {
    const callee = unwrapParens(parts.callee);

    // PandasFrame[S](...)
    if (callee.type === "subscript") {
      const head = tailName(callee.childForFieldName("value"));
      const indices = subscriptIndices(callee);
      if (head && FRAME_TYPE_NAMES.has(head) && indices.length === 1) {
        return this.schemaNamed(indices[0]);
      }
      return null;
    }

    const schemaKeyword = parts.keywords.get("schema");
    if (schemaKeyword) {
      const schema = this.schemaNamed(schemaKeyword);
      if (schema) return schema;
    }

    const calleeName = tailName(callee);
    if (calleeName === "from_schema") {
      return this.schemaNamed(parts.positional[1]);
    }

    if (callee.type === "attribute") {
      const object = unwrapParens(callee.childForFieldName("object") ?? callee);
      const objectName = identifierName(object);
      if (calleeName && (SCHEMA_CONSTRUCTORS.has(calleeName) || calleeName.startsWith("read_"))) {
        // S.read_csv(...) or S().read_csv(...)
        const schemaNode = object.type === "call" ? object.childForFieldName("function") : object;
        const shadowed = objectName !== null && scope.lookup(objectName) !== undefined;
        if (!shadowed) {
          const schema = this.schemaNamed(schemaNode);
          if (schema) return schema;
        }
      }
      // module.load_users(...)
      if (objectName !== null && scope.lookup(objectName) !== undefined) return null;
    }

    if (calleeName && (callee.type === "identifier" || dottedName(callee) !== null)) {
      const shadowed = callee.type === "identifier" && scope.lookup(calleeName) !== undefined;
      if (!shadowed) {
        return this.context.registry.factoryReturn(calleeName) ?? null;
      }
    }
    return null;
  }

  private inferMethod(
    method: string,
    receiver: NonNullable<Inference>,
    parts: CallParts,
    node: SyntaxNode,
    scope: BindingScope,
    report: boolean
  ): Inference {
    if (PRESERVING_METHODS.has(method)) {
      return { schema: receiver.schema, confidence: "inferred" };
    }

    const shape = this.derivedShape(receiver.schema);
    switch (method) {
      case "merge":
      case "join": {
        const other = parts.keywords.get("right") ?? parts.keywords.get("other") ?? parts.positional[0];
        const otherInference = other ? this.infer(other, scope) : null;
        return otherInference ? this.composeAt([receiver.schema, otherInference.schema], node, report) : null;
      }
      case "select": {
        const names: string[] = [];
        for (const argument of parts.positional) {
          const list = this.columnList(argument, scope) ?? this.polarsColumns(argument);
          if (!list || !list.complete || list.entries.some((entry) => entry.unresolvedIn)) return null;
          names.push(...list.entries.map((entry) => entry.name));
        }
        if (names.length === 0 || parts.keywords.size > 0 || parts.hasSplat) return null;
        return { schema: selectColumns(receiver.schema, names, shape).schema, confidence: "inferred" };
      }
      case "drop": {
        const names: string[] = [];
        for (const argument of this.dropArgumentNodes(parts)) {
          const list = this.columnList(argument, scope);
          if (!list || !list.complete || list.entries.some((entry) => entry.unresolvedIn)) return null;
          names.push(...list.entries.map((entry) => entry.name));
        }
        if (names.length === 0) return null;
        return { schema: dropColumns(receiver.schema, names, shape).schema, confidence: "inferred" };
      }
      case "rename": {
        const mapping = this.renameMapping(parts);
        return mapping ? { schema: renameColumns(receiver.schema, mapping, shape), confidence: "inferred" } : null;
      }
      case "assign": {
        if (parts.hasSplat) return null;
        let schema = receiver.schema;
        for (const keyword of parts.keywords.keys()) {
          if (!schemaAdmits(schema, keyword)) {
            schema = extendSchema(schema, exactColumn(keyword), shape);
          }
        }
        return { schema, confidence: "inferred" };
      }
      default:
        return null;
    }
  }

  /**
   * `rename(columns={"a": "b"})`, or a positional mapping with
   * `axis="columns"`.
   */
  private renameMapping(parts: CallParts): Map<string, string> | null {
    const positional = parts.positional[0];
    const node =
      parts.keywords.get("columns") ??
      (positional && isAxisColumns(parts.keywords.get("axis")) ? positional : undefined);
    if (!node || node.type !== "dictionary") return null;

    const mapping = new Map<string, string>();
    for (const pair of namedChildren(node)) {
      if (pair.type !== "pair") return null;
      const key = stringLiteralValue(pair.childForFieldName("key"));
      const value = stringLiteralValue(pair.childForFieldName("value"));
      if (key === null || value === null) return null;
      mapping.set(key, value);
    }
    return mapping;
  }

  private inferSubscript(node: SyntaxNode, scope: BindingScope): Inference {
    const value = node.childForFieldName("value");
    if (!value) return null;
    const indices = subscriptIndices(node);
    const target = unwrapParens(value);

    const accessor = target.type === "attribute" ? target.childForFieldName("attribute")?.text : undefined;
    if (target.type === "attribute" && (accessor === "loc" || accessor === "iloc")) {
      const object = target.childForFieldName("object");
      const receiver = object ? this.infer(object, scope) : null;
      if (!receiver) return null;

      const columnPart = this.columnPart(indices);
      if (!columnPart) {
        // rows only
        return indices.length === 1 ? { schema: receiver.schema, confidence: "inferred" } : null;
      }
      if (columnPart.type === "slice") {
        return { schema: receiver.schema, confidence: "inferred" };
      }
      const list = accessor === "loc" ? this.columnList(columnPart, scope) : null;
      if (!list || list.single || !list.complete || list.entries.some((entry) => entry.unresolvedIn)) return null;
      const names = list.entries.map((entry) => entry.name);
      return {
        schema: selectColumns(receiver.schema, names, this.derivedShape(receiver.schema)).schema,
        confidence: "inferred",
      };
    }

    const receiver = this.infer(value, scope);
    const index = indices[0];
    if (!receiver || indices.length !== 1 || !index) return null;

    const list = this.columnList(index, scope);
    if (list) {
      if (list.single || !list.complete || list.entries.some((entry) => entry.unresolvedIn)) return null;
      const names = list.entries.map((entry) => entry.name);
      return {
        schema: selectColumns(receiver.schema, names, this.derivedShape(receiver.schema)).schema,
        confidence: "inferred",
      };
    }

    if (this.isMask(index, scope)) {
      return { schema: receiver.schema, confidence: "inferred" };
    }
    return null;
  }

  private isMask(index: SyntaxNode, scope: BindingScope): boolean {
    const target = unwrapParens(index);
    if (MASK_INDEX_TYPES.has(target.type)) return true;
    // df[df.flag] / df[df["flag"]]
    if (target.type === "attribute") {
      const object = target.childForFieldName("object");
      return object !== null && this.infer(object, scope) !== null;
    }
    if (target.type === "subscript") {
      const object = target.childForFieldName("value");
      return object !== null && this.infer(object, scope) !== null;
    }
    return false;
  }

  private inferUnion(
    operands: ReadonlyArray<SyntaxNode | undefined>,
    node: SyntaxNode,
    scope: BindingScope,
    report: boolean
  ): Inference {
    const schemas: SchemaDefinition[] = [];
    for (const operand of operands) {
      const inference = operand ? this.infer(operand, scope) : null;
      if (!inference) return null;
      schemas.push(inference.schema);
    }
    return this.composeAt(schemas, node, report);
  }

  /**
   * Union of the operands' schemas for merge/join/concat. A conflict is
   * reported at the call and leaves the result Unknown.
   */
  private composeAt(schemas: SchemaDefinition[], node: SyntaxNode, report: boolean): Inference {
    const [first] = schemas;
    if (!first) return null;
    if (schemas.every((schema) => schema === first)) {
      return { schema: first, confidence: "inferred" };
    }

    const location = locationOf(node, this.file);
    const composed = composeSchemas(schemas, {
      name: [...new Set(schemas.map((schema) => schema.name))].join(" + "),
      declaredAt: location,
      origin: "derived",
    });
    if (composed.ok) {
      return { schema: composed.value, confidence: "inferred" };
    }
    if (report) {
      this.emitDiagnostic(diagnosticFromError(composed.error, "SchemaConflictError", location));
    }
    return null;
  }

  private derivedShape(source: SchemaDefinition): SchemaShape {
    return { name: source.name, declaredAt: source.declaredAt, origin: "derived" };
  }
}

