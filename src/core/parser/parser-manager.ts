/**
 * Parser Manager
 *
 * Manages the Tree-sitter parser for Python sources.
 * Provides a unified interface for parsing source code into syntax trees.
 *
 * @module
 */

import { Parser, Language, type Tree, type Node } from "web-tree-sitter";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { ErrorCode, ParsingError } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Supported language identifiers
 */
export type SupportedLanguage = "python";

/**
 * Parse result from Tree-sitter
 */
export interface ParseResult {
  /** The parsed syntax tree */
  tree: Tree;
  /** Source code that was parsed */
  sourceCode: string;
  /** Language that was used */
  language: SupportedLanguage;
  /** Parse time in milliseconds */
  parseTimeMs: number;
  /** Whether there were any parse errors */
  hasErrors: boolean;
}

export interface ParserManagerOptions {
  /** Explicit path to the Python grammar WASM file */
  grammarWasmPath?: string;
}

// =============================================================================
// Constants
// =============================================================================

const GRAMMAR_MODULE = "tree-sitter-python";
const GRAMMAR_WASM_FILE = "tree-sitter-python.wasm";

// =============================================================================
// Parser Manager Class
// =============================================================================

/**
 * Manages the Tree-sitter parser for Python.
 *
 * @example
 * ```typescript
 * const manager = new ParserManager();
 * await manager.initialize();
 *
 * const parsed = manager.parseSource("users.py", source);
 * if (parsed.ok) {
 *   console.log(parsed.value.tree.rootNode.type); // "module"
 * }
 *
 * await manager.close();
 * ```
 */
export class ParserManager {
  private parser: Parser | null = null;
  private language: Language | null = null;
  private initialized = false;
  private readonly options: ParserManagerOptions;

  constructor(options: ParserManagerOptions = {}) {
    this.options = options;
  }

  /**
   * Initializes Tree-sitter and loads the Python grammar.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await Parser.init();

    const wasmPath = this.options.grammarWasmPath ?? this.resolveWasmPath();
    this.language = await Language.load(wasmPath);

    const parser = new Parser();
    parser.setLanguage(this.language);
    this.parser = parser;

    this.initialized = true;
  }

  /**
   * Closes the parser and releases resources.
   */
  async close(): Promise<void> {
    this.parser?.delete();
    this.parser = null;
    this.language = null;
    this.initialized = false;
  }

  /**
   * Parses source code directly.
   */
  parseCode(code: string): ParseResult {
    const parser = this.getParser();
    const startTime = performance.now();

    const tree = parser.parse(code);
    const parseTimeMs = performance.now() - startTime;

    if (!tree) {
      throw new ParsingError("Tree-sitter returned no tree", ErrorCode.PARSE_TREE_SITTER_ERROR);
    }

    return {
      tree,
      sourceCode: code,
      language: "python",
      parseTimeMs,
      hasErrors: tree.rootNode.hasError,
    };
  }

  /**
   * Parses a file's text, turning a tree with syntax errors into a
   * ParsingError located at the first error node. The failed tree is
   * released before returning.
   */
  parseSource(filePath: string, code: string): Result<ParseResult, ParsingError> {
    const result = this.parseCode(code);
    if (!result.hasErrors) {
      return ok(result);
    }

    const errorNode = findFirstErrorNode(result.tree.rootNode);
    const line = (errorNode?.startPosition.row ?? 0) + 1;
    const column = (errorNode?.startPosition.column ?? 0) + 1;
    const message =
      errorNode?.isMissing === true
        ? `Syntax error: missing '${errorNode.type}'`
        : "Syntax error: invalid syntax";
    result.tree.delete();

    return err(
      new ParsingError(message, ErrorCode.PARSE_SYNTAX_ERROR, { filePath, line, column })
    );
  }

  /**
   * Gets the loaded parser.
   */
  getParser(): Parser {
    if (!this.initialized || !this.parser) {
      throw new ParsingError(
        "ParserManager not initialized. Call initialize() first.",
        ErrorCode.PARSE_TREE_SITTER_ERROR
      );
    }
    return this.parser;
  }

  /**
   * Resolves the WASM file path for the grammar.
   */
  private resolveWasmPath(): string {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);

    // Same depth from src/core/parser and dist/core/parser
    const nodeModulesPath = path.resolve(__dirname, "../../../node_modules");
    return path.join(nodeModulesPath, GRAMMAR_MODULE, GRAMMAR_WASM_FILE);
  }
}

/**
 * Finds the first ERROR or MISSING node in document order.
 */
function findFirstErrorNode(root: Node): Node | null {
  const stack: Node[] = [root];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;

    if (current.isError || current.isMissing) {
      return current;
    }
    if (!current.hasError && current !== root) {
      continue;
    }

    for (let i = current.children.length - 1; i >= 0; i--) {
      const child = current.children[i];
      if (child) {
        stack.push(child);
      }
    }
  }

  return null;
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates and initializes a ParserManager instance.
 */
export async function createParserManager(options?: ParserManagerOptions): Promise<ParserManager> {
  const manager = new ParserManager(options);
  await manager.initialize();
  return manager;
}
