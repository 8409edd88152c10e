/**
 * Source Parser Module
 *
 * Tree-sitter based parsing of Python sources into syntax trees, plus the
 * node helpers the registry and resolver read trees with.
 *
 * @module
 */

export * from "./parser-manager.js";
export * from "./syntax.js";
