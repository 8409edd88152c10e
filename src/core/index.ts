/**
 * Core module - the schema-flow analysis engine
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./parser/index.js";
export * from "./registry/schema-registry.js";
export * from "./registry/declarations.js";
export * from "./registry/membership.js";
export * from "./registry/frame-members.js";
export * from "./resolver/binding-scope.js";
export * from "./resolver/binding-resolver.js";
export * from "./checker/fuzzy-match.js";
export * from "./checker/reference-checker.js";
export * from "./checker/file-checker.js";
export * from "./diagnostics/diagnostic.js";
export * from "./reporter/diagnostic-reporter.js";
export * from "./engine/worker-pool.js";
export * from "./engine/schema-flow-engine.js";
export * from "./export/zod-exporter.js";

// Re-export types
export * from "../types/index.js";
export * from "../types/result.js";
