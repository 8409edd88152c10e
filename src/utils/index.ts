/**
 * Shared utilities
 */

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// Re-export configuration loading
export * from "./config.js";
export * from "./validation.js";
