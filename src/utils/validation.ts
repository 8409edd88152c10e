/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Configuration Schema
// =============================================================================

export const OutputFormatSchema = z.enum(["human", "json"]);

/**
 * framecheck.config.json
 */
export const FrameCheckConfigSchema = z
  .object({
    /** Set to false to opt a project out of checking */
    enabled: z.boolean().default(true),

    /** Treat warnings as failures */
    strict: z.boolean().default(false),

    outputFormat: OutputFormatSchema.default("human"),

    /** Glob patterns for source files, relative to the checked directory */
    include: z.array(z.string().min(1)).default(["**/*.py", "**/*.pyi"]),

    /** Glob patterns to exclude */
    exclude: z.array(z.string().min(1)).default([]),

    /** Maximum files processed at once */
    concurrency: z.number().int().positive().max(256).optional(),
  })
  .strict();

export type FrameCheckConfig = z.infer<typeof FrameCheckConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @returns Validation result with either data or error
 */
export function safeValidate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
