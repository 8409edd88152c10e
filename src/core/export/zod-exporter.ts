/**
 * Runtime validation export
 *
 * Turns a resolved schema into a zod schema for one row of data, keyed by
 * physical column names. One-directional: nothing is read back.
 *
 * @module
 */

import { z } from "zod";
import type { ColumnDefinition, SchemaDefinition } from "../../types/index.js";
import { matchesMembership } from "../registry/membership.js";

export type RowSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

/**
 * Zod type for a single cell of a column.
 */
export function zodTypeFor(column: ColumnDefinition): z.ZodTypeAny {
  let type: z.ZodTypeAny;
  switch (column.valueType.tag) {
    case "int":
      type = z.number().int();
      break;
    case "float":
      type = z.number();
      break;
    case "str":
      type = z.string();
      break;
    case "bool":
      type = z.boolean();
      break;
    case "other":
      type = z.unknown();
      break;
  }

  if (column.nullable) {
    type = type.nullable();
  }
  if (column.description !== undefined) {
    type = type.describe(column.description);
  }
  return type;
}

/**
 * Row schema for `schema`:
 * - exact columns are required keys under their lookup key;
 * - explicit column set members are optional keys;
 * - keys matching a regex column set are checked against that set's type;
 * - any other key is rejected unless the schema allows extra columns or
 *   its membership is only known at run time.
 */
export function toZodSchema(schema: SchemaDefinition): RowSchema {
  const shape: Record<string, z.ZodTypeAny> = {};
  const families: ColumnDefinition[] = [];

  for (const column of schema.columns) {
    if (column.membership.kind === "exact") {
      shape[column.lookupKey] = zodTypeFor(column);
    }
  }
  for (const column of schema.columns) {
    if (column.membership.kind === "members") {
      for (const member of column.membership.names) {
        shape[member] ??= zodTypeFor(column).optional();
      }
    } else if (column.membership.kind === "regex") {
      families.push(column);
    }
  }

  const declared = new Set(Object.keys(shape));
  const acceptsUnknown = schema.allowExtraColumns || schema.deferred;

  return z
    .object(shape)
    .passthrough()
    .superRefine((row, ctx) => {
      for (const [key, value] of Object.entries(row)) {
        if (declared.has(key)) continue;

        const family = families.find((column) => matchesMembership(column, key));
        if (family) {
          const result = zodTypeFor(family).safeParse(value);
          if (!result.success) {
            for (const issue of result.error.issues) {
              ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key, ...issue.path], message: issue.message });
            }
          }
          continue;
        }

        if (!acceptsUnknown) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `Column '${key}' is not declared in ${schema.name}`,
          });
        }
      }
    });
}
