/**
 * DataFrame Member Names
 *
 * Method and property names of pandas/polars DataFrames, read from
 * `data/frame-members.json`. Attribute access with one of these names is
 * never a column reference, and declaring a column under one of them is
 * reported as a ReservedColumnName warning.
 *
 * @module
 */

import { readFileSync } from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ErrorCode, InternalFaultError } from "../errors.js";

const FrameMembersFileSchema = z.object({
  methods: z.array(z.string()),
  properties: z.array(z.string()),
});

let cached: ReadonlySet<string> | null = null;

function membersFilePath(): string {
  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  // Same depth from src/core/registry and dist/core/registry
  return path.resolve(__dirname, "../../../data/frame-members.json");
}

/**
 * Loads the union of method and property names once per process.
 *
 * @throws InternalFaultError when the data file is missing or malformed
 */
export function loadFrameMembers(): ReadonlySet<string> {
  if (cached) return cached;

  const filePath = membersFilePath();
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new InternalFaultError(
      `Cannot read DataFrame member list: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.INTERNAL_FAULT,
      { filePath }
    );
  }

  const parsed = FrameMembersFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InternalFaultError(`Malformed DataFrame member list: ${parsed.error.message}`, ErrorCode.INTERNAL_FAULT, {
      filePath,
    });
  }

  cached = new Set([...parsed.data.methods, ...parsed.data.properties]);
  return cached;
}
