/**
 * File System Utilities
 * File discovery and reading for checking runs
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
  onlyFiles?: boolean;
}

/**
 * Directories never searched for sources
 */
export const DEFAULT_IGNORES = [
  "**/node_modules/**",
  "**/.git/**",
  "**/.venv/**",
  "**/venv/**",
  "**/__pycache__/**",
  "**/.mypy_cache/**",
  "**/.tox/**",
  "**/dist/**",
  "**/build/**",
];

/**
 * Find files matching glob patterns, sorted by path
 *
 * @param options - Glob options
 * @returns Array of matching file paths
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = true, onlyFiles = true } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles,
    ignore: [...DEFAULT_IGNORES, ...ignore],
    dot: false, // Don't include dotfiles
  });
  return files.sort();
}

/**
 * Read a file as UTF-8 text
 */
export async function readFileWithEncoding(filePath: string, encoding: BufferEncoding = "utf-8"): Promise<string> {
  return fsPromises.readFile(filePath, { encoding });
}

/**
 * Check if a path exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether a path is an existing directory
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    return (await fsPromises.stat(filePath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Walks up from `start` (a file or directory) looking for `fileName`.
 *
 * @returns the absolute path of the nearest match, or null
 */
export async function findUp(fileName: string, start: string): Promise<string | null> {
  let directory = path.resolve(start);
  if (!(await isDirectory(directory))) {
    directory = path.dirname(directory);
  }

  for (;;) {
    const candidate = path.join(directory, fileName);
    if (await fileExists(candidate)) {
      return candidate;
    }
    const parent = path.dirname(directory);
    if (parent === directory) {
      return null;
    }
    directory = parent;
  }
}
