/**
 * Configuration Loading
 *
 * Finds `framecheck.config.json` by walking up from the checked path and
 * validates it. A missing file yields the defaults.
 *
 * @module
 */

import { ConfigurationError } from "../core/errors.js";
import { err, ok, type Result } from "../types/result.js";
import { findUp, readFileWithEncoding } from "./fs.js";
import { FrameCheckConfigSchema, formatZodError, safeValidate, type FrameCheckConfig } from "./validation.js";

export const CONFIG_FILE = "framecheck.config.json";

export interface LoadedConfig {
  config: FrameCheckConfig;
  /** Path of the file the configuration came from, null for defaults */
  configPath: string | null;
}

export function defaultConfig(): FrameCheckConfig {
  return FrameCheckConfigSchema.parse({});
}

/**
 * Parses configuration text.
 */
export function parseConfig(text: string, configPath: string): Result<FrameCheckConfig, ConfigurationError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return err(
      new ConfigurationError(
        `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        { configPath }
      )
    );
  }

  const result = safeValidate(FrameCheckConfigSchema, raw);
  if (!result.success) {
    return err(
      new ConfigurationError(`Invalid configuration in ${configPath}: ${formatZodError(result.error).join("; ")}`, {
        configPath,
      })
    );
  }
  return ok(result.data);
}

/**
 * Loads the nearest configuration file above `start`, or an explicit file.
 */
export async function loadConfig(
  start: string,
  explicitPath?: string
): Promise<Result<LoadedConfig, ConfigurationError>> {
  const configPath = explicitPath ?? (await findUp(CONFIG_FILE, start));
  if (!configPath) {
    return ok({ config: defaultConfig(), configPath: null });
  }

  let text: string;
  try {
    text = await readFileWithEncoding(configPath);
  } catch (error) {
    return err(
      new ConfigurationError(
        `Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        { configPath }
      )
    );
  }

  const parsed = parseConfig(text, configPath);
  return parsed.ok ? ok({ config: parsed.value, configPath }) : parsed;
}
