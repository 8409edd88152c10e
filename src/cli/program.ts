/**
 * framecheck command definitions
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { checkCommand } from "./commands/check.js";

export const VERSION = "0.1.0";

/**
 * Parses a positive integer option value.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("framecheck")
    .description("Static checker for DataFrame column access against declared schemas")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeErr: (str) => process.stderr.write(chalk.red(str)),
    });

  // =============================================================================
  // Commands
  // =============================================================================

  program
    .command("check")
    .description("Check Python sources under a file or directory")
    .argument("[path]", "File or directory to check", ".")
    .option("-s, --strict", "Treat warnings as failures")
    .option("--json", "Print diagnostics as JSON (same as --format json)")
    .option("-f, --format <format>", "Output format: human or json")
    .option("-c, --concurrency <n>", "Maximum files processed at once", parsePositiveInt)
    .option("--config <file>", "Use this configuration file instead of searching for one")
    .option("--no-color", "Disable coloured output")
    .action(checkCommand);

  return program;
}
