#!/usr/bin/env node

/**
 * framecheck CLI
 * Checks DataFrame column accesses in Python projects
 */

import { CommanderError } from "commander";
import chalk from "chalk";
import { createLogger } from "../utils/logger.js";
import { ExitCode } from "./commands/check.js";
import { createProgram } from "./program.js";

const logger = createLogger("cli");

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Reports an error that escaped a command. Usage errors exit with 2,
 * everything else is an internal failure.
 */
function handleError(error: unknown): void {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode === 0 ? ExitCode.Success : ExitCode.Usage;
    return;
  }

  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG) {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exitCode = ExitCode.InternalFailure;
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// =============================================================================
// Parse and Execute
// =============================================================================

createProgram().parseAsync(process.argv).catch(handleError);
