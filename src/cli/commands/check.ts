/**
 * check command - Check DataFrame column accesses under a path
 */

import * as path from "node:path";
import { createSchemaFlowEngine } from "../../core/engine/schema-flow-engine.js";
import { formatFault, formatReport } from "../../core/reporter/diagnostic-reporter.js";
import type { OutputFormat, RunOutcome } from "../../types/index.js";
import { createLogger, fileExists, findFiles, isDirectory, loadConfig, OutputFormatSchema } from "../../utils/index.js";

const logger = createLogger("check");

export interface CheckCommandOptions {
  strict?: boolean;
  json?: boolean;
  format?: string;
  concurrency?: number;
  /** Explicit configuration file */
  config?: string;
  /** false under --no-color */
  color?: boolean;
}

/**
 * Where output goes; the process streams by default
 */
export interface CheckIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Base for relative paths in the report */
  cwd: string;
}

/**
 * Process exit codes
 */
export const ExitCode = {
  Success: 0,
  Findings: 1,
  Usage: 2,
  InternalFailure: 3,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(outcome: RunOutcome): ExitCodeValue {
  switch (outcome) {
    case "success":
      return ExitCode.Success;
    case "findings":
      return ExitCode.Findings;
    case "internal-failure":
      return ExitCode.InternalFailure;
  }
}

const processIO: CheckIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  cwd: process.cwd(),
};

/**
 * Runs a check of `target` and returns the exit code. Never exits the
 * process itself.
 */
export async function runCheck(
  target: string,
  options: CheckCommandOptions,
  io: CheckIO = processIO
): Promise<ExitCodeValue> {
  logger.debug({ target, options }, "Starting check");

  const format = resolveFormat(options);
  if (format === null) {
    io.stderr(`error: unsupported output format '${options.format ?? ""}' (expected human or json)`);
    return ExitCode.Usage;
  }

  const absoluteTarget = path.resolve(io.cwd, target);
  if (!(await fileExists(absoluteTarget))) {
    io.stderr(`error: path not found: ${target}`);
    return ExitCode.Usage;
  }

  const loaded = await loadConfig(
    absoluteTarget,
    options.config === undefined ? undefined : path.resolve(io.cwd, options.config)
  );
  if (!loaded.ok) {
    io.stderr(`error: ${loaded.error.message}`);
    return ExitCode.Usage;
  }
  const { config, configPath } = loaded.value;
  if (configPath) {
    logger.debug({ configPath }, "Loaded configuration");
  }

  if (!config.enabled) {
    io.stderr("framecheck is disabled by configuration; nothing checked");
    return ExitCode.Success;
  }

  const files = (await isDirectory(absoluteTarget))
    ? await findFiles({ patterns: config.include, ignore: config.exclude, cwd: absoluteTarget })
    : [absoluteTarget];
  const reported = files.map((file) => path.relative(io.cwd, file) || file);

  const engine = await createSchemaFlowEngine({
    concurrency: options.concurrency ?? config.concurrency,
    baseDir: io.cwd,
  });
  try {
    const result = await engine.run(
      reported.map((file) => ({ path: file })),
      { strict: options.strict === true || config.strict }
    );

    if (result.outcome === "internal-failure" && result.fault) {
      io.stderr(formatFault(result.fault));
      return ExitCode.InternalFailure;
    }

    io.stdout(
      formatReport(result.diagnostics, result.filesChecked, format ?? config.outputFormat, {
        color: options.color !== false && process.stdout.isTTY === true,
      })
    );
    logger.debug({ outcome: result.outcome, durationMs: Math.round(result.durationMs) }, "Check finished");
    return exitCodeFor(result.outcome);
  } finally {
    await engine.close();
  }
}

/**
 * The requested output format, undefined when none was given, or null
 * when the value is not a format.
 */
function resolveFormat(options: CheckCommandOptions): OutputFormat | undefined | null {
  if (options.json === true) return "json";
  if (options.format === undefined) return undefined;
  const parsed = OutputFormatSchema.safeParse(options.format);
  return parsed.success ? parsed.data : null;
}

/**
 * commander action
 */
export async function checkCommand(target: string, options: CheckCommandOptions): Promise<void> {
  process.exitCode = await runCheck(target, options);
}
