/**
 * Logger Module
 * Structured logging using pino, written to stderr so that stdout carries
 * only the report
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Force or disable pretty printing; defaults to whether stderr is a TTY */
  pretty?: boolean;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "warn";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "engine", "registry", "cli")
 * @param options - Optional configuration
 * @returns A configured pino logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger("engine");
 * logger.debug({ files: 12 }, "Registry built");
 * logger.error({ err }, "Internal fault");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), pretty = process.stderr.isTTY === true } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (pretty) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions, pino.destination({ dest: 2, sync: true }));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
