/**
 * @shortbox/logger - Structured Logging Package
 *
 * One pino setup shared by the store, the HTTP API and the console.
 *
 * Usage:
 * ```ts
 * import { logger, createLogger } from "@shortbox/logger";
 *
 * logger.info({ slug: "aB3xY9kQ" }, "Link created");
 *
 * const sweeperLogger = createLogger("sweeper");
 * sweeperLogger.error({ err }, "Sweep failed");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Read LOG_LEVEL, falling back to `fallback` for unknown values.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export interface CreateLoggerOptions {
  /** Overrides LOG_LEVEL for this logger */
  level?: LogLevel;
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(name: string, options: CreateLoggerOptions = {}): pino.Logger {
  const nodeEnv = process.env.NODE_ENV || "development";
  const serviceName = process.env.SERVICE_NAME || "shortbox";

  return pino({
    name: `${serviceName}:${name}`,
    level: options.level ?? resolveLogLevel(process.env.LOG_LEVEL),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      nodeEnv === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
    base: {
      service: name,
      env: nodeEnv,
    },
  });
}

// ============================================================================
// Default Logger Instance
// ============================================================================

export const logger = createLogger("main");

/**
 * Check if a log level is enabled on the default logger
 */
export function isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
  return logger.isLevelEnabled(level);
}

export type { Logger } from "pino";
