/**
 * Logger Module
 * Structured logging using pino, pretty-printed in development
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";
import { getConfigDir } from "./index.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  enableFileLogging?: boolean;
  logDir?: string;
}

const LOG_DIR_NAME = "logs";
const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

/**
 * Log level from LOG_LEVEL, otherwise debug in development, info in
 * production and silent under the test runner.
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "graph-store", "orchestrator")
 *
 * @example
 * ```typescript
 * const logger = createLogger("extraction");
 * logger.info({ filePath: "main.py" }, "File extracted");
 * logger.error({ err }, "Failed to write file entities");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), enableFileLogging = false, logDir } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (enableFileLogging) {
    const dir = logDir ?? path.join(getConfigDir(), LOG_DIR_NAME);
    fs.mkdirSync(dir, { recursive: true });

    const destination = pino.destination({
      dest: path.join(dir, `${component}.log`),
      sync: false,
    });
    return pino(baseOptions, destination);
  }

  // pino-pretty runs in a worker thread; keep tests on the plain stream
  if (isDevelopment() && !isTest()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions);
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: PinoLogger, bindings: Record<string, unknown>): PinoLogger {
  return parent.child(bindings);
}

export type Logger = PinoLogger;
