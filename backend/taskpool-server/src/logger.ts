/**
 * Logger
 *
 * pino is the logger the Fastify server already runs on; the scheduler and
 * its collaborators log through the same library.
 */

import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  /** Logger name (default: 'taskpool') */
  name?: string;
  /** Minimum level (default: TASKPOOL_LOG_LEVEL or 'info') */
  level?: LogLevel;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "taskpool",
    level: options.level ?? process.env.TASKPOOL_LOG_LEVEL ?? "info",
  });
}

let defaultLogger: Logger | undefined;

/**
 * Shared module logger used when a component is not handed one.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
