/**
 * Test Utilities
 *
 * Loggers that keep test output quiet, and one that records what was logged
 * so assertions can inspect it.
 */

import pino, { type Logger } from "pino";

export interface LoggedLine {
  level: number;
  msg: string;
  task?: string;
}

export interface CapturingLogger {
  logger: Logger;
  lines: LoggedLine[];
  /** Messages logged at or above pino's warn level (40) */
  warnings(): string[];
  /** Messages logged at or above pino's error level (50) */
  errors(): string[];
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Logger that parses each JSON line pino writes and keeps it in memory.
 */
export function createCapturingLogger(level: string = "debug"): CapturingLogger {
  const lines: LoggedLine[] = [];
  const logger = pino(
    { level },
    {
      write: (line: string) => {
        const entry: { level?: unknown; msg?: unknown; task?: unknown } = JSON.parse(line);
        lines.push({
          level: typeof entry.level === "number" ? entry.level : 0,
          msg: typeof entry.msg === "string" ? entry.msg : "",
          task: typeof entry.task === "string" ? entry.task : undefined,
        });
      },
    }
  );

  return {
    logger,
    lines,
    warnings: () => lines.filter((l) => l.level >= 40).map((l) => l.msg),
    errors: () => lines.filter((l) => l.level >= 50).map((l) => l.msg),
  };
}
