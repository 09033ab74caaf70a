/**
 * Built-in task handlers
 *
 * Handlers every server registers, so the pool can be exercised over the API
 * without custom code:
 * - `sleep`: waits in steps, reporting progress, and stops early on cancellation
 * - `write-line`: appends lines to the configured output file
 * - `fail`: fails on purpose, for trying out retries
 */

import { z } from "zod";
import type { HandlerDefinition, HandlerRegistry } from "../queue/HandlerRegistry";
import type { SafeFileWriter } from "./SafeFileWriter";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const SleepArgsSchema = z.object({
  ms: z.number().int().min(0).max(3_600_000),
  steps: z.number().int().min(1).max(1000).default(10),
});

export type SleepArgs = z.infer<typeof SleepArgsSchema>;

export interface SleepResult {
  sleptMs: number;
  cancelled: boolean;
}

export function createSleepHandler(): HandlerDefinition<SleepArgs, SleepResult> {
  return {
    description: "Wait for `ms` milliseconds in `steps` increments",
    args: SleepArgsSchema,
    run: async (ctx, { ms, steps }) => {
      const stepMs = ms / steps;
      let sleptMs = 0;
      ctx.reportProgress(0, steps);

      for (let i = 0; i < steps; i++) {
        if (ctx.isCancelled()) {
          return { sleptMs, cancelled: true };
        }
        await sleep(stepMs);
        sleptMs += stepMs;
        ctx.advance();
      }

      return { sleptMs: ms, cancelled: false };
    },
  };
}

const WriteLineArgsSchema = z.object({
  line: z.string(),
  repeat: z.number().int().min(1).max(10_000).default(1),
});

export type WriteLineArgs = z.infer<typeof WriteLineArgsSchema>;

export function createWriteLineHandler(writer: SafeFileWriter): HandlerDefinition<WriteLineArgs, { file: string; lines: number }> {
  return {
    description: `Append \`line\` to ${writer.filePath}, \`repeat\` times`,
    args: WriteLineArgsSchema,
    run: async (ctx, { line, repeat }) => {
      ctx.reportProgress(0, repeat);
      for (let i = 0; i < repeat; i++) {
        await writer.write(line);
        ctx.advance();
      }
      return { file: writer.filePath, lines: repeat };
    },
  };
}

const FailArgsSchema = z.object({
  message: z.string().min(1).default("Task failed on request"),
  delayMs: z.number().int().min(0).max(60_000).default(0),
});

export type FailArgs = z.infer<typeof FailArgsSchema>;

export function createFailHandler(): HandlerDefinition<FailArgs, never> {
  return {
    description: "Fail with `message` after `delayMs` milliseconds",
    args: FailArgsSchema,
    run: async (_ctx, { message, delayMs }) => {
      if (delayMs > 0) {
        await sleep(delayMs);
      }
      throw new Error(message);
    },
  };
}

export interface BuiltinHandlerOptions {
  /** Enables `write-line` */
  writer?: SafeFileWriter;
}

/**
 * Register the built-in handlers.
 */
export function registerBuiltinHandlers(registry: HandlerRegistry, options: BuiltinHandlerOptions = {}): HandlerRegistry {
  registry.register("sleep", createSleepHandler());
  registry.register("fail", createFailHandler());
  if (options.writer) {
    registry.register("write-line", createWriteLineHandler(options.writer));
  }
  return registry;
}
