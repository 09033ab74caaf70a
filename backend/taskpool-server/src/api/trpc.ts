/**
 * TRPC Router Configuration
 *
 * Exposes a TaskScheduler and the handlers registered for it. Tasks are
 * submitted by handler type, since callables cannot cross the wire.
 */

import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";
import { TaskScheduler } from "../queue/TaskScheduler";
import { HandlerRegistry } from "../queue/HandlerRegistry";
import { TaskState } from "../queue/TaskState";
import type { TaskSnapshot, TaskProgress } from "../queue/TaskRecord";
import { NotFoundError, DuplicateNameError, InvalidSubmissionError } from "../queue/errors";

/**
 * Context passed to all TRPC procedures
 */
export interface Context {
  scheduler: TaskScheduler;
  handlers: HandlerRegistry;
}

export function createContext(scheduler: TaskScheduler, handlers: HandlerRegistry): Context {
  return { scheduler, handlers };
}

const t = initTRPC.context<Context>().create();

export const router = t.router;
export const publicProcedure = t.procedure;
export const createCallerFactory = t.createCallerFactory;

/**
 * JSON-safe view of a task; the failure travels as its message.
 */
export interface TaskView {
  name: string;
  priority: number;
  state: TaskState;
  result?: unknown;
  error?: string;
  progress: TaskProgress;
  daemon: boolean;
  submittedAt: number;
  startedAt?: number;
  finishedAt?: number;
  durationMs?: number;
  retryOf?: string;
  retriedAs?: string;
}

export function toTaskView(snapshot: TaskSnapshot): TaskView {
  const { failure, progress, ...rest } = snapshot;
  return { ...rest, progress: { ...progress }, error: failure?.message };
}

/**
 * Map pool errors onto TRPC error codes.
 */
export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }
  if (error instanceof NotFoundError) {
    return new TRPCError({ code: "NOT_FOUND", message: error.message, cause: error });
  }
  if (error instanceof DuplicateNameError) {
    return new TRPCError({ code: "CONFLICT", message: error.message, cause: error });
  }
  if (error instanceof InvalidSubmissionError || error instanceof RangeError) {
    return new TRPCError({ code: "BAD_REQUEST", message: error.message, cause: error });
  }
  if (error instanceof Error) {
    return new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: error.message, cause: error });
  }
  return new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: String(error) });
}

async function guard<T>(fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toTRPCError(error);
  }
}

const NameInput = z.object({ name: z.string().min(1) });

/**
 * Pool router - submission, lifecycle and queries
 */
export const poolRouter = router({
  stats: publicProcedure.query(({ ctx }) => ctx.scheduler.stats()),

  /**
   * List tasks in submission order, optionally filtered by state
   */
  list: publicProcedure
    .input(z.object({ state: z.nativeEnum(TaskState).optional() }).optional())
    .query(({ input, ctx }) => ctx.scheduler.list({ state: input?.state }).map(toTaskView)),

  get: publicProcedure.input(NameInput).query(({ input, ctx }) => guard(() => toTaskView(ctx.scheduler.get(input.name)))),

  status: publicProcedure.input(NameInput).query(({ input, ctx }) =>
    guard(() => {
      const { state, progress, failure } = ctx.scheduler.status(input.name);
      return { state, progress: { ...progress }, error: failure?.message };
    })
  ),

  /**
   * Results of every registered task; null where a task has none
   */
  results: publicProcedure.query(({ ctx }) => ctx.scheduler.results()),

  /**
   * Failure messages keyed by task name
   */
  failures: publicProcedure.query(({ ctx }) => {
    const messages: Record<string, string> = {};
    for (const [name, failure] of Object.entries(ctx.scheduler.failures())) {
      messages[name] = failure.message;
    }
    return messages;
  }),

  handlers: publicProcedure.query(({ ctx }) => ctx.handlers.list()),

  /**
   * Submit a task by handler type. It waits in the queue until the pool is
   * started.
   */
  submit: publicProcedure
    .input(
      z.object({
        type: z.string().min(1),
        args: z.unknown().optional(),
        name: z.string().min(1).optional(),
        priority: z.number().int().optional(),
      })
    )
    .mutation(({ input, ctx }) =>
      guard(() => {
        const handle = ctx.handlers.submit(ctx.scheduler, input);
        return toTaskView(handle.snapshot());
      })
    ),

  /**
   * Start the whole pool, or admit a single named task
   */
  start: publicProcedure
    .input(z.object({ name: z.string().min(1).optional() }).optional())
    .mutation(({ input, ctx }) =>
      guard(() => {
        if (input?.name !== undefined) {
          return { started: ctx.scheduler.start(input.name) ? [input.name] : [] };
        }
        return { started: ctx.scheduler.startAll() };
      })
    ),

  retryFailed: publicProcedure.mutation(({ ctx }) => ({ retried: ctx.scheduler.retryFailed() })),

  removeFinished: publicProcedure.mutation(({ ctx }) => ({ removed: ctx.scheduler.removeFinished() })),

  cancel: publicProcedure
    .input(z.object({ reason: z.string().min(1).optional() }).optional())
    .mutation(({ input, ctx }) => {
      ctx.scheduler.cancel(input?.reason);
      return { cancelled: ctx.scheduler.isCancelled() };
    }),

  /**
   * Wait for the pool to drain; returns the names still unfinished
   */
  join: publicProcedure
    .input(z.object({ timeoutMs: z.number().int().min(0).max(600_000).optional() }).optional())
    .mutation(async ({ input, ctx }) => ({ unfinished: await ctx.scheduler.join(input?.timeoutMs) })),

  /**
   * Wait for one task to finish
   */
  wait: publicProcedure
    .input(NameInput.extend({ timeoutMs: z.number().int().min(0).max(600_000).optional() }))
    .mutation(({ input, ctx }) => guard(async () => ({ done: await ctx.scheduler.joinTask(input.name, input.timeoutMs) }))),
});

/**
 * Main app router combining all sub-routers
 */
export const appRouter = router({
  pool: poolRouter,
});

export type AppRouter = typeof appRouter;
