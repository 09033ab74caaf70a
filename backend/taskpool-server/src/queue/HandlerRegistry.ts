/**
 * HandlerRegistry
 *
 * Named task handlers for submissions that arrive as data (e.g. over the
 * API) rather than as callables. Each handler declares a zod schema for its
 * arguments; a submission is validated against it before anything is
 * registered with the scheduler.
 */

import type { z } from "zod";
import { InvalidSubmissionError } from "./errors";
import { uniqueName } from "./names";
import type { TaskContext } from "./TaskRecord";
import type { TaskHandle, TaskScheduler } from "./TaskScheduler";

export interface HandlerDefinition<TArgs, TResult> {
  /** Shown in handler listings */
  description?: string;
  /** Validates (and may default) the submitted arguments */
  args: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  run: (context: TaskContext, args: TArgs) => TResult | PromiseLike<TResult>;
}

export interface HandlerSubmission {
  type: string;
  args?: unknown;
  /** Defaults to the handler type, made unique */
  name?: string;
  priority?: number;
}

export interface HandlerInfo {
  type: string;
  description?: string;
}

type Submitter = (scheduler: TaskScheduler, submission: HandlerSubmission) => TaskHandle;

interface RegisteredHandler {
  info: HandlerInfo;
  submit: Submitter;
}

export class HandlerRegistry {
  private readonly handlers: Map<string, RegisteredHandler> = new Map();

  /**
   * Register a handler under a type name, replacing any previous one.
   */
  register<TArgs, TResult>(type: string, definition: HandlerDefinition<TArgs, TResult>): this {
    const submit: Submitter = (scheduler, submission) => {
      const parsed = definition.args.safeParse(submission.args ?? {});
      if (!parsed.success) {
        throw new InvalidSubmissionError(
          `Invalid arguments for task type '${type}'`,
          parsed.error.issues.map((issue) => `${issue.path.join(".") || "args"}: ${issue.message}`)
        );
      }
      return scheduler.submit(definition.run, [parsed.data], {
        name: submission.name ?? uniqueName(type, (candidate) => scheduler.has(candidate)),
        priority: submission.priority,
      });
    };

    this.handlers.set(type, { info: { type, description: definition.description }, submit });
    return this;
  }

  unregister(type: string): boolean {
    return this.handlers.delete(type);
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  list(): HandlerInfo[] {
    return Array.from(this.handlers.values(), (handler) => handler.info);
  }

  /**
   * Validate a submission and register it with the scheduler.
   *
   * @throws InvalidSubmissionError for unknown types or rejected arguments
   * @throws DuplicateNameError if an explicit name is taken
   */
  submit(scheduler: TaskScheduler, submission: HandlerSubmission): TaskHandle {
    const handler = this.handlers.get(submission.type);
    if (!handler) {
      throw new InvalidSubmissionError(`Unknown task type '${submission.type}'`, [
        `registered types: ${Array.from(this.handlers.keys()).join(", ") || "none"}`,
      ]);
    }
    return handler.submit(scheduler, submission);
  }
}
