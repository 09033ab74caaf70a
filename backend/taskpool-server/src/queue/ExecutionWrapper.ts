/**
 * ExecutionWrapper
 *
 * Supervises a single run of one task record:
 * 1. Marks the record RUNNING and notifies the observer
 * 2. Invokes the body with its context and stored arguments
 * 3. Stores the result (SUCCEEDED, progress filled) or the failure cause
 *    (FAILED, progress left where the body got to)
 * 4. Settles the record's completion exactly once
 *
 * A failing body is contained here: its error is recorded and logged and
 * never reaches the controller or sibling tasks. Observer failures are
 * logged and never change task state.
 */

import type { Logger } from "pino";
import { toError } from "./errors";
import type { SchedulerEventBus } from "./events";
import type { StatusRegistry } from "./StatusRegistry";
import { ProgressObserver, TaskContext, TaskRecord, TaskSnapshot, snapshotOf } from "./TaskRecord";

export interface ExecutionWrapperOptions {
  registry: StatusRegistry;
  events: SchedulerEventBus;
  /** Pool-wide cooperative cancellation signal */
  signal: AbortSignal;
  logger: Logger;
  observer?: ProgressObserver;
}

export class ExecutionWrapper {
  private readonly registry: StatusRegistry;
  private readonly events: SchedulerEventBus;
  private readonly signal: AbortSignal;
  private readonly logger: Logger;
  private readonly observer?: ProgressObserver;

  constructor(options: ExecutionWrapperOptions) {
    this.registry = options.registry;
    this.events = options.events;
    this.signal = options.signal;
    this.logger = options.logger;
    this.observer = options.observer;
  }

  /**
   * Run a PENDING record to completion.
   *
   * The record turns RUNNING synchronously, before this returns; the body
   * itself starts on a later microtask so callers can finish their own
   * bookkeeping first.
   *
   * @param onSettled - Called once the record is terminal, before its
   *   completion promise settles
   * @returns Terminal snapshot. Never rejects because of the task body.
   */
  async execute(record: TaskRecord, onSettled?: () => void): Promise<TaskSnapshot> {
    const { name } = record;
    this.registry.markRunning(name);
    this.notify(name, record.progress.completed, record.progress.total);

    const taskLogger = this.logger.child({ task: name });
    const context = this.createContext(record, taskLogger);

    try {
      const value = await Promise.resolve().then(() => record.invoke(context));
      this.registry.updateProgress(name, record.progress.total);
      this.registry.markSucceeded(name, value);
      this.notify(name, record.progress.total, record.progress.total);
      this.events.publishSync("task.succeeded", { name, durationMs: this.durationOf(record) });
    } catch (error) {
      const cause = toError(error);
      this.registry.markFailed(name, cause);
      taskLogger.error({ err: cause }, `Task ${name} raised: ${cause.message}`);
      this.notify(name, record.progress.completed, record.progress.total);
      this.events.publishSync("task.failed", {
        name,
        error: cause.message,
        durationMs: this.durationOf(record),
      });
    } finally {
      this.settle(record, onSettled);
    }

    return snapshotOf(record);
  }

  private createContext(record: TaskRecord, logger: Logger): TaskContext {
    const { name } = record;
    const report = (completed: number, total?: number): void => {
      // Progress reported after the record left RUNNING is ignored
      if (record.finishedAt !== undefined) {
        return;
      }
      const updated = this.registry.updateProgress(name, completed, total);
      this.notify(name, updated.progress.completed, updated.progress.total);
      this.events.publishSync("task.progress", { name, ...updated.progress });
    };

    return {
      name,
      signal: this.signal,
      logger,
      isCancelled: () => this.signal.aborted,
      reportProgress: report,
      advance: (units = 1) => report(record.progress.completed + units),
    };
  }

  private settle(record: TaskRecord, onSettled?: () => void): void {
    try {
      onSettled?.();
    } catch (error) {
      this.logger.error({ err: toError(error), task: record.name }, `Settle hook failed for task ${record.name}`);
    } finally {
      record.complete();
    }
  }

  private notify(name: string, completed: number, total: number): void {
    if (!this.observer) {
      return;
    }
    try {
      this.observer(name, completed, total);
    } catch (error) {
      const cause = toError(error);
      this.logger.error({ err: cause, task: name }, `Progress observer failed for task ${name}: ${cause.message}`);
    }
  }

  private durationOf(record: TaskRecord): number {
    return (record.finishedAt ?? Date.now()) - (record.startedAt ?? record.submittedAt);
  }
}
