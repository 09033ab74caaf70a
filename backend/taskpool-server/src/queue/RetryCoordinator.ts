/**
 * RetryCoordinator
 *
 * Re-submits failed records as fresh ones. The failed record keeps its FAILED
 * state and cause for audit; the new record copies its callable, arguments,
 * priority, daemon flag and progress total under a derived unique name.
 */

import type { Logger } from "pino";
import type { SchedulerEventBus } from "./events";
import { uniqueName } from "./names";
import type { StatusRegistry } from "./StatusRegistry";
import { TaskRecord, createTaskRecord } from "./TaskRecord";

export interface RetryCoordinatorOptions {
  registry: StatusRegistry;
  events: SchedulerEventBus;
  signal: AbortSignal;
  logger: Logger;
  /** Queues a newly registered record for admission */
  enqueue: (record: TaskRecord) => void;
}

export class RetryCoordinator {
  private readonly registry: StatusRegistry;
  private readonly events: SchedulerEventBus;
  private readonly signal: AbortSignal;
  private readonly logger: Logger;
  private readonly enqueue: (record: TaskRecord) => void;

  constructor(options: RetryCoordinatorOptions) {
    this.registry = options.registry;
    this.events = options.events;
    this.signal = options.signal;
    this.logger = options.logger;
    this.enqueue = options.enqueue;
  }

  /**
   * Re-submit every record that is FAILED now and was not retried before.
   *
   * @returns Names of the new records, in registration order of the originals
   */
  retryFailed(): string[] {
    if (this.signal.aborted) {
      this.logger.warn("Retry skipped: scheduler is cancelled");
      return [];
    }

    const retried: string[] = [];
    for (const failed of this.registry.failedRecords()) {
      if (failed.retriedAs !== undefined) {
        continue;
      }
      retried.push(this.resubmit(failed));
    }

    if (retried.length > 0) {
      this.logger.info({ tasks: retried }, `Retrying ${retried.length} failed task(s)`);
    }
    return retried;
  }

  private resubmit(failed: TaskRecord): string {
    const name = uniqueName(failed.name, (candidate) => this.registry.has(candidate));
    const record = createTaskRecord({
      name,
      priority: failed.priority,
      daemon: failed.daemon,
      args: failed.args,
      invoke: failed.invoke,
      total: failed.progress.total,
      retryOf: failed.name,
    });

    this.registry.add(record);
    this.registry.markRetried(failed.name, name);
    this.events.publishSync("task.submitted", { name, priority: record.priority, retryOf: failed.name });
    this.events.publishSync("task.retried", { name, retryOf: failed.name, priority: record.priority });
    this.enqueue(record);
    return name;
  }
}
