/**
 * WorkerPool
 *
 * Admission controller: keeps at most `maxWorkers` records RUNNING and feeds
 * the ExecutionWrapper from the AdmissionQueue.
 *
 * Admission is event-driven rather than polled. pump() runs when the pool is
 * started, when a task is submitted or retried, and when a running task
 * settles; each pass fills every free slot in priority order. Admission stops
 * while the pool is not started or once the cancellation signal has aborted.
 */

import type { Logger } from "pino";
import type { AdmissionQueue } from "./AdmissionQueue";
import { ConfigurationError, toError } from "./errors";
import type { SchedulerEventBus } from "./events";
import type { ExecutionWrapper } from "./ExecutionWrapper";
import type { StatusRegistry } from "./StatusRegistry";
import type { TaskRecord } from "./TaskRecord";
import { TaskState } from "./TaskState";

export interface WorkerPoolOptions {
  maxWorkers: number;
  registry: StatusRegistry;
  queue: AdmissionQueue;
  wrapper: ExecutionWrapper;
  events: SchedulerEventBus;
  signal: AbortSignal;
  logger: Logger;
}

/** Interval of the keep-alive timer; it only exists to hold the event loop open */
const KEEP_ALIVE_INTERVAL_MS = 60_000;

export class WorkerPool {
  readonly maxWorkers: number;

  private readonly registry: StatusRegistry;
  private readonly queue: AdmissionQueue;
  private readonly wrapper: ExecutionWrapper;
  private readonly events: SchedulerEventBus;
  private readonly signal: AbortSignal;
  private readonly logger: Logger;

  /** Names of records admitted and not yet settled */
  private readonly running: Set<string> = new Set();
  /** Running records that must keep the process alive */
  private readonly heldOpen: Set<string> = new Set();
  private keepAlive?: ReturnType<typeof setInterval>;

  private started: boolean = false;
  private pumping: boolean = false;
  private pumpRequested: boolean = false;
  /** Set on admission, cleared when 'pool.drained' is published */
  private busy: boolean = false;
  private drainWaiters: Array<() => void> = [];

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.maxWorkers) || options.maxWorkers <= 0) {
      throw new ConfigurationError("Invalid worker pool configuration", [
        `maxWorkers: expected a positive integer, received ${options.maxWorkers}`,
      ]);
    }
    this.maxWorkers = options.maxWorkers;
    this.registry = options.registry;
    this.queue = options.queue;
    this.wrapper = options.wrapper;
    this.events = options.events;
    this.signal = options.signal;
    this.logger = options.logger;
  }

  get runningCount(): number {
    return this.running.size;
  }

  isStarted(): boolean {
    return this.started;
  }

  /**
   * Whether queued work may currently be admitted
   */
  isAdmitting(): boolean {
    return this.started && !this.signal.aborted;
  }

  /**
   * Begin admitting from the queue.
   *
   * @returns Names admitted by this call
   */
  start(): string[] {
    if (this.signal.aborted) {
      return [];
    }
    this.started = true;
    return this.pump();
  }

  /**
   * Fill free slots from the head of the queue.
   *
   * Re-entrant calls (e.g. an event handler submitting more work during a
   * pass) are folded into the pass already in progress.
   *
   * @returns Names admitted by this call
   */
  pump(): string[] {
    if (this.pumping) {
      this.pumpRequested = true;
      return [];
    }

    const admitted: string[] = [];
    this.pumping = true;
    try {
      do {
        this.pumpRequested = false;
        while (this.isAdmitting() && this.running.size < this.maxWorkers) {
          const name = this.queue.pop();
          if (name === undefined) {
            break;
          }
          // Queue entries are weak references: skip records that were
          // removed or started out of order since they were pushed
          if (!this.registry.has(name) || this.registry.require(name).state !== TaskState.PENDING) {
            continue;
          }
          this.launch(this.registry.require(name));
          admitted.push(name);
        }
      } while (this.pumpRequested);
    } finally {
      this.pumping = false;
    }

    this.checkDrained();
    return admitted;
  }

  /**
   * Admit one specific pending record ahead of queue order, provided a slot
   * is free. Works before start(); never after cancellation.
   *
   * @returns true if the record was admitted
   */
  admit(name: string): boolean {
    if (this.signal.aborted) {
      return false;
    }
    const record = this.registry.require(name);
    if (record.state !== TaskState.PENDING || this.running.size >= this.maxWorkers) {
      return false;
    }
    this.queue.remove(name);
    this.launch(record);
    return true;
  }

  /**
   * Nothing is running and nothing queued can still be admitted.
   */
  isDrained(): boolean {
    return this.running.size === 0 && (this.queue.isEmpty() || !this.isAdmitting());
  }

  /**
   * Resolves the next time the pool is drained (immediately if it already is).
   */
  whenDrained(): Promise<void> {
    if (this.isDrained()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /**
   * Re-evaluate the drained condition, e.g. after cancellation.
   */
  checkDrained(): void {
    if (!this.isDrained()) {
      return;
    }
    // Tasks started by name ahead of start() leave the rest of the queue waiting
    if (this.busy && (this.started || this.queue.isEmpty())) {
      this.busy = false;
      this.events.publishSync("pool.drained", { stats: this.registry.stats() });
    }
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private launch(record: TaskRecord): void {
    const { name } = record;
    this.running.add(name);
    this.busy = true;
    if (!record.daemon) {
      this.hold(name);
    }

    this.logger.debug({ task: name, priority: record.priority }, `Starting task: ${name}`);
    // execute() marks the record RUNNING before it first yields
    this.wrapper
      .execute(record, () => this.release(name))
      .catch((error: unknown) => {
        // execute() contains task failures; this only fires on a bookkeeping bug
        this.logger.error({ err: toError(error), task: name }, `Unexpected error executing task ${name}`);
        this.release(name);
      });

    this.events.publishSync("task.admitted", {
      name,
      priority: record.priority,
      running: this.running.size,
    });
  }

  private release(name: string): void {
    if (!this.running.delete(name)) {
      return;
    }
    this.unhold(name);
    this.pump();
  }

  private hold(name: string): void {
    this.heldOpen.add(name);
    if (!this.keepAlive) {
      this.keepAlive = setInterval(() => undefined, KEEP_ALIVE_INTERVAL_MS);
    }
  }

  private unhold(name: string): void {
    this.heldOpen.delete(name);
    if (this.heldOpen.size === 0 && this.keepAlive) {
      clearInterval(this.keepAlive);
      this.keepAlive = undefined;
    }
  }
}
