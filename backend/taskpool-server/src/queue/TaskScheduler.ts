/**
 * TaskScheduler
 *
 * Bounded-concurrency, priority-ordered scheduler. Owns the StatusRegistry,
 * the AdmissionQueue and the WorkerPool and is the only thing that mutates
 * them; every public method runs its bookkeeping synchronously, so callers
 * always observe a consistent pool.
 *
 * ```typescript
 * const scheduler = new TaskScheduler({ maxWorkers: 2 });
 * const handle = scheduler.submit(async (ctx, url: string) => fetchPage(url), ["https://example.com"], { priority: 1 });
 * scheduler.startAll();
 * const page = await handle.result();
 * ```
 */

import type { Logger } from "pino";
import { z } from "zod";
import { getDefaultLogger } from "../logger";
import { AdmissionQueue } from "./AdmissionQueue";
import { ConfigurationError, TaskFailureError, toError } from "./errors";
import { EventBus } from "./EventBus";
import type { SchedulerEventBus, SchedulerEvents } from "./events";
import { ExecutionWrapper } from "./ExecutionWrapper";
import { deriveName, uniqueName } from "./names";
import { RetryCoordinator } from "./RetryCoordinator";
import { RegistryStats, StatusRegistry } from "./StatusRegistry";
import {
  ProgressObserver,
  TaskCallable,
  TaskRecord,
  TaskSnapshot,
  TaskStatus,
  createTaskRecord,
  snapshotOf,
} from "./TaskRecord";
import { TaskState, isTerminalState } from "./TaskState";
import { WorkerPool } from "./WorkerPool";

export interface TaskSchedulerOptions {
  /** Maximum number of tasks running at once; a positive integer */
  maxWorkers: number;
  /** Default daemon flag for submitted tasks (default: false) */
  daemon?: boolean;
  /** External cancellation; aborting it cancels the scheduler */
  signal?: AbortSignal;
  /** Notified on admission, progress and completion of every task */
  onProgress?: ProgressObserver;
  /** Bus lifecycle events are published on (default: a private one) */
  eventBus?: SchedulerEventBus;
  logger?: Logger;
}

export interface SubmitOptions {
  /** Explicit unique name; derived from the callable when omitted */
  name?: string;
  /** Lower runs earlier (default: 0) */
  priority?: number;
  /** Progress units the task reports against (default: 100) */
  total?: number;
  /** Overrides the scheduler's default daemon flag */
  daemon?: boolean;
}

/**
 * Caller's view of one submitted task.
 */
export interface TaskHandle<TResult = unknown> {
  readonly name: string;
  snapshot(): TaskSnapshot<TResult>;
  /** Resolves with the terminal snapshot */
  done(): Promise<TaskSnapshot<TResult>>;
  /** Resolves with the task's value or rejects with TaskFailureError */
  result(): Promise<TResult>;
}

export interface SchedulerStats extends RegistryStats {
  maxWorkers: number;
  /** Entries waiting in the admission queue */
  queued: number;
  started: boolean;
  cancelled: boolean;
}

export interface RethrowOptions {
  /** Throw TaskFailureError instead of returning null for a failed task */
  rethrow?: boolean;
}

/** Grace period shutdown() gives running tasks */
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

const SchedulerOptionsSchema = z.object({
  maxWorkers: z.number().int().positive(),
  daemon: z.boolean().optional(),
});

/** Longest delay setTimeout honours; anything larger fires at once */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Wait for a promise, giving up after timeoutMs (no limit when undefined or
 * not finite). Budgets past the timer limit are waited out in chunks.
 *
 * @returns true if the promise settled in time
 */
async function settledWithin(promise: Promise<void>, timeoutMs?: number): Promise<boolean> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs)) {
    await promise;
    return true;
  }

  const deadline = Date.now() + Math.max(0, timeoutMs);
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<boolean>((resolve) => {
    const arm = (delayMs: number): void => {
      timer = setTimeout(() => {
        const remaining = deadline - Date.now();
        if (remaining > 0) {
          arm(remaining);
        } else {
          resolve(false);
        }
      }, Math.min(delayMs, MAX_TIMER_DELAY_MS));
    };
    arm(Math.max(0, timeoutMs));
  });
  try {
    return await Promise.race([promise.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

export class TaskScheduler {
  readonly maxWorkers: number;
  readonly events: SchedulerEventBus;

  private readonly daemon: boolean;
  private readonly logger: Logger;
  private readonly controller: AbortController = new AbortController();
  private readonly registry: StatusRegistry = new StatusRegistry();
  private readonly queue: AdmissionQueue = new AdmissionQueue();
  private readonly pool: WorkerPool;
  private readonly retries: RetryCoordinator;

  constructor(options: TaskSchedulerOptions) {
    const parsed = SchedulerOptionsSchema.safeParse({ maxWorkers: options.maxWorkers, daemon: options.daemon });
    if (!parsed.success) {
      throw new ConfigurationError(
        "Invalid scheduler options",
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      );
    }

    this.maxWorkers = parsed.data.maxWorkers;
    this.daemon = parsed.data.daemon ?? false;
    this.logger = options.logger ?? getDefaultLogger();
    this.events = options.eventBus ?? new EventBus<SchedulerEvents>({ logger: this.logger });

    const { signal } = this.controller;
    const wrapper = new ExecutionWrapper({
      registry: this.registry,
      events: this.events,
      signal,
      logger: this.logger,
      observer: options.onProgress,
    });
    this.pool = new WorkerPool({
      maxWorkers: this.maxWorkers,
      registry: this.registry,
      queue: this.queue,
      wrapper,
      events: this.events,
      signal,
      logger: this.logger,
    });
    this.retries = new RetryCoordinator({
      registry: this.registry,
      events: this.events,
      signal,
      logger: this.logger,
      enqueue: (record) => this.enqueue(record),
    });

    signal.addEventListener("abort", () => this.onCancelled(), { once: true });
    if (options.signal) {
      const external = options.signal;
      if (external.aborted) {
        this.controller.abort(external.reason);
      } else {
        external.addEventListener("abort", () => this.controller.abort(external.reason), { once: true });
      }
    }
  }

  get runningCount(): number {
    return this.pool.runningCount;
  }

  /**
   * Register a task. It is queued immediately and admitted once the pool is
   * started and a slot is free.
   *
   * @throws DuplicateNameError if an explicit name is already registered
   * @throws RangeError for a non-integer priority or a non-positive total
   */
  submit<TArgs extends unknown[], TResult>(
    callable: TaskCallable<TArgs, TResult>,
    args: TArgs,
    options: SubmitOptions = {}
  ): TaskHandle<TResult> {
    const priority = options.priority ?? 0;
    if (!Number.isSafeInteger(priority)) {
      throw new RangeError(`Task priority must be an integer, received ${priority}`);
    }
    if (options.total !== undefined && !(Number.isFinite(options.total) && options.total > 0)) {
      throw new RangeError(`Task progress total must be a positive number, received ${options.total}`);
    }

    const name = options.name ?? uniqueName(deriveName(callable), (candidate) => this.registry.has(candidate));
    const record = createTaskRecord<TResult>({
      name,
      priority,
      daemon: options.daemon ?? this.daemon,
      args,
      invoke: (context) => callable(context, ...args),
      total: options.total,
    });

    this.registry.add(record);
    this.logger.debug({ task: name, priority }, `Submitted task: ${name}`);
    this.events.publishSync("task.submitted", { name, priority });
    this.enqueue(record);
    return this.createHandle(record);
  }

  /**
   * Start admitting queued tasks.
   *
   * @returns Names admitted by this call; empty once cancelled
   */
  startAll(): string[] {
    if (this.isCancelled()) {
      this.logger.warn("Cancellation requested, not starting tasks");
      return [];
    }
    if (!this.pool.isStarted()) {
      this.logger.info({ maxWorkers: this.maxWorkers, pending: this.queue.size }, "Starting task pool");
      this.events.publishSync("pool.started", { maxWorkers: this.maxWorkers, pending: this.queue.size });
    }
    return this.pool.start();
  }

  /**
   * Start one pending task ahead of queue order if a slot is free. Does not
   * start the rest of the pool.
   *
   * @throws NotFoundError for unknown names
   */
  start(name: string): boolean {
    this.registry.require(name);
    if (this.isCancelled()) {
      this.logger.warn({ task: name }, `Cancellation requested, not starting task ${name}`);
      return false;
    }
    return this.pool.admit(name);
  }

  /**
   * startAll() followed by join().
   */
  async run(timeoutMs?: number): Promise<string[]> {
    this.startAll();
    return this.join(timeoutMs);
  }

  /**
   * Wait until nothing is running and nothing queued can still be admitted.
   *
   * @param timeoutMs - Give up after this long (no limit when omitted; 0
   *   checks once without waiting)
   * @returns Names still pending or running when the wait ended
   */
  async join(timeoutMs?: number): Promise<string[]> {
    if (timeoutMs === undefined || timeoutMs > 0) {
      await settledWithin(this.pool.whenDrained(), timeoutMs);
    }
    return this.registry.unfinishedNames();
  }

  /**
   * Wait for one task to finish, or for the pool to stop making progress.
   *
   * @returns Whether the task reached a terminal state
   * @throws NotFoundError for unknown names
   */
  async joinTask(name: string, timeoutMs?: number): Promise<boolean> {
    const record = this.registry.require(name);
    if (!isTerminalState(record.state) && (timeoutMs === undefined || timeoutMs > 0)) {
      await settledWithin(Promise.race([record.completion, this.pool.whenDrained()]), timeoutMs);
    }
    return isTerminalState(record.state);
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  status(name: string): TaskStatus {
    return this.registry.status(name);
  }

  get(name: string): TaskSnapshot {
    return this.registry.get(name);
  }

  list(filter?: { state?: TaskState }): TaskSnapshot[] {
    return this.registry.list(filter);
  }

  /**
   * Value a task produced; null while it has none.
   *
   * @throws TaskFailureError for a failed task unless rethrow is false
   * @throws NotFoundError for unknown names
   */
  getResult(name: string, options: RethrowOptions = {}): unknown {
    const { outcome } = this.registry.require(name);
    if (outcome?.kind === "failed") {
      if (options.rethrow ?? true) {
        throw new TaskFailureError(name, outcome.cause);
      }
      return null;
    }
    return outcome?.kind === "succeeded" ? outcome.value : null;
  }

  /**
   * name → result for every task, null where absent.
   *
   * @throws TaskFailureError for the first failed task when rethrow is set
   */
  results(options: RethrowOptions = {}): Record<string, unknown> {
    if (options.rethrow) {
      const [failed] = this.registry.failedRecords();
      if (failed?.outcome?.kind === "failed") {
        throw new TaskFailureError(failed.name, failed.outcome.cause);
      }
    }
    return this.registry.results();
  }

  failures(): Record<string, Error> {
    return this.registry.failures();
  }

  allNames(): string[] {
    return this.registry.allNames();
  }

  activeNames(): string[] {
    return this.registry.activeNames();
  }

  pendingNames(): string[] {
    return this.registry.pendingNames();
  }

  /**
   * Every registered task has succeeded or failed.
   */
  isAllDone(): boolean {
    return this.registry.unfinishedNames().length === 0;
  }

  /**
   * Evict succeeded and failed tasks from the registry.
   *
   * @returns Evicted names
   */
  removeFinished(): string[] {
    const removed = this.registry.removeFinished();
    if (removed.length > 0) {
      this.logger.debug({ tasks: removed }, `Removed ${removed.length} finished task(s)`);
    }
    return removed;
  }

  stats(): SchedulerStats {
    return {
      ...this.registry.stats(),
      maxWorkers: this.maxWorkers,
      queued: this.queue.size,
      started: this.pool.isStarted(),
      cancelled: this.isCancelled(),
    };
  }

  /**
   * Re-submit every failed task under a derived name.
   *
   * @returns Names of the new tasks
   */
  retryFailed(): string[] {
    return this.retries.retryFailed();
  }

  /**
   * Stop admitting tasks. Running tasks are not interrupted; they can
   * observe cancellation through their context.
   */
  cancel(reason: string = "Scheduler cancelled"): void {
    if (!this.isCancelled()) {
      this.controller.abort(reason);
    }
  }

  isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Cancel, then give running tasks up to timeoutMs to finish.
   *
   * @returns Names of tasks still running afterwards
   */
  async shutdown(timeoutMs: number = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<string[]> {
    this.cancel("Scheduler shutting down");
    await this.join(timeoutMs);

    const stillRunning = this.registry.activeNames();
    for (const name of stillRunning) {
      this.logger.warn({ task: name }, `Task ${name} still running after shutdown`);
    }
    return stillRunning;
  }

  private enqueue(record: TaskRecord): void {
    this.queue.push(record.name, record.priority);
    this.pool.pump();
  }

  private onCancelled(): void {
    const reason = toError(this.controller.signal.reason).message;
    const running = this.registry.activeNames();
    const pending = this.registry.pendingNames();
    this.logger.info({ running: running.length, pending: pending.length }, `Task pool cancelled: ${reason}`);
    this.events.publishSync("pool.cancelled", { reason, running, pending });
    this.pool.checkDrained();
  }

  private createHandle<TResult>(record: TaskRecord<TResult>): TaskHandle<TResult> {
    const { name } = record;
    return {
      name,
      snapshot: () => snapshotOf(record),
      done: async () => {
        await record.completion;
        return snapshotOf(record);
      },
      result: async () => {
        await record.completion;
        const { outcome } = record;
        if (outcome?.kind === "succeeded") {
          return outcome.value;
        }
        if (outcome?.kind === "failed") {
          throw new TaskFailureError(name, outcome.cause);
        }
        throw new Error(`Task '${name}' settled without an outcome`);
      },
    };
  }
}
