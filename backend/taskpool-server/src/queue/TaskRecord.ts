/**
 * Task records and the values derived from them.
 *
 * A TaskRecord is owned by the StatusRegistry. Its description (name,
 * priority, callable and arguments) never changes; its run-state moves
 * forward through TaskState and is only written by the registry.
 */

import type { Logger } from "pino";
import { TaskState } from "./TaskState";

/**
 * Handed to every task body as its first argument.
 */
export interface TaskContext {
  /** Name of the record being executed */
  readonly name: string;
  /** Cooperative cancellation signal shared by the whole pool */
  readonly signal: AbortSignal;
  /** Logger bound to this task */
  readonly logger: Logger;
  /** Whether cancellation has been signalled */
  isCancelled(): boolean;
  /**
   * Report absolute progress. Advisory only: it never changes how often the
   * body runs.
   */
  reportProgress(completed: number, total?: number): void;
  /** Add to the completed progress units (default: 1) */
  advance(units?: number): void;
}

/**
 * A unit of work. Receives its context, then the arguments it was submitted
 * with.
 */
export type TaskCallable<TArgs extends unknown[] = unknown[], TResult = unknown> = (
  context: TaskContext,
  ...args: TArgs
) => TResult | PromiseLike<TResult>;

/**
 * Observer notified on admission, on each progress report and on completion.
 */
export type ProgressObserver = (name: string, completed: number, total: number) => void;

/**
 * Result and failure cause are mutually exclusive by construction.
 */
export type TaskOutcome<TResult> =
  | { kind: "succeeded"; value: TResult }
  | { kind: "failed"; cause: Error };

export interface TaskProgress {
  completed: number;
  total: number;
}

export const DEFAULT_PROGRESS_TOTAL = 100;

export interface TaskRecord<TResult = unknown> {
  readonly name: string;
  /** Lower = admitted earlier */
  readonly priority: number;
  /** Whether the process may exit while this task runs */
  readonly daemon: boolean;
  /** Arguments the body is invoked with, kept for audit and retries */
  readonly args: readonly unknown[];
  /** Invokes the body with its stored arguments */
  readonly invoke: (context: TaskContext) => TResult | PromiseLike<TResult>;
  readonly submittedAt: number;
  /** Name of the failed record this one re-submits */
  readonly retryOf?: string;
  /** Settles once the record reaches a terminal state */
  readonly completion: Promise<void>;
  /** Settles `completion`; calling it again has no effect */
  readonly complete: () => void;

  state: TaskState;
  outcome?: TaskOutcome<TResult>;
  startedAt?: number;
  finishedAt?: number;
  progress: TaskProgress;
  /** Name of the record created when this one was retried */
  retriedAs?: string;
}

export interface TaskRecordInit<TResult> {
  name: string;
  priority: number;
  daemon: boolean;
  args: readonly unknown[];
  invoke: (context: TaskContext) => TResult | PromiseLike<TResult>;
  total?: number;
  retryOf?: string;
}

export function createTaskRecord<TResult>(init: TaskRecordInit<TResult>): TaskRecord<TResult> {
  let resolve: () => void = () => undefined;
  const completion = new Promise<void>((r) => {
    resolve = r;
  });

  return {
    name: init.name,
    priority: init.priority,
    daemon: init.daemon,
    args: init.args,
    invoke: init.invoke,
    submittedAt: Date.now(),
    retryOf: init.retryOf,
    completion,
    complete: () => resolve(),
    state: TaskState.PENDING,
    progress: { completed: 0, total: init.total ?? DEFAULT_PROGRESS_TOTAL },
  };
}

/**
 * Read-only copy of a record, safe to hand to callers.
 */
export interface TaskSnapshot<TResult = unknown> {
  readonly name: string;
  readonly priority: number;
  readonly state: TaskState;
  readonly result?: TResult;
  readonly failure?: Error;
  readonly progress: Readonly<TaskProgress>;
  readonly daemon: boolean;
  readonly submittedAt: number;
  readonly startedAt?: number;
  readonly finishedAt?: number;
  /** Time spent running; measured to now while the task is still running */
  readonly durationMs?: number;
  readonly retryOf?: string;
  readonly retriedAs?: string;
}

/**
 * What status(name) reports.
 */
export interface TaskStatus {
  readonly state: TaskState;
  readonly progress: Readonly<TaskProgress>;
  readonly failure?: Error;
}

export function snapshotOf<TResult>(record: TaskRecord<TResult>, now: number = Date.now()): TaskSnapshot<TResult> {
  const { outcome } = record;
  let durationMs: number | undefined;
  if (record.startedAt !== undefined) {
    durationMs = (record.finishedAt ?? now) - record.startedAt;
  }

  return Object.freeze({
    name: record.name,
    priority: record.priority,
    state: record.state,
    result: outcome?.kind === "succeeded" ? outcome.value : undefined,
    failure: outcome?.kind === "failed" ? outcome.cause : undefined,
    progress: Object.freeze({ ...record.progress }),
    daemon: record.daemon,
    submittedAt: record.submittedAt,
    startedAt: record.startedAt,
    finishedAt: record.finishedAt,
    durationMs,
    retryOf: record.retryOf,
    retriedAs: record.retriedAs,
  });
}
