/**
 * StatusRegistry
 *
 * Owns every task record, keyed by its unique name. All reads hand out frozen
 * snapshots and all writes happen in single synchronous calls, so a reader
 * never observes a record half-way through a transition (e.g. RUNNING with a
 * result already attached).
 */

import { DuplicateNameError, NotFoundError } from "./errors";
import { TaskState, isTerminalState, isValidTransition } from "./TaskState";
import { TaskRecord, TaskSnapshot, TaskStatus, snapshotOf } from "./TaskRecord";

/**
 * Record counts per state
 */
export interface RegistryStats {
  pending: number;
  running: number;
  succeeded: number;
  failed: number;
  total: number;
}

export class StatusRegistry {
  /** Insertion-ordered records */
  private readonly records: Map<string, TaskRecord> = new Map();

  /**
   * Register a new record.
   *
   * @throws DuplicateNameError if the name is held by another record
   */
  add(record: TaskRecord): void {
    if (this.records.has(record.name)) {
      throw new DuplicateNameError(record.name);
    }
    this.records.set(record.name, record);
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  /**
   * Live record lookup for the pool's own components.
   *
   * @throws NotFoundError for unknown names
   */
  require(name: string): TaskRecord {
    const record = this.records.get(name);
    if (!record) {
      throw new NotFoundError(name);
    }
    return record;
  }

  /**
   * Snapshot of one record.
   *
   * @throws NotFoundError for unknown names
   */
  get(name: string): TaskSnapshot {
    return snapshotOf(this.require(name));
  }

  status(name: string): TaskStatus {
    const record = this.require(name);
    return Object.freeze({
      state: record.state,
      progress: Object.freeze({ ...record.progress }),
      failure: record.outcome?.kind === "failed" ? record.outcome.cause : undefined,
    });
  }

  list(filter?: { state?: TaskState }): TaskSnapshot[] {
    const now = Date.now();
    const snapshots: TaskSnapshot[] = [];
    for (const record of this.records.values()) {
      if (filter?.state === undefined || record.state === filter.state) {
        snapshots.push(snapshotOf(record, now));
      }
    }
    return snapshots;
  }

  allNames(): string[] {
    return Array.from(this.records.keys());
  }

  /**
   * Names of running records
   */
  activeNames(): string[] {
    return this.namesIn(TaskState.RUNNING);
  }

  pendingNames(): string[] {
    return this.namesIn(TaskState.PENDING);
  }

  /**
   * Names that have not reached a terminal state
   */
  unfinishedNames(): string[] {
    const names: string[] = [];
    for (const record of this.records.values()) {
      if (!isTerminalState(record.state)) {
        names.push(record.name);
      }
    }
    return names;
  }

  /**
   * name → result for every record; null where no result exists (pending,
   * running or failed).
   */
  results(): Record<string, unknown> {
    const results: Record<string, unknown> = {};
    for (const record of this.records.values()) {
      results[record.name] = record.outcome?.kind === "succeeded" ? record.outcome.value : null;
    }
    return results;
  }

  /**
   * name → failure cause for failed records only.
   */
  failures(): Record<string, Error> {
    const failures: Record<string, Error> = {};
    for (const record of this.records.values()) {
      if (record.outcome?.kind === "failed") {
        failures[record.name] = record.outcome.cause;
      }
    }
    return failures;
  }

  /**
   * Failed records in registration order
   */
  failedRecords(): TaskRecord[] {
    return Array.from(this.records.values()).filter((record) => record.state === TaskState.FAILED);
  }

  /**
   * Evict every terminal record.
   *
   * @returns Evicted names
   */
  removeFinished(): string[] {
    const removed: string[] = [];
    for (const [name, record] of this.records) {
      if (isTerminalState(record.state)) {
        this.records.delete(name);
        removed.push(name);
      }
    }
    return removed;
  }

  stats(): RegistryStats {
    const stats: RegistryStats = { pending: 0, running: 0, succeeded: 0, failed: 0, total: 0 };
    for (const record of this.records.values()) {
      stats.total++;
      switch (record.state) {
        case TaskState.PENDING:
          stats.pending++;
          break;
        case TaskState.RUNNING:
          stats.running++;
          break;
        case TaskState.SUCCEEDED:
          stats.succeeded++;
          break;
        case TaskState.FAILED:
          stats.failed++;
          break;
      }
    }
    return stats;
  }

  markRunning(name: string): TaskRecord {
    const record = this.transition(name, TaskState.RUNNING);
    record.startedAt = Date.now();
    return record;
  }

  markSucceeded(name: string, value: unknown): TaskRecord {
    const record = this.transition(name, TaskState.SUCCEEDED);
    record.outcome = { kind: "succeeded", value };
    record.finishedAt = Date.now();
    return record;
  }

  markFailed(name: string, cause: Error): TaskRecord {
    const record = this.transition(name, TaskState.FAILED);
    record.outcome = { kind: "failed", cause };
    record.finishedAt = Date.now();
    return record;
  }

  /**
   * Link a failed record to the record that re-submits it.
   */
  markRetried(name: string, retryName: string): void {
    const record = this.require(name);
    if (record.state !== TaskState.FAILED) {
      throw new Error(`Cannot retry task ${name} in state ${record.state}`);
    }
    record.retriedAs = retryName;
  }

  /**
   * Update a running record's advisory progress. Completed units are clamped
   * to [0, total].
   */
  updateProgress(name: string, completed: number, total?: number): TaskRecord {
    const record = this.require(name);
    const nextTotal = total !== undefined && Number.isFinite(total) && total > 0 ? total : record.progress.total;
    const clamped = Number.isFinite(completed) ? Math.min(Math.max(completed, 0), nextTotal) : record.progress.completed;
    record.progress = { completed: clamped, total: nextTotal };
    return record;
  }

  /**
   * Move a record to a new state, enforcing the state machine.
   */
  private transition(name: string, to: TaskState): TaskRecord {
    const record = this.require(name);
    if (!isValidTransition(record.state, to)) {
      throw new Error(`Invalid state transition: ${record.state} -> ${to} for task ${name}`);
    }
    record.state = to;
    return record;
  }

  private namesIn(state: TaskState): string[] {
    const names: string[] = [];
    for (const record of this.records.values()) {
      if (record.state === state) {
        names.push(record.name);
      }
    }
    return names;
  }
}
