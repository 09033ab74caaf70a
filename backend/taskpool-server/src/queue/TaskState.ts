/**
 * TaskState Enum
 *
 * Lifecycle of a task record in the pool:
 *
 *   PENDING → RUNNING → SUCCEEDED
 *                ↓
 *             FAILED
 *
 * Transitions only move forward. Re-running a failed task creates a new
 * record under a new name; a terminal record is never revisited.
 */
export enum TaskState {
  /** Registered and waiting in the admission queue */
  PENDING = "PENDING",

  /** Admitted under the concurrency cap; its body is executing */
  RUNNING = "RUNNING",

  /** Body returned (or its promise resolved) */
  SUCCEEDED = "SUCCEEDED",

  /** Body threw (or its promise rejected) */
  FAILED = "FAILED",
}

/**
 * Check if a state is terminal (no further transitions possible)
 */
export function isTerminalState(state: TaskState): boolean {
  return state === TaskState.SUCCEEDED || state === TaskState.FAILED;
}

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: TaskState, to: TaskState): boolean {
  return getAllowedTransitions(from).includes(to);
}

/**
 * Get allowed next states from current state
 */
export function getAllowedTransitions(state: TaskState): TaskState[] {
  switch (state) {
    case TaskState.PENDING:
      return [TaskState.RUNNING];
    case TaskState.RUNNING:
      return [TaskState.SUCCEEDED, TaskState.FAILED];
    case TaskState.SUCCEEDED:
    case TaskState.FAILED:
      return [];
    default:
      return [];
  }
}
