/**
 * Error taxonomy for the task pool.
 *
 * Only configuration and query errors are thrown at callers synchronously.
 * Failures raised by task bodies are recorded on their task and surface as
 * TaskFailureError only when a caller asks for them to be re-raised.
 */

export type TaskpoolErrorCode =
  | "CONFIGURATION"
  | "DUPLICATE_NAME"
  | "NOT_FOUND"
  | "TASK_FAILURE"
  | "INVALID_SUBMISSION"
  | "FILE_SINK";

/**
 * Base class for every error the pool raises on purpose.
 */
export abstract class TaskpoolError extends Error {
  abstract readonly code: TaskpoolErrorCode;
}

/**
 * Invalid scheduler options, environment or configuration file.
 */
export class ConfigurationError extends TaskpoolError {
  readonly code = "CONFIGURATION";

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.name = "ConfigurationError";
  }
}

/**
 * A submission reused the name of a record still held by the registry.
 */
export class DuplicateNameError extends TaskpoolError {
  readonly code = "DUPLICATE_NAME";

  constructor(public readonly taskName: string) {
    super(`A task named '${taskName}' is already registered`);
    this.name = "DuplicateNameError";
  }
}

export class NotFoundError extends TaskpoolError {
  readonly code = "NOT_FOUND";

  constructor(public readonly taskName: string) {
    super(`No task named '${taskName}'`);
    this.name = "NotFoundError";
  }
}

/**
 * Re-raises the cause a task body failed with.
 */
export class TaskFailureError extends TaskpoolError {
  readonly code = "TASK_FAILURE";

  constructor(
    public readonly taskName: string,
    public readonly failure: Error
  ) {
    super(`Task '${taskName}' failed: ${failure.message}`, { cause: failure });
    this.name = "TaskFailureError";
  }
}

/**
 * A submission that names an unknown handler or carries arguments the
 * handler rejects.
 */
export class InvalidSubmissionError extends TaskpoolError {
  readonly code = "INVALID_SUBMISSION";

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "InvalidSubmissionError";
  }
}

export class FileSinkError extends TaskpoolError {
  readonly code = "FILE_SINK";

  constructor(
    public readonly filePath: string,
    failure: Error
  ) {
    super(`Error writing to file ${filePath}: ${failure.message}`, { cause: failure });
    this.name = "FileSinkError";
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
