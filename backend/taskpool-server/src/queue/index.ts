/**
 * Task Queue Module
 *
 * Bounded-concurrency, priority-ordered task scheduling.
 */

export { TaskState, isTerminalState, isValidTransition, getAllowedTransitions } from "./TaskState";
export { TaskScheduler, DEFAULT_SHUTDOWN_TIMEOUT_MS } from "./TaskScheduler";
export type { TaskSchedulerOptions, SubmitOptions, TaskHandle, SchedulerStats, RethrowOptions } from "./TaskScheduler";
export { createTaskRecord, snapshotOf, DEFAULT_PROGRESS_TOTAL } from "./TaskRecord";
export type {
  TaskCallable,
  TaskContext,
  TaskOutcome,
  TaskProgress,
  TaskRecord,
  TaskSnapshot,
  TaskStatus,
  ProgressObserver,
} from "./TaskRecord";
export { AdmissionQueue } from "./AdmissionQueue";
export { StatusRegistry } from "./StatusRegistry";
export type { RegistryStats } from "./StatusRegistry";
export { WorkerPool } from "./WorkerPool";
export type { WorkerPoolOptions } from "./WorkerPool";
export { ExecutionWrapper } from "./ExecutionWrapper";
export type { ExecutionWrapperOptions } from "./ExecutionWrapper";
export { RetryCoordinator } from "./RetryCoordinator";
export type { RetryCoordinatorOptions } from "./RetryCoordinator";
export { HandlerRegistry } from "./HandlerRegistry";
export type { HandlerDefinition, HandlerSubmission, HandlerInfo } from "./HandlerRegistry";
export { uniqueName, deriveName, FALLBACK_TASK_NAME } from "./names";
export { EventBus, WILDCARD } from "./EventBus";
export type { Event, EventHandler, EventMap, EventBusOptions, Subscription } from "./EventBus";
export { SCHEDULER_EVENT_TYPES } from "./events";
export type { SchedulerEvents, SchedulerEventType, SchedulerEventBus } from "./events";
export {
  TaskpoolError,
  ConfigurationError,
  DuplicateNameError,
  NotFoundError,
  TaskFailureError,
  InvalidSubmissionError,
  FileSinkError,
  toError,
} from "./errors";
export type { TaskpoolErrorCode } from "./errors";
