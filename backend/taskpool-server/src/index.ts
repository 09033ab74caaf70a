/**
 * @taskpool/server
 * Bounded-concurrency, priority-ordered task scheduler with an HTTP API
 */

// Queue exports
export {
  TaskState,
  isTerminalState,
  isValidTransition,
  getAllowedTransitions,
  TaskScheduler,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  DEFAULT_PROGRESS_TOTAL,
  HandlerRegistry,
  EventBus,
  SCHEDULER_EVENT_TYPES,
  uniqueName,
  deriveName,
  TaskpoolError,
  ConfigurationError,
  DuplicateNameError,
  NotFoundError,
  TaskFailureError,
  InvalidSubmissionError,
  FileSinkError,
} from "./queue";
export type {
  TaskSchedulerOptions,
  SubmitOptions,
  TaskHandle,
  SchedulerStats,
  RethrowOptions,
  TaskCallable,
  TaskContext,
  TaskSnapshot,
  TaskStatus,
  TaskProgress,
  ProgressObserver,
  HandlerDefinition,
  HandlerSubmission,
  HandlerInfo,
  Event,
  EventHandler,
  Subscription,
  SchedulerEvents,
  SchedulerEventType,
  TaskpoolErrorCode,
} from "./queue";

// Runner exports
export { SafeFileWriter, ProgressReporter, registerBuiltinHandlers } from "./runner";
export type { SafeFileWriterOptions, ProgressReporterOptions, BuiltinHandlerOptions } from "./runner";

// Configuration exports
export { loadConfig, DEFAULT_CONFIG_FILE } from "./config/loadConfig";
export type { TaskpoolConfig, LoadConfigOptions } from "./config/loadConfig";
export { createLogger, getDefaultLogger, LOG_LEVELS } from "./logger";
export type { Logger, LogLevel, LoggerOptions } from "./logger";

// API exports
export { createServer, startServer, appRouter, createContext, EventBroadcaster } from "./api";
export type { ServerOptions, AppRouter, Context, TaskView } from "./api";
