/**
 * Events published by the TaskScheduler
 */

import type { EventBus } from "./EventBus";
import type { RegistryStats } from "./StatusRegistry";

export type SchedulerEvents = {
  "pool.started": { maxWorkers: number; pending: number };
  "pool.cancelled": { reason: string; running: string[]; pending: string[] };
  /** Nothing is running and no queued task can be admitted */
  "pool.drained": { stats: RegistryStats };
  "task.submitted": { name: string; priority: number; retryOf?: string };
  "task.admitted": { name: string; priority: number; running: number };
  "task.progress": { name: string; completed: number; total: number };
  "task.succeeded": { name: string; durationMs: number };
  "task.failed": { name: string; error: string; durationMs: number };
  "task.retried": { name: string; retryOf: string; priority: number };
};

export type SchedulerEventType = keyof SchedulerEvents;

export type SchedulerEventBus = EventBus<SchedulerEvents>;

export const SCHEDULER_EVENT_TYPES = [
  "pool.started",
  "pool.cancelled",
  "pool.drained",
  "task.submitted",
  "task.admitted",
  "task.progress",
  "task.succeeded",
  "task.failed",
  "task.retried",
] as const satisfies readonly SchedulerEventType[];
