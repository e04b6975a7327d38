/**
 * Scheduler module
 *
 * Provides the command-file driven sync scheduler and its worker pool.
 */

// Scheduler
export {
  SyncScheduler,
  DEFAULT_JOB_TIMEOUT,
  DEFAULT_MAX_WORKERS,
  DEFAULT_POLL_WAIT,
} from "./scheduler.js";

// Worker pool
export {
  assertValidMaxWorkers,
  JobHandle,
  WorkerPool,
  type WorkerFunction,
  type WorkerPoolOptions,
} from "./worker-pool.js";

// Errors
export {
  isSchedulerConfigError,
  SchedulerConfigError,
  SchedulerError,
  SchedulerShutdownError,
} from "./errors.js";

// Types
export type {
  CycleReport,
  SchedulerOptions,
  SchedulerState,
  SchedulerStatus,
  StopOptions,
} from "./types.js";
