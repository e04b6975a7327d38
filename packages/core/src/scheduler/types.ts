/**
 * Type definitions for the Scheduler module
 *
 * Provides interfaces for scheduler configuration, status tracking
 * and shutdown behavior.
 */

import type { SyncLogger } from "../logging/index.js";
import type { SyncRunner } from "../sync/index.js";

// =============================================================================
// Stop Options
// =============================================================================

/**
 * Options for stopping the scheduler
 */
export interface StopOptions {
  /**
   * Maximum time in milliseconds to wait for in-flight jobs to drain
   * Default: unbounded (every job is waited for)
   */
  timeout?: number;
}

// =============================================================================
// Scheduler Options
// =============================================================================

/**
 * Options for configuring the SyncScheduler
 */
export interface SchedulerOptions {
  /**
   * Directory scanned for command files
   */
  commandDir: string;

  /**
   * Minimum seconds between the starts of two cycles
   * Default: 1
   */
  pollWait?: number;

  /**
   * Seconds before a sync job counts as timed out; `<= 0` means no timeout
   * Default: 120
   */
  timeout?: number;

  /**
   * Maximum number of concurrent sync jobs; must be an integer >= 1
   * Default: 1
   */
  maxWorkers?: number;

  /**
   * Flags forwarded verbatim to the sync tool
   * Default: []
   */
  syncOptions?: readonly string[];

  /**
   * Executable and leading arguments of the sync tool, used when no runner is given
   * Default: ["wandb", "sync"]
   */
  syncCommand?: readonly string[];

  /**
   * Log sync invocations instead of running them (ignored when a runner is given)
   * Default: false
   */
  dryRun?: boolean;

  /**
   * Run a single cycle, wait for its jobs, then return from start()
   * Default: false
   */
  once?: boolean;

  /**
   * Stops the loop when aborted, like stop()
   */
  signal?: AbortSignal;

  /**
   * Job runner; defaults to a WandbSyncRunner built from syncCommand and dryRun
   */
  runner?: SyncRunner;

  /**
   * Logger for scheduler operations
   * Default: console-based logger
   */
  logger?: SyncLogger;
}

// =============================================================================
// Scheduler Status
// =============================================================================

/**
 * Current status of the scheduler
 */
export type SchedulerStatus = "stopped" | "running" | "stopping";

/**
 * Detailed scheduler state for monitoring
 */
export interface SchedulerState {
  /**
   * Current scheduler status
   */
  status: SchedulerStatus;

  /**
   * ISO timestamp of when the scheduler was started
   */
  startedAt: string | null;

  /**
   * Number of cycles completed
   */
  cycleCount: number;

  /**
   * Number of jobs handed to the worker pool
   */
  dispatchCount: number;

  /**
   * Number of timed-out targets put back into the queue
   */
  requeueCount: number;

  /**
   * ISO timestamp of the last cycle start
   */
  lastCycleAt: string | null;

  /**
   * Targets waiting for a free worker
   */
  pendingCount: number;

  /**
   * Jobs dispatched and not yet reclaimed
   */
  inFlightCount: number;
}

/**
 * What a single cycle did, returned by runCycle()
 */
export interface CycleReport {
  /** Jobs whose completion was observed */
  reclaimed: number;
  /** Timed-out targets put back into the queue */
  requeued: number;
  /** Command files read from the command directory */
  commandFiles: number;
  /** Command files that named a usable directory */
  accepted: number;
  /** Command files skipped (unreadable or missing directory) */
  rejected: number;
  /** Jobs handed to the worker pool */
  dispatched: number;
  /** Command files deleted during cleanup */
  removed: number;
}
