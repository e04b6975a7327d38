/**
 * Error classes for scheduler module
 *
 * Provides typed errors with descriptive messages for scheduler operations.
 */

import { OfflineSyncError, OfflineSyncErrorCode } from "../errors.js";

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all scheduler errors
 */
export class SchedulerError extends OfflineSyncError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: OfflineSyncErrorCode }
  ) {
    super(message, {
      cause: options?.cause,
      code: options?.code ?? OfflineSyncErrorCode.SCHEDULER_ERROR,
    });
    this.name = "SchedulerError";
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when a scheduler or worker pool is built with invalid settings
 *
 * Raised from the constructor, before any scheduling happens. Values are
 * never clamped into range.
 */
export class SchedulerConfigError extends SchedulerError {
  /** The option that failed validation, e.g. "maxWorkers" */
  public readonly field: string;

  /** The rejected value */
  public readonly value: unknown;

  constructor(message: string, field: string, value: unknown) {
    super(message, { code: OfflineSyncErrorCode.SCHEDULER_CONFIG });
    this.name = "SchedulerConfigError";
    this.field = field;
    this.value = value;
  }
}

// =============================================================================
// Scheduler Shutdown Errors
// =============================================================================

/**
 * Error thrown when scheduler shutdown encounters issues
 *
 * This error is thrown when the scheduler cannot shut down cleanly,
 * typically due to running jobs not completing within the configured timeout.
 */
export class SchedulerShutdownError extends SchedulerError {
  /** Whether the shutdown timed out waiting for jobs to complete */
  public readonly timedOut: boolean;

  /** Number of jobs that were still running when shutdown completed/timed out */
  public readonly runningJobCount: number;

  constructor(
    message: string,
    options: { timedOut: boolean; runningJobCount: number; cause?: Error }
  ) {
    super(message, {
      cause: options.cause,
      code: OfflineSyncErrorCode.SCHEDULER_SHUTDOWN,
    });
    this.name = "SchedulerShutdownError";
    this.timedOut = options.timedOut;
    this.runningJobCount = options.runningJobCount;
  }
}

/**
 * Type guard to check if an error is a SchedulerConfigError
 */
export function isSchedulerConfigError(
  error: unknown
): error is SchedulerConfigError {
  return error instanceof SchedulerConfigError;
}
