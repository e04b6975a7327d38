/**
 * Base error types shared by every offline-sync module
 *
 * Each module defines its own subclasses (scheduler, config, command-source)
 * that extend OfflineSyncError and carry a stable error code.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Stable identifiers for error types, usable for programmatic handling
 */
export const OfflineSyncErrorCode = {
  OFFLINE_SYNC_ERROR: "OFFLINE_SYNC_ERROR",

  // Configuration
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  SCHEMA_VALIDATION: "SCHEMA_VALIDATION",
  FILE_READ_ERROR: "FILE_READ_ERROR",

  // Scheduling
  SCHEDULER_ERROR: "SCHEDULER_ERROR",
  SCHEDULER_CONFIG: "SCHEDULER_CONFIG",
  SCHEDULER_SHUTDOWN: "SCHEDULER_SHUTDOWN",

  // Command files
  COMMAND_FILE_ERROR: "COMMAND_FILE_ERROR",
} as const;

export type OfflineSyncErrorCode =
  (typeof OfflineSyncErrorCode)[keyof typeof OfflineSyncErrorCode];

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all offline-sync errors
 */
export class OfflineSyncError extends Error {
  /** Error code for programmatic handling */
  public readonly code: OfflineSyncErrorCode;

  constructor(
    message: string,
    options?: { cause?: Error; code?: OfflineSyncErrorCode }
  ) {
    super(message);
    this.name = "OfflineSyncError";
    this.cause = options?.cause;
    this.code = options?.code ?? OfflineSyncErrorCode.OFFLINE_SYNC_ERROR;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if an error is an OfflineSyncError
 */
export function isOfflineSyncError(error: unknown): error is OfflineSyncError {
  return error instanceof OfflineSyncError;
}

/**
 * Type guard for errors raised by Node's fs and child_process APIs
 */
export function isErrnoException(
  error: unknown
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Extract a printable message from a thrown value
 */
export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
