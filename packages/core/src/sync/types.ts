/**
 * Type definitions for the sync (job runner) module
 */

// =============================================================================
// Job Outcomes
// =============================================================================

/**
 * The sync tool exited with status 0
 */
export interface SyncSuccess {
  status: "success";
}

/**
 * The sync tool could not be started or exited non-zero
 */
export interface SyncFailure {
  status: "failure";
  /** Human-readable reason, e.g. "Command failed with exit code 1" */
  reason: string;
  /** Exit code, when the process got far enough to produce one */
  exitCode?: number;
}

/**
 * The sync tool ran longer than the configured timeout and was killed
 */
export interface SyncTimeout {
  status: "timeout";
  timeoutSeconds: number;
}

/**
 * The runner itself threw; produced by the worker pool, never by a runner
 */
export interface SyncCrash {
  status: "error";
  error: Error;
}

/**
 * Terminal outcome of one job
 *
 * The scheduler only distinguishes "timeout" (requeue) from everything else.
 */
export type JobOutcome = SyncSuccess | SyncFailure | SyncTimeout | SyncCrash;

/**
 * Outcomes a SyncRunner may return
 */
export type SyncOutcome = SyncSuccess | SyncFailure | SyncTimeout;

// =============================================================================
// Runner Interface
// =============================================================================

/**
 * Runs the external sync tool once against one target directory
 */
export interface SyncRunner {
  /**
   * @param target - Absolute path of the directory to sync
   * @param options - Flags forwarded verbatim to the sync tool
   * @param timeoutSeconds - Kill the tool after this many seconds; `<= 0` waits forever
   */
  run(
    target: string,
    options: readonly string[],
    timeoutSeconds: number
  ): Promise<SyncOutcome>;
}

// =============================================================================
// Process Spawning
// =============================================================================

/**
 * Options handed to a ProcessSpawner
 */
export interface SpawnOptions {
  /** Working directory for the process */
  cwd: string;
  /** Kill the process after this many milliseconds; undefined means never */
  timeoutMs?: number;
}

/**
 * Starts the sync tool and settles when it exits
 *
 * Must reject when the process fails or times out. A timeout rejection
 * carries `timedOut: true`, as execa's errors do. Defaults to execa; tests
 * and alternative hosts may provide their own.
 */
export type ProcessSpawner = (
  file: string,
  args: readonly string[],
  options: SpawnOptions
) => Promise<void>;
