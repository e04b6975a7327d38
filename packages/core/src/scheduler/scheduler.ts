/**
 * SyncScheduler turns command files into sync jobs
 *
 * The scheduler owns two collections: the pending set (targets waiting for a
 * worker) and the in-flight table (job handle -> target). Only the control
 * loop touches them; every mutation runs through serialize(), so runCycle()
 * and drain() never interleave even when called from outside the loop.
 */

import { mkdir } from "node:fs/promises";
import {
  isDirectory,
  readCommandTarget,
  removeCommandFiles,
  scanCommandDir,
  SyncTrigger,
} from "../command-source/index.js";
import { errorMessage } from "../errors.js";
import { createLogger, type SyncLogger } from "../logging/index.js";
import { WandbSyncRunner, type SyncRunner } from "../sync/index.js";
import { SchedulerConfigError, SchedulerError, SchedulerShutdownError } from "./errors.js";
import type {
  CycleReport,
  SchedulerOptions,
  SchedulerState,
  SchedulerStatus,
  StopOptions,
} from "./types.js";
import { assertValidMaxWorkers, WorkerPool, type JobHandle } from "./worker-pool.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Default minimum seconds between cycle starts
 */
export const DEFAULT_POLL_WAIT = 1;

/**
 * Default seconds before a sync job times out
 */
export const DEFAULT_JOB_TIMEOUT = 120;

/**
 * Default number of concurrent sync jobs
 */
export const DEFAULT_MAX_WORKERS = 1;

// =============================================================================
// Scheduler Class
// =============================================================================

/**
 * Bounded-concurrency scheduler for command-file driven sync jobs
 *
 * Each cycle:
 * 1. Reclaims finished jobs; a timed-out target gets a fresh command file and
 *    goes back into the pending set
 * 2. Ingests command files naming existing directories into the pending set
 * 3. Dispatches pending targets while workers are free
 * 4. Deletes the command files read in step 2; one that cannot be deleted is
 *    never read again
 * 5. Sleeps so cycles start at least `pollWait` seconds apart
 *
 * @example
 * ```typescript
 * const scheduler = new SyncScheduler({
 *   commandDir: "/home/me/.offline_sync_command_dir",
 *   maxWorkers: 2,
 *   timeout: 300,
 *   syncOptions: ["--include-offline"],
 * });
 *
 * process.on("SIGTERM", () => void scheduler.stop());
 * await scheduler.start();
 * ```
 */
export class SyncScheduler {
  readonly commandDir: string;
  readonly pollWait: number;
  readonly timeout: number;
  readonly maxWorkers: number;
  readonly syncOptions: readonly string[];

  private readonly once: boolean;
  private readonly externalSignal?: AbortSignal;
  private readonly logger: SyncLogger;
  private readonly runner: SyncRunner;
  private readonly trigger: SyncTrigger;
  private readonly pool: WorkerPool;

  private readonly pending = new Set<string>();
  private readonly inFlight = new Map<JobHandle, string>();
  // Command files already read once whose deletion failed
  private readonly undeletable = new Set<string>();
  private lock: Promise<unknown> = Promise.resolve();

  private status: SchedulerStatus = "stopped";
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;

  private startedAt: string | null = null;
  private cycleCount = 0;
  private dispatchCount = 0;
  private requeueCount = 0;
  private lastCycleAt: string | null = null;

  constructor(options: SchedulerOptions) {
    const maxWorkers = options.maxWorkers ?? DEFAULT_MAX_WORKERS;
    assertValidMaxWorkers(maxWorkers);

    const pollWait = options.pollWait ?? DEFAULT_POLL_WAIT;
    if (!Number.isFinite(pollWait) || pollWait < 0) {
      throw new SchedulerConfigError(
        `pollWait must be a number >= 0, got ${pollWait}`,
        "pollWait",
        pollWait
      );
    }

    this.commandDir = options.commandDir;
    this.pollWait = pollWait;
    this.timeout = options.timeout ?? DEFAULT_JOB_TIMEOUT;
    this.maxWorkers = maxWorkers;
    this.syncOptions = [...(options.syncOptions ?? [])];
    this.once = options.once ?? false;
    this.externalSignal = options.signal;
    this.logger = options.logger ?? createLogger({ prefix: "[scheduler]" });
    this.runner =
      options.runner ??
      new WandbSyncRunner({
        command: options.syncCommand,
        dryRun: options.dryRun,
        logger: this.logger,
      });
    this.trigger = new SyncTrigger({ commandDir: this.commandDir, logger: this.logger });
    this.pool = new WorkerPool({
      maxWorkers,
      run: (target) => this.runner.run(target, this.syncOptions, this.timeout),
    });
  }

  /**
   * Check if the scheduler is currently running
   */
  isRunning(): boolean {
    return this.status === "running";
  }

  /**
   * Get the current scheduler status
   */
  getStatus(): SchedulerStatus {
    return this.status;
  }

  /**
   * Get detailed scheduler state for monitoring
   */
  getState(): SchedulerState {
    return {
      status: this.status,
      startedAt: this.startedAt,
      cycleCount: this.cycleCount,
      dispatchCount: this.dispatchCount,
      requeueCount: this.requeueCount,
      lastCycleAt: this.lastCycleAt,
      pendingCount: this.pending.size,
      inFlightCount: this.inFlight.size,
    };
  }

  /**
   * Targets waiting for a free worker, in dispatch order
   */
  getPendingTargets(): string[] {
    return Array.from(this.pending);
  }

  /**
   * Targets with a job currently in flight
   */
  getInFlightTargets(): string[] {
    return Array.from(this.inFlight.values());
  }

  /**
   * Start the polling loop
   *
   * Resolves once the loop has been stopped (stop(), the abort signal, or
   * after one cycle with `once`) and every in-flight job has been reclaimed.
   *
   * @throws SchedulerError if the scheduler is already running or stopping
   */
  async start(): Promise<void> {
    if (this.status === "running") {
      throw new SchedulerError("Scheduler is already running");
    }

    if (this.status === "stopping") {
      throw new SchedulerError("Scheduler is stopping, wait for it to complete");
    }

    const abortController = new AbortController();
    const onExternalAbort = () => abortController.abort();
    if (this.externalSignal?.aborted) {
      abortController.abort();
    }
    this.externalSignal?.addEventListener("abort", onExternalAbort, { once: true });

    this.status = "running";
    this.abortController = abortController;
    this.startedAt = new Date().toISOString();
    this.cycleCount = 0;
    this.dispatchCount = 0;
    this.requeueCount = 0;

    this.logger.info(
      `Starting to watch ${this.commandDir} ` +
        `(max workers: ${this.maxWorkers}, poll wait: ${this.pollWait}s, timeout: ${this.timeout}s)`
    );

    this.loop = this.runLoop(abortController.signal);

    try {
      await this.loop;
    } finally {
      this.externalSignal?.removeEventListener("abort", onExternalAbort);
      this.status = "stopped";
      this.abortController = null;
      this.loop = null;
      this.logger.info("Scheduler stopped");
    }
  }

  /**
   * Stop the scheduler gracefully
   *
   * Signals the loop to stop after its current cycle, then waits for every
   * in-flight job to finish and be reclaimed. Timed-out jobs found while
   * draining still get their command file rewritten, so they are picked up
   * by the next scheduler run.
   *
   * @param options - Options for shutdown behavior
   * @param options.timeout - Maximum time to wait in milliseconds (default: unbounded)
   * @throws SchedulerShutdownError if the timeout is reached while jobs are still running
   */
  async stop(options?: StopOptions): Promise<void> {
    const loop = this.loop;
    if (this.status !== "running" || !loop) {
      return;
    }

    this.status = "stopping";
    this.logger.info("Scheduler stopping...");
    this.abortController?.abort();

    if (options?.timeout === undefined) {
      await loop;
      return;
    }

    const timeout = options.timeout;
    let timeoutHandle: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<"timeout">((resolve) => {
      timeoutHandle = setTimeout(() => resolve("timeout"), timeout);
    });

    try {
      const result = await Promise.race([
        loop.then(() => "completed" as const),
        timeoutPromise,
      ]);

      if (result === "timeout") {
        const runningJobCount = this.inFlight.size;
        this.logger.error(
          `Shutdown timed out with ${runningJobCount} job(s) still running`
        );
        throw new SchedulerShutdownError(
          `Scheduler shutdown timed out after ${timeout}ms with ${runningJobCount} job(s) still running`,
          { timedOut: true, runningJobCount }
        );
      }
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  /**
   * Run one reclaim → ingest → dispatch → cleanup cycle, without throttling
   */
  runCycle(): Promise<CycleReport> {
    return this.serialize(() => this.cycle());
  }

  /**
   * Wait for every in-flight job and reclaim it
   */
  drain(): Promise<void> {
    return this.serialize(async () => {
      await this.pool.drain();
      await this.reclaim();
    });
  }

  /**
   * Main polling loop
   */
  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const cycleStartedAt = Date.now();

      try {
        await this.runCycle();
      } catch (error) {
        this.logger.error(`Error during sync cycle: ${errorMessage(error)}`);
      }

      if (this.once || signal.aborted) {
        break;
      }

      const elapsed = Date.now() - cycleStartedAt;
      await this.sleep(Math.max(0, this.pollWait * 1000 - elapsed), signal);
    }

    if (this.inFlight.size > 0) {
      this.logger.info(
        `Waiting for ${this.inFlight.size} running job(s) to complete...`
      );
    }
    await this.drain();
  }

  /**
   * Sleep for the specified duration, interruptible via AbortSignal
   */
  private sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timeout);
        resolve();
      };
      const timeout = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      }, ms);

      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Run a task after every previously queued one has settled
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lock.then(task);
    // Failures reach the caller through `run`; the chain itself keeps going
    this.lock = run.catch(() => undefined);
    return run;
  }

  private async cycle(): Promise<CycleReport> {
    this.lastCycleAt = new Date().toISOString();

    const { reclaimed, requeued } = await this.reclaim();
    const { commandFiles, accepted, rejected } = await this.ingest();
    const dispatched = this.dispatch();
    const removed = await this.cleanup(commandFiles);

    this.cycleCount++;

    return {
      reclaimed,
      requeued,
      commandFiles: commandFiles.length,
      accepted,
      rejected,
      dispatched,
      removed,
    };
  }

  /**
   * Delete consumed command files and retry earlier failures
   */
  private async cleanup(commandFiles: readonly string[]): Promise<number> {
    const { removed, failed } = await removeCommandFiles([
      ...commandFiles,
      ...this.undeletable,
    ]);

    const stillFailing = new Set<string>();
    for (const { commandFile, error } of failed) {
      stillFailing.add(commandFile);
      if (!this.undeletable.has(commandFile)) {
        this.logger.error(
          `Failed to delete command file ${commandFile}, ignoring it from now on: ${error.message}`
        );
      }
    }

    this.undeletable.clear();
    for (const commandFile of stillFailing) {
      this.undeletable.add(commandFile);
    }

    return removed;
  }

  /**
   * Remove finished jobs from the in-flight table and requeue timeouts
   */
  private async reclaim(): Promise<{ reclaimed: number; requeued: number }> {
    let reclaimed = 0;
    let requeued = 0;

    for (const [handle, target] of Array.from(this.inFlight)) {
      if (!this.pool.isDone(handle)) {
        continue;
      }

      this.inFlight.delete(handle);
      const outcome = await this.pool.result(handle);
      this.pool.forget(handle);
      reclaimed++;

      switch (outcome.status) {
        case "timeout":
          this.logger.warn(`Syncing ${target} timed out. Trying later.`);
          await this.requeue(target);
          requeued++;
          break;
        case "error":
          this.logger.error(`Sync job for ${target} crashed: ${outcome.error.message}`);
          break;
        default:
          this.logger.debug(`Sync job for ${target} finished (${outcome.status})`);
      }
    }

    return { reclaimed, requeued };
  }

  /**
   * Re-signal a target on disk and put it back into the pending set
   */
  private async requeue(target: string): Promise<void> {
    try {
      await this.trigger.trigger(target, { quiet: true });
    } catch (error) {
      this.logger.error(
        `Failed to write command file for ${target}: ${errorMessage(error)}`
      );
    }
    this.pending.add(target);
    this.requeueCount++;
  }

  /**
   * Read command files into the pending set
   */
  private async ingest(): Promise<{
    commandFiles: string[];
    accepted: number;
    rejected: number;
  }> {
    await mkdir(this.commandDir, { recursive: true });
    const commandFiles = (await scanCommandDir(this.commandDir)).filter(
      (commandFile) => !this.undeletable.has(commandFile)
    );
    let accepted = 0;
    let rejected = 0;

    for (const commandFile of commandFiles) {
      let target: string;
      let exists: boolean;
      try {
        target = await readCommandTarget(commandFile);
        exists = await isDirectory(target);
      } catch (error) {
        this.logger.error(errorMessage(error));
        rejected++;
        continue;
      }

      if (!exists) {
        this.logger.error(
          `Command file ${commandFile} points to non-existing directory ${target}`
        );
        rejected++;
        continue;
      }

      accepted++;

      if (this.isInFlight(target)) {
        this.logger.debug(`${target} is already being synced, dropping ${commandFile}`);
        continue;
      }

      this.pending.add(target);
    }

    return { commandFiles, accepted, rejected };
  }

  /**
   * Hand pending targets to the worker pool while workers are free
   */
  private dispatch(): number {
    let available = this.maxWorkers - this.inFlight.size;
    let dispatched = 0;

    for (const target of Array.from(this.pending)) {
      if (available <= 0) {
        break;
      }

      this.pending.delete(target);
      this.logger.info(`Syncing ${target}...`);
      const handle = this.pool.submit(target);
      this.inFlight.set(handle, target);
      available--;
      dispatched++;
      this.dispatchCount++;
    }

    return dispatched;
  }

  private isInFlight(target: string): boolean {
    for (const inFlightTarget of this.inFlight.values()) {
      if (inFlightTarget === target) {
        return true;
      }
    }
    return false;
  }
}
