/**
 * WandbSyncRunner runs `wandb sync` (or a configured equivalent) in a target
 * directory
 *
 * The command line is `<command...> <options...> .`, run with the target as
 * working directory. With `dryRun` the command is logged instead of run, so
 * the whole scheduling path can be exercised without the tool installed.
 */

import { execa, ExecaError } from "execa";
import { errorMessage } from "../errors.js";
import { createLogger, type SyncLogger } from "../logging/index.js";
import type { ProcessSpawner, SyncOutcome, SyncRunner } from "./types.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Command used when none is configured
 */
export const DEFAULT_SYNC_COMMAND: readonly string[] = ["wandb", "sync"];

// =============================================================================
// Helpers
// =============================================================================

/**
 * Default spawner: execa with inherited stdio, like a foreground command
 */
const execaSpawner: ProcessSpawner = async (file, args, options) => {
  await execa(file, args, {
    cwd: options.cwd,
    timeout: options.timeoutMs,
    stdio: "inherit",
  });
};

/**
 * Check whether a spawner rejection means the process hit its timeout
 *
 * Matches any error carrying `timedOut: true`, as ExecaError does, so a
 * custom spawner reports a timeout the same way.
 */
export function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "timedOut" in error &&
    error.timedOut === true
  );
}

/**
 * Build the full argument vector for one run
 */
export function buildSyncCommand(
  command: readonly string[],
  options: readonly string[]
): string[] {
  return [...command, ...options, "."];
}

// =============================================================================
// Runner
// =============================================================================

/**
 * Options for WandbSyncRunner
 */
export interface WandbSyncRunnerOptions {
  /**
   * Executable and leading arguments
   * Default: ["wandb", "sync"]
   */
  command?: readonly string[];

  /** Log the command instead of running it */
  dryRun?: boolean;

  /** Logger for runner output */
  logger?: SyncLogger;

  /** Custom process spawner; defaults to execa */
  spawner?: ProcessSpawner;
}

/**
 * SyncRunner backed by an external process
 *
 * @example
 * ```typescript
 * const runner = new WandbSyncRunner({ dryRun: true });
 * const outcome = await runner.run("/data/offline-run-1", ["--include-offline"], 120);
 * ```
 */
export class WandbSyncRunner implements SyncRunner {
  private readonly command: readonly string[];
  private readonly dryRun: boolean;
  private readonly logger: SyncLogger;
  private readonly spawner: ProcessSpawner;

  constructor(options: WandbSyncRunnerOptions = {}) {
    if (options.command !== undefined && options.command.length === 0) {
      throw new Error("Sync command must name an executable");
    }
    this.command = options.command ?? DEFAULT_SYNC_COMMAND;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? createLogger({ prefix: "[sync]" });
    this.spawner = options.spawner ?? execaSpawner;
  }

  async run(
    target: string,
    options: readonly string[],
    timeoutSeconds: number
  ): Promise<SyncOutcome> {
    const [file, ...args] = buildSyncCommand(this.command, options);
    const commandLine = [file, ...args].join(" ");

    if (this.dryRun) {
      this.logger.debug(`Dry run enabled. Not actually calling ${file}.`);
      this.logger.info(`Command would be: ${commandLine} in ${target}`);
      return { status: "success" };
    }

    const timeoutMs = timeoutSeconds > 0 ? Math.round(timeoutSeconds * 1000) : undefined;
    this.logger.debug(`Running "${commandLine}" in ${target}`);

    try {
      await this.spawner(file, args, { cwd: target, timeoutMs });
      this.logger.debug(`Finished "${commandLine}" in ${target}`);
      return { status: "success" };
    } catch (error) {
      if (isTimeoutError(error)) {
        this.logger.debug(`"${commandLine}" in ${target} timed out after ${timeoutSeconds}s`);
        return { status: "timeout", timeoutSeconds };
      }

      const reason = error instanceof ExecaError ? error.shortMessage : errorMessage(error);
      const exitCode = error instanceof ExecaError ? error.exitCode : undefined;
      this.logger.warn(`Sync of ${target} failed: ${reason}`);
      return { status: "failure", reason, exitCode };
    }
  }
}
