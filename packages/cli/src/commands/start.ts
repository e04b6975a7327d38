/**
 * offline-sync start - Watch the command directory and run sync jobs
 *
 * Commands:
 * - offline-sync start                               Run until stopped
 * - offline-sync start --once                        Run one cycle, wait for its jobs
 * - offline-sync start --max-workers 4 --timeout 600
 * - offline-sync start -- --include-offline          Forward options to the sync command
 */

import {
  SyncScheduler,
  createLogger,
  type LogLevel,
  type ResolvedSchedulerOptions,
} from "@offline-sync/core";
import { isProcessRunning, readPidFile, removePidFile, writePidFile } from "../pid-file.js";
import { exitWithError, resolveSettings } from "../settings.js";

export interface StartOptions {
  config?: string;
  commandDir?: string;
  wait?: number;
  timeout?: number;
  maxWorkers?: number;
  dryRun?: boolean;
  once?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  /** Arguments after `--`, forwarded to every sync invocation */
  syncOptions?: string[];
}

function pickLogLevel(options: StartOptions): LogLevel | undefined {
  if (options.verbose) {
    return "debug";
  }
  if (options.quiet) {
    return "warn";
  }
  return undefined;
}

/**
 * Start the scheduler
 */
export async function startCommand(options: StartOptions): Promise<void> {
  let resolved: ResolvedSchedulerOptions;
  let runningPid: number | null;
  try {
    ({ options: resolved } = await resolveSettings(options.config, {
      commandDir: options.commandDir,
      pollWait: options.wait,
      timeout: options.timeout,
      maxWorkers: options.maxWorkers,
      syncOptions:
        options.syncOptions && options.syncOptions.length > 0 ? options.syncOptions : undefined,
      dryRun: options.dryRun,
      logLevel: pickLogLevel(options),
    }));
    runningPid = await readPidFile(resolved.commandDir);
  } catch (error) {
    exitWithError(error);
  }

  const commandDir = resolved.commandDir;
  if (runningPid !== null && runningPid !== process.pid && isProcessRunning(runningPid)) {
    console.error(`Error: A scheduler is already watching ${commandDir} (PID ${runningPid}).`);
    process.exit(1);
  }

  const abortController = new AbortController();
  let scheduler: SyncScheduler;
  try {
    scheduler = new SyncScheduler({
      ...resolved,
      once: options.once,
      signal: abortController.signal,
      logger: createLogger({ prefix: "[offline-sync]", level: resolved.logLevel }),
    });
  } catch (error) {
    exitWithError(error);
  }

  const onSignal = (signal: NodeJS.Signals) => {
    if (!abortController.signal.aborted) {
      console.log("");
      console.log(`Received ${signal}, waiting for running jobs to finish...`);
      abortController.abort();
    }
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    try {
      const pidFile = await writePidFile(commandDir);
      console.log(`PID file written: ${pidFile}`);
      if (!options.once) {
        console.log("Press Ctrl+C to stop");
      }

      await scheduler.start();
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      await removePidFile(commandDir);
    }
  } catch (error) {
    exitWithError(error);
  }
}
