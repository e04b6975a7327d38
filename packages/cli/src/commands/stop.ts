/**
 * offline-sync stop - Stop a running scheduler
 *
 * Commands:
 * - offline-sync stop               Graceful stop (wait for running jobs)
 * - offline-sync stop --force       Immediate stop (SIGKILL)
 * - offline-sync stop --timeout 30  Wait max 30 seconds before force kill
 */

import { isProcessRunning, pidFilePath, readPidFile, removePidFile } from "../pid-file.js";
import { exitWithError, resolveSettings } from "../settings.js";

export interface StopOptions {
  config?: string;
  commandDir?: string;
  force?: boolean;
  timeout?: number;
}

/**
 * Default timeout in seconds
 */
const DEFAULT_TIMEOUT = 30;

/**
 * Send signal to process
 */
function sendSignal(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch {
    return false;
  }
}

/**
 * Wait for a process to exit with timeout
 */
async function waitForProcessExit(pid: number, timeoutSeconds: number): Promise<boolean> {
  const startTime = Date.now();
  const timeoutMs = timeoutSeconds * 1000;

  while (Date.now() - startTime < timeoutMs) {
    if (!isProcessRunning(pid)) {
      return true;
    }
    await new Promise((resolve) => setTimeout(resolve, 100));
  }

  return !isProcessRunning(pid);
}

/**
 * Send SIGKILL and wait briefly for the process to go away
 */
async function forceKill(pid: number): Promise<void> {
  if (!sendSignal(pid, "SIGKILL")) {
    console.error(`Error: Failed to send SIGKILL to process ${pid}.`);
    process.exit(1);
  }

  if (!(await waitForProcessExit(pid, 5))) {
    console.error(`Error: Process ${pid} did not terminate after SIGKILL.`);
    process.exit(1);
  }
}

/**
 * Stop the scheduler watching the configured command directory
 */
export async function stopCommand(options: StopOptions): Promise<void> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const force = options.force ?? false;

  let commandDir: string;
  let pid: number | null;
  try {
    const { options: resolved } = await resolveSettings(options.config, {
      commandDir: options.commandDir,
    });
    commandDir = resolved.commandDir;
    pid = await readPidFile(commandDir);
  } catch (error) {
    exitWithError(error);
  }

  if (pid === null) {
    console.error("Error: No PID file found. Is the scheduler running?");
    console.error(`Checked: ${pidFilePath(commandDir)}`);
    process.exit(1);
  }

  if (!isProcessRunning(pid)) {
    console.error(`Error: Scheduler process (PID ${pid}) is not running.`);
    console.log("Cleaning up stale PID file...");
    await removePidFile(commandDir);
    console.log("PID file removed.");
    process.exit(1);
  }

  if (force) {
    console.log(`Force stopping scheduler (PID ${pid})...`);
    await forceKill(pid);
  } else {
    console.log(`Stopping scheduler (PID ${pid})...`);
    if (!sendSignal(pid, "SIGTERM")) {
      console.error(`Error: Failed to send SIGTERM to process ${pid}.`);
      process.exit(1);
    }

    console.log(`Waiting up to ${timeout} seconds for running jobs to finish...`);
    if (!(await waitForProcessExit(pid, timeout))) {
      console.log(`Timeout reached. Force killing process ${pid}...`);
      await forceKill(pid);
    }
  }

  await removePidFile(commandDir);
  console.log("Scheduler stopped.");
}
