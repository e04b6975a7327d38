/**
 * PID file helpers shared by start, stop and status
 *
 * The running scheduler records its PID in the command directory it watches,
 * so every command pointed at the same directory finds the same process.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { isErrnoException } from "@offline-sync/core";

export const PID_FILE_NAME = "offline-sync.pid";

export function pidFilePath(commandDir: string): string {
  return path.join(commandDir, PID_FILE_NAME);
}

/**
 * Write the current process PID to the command directory
 */
export async function writePidFile(commandDir: string): Promise<string> {
  const pidFile = pidFilePath(commandDir);
  await fs.promises.mkdir(commandDir, { recursive: true });
  await fs.promises.writeFile(pidFile, process.pid.toString(), "utf-8");
  return pidFile;
}

/**
 * Read the PID from the PID file, or null when there is none
 */
export async function readPidFile(commandDir: string): Promise<number | null> {
  try {
    const content = await fs.promises.readFile(pidFilePath(commandDir), "utf-8");
    const pid = parseInt(content.trim(), 10);
    if (isNaN(pid)) {
      return null;
    }
    return pid;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Remove the PID file; a missing file is fine
 */
export async function removePidFile(commandDir: string): Promise<void> {
  try {
    await fs.promises.unlink(pidFilePath(commandDir));
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * Check if a process is running
 */
export function isProcessRunning(pid: number): boolean {
  try {
    // Signal 0 checks for existence without signaling
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
