/**
 * offline-sync status - Show the scheduler process and waiting command files
 *
 * Commands:
 * - offline-sync status          Human-readable status
 * - offline-sync status --json   JSON output for scripting
 */

import {
  readCommandTarget,
  scanCommandDir,
  errorMessage,
} from "@offline-sync/core";
import { isProcessRunning, readPidFile } from "../pid-file.js";
import { exitWithError, resolveSettings } from "../settings.js";

export interface StatusOptions {
  config?: string;
  commandDir?: string;
  json?: boolean;
}

/**
 * A command file waiting in the command directory
 */
export interface CommandFileStatus {
  file: string;
  target: string | null;
  error?: string;
}

/**
 * JSON output structure for status
 */
export interface StatusOutput {
  commandDir: string;
  scheduler: {
    running: boolean;
    pid: number | null;
  };
  commandFiles: CommandFileStatus[];
}

async function describeCommandFiles(commandDir: string): Promise<CommandFileStatus[]> {
  const files = await scanCommandDir(commandDir);
  const result: CommandFileStatus[] = [];

  for (const file of files) {
    try {
      result.push({ file, target: await readCommandTarget(file) });
    } catch (error) {
      result.push({ file, target: null, error: errorMessage(error) });
    }
  }

  return result;
}

function formatStatus(status: StatusOutput): string {
  const lines: string[] = [];

  lines.push("");
  lines.push("Scheduler Status");
  lines.push("================");
  lines.push(`Command directory: ${status.commandDir}`);

  const { running, pid } = status.scheduler;
  if (running) {
    lines.push(`Scheduler: running (PID ${pid})`);
  } else if (pid !== null) {
    lines.push(`Scheduler: not running (stale PID file for ${pid})`);
  } else {
    lines.push("Scheduler: not running");
  }

  lines.push("");
  lines.push(`Pending command files: ${status.commandFiles.length}`);
  for (const entry of status.commandFiles) {
    const detail = entry.target ?? `unreadable: ${entry.error ?? "unknown error"}`;
    lines.push(`  ${entry.file} -> ${detail}`);
  }
  lines.push("");

  return lines.join("\n");
}

/**
 * Show status for the configured command directory
 */
export async function statusCommand(options: StatusOptions): Promise<void> {
  let status: StatusOutput;

  try {
    const { options: resolved } = await resolveSettings(options.config, {
      commandDir: options.commandDir,
    });
    const pid = await readPidFile(resolved.commandDir);

    status = {
      commandDir: resolved.commandDir,
      scheduler: {
        running: pid !== null && isProcessRunning(pid),
        pid,
      },
      commandFiles: await describeCommandFiles(resolved.commandDir),
    };
  } catch (error) {
    exitWithError(error);
  }

  if (options.json) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  console.log(formatStatus(status));
}
