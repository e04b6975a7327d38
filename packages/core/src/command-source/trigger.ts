/**
 * SyncTrigger writes command files
 *
 * This is the producer side of the command directory: training jobs (or the
 * `offline-sync trigger` command) call it to ask for a directory to be synced,
 * and the scheduler calls it to re-signal a target whose sync timed out, so
 * the retry survives a scheduler restart.
 */

import { access, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createLogger, type SyncLogger } from "../logging/index.js";
import { commandFileName, normalizeTarget } from "./command-file.js";

/**
 * Options for SyncTrigger
 */
export interface SyncTriggerOptions {
  /** Directory the scheduler watches */
  commandDir: string;

  /** Logger for trigger operations */
  logger?: SyncLogger;
}

/**
 * Options for a single trigger call
 */
export interface TriggerOptions {
  /** Skip the stale-file warning and the debug line for the written file */
  quiet?: boolean;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes one command file per target into the command directory
 *
 * @example
 * ```typescript
 * const trigger = new SyncTrigger({ commandDir: "/tmp/commands" });
 * await trigger.trigger("./runs/offline-run-42");
 * ```
 */
export class SyncTrigger {
  readonly commandDir: string;
  private readonly logger: SyncLogger;

  constructor(options: SyncTriggerOptions) {
    this.commandDir = options.commandDir;
    this.logger = options.logger ?? createLogger({ prefix: "[trigger]" });
  }

  /**
   * Path of the command file that trigger() would write for a target
   */
  commandFileFor(target: string): string {
    return join(this.commandDir, commandFileName(target));
  }

  /**
   * Request a sync of `target`
   *
   * An existing command file for the same target is overwritten; finding one
   * means the scheduler has not consumed the previous request yet.
   *
   * @returns Absolute path of the command file written
   */
  async trigger(target: string, options: TriggerOptions = {}): Promise<string> {
    const resolvedTarget = normalizeTarget(target);
    const commandFile = this.commandFileFor(resolvedTarget);

    await mkdir(this.commandDir, { recursive: true });

    if (!options.quiet && (await fileExists(commandFile))) {
      this.logger.warn(
        `Syncing not active or too slow: command file ${commandFile} still exists`
      );
    }

    await writeFile(commandFile, resolvedTarget, "utf-8");

    if (!options.quiet) {
      this.logger.debug(`Wrote command file ${commandFile}`);
    }

    return commandFile;
  }
}
