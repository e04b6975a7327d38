/**
 * offline-sync trigger - Ask the scheduler to sync a directory
 *
 * Commands:
 * - offline-sync trigger ./wandb/offline-run-1
 * - offline-sync trigger ./run --command-dir /shared/commands
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { SyncTrigger, createSilentLogger, isDirectory } from "@offline-sync/core";
import { exitWithError, resolveSettings } from "../settings.js";

export interface TriggerOptions {
  config?: string;
  commandDir?: string;
  quiet?: boolean;
}

/**
 * Write a command file for `dir`
 */
export async function triggerCommand(dir: string, options: TriggerOptions): Promise<void> {
  const target = path.resolve(dir);

  let exists: boolean;
  try {
    exists = await isDirectory(target);
  } catch (error) {
    exitWithError(error);
  }

  if (!exists) {
    console.error(`Error: ${target} is not a directory.`);
    process.exit(1);
  }

  let commandFile: string;
  let alreadyQueued: boolean;
  try {
    const { options: resolved } = await resolveSettings(options.config, {
      commandDir: options.commandDir,
    });

    const trigger = new SyncTrigger({
      commandDir: resolved.commandDir,
      logger: createSilentLogger(),
    });
    alreadyQueued = fs.existsSync(trigger.commandFileFor(target));
    commandFile = await trigger.trigger(target);
  } catch (error) {
    exitWithError(error);
  }

  if (options.quiet) {
    console.log(commandFile);
    return;
  }

  console.log(`Queued ${target} for syncing`);
  console.log(`Command file: ${commandFile}`);
  if (alreadyQueued) {
    console.log("Note: the previous command file for this directory had not been picked up yet.");
  }
}
