/**
 * Command file primitives
 *
 * A command file is a `*.command` file whose entire content is the path of one
 * directory to sync. Producers write them; the scheduler lists, reads and then
 * deletes them. Any file may disappear between listing, reading and deleting,
 * since producers and other consumers share the directory.
 */

import { createHash } from "node:crypto";
import { readdir, readFile, stat, unlink } from "node:fs/promises";
import { join, resolve } from "node:path";
import { errorMessage, isErrnoException, toError } from "../errors.js";
import { CommandFileError } from "./errors.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Extension every command file carries
 */
export const COMMAND_FILE_EXTENSION = ".command";

/**
 * Number of hex characters of the target hash used in command file names
 */
const COMMAND_FILE_HASH_LENGTH = 16;

// =============================================================================
// Naming
// =============================================================================

/**
 * Normalize a target path into its identity (absolute, no trailing separator)
 */
export function normalizeTarget(target: string): string {
  return resolve(target);
}

/**
 * Command file name for a target
 *
 * Derived from a hash of the normalized target, so repeated triggers for the
 * same directory overwrite one file instead of piling up.
 */
export function commandFileName(target: string): string {
  const digest = createHash("sha256")
    .update(normalizeTarget(target))
    .digest("hex")
    .slice(0, COMMAND_FILE_HASH_LENGTH);
  return `${digest}${COMMAND_FILE_EXTENSION}`;
}

// =============================================================================
// Scanning
// =============================================================================

/**
 * List command files in a directory
 *
 * @returns Absolute paths of `*.command` regular files, sorted by name.
 *          Empty when the directory does not exist.
 */
export async function scanCommandDir(commandDir: string): Promise<string[]> {
  let entries;
  try {
    entries = await readdir(commandDir, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(COMMAND_FILE_EXTENSION))
    .map((entry) => join(commandDir, entry.name))
    .sort();
}

/**
 * Read the target named by a command file
 *
 * Trailing line terminators are dropped; nothing else is parsed.
 *
 * @throws {CommandFileError} If the file cannot be read or is empty
 */
export async function readCommandTarget(commandFile: string): Promise<string> {
  let content: string;
  try {
    content = await readFile(commandFile, "utf-8");
  } catch (error) {
    throw new CommandFileError(
      `Failed to read command file ${commandFile}: ${errorMessage(error)}`,
      commandFile,
      { cause: toError(error) }
    );
  }

  const target = content.replace(/(\r?\n)+$/, "");
  if (target.length === 0) {
    throw new CommandFileError(`Command file ${commandFile} is empty`, commandFile);
  }

  return normalizeTarget(target);
}

/**
 * Check whether a path names an existing directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * A command file that could not be deleted
 */
export interface CommandFileRemovalFailure {
  commandFile: string;
  error: Error;
}

/**
 * Result of removeCommandFiles
 */
export interface CommandFileRemoval {
  /** Number of files this call actually removed */
  removed: number;
  /** Files that still exist because unlink failed */
  failed: CommandFileRemovalFailure[];
}

/**
 * Delete command files, ignoring any that are already gone
 *
 * A file that cannot be deleted is reported in `failed` and does not stop
 * the rest from being removed.
 */
export async function removeCommandFiles(
  commandFiles: Iterable<string>
): Promise<CommandFileRemoval> {
  let removed = 0;
  const failed: CommandFileRemovalFailure[] = [];

  for (const commandFile of commandFiles) {
    try {
      await unlink(commandFile);
      removed++;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        continue;
      }
      failed.push({ commandFile, error: toError(error) });
    }
  }

  return { removed, failed };
}
