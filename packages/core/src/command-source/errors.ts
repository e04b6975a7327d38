/**
 * Error classes for command-source operations
 */

import { OfflineSyncError, OfflineSyncErrorCode } from "../errors.js";

/**
 * Error raised when a command file cannot be read or names no target
 *
 * The scheduler logs these and moves on; they never stop the loop.
 */
export class CommandFileError extends OfflineSyncError {
  /** Absolute path of the offending command file */
  public readonly commandFile: string;

  constructor(message: string, commandFile: string, options?: { cause?: Error }) {
    super(message, {
      cause: options?.cause,
      code: OfflineSyncErrorCode.COMMAND_FILE_ERROR,
    });
    this.name = "CommandFileError";
    this.commandFile = commandFile;
  }
}
