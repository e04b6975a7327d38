/**
 * Command source: the directory of `*.command` files that drives scheduling
 */

export {
  COMMAND_FILE_EXTENSION,
  commandFileName,
  type CommandFileRemoval,
  type CommandFileRemovalFailure,
  isDirectory,
  normalizeTarget,
  readCommandTarget,
  removeCommandFiles,
  scanCommandDir,
} from "./command-file.js";

export { CommandFileError } from "./errors.js";

export {
  SyncTrigger,
  type SyncTriggerOptions,
  type TriggerOptions,
} from "./trigger.js";
