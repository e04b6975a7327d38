/**
 * Sync module: the job runner invoked once per target
 */

export {
  buildSyncCommand,
  DEFAULT_SYNC_COMMAND,
  isTimeoutError,
  WandbSyncRunner,
  type WandbSyncRunnerOptions,
} from "./sync-runner.js";

export type {
  JobOutcome,
  ProcessSpawner,
  SpawnOptions,
  SyncCrash,
  SyncFailure,
  SyncOutcome,
  SyncRunner,
  SyncSuccess,
  SyncTimeout,
} from "./types.js";
