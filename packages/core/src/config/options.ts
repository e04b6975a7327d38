/**
 * Resolve scheduler options from CLI overrides, config file and environment
 *
 * Precedence: CLI overrides, then the config file, then the environment
 * (command directory only), then built-in defaults.
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";
import type { LogLevel } from "../logging/index.js";
import {
  DEFAULT_JOB_TIMEOUT,
  DEFAULT_MAX_WORKERS,
  DEFAULT_POLL_WAIT,
} from "../scheduler/index.js";
import { DEFAULT_SYNC_COMMAND } from "../sync/index.js";
import type { OfflineSyncConfig } from "./schema.js";

/**
 * Environment variable naming the command directory
 */
export const COMMAND_DIR_ENV = "OFFLINE_SYNC_COMMAND_DIR";

/**
 * Command directory name under the home directory when nothing else is set
 */
export const DEFAULT_COMMAND_DIR_NAME = ".offline_sync_command_dir";

/**
 * Values given on the command line; undefined means "not given"
 */
export interface SchedulerOverrides {
  commandDir?: string;
  pollWait?: number;
  timeout?: number;
  maxWorkers?: number;
  syncOptions?: readonly string[];
  dryRun?: boolean;
  logLevel?: LogLevel;
}

/**
 * Fully resolved settings for a scheduler run
 */
export interface ResolvedSchedulerOptions {
  commandDir: string;
  pollWait: number;
  timeout: number;
  maxWorkers: number;
  syncOptions: string[];
  syncCommand: string[];
  dryRun: boolean;
  logLevel: LogLevel;
}

export interface ResolveOptionsContext {
  /** Default: process.env */
  env?: Record<string, string | undefined>;
  /** Default: os.homedir() */
  homeDir?: string;
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(path: string, homeDir: string = homedir()): string {
  if (path === "~") {
    return homeDir;
  }
  if (path.startsWith("~/")) {
    return join(homeDir, path.slice(2));
  }
  return path;
}

/**
 * The command directory used when neither CLI nor config file name one
 */
export function defaultCommandDir(context: ResolveOptionsContext = {}): string {
  const env = context.env ?? process.env;
  const homeDir = context.homeDir ?? homedir();
  const fromEnv = env[COMMAND_DIR_ENV];
  if (fromEnv) {
    return resolve(expandHome(fromEnv, homeDir));
  }
  return join(homeDir, DEFAULT_COMMAND_DIR_NAME);
}

/**
 * Merge CLI overrides, config file values, environment and defaults
 *
 * @example
 * ```typescript
 * const options = resolveSchedulerOptions(loaded?.config ?? null, { maxWorkers: 4 });
 * const scheduler = new SyncScheduler({ ...options, logger });
 * ```
 */
export function resolveSchedulerOptions(
  config: OfflineSyncConfig | null,
  overrides: SchedulerOverrides = {},
  context: ResolveOptionsContext = {}
): ResolvedSchedulerOptions {
  const homeDir = context.homeDir ?? homedir();
  const file = config ?? {};

  const commandDir = overrides.commandDir ?? file.command_dir;

  return {
    commandDir:
      commandDir !== undefined
        ? resolve(expandHome(commandDir, homeDir))
        : defaultCommandDir({ ...context, homeDir }),
    pollWait: overrides.pollWait ?? file.wait ?? DEFAULT_POLL_WAIT,
    timeout: overrides.timeout ?? file.timeout ?? DEFAULT_JOB_TIMEOUT,
    maxWorkers: overrides.maxWorkers ?? file.max_workers ?? DEFAULT_MAX_WORKERS,
    syncOptions: [...(overrides.syncOptions ?? file.sync_options ?? [])],
    syncCommand: [...(file.sync_command ?? DEFAULT_SYNC_COMMAND)],
    dryRun: overrides.dryRun ?? file.dry_run ?? false,
    logLevel: overrides.logLevel ?? file.log_level ?? "info",
  };
}
