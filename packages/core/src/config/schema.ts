/**
 * Zod schema for offline-sync.yaml
 */

import { z } from "zod";
import { LOG_LEVELS } from "../logging/index.js";

/**
 * Configuration file schema
 *
 * Every key is optional; anything left out falls back to the CLI flag,
 * the environment or the built-in default.
 *
 * @example
 * ```yaml
 * command_dir: ~/.offline_sync_command_dir
 * wait: 5
 * timeout: 300
 * max_workers: 2
 * sync_options:
 *   - --include-offline
 * sync_command: [wandb, sync]
 * dry_run: false
 * log_level: info
 * ```
 */
export const OfflineSyncConfigSchema = z
  .object({
    /** Directory watched for command files */
    command_dir: z.string().min(1).optional(),
    /** Minimum seconds between cycle starts */
    wait: z.number().nonnegative().optional(),
    /** Seconds before a sync job times out; <= 0 disables the timeout */
    timeout: z.number().optional(),
    /** Maximum concurrent sync jobs */
    max_workers: z.number().int().positive().optional(),
    /** Extra arguments passed to every sync invocation */
    sync_options: z.array(z.string()).optional(),
    /** Executable and leading arguments of the sync command */
    sync_command: z.array(z.string().min(1)).min(1).optional(),
    /** Log invocations instead of running them */
    dry_run: z.boolean().optional(),
    log_level: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

export type OfflineSyncConfig = z.infer<typeof OfflineSyncConfigSchema>;
