/**
 * Resolve settings for a command from --config, the flags and the environment
 */

import {
  loadConfig,
  loadOptionalConfig,
  resolveSchedulerOptions,
  ConfigNotFoundError,
  SchemaValidationError,
  errorMessage,
  type ResolvedSchedulerOptions,
  type SchedulerOverrides,
} from "@offline-sync/core";

export interface ResolvedSettings {
  options: ResolvedSchedulerOptions;
  /** Config file the settings came from, or null when none was found */
  configPath: string | null;
}

/**
 * Load the config file (given or discovered) and merge in the overrides
 *
 * @param config - Path to a config file or a directory to search from
 */
export async function resolveSettings(
  config: string | undefined,
  overrides: SchedulerOverrides = {}
): Promise<ResolvedSettings> {
  const loaded = config ? await loadConfig(config) : await loadOptionalConfig();
  return {
    options: resolveSchedulerOptions(loaded?.config ?? null, overrides),
    configPath: loaded?.configPath ?? null,
  };
}

/**
 * Print an error the way every command reports failures, then exit 1
 */
export function exitWithError(error: unknown): never {
  if (error instanceof ConfigNotFoundError) {
    console.error("Error: No configuration file found.");
    console.error(`Searched from: ${error.startDirectory}`);
  } else if (error instanceof SchemaValidationError) {
    console.error("Error: Invalid configuration.");
    for (const issue of error.issues) {
      console.error(`  - ${issue.path}: ${issue.message}`);
    }
  } else {
    console.error(`Error: ${errorMessage(error)}`);
  }
  process.exit(1);
}
