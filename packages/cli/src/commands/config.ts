/**
 * offline-sync config - Configuration inspection commands
 *
 * Commands:
 * - offline-sync config show          Show resolved settings
 * - offline-sync config show --json   JSON output
 */

import type { ResolvedSchedulerOptions } from "@offline-sync/core";
import { exitWithError, resolveSettings } from "../settings.js";

export interface ConfigShowOptions {
  config?: string;
  commandDir?: string;
  json?: boolean;
}

function formatTimeout(timeout: number): string {
  return timeout > 0 ? `${timeout}s` : "none";
}

function formatSettings(configPath: string | null, options: ResolvedSchedulerOptions): string {
  const lines: string[] = [];

  lines.push("");
  lines.push("Configuration");
  lines.push("=============");
  lines.push(`Config file: ${configPath ?? "(none)"}`);
  lines.push("");
  lines.push(`Command directory: ${options.commandDir}`);
  lines.push(`Poll wait: ${options.pollWait}s`);
  lines.push(`Job timeout: ${formatTimeout(options.timeout)}`);
  lines.push(`Max workers: ${options.maxWorkers}`);
  lines.push(`Sync command: ${options.syncCommand.join(" ")}`);
  lines.push(
    `Sync options: ${options.syncOptions.length > 0 ? options.syncOptions.join(" ") : "(none)"}`
  );
  lines.push(`Dry run: ${options.dryRun ? "yes" : "no"}`);
  lines.push(`Log level: ${options.logLevel}`);
  lines.push("");

  return lines.join("\n");
}

/**
 * Show the settings a `start` with the same flags would use
 */
export async function configShowCommand(options: ConfigShowOptions): Promise<void> {
  let configPath: string | null;
  let resolved: ResolvedSchedulerOptions;

  try {
    ({ configPath, options: resolved } = await resolveSettings(options.config, {
      commandDir: options.commandDir,
    }));
  } catch (error) {
    exitWithError(error);
  }

  if (options.json) {
    console.log(JSON.stringify({ configPath, ...resolved }, null, 2));
    return;
  }

  console.log(formatSettings(configPath, resolved));
}
