#!/usr/bin/env node

/**
 * offline-sync - Sync offline experiment runs from compute nodes
 *
 * Commands:
 * - offline-sync start [-- sync options]   Watch the command directory and run sync jobs
 * - offline-sync stop                      Stop the running scheduler
 * - offline-sync trigger <dir>             Queue a directory for syncing
 * - offline-sync status                    Show scheduler process and waiting command files
 * - offline-sync config show               Show resolved settings
 */

import { Command } from "commander";
import { VERSION } from "@offline-sync/core";
import { startCommand } from "./commands/start.js";
import { stopCommand } from "./commands/stop.js";
import { triggerCommand } from "./commands/trigger.js";
import { statusCommand } from "./commands/status.js";
import { configShowCommand } from "./commands/config.js";
import { parseInteger, parseSeconds } from "./parse.js";

interface LocationFlags {
  config?: string;
  commandDir?: string;
}

interface StartFlags extends LocationFlags {
  wait?: number;
  timeout?: number;
  maxWorkers?: number;
  dryRun?: boolean;
  once?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

interface StopFlags extends LocationFlags {
  force?: boolean;
  timeout: number;
}

interface TriggerFlags extends LocationFlags {
  quiet?: boolean;
}

interface JsonFlags extends LocationFlags {
  json?: boolean;
}

const program = new Command();

program
  .name("offline-sync")
  .description("Sync offline experiment runs from compute nodes without internet access")
  .version(VERSION);

program
  .command("start")
  .description("Watch the command directory and sync the directories it names")
  .argument("[syncOptions...]", "Options forwarded to the sync command (after --)")
  .option("-c, --config <path>", "Path to config file or directory")
  .option("-d, --command-dir <dir>", "Directory watched for command files")
  .option("-w, --wait <seconds>", "Minimum seconds between polls", parseSeconds)
  .option("-t, --timeout <seconds>", "Seconds before a sync job times out (0: none)", parseSeconds)
  .option("-n, --max-workers <count>", "Maximum concurrent sync jobs", parseInteger)
  .option("--dry-run", "Log sync commands instead of running them")
  .option("--once", "Run one cycle, wait for its jobs, then exit")
  .option("-v, --verbose", "Log debug output")
  .option("-q, --quiet", "Log warnings and errors only")
  .action(async (syncOptions: string[], options: StartFlags) => {
    await startCommand({ ...options, syncOptions });
  });

program
  .command("stop")
  .description("Stop the running scheduler")
  .option("-c, --config <path>", "Path to config file or directory")
  .option("-d, --command-dir <dir>", "Directory watched for command files")
  .option("-f, --force", "Immediate stop (SIGKILL)")
  .option("-t, --timeout <seconds>", "Wait max seconds before force kill", parseSeconds, 30)
  .action(async (options: StopFlags) => {
    await stopCommand(options);
  });

program
  .command("trigger <dir>")
  .description("Queue a directory for syncing")
  .option("-c, --config <path>", "Path to config file or directory")
  .option("-d, --command-dir <dir>", "Directory watched for command files")
  .option("-q, --quiet", "Print only the command file path")
  .action(async (dir: string, options: TriggerFlags) => {
    await triggerCommand(dir, options);
  });

program
  .command("status")
  .description("Show the scheduler process and waiting command files")
  .option("--json", "Output as JSON for scripting")
  .option("-c, --config <path>", "Path to config file or directory")
  .option("-d, --command-dir <dir>", "Directory watched for command files")
  .action(async (options: JsonFlags) => {
    await statusCommand(options);
  });

const configCmd = program.command("config").description("Configuration commands");

configCmd
  .command("show")
  .description("Show resolved settings")
  .option("--json", "Output as JSON")
  .option("-c, --config <path>", "Path to config file or directory")
  .option("-d, --command-dir <dir>", "Directory watched for command files")
  .action(async (options: JsonFlags) => {
    await configShowCommand(options);
  });

await program.parseAsync();
