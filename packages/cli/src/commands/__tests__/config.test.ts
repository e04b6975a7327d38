import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { tmpdir } from "node:os";
import { configShowCommand } from "../config.js";

// Helper to create a temp directory
function createTempDir(): string {
  const baseDir = path.join(
    tmpdir(),
    `offline-sync-cli-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
  );
  fs.mkdirSync(baseDir, { recursive: true });
  return fs.realpathSync(baseDir);
}

// Helper to clean up temp directory
function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

describe("configShowCommand", () => {
  let tempDir: string;
  let configPath: string;
  let consoleLogs: string[];
  let consoleErrors: string[];
  let originalConsoleLog: typeof console.log;
  let originalConsoleError: typeof console.error;
  let originalProcessExit: typeof process.exit;
  let exitCode: number | undefined;

  function writeConfig(content: string): void {
    fs.writeFileSync(configPath, content, "utf-8");
  }

  beforeEach(() => {
    tempDir = createTempDir();
    configPath = path.join(tempDir, "offline-sync.yaml");

    // Capture console output
    consoleLogs = [];
    consoleErrors = [];
    originalConsoleLog = console.log;
    originalConsoleError = console.error;
    console.log = (...args: unknown[]) => consoleLogs.push(args.join(" "));
    console.error = (...args: unknown[]) => consoleErrors.push(args.join(" "));

    // Mock process.exit
    exitCode = undefined;
    originalProcessExit = process.exit;
    process.exit = ((code?: number) => {
      exitCode = code ?? 0;
      throw new Error(`process.exit(${code})`);
    }) as never;
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
    console.log = originalConsoleLog;
    console.error = originalConsoleError;
    process.exit = originalProcessExit;
  });

  describe("JSON output", () => {
    it("prints resolved settings from the config file", async () => {
      writeConfig(
        [
          "command_dir: ./commands",
          "wait: 2",
          "timeout: 0",
          "max_workers: 3",
          "sync_options: [--include-offline]",
          "dry_run: true",
          "log_level: debug",
        ].join("\n")
      );

      await configShowCommand({ config: tempDir, json: true });

      expect(JSON.parse(consoleLogs.join("\n"))).toEqual({
        configPath,
        commandDir: path.join(tempDir, "commands"),
        pollWait: 2,
        timeout: 0,
        maxWorkers: 3,
        syncOptions: ["--include-offline"],
        syncCommand: ["wandb", "sync"],
        dryRun: true,
        logLevel: "debug",
      });
    });

    it("lets --command-dir win over the config file", async () => {
      writeConfig("command_dir: ./commands\n");
      const override = path.join(tempDir, "elsewhere");

      await configShowCommand({ config: tempDir, commandDir: override, json: true });

      expect(JSON.parse(consoleLogs.join("\n")).commandDir).toBe(override);
    });
  });

  describe("text output", () => {
    it("shows each setting", async () => {
      writeConfig("command_dir: /srv/commands\ntimeout: 0\n");

      await configShowCommand({ config: configPath });

      expect(consoleLogs.join("\n").split("\n")).toEqual([
        "",
        "Configuration",
        "=============",
        `Config file: ${configPath}`,
        "",
        "Command directory: /srv/commands",
        "Poll wait: 1s",
        "Job timeout: none",
        "Max workers: 1",
        "Sync command: wandb sync",
        "Sync options: (none)",
        "Dry run: no",
        "Log level: info",
        "",
      ]);
    });
  });

  describe("errors", () => {
    it("reports schema errors with their paths", async () => {
      writeConfig("max_workers: 0\nbogus: 1\n");

      await expect(configShowCommand({ config: tempDir })).rejects.toThrow("process.exit(1)");

      expect(exitCode).toBe(1);
      expect(consoleErrors[0]).toBe("Error: Invalid configuration.");
      expect(consoleErrors.some((e) => e.startsWith("  - max_workers:"))).toBe(true);
    });

    it("reports a missing explicit config file", async () => {
      await expect(
        configShowCommand({ config: path.join(tempDir, "missing.yml") })
      ).rejects.toThrow("process.exit(1)");

      expect(consoleErrors[0]).toMatch(/^Error: Failed to read file '/);
    });
  });
});
