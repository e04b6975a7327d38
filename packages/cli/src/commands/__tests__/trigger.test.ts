import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { tmpdir } from "node:os";
import { commandFileName } from "@offline-sync/core";
import { triggerCommand } from "../trigger.js";

// Helper to create a temp directory
function createTempDir(): string {
  const baseDir = path.join(
    tmpdir(),
    `offline-sync-cli-trigger-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
  );
  fs.mkdirSync(baseDir, { recursive: true });
  return fs.realpathSync(baseDir);
}

// Helper to clean up temp directory
function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

describe("triggerCommand", () => {
  let tempDir: string;
  let commandDir: string;
  let target: string;
  let consoleLogs: string[];
  let consoleErrors: string[];
  let originalConsoleLog: typeof console.log;
  let originalConsoleError: typeof console.error;
  let originalProcessExit: typeof process.exit;
  let exitCode: number | undefined;

  beforeEach(() => {
    tempDir = createTempDir();
    commandDir = path.join(tempDir, "commands");
    target = path.join(tempDir, "runs", "offline-run-1");
    fs.mkdirSync(target, { recursive: true });
    fs.writeFileSync(path.join(tempDir, "offline-sync.yaml"), "");

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

  it("writes a command file naming the directory", async () => {
    await triggerCommand(target, { config: tempDir, commandDir });

    const commandFile = path.join(commandDir, commandFileName(target));
    expect(fs.readFileSync(commandFile, "utf-8")).toBe(target);
    expect(consoleLogs).toEqual([
      `Queued ${target} for syncing`,
      `Command file: ${commandFile}`,
    ]);
  });

  it("prints only the command file path with --quiet", async () => {
    await triggerCommand(target, { config: tempDir, commandDir, quiet: true });

    expect(consoleLogs).toEqual([path.join(commandDir, commandFileName(target))]);
  });

  it("resolves a trailing slash to the same command file", async () => {
    await triggerCommand(`${target}/`, { config: tempDir, commandDir, quiet: true });

    expect(fs.readdirSync(commandDir)).toEqual([commandFileName(target)]);
  });

  it("notes a command file that was not picked up yet", async () => {
    await triggerCommand(target, { config: tempDir, commandDir });
    consoleLogs.length = 0;

    await triggerCommand(target, { config: tempDir, commandDir });

    expect(consoleLogs).toContain(
      "Note: the previous command file for this directory had not been picked up yet."
    );
    expect(fs.readdirSync(commandDir)).toHaveLength(1);
  });

  it("uses the command directory from the config file", async () => {
    fs.writeFileSync(path.join(tempDir, "offline-sync.yaml"), "command_dir: ./queue\n");

    await triggerCommand(target, { config: tempDir, quiet: true });

    expect(consoleLogs).toEqual([path.join(tempDir, "queue", commandFileName(target))]);
  });

  it("errors for a directory that does not exist", async () => {
    const missing = path.join(tempDir, "runs", "missing");

    await expect(triggerCommand(missing, { config: tempDir, commandDir })).rejects.toThrow(
      "process.exit(1)"
    );

    expect(exitCode).toBe(1);
    expect(consoleErrors).toEqual([`Error: ${missing} is not a directory.`]);
    expect(fs.existsSync(commandDir)).toBe(false);
  });

  it("errors for a regular file", async () => {
    const file = path.join(tempDir, "runs", "notes.txt");
    fs.writeFileSync(file, "not a run");

    await expect(triggerCommand(file, { config: tempDir, commandDir })).rejects.toThrow(
      "process.exit(1)"
    );

    expect(consoleErrors).toEqual([`Error: ${file} is not a directory.`]);
  });
});
