import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { tmpdir } from "node:os";
import { spawn, type ChildProcess } from "node:child_process";
import { stopCommand } from "../stop.js";

// Helper to create a temp directory
function createTempDir(): string {
  const baseDir = path.join(
    tmpdir(),
    `offline-sync-cli-stop-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
  );
  fs.mkdirSync(baseDir, { recursive: true });
  return fs.realpathSync(baseDir);
}

// Helper to clean up temp directory
function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

// Helper to create the command directory with a PID file
function createPidFile(commandDir: string, content: string): void {
  fs.mkdirSync(commandDir, { recursive: true });
  fs.writeFileSync(path.join(commandDir, "offline-sync.pid"), content);
}

// Spawn a long-running node process for testing
function spawnTestProcess(script = "setInterval(() => {}, 1000)"): ChildProcess {
  const child = spawn(process.execPath, ["-e", script], {
    detached: true,
    stdio: "ignore",
  });
  child.unref();
  return child;
}

describe("stopCommand", () => {
  let tempDir: string;
  let commandDir: string;
  let consoleLogs: string[];
  let consoleErrors: string[];
  let originalConsoleLog: typeof console.log;
  let originalConsoleError: typeof console.error;
  let originalProcessExit: typeof process.exit;
  let exitCode: number | undefined;
  let testProcesses: ChildProcess[];

  beforeEach(() => {
    tempDir = createTempDir();
    commandDir = path.join(tempDir, "commands");
    // An empty config file keeps discovery inside the temp directory
    fs.writeFileSync(path.join(tempDir, "offline-sync.yaml"), "");
    testProcesses = [];

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

    for (const proc of testProcesses) {
      try {
        if (proc.pid) {
          process.kill(proc.pid, "SIGKILL");
        }
      } catch {
        // Process already gone
      }
    }
  });

  function spawnTracked(script?: string): number {
    const proc = spawnTestProcess(script);
    testProcesses.push(proc);
    if (!proc.pid) {
      throw new Error("Failed to spawn test process");
    }
    return proc.pid;
  }

  describe("no PID file", () => {
    it("errors when no PID file exists", async () => {
      await expect(stopCommand({ config: tempDir, commandDir })).rejects.toThrow(
        "process.exit(1)"
      );
      expect(exitCode).toBe(1);
      expect(consoleErrors).toContain("Error: No PID file found. Is the scheduler running?");
    });

    it("shows path to expected PID file", async () => {
      await expect(stopCommand({ config: tempDir, commandDir })).rejects.toThrow(
        "process.exit(1)"
      );
      expect(consoleErrors).toContain(`Checked: ${path.join(commandDir, "offline-sync.pid")}`);
    });

    it("uses the command directory from the config file", async () => {
      fs.writeFileSync(path.join(tempDir, "offline-sync.yaml"), "command_dir: ./from-config\n");

      await expect(stopCommand({ config: tempDir })).rejects.toThrow("process.exit(1)");
      expect(consoleErrors).toContain(
        `Checked: ${path.join(tempDir, "from-config", "offline-sync.pid")}`
      );
    });

    it("errors when PID file contains invalid content", async () => {
      createPidFile(commandDir, "not-a-number");

      await expect(stopCommand({ config: tempDir, commandDir })).rejects.toThrow(
        "process.exit(1)"
      );
      expect(consoleErrors.some((e) => e.includes("No PID file found"))).toBe(true);
    });
  });

  describe("stale PID file", () => {
    it("errors and cleans up when process is not running", async () => {
      // A PID that cannot exist
      createPidFile(commandDir, "999999999");

      await expect(stopCommand({ config: tempDir, commandDir })).rejects.toThrow(
        "process.exit(1)"
      );
      expect(exitCode).toBe(1);
      expect(consoleErrors).toContain("Error: Scheduler process (PID 999999999) is not running.");
      expect(consoleLogs).toContain("Cleaning up stale PID file...");
      expect(fs.existsSync(path.join(commandDir, "offline-sync.pid"))).toBe(false);
    });
  });

  describe("graceful stop", () => {
    it("sends SIGTERM and waits for process exit", async () => {
      const pid = spawnTracked();
      createPidFile(commandDir, pid.toString());

      await stopCommand({ config: tempDir, commandDir, timeout: 5 });

      expect(consoleLogs).toContain(`Stopping scheduler (PID ${pid})...`);
      expect(consoleLogs).toContain("Waiting up to 5 seconds for running jobs to finish...");
      expect(consoleLogs).toContain("Scheduler stopped.");
      expect(consoleLogs.some((l) => l.includes("Timeout reached"))).toBe(false);
      expect(fs.existsSync(path.join(commandDir, "offline-sync.pid"))).toBe(false);
    });

    it("uses default timeout of 30 seconds", async () => {
      const pid = spawnTracked();
      createPidFile(commandDir, pid.toString());

      await stopCommand({ config: tempDir, commandDir });

      expect(consoleLogs).toContain("Waiting up to 30 seconds for running jobs to finish...");
      expect(consoleLogs).toContain("Scheduler stopped.");
    });
  });

  describe("force stop", () => {
    it("sends SIGKILL immediately with --force", async () => {
      const pid = spawnTracked();
      createPidFile(commandDir, pid.toString());

      await stopCommand({ config: tempDir, commandDir, force: true });

      expect(consoleLogs).toContain(`Force stopping scheduler (PID ${pid})...`);
      expect(consoleLogs).toContain("Scheduler stopped.");
      expect(fs.existsSync(path.join(commandDir, "offline-sync.pid"))).toBe(false);
    });
  });

  describe("timeout behavior", () => {
    it("force kills after timeout when process ignores SIGTERM", async () => {
      const pid = spawnTracked("process.on('SIGTERM', () => {}); setInterval(() => {}, 1000)");
      // Give the process time to install its handler
      await new Promise((resolve) => setTimeout(resolve, 300));
      createPidFile(commandDir, pid.toString());

      await stopCommand({ config: tempDir, commandDir, timeout: 1 });

      expect(consoleLogs).toContain(`Timeout reached. Force killing process ${pid}...`);
      expect(consoleLogs).toContain("Scheduler stopped.");
      expect(fs.existsSync(path.join(commandDir, "offline-sync.pid"))).toBe(false);
    });
  });
});
