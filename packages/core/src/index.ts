/**
 * @offline-sync/core
 *
 * Core library for offline-sync - command-file driven sync scheduling
 *
 * This package provides:
 * - Config loading (offline-sync.yaml, .env, environment)
 * - Command files (scan, read, trigger)
 * - Sync runner (external sync command via execa)
 * - Scheduler (bounded worker pool, timeout requeue)
 */

import { createRequire } from "module";
const require = createRequire(import.meta.url);
const pkg: unknown = require("../package.json");
const VERSION: string =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

export { VERSION };

// Shared errors
export * from "./errors.js";

// Logging
export * from "./logging/index.js";

// Config
export * from "./config/index.js";

// Command files
export * from "./command-source/index.js";

// Sync runner
export * from "./sync/index.js";

// Scheduler
export * from "./scheduler/index.js";
