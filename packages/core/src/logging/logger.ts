/**
 * Console logger with level-based filtering
 *
 * Every offline-sync component takes an optional logger matching SyncLogger;
 * when none is given it falls back to createLogger() with the component's prefix.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Logger interface accepted by the scheduler, worker pool, runner and trigger
 */
export interface SyncLogger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Log levels, from most to least verbose
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Options for creating a logger
 */
export interface LoggerOptions {
  /** Prefix for log messages, e.g. "[scheduler]" */
  prefix: string;

  /**
   * Minimum level that gets written
   * Default: "info"
   */
  level?: LogLevel;
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Check whether a message at `level` passes the `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Type guard for log level strings (e.g. from CLI flags or env)
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a console-backed logger with the specified configuration
 */
export function createLogger(options: LoggerOptions): SyncLogger {
  const { prefix, level = "info" } = options;

  return {
    debug: (message: string) => {
      if (isLevelEnabled("debug", level)) {
        console.debug(`${prefix} ${message}`);
      }
    },
    info: (message: string) => {
      if (isLevelEnabled("info", level)) {
        console.info(`${prefix} ${message}`);
      }
    },
    warn: (message: string) => {
      if (isLevelEnabled("warn", level)) {
        console.warn(`${prefix} ${message}`);
      }
    },
    error: (message: string) => {
      console.error(`${prefix} ${message}`);
    },
  };
}

/**
 * Create a logger that discards everything
 */
export function createSilentLogger(): SyncLogger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
