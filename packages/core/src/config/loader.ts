/**
 * Configuration loader for offline-sync
 *
 * - Auto-discovers offline-sync.yaml by walking up the directory tree
 * - Loads a .env file beside it for environment variables
 * - Interpolates environment variables
 * - Validates the result
 */

import { access, readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { parse as parseDotenv } from "dotenv";
import { isErrnoException } from "../errors.js";
import { ConfigError, ConfigNotFoundError, FileReadError } from "./errors.js";
import { parseConfig } from "./parser.js";
import type { OfflineSyncConfig } from "./schema.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Config file names to search for, in order of preference
 */
export const CONFIG_FILE_NAMES = ["offline-sync.yaml", "offline-sync.yml"] as const;

// =============================================================================
// Types
// =============================================================================

/**
 * A loaded configuration file
 */
export interface ResolvedConfig {
  /** The parsed and validated configuration */
  config: OfflineSyncConfig;

  /** The absolute path to the configuration file */
  configPath: string;

  /** The directory containing the configuration file */
  configDir: string;
}

/**
 * Options for the loadConfig function
 */
export interface LoadConfigOptions {
  /**
   * Environment variables for interpolation
   * Default: process.env
   */
  env?: Record<string, string | undefined>;

  /**
   * Whether to interpolate environment variables
   * Default: true
   */
  interpolate?: boolean;

  /**
   * .env file to read before interpolating.
   * - `true` (default): read .env from the config file's directory if it exists
   * - `false`: read no .env file
   * - `string`: explicit path to a .env file
   *
   * Variables already set in `env` take precedence over the file.
   */
  envFile?: boolean | string;
}

// =============================================================================
// File Discovery
// =============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Walk up from `startDir`, recording every candidate path checked
 */
async function searchConfigFile(
  startDir: string
): Promise<{ path: string | null; searchedPaths: string[] }> {
  const searchedPaths: string[] = [];
  let currentDir = resolve(startDir);

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = join(currentDir, fileName);
      searchedPaths.push(configPath);

      if (await fileExists(configPath)) {
        return { path: configPath, searchedPaths };
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return { path: null, searchedPaths };
    }
    currentDir = parentDir;
  }
}

/**
 * Find a configuration file by walking up the directory tree
 *
 * @param startDir - The directory to start searching from
 * @returns The absolute path to the config file, or null if not found
 */
export async function findConfigFile(
  startDir: string
): Promise<{ path: string; searchedPaths: string[] } | null> {
  const { path, searchedPaths } = await searchConfigFile(startDir);
  return path === null ? null : { path, searchedPaths };
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Merge variables from a .env file without overriding existing ones
 */
async function mergeEnvFile(
  envFilePath: string,
  env: Record<string, string | undefined>
): Promise<Record<string, string | undefined>> {
  let content: string;
  try {
    content = await readFile(envFilePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return env;
    }
    throw new FileReadError(envFilePath, error instanceof Error ? error : undefined);
  }

  const merged = { ...env };
  for (const [key, value] of Object.entries(parseDotenv(content))) {
    if (merged[key] === undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Resolve `command_dir` relative to the config file's directory
 */
function resolveCommandDir(config: OfflineSyncConfig, configDir: string): OfflineSyncConfig {
  const commandDir = config.command_dir;
  if (commandDir === undefined || commandDir.startsWith("~") || commandDir.startsWith("/")) {
    return config;
  }
  return { ...config, command_dir: resolve(configDir, commandDir) };
}

/**
 * Load configuration from a file path or by auto-discovery
 *
 * @param configPath - Path to offline-sync.yaml, or a directory to search
 *                     from. Defaults to the current working directory.
 * @throws {ConfigNotFoundError} If no config file is found
 * @throws {FileReadError} If the config file cannot be read
 * @throws {YamlSyntaxError} If YAML syntax is invalid
 * @throws {SchemaValidationError} If the configuration fails validation
 *
 * @example
 * ```typescript
 * const { config, configPath } = await loadConfig();
 * const resolved = await loadConfig("./project/offline-sync.yaml");
 * ```
 */
export async function loadConfig(
  configPath?: string,
  options: LoadConfigOptions = {}
): Promise<ResolvedConfig> {
  const { interpolate = true, envFile = true } = options;
  let env: Record<string, string | undefined> = options.env ?? { ...process.env };

  let resolvedConfigPath: string;
  if (configPath && (configPath.endsWith(".yaml") || configPath.endsWith(".yml"))) {
    resolvedConfigPath = resolve(configPath);
  } else {
    const startDir = configPath ?? process.cwd();
    const found = await searchConfigFile(startDir);
    if (found.path === null) {
      throw new ConfigNotFoundError(startDir, found.searchedPaths);
    }
    resolvedConfigPath = found.path;
  }

  const configDir = dirname(resolvedConfigPath);

  if (envFile !== false) {
    const envFilePath = typeof envFile === "string" ? resolve(envFile) : join(configDir, ".env");
    env = await mergeEnvFile(envFilePath, env);
  }

  let content: string;
  try {
    content = await readFile(resolvedConfigPath, "utf-8");
  } catch (error) {
    throw new FileReadError(resolvedConfigPath, error instanceof Error ? error : undefined);
  }

  const config = parseConfig(content, resolvedConfigPath, { env, interpolate });

  return {
    config: resolveCommandDir(config, configDir),
    configPath: resolvedConfigPath,
    configDir,
  };
}

/**
 * Load configuration if a file can be found, otherwise return null
 *
 * Only a missing file is tolerated; an unreadable or invalid one still throws.
 */
export async function loadOptionalConfig(
  startDir: string = process.cwd(),
  options: LoadConfigOptions = {}
): Promise<ResolvedConfig | null> {
  try {
    return await loadConfig(startDir, options);
  } catch (error) {
    if (error instanceof ConfigNotFoundError) {
      return null;
    }
    throw error;
  }
}

/**
 * Load configuration without throwing on errors
 */
export async function safeLoadConfig(
  configPath?: string,
  options: LoadConfigOptions = {}
): Promise<{ success: true; data: ResolvedConfig } | { success: false; error: ConfigError }> {
  try {
    const config = await loadConfig(configPath, options);
    return { success: true, data: config };
  } catch (error) {
    if (error instanceof ConfigError) {
      return { success: false, error };
    }
    return {
      success: false,
      error: new ConfigError(error instanceof Error ? error.message : String(error)),
    };
  }
}
