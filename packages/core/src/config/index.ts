/**
 * Configuration module for offline-sync
 *
 * Loads and validates offline-sync.yaml and resolves scheduler options
 */

export {
  OfflineSyncConfigSchema,
  type OfflineSyncConfig,
} from "./schema.js";

export {
  ConfigError,
  ConfigNotFoundError,
  YamlSyntaxError,
  SchemaValidationError,
  FileReadError,
  UndefinedVariableError,
  type SchemaIssue,
} from "./errors.js";

export { parseConfig, safeParseConfig, type ParseConfigOptions } from "./parser.js";

export {
  interpolateString,
  interpolateValue,
  type InterpolateOptions,
} from "./interpolate.js";

export {
  loadConfig,
  loadOptionalConfig,
  safeLoadConfig,
  findConfigFile,
  CONFIG_FILE_NAMES,
  type ResolvedConfig,
  type LoadConfigOptions,
} from "./loader.js";

export {
  resolveSchedulerOptions,
  defaultCommandDir,
  expandHome,
  COMMAND_DIR_ENV,
  DEFAULT_COMMAND_DIR_NAME,
  type SchedulerOverrides,
  type ResolvedSchedulerOptions,
  type ResolveOptionsContext,
} from "./options.js";
