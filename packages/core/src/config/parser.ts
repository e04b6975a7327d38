/**
 * YAML parsing and validation for offline-sync.yaml
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import { ZodError } from "zod";
import { ConfigError, SchemaValidationError, YamlSyntaxError } from "./errors.js";
import { interpolateValue, type InterpolateOptions } from "./interpolate.js";
import { OfflineSyncConfigSchema, type OfflineSyncConfig } from "./schema.js";

export interface ParseConfigOptions extends InterpolateOptions {
  /**
   * Whether to interpolate environment variables before validating
   * Default: true
   */
  interpolate?: boolean;
}

/**
 * Parse and validate configuration YAML
 *
 * An empty document is a valid, empty configuration.
 *
 * @param filePath - Used in error messages only
 * @throws {YamlSyntaxError} If the content is not valid YAML
 * @throws {UndefinedVariableError} If a `${VAR}` reference cannot be resolved
 * @throws {SchemaValidationError} If the content does not match the schema
 */
export function parseConfig(
  content: string,
  filePath = "<inline>",
  options: ParseConfigOptions = {}
): OfflineSyncConfig {
  let rawConfig: unknown;
  try {
    rawConfig = parseYaml(content);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new YamlSyntaxError(filePath, error, error.linePos?.[0]);
    }
    throw error;
  }

  // Handle empty files
  if (rawConfig === null || rawConfig === undefined) {
    rawConfig = {};
  }

  if (options.interpolate !== false) {
    rawConfig = interpolateValue(rawConfig, options);
  }

  try {
    return OfflineSyncConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new SchemaValidationError(error, filePath);
    }
    throw error;
  }
}

/**
 * Parse configuration without throwing on errors
 */
export function safeParseConfig(
  content: string,
  filePath?: string,
  options?: ParseConfigOptions
): { success: true; data: OfflineSyncConfig } | { success: false; error: ConfigError } {
  try {
    return { success: true, data: parseConfig(content, filePath, options) };
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
