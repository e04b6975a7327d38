/**
 * Environment variable interpolation for config values
 *
 * Supports `${VAR}` and `${VAR:-default}` inside any string value. Objects
 * and arrays are walked recursively; other values pass through unchanged.
 */

import { UndefinedVariableError } from "./errors.js";

const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

export interface InterpolateOptions {
  /**
   * Variables to substitute
   * Default: process.env
   */
  env?: Record<string, string | undefined>;
}

/**
 * Interpolate every variable reference in a string
 *
 * @param path - Dotted location of the value, used in error messages
 * @throws {UndefinedVariableError} If a variable is unset and has no default
 *
 * @example
 * ```typescript
 * interpolateString("${HOME}/runs", "command_dir", { env: { HOME: "/home/me" } });
 * // "/home/me/runs"
 * interpolateString("${MISSING:-fallback}", "x", { env: {} });
 * // "fallback"
 * ```
 */
export function interpolateString(
  value: string,
  path: string,
  options: InterpolateOptions = {}
): string {
  const env = options.env ?? process.env;
  return value.replace(
    VARIABLE_PATTERN,
    (_match: string, name: string, defaultValue: string | undefined) => {
      const resolved = env[name];
      if (resolved !== undefined) {
        return resolved;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      throw new UndefinedVariableError(name, path);
    }
  );
}

/**
 * Interpolate every string inside a parsed YAML value
 */
export function interpolateValue(
  value: unknown,
  options: InterpolateOptions = {},
  path = ""
): unknown {
  if (typeof value === "string") {
    return interpolateString(value, path || "(root)", options);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      interpolateValue(item, options, path ? `${path}[${index}]` : `[${index}]`)
    );
  }

  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        interpolateValue(item, options, path ? `${path}.${key}` : key),
      ])
    );
  }

  return value;
}
