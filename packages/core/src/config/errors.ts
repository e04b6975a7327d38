/**
 * Error classes for configuration loading
 */

import type { ZodError } from "zod";
import { OfflineSyncError, OfflineSyncErrorCode } from "../errors.js";

/**
 * Base error class for configuration errors
 */
export class ConfigError extends OfflineSyncError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: OfflineSyncErrorCode }
  ) {
    super(message, { cause: options?.cause, code: options?.code ?? OfflineSyncErrorCode.CONFIG_ERROR });
    this.name = "ConfigError";
  }
}

/**
 * Error thrown when no configuration file is found
 */
export class ConfigNotFoundError extends ConfigError {
  public readonly searchedPaths: string[];
  public readonly startDirectory: string;

  constructor(startDirectory: string, searchedPaths: string[]) {
    super(
      `No offline-sync configuration file found. ` +
        `Searched from '${startDirectory}' up to filesystem root.`,
      { code: OfflineSyncErrorCode.CONFIG_NOT_FOUND }
    );
    this.name = "ConfigNotFoundError";
    this.searchedPaths = searchedPaths;
    this.startDirectory = startDirectory;
  }
}

/**
 * Error thrown when the configuration file is not valid YAML
 */
export class YamlSyntaxError extends ConfigError {
  public readonly line?: number;
  public readonly column?: number;
  public readonly originalError: Error;

  constructor(filePath: string, error: Error, position?: { line: number; col: number }) {
    const locationInfo = position ? ` at line ${position.line}, column ${position.col}` : "";
    super(`Invalid YAML syntax in '${filePath}'${locationInfo}: ${error.message}`, {
      cause: error,
    });
    this.name = "YamlSyntaxError";
    this.line = position?.line;
    this.column = position?.col;
    this.originalError = error;
  }
}

/**
 * A single schema violation, with a dotted path into the config
 */
export interface SchemaIssue {
  path: string;
  message: string;
}

/**
 * Error thrown when the configuration does not match the schema
 */
export class SchemaValidationError extends ConfigError {
  public readonly issues: SchemaIssue[];

  constructor(error: ZodError, filePath?: string) {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    const issueMessages = issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
    const where = filePath ? ` in '${filePath}'` : "";
    super(`Configuration validation failed${where}:\n${issueMessages}`, {
      cause: error,
      code: OfflineSyncErrorCode.SCHEMA_VALIDATION,
    });
    this.name = "SchemaValidationError";
    this.issues = issues;
  }
}

/**
 * Error thrown when a configuration file cannot be read
 */
export class FileReadError extends ConfigError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    const reason = cause ? `: ${cause.message}` : "";
    super(`Failed to read file '${filePath}'${reason}`, {
      cause,
      code: OfflineSyncErrorCode.FILE_READ_ERROR,
    });
    this.name = "FileReadError";
    this.filePath = filePath;
  }
}

/**
 * Error thrown when a `${VAR}` reference names an unset variable
 */
export class UndefinedVariableError extends ConfigError {
  public readonly variableName: string;
  public readonly path: string;

  constructor(variableName: string, path: string) {
    super(
      `Undefined environment variable '${variableName}' at '${path}' (no default provided)`
    );
    this.name = "UndefinedVariableError";
    this.variableName = variableName;
    this.path = path;
  }
}
