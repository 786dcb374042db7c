/**
 * Error hierarchy:
 * - LintError (base)
 *   - PositionOutOfRangeError (offset is not a valid position in the buffer)
 *   - OverlappingReplacementsError (two enabled replacements intersect)
 *   - BinaryFileError (file is not text)
 *   - ConfigurationError (invalid options, version files or metadata)
 *   - SourceParseError (a linted YAML or TOML file does not parse)
 *   - GitError (git subprocess failures)
 */

import type { Replacement } from "./warnings.mjs";

export class LintError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LintError";
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class PositionOutOfRangeError extends LintError {
  readonly position: number;

  constructor(message: string, position: number) {
    super(message, "POSITION_OUT_OF_RANGE");
    this.name = "PositionOutOfRangeError";
    this.position = position;
  }
}

export class OverlappingReplacementsError extends LintError {
  readonly first: Replacement;
  readonly second: Replacement;

  constructor(first: Replacement, second: Replacement) {
    super(`${first.toString()} overlaps with ${second.toString()}`, "OVERLAPPING_REPLACEMENTS");
    this.name = "OverlappingReplacementsError";
    this.first = first;
    this.second = second;
  }
}

export class BinaryFileError extends LintError {
  readonly filename: string;

  constructor(filename: string) {
    super(`Refusing to run text linter on binary file ${filename}.`, "BINARY_FILE");
    this.name = "BinaryFileError";
    this.filename = filename;
  }
}

export class ConfigurationError extends LintError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIGURATION_ERROR", options);
    this.name = "ConfigurationError";
  }
}

export class SourceParseError extends LintError {
  readonly filename: string;

  constructor(filename: string, detail: string, options?: ErrorOptions) {
    super(`Failed to parse ${filename}: ${detail}`, "SOURCE_PARSE_ERROR", options);
    this.name = "SourceParseError";
    this.filename = filename;
  }
}

export class GitError extends LintError {
  readonly args: string[];

  constructor(message: string, args: string[]) {
    super(message, "GIT_ERROR");
    this.name = "GitError";
    this.args = args;
  }
}

export function isLintError(value: unknown): value is LintError {
  return value instanceof LintError;
}
