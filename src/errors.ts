/**
 * Report Normalizer Error Types
 *
 * Only conditions that stop a run are errors. Row and column anomalies are repaired
 * in place and surface as `RemediationWarning`s instead.
 */

import type { ZodIssue } from "zod";

/**
 * Thrown when the input path does not resolve to a readable file.
 */
export class InputNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Input file not found: ${path}`);
    this.name = "InputNotFoundError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InputNotFoundError);
    }
  }
}

/**
 * Thrown when a file extension has no reader or writer.
 */
export class UnsupportedFormatError extends Error {
  constructor(public readonly path: string, public readonly supported: readonly string[]) {
    super(`Unsupported file type for ${path} (expected one of ${supported.join(", ")})`);
    this.name = "UnsupportedFormatError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnsupportedFormatError);
    }
  }
}

/**
 * Thrown when a configuration file cannot be parsed or fails validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | null,
    public readonly issues: readonly ZodIssue[] = []
  ) {
    super(message);
    this.name = "ConfigError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }

  getSummary(): string {
    const lines = [this.message];
    for (const issue of this.issues.slice(0, 5)) {
      lines.push(`  - ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    }
    if (this.issues.length > 5) {
      lines.push(`  ... and ${this.issues.length - 5} more issues`);
    }
    return lines.join("\n");
  }
}

/**
 * Message of anything thrown, for top-level reporting.
 */
export function describeError(error: unknown): string {
  if (error instanceof ConfigError) return error.getSummary();
  if (error instanceof Error) return error.message;
  return String(error);
}
