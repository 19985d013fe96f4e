import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 */

// ============================================================================
// Authentication Errors
// ============================================================================

export function authFailed(status: number, body?: string): CLIError {
  return new CLIError("AUTH_FAILED", `Bad authentication (HTTP ${status})`, {
    suggestion: "Check the account email and the RDAPSWD password",
    details: body?.trim() ? body.trim().slice(0, 500) : undefined,
  });
}

export function missingSecret(variable: string): CLIError {
  return new CLIError("AUTH_MISSING_SECRET", `${variable} is not set`, {
    suggestion: `Export the RDA account password as ${variable}`,
    example: `export ${variable}=...`,
  });
}

// ============================================================================
// Filesystem Errors
// ============================================================================

export function logNotWritable(path: string, reason?: string): CLIError {
  return new CLIError("LOG_NOT_WRITABLE", `Can't write the log file "${path}"`, {
    suggestion: "Check the directory exists and is writable, or set logging.file in the config",
    details: reason,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}
