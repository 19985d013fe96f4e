import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

export type ErrorOutput = "static" | "json";

/**
 * Format an error as styled terminal lines.
 */
export function formatStaticError(error: CLIError): string[] {
  const output: string[] = [""];

  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`);

  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");
  return output;
}

/**
 * Build the JSON error document, leaving out unset fields.
 */
export function formatJsonError(error: CLIError): Record<string, unknown> {
  const output = {
    success: false,
    error: Object.fromEntries(
      Object.entries({
        code: error.code,
        message: error.message,
        suggestion: error.suggestion,
        details: error.details,
      }).filter(([, v]) => v !== undefined)
    ),
  };
  return output;
}

/**
 * Render an error to stderr.
 */
export function renderError(error: CLIError, mode: ErrorOutput = "static"): void {
  if (mode === "json") {
    console.error(JSON.stringify(formatJsonError(error), null, 2));
    return;
  }
  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: ErrorOutput): void {
  if (isCLIError(error)) {
    renderError(error, mode);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    const cliError = new CLIError("UNKNOWN_ERROR", message, {
      cause: error instanceof Error ? error : undefined,
    });
    renderError(cliError, mode);
  }
}

export { CLIError, isCLIError };
