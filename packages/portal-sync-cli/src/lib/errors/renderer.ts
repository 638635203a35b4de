import chalk from "chalk";
import { SyncError, isSyncError } from "./types.js";
import { unknownError } from "./catalog.js";
import { isJsonMode } from "../cli-context.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Format an error for the terminal, one entry per output line.
 */
export function formatStaticError(error: SyncError): string[] {
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

  output.push("");
  return output;
}

export function formatJsonError(error: SyncError): string {
  const output = {
    error: true,
    code: error.code,
    kind: error.kind,
    message: error.message,
    suggestion: error.suggestion,
    details: error.details,
  };

  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  return JSON.stringify(cleaned, null, 2);
}

/**
 * Render an error to stderr in the current output mode.
 */
export function renderError(error: unknown, json: boolean = isJsonMode()): void {
  const syncError = isSyncError(error) ? error : unknownError(error);

  if (json) {
    console.error(formatJsonError(syncError));
    return;
  }

  for (const line of formatStaticError(syncError)) {
    console.error(line);
  }
}
