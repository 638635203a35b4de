/**
 * Global CLI context for flags shared by every command.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Answer yes to confirmation prompts (reuse cached manifest) */
  yes: boolean;
  /** Fail instead of prompting for input (CI mode) */
  noInput: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  yes: false,
  noInput: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || isTruthyEnv(env.PORTAL_SYNC_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || isTruthyEnv(env.PORTAL_SYNC_QUIET)) {
    currentContext.quiet = true;
  }

  if (argv.includes("--yes") || argv.includes("-y")) {
    currentContext.yes = true;
  }

  if (argv.includes("--no-input") || env.CI) {
    currentContext.noInput = true;
    currentContext.yes = true; // No input implies auto-yes
  }

  return currentContext;
}

export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

export function shouldAutoConfirm(): boolean {
  return currentContext.yes;
}

/**
 * Check if we're in non-interactive mode.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdin.isTTY;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
