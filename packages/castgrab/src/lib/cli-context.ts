/**
 * Global CLI context for shared options and state.
 * Only the command layer reads this; the core takes explicit parameters.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Skip confirmation prompts (auto-yes) */
  yes: boolean;
  /** Fail instead of prompting for input (CI mode) */
  noInput: boolean;
  /** Log at debug level */
  verbose: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  yes: false,
  noInput: false,
  verbose: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthy(value: string | undefined): boolean {
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

  if (argv.includes("--json") || isTruthy(env.CASTGRAB_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || isTruthy(env.CASTGRAB_QUIET)) {
    currentContext.quiet = true;
  }

  if (argv.includes("--yes") || argv.includes("-y") || isTruthy(env.CASTGRAB_YES)) {
    currentContext.yes = true;
  }

  if (argv.includes("--no-input") || env.CI || isTruthy(env.CASTGRAB_NO_INPUT)) {
    currentContext.noInput = true;
  }

  if (argv.includes("--verbose") || argv.includes("-v")) {
    currentContext.verbose = true;
  }

  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Check if we're in quiet mode (no spinners/progress).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Check if we should skip confirmations.
 */
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
