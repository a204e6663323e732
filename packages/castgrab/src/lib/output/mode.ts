/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tui" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tui`: Interactive terminal with spinners and live progress
 * - `static`: Plain text output (for CI, pipes, non-interactive)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): OutputMode {
  if (argv.includes("--json") || env.CASTGRAB_JSON === "1" || env.CASTGRAB_JSON === "true") {
    return "json";
  }

  if (argv.includes("--no-input") || env.CI || env.CASTGRAB_NON_INTERACTIVE) {
    return "static";
  }

  // Piped output or a dumb terminal cannot redraw a spinner line
  if (!isTTY || env.TERM === "dumb") {
    return "static";
  }

  return "tui";
}
