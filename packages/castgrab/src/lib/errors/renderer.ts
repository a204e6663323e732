import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split("\n")) {
    let currentLine = "";
    for (const word of paragraph.split(" ")) {
      const testLine = currentLine ? `${currentLine} ${word}` : word;
      if (testLine.length <= maxWidth) {
        currentLine = testLine;
      } else {
        if (currentLine) lines.push(currentLine);
        currentLine = word;
      }
    }
    lines.push(currentLine);
  }

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Build the human-readable lines for an error.
 */
export function formatStaticError(error: CLIError, width: number = 80): string[] {
  const textWidth = Math.min(width, 80) - 4;
  const output: string[] = [""];

  const [first, ...rest] = wrapText(error.message, textWidth);
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const line of wrapText(error.details, textWidth)) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  const examples = error.examples?.length
    ? error.examples
    : error.example
      ? [error.example]
      : [];

  if (error.suggestion || examples.length > 0) {
    output.push("");

    if (error.suggestion) {
      const [head, ...tail] = wrapText(error.suggestion, textWidth);
      output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
      for (const line of tail) {
        output.push(`    ${line}`);
      }
    }

    if (examples.length === 1) {
      output.push("");
      output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
    } else if (examples.length > 1) {
      output.push("");
      output.push(`  ${chalk.dim("Examples:")}`);
      for (const ex of examples.slice(0, 3)) {
        output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
      }
    }
  }

  output.push("");
  return output;
}

/**
 * Build the JSON representation of an error, without undefined fields.
 */
export function formatJsonError(error: CLIError): Record<string, unknown> {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    examples: error.examples,
    details: error.details,
  };

  return Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );
}

/**
 * Render an error based on the current output mode.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  if (outputMode === "json") {
    console.error(JSON.stringify(formatJsonError(error), null, 2));
    return;
  }

  for (const line of formatStaticError(error, process.stdout.columns || 80)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(isCLIError(error) ? error : unknownError(error), mode);
}
