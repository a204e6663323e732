import { CLIError, errorMessage } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

function causeOf(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

// ============================================================================
// Feed Errors
// ============================================================================

export function feedParseFailed(reason: string): CLIError {
  return new CLIError("FEED_PARSE_FAILED", "The feed isn't readable XML", {
    suggestion: "Check that the feed URL points at an RSS document, not a web page",
    details: reason,
  });
}

export function feedFetchFailed(url: string, reason: string, cause?: unknown): CLIError {
  return new CLIError("FEED_FETCH_FAILED", `Couldn't fetch the feed from ${url}`, {
    suggestion: "Check your internet connection and the feed URL",
    details: reason,
    cause: causeOf(cause),
  });
}

export function feedFetchInProgress(): CLIError {
  return new CLIError("FEED_FETCH_IN_PROGRESS", "The feed is already being fetched", {
    suggestion: "Wait for the current fetch to finish",
  });
}

// ============================================================================
// Configuration Errors
// ============================================================================

export function missingFeedUrl(): CLIError {
  return new CLIError("CONFIG_MISSING_FEED", "No feed URL is configured", {
    suggestion: "Pass --feed, set CASTGRAB_FEED_URL, or add feed.url to your config file",
    examples: [
      "castgrab list --feed https://example.com/podcast.xml",
      "castgrab config init",
    ],
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

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function invalidArgument(argumentName: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid <${argumentName}>: ${reason}`, {
    example: "castgrab list",
  });
}

// ============================================================================
// Selection Errors
// ============================================================================

export function selectionOutOfRange(index: number, count: number): CLIError {
  const range = count > 0 ? `0-${count - 1}` : "none, the feed is empty";
  return new CLIError("SELECTION_OUT_OF_RANGE", `There is no episode #${index}`, {
    suggestion: `Valid episode numbers: ${range}`,
    example: "castgrab list",
  });
}

export function selectionRequired(): CLIError {
  return new CLIError("SELECTION_REQUIRED", "No episode is selected", {
    suggestion: "Select an episode before starting a download",
  });
}

export function showNotDownloadable(title: string): CLIError {
  return new CLIError("SHOW_NOT_DOWNLOADABLE", `"${title}" has no media file to download`, {
    suggestion: "The feed item carries no enclosure. Pick another episode",
  });
}

// ============================================================================
// Download Errors
// ============================================================================

export function downloadConflict(title: string): CLIError {
  return new CLIError("DOWNLOAD_CONFLICT", "A download is already running", {
    suggestion: "Cancel it or wait for it to finish before starting another",
    details: `In progress: ${title}`,
  });
}

export function downloadAlreadyStarted(): CLIError {
  return new CLIError("DOWNLOAD_ALREADY_STARTED", "This download session was already started", {
    suggestion: "Create a new session for each download attempt",
  });
}

export function destinationExists(path: string): CLIError {
  return new CLIError("DOWNLOAD_DESTINATION_EXISTS", `"${path}" already exists`, {
    suggestion: "Pass --yes or set download.overwrite to \"always\" to replace it",
    example: "castgrab download 0 --yes",
  });
}

export function networkError(url: string, reason: string, cause?: unknown): CLIError {
  return new CLIError("NETWORK_ERROR", `Download from ${url} failed`, {
    suggestion: "Check your internet connection and try again",
    details: reason,
    cause: causeOf(cause),
  });
}

export function httpStatusError(url: string, status: number, statusText: string): CLIError {
  return networkError(url, `Server answered ${status} ${statusText}`.trim());
}

export function filesystemError(path: string, action: string, cause?: unknown): CLIError {
  return new CLIError("FILESYSTEM_ERROR", `Couldn't ${action} "${path}"`, {
    suggestion: "Check the folder exists, is writable, and has free space",
    details: cause === undefined ? undefined : errorMessage(cause),
    cause: causeOf(cause),
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  return new CLIError("UNKNOWN_ERROR", errorMessage(error), { cause: causeOf(error) });
}
