/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Feed errors
  | "FEED_PARSE_FAILED"
  | "FEED_FETCH_FAILED"
  | "FEED_FETCH_IN_PROGRESS"
  // Configuration errors
  | "CONFIG_MISSING_FEED"
  | "VALIDATION_CONFIG_INVALID"
  | "VALIDATION_INVALID_OPTION"
  // Selection errors
  | "SELECTION_OUT_OF_RANGE"
  | "SELECTION_REQUIRED"
  | "SHOW_NOT_DOWNLOADABLE"
  // Download errors
  | "DOWNLOAD_CONFLICT"
  | "DOWNLOAD_ALREADY_STARTED"
  | "DOWNLOAD_DESTINATION_EXISTS"
  | "NETWORK_ERROR"
  | "FILESYSTEM_ERROR"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      examples?: string[];
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Extract a message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
