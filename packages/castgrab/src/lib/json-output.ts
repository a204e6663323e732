/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import type { CLIError } from "./errors/types.js";
import { isDownloadable, type ShowRecord } from "./feed/types.js";
import type { DownloadEvent, ProgressSnapshot, TerminalState } from "./download/types.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

/** Error shape embedded in streamed events */
export interface JsonError {
  error: {
    code: string;
    message: string;
    suggestion?: string;
    details?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface ShowJson {
  index: number;
  title: string;
  description: string;
  link: string;
  published: string;
  /** ISO 8601, null when the date could not be parsed */
  publishedAt: string | null;
  lengthBytes: number;
  downloadable: boolean;
}

export interface DownloadEventJson {
  type: "progress" | "terminal";
  timestamp: string;
  state?: TerminalState;
  destinationPath?: string;
  progress: ProgressSnapshot;
  error?: JsonError["error"];
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Converters
// ============================================================================

export function showToJson(show: ShowRecord, index: number): ShowJson {
  return {
    index,
    title: show.title,
    description: show.description,
    link: show.link,
    published: show.publishedRaw,
    publishedAt: show.publishedTimestamp > 0 ? new Date(show.publishedTimestamp).toISOString() : null,
    lengthBytes: show.lengthBytes,
    downloadable: isDownloadable(show),
  };
}

function errorToJson(error: CLIError): JsonError["error"] {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.details && { details: error.details }),
  };
}

export function downloadEventToJson(event: DownloadEvent, timestamp: Date): DownloadEventJson {
  if (event.type === "progress") {
    return { type: "progress", timestamp: timestamp.toISOString(), progress: event.snapshot };
  }
  return {
    type: "terminal",
    timestamp: timestamp.toISOString(),
    state: event.state,
    destinationPath: event.destinationPath,
    progress: event.snapshot,
    ...(event.error && { error: errorToJson(event.error) }),
  };
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an NDJSON event (for streaming download progress).
 */
export function outputNdjson(event: DownloadEventJson): void {
  console.log(JSON.stringify(event));
}

/**
 * Conditionally output JSON or return false for human output.
 * Use this to check if JSON mode is enabled before outputting.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
