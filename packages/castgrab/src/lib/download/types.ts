import type { CLIError } from "../errors/types.js";

export type DownloadState = "idle" | "in-progress" | "completed" | "canceled" | "failed";

export type TerminalState = Extract<DownloadState, "completed" | "canceled" | "failed">;

/**
 * Transfer progress after one chunk. A fresh object is built for every
 * event, so sinks may keep it.
 */
export interface ProgressSnapshot {
  readonly bytesDownloaded: number;
  /** 0 when the server sent no usable content-length */
  readonly totalBytes: number;
  /** Whole percent, null when the total is unknown */
  readonly percent: number | null;
  readonly rateBytesPerSec: number;
  /** Seconds remaining, -1 when unknown */
  readonly etaSeconds: number;
}

export interface ProgressEvent {
  readonly type: "progress";
  readonly snapshot: ProgressSnapshot;
}

export interface TerminalEvent {
  readonly type: "terminal";
  readonly state: TerminalState;
  readonly destinationPath: string;
  /** Progress at the moment the session ended */
  readonly snapshot: ProgressSnapshot;
  /** Set for failed downloads, and for canceled ones whose cleanup failed */
  readonly error?: CLIError;
}

export type DownloadEvent = ProgressEvent | TerminalEvent;

/**
 * Receives download events in the order they happen.
 */
export type DownloadEventSink = (event: DownloadEvent) => void;

export function isTerminalEvent(event: DownloadEvent): event is TerminalEvent {
  return event.type === "terminal";
}
