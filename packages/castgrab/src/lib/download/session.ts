import { dirname } from "path";
import type { Clock } from "../ports/clock.js";
import type { FileSystem, WritableFile } from "../ports/file-system.js";
import type { HttpStream, HttpStreamClient } from "../ports/http-stream.js";
import { systemClock } from "../adapters/system-clock.js";
import { createNoopLogger, type Logger } from "../logger.js";
import { CLIError, errorMessage, isCLIError } from "../errors/types.js";
import {
  downloadAlreadyStarted,
  filesystemError,
  networkError,
} from "../errors/catalog.js";
import { computeProgress } from "./progress.js";
import type {
  DownloadEvent,
  DownloadEventSink,
  DownloadState,
  TerminalEvent,
  TerminalState,
} from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadSessionOptions {
  http: HttpStreamClient;
  fs: FileSystem;
  /** Receives every progress event and the single terminal event */
  sink: DownloadEventSink;
  clock?: Clock;
  logger?: Logger;
  /** Largest number of bytes written between cancellation checks */
  chunkSize?: number;
}

export interface DownloadSession {
  /**
   * Stream `url` into `destinationPath`. Resolves with the terminal event
   * once the session has released its resources; never rejects for
   * transfer problems. Rejects when the session was already started.
   */
  start(url: string, destinationPath: string): Promise<TerminalEvent>;
  /** Ask the transfer to stop at the next chunk boundary */
  cancel(): void;
  /**
   * Cancel and tear down the connection without waiting for the next
   * chunk. Last resort for shutdown when a cancelled transfer is stuck.
   */
  forceAbort(): void;
  getState(): DownloadState;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_CHUNK_SIZE = 8192;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Run `work`, converting anything it throws that is not already a
 * CLIError with `wrap`.
 */
async function attempt<T>(
  work: () => Promise<T>,
  wrap: (error: unknown) => CLIError
): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw isCLIError(error) ? error : wrap(error);
  }
}

/**
 * Create a single-use streaming download.
 *
 * The body is written in chunks of at most `chunkSize` bytes. The cancel
 * flag is checked before every chunk, so a cancelled transfer stops within
 * one read/write cycle. The partial file is removed whenever the session
 * ends in any state other than completed.
 */
export function createDownloadSession(options: DownloadSessionOptions): DownloadSession {
  const { http, fs, sink } = options;
  const clock = options.clock ?? systemClock;
  const logger = (options.logger ?? createNoopLogger()).child({ component: "download" });
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const controller = new AbortController();
  let state: DownloadState = "idle";
  let cancelRequested = false;

  function deliver(event: DownloadEvent): void {
    try {
      sink(event);
    } catch (error) {
      logger.warn("Download event sink threw", { error: errorMessage(error) });
    }
  }

  function cancel(): void {
    if (cancelRequested || (state !== "idle" && state !== "in-progress")) {
      return;
    }
    cancelRequested = true;
    logger.info("Cancellation requested");
  }

  async function release(stream: HttpStream | undefined): Promise<void> {
    if (!stream) return;
    try {
      await stream.close();
    } catch (error) {
      logger.debug("Closing the response stream failed", { error: errorMessage(error) });
    }
  }

  async function run(url: string, destinationPath: string): Promise<TerminalEvent> {
    const startedAt = clock.now();
    let stream: HttpStream | undefined;
    let file: WritableFile | undefined;
    let bytesDownloaded = 0;
    let totalBytes = 0;
    let failure: CLIError | undefined;

    try {
      if (!cancelRequested) {
        stream = await attempt(
          () => http.open(url, controller.signal),
          (error) => networkError(url, errorMessage(error), error)
        );
        totalBytes = stream.contentLength ?? 0;
        logger.debug("Response received", { totalBytes });

        const directory = dirname(destinationPath);
        await attempt(
          () => fs.ensureDir(directory),
          (error) => filesystemError(directory, "create folder", error)
        );
        file = await attempt(
          () => fs.openForWrite(destinationPath),
          (error) => filesystemError(destinationPath, "create", error)
        );
      }

      const body = stream;
      const output = file;
      reading: while (body && output && !cancelRequested) {
        const piece = await attempt(
          () => body.read(),
          (error) => networkError(url, errorMessage(error), error)
        );
        if (piece === undefined) break;

        for (let offset = 0; offset < piece.byteLength; offset += chunkSize) {
          if (cancelRequested) break reading;

          const chunk = piece.subarray(offset, offset + chunkSize);
          await attempt(
            () => output.write(chunk),
            (error) => filesystemError(destinationPath, "write to", error)
          );
          bytesDownloaded += chunk.byteLength;

          deliver({
            type: "progress",
            snapshot: computeProgress(bytesDownloaded, totalBytes, clock.now() - startedAt),
          });
        }
      }
    } catch (error) {
      failure = isCLIError(error) ? error : networkError(url, errorMessage(error), error);
    }

    if (file) {
      try {
        await file.close();
      } catch (error) {
        failure ??= filesystemError(destinationPath, "finish writing", error);
      }
    }
    await release(stream);

    if (!failure && !cancelRequested && totalBytes > 0 && bytesDownloaded !== totalBytes) {
      failure = networkError(
        url,
        `Expected ${totalBytes} bytes but received ${bytesDownloaded}`
      );
    }

    let outcome: TerminalState = "completed";
    let reported: CLIError | undefined;

    if (cancelRequested) {
      outcome = "canceled";
      if (failure) {
        logger.debug("Error after cancellation", { error: failure.message });
      }
    } else if (failure) {
      outcome = "failed";
      reported = failure;
    }

    if (outcome !== "completed" && file) {
      try {
        await fs.remove(destinationPath);
      } catch (error) {
        const cleanup = filesystemError(destinationPath, "remove the partial file", error);
        logger.warn("Partial file left behind", { destinationPath, error: errorMessage(error) });
        reported ??= cleanup;
      }
    }

    state = outcome;
    const event: TerminalEvent = {
      type: "terminal",
      state: outcome,
      destinationPath,
      snapshot: computeProgress(bytesDownloaded, totalBytes, clock.now() - startedAt),
      ...(reported ? { error: reported } : {}),
    };

    const meta = { destinationPath, bytesDownloaded, totalBytes };
    if (outcome === "failed") {
      logger.error("Download failed", { ...meta, error: reported?.message });
    } else {
      logger.info(outcome === "completed" ? "Download completed" : "Download canceled", meta);
    }

    deliver(event);
    return event;
  }

  return {
    async start(url: string, destinationPath: string): Promise<TerminalEvent> {
      if (state !== "idle") {
        throw downloadAlreadyStarted();
      }
      state = "in-progress";
      logger.info("Download started", { url, destinationPath });
      return run(url, destinationPath);
    },

    cancel,

    forceAbort(): void {
      if (state !== "in-progress") return;
      cancel();
      controller.abort();
    },

    getState(): DownloadState {
      return state;
    },
  };
}
