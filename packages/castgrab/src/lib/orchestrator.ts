import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";
import type { FeedSource } from "./ports/feed-source.js";
import type { FileSystem } from "./ports/file-system.js";
import type { HttpStreamClient } from "./ports/http-stream.js";
import { systemClock } from "./adapters/system-clock.js";
import { realDelay } from "./adapters/real-timers.js";
import { createNoopLogger, type Logger } from "./logger.js";
import {
  downloadConflict,
  feedFetchInProgress,
  missingFeedUrl,
  selectionOutOfRange,
  selectionRequired,
  showNotDownloadable,
} from "./errors/catalog.js";
import { parseFeed } from "./feed/parser.js";
import { isDownloadable, type ShowRecord } from "./feed/types.js";
import { destinationPathFor } from "./download/filename.js";
import { createDownloadSession, type DownloadSession } from "./download/session.js";
import { isTerminalEvent, type DownloadEventSink, type TerminalEvent } from "./download/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Values the orchestrator needs from configuration. Passed in explicitly;
 * nothing is read from the environment here.
 */
export interface OrchestratorConfig {
  /** Feed used when loadShows is called without a source */
  feedUrl?: string;
  /** Folder used when startDownload is called without one */
  outputDir: string;
  chunkSize?: number;
}

export interface OrchestratorDeps {
  config: OrchestratorConfig;
  feedSource: FeedSource;
  http: HttpStreamClient;
  fs: FileSystem;
  /** Receives the events of every download this orchestrator starts */
  sink: DownloadEventSink;
  clock?: Clock;
  delay?: DelayFn;
  logger?: Logger;
  parse?: (feed: Uint8Array) => ShowRecord[];
}

export interface ShowSelection {
  index: number;
  show: ShowRecord;
  downloadable: boolean;
}

export interface DownloadHandle {
  show: ShowRecord;
  destinationPath: string;
  /** Resolves with the terminal event; never rejects */
  done: Promise<TerminalEvent>;
}

export interface Orchestrator {
  /** Fetch and parse a feed, replacing the held show list */
  loadShows(source?: string): Promise<readonly ShowRecord[]>;
  getShows(): readonly ShowRecord[];
  selectShow(index: number): ShowSelection;
  getSelection(): ShowSelection | undefined;
  /** Start downloading the selected show; throws when one is already running */
  startDownload(destinationDir?: string): DownloadHandle;
  cancelDownload(): void;
  isDownloading(): boolean;
  /**
   * Cancel the running download and wait for it to wind down, forcing the
   * connection closed when it has not finished within `graceMs`.
   */
  shutdown(graceMs: number): Promise<void>;
}

interface ActiveDownload {
  session: DownloadSession;
  handle: DownloadHandle;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the controller that ties feed loading, selection and the single
 * download slot together.
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { config, feedSource, http, fs, sink } = deps;
  const clock = deps.clock ?? systemClock;
  const delay = deps.delay ?? realDelay;
  const logger = deps.logger ?? createNoopLogger();
  const parse = deps.parse ?? parseFeed;

  let shows: readonly ShowRecord[] = [];
  let selection: ShowSelection | undefined;
  let fetching = false;
  let active: ActiveDownload | undefined;

  async function loadShows(source?: string): Promise<readonly ShowRecord[]> {
    const url = source ?? config.feedUrl;
    if (!url) {
      throw missingFeedUrl();
    }
    if (fetching) {
      throw feedFetchInProgress();
    }

    fetching = true;
    try {
      logger.debug("Fetching feed", { url });
      const bytes = await feedSource.fetch(url);
      const parsed = Object.freeze(parse(bytes));
      shows = parsed;
      selection = undefined;
      logger.info("Feed loaded", { url, shows: parsed.length });
      return parsed;
    } finally {
      fetching = false;
    }
  }

  function selectShow(index: number): ShowSelection {
    if (!Number.isInteger(index) || index < 0 || index >= shows.length) {
      throw selectionOutOfRange(index, shows.length);
    }
    const show = shows[index];
    selection = { index, show, downloadable: isDownloadable(show) };
    return selection;
  }

  function startDownload(destinationDir: string = config.outputDir): DownloadHandle {
    if (active) {
      throw downloadConflict(active.handle.show.title);
    }
    if (!selection) {
      throw selectionRequired();
    }
    const { show } = selection;
    if (!isDownloadable(show)) {
      throw showNotDownloadable(show.title);
    }

    const destinationPath = destinationPathFor(destinationDir, show.title, show.link);
    const session = createDownloadSession({
      http,
      fs,
      clock,
      logger,
      chunkSize: config.chunkSize,
      sink: (event) => {
        // Free the slot first so the sink may start the next attempt
        if (isTerminalEvent(event) && active?.session === session) {
          active = undefined;
        }
        sink(event);
      },
    });

    const handle: DownloadHandle = {
      show,
      destinationPath,
      done: session.start(show.link, destinationPath),
    };
    active = { session, handle };
    return handle;
  }

  function cancelDownload(): void {
    active?.session.cancel();
  }

  async function shutdown(graceMs: number): Promise<void> {
    const running = active;
    if (!running) return;

    running.session.cancel();
    const finished = await Promise.race([
      running.handle.done.then(() => true),
      delay(graceMs).then(() => false),
    ]);

    if (!finished) {
      logger.warn("Download did not stop in time, closing the connection", { graceMs });
      running.session.forceAbort();
      await running.handle.done;
    }
  }

  return {
    loadShows,
    getShows: () => shows,
    selectShow,
    getSelection: () => selection,
    startDownload,
    cancelDownload,
    isDownloading: () => active !== undefined,
    shutdown,
  };
}
