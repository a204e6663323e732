import { Command } from "commander";
import chalk from "chalk";
import type { Runtime, RuntimeProvider } from "../lib/runtime.js";
import { orchestratorFor } from "../lib/runtime.js";
import { expandHome } from "../lib/config.js";
import { createSpinner } from "../lib/spinner.js";
import { isJsonMode, isNonInteractive, shouldAutoConfirm } from "../lib/cli-context.js";
import { downloadEventToJson, outputNdjson } from "../lib/json-output.js";
import { destinationExists, showNotDownloadable, unknownError } from "../lib/errors/catalog.js";
import { errorMessage } from "../lib/errors/types.js";
import { renderError } from "../lib/errors/renderer.js";
import { destinationPathFor } from "../lib/download/filename.js";
import { createProgressThrottle } from "../lib/download/progress.js";
import type { DownloadEventSink } from "../lib/download/types.js";
import { formatBytes } from "../lib/format.js";
import { loadWithSpinner, parseEpisodeIndex } from "./shows.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  feed?: string;
  outputDir?: string;
}

/** Exit code for a download stopped with Ctrl-C */
export const EXIT_CANCELED = 130;

/** Spinner and NDJSON progress are refreshed at most this often */
export const PROGRESS_INTERVAL_MS = 250;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommand(program: Command, runtime: RuntimeProvider): void {
  program
    .command("download")
    .description("Download one episode's media file")
    .argument("<index>", "Episode number from 'castgrab list'", parseEpisodeIndex)
    .option("-f, --feed <url>", "Feed URL (overrides config)")
    .option("-o, --output-dir <dir>", "Folder to save into (overrides config)")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  castgrab download 0                    ${chalk.gray("Newest episode in feed order")}
  castgrab download 3 -o ~/Podcasts      ${chalk.gray("Save somewhere else")}
  castgrab download 0 --json             ${chalk.gray("Stream progress as NDJSON")}

Press Ctrl-C to cancel; the partial file is removed.
`
    )
    .action(async (index: number, options: DownloadOptions) => {
      const overrides = options.outputDir ? { outputDir: expandHome(options.outputDir) } : {};
      await downloadShow(runtime(overrides), index, options);
    });
}

// ---------------------------------------------------------------------------
// Command Implementation
// ---------------------------------------------------------------------------

/**
 * Decide whether an existing file at `path` may be replaced.
 * Throws when the answer is no and nobody could be asked.
 */
export async function confirmOverwrite(runtime: Runtime, path: string): Promise<boolean> {
  if (!(await runtime.fs.exists(path))) {
    return true;
  }
  if (shouldAutoConfirm() || runtime.config.overwrite === "always") {
    return true;
  }
  if (runtime.config.overwrite === "never" || isNonInteractive() || isJsonMode()) {
    throw destinationExists(path);
  }
  return runtime.prompts.confirm(`${path} already exists. Replace it?`, false);
}

export async function downloadShow(
  runtime: Runtime,
  index: number,
  options: DownloadOptions
): Promise<void> {
  const { logger, clock } = runtime;
  const json = isJsonMode();
  const spinner = createSpinner();
  const throttle = createProgressThrottle(PROGRESS_INTERVAL_MS, () => clock.now());

  const sink: DownloadEventSink = (event) => {
    const isTerminal = event.type === "terminal";
    if (!throttle(isTerminal)) return;

    if (json) {
      outputNdjson(downloadEventToJson(event, clock.newDate()));
    } else if (!isTerminal) {
      spinner.progress(event.snapshot);
    }
  };

  const orchestrator = orchestratorFor(runtime, sink);
  await loadWithSpinner(orchestrator, options.feed);

  const { show, downloadable } = orchestrator.selectShow(index);
  if (!downloadable) {
    throw showNotDownloadable(show.title);
  }

  const target = destinationPathFor(runtime.config.outputDir, show.title, show.link);
  if (!(await confirmOverwrite(runtime, target))) {
    console.log(chalk.yellow(`Kept the existing file: ${target}`));
    return;
  }

  spinner.start(show.title);

  let interrupted = false;
  runtime.signals.onInterrupt((signal) => {
    if (interrupted) return;
    interrupted = true;
    logger.info("Interrupted, canceling download", { signal });
    spinner.status("canceling…");
    orchestrator.shutdown(runtime.config.shutdownGraceMs).catch((error: unknown) => {
      logger.error("Shutdown failed", { error: errorMessage(error) });
    });
  });

  try {
    const handle = orchestrator.startDownload();
    const result = await handle.done;

    switch (result.state) {
      case "completed":
        spinner.succeed(
          `Saved ${chalk.cyan(result.destinationPath)} (${formatBytes(result.snapshot.bytesDownloaded)})`
        );
        return;

      case "canceled":
        spinner.warn("Download canceled, partial file removed");
        if (result.error) {
          renderError(result.error);
        }
        process.exitCode = EXIT_CANCELED;
        return;

      case "failed":
        spinner.fail("Download failed");
        throw result.error ?? unknownError("Download failed");
    }
  } finally {
    runtime.signals.removeAll();
  }
}
