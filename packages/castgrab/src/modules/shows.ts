import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { RuntimeProvider, Runtime } from "../lib/runtime.js";
import { orchestratorFor } from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";
import { maybeOutputJson, showToJson } from "../lib/json-output.js";
import { invalidArgument, invalidOption } from "../lib/errors/catalog.js";
import { isDownloadable, type ShowRecord } from "../lib/feed/types.js";
import {
  SORT_COLUMNS,
  SORT_ORDERS,
  sortShows,
  type SortColumn,
  type SortOrder,
} from "../lib/feed/sort.js";
import { formatBytes, formatMegabytes } from "../lib/format.js";
import type { Orchestrator } from "../lib/orchestrator.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ListOptions {
  feed?: string;
  sort: SortColumn;
  order: SortOrder;
  limit?: number;
}

export interface InfoOptions {
  feed?: string;
}

// ---------------------------------------------------------------------------
// Option Parsers
// ---------------------------------------------------------------------------

function isSortColumn(value: string): value is SortColumn {
  return SORT_COLUMNS.some((column) => column === value);
}

function isSortOrder(value: string): value is SortOrder {
  return SORT_ORDERS.some((order) => order === value);
}

export function parseSortColumn(value: string): SortColumn {
  if (!isSortColumn(value)) {
    throw invalidOption("sort", `"${value}" is not a column`, [...SORT_COLUMNS]);
  }
  return value;
}

export function parseSortOrder(value: string): SortOrder {
  if (!isSortOrder(value)) {
    throw invalidOption("order", `"${value}" is not a sort order`, [...SORT_ORDERS]);
  }
  return value;
}

export function parseCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(count) || count < 1) {
    throw invalidOption("limit", `"${value}" is not a positive whole number`);
  }
  return count;
}

/**
 * Episode numbers are feed positions, starting at 0.
 */
export function parseEpisodeIndex(value: string): number {
  const index = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(index)) {
    throw invalidArgument("index", `"${value}" is not an episode number`);
  }
  return index;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerShowCommands(program: Command, runtime: RuntimeProvider): void {
  program
    .command("list")
    .description("List the episodes in the feed")
    .option("-f, --feed <url>", "Feed URL (overrides config)")
    .option("-s, --sort <column>", `Sort by ${SORT_COLUMNS.join(", ")}`, parseSortColumn, "date")
    .option("--order <order>", `Sort order: ${SORT_ORDERS.join(", ")}`, parseSortOrder, "desc")
    .option("-n, --limit <count>", "Show at most this many episodes", parseCount)
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  castgrab list                         ${chalk.gray("Newest episodes first")}
  castgrab list --sort size --order asc ${chalk.gray("Smallest episodes first")}
  castgrab list --json                  ${chalk.gray("Output as JSON for scripting")}
`
    )
    .action(async (options: ListOptions) => {
      await listShows(runtime(), options);
    });

  program
    .command("info")
    .description("Show the details of one episode")
    .argument("<index>", "Episode number from 'castgrab list'", parseEpisodeIndex)
    .option("-f, --feed <url>", "Feed URL (overrides config)")
    .action(async (index: number, options: InfoOptions) => {
      await showInfo(runtime(), index, options);
    });
}

// ---------------------------------------------------------------------------
// Command Implementation
// ---------------------------------------------------------------------------

/**
 * Fetch the feed behind a spinner.
 */
export async function loadWithSpinner(
  orchestrator: Orchestrator,
  feed?: string
): Promise<readonly ShowRecord[]> {
  const spinner = createSpinner().start("Fetching feed");
  try {
    const shows = await orchestrator.loadShows(feed);
    spinner.stop();
    return shows;
  } catch (error) {
    spinner.fail("Couldn't load the feed");
    throw error;
  }
}

export async function listShows(runtime: Runtime, options: ListOptions): Promise<void> {
  const orchestrator = orchestratorFor(runtime);
  const shows = await loadWithSpinner(orchestrator, options.feed);

  // Numbers shown are feed positions, whatever the display order
  const positions = new Map(shows.map((show, index) => [show, index] as const));
  const sorted = sortShows(shows, options.sort, options.order).slice(0, options.limit);

  if (maybeOutputJson(sorted.map((show) => showToJson(show, positions.get(show) ?? -1)))) {
    return;
  }

  if (sorted.length === 0) {
    console.log(chalk.yellow("The feed has no episodes."));
    return;
  }

  const table = new CliTable3({
    head: [chalk.cyan("#"), chalk.cyan("Date"), chalk.cyan("Size (MB)"), chalk.cyan("Title")],
  });

  for (const show of sorted) {
    table.push([
      String(positions.get(show) ?? ""),
      show.publishedRaw,
      show.lengthBytes > 0 ? formatMegabytes(show.lengthBytes) : "-",
      isDownloadable(show) ? show.title : chalk.gray(show.title),
    ]);
  }

  console.log(table.toString());
  console.log(chalk.gray(`${shows.length} episode(s). Download one with 'castgrab download <#>'.`));
}

export async function showInfo(runtime: Runtime, index: number, options: InfoOptions): Promise<void> {
  const orchestrator = orchestratorFor(runtime);
  await loadWithSpinner(orchestrator, options.feed);
  const { show, downloadable } = orchestrator.selectShow(index);

  if (maybeOutputJson(showToJson(show, index))) {
    return;
  }

  console.log(chalk.bold(show.title));
  console.log();
  console.log(`  ${chalk.gray("Published:")}    ${show.publishedRaw}`);
  console.log(
    `  ${chalk.gray("Size:")}         ${show.lengthBytes > 0 ? formatBytes(show.lengthBytes) : "unknown"}`
  );
  console.log(`  ${chalk.gray("Link:")}         ${downloadable ? show.link : chalk.yellow("none")}`);
  if (show.description) {
    console.log();
    console.log(`  ${show.description}`);
  }
}
