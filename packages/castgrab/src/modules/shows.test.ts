import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

// Mock ora before imports
const oraInstance = vi.hoisted(() => ({
  start: vi.fn(),
  stop: vi.fn(),
  succeed: vi.fn(),
  fail: vi.fn(),
  warn: vi.fn(),
  text: "",
}));
vi.mock("ora", () => ({
  default: () => oraInstance,
}));

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    bold: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    yellow: (s: string) => s,
  },
}));

import {
  listShows,
  parseCount,
  parseEpisodeIndex,
  parseSortColumn,
  parseSortOrder,
  showInfo,
} from "./shows.js";
import type { Runtime } from "../lib/runtime.js";
import type { FeedSource } from "../lib/ports/feed-source.js";
import { createNoopLogger } from "../lib/logger.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { feedFetchFailed } from "../lib/errors/catalog.js";
import { isCLIError } from "../lib/errors/types.js";

const FEED = `<?xml version="1.0"?>
<rss version="2.0"><channel>
  <item>
    <title>Old</title>
    <pubDate>Mon, 01 Jan 2024 00:00:00 GMT</pubDate>
    <enclosure url="http://x/old.mp3" length="2097152"/>
  </item>
  <item>
    <title>New</title>
    <pubDate>Fri, 01 Mar 2024 00:00:00 GMT</pubDate>
    <description>&lt;p&gt;Spring episode&lt;/p&gt;</description>
    <enclosure url="http://x/new.mp3" length="1048576"/>
  </item>
  <item><title>Notes</title></item>
</channel></rss>`;

const EMPTY_FEED = `<?xml version="1.0"?><rss version="2.0"><channel><title>Quiet</title></channel></rss>`;

function feedOf(xml: string): FeedSource {
  return { fetch: async () => new TextEncoder().encode(xml) };
}

function createTestRuntime(feedSource: FeedSource = feedOf(FEED)): Runtime {
  return {
    config: {
      feedUrl: "https://example.com/feed.xml",
      outputDir: "/downloads",
      chunkSize: 8192,
      shutdownGraceMs: 5000,
      fetchTimeoutMs: 30000,
      overwrite: "ask",
      logLevel: "warn",
      logJson: false,
    },
    sources: [],
    logger: createNoopLogger(),
    clock: { now: () => 0, newDate: () => new Date(0) },
    delay: async () => {},
    feedSource,
    http: {
      open: async () => {
        throw new Error("no network in tests");
      },
    },
    fs: {
      ensureDir: async () => {},
      openForWrite: async () => ({ write: async () => {}, close: async () => {} }),
      remove: async () => {},
      exists: async () => false,
    },
    prompts: { confirm: async () => false },
    signals: { onInterrupt: () => {}, removeAll: () => {} },
  };
}

function codeOf(work: () => unknown): string | undefined {
  try {
    work();
  } catch (error) {
    return isCLIError(error) ? `${error.code}: ${error.message}` : "not a CLIError";
  }
  return undefined;
}

function printedJson(spy: MockInstance): unknown {
  expect(spy).toHaveBeenCalledTimes(1);
  return JSON.parse(String(spy.mock.calls[0][0]));
}

describe("shows module", () => {
  let consoleLogSpy: MockInstance;

  beforeEach(() => {
    vi.clearAllMocks();
    resetContext();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    resetContext();
  });

  describe("option parsers", () => {
    it("accepts known sort columns and orders", () => {
      expect(parseSortColumn("size")).toBe("size");
      expect(parseSortOrder("asc")).toBe("asc");
    });

    it("rejects unknown sort columns and orders", () => {
      expect(codeOf(() => parseSortColumn("length"))).toBe(
        'VALIDATION_INVALID_OPTION: Invalid --sort: "length" is not a column'
      );
      expect(codeOf(() => parseSortOrder("up"))).toBe(
        'VALIDATION_INVALID_OPTION: Invalid --order: "up" is not a sort order'
      );
    });

    it("takes positive whole numbers as a limit", () => {
      expect(parseCount("5")).toBe(5);
      expect(codeOf(() => parseCount("0"))).toBe(
        'VALIDATION_INVALID_OPTION: Invalid --limit: "0" is not a positive whole number'
      );
      expect(codeOf(() => parseCount("2.5"))).toBe(
        'VALIDATION_INVALID_OPTION: Invalid --limit: "2.5" is not a positive whole number'
      );
    });

    it("takes episode numbers from 0", () => {
      expect(parseEpisodeIndex("0")).toBe(0);
      expect(codeOf(() => parseEpisodeIndex("-1"))).toBe(
        'VALIDATION_INVALID_OPTION: Invalid <index>: "-1" is not an episode number'
      );
    });
  });

  describe("listShows", () => {
    it("lists newest first with feed positions as numbers", async () => {
      initContext(["node", "castgrab", "--json"], {});

      await listShows(createTestRuntime(), { sort: "date", order: "desc" });

      expect(printedJson(consoleLogSpy)).toEqual({
        success: true,
        data: [
          {
            index: 1,
            title: "New",
            description: "Spring episode",
            link: "http://x/new.mp3",
            published: "Fri, 01 Mar 2024 00:00:00 GMT",
            publishedAt: "2024-03-01T00:00:00.000Z",
            lengthBytes: 1048576,
            downloadable: true,
          },
          {
            index: 0,
            title: "Old",
            description: "",
            link: "http://x/old.mp3",
            published: "Mon, 01 Jan 2024 00:00:00 GMT",
            publishedAt: "2024-01-01T00:00:00.000Z",
            lengthBytes: 2097152,
            downloadable: true,
          },
          {
            index: 2,
            title: "Notes",
            description: "",
            link: "",
            published: "No Date",
            publishedAt: null,
            lengthBytes: 0,
            downloadable: false,
          },
        ],
      });
    });

    it("sorts by size and honours the limit", async () => {
      initContext(["node", "castgrab", "--json"], {});

      await listShows(createTestRuntime(), { sort: "size", order: "asc", limit: 2 });

      const output = printedJson(consoleLogSpy);
      expect(output).toMatchObject({ success: true });
      expect(output).toHaveProperty("data.length", 2);
      expect(output).toMatchObject({ data: [{ index: 2 }, { index: 1 }] });
    });

    it("prints a table with a footer", async () => {
      await listShows(createTestRuntime(), { sort: "date", order: "desc" });

      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
      const table = String(consoleLogSpy.mock.calls[0][0]);
      expect(table).toContain("New");
      expect(table).toContain("2.00");
      expect(consoleLogSpy).toHaveBeenLastCalledWith(
        "3 episode(s). Download one with 'castgrab download <#>'."
      );
      expect(oraInstance.stop).toHaveBeenCalledTimes(1);
    });

    it("says so when the feed is empty", async () => {
      await listShows(createTestRuntime(feedOf(EMPTY_FEED)), { sort: "date", order: "desc" });

      expect(consoleLogSpy).toHaveBeenCalledWith("The feed has no episodes.");
    });

    it("fails the spinner and rethrows when the feed cannot be fetched", async () => {
      const runtime = createTestRuntime({
        fetch: async (url) => {
          throw feedFetchFailed(url, "Server answered 503");
        },
      });

      await expect(listShows(runtime, { sort: "date", order: "desc" })).rejects.toMatchObject({
        code: "FEED_FETCH_FAILED",
      });
      expect(oraInstance.fail).toHaveBeenCalledWith("Couldn't load the feed");
    });
  });

  describe("showInfo", () => {
    it("prints the details of one episode", async () => {
      await showInfo(createTestRuntime(), 1, {});

      expect(consoleLogSpy.mock.calls.map((call) => call[0] ?? "")).toEqual([
        "New",
        "",
        "  Published:    Fri, 01 Mar 2024 00:00:00 GMT",
        "  Size:         1.00 MB",
        "  Link:         http://x/new.mp3",
        "",
        "  Spring episode",
      ]);
    });

    it("marks an episode without media", async () => {
      await showInfo(createTestRuntime(), 2, {});

      expect(consoleLogSpy).toHaveBeenCalledWith("  Size:         unknown");
      expect(consoleLogSpy).toHaveBeenCalledWith("  Link:         none");
    });

    it("prints one record in JSON mode", async () => {
      initContext(["node", "castgrab", "--json"], {});

      await showInfo(createTestRuntime(), 0, {});

      expect(printedJson(consoleLogSpy)).toMatchObject({
        success: true,
        data: { index: 0, title: "Old", lengthBytes: 2097152, downloadable: true },
      });
    });

    it("rejects an index past the end of the feed", async () => {
      await expect(showInfo(createTestRuntime(), 3, {})).rejects.toMatchObject({
        code: "SELECTION_OUT_OF_RANGE",
      });
    });
  });
});
