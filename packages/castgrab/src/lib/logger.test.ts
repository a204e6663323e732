import { describe, it, expect, vi, beforeEach, type MockInstance } from "vitest";
import { createLogger, createNoopLogger } from "./logger.js";
import type { Clock } from "./ports/clock.js";

const fixedClock: Clock = {
  now: () => Date.UTC(2024, 4, 1, 9, 30, 0),
  newDate: () => new Date(Date.UTC(2024, 4, 1, 9, 30, 0)),
};

const STAMP = "2024-05-01T09:30:00.000Z";

describe("logger", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  function lastStdout(): string {
    return String(consoleLogSpy.mock.calls.at(-1)?.[0]);
  }

  function lastStderr(): string {
    return String(consoleErrorSpy.mock.calls.at(-1)?.[0]);
  }

  describe("createLogger", () => {
    describe("log level filtering", () => {
      it("drops debug lines below the configured level", () => {
        const logger = createLogger({ level: "info", json: false, clock: fixedClock });
        logger.debug("chunk written");
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });

      it("drops info lines at the default warn level", () => {
        const logger = createLogger({ level: "warn", json: false, clock: fixedClock });
        logger.info("Feed loaded");
        logger.warn("Partial file left behind");
        expect(consoleLogSpy).not.toHaveBeenCalled();
        expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      });

      it("keeps only errors at error level", () => {
        const logger = createLogger({ level: "error", json: false, clock: fixedClock });
        logger.warn("ignored");
        logger.error("Download failed");
        expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
        expect(lastStderr()).toContain("Download failed");
      });
    });

    describe("output routing", () => {
      it("writes debug and info to stdout", () => {
        const logger = createLogger({ level: "debug", json: false, clock: fixedClock });
        logger.debug("a");
        logger.info("b");
        expect(consoleLogSpy).toHaveBeenCalledTimes(2);
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });

      it("writes warn and error to stderr", () => {
        const logger = createLogger({ level: "debug", json: false, clock: fixedClock });
        logger.warn("a");
        logger.error("b");
        expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });
    });

    describe("human-readable format", () => {
      it("prints timestamp, padded level and message", () => {
        const logger = createLogger({ level: "debug", json: false, clock: fixedClock });
        logger.info("Download started");
        expect(lastStdout()).toBe(`[${STAMP}] INFO  Download started`);
      });

      it("appends metadata as JSON when provided", () => {
        const logger = createLogger({ level: "debug", json: false, clock: fixedClock });
        logger.warn("Download did not stop in time", { graceMs: 5000 });
        expect(lastStderr()).toBe(`[${STAMP}] WARN  Download did not stop in time {"graceMs":5000}`);
      });
    });

    describe("JSON format", () => {
      it("writes one object per line with metadata merged in", () => {
        const logger = createLogger({ level: "debug", json: true, clock: fixedClock });
        logger.info("Feed loaded", { shows: 3 });

        expect(JSON.parse(lastStdout())).toEqual({
          timestamp: STAMP,
          level: "info",
          message: "Feed loaded",
          shows: 3,
        });
      });
    });

    describe("child logger", () => {
      it("adds its default metadata to every line", () => {
        const logger = createLogger({ level: "debug", json: true, clock: fixedClock });
        const child = logger.child({ component: "download" });

        child.info("one");
        child.error("two");

        expect(JSON.parse(lastStdout())).toMatchObject({ component: "download", message: "one" });
        expect(JSON.parse(lastStderr())).toMatchObject({ component: "download", message: "two" });
      });

      it("lets per-call metadata override the defaults", () => {
        const logger = createLogger({ level: "debug", json: true, clock: fixedClock });
        logger.child({ component: "download" }).info("x", { component: "feed" });
        expect(JSON.parse(lastStdout()).component).toBe("feed");
      });

      it("merges metadata of nested children", () => {
        const logger = createLogger({ level: "debug", json: true, clock: fixedClock });
        logger.child({ a: 1 }).child({ b: 2 }).info("nested");
        expect(JSON.parse(lastStdout())).toMatchObject({ a: 1, b: 2 });
      });
    });
  });

  describe("createNoopLogger", () => {
    it("discards everything, children included", () => {
      const logger = createNoopLogger();

      logger.debug("debug");
      logger.info("info");
      logger.warn("warn");
      logger.error("error");
      logger.child({ component: "download" }).error("still nothing");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });
  });
});
