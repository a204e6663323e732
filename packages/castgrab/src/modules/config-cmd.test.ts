import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { registerConfigCommands, EXAMPLE_CONFIG } from "./config-cmd.js";
import type { ResolvedConfig } from "../lib/config.js";
import { initContext, resetContext } from "../lib/cli-context.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  writeFileSync: vi.fn(),
}));

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    bold: (s: string) => s,
  },
}));

// Mock config module
vi.mock("../lib/config.js", () => ({
  loadConfig: vi.fn(),
  loadConfigFile: vi.fn(),
  USER_CONFIG_PATH: "/home/user/.config/castgrab/config.yaml",
  SYSTEM_CONFIG_PATH: "/etc/castgrab/config.yaml",
  ENV_FEED_URL: "CASTGRAB_FEED_URL",
  ENV_OUTPUT_DIR: "CASTGRAB_OUTPUT_DIR",
}));

import { existsSync, mkdirSync, writeFileSync } from "fs";
import { loadConfig, loadConfigFile } from "../lib/config.js";

const RESOLVED: ResolvedConfig = {
  feedUrl: "https://example.com/feed.xml",
  outputDir: "/home/user/Podcasts",
  chunkSize: 8192,
  shutdownGraceMs: 5000,
  fetchTimeoutMs: 30000,
  overwrite: "ask",
  logLevel: "warn",
  logJson: false,
};

describe("config-cmd", () => {
  let program: Command;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    program = new Command();
    program.exitOverride();
    registerConfigCommands(program);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    vi.clearAllMocks();
    resetContext();
    process.exitCode = undefined;
  });

  afterEach(() => {
    resetContext();
    process.exitCode = undefined;
  });

  describe("config init", () => {
    it("writes the example config to the user path", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(mkdirSync).toHaveBeenCalledWith("/home/user/.config/castgrab", { recursive: true });
      expect(writeFileSync).toHaveBeenCalledWith(
        "/home/user/.config/castgrab/config.yaml",
        EXAMPLE_CONFIG,
        "utf-8"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Created config file: /home/user/.config/castgrab/config.yaml"
      );
    });

    it("writes to the system path with --global", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(writeFileSync).toHaveBeenCalledWith("/etc/castgrab/config.yaml", EXAMPLE_CONFIG, "utf-8");
    });

    it("does not overwrite an existing config file", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(writeFileSync).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Config file already exists: /home/user/.config/castgrab/config.yaml"
      );
      expect(process.exitCode).toBe(1);
    });

    it("reports write errors and suggests sudo for the system file", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      vi.mocked(writeFileSync).mockImplementation(() => {
        throw new Error("Permission denied");
      });

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("Failed to create config: Permission denied");
      expect(consoleErrorSpy).toHaveBeenCalledWith("System config may require sudo.");
      expect(process.exitCode).toBe(1);
    });

    it("ships an example that documents every section", () => {
      for (const section of ["feed:", "download:", "fetch:", "logging:"]) {
        expect(EXAMPLE_CONFIG).toContain(`\n${section}\n`);
      }
    });
  });

  describe("config validate", () => {
    it("checks only the files that exist", async () => {
      vi.mocked(existsSync).mockImplementation((path) => String(path).includes("/home/user"));
      vi.mocked(loadConfigFile).mockReturnValue({});

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(loadConfigFile).toHaveBeenCalledTimes(1);
      expect(loadConfigFile).toHaveBeenCalledWith("/home/user/.config/castgrab/config.yaml");
      expect(consoleLogSpy).toHaveBeenCalledWith("  ✓ Valid");
    });

    it("reports validation errors", async () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockImplementation(() => {
        throw new Error("Config file /bad/config.yaml has errors");
      });

      await program.parseAsync(["node", "test", "config", "validate", "-c", "/bad/config.yaml"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "  ✗ Invalid: Config file /bad/config.yaml has errors"
      );
      expect(process.exitCode).toBe(1);
    });

    it("reports file not found for a specific path", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "validate", "-c", "/missing/config.yaml"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("File not found: /missing/config.yaml");
      expect(process.exitCode).toBe(1);
    });

    it("suggests init when no config files exist", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("No configuration files found.");
      expect(consoleLogSpy).toHaveBeenCalledWith("Run 'castgrab config init' to create one.");
      expect(process.exitCode).toBeUndefined();
    });
  });

  describe("config show", () => {
    it("prints every resolved setting", async () => {
      vi.mocked(loadConfig).mockReturnValue({
        config: RESOLVED,
        sources: ["/home/user/.config/castgrab/config.yaml"],
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Sources: /home/user/.config/castgrab/config.yaml"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith("  url:             https://example.com/feed.xml");
      expect(consoleLogSpy).toHaveBeenCalledWith("  outputDir:       /home/user/Podcasts");
      expect(consoleLogSpy).toHaveBeenCalledWith("  overwrite:       ask");
    });

    it("marks a missing feed URL and a defaults-only config", async () => {
      vi.mocked(loadConfig).mockReturnValue({
        config: { ...RESOLVED, feedUrl: undefined },
        sources: [],
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Sources: (defaults only)");
      expect(consoleLogSpy).toHaveBeenCalledWith("  url:             (not set)");
    });

    it("prints JSON in JSON mode", async () => {
      initContext(["node", "test", "--json"], {});
      vi.mocked(loadConfig).mockReturnValue({ config: RESOLVED, sources: [] });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
        success: true,
        data: { effective: RESOLVED, sources: [] },
      });
    });

    it("passes -c through to loadConfig", async () => {
      vi.mocked(loadConfig).mockReturnValue({ config: RESOLVED, sources: [] });

      await program.parseAsync(["node", "test", "config", "show", "-c", "/custom/config.yaml"]);

      expect(loadConfig).toHaveBeenCalledWith("/custom/config.yaml");
    });

    it("handles config loading errors", async () => {
      vi.mocked(loadConfig).mockImplementation(() => {
        throw new Error("Config parse error");
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("Failed to load config: Config parse error");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config path", () => {
    it("lists both locations with their status", async () => {
      vi.mocked(existsSync).mockImplementation((path) => String(path).startsWith("/etc"));

      await program.parseAsync(["node", "test", "config", "path"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("  /home/user/.config/castgrab/config.yaml");
      expect(consoleLogSpy).toHaveBeenCalledWith("  (not found)");
      expect(consoleLogSpy).toHaveBeenCalledWith("  /etc/castgrab/config.yaml");
      expect(consoleLogSpy).toHaveBeenCalledWith("  (exists)");
    });
  });
});
