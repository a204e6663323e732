import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";
import type { LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/castgrab/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "castgrab",
  "config.yaml"
);

/** Environment variables read by loadConfig */
export const ENV_FEED_URL = "CASTGRAB_FEED_URL";
export const ENV_OUTPUT_DIR = "CASTGRAB_OUTPUT_DIR";

export type OverwritePolicy = "ask" | "always" | "never";

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  outputDir: join(homedir(), "Downloads"),
  chunkSize: 8192,
  shutdownGraceMs: 5000,
  fetchTimeoutMs: 30000,
  overwrite: "ask",
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  feed: z
    .object({
      url: z.string().url().optional(),
    })
    .optional(),
  download: z
    .object({
      outputDir: z.string().min(1).optional(),
      chunkSize: z.number().int().min(1024).max(1024 * 1024).optional(),
      shutdownGraceMs: z.number().int().min(0).max(60000).optional(),
      overwrite: z.enum(["ask", "always", "never"]).optional(),
    })
    .optional(),
  fetch: z
    .object({
      timeoutMs: z.number().int().min(1000).max(300000).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  feedUrl?: string;
  outputDir: string;
  chunkSize: number;
  shutdownGraceMs: number;
  fetchTimeoutMs: number;
  overwrite: OverwritePolicy;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Expand a leading ~ to the home directory.
 */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws a VALIDATION_CONFIG_INVALID CLIError if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`Cannot read file: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`Invalid YAML: ${errorMessage(err)}`]);
  }

  // Empty files are valid
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.feed?.url !== undefined) {
    target.feedUrl = source.feed.url;
  }
  if (source.download?.outputDir !== undefined) {
    target.outputDir = expandHome(source.download.outputDir);
  }
  if (source.download?.chunkSize !== undefined) {
    target.chunkSize = source.download.chunkSize;
  }
  if (source.download?.shutdownGraceMs !== undefined) {
    target.shutdownGraceMs = source.download.shutdownGraceMs;
  }
  if (source.download?.overwrite !== undefined) {
    target.overwrite = source.download.overwrite;
  }
  if (source.fetch?.timeoutMs !== undefined) {
    target.fetchTimeoutMs = source.fetch.timeoutMs;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Settings taken from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<ResolvedConfig> {
  const fromEnv: Partial<ResolvedConfig> = {};
  const feedUrl = env[ENV_FEED_URL]?.trim();
  const outputDir = env[ENV_OUTPUT_DIR]?.trim();

  if (feedUrl) fromEnv.feedUrl = feedUrl;
  if (outputDir) fromEnv.outputDir = expandHome(outputDir);
  return fromEnv;
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > environment > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  envOptions: Partial<ResolvedConfig> = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    outputDir: CONFIG_DEFAULTS.outputDir,
    chunkSize: CONFIG_DEFAULTS.chunkSize,
    shutdownGraceMs: CONFIG_DEFAULTS.shutdownGraceMs,
    fetchTimeoutMs: CONFIG_DEFAULTS.fetchTimeoutMs,
    overwrite: CONFIG_DEFAULTS.overwrite,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(envOptions));
  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Config file given with --config; replaces the
 *   system and user files
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const envOptions = configFromEnv(env);
  if (Object.keys(envOptions).length > 0) sources.push("environment");

  const config = resolveConfig(cliOptions, userConfig, systemConfig, envOptions);

  return { config, sources };
}
