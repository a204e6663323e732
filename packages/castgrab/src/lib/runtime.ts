import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";
import type { FeedSource } from "./ports/feed-source.js";
import type { FileSystem } from "./ports/file-system.js";
import type { HttpStreamClient } from "./ports/http-stream.js";
import type { PromptService } from "./ports/prompt.js";
import type { SignalHandler } from "./ports/signal-handler.js";
import {
  createFetchFeedSource,
  createProcessSignalHandler,
  fetchHttpStreamClient,
  interactivePrompts,
  nodeFileSystem,
  realDelay,
  systemClock,
} from "./adapters/index.js";
import { loadConfig, type ResolvedConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { createOrchestrator, type Orchestrator } from "./orchestrator.js";
import type { DownloadEventSink } from "./download/types.js";

/**
 * Everything a command needs, resolved once per invocation.
 * Commands receive this instead of reaching for process globals.
 */
export interface Runtime {
  config: ResolvedConfig;
  /** Config files that contributed to `config` */
  sources: string[];
  logger: Logger;
  clock: Clock;
  delay: DelayFn;
  feedSource: FeedSource;
  http: HttpStreamClient;
  fs: FileSystem;
  prompts: PromptService;
  signals: SignalHandler;
}

/**
 * Builds a runtime, with per-command overrides taking precedence over
 * every other config source.
 */
export type RuntimeProvider = (overrides?: Partial<ResolvedConfig>) => Runtime;

export interface RuntimeOptions {
  /** --config path */
  configPath?: string;
  /** --verbose forces debug logging */
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
}

export function createRuntime(
  options: RuntimeOptions = {},
  overrides: Partial<ResolvedConfig> = {}
): Runtime {
  const { config, sources } = loadConfig(options.configPath, overrides, options.env);
  const logger = createLogger({
    level: options.verbose ? "debug" : config.logLevel,
    json: config.logJson,
  });

  logger.debug("Configuration loaded", { sources });

  return {
    config,
    sources,
    logger,
    clock: systemClock,
    delay: realDelay,
    feedSource: createFetchFeedSource({ timeoutMs: config.fetchTimeoutMs }),
    http: fetchHttpStreamClient,
    fs: nodeFileSystem,
    prompts: interactivePrompts,
    signals: createProcessSignalHandler(),
  };
}

/**
 * Wire an orchestrator to a runtime's adapters and config.
 */
export function orchestratorFor(runtime: Runtime, sink: DownloadEventSink = () => {}): Orchestrator {
  return createOrchestrator({
    config: {
      feedUrl: runtime.config.feedUrl,
      outputDir: runtime.config.outputDir,
      chunkSize: runtime.config.chunkSize,
    },
    feedSource: runtime.feedSource,
    http: runtime.http,
    fs: runtime.fs,
    clock: runtime.clock,
    delay: runtime.delay,
    logger: runtime.logger,
    sink,
  });
}
