export {
  parseFeed,
  descriptionHtml,
  extractFirstParagraph,
  parseLength,
  parsePublished,
} from "./feed/parser.js";
export { sortShows, compareShows, SORT_COLUMNS, SORT_ORDERS } from "./feed/sort.js";
export type { SortColumn, SortOrder } from "./feed/sort.js";
export {
  DEFAULT_PUBLISHED,
  DEFAULT_TITLE,
  UNPARSEABLE_DESCRIPTION,
  isDownloadable,
} from "./feed/types.js";
export type { ShowRecord } from "./feed/types.js";

export { createDownloadSession, DEFAULT_CHUNK_SIZE } from "./download/session.js";
export type { DownloadSession, DownloadSessionOptions } from "./download/session.js";
export { computeProgress, createProgressThrottle } from "./download/progress.js";
export { deriveFilename, destinationPathFor, extensionFromLink, sanitizeTitle } from "./download/filename.js";
export { isTerminalEvent } from "./download/types.js";
export type {
  DownloadEvent,
  DownloadEventSink,
  DownloadState,
  ProgressEvent,
  ProgressSnapshot,
  TerminalEvent,
  TerminalState,
} from "./download/types.js";

export { createOrchestrator } from "./orchestrator.js";
export type {
  DownloadHandle,
  Orchestrator,
  OrchestratorConfig,
  OrchestratorDeps,
  ShowSelection,
} from "./orchestrator.js";

export { formatBytes, formatEta, formatProgressLine } from "./format.js";
export { CLIError, isCLIError } from "./errors/types.js";
export type { ErrorCode } from "./errors/types.js";
export { createLogger, createNoopLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";

export * from "./adapters/index.js";
export type * from "./ports/index.js";
