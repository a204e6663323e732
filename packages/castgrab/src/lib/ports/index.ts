export type { Clock } from "./clock.js";
export type { DelayFn } from "./timer.js";
export type { PromptService } from "./prompt.js";
export type { SignalHandler } from "./signal-handler.js";
export type { FeedSource } from "./feed-source.js";
export type { HttpStream, HttpStreamClient } from "./http-stream.js";
export type { FileSystem, WritableFile } from "./file-system.js";
