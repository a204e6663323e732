export { systemClock } from "./system-clock.js";
export { realDelay } from "./real-timers.js";
export { interactivePrompts } from "./interactive-prompts.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createFetchFeedSource } from "./fetch-feed-source.js";
export { createFetchHttpStreamClient, fetchHttpStreamClient, parseContentLength } from "./fetch-http-stream.js";
export { nodeFileSystem } from "./node-file-system.js";
