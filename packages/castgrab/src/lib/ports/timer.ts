/**
 * Promise-based delay function type.
 * Used to bound how long shutdown waits for a cancelled download.
 */
export type DelayFn = (ms: number) => Promise<void>;
