import type { DelayFn } from "../ports/timer.js";

/**
 * Real delay function using setTimeout. The timer is unref'd so a pending
 * wait never holds the process open on its own.
 */
export const realDelay: DelayFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms).unref();
  });
