import type { Clock } from "../ports/clock.js";

/**
 * Wall clock backed by Date.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  newDate: () => new Date(),
};
